/**
 * Vector similarity primitives for clause search.
 *
 * Scores are computed in process rather than with pgvector's `<=>` operator:
 * pgvector returns NaN for a zero vector, while a degraded clause must score
 * exactly 0 and still appear in results.
 */

import { ValidationError } from "./errors"

export function zeroVector(dimensions: number): number[] {
  return new Array<number>(dimensions).fill(0)
}

export function isZeroVector(vector: readonly number[]): boolean {
  return vector.every((v) => v === 0)
}

/**
 * Cosine similarity `dot(a, b) / (|a| * |b|)`, defined as 0 when either
 * vector has zero norm.
 *
 * @throws ValidationError - vectors of different length
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new ValidationError("Vector dimension mismatch", [
      { field: "vector", message: `expected ${a.length}, got ${b.length}` },
    ])
  }

  let dot = 0
  let normA = 0
  let normB = 0
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i]
    normA += a[i] * a[i]
    normB += b[i] * b[i]
  }

  if (normA === 0 || normB === 0) return 0
  return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

export interface Scored<T> {
  item: T
  score: number
}

/**
 * Scores every candidate against `query`, best first. Ties keep candidate
 * order (Array.prototype.sort is stable).
 */
export function rankBySimilarity<T>(
  query: readonly number[],
  candidates: readonly T[],
  vectorOf: (item: T) => readonly number[],
  topK: number
): Scored<T>[] {
  return candidates
    .map((item) => ({ item, score: cosineSimilarity(query, vectorOf(item)) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, topK)
}
