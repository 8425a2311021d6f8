/**
 * @fileoverview Embedding Cache
 *
 * LRU cache for provider embeddings so re-ingesting a contract, or searching
 * the same query twice, does not call the embedding API again. Only vectors
 * returned by the provider are stored; degraded zero vectors never are.
 *
 * @module lib/cache/embedding-cache
 */

import { LRUCache } from "lru-cache"
import { createHash } from "crypto"
import type { EmbeddingInputType } from "@/lib/embeddings"

export interface CachedEmbedding {
  embedding: number[]
  tokens: number
  cachedAt: number
}

/**
 * - Max 10,000 entries (~40MB at 1024 dimensions)
 * - 1-hour TTL
 */
const embeddingCache = new LRUCache<string, CachedEmbedding>({
  max: 10_000,
  ttl: 1000 * 60 * 60,
})

/**
 * Cache key from model, input type and normalised text.
 * Whitespace runs collapse so re-extracted text still hits.
 */
export function getCacheKey(
  text: string,
  inputType: EmbeddingInputType,
  model: string
): string {
  const normalized = text.trim().replace(/\s+/g, " ")
  const hash = createHash("sha256").update(normalized).digest("hex").substring(0, 16)
  return `emb:${model}:${inputType}:${hash}`
}

export function getCachedEmbedding(
  text: string,
  inputType: EmbeddingInputType,
  model: string
): CachedEmbedding | null {
  return embeddingCache.get(getCacheKey(text, inputType, model)) ?? null
}

export function setCachedEmbedding(
  text: string,
  inputType: EmbeddingInputType,
  model: string,
  embedding: number[],
  tokens: number
): void {
  embeddingCache.set(getCacheKey(text, inputType, model), {
    embedding,
    tokens,
    cachedAt: Date.now(),
  })
}

/**
 * Clear the cache (for testing).
 */
export function clearEmbeddingCache(): void {
  embeddingCache.clear()
}
