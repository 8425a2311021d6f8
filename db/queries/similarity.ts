/**
 * @fileoverview Clause Similarity Search
 *
 * Ranks stored clauses against a free-text query by cosine similarity of
 * their embeddings.
 *
 * ## Linear Scan
 *
 * Scores are computed in process over every stored clause rather than with
 * pgvector's `cosineDistance()` and an HNSW index:
 *
 * - Degraded clauses carry all-zero vectors. pgvector's cosine distance on a
 *   zero vector is NaN, while these clauses must stay in the results with a
 *   score of exactly 0.
 * - Ties must resolve by clause insertion order (`seq`), which an approximate
 *   index does not guarantee.
 *
 * | Score | Interpretation                           |
 * |-------|------------------------------------------|
 * | 1.0   | Same direction as the query              |
 * | 0.0   | Orthogonal, or a degraded (zero) vector  |
 * | -1.0  | Opposite                                 |
 *
 * @module db/queries/similarity
 */

import { asc } from "drizzle-orm"
import { EmbeddingGenerator } from "@/lib/embeddings"
import { ValidationError, driverErrorMessage, isAppError, StorageError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import { rankBySimilarity } from "@/lib/similarity"
import { withTimeout } from "@/lib/timeout"
import { getDb, type Database } from "../client"
import { clauses } from "../schema"

export interface ClauseMatch {
  contractId: string
  clauseId: string
  clauseName: string
  score: number
}

export interface SimilaritySearchOptions {
  /** Budget for the clause scan. Default: 30s */
  timeoutMs?: number
}

export interface ScannedClause {
  id: string
  contractId: string
  name: string
  embedding: number[]
}

export class SimilaritySearch {
  private readonly timeoutMs: number

  constructor(
    private readonly embeddings: EmbeddingGenerator,
    private readonly db: Database = getDb(),
    options: SimilaritySearchOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 30_000
  }

  /**
   * Top `topK` clauses by descending similarity to `queryText`.
   *
   * A degraded query embedding (embedding service down) scores every clause 0,
   * so the result is the first `topK` clauses in insertion order.
   *
   * @throws ValidationError - `topK` is not a positive integer, or the query is empty
   * @throws StorageError - clauses could not be read
   * @throws TimeoutError - the clause scan exceeded its budget
   */
  async searchSimilarClauses(queryText: string, topK: number): Promise<ClauseMatch[]> {
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new ValidationError("topK must be a positive integer", [
        { field: "topK", message: `got ${topK}` },
      ])
    }

    const query = await this.embeddings.embed(queryText, "query")
    if (query.status === "degraded") {
      logger.warn("Similarity search using degraded query embedding", { reason: query.reason })
    }

    let rows: ScannedClause[]
    try {
      rows = await withTimeout("clause scan", this.timeoutMs, () => this.loadClauses())
    } catch (error) {
      if (isAppError(error)) throw error
      throw new StorageError(`Clause scan failed: ${driverErrorMessage(error)}`, { cause: error })
    }

    return rankBySimilarity(query.vector, rows, (row) => row.embedding, topK).map(
      ({ item, score }) => ({
        contractId: item.contractId,
        clauseId: item.id,
        clauseName: item.name,
        score,
      })
    )
  }

  /** Every stored clause in insertion order */
  protected async loadClauses(): Promise<ScannedClause[]> {
    return this.db
      .select({
        id: clauses.id,
        contractId: clauses.contractId,
        name: clauses.name,
        embedding: clauses.embedding,
      })
      .from(clauses)
      .orderBy(asc(clauses.seq))
  }
}
