/**
 * @fileoverview Embedding generation
 *
 * `EmbeddingProvider` is the text-to-vector capability; `VoyageAIClient` is
 * the production provider (voyage-law-2, legal-domain embeddings).
 * `EmbeddingGenerator` wraps any provider with a time budget and dimension
 * checks, and substitutes a zero vector when the provider fails so a run
 * never halts on embeddings.
 *
 * @module lib/embeddings
 */

import pLimit from "p-limit"
import { z } from "zod"
import {
  getCachedEmbedding,
  setCachedEmbedding,
} from "./cache"
import { EmbeddingFailedError, ValidationError, errorMessage } from "./errors"
import { logger } from "./logger"
import { withTimeout } from "./timeout"
import { zeroVector } from "./similarity"

/**
 * Voyage AI configuration.
 */
export const VOYAGE_CONFIG = {
  model: "voyage-law-2",
  dimensions: 1024,
  maxInputTokens: 16_000,
  /** Character budget per input, ~3 chars/token below the token limit */
  maxInputChars: 48_000,
  batchLimit: 128,
  baseUrl: "https://api.voyageai.com/v1",
} as const

/** Dimension D of every stored contract and clause embedding. */
export const EMBEDDING_DIMENSIONS = VOYAGE_CONFIG.dimensions

/**
 * Input type for embedding generation.
 */
export type EmbeddingInputType = "document" | "query"

/**
 * Text-to-vector capability with a declared output dimension. Providers that
 * accept several inputs per request implement `embedBatch`.
 */
export interface EmbeddingProvider {
  readonly model: string
  readonly dimensions: number
  embed(
    text: string,
    inputType: EmbeddingInputType,
    signal?: AbortSignal
  ): Promise<number[]>
  embedBatch?(
    texts: string[],
    inputType: EmbeddingInputType,
    signal?: AbortSignal
  ): Promise<{ embeddings: number[][] }>
}

/**
 * Batch embedding result.
 */
export interface BatchEmbeddingResult {
  embeddings: number[][]
  totalTokens: number
  cacheHits: number
}

/**
 * Voyage AI API response schema.
 */
const voyageResponseSchema = z.object({
  object: z.literal("list"),
  data: z.array(
    z.object({
      object: z.literal("embedding"),
      index: z.number(),
      embedding: z.array(z.number()),
    })
  ),
  model: z.string(),
  usage: z.object({
    total_tokens: z.number(),
  }),
})

/**
 * Voyage AI client.
 */
export class VoyageAIClient implements EmbeddingProvider {
  readonly model = VOYAGE_CONFIG.model
  readonly dimensions = VOYAGE_CONFIG.dimensions
  private apiKey: string
  private baseUrl: string

  constructor(apiKey?: string) {
    this.apiKey = apiKey ?? process.env.VOYAGE_API_KEY ?? ""
    if (!this.apiKey) {
      throw new ValidationError("VOYAGE_API_KEY is required")
    }
    this.baseUrl = VOYAGE_CONFIG.baseUrl
  }

  async embed(
    text: string,
    inputType: EmbeddingInputType,
    signal?: AbortSignal
  ): Promise<number[]> {
    const result = await this.embedBatch([text], inputType, signal)
    return result.embeddings[0]
  }

  /**
   * Generate embeddings for multiple texts with caching.
   *
   * @throws EmbeddingFailedError - non-2xx response or malformed body
   */
  async embedBatch(
    texts: string[],
    inputType: EmbeddingInputType = "document",
    signal?: AbortSignal
  ): Promise<BatchEmbeddingResult> {
    if (texts.length === 0) {
      return { embeddings: [], totalTokens: 0, cacheHits: 0 }
    }

    if (texts.length > VOYAGE_CONFIG.batchLimit) {
      throw new ValidationError(
        `Batch size ${texts.length} exceeds limit ${VOYAGE_CONFIG.batchLimit}`
      )
    }

    const embeddings: Array<number[] | undefined> = texts.map(
      (text) => getCachedEmbedding(text, inputType, this.model)?.embedding
    )
    const uncached = texts
      .map((text, index) => ({ text, index }))
      .filter(({ index }) => embeddings[index] === undefined)
    const cacheHits = texts.length - uncached.length

    if (uncached.length === 0) {
      return { embeddings: collect(embeddings), totalTokens: 0, cacheHits }
    }

    const response = await fetch(`${this.baseUrl}/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        input: uncached.map((u) => u.text),
        input_type: inputType,
      }),
      signal,
    })

    if (!response.ok) {
      const error = await response.text()
      throw new EmbeddingFailedError(
        `Voyage AI API error (${response.status}): ${error}`
      )
    }

    const parsed = voyageResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new EmbeddingFailedError("Voyage AI returned a malformed response")
    }
    if (parsed.data.data.length !== uncached.length) {
      throw new EmbeddingFailedError(
        `Voyage AI returned ${parsed.data.data.length} embeddings for ${uncached.length} inputs`
      )
    }

    // Sort by index to match request order
    const sorted = [...parsed.data.data].sort((a, b) => a.index - b.index)
    const tokensPerText = Math.floor(parsed.data.usage.total_tokens / uncached.length)

    uncached.forEach(({ text, index }, i) => {
      embeddings[index] = sorted[i].embedding
      setCachedEmbedding(text, inputType, this.model, sorted[i].embedding, tokensPerText)
    })

    return {
      embeddings: collect(embeddings),
      totalTokens: parsed.data.usage.total_tokens,
      cacheHits,
    }
  }
}

// Singleton instance
let voyageClient: VoyageAIClient | null = null

/**
 * Get the shared Voyage AI client.
 *
 * @throws ValidationError - no API key given and none in the environment
 */
export function getVoyageAIClient(apiKey?: string): VoyageAIClient {
  if (!voyageClient) {
    voyageClient = new VoyageAIClient(apiKey)
  }
  return voyageClient
}

/**
 * Reset the singleton (for testing).
 */
export function resetVoyageAIClient(): void {
  voyageClient = null
}

function collect(embeddings: Array<number[] | undefined>): number[][] {
  return embeddings.map((e, i) => {
    if (!e) throw new EmbeddingFailedError(`Missing embedding for input ${i}`)
    return e
  })
}

// ============================================================================
// Embedding Generator
// ============================================================================

/**
 * A nominal vector from the provider, or a zero vector standing in for a
 * failed call. Callers keep the reason; search later scores degraded vectors 0.
 */
export type EmbeddingOutcome =
  | { status: "nominal"; vector: number[] }
  | { status: "degraded"; vector: number[]; reason: string }

export interface EmbeddingGeneratorOptions {
  /** Per-call budget. Default: 15s */
  timeoutMs?: number
  /** Inputs longer than this are cut before embedding */
  maxInputChars?: number
  /** Texts per `embedBatch` request. Default: 128 */
  batchSize?: number
  /** Parallel `embed` calls when the provider has no `embedBatch`. Default: 4 */
  concurrency?: number
}

export class EmbeddingGenerator {
  readonly dimensions: number
  private readonly timeoutMs: number
  private readonly maxInputChars: number
  private readonly batchSize: number
  private readonly concurrency: number

  constructor(
    private readonly provider: EmbeddingProvider,
    options: EmbeddingGeneratorOptions = {}
  ) {
    this.dimensions = provider.dimensions
    this.timeoutMs = options.timeoutMs ?? 15_000
    this.maxInputChars = options.maxInputChars ?? VOYAGE_CONFIG.maxInputChars
    this.batchSize = options.batchSize ?? VOYAGE_CONFIG.batchLimit
    this.concurrency = options.concurrency ?? 4
  }

  /**
   * Embeds one text. Never rejects for provider failures.
   *
   * @throws ValidationError - empty or whitespace-only text
   */
  async embed(
    text: string,
    inputType: EmbeddingInputType = "document",
    signal?: AbortSignal
  ): Promise<EmbeddingOutcome> {
    const input = this.prepare(text)

    let vector: number[]
    try {
      vector = await withTimeout(
        "embedding",
        this.timeoutMs,
        (s) => this.provider.embed(input, inputType, s),
        signal
      )
    } catch (error) {
      return this.degrade(errorMessage(error))
    }

    const problem = checkVector(vector, this.dimensions)
    return problem ? this.degrade(problem) : { status: "nominal", vector }
  }

  /**
   * Embeds several texts, preserving input order. Batching providers get one
   * request per `batchSize` texts and a failed request degrades its whole
   * batch; otherwise at most `concurrency` single calls run at once.
   *
   * @throws ValidationError - any text is empty or whitespace-only
   */
  async embedMany(
    texts: string[],
    inputType: EmbeddingInputType = "document",
    signal?: AbortSignal
  ): Promise<EmbeddingOutcome[]> {
    const inputs = texts.map((text) => this.prepare(text))
    const embedBatch = this.provider.embedBatch?.bind(this.provider)

    if (!embedBatch) {
      const limit = pLimit(this.concurrency)
      return Promise.all(inputs.map((t) => limit(() => this.embed(t, inputType, signal))))
    }

    const outcomes: EmbeddingOutcome[] = []
    for (let start = 0; start < inputs.length; start += this.batchSize) {
      const batch = inputs.slice(start, start + this.batchSize)
      const vectors = withTimeout(
        "embedding",
        this.timeoutMs,
        async (s) => (await embedBatch(batch, inputType, s)).embeddings,
        signal
      )
      outcomes.push(...(await this.settleBatch(batch.length, vectors)))
    }
    return outcomes
  }

  private async settleBatch(
    size: number,
    pending: Promise<number[][]>
  ): Promise<EmbeddingOutcome[]> {
    let vectors: number[][]
    try {
      vectors = await pending
    } catch (error) {
      const reason = errorMessage(error)
      return Array.from({ length: size }, () => this.degrade(reason))
    }

    if (vectors.length !== size) {
      const reason = `expected ${size} embeddings, got ${vectors.length}`
      return Array.from({ length: size }, () => this.degrade(reason))
    }
    return vectors.map((vector): EmbeddingOutcome => {
      const problem = checkVector(vector, this.dimensions)
      return problem ? this.degrade(problem) : { status: "nominal", vector }
    })
  }

  /** Rejects blank text and cuts it to the character budget */
  private prepare(text: string): string {
    if (text.trim().length === 0) {
      throw new ValidationError("Cannot embed empty text")
    }
    return text.length > this.maxInputChars ? text.slice(0, this.maxInputChars) : text
  }

  private degrade(reason: string): EmbeddingOutcome {
    logger.warn("Embedding degraded to zero vector", {
      model: this.provider.model,
      reason,
    })
    return { status: "degraded", vector: zeroVector(this.dimensions), reason }
  }
}

function checkVector(vector: unknown, dimensions: number): string | null {
  if (!Array.isArray(vector)) return "provider returned a non-array embedding"
  if (vector.length !== dimensions) {
    return `expected ${dimensions} dimensions, got ${vector.length}`
  }
  if (!vector.every((v) => typeof v === "number" && Number.isFinite(v))) {
    return "embedding contains non-finite values"
  }
  return null
}
