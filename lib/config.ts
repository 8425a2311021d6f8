/**
 * @fileoverview Runtime configuration
 *
 * Environment variables validated with zod. Timeouts bound every external
 * call the pipeline makes; the concurrency bound caps parallel runs to respect
 * embedding and model rate limits.
 *
 * @module lib/config
 */

import { z } from "zod"
import { ValidationError } from "./errors"
import { MODELS } from "./ai/config"

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback)

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v : undefined))

export const configSchema = z.object({
  DATABASE_URL: optionalString,
  VOYAGE_API_KEY: optionalString,
  ANALYZER_MODEL: z.string().min(1).default(MODELS.best),
  EXTRACTION_TIMEOUT_MS: positiveInt(30_000),
  EMBEDDING_TIMEOUT_MS: positiveInt(15_000),
  ANALYSIS_TIMEOUT_MS: positiveInt(120_000),
  STORAGE_TIMEOUT_MS: positiveInt(30_000),
  PIPELINE_CONCURRENCY: positiveInt(3),
  SENTRY_DSN: optionalString,
})

export type EnvConfig = z.infer<typeof configSchema>

/** Per-stage time budgets, in milliseconds. */
export interface PipelineTimeouts {
  extractionMs: number
  embeddingMs: number
  analysisMs: number
  storageMs: number
}

export interface AppConfig {
  databaseUrl?: string
  voyageApiKey?: string
  analyzerModel: string
  timeouts: PipelineTimeouts
  concurrency: number
  sentryDsn?: string
}

/**
 * Parses configuration from environment variables.
 *
 * @throws ValidationError - one detail per invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = configSchema.safeParse(env)
  if (!parsed.success) {
    const error = ValidationError.fromZodError(parsed.error)
    throw new ValidationError("Invalid configuration", error.details)
  }

  const c = parsed.data
  return {
    databaseUrl: c.DATABASE_URL,
    voyageApiKey: c.VOYAGE_API_KEY,
    analyzerModel: c.ANALYZER_MODEL,
    timeouts: {
      extractionMs: c.EXTRACTION_TIMEOUT_MS,
      embeddingMs: c.EMBEDDING_TIMEOUT_MS,
      analysisMs: c.ANALYSIS_TIMEOUT_MS,
      storageMs: c.STORAGE_TIMEOUT_MS,
    },
    concurrency: c.PIPELINE_CONCURRENCY,
    sentryDsn: c.SENTRY_DSN,
  }
}
