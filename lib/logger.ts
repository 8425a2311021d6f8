import * as Sentry from "@sentry/node"

/**
 * Structured logger using Sentry.logger
 *
 * Calls are no-ops until `initSentry()` has run with a DSN, so library code
 * and tests can log freely.
 *
 * @example
 * ```ts
 * import { logger } from "@/lib/logger"
 *
 * logger.info("Contract stored", { contractId: "contract-1a2b", clauses: 12 })
 * logger.warn("Embedding degraded", { contractId, reason: err.message })
 * logger.error("Pipeline failed", { contractId, stage: "STORED", code: "STORAGE_FAILED" })
 * ```
 */
export const logger = Sentry.logger
