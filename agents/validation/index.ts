/**
 * @fileoverview Model output recovery and defaulting
 *
 * Pure functions only; safe to import anywhere.
 *
 * @module agents/validation
 */

export { recoverJsonObject, repairTruncated, type RecoveredJson, type RecoveryMethod } from './json-recovery'
export {
  normalizeAnalysis,
  normalizeDate,
  normalizeRiskLevel,
  assertStructuredAnalysis,
  type NormalizedAnalysis,
} from './normalize'
