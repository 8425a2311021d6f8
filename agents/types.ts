import { z } from 'zod'

// ============================================================================
// Risk Levels
// ============================================================================

export const RISK_LEVELS = ['Low', 'Medium', 'High'] as const

export type RiskLevel = (typeof RISK_LEVELS)[number]

export const riskLevelSchema = z.enum(RISK_LEVELS)

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_TITLE = 'Untitled'

/** Substituted for any missing free-text field */
export const NOT_SPECIFIED = 'Not specified'

/** Conservative default for absent or unrecognised risk output */
export const DEFAULT_RISK_LEVEL: RiskLevel = 'Medium'

// ============================================================================
// Structured Analysis
// ============================================================================

/** Per-clause facets that can be defaulted independently */
export const CLAUSE_FACETS = [
  'riskLevel',
  'riskReason',
  'obligation',
  'liability',
  'aiSummary',
] as const

export type ClauseFacet = (typeof CLAUSE_FACETS)[number]

const requiredText = z.string().trim().min(1)

/** ISO calendar date, YYYY-MM-DD */
export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/)

export const partySchema = z
  .object({
    name: requiredText,
    role: requiredText,
  })
  .strict()

export type Party = z.infer<typeof partySchema>

export const importantDateSchema = z
  .object({
    value: isoDateSchema,
    type: requiredText,
  })
  .strict()

export type ImportantDate = z.infer<typeof importantDateSchema>

export const clauseAnalysisSchema = z
  .object({
    name: requiredText,
    summary: requiredText,
    risk: z
      .object({
        level: riskLevelSchema,
        reason: requiredText,
      })
      .strict(),
    obligation: requiredText,
    liability: requiredText,
    aiSummary: requiredText,
    /** Facets substituted by defaulting rather than taken from the model */
    defaulted: z.array(z.enum(CLAUSE_FACETS)),
  })
  .strict()

export type ClauseAnalysis = z.infer<typeof clauseAnalysisSchema>

export const structuredAnalysisSchema = z
  .object({
    title: requiredText,
    governingLaw: requiredText,
    parties: z.array(partySchema),
    dates: z.array(importantDateSchema),
    clauses: z.array(clauseAnalysisSchema),
  })
  .strict()

export type StructuredAnalysis = z.infer<typeof structuredAnalysisSchema>

/** Analysis used when nothing usable came back from the model */
export function minimalAnalysis(): StructuredAnalysis {
  return {
    title: DEFAULT_TITLE,
    governingLaw: NOT_SPECIFIED,
    parties: [],
    dates: [],
    clauses: [],
  }
}
