/**
 * @fileoverview Field-level defaulting of model output
 *
 * `normalizeAnalysis` maps any value (usually parsed model JSON) to a
 * `StructuredAnalysis` that passes `structuredAnalysisSchema`. Each field is
 * checked on its own; a bad field is replaced by its default and recorded as
 * an issue, leaving the rest of the analysis intact.
 *
 * @module agents/validation/normalize
 */

import { z } from 'zod'
import { ValidationError } from '@/lib/errors'
import {
  DEFAULT_RISK_LEVEL,
  DEFAULT_TITLE,
  NOT_SPECIFIED,
  RISK_LEVELS,
  isoDateSchema,
  minimalAnalysis,
  structuredAnalysisSchema,
  type ClauseAnalysis,
  type ClauseFacet,
  type ImportantDate,
  type Party,
  type RiskLevel,
  type StructuredAnalysis,
} from '../types'

export interface NormalizedAnalysis {
  analysis: StructuredAnalysis
  /** One entry per substituted or dropped field, e.g. `clauses[0].obligation: missing` */
  issues: string[]
}

type Fields = Record<string, unknown>

const recordSchema = z.record(z.unknown())
// PostgreSQL text columns reject NUL
const textSchema = z
  .string()
  .transform((s) => s.replace(/\u0000/g, ''))
  .pipe(z.string().trim().min(1))

function asRecord(value: unknown): Fields | null {
  if (Array.isArray(value)) return null
  const parsed = recordSchema.safeParse(value)
  return parsed.success ? parsed.data : null
}

/** First non-blank string among `keys`, trimmed */
function pickText(fields: Fields | null, keys: readonly string[]): string | undefined {
  if (!fields) return undefined
  for (const key of keys) {
    const parsed = textSchema.safeParse(fields[key])
    if (parsed.success) return parsed.data
  }
  return undefined
}

function pickValue(fields: Fields, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (fields[key] !== undefined && fields[key] !== null) return fields[key]
  }
  return undefined
}

export function normalizeRiskLevel(value: unknown): RiskLevel | undefined {
  const parsed = textSchema.safeParse(value)
  if (!parsed.success) return undefined
  const wanted = parsed.data.toLowerCase()
  return RISK_LEVELS.find((level) => level.toLowerCase() === wanted)
}

const ISO_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/

/**
 * Normalizes a calendar date to YYYY-MM-DD, or undefined when it does not
 * name a real day.
 */
export function normalizeDate(value: unknown): string | undefined {
  const parsed = textSchema.safeParse(value)
  if (!parsed.success) return undefined
  const text = parsed.data

  const iso = ISO_PREFIX.exec(text)
  if (iso) {
    const [year, month, day] = [Number(iso[1]), Number(iso[2]), Number(iso[3])]
    const date = new Date(Date.UTC(year, month - 1, day))
    const valid =
      date.getUTCFullYear() === year &&
      date.getUTCMonth() === month - 1 &&
      date.getUTCDate() === day
    return valid ? `${iso[1]}-${iso[2]}-${iso[3]}` : undefined
  }

  // Free-form dates ("March 1, 2024") parse in local time
  const timestamp = Date.parse(text)
  if (Number.isNaN(timestamp)) return undefined
  const date = new Date(timestamp)
  const pad = (n: number) => String(n).padStart(2, '0')
  const formatted = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  // Years outside 1-9999 have no YYYY-MM-DD form
  return isoDateSchema.safeParse(formatted).success && date.getFullYear() >= 1
    ? formatted
    : undefined
}

function normalizeList<T>(
  root: Fields,
  keys: readonly string[],
  path: string,
  issues: string[],
  normalizeItem: (value: unknown, itemPath: string) => T | null
): T[] {
  const value = pickValue(root, keys)
  if (value === undefined) {
    issues.push(`${path}: missing, using []`)
    return []
  }
  if (!Array.isArray(value)) {
    issues.push(`${path}: not a list, using []`)
    return []
  }

  const items: T[] = []
  value.forEach((entry, i) => {
    const item = normalizeItem(entry, `${path}[${i}]`)
    if (item !== null) items.push(item)
  })
  return items
}

export function normalizeAnalysis(input: unknown): NormalizedAnalysis {
  const issues: string[] = []

  const root = asRecord(input)
  if (!root) {
    issues.push('analysis: not an object, using defaults')
    return { analysis: minimalAnalysis(), issues }
  }

  const text = (fields: Fields | null, keys: readonly string[], path: string, fallback: string) => {
    const value = pickText(fields, keys)
    if (value !== undefined) return value
    issues.push(`${path}: missing, defaulted to "${fallback}"`)
    return fallback
  }

  const normalizeParty = (value: unknown, path: string): Party | null => {
    // A bare string is taken as the party name
    const bare = textSchema.safeParse(value)
    if (bare.success) {
      issues.push(`${path}.role: missing, defaulted to "${NOT_SPECIFIED}"`)
      return { name: bare.data, role: NOT_SPECIFIED }
    }
    const fields = asRecord(value)
    const name = pickText(fields, ['name', 'organization', 'party'])
    if (name === undefined) {
      issues.push(`${path}: dropped, no name`)
      return null
    }
    return { name, role: text(fields, ['role', 'type'], `${path}.role`, NOT_SPECIFIED) }
  }

  const normalizeImportantDate = (value: unknown, path: string): ImportantDate | null => {
    const fields = asRecord(value)
    const date = fields ? normalizeDate(pickValue(fields, ['value', 'date'])) : undefined
    if (date === undefined) {
      issues.push(`${path}: dropped, no parseable date`)
      return null
    }
    return {
      value: date,
      type: text(fields, ['type', 'label', 'description'], `${path}.type`, NOT_SPECIFIED),
    }
  }

  const normalizeClause = (value: unknown, path: string): ClauseAnalysis | null => {
    const fields = asRecord(value)
    if (!fields) {
      issues.push(`${path}: dropped, not an object`)
      return null
    }

    const defaulted: ClauseFacet[] = []
    const facet = (name: ClauseFacet, keys: readonly string[], source: Fields | null) => {
      const found = pickText(source, keys)
      if (found !== undefined) return found
      defaulted.push(name)
      issues.push(`${path}.${name}: missing, defaulted to "${NOT_SPECIFIED}"`)
      return NOT_SPECIFIED
    }

    // risk may be { level, reason }, a bare level string, or flattened keys
    const risk = asRecord(fields.risk)
    const rawLevel = risk
      ? pickValue(risk, ['level', 'rating'])
      : pickValue(fields, ['risk', 'risk_level', 'riskLevel'])
    let level = normalizeRiskLevel(rawLevel)
    if (level === undefined) {
      defaulted.push('riskLevel')
      issues.push(
        rawLevel === undefined
          ? `${path}.riskLevel: missing, defaulted to ${DEFAULT_RISK_LEVEL}`
          : `${path}.riskLevel: unrecognised ${JSON.stringify(rawLevel)}, defaulted to ${DEFAULT_RISK_LEVEL}`
      )
      level = DEFAULT_RISK_LEVEL
    }

    const reasonSource = risk && pickText(risk, ['reason']) !== undefined ? risk : fields

    return {
      name: text(fields, ['name', 'clause_name', 'clauseName', 'title'], `${path}.name`, NOT_SPECIFIED),
      summary: text(fields, ['summary', 'clause_summary'], `${path}.summary`, NOT_SPECIFIED),
      risk: {
        level,
        reason: facet('riskReason', ['reason', 'risk_reason', 'riskReason'], reasonSource),
      },
      obligation: facet('obligation', ['obligation', 'obligations'], fields),
      liability: facet('liability', ['liability', 'liabilities'], fields),
      aiSummary: facet('aiSummary', ['aiSummary', 'ai_summary'], fields),
      defaulted,
    }
  }

  const candidate: StructuredAnalysis = {
    title: text(root, ['title', 'contract_title', 'contractTitle'], 'title', DEFAULT_TITLE),
    governingLaw: text(root, ['governingLaw', 'governing_law'], 'governingLaw', NOT_SPECIFIED),
    parties: normalizeList(root, ['parties', 'organizations'], 'parties', issues, normalizeParty),
    dates: normalizeList(
      root,
      ['dates', 'importantDates', 'important_dates'],
      'dates',
      issues,
      normalizeImportantDate
    ),
    clauses: normalizeList(root, ['clauses'], 'clauses', issues, normalizeClause),
  }

  return { analysis: assertStructuredAnalysis(candidate), issues }
}

/**
 * @throws ValidationError - the analysis does not satisfy the storage schema
 */
export function assertStructuredAnalysis(value: unknown): StructuredAnalysis {
  const parsed = structuredAnalysisSchema.safeParse(value)
  if (!parsed.success) {
    const error = ValidationError.fromZodError(parsed.error)
    throw new ValidationError('Structured analysis failed validation', error.details)
  }
  return parsed.data
}
