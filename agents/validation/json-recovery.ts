/**
 * @fileoverview Best-effort JSON recovery for model completions
 *
 * Models wrap JSON in Markdown fences, add prose around it, or stop mid-way
 * when they hit the output token limit. Each step below is tried in order
 * and the first that parses wins.
 *
 * @module agents/validation/json-recovery
 */

export type RecoveryMethod = 'strict' | 'fenced' | 'sliced' | 'repaired'

export interface RecoveredJson {
  value: unknown
  method: RecoveryMethod
}

const FENCE = /```(?:json)?\s*([\s\S]*?)```/i
const OPENING_FENCE = /^\s*```(?:json)?\s*/i

/**
 * Recovers a JSON value from a completion, or null when nothing parses.
 */
export function recoverJsonObject(text: string): RecoveredJson | null {
  const strict = tryParse(text.trim())
  if (strict) return { value: strict.value, method: 'strict' }

  const fenced = FENCE.exec(text)
  if (fenced) {
    const parsed = tryParse(fenced[1].trim())
    if (parsed) return { value: parsed.value, method: 'fenced' }
  }

  // An unterminated fence means the completion was cut off inside it
  const body = fenced ? fenced[1] : text.replace(OPENING_FENCE, '')

  const start = body.indexOf('{')
  if (start === -1) return null

  const end = body.lastIndexOf('}')
  if (end > start) {
    const parsed = tryParse(body.slice(start, end + 1))
    if (parsed) return { value: parsed.value, method: 'sliced' }
  }

  const repaired = repairTruncated(body.slice(start))
  return repaired === undefined ? null : { value: repaired, method: 'repaired' }
}

function tryParse(text: string): { value: unknown } | null {
  if (text.length === 0) return null
  try {
    return { value: JSON.parse(text) }
  } catch {
    return null
  }
}

interface CutPoint {
  index: number
  closers: string
}

/**
 * Closes a truncated JSON document at the last complete value.
 *
 * Scans once, recording every position right after a complete value inside
 * an open container, together with the brackets still open there. Candidates
 * are tried from the latest backwards.
 */
export function repairTruncated(fragment: string): unknown {
  const stack: string[] = []
  const cuts: CutPoint[] = []
  let inString = false
  let escaped = false
  let stringIsValue = false
  let lastSignificant = ''

  for (let i = 0; i < fragment.length; i++) {
    const ch = fragment[i]

    if (inString) {
      if (escaped) {
        escaped = false
      } else if (ch === '\\') {
        escaped = true
      } else if (ch === '"') {
        inString = false
        lastSignificant = ch
        if (stringIsValue && stack.length > 0) {
          cuts.push({ index: i + 1, closers: [...stack].reverse().join('') })
        }
      }
      continue
    }

    if (ch === '"') {
      inString = true
      const top = stack[stack.length - 1]
      stringIsValue =
        lastSignificant === ':' ||
        lastSignificant === '[' ||
        (lastSignificant === ',' && top === ']')
    } else if (ch === '{') {
      stack.push('}')
    } else if (ch === '[') {
      stack.push(']')
    } else if (ch === '}' || ch === ']') {
      if (stack.pop() !== ch) return undefined
      if (stack.length === 0) break
      cuts.push({ index: i + 1, closers: [...stack].reverse().join('') })
    }

    if (!/\s/.test(ch)) lastSignificant = ch
  }

  for (let c = cuts.length - 1; c >= 0; c--) {
    const parsed = tryParse(fragment.slice(0, cuts[c].index) + cuts[c].closers)
    if (parsed) return parsed.value
  }
  return undefined
}
