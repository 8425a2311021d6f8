/**
 * @fileoverview Contract Analyzer Agent
 *
 * Maps contract text to a `StructuredAnalysis` through a language model.
 * The model is asked for JSON, but its completion is treated as untrusted:
 * it is recovered with `recoverJsonObject` and then defaulted field by field
 * with `normalizeAnalysis`. Only a failed model call is fatal.
 *
 * @module agents/contract-analyzer
 */

import { generateText } from 'ai'
import { getAgentModel, GENERATION_CONFIG } from '@/lib/ai/config'
import { AnalysisError, ValidationError, errorMessage } from '@/lib/errors'
import { logger } from '@/lib/logger'
import { withTimeout } from '@/lib/timeout'
import { minimalAnalysis, type StructuredAnalysis } from './types'
import { normalizeAnalysis, recoverJsonObject } from './validation'
import {
  CONTRACT_ANALYZER_SYSTEM_PROMPT,
  createContractAnalyzerPrompt,
} from './prompts/contract-analyzer'

// ============================================================================
// Types
// ============================================================================

/**
 * How the analysis was obtained:
 * - `parsed`: the completion was valid JSON (possibly fenced)
 * - `recovered`: JSON was sliced out of prose or repaired after truncation
 * - `defaulted`: nothing parsed; the minimal analysis was substituted
 */
export type AnalysisRecovery = 'parsed' | 'recovered' | 'defaulted'

export interface AnalysisOutcome {
  analysis: StructuredAnalysis
  recovery: AnalysisRecovery
  /** Substituted or dropped fields */
  issues: string[]
}

export interface AnalyzeOptions {
  signal?: AbortSignal
}

/**
 * Text-to-structured-analysis capability.
 */
export interface ContractAnalyzer {
  /**
   * @throws AnalysisError - no completion could be obtained
   * @throws ValidationError - empty text
   */
  analyze(text: string, options?: AnalyzeOptions): Promise<AnalysisOutcome>
}

export interface LlmContractAnalyzerOptions {
  /** Gateway model id. Default: AGENT_MODELS.contractAnalyzer */
  modelId?: string
  /** Model call budget. Default: 120s */
  timeoutMs?: number
  /** Contract text beyond this is cut before prompting */
  maxInputChars?: number
}

const DEFAULT_MAX_INPUT_CHARS = 400_000

// ============================================================================
// Completion Interpretation
// ============================================================================

/**
 * Turns a raw completion into an analysis. Never throws for malformed text.
 */
export function interpretCompletion(completion: string): AnalysisOutcome {
  const recovered = recoverJsonObject(completion)

  if (!recovered) {
    logger.warn('Analysis completion unparseable, using minimal analysis', {
      completionLength: completion.length,
    })
    return {
      analysis: minimalAnalysis(),
      recovery: 'defaulted',
      issues: ['completion: no JSON object could be recovered'],
    }
  }

  const { analysis, issues } = normalizeAnalysis(recovered.value)
  const recovery: AnalysisRecovery =
    recovered.method === 'strict' || recovered.method === 'fenced' ? 'parsed' : 'recovered'

  if (recovery === 'recovered' || issues.length > 0) {
    logger.warn('Analysis completion needed recovery', {
      method: recovered.method,
      issueCount: issues.length,
      clauseCount: analysis.clauses.length,
    })
  }

  return { analysis, recovery, issues }
}

// ============================================================================
// Agent
// ============================================================================

export class LlmContractAnalyzer implements ContractAnalyzer {
  private readonly modelId?: string
  private readonly timeoutMs: number
  private readonly maxInputChars: number

  constructor(options: LlmContractAnalyzerOptions = {}) {
    this.modelId = options.modelId
    this.timeoutMs = options.timeoutMs ?? 120_000
    this.maxInputChars = options.maxInputChars ?? DEFAULT_MAX_INPUT_CHARS
  }

  async analyze(text: string, { signal }: AnalyzeOptions = {}): Promise<AnalysisOutcome> {
    if (text.trim().length === 0) {
      throw new ValidationError('Cannot analyze empty text')
    }
    const input = text.length > this.maxInputChars ? text.slice(0, this.maxInputChars) : text

    let completion: string
    try {
      const result = await withTimeout(
        'analysis',
        this.timeoutMs,
        (abortSignal) =>
          generateText({
            model: getAgentModel('contractAnalyzer', this.modelId),
            system: CONTRACT_ANALYZER_SYSTEM_PROMPT,
            prompt: createContractAnalyzerPrompt(input),
            abortSignal,
            ...GENERATION_CONFIG,
          }),
        signal
      )
      completion = result.text
    } catch (error) {
      throw new AnalysisError(
        `Language model call failed: ${errorMessage(error)}`,
        [{ field: 'analysis', message: errorMessage(error) }],
        { cause: error }
      )
    }

    if (completion.trim().length === 0) {
      throw new AnalysisError('Language model returned an empty completion')
    }

    return interpretCompletion(completion)
  }
}
