/**
 * @fileoverview Contract Processing Pipeline
 *
 * Orchestrates one contract through the graph pipeline:
 * Extract → Embed contract → Analyze + embed clauses → Store
 *
 * Stage failure policy:
 * - Extraction, analysis and storage failures are fatal and end the run in
 *   FAILED, with everything accumulated so far kept on the state.
 * - Embedding failures never are: the generator substitutes zero vectors and
 *   the run records a degradation.
 *
 * `run` never rejects for a stage failure. Cancellation is checked between
 * stages, so an upsert that has started is allowed to commit.
 *
 * @module pipeline/process-contract
 */

import type { ContractAnalyzer } from '@/agents/contract-analyzer'
import type { ClauseAnalysis } from '@/agents/types'
import type { ContractGraphInput, StoredEmbedding } from '@/db/graph'
import {
  deriveContractId,
  loadSourceBytes,
  sourceFileName,
  type PdfSource,
  type TextExtractor,
} from '@/lib/document-extraction'
import type { EmbeddingGenerator, EmbeddingOutcome } from '@/lib/embeddings'
import { CancelledError, ExtractionError, InternalError } from '@/lib/errors'
import { logger } from '@/lib/logger'
import { withTimeout } from '@/lib/timeout'
import {
  createPipelineState,
  fail,
  isFinal,
  lastCompletedStatus,
  nextStage,
  transition,
  type Degradation,
  type FinalPipelineState,
  type PipelineStage,
  type PipelineState,
} from './state'

// ============================================================================
// Types
// ============================================================================

/** The part of the graph store a run writes through */
export interface ContractGraphWriter {
  upsert(input: ContractGraphInput): Promise<void>
}

export interface ContractPipelineDeps {
  extractor: TextExtractor
  embeddings: EmbeddingGenerator
  analyzer: ContractAnalyzer
  store: ContractGraphWriter
  timeouts?: {
    /** Default: 30s */
    extractionMs?: number
  }
}

export interface RunInput {
  source: PdfSource
  /** Derived from the document bytes when omitted */
  contractId?: string
}

export interface RunOptions {
  signal?: AbortSignal
}

const DEFAULT_EXTRACTION_TIMEOUT_MS = 30_000

// ============================================================================
// Pipeline
// ============================================================================

export class ContractPipeline {
  private readonly extractionMs: number

  constructor(private readonly deps: ContractPipelineDeps) {
    this.extractionMs = deps.timeouts?.extractionMs ?? DEFAULT_EXTRACTION_TIMEOUT_MS
  }

  /**
   * Processes one contract to STORED or FAILED.
   */
  async run(
    { source, contractId }: RunInput,
    { signal }: RunOptions = {}
  ): Promise<FinalPipelineState> {
    const state = createPipelineState(source, sourceFileName(source), contractId)
    logger.info('Contract pipeline started', {
      fileName: state.fileName,
      contractId: contractId ?? 'derived',
    })
    return this.advance(state, signal)
  }

  /**
   * Continues a FAILED run from its last completed stage, reusing the text,
   * embeddings and analysis it already carries. A STORED state is returned
   * as is.
   */
  async resume(state: PipelineState, { signal }: RunOptions = {}): Promise<FinalPipelineState> {
    if (state.status === 'STORED') return { ...state, status: 'STORED' }

    let current = state
    if (state.status === 'FAILED') {
      const from = lastCompletedStatus(state)
      logger.info('Contract pipeline resumed', {
        contractId: state.contractId ?? 'unknown',
        from,
        failedAt: state.failure?.stage ?? 'unknown',
      })
      current = transition(state, from, { failure: undefined })
    }
    return this.advance(current, signal)
  }

  private async advance(state: PipelineState, signal?: AbortSignal): Promise<FinalPipelineState> {
    let current = state

    while (!isFinal(current)) {
      const stage = nextStage(current.status)
      if (signal?.aborted) {
        current = this.failed(current, stage, new CancelledError())
        continue
      }

      try {
        current = await this.runStage(stage, current, signal)
        logger.info('Pipeline stage completed', {
          contractId: current.contractId ?? 'unknown',
          stage,
        })
      } catch (error) {
        current = this.failed(current, stage, error)
      }
    }

    return current
  }

  private runStage(
    stage: PipelineStage,
    state: PipelineState,
    signal?: AbortSignal
  ): Promise<PipelineState> {
    switch (stage) {
      case 'EXTRACTED':
        return this.extract(state, signal)
      case 'EMBEDDED':
        return this.embedContract(state, signal)
      case 'ANALYZED':
        return this.analyze(state, signal)
      case 'STORED':
        return this.store(state)
    }
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  private async extract(state: PipelineState, signal?: AbortSignal): Promise<PipelineState> {
    const bytes = await loadSourceBytes(state.source)
    const contractId = state.contractId ?? deriveContractId(bytes)

    const result = await withTimeout(
      'extraction',
      this.extractionMs,
      (s) => this.deps.extractor.extract(bytes, s),
      signal
    )
    if (result.text.trim().length === 0) {
      throw new ExtractionError('Document has no extractable text')
    }
    if (result.quality.warnings.length > 0) {
      logger.warn('Extraction quality warnings', {
        contractId,
        warnings: result.quality.warnings.map((w) => w.type).join(','),
      })
    }

    return transition(state, 'EXTRACTED', {
      contractId,
      text: result.text,
      pageCount: result.pageCount,
    })
  }

  private async embedContract(state: PipelineState, signal?: AbortSignal): Promise<PipelineState> {
    const text = required(state.text, 'text')
    const outcome = await this.deps.embeddings.embed(text, 'document', signal)

    return transition(state, 'EMBEDDED', {
      contractEmbedding: toStored(outcome),
      degradations: withDegradation(state.degradations, 'contract', outcome),
    })
  }

  private async analyze(state: PipelineState, signal?: AbortSignal): Promise<PipelineState> {
    const text = required(state.text, 'text')
    const outcome = await this.deps.analyzer.analyze(text, { signal })

    if (outcome.issues.length > 0) {
      logger.warn('Analysis fields defaulted', {
        contractId: state.contractId ?? 'unknown',
        recovery: outcome.recovery,
        issues: outcome.issues.length,
      })
    }

    const clauseOutcomes = await this.deps.embeddings.embedMany(
      outcome.analysis.clauses.map(clauseEmbeddingText),
      'document',
      signal
    )
    const degradations = clauseOutcomes.reduce<Degradation[]>(
      (acc, o, i) => withDegradation(acc, `clauses[${i}]`, o),
      state.degradations
    )

    return transition(state, 'ANALYZED', {
      analysis: outcome.analysis,
      analysisRecovery: outcome.recovery,
      analysisIssues: outcome.issues,
      clauseEmbeddings: clauseOutcomes.map(toStored),
      degradations,
    })
  }

  private async store(state: PipelineState): Promise<PipelineState> {
    await this.deps.store.upsert({
      contractId: required(state.contractId, 'contractId'),
      fileName: state.fileName,
      analysis: required(state.analysis, 'analysis'),
      contractEmbedding: required(state.contractEmbedding, 'contractEmbedding'),
      clauseEmbeddings: required(state.clauseEmbeddings, 'clauseEmbeddings'),
    })
    return transition(state, 'STORED')
  }

  private failed(state: PipelineState, stage: PipelineStage, error: unknown): FinalPipelineState {
    const next = fail(state, stage, error)
    logger.error('Contract pipeline failed', {
      contractId: state.contractId ?? 'unknown',
      stage,
      code: next.failure?.code ?? 'INTERNAL_ERROR',
      message: next.failure?.message ?? '',
    })
    return next
  }
}

// ============================================================================
// Helpers
// ============================================================================

/** Text a clause is embedded from */
export function clauseEmbeddingText(clause: ClauseAnalysis): string {
  return `${clause.name}\n\n${clause.summary}`
}

function toStored(outcome: EmbeddingOutcome): StoredEmbedding {
  return { vector: outcome.vector, status: outcome.status }
}

function withDegradation(
  degradations: Degradation[],
  target: string,
  outcome: EmbeddingOutcome
): Degradation[] {
  if (outcome.status === 'nominal') return degradations
  return [...degradations, { target, reason: outcome.reason }]
}

function required<T>(value: T | undefined, field: string): T {
  if (value === undefined) {
    throw new InternalError(`Pipeline state is missing ${field}`)
  }
  return value
}
