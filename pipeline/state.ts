/**
 * @fileoverview Pipeline state machine
 *
 * A run moves PENDING → EXTRACTED → EMBEDDED → ANALYZED → STORED, or to
 * FAILED from any non-terminal status. FAILED may be resumed into the last
 * status whose outputs are present on the state.
 *
 * @module pipeline/state
 */

import type { AnalysisRecovery } from '@/agents/contract-analyzer'
import type { StructuredAnalysis } from '@/agents/types'
import type { StoredEmbedding } from '@/db/graph'
import type { PdfSource } from '@/lib/document-extraction/types'
import { InternalError, toAppError, type ErrorCode } from '@/lib/errors'

export const PIPELINE_STATUSES = [
  'PENDING',
  'EXTRACTED',
  'EMBEDDED',
  'ANALYZED',
  'STORED',
  'FAILED',
] as const

export type PipelineStatus = (typeof PIPELINE_STATUSES)[number]

/** A status reached by doing work */
export type PipelineStage = 'EXTRACTED' | 'EMBEDDED' | 'ANALYZED' | 'STORED'

export const TRANSITIONS: Readonly<Record<PipelineStatus, readonly PipelineStatus[]>> = {
  PENDING: ['EXTRACTED', 'FAILED'],
  EXTRACTED: ['EMBEDDED', 'FAILED'],
  EMBEDDED: ['ANALYZED', 'FAILED'],
  ANALYZED: ['STORED', 'FAILED'],
  STORED: [],
  FAILED: ['PENDING', 'EXTRACTED', 'EMBEDDED', 'ANALYZED'],
}

const NEXT_STAGE: Readonly<Record<'PENDING' | 'EXTRACTED' | 'EMBEDDED' | 'ANALYZED', PipelineStage>> = {
  PENDING: 'EXTRACTED',
  EXTRACTED: 'EMBEDDED',
  EMBEDDED: 'ANALYZED',
  ANALYZED: 'STORED',
}

export interface PipelineFailure {
  /** The stage that was being attempted */
  stage: PipelineStage
  code: ErrorCode
  message: string
}

/** An embedding replaced by a zero vector */
export interface Degradation {
  /** `contract` or `clauses[i]` */
  target: string
  reason: string
}

export interface PipelineState {
  source: PdfSource
  fileName: string
  contractId?: string
  status: PipelineStatus
  text?: string
  pageCount?: number
  contractEmbedding?: StoredEmbedding
  clauseEmbeddings?: StoredEmbedding[]
  analysis?: StructuredAnalysis
  analysisRecovery?: AnalysisRecovery
  degradations: Degradation[]
  analysisIssues: string[]
  failure?: PipelineFailure
}

export type FinalPipelineState = PipelineState & { status: 'STORED' | 'FAILED' }

export function createPipelineState(
  source: PdfSource,
  fileName: string,
  contractId?: string
): PipelineState {
  return {
    source,
    fileName,
    contractId,
    status: 'PENDING',
    degradations: [],
    analysisIssues: [],
  }
}

export function isFinal(state: PipelineState): state is FinalPipelineState {
  return state.status === 'STORED' || state.status === 'FAILED'
}

export function canTransition(from: PipelineStatus, to: PipelineStatus): boolean {
  return TRANSITIONS[from].includes(to)
}

/**
 * Moves `state` to `to`, applying `patch`.
 *
 * @throws InternalError - `to` is not reachable from the current status
 */
export function transition(
  state: PipelineState,
  to: PipelineStatus,
  patch: Partial<Omit<PipelineState, 'status'>> = {}
): PipelineState {
  if (!canTransition(state.status, to)) {
    throw new InternalError(`Illegal pipeline transition ${state.status} → ${to}`)
  }
  return { ...state, ...patch, status: to }
}

/**
 * The stage a non-final status advances to.
 *
 * @throws InternalError - the status is STORED or FAILED
 */
export function nextStage(status: PipelineStatus): PipelineStage {
  if (status === 'STORED' || status === 'FAILED') {
    throw new InternalError(`No stage follows ${status}`)
  }
  return NEXT_STAGE[status]
}

export function fail(state: PipelineState, stage: PipelineStage, error: unknown): FinalPipelineState {
  const appError = toAppError(error)
  const failed = transition(state, 'FAILED', {
    failure: { stage, code: appError.code, message: appError.message },
  })
  return { ...failed, status: 'FAILED' }
}

/**
 * The furthest status whose outputs the state still carries.
 */
export function lastCompletedStatus(state: PipelineState): Exclude<PipelineStatus, 'STORED' | 'FAILED'> {
  if (state.text === undefined || state.contractId === undefined) return 'PENDING'
  if (state.contractEmbedding === undefined) return 'EXTRACTED'
  if (state.analysis === undefined || state.clauseEmbeddings === undefined) return 'EMBEDDED'
  return 'ANALYZED'
}
