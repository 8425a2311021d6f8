/**
 * @fileoverview Pipeline barrel export
 * @module pipeline
 */

export {
  ContractPipeline,
  clauseEmbeddingText,
  type ContractGraphWriter,
  type ContractPipelineDeps,
  type RunInput,
  type RunOptions,
} from './process-contract'

export {
  processContracts,
  type BatchOptions,
  type BatchSummary,
  type ContractRunner,
} from './batch'

export {
  PIPELINE_STATUSES,
  TRANSITIONS,
  canTransition,
  createPipelineState,
  isFinal,
  lastCompletedStatus,
  transition,
  type Degradation,
  type FinalPipelineState,
  type PipelineFailure,
  type PipelineStage,
  type PipelineState,
  type PipelineStatus,
} from './state'
