/**
 * contract-graph
 *
 * Turns contract PDFs into a PostgreSQL graph of parties, dates, clauses and
 * clause facets, and ranks stored clauses against free-text queries.
 *
 * @example
 * ```typescript
 * import { createContractGraph } from "contract-graph"
 *
 * const graph = createContractGraph()
 * const state = await graph.processContract({ source: { path: "msa.pdf" } })
 * if (state.status === "STORED" && state.contractId) {
 *   const contract = await graph.getContract(state.contractId)
 * }
 * const matches = await graph.searchSimilarClauses("late payment interest", 5)
 * await graph.close()
 * ```
 *
 * @module contract-graph
 */

import { LlmContractAnalyzer, type ContractAnalyzer } from "./agents/contract-analyzer"
import {
  GraphStore,
  SimilaritySearch,
  closeDb,
  getDb,
  type ClauseMatch,
  type ContractRecord,
  type Database,
} from "./db"
import { PdfTextExtractor, type TextExtractor } from "./lib/document-extraction"
import {
  EmbeddingGenerator,
  getVoyageAIClient,
  type EmbeddingProvider,
} from "./lib/embeddings"
import { loadConfig, type AppConfig } from "./lib/config"
import type { NotFoundError } from "./lib/errors"
import type { Result } from "./lib/result"
import { initSentry } from "./lib/sentry"
import {
  ContractPipeline,
  processContracts,
  type BatchOptions,
  type BatchSummary,
  type FinalPipelineState,
  type RunInput,
  type RunOptions,
} from "./pipeline"

export interface ContractGraphOptions {
  /** Default: parsed from the environment */
  config?: AppConfig
  /** Default: the pooled Neon client for `config.databaseUrl` */
  db?: Database
  /** Default: unpdf */
  extractor?: TextExtractor
  /** Default: Voyage AI */
  embeddingProvider?: EmbeddingProvider
  /** Default: the gateway model named by `config.analyzerModel` */
  analyzer?: ContractAnalyzer
}

export interface ContractGraphService {
  pipeline: ContractPipeline
  store: GraphStore
  search: SimilaritySearch
  processContract(input: RunInput, options?: RunOptions): Promise<FinalPipelineState>
  processContracts(inputs: RunInput[], options?: BatchOptions): Promise<BatchSummary>
  getContract(contractId: string): Promise<Result<ContractRecord, NotFoundError>>
  searchSimilarClauses(queryText: string, topK: number): Promise<ClauseMatch[]>
  /** Releases the database pool */
  close(): Promise<void>
}

/**
 * Wires the pipeline, store and search over one database.
 *
 * @throws ValidationError - invalid configuration, or a missing database URL
 *   or Voyage AI key for a default that needs one
 */
export function createContractGraph(options: ContractGraphOptions = {}): ContractGraphService {
  const config = options.config ?? loadConfig()
  initSentry(config.sentryDsn)

  const db = options.db ?? getDb(config.databaseUrl)
  const embeddings = new EmbeddingGenerator(
    options.embeddingProvider ?? getVoyageAIClient(config.voyageApiKey),
    { timeoutMs: config.timeouts.embeddingMs }
  )
  const store = new GraphStore(db, { timeoutMs: config.timeouts.storageMs })
  const search = new SimilaritySearch(embeddings, db, { timeoutMs: config.timeouts.storageMs })
  const pipeline = new ContractPipeline({
    extractor: options.extractor ?? new PdfTextExtractor(),
    embeddings,
    analyzer:
      options.analyzer ??
      new LlmContractAnalyzer({
        modelId: config.analyzerModel,
        timeoutMs: config.timeouts.analysisMs,
      }),
    store,
    timeouts: { extractionMs: config.timeouts.extractionMs },
  })

  return {
    pipeline,
    store,
    search,
    processContract: (input, runOptions) => pipeline.run(input, runOptions),
    processContracts: (inputs, batchOptions) =>
      processContracts(pipeline, inputs, { concurrency: config.concurrency, ...batchOptions }),
    getContract: (contractId) => store.get(contractId),
    searchSimilarClauses: (queryText, topK) => search.searchSimilarClauses(queryText, topK),
    close: () => (options.db ? Promise.resolve() : closeDb()),
  }
}

export type { ContractRecord, ClauseRecord, PartyRecord, ImportantDateRecord, RiskDistribution, ClauseMatch } from "./db"
export type { StructuredAnalysis, ClauseAnalysis, RiskLevel } from "./agents/types"
export type { PdfSource } from "./lib/document-extraction"
export type {
  FinalPipelineState,
  PipelineState,
  PipelineStatus,
  PipelineFailure,
  RunInput,
  BatchSummary,
} from "./pipeline"
export { AppError, ValidationError, NotFoundError, StorageError, ExtractionError, AnalysisError } from "./lib/errors"
export { loadConfig } from "./lib/config"
