/**
 * @fileoverview Batch processing with bounded concurrency
 * @module pipeline/batch
 */

import pLimit from 'p-limit'
import { ValidationError } from '@/lib/errors'
import { logger } from '@/lib/logger'
import type { RunInput, RunOptions } from './process-contract'
import type { FinalPipelineState } from './state'

/** Anything that runs one contract to a final state */
export interface ContractRunner {
  run(input: RunInput, options?: RunOptions): Promise<FinalPipelineState>
}

export interface BatchOptions {
  /** Maximum runs in flight. Default: 3 */
  concurrency?: number
  signal?: AbortSignal
}

export interface BatchSummary {
  /** Final states, in input order */
  results: FinalPipelineState[]
  stored: number
  failed: number
}

const DEFAULT_CONCURRENCY = 3

/**
 * Runs every input through `runner`, at most `concurrency` at a time. Runs
 * are independent: one failing does not affect the others.
 *
 * @throws ValidationError - concurrency is not a positive integer
 */
export async function processContracts(
  runner: ContractRunner,
  inputs: RunInput[],
  { concurrency = DEFAULT_CONCURRENCY, signal }: BatchOptions = {}
): Promise<BatchSummary> {
  if (!Number.isInteger(concurrency) || concurrency <= 0) {
    throw new ValidationError('concurrency must be a positive integer', [
      { field: 'concurrency', message: `got ${concurrency}` },
    ])
  }

  const limit = pLimit(concurrency)
  const results = await Promise.all(
    inputs.map((input) => limit(() => runner.run(input, { signal })))
  )

  const stored = results.filter((r) => r.status === 'STORED').length
  const summary = { results, stored, failed: results.length - stored }
  logger.info('Contract batch finished', {
    total: results.length,
    stored: summary.stored,
    failed: summary.failed,
  })
  return summary
}
