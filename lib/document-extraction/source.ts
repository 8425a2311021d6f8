/**
 * @fileoverview Contract source loading and content-derived identity
 * @module lib/document-extraction/source
 */

import { createHash } from 'crypto'
import { readFile } from 'fs/promises'
import { basename } from 'path'
import { ExtractionError, errorMessage } from '@/lib/errors'
import type { PdfSource } from './types'

const DEFAULT_FILE_NAME = 'document.pdf'

/**
 * Reads the bytes of a source.
 *
 * @throws ExtractionError - the file cannot be read
 */
export async function loadSourceBytes(source: PdfSource): Promise<Uint8Array> {
  if ('bytes' in source) return source.bytes

  try {
    return new Uint8Array(await readFile(source.path))
  } catch (error: unknown) {
    throw new ExtractionError(`Cannot read ${source.path}: ${errorMessage(error)}`, {
      cause: error,
    })
  }
}

export function sourceFileName(source: PdfSource): string {
  return 'path' in source ? basename(source.path) : (source.fileName ?? DEFAULT_FILE_NAME)
}

/**
 * Contract id derived from document content, so re-ingesting the same PDF
 * addresses the same contract.
 */
export function deriveContractId(bytes: Uint8Array): string {
  const hash = createHash('sha256').update(bytes).digest('hex').substring(0, 32)
  return `contract-${hash}`
}
