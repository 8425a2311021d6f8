/**
 * @fileoverview PDF text extraction with error handling
 *
 * Uses unpdf (serverless-optimized PDF.js build) so no browser globals are
 * needed under Node.
 *
 * @module lib/document-extraction/pdf-extractor
 */

import {
  type AppError,
  CancelledError,
  CorruptDocumentError,
  EncryptedDocumentError,
  ExtractionError,
  errorMessage,
  isAppError,
} from '@/lib/errors'
import type { DocumentMetadata, ExtractionResult, TextExtractor } from './types'
import { validateExtractionQuality } from './validators'

/**
 * Extracts text from a PDF buffer.
 *
 * **Linearization:** PDF.js outputs text in content-stream order, which
 * flattens multi-column layouts into a single column.
 *
 * @throws EncryptedDocumentError - Password-protected PDF
 * @throws CorruptDocumentError - Invalid or corrupt PDF
 * @throws ExtractionError - No text layer, or any other reader failure
 */
export async function extractPdf(bytes: Uint8Array): Promise<ExtractionResult> {
  const { extractText, getMeta, getDocumentProxy } = await import('unpdf')

  let pdf: Awaited<ReturnType<typeof getDocumentProxy>>
  try {
    // pdf.js takes ownership of the buffer it is given
    pdf = await getDocumentProxy(new Uint8Array(bytes))
  } catch (error: unknown) {
    throw classifyPdfError(error)
  }

  try {
    const { totalPages, text: rawText } = await extractText(pdf, { mergePages: true })
    const text = rawText.normalize('NFC')

    if (text.trim().length === 0) {
      throw new ExtractionError('Document has no extractable text layer')
    }

    const quality = validateExtractionQuality(text, bytes.length, totalPages)

    return {
      text,
      quality,
      pageCount: totalPages,
      metadata: await readMetadata(() => getMeta(pdf)),
    }
  } catch (error: unknown) {
    throw classifyPdfError(error)
  } finally {
    await pdf.destroy()
  }
}

/**
 * Metadata is optional; a failure here leaves it empty.
 */
async function readMetadata(
  read: () => Promise<{ info?: Record<string, unknown> }>
): Promise<DocumentMetadata> {
  try {
    const { info } = await read()
    return {
      title: stringField(info, 'Title'),
      author: stringField(info, 'Author'),
      creationDate: stringField(info, 'CreationDate'),
      modificationDate: stringField(info, 'ModDate'),
    }
  } catch {
    return {}
  }
}

function stringField(info: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = info?.[key]
  return typeof value === 'string' ? value : undefined
}

function classifyPdfError(error: unknown): AppError {
  if (isAppError(error)) return error

  const message = errorMessage(error)
  if (/password|encrypted/i.test(message)) {
    return new EncryptedDocumentError()
  }
  if (/invalid pdf|not a pdf|missing pdf/i.test(message)) {
    return new CorruptDocumentError()
  }
  return new ExtractionError(message, { cause: error })
}

/**
 * `TextExtractor` over unpdf.
 */
export class PdfTextExtractor implements TextExtractor {
  async extract(bytes: Uint8Array, signal?: AbortSignal): Promise<ExtractionResult> {
    // pdf.js cannot be interrupted mid-parse; honour the signal at the edges
    if (signal?.aborted) throw new CancelledError()
    const result = await extractPdf(bytes)
    if (signal?.aborted) throw new CancelledError()
    return result
  }
}
