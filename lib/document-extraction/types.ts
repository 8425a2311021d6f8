/**
 * @fileoverview Document extraction type definitions
 * @module lib/document-extraction/types
 */

export interface ExtractionWarning {
  type: 'low_text' | 'low_confidence' | 'non_english'
  message: string
}

export interface QualityMetrics {
  /** Total character count after normalization */
  charCount: number
  /** Estimated word count */
  wordCount: number
  /** Number of pages */
  pageCount: number
  /** Extraction confidence 0-1 based on text density */
  confidence: number
  /** Warnings from extraction process */
  warnings: ExtractionWarning[]
}

export interface DocumentMetadata {
  title?: string
  author?: string
  creationDate?: string
  modificationDate?: string
}

export interface ExtractionResult {
  /** Extracted text, NFC-normalized UTF-8 */
  text: string
  /** Quality metrics for logging and diagnostics */
  quality: QualityMetrics
  /** Page count from source document */
  pageCount: number
  /** Document metadata if available */
  metadata: DocumentMetadata
}

/**
 * Where a contract PDF comes from: a file on disk, or bytes already in memory.
 */
export type PdfSource =
  | { path: string }
  | { bytes: Uint8Array; fileName?: string }

/**
 * PDF-bytes-to-text capability.
 *
 * @throws ExtractionError (or a subclass) - unreadable, encrypted, corrupt or empty document
 */
export interface TextExtractor {
  extract(bytes: Uint8Array, signal?: AbortSignal): Promise<ExtractionResult>
}
