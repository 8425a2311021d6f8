/**
 * @fileoverview Document extraction module
 *
 * unpdf is loaded lazily inside `extractPdf`, so importing this barrel stays
 * cheap for callers that only need the types or source helpers.
 *
 * @module lib/document-extraction
 */

// Types
export type {
  ExtractionResult,
  QualityMetrics,
  ExtractionWarning,
  DocumentMetadata,
  PdfSource,
  TextExtractor,
} from './types'

// Extractors
export { extractPdf, PdfTextExtractor } from './pdf-extractor'

// Sources
export { loadSourceBytes, sourceFileName, deriveContractId } from './source'

// Validators
export { validateExtractionQuality, detectLanguage } from './validators'
