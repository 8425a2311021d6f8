/**
 * @fileoverview Extraction quality validation utilities
 * @module lib/document-extraction/validators
 */

import type { QualityMetrics, ExtractionWarning } from './types'

const MIN_TEXT_LENGTH = 100
const MIN_TEXT_TO_SIZE_RATIO = 0.001 // Very low = likely scanned

/**
 * Computes quality metrics for extracted text.
 *
 * Short or sparse text still passes; it is flagged so the pipeline can log
 * that analysis is working from little material.
 */
export function validateExtractionQuality(
  text: string,
  fileSize: number,
  pageCount = 1
): QualityMetrics {
  const charCount = text.length
  const wordCount = text.split(/\s+/).filter(Boolean).length
  const ratio = fileSize > 0 ? charCount / fileSize : 0
  const warnings: ExtractionWarning[] = []

  const lowText = charCount < MIN_TEXT_LENGTH

  if (lowText) {
    warnings.push({
      type: 'low_text',
      message: `Document has only ${charCount} characters of text (likely scanned)`,
    })
  } else if (ratio < MIN_TEXT_TO_SIZE_RATIO && fileSize > 100_000) {
    // Large file with very little text - suspicious
    warnings.push({
      type: 'low_confidence',
      message: 'Document has unusually low text density',
    })
  }

  if (!lowText && !detectLanguage(text).isEnglish) {
    warnings.push({
      type: 'non_english',
      message: 'Document does not appear to be in English',
    })
  }

  // Higher ratio = more confident it's actual text
  const confidence = lowText ? 0 : Math.min(1, ratio * 100)

  return {
    charCount,
    wordCount,
    pageCount,
    confidence,
    warnings,
  }
}

/**
 * Simple language detection heuristic based on character script.
 */
export function detectLanguage(text: string): {
  isEnglish: boolean
  confidence: number
} {
  // Sample first 5000 chars for efficiency
  const sample = text.slice(0, 5000)

  const latinChars = (sample.match(/[a-zA-Z]/g) || []).length
  // CJK, Cyrillic, Arabic, etc.
  const nonAsciiChars = (sample.match(/[^\x00-\x7F]/g) || []).length

  const latinRatio = latinChars / (latinChars + nonAsciiChars + 1)

  return { isEnglish: latinRatio > 0.5, confidence: latinRatio }
}
