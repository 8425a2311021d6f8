/**
 * Custom error classes for structured error handling.
 *
 * Usage:
 *   throw new ExtractionError("PDF has no text layer")
 *   throw new ValidationError("Embedding dimension mismatch", [{ field: "clauseEmbeddings.2", message: "expected 1024, got 768" }])
 *   throw new StorageError() // Uses default message
 *
 * Pipeline code never lets these escape a run; they are captured as the
 * `failure` of the final pipeline state via `toAppError`.
 */

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INTERNAL_ERROR"
  | "TIMEOUT"
  | "CANCELLED"
  // Pipeline stage errors
  | "EXTRACTION_FAILED"
  | "ENCRYPTED_DOCUMENT"
  | "CORRUPT_DOCUMENT"
  | "EMBEDDING_FAILED"
  | "ANALYSIS_FAILED"
  | "STORAGE_FAILED"

export interface ErrorDetail {
  field?: string
  message: string
  code?: string
}

export interface SerializedError {
  code: ErrorCode
  message: string
  details?: ErrorDetail[]
}

/**
 * Base application error class.
 * All custom errors extend this for consistent handling.
 */
export class AppError extends Error {
  public readonly isOperational = true

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: ErrorDetail[],
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = this.constructor.name
    Object.setPrototypeOf(this, new.target.prototype)
    Error.captureStackTrace(this, this.constructor)
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    }
  }
}

/**
 * 400 Validation Error - contract violation between components
 * (dimension mismatch, malformed analysis after defaulting, bad search input)
 */
export class ValidationError extends AppError {
  constructor(message = "Validation failed", details?: ErrorDetail[]) {
    super("VALIDATION_ERROR", message, 400, details)
  }

  static fromZodError(error: { issues: Array<{ path: PropertyKey[]; message: string }> }): ValidationError {
    const details = error.issues.map((e) => ({
      field: e.path.map(String).join("."),
      message: e.message,
    }))
    return new ValidationError("Validation failed", details)
  }
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super("NOT_FOUND", message, 404)
  }
}

/**
 * 500 Internal Error - Unexpected error or broken invariant
 */
export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred", options?: { cause?: unknown }) {
    super("INTERNAL_ERROR", message, 500, undefined, options)
  }
}

/**
 * 504 Timeout - An external call exceeded its time budget
 */
export class TimeoutError extends AppError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super("TIMEOUT", `${operation} timed out after ${timeoutMs}ms`, 504)
  }
}

/**
 * 499 Cancelled - The caller aborted the run
 */
export class CancelledError extends AppError {
  constructor(message = "Run was cancelled") {
    super("CANCELLED", message, 499)
  }
}

/**
 * 422 Extraction Failed - Source document unreadable
 */
export class ExtractionError extends AppError {
  constructor(message = "Text extraction failed", options?: { cause?: unknown }) {
    super("EXTRACTION_FAILED", message, 422, undefined, options)
  }
}

/**
 * 422 Encrypted Document - Password-protected PDF
 */
export class EncryptedDocumentError extends AppError {
  constructor(message = "Document is password-protected") {
    super("ENCRYPTED_DOCUMENT", message, 422)
  }
}

/**
 * 422 Corrupt Document - Not a readable PDF
 */
export class CorruptDocumentError extends AppError {
  constructor(message = "Document is corrupt or not a PDF") {
    super("CORRUPT_DOCUMENT", message, 422)
  }
}

/**
 * 502 Embedding Failed - Vector embedding generation error.
 * Recovered inside the embedding generator; never fatal to a run.
 */
export class EmbeddingFailedError extends AppError {
  constructor(message = "Embedding generation failed", options?: { cause?: unknown }) {
    super("EMBEDDING_FAILED", message, 502, undefined, options)
  }
}

/**
 * 502 Analysis Failed - Language model produced nothing usable
 */
export class AnalysisError extends AppError {
  constructor(message = "Analysis failed", details?: ErrorDetail[], options?: { cause?: unknown }) {
    super("ANALYSIS_FAILED", message, 502, details, options)
  }
}

/**
 * 503 Storage Failed - Transaction, connectivity or constraint failure
 */
export class StorageError extends AppError {
  constructor(message = "Graph storage failed", options?: { cause?: unknown }) {
    super("STORAGE_FAILED", message, 503, undefined, options)
  }
}

/**
 * Type guard to check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

/**
 * Convert any error to an AppError for consistent handling.
 * Preserves AppErrors, wraps others in InternalError.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error
  }

  if (error instanceof Error) {
    return new InternalError(error.message, { cause: error })
  }

  return new InternalError("An unexpected error occurred")
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Message of the driver error underneath a query error. Drizzle wraps
 * failures with the full SQL and its parameters, embedding vectors included.
 */
export function driverErrorMessage(error: unknown): string {
  if (error instanceof Error && error.cause instanceof Error) {
    return error.cause.message
  }
  return errorMessage(error)
}
