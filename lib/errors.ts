/**
 * Custom error classes for structured error handling.
 *
 * Usage:
 *   throw new ConfigError("matchThreshold must exceed borderlineThreshold")
 *   throw new EmbeddingFailedError("Embedding provider timed out", { cause })
 *   throw new StaleEmbeddingError("clause-7")
 *
 * At the validation boundary:
 *   catch (error) {
 *     if (isAppError(error) && !error.retriable) {
 *       return { status: error.statusCode, body: error.toJSON() }
 *     }
 *   }
 */

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "DUPLICATE"
  | "INTERNAL_ERROR"
  // Clause validation pipeline
  | "CONFIG_ERROR"
  | "UPSTREAM_ERROR"
  | "UPSTREAM_TIMEOUT"
  | "EMBEDDING_FAILED"
  | "OCR_FAILED"
  | "DATA_ERROR"
  | "STALE_EMBEDDING"

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

export interface AppErrorOptions {
  details?: ErrorDetail[]
  cause?: unknown
  retriable?: boolean
}

/**
 * Base application error class.
 * All custom errors extend this for consistent handling.
 *
 * `retriable` is read by `withRetry`; only upstream failures opt in.
 */
export class AppError extends Error {
  public readonly isOperational = true
  public readonly details?: ErrorDetail[]
  public readonly retriable: boolean

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    options: AppErrorOptions = {}
  ) {
    super(message, { cause: options.cause })
    this.name = this.constructor.name
    this.details = options.details
    this.retriable = options.retriable ?? false
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
 * 400 Validation Error - Input failed schema validation at a boundary
 */
export class ValidationError extends AppError {
  constructor(message = "Validation failed", details?: ErrorDetail[]) {
    super("VALIDATION_ERROR", message, 400, { details })
  }

  static fromZodError(
    error: { issues: Array<{ path: PropertyKey[]; message: string }> },
    message = "Validation failed"
  ): ValidationError {
    return new ValidationError(message, issuesToDetails(error.issues))
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
 * 409 Duplicate - Resource already exists
 */
export class DuplicateError extends AppError {
  constructor(message = "Resource already exists") {
    super("DUPLICATE", message, 409)
  }
}

/**
 * 500 Internal Error - Unexpected server error
 */
export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred", cause?: unknown) {
    super("INTERNAL_ERROR", message, 500, { cause })
  }
}

/**
 * 500 Config Error - Fatal misconfiguration (thresholds, vector dimensions).
 * The process should refuse to start rather than run with it.
 */
export class ConfigError extends AppError {
  constructor(message = "Invalid configuration", details?: ErrorDetail[]) {
    super("CONFIG_ERROR", message, 500, { details })
  }

  static fromZodError(error: {
    issues: Array<{ path: PropertyKey[]; message: string }>
  }): ConfigError {
    return new ConfigError("Invalid configuration", issuesToDetails(error.issues))
  }
}

export type UpstreamService = "embedding" | "ocr" | "vector-index" | "llm"

/**
 * 502 Upstream Error - An external collaborator failed.
 * Retriable unless the caller says otherwise.
 */
export class UpstreamError extends AppError {
  constructor(
    public readonly service: UpstreamService,
    message = "Upstream service failed",
    options: { cause?: unknown; retriable?: boolean } = {},
    code: ErrorCode = "UPSTREAM_ERROR",
    statusCode = 502
  ) {
    super(code, message, statusCode, {
      cause: options.cause,
      retriable: options.retriable ?? true,
    })
  }
}

/**
 * 504 Upstream Timeout - An external call did not finish in time
 */
export class UpstreamTimeoutError extends UpstreamError {
  constructor(service: UpstreamService, timeoutMs: number) {
    super(
      service,
      `${service} call timed out after ${timeoutMs}ms`,
      { retriable: true },
      "UPSTREAM_TIMEOUT",
      504
    )
  }
}

/**
 * 502 Embedding Failed - Vector embedding generation error
 */
export class EmbeddingFailedError extends UpstreamError {
  constructor(
    message = "Embedding generation failed",
    options: { cause?: unknown; retriable?: boolean } = {}
  ) {
    super("embedding", message, options, "EMBEDDING_FAILED")
  }
}

/**
 * 502 OCR Failed - Text extraction error
 */
export class OcrError extends UpstreamError {
  constructor(
    message = "Text extraction failed",
    options: { cause?: unknown; retriable?: boolean } = {}
  ) {
    super("ocr", message, { retriable: false, ...options }, "OCR_FAILED")
  }
}

/**
 * 422 Data Error - Malformed or inconsistent data for a single record.
 * Fails the affected clause or chunk, never the whole run.
 */
export class DataError extends AppError {
  constructor(
    message = "Invalid data",
    code: ErrorCode = "DATA_ERROR",
    details?: ErrorDetail[]
  ) {
    super(code, message, 422, { details })
  }

  static fromZodError(
    error: { issues: Array<{ path: PropertyKey[]; message: string }> },
    message = "Invalid data"
  ): DataError {
    return new DataError(message, "DATA_ERROR", issuesToDetails(error.issues))
  }
}

/**
 * 422 Stale Embedding - A clause embedding no longer reflects its text
 */
export class StaleEmbeddingError extends DataError {
  constructor(public readonly clauseId: string, reason = "embedding is stale") {
    super(`Clause ${clauseId}: ${reason}`, "STALE_EMBEDDING")
  }
}

function issuesToDetails(
  issues: Array<{ path: PropertyKey[]; message: string }>
): ErrorDetail[] {
  return issues.map((e) => ({
    field: e.path.map(String).join("."),
    message: e.message,
  }))
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
    // Don't expose internal error messages in production
    const message =
      process.env.NODE_ENV === "production"
        ? "An unexpected error occurred"
        : error.message

    return new InternalError(message, error)
  }

  return new InternalError("An unexpected error occurred", error)
}
