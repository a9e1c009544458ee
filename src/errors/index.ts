/**
 * Tiny Blog Error Handling Module
 *
 * Provides a standardized error hierarchy for the post store, the
 * renderer and the HTTP layer. All errors extend from BlogError which
 * provides:
 * - Error codes for programmatic handling
 * - Serialization support for JSON responses
 * - Cause chaining for debugging
 * - Type guards for error checking
 *
 * Error Hierarchy:
 * - BlogError (base class)
 *   - ValidationError (request body or slug validation failures)
 *   - NotFoundError (resource not found)
 *     - PostNotFoundError (no record stored under a slug)
 *   - StorageError (storage engine failures)
 *     - StorageUnavailableError (engine cannot be opened or initialized)
 *     - StorageWriteError (write transaction failed to commit)
 *   - CodecError
 *     - EncodingError (post could not be serialized)
 *     - DecodingError (stored bytes do not parse as a post)
 *   - ConfigurationError (invalid configuration)
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for blog operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',

  // Validation errors
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  INVALID_SLUG = 'INVALID_SLUG',

  // Not found errors
  NOT_FOUND = 'NOT_FOUND',
  POST_NOT_FOUND = 'POST_NOT_FOUND',

  // Storage errors
  STORAGE_ERROR = 'STORAGE_ERROR',
  STORAGE_UNAVAILABLE = 'STORAGE_UNAVAILABLE',
  STORAGE_READ_ERROR = 'STORAGE_READ_ERROR',
  STORAGE_WRITE_ERROR = 'STORAGE_WRITE_ERROR',

  // Codec errors
  ENCODING_ERROR = 'ENCODING_ERROR',
  DECODING_ERROR = 'DECODING_ERROR',

  // Configuration errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format for JSON responses
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (included in development mode) */
  stack?: string
  /** Additional context data */
  context?: Record<string, unknown>
  /** Serialized cause (if error chaining) */
  cause?: SerializedError
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all blog errors.
 *
 * @example
 * ```typescript
 * throw new BlogError('Operation failed', ErrorCode.INTERNAL, {
 *   operation: 'upsert',
 *   slug: 'hello-world'
 * })
 * ```
 */
export class BlogError extends Error {
  override readonly name: string = 'BlogError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error for a JSON response body
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof BlogError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when input validation fails.
 */
export class ValidationError extends BlogError {
  override readonly name: string = 'ValidationError'
  readonly field: string | undefined

  constructor(
    message: string,
    context?: {
      field?: string
      value?: unknown
    },
    cause?: Error,
    code: ErrorCode = ErrorCode.VALIDATION_FAILED
  ) {
    super(message, code, context, cause)
    this.field = context?.field
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Error thrown when a slug is not a usable storage key.
 */
export class InvalidSlugError extends ValidationError {
  override readonly name = 'InvalidSlugError'
  readonly slug: string

  constructor(slug: string, reason: string) {
    super(`Invalid slug "${slug}": ${reason}`, { field: 'slug', value: slug }, undefined, ErrorCode.INVALID_SLUG)
    this.slug = slug
    Object.setPrototypeOf(this, InvalidSlugError.prototype)
  }
}

// =============================================================================
// Not Found Errors
// =============================================================================

/**
 * Error thrown when a requested resource is not found.
 */
export class NotFoundError extends BlogError {
  override readonly name: string = 'NotFoundError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NOT_FOUND,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Error thrown when no post is stored under a slug.
 *
 * An expected outcome rather than a system failure; callers map it to a
 * "not found" response.
 */
export class PostNotFoundError extends NotFoundError {
  override readonly name = 'PostNotFoundError'
  readonly slug: string

  constructor(slug: string) {
    super(`Post not found: ${slug}`, ErrorCode.POST_NOT_FOUND, { slug })
    this.slug = slug
    Object.setPrototypeOf(this, PostNotFoundError.prototype)
  }
}

// =============================================================================
// Storage Errors
// =============================================================================

/**
 * Error thrown when a storage engine operation fails.
 */
export class StorageError extends BlogError {
  override readonly name: string = 'StorageError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORAGE_ERROR,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Error thrown when the backing file cannot be opened or its namespace
 * cannot be created. Fatal at startup.
 */
export class StorageUnavailableError extends StorageError {
  override readonly name = 'StorageUnavailableError'
  readonly path: string

  constructor(path: string, message: string, cause?: Error) {
    super(
      `Storage unavailable at "${path}": ${message}`,
      ErrorCode.STORAGE_UNAVAILABLE,
      { path },
      cause
    )
    this.path = path
    Object.setPrototypeOf(this, StorageUnavailableError.prototype)
  }
}

/**
 * Error thrown when a read transaction fails inside the engine.
 */
export class StorageReadError extends StorageError {
  override readonly name = 'StorageReadError'

  constructor(message: string, cause?: Error) {
    super(`Read failed: ${message}`, ErrorCode.STORAGE_READ_ERROR, {}, cause)
    Object.setPrototypeOf(this, StorageReadError.prototype)
  }
}

/**
 * Error thrown when a write transaction cannot commit (I/O failure,
 * disk full, writer slot not acquired in time). Never retried here.
 */
export class StorageWriteError extends StorageError {
  override readonly name = 'StorageWriteError'
  readonly operation: string

  constructor(operation: string, message: string, cause?: Error) {
    super(
      `${operation} failed: ${message}`,
      ErrorCode.STORAGE_WRITE_ERROR,
      { operation },
      cause
    )
    this.operation = operation
    Object.setPrototypeOf(this, StorageWriteError.prototype)
  }
}

// =============================================================================
// Codec Errors
// =============================================================================

/**
 * Base class for post serialization failures.
 */
export class CodecError extends BlogError {
  override readonly name: string = 'CodecError'
  readonly slug: string | undefined

  constructor(message: string, code: ErrorCode, slug?: string, cause?: Error) {
    super(message, code, slug === undefined ? {} : { slug }, cause)
    this.slug = slug
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Error thrown when a post cannot be serialized before a write.
 */
export class EncodingError extends CodecError {
  override readonly name = 'EncodingError'

  constructor(message: string, slug?: string, cause?: Error) {
    super(`Cannot encode post: ${message}`, ErrorCode.ENCODING_ERROR, slug, cause)
    Object.setPrototypeOf(this, EncodingError.prototype)
  }
}

/**
 * Error thrown when stored bytes do not parse back into a post.
 *
 * Signals corruption or schema drift and is never conflated with an
 * absent record.
 */
export class DecodingError extends CodecError {
  override readonly name = 'DecodingError'

  constructor(message: string, slug?: string, cause?: Error) {
    super(
      slug === undefined ? `Cannot decode post: ${message}` : `Cannot decode post "${slug}": ${message}`,
      ErrorCode.DECODING_ERROR,
      slug,
      cause
    )
    Object.setPrototypeOf(this, DecodingError.prototype)
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends BlogError {
  override readonly name = 'ConfigurationError'

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context)
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is a BlogError
 */
export function isBlogError(error: unknown): error is BlogError {
  return error instanceof BlogError
}

/**
 * Check if an error is a ValidationError (or any subclass)
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

/**
 * Check if an error is a NotFoundError (or any subclass)
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError
}

/**
 * Check if an error is a StorageError (or any subclass)
 */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError
}

/**
 * Check if an error is a DecodingError
 */
export function isDecodingError(error: unknown): error is DecodingError {
  return error instanceof DecodingError
}

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Wrap an unknown error in a BlogError
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): BlogError {
  if (error instanceof BlogError) {
    return error
  }

  if (error instanceof Error) {
    return new BlogError(error.message, ErrorCode.INTERNAL, context, error)
  }

  return new BlogError(String(error), ErrorCode.UNKNOWN, context)
}

/**
 * Normalize a thrown value into an Error for cause chaining
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
