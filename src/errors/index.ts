/**
 * memcql Error Handling Module
 *
 * Provides the error hierarchy for the statement engine.
 * All errors extend from MemCQLError which provides:
 * - Error codes for programmatic handling
 * - Serialization support
 * - Cause chaining for debugging
 * - Type guards for error checking
 *
 * Error Hierarchy:
 * - MemCQLError (base class)
 *   - InvalidRequestError (unknown objects, bad clause combinations, bad values)
 *     - AlreadyExistsError (re-creating a keyspace, table, type, index or view)
 *     - NotFoundError (keyspace, table, column, type, index or view missing)
 *   - ParameterBindingError (placeholder/parameter mismatch)
 *   - CqlSyntaxError (statement shape not recognized)
 *     - UnsupportedQueryError (statement kind not recognized at all)
 *   - SessionClosedError (statement sent to a shut-down session)
 *   - ConfigurationError (invalid configuration)
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for memcql operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',

  // Invalid request errors
  INVALID_REQUEST = 'INVALID_REQUEST',
  INVALID_VALUE = 'INVALID_VALUE',
  ALREADY_EXISTS = 'ALREADY_EXISTS',

  // Not found errors
  KEYSPACE_NOT_FOUND = 'KEYSPACE_NOT_FOUND',
  TABLE_NOT_FOUND = 'TABLE_NOT_FOUND',
  COLUMN_NOT_FOUND = 'COLUMN_NOT_FOUND',
  TYPE_NOT_FOUND = 'TYPE_NOT_FOUND',
  INDEX_NOT_FOUND = 'INDEX_NOT_FOUND',
  VIEW_NOT_FOUND = 'VIEW_NOT_FOUND',

  // Binding errors
  PARAMETER_BINDING = 'PARAMETER_BINDING',

  // Syntax errors
  SYNTAX_ERROR = 'SYNTAX_ERROR',
  UNSUPPORTED_QUERY = 'UNSUPPORTED_QUERY',

  // Session errors
  SESSION_CLOSED = 'SESSION_CLOSED',

  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (included outside production) */
  stack?: string | undefined
  /** Additional context data */
  context?: Record<string, unknown> | undefined
  /** Serialized cause (if error chaining) */
  cause?: SerializedError | undefined
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all memcql errors.
 *
 * @example
 * ```typescript
 * throw new MemCQLError('Operation failed', ErrorCode.INTERNAL, {
 *   statement: 'select',
 *   table: 'users'
 * })
 * ```
 */
export class MemCQLError extends Error {
  override readonly name: string = 'MemCQLError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error | undefined

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
   * Serialize error for logging or transport
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof MemCQLError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Create error from serialized format
   */
  static fromJSON(data: SerializedError): MemCQLError {
    const cause = data.cause ? MemCQLError.fromJSON(data.cause) : undefined
    const error = new MemCQLError(data.message, data.code, data.context, cause)
    if (data.stack) {
      error.stack = data.stack
    }
    return error
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

// =============================================================================
// Invalid Request Errors
// =============================================================================

/**
 * Error thrown when a statement is well formed but cannot be executed.
 *
 * Used for:
 * - Unsupported SELECT item combinations
 * - Values that cannot be cast to the column type
 * - Out-of-range TTL
 * - Writes to read-only tables
 */
export class InvalidRequestError extends MemCQLError {
  override readonly name: string = 'InvalidRequestError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INVALID_REQUEST,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
  }
}

/**
 * Error thrown when a definition statement targets a name that is taken.
 */
export class AlreadyExistsError extends InvalidRequestError {
  override readonly name: string = 'AlreadyExistsError'

  constructor(
    kind: 'keyspace' | 'table' | 'type' | 'index' | 'view',
    keyspace: string,
    objectName?: string
  ) {
    super(
      objectName === undefined
        ? `Keyspace '${keyspace}' already exists`
        : `${kind[0]?.toUpperCase()}${kind.slice(1)} '${objectName}' already exists in keyspace '${keyspace}'`,
      ErrorCode.ALREADY_EXISTS,
      { kind, keyspace, objectName }
    )
  }

  get keyspace(): string {
    return String(this.context.keyspace)
  }
}

/**
 * Error thrown when a keyspace, table, column, type, index or view is missing.
 */
export class NotFoundError extends InvalidRequestError {
  override readonly name: string = 'NotFoundError'

  constructor(
    message: string,
    code: ErrorCode,
    context?: Record<string, unknown>
  ) {
    super(message, code, context)
  }
}

/**
 * Error thrown when a keyspace does not exist.
 */
export class KeyspaceNotFoundError extends NotFoundError {
  override readonly name: string = 'KeyspaceNotFoundError'

  constructor(keyspace: string) {
    super(`Keyspace '${keyspace}' does not exist`, ErrorCode.KEYSPACE_NOT_FOUND, { keyspace })
  }
}

/**
 * Error thrown when a table does not exist.
 */
export class TableNotFoundError extends NotFoundError {
  override readonly name: string = 'TableNotFoundError'

  constructor(keyspace: string, table: string) {
    super(
      `Table '${table}' does not exist in keyspace '${keyspace}'`,
      ErrorCode.TABLE_NOT_FOUND,
      { keyspace, table }
    )
  }
}

/**
 * Error thrown when a column cannot be resolved against a table schema.
 */
export class ColumnNotFoundError extends NotFoundError {
  override readonly name: string = 'ColumnNotFoundError'

  constructor(column: string, table: string) {
    super(
      `Column '${column}' not found in table schema of '${table}'`,
      ErrorCode.COLUMN_NOT_FOUND,
      { column, table }
    )
  }

  get column(): string {
    return String(this.context.column)
  }
}

// =============================================================================
// Binding Errors
// =============================================================================

/**
 * Error thrown when bound parameters do not fit the statement's placeholders.
 */
export class ParameterBindingError extends MemCQLError {
  override readonly name: string = 'ParameterBindingError'

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.PARAMETER_BINDING, context)
  }
}

// =============================================================================
// Syntax Errors
// =============================================================================

/**
 * Error thrown when a statement does not match a recognized shape.
 */
export class CqlSyntaxError extends MemCQLError {
  override readonly name: string = 'CqlSyntaxError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SYNTAX_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message, code, context)
  }

  /** Offset in the statement text where parsing stopped, when known */
  get position(): number | undefined {
    const position = this.context.position
    return typeof position === 'number' ? position : undefined
  }
}

/**
 * Error thrown when the leading keywords do not name any known statement.
 */
export class UnsupportedQueryError extends CqlSyntaxError {
  override readonly name: string = 'UnsupportedQueryError'

  constructor(statement: string) {
    super(`Unsupported query: ${statement}`, ErrorCode.UNSUPPORTED_QUERY, { statement })
  }
}

// =============================================================================
// Session & Configuration Errors
// =============================================================================

/**
 * Error thrown when a statement is sent to a session that was shut down.
 */
export class SessionClosedError extends MemCQLError {
  override readonly name: string = 'SessionClosedError'

  constructor() {
    super('Session has been shut down; create a new session', ErrorCode.SESSION_CLOSED)
  }
}

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends MemCQLError {
  override readonly name: string = 'ConfigurationError'

  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCode.INVALID_CONFIG, context, cause)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is a MemCQLError
 */
export function isMemCQLError(error: unknown): error is MemCQLError {
  return error instanceof MemCQLError
}

/**
 * Check if an error is an InvalidRequestError (or any subclass)
 */
export function isInvalidRequestError(error: unknown): error is InvalidRequestError {
  return error instanceof InvalidRequestError
}

/**
 * Check if an error is a NotFoundError (or any subclass)
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError ||
    (isMemCQLError(error) && error.code.endsWith('_NOT_FOUND'))
}

/**
 * Check if an error is an AlreadyExistsError
 */
export function isAlreadyExistsError(error: unknown): error is AlreadyExistsError {
  return error instanceof AlreadyExistsError
}

/**
 * Check if an error is a ParameterBindingError
 */
export function isParameterBindingError(error: unknown): error is ParameterBindingError {
  return error instanceof ParameterBindingError
}

/**
 * Check if an error is a CqlSyntaxError (or any subclass)
 */
export function isSyntaxError(error: unknown): error is CqlSyntaxError {
  return error instanceof CqlSyntaxError
}

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Wrap an unknown error in a MemCQLError
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): MemCQLError {
  if (error instanceof MemCQLError) {
    return error
  }

  if (error instanceof Error) {
    return new MemCQLError(error.message, ErrorCode.INTERNAL, context, error)
  }

  return new MemCQLError(String(error), ErrorCode.UNKNOWN, context)
}
