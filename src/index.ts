/**
 * memcql - an in-memory CQL database for tests
 *
 * @packageDocumentation
 */

// =============================================================================
// Entry Point
// =============================================================================

export {
  MemCQL,
  type ColumnMetadata,
  type TableMetadata,
  type KeyspaceMetadata,
  type Metadata,
} from './MemCQL'

export {
  Session,
  PreparedStatement,
  BoundStatement,
  type ExecuteOptions,
  type BatchOptions,
  type BatchQuery,
} from './session'

// =============================================================================
// Results
// =============================================================================

export { ResultSet, Row, APPLIED_COLUMN } from './result'
export { JSON_COLUMN } from './query/select'

// =============================================================================
// Values
// =============================================================================

export type { CqlValue, CqlObject, CqlType, NativeTypeName } from './values/types'
export { formatCqlType } from './values/types'
export type { StatementParameters } from './parser/bindings'
export { MAX_TTL } from './mutation/write-metadata'

// =============================================================================
// Parsing
// =============================================================================

export { parseStatement, parseType } from './parser/parser'
export type { ParsedStatement, Statement } from './parser/ast'

// =============================================================================
// Configuration
// =============================================================================

export {
  configSchema,
  defineConfig,
  resolveConfig,
  loadConfigFromEnv,
  type MemCQLConfig,
  type ResolvedConfig,
} from './config'

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  MemCQLError,
  InvalidRequestError,
  AlreadyExistsError,
  NotFoundError,
  KeyspaceNotFoundError,
  TableNotFoundError,
  ColumnNotFoundError,
  ParameterBindingError,
  CqlSyntaxError,
  UnsupportedQueryError,
  SessionClosedError,
  ConfigurationError,
  isMemCQLError,
  isInvalidRequestError,
  isNotFoundError,
  isAlreadyExistsError,
  isParameterBindingError,
  isSyntaxError,
  wrapError,
  type SerializedError,
} from './errors'

// =============================================================================
// Logging
// =============================================================================

export {
  logger,
  setLogger,
  consoleLogger,
  noopLogger,
  createLevelLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
} from './utils/logger'
