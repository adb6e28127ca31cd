/**
 * Session
 *
 * Driver-style facade over one emulation context: execute statements,
 * prepare and bind them, run batches, and track the session keyspace.
 *
 * @module session
 */

import type { ResolvedConfig } from './config'
import { runBatch, type BatchEntry } from './engine/batch'
import type { SessionScope } from './engine/context'
import { executeStatement } from './engine/dispatcher'
import { ErrorCode, InvalidRequestError, SessionClosedError, wrapError } from './errors'
import type { WriteClock } from './mutation/write-metadata'
import type { ParsedStatement } from './parser/ast'
import { bindParameters, NO_BINDINGS, type StatementParameters } from './parser/bindings'
import { parseStatement } from './parser/parser'
import type { ResultSet } from './result'
import type { Catalog } from './schema/catalog'
import { logger } from './utils/logger'

// =============================================================================
// Types
// =============================================================================

/**
 * Per-call options. Accepted for driver compatibility; execution is
 * synchronous so none of them change behavior.
 */
export interface ExecuteOptions {
  prepare?: boolean | undefined
  timeout?: number | undefined
  consistency?: string | undefined
  fetchSize?: number | undefined
}

export interface BatchOptions {
  /** Write timestamp in microseconds shared by every statement */
  timestamp?: number | undefined
}

/**
 * A statement in `Session.batch()`
 */
export type BatchQuery = string | BoundStatement | { query: string; params?: StatementParameters | undefined }

/**
 * State shared by the sessions of one context
 */
export interface SessionHost {
  readonly catalog: Catalog
  readonly config: ResolvedConfig
  readonly clock: WriteClock
}

// =============================================================================
// Prepared statements
// =============================================================================

/**
 * A statement parsed once and executed many times
 */
export class PreparedStatement {
  constructor(readonly parsed: ParsedStatement) {}

  get query(): string {
    return this.parsed.text
  }

  /** Number of placeholders in the statement */
  get markerCount(): number {
    return this.parsed.markers.length
  }

  /**
   * Attach parameter values. Binding errors surface when the bound
   * statement executes.
   */
  bind(values?: StatementParameters): BoundStatement {
    return new BoundStatement(this, values)
  }
}

export class BoundStatement {
  constructor(
    readonly prepared: PreparedStatement,
    readonly values?: StatementParameters | undefined
  ) {}
}

// =============================================================================
// Session
// =============================================================================

export class Session {
  private currentKeyspace: string | undefined
  private closed = false

  constructor(
    private readonly host: SessionHost,
    keyspace?: string
  ) {
    this.currentKeyspace = keyspace
  }

  get keyspace(): string | undefined {
    return this.currentKeyspace
  }

  get isShutdown(): boolean {
    return this.closed
  }

  private ensureOpen(): void {
    if (this.closed) throw new SessionClosedError()
  }

  private scope(): SessionScope {
    return {
      catalog: this.host.catalog,
      config: this.host.config,
      clock: this.host.clock,
      keyspace: this.currentKeyspace,
      useKeyspace: name => {
        this.currentKeyspace = name
      },
    }
  }

  /**
   * Execute a statement synchronously
   *
   * @example
   * ```typescript
   * session.execute('INSERT INTO users (id, name) VALUES (?, ?)', [1, 'Ada'])
   * const row = session.execute('SELECT name FROM users WHERE id = :id', { id: 1 }).one()
   * ```
   */
  execute(
    query: string | PreparedStatement | BoundStatement,
    params?: StatementParameters,
    _options?: ExecuteOptions
  ): ResultSet {
    this.ensureOpen()
    if (query instanceof BoundStatement) {
      return executeStatement(query.prepared.parsed, params ?? query.values, this.scope())
    }
    if (query instanceof PreparedStatement) {
      return executeStatement(query.parsed, params, this.scope())
    }
    return executeStatement(query, params, this.scope())
  }

  /**
   * Promise form of `execute()`. Errors reject the promise; anything that
   * is not already a `MemCQLError` is wrapped in one.
   */
  executeAsync(
    query: string | PreparedStatement | BoundStatement,
    params?: StatementParameters,
    options?: ExecuteOptions
  ): Promise<ResultSet> {
    try {
      return Promise.resolve(this.execute(query, params, options))
    } catch (error) {
      return Promise.reject(wrapError(error, { query: typeof query === 'string' ? query : undefined }))
    }
  }

  /**
   * Parse a statement ahead of execution
   *
   * @throws CqlSyntaxError if the statement cannot be parsed
   */
  prepare(query: string): PreparedStatement {
    this.ensureOpen()
    return new PreparedStatement(parseStatement(query))
  }

  /**
   * Run INSERT, UPDATE and DELETE statements as one batch with a shared
   * write timestamp
   */
  batch(queries: readonly BatchQuery[], options: BatchOptions = {}): ResultSet {
    this.ensureOpen()
    const entries: BatchEntry[] = queries.map(query => {
      const { parsed, params } = typeof query === 'string'
        ? { parsed: parseStatement(query), params: undefined }
        : query instanceof BoundStatement
          ? { parsed: query.prepared.parsed, params: query.values }
          : { parsed: parseStatement(query.query), params: query.params }
      const { statement } = parsed
      if (statement.kind !== 'insert' && statement.kind !== 'update' && statement.kind !== 'delete') {
        throw new InvalidRequestError(
          `Only INSERT, UPDATE and DELETE statements are allowed in a batch, got ${statement.kind}`,
          ErrorCode.INVALID_REQUEST,
          { statement: parsed.text }
        )
      }
      return { statement, bindings: bindParameters(parsed.markers, params) }
    })

    const scope = this.scope()
    const timestamp = options.timestamp ?? this.host.clock.nextTimestamp()
    return runBatch(entries, timestamp, { ...scope, bindings: NO_BINDINGS })
  }

  /**
   * Switch the session keyspace
   *
   * @throws KeyspaceNotFoundError
   */
  setKeyspace(name: string): void {
    this.ensureOpen()
    this.currentKeyspace = this.host.catalog.requireKeyspace(name).name
  }

  /**
   * Close the session. Further calls throw `SessionClosedError`.
   */
  shutdown(): void {
    if (this.closed) return
    this.closed = true
    logger.debug('Session shut down')
  }
}
