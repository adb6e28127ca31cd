/**
 * Execution Context
 *
 * Everything a statement handler needs: the catalog, the session keyspace,
 * bound parameters, configuration and the write clock.
 *
 * @module engine/context
 */

import type { ResolvedConfig } from '../config'
import type { Bindings } from '../parser/bindings'
import type { WriteClock, WriteContext } from '../mutation/write-metadata'
import type { ResolveContext } from '../query/condition'
import type { Catalog } from '../schema/catalog'
import type { Table } from '../schema/table'

export interface ExecutionContext {
  readonly catalog: Catalog
  readonly config: ResolvedConfig
  readonly clock: WriteClock
  readonly bindings: Bindings
  /** Session keyspace used for unqualified names */
  readonly keyspace: string | undefined
  /** Timestamp shared by the statements of a batch */
  readonly defaultTimestamp?: number | undefined
  /** Switch the session keyspace (USE) */
  useKeyspace(name: string): void
}

/**
 * Session state a statement runs against, before parameters are bound
 */
export type SessionScope = Omit<ExecutionContext, 'bindings' | 'defaultTimestamp'>

/**
 * Term and write context for statements against `table`
 */
export function writeContext(context: ExecutionContext, table: Table): WriteContext & ResolveContext {
  return {
    bindings: context.bindings,
    now: context.clock.now,
    clock: context.clock,
    defaultTimestamp: context.defaultTimestamp,
    resolveType: context.catalog.typeResolver(table.keyspace),
  }
}
