/**
 * Schema Catalog
 *
 * Owns keyspaces, tables, user-defined types, indexes and materialized
 * views for one emulation context, and keeps the reflective
 * `system_schema` tables in step with them.
 *
 * @module schema/catalog
 */

import {
  ErrorCode,
  InvalidRequestError,
  KeyspaceNotFoundError,
  NotFoundError,
  TableNotFoundError,
} from '../errors'
import type { QualifiedName } from '../parser/ast'
import type { ResolvedCondition } from '../query/condition'
import type { UserTypeResolver } from '../values/cast'
import type { CqlType } from '../values/types'
import { createSystemKeyspaces, refreshSystemSchema, RESERVED_KEYSPACES, type NodeIdentity } from './system'
import type { Table } from './table'

export { DEFAULT_REPLICATION } from './system'

// =============================================================================
// Types
// =============================================================================

export interface UserType {
  name: string
  fields: Map<string, CqlType>
}

export interface ViewDefinition {
  name: string
  keyspace: string
  baseTable: string
  /** Selected base columns; empty means all */
  columns: string[]
  where: ResolvedCondition[]
  whereClause: string
  partitionKey: string[]
  clusteringKey: string[]
}

export interface Keyspace {
  name: string
  replication: Record<string, string>
  durableWrites: boolean
  tables: Map<string, Table>
  types: Map<string, UserType>
  views: Map<string, ViewDefinition>
  /** Reserved keyspaces cannot be written to or dropped */
  reserved: boolean
}

/** A table or view named in a FROM clause */
export interface Relation {
  table: Table
  view?: ViewDefinition | undefined
}

/**
 * Find an entry by exact name, then case-insensitively
 */
export function findByName<T>(entries: ReadonlyMap<string, T>, name: string): T | undefined {
  const exact = entries.get(name)
  if (exact !== undefined) return exact
  const lowered = name.toLowerCase()
  for (const [key, value] of entries) {
    if (key.toLowerCase() === lowered) return value
  }
  return undefined
}

// =============================================================================
// Catalog
// =============================================================================

export class Catalog {
  private keyspaces = new Map<string, Keyspace>()

  constructor(private readonly identity: NodeIdentity) {
    this.reset()
  }

  /**
   * Drop every user keyspace and restore the system keyspaces
   */
  reset(): void {
    this.keyspaces = new Map()
    for (const keyspace of createSystemKeyspaces(this.identity)) {
      this.keyspaces.set(keyspace.name, keyspace)
    }
    this.refresh()
  }

  /**
   * Regenerate the reflective schema tables from the live catalog
   */
  refresh(): void {
    refreshSystemSchema(this)
  }

  listKeyspaces(): Keyspace[] {
    return [...this.keyspaces.values()]
  }

  isReserved(name: string): boolean {
    return RESERVED_KEYSPACES.includes(name.toLowerCase())
  }

  findKeyspace(name: string): Keyspace | undefined {
    return findByName(this.keyspaces, name)
  }

  /**
   * @throws KeyspaceNotFoundError
   */
  requireKeyspace(name: string): Keyspace {
    const keyspace = this.findKeyspace(name)
    if (!keyspace) throw new KeyspaceNotFoundError(name)
    return keyspace
  }

  addKeyspace(keyspace: Keyspace): void {
    this.keyspaces.set(keyspace.name, keyspace)
  }

  removeKeyspace(keyspace: Keyspace): void {
    this.keyspaces.delete(keyspace.name)
  }

  /**
   * Keyspace for a possibly qualified name, falling back to the session keyspace
   *
   * @throws InvalidRequestError when neither names a keyspace
   */
  keyspaceFor(name: QualifiedName, sessionKeyspace: string | undefined): Keyspace {
    const keyspaceName = name.keyspace ?? sessionKeyspace
    if (keyspaceName === undefined) {
      throw new InvalidRequestError(
        `No keyspace has been specified for '${name.name}'. USE a keyspace, or explicitly specify keyspace.tablename`,
        ErrorCode.INVALID_REQUEST,
        { name: name.name }
      )
    }
    return this.requireKeyspace(keyspaceName)
  }

  /**
   * @throws TableNotFoundError
   */
  requireTable(name: QualifiedName, sessionKeyspace: string | undefined): Table {
    const keyspace = this.keyspaceFor(name, sessionKeyspace)
    const table = findByName(keyspace.tables, name.name)
    if (!table) throw new TableNotFoundError(keyspace.name, name.name)
    return table
  }

  /**
   * Table for a data-modification statement
   *
   * @throws InvalidRequestError for reserved keyspaces and views
   */
  requireWritableTable(name: QualifiedName, sessionKeyspace: string | undefined): Table {
    const keyspace = this.keyspaceFor(name, sessionKeyspace)
    const view = findByName(keyspace.views, name.name)
    if (view) {
      throw new InvalidRequestError(
        `Cannot directly modify a materialized view: ${keyspace.name}.${view.name}`,
        ErrorCode.INVALID_REQUEST,
        { keyspace: keyspace.name, view: view.name }
      )
    }
    const table = this.requireTable(name, sessionKeyspace)
    if (table.readOnly || keyspace.reserved) {
      throw new InvalidRequestError(
        `Modification of system keyspace '${keyspace.name}' is not allowed`,
        ErrorCode.INVALID_REQUEST,
        { keyspace: keyspace.name, table: table.name }
      )
    }
    return table
  }

  /**
   * Table or materialized view named in a SELECT
   */
  requireRelation(name: QualifiedName, sessionKeyspace: string | undefined): Relation {
    const keyspace = this.keyspaceFor(name, sessionKeyspace)
    const table = findByName(keyspace.tables, name.name)
    if (table) return { table }
    const view = findByName(keyspace.views, name.name)
    if (view) {
      const base = findByName(keyspace.tables, view.baseTable)
      if (base) return { table: base, view }
    }
    throw new TableNotFoundError(keyspace.name, name.name)
  }

  /**
   * @throws NotFoundError with code TYPE_NOT_FOUND
   */
  requireType(keyspace: Keyspace, name: string): UserType {
    const type = findByName(keyspace.types, name)
    if (!type) {
      throw new NotFoundError(
        `Type '${name}' does not exist in keyspace '${keyspace.name}'`,
        ErrorCode.TYPE_NOT_FOUND,
        { keyspace: keyspace.name, type: name }
      )
    }
    return type
  }

  /**
   * Resolver for user-defined types of a keyspace
   */
  typeResolver(keyspaceName: string): UserTypeResolver {
    return name => {
      const keyspace = this.findKeyspace(keyspaceName)
      return keyspace ? findByName(keyspace.types, name)?.fields : undefined
    }
  }
}
