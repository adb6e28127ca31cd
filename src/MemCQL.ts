/**
 * MemCQL - an in-memory CQL database
 *
 * One `MemCQL` instance owns one catalog of keyspaces, tables and rows.
 * Sessions created with `connect()` execute statements against it.
 */

import { resolveConfig, type MemCQLConfig, type ResolvedConfig } from './config'
import { WriteClock } from './mutation/write-metadata'
import { Catalog, type Keyspace } from './schema/catalog'
import { Session, type SessionHost } from './session'
import { formatCqlType, type CqlValue } from './values/types'
import { cloneValue } from './values/compare'
import { createLevelLogger, logger, setLogger } from './utils/logger'

// =============================================================================
// Metadata Types
// =============================================================================

export interface ColumnMetadata {
  name: string
  /** Declared type, e.g. `map<text, int>`; undefined for undeclared columns */
  type: string | undefined
  kind: 'partition_key' | 'clustering' | 'static' | 'regular'
}

export interface TableMetadata {
  name: string
  columns: ColumnMetadata[]
  partitionKey: string[]
  clusteringKey: string[]
  clusteringOrder: Record<string, 'ASC' | 'DESC'>
  indexes: Array<{ name: string; target: string }>
  options: Record<string, CqlValue>
}

export interface KeyspaceMetadata {
  name: string
  replication: Record<string, string>
  durableWrites: boolean
  tables: Record<string, TableMetadata>
  userTypes: Record<string, Record<string, string>>
  views: Record<string, { baseTable: string; whereClause: string }>
}

/**
 * Read-only view of the schema
 */
export interface Metadata {
  keyspace(name: string): KeyspaceMetadata | undefined
  keyspaces(): string[]
}

function keyspaceMetadata(keyspace: Keyspace): KeyspaceMetadata {
  const tables: Record<string, TableMetadata> = {}
  for (const table of keyspace.tables.values()) {
    tables[table.name] = {
      name: table.name,
      columns: table.columnNames().map(name => {
        const column = table.requireColumn(name)
        return { name, type: column.type ? formatCqlType(column.type) : undefined, kind: column.kind }
      }),
      partitionKey: [...table.partitionKey],
      clusteringKey: [...table.clusteringKey],
      clusteringOrder: Object.fromEntries(table.clusteringKey.map(name => [name, table.clusteringOrder.get(name) ?? 'ASC'])),
      indexes: [...table.indexes.values()].map(index => ({ name: index.name, target: index.target })),
      options: { ...table.options },
    }
  }

  const userTypes: Record<string, Record<string, string>> = {}
  for (const type of keyspace.types.values()) {
    userTypes[type.name] = Object.fromEntries([...type.fields].map(([field, fieldType]) => [field, formatCqlType(fieldType)]))
  }

  const views: KeyspaceMetadata['views'] = {}
  for (const view of keyspace.views.values()) {
    views[view.name] = { baseTable: view.baseTable, whereClause: view.whereClause }
  }

  return {
    name: keyspace.name,
    replication: { ...keyspace.replication },
    durableWrites: keyspace.durableWrites,
    tables,
    userTypes,
    views,
  }
}

// =============================================================================
// MemCQL
// =============================================================================

/**
 * In-memory emulation context
 *
 * @example
 * ```typescript
 * const db = new MemCQL()
 * const session = db.connect()
 * session.execute("CREATE KEYSPACE app WITH REPLICATION = {'class': 'SimpleStrategy', 'replication_factor': 1}")
 * session.execute('USE app')
 * session.execute('CREATE TABLE users (id int PRIMARY KEY, name text)')
 * session.execute('INSERT INTO users (id, name) VALUES (?, ?)', [1, 'Ada'])
 * session.execute('SELECT * FROM users').all()
 * ```
 */
export class MemCQL implements SessionHost {
  readonly config: ResolvedConfig
  readonly catalog: Catalog
  readonly clock: WriteClock

  constructor(config: MemCQLConfig = {}) {
    this.config = resolveConfig(config)
    setLogger(this.config.logger ?? createLevelLogger(this.config.logLevel))
    this.clock = new WriteClock(this.config.clock)
    this.catalog = new Catalog({
      clusterName: this.config.clusterName,
      dataCenter: this.config.dataCenter,
      rack: this.config.rack,
      rpcAddress: this.config.rpcAddress,
      releaseVersion: this.config.releaseVersion,
    })
  }

  /**
   * Open a session, optionally bound to a keyspace
   *
   * @param keyspace - Session keyspace; defaults to `config.defaultKeyspace`
   * @throws KeyspaceNotFoundError if the keyspace is given and does not exist
   */
  connect(keyspace?: string): Session {
    const name = keyspace ?? this.config.defaultKeyspace
    const session = new Session(this, name === undefined ? undefined : this.catalog.requireKeyspace(name).name)
    logger.debug(`Session opened${name === undefined ? '' : ` on keyspace ${name}`}`)
    return session
  }

  /**
   * Drop every user keyspace and row, restoring the initial catalog
   */
  reset(): void {
    this.catalog.reset()
    logger.debug('Catalog reset')
  }

  // ---------------------------------------------------------------------------
  // Inspection
  // ---------------------------------------------------------------------------

  getKeyspaces(): string[] {
    return this.catalog.listKeyspaces().map(keyspace => keyspace.name)
  }

  getTables(keyspace: string): string[] {
    return [...this.catalog.requireKeyspace(keyspace).tables.keys()]
  }

  getTypes(keyspace: string): string[] {
    return [...this.catalog.requireKeyspace(keyspace).types.keys()]
  }

  /**
   * Copy of the live (unexpired) rows of a table, in insertion order
   */
  getTableRows(keyspace: string, table: string): Array<Record<string, CqlValue>> {
    const found = this.catalog.requireTable({ keyspace, name: table }, undefined)
    found.purgeExpired(this.clock.now())
    return found.rows.map(row => {
      const values: Record<string, CqlValue> = {}
      for (const [name, value] of row.values) values[name] = cloneValue(value)
      return values
    })
  }

  get metadata(): Metadata {
    return {
      keyspace: name => {
        const keyspace = this.catalog.findKeyspace(name)
        return keyspace ? keyspaceMetadata(keyspace) : undefined
      },
      keyspaces: () => this.getKeyspaces(),
    }
  }
}
