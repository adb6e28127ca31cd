/**
 * Table Storage
 *
 * A table owns its column definitions, primary-key layout, secondary
 * indexes and rows. Rows keep insertion order and are indexed by their
 * primary-key tuple.
 *
 * @module schema/table
 */

import { ColumnNotFoundError } from '../errors'
import { cloneValue, tupleKey } from '../values/compare'
import { isCounterType, type CqlType, type CqlValue } from '../values/types'

// =============================================================================
// Types
// =============================================================================

/**
 * A stored row with its write metadata
 */
export interface StoredRow {
  values: Map<string, CqlValue>
  /** Write timestamp in microseconds */
  writeTime: number
  /** Expiry instant in milliseconds since epoch */
  expiresAt?: number | undefined
  /** TTL in seconds as written */
  ttl?: number | undefined
}

export type ColumnKind = 'partition_key' | 'clustering' | 'static' | 'regular'

export interface ColumnDefinition {
  name: string
  /** Undefined for columns written without a declared type */
  type?: CqlType | undefined
  kind: ColumnKind
}

export interface IndexDefinition {
  name: string
  column: string
  /** Index target as shown in `system_schema.indexes`, e.g. `keys(tags)` */
  target: string
  using?: string | undefined
}

export interface TableDefinition {
  columns: Array<{ name: string; type: CqlType; isStatic?: boolean | undefined }>
  partitionKey: string[]
  clusteringKey?: string[] | undefined
  clusteringOrder?: ReadonlyMap<string, 'ASC' | 'DESC'> | undefined
  options?: Record<string, CqlValue> | undefined
  readOnly?: boolean | undefined
}

/**
 * Saved row state, used to roll back a conditional batch
 */
export interface TableSnapshot {
  rows: StoredRow[]
  looseColumns: string[]
}

/**
 * Check if a row has passed its expiry instant
 */
/**
 * Definition of a column written without a declared type
 */
export function looseColumn(name: string): ColumnDefinition {
  return { name, kind: 'regular' }
}

export function isExpired(row: StoredRow, now: number): boolean {
  return row.expiresAt !== undefined && now >= row.expiresAt
}

function copyRow(row: StoredRow): StoredRow {
  const values = new Map<string, CqlValue>()
  for (const [name, value] of row.values) values.set(name, cloneValue(value))
  return { values, writeTime: row.writeTime, expiresAt: row.expiresAt, ttl: row.ttl }
}

// =============================================================================
// Table
// =============================================================================

export class Table {
  readonly columns = new Map<string, ColumnDefinition>()
  readonly partitionKey: string[]
  readonly clusteringKey: string[]
  readonly clusteringOrder: Map<string, 'ASC' | 'DESC'>
  readonly indexes = new Map<string, IndexDefinition>()
  readonly readOnly: boolean
  options: Record<string, CqlValue>

  /** Columns written without being declared, in first-write order */
  private readonly looseColumns = new Map<string, ColumnDefinition>()
  private rowList: StoredRow[] = []
  private readonly byKey = new Map<string, StoredRow>()

  constructor(
    readonly keyspace: string,
    readonly name: string,
    definition: TableDefinition
  ) {
    this.partitionKey = [...definition.partitionKey]
    this.clusteringKey = [...(definition.clusteringKey ?? [])]
    this.clusteringOrder = new Map(definition.clusteringOrder ?? [])
    this.options = { ...(definition.options ?? {}) }
    this.readOnly = definition.readOnly ?? false

    for (const column of definition.columns) {
      this.columns.set(column.name, {
        name: column.name,
        type: column.type,
        kind: this.kindOf(column.name, column.isStatic ?? false),
      })
    }
  }

  private kindOf(name: string, isStatic: boolean): ColumnKind {
    if (this.partitionKey.includes(name)) return 'partition_key'
    if (this.clusteringKey.includes(name)) return 'clustering'
    return isStatic ? 'static' : 'regular'
  }

  // ---------------------------------------------------------------------------
  // Columns
  // ---------------------------------------------------------------------------

  get primaryKey(): string[] {
    return [...this.partitionKey, ...this.clusteringKey]
  }

  /**
   * Declared columns in declaration order, followed by undeclared columns
   */
  columnNames(): string[] {
    return [...this.columns.keys(), ...this.looseColumns.keys()]
  }

  /**
   * Find a column by name: exact match first, then case-insensitive
   */
  resolveColumn(name: string): ColumnDefinition | undefined {
    const exact = this.columns.get(name) ?? this.looseColumns.get(name)
    if (exact) return exact
    const lowered = name.toLowerCase()
    for (const column of [...this.columns.values(), ...this.looseColumns.values()]) {
      if (column.name.toLowerCase() === lowered) return column
    }
    return undefined
  }

  /**
   * @throws ColumnNotFoundError if the column does not exist
   */
  requireColumn(name: string): ColumnDefinition {
    const column = this.resolveColumn(name)
    if (!column) throw new ColumnNotFoundError(name, this.name)
    return column
  }

  isPrimaryKeyColumn(name: string): boolean {
    const kind = this.resolveColumn(name)?.kind
    return kind === 'partition_key' || kind === 'clustering'
  }

  hasCounterColumns(): boolean {
    for (const column of this.columns.values()) {
      if (column.type && isCounterType(column.type)) return true
    }
    return false
  }

  addColumn(name: string, type: CqlType, isStatic = false): ColumnDefinition {
    const column: ColumnDefinition = { name, type, kind: isStatic ? 'static' : 'regular' }
    this.looseColumns.delete(name)
    this.columns.set(name, column)
    return column
  }

  /**
   * Register a column written without a declared type
   */
  addLooseColumn(name: string): ColumnDefinition {
    const column = looseColumn(name)
    this.looseColumns.set(name, column)
    return column
  }

  /**
   * Register the names the table does not resolve yet as loose columns
   */
  addLooseColumns(names: Iterable<string>): void {
    for (const name of names) {
      if (!this.resolveColumn(name)) this.addLooseColumn(name)
    }
  }

  dropColumn(name: string): void {
    this.columns.delete(name)
    this.looseColumns.delete(name)
    for (const row of this.rowList) row.values.delete(name)
  }

  // ---------------------------------------------------------------------------
  // Rows
  // ---------------------------------------------------------------------------

  get rows(): readonly StoredRow[] {
    return this.rowList
  }

  get size(): number {
    return this.rowList.length
  }

  /**
   * Identity key of a row from its primary-key values
   */
  keyOf(values: ReadonlyMap<string, CqlValue>): string {
    return tupleKey(this.primaryKey.map(column => values.get(column) ?? null))
  }

  get(key: string): StoredRow | undefined {
    return this.byKey.get(key)
  }

  /**
   * Store a row, replacing any row with the same identity in place
   */
  put(row: StoredRow): void {
    const key = this.keyOf(row.values)
    const existing = this.byKey.get(key)
    if (existing) {
      const index = this.rowList.indexOf(existing)
      this.rowList[index] = row
    } else {
      this.rowList.push(row)
    }
    this.byKey.set(key, row)
  }

  remove(row: StoredRow): boolean {
    const index = this.rowList.indexOf(row)
    if (index === -1) return false
    this.rowList.splice(index, 1)
    this.byKey.delete(this.keyOf(row.values))
    return true
  }

  truncate(): void {
    this.rowList = []
    this.byKey.clear()
  }

  /**
   * Replace all rows at once
   */
  replaceRows(rows: StoredRow[]): void {
    this.truncate()
    for (const row of rows) this.put(row)
  }

  /**
   * Remove rows whose TTL has elapsed
   *
   * @returns number of rows removed
   */
  purgeExpired(now: number): number {
    const live = this.rowList.filter(row => !isExpired(row, now))
    const removed = this.rowList.length - live.length
    if (removed > 0) this.replaceRows(live)
    return removed
  }

  snapshot(): TableSnapshot {
    return { rows: this.rowList.map(copyRow), looseColumns: [...this.looseColumns.keys()] }
  }

  restore(snapshot: TableSnapshot): void {
    this.looseColumns.clear()
    for (const name of snapshot.looseColumns) this.addLooseColumn(name)
    this.replaceRows(snapshot.rows.map(copyRow))
  }
}
