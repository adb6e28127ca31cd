/**
 * Result Model
 *
 * Every statement returns a `ResultSet`: ordered rows over an ordered
 * column list. Definition statements and unconditional writes return an
 * empty result; conditional writes return a single `[applied]` row.
 *
 * @module result
 */

import type { CqlValue } from './values/types'

export const APPLIED_COLUMN = '[applied]'

// =============================================================================
// Row
// =============================================================================

/**
 * A result row with named columns
 */
export class Row {
  constructor(
    private readonly columnNames: readonly string[],
    private readonly data: readonly CqlValue[]
  ) {}

  private indexOf(name: string): number {
    const exact = this.columnNames.indexOf(name)
    if (exact !== -1) return exact
    const lowered = name.toLowerCase()
    return this.columnNames.findIndex(column => column.toLowerCase() === lowered)
  }

  /**
   * Value of a column by name (case-insensitive), or undefined if the row
   * has no such column
   */
  get(name: string): CqlValue | undefined {
    const index = this.indexOf(name)
    return index === -1 ? undefined : this.data[index]
  }

  /**
   * Value at a column position
   */
  at(index: number): CqlValue | undefined {
    return this.data[index]
  }

  keys(): string[] {
    return [...this.columnNames]
  }

  values(): CqlValue[] {
    return [...this.data]
  }

  /**
   * Plain object keyed by column name. A repeated column name keeps its
   * first value.
   */
  toObject(): Record<string, CqlValue> {
    const result: Record<string, CqlValue> = {}
    this.columnNames.forEach((name, i) => {
      if (!(name in result)) result[name] = this.data[i] ?? null
    })
    return result
  }
}

// =============================================================================
// ResultSet
// =============================================================================

export class ResultSet implements Iterable<Row> {
  readonly rows: Row[]

  constructor(
    readonly columns: readonly string[],
    values: ReadonlyArray<readonly CqlValue[]> = []
  ) {
    this.rows = values.map(data => new Row(columns, data))
  }

  /**
   * Result with no columns and no rows
   */
  static empty(): ResultSet {
    return new ResultSet([])
  }

  /**
   * Single-row result of a conditional write
   */
  static applied(applied: boolean, columns: readonly string[] = [], values: readonly CqlValue[] = []): ResultSet {
    return new ResultSet([APPLIED_COLUMN, ...columns], [[applied, ...values]])
  }

  get length(): number {
    return this.rows.length
  }

  first(): Row | null {
    return this.rows[0] ?? null
  }

  one(): Row | null {
    return this.first()
  }

  all(): Row[] {
    return [...this.rows]
  }

  /**
   * Outcome of a conditional write. Results without an `[applied]` column
   * count as applied.
   */
  wasApplied(): boolean {
    const applied = this.first()?.get(APPLIED_COLUMN)
    return typeof applied === 'boolean' ? applied : true
  }

  [Symbol.iterator](): Iterator<Row> {
    return this.rows[Symbol.iterator]()
  }
}
