/**
 * Projection
 *
 * Resolves select items to output columns and computes their values for
 * single rows and for row groups.
 *
 * @module query/projection
 */

import { computeAggregate, type AggregateSpec } from '../aggregation'
import { ColumnNotFoundError, ErrorCode, InvalidRequestError } from '../errors'
import type { SelectItem } from '../parser/ast'
import { remainingTtl } from '../mutation/write-metadata'
import type { ViewDefinition } from '../schema/catalog'
import type { StoredRow, Table } from '../schema/table'
import { cloneValue, toHex } from '../values/compare'
import type { CqlValue } from '../values/types'

// =============================================================================
// Output columns
// =============================================================================

export type OutputColumn =
  | { kind: 'column'; name: string; column: string }
  | { kind: 'aggregate'; name: string; spec: AggregateSpec }
  | { kind: 'function'; name: string; fn: 'writetime' | 'ttl'; column: string }

/**
 * Columns visible through a relation: the view's column list, or every
 * column of the table
 */
export function visibleColumns(table: Table, view?: ViewDefinition): string[] {
  return view && view.columns.length > 0 ? [...view.columns] : table.columnNames()
}

/**
 * Resolve a column name against the relation read by a SELECT
 *
 * @throws ColumnNotFoundError
 */
export function resolveReadColumn(name: string, table: Table, view?: ViewDefinition): string {
  const column = table.requireColumn(name).name
  if (view && view.columns.length > 0 && !view.columns.includes(column)) {
    throw new ColumnNotFoundError(name, view.name)
  }
  return column
}

/**
 * Resolve select items to output columns in select order
 */
export function resolveOutputColumns(items: readonly SelectItem[], table: Table, view?: ViewDefinition): OutputColumn[] {
  return items.flatMap((item): OutputColumn[] => {
    switch (item.kind) {
      case 'wildcard':
        return visibleColumns(table, view).map(column => ({ kind: 'column', name: column, column }))
      case 'column': {
        const column = resolveReadColumn(item.name, table, view)
        return [{ kind: 'column', name: item.alias ?? column, column }]
      }
      case 'aggregate': {
        const column = item.argument === '*' ? undefined : resolveReadColumn(item.argument, table, view)
        return [{
          kind: 'aggregate',
          name: item.alias ?? item.fn,
          spec: { fn: item.fn, column, distinct: item.distinct },
        }]
      }
      case 'function': {
        const column = resolveReadColumn(item.column, table, view)
        if (table.isPrimaryKeyColumn(column)) {
          throw new InvalidRequestError(
            `Cannot use selection function ${item.fn} on PRIMARY KEY part ${column}`,
            ErrorCode.INVALID_REQUEST,
            { column }
          )
        }
        return [{ kind: 'function', name: item.alias ?? `${item.fn}(${column})`, fn: item.fn, column }]
      }
    }
  })
}

// =============================================================================
// Values
// =============================================================================

/**
 * Output values for one stored row. Collections, dates and blobs are
 * copies, never the stored objects.
 */
export function projectRow(columns: readonly OutputColumn[], row: StoredRow, now: number): CqlValue[] {
  return columns.map(output => {
    switch (output.kind) {
      case 'column':
        return cloneValue(row.values.get(output.column) ?? null)
      case 'function': {
        if ((row.values.get(output.column) ?? null) === null) return null
        return output.fn === 'writetime' ? row.writeTime : remainingTtl(row, now)
      }
      case 'aggregate':
        return cloneValue(computeAggregate(output.spec, [row.values]))
    }
  })
}

/**
 * Output values for a group of rows. Plain columns take the value of the
 * group's first row.
 */
export function projectGroup(columns: readonly OutputColumn[], rows: readonly StoredRow[], now: number): CqlValue[] {
  const inputs = rows.map(row => row.values)
  const [first] = rows
  return columns.map(output => {
    if (output.kind === 'aggregate') return cloneValue(computeAggregate(output.spec, inputs))
    return first ? (projectRow([output], first, now)[0] ?? null) : null
  })
}

// =============================================================================
// JSON
// =============================================================================

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

function jsonValue(value: CqlValue): JsonValue {
  // JSON numbers cannot carry more than a double's precision
  if (typeof value === 'bigint') return value.toString()
  if (value instanceof Date) return value.toISOString()
  if (value instanceof Uint8Array) return `0x${toHex(value)}`
  if (Array.isArray(value)) return value.map(jsonValue)
  if (value !== null && typeof value === 'object') {
    const result: { [key: string]: JsonValue } = {}
    for (const [key, entry] of Object.entries(value)) result[key] = jsonValue(entry)
    return result
  }
  return value
}

/**
 * One output row as the JSON text of `SELECT JSON`
 */
export function rowToJson(names: readonly string[], values: readonly CqlValue[]): string {
  const object: { [key: string]: JsonValue } = {}
  names.forEach((name, i) => {
    object[name] = jsonValue(values[i] ?? null)
  })
  return JSON.stringify(object)
}
