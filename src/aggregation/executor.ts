/**
 * Aggregate Executor
 *
 * Computes COUNT, SUM, MIN, MAX and AVG over a set of rows and partitions
 * rows into GROUP BY groups. Null values are skipped by every aggregate
 * except `COUNT(*)`.
 *
 * @module aggregation/executor
 */

import { ErrorCode, InvalidRequestError } from '../errors'
import { normalizeInteger } from '../values/cast'
import { compareValues, valueKey } from '../values/compare'
import type { CqlValue } from '../values/types'
import { isCountAll, type AggregateInput, type AggregateSpec, type RowGroup } from './types'

/**
 * Non-null values of the aggregated column, de-duplicated for DISTINCT
 */
function collectValues(rows: readonly AggregateInput[], spec: AggregateSpec): CqlValue[] {
  const column = spec.column
  if (column === undefined) return []
  const values: CqlValue[] = []
  const seen = new Set<string>()
  for (const row of rows) {
    const value = row.get(column) ?? null
    if (value === null) continue
    if (spec.distinct) {
      const key = valueKey(value)
      if (seen.has(key)) continue
      seen.add(key)
    }
    values.push(value)
  }
  return values
}

function numbers(values: readonly CqlValue[], spec: AggregateSpec): Array<number | bigint> {
  return values.map(value => {
    if (typeof value !== 'number' && typeof value !== 'bigint') {
      throw new InvalidRequestError(
        `Invalid call to ${spec.fn}(): column ${spec.column ?? '*'} is not numeric`,
        ErrorCode.INVALID_REQUEST,
        { function: spec.fn, column: spec.column }
      )
    }
    return value
  })
}

/**
 * Sum of integers is exact and may grow past the safe range; any other
 * value makes it a floating-point sum
 */
function sum(values: ReadonlyArray<number | bigint>): number | bigint {
  if (values.every(value => typeof value === 'bigint' || Number.isSafeInteger(value))) {
    return normalizeInteger(values.reduce<bigint>((total, value) => total + BigInt(value), 0n))
  }
  return values.reduce<number>((total, value) => total + Number(value), 0)
}

/**
 * Evaluate one aggregate over `rows`
 *
 * `SUM` of nothing is 0; `MIN`, `MAX` and `AVG` of nothing are null.
 */
export function computeAggregate(spec: AggregateSpec, rows: readonly AggregateInput[]): CqlValue {
  if (isCountAll(spec)) return rows.length

  const values = collectValues(rows, spec)
  switch (spec.fn) {
    case 'count':
      return values.length
    case 'sum':
      return sum(numbers(values, spec))
    case 'avg': {
      const items = numbers(values, spec)
      return items.length === 0 ? null : Number(sum(items)) / items.length
    }
    case 'min':
      return values.reduce<CqlValue>((min, value) => (min === null || compareValues(value, min) < 0 ? value : min), null)
    case 'max':
      return values.reduce<CqlValue>((max, value) => (max === null || compareValues(value, max) > 0 ? value : max), null)
  }
}

/**
 * Partition rows by key, keeping groups and their rows in first-seen order
 */
export function groupRows<T>(rows: readonly T[], keyOf: (row: T) => string): RowGroup<T>[] {
  const groups = new Map<string, RowGroup<T>>()
  for (const row of rows) {
    const key = keyOf(row)
    let group = groups.get(key)
    if (!group) {
      group = { key, rows: [] }
      groups.set(key, group)
    }
    group.rows.push(row)
  }
  return [...groups.values()]
}
