/**
 * Aggregate Types
 *
 * @module aggregation/types
 */

import type { AggregateFunction } from '../parser/ast'
import type { CqlValue } from '../values/types'

export type { AggregateFunction }

/**
 * An aggregate with its argument resolved against the table schema
 */
export interface AggregateSpec {
  fn: AggregateFunction
  /** Resolved column name; undefined for `COUNT(*)` */
  column?: string | undefined
  /** Aggregate over distinct values only */
  distinct: boolean
}

/**
 * Column values of one row, as seen by an aggregate
 */
export type AggregateInput = ReadonlyMap<string, CqlValue>

/**
 * Rows sharing the same GROUP BY values, in first-seen order
 */
export interface RowGroup<T> {
  key: string
  rows: T[]
}

export function isCountAll(spec: AggregateSpec): boolean {
  return spec.fn === 'count' && spec.column === undefined
}
