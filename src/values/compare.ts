/**
 * Comparison Utilities for CQL Values
 *
 * Canonical equality, ordering and key functions used by the condition
 * evaluator, grouping, DISTINCT and primary-key lookups.
 *
 * @module values/compare
 */

import { isCqlObject, type CqlValue } from './types'

// =============================================================================
// Deep Equality
// =============================================================================

/**
 * Deep equality check for two values
 *
 * Handles:
 * - Primitives (strict equality)
 * - Dates (compared by timestamp)
 * - Blobs (byte-wise comparison)
 * - Arrays (element-wise comparison)
 * - Maps and user types (key-value comparison)
 *
 * @example
 * deepEqual({ a: 1 }, { a: 1 }) // true
 * deepEqual([1, 2], [1, 2]) // true
 * deepEqual(new Date(0), new Date(0)) // true
 */
export function deepEqual(a: CqlValue | undefined, b: CqlValue | undefined): boolean {
  if (a === b) return true
  if (a === null || a === undefined) return b === null || b === undefined
  if (b === null || b === undefined) return false

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime()
  }

  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    if (a.length !== b.length) return false
    return a.every((byte, i) => byte === b[i])
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false
    return a.every((v, i) => deepEqual(v, b[i]))
  }

  if (isCqlObject(a) && isCqlObject(b)) {
    const aKeys = Object.keys(a)
    const bKeys = Object.keys(b)
    if (aKeys.length !== bKeys.length) return false
    return aKeys.every(k => k in b && deepEqual(a[k], b[k]))
  }

  return false
}

// =============================================================================
// Value Comparison for Ordering
// =============================================================================

/**
 * Compare two values for ordering
 *
 * Nulls sort first. Values of the same kind compare naturally: numbers
 * and bigints numerically, strings by code unit, dates by instant, false
 * before true, collections element-wise. Mixed kinds fall back to string
 * comparison.
 *
 * @returns negative if a < b, 0 if equal, positive if a > b
 *
 * @example
 * compareValues(1, 2) // -1
 * compareValues('b', 'a') // 1
 * compareValues(null, 1) // -1
 */
export function compareValues(a: CqlValue | undefined, b: CqlValue | undefined): number {
  if (a === null || a === undefined) {
    return b === null || b === undefined ? 0 : -1
  }
  if (b === null || b === undefined) return 1

  if ((typeof a === 'number' || typeof a === 'bigint') && (typeof b === 'number' || typeof b === 'bigint')) {
    return compareNumeric(a, b)
  }
  if (typeof a === 'string' && typeof b === 'string') {
    if (a < b) return -1
    if (a > b) return 1
    return 0
  }
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime()
  if (typeof a === 'boolean' && typeof b === 'boolean') return (a ? 1 : 0) - (b ? 1 : 0)

  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    const length = Math.min(a.length, b.length)
    for (let i = 0; i < length; i++) {
      const diff = (a[i] ?? 0) - (b[i] ?? 0)
      if (diff !== 0) return diff
    }
    return a.length - b.length
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    const length = Math.min(a.length, b.length)
    for (let i = 0; i < length; i++) {
      const diff = compareValues(a[i], b[i])
      if (diff !== 0) return diff
    }
    return a.length - b.length
  }

  return valueKey(a).localeCompare(valueKey(b))
}

function compareNumeric(a: number | bigint, b: number | bigint): number {
  if (typeof a === 'bigint' && typeof b === 'bigint') {
    if (a < b) return -1
    if (a > b) return 1
    return 0
  }
  const x = Number(a)
  const y = Number(b)
  if (x < y) return -1
  if (x > y) return 1
  return 0
}

// =============================================================================
// Keys
// =============================================================================

/**
 * Canonical string form of a value, usable as a Map key.
 * Equal values (per `deepEqual`) always produce the same key.
 */
export function valueKey(value: CqlValue | undefined): string {
  if (value === null || value === undefined) return 'null'
  if (typeof value === 'string') return JSON.stringify(value)
  if (typeof value === 'number' || typeof value === 'bigint') return `n:${value}`
  if (typeof value === 'boolean') return value ? 'true' : 'false'
  if (value instanceof Date) return `d:${value.getTime()}`
  if (value instanceof Uint8Array) return `b:${toHex(value)}`
  if (Array.isArray(value)) return `[${value.map(valueKey).join(',')}]`
  const keys = Object.keys(value).sort()
  return `{${keys.map(k => `${JSON.stringify(k)}:${valueKey(value[k])}`).join(',')}}`
}

/**
 * Key for a tuple of values, such as a primary key or a GROUP BY group
 */
export function tupleKey(values: ReadonlyArray<CqlValue | undefined>): string {
  return values.map(valueKey).join('|')
}

/**
 * Lower-case hex form of a blob, without prefix
 */
export function toHex(bytes: Uint8Array): string {
  let hex = ''
  for (const byte of bytes) {
    hex += byte.toString(16).padStart(2, '0')
  }
  return hex
}

// =============================================================================
// Deep Clone
// =============================================================================

/**
 * Deep clone a value, preserving Date and Uint8Array instances
 */
export function cloneValue<T extends CqlValue>(value: T): T {
  if (value === null || typeof value !== 'object') return value
  return structuredClone(value)
}
