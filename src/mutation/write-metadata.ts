/**
 * Write Metadata
 *
 * Write timestamps, TTL and last-write-wins handling shared by INSERT,
 * UPDATE and DELETE.
 *
 * @module mutation/write-metadata
 */

import { ErrorCode, InvalidRequestError } from '../errors'
import type { Term, UsingClause } from '../parser/ast'
import { evaluateTerm, type TermContext } from '../parser/bindings'
import type { StoredRow, Table } from '../schema/table'
import { castValue } from '../values/cast'
import { nativeType, type CqlValue } from '../values/types'

/** Largest TTL accepted, in seconds (20 years) */
export const MAX_TTL = 630_720_000

/**
 * Monotonic microsecond clock for write timestamps
 */
export class WriteClock {
  private last = 0

  constructor(readonly now: () => number) {}

  /**
   * Next write timestamp in microseconds. Never returns the same value twice.
   */
  nextTimestamp(): number {
    const candidate = Math.floor(this.now() * 1000)
    this.last = Math.max(candidate, this.last + 1)
    return this.last
  }
}

/**
 * Evaluate a `USING TIMESTAMP` term to microseconds
 *
 * @throws InvalidRequestError when the value is not an integer the clock
 * can represent exactly
 */
export function resolveTimestamp(term: Term, context: TermContext): number {
  const value = castValue(evaluateTerm(term, context), nativeType('bigint'), { column: '[timestamp]' })
  if (typeof value !== 'number') {
    throw new InvalidRequestError(
      `Invalid timestamp ${String(value)}: expected an integer between ${Number.MIN_SAFE_INTEGER} and ${Number.MAX_SAFE_INTEGER}`,
      ErrorCode.INVALID_VALUE,
      { timestamp: String(value) }
    )
  }
  return value
}

/**
 * Effective timestamp and expiry of one write
 */
export interface WriteOptions {
  /** Microseconds */
  timestamp: number
  /** Seconds; undefined when the statement sets no TTL */
  ttl?: number | undefined
  /** Milliseconds since epoch; undefined for no expiry */
  expiresAt?: number | undefined
  /** Set when the timestamp is the one shared by the statements of a batch */
  batched?: boolean | undefined
}

export interface WriteContext extends TermContext {
  clock: WriteClock
  /** Timestamp shared by the statements of a batch */
  defaultTimestamp?: number | undefined
}

/**
 * Resolve `USING TTL` / `USING TIMESTAMP` for a write to `table`
 *
 * Without a TTL the table's `default_time_to_live` applies. TTL 0 means
 * no expiry.
 *
 * @throws InvalidRequestError for a negative or oversized TTL
 */
export function resolveWriteOptions(using: UsingClause, table: Table, context: WriteContext): WriteOptions {
  let ttl: number | undefined
  if (using.ttl !== undefined) {
    const value = castValue(evaluateTerm(using.ttl, context), nativeType('int'), { column: '[ttl]' })
    if (typeof value === 'number') {
      if (value < 0) {
        throw new InvalidRequestError(`A TTL must be greater or equal to 0, but was ${value}`, ErrorCode.INVALID_VALUE, { ttl: value })
      }
      if (value > MAX_TTL) {
        throw new InvalidRequestError(`ttl is too large. requested (${value}) maximum (${MAX_TTL})`, ErrorCode.INVALID_VALUE, { ttl: value })
      }
      ttl = value
    }
  } else {
    const fallback = table.options.default_time_to_live
    if (typeof fallback === 'number' && fallback > 0) ttl = fallback
  }

  const timestamp = using.timestamp === undefined ? undefined : resolveTimestamp(using.timestamp, context)
  const batched = timestamp === undefined && context.defaultTimestamp !== undefined

  return {
    timestamp: timestamp ?? context.defaultTimestamp ?? context.clock.nextTimestamp(),
    ttl,
    expiresAt: ttl !== undefined && ttl > 0 ? context.now() + ttl * 1000 : undefined,
    batched,
  }
}

/**
 * Last-write-wins check: a write applies only when its timestamp is newer
 * than the row's. Ties keep the existing write, except between statements
 * of one batch, which apply in order.
 */
export function isNewerWrite(row: StoredRow, write: WriteOptions): boolean {
  if (write.batched === true && write.timestamp === row.writeTime) return true
  return write.timestamp > row.writeTime
}

/**
 * Stamp a row with the metadata of a write. The previous expiry stays
 * unless the write sets a TTL.
 */
export function stampRow(row: StoredRow, write: WriteOptions): void {
  row.writeTime = Math.max(row.writeTime, write.timestamp)
  if (write.ttl !== undefined) {
    row.ttl = write.ttl > 0 ? write.ttl : undefined
    row.expiresAt = write.expiresAt
  }
}

/**
 * Build a new row from values and write metadata
 */
export function createRow(values: Map<string, CqlValue>, write: WriteOptions): StoredRow {
  return {
    values,
    writeTime: write.timestamp,
    expiresAt: write.expiresAt,
    ttl: write.ttl !== undefined && write.ttl > 0 ? write.ttl : undefined,
  }
}

/**
 * Remaining whole seconds before a row expires, or null without expiry
 */
export function remainingTtl(row: StoredRow, now: number): number | null {
  if (row.expiresAt === undefined) return null
  return Math.max(0, Math.ceil((row.expiresAt - now) / 1000))
}
