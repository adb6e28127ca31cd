/**
 * BATCH
 *
 * Replays the INSERT, UPDATE and DELETE statements of a batch with one
 * shared write timestamp. The batch is all-or-nothing: tables it touches
 * are restored when a statement fails or a condition is not met.
 *
 * @module engine/batch
 */

import { ErrorCode, InvalidRequestError } from '../errors'
import type { BatchStatement, MutationStatement } from '../parser/ast'
import type { Bindings } from '../parser/bindings'
import { executeDelete } from '../mutation/delete'
import { executeInsert } from '../mutation/insert'
import { executeUpdate } from '../mutation/update'
import { resolveTimestamp } from '../mutation/write-metadata'
import { ResultSet } from '../result'
import type { Table, TableSnapshot } from '../schema/table'
import { logger } from '../utils/logger'
import type { ExecutionContext } from './context'

/**
 * Run one data statement
 */
export function executeMutation(statement: MutationStatement, context: ExecutionContext): ResultSet {
  switch (statement.kind) {
    case 'insert':
      return executeInsert(statement, context)
    case 'update':
      return executeUpdate(statement, context)
    case 'delete':
      return executeDelete(statement, context)
  }
}

function batchTimestamp(statement: BatchStatement, context: ExecutionContext): number {
  if (statement.using.ttl !== undefined) {
    throw new InvalidRequestError('Global TTL on the BATCH statement is not supported', ErrorCode.INVALID_REQUEST)
  }
  if (statement.using.timestamp === undefined) return context.clock.nextTimestamp()
  return resolveTimestamp(statement.using.timestamp, { bindings: context.bindings, now: context.clock.now })
}

/**
 * A data statement of a batch with its own bound parameters
 */
export interface BatchEntry {
  statement: MutationStatement
  bindings: Bindings
}

/**
 * Apply batch entries in order with a shared timestamp
 *
 * @returns an empty result, or for a batch with conditions one `[applied]`
 * row (the first failed condition's result when not applied)
 */
export function runBatch(entries: readonly BatchEntry[], defaultTimestamp: number, context: ExecutionContext): ResultSet {
  const snapshots = new Map<Table, TableSnapshot>()
  for (const { statement } of entries) {
    const table = context.catalog.requireWritableTable(statement.table, context.keyspace)
    if (!snapshots.has(table)) snapshots.set(table, table.snapshot())
  }
  const rollback = (): void => {
    for (const [table, snapshot] of snapshots) table.restore(snapshot)
  }

  const conditional = entries.some(({ statement }) => statement.lwt !== undefined)
  for (const { statement, bindings } of entries) {
    let result: ResultSet
    try {
      result = executeMutation(statement, { ...context, bindings, defaultTimestamp })
    } catch (error) {
      rollback()
      throw error
    }
    if (statement.lwt !== undefined && !result.wasApplied()) {
      rollback()
      logger.debug(`BATCH not applied: ${entries.length} statement(s) rolled back`)
      return result
    }
  }

  logger.debug(`BATCH applied: ${entries.length} statement(s)`)
  return conditional ? ResultSet.applied(true) : ResultSet.empty()
}

/**
 * Execute a `BEGIN BATCH ... APPLY BATCH` statement
 */
export function executeBatch(statement: BatchStatement, context: ExecutionContext): ResultSet {
  for (const skipped of statement.skipped) {
    logger.warn(`Skipping batch statement (${skipped.reason}): ${skipped.text}`)
  }
  const entries = statement.statements.map(mutation => ({ statement: mutation, bindings: context.bindings }))
  return runBatch(entries, batchTimestamp(statement, context), context)
}
