/**
 * DELETE
 *
 * @module mutation/delete
 */

import { ErrorCode, InvalidRequestError } from '../errors'
import type { DeleteSelector, DeleteStatement } from '../parser/ast'
import { evaluateTerm } from '../parser/bindings'
import { writeContext, type ExecutionContext } from '../engine/context'
import { matchesAll, resolveConditions } from '../query/condition'
import { ResultSet } from '../result'
import type { ColumnDefinition, StoredRow, Table } from '../schema/table'
import { castValue, keyString } from '../values/cast'
import { isCqlObject, nativeType, unfreeze, type CqlValue } from '../values/types'
import { logger } from '../utils/logger'
import { checkLwt, lwtResult } from './lwt'
import { resolveWriteOptions, stampRow, type WriteOptions } from './write-metadata'

interface ResolvedSelector {
  column: ColumnDefinition
  key?: CqlValue | undefined
}

function resolveSelectors(
  selectors: readonly DeleteSelector[],
  table: Table,
  scope: ReturnType<typeof writeContext>
): ResolvedSelector[] {
  return selectors.map(selector => {
    const column = table.requireColumn(selector.column)
    if (column.kind === 'partition_key' || column.kind === 'clustering') {
      throw new InvalidRequestError(
        `Invalid identifier ${column.name} for deletion (should not be a PRIMARY KEY part)`,
        ErrorCode.INVALID_REQUEST,
        { column: column.name }
      )
    }
    if (selector.key === undefined) return { column }

    const type = column.type ? unfreeze(column.type) : undefined
    const keyType = type?.kind === 'map' ? type.key : type?.kind === 'list' ? nativeType('int') : undefined
    if (type !== undefined && keyType === undefined) {
      throw new InvalidRequestError(
        `Invalid element deletion on non-collection column ${column.name}`,
        ErrorCode.INVALID_REQUEST,
        { column: column.name }
      )
    }
    const key = castValue(evaluateTerm(selector.key, scope), keyType, { column: column.name, resolveType: scope.resolveType })
    return { column, key }
  })
}

function clearSelector(row: StoredRow, { column, key }: ResolvedSelector): void {
  if (key === undefined) {
    row.values.set(column.name, null)
    return
  }
  const current = row.values.get(column.name) ?? null
  if (Array.isArray(current) && typeof key === 'number') {
    row.values.set(column.name, current.filter((_, i) => i !== key))
  } else if (isCqlObject(current)) {
    const next = { ...current }
    delete next[keyString(key)]
    row.values.set(column.name, next)
  }
}

/**
 * Remove a matched row, or clear the selected columns of it
 */
function applyDelete(
  table: Table,
  row: StoredRow,
  selectors: ResolvedSelector[],
  write: WriteOptions,
  explicitTimestamp: boolean
): boolean {
  // Writes newer than an explicit delete timestamp survive it
  if (explicitTimestamp && row.writeTime > write.timestamp) return false
  if (selectors.length === 0) return table.remove(row)
  for (const selector of selectors) clearSelector(row, selector)
  stampRow(row, { timestamp: write.timestamp })
  return true
}

/**
 * Execute a DELETE
 *
 * A DELETE without a WHERE clause is a no-op, never a table-wide delete.
 */
export function executeDelete(statement: DeleteStatement, context: ExecutionContext): ResultSet {
  const table = context.catalog.requireWritableTable(statement.table, context.keyspace)
  const label = `DELETE FROM ${table.keyspace}.${table.name}`
  if (statement.lwt?.kind === 'if_not_exists') {
    throw new InvalidRequestError('IF NOT EXISTS is not supported on DELETE statements', ErrorCode.INVALID_REQUEST)
  }
  if (statement.where === undefined) {
    logger.debug(`${label}: no WHERE clause, nothing deleted`)
    return statement.lwt ? ResultSet.applied(false) : ResultSet.empty()
  }

  const scope = writeContext(context, table)
  const selectors = resolveSelectors(statement.selectors, table, scope)
  const explicitTimestamp = statement.using.timestamp !== undefined
  const write = resolveWriteOptions({ timestamp: statement.using.timestamp }, table, scope)

  table.purgeExpired(scope.now())
  const conditions = resolveConditions(statement.where, table, scope)
  const matched = table.rows.filter(row => matchesAll(row, conditions))

  if (statement.lwt) {
    const outcome = checkLwt(statement.lwt, matched, table, scope)
    // An applied condition wins over newer writes
    if (outcome.applied) {
      for (const row of matched) applyDelete(table, row, selectors, write, false)
    }
    logger.debug(`${label}: applied=${outcome.applied}`)
    return lwtResult(table, outcome)
  }

  const removed = matched.filter(row => applyDelete(table, row, selectors, write, explicitTimestamp)).length
  logger.debug(`${label}: ${removed} row(s) affected`)
  return ResultSet.empty()
}
