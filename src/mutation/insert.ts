/**
 * INSERT
 *
 * @module mutation/insert
 */

import { ColumnNotFoundError, ErrorCode, InvalidRequestError } from '../errors'
import type { InsertStatement } from '../parser/ast'
import { evaluateTerm } from '../parser/bindings'
import { writeContext, type ExecutionContext } from '../engine/context'
import { ResultSet } from '../result'
import { looseColumn, type ColumnDefinition, type Table } from '../schema/table'
import { castValue } from '../values/cast'
import type { CqlValue } from '../values/types'
import { logger } from '../utils/logger'
import { checkLwt, lwtResult } from './lwt'
import { createRow, isNewerWrite, resolveWriteOptions, stampRow } from './write-metadata'

/**
 * Column/value pairs written by an INSERT, before casting
 */
function insertEntries(statement: InsertStatement, context: ReturnType<typeof writeContext>): Array<[string, unknown]> {
  if (statement.json === undefined) {
    return statement.columns.map((column, i) => {
      const term = statement.values[i]
      return [column, term === undefined ? null : evaluateTerm(term, context)]
    })
  }

  const raw = evaluateTerm(statement.json, context)
  if (typeof raw !== 'string') {
    throw new InvalidRequestError('INSERT JSON requires a string value', ErrorCode.INVALID_VALUE)
  }
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new InvalidRequestError(
      `Could not decode JSON string: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.INVALID_VALUE,
      { json: raw },
      error instanceof Error ? error : undefined
    )
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new InvalidRequestError('INSERT JSON requires a JSON object', ErrorCode.INVALID_VALUE, { json: raw })
  }
  return Object.entries(parsed)
}

/**
 * Cast the written values and check the primary key is complete
 */
export function buildRowValues(
  table: Table,
  entries: Array<[string, unknown]>,
  context: ExecutionContext,
  cast: ReturnType<typeof writeContext>
): Map<string, CqlValue> {
  const values = new Map<string, CqlValue>()
  // Undeclared columns join the table only once the whole write is valid
  const loose = new Map<string, ColumnDefinition>()
  for (const [name, raw] of entries) {
    let column = table.resolveColumn(name) ?? loose.get(name.toLowerCase())
    if (!column) {
      if (context.config.strictSchema) throw new ColumnNotFoundError(name, table.name)
      column = looseColumn(name)
      loose.set(name.toLowerCase(), column)
    }
    if (values.has(column.name)) {
      throw new InvalidRequestError(`Multiple definitions found for column ${column.name}`, ErrorCode.INVALID_REQUEST, { column: column.name })
    }
    values.set(column.name, castValue(raw, column.type, { column: column.name, resolveType: cast.resolveType }))
  }

  const missingPartition = table.partitionKey.filter(name => !values.has(name))
  if (missingPartition.length > 0) {
    throw new InvalidRequestError(
      `Some partition key parts are missing: ${missingPartition.join(', ')}`,
      ErrorCode.INVALID_REQUEST,
      { missing: missingPartition }
    )
  }
  const missingClustering = table.clusteringKey.filter(name => !values.has(name))
  if (missingClustering.length > 0) {
    throw new InvalidRequestError(
      `Some clustering keys are missing: ${missingClustering.join(', ')}`,
      ErrorCode.INVALID_REQUEST,
      { missing: missingClustering }
    )
  }
  for (const name of table.primaryKey) {
    if (values.get(name) === null) {
      throw new InvalidRequestError(`Invalid null value for primary key column ${name}`, ErrorCode.INVALID_VALUE, { column: name })
    }
  }
  return values
}

/**
 * Execute an INSERT
 *
 * Unconditional inserts follow last-write-wins: an existing row with an
 * equal or newer write timestamp is left unchanged.
 */
export function executeInsert(statement: InsertStatement, context: ExecutionContext): ResultSet {
  const table = context.catalog.requireWritableTable(statement.table, context.keyspace)
  if (table.hasCounterColumns()) {
    throw new InvalidRequestError(
      'INSERT statements are not allowed on counter tables, use UPDATE instead',
      ErrorCode.INVALID_REQUEST,
      { table: table.name }
    )
  }

  const termContext = writeContext(context, table)
  const values = buildRowValues(table, insertEntries(statement, termContext), context, termContext)
  const write = resolveWriteOptions(statement.using, table, termContext)
  table.addLooseColumns(values.keys())

  table.purgeExpired(termContext.now())
  const existing = table.get(table.keyOf(values))

  if (statement.lwt) {
    const outcome = checkLwt(statement.lwt, existing ? [existing] : [], table, termContext)
    if (outcome.applied) {
      if (existing) {
        for (const [name, value] of values) existing.values.set(name, value)
        stampRow(existing, write)
      } else {
        table.put(createRow(values, write))
      }
    }
    logger.debug(`INSERT INTO ${table.keyspace}.${table.name}: applied=${outcome.applied}`)
    return lwtResult(table, outcome)
  }

  if (!existing) {
    table.put(createRow(values, write))
  } else if (isNewerWrite(existing, write)) {
    for (const [name, value] of values) existing.values.set(name, value)
    stampRow(existing, write)
  } else {
    logger.debug(`INSERT INTO ${table.keyspace}.${table.name} ignored: write timestamp ${write.timestamp} is not newer than ${existing.writeTime}`)
  }
  return ResultSet.empty()
}
