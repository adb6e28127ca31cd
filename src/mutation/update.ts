/**
 * UPDATE
 *
 * @module mutation/update
 */

import { ColumnNotFoundError, ErrorCode, InvalidRequestError } from '../errors'
import type { Assignment, UpdateStatement } from '../parser/ast'
import { evaluateTerm } from '../parser/bindings'
import { writeContext, type ExecutionContext } from '../engine/context'
import { isEqualityOnly, matchesAll, resolveConditions, type ResolvedCondition } from '../query/condition'
import { ResultSet } from '../result'
import { looseColumn, type ColumnDefinition, type StoredRow, type Table } from '../schema/table'
import { castValue, keyString, normalizeInteger, normalizeSet, type CastContext } from '../values/cast'
import { deepEqual } from '../values/compare'
import { isCounterType, isCqlObject, unfreeze, type CqlObject, type CqlType, type CqlValue } from '../values/types'
import { logger } from '../utils/logger'
import { checkLwt, lwtResult } from './lwt'
import { createRow, isNewerWrite, resolveWriteOptions, stampRow, type WriteOptions } from './write-metadata'

type TermScope = ReturnType<typeof writeContext>

interface ResolvedAssignment {
  assignment: Assignment
  column: ColumnDefinition
}

// =============================================================================
// Assignment evaluation
// =============================================================================

function invalidOperation(column: ColumnDefinition, detail: string): InvalidRequestError {
  return new InvalidRequestError(
    `Invalid operation for column ${column.name}: ${detail}`,
    ErrorCode.INVALID_REQUEST,
    { column: column.name }
  )
}

function collectionType(column: ColumnDefinition): CqlType | undefined {
  return column.type ? unfreeze(column.type) : undefined
}

function isNumeric(value: CqlValue): value is number | bigint {
  return typeof value === 'number' || typeof value === 'bigint'
}

function isExactInteger(value: number | bigint): boolean {
  return typeof value === 'bigint' || Number.isSafeInteger(value)
}

function addValues(column: ColumnDefinition, current: CqlValue, delta: CqlValue, op: '+' | '-'): CqlValue {
  const type = collectionType(column)

  if (type?.kind === 'list' || (type === undefined && Array.isArray(delta))) {
    const base = Array.isArray(current) ? current : []
    const items = Array.isArray(delta) ? delta : []
    return op === '+' ? [...base, ...items] : base.filter(item => !items.some(removed => deepEqual(item, removed)))
  }

  if (type?.kind === 'set') {
    const base = Array.isArray(current) ? current : []
    const items = Array.isArray(delta) ? delta : []
    return op === '+'
      ? normalizeSet([...base, ...items])
      : base.filter(item => !items.some(removed => deepEqual(item, removed)))
  }

  if (type?.kind === 'map' || (type === undefined && isCqlObject(delta))) {
    const base: CqlObject = isCqlObject(current) ? { ...current } : {}
    if (op === '+') {
      if (!isCqlObject(delta)) throw invalidOperation(column, 'expected a map')
      return { ...base, ...delta }
    }
    // `m = m - {k1, k2}` removes keys
    const keys = Array.isArray(delta) ? delta : []
    for (const key of keys) delete base[keyString(key)]
    return base
  }

  if (isNumeric(delta) && (current === null || isNumeric(current))) {
    const base = current ?? 0
    if (isExactInteger(base) && isExactInteger(delta)) {
      const result = op === '+' ? BigInt(base) + BigInt(delta) : BigInt(base) - BigInt(delta)
      return normalizeInteger(result)
    }
    return op === '+' ? Number(base) + Number(delta) : Number(base) - Number(delta)
  }

  throw invalidOperation(column, `cannot apply '${op}'`)
}

function deltaType(column: ColumnDefinition, op: '+' | '-'): CqlType | undefined {
  const type = collectionType(column)
  // Map removal takes a set of keys
  if (type?.kind === 'map' && op === '-') return { kind: 'set', element: type.key }
  return column.type
}

function applyAssignment(
  target: Map<string, CqlValue>,
  { assignment, column }: ResolvedAssignment,
  scope: TermScope
): void {
  const cast: CastContext = { column: column.name, resolveType: scope.resolveType }
  const current = target.get(column.name) ?? null

  switch (assignment.kind) {
    case 'set':
      target.set(column.name, castValue(evaluateTerm(assignment.value, scope), column.type, cast))
      return
    case 'add': {
      const delta = castValue(evaluateTerm(assignment.value, scope), deltaType(column, assignment.op), cast)
      target.set(column.name, addValues(column, current, delta, assignment.op))
      return
    }
    case 'prepend': {
      const type = collectionType(column)
      if (type !== undefined && type.kind !== 'list') throw invalidOperation(column, 'prepend requires a list')
      const items = castValue(evaluateTerm(assignment.value, scope), column.type, cast)
      target.set(column.name, [...(Array.isArray(items) ? items : []), ...(Array.isArray(current) ? current : [])])
      return
    }
    case 'element': {
      const type = collectionType(column)
      if (type?.kind === 'list') {
        const index = castValue(evaluateTerm(assignment.key, scope), { kind: 'native', name: 'int' }, cast)
        const list = Array.isArray(current) ? [...current] : []
        if (typeof index !== 'number' || index < 0 || index >= list.length) {
          throw invalidOperation(column, `list index ${String(index)} out of bound, list has size ${list.length}`)
        }
        const value = castValue(evaluateTerm(assignment.value, scope), type.element, cast)
        if (value === null) list.splice(index, 1)
        else list[index] = value
        target.set(column.name, list)
        return
      }
      if (type === undefined || type.kind === 'map') {
        const key = castValue(evaluateTerm(assignment.key, scope), type?.key, cast)
        const value = castValue(evaluateTerm(assignment.value, scope), type?.value, cast)
        const map: CqlObject = isCqlObject(current) ? { ...current } : {}
        if (value === null) delete map[keyString(key)]
        else map[keyString(key)] = value
        target.set(column.name, map)
        return
      }
      throw invalidOperation(column, 'element assignment requires a list or map')
    }
  }
}

// =============================================================================
// Statement
// =============================================================================

function resolveAssignments(statement: UpdateStatement, table: Table, strictSchema: boolean): ResolvedAssignment[] {
  const counterTable = table.hasCounterColumns()
  const loose = new Map<string, ColumnDefinition>()
  return statement.assignments.map(assignment => {
    let column = table.resolveColumn(assignment.column) ?? loose.get(assignment.column.toLowerCase())
    if (!column) {
      if (strictSchema) throw new ColumnNotFoundError(assignment.column, table.name)
      column = looseColumn(assignment.column)
      loose.set(assignment.column.toLowerCase(), column)
    }
    if (column.kind === 'partition_key' || column.kind === 'clustering') {
      throw new InvalidRequestError(
        `PRIMARY KEY part ${column.name} found in SET part`,
        ErrorCode.INVALID_REQUEST,
        { column: column.name }
      )
    }
    const isCounter = column.type !== undefined && isCounterType(column.type)
    if (isCounter && assignment.kind !== 'add') {
      throw new InvalidRequestError(
        `Cannot set the value of counter column ${column.name} (counters can only be incremented/decremented, not set)`,
        ErrorCode.INVALID_REQUEST,
        { column: column.name }
      )
    }
    if (counterTable && !isCounter) {
      throw new InvalidRequestError(
        `Cannot mix counter and non counter columns in the same table (${column.name})`,
        ErrorCode.INVALID_REQUEST,
        { column: column.name }
      )
    }
    return { assignment, column }
  })
}

function applyToRow(
  row: StoredRow,
  assignments: ResolvedAssignment[],
  write: WriteOptions,
  scope: TermScope,
  overrideTimestamps: boolean
): boolean {
  // Counter increments and applied conditional updates bypass last-write-wins
  if (!overrideTimestamps && !isNewerWrite(row, write)) return false
  for (const assignment of assignments) applyAssignment(row.values, assignment, scope)
  stampRow(row, write)
  return true
}

/**
 * New row for an UPDATE that matched nothing, built from the WHERE
 * equalities and the SET assignments
 */
function upsertRow(
  table: Table,
  conditions: ResolvedCondition[],
  assignments: ResolvedAssignment[],
  write: WriteOptions,
  scope: TermScope
): StoredRow | undefined {
  const values = new Map<string, CqlValue>()
  for (const condition of conditions) {
    if (condition.kind === 'compare') values.set(condition.column, condition.value)
  }
  if (table.get(table.keyOf(values))) return undefined
  for (const assignment of assignments) applyAssignment(values, assignment, scope)
  return createRow(values, write)
}

/**
 * Execute an UPDATE
 *
 * When nothing matches an equality-only WHERE clause, the row is created
 * (upsert). Range and membership predicates never create rows.
 */
export function executeUpdate(statement: UpdateStatement, context: ExecutionContext): ResultSet {
  const table = context.catalog.requireWritableTable(statement.table, context.keyspace)
  const scope = writeContext(context, table)
  const assignments = resolveAssignments(statement, table, context.config.strictSchema)
  const write = resolveWriteOptions(statement.using, table, scope)
  const counterTable = table.hasCounterColumns()

  table.purgeExpired(scope.now())
  const conditions = resolveConditions(statement.where, table, scope)
  // Undeclared SET columns join the table only once the statement resolves
  table.addLooseColumns(assignments.map(({ column }) => column.name))
  const matched = table.rows.filter(row => matchesAll(row, conditions))
  const label = `UPDATE ${table.keyspace}.${table.name}`

  if (statement.lwt) {
    const outcome = checkLwt(statement.lwt, matched, table, scope)
    if (outcome.applied) {
      if (matched.length > 0) {
        for (const row of matched) applyToRow(row, assignments, write, scope, true)
      } else if (isEqualityOnly(conditions)) {
        const created = upsertRow(table, conditions, assignments, write, scope)
        if (created) table.put(created)
      }
    }
    logger.debug(`${label}: applied=${outcome.applied}`)
    return lwtResult(table, outcome)
  }

  if (matched.length > 0) {
    const changed = matched.filter(row => applyToRow(row, assignments, write, scope, counterTable)).length
    logger.debug(`${label}: ${changed} row(s) updated`)
  } else if (isEqualityOnly(conditions)) {
    const created = upsertRow(table, conditions, assignments, write, scope)
    if (created) {
      table.put(created)
      logger.debug(`${label}: row created`)
    }
  }
  return ResultSet.empty()
}
