/**
 * SELECT
 *
 * Read pipeline: filter live rows, group, apply HAVING, aggregate or
 * project, de-duplicate, order and limit.
 *
 * @module query/select
 */

import { computeAggregate, groupRows, type AggregateSpec } from '../aggregation'
import { ErrorCode, InvalidRequestError } from '../errors'
import type { ComparisonOperator, HavingCondition, Ordering, SelectStatement } from '../parser/ast'
import { evaluateTerm } from '../parser/bindings'
import type { ExecutionContext } from '../engine/context'
import { ResultSet } from '../result'
import type { StoredRow } from '../schema/table'
import { castValue, toCqlValue } from '../values/cast'
import { compareValues, tupleKey } from '../values/compare'
import { nativeType, type CqlValue } from '../values/types'
import { logger } from '../utils/logger'
import { compareOperands, matchesAll, resolveConditions, type ResolveContext } from './condition'
import { projectGroup, projectRow, resolveOutputColumns, resolveReadColumn, rowToJson } from './projection'
import { validateSelect } from './validate'

export const JSON_COLUMN = '[json]'

interface ResolvedHaving {
  spec: AggregateSpec
  op: ComparisonOperator
  value: CqlValue
}

// =============================================================================
// Clauses
// =============================================================================

function resolveLimit(statement: SelectStatement, context: ResolveContext): number | undefined {
  if (statement.limit === undefined) return undefined
  const limit = castValue(evaluateTerm(statement.limit, context), nativeType('int'), { column: 'limit' })
  if (typeof limit !== 'number' || limit <= 0) {
    throw new InvalidRequestError(
      `LIMIT must be strictly positive, got ${String(limit)}`,
      ErrorCode.INVALID_VALUE,
      { limit }
    )
  }
  return limit
}

/**
 * Stable multi-column sort; rows without a value sort first
 */
function sortRows(rows: StoredRow[], orderBy: readonly Ordering[]): StoredRow[] {
  return [...rows].sort((a, b) => {
    for (const { column, order } of orderBy) {
      const diff = compareValues(a.values.get(column) ?? null, b.values.get(column) ?? null)
      if (diff !== 0) return order === 'DESC' ? -diff : diff
    }
    return 0
  })
}

function distinctRows(values: CqlValue[][]): CqlValue[][] {
  const seen = new Set<string>()
  return values.filter(row => {
    const key = tupleKey(row)
    if (seen.has(key)) return false
    seen.add(key)
    return true
  })
}

// =============================================================================
// Execution
// =============================================================================

/**
 * Execute a SELECT against a table or materialized view
 */
export function executeSelect(statement: SelectStatement, context: ExecutionContext): ResultSet {
  validateSelect(statement)

  const { table, view } = context.catalog.requireRelation(statement.table, context.keyspace)
  const scope: ResolveContext = {
    bindings: context.bindings,
    now: context.clock.now,
    resolveType: context.catalog.typeResolver(table.keyspace),
  }
  const now = scope.now()

  const output = resolveOutputColumns(statement.items, table, view)
  const conditions = resolveConditions(statement.where, table, scope)
  for (const condition of conditions) resolveReadColumn(condition.column, table, view)
  const groupBy = statement.groupBy.map(column => resolveReadColumn(column, table, view))
  const having = statement.having.map((clause: HavingCondition): ResolvedHaving => ({
    spec: {
      fn: clause.fn,
      column: clause.argument === '*' ? undefined : resolveReadColumn(clause.argument, table, view),
      distinct: clause.distinct,
    },
    op: clause.op,
    value: toCqlValue(evaluateTerm(clause.value, scope)),
  }))
  const orderBy = statement.orderBy.map(ordering => ({
    column: resolveReadColumn(ordering.column, table, view),
    order: ordering.order,
  }))
  const limit = resolveLimit(statement, scope)

  table.purgeExpired(now)
  const filtered = table.rows.filter(row =>
    matchesAll(row, conditions) && (view === undefined || matchesAll(row, view.where))
  )

  let values: CqlValue[][]
  if (groupBy.length > 0) {
    const groups = groupRows(filtered, row => tupleKey(groupBy.map(column => row.values.get(column) ?? null)))
    values = groups
      .filter(group => having.every(clause =>
        compareOperands(computeAggregate(clause.spec, group.rows.map(row => row.values)), clause.op, clause.value)
      ))
      .map(group => projectGroup(output, group.rows, now))
  } else if (output.some(column => column.kind === 'aggregate')) {
    values = [projectGroup(output, filtered, now)]
  } else {
    const ordered = orderBy.length > 0 ? sortRows(filtered, orderBy) : filtered
    values = ordered.map(row => projectRow(output, row, now))
    if (statement.distinct) values = distinctRows(values)
  }
  if (limit !== undefined) values = values.slice(0, limit)

  logger.debug(`SELECT FROM ${table.keyspace}.${view?.name ?? table.name}: ${values.length} row(s)`)

  const names = output.map(column => column.name)
  if (statement.json) {
    return new ResultSet([JSON_COLUMN], values.map(row => [rowToJson(names, row)]))
  }
  return new ResultSet(names, values)
}
