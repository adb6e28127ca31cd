/**
 * Condition Evaluator
 *
 * Resolves parsed WHERE / IF conditions against a table schema (column
 * names and value types) and evaluates them against stored rows.
 *
 * @module query/condition
 */

import { ErrorCode, InvalidRequestError } from '../errors'
import type { ComparisonOperator, Condition } from '../parser/ast'
import { evaluateTerm, type TermContext } from '../parser/bindings'
import type { ColumnDefinition, StoredRow, Table } from '../schema/table'
import { castValue, keyString, type UserTypeResolver } from '../values/cast'
import { compareValues, deepEqual } from '../values/compare'
import { isCqlObject, unfreeze, type CqlType, type CqlValue } from '../values/types'

// =============================================================================
// Types
// =============================================================================

/**
 * A condition with its column resolved and its operand cast
 */
export type ResolvedCondition =
  | { kind: 'compare'; column: string; op: ComparisonOperator; value: CqlValue }
  | { kind: 'in'; column: string; values: CqlValue[] }
  | { kind: 'contains'; column: string; key: boolean; value: CqlValue }
  | { kind: 'not_null'; column: string }

export interface ResolveContext extends TermContext {
  resolveType?: UserTypeResolver | undefined
}

// =============================================================================
// Resolution
// =============================================================================

function containedType(column: ColumnDefinition, key: boolean): CqlType | undefined {
  if (!column.type) return undefined
  const type = unfreeze(column.type)
  switch (type.kind) {
    case 'list':
    case 'set':
      if (key) break
      return type.element
    case 'map':
      return key ? type.key : type.value
    default:
      break
  }
  throw new InvalidRequestError(
    `Cannot use CONTAINS${key ? ' KEY' : ''} on non-${key ? 'map' : 'collection'} column ${column.name}`,
    ErrorCode.INVALID_REQUEST,
    { column: column.name }
  )
}

/**
 * Resolve one condition against a table
 *
 * @throws ColumnNotFoundError if the column does not exist
 * @throws InvalidRequestError if an operand cannot be cast
 */
export function resolveCondition(condition: Condition, table: Table, context: ResolveContext): ResolvedCondition {
  const column = table.requireColumn(condition.column)
  const cast = { column: column.name, resolveType: context.resolveType }

  switch (condition.kind) {
    case 'compare':
      return {
        kind: 'compare',
        column: column.name,
        op: condition.op,
        value: castValue(evaluateTerm(condition.value, context), column.type, cast),
      }
    case 'in': {
      const raw = evaluateTerm(condition.values, context)
      const items = Array.isArray(raw) ? raw : raw instanceof Set ? [...raw] : undefined
      if (items === undefined) {
        throw new InvalidRequestError(
          `IN on column ${column.name} requires a list of values`,
          ErrorCode.INVALID_VALUE,
          { column: column.name }
        )
      }
      return {
        kind: 'in',
        column: column.name,
        values: items.map(item => castValue(item, column.type, cast)),
      }
    }
    case 'contains':
      return {
        kind: 'contains',
        column: column.name,
        key: condition.key,
        value: castValue(evaluateTerm(condition.value, context), containedType(column, condition.key), cast),
      }
    case 'not_null':
      return { kind: 'not_null', column: column.name }
  }
}

export function resolveConditions(
  conditions: readonly Condition[],
  table: Table,
  context: ResolveContext
): ResolvedCondition[] {
  return conditions.map(condition => resolveCondition(condition, table, context))
}

// =============================================================================
// Evaluation
// =============================================================================

/**
 * Apply a comparison operator; ordering operators are false when either
 * side is null
 */
export function compareOperands(actual: CqlValue, op: ComparisonOperator, expected: CqlValue): boolean {
  if (op === '=') return deepEqual(actual, expected)
  if (op === '!=') return !deepEqual(actual, expected)
  if (actual === null || expected === null) return false
  const order = compareValues(actual, expected)
  switch (op) {
    case '<':
      return order < 0
    case '<=':
      return order <= 0
    case '>':
      return order > 0
    case '>=':
      return order >= 0
  }
}

/**
 * Evaluate a resolved condition against a value map
 */
export function matchesCondition(values: ReadonlyMap<string, CqlValue>, condition: ResolvedCondition): boolean {
  const actual = values.get(condition.column) ?? null
  switch (condition.kind) {
    case 'compare':
      return compareOperands(actual, condition.op, condition.value)
    case 'in':
      return condition.values.some(value => deepEqual(actual, value))
    case 'contains': {
      if (Array.isArray(actual)) {
        return !condition.key && actual.some(item => deepEqual(item, condition.value))
      }
      if (isCqlObject(actual)) {
        return condition.key
          ? Object.prototype.hasOwnProperty.call(actual, keyString(condition.value))
          : Object.values(actual).some(item => deepEqual(item, condition.value))
      }
      return false
    }
    case 'not_null':
      return actual !== null
  }
}

/**
 * Check if a row satisfies every condition
 */
export function matchesAll(row: StoredRow, conditions: readonly ResolvedCondition[]): boolean {
  return conditions.every(condition => matchesCondition(row.values, condition))
}

/**
 * True when every condition is an `=` comparison
 */
export function isEqualityOnly(conditions: readonly ResolvedCondition[]): boolean {
  return conditions.length > 0 && conditions.every(condition => condition.kind === 'compare' && condition.op === '=')
}
