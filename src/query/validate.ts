/**
 * SELECT Validation
 *
 * Structural rules on the combination of select items and clauses,
 * checked before any column is resolved.
 *
 * @module query/validate
 */

import { ErrorCode, InvalidRequestError } from '../errors'
import type { SelectStatement } from '../parser/ast'

function reject(message: string): never {
  throw new InvalidRequestError(message, ErrorCode.INVALID_REQUEST)
}

/**
 * Reject unsupported combinations of select items, DISTINCT, GROUP BY,
 * HAVING, ORDER BY and LIMIT
 *
 * @throws InvalidRequestError describing the first violated rule
 */
export function validateSelect(statement: SelectStatement): void {
  const { items, distinct } = statement
  const hasWildcard = items.some(item => item.kind === 'wildcard')
  const hasAggregates = items.some(item => item.kind === 'aggregate')
  const hasFunctions = items.some(item => item.kind === 'function')
  const hasGroupBy = statement.groupBy.length > 0

  if (hasWildcard) {
    if (hasAggregates) reject('Cannot combine * with aggregate functions')
    if (hasGroupBy) reject('Cannot use GROUP BY with SELECT *')
    if (distinct) reject('SELECT DISTINCT requires a list of columns')
  }

  if (distinct) {
    if (hasAggregates) reject('Cannot combine DISTINCT with aggregate functions')
    if (hasGroupBy) reject('Cannot combine DISTINCT with GROUP BY')
  }

  if (hasFunctions && (hasAggregates || hasGroupBy || distinct)) {
    reject('WRITETIME and TTL cannot be combined with aggregates, GROUP BY or DISTINCT')
  }

  if (hasAggregates || hasGroupBy) {
    const grouped = new Set(statement.groupBy.map(column => column.toLowerCase()))
    for (const item of items) {
      if (item.kind !== 'column') continue
      if (!hasGroupBy) reject(`Column ${item.name} must appear in GROUP BY when selected with aggregate functions`)
      if (!grouped.has(item.name.toLowerCase())) {
        reject(`Column ${item.name} is selected but does not appear in GROUP BY`)
      }
    }
  }

  if (statement.having.length > 0 && !hasGroupBy) reject('HAVING requires GROUP BY')

  if (statement.orderBy.length > 0) {
    if (hasAggregates) reject('ORDER BY is not supported with aggregate functions')
    if (hasGroupBy) reject('ORDER BY is not supported with GROUP BY')
    if (distinct) reject('ORDER BY is not supported with SELECT DISTINCT')
  }

  if (statement.limit !== undefined && hasAggregates) {
    reject('LIMIT is not supported with aggregate functions')
  }
}
