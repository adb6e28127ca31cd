/**
 * Lightweight Transactions
 *
 * Evaluates `IF EXISTS`, `IF NOT EXISTS` and `IF <conditions>` against the
 * rows a mutation targets, and builds the `[applied]` result.
 *
 * @module mutation/lwt
 */

import type { LwtClause } from '../parser/ast'
import { matchesAll, resolveConditions, type ResolveContext } from '../query/condition'
import { ResultSet } from '../result'
import type { StoredRow, Table } from '../schema/table'
import { cloneValue } from '../values/compare'

export interface LwtOutcome {
  applied: boolean
  /** Row reported back when the write is not applied */
  row?: StoredRow | undefined
}

/**
 * Decide whether a conditional mutation applies to `rows`
 */
export function checkLwt(clause: LwtClause, rows: readonly StoredRow[], table: Table, context: ResolveContext): LwtOutcome {
  const [first] = rows
  switch (clause.kind) {
    case 'if_not_exists':
      return first ? { applied: false, row: first } : { applied: true }
    case 'if_exists':
      return { applied: first !== undefined }
    case 'if': {
      if (!first) return { applied: false }
      const conditions = resolveConditions(clause.conditions, table, context)
      const failed = rows.find(row => !matchesAll(row, conditions))
      return failed ? { applied: false, row: failed } : { applied: true }
    }
  }
}

/**
 * `[applied]` result, followed by the existing row's columns in schema
 * order when the write was not applied
 */
export function lwtResult(table: Table, outcome: LwtOutcome): ResultSet {
  if (outcome.applied || !outcome.row) return ResultSet.applied(outcome.applied)
  const { row } = outcome
  const columns = table.columnNames()
  return ResultSet.applied(false, columns, columns.map(name => cloneValue(row.values.get(name) ?? null)))
}
