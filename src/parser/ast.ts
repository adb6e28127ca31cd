/**
 * Statement AST
 *
 * One variant per statement kind, discriminated by `kind`. Values inside
 * statements are `Term`s; placeholders are resolved against bound
 * parameters when the statement executes.
 *
 * @module parser/ast
 */

import type { CqlType } from '../values/types'

// =============================================================================
// Terms
// =============================================================================

export type Term =
  | { kind: 'literal'; value: string | number | bigint | boolean | null | Uint8Array }
  | { kind: 'marker'; slot: number }
  | { kind: 'list'; items: Term[] }
  | { kind: 'set'; items: Term[] }
  | { kind: 'tuple'; items: Term[] }
  | { kind: 'map'; entries: Array<[Term, Term]> }
  | { kind: 'call'; name: string; args: Term[] }

/**
 * A placeholder occurrence. `name` is set for `:name` markers; `receiver`
 * is the column (or `limit`) the value is bound to, when known.
 */
export interface MarkerInfo {
  slot: number
  name?: string | undefined
  receiver?: string | undefined
}

export interface QualifiedName {
  keyspace?: string | undefined
  name: string
}

// =============================================================================
// Conditions
// =============================================================================

export type ComparisonOperator = '=' | '!=' | '<' | '<=' | '>' | '>='

export type Condition =
  | { kind: 'compare'; column: string; op: ComparisonOperator; value: Term }
  | { kind: 'in'; column: string; values: Term }
  | { kind: 'contains'; column: string; key: boolean; value: Term }
  | { kind: 'not_null'; column: string }

/** Lightweight transaction clause of a mutation */
export type LwtClause =
  | { kind: 'if_not_exists' }
  | { kind: 'if_exists' }
  | { kind: 'if'; conditions: Condition[] }

export interface UsingClause {
  ttl?: Term | undefined
  timestamp?: Term | undefined
}

// =============================================================================
// Select items
// =============================================================================

export type AggregateFunction = 'count' | 'sum' | 'min' | 'max' | 'avg'

export type SelectItem =
  | { kind: 'wildcard' }
  | { kind: 'column'; name: string; alias?: string | undefined }
  | {
    kind: 'aggregate'
    fn: AggregateFunction
    /** Column name, or `*` for COUNT(*) and COUNT(1) */
    argument: string
    distinct: boolean
    alias?: string | undefined
  }
  | { kind: 'function'; fn: 'writetime' | 'ttl'; column: string; alias?: string | undefined }

export interface HavingCondition {
  fn: AggregateFunction
  argument: string
  distinct: boolean
  op: ComparisonOperator
  value: Term
}

export interface Ordering {
  column: string
  order: 'ASC' | 'DESC'
}

// =============================================================================
// Definition statements
// =============================================================================

export interface Property {
  name: string
  value: Term
}

export interface ColumnSpec {
  name: string
  type: CqlType
  isStatic: boolean
}

export interface CreateKeyspaceStatement {
  kind: 'create_keyspace'
  name: string
  ifNotExists: boolean
  properties: Property[]
}

export interface AlterKeyspaceStatement {
  kind: 'alter_keyspace'
  name: string
  properties: Property[]
}

export interface DropKeyspaceStatement {
  kind: 'drop_keyspace'
  name: string
  ifExists: boolean
}

export interface UseStatement {
  kind: 'use'
  keyspace: string
}

export interface CreateTableStatement {
  kind: 'create_table'
  table: QualifiedName
  ifNotExists: boolean
  columns: ColumnSpec[]
  partitionKey: string[]
  clusteringKey: string[]
  clusteringOrder: Ordering[]
  properties: Property[]
  compactStorage: boolean
}

export type AlterTableAction =
  | { kind: 'add'; columns: ColumnSpec[] }
  | { kind: 'drop'; columns: string[] }
  | { kind: 'with'; properties: Property[] }

export interface AlterTableStatement {
  kind: 'alter_table'
  table: QualifiedName
  action: AlterTableAction
}

export interface DropTableStatement {
  kind: 'drop_table'
  table: QualifiedName
  ifExists: boolean
}

export interface TruncateStatement {
  kind: 'truncate'
  table: QualifiedName
}

export interface CreateTypeStatement {
  kind: 'create_type'
  type: QualifiedName
  ifNotExists: boolean
  fields: Array<{ name: string; type: CqlType }>
}

export interface DropTypeStatement {
  kind: 'drop_type'
  type: QualifiedName
  ifExists: boolean
}

export interface CreateIndexStatement {
  kind: 'create_index'
  name?: string | undefined
  ifNotExists: boolean
  table: QualifiedName
  column: string
  /** Collection target wrapper, e.g. `keys` for `keys(col)` */
  targetKind?: 'keys' | 'values' | 'entries' | 'full' | undefined
  using?: string | undefined
}

export interface DropIndexStatement {
  kind: 'drop_index'
  index: QualifiedName
  ifExists: boolean
}

export interface CreateViewStatement {
  kind: 'create_view'
  view: QualifiedName
  ifNotExists: boolean
  /** Selected columns; empty means all */
  columns: string[]
  base: QualifiedName
  where: Condition[]
  /** WHERE clause as written */
  whereText: string
  partitionKey: string[]
  clusteringKey: string[]
  clusteringOrder: Ordering[]
  properties: Property[]
}

export interface DropViewStatement {
  kind: 'drop_view'
  view: QualifiedName
  ifExists: boolean
}

// =============================================================================
// Data statements
// =============================================================================

export interface InsertStatement {
  kind: 'insert'
  table: QualifiedName
  columns: string[]
  values: Term[]
  /** Set for `INSERT ... JSON '<object>'` */
  json?: Term | undefined
  using: UsingClause
  lwt?: LwtClause | undefined
}

export type Assignment =
  | { kind: 'set'; column: string; value: Term }
  /** `c = c + v` or `c = c - v` (counter or collection) */
  | { kind: 'add'; column: string; op: '+' | '-'; value: Term }
  /** `c = v + c` (list prepend) */
  | { kind: 'prepend'; column: string; value: Term }
  /** `c[key] = v` */
  | { kind: 'element'; column: string; key: Term; value: Term }

export interface UpdateStatement {
  kind: 'update'
  table: QualifiedName
  using: UsingClause
  assignments: Assignment[]
  where: Condition[]
  lwt?: LwtClause | undefined
}

export interface DeleteSelector {
  column: string
  /** Element key for `DELETE m[key]` */
  key?: Term | undefined
}

export interface DeleteStatement {
  kind: 'delete'
  table: QualifiedName
  selectors: DeleteSelector[]
  using: UsingClause
  /** Absent when the statement has no WHERE clause */
  where?: Condition[] | undefined
  lwt?: LwtClause | undefined
}

export type MutationStatement = InsertStatement | UpdateStatement | DeleteStatement

export interface SkippedStatement {
  text: string
  reason: string
}

export interface BatchStatement {
  kind: 'batch'
  batchType: 'logged' | 'unlogged' | 'counter'
  using: UsingClause
  statements: MutationStatement[]
  skipped: SkippedStatement[]
}

export interface SelectStatement {
  kind: 'select'
  json: boolean
  distinct: boolean
  items: SelectItem[]
  table: QualifiedName
  where: Condition[]
  groupBy: string[]
  having: HavingCondition[]
  orderBy: Ordering[]
  limit?: Term | undefined
  allowFiltering: boolean
}

export type Statement =
  | CreateKeyspaceStatement
  | AlterKeyspaceStatement
  | DropKeyspaceStatement
  | UseStatement
  | CreateTableStatement
  | AlterTableStatement
  | DropTableStatement
  | TruncateStatement
  | CreateTypeStatement
  | DropTypeStatement
  | CreateIndexStatement
  | DropIndexStatement
  | CreateViewStatement
  | DropViewStatement
  | InsertStatement
  | UpdateStatement
  | DeleteStatement
  | BatchStatement
  | SelectStatement

export type StatementKind = Statement['kind']

/**
 * A parsed statement together with its placeholder occurrences
 */
export interface ParsedStatement {
  statement: Statement
  markers: MarkerInfo[]
  text: string
}
