/**
 * CQL Statement Parser
 *
 * Recursive-descent parser over the token stream produced by `tokenize`.
 * Produces one AST variant per statement kind and records every
 * placeholder occurrence with the column it feeds.
 *
 * @example
 * ```typescript
 * const { statement, markers } = parseStatement('SELECT * FROM users WHERE id = ?')
 * statement.kind // 'select'
 * markers        // [{ slot: 0, receiver: 'id' }]
 * ```
 *
 * @module parser/parser
 */

import { CqlSyntaxError, UnsupportedQueryError } from '../errors'
import { fromHex } from '../values/cast'
import { isNativeTypeName, type CqlType } from '../values/types'
import type {
  AggregateFunction,
  AlterTableAction,
  Assignment,
  BatchStatement,
  ColumnSpec,
  ComparisonOperator,
  Condition,
  DeleteSelector,
  DeleteStatement,
  HavingCondition,
  InsertStatement,
  LwtClause,
  MarkerInfo,
  MutationStatement,
  Ordering,
  ParsedStatement,
  Property,
  QualifiedName,
  SelectItem,
  SelectStatement,
  SkippedStatement,
  Statement,
  Term,
  UpdateStatement,
  UsingClause,
} from './ast'
import { tokenize, type Token } from './tokenizer'

const AGGREGATES: ReadonlySet<string> = new Set(['count', 'sum', 'min', 'max', 'avg'])
const COMPARISON_OPERATORS: ReadonlySet<string> = new Set(['=', '!=', '<', '<=', '>', '>='])
const INDEX_TARGETS = ['keys', 'values', 'entries', 'full'] as const

function isComparisonOperator(value: string): value is ComparisonOperator {
  return COMPARISON_OPERATORS.has(value)
}

function isAggregateFunction(value: string): value is AggregateFunction {
  return AGGREGATES.has(value)
}

interface TableOptions {
  clusteringOrder: Ordering[]
  properties: Property[]
  compactStorage: boolean
}

// =============================================================================
// Parser
// =============================================================================

class Parser {
  private pos = 0
  private readonly end: Token

  constructor(
    private readonly tokens: Token[],
    private readonly text: string,
    readonly markers: MarkerInfo[] = []
  ) {
    const last = tokens[tokens.length - 1]
    this.end = last?.type === 'eof' ? last : { type: 'eof', pos: text.length }
  }

  // ---------------------------------------------------------------------------
  // Token helpers
  // ---------------------------------------------------------------------------

  private peek(offset = 0): Token {
    return this.tokens[this.pos + offset] ?? this.end
  }

  private advance(): Token {
    const token = this.peek()
    if (token.type !== 'eof') this.pos++
    return token
  }

  private error(message: string, token: Token = this.peek()): CqlSyntaxError {
    return new CqlSyntaxError(`${message} at position ${token.pos}`, undefined, { position: token.pos })
  }

  private describe(token: Token): string {
    switch (token.type) {
      case 'eof':
        return 'end of statement'
      case 'marker':
        return 'placeholder'
      case 'string':
        return `'${token.value}'`
      case 'number':
        return token.text
      default:
        return `'${token.value}'`
    }
  }

  private isKeyword(token: Token, keyword: string): boolean {
    return token.type === 'ident' && !token.quoted && token.value.toUpperCase() === keyword
  }

  private peekKeyword(...keywords: string[]): boolean {
    return keywords.every((keyword, i) => this.isKeyword(this.peek(i), keyword))
  }

  private acceptKeyword(...keywords: string[]): boolean {
    if (!this.peekKeyword(...keywords)) return false
    this.pos += keywords.length
    return true
  }

  private expectKeyword(...keywords: string[]): void {
    for (const keyword of keywords) {
      const token = this.peek()
      if (!this.isKeyword(token, keyword)) {
        throw this.error(`Expected ${keyword} but found ${this.describe(token)}`, token)
      }
      this.pos++
    }
  }

  private isPunct(token: Token, value: string): boolean {
    return token.type === 'punct' && token.value === value
  }

  private acceptPunct(value: string): boolean {
    if (!this.isPunct(this.peek(), value)) return false
    this.pos++
    return true
  }

  private expectPunct(value: string): void {
    const token = this.peek()
    if (!this.isPunct(token, value)) {
      throw this.error(`Expected '${value}' but found ${this.describe(token)}`, token)
    }
    this.pos++
  }

  private identifier(what = 'identifier'): string {
    const token = this.peek()
    if (token.type !== 'ident') {
      throw this.error(`Expected ${what} but found ${this.describe(token)}`, token)
    }
    this.pos++
    return token.value
  }

  private qualifiedName(): QualifiedName {
    const first = this.identifier('name')
    if (this.acceptPunct('.')) {
      return { keyspace: first, name: this.identifier('name') }
    }
    return { name: first }
  }

  private ifNotExists(): boolean {
    return this.acceptKeyword('IF', 'NOT', 'EXISTS')
  }

  private ifExists(): boolean {
    return this.acceptKeyword('IF', 'EXISTS')
  }

  private identifierList(): string[] {
    const names = [this.identifier('column name')]
    while (this.acceptPunct(',')) names.push(this.identifier('column name'))
    return names
  }

  expectEnd(): void {
    while (this.acceptPunct(';')) { /* trailing separators */ }
    const token = this.peek()
    if (token.type !== 'eof') {
      throw this.error(`Unexpected ${this.describe(token)}`, token)
    }
  }

  // ---------------------------------------------------------------------------
  // Statements
  // ---------------------------------------------------------------------------

  statement(): Statement {
    const token = this.peek()
    if (this.acceptKeyword('CREATE')) return this.create()
    if (this.acceptKeyword('ALTER')) return this.alter()
    if (this.acceptKeyword('DROP')) return this.drop()
    if (this.acceptKeyword('TRUNCATE')) {
      this.acceptKeyword('TABLE')
      return { kind: 'truncate', table: this.qualifiedName() }
    }
    if (this.acceptKeyword('USE')) return { kind: 'use', keyspace: this.identifier('keyspace name') }
    if (this.acceptKeyword('INSERT')) return this.insert()
    if (this.acceptKeyword('UPDATE')) return this.update()
    if (this.acceptKeyword('DELETE')) return this.delete()
    if (this.peekKeyword('BEGIN')) return this.batch()
    if (this.acceptKeyword('SELECT')) return this.select()
    throw this.unsupported(token)
  }

  private unsupported(token: Token): UnsupportedQueryError {
    const error = new UnsupportedQueryError(this.text.trim())
    error.context.position = token.pos
    return error
  }

  private create(): Statement {
    const start = this.peek()
    if (this.acceptKeyword('KEYSPACE') || this.acceptKeyword('SCHEMA')) {
      const ifNotExists = this.ifNotExists()
      const name = this.identifier('keyspace name')
      const properties = this.acceptKeyword('WITH') ? this.properties() : []
      return { kind: 'create_keyspace', name, ifNotExists, properties }
    }
    if (this.acceptKeyword('TABLE') || this.acceptKeyword('COLUMNFAMILY')) return this.createTable()
    if (this.acceptKeyword('TYPE')) {
      const ifNotExists = this.ifNotExists()
      const type = this.qualifiedName()
      this.expectPunct('(')
      const fields: Array<{ name: string; type: CqlType }> = []
      do {
        fields.push({ name: this.identifier('field name'), type: this.type() })
      } while (this.acceptPunct(','))
      this.expectPunct(')')
      return { kind: 'create_type', type, ifNotExists, fields }
    }
    if (this.acceptKeyword('CUSTOM', 'INDEX') || this.acceptKeyword('INDEX')) return this.createIndex()
    if (this.acceptKeyword('MATERIALIZED', 'VIEW')) return this.createView()
    throw this.unsupported(start)
  }

  private createTable(): Statement {
    const ifNotExists = this.ifNotExists()
    const table = this.qualifiedName()
    const columns: ColumnSpec[] = []
    let primaryKey: { partition: string[]; clustering: string[] } | undefined
    let primaryKeyCount = 0

    this.expectPunct('(')
    do {
      if (this.isPunct(this.peek(), ')')) break
      if (this.acceptKeyword('PRIMARY', 'KEY')) {
        primaryKeyCount++
        primaryKey = this.primaryKeySpec()
        continue
      }
      const name = this.identifier('column name')
      const type = this.type()
      const isStatic = this.acceptKeyword('STATIC')
      if (this.acceptKeyword('PRIMARY', 'KEY')) {
        primaryKeyCount++
        primaryKey = { partition: [name], clustering: [] }
      }
      columns.push({ name, type, isStatic })
    } while (this.acceptPunct(','))
    this.expectPunct(')')

    if (primaryKeyCount === 0 || primaryKey === undefined) {
      throw this.error(`No PRIMARY KEY specified for table '${table.name}'`)
    }
    if (primaryKeyCount > 1) {
      throw this.error(`Multiple PRIMARY KEY definitions for table '${table.name}'`)
    }

    const options = this.acceptKeyword('WITH') ? this.tableOptions() : emptyTableOptions()
    return {
      kind: 'create_table',
      table,
      ifNotExists,
      columns,
      partitionKey: primaryKey.partition,
      clusteringKey: primaryKey.clustering,
      clusteringOrder: options.clusteringOrder,
      properties: options.properties,
      compactStorage: options.compactStorage,
    }
  }

  private primaryKeySpec(): { partition: string[]; clustering: string[] } {
    this.expectPunct('(')
    let partition: string[]
    if (this.acceptPunct('(')) {
      partition = this.identifierList()
      this.expectPunct(')')
    } else {
      partition = [this.identifier('column name')]
    }
    const clustering: string[] = []
    while (this.acceptPunct(',')) clustering.push(this.identifier('column name'))
    this.expectPunct(')')
    return { partition, clustering }
  }

  private tableOptions(): TableOptions {
    const options = emptyTableOptions()
    do {
      if (this.acceptKeyword('CLUSTERING', 'ORDER', 'BY')) {
        this.expectPunct('(')
        do {
          options.clusteringOrder.push(this.ordering())
        } while (this.acceptPunct(','))
        this.expectPunct(')')
      } else if (this.acceptKeyword('COMPACT', 'STORAGE')) {
        options.compactStorage = true
      } else {
        options.properties.push(this.property())
      }
    } while (this.acceptKeyword('AND'))
    return options
  }

  private ordering(): Ordering {
    const column = this.identifier('column name')
    if (this.acceptKeyword('DESC')) return { column, order: 'DESC' }
    this.acceptKeyword('ASC')
    return { column, order: 'ASC' }
  }

  private properties(): Property[] {
    const properties = [this.property()]
    while (this.acceptKeyword('AND')) properties.push(this.property())
    return properties
  }

  private property(): Property {
    const name = this.identifier('option name').toLowerCase()
    this.expectPunct('=')
    return { name, value: this.term() }
  }

  private createIndex(): Statement {
    const ifNotExists = this.ifNotExists()
    const name = this.peekKeyword('ON') ? undefined : this.identifier('index name')
    this.expectKeyword('ON')
    const table = this.qualifiedName()
    this.expectPunct('(')
    let targetKind: (typeof INDEX_TARGETS)[number] | undefined
    const head = this.peek()
    const wrapper = INDEX_TARGETS.find(kind => this.isKeyword(head, kind.toUpperCase()))
    if (wrapper !== undefined && this.isPunct(this.peek(1), '(')) {
      this.pos += 2
      targetKind = wrapper
      const column = this.identifier('column name')
      this.expectPunct(')')
      this.expectPunct(')')
      return { kind: 'create_index', name, ifNotExists, table, column, targetKind, using: this.indexUsing() }
    }
    const column = this.identifier('column name')
    this.expectPunct(')')
    return { kind: 'create_index', name, ifNotExists, table, column, targetKind, using: this.indexUsing() }
  }

  private indexUsing(): string | undefined {
    if (!this.acceptKeyword('USING')) return undefined
    const token = this.advance()
    if (token.type !== 'string') throw this.error('Expected index class name', token)
    if (this.acceptKeyword('WITH')) this.properties()
    return token.value
  }

  private createView(): Statement {
    const ifNotExists = this.ifNotExists()
    const view = this.qualifiedName()
    this.expectKeyword('AS', 'SELECT')
    const columns = this.acceptPunct('*') ? [] : this.identifierList()
    this.expectKeyword('FROM')
    const base = this.qualifiedName()
    this.expectKeyword('WHERE')
    const whereStart = this.peek().pos
    const where = this.conditions()
    const whereText = this.text.slice(whereStart, this.peek().pos).trim()
    this.expectKeyword('PRIMARY', 'KEY')
    const primaryKey = this.primaryKeySpec()
    const options = this.acceptKeyword('WITH') ? this.tableOptions() : emptyTableOptions()
    return {
      kind: 'create_view',
      view,
      ifNotExists,
      columns,
      base,
      where,
      whereText,
      partitionKey: primaryKey.partition,
      clusteringKey: primaryKey.clustering,
      clusteringOrder: options.clusteringOrder,
      properties: options.properties,
    }
  }

  private alter(): Statement {
    const start = this.peek()
    if (this.acceptKeyword('KEYSPACE') || this.acceptKeyword('SCHEMA')) {
      const name = this.identifier('keyspace name')
      this.expectKeyword('WITH')
      return { kind: 'alter_keyspace', name, properties: this.properties() }
    }
    if (this.acceptKeyword('TABLE') || this.acceptKeyword('COLUMNFAMILY')) {
      const table = this.qualifiedName()
      return { kind: 'alter_table', table, action: this.alterTableAction() }
    }
    throw this.unsupported(start)
  }

  private alterTableAction(): AlterTableAction {
    if (this.acceptKeyword('ADD')) {
      const parenthesized = this.acceptPunct('(')
      const columns: ColumnSpec[] = []
      do {
        const name = this.identifier('column name')
        const type = this.type()
        columns.push({ name, type, isStatic: this.acceptKeyword('STATIC') })
      } while (this.acceptPunct(','))
      if (parenthesized) this.expectPunct(')')
      return { kind: 'add', columns }
    }
    if (this.acceptKeyword('DROP')) {
      const parenthesized = this.acceptPunct('(')
      const columns = this.identifierList()
      if (parenthesized) this.expectPunct(')')
      return { kind: 'drop', columns }
    }
    if (this.acceptKeyword('WITH')) {
      const options = this.tableOptions()
      return { kind: 'with', properties: options.properties }
    }
    throw this.error('Expected ADD, DROP or WITH in ALTER TABLE')
  }

  private drop(): Statement {
    const start = this.peek()
    if (this.acceptKeyword('KEYSPACE') || this.acceptKeyword('SCHEMA')) {
      const ifExists = this.ifExists()
      return { kind: 'drop_keyspace', name: this.identifier('keyspace name'), ifExists }
    }
    if (this.acceptKeyword('TABLE') || this.acceptKeyword('COLUMNFAMILY')) {
      const ifExists = this.ifExists()
      return { kind: 'drop_table', table: this.qualifiedName(), ifExists }
    }
    if (this.acceptKeyword('TYPE')) {
      const ifExists = this.ifExists()
      return { kind: 'drop_type', type: this.qualifiedName(), ifExists }
    }
    if (this.acceptKeyword('INDEX')) {
      const ifExists = this.ifExists()
      return { kind: 'drop_index', index: this.qualifiedName(), ifExists }
    }
    if (this.acceptKeyword('MATERIALIZED', 'VIEW')) {
      const ifExists = this.ifExists()
      return { kind: 'drop_view', view: this.qualifiedName(), ifExists }
    }
    throw this.unsupported(start)
  }

  // ---------------------------------------------------------------------------
  // Data statements
  // ---------------------------------------------------------------------------

  private insert(): InsertStatement {
    this.expectKeyword('INTO')
    const table = this.qualifiedName()
    let columns: string[] = []
    let values: Term[] = []
    let json: Term | undefined

    if (this.acceptKeyword('JSON')) {
      json = this.term('[json]')
    } else {
      this.expectPunct('(')
      columns = this.identifierList()
      this.expectPunct(')')
      this.expectKeyword('VALUES')
      this.expectPunct('(')
      values = [this.term(columns[0])]
      while (this.acceptPunct(',')) values.push(this.term(columns[values.length]))
      this.expectPunct(')')
      if (values.length !== columns.length) {
        throw this.error(`Unmatched column names/values: ${columns.length} columns, ${values.length} values`)
      }
    }

    const statement: InsertStatement = { kind: 'insert', table, columns, values, json, using: {} }
    for (;;) {
      if (this.acceptKeyword('USING')) {
        statement.using = this.using()
      } else if (this.peekKeyword('IF')) {
        statement.lwt = this.lwt()
      } else {
        break
      }
    }
    return statement
  }

  private update(): UpdateStatement {
    const table = this.qualifiedName()
    const using = this.acceptKeyword('USING') ? this.using() : {}
    this.expectKeyword('SET')
    const assignments = [this.assignment()]
    while (this.acceptPunct(',')) assignments.push(this.assignment())
    this.expectKeyword('WHERE')
    const where = this.conditions()
    const lwt = this.peekKeyword('IF') ? this.lwt() : undefined
    return { kind: 'update', table, using, assignments, where, lwt }
  }

  private assignment(): Assignment {
    const column = this.identifier('column name')
    if (this.acceptPunct('[')) {
      const key = this.term(column)
      this.expectPunct(']')
      this.expectPunct('=')
      return { kind: 'element', column, key, value: this.term(column) }
    }
    this.expectPunct('=')

    const head = this.peek()
    const op = this.peek(1)
    if (head.type === 'ident' && head.value.toLowerCase() === column.toLowerCase() &&
      op.type === 'punct' && (op.value === '+' || op.value === '-')) {
      this.pos += 2
      return { kind: 'add', column, op: op.value, value: this.term(column) }
    }

    const value = this.term(column)
    if (this.isPunct(this.peek(), '+')) {
      const tail = this.peek(1)
      if (tail.type === 'ident' && tail.value.toLowerCase() === column.toLowerCase()) {
        this.pos += 2
        return { kind: 'prepend', column, value }
      }
      throw this.error(`Invalid operation on column '${column}'`)
    }
    return { kind: 'set', column, value }
  }

  private delete(): DeleteStatement {
    const selectors: DeleteSelector[] = []
    if (!this.peekKeyword('FROM')) {
      do {
        const column = this.identifier('column name')
        let key: Term | undefined
        if (this.acceptPunct('[')) {
          key = this.term(column)
          this.expectPunct(']')
        }
        selectors.push({ column, key })
      } while (this.acceptPunct(','))
    }
    this.expectKeyword('FROM')
    const table = this.qualifiedName()
    const using = this.acceptKeyword('USING') ? this.using() : {}
    const where = this.acceptKeyword('WHERE') ? this.conditions() : undefined
    const lwt = this.peekKeyword('IF') ? this.lwt() : undefined
    return { kind: 'delete', table, selectors, using, where, lwt }
  }

  private using(): UsingClause {
    const using: UsingClause = {}
    do {
      if (this.acceptKeyword('TTL')) {
        using.ttl = this.term('[ttl]')
      } else if (this.acceptKeyword('TIMESTAMP')) {
        using.timestamp = this.term('[timestamp]')
      } else {
        throw this.error('Expected TTL or TIMESTAMP')
      }
    } while (this.acceptKeyword('AND'))
    return using
  }

  private lwt(): LwtClause {
    this.expectKeyword('IF')
    if (this.acceptKeyword('NOT', 'EXISTS')) return { kind: 'if_not_exists' }
    if (this.acceptKeyword('EXISTS')) return { kind: 'if_exists' }
    return { kind: 'if', conditions: this.conditions() }
  }

  batch(): BatchStatement {
    this.expectKeyword('BEGIN')
    let batchType: BatchStatement['batchType'] = 'logged'
    if (this.acceptKeyword('UNLOGGED')) batchType = 'unlogged'
    else if (this.acceptKeyword('COUNTER')) batchType = 'counter'
    else this.acceptKeyword('LOGGED')
    this.expectKeyword('BATCH')
    const using = this.acceptKeyword('USING') ? this.using() : {}

    const statements: MutationStatement[] = []
    const skipped: SkippedStatement[] = []

    for (;;) {
      while (this.acceptPunct(';')) { /* separators */ }
      if (this.acceptKeyword('APPLY', 'BATCH')) break
      if (this.peek().type === 'eof') throw this.error('Expected APPLY BATCH')

      const startIndex = this.pos
      let endIndex = startIndex
      let depth = 0
      for (;;) {
        const token = this.tokens[endIndex] ?? this.end
        if (token.type === 'eof') break
        if (depth === 0 && (this.isPunct(token, ';') ||
          (this.isKeyword(token, 'APPLY') && this.isKeyword(this.tokens[endIndex + 1] ?? this.end, 'BATCH')))) {
          break
        }
        if (token.type === 'punct' && ['(', '[', '{'].includes(token.value)) depth++
        if (token.type === 'punct' && [')', ']', '}'].includes(token.value)) depth--
        endIndex++
      }

      const slice = this.tokens.slice(startIndex, endIndex)
      const first = slice[0] ?? this.end
      const stop = this.tokens[endIndex] ?? this.end
      const text = this.text.slice(first.pos, stop.pos).trim()
      const markerCount = this.markers.length
      const eof: Token = { type: 'eof', pos: stop.pos }
      const inner = new Parser([...slice, eof], this.text, this.markers)

      let reason: string | undefined
      if (this.isKeyword(first, 'INSERT') || this.isKeyword(first, 'UPDATE') || this.isKeyword(first, 'DELETE')) {
        try {
          const statement = inner.statement()
          inner.expectEnd()
          if (statement.kind === 'insert' || statement.kind === 'update' || statement.kind === 'delete') {
            statements.push(statement)
          }
        } catch (error) {
          if (!(error instanceof CqlSyntaxError)) throw error
          reason = error.message
        }
      } else {
        reason = 'not an INSERT, UPDATE or DELETE statement'
      }

      if (reason !== undefined) {
        // Placeholders of a skipped statement still take their positions
        this.markers.length = markerCount
        for (const token of slice) {
          if (token.type === 'marker') this.markers.push({ slot: this.markers.length, name: token.name })
        }
        skipped.push({ text, reason })
      }
      this.pos = endIndex
    }

    return { kind: 'batch', batchType, using, statements, skipped }
  }

  private select(): SelectStatement {
    const json = this.acceptKeyword('JSON')
    const distinct = this.acceptKeyword('DISTINCT')
    const items: SelectItem[] = []
    if (this.acceptPunct('*')) {
      items.push({ kind: 'wildcard' })
    } else {
      do {
        items.push(this.selectItem())
      } while (this.acceptPunct(','))
    }

    this.expectKeyword('FROM')
    const table = this.qualifiedName()
    const statement: SelectStatement = {
      kind: 'select',
      json,
      distinct,
      items,
      table,
      where: [],
      groupBy: [],
      having: [],
      orderBy: [],
      allowFiltering: false,
    }

    if (this.acceptKeyword('WHERE')) statement.where = this.conditions()
    if (this.acceptKeyword('GROUP', 'BY')) statement.groupBy = this.identifierList()
    if (this.acceptKeyword('HAVING')) {
      statement.having = [this.having()]
      while (this.acceptKeyword('AND')) statement.having.push(this.having())
    }
    if (this.acceptKeyword('ORDER', 'BY')) {
      do {
        statement.orderBy.push(this.ordering())
      } while (this.acceptPunct(','))
    }
    if (this.acceptKeyword('LIMIT')) statement.limit = this.term('limit')
    if (this.acceptKeyword('ALLOW', 'FILTERING')) statement.allowFiltering = true
    return statement
  }

  private selectItem(): SelectItem {
    const head = this.peek()
    let item: Exclude<SelectItem, { kind: 'wildcard' }>
    if (head.type === 'ident' && !head.quoted && this.isPunct(this.peek(1), '(')) {
      const fn = head.value.toLowerCase()
      this.pos += 2
      if (isAggregateFunction(fn)) {
        const { argument, distinct } = this.aggregateArgument(fn)
        item = { kind: 'aggregate', fn, argument, distinct }
      } else if (fn === 'writetime' || fn === 'ttl') {
        item = { kind: 'function', fn, column: this.identifier('column name') }
        this.expectPunct(')')
      } else {
        throw this.error(`Unsupported function '${head.value}'`, head)
      }
    } else {
      item = { kind: 'column', name: this.identifier('column name') }
    }

    if (this.acceptKeyword('AS')) {
      item.alias = this.identifier('alias')
    } else {
      const next = this.peek()
      if (next.type === 'ident' && !this.isKeyword(next, 'FROM')) {
        item.alias = this.identifier('alias')
      }
    }
    return item
  }

  /** Parses the argument list after `fn(` up to and including `)` */
  private aggregateArgument(fn: AggregateFunction): { argument: string; distinct: boolean } {
    const distinct = this.acceptKeyword('DISTINCT')
    let argument: string
    const token = this.peek()
    if (fn === 'count' && !distinct && this.isPunct(token, '*')) {
      this.pos++
      argument = '*'
    } else if (fn === 'count' && !distinct && token.type === 'number' && token.value === 1) {
      this.pos++
      argument = '*'
    } else {
      argument = this.identifier('column name')
    }
    this.expectPunct(')')
    return { argument, distinct }
  }

  private having(): HavingCondition {
    const head = this.peek()
    const fn = head.type === 'ident' ? head.value.toLowerCase() : ''
    if (!isAggregateFunction(fn) || !this.isPunct(this.peek(1), '(')) {
      throw this.error('HAVING supports aggregate comparisons only', head)
    }
    this.pos += 2
    const { argument, distinct } = this.aggregateArgument(fn)
    const op = this.comparisonOperator()
    return { fn, argument, distinct, op, value: this.term() }
  }

  private comparisonOperator(): ComparisonOperator {
    const token = this.peek()
    if (token.type === 'punct' && isComparisonOperator(token.value)) {
      this.pos++
      return token.value
    }
    throw this.error(`Expected comparison operator but found ${this.describe(token)}`, token)
  }

  private conditions(): Condition[] {
    const conditions = [this.condition()]
    while (this.acceptKeyword('AND')) conditions.push(this.condition())
    return conditions
  }

  private condition(): Condition {
    const column = this.identifier('column name')
    if (this.acceptKeyword('IN')) {
      if (this.acceptPunct('(')) {
        const items: Term[] = []
        if (!this.isPunct(this.peek(), ')')) {
          do {
            items.push(this.term(column))
          } while (this.acceptPunct(','))
        }
        this.expectPunct(')')
        return { kind: 'in', column, values: { kind: 'list', items } }
      }
      return { kind: 'in', column, values: this.term(column) }
    }
    if (this.acceptKeyword('CONTAINS')) {
      const key = this.acceptKeyword('KEY')
      return { kind: 'contains', column, key, value: this.term(column) }
    }
    if (this.acceptKeyword('IS', 'NOT', 'NULL')) return { kind: 'not_null', column }
    const op = this.comparisonOperator()
    return { kind: 'compare', column, op, value: this.term(column) }
  }

  // ---------------------------------------------------------------------------
  // Terms and types
  // ---------------------------------------------------------------------------

  term(receiver?: string): Term {
    const token = this.advance()
    switch (token.type) {
      case 'marker': {
        const slot = this.markers.length
        this.markers.push({ slot, name: token.name, receiver: token.name ?? receiver })
        return { kind: 'marker', slot }
      }
      case 'string':
        return { kind: 'literal', value: token.value }
      case 'number':
        return { kind: 'literal', value: token.value }
      case 'uuid':
        return { kind: 'literal', value: token.value }
      case 'blob':
        if (token.value.length % 2 !== 0) throw this.error('Blob literal must have an even number of digits', token)
        return { kind: 'literal', value: fromHex(token.value) }
      case 'punct':
        return this.punctTerm(token, receiver)
      case 'ident': {
        if (!token.quoted) {
          const lowered = token.value.toLowerCase()
          if (this.isPunct(this.peek(), '(')) {
            this.pos++
            const args: Term[] = []
            if (!this.isPunct(this.peek(), ')')) {
              do {
                args.push(this.term())
              } while (this.acceptPunct(','))
            }
            this.expectPunct(')')
            return { kind: 'call', name: lowered, args }
          }
          if (lowered === 'true') return { kind: 'literal', value: true }
          if (lowered === 'false') return { kind: 'literal', value: false }
          if (lowered === 'null') return { kind: 'literal', value: null }
          if (lowered === 'nan') return { kind: 'literal', value: NaN }
          if (lowered === 'infinity') return { kind: 'literal', value: Infinity }
        }
        throw this.error(`Unexpected identifier '${token.value}' where a value was expected`, token)
      }
      case 'eof':
        throw this.error('Expected a value but found end of statement', token)
    }
  }

  private punctTerm(token: Extract<Token, { type: 'punct' }>, receiver: string | undefined): Term {
    switch (token.value) {
      case '-': {
        const next = this.advance()
        if (next.type === 'number') return { kind: 'literal', value: -next.value }
        if (next.type === 'ident' && next.value.toLowerCase() === 'infinity') {
          return { kind: 'literal', value: -Infinity }
        }
        throw this.error('Expected a number after \'-\'', next)
      }
      case '[': {
        const items: Term[] = []
        if (!this.acceptPunct(']')) {
          do {
            items.push(this.term(receiver))
          } while (this.acceptPunct(','))
          this.expectPunct(']')
        }
        return { kind: 'list', items }
      }
      case '(': {
        const items: Term[] = []
        do {
          items.push(this.term(receiver))
        } while (this.acceptPunct(','))
        this.expectPunct(')')
        return { kind: 'tuple', items }
      }
      case '{':
        return this.braceTerm(receiver)
      default:
        throw this.error(`Unexpected '${token.value}' where a value was expected`, token)
    }
  }

  /** `{k: v, ...}` is a map or user type value, `{a, b}` a set */
  private braceTerm(receiver: string | undefined): Term {
    if (this.acceptPunct('}')) return { kind: 'map', entries: [] }

    const first = this.mapKey(receiver)
    if (this.acceptPunct(':')) {
      const entries: Array<[Term, Term]> = [[first, this.term(receiver)]]
      while (this.acceptPunct(',')) {
        const key = this.mapKey(receiver)
        this.expectPunct(':')
        entries.push([key, this.term(receiver)])
      }
      this.expectPunct('}')
      return { kind: 'map', entries }
    }

    const items = [first]
    while (this.acceptPunct(',')) items.push(this.term(receiver))
    this.expectPunct('}')
    return { kind: 'set', items }
  }

  private mapKey(receiver: string | undefined): Term {
    const token = this.peek()
    const next = this.peek(1)
    // User type field names are bare identifiers
    if (token.type === 'ident' && this.isPunct(next, ':')) {
      const lowered = token.value.toLowerCase()
      if (token.quoted || !['true', 'false', 'null', 'nan', 'infinity'].includes(lowered)) {
        this.pos++
        return { kind: 'literal', value: token.value }
      }
    }
    return this.term(receiver)
  }

  type(): CqlType {
    const token = this.peek()
    const name = this.identifier('type name')
    const lowered = token.type === 'ident' && token.quoted ? name : name.toLowerCase()

    switch (lowered) {
      case 'frozen': {
        this.expectPunct('<')
        const inner = this.type()
        this.expectPunct('>')
        return { kind: 'frozen', inner }
      }
      case 'list':
      case 'set': {
        this.expectPunct('<')
        const element = this.type()
        this.expectPunct('>')
        return lowered === 'list' ? { kind: 'list', element } : { kind: 'set', element }
      }
      case 'map': {
        this.expectPunct('<')
        const key = this.type()
        this.expectPunct(',')
        const value = this.type()
        this.expectPunct('>')
        return { kind: 'map', key, value }
      }
      case 'tuple': {
        this.expectPunct('<')
        const elements = [this.type()]
        while (this.acceptPunct(',')) elements.push(this.type())
        this.expectPunct('>')
        return { kind: 'tuple', elements }
      }
    }

    if (isNativeTypeName(lowered)) return { kind: 'native', name: lowered }
    if (this.acceptPunct('.')) {
      return { kind: 'udt', name: this.identifier('type name') }
    }
    return { kind: 'udt', name }
  }
}

function emptyTableOptions(): TableOptions {
  return { clusteringOrder: [], properties: [], compactStorage: false }
}

// =============================================================================
// Entry points
// =============================================================================

/**
 * Parse a single statement
 *
 * @throws UnsupportedQueryError if the statement kind is not recognized
 * @throws CqlSyntaxError if a recognized statement is malformed
 */
export function parseStatement(text: string): ParsedStatement {
  const tokens = tokenize(text)
  const parser = new Parser(tokens, text)
  const statement = parser.statement()
  parser.expectEnd()
  return { statement, markers: parser.markers, text }
}

/**
 * Parse a column type such as `map<text, frozen<list<int>>>`
 */
export function parseType(text: string): CqlType {
  const parser = new Parser(tokenize(text), text)
  const type = parser.type()
  parser.expectEnd()
  return type
}
