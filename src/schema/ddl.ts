/**
 * Definition Statements
 *
 * Handlers for keyspace, table, type, index and materialized view
 * definitions. Every successful change regenerates `system_schema`.
 *
 * @module schema/ddl
 */

import {
  AlreadyExistsError,
  ColumnNotFoundError,
  CqlSyntaxError,
  ErrorCode,
  InvalidRequestError,
  KeyspaceNotFoundError,
  NotFoundError,
  TableNotFoundError,
} from '../errors'
import type {
  AlterKeyspaceStatement,
  AlterTableStatement,
  ColumnSpec,
  CreateIndexStatement,
  CreateKeyspaceStatement,
  CreateTableStatement,
  CreateTypeStatement,
  CreateViewStatement,
  DropIndexStatement,
  DropKeyspaceStatement,
  DropTableStatement,
  DropTypeStatement,
  DropViewStatement,
  Property,
  TruncateStatement,
  UseStatement,
} from '../parser/ast'
import { evaluateTerm } from '../parser/bindings'
import type { ExecutionContext } from '../engine/context'
import { resolveConditions } from '../query/condition'
import { ResultSet } from '../result'
import { toCqlValue } from '../values/cast'
import { isCounterType, isCqlObject, unfreeze, type CqlType, type CqlValue } from '../values/types'
import { logger } from '../utils/logger'
import { DEFAULT_REPLICATION, findByName, type Catalog, type Keyspace, type UserType } from './catalog'
import { Table, type IndexDefinition } from './table'

type DdlHandler<T> = (statement: T, context: ExecutionContext) => ResultSet

function changed(context: ExecutionContext, description: string): ResultSet {
  context.catalog.refresh()
  logger.debug(description)
  return ResultSet.empty()
}

// =============================================================================
// Properties
// =============================================================================

function propertyValues(properties: readonly Property[], context: ExecutionContext): Record<string, CqlValue> {
  const values: Record<string, CqlValue> = {}
  for (const property of properties) {
    values[property.name] = toCqlValue(evaluateTerm(property.value, {
      bindings: context.bindings,
      now: context.clock.now,
    }))
  }
  return values
}

function parseReplication(value: CqlValue | undefined): Record<string, string> {
  if (!isCqlObject(value)) return { ...DEFAULT_REPLICATION }
  const replication: Record<string, string> = {}
  for (const [key, entry] of Object.entries(value)) replication[key] = String(entry)
  return replication
}

function parseDurableWrites(value: CqlValue | undefined): boolean {
  if (typeof value === 'boolean') return value
  if (typeof value === 'string') return value.toLowerCase() !== 'false'
  return true
}

function requireUserKeyspace(catalog: Catalog, keyspace: Keyspace): Keyspace {
  if (keyspace.reserved || catalog.isReserved(keyspace.name)) {
    throw new InvalidRequestError(
      `Modification of system keyspace '${keyspace.name}' is not allowed`,
      ErrorCode.INVALID_REQUEST,
      { keyspace: keyspace.name }
    )
  }
  return keyspace
}

// =============================================================================
// Types
// =============================================================================

/**
 * Check that every user type a column type refers to exists in `keyspace`
 */
function validateType(type: CqlType, keyspace: Keyspace, context: ExecutionContext): void {
  switch (type.kind) {
    case 'native':
      return
    case 'list':
    case 'set':
      validateType(type.element, keyspace, context)
      return
    case 'map':
      validateType(type.key, keyspace, context)
      validateType(type.value, keyspace, context)
      return
    case 'tuple':
      for (const element of type.elements) validateType(element, keyspace, context)
      return
    case 'frozen':
      validateType(type.inner, keyspace, context)
      return
    case 'udt':
      context.catalog.requireType(keyspace, type.name)
  }
}

function usesType(type: CqlType, name: string): boolean {
  switch (type.kind) {
    case 'native':
      return false
    case 'list':
    case 'set':
      return usesType(type.element, name)
    case 'map':
      return usesType(type.key, name) || usesType(type.value, name)
    case 'tuple':
      return type.elements.some(element => usesType(element, name))
    case 'frozen':
      return usesType(type.inner, name)
    case 'udt':
      return type.name.toLowerCase() === name.toLowerCase()
  }
}

function assertUniqueNames(names: readonly string[], what: string): void {
  const seen = new Set<string>()
  for (const name of names) {
    const lowered = name.toLowerCase()
    if (seen.has(lowered)) {
      throw new InvalidRequestError(`Multiple definition of identifier ${name}`, ErrorCode.INVALID_REQUEST, { [what]: name })
    }
    seen.add(lowered)
  }
}

// =============================================================================
// Keyspaces
// =============================================================================

export const createKeyspace: DdlHandler<CreateKeyspaceStatement> = (statement, context) => {
  const { catalog } = context
  const existing = catalog.findKeyspace(statement.name)
  if (existing) {
    if (statement.ifNotExists) return ResultSet.empty()
    throw new AlreadyExistsError('keyspace', existing.name)
  }

  const options = propertyValues(statement.properties, context)
  catalog.addKeyspace({
    name: statement.name,
    replication: parseReplication(options.replication),
    durableWrites: parseDurableWrites(options.durable_writes),
    tables: new Map(),
    types: new Map(),
    views: new Map(),
    reserved: false,
  })
  return changed(context, `CREATE KEYSPACE ${statement.name}`)
}

export const alterKeyspace: DdlHandler<AlterKeyspaceStatement> = (statement, context) => {
  const keyspace = requireUserKeyspace(context.catalog, context.catalog.requireKeyspace(statement.name))
  const options = propertyValues(statement.properties, context)
  if ('replication' in options) keyspace.replication = parseReplication(options.replication)
  if ('durable_writes' in options) keyspace.durableWrites = parseDurableWrites(options.durable_writes)
  return changed(context, `ALTER KEYSPACE ${keyspace.name}`)
}

export const dropKeyspace: DdlHandler<DropKeyspaceStatement> = (statement, context) => {
  const { catalog } = context
  if (catalog.isReserved(statement.name)) {
    throw new InvalidRequestError(
      `Cannot drop system keyspace '${statement.name}'`,
      ErrorCode.INVALID_REQUEST,
      { keyspace: statement.name }
    )
  }
  const keyspace = catalog.findKeyspace(statement.name)
  if (!keyspace) {
    if (statement.ifExists) return ResultSet.empty()
    throw new KeyspaceNotFoundError(statement.name)
  }
  catalog.removeKeyspace(keyspace)
  return changed(context, `DROP KEYSPACE ${keyspace.name}`)
}

export const useKeyspace: DdlHandler<UseStatement> = (statement, context) => {
  const keyspace = context.catalog.requireKeyspace(statement.keyspace)
  context.useKeyspace(keyspace.name)
  logger.debug(`USE ${keyspace.name}`)
  return ResultSet.empty()
}

// =============================================================================
// Tables
// =============================================================================

function checkColumnSpecs(columns: readonly ColumnSpec[], keyspace: Keyspace, context: ExecutionContext): void {
  assertUniqueNames(columns.map(column => column.name), 'column')
  for (const column of columns) validateType(column.type, keyspace, context)
}

export const createTable: DdlHandler<CreateTableStatement> = (statement, context) => {
  const { catalog } = context
  const keyspace = requireUserKeyspace(catalog, catalog.keyspaceFor(statement.table, context.keyspace))
  const name = statement.table.name
  if (findByName(keyspace.tables, name) || findByName(keyspace.views, name)) {
    if (statement.ifNotExists) return ResultSet.empty()
    throw new AlreadyExistsError('table', keyspace.name, name)
  }

  checkColumnSpecs(statement.columns, keyspace, context)
  const declared = new Map(statement.columns.map(column => [column.name.toLowerCase(), column]))
  const keyColumn = (column: string): string => {
    const spec = declared.get(column.toLowerCase())
    if (!spec) {
      throw new InvalidRequestError(
        `Unknown definition ${column} referenced in PRIMARY KEY`,
        ErrorCode.INVALID_REQUEST,
        { column }
      )
    }
    if (isCounterType(spec.type)) {
      throw new InvalidRequestError(`counter type is not supported for PRIMARY KEY column '${spec.name}'`, ErrorCode.INVALID_REQUEST, { column: spec.name })
    }
    return spec.name
  }
  const partitionKey = statement.partitionKey.map(keyColumn)
  const clusteringKey = statement.clusteringKey.map(keyColumn)
  assertUniqueNames([...partitionKey, ...clusteringKey], 'column')

  const regular = statement.columns.filter(column => !partitionKey.includes(column.name) && !clusteringKey.includes(column.name))
  const counters = regular.filter(column => isCounterType(column.type))
  if (counters.length > 0 && counters.length < regular.length) {
    throw new InvalidRequestError(
      'Cannot mix counter and non counter columns in the same table',
      ErrorCode.INVALID_REQUEST,
      { table: name }
    )
  }
  if (clusteringKey.length === 0 && statement.columns.some(column => column.isStatic)) {
    throw new InvalidRequestError('Static columns are only useful (and thus allowed) if the table has at least one clustering column', ErrorCode.INVALID_REQUEST, { table: name })
  }

  const clusteringOrder = new Map<string, 'ASC' | 'DESC'>()
  for (const ordering of statement.clusteringOrder) {
    const column = clusteringKey.find(key => key.toLowerCase() === ordering.column.toLowerCase())
    if (column === undefined) {
      throw new InvalidRequestError(
        `Only clustering key columns can be defined in CLUSTERING ORDER directive: ${ordering.column}`,
        ErrorCode.INVALID_REQUEST,
        { column: ordering.column }
      )
    }
    clusteringOrder.set(column, ordering.order)
  }

  const options = propertyValues(statement.properties, context)
  if (statement.compactStorage) options.compact_storage = true
  keyspace.tables.set(name, new Table(keyspace.name, name, {
    columns: statement.columns,
    partitionKey,
    clusteringKey,
    clusteringOrder,
    options,
  }))
  return changed(context, `CREATE TABLE ${keyspace.name}.${name}`)
}

export const alterTable: DdlHandler<AlterTableStatement> = (statement, context) => {
  const { catalog } = context
  const keyspace = catalog.keyspaceFor(statement.table, context.keyspace)
  const table = findByName(keyspace.tables, statement.table.name)
  if (!table) {
    throw new CqlSyntaxError(
      `Cannot alter unknown table '${keyspace.name}.${statement.table.name}'`,
      ErrorCode.SYNTAX_ERROR,
      { keyspace: keyspace.name, table: statement.table.name }
    )
  }
  requireUserKeyspace(catalog, keyspace)

  const { action } = statement
  switch (action.kind) {
    case 'add':
      checkColumnSpecs(action.columns, keyspace, context)
      for (const column of action.columns) {
        if (table.columns.has(column.name) || [...table.columns.keys()].some(name => name.toLowerCase() === column.name.toLowerCase())) {
          throw new InvalidRequestError(
            `Invalid column name ${column.name} because it conflicts with an existing column`,
            ErrorCode.INVALID_REQUEST,
            { column: column.name }
          )
        }
        table.addColumn(column.name, column.type, column.isStatic)
      }
      break
    case 'drop':
      for (const name of action.columns) {
        const column = table.resolveColumn(name)
        if (!column) throw new ColumnNotFoundError(name, table.name)
        if (column.kind === 'partition_key' || column.kind === 'clustering') {
          throw new InvalidRequestError(`Cannot drop PRIMARY KEY part ${column.name}`, ErrorCode.INVALID_REQUEST, { column: column.name })
        }
        table.dropColumn(column.name)
      }
      break
    case 'with':
      table.options = { ...table.options, ...propertyValues(action.properties, context) }
      break
  }
  return changed(context, `ALTER TABLE ${keyspace.name}.${table.name} ${action.kind.toUpperCase()}`)
}

export const dropTable: DdlHandler<DropTableStatement> = (statement, context) => {
  const { catalog } = context
  const keyspace = catalog.keyspaceFor(statement.table, context.keyspace)
  const table = findByName(keyspace.tables, statement.table.name)
  if (!table) {
    if (statement.ifExists) return ResultSet.empty()
    throw new TableNotFoundError(keyspace.name, statement.table.name)
  }
  requireUserKeyspace(catalog, keyspace)

  const dependent = [...keyspace.views.values()].filter(view => view.baseTable === table.name)
  if (dependent.length > 0) {
    throw new InvalidRequestError(
      `Cannot drop table when materialized views still depend on it (${dependent.map(view => `${keyspace.name}.${view.name}`).join(', ')})`,
      ErrorCode.INVALID_REQUEST,
      { table: table.name }
    )
  }
  keyspace.tables.delete(table.name)
  return changed(context, `DROP TABLE ${keyspace.name}.${table.name}`)
}

export const truncateTable: DdlHandler<TruncateStatement> = (statement, context) => {
  const table = context.catalog.requireWritableTable(statement.table, context.keyspace)
  const count = table.size
  table.truncate()
  logger.debug(`TRUNCATE ${table.keyspace}.${table.name}: ${count} row(s) removed`)
  return ResultSet.empty()
}

// =============================================================================
// User types
// =============================================================================

export const createType: DdlHandler<CreateTypeStatement> = (statement, context) => {
  const { catalog } = context
  const keyspace = requireUserKeyspace(catalog, catalog.keyspaceFor(statement.type, context.keyspace))
  const name = statement.type.name
  if (findByName(keyspace.types, name)) {
    if (statement.ifNotExists) return ResultSet.empty()
    throw new AlreadyExistsError('type', keyspace.name, name)
  }

  assertUniqueNames(statement.fields.map(field => field.name), 'field')
  for (const field of statement.fields) validateType(field.type, keyspace, context)
  const type: UserType = { name, fields: new Map(statement.fields.map(field => [field.name, field.type])) }
  keyspace.types.set(name, type)
  return changed(context, `CREATE TYPE ${keyspace.name}.${name}`)
}

export const dropType: DdlHandler<DropTypeStatement> = (statement, context) => {
  const { catalog } = context
  const keyspace = catalog.keyspaceFor(statement.type, context.keyspace)
  const type = statement.ifExists
    ? findByName(keyspace.types, statement.type.name)
    : catalog.requireType(keyspace, statement.type.name)
  if (!type) return ResultSet.empty()
  requireUserKeyspace(catalog, keyspace)

  for (const table of keyspace.tables.values()) {
    for (const column of table.columns.values()) {
      if (column.type && usesType(column.type, type.name)) {
        throw new InvalidRequestError(
          `Cannot drop user type ${keyspace.name}.${type.name} as it is still used by table ${keyspace.name}.${table.name}`,
          ErrorCode.INVALID_REQUEST,
          { type: type.name, table: table.name }
        )
      }
    }
  }
  keyspace.types.delete(type.name)
  return changed(context, `DROP TYPE ${keyspace.name}.${type.name}`)
}

// =============================================================================
// Indexes
// =============================================================================

function findIndex(keyspace: Keyspace, name: string): { table: Table; index: IndexDefinition } | undefined {
  for (const table of keyspace.tables.values()) {
    const index = findByName(table.indexes, name)
    if (index) return { table, index }
  }
  return undefined
}

export const createIndex: DdlHandler<CreateIndexStatement> = (statement, context) => {
  const { catalog } = context
  const table = catalog.requireWritableTable(statement.table, context.keyspace)
  const keyspace = catalog.requireKeyspace(table.keyspace)
  const column = table.requireColumn(statement.column)
  const name = statement.name ?? `${table.name}_${column.name}_idx`

  if (findIndex(keyspace, name)) {
    if (statement.ifNotExists) return ResultSet.empty()
    throw new AlreadyExistsError('index', keyspace.name, name)
  }
  if (statement.targetKind !== undefined && statement.targetKind !== 'full') {
    const kind = column.type ? unfreeze(column.type).kind : undefined
    if (kind !== undefined && kind !== 'list' && kind !== 'set' && kind !== 'map') {
      throw new InvalidRequestError(
        `Cannot create ${statement.targetKind}() index on ${column.name}, it is not a collection`,
        ErrorCode.INVALID_REQUEST,
        { column: column.name }
      )
    }
  }

  table.indexes.set(name, {
    name,
    column: column.name,
    target: statement.targetKind ? `${statement.targetKind}(${column.name})` : column.name,
    using: statement.using,
  })
  return changed(context, `CREATE INDEX ${name} ON ${keyspace.name}.${table.name} (${column.name})`)
}

export const dropIndex: DdlHandler<DropIndexStatement> = (statement, context) => {
  const keyspace = context.catalog.keyspaceFor(statement.index, context.keyspace)
  const found = findIndex(keyspace, statement.index.name)
  if (!found) {
    if (statement.ifExists) return ResultSet.empty()
    throw new NotFoundError(
      `Index '${statement.index.name}' could not be found in any of the tables of keyspace '${keyspace.name}'`,
      ErrorCode.INDEX_NOT_FOUND,
      { keyspace: keyspace.name, index: statement.index.name }
    )
  }
  found.table.indexes.delete(found.index.name)
  return changed(context, `DROP INDEX ${keyspace.name}.${found.index.name}`)
}

// =============================================================================
// Materialized views
// =============================================================================

export const createView: DdlHandler<CreateViewStatement> = (statement, context) => {
  const { catalog } = context
  const keyspace = requireUserKeyspace(catalog, catalog.keyspaceFor(statement.view, context.keyspace))
  const name = statement.view.name
  if (findByName(keyspace.views, name) || findByName(keyspace.tables, name)) {
    if (statement.ifNotExists) return ResultSet.empty()
    throw new AlreadyExistsError('view', keyspace.name, name)
  }

  const base = catalog.requireTable(
    { keyspace: statement.base.keyspace ?? keyspace.name, name: statement.base.name },
    context.keyspace
  )
  if (base.keyspace.toLowerCase() !== keyspace.name.toLowerCase()) {
    throw new InvalidRequestError(
      'Cannot create a materialized view on a table in a different keyspace',
      ErrorCode.INVALID_REQUEST,
      { view: name, baseTable: base.name }
    )
  }
  const columns = statement.columns.map(column => base.requireColumn(column).name)
  const partitionKey = statement.partitionKey.map(column => base.requireColumn(column).name)
  const clusteringKey = statement.clusteringKey.map(column => base.requireColumn(column).name)
  const where = resolveConditions(statement.where, base, {
    bindings: context.bindings,
    now: context.clock.now,
    resolveType: catalog.typeResolver(keyspace.name),
  })

  keyspace.views.set(name, {
    name,
    keyspace: keyspace.name,
    baseTable: base.name,
    columns,
    where,
    whereClause: statement.whereText,
    partitionKey,
    clusteringKey,
  })
  return changed(context, `CREATE MATERIALIZED VIEW ${keyspace.name}.${name}`)
}

export const dropView: DdlHandler<DropViewStatement> = (statement, context) => {
  const keyspace = context.catalog.keyspaceFor(statement.view, context.keyspace)
  const view = findByName(keyspace.views, statement.view.name)
  if (!view) {
    if (statement.ifExists) return ResultSet.empty()
    throw new NotFoundError(
      `Materialized view '${statement.view.name}' does not exist in keyspace '${keyspace.name}'`,
      ErrorCode.VIEW_NOT_FOUND,
      { keyspace: keyspace.name, view: statement.view.name }
    )
  }
  keyspace.views.delete(view.name)
  return changed(context, `DROP MATERIALIZED VIEW ${keyspace.name}.${view.name}`)
}
