/**
 * Statement Dispatcher
 *
 * Parses a statement, binds its parameters and routes it to the catalog,
 * mutation or query handler for its kind.
 *
 * @module engine/dispatcher
 */

import type { ParsedStatement, Statement } from '../parser/ast'
import { bindParameters, type StatementParameters } from '../parser/bindings'
import { parseStatement } from '../parser/parser'
import { executeSelect } from '../query/select'
import type { ResultSet } from '../result'
import * as ddl from '../schema/ddl'
import { logger } from '../utils/logger'
import { executeBatch, executeMutation } from './batch'
import type { ExecutionContext, SessionScope } from './context'

/**
 * Route a parsed statement to its handler
 */
export function dispatch(statement: Statement, context: ExecutionContext): ResultSet {
  switch (statement.kind) {
    case 'create_keyspace':
      return ddl.createKeyspace(statement, context)
    case 'alter_keyspace':
      return ddl.alterKeyspace(statement, context)
    case 'drop_keyspace':
      return ddl.dropKeyspace(statement, context)
    case 'use':
      return ddl.useKeyspace(statement, context)
    case 'create_table':
      return ddl.createTable(statement, context)
    case 'alter_table':
      return ddl.alterTable(statement, context)
    case 'drop_table':
      return ddl.dropTable(statement, context)
    case 'truncate':
      return ddl.truncateTable(statement, context)
    case 'create_type':
      return ddl.createType(statement, context)
    case 'drop_type':
      return ddl.dropType(statement, context)
    case 'create_index':
      return ddl.createIndex(statement, context)
    case 'drop_index':
      return ddl.dropIndex(statement, context)
    case 'create_view':
      return ddl.createView(statement, context)
    case 'drop_view':
      return ddl.dropView(statement, context)
    case 'insert':
    case 'update':
    case 'delete':
      return executeMutation(statement, context)
    case 'batch':
      return executeBatch(statement, context)
    case 'select':
      return executeSelect(statement, context)
  }
}

/**
 * Parse, bind and execute one statement
 *
 * @param query - Statement text, or a statement parsed ahead of time
 * @param params - Positional values or a name/value mapping
 * @throws CqlSyntaxError if the statement cannot be parsed
 * @throws ParameterBindingError if the parameters do not match the placeholders
 * @throws InvalidRequestError if the statement is rejected
 */
export function executeStatement(
  query: string | ParsedStatement,
  params: StatementParameters | undefined,
  scope: SessionScope
): ResultSet {
  const parsed = typeof query === 'string' ? parseStatement(query) : query
  const bindings = bindParameters(parsed.markers, params)
  const context: ExecutionContext = {
    catalog: scope.catalog,
    config: scope.config,
    clock: scope.clock,
    keyspace: scope.keyspace,
    bindings,
    useKeyspace: name => scope.useKeyspace(name),
  }

  logger.debug(`Executing ${parsed.statement.kind}: ${parsed.text.trim()}`)
  return dispatch(parsed.statement, context)
}
