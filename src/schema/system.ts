/**
 * Reserved Keyspaces
 *
 * `system.local` describes the emulated node. `system_schema` reflects the
 * live catalog and is regenerated wholesale after every definition change.
 *
 * @module schema/system
 */

import { parseType } from '../parser/parser'
import { formatCqlType, type CqlValue } from '../values/types'
import type { Catalog, Keyspace } from './catalog'
import { Table, type StoredRow } from './table'

export interface NodeIdentity {
  clusterName: string
  dataCenter: string
  rack: string
  rpcAddress: string
  releaseVersion: string
}

export const RESERVED_KEYSPACES: readonly string[] = ['system', 'system_schema']

export const DEFAULT_REPLICATION: Readonly<Record<string, string>> = {
  class: 'SimpleStrategy',
  replication_factor: '1',
}

interface SystemTableSpec {
  name: string
  columns: Array<[string, string]>
  partitionKey: string[]
  clusteringKey: string[]
}

const SYSTEM_SCHEMA_TABLES: SystemTableSpec[] = [
  {
    name: 'keyspaces',
    columns: [['keyspace_name', 'text'], ['durable_writes', 'boolean'], ['replication', 'map<text, text>']],
    partitionKey: ['keyspace_name'],
    clusteringKey: [],
  },
  {
    name: 'tables',
    columns: [['keyspace_name', 'text'], ['table_name', 'text']],
    partitionKey: ['keyspace_name'],
    clusteringKey: ['table_name'],
  },
  {
    name: 'columns',
    columns: [
      ['keyspace_name', 'text'],
      ['table_name', 'text'],
      ['column_name', 'text'],
      ['kind', 'text'],
      ['type', 'text'],
    ],
    partitionKey: ['keyspace_name'],
    clusteringKey: ['table_name', 'column_name'],
  },
  {
    name: 'indexes',
    columns: [['keyspace_name', 'text'], ['table_name', 'text'], ['index_name', 'text'], ['target', 'text']],
    partitionKey: ['keyspace_name'],
    clusteringKey: ['table_name', 'index_name'],
  },
  {
    name: 'views',
    columns: [
      ['keyspace_name', 'text'],
      ['view_name', 'text'],
      ['base_table_name', 'text'],
      ['where_clause', 'text'],
    ],
    partitionKey: ['keyspace_name'],
    clusteringKey: ['view_name'],
  },
  {
    name: 'types',
    columns: [
      ['keyspace_name', 'text'],
      ['type_name', 'text'],
      ['field_names', 'frozen<list<text>>'],
      ['field_types', 'frozen<list<text>>'],
    ],
    partitionKey: ['keyspace_name'],
    clusteringKey: ['type_name'],
  },
]

function systemTable(keyspace: string, spec: SystemTableSpec): Table {
  return new Table(keyspace, spec.name, {
    columns: spec.columns.map(([name, type]) => ({ name, type: parseType(type) })),
    partitionKey: spec.partitionKey,
    clusteringKey: spec.clusteringKey,
    readOnly: true,
  })
}

function row(values: Record<string, CqlValue>): StoredRow {
  return { values: new Map(Object.entries(values)), writeTime: 0 }
}

function reservedKeyspace(name: string, tables: Table[]): Keyspace {
  return {
    name,
    replication: { ...DEFAULT_REPLICATION },
    durableWrites: true,
    tables: new Map(tables.map(table => [table.name, table])),
    types: new Map(),
    views: new Map(),
    reserved: true,
  }
}

/**
 * Build fresh `system` and `system_schema` keyspaces
 */
export function createSystemKeyspaces(identity: NodeIdentity): Keyspace[] {
  const local = new Table('system', 'local', {
    columns: [
      { name: 'key', type: parseType('text') },
      { name: 'rpc_address', type: parseType('inet') },
      { name: 'data_center', type: parseType('text') },
      { name: 'rack', type: parseType('text') },
      { name: 'cluster_name', type: parseType('text') },
      { name: 'release_version', type: parseType('text') },
    ],
    partitionKey: ['key'],
    readOnly: true,
  })
  local.put(row({
    key: 'local',
    rpc_address: identity.rpcAddress,
    data_center: identity.dataCenter,
    rack: identity.rack,
    cluster_name: identity.clusterName,
    release_version: identity.releaseVersion,
  }))

  return [
    reservedKeyspace('system', [local]),
    reservedKeyspace('system_schema', SYSTEM_SCHEMA_TABLES.map(spec => systemTable('system_schema', spec))),
  ]
}

/**
 * Rebuild every `system_schema` table from the live catalog
 */
export function refreshSystemSchema(catalog: Catalog): void {
  const schema = catalog.findKeyspace('system_schema')
  if (!schema) return

  const keyspaces: StoredRow[] = []
  const tables: StoredRow[] = []
  const columns: StoredRow[] = []
  const indexes: StoredRow[] = []
  const views: StoredRow[] = []
  const types: StoredRow[] = []

  for (const keyspace of catalog.listKeyspaces()) {
    keyspaces.push(row({
      keyspace_name: keyspace.name,
      durable_writes: keyspace.durableWrites,
      replication: { ...keyspace.replication },
    }))

    for (const table of keyspace.tables.values()) {
      tables.push(row({ keyspace_name: keyspace.name, table_name: table.name }))

      for (const column of table.columns.values()) {
        columns.push(row({
          keyspace_name: keyspace.name,
          table_name: table.name,
          column_name: column.name,
          kind: column.kind,
          type: column.type ? formatCqlType(column.type) : 'text',
        }))
      }

      for (const index of table.indexes.values()) {
        indexes.push(row({
          keyspace_name: keyspace.name,
          table_name: table.name,
          index_name: index.name,
          target: index.target,
        }))
      }
    }

    for (const view of keyspace.views.values()) {
      views.push(row({
        keyspace_name: keyspace.name,
        view_name: view.name,
        base_table_name: view.baseTable,
        where_clause: view.whereClause,
      }))
    }

    for (const type of keyspace.types.values()) {
      types.push(row({
        keyspace_name: keyspace.name,
        type_name: type.name,
        field_names: [...type.fields.keys()],
        field_types: [...type.fields.values()].map(formatCqlType),
      }))
    }
  }

  const generated: Record<string, StoredRow[]> = { keyspaces, tables, columns, indexes, views, types }
  for (const [name, rows] of Object.entries(generated)) {
    schema.tables.get(name)?.replaceRows(rows)
  }
}
