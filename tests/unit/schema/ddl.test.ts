/**
 * Definition Statement Tests
 *
 * Keyspaces, tables, user types and indexes through the session surface.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import {
  AlreadyExistsError,
  ColumnNotFoundError,
  CqlSyntaxError,
  ErrorCode,
  InvalidRequestError,
  KeyspaceNotFoundError,
  MemCQL,
  NotFoundError,
  TableNotFoundError,
  type Session,
} from '../../../src'
import { createTestContext, rowsOf, type TestContext } from '../../factories'

describe('keyspaces', () => {
  let ctx: TestContext

  beforeEach(() => {
    ctx = createTestContext()
  })

  it('creates a keyspace with its replication and durable writes', () => {
    ctx.session.execute(
      "CREATE KEYSPACE app WITH REPLICATION = {'class': 'NetworkTopologyStrategy', 'dc1': 3} AND DURABLE_WRITES = false"
    )
    expect(ctx.db.metadata.keyspace('app')).toMatchObject({
      name: 'app',
      replication: { class: 'NetworkTopologyStrategy', dc1: '3' },
      durableWrites: false,
    })
  })

  it('falls back to the default replication', () => {
    ctx.session.execute('CREATE KEYSPACE plain')
    expect(ctx.db.metadata.keyspace('plain')?.replication).toEqual({ class: 'SimpleStrategy', replication_factor: '1' })
  })

  it('rejects a duplicate keyspace unless IF NOT EXISTS is given', () => {
    expect(() => ctx.session.execute('CREATE KEYSPACE test')).toThrow(AlreadyExistsError)
    expect(() => ctx.session.execute('CREATE KEYSPACE IF NOT EXISTS test')).not.toThrow()
  })

  it('drops keyspaces and honours IF EXISTS', () => {
    ctx.session.execute('CREATE KEYSPACE gone')
    ctx.session.execute('DROP KEYSPACE gone')
    expect(ctx.db.getKeyspaces()).not.toContain('gone')
    expect(() => ctx.session.execute('DROP KEYSPACE gone')).toThrow(KeyspaceNotFoundError)
    expect(() => ctx.session.execute('DROP KEYSPACE IF EXISTS gone')).not.toThrow()
  })

  it('never drops a system keyspace', () => {
    expect(() => ctx.session.execute('DROP KEYSPACE system')).toThrow("Cannot drop system keyspace 'system'")
    expect(() => ctx.session.execute('DROP KEYSPACE IF EXISTS system_schema')).toThrow(InvalidRequestError)
  })

  it('alters replication', () => {
    ctx.session.execute("ALTER KEYSPACE test WITH REPLICATION = {'class': 'SimpleStrategy', 'replication_factor': 2}")
    expect(ctx.db.metadata.keyspace('test')?.replication.replication_factor).toBe('2')
  })

  it('switches the session keyspace with USE', () => {
    ctx.session.execute('CREATE KEYSPACE other')
    ctx.session.execute('USE other')
    expect(ctx.session.keyspace).toBe('other')
    expect(() => ctx.session.execute('USE missing')).toThrow(KeyspaceNotFoundError)
  })
})

describe('tables', () => {
  let ctx: TestContext
  let session: Session

  beforeEach(() => {
    ctx = createTestContext()
    session = ctx.session
  })

  it('requires a keyspace', () => {
    const bare = new MemCQL().connect()
    expect(() => bare.execute('CREATE TABLE t (id int PRIMARY KEY)')).toThrow(
      "No keyspace has been specified for 't'. USE a keyspace, or explicitly specify keyspace.tablename"
    )
  })

  it('creates tables in a named keyspace', () => {
    const bare = ctx.db.connect()
    bare.execute('CREATE TABLE test.t (id int PRIMARY KEY)')
    expect(ctx.db.getTables('test')).toEqual(['t'])
  })

  it('fails for an unknown keyspace', () => {
    expect(() => session.execute('CREATE TABLE nowhere.t (id int PRIMARY KEY)')).toThrow(KeyspaceNotFoundError)
  })

  it('records primary key layout and clustering order', () => {
    session.execute(
      'CREATE TABLE events (tenant text, day date, seq int, payload text, PRIMARY KEY ((tenant, day), seq)) WITH CLUSTERING ORDER BY (seq DESC)'
    )
    const table = ctx.db.metadata.keyspace('test')?.tables.events
    expect(table?.partitionKey).toEqual(['tenant', 'day'])
    expect(table?.clusteringKey).toEqual(['seq'])
    expect(table?.clusteringOrder).toEqual({ seq: 'DESC' })
    expect(table?.columns).toEqual([
      { name: 'tenant', type: 'text', kind: 'partition_key' },
      { name: 'day', type: 'date', kind: 'partition_key' },
      { name: 'seq', type: 'int', kind: 'clustering' },
      { name: 'payload', type: 'text', kind: 'regular' },
    ])
  })

  it('keeps table options', () => {
    session.execute("CREATE TABLE t (id int PRIMARY KEY) WITH comment = 'notes' AND default_time_to_live = 60")
    expect(ctx.db.metadata.keyspace('test')?.tables.t?.options).toEqual({ comment: 'notes', default_time_to_live: 60 })
  })

  it('rejects a duplicate table unless IF NOT EXISTS is given', () => {
    session.execute('CREATE TABLE t (id int PRIMARY KEY)')
    expect(() => session.execute('CREATE TABLE t (id int PRIMARY KEY)')).toThrow(
      "Table 't' already exists in keyspace 'test'"
    )
    expect(() => session.execute('CREATE TABLE IF NOT EXISTS t (id int PRIMARY KEY, extra text)')).not.toThrow()
    expect(ctx.db.metadata.keyspace('test')?.tables.t?.columns).toHaveLength(1)
  })

  it('validates the primary key', () => {
    expect(() => session.execute('CREATE TABLE t (id int, PRIMARY KEY (missing))')).toThrow(
      'Unknown definition missing referenced in PRIMARY KEY'
    )
    expect(() => session.execute('CREATE TABLE t (id counter PRIMARY KEY)')).toThrow(InvalidRequestError)
    expect(() => session.execute('CREATE TABLE t (id int PRIMARY KEY, id text)')).toThrow('Multiple definition of identifier id')
  })

  it('rejects mixing counter and regular columns', () => {
    expect(() => session.execute('CREATE TABLE t (id int PRIMARY KEY, hits counter, name text)')).toThrow(
      'Cannot mix counter and non counter columns in the same table'
    )
  })

  it('rejects static columns without clustering columns', () => {
    expect(() => session.execute('CREATE TABLE t (id int PRIMARY KEY, s text STATIC)')).toThrow(InvalidRequestError)
  })

  it('rejects clustering order on a non-clustering column', () => {
    expect(() => session.execute('CREATE TABLE t (a int, b int, PRIMARY KEY (a, b)) WITH CLUSTERING ORDER BY (a DESC)'))
      .toThrow('Only clustering key columns can be defined in CLUSTERING ORDER directive: a')
  })

  describe('ALTER TABLE', () => {
    beforeEach(() => {
      session.execute('CREATE TABLE users (id int PRIMARY KEY, name text)')
      session.execute("INSERT INTO users (id, name) VALUES (1, 'Ada')")
    })

    it('adds columns that read as null on existing rows', () => {
      session.execute('ALTER TABLE users ADD email text, tags set<text>')
      expect(rowsOf(session.execute('SELECT * FROM users'))).toEqual([
        { id: 1, name: 'Ada', email: null, tags: null },
      ])
    })

    it('rejects a column that already exists', () => {
      expect(() => session.execute('ALTER TABLE users ADD NAME text')).toThrow(
        'Invalid column name NAME because it conflicts with an existing column'
      )
    })

    it('drops regular columns but not key columns', () => {
      session.execute('ALTER TABLE users DROP name')
      expect(rowsOf(session.execute('SELECT * FROM users'))).toEqual([{ id: 1 }])
      expect(() => session.execute('ALTER TABLE users DROP id')).toThrow('Cannot drop PRIMARY KEY part id')
      expect(() => session.execute('ALTER TABLE users DROP nope')).toThrow(ColumnNotFoundError)
    })

    it('merges options', () => {
      session.execute("ALTER TABLE users WITH comment = 'people'")
      expect(ctx.db.metadata.keyspace('test')?.tables.users?.options).toEqual({ comment: 'people' })
    })

    it('reports an unknown table as a syntax error', () => {
      try {
        session.execute('ALTER TABLE ghosts ADD x int')
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(CqlSyntaxError)
        if (error instanceof CqlSyntaxError) expect(error.code).toBe(ErrorCode.SYNTAX_ERROR)
      }
    })
  })

  it('drops tables and honours IF EXISTS', () => {
    session.execute('CREATE TABLE t (id int PRIMARY KEY)')
    session.execute('DROP TABLE t')
    expect(ctx.db.getTables('test')).toEqual([])
    expect(() => session.execute('DROP TABLE t')).toThrow(TableNotFoundError)
    expect(() => session.execute('DROP TABLE IF EXISTS t')).not.toThrow()
  })

  it('truncates rows but keeps the table', () => {
    session.execute('CREATE TABLE t (id int PRIMARY KEY)')
    session.execute('INSERT INTO t (id) VALUES (1)')
    session.execute('TRUNCATE TABLE t')
    expect(session.execute('SELECT * FROM t').length).toBe(0)
    expect(ctx.db.getTables('test')).toEqual(['t'])
  })

  it('refuses to modify system tables', () => {
    expect(() => session.execute('TRUNCATE system.local')).toThrow("Modification of system keyspace 'system' is not allowed")
    expect(() => session.execute('CREATE TABLE system_schema.t (id int PRIMARY KEY)')).toThrow(InvalidRequestError)
  })
})

describe('user types', () => {
  let session: Session

  beforeEach(() => {
    session = createTestContext().session
    session.execute('CREATE TYPE address (street text, zip int)')
  })

  it('stores user type values with typed fields', () => {
    session.execute('CREATE TABLE homes (id int PRIMARY KEY, addr frozen<address>)')
    session.execute("INSERT INTO homes (id, addr) VALUES (1, {street: 'Main', zip: '12345'})")
    expect(session.execute('SELECT addr FROM homes').one()?.get('addr')).toEqual({ street: 'Main', zip: 12345 })
  })

  it('rejects columns of unknown types', () => {
    try {
      session.execute('CREATE TABLE t (id int PRIMARY KEY, loc location)')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(NotFoundError)
      if (error instanceof NotFoundError) expect(error.code).toBe(ErrorCode.TYPE_NOT_FOUND)
    }
  })

  it('rejects a duplicate type unless IF NOT EXISTS is given', () => {
    expect(() => session.execute('CREATE TYPE address (x int)')).toThrow(AlreadyExistsError)
    expect(() => session.execute('CREATE TYPE IF NOT EXISTS address (x int)')).not.toThrow()
  })

  it('refuses to drop a type that is still in use', () => {
    session.execute('CREATE TABLE homes (id int PRIMARY KEY, addrs list<frozen<address>>)')
    expect(() => session.execute('DROP TYPE address')).toThrow(
      'Cannot drop user type test.address as it is still used by table test.homes'
    )
    session.execute('DROP TABLE homes')
    session.execute('DROP TYPE address')
    expect(() => session.execute('DROP TYPE address')).toThrow(NotFoundError)
    expect(() => session.execute('DROP TYPE IF EXISTS address')).not.toThrow()
  })
})

describe('indexes', () => {
  let ctx: TestContext

  beforeEach(() => {
    ctx = createTestContext()
    ctx.session.execute('CREATE TABLE users (id int PRIMARY KEY, name text, tags map<text, text>)')
  })

  it('names indexes after table and column by default', () => {
    ctx.session.execute('CREATE INDEX ON users (name)')
    ctx.session.execute('CREATE INDEX tag_keys ON users (KEYS(tags))')
    expect(ctx.db.metadata.keyspace('test')?.tables.users?.indexes).toEqual([
      { name: 'users_name_idx', target: 'name' },
      { name: 'tag_keys', target: 'keys(tags)' },
    ])
  })

  it('rejects duplicate index names unless IF NOT EXISTS is given', () => {
    ctx.session.execute('CREATE INDEX by_name ON users (name)')
    expect(() => ctx.session.execute('CREATE INDEX by_name ON users (name)')).toThrow(AlreadyExistsError)
    expect(() => ctx.session.execute('CREATE INDEX IF NOT EXISTS by_name ON users (name)')).not.toThrow()
  })

  it('rejects collection targets on scalar columns', () => {
    expect(() => ctx.session.execute('CREATE INDEX ON users (values(name))')).toThrow(
      'Cannot create values() index on name, it is not a collection'
    )
  })

  it('drops indexes and honours IF EXISTS', () => {
    ctx.session.execute('CREATE INDEX ON users (name)')
    ctx.session.execute('DROP INDEX users_name_idx')
    expect(ctx.db.metadata.keyspace('test')?.tables.users?.indexes).toEqual([])
    try {
      ctx.session.execute('DROP INDEX users_name_idx')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(NotFoundError)
      if (error instanceof NotFoundError) expect(error.code).toBe(ErrorCode.INDEX_NOT_FOUND)
    }
    expect(() => ctx.session.execute('DROP INDEX IF EXISTS users_name_idx')).not.toThrow()
  })
})
