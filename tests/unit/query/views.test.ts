/**
 * Materialized View Tests
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { AlreadyExistsError, ColumnNotFoundError, ErrorCode, NotFoundError } from '../../../src'
import { createUsersContext, rowsOf, type TestContext } from '../../factories'

const CREATE_VIEW =
  'CREATE MATERIALIZED VIEW users_by_age AS SELECT id, age FROM users WHERE age IS NOT NULL AND id IS NOT NULL PRIMARY KEY (age, id)'

describe('materialized views', () => {
  let ctx: TestContext

  beforeEach(() => {
    ctx = createUsersContext()
    ctx.session.execute("INSERT INTO users (id, name, age) VALUES (1, 'Ada', 36)")
    ctx.session.execute("INSERT INTO users (id, name) VALUES (2, 'Bob')")
    ctx.session.execute("INSERT INTO users (id, name, age) VALUES (3, 'Cy', 20)")
    ctx.session.execute(CREATE_VIEW)
  })

  it('reads the selected columns of base rows that pass the view filter', () => {
    const result = ctx.session.execute('SELECT * FROM users_by_age')
    expect(result.columns).toEqual(['id', 'age'])
    expect(rowsOf(result)).toEqual([{ id: 1, age: 36 }, { id: 3, age: 20 }])
  })

  it('combines the view filter with the query filter', () => {
    expect(rowsOf(ctx.session.execute('SELECT id FROM users_by_age WHERE age = 20'))).toEqual([{ id: 3 }])
  })

  it('follows later writes to the base table', () => {
    ctx.session.execute('UPDATE users SET age = 50 WHERE id = 2')
    expect(ctx.session.execute('SELECT id FROM users_by_age').all().map(row => row.get('id'))).toEqual([1, 2, 3])
  })

  it('hides base columns it does not select', () => {
    expect(() => ctx.session.execute('SELECT name FROM users_by_age')).toThrow(ColumnNotFoundError)
  })

  it('exposes every base column for SELECT *', () => {
    ctx.session.execute('CREATE MATERIALIZED VIEW all_users AS SELECT * FROM users WHERE id IS NOT NULL PRIMARY KEY (id)')
    expect(ctx.session.execute('SELECT * FROM all_users').columns).toEqual(['id', 'name', 'age'])
  })

  it('cannot be written to', () => {
    expect(() => ctx.session.execute('INSERT INTO users_by_age (id, age) VALUES (9, 9)')).toThrow(
      'Cannot directly modify a materialized view: test.users_by_age'
    )
  })

  it('is recorded in the metadata and system_schema', () => {
    expect(ctx.db.metadata.keyspace('test')?.views).toEqual({
      users_by_age: { baseTable: 'users', whereClause: 'age IS NOT NULL AND id IS NOT NULL' },
    })
    expect(rowsOf(ctx.session.execute("SELECT view_name, base_table_name FROM system_schema.views WHERE keyspace_name = 'test'")))
      .toEqual([{ view_name: 'users_by_age', base_table_name: 'users' }])
  })

  it('rejects a duplicate name unless IF NOT EXISTS is given', () => {
    expect(() => ctx.session.execute(CREATE_VIEW)).toThrow(AlreadyExistsError)
    expect(() => ctx.session.execute(CREATE_VIEW.replace('VIEW', 'VIEW IF NOT EXISTS'))).not.toThrow()
  })

  it('keeps its base table from being dropped', () => {
    expect(() => ctx.session.execute('DROP TABLE users')).toThrow(
      'Cannot drop table when materialized views still depend on it (test.users_by_age)'
    )
    ctx.session.execute('DROP MATERIALIZED VIEW users_by_age')
    ctx.session.execute('DROP TABLE users')
    expect(ctx.db.getTables('test')).toEqual([])
  })

  it('reports a missing view on DROP', () => {
    try {
      ctx.session.execute('DROP MATERIALIZED VIEW ghosts')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(NotFoundError)
      if (error instanceof NotFoundError) expect(error.code).toBe(ErrorCode.VIEW_NOT_FOUND)
    }
    expect(() => ctx.session.execute('DROP MATERIALIZED VIEW IF EXISTS ghosts')).not.toThrow()
  })
})
