/**
 * INSERT Tests
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { ColumnNotFoundError, InvalidRequestError } from '../../../src'
import { CLOCK_START, createUsersContext, rowsOf, type TestContext } from '../../factories'

describe('INSERT', () => {
  let ctx: TestContext

  beforeEach(() => {
    ctx = createUsersContext()
  })

  const names = (): unknown[] => ctx.session.execute('SELECT name FROM users').all().map(row => row.get('name'))

  it('stores a row', () => {
    ctx.session.execute("INSERT INTO users (id, name, age) VALUES (1, 'Ada', 36)")
    expect(rowsOf(ctx.session.execute('SELECT * FROM users'))).toEqual([{ id: 1, name: 'Ada', age: 36 }])
  })

  it('returns an empty result', () => {
    const result = ctx.session.execute("INSERT INTO users (id, name) VALUES (1, 'Ada')")
    expect(result.columns).toEqual([])
    expect(result.length).toBe(0)
  })

  it('casts bound parameters to the column types', () => {
    ctx.session.execute('INSERT INTO users (id, name, age) VALUES (?, ?, ?)', ['2', 'Bob', '41'])
    expect(rowsOf(ctx.session.execute('SELECT * FROM users'))).toEqual([{ id: 2, name: 'Bob', age: 41 }])
  })

  it('resolves column names case-insensitively', () => {
    ctx.session.execute("INSERT INTO users (ID, Name) VALUES (1, 'Ada')")
    expect(rowsOf(ctx.session.execute('SELECT id, name FROM users'))).toEqual([{ id: 1, name: 'Ada' }])
  })

  it('merges into an existing row with the same key', () => {
    ctx.session.execute("INSERT INTO users (id, name, age) VALUES (1, 'Ada', 36)")
    ctx.session.execute("INSERT INTO users (id, name) VALUES (1, 'Ada L.')")
    expect(rowsOf(ctx.session.execute('SELECT * FROM users'))).toEqual([{ id: 1, name: 'Ada L.', age: 36 }])
  })

  it('keeps rows in insertion order', () => {
    ctx.session.execute("INSERT INTO users (id, name) VALUES (3, 'c')")
    ctx.session.execute("INSERT INTO users (id, name) VALUES (1, 'a')")
    ctx.session.execute("INSERT INTO users (id, name) VALUES (2, 'b')")
    expect(names()).toEqual(['c', 'a', 'b'])
  })

  describe('primary key', () => {
    it('requires every partition key column', () => {
      expect(() => ctx.session.execute("INSERT INTO users (name) VALUES ('x')")).toThrow(
        'Some partition key parts are missing: id'
      )
    })

    it('requires every clustering column', () => {
      ctx.session.execute('CREATE TABLE events (tenant text, seq int, body text, PRIMARY KEY (tenant, seq))')
      expect(() => ctx.session.execute("INSERT INTO events (tenant, body) VALUES ('t', 'b')")).toThrow(
        'Some clustering keys are missing: seq'
      )
    })

    it('rejects null key values', () => {
      expect(() => ctx.session.execute("INSERT INTO users (id, name) VALUES (null, 'x')")).toThrow(
        'Invalid null value for primary key column id'
      )
    })

    it('rejects a column given twice', () => {
      expect(() => ctx.session.execute('INSERT INTO users (id, ID) VALUES (1, 2)')).toThrow(
        'Multiple definitions found for column id'
      )
    })
  })

  describe('undeclared columns', () => {
    it('are added after the declared columns', () => {
      ctx.session.execute("INSERT INTO users (id, email) VALUES (1, 'ada@example.com')")
      expect(rowsOf(ctx.session.execute('SELECT * FROM users'))).toEqual([
        { id: 1, name: null, age: null, email: 'ada@example.com' },
      ])
    })

    it('are not added by a statement that fails', () => {
      expect(() => ctx.session.execute("INSERT INTO users (name, extra) VALUES ('x', 1)")).toThrow(
        'Some partition key parts are missing: id'
      )
      expect(() => ctx.session.execute('INSERT INTO users (id, extra) VALUES (1, 2) USING TTL -1')).toThrow(InvalidRequestError)
      expect(() => ctx.session.execute('INSERT INTO users (id, extra, EXTRA) VALUES (1, 2, 3)')).toThrow(
        'Multiple definitions found for column extra'
      )
      expect(ctx.session.execute('SELECT * FROM users').columns).toEqual(['id', 'name', 'age'])
    })

    it('are rejected under strictSchema', () => {
      const strict = createUsersContext({ strictSchema: true })
      expect(() => strict.session.execute("INSERT INTO users (id, email) VALUES (1, 'ada@example.com')"))
        .toThrow(ColumnNotFoundError)
    })
  })

  describe('write timestamps', () => {
    it('defaults to the clock in microseconds', () => {
      ctx.session.execute("INSERT INTO users (id, name) VALUES (1, 'Ada')")
      expect(ctx.session.execute('SELECT WRITETIME(name) FROM users').one()?.get('writetime(name)')).toBe(CLOCK_START * 1000)
    })

    it('keeps the newest write', () => {
      ctx.session.execute("INSERT INTO users (id, name) VALUES (1, 'a') USING TIMESTAMP 2000")
      ctx.session.execute("INSERT INTO users (id, name) VALUES (1, 'b') USING TIMESTAMP 1000")
      expect(names()).toEqual(['a'])

      // an equal timestamp does not overwrite
      ctx.session.execute("INSERT INTO users (id, name) VALUES (1, 'c') USING TIMESTAMP 2000")
      expect(names()).toEqual(['a'])

      ctx.session.execute("INSERT INTO users (id, name) VALUES (1, 'd') USING TIMESTAMP 3000")
      expect(names()).toEqual(['d'])
      expect(ctx.session.execute('SELECT WRITETIME(name) AS wt FROM users').one()?.get('wt')).toBe(3000)
    })
  })

  describe('64-bit keys', () => {
    beforeEach(() => {
      ctx.session.execute('CREATE TABLE ledger (id bigint PRIMARY KEY, note text, total varint)')
    })

    it('keeps keys apart that differ past the safe integer range', () => {
      ctx.session.execute("INSERT INTO ledger (id, note) VALUES (9007199254740992, 'a')")
      ctx.session.execute("INSERT INTO ledger (id, note) VALUES (9007199254740993, 'b')")
      ctx.session.execute("INSERT INTO ledger (id, note) VALUES (9223372036854775807, 'max')")
      ctx.session.execute("INSERT INTO ledger (id, note) VALUES (-9223372036854775808, 'min')")
      expect(rowsOf(ctx.session.execute('SELECT id, note FROM ledger'))).toEqual([
        { id: 9007199254740992n, note: 'a' },
        { id: 9007199254740993n, note: 'b' },
        { id: 9223372036854775807n, note: 'max' },
        { id: -9223372036854775808n, note: 'min' },
      ])
      expect(ctx.session.execute('SELECT note FROM ledger WHERE id = 9007199254740993').one()?.get('note')).toBe('b')
    })

    it('stores values in the safe range as numbers', () => {
      ctx.session.execute('INSERT INTO ledger (id, total) VALUES (?, ?)', [42n, '123456789012345678901234567890'])
      expect(rowsOf(ctx.session.execute('SELECT id, total FROM ledger'))).toEqual([
        { id: 42, total: 123456789012345678901234567890n },
      ])
    })

    it('matches bound bigints and digit strings to the same key', () => {
      ctx.session.execute('INSERT INTO ledger (id, note) VALUES (?, ?)', [1234567890123456789n, 'x'])
      ctx.session.execute('INSERT INTO ledger (id, note) VALUES (?, ?)', ['1234567890123456789', 'y'])
      expect(rowsOf(ctx.session.execute('SELECT id, note FROM ledger'))).toEqual([{ id: 1234567890123456789n, note: 'y' }])
    })

    it('rejects values outside the 64-bit range and numbers that lost precision', () => {
      expect(() => ctx.session.execute("INSERT INTO ledger (id, note) VALUES (9223372036854775808, 'x')")).toThrow(
        "Invalid bigint value 9223372036854775808 for column 'id'"
      )
      expect(() => ctx.session.execute('INSERT INTO ledger (id) VALUES (?)', [2 ** 53])).toThrow(
        "Invalid bigint value 9007199254740992 for column 'id'"
      )
      expect(ctx.session.execute('SELECT * FROM ledger').length).toBe(0)
    })

    it('writes large values to JSON as digit strings', () => {
      ctx.session.execute("INSERT INTO ledger (id, note) VALUES (9007199254740993, 'b')")
      expect(ctx.session.execute('SELECT JSON id, note FROM ledger').one()?.get('[json]')).toBe(
        '{"id":"9007199254740993","note":"b"}'
      )
    })
  })

  describe('TTL', () => {
    it('expires rows once the TTL has elapsed', () => {
      ctx.session.execute("INSERT INTO users (id, name) VALUES (1, 'Ada') USING TTL 1")
      ctx.clock.advance(999)
      expect(ctx.session.execute('SELECT * FROM users').length).toBe(1)
      ctx.clock.advance(1)
      expect(ctx.session.execute('SELECT * FROM users').length).toBe(0)
      expect(ctx.db.getTableRows('test', 'users')).toEqual([])
    })

    it('reports the remaining seconds, rounded up', () => {
      ctx.session.execute("INSERT INTO users (id, name) VALUES (1, 'Ada') USING TTL 100")
      ctx.session.execute("INSERT INTO users (id, name) VALUES (2, 'Bob')")
      ctx.clock.advance(30_500)
      expect(ctx.session.execute('SELECT id, TTL(name) FROM users').all().map(row => row.values())).toEqual([
        [1, 70],
        [2, null],
      ])
    })

    it('keeps the previous expiry when a later write sets none', () => {
      ctx.session.execute("INSERT INTO users (id, name) VALUES (1, 'Ada') USING TTL 10")
      ctx.session.execute("INSERT INTO users (id, name) VALUES (1, 'Ada L.')")
      expect(ctx.session.execute('SELECT TTL(name) FROM users').one()?.get('ttl(name)')).toBe(10)
    })

    it('applies the table default TTL', () => {
      ctx.session.execute('CREATE TABLE sessions (id int PRIMARY KEY, token text) WITH default_time_to_live = 60')
      ctx.session.execute("INSERT INTO sessions (id, token) VALUES (1, 'test-token')")
      expect(ctx.session.execute('SELECT TTL(token) FROM sessions').one()?.get('ttl(token)')).toBe(60)
    })

    it('treats TTL 0 as no expiry', () => {
      ctx.session.execute("INSERT INTO users (id, name) VALUES (1, 'Ada') USING TTL 0")
      expect(ctx.session.execute('SELECT TTL(name) FROM users').one()?.get('ttl(name)')).toBeNull()
    })

    it('rejects negative and oversized values', () => {
      expect(() => ctx.session.execute('INSERT INTO users (id) VALUES (?) USING TTL ?', [1, -1])).toThrow(
        'A TTL must be greater or equal to 0, but was -1'
      )
      expect(() => ctx.session.execute('INSERT INTO users (id) VALUES (1) USING TTL 630720001')).toThrow(
        'ttl is too large. requested (630720001) maximum (630720000)'
      )
    })

    it('accepts TTL and TIMESTAMP together', () => {
      ctx.session.execute("INSERT INTO users (id, name) VALUES (1, 'Ada') USING TTL 5 AND TIMESTAMP 1234")
      const row = ctx.session.execute('SELECT TTL(name) AS ttl, WRITETIME(name) AS wt FROM users').one()
      expect(row?.toObject()).toEqual({ ttl: 5, wt: 1234 })
    })
  })

  describe('JSON', () => {
    it('inserts the fields of a JSON object', () => {
      ctx.session.execute('INSERT INTO users JSON \'{"id": 3, "name": "Cy"}\'')
      expect(rowsOf(ctx.session.execute('SELECT * FROM users'))).toEqual([{ id: 3, name: 'Cy', age: null }])
    })

    it('accepts a bound JSON string', () => {
      ctx.session.execute('INSERT INTO users JSON ?', ['{"id": 4, "age": "50"}'])
      expect(rowsOf(ctx.session.execute('SELECT id, age FROM users'))).toEqual([{ id: 4, age: 50 }])
    })

    it('rejects text that is not a JSON object', () => {
      expect(() => ctx.session.execute("INSERT INTO users JSON '{broken'")).toThrow(/^Could not decode JSON string/)
      expect(() => ctx.session.execute("INSERT INTO users JSON '[1]'")).toThrow('INSERT JSON requires a JSON object')
    })
  })

  it('rejects writes to an unknown table', () => {
    expect(() => ctx.session.execute('INSERT INTO ghosts (id) VALUES (1)')).toThrow(InvalidRequestError)
  })
})
