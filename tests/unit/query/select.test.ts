/**
 * SELECT Tests
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { ColumnNotFoundError, JSON_COLUMN, ParameterBindingError, TableNotFoundError } from '../../../src'
import { createTestContext, rowsOf, type TestContext } from '../../factories'

const ORDERS: Array<[number, string, number]> = [
  [1, 'a', 5],
  [2, 'b', 10],
  [3, 'a', 15],
  [4, 'c', 20],
  [5, 'c', 5],
]

describe('SELECT', () => {
  let ctx: TestContext

  beforeEach(() => {
    ctx = createTestContext()
    ctx.session.execute('CREATE TABLE orders (id int PRIMARY KEY, customer text, amount int)')
    const insert = ctx.session.prepare('INSERT INTO orders (id, customer, amount) VALUES (?, ?, ?)')
    for (const order of ORDERS) ctx.session.execute(insert, order)
  })

  const ids = (query: string, params?: readonly unknown[] | Record<string, unknown>): unknown[] =>
    ctx.session.execute(query, params).all().map(row => row.get('id'))

  describe('columns', () => {
    it('returns every column for *', () => {
      const result = ctx.session.execute('SELECT * FROM orders WHERE id = 1')
      expect(result.columns).toEqual(['id', 'customer', 'amount'])
      expect(rowsOf(result)).toEqual([{ id: 1, customer: 'a', amount: 5 }])
    })

    it('names columns as declared, whatever case is used', () => {
      const result = ctx.session.execute('SELECT ID, Customer FROM orders WHERE ID = 1')
      expect(result.columns).toEqual(['id', 'customer'])
    })

    it('applies aliases with and without AS', () => {
      const result = ctx.session.execute('SELECT id AS key, customer buyer FROM orders WHERE id = 2')
      expect(rowsOf(result)).toEqual([{ key: 2, buyer: 'b' }])
    })

    it('rejects unknown columns and tables', () => {
      expect(() => ctx.session.execute('SELECT nope FROM orders')).toThrow(ColumnNotFoundError)
      expect(() => ctx.session.execute('SELECT * FROM orders ORDER BY nope')).toThrow(ColumnNotFoundError)
      expect(() => ctx.session.execute('SELECT * FROM ghosts')).toThrow(TableNotFoundError)
    })

    it('renders rows as JSON', () => {
      const result = ctx.session.execute('SELECT JSON id, customer FROM orders WHERE id = 1')
      expect(result.columns).toEqual([JSON_COLUMN])
      expect(result.one()?.get(JSON_COLUMN)).toBe('{"id":1,"customer":"a"}')
    })
  })

  describe('WHERE', () => {
    it('filters by comparison', () => {
      expect(ids('SELECT id FROM orders WHERE amount >= 10 AND amount < 20')).toEqual([2, 3])
      expect(ids("SELECT id FROM orders WHERE customer != 'c'")).toEqual([1, 2, 3])
    })

    it('filters by IN', () => {
      expect(ids('SELECT id FROM orders WHERE id IN (2, 4)')).toEqual([2, 4])
      expect(ids('SELECT id FROM orders WHERE id IN ?', [[5, 1]])).toEqual([1, 5])
    })

    it('accepts ALLOW FILTERING', () => {
      expect(ids("SELECT id FROM orders WHERE customer = 'a' ALLOW FILTERING")).toEqual([1, 3])
    })

    it('skips rows whose value is null for ordering comparisons', () => {
      ctx.session.execute('INSERT INTO orders (id) VALUES (6)')
      expect(ids('SELECT id FROM orders WHERE amount < 100')).toEqual([1, 2, 3, 4, 5])
    })

    it('filters collections with CONTAINS and CONTAINS KEY', () => {
      ctx.session.execute('CREATE TABLE posts (id int PRIMARY KEY, tags set<text>, meta map<text, text>)')
      ctx.session.execute("INSERT INTO posts (id, tags, meta) VALUES (1, {'a', 'b'}, {'k': 'v'})")
      ctx.session.execute("INSERT INTO posts (id, tags, meta) VALUES (2, {'b'}, {'x': 'y'})")
      expect(ids("SELECT id FROM posts WHERE tags CONTAINS 'a'")).toEqual([1])
      expect(ids("SELECT id FROM posts WHERE tags CONTAINS 'b'")).toEqual([1, 2])
      expect(ids("SELECT id FROM posts WHERE meta CONTAINS KEY 'x'")).toEqual([2])
      expect(ids("SELECT id FROM posts WHERE meta CONTAINS 'v'")).toEqual([1])
    })

    it('rejects CONTAINS on scalar columns', () => {
      expect(() => ctx.session.execute("SELECT id FROM orders WHERE customer CONTAINS 'a'")).toThrow(
        'Cannot use CONTAINS on non-collection column customer'
      )
    })
  })

  describe('ORDER BY and LIMIT', () => {
    it('sorts descending with a stable order for ties', () => {
      expect(ids('SELECT id FROM orders ORDER BY amount DESC')).toEqual([4, 3, 2, 1, 5])
    })

    it('sorts by several columns', () => {
      expect(ids('SELECT id FROM orders ORDER BY amount ASC, id DESC')).toEqual([5, 1, 2, 3, 4])
    })

    it('limits the rows returned', () => {
      expect(ids('SELECT id FROM orders LIMIT 2')).toEqual([1, 2])
      expect(ids('SELECT id FROM orders ORDER BY amount DESC LIMIT ?', [1])).toEqual([4])
    })

    it('binds the limit by position or by name', () => {
      expect(ids('SELECT id FROM orders LIMIT :n', { n: 3 })).toEqual([1, 2, 3])
      expect(ids('SELECT id FROM orders LIMIT ?', { limit: 2 })).toEqual([1, 2])
      expect(ids('SELECT id FROM orders WHERE customer = ? LIMIT ?', ['c', 1])).toEqual([4])
    })

    it('reports a limit parameter that is missing', () => {
      expect(() => ctx.session.execute('SELECT id FROM orders LIMIT :n', {})).toThrow(ParameterBindingError)
      expect(() => ctx.session.execute('SELECT id FROM orders LIMIT :n', {})).toThrow("Missing parameter 'n'")
      expect(() => ctx.session.execute('SELECT id FROM orders LIMIT ?')).toThrow(
        'Statement has 1 placeholder(s) but no parameters were given'
      )
      expect(() => ctx.session.execute('SELECT id FROM orders LIMIT ?', [null])).toThrow(
        'LIMIT must be strictly positive, got null'
      )
    })

    it('rejects a LIMIT below one', () => {
      expect(() => ctx.session.execute('SELECT id FROM orders LIMIT 0')).toThrow('LIMIT must be strictly positive, got 0')
    })
  })

  describe('DISTINCT', () => {
    it('removes duplicate output rows', () => {
      const customers = ctx.session.execute('SELECT DISTINCT customer FROM orders').all().map(row => row.get('customer'))
      expect(customers).toEqual(['a', 'b', 'c'])
    })
  })

  describe('aggregates', () => {
    it('computes aggregates over all rows', () => {
      const result = ctx.session.execute('SELECT SUM(amount), MIN(amount), MAX(amount), AVG(amount), COUNT(*) FROM orders')
      expect(result.columns).toEqual(['sum', 'min', 'max', 'avg', 'count'])
      expect(result.one()?.values()).toEqual([55, 5, 20, 11, 5])
    })

    it('aggregates only the rows matched by WHERE', () => {
      expect(ctx.session.execute("SELECT SUM(amount) AS total FROM orders WHERE customer = 'a'").one()?.get('total')).toBe(20)
    })

    it('returns one row for an empty input', () => {
      ctx.session.execute('TRUNCATE orders')
      const result = ctx.session.execute('SELECT COUNT(*), MIN(amount), MAX(amount), SUM(amount) FROM orders')
      expect(result.all().map(row => row.values())).toEqual([[0, null, null, 0]])
    })

    it('counts distinct values', () => {
      expect(ctx.session.execute('SELECT COUNT(DISTINCT customer) FROM orders').one()?.get('count')).toBe(3)
    })

    it('skips nulls', () => {
      ctx.session.execute('INSERT INTO orders (id) VALUES (6)')
      const row = ctx.session.execute('SELECT COUNT(*) AS all_rows, COUNT(amount) AS priced FROM orders').one()
      expect(row?.toObject()).toEqual({ all_rows: 6, priced: 5 })
    })

    it('rejects non-numeric SUM arguments', () => {
      expect(() => ctx.session.execute('SELECT SUM(customer) FROM orders')).toThrow(
        'Invalid call to sum(): column customer is not numeric'
      )
    })
  })

  describe('GROUP BY', () => {
    it('aggregates each group in first-seen order', () => {
      const result = ctx.session.execute('SELECT customer, SUM(amount) AS total FROM orders GROUP BY customer')
      expect(rowsOf(result)).toEqual([
        { customer: 'a', total: 20 },
        { customer: 'b', total: 10 },
        { customer: 'c', total: 25 },
      ])
    })

    it('filters groups with HAVING', () => {
      const result = ctx.session.execute('SELECT customer, COUNT(*) FROM orders GROUP BY customer HAVING COUNT(*) > 1')
      expect(result.all().map(row => row.values())).toEqual([['a', 2], ['c', 2]])
    })

    it('combines HAVING conditions', () => {
      const result = ctx.session.execute(
        'SELECT customer FROM orders GROUP BY customer HAVING SUM(amount) >= 20 AND MAX(amount) < 20'
      )
      expect(result.all().map(row => row.get('customer'))).toEqual(['a'])
    })
  })
})
