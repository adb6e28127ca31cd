/**
 * SELECT Validation Tests
 */

import { describe, it, expect } from 'vitest'
import { InvalidRequestError } from '../../../src/errors'
import type { SelectStatement } from '../../../src/parser/ast'
import { parseStatement } from '../../../src/parser/parser'
import { validateSelect } from '../../../src/query/validate'
import { createTestContext } from '../../factories'

function select(text: string): SelectStatement {
  const { statement } = parseStatement(text)
  if (statement.kind !== 'select') throw new Error(`not a SELECT: ${text}`)
  return statement
}

const check = (text: string) => () => validateSelect(select(text))

describe('validateSelect', () => {
  it('accepts plain, grouped and aggregate queries', () => {
    expect(check('SELECT * FROM t WHERE a = 1 ORDER BY b LIMIT 3')).not.toThrow()
    expect(check('SELECT a, COUNT(*) FROM t GROUP BY a HAVING COUNT(*) > 1')).not.toThrow()
    expect(check('SELECT MAX(b), MIN(b) FROM t')).not.toThrow()
    expect(check('SELECT DISTINCT a FROM t LIMIT 1')).not.toThrow()
  })

  it('rejects * with aggregates', () => {
    const statement = select('SELECT * FROM t')
    statement.items = [{ kind: 'wildcard' }, { kind: 'aggregate', fn: 'count', argument: '*', distinct: false }]
    expect(() => validateSelect(statement)).toThrow('Cannot combine * with aggregate functions')
  })

  it.each([
    ['SELECT * FROM t GROUP BY a', 'Cannot use GROUP BY with SELECT *'],
    ['SELECT DISTINCT * FROM t', 'SELECT DISTINCT requires a list of columns'],
    ['SELECT DISTINCT COUNT(*) FROM t', 'Cannot combine DISTINCT with aggregate functions'],
    ['SELECT DISTINCT a FROM t GROUP BY a', 'Cannot combine DISTINCT with GROUP BY'],
    ['SELECT WRITETIME(b), COUNT(*) FROM t', 'WRITETIME and TTL cannot be combined with aggregates, GROUP BY or DISTINCT'],
    ['SELECT DISTINCT TTL(b) FROM t', 'WRITETIME and TTL cannot be combined with aggregates, GROUP BY or DISTINCT'],
    ['SELECT a, COUNT(*) FROM t', 'Column a must appear in GROUP BY when selected with aggregate functions'],
    ['SELECT b, COUNT(*) FROM t GROUP BY a', 'Column b is selected but does not appear in GROUP BY'],
    ['SELECT a FROM t HAVING COUNT(*) > 1', 'HAVING requires GROUP BY'],
    ['SELECT COUNT(*) FROM t ORDER BY a', 'ORDER BY is not supported with aggregate functions'],
    ['SELECT a FROM t GROUP BY a ORDER BY a', 'ORDER BY is not supported with GROUP BY'],
    ['SELECT DISTINCT a FROM t ORDER BY a', 'ORDER BY is not supported with SELECT DISTINCT'],
    ['SELECT COUNT(*) FROM t LIMIT 1', 'LIMIT is not supported with aggregate functions'],
  ])('%s', (text, message) => {
    expect(check(text)).toThrow(InvalidRequestError)
    expect(check(text)).toThrow(message)
  })

  it('compares GROUP BY columns case-insensitively', () => {
    expect(check('SELECT A, COUNT(*) FROM t GROUP BY a')).not.toThrow()
  })
})

describe('selection functions', () => {
  it('reject primary key columns', () => {
    const { session } = createTestContext()
    session.execute('CREATE TABLE t (id int PRIMARY KEY, v text)')
    expect(() => session.execute('SELECT WRITETIME(id) FROM t')).toThrow(
      'Cannot use selection function writetime on PRIMARY KEY part id'
    )
  })
})
