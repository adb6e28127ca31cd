/**
 * Conditional INSERT Tests
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { APPLIED_COLUMN } from '../../../src'
import { createUsersContext, rowsOf, type TestContext } from '../../factories'

describe('INSERT IF NOT EXISTS', () => {
  let ctx: TestContext

  beforeEach(() => {
    ctx = createUsersContext()
  })

  it('applies when the row is new', () => {
    const result = ctx.session.execute("INSERT INTO users (id, name, age) VALUES (1, 'Ada', 36) IF NOT EXISTS")
    expect(result.columns).toEqual([APPLIED_COLUMN])
    expect(result.wasApplied()).toBe(true)
  })

  it('returns the existing row instead of overwriting it', () => {
    ctx.session.execute("INSERT INTO users (id, name, age) VALUES (1, 'Ada', 36) IF NOT EXISTS")
    const second = ctx.session.execute("INSERT INTO users (id, name, age) VALUES (1, 'Imposter', 99) IF NOT EXISTS")
    expect(rowsOf(second)).toEqual([{ '[applied]': false, id: 1, name: 'Ada', age: 36 }])
    expect(rowsOf(ctx.session.execute('SELECT * FROM users'))).toEqual([{ id: 1, name: 'Ada', age: 36 }])
  })

  it('treats an expired row as absent', () => {
    ctx.session.execute("INSERT INTO users (id, name) VALUES (1, 'Ada') USING TTL 5")
    ctx.clock.advance(5000)
    const result = ctx.session.execute("INSERT INTO users (id, name) VALUES (1, 'Bob') IF NOT EXISTS")
    expect(result.wasApplied()).toBe(true)
    expect(ctx.session.execute('SELECT name FROM users').one()?.get('name')).toBe('Bob')
  })

  it('accepts USING before or after the condition', () => {
    ctx.session.execute("INSERT INTO users (id, name) VALUES (1, 'Ada') IF NOT EXISTS USING TTL 20")
    expect(ctx.session.execute('SELECT TTL(name) FROM users').one()?.get('ttl(name)')).toBe(20)
  })

  it('reports unconditional results as applied', () => {
    expect(ctx.session.execute("INSERT INTO users (id, name) VALUES (1, 'Ada')").wasApplied()).toBe(true)
  })
})
