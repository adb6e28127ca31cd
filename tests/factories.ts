/**
 * Test Factories
 *
 * Helpers for building emulation contexts with a ready keyspace and a
 * controllable clock.
 */

import { MemCQL, type MemCQLConfig, type ResultSet, type Session } from '../src'
import type { CqlValue } from '../src/values/types'

// =============================================================================
// Clock
// =============================================================================

export interface ManualClock {
  now: () => number
  advance(ms: number): void
}

/** 2024-01-01T00:00:00.000Z */
export const CLOCK_START = 1_704_067_200_000

/**
 * Clock that only moves when told to
 */
export function createManualClock(start = CLOCK_START): ManualClock {
  let current = start
  return {
    now: () => current,
    advance(ms: number) {
      current += ms
    },
  }
}

// =============================================================================
// Sessions
// =============================================================================

export interface TestContext {
  db: MemCQL
  session: Session
  clock: ManualClock
}

/**
 * Emulation context with a `test` keyspace selected
 */
export function createTestContext(config: MemCQLConfig = {}): TestContext {
  const clock = createManualClock()
  const db = new MemCQL({ clock: clock.now, ...config })
  const session = db.connect()
  session.execute("CREATE KEYSPACE test WITH REPLICATION = {'class': 'SimpleStrategy', 'replication_factor': 1}")
  session.execute('USE test')
  return { db, session, clock }
}

/**
 * Context with a `users (id int PRIMARY KEY, name text, age int)` table
 */
export function createUsersContext(config: MemCQLConfig = {}): TestContext {
  const context = createTestContext(config)
  context.session.execute('CREATE TABLE users (id int PRIMARY KEY, name text, age int)')
  return context
}

/**
 * Result rows as plain objects
 */
export function rowsOf(result: ResultSet): Array<Record<string, CqlValue>> {
  return result.all().map(row => row.toObject())
}
