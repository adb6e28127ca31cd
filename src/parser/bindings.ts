/**
 * Parameter Binding
 *
 * Matches bound parameters to the placeholders of a parsed statement and
 * evaluates terms against the bound values.
 *
 * @module parser/bindings
 */

import { v1 as uuidv1, v4 as uuidv4, validate as isUuid, version as uuidVersion } from 'uuid'
import { ErrorCode, InvalidRequestError, ParameterBindingError } from '../errors'
import type { MarkerInfo, Term } from './ast'

/**
 * Parameters for one statement: a sequence binds placeholders in order, a
 * mapping binds them by name
 */
export type StatementParameters = readonly unknown[] | Readonly<Record<string, unknown>>

/**
 * Values for every placeholder slot of a statement
 */
export interface Bindings {
  readonly slots: readonly unknown[]
}

export const NO_BINDINGS: Bindings = { slots: [] }

function isSequence(params: StatementParameters): params is readonly unknown[] {
  return Array.isArray(params)
}

function lookup(params: Readonly<Record<string, unknown>>, name: string): string | undefined {
  if (Object.prototype.hasOwnProperty.call(params, name)) return name
  const lowered = name.toLowerCase()
  return Object.keys(params).find(key => key.toLowerCase() === lowered)
}

/**
 * Bind parameters to placeholders
 *
 * - a sequence must have exactly one value per placeholder
 * - a mapping must name every named placeholder; `?` placeholders are
 *   bound by the column they feed
 * - a mapping may not carry names no placeholder uses
 *
 * @throws ParameterBindingError when parameters and placeholders do not fit
 */
export function bindParameters(markers: readonly MarkerInfo[], params?: StatementParameters): Bindings {
  const named = markers.filter(marker => marker.name !== undefined)
  if (named.length > 0 && named.length < markers.length) {
    throw new ParameterBindingError('Cannot mix positional and named placeholders in one statement')
  }

  if (params === undefined) {
    if (markers.length > 0) {
      throw new ParameterBindingError(
        `Statement has ${markers.length} placeholder(s) but no parameters were given`,
        { expected: markers.length, received: 0 }
      )
    }
    return NO_BINDINGS
  }

  if (isSequence(params)) {
    if (params.length !== markers.length) {
      throw new ParameterBindingError(
        `Statement has ${markers.length} placeholder(s) but ${params.length} parameter(s) were given`,
        { expected: markers.length, received: params.length }
      )
    }
    return { slots: [...params] }
  }

  const used = new Set<string>()
  const slots = markers.map(marker => {
    const name = marker.name ?? marker.receiver
    const key = name === undefined ? undefined : lookup(params, name)
    if (key === undefined) {
      throw new ParameterBindingError(
        name === undefined
          ? `Placeholder ${marker.slot + 1} cannot be bound by name`
          : `Missing parameter '${name}'`,
        { slot: marker.slot, name }
      )
    }
    used.add(key)
    return params[key]
  })

  const extra = Object.keys(params).filter(key => !used.has(key))
  if (extra.length > 0) {
    throw new ParameterBindingError(
      `Unexpected parameter(s): ${extra.map(key => `'${key}'`).join(', ')}`,
      { extra }
    )
  }

  return { slots }
}

// =============================================================================
// Term evaluation
// =============================================================================

export interface TermContext {
  bindings: Bindings
  /** Milliseconds since epoch */
  now: () => number
}

/**
 * Evaluate a term to a plain value. Collection terms become arrays (list,
 * set, tuple) or `Map`s (map literals), ready for `castValue`.
 */
export function evaluateTerm(term: Term, context: TermContext): unknown {
  switch (term.kind) {
    case 'literal':
      return term.value
    case 'marker': {
      if (term.slot >= context.bindings.slots.length) {
        throw new ParameterBindingError(`No value bound for placeholder ${term.slot + 1}`, { slot: term.slot })
      }
      return context.bindings.slots[term.slot]
    }
    case 'list':
    case 'set':
    case 'tuple':
      return term.items.map(item => evaluateTerm(item, context))
    case 'map': {
      const map = new Map<unknown, unknown>()
      for (const [key, value] of term.entries) {
        map.set(evaluateTerm(key, context), evaluateTerm(value, context))
      }
      return map
    }
    case 'call':
      return callFunction(term.name, term.args, context)
  }
}

/** Milliseconds from the uuid epoch (1582-10-15) to the Unix epoch */
const UUID_EPOCH_OFFSET_MS = 12_219_292_800_000n

/**
 * Instant a version 1 (time-based) uuid was generated at, in
 * milliseconds since the Unix epoch
 */
export function timeuuidMillis(value: string): number | undefined {
  if (!isUuid(value) || uuidVersion(value) !== 1) return undefined
  const hex = value.replace(/-/g, '')
  // 100ns ticks: time_hi (version nibble dropped), time_mid, time_low
  const ticks = BigInt(`0x${hex.slice(13, 16)}${hex.slice(8, 12)}${hex.slice(0, 8)}`)
  return Number(ticks / 10_000n - UUID_EPOCH_OFFSET_MS)
}

function callFunction(name: string, args: Term[], context: TermContext): unknown {
  switch (name) {
    case 'now':
      return uuidv1({ msecs: context.now() })
    case 'uuid':
      return uuidv4()
    case 'currenttimestamp':
      return new Date(context.now())
    case 'currentdate':
      return new Date(context.now()).toISOString().slice(0, 10)
    case 'totimestamp':
    case 'todate': {
      const [arg] = args
      const value = arg === undefined ? undefined : evaluateTerm(arg, context)
      const millis = typeof value === 'string' ? timeuuidMillis(value) : undefined
      const instant = value instanceof Date ? value : new Date(millis ?? context.now())
      return name === 'todate' ? instant.toISOString().slice(0, 10) : instant
    }
    default:
      throw new InvalidRequestError(`Unknown function '${name}'`, ErrorCode.INVALID_REQUEST, { function: name })
  }
}
