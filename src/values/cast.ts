/**
 * Value Casting
 *
 * Converts literal and bound parameter values into typed `CqlValue`s for a
 * declared column type.
 *
 * @module values/cast
 */

import { ErrorCode, InvalidRequestError } from '../errors'
import { compareValues, deepEqual, toHex } from './compare'
import {
  DECIMAL_TYPES,
  INTEGER_TYPES,
  TEXT_TYPES,
  formatCqlType,
  isCqlObject,
  type CqlObject,
  type CqlType,
  type CqlValue,
  type NativeTypeName,
} from './types'

/**
 * Looks up the fields of a user-defined type by name
 */
export type UserTypeResolver = (name: string) => ReadonlyMap<string, CqlType> | undefined

export interface CastContext {
  /** Column being written, for error messages */
  column?: string | undefined
  resolveType?: UserTypeResolver | undefined
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/
const HEX_PATTERN = /^0x([0-9a-f]*)$/i

const INTEGER_TEXT = /^[+-]?\d+$/

const INT64_RANGE = [-(2n ** 63n), 2n ** 63n - 1n] as const

/** Integer ranges for fixed-width integer types; `varint` is unbounded */
const INTEGER_RANGES: Partial<Record<NativeTypeName, readonly [bigint, bigint]>> = {
  tinyint: [-128n, 127n],
  smallint: [-32768n, 32767n],
  int: [-2147483648n, 2147483647n],
  bigint: INT64_RANGE,
  counter: INT64_RANGE,
}

/**
 * Integer as stored: a `number` while it is a safe integer, a `bigint`
 * beyond that
 */
export function normalizeInteger(value: bigint): number | bigint {
  const n = Number(value)
  return Number.isSafeInteger(n) ? n : value
}

function invalid(value: unknown, type: CqlType, context: CastContext): InvalidRequestError {
  const shown = typeof value === 'string' ? `'${value}'` : String(value)
  const target = context.column ? ` for column '${context.column}'` : ''
  return new InvalidRequestError(
    `Invalid ${formatCqlType(type)} value ${shown}${target}`,
    ErrorCode.INVALID_VALUE,
    { column: context.column, type: formatCqlType(type) }
  )
}

// =============================================================================
// Untyped values
// =============================================================================

/**
 * Convert an arbitrary JavaScript value into a `CqlValue` without a
 * declared type. Used for columns that are not part of the table schema.
 */
export function toCqlValue(value: unknown): CqlValue {
  if (value === null || value === undefined) return null
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value
  }
  if (typeof value === 'bigint') return normalizeInteger(value)
  if (value instanceof Date || value instanceof Uint8Array) return value
  if (Array.isArray(value)) return value.map(toCqlValue)
  if (value instanceof Set) return [...value].map(toCqlValue)
  if (value instanceof Map) {
    const result: CqlObject = {}
    for (const [k, v] of value) {
      result[keyString(toCqlValue(k))] = toCqlValue(v)
    }
    return result
  }
  if (typeof value === 'object') {
    const result: CqlObject = {}
    for (const [k, v] of Object.entries(value)) {
      result[k] = toCqlValue(v)
    }
    return result
  }
  return String(value)
}

/**
 * String form of a map key
 */
export function keyString(value: CqlValue): string {
  if (value instanceof Date) return value.toISOString()
  if (value instanceof Uint8Array) return `0x${toHex(value)}`
  if (typeof value === 'string') return value
  if (value !== null && typeof value === 'object') {
    return JSON.stringify(value, (_key, entry: unknown) => (typeof entry === 'bigint' ? entry.toString() : entry))
  }
  return String(value)
}

// =============================================================================
// Typed casting
// =============================================================================

/**
 * Cast a value to the declared column type.
 *
 * `null` and `undefined` cast to `null` for every type. A missing type
 * keeps the value as written.
 *
 * @throws InvalidRequestError when the value cannot represent the type
 */
export function castValue(value: unknown, type: CqlType | undefined, context: CastContext = {}): CqlValue {
  if (value === null || value === undefined) return null
  if (type === undefined) return toCqlValue(value)

  switch (type.kind) {
    case 'frozen':
      return castValue(value, type.inner, context)
    case 'native':
      return castNative(value, type.name, type, context)
    case 'list': {
      const items = asItems(value)
      if (items === undefined) throw invalid(value, type, context)
      return items.map(item => castValue(item, type.element, context))
    }
    case 'set': {
      const items = asItems(value)
      if (items === undefined) throw invalid(value, type, context)
      return normalizeSet(items.map(item => castValue(item, type.element, context)))
    }
    case 'tuple': {
      const items = asItems(value)
      if (items === undefined || items.length > type.elements.length) throw invalid(value, type, context)
      return type.elements.map((elementType, i) => castValue(items[i], elementType, context))
    }
    case 'map': {
      const entries = asEntries(value)
      if (entries === undefined) throw invalid(value, type, context)
      const result: CqlObject = {}
      for (const [k, v] of entries) {
        const key = castValue(k, type.key, context)
        result[keyString(key)] = castValue(v, type.value, context)
      }
      return result
    }
    case 'udt': {
      const fields = context.resolveType?.(type.name)
      const entries = asEntries(value)
      if (entries === undefined) throw invalid(value, type, context)
      const result: CqlObject = {}
      if (fields === undefined) {
        for (const [k, v] of entries) result[String(k)] = toCqlValue(v)
        return result
      }
      for (const [k, v] of entries) {
        const fieldName = String(k)
        const fieldType = fields.get(fieldName) ?? findCaseInsensitive(fields, fieldName)
        if (fieldType === undefined) {
          throw new InvalidRequestError(
            `Unknown field '${fieldName}' in value of type ${type.name}`,
            ErrorCode.INVALID_VALUE,
            { column: context.column, type: type.name }
          )
        }
        result[fieldName] = castValue(v, fieldType, context)
      }
      return result
    }
  }
}

/**
 * De-duplicate and sort set elements
 */
export function normalizeSet(items: CqlValue[]): CqlValue[] {
  const unique: CqlValue[] = []
  for (const item of items) {
    if (!unique.some(existing => deepEqual(existing, item))) unique.push(item)
  }
  return unique.sort(compareValues)
}

function findCaseInsensitive(fields: ReadonlyMap<string, CqlType>, name: string): CqlType | undefined {
  const lowered = name.toLowerCase()
  for (const [fieldName, fieldType] of fields) {
    if (fieldName.toLowerCase() === lowered) return fieldType
  }
  return undefined
}

function asItems(value: unknown): unknown[] | undefined {
  if (Array.isArray(value)) return value
  if (value instanceof Set) return [...value]
  // `{}` is parsed as an empty map but is also the empty set literal
  if (value instanceof Map) return value.size === 0 ? [] : undefined
  if (isCqlObject(value) && Object.keys(value).length === 0) return []
  return undefined
}

function asEntries(value: unknown): Array<[unknown, unknown]> | undefined {
  if (value instanceof Map) return [...value.entries()]
  if (Array.isArray(value) && value.length === 0) return []
  if (typeof value === 'object' && value !== null && !Array.isArray(value) &&
    !(value instanceof Date) && !(value instanceof Uint8Array) && !(value instanceof Set)) {
    return Object.entries(value)
  }
  return undefined
}

function castNative(value: unknown, name: NativeTypeName, type: CqlType, context: CastContext): CqlValue {
  if (INTEGER_TYPES.has(name)) {
    const n = toInteger(value)
    if (n === undefined) throw invalid(value, type, context)
    const range = INTEGER_RANGES[name]
    if (range && (n < range[0] || n > range[1])) throw invalid(value, type, context)
    return normalizeInteger(n)
  }

  if (DECIMAL_TYPES.has(name)) {
    const n = toNumber(value)
    if (n === undefined) throw invalid(value, type, context)
    return n
  }

  if (TEXT_TYPES.has(name)) {
    if (typeof value === 'string') return value
    if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value)
    throw invalid(value, type, context)
  }

  switch (name) {
    case 'boolean': {
      if (typeof value === 'boolean') return value
      if (typeof value === 'string') {
        const lowered = value.trim().toLowerCase()
        if (lowered === 'true') return true
        if (lowered === 'false') return false
      }
      throw invalid(value, type, context)
    }
    case 'uuid':
    case 'timeuuid': {
      if (typeof value === 'string' && UUID_PATTERN.test(value)) return value.toLowerCase()
      throw invalid(value, type, context)
    }
    case 'timestamp': {
      if (value instanceof Date) {
        if (Number.isNaN(value.getTime())) throw invalid(value, type, context)
        return value
      }
      if (typeof value === 'number' || typeof value === 'bigint') return new Date(Number(value))
      if (typeof value === 'string') {
        const asNumber = Number(value)
        const date = value.trim() !== '' && Number.isFinite(asNumber) ? new Date(asNumber) : new Date(value)
        if (Number.isNaN(date.getTime())) throw invalid(value, type, context)
        return date
      }
      throw invalid(value, type, context)
    }
    case 'date': {
      if (value instanceof Date) return value.toISOString().slice(0, 10)
      if (typeof value === 'string' && DATE_PATTERN.test(value)) return value
      throw invalid(value, type, context)
    }
    case 'time': {
      if (typeof value === 'string') return value
      throw invalid(value, type, context)
    }
    case 'blob': {
      if (value instanceof Uint8Array) return value
      if (typeof value === 'string') {
        const match = HEX_PATTERN.exec(value)
        if (match?.[1] !== undefined && match[1].length % 2 === 0) return fromHex(match[1])
      }
      throw invalid(value, type, context)
    }
    default:
      throw invalid(value, type, context)
  }
}

/**
 * Exact integer value. Numbers past the safe range are refused since
 * their digits are already lost.
 */
function toInteger(value: unknown): bigint | undefined {
  if (typeof value === 'bigint') return value
  if (typeof value === 'number') return Number.isSafeInteger(value) ? BigInt(value) : undefined
  if (typeof value === 'string' && INTEGER_TEXT.test(value.trim())) return BigInt(value.trim())
  return undefined
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return value
  if (typeof value === 'bigint') return Number(value)
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value)
    return Number.isNaN(n) && value.trim().toLowerCase() !== 'nan' ? undefined : n
  }
  return undefined
}

/**
 * Decode a hex string (without `0x`) into bytes
 */
export function fromHex(hex: string): Uint8Array {
  const bytes = new Uint8Array(hex.length / 2)
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16)
  }
  return bytes
}
