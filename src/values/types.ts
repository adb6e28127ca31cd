/**
 * CQL Type Model
 *
 * Column types are parsed once, when a table or user type is defined, into
 * the structured `CqlType` union. Values stored in rows use the `CqlValue`
 * union.
 *
 * @module values/types
 */

// =============================================================================
// Value Types
// =============================================================================

/**
 * A typed value as stored in a row and returned in result sets.
 *
 * - numeric types are `number`; `bigint`, `varint` and `counter` values
 *   outside the safe integer range are `bigint`
 * - `timestamp` is `Date`, `blob` is `Uint8Array`
 * - list, set and tuple values are arrays
 * - map and user-defined type values are plain objects
 */
export type CqlValue =
  | null
  | string
  | number
  | bigint
  | boolean
  | Date
  | Uint8Array
  | CqlValue[]
  | CqlObject

export interface CqlObject {
  [key: string]: CqlValue
}

/**
 * Check if a value is a map or user-defined type value
 */
export function isCqlObject(value: unknown): value is CqlObject {
  return typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof Uint8Array)
}

// =============================================================================
// Column Types
// =============================================================================

export const NATIVE_TYPES = [
  'ascii',
  'bigint',
  'blob',
  'boolean',
  'counter',
  'date',
  'decimal',
  'double',
  'duration',
  'float',
  'inet',
  'int',
  'smallint',
  'text',
  'time',
  'timestamp',
  'timeuuid',
  'tinyint',
  'uuid',
  'varchar',
  'varint',
] as const

export type NativeTypeName = (typeof NATIVE_TYPES)[number]

export type CqlType =
  | { kind: 'native'; name: NativeTypeName }
  | { kind: 'list'; element: CqlType }
  | { kind: 'set'; element: CqlType }
  | { kind: 'map'; key: CqlType; value: CqlType }
  | { kind: 'tuple'; elements: CqlType[] }
  | { kind: 'frozen'; inner: CqlType }
  | { kind: 'udt'; name: string }

export const INTEGER_TYPES: ReadonlySet<NativeTypeName> = new Set([
  'int',
  'bigint',
  'smallint',
  'tinyint',
  'varint',
  'counter',
])

export const DECIMAL_TYPES: ReadonlySet<NativeTypeName> = new Set(['float', 'double', 'decimal'])

export const TEXT_TYPES: ReadonlySet<NativeTypeName> = new Set([
  'text',
  'varchar',
  'ascii',
  'inet',
  'duration',
])

/**
 * Check if a name is a native CQL type
 */
export function isNativeTypeName(name: string): name is NativeTypeName {
  return NATIVE_TYPES.some(native => native === name)
}

/**
 * Build a native type descriptor
 */
export function nativeType(name: NativeTypeName): CqlType {
  return { kind: 'native', name }
}

/**
 * Remove any `frozen<...>` wrapper
 */
export function unfreeze(type: CqlType): CqlType {
  return type.kind === 'frozen' ? unfreeze(type.inner) : type
}

/**
 * Check if a type is `counter`
 */
export function isCounterType(type: CqlType): boolean {
  const inner = unfreeze(type)
  return inner.kind === 'native' && inner.name === 'counter'
}

/**
 * Format a type the way it is shown in `system_schema.columns`
 *
 * @example
 * formatCqlType({ kind: 'map', key: text, value: int }) // 'map<text, int>'
 */
export function formatCqlType(type: CqlType): string {
  switch (type.kind) {
    case 'native':
      return type.name
    case 'list':
      return `list<${formatCqlType(type.element)}>`
    case 'set':
      return `set<${formatCqlType(type.element)}>`
    case 'map':
      return `map<${formatCqlType(type.key)}, ${formatCqlType(type.value)}>`
    case 'tuple':
      return `tuple<${type.elements.map(formatCqlType).join(', ')}>`
    case 'frozen':
      return `frozen<${formatCqlType(type.inner)}>`
    case 'udt':
      return type.name
  }
}
