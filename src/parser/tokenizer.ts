/**
 * CQL Tokenizer
 *
 * Splits a statement into identifiers, literals, placeholders and
 * punctuation. Keywords are plain identifiers; the parser matches them
 * case-insensitively.
 *
 * @module parser/tokenizer
 */

import { CqlSyntaxError } from '../errors'

// =============================================================================
// Types
// =============================================================================

export type Token =
  | { type: 'ident'; value: string; quoted: boolean; pos: number }
  | { type: 'string'; value: string; pos: number }
  | { type: 'number'; value: number | bigint; text: string; pos: number }
  | { type: 'uuid'; value: string; pos: number }
  | { type: 'blob'; value: string; pos: number }
  | { type: 'marker'; name?: string | undefined; pos: number }
  | { type: 'punct'; value: string; pos: number }
  | { type: 'eof'; pos: number }

// =============================================================================
// Patterns
// =============================================================================

const UUID_AT = /[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}(?![0-9A-Za-z_])/y
const BLOB_AT = /0[xX][0-9a-fA-F]*(?![0-9A-Za-z_])/y
const NUMBER_AT = /(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?(?![A-Za-z_])/y
const IDENT_AT = /[A-Za-z_][A-Za-z0-9_$]*/y
const NAMED_MARKER_AT = /:([A-Za-z_][A-Za-z0-9_]*)/y

const TWO_CHAR_PUNCT = new Set(['<=', '>=', '!=', '<>'])
const ONE_CHAR_PUNCT = new Set(['(', ')', ',', ';', '.', '[', ']', '{', '}', ':', '=', '<', '>', '+', '-', '*', '/'])

/** Integer literals too large for a double keep every digit as a bigint */
function numberValue(text: string): number | bigint {
  const value = Number(text)
  return /^\d+$/.test(text) && !Number.isSafeInteger(value) ? BigInt(text) : value
}

function matchAt(pattern: RegExp, input: string, pos: number): RegExpExecArray | null {
  pattern.lastIndex = pos
  return pattern.exec(input)
}

// =============================================================================
// Tokenizer
// =============================================================================

/**
 * Tokenize a statement
 *
 * `?` and `%s` both produce an unnamed marker; `:name` produces a named one.
 *
 * @throws CqlSyntaxError on an unterminated string or unexpected character
 */
export function tokenize(input: string): Token[] {
  const tokens: Token[] = []
  let pos = 0

  while (pos < input.length) {
    const ch = input.charAt(pos)

    // Whitespace
    if (/\s/.test(ch)) {
      pos++
      continue
    }

    // Comments
    if (input.startsWith('--', pos) || input.startsWith('//', pos)) {
      const end = input.indexOf('\n', pos)
      pos = end === -1 ? input.length : end + 1
      continue
    }
    if (input.startsWith('/*', pos)) {
      const end = input.indexOf('*/', pos + 2)
      if (end === -1) throw new CqlSyntaxError('Unterminated comment', undefined, { position: pos })
      pos = end + 2
      continue
    }

    // Quoted string
    if (ch === "'") {
      const start = pos
      let value = ''
      pos++
      for (;;) {
        if (pos >= input.length) {
          throw new CqlSyntaxError('Unterminated string literal', undefined, { position: start })
        }
        const c = input.charAt(pos)
        if (c === "'") {
          if (input.charAt(pos + 1) === "'") {
            value += "'"
            pos += 2
            continue
          }
          pos++
          break
        }
        value += c
        pos++
      }
      tokens.push({ type: 'string', value, pos: start })
      continue
    }

    // Dollar-quoted string
    if (input.startsWith('$$', pos)) {
      const end = input.indexOf('$$', pos + 2)
      if (end === -1) throw new CqlSyntaxError('Unterminated string literal', undefined, { position: pos })
      tokens.push({ type: 'string', value: input.slice(pos + 2, end), pos })
      pos = end + 2
      continue
    }

    // Quoted identifier
    if (ch === '"') {
      const start = pos
      let value = ''
      pos++
      for (;;) {
        if (pos >= input.length) {
          throw new CqlSyntaxError('Unterminated quoted identifier', undefined, { position: start })
        }
        const c = input.charAt(pos)
        if (c === '"') {
          if (input.charAt(pos + 1) === '"') {
            value += '"'
            pos += 2
            continue
          }
          pos++
          break
        }
        value += c
        pos++
      }
      tokens.push({ type: 'ident', value, quoted: true, pos: start })
      continue
    }

    // Placeholders
    if (ch === '?') {
      tokens.push({ type: 'marker', pos })
      pos++
      continue
    }
    if (input.startsWith('%s', pos)) {
      tokens.push({ type: 'marker', pos })
      pos += 2
      continue
    }
    // `{a:b}` is a map entry, not a named marker
    if (ch === ':' && !/[A-Za-z0-9_'")\]}]/.test(input.charAt(pos - 1))) {
      const named = matchAt(NAMED_MARKER_AT, input, pos)
      if (named?.[1] !== undefined) {
        tokens.push({ type: 'marker', name: named[1], pos })
        pos += named[0].length
        continue
      }
    }

    // UUID literals start like numbers or identifiers, so they go first
    const uuid = matchAt(UUID_AT, input, pos)
    if (uuid) {
      tokens.push({ type: 'uuid', value: uuid[0].toLowerCase(), pos })
      pos += uuid[0].length
      continue
    }

    const blob = matchAt(BLOB_AT, input, pos)
    if (blob) {
      tokens.push({ type: 'blob', value: blob[0].slice(2).toLowerCase(), pos })
      pos += blob[0].length
      continue
    }

    const number = matchAt(NUMBER_AT, input, pos)
    if (number) {
      tokens.push({ type: 'number', value: numberValue(number[0]), text: number[0], pos })
      pos += number[0].length
      continue
    }

    const ident = matchAt(IDENT_AT, input, pos)
    if (ident) {
      tokens.push({ type: 'ident', value: ident[0], quoted: false, pos })
      pos += ident[0].length
      continue
    }

    const pair = input.slice(pos, pos + 2)
    if (TWO_CHAR_PUNCT.has(pair)) {
      tokens.push({ type: 'punct', value: pair === '<>' ? '!=' : pair, pos })
      pos += 2
      continue
    }
    if (ONE_CHAR_PUNCT.has(ch)) {
      tokens.push({ type: 'punct', value: ch, pos })
      pos++
      continue
    }

    throw new CqlSyntaxError(`Unexpected character '${ch}' at position ${pos}`, undefined, { position: pos })
  }

  tokens.push({ type: 'eof', pos: input.length })
  return tokens
}
