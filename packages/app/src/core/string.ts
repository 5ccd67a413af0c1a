import * as Either from "effect/Either"

import type { Cursor, Parsed } from "./cursor.js"
import { advance, isAtEnd, makeCursor, peek, remaining, startsWith, toEnd } from "./cursor.js"
import type { DecodeError } from "./errors.js"
import { unexpectedEndOfBuffer, unexpectedToken } from "./errors.js"

// CHANGE: decode double-quoted string literals with escapes and surrogate pairs
// WHY: strings are the one production shared by object keys and values
// REF: req-string-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: decodeString("\"" + s + "\"") = Right(t) → t contains no unpaired surrogate from an escape
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the returned cursor is positioned right after the closing quote
// COMPLEXITY: O(n) where n = literal length

const simpleEscapes: ReadonlyMap<string, string> = new Map([
  ["b", "\b"],
  ["f", "\f"],
  ["n", "\n"],
  ["r", "\r"],
  ["t", "\t"],
  ["\"", "\""],
  ["\\", "\\"],
  ["/", "/"]
])

const hexDigitValue = (char: string): number | undefined => {
  const code = char.charCodeAt(0)
  if (code >= 0x30 && code <= 0x39) {
    return code - 0x30
  }
  if (code >= 0x61 && code <= 0x66) {
    return code - 0x61 + 10
  }
  if (code >= 0x41 && code <= 0x46) {
    return code - 0x41 + 10
  }
  return undefined
}

const isHighSurrogate = (unit: number): boolean => unit >= 0xd800 && unit <= 0xdbff

const isLowSurrogate = (unit: number): boolean => unit >= 0xdc00 && unit <= 0xdfff

const readHexQuad = (cursor: Cursor): Either.Either<Parsed<number>, DecodeError> => {
  let unit = 0
  let current = cursor
  for (let index = 0; index < 4; index++) {
    const char = peek(current)
    if (char === undefined) {
      return Either.left(unexpectedEndOfBuffer(current))
    }
    const digit = hexDigitValue(char)
    if (digit === undefined) {
      return Either.left(unexpectedToken(current))
    }
    unit = unit * 16 + digit
    current = advance(current, 1)
  }
  return Either.right({ value: unit, rest: current })
}

const combineSurrogates = (high: number, low: number): number => 0x10000 + ((high - 0xd800) << 10) + (low - 0xdc00)

// `escape` points at the backslash of a "\u" sequence
const decodeUnicodeEscape = (escape: Cursor): Either.Either<Parsed<string>, DecodeError> => {
  const first = readHexQuad(advance(escape, 2))
  if (Either.isLeft(first)) {
    return Either.left(first.left)
  }
  const high = first.right.value
  const afterHigh = first.right.rest
  if (isLowSurrogate(high)) {
    return Either.left(unexpectedToken(escape))
  }
  if (!isHighSurrogate(high)) {
    return Either.right({ value: String.fromCodePoint(high), rest: afterHigh })
  }
  if (!startsWith(afterHigh, "\\u")) {
    const tail = remaining(afterHigh)
    return "\\u".startsWith(tail)
      ? Either.left(unexpectedEndOfBuffer(afterHigh))
      : Either.left(unexpectedToken(escape))
  }
  const second = readHexQuad(advance(afterHigh, 2))
  if (Either.isLeft(second)) {
    return Either.left(second.left)
  }
  const low = second.right.value
  if (!isLowSurrogate(low)) {
    return Either.left(unexpectedToken(escape))
  }
  return Either.right({
    value: String.fromCodePoint(combineSurrogates(high, low)),
    rest: second.right.rest
  })
}

// end of the longest run at `offset` containing neither a quote nor a backslash
const plainRunEnd = (input: string, offset: number): number => {
  let end = offset
  while (end < input.length) {
    const char = input.charAt(end)
    if (char === "\"" || char === "\\") {
      return end
    }
    end++
  }
  return end
}

/**
 * Decode a string literal starting at the cursor.
 *
 * @param cursor - Must point at the opening quote.
 * @returns Decoded text and the cursor after the closing quote.
 *
 * @pure true
 * @invariant an unknown escape keeps its backslash verbatim
 * @complexity O(n)
 */
export const decodeString = (cursor: Cursor): Either.Either<Parsed<string>, DecodeError> => {
  const open = peek(cursor)
  if (open === undefined) {
    return Either.left(unexpectedEndOfBuffer(cursor))
  }
  if (open !== "\"") {
    return Either.left(unexpectedToken(cursor))
  }
  const chunks: Array<string> = []
  let current = advance(cursor, 1)
  while (!isAtEnd(current)) {
    const runEnd = plainRunEnd(current.input, current.offset)
    if (runEnd > current.offset) {
      chunks.push(current.input.slice(current.offset, runEnd))
      current = advance(current, runEnd - current.offset)
      continue
    }
    if (peek(current) === "\"") {
      return Either.right({ value: chunks.join(""), rest: advance(current, 1) })
    }
    const escaped = current.input.charAt(current.offset + 1)
    if (escaped === "u") {
      const decoded = decodeUnicodeEscape(current)
      if (Either.isLeft(decoded)) {
        return Either.left(decoded.left)
      }
      chunks.push(decoded.right.value)
      current = decoded.right.rest
      continue
    }
    const replacement = simpleEscapes.get(escaped)
    if (replacement === undefined) {
      chunks.push("\\")
      current = advance(current, 1)
      continue
    }
    chunks.push(replacement)
    current = advance(current, 2)
  }
  return Either.left(unexpectedEndOfBuffer(toEnd(current)))
}

export interface StringLiteral {
  readonly value: string
  readonly remaining: string
}

/**
 * Decode a leading string literal and return whatever follows it.
 *
 * @example
 * parseStringLiteral("\"-88.22suffix\" foo bar")
 * // Right({ value: "-88.22suffix", remaining: " foo bar" })
 *
 * @pure true
 */
export const parseStringLiteral = (input: string): Either.Either<StringLiteral, DecodeError> =>
  Either.map(decodeString(makeCursor(input)), (parsed) => ({
    value: parsed.value,
    remaining: remaining(parsed.rest)
  }))
