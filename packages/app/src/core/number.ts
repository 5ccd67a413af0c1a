import * as Either from "effect/Either"

import type { Cursor, Parsed } from "./cursor.js"
import { advance, peek, sliceBetween } from "./cursor.js"
import type { DecodeError } from "./errors.js"
import { unexpectedEndOfBuffer, unexpectedToken } from "./errors.js"
import type { NumberValue } from "./value.js"
import { numberValue } from "./value.js"

// CHANGE: decode numeric literals (integer, fraction, exponent)
// WHY: keep whether the literal was integral next to its numeric value, and large integers exact
// REF: req-number-1
// SOURCE: n/a
// FORMAT THEOREM: ∀n: decodeNumber(n) = Right(v) → v.integral ⇔ n ∉ {".", "e", "E"}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a leading zero is never followed by more integer digits
// COMPLEXITY: O(n) where n = literal length

const isDigit = (char: string | undefined): boolean => char !== undefined && char >= "0" && char <= "9"

const skipDigits = (cursor: Cursor): Cursor => {
  let current = cursor
  while (isDigit(peek(current))) {
    current = advance(current, 1)
  }
  return current
}

const requireDigits = (cursor: Cursor): Either.Either<Cursor, DecodeError> => {
  const char = peek(cursor)
  if (char === undefined) {
    return Either.left(unexpectedEndOfBuffer(cursor))
  }
  if (!isDigit(char)) {
    return Either.left(unexpectedToken(cursor))
  }
  return Either.right(skipDigits(cursor))
}

const decodeIntegerPart = (cursor: Cursor): Either.Either<Cursor, DecodeError> =>
  peek(cursor) === "0" ? Either.right(advance(cursor, 1)) : requireDigits(cursor)

const decodeExponent = (marker: Cursor): Either.Either<Cursor, DecodeError> => {
  const afterMarker = advance(marker, 1)
  const sign = peek(afterMarker)
  return requireDigits(sign === "+" || sign === "-" ? advance(afterMarker, 1) : afterMarker)
}

/**
 * Decode a number literal starting at the cursor.
 *
 * @param cursor - Points at "-" or a digit.
 * @returns NumberValue and the cursor after the literal.
 *
 * @pure true
 * @invariant integral = false iff a fraction or exponent was consumed
 * @invariant integral literals outside the safe integer range are kept exact as bigint
 * @invariant literals overflowing to ±Infinity are rejected
 * @complexity O(n)
 */
export const decodeNumber = (cursor: Cursor): Either.Either<Parsed<NumberValue>, DecodeError> => {
  const unsigned = peek(cursor) === "-" ? advance(cursor, 1) : cursor
  const integer = decodeIntegerPart(unsigned)
  if (Either.isLeft(integer)) {
    return Either.left(integer.left)
  }
  let current = integer.right
  let integral = true
  if (peek(current) === ".") {
    const fraction = requireDigits(advance(current, 1))
    if (Either.isLeft(fraction)) {
      return Either.left(fraction.left)
    }
    current = fraction.right
    integral = false
  }
  const marker = peek(current)
  if (marker === "e" || marker === "E") {
    const exponent = decodeExponent(current)
    if (Either.isLeft(exponent)) {
      return Either.left(exponent.left)
    }
    current = exponent.right
    integral = false
  }
  const literal = sliceBetween(cursor, current)
  const value = Number(literal)
  if (!Number.isFinite(value)) {
    return Either.left(unexpectedToken(cursor))
  }
  return Either.right({
    value: numberValue(integral && !Number.isSafeInteger(value) ? BigInt(literal) : value, integral),
    rest: current
  })
}
