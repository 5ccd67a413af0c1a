import * as Either from "effect/Either"

import type { Cursor, Parsed } from "./cursor.js"
import { advance, makeCursor, peek, remaining, skipWhitespace, startsWith, toEnd } from "./cursor.js"
import type { DecodeError } from "./errors.js"
import { unexpectedEndOfBuffer, unexpectedToken } from "./errors.js"
import type { Json } from "./json.js"
import { decodeNumber } from "./number.js"
import type { DecodeOptions, ResolvedDecodeOptions } from "./options.js"
import { resolveDecodeOptions } from "./options.js"
import { decodeString } from "./string.js"
import type { ArrayValue, ObjectValue, Value } from "./value.js"
import { arrayValue, boolValue, nullValue, objectValue, stringValue, toJson } from "./value.js"

// CHANGE: implement the recursive-descent value, array, object and root productions
// WHY: decode a complete JSON document into a Value tree in a single pass
// REF: req-decode-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s: decode(s) = Right(v) → s = ws · root(v) · ws
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the first failing production decides the result
// COMPLEXITY: O(n) where n = input length

type Step<A> = Either.Either<Parsed<A>, DecodeError>

const isDigit = (char: string): boolean => char >= "0" && char <= "9"

const decodeKeyword = (cursor: Cursor, keyword: string, value: Value): Step<Value> => {
  if (startsWith(cursor, keyword)) {
    return Either.right({ value, rest: advance(cursor, keyword.length) })
  }
  const tail = remaining(cursor)
  if (tail.length < keyword.length && keyword.startsWith(tail)) {
    return Either.left(unexpectedEndOfBuffer(toEnd(cursor)))
  }
  return Either.left(unexpectedToken(cursor))
}

const widen = <A extends Value>(step: Step<A>): Step<Value> =>
  Either.map(step, ({ rest, value }): Parsed<Value> => ({ value, rest }))

const decodeValue = (cursor: Cursor, depth: number, options: ResolvedDecodeOptions): Step<Value> => {
  const start = skipWhitespace(cursor)
  const char = peek(start)
  if (char === undefined) {
    return Either.left(unexpectedEndOfBuffer(start))
  }
  switch (char) {
    case "\"":
      return Either.map(decodeString(start), ({ rest, value }): Parsed<Value> => ({ value: stringValue(value), rest }))
    case "t":
      return decodeKeyword(start, "true", boolValue(true))
    case "f":
      return decodeKeyword(start, "false", boolValue(false))
    case "n":
      return decodeKeyword(start, "null", nullValue)
    case "[":
      return widen(decodeArray(start, depth + 1, options))
    case "{":
      return widen(decodeObject(start, depth + 1, options))
    default:
      return char === "-" || isDigit(char) ? widen(decodeNumber(start)) : Either.left(unexpectedToken(start))
  }
}

/**
 * Decode an array whose opening bracket is at `open`.
 *
 * @pure true
 * @invariant trailing commas are rejected
 */
const decodeArray = (open: Cursor, depth: number, options: ResolvedDecodeOptions): Step<ArrayValue> => {
  if (depth > options.maxDepth) {
    return Either.left(unexpectedToken(open))
  }
  let current = skipWhitespace(advance(open, 1))
  if (peek(current) === "]") {
    return Either.right({ value: arrayValue([]), rest: advance(current, 1) })
  }
  const items: Array<Value> = []
  while (true) {
    const element = decodeValue(current, depth, options)
    if (Either.isLeft(element)) {
      return Either.left(element.left)
    }
    items.push(element.right.value)
    const separator = skipWhitespace(element.right.rest)
    const char = peek(separator)
    if (char === undefined) {
      return Either.left(unexpectedEndOfBuffer(separator))
    }
    if (char === "]") {
      return Either.right({ value: arrayValue(items), rest: advance(separator, 1) })
    }
    if (char !== ",") {
      return Either.left(unexpectedToken(separator))
    }
    current = advance(separator, 1)
  }
}

const expectColon = (cursor: Cursor): Either.Either<Cursor, DecodeError> => {
  const colon = skipWhitespace(cursor)
  const char = peek(colon)
  if (char === undefined) {
    return Either.left(unexpectedEndOfBuffer(colon))
  }
  if (char !== ":") {
    return Either.left(unexpectedToken(colon))
  }
  return Either.right(advance(colon, 1))
}

/**
 * Decode an object whose opening brace is at `open`.
 *
 * @pure true
 * @invariant a repeated key keeps its first position and its last value
 */
const decodeObject = (open: Cursor, depth: number, options: ResolvedDecodeOptions): Step<ObjectValue> => {
  if (depth > options.maxDepth) {
    return Either.left(unexpectedToken(open))
  }
  let current = skipWhitespace(advance(open, 1))
  if (peek(current) === "}") {
    return Either.right({ value: objectValue(new Map()), rest: advance(current, 1) })
  }
  const entries = new Map<string, Value>()
  while (true) {
    const key = decodeString(current)
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    const afterColon = expectColon(key.right.rest)
    if (Either.isLeft(afterColon)) {
      return Either.left(afterColon.left)
    }
    const member = decodeValue(afterColon.right, depth, options)
    if (Either.isLeft(member)) {
      return Either.left(member.left)
    }
    entries.set(key.right.value, member.right.value)
    const separator = skipWhitespace(member.right.rest)
    const char = peek(separator)
    if (char === undefined) {
      return Either.left(unexpectedEndOfBuffer(separator))
    }
    if (char === "}") {
      return Either.right({ value: objectValue(entries), rest: advance(separator, 1) })
    }
    if (char !== ",") {
      return Either.left(unexpectedToken(separator))
    }
    current = skipWhitespace(advance(separator, 1))
  }
}

// Only containers are roots: a leading quote, digit or keyword is an UnexpectedToken here,
// even when the string decoder would report an unterminated literal as UnexpectedEndOfBuffer.
const decodeRoot = (start: Cursor, options: ResolvedDecodeOptions): Step<Value> => {
  const char = peek(start)
  if (char === undefined) {
    return Either.left(unexpectedEndOfBuffer(start))
  }
  if (char === "{") {
    return widen(decodeObject(start, 1, options))
  }
  if (char === "[") {
    return widen(decodeArray(start, 1, options))
  }
  return Either.left(unexpectedToken(start))
}

/**
 * Decode a JSON document whose root is an object or an array.
 *
 * @param input - Complete JSON text.
 * @param options - Optional limits; see DecodeOptions.
 * @returns Value tree or the first DecodeError encountered.
 *
 * @pure true
 * @invariant only whitespace may follow the root value
 * @complexity O(n)
 */
export const decode = (input: string, options?: DecodeOptions): Either.Either<Value, DecodeError> => {
  if (input === "{}") {
    return Either.right(objectValue(new Map()))
  }
  if (input === "[]") {
    return Either.right(arrayValue([]))
  }
  const root = decodeRoot(skipWhitespace(makeCursor(input)), resolveDecodeOptions(options))
  if (Either.isLeft(root)) {
    return Either.left(root.left)
  }
  const tail = skipWhitespace(root.right.rest)
  if (peek(tail) !== undefined) {
    return Either.left(unexpectedToken(tail))
  }
  return Either.right(root.right.value)
}

export const decodeJson = (input: string, options?: DecodeOptions): Either.Either<Json, DecodeError> =>
  Either.map(decode(input, options), toJson)
