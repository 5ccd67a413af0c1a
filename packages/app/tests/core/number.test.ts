import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { makeCursor } from "../../src/core/cursor.js"
import { decodeNumber } from "../../src/core/number.js"

const decodeAt = (input: string) =>
  Either.map(decodeNumber(makeCursor(input)), (parsed) => ({
    value: parsed.value.value,
    integral: parsed.value.integral,
    offset: parsed.rest.offset
  }))

describe("decodeNumber", () => {
  it.effect("decodes integers", () =>
    Effect.sync(() => {
      expect(decodeAt("0")).toEqual(Either.right({ value: 0, integral: true, offset: 1 }))
      expect(decodeAt("-12")).toEqual(Either.right({ value: -12, integral: true, offset: 3 }))
      expect(decodeAt("12,3")).toEqual(Either.right({ value: 12, integral: true, offset: 2 }))
    }))

  it.effect("marks fractions and exponents as non-integral", () =>
    Effect.sync(() => {
      expect(decodeAt("3.25")).toEqual(Either.right({ value: 3.25, integral: false, offset: 4 }))
      expect(decodeAt("1e3")).toEqual(Either.right({ value: 1000, integral: false, offset: 3 }))
      expect(decodeAt("-2.5E-2")).toEqual(Either.right({ value: -0.025, integral: false, offset: 7 }))
      expect(decodeAt("4E+1]")).toEqual(Either.right({ value: 40, integral: false, offset: 4 }))
    }))

  it.effect("stops after a standalone leading zero", () =>
    Effect.sync(() => {
      expect(decodeAt("0123")).toEqual(Either.right({ value: 0, integral: true, offset: 1 }))
    }))

  it.effect("requires a digit after sign, point and exponent marker", () =>
    Effect.sync(() => {
      expect(decodeAt("-x")).toEqual(Either.left({ _tag: "UnexpectedToken", remaining: "x", offset: 1 }))
      expect(decodeAt("1.e5")).toEqual(Either.left({ _tag: "UnexpectedToken", remaining: "e5", offset: 2 }))
      expect(decodeAt("1e+x")).toEqual(Either.left({ _tag: "UnexpectedToken", remaining: "x", offset: 3 }))
    }))

  it.effect("reports end of buffer when the literal is cut", () =>
    Effect.sync(() => {
      expect(decodeAt("-")).toEqual(Either.left({ _tag: "UnexpectedEndOfBuffer", offset: 1 }))
      expect(decodeAt("1.")).toEqual(Either.left({ _tag: "UnexpectedEndOfBuffer", offset: 2 }))
      expect(decodeAt("1e+")).toEqual(Either.left({ _tag: "UnexpectedEndOfBuffer", offset: 3 }))
    }))

  it.effect("keeps integers beyond the safe range exact", () =>
    Effect.sync(() => {
      expect(decodeAt("12345678901234567891")).toEqual(
        Either.right({ value: 12345678901234567891n, integral: true, offset: 20 })
      )
      expect(decodeAt("-9007199254740993")).toEqual(
        Either.right({ value: -9007199254740993n, integral: true, offset: 17 })
      )
      expect(decodeAt("9007199254740991")).toEqual(
        Either.right({ value: 9007199254740991, integral: true, offset: 16 })
      )
    }))

  it.effect("rejects literals that overflow to infinity", () =>
    Effect.sync(() => {
      expect(decodeAt("1e400")).toEqual(Either.left({ _tag: "UnexpectedToken", remaining: "1e400", offset: 0 }))
      expect(decodeAt("-1.5e999,")).toEqual(
        Either.left({ _tag: "UnexpectedToken", remaining: "-1.5e999,", offset: 0 })
      )
    }))

  it.effect("keeps the sign of negative zero", () =>
    Effect.sync(() => {
      const result = decodeAt("-0")
      expect(Either.isRight(result)).toBe(true)
      if (Either.isRight(result)) {
        expect(Object.is(result.right.value, -0)).toBe(true)
      }
    }))
})
