import { describe, expect, it } from "@effect/vitest"
import { Effect, Logger } from "effect"

import { arrayValue, decodeText, decodeTextToJson, numberValue, objectValue } from "../../src/index.js"

const collectLevels = (levels: Array<string>) =>
  Logger.add(
    Logger.make(({ logLevel }) => {
      levels.push(logLevel.label)
    })
  )

describe("decodeText", () => {
  it.effect("succeeds with the decoded tree", () =>
    Effect.gen(function*(_) {
      const value = yield* _(decodeText(`{"a":[1]}`))
      expect(value).toEqual(objectValue(new Map([["a", arrayValue([numberValue(1, true)])]])))
    }))

  it.effect("fails with the decode error", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decodeText("{} x")))
      expect(error).toEqual({ _tag: "UnexpectedToken", remaining: "x", offset: 3 })
    }))

  it.effect("validates options before decoding", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decodeText("[]", { maxDepth: -1 })))
      expect(error._tag).toBe("OptionsError")
    }))

  it.effect("applies validated options", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(decodeText("[[1]]", { maxDepth: 1 })))
      expect(error).toEqual({ _tag: "UnexpectedToken", remaining: "[1]]", offset: 1 })
    }))

  it.effect("logs a warning on failure only", () =>
    Effect.gen(function*(_) {
      const levels: Array<string> = []
      yield* _(decodeText("[true]").pipe(Effect.provide(collectLevels(levels))))
      expect(levels).not.toContain("WARN")
      yield* _(Effect.either(decodeText("[").pipe(Effect.provide(collectLevels(levels)))))
      expect(levels).toContain("WARN")
    }))
})

describe("decodeTextToJson", () => {
  it.effect("yields plain JSON", () =>
    Effect.gen(function*(_) {
      const json = yield* _(decodeTextToJson(`[{"k":"v"},2.5]`))
      expect(json).toEqual([{ k: "v" }, 2.5])
    }))
})
