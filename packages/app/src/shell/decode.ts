import * as Effect from "effect/Effect"
import type * as Either from "effect/Either"

import { decode } from "../core/decode.js"
import type { AppError } from "../core/errors.js"
import { renderError } from "../core/errors.js"
import type { Json } from "../core/json.js"
import { parseDecodeOptions } from "../core/options.js"
import type { Value } from "../core/value.js"
import { toJson } from "../core/value.js"

// CHANGE: expose the pure decoder as an Effect with boundary validation and logging
// WHY: effectful callers get typed failures and a log trail without touching the core
// REF: req-shell-decode-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s,o: decodeText(s,o) succeeds with v ⇔ parseDecodeOptions(o) = Right(p) ∧ decode(s,p) = Right(v)
// PURITY: SHELL
// EFFECT: Effect<Value, AppError>
// INVARIANT: a failure is logged exactly once at warning level
// COMPLEXITY: O(n)

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

/**
 * Decode JSON text, validating untyped options first.
 *
 * @param input - Complete JSON text.
 * @param rawOptions - Options of unknown shape; defaults apply to missing fields.
 * @returns Effect yielding the decoded Value.
 *
 * @pure false
 * @effect Logger
 */
export const decodeText = (
  input: string,
  rawOptions: unknown = {}
): Effect.Effect<Value, AppError> =>
  Effect.gen(function*(_) {
    const options = yield* _(fromEither(parseDecodeOptions(rawOptions)))
    yield* _(Effect.logDebug("decoding JSON text"))
    const value = yield* _(fromEither(decode(input, options)))
    yield* _(Effect.logDebug(`decoded ${value._tag} root`))
    return value
  }).pipe(
    Effect.tapError((error) => Effect.logWarning(renderError(error))),
    Effect.annotateLogs({ inputLength: input.length }),
    Effect.withLogSpan("json.decode")
  )

export const decodeTextToJson = (
  input: string,
  rawOptions: unknown = {}
): Effect.Effect<Json, AppError> => Effect.map(decodeText(input, rawOptions), toJson)
