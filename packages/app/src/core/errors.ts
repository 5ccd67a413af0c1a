import { Match } from "effect"

import type { Cursor } from "./cursor.js"
import { remaining } from "./cursor.js"

// CHANGE: unify error algebra for the decoder
// WHY: provide typed failures that short-circuit every production the same way
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ DecodeError: e._tag ∈ {"UnexpectedToken","UnexpectedEndOfBuffer"}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type UnexpectedToken = {
  readonly _tag: "UnexpectedToken"
  readonly remaining: string
  readonly offset: number
}
export type UnexpectedEndOfBuffer = { readonly _tag: "UnexpectedEndOfBuffer"; readonly offset: number }
export type OptionsError = { readonly _tag: "OptionsError"; readonly message: string }

export type DecodeError = UnexpectedToken | UnexpectedEndOfBuffer

export type AppError = DecodeError | OptionsError

export const unexpectedToken = (cursor: Cursor): UnexpectedToken => ({
  _tag: "UnexpectedToken",
  remaining: remaining(cursor),
  offset: cursor.offset
})

export const unexpectedEndOfBuffer = (cursor: Cursor): UnexpectedEndOfBuffer => ({
  _tag: "UnexpectedEndOfBuffer",
  offset: cursor.input.length
})

export const optionsError = (message: string): OptionsError => ({
  _tag: "OptionsError",
  message
})

/**
 * Render a failure as a single human-readable line.
 *
 * @pure true
 */
export const renderError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("UnexpectedToken", (failure) => `Invalid JSON - unexpected token >>${failure.remaining}<<`),
    Match.tag("UnexpectedEndOfBuffer", () => "Invalid JSON - unexpected end of buffer"),
    Match.tag("OptionsError", (failure) => failure.message),
    Match.exhaustive
  )

export const renderDecodeError = (error: DecodeError): string => renderError(error)
