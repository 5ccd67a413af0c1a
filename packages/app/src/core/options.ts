import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Either from "effect/Either"

import type { OptionsError } from "./errors.js"
import { optionsError } from "./errors.js"

// CHANGE: define decoder options, their defaults and boundary validation
// WHY: explicit options override defaults deterministically; untyped input is rejected early
// REF: req-options-1
// SOURCE: n/a
// FORMAT THEOREM: ∀o: resolve(o).maxDepth = isDepth(o.maxDepth) ? o.maxDepth : defaultMaxDepth
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved maxDepth is always a positive safe integer
// COMPLEXITY: O(1)/O(1)

export interface DecodeOptions {
  readonly maxDepth?: number
}

export interface ResolvedDecodeOptions {
  readonly maxDepth: number
}

export const defaultMaxDepth = 2048

const RawOptionsSchema = S.partial(
  S.Struct({
    maxDepth: S.Number.pipe(S.int(), S.positive())
  })
)

const isDepth = (value: number | undefined): value is number =>
  value !== undefined && Number.isSafeInteger(value) && value > 0

export const resolveDecodeOptions = (options: DecodeOptions | undefined): ResolvedDecodeOptions => {
  const maxDepth = options?.maxDepth
  return { maxDepth: isDepth(maxDepth) ? maxDepth : defaultMaxDepth }
}

/**
 * Validate untyped options (for example a parsed config object).
 *
 * @param raw - Candidate options value.
 * @returns DecodeOptions or an OptionsError carrying the formatted schema report.
 *
 * @pure true
 * @invariant missing fields stay missing
 */
export const parseDecodeOptions = (raw: unknown): Either.Either<DecodeOptions, OptionsError> =>
  Either.match(S.decodeUnknownEither(RawOptionsSchema)(raw), {
    onLeft: (error) => Either.left(optionsError(TreeFormatter.formatErrorSync(error))),
    onRight: (options) => Either.right(options.maxDepth === undefined ? {} : { maxDepth: options.maxDepth })
  })
