// CHANGE: model the decoder position as an immutable cursor over the input
// WHY: every production returns a fresh cursor, so recursion never shares position state
// REF: req-cursor-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: skipWhitespace(c).offset ≥ c.offset
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: 0 ≤ offset ≤ input.length
// COMPLEXITY: O(1) per step, O(k) for a whitespace run of length k

export interface Cursor {
  readonly input: string
  readonly offset: number
}

/**
 * Result of a successful production: the decoded value and the cursor after it.
 */
export interface Parsed<A> {
  readonly value: A
  readonly rest: Cursor
}

export const makeCursor = (input: string): Cursor => ({ input, offset: 0 })

export const isAtEnd = (cursor: Cursor): boolean => cursor.offset >= cursor.input.length

export const peek = (cursor: Cursor): string | undefined =>
  isAtEnd(cursor) ? undefined : cursor.input.charAt(cursor.offset)

export const advance = (cursor: Cursor, count: number): Cursor => ({
  input: cursor.input,
  offset: Math.min(cursor.offset + count, cursor.input.length)
})

export const remaining = (cursor: Cursor): string => cursor.input.slice(cursor.offset)

export const startsWith = (cursor: Cursor, lexeme: string): boolean =>
  cursor.input.startsWith(lexeme, cursor.offset)

export const sliceBetween = (from: Cursor, to: Cursor): string => from.input.slice(from.offset, to.offset)

export const toEnd = (cursor: Cursor): Cursor => ({ input: cursor.input, offset: cursor.input.length })

const isWhitespace = (char: string): boolean => char === " " || char === "\t" || char === "\r" || char === "\n"

/**
 * Skip space, tab, carriage return and line feed.
 *
 * @pure true
 * @invariant returns the same offset when no whitespace leads
 */
export const skipWhitespace = (cursor: Cursor): Cursor => {
  let offset = cursor.offset
  while (offset < cursor.input.length && isWhitespace(cursor.input.charAt(offset))) {
    offset++
  }
  return offset === cursor.offset ? cursor : { input: cursor.input, offset }
}
