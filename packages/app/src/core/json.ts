// CHANGE: plain data shape that decoded trees project onto
// WHY: callers that need neither key order metadata nor the integral flag read ordinary objects and arrays
// REF: req-json-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ Value: toJson(v) ∈ Json ∧ JSON.stringify(toJson(v)) is defined
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: number leaves are finite doubles; containers hold only Json
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }
