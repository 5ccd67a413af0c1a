import { Match } from "effect"

import type { Json } from "./json.js"

// CHANGE: define the decoded value as a closed tagged union
// WHY: keep the number literal shape and object key order that plain JS values lose
// REF: req-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ Value: v._tag ∈ {"Null","Bool","Number","String","Array","Object"}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Object keys are unique; Array order equals source order
// COMPLEXITY: O(1)/O(1)

export type NullValue = { readonly _tag: "Null" }
export type BoolValue = { readonly _tag: "Bool"; readonly value: boolean }
export type NumberValue = {
  readonly _tag: "Number"
  readonly value: number | bigint
  readonly integral: boolean
}
export type StringValue = { readonly _tag: "String"; readonly value: string }
export type ArrayValue = { readonly _tag: "Array"; readonly items: ReadonlyArray<Value> }
export type ObjectValue = { readonly _tag: "Object"; readonly entries: ReadonlyMap<string, Value> }

export type Value =
  | NullValue
  | BoolValue
  | NumberValue
  | StringValue
  | ArrayValue
  | ObjectValue

export const nullValue: NullValue = { _tag: "Null" }

export const boolValue = (value: boolean): BoolValue => ({ _tag: "Bool", value })

export const numberValue = (value: number | bigint, integral: boolean): NumberValue => ({
  _tag: "Number",
  value,
  integral
})

export const stringValue = (value: string): StringValue => ({ _tag: "String", value })

export const arrayValue = (items: ReadonlyArray<Value>): ArrayValue => ({ _tag: "Array", items })

export const objectValue = (entries: ReadonlyMap<string, Value>): ObjectValue => ({
  _tag: "Object",
  entries
})

const objectToJson = (value: ObjectValue): Json => {
  const result: Record<string, Json> = {}
  for (const [key, entry] of value.entries) {
    Object.defineProperty(result, key, {
      value: toJson(entry),
      enumerable: true,
      writable: true,
      configurable: true
    })
  }
  return result
}

/**
 * Project a decoded value onto plain JSON data.
 *
 * @param value - Decoded value.
 * @returns Json with object keys in insertion order.
 *
 * @pure true
 * @invariant "__proto__" keys become own properties
 * @invariant bigint numbers are narrowed to the nearest double
 * @complexity O(n) where n = number of nodes
 */
export const toJson: (value: Value) => Json = Match.type<Value>().pipe(
  Match.withReturnType<Json>(),
  Match.tag("Null", () => null),
  Match.tag("Bool", (node) => node.value),
  Match.tag("Number", (node) => Number(node.value)),
  Match.tag("String", (node) => node.value),
  Match.tag("Array", (node) => node.items.map((item) => toJson(item))),
  Match.tag("Object", objectToJson),
  Match.exhaustive
)
