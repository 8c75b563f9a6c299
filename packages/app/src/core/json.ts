// CHANGE: describe the JSON values accepted by whole-value writes
// WHY: let callers hand over an existing value without giving up streaming output
// REF: req-json-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Json: x ∈ JsonScalar ∨ children(x) ⊆ Json
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type JsonScalar = null | undefined | boolean | number | bigint | string

export type Json =
  | JsonScalar
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }

export const isJsonArray = (value: Json): value is ReadonlyArray<Json> => Array.isArray(value)

export const isJsonObject = (value: Json): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)
