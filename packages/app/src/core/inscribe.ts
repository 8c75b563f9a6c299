import type { Json, JsonScalar } from "./json.js"
import { isJsonArray, isJsonObject } from "./json.js"
import type { NumericLiteral } from "./numeric.js"
import { renderNumeric, toNumericLiteral } from "./numeric.js"
import type { JsonScribe } from "./scribe.js"

// CHANGE: translate scalar and whole-value writes into engine primitives
// WHY: every builder entry point shares one null-coalescing dispatch
// REF: req-inscribe-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ {null, undefined}: inscribeScalar(v) ≡ writeValueLiteral("null")
// PURITY: SHELL
// EFFECT: JsonScribe
// INVARIANT: each call leaves the engine at the depth it started from
// COMPLEXITY: O(n) where n = size of the written value

export const NULL_TOKEN = "null"

export const booleanToken = (value: boolean): string => value ? "true" : "false"

export const inscribeNull = (scribe: JsonScribe): void => scribe.writeValueLiteral(NULL_TOKEN)

export const inscribeNumber = (scribe: JsonScribe, literal: NumericLiteral | null | undefined): void =>
  scribe.writeValueLiteral(literal === null || literal === undefined ? NULL_TOKEN : renderNumeric(literal))

export const inscribeString = (scribe: JsonScribe, value: string): void => {
  scribe.beginStringValue(value)
  scribe.endCurrent()
}

/**
 * Write one scalar value at the engine's current position.
 *
 * @param scribe - Engine positioned where a value is expected.
 * @param value - Scalar; null and undefined become the null literal.
 *
 * @pure false
 * @effect JsonScribe
 * @invariant cursor is unchanged on return
 * @complexity O(n) for strings, O(1) otherwise
 */
export const inscribeScalar = (scribe: JsonScribe, value: JsonScalar): void => {
  if (value === null || value === undefined) {
    inscribeNull(scribe)
    return
  }
  if (typeof value === "boolean") {
    scribe.writeValueLiteral(booleanToken(value))
    return
  }
  if (typeof value === "string") {
    inscribeString(scribe, value)
    return
  }
  inscribeNumber(scribe, toNumericLiteral(value))
}

/**
 * Stream a nested Json value through the engine, depth first.
 *
 * Object members are written in own-key order; undefined members are written as null.
 */
export const inscribeJson = (scribe: JsonScribe, value: Json): void => {
  if (isJsonArray(value)) {
    scribe.beginArray()
    for (const element of value) {
      inscribeJson(scribe, element)
    }
    scribe.endCurrent()
    return
  }
  if (isJsonObject(value)) {
    scribe.beginObject()
    for (const [key, member] of Object.entries(value)) {
      scribe.writeKey(key)
      inscribeJson(scribe, member)
    }
    scribe.endCurrent()
    return
  }
  inscribeScalar(scribe, value)
}
