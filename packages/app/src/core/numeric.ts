import * as Either from "effect/Either"
import { Match } from "effect"
import * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"

import type { InvalidDecimal } from "./errors.js"
import { invalidDecimal } from "./errors.js"

// CHANGE: collapse numeric writes into one tagged literal and one renderer
// WHY: every numeric entry point must share the non-finite and precision policy
// REF: req-numeric-1
// SOURCE: RFC 8259 §6
// FORMAT THEOREM: ∀n ∈ NumericLiteral: render(n) ∈ JsonNumber ∪ {"null"}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: non-finite values render as null; decimals are written verbatim
// COMPLEXITY: O(d) where d = digit count

const JSON_NUMBER = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/u

export const DecimalString = Schema.String.pipe(
  Schema.pattern(JSON_NUMBER, { message: () => "expected a JSON number" }),
  Schema.brand("DecimalString")
)

export type DecimalString = Schema.Schema.Type<typeof DecimalString>

export type NumericLiteral =
  | { readonly _tag: "Integer"; readonly value: number }
  | { readonly _tag: "Float"; readonly value: number }
  | { readonly _tag: "BigInteger"; readonly value: bigint }
  | { readonly _tag: "Decimal"; readonly value: DecimalString }

export const integer = (value: number): NumericLiteral => ({ _tag: "Integer", value })

export const float = (value: number): NumericLiteral => ({ _tag: "Float", value })

export const bigInteger = (value: bigint): NumericLiteral => ({ _tag: "BigInteger", value })

export const decimal = (value: DecimalString): NumericLiteral => ({ _tag: "Decimal", value })

const decodeDecimal = Schema.decodeUnknownEither(DecimalString)

/**
 * Validate arbitrary-precision decimal text at the boundary.
 *
 * @param text - Decimal text such as `"12.50"` or `"-3e-7"`.
 * @returns The branded text unchanged, or InvalidDecimal.
 *
 * @pure true
 * @invariant Right(d) → d === text
 * @complexity O(n)
 */
export const parseDecimal = (text: string): Either.Either<DecimalString, InvalidDecimal> =>
  Either.mapLeft(
    decodeDecimal(text),
    (error) => invalidDecimal(text, ParseResult.TreeFormatter.formatErrorSync(error))
  )

const NULL_LITERAL = "null"

// BigInt keeps magnitudes ≥ 1e21 out of exponent form; -0 collapses to 0.
const renderInteger = (value: number): string =>
  Number.isFinite(value) ? BigInt(Math.trunc(value)).toString() : NULL_LITERAL

const renderFloat = (value: number): string => Number.isFinite(value) ? String(value) : NULL_LITERAL

/**
 * Render a numeric literal as a JSON token.
 *
 * @pure true
 * @invariant output parses as a JSON number or is exactly "null"
 * @complexity O(d)
 */
export const renderNumeric = (literal: NumericLiteral): string =>
  Match.value(literal).pipe(
    Match.tag("Integer", ({ value }) => renderInteger(value)),
    Match.tag("Float", ({ value }) => renderFloat(value)),
    Match.tag("BigInteger", ({ value }) => value.toString()),
    Match.tag("Decimal", ({ value }) => String(value)),
    Match.exhaustive
  )

/**
 * Map a JavaScript numeric value onto its literal variant.
 *
 * Safe integers take the Integer variant; larger magnitudes render through Float,
 * so `1e300` stays `1e+300` instead of expanding to every digit.
 */
export const toNumericLiteral = (value: number | bigint): NumericLiteral => {
  if (typeof value === "bigint") {
    return bigInteger(value)
  }
  return Number.isSafeInteger(value) ? integer(value) : float(value)
}
