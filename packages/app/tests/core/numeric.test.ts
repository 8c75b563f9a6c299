import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import {
  bigInteger,
  decimal,
  float,
  integer,
  parseDecimal,
  renderNumeric,
  toNumericLiteral
} from "../../src/core/numeric.js"

describe("renderNumeric", () => {
  it.effect("renders integers in plain base 10", () =>
    Effect.sync(() => {
      expect(renderNumeric(integer(42))).toBe("42")
      expect(renderNumeric(integer(-7))).toBe("-7")
      expect(renderNumeric(integer(-0))).toBe("0")
      expect(renderNumeric(integer(1e21))).toBe("1000000000000000000000")
    }))

  it.effect("truncates fractional parts of integers toward zero", () =>
    Effect.sync(() => {
      expect(renderNumeric(integer(3.9))).toBe("3")
      expect(renderNumeric(integer(-3.9))).toBe("-3")
    }))

  it.effect("renders non-finite values as null", () =>
    Effect.sync(() => {
      expect(renderNumeric(float(Number.NaN))).toBe("null")
      expect(renderNumeric(float(Number.POSITIVE_INFINITY))).toBe("null")
      expect(renderNumeric(float(Number.NEGATIVE_INFINITY))).toBe("null")
      expect(renderNumeric(integer(Number.NaN))).toBe("null")
    }))

  it.effect("renders floats in shortest round-trip form", () =>
    Effect.sync(() => {
      expect(renderNumeric(float(1.5))).toBe("1.5")
      expect(renderNumeric(float(0.1))).toBe("0.1")
      expect(renderNumeric(float(1e-7))).toBe("1e-7")
      expect(JSON.parse(renderNumeric(float(1e-7)))).toBe(1e-7)
    }))

  it.effect("renders big integers without loss", () =>
    Effect.sync(() => {
      expect(renderNumeric(bigInteger(12345678901234567890n))).toBe("12345678901234567890")
      expect(renderNumeric(bigInteger(-5n))).toBe("-5")
    }))

  it.effect("writes decimals verbatim", () =>
    Effect.sync(() => {
      const parsed = parseDecimal("12.50")
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        expect(renderNumeric(decimal(parsed.right))).toBe("12.50")
      }
    }))
})

describe("parseDecimal", () => {
  it.effect("accepts JSON number text", () =>
    Effect.sync(() => {
      expect(Either.isRight(parseDecimal("0"))).toBe(true)
      expect(Either.isRight(parseDecimal("-0.000001"))).toBe(true)
      expect(Either.isRight(parseDecimal("6.02E+23"))).toBe(true)
    }))

  it.effect("rejects text outside the JSON number grammar", () =>
    Effect.sync(() => {
      for (const input of ["01", "1.", ".5", "+1", "NaN", "1e", ""]) {
        const parsed = parseDecimal(input)
        expect(Either.isLeft(parsed)).toBe(true)
        if (Either.isLeft(parsed)) {
          expect(parsed.left._tag).toBe("InvalidDecimal")
          expect(parsed.left.input).toBe(input)
        }
      }
    }))
})

describe("toNumericLiteral", () => {
  it.effect("picks the variant from the value", () =>
    Effect.sync(() => {
      expect(toNumericLiteral(2)._tag).toBe("Integer")
      expect(toNumericLiteral(2.5)._tag).toBe("Float")
      expect(toNumericLiteral(2n)._tag).toBe("BigInteger")
      expect(toNumericLiteral(Number.NaN)._tag).toBe("Float")
    }))

  it.effect("keeps integers beyond the safe range in exponent form", () =>
    Effect.sync(() => {
      expect(toNumericLiteral(Number.MAX_SAFE_INTEGER)._tag).toBe("Integer")
      expect(toNumericLiteral(1e300)._tag).toBe("Float")
      expect(renderNumeric(toNumericLiteral(1e300))).toBe("1e+300")
      expect(renderNumeric(toNumericLiteral(2 ** 53))).toBe("9007199254740992")
    }))
})
