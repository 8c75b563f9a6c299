import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { NoOpenContext } from "../../src/core/errors.js"
import { makeJsonScribe } from "../../src/core/scribe.js"
import type { Sink } from "../../src/core/sink.js"
import { makeStringSink } from "../../src/core/sink.js"

describe("makeJsonScribe", () => {
  it.effect("returns the cursor to its starting value after each matched pair", () =>
    Effect.sync(() => {
      const sink = makeStringSink()
      const scribe = makeJsonScribe(sink)
      const depths: Array<number> = []
      scribe.beginArray()
      depths.push(scribe.getCursor())
      scribe.beginObject()
      depths.push(scribe.getCursor())
      scribe.writeKey("s")
      scribe.beginStringValue()
      depths.push(scribe.getCursor())
      scribe.endCurrent()
      depths.push(scribe.getCursor())
      scribe.endCurrent()
      depths.push(scribe.getCursor())
      scribe.endCurrent()
      depths.push(scribe.getCursor())
      expect(depths).toEqual([1, 2, 3, 2, 1, 0])
      expect(sink.toString()).toBe("[{\"s\":\"\"}]")
    }))

  it.effect("places commas only between array elements", () =>
    Effect.sync(() => {
      const sink = makeStringSink()
      const scribe = makeJsonScribe(sink)
      scribe.beginArray()
      scribe.writeValueLiteral("1")
      scribe.writeValueLiteral("2")
      scribe.writeValueLiteral("3")
      scribe.endCurrent()
      const text = sink.toString()
      expect(text).toBe("[1,2,3]")
      expect(text.split(",").length - 1).toBe(2)
    }))

  it.effect("separates nested constructs from their siblings", () =>
    Effect.sync(() => {
      const sink = makeStringSink()
      const scribe = makeJsonScribe(sink)
      scribe.beginArray()
      scribe.beginArray()
      scribe.writeValueLiteral("1")
      scribe.endCurrent()
      scribe.beginObject()
      scribe.endCurrent()
      scribe.writeValueLiteral("null")
      scribe.endCurrent()
      expect(sink.toString()).toBe("[[1],{},null]")
    }))

  it.effect("writes object members with key separators", () =>
    Effect.sync(() => {
      const sink = makeStringSink()
      const scribe = makeJsonScribe(sink)
      scribe.beginObject()
      scribe.writeKey("a")
      scribe.writeValueLiteral("1")
      scribe.writeKey("b")
      scribe.beginArray()
      scribe.endCurrent()
      scribe.writeKey("c")
      scribe.beginObject()
      scribe.endCurrent()
      scribe.endCurrent()
      expect(sink.toString()).toBe("{\"a\":1,\"b\":[],\"c\":{}}")
    }))

  it.effect("escapes string content appended across several calls", () =>
    Effect.sync(() => {
      const sink = makeStringSink()
      const scribe = makeJsonScribe(sink)
      scribe.beginStringValue("a\"")
      scribe.appendToStringValue("b\n")
      scribe.appendToStringValue("\\c")
      scribe.endCurrent()
      expect(sink.toString()).toBe("\"a\\\"b\\n\\\\c\"")
      expect(JSON.parse(sink.toString())).toBe("a\"b\n\\c")
    }))

  it.effect("reports the kind of the innermost open construct", () =>
    Effect.sync(() => {
      const scribe = makeJsonScribe(makeStringSink())
      expect(scribe.currentKind()).toBeUndefined()
      scribe.beginObject()
      expect(scribe.currentKind()).toBe("object")
      scribe.writeKey("k")
      scribe.beginStringValue()
      expect(scribe.currentKind()).toBe("string-value")
    }))

  it.effect("throws NoOpenContext on an extra close without writing", () =>
    Effect.sync(() => {
      const sink = makeStringSink()
      const scribe = makeJsonScribe(sink)
      scribe.beginArray()
      scribe.endCurrent()
      expect(() => scribe.endCurrent()).toThrow(NoOpenContext)
      expect(() => scribe.endCurrent()).toThrow("No open context to close")
      expect(sink.toString()).toBe("[]")
      expect(scribe.getCursor()).toBe(0)
    }))

  it.effect("closes every open construct down to a depth", () =>
    Effect.sync(() => {
      const sink = makeStringSink()
      const scribe = makeJsonScribe(sink)
      scribe.beginObject()
      scribe.writeKey("a")
      scribe.beginArray()
      scribe.beginStringValue("x")
      scribe.endTo(1)
      expect(sink.toString()).toBe("{\"a\":[\"x\"]")
      scribe.endTo(0)
      expect(sink.toString()).toBe("{\"a\":[\"x\"]}")
      expect(scribe.getCursor()).toBe(0)
    }))

  it.effect("rejects a close target outside the open depth", () =>
    Effect.sync(() => {
      const sink = makeStringSink()
      const scribe = makeJsonScribe(sink)
      scribe.beginArray()
      expect(() => scribe.endTo(2)).toThrow("Cannot close to depth 2: current depth is 1")
      expect(() => scribe.endTo(-1)).toThrow(NoOpenContext)
      expect(sink.toString()).toBe("[")
      expect(scribe.getCursor()).toBe(1)
    }))

  it.effect("reports a close target above an empty stack by its depth", () =>
    Effect.sync(() => {
      const sink = makeStringSink()
      const scribe = makeJsonScribe(sink)
      expect(() => scribe.endTo(1)).toThrow("Cannot close to depth 1: current depth is 0")
      expect(() => scribe.endCurrent()).toThrow("No open context to close")
      expect(sink.toString()).toBe("")
    }))

  it.effect("propagates sink failures unchanged", () =>
    Effect.sync(() => {
      const failure = new Error("disk full")
      const sink: Sink = {
        append: () => {
          throw failure
        }
      }
      const scribe = makeJsonScribe(sink)
      expect(() => scribe.beginArray()).toThrow(failure)
      expect(scribe.getCursor()).toBe(0)
    }))
})
