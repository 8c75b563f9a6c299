import type { EscapeOptions } from "./escape.js"
import { inscribeJson, inscribeScalar } from "./inscribe.js"
import type { Json, JsonScalar } from "./json.js"
import type { JsonArrayNode, JsonObjectNode, JsonValueNode } from "./nodes.js"
import { makeArrayNode, makeObjectNode, makeValueNode } from "./nodes.js"
import type { JsonScribe } from "./scribe.js"
import { makeJsonScribe } from "./scribe.js"
import type { Sink } from "./sink.js"

// CHANGE: provide top-level entry points that hand back the sink when the document closes
// WHY: a fluent chain needs a terminal value once the outermost construct is closed
// REF: req-document-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d: d.array()...then() = d.sink
// PURITY: SHELL
// EFFECT: Sink.append
// INVARIANT: one engine per document; the sink is never flushed or closed here
// COMPLEXITY: O(1)

export interface JsonDocument<S extends Sink> {
  readonly sink: S
  readonly scribe: JsonScribe
  readonly array: () => JsonArrayNode<S>
  readonly object: () => JsonObjectNode<S>
  readonly value: (prefix?: string) => JsonValueNode<S>
  readonly scalar: (value: JsonScalar) => S
  readonly json: (value: Json) => S
  readonly depth: () => number
  /** Closes every construct still open, innermost first. */
  readonly finish: () => S
}

/**
 * Start a writing session over `sink`.
 *
 * @param sink - Destination; returned by every terminal call.
 * @param options - Escaping options for keys and strings.
 * @returns Document whose entry points open the top-level value.
 *
 * @pure false
 * @invariant depth() = 0 before any entry point is used
 * @complexity O(1)
 */
export const makeDocument = <S extends Sink>(
  sink: S,
  options?: EscapeOptions
): JsonDocument<S> => bindDocument(sink, makeJsonScribe(sink, options))

/**
 * Document over an engine that may write somewhere other than `sink`, such as a
 * wrapper around it; terminal calls still return `sink`.
 */
export const bindDocument = <S extends Sink>(sink: S, scribe: JsonScribe): JsonDocument<S> => {
  return {
    sink,
    scribe,
    array: () => {
      scribe.beginArray()
      return makeArrayNode(scribe, sink)
    },
    object: () => {
      scribe.beginObject()
      return makeObjectNode(scribe, sink)
    },
    value: (prefix) => {
      scribe.beginStringValue(prefix)
      return makeValueNode(scribe, sink)
    },
    scalar: (value) => {
      inscribeScalar(scribe, value)
      return sink
    },
    json: (value) => {
      inscribeJson(scribe, value)
      return sink
    },
    depth: scribe.getCursor,
    finish: () => {
      scribe.endTo(0)
      return sink
    }
  }
}

export const openArray = <S extends Sink>(sink: S, options?: EscapeOptions): JsonArrayNode<S> =>
  makeDocument(sink, options).array()

export const openObject = <S extends Sink>(sink: S, options?: EscapeOptions): JsonObjectNode<S> =>
  makeDocument(sink, options).object()

export const openValue = <S extends Sink>(
  sink: S,
  prefix?: string,
  options?: EscapeOptions
): JsonValueNode<S> => makeDocument(sink, options).value(prefix)

export const writeScalar = <S extends Sink>(sink: S, value: JsonScalar, options?: EscapeOptions): S =>
  makeDocument(sink, options).scalar(value)

export const writeJson = <S extends Sink>(sink: S, value: Json, options?: EscapeOptions): S =>
  makeDocument(sink, options).json(value)
