import * as Data from "effect/Data"
import * as Effect from "effect/Effect"

import type { JsonDocument } from "../core/document.js"
import { bindDocument } from "../core/document.js"
import type { AppError } from "../core/errors.js"
import { NoOpenContext, sinkFailure, structuralMisuse } from "../core/errors.js"
import type { EscapeOptions } from "../core/escape.js"
import { makeJsonScribe } from "../core/scribe.js"
import type { Sink, StringSink } from "../core/sink.js"
import { makeStringSink } from "../core/sink.js"

// CHANGE: run a synchronous document build as a typed Effect
// WHY: engine failures are thrown; the shell reports them as AppError values
// REF: req-render-1
// SOURCE: n/a
// FORMAT THEOREM: ∀b: inscribe(s, b) fails ⇔ b throws
// PURITY: SHELL
// EFFECT: Effect<S, AppError>
// INVARIANT: NoOpenContext → StructuralMisuse, Sink.append throw → SinkFailure, anything else → defect
// COMPLEXITY: O(n) where n = emitted characters

class SinkAppendError extends Data.TaggedError("SinkAppendError")<{
  readonly failure: unknown
}> {}

const guardSink = (sink: Sink): Sink => ({
  append: (chunk) => {
    try {
      sink.append(chunk)
    } catch (failure) {
      throw new SinkAppendError({ failure })
    }
  }
})

const describe = (failure: unknown): string => failure instanceof Error ? failure.message : String(failure)

const classify = (error: unknown): Effect.Effect<never, AppError> => {
  if (error instanceof NoOpenContext) {
    return Effect.fail(structuralMisuse(error.message))
  }
  if (error instanceof SinkAppendError) {
    return Effect.fail(sinkFailure(describe(error.failure)))
  }
  return Effect.die(error)
}

/**
 * Build a document into an arbitrary sink.
 *
 * Partial output already appended stays in the sink when the build fails. Throws
 * that come neither from the engine nor from the sink are defects.
 *
 * @pure false
 * @effect Sink.append
 * @complexity O(n)
 */
export const inscribeInto = <S extends Sink>(
  sink: S,
  build: (document: JsonDocument<S>) => unknown,
  options?: EscapeOptions
): Effect.Effect<S, AppError> =>
  Effect.try({
    try: () => {
      build(bindDocument(sink, makeJsonScribe(guardSink(sink), options)))
      return sink
    },
    catch: (error) => error
  }).pipe(Effect.catchAll(classify))

export const renderDocument = (
  build: (document: JsonDocument<StringSink>) => unknown,
  options?: EscapeOptions
): Effect.Effect<string, AppError> =>
  inscribeInto(makeStringSink(), build, options).pipe(
    Effect.map((sink) => sink.toString()),
    Effect.tap((text) => Effect.logDebug(`rendered ${text.length} characters`))
  )
