import { noOpenContext } from "./errors.js"
import type { EscapeOptions } from "./escape.js"
import { defaultEscapeOptions, escapeJsonText } from "./escape.js"
import type { ContextFrame, ContextKind } from "./frame.js"
import {
  afterKey,
  afterValue,
  closeDelimiter,
  keySeparator,
  openDelimiter,
  openFrame,
  valueSeparator
} from "./frame.js"
import type { Sink } from "./sink.js"

// CHANGE: implement the streaming JSON writing engine over a context stack
// WHY: emit separators and delimiters as calls arrive, without building a tree
// REF: req-scribe-1
// SOURCE: n/a
// FORMAT THEOREM: ∀ well-formed call sequence: sink contents are a valid JSON prefix
// PURITY: SHELL
// EFFECT: Sink.append
// INVARIANT: getCursor() = stack.length; nothing is written when a close fails
// COMPLEXITY: O(1) per structural call, O(n) per text call

export interface JsonScribe {
  readonly beginArray: () => void
  readonly beginObject: () => void
  readonly beginStringValue: (prefix?: string) => void
  readonly appendToStringValue: (text: string) => void
  readonly writeKey: (key: string) => void
  readonly writeValueLiteral: (token: string) => void
  readonly endCurrent: () => void
  readonly endTo: (depth: number) => void
  readonly getCursor: () => number
  readonly currentKind: () => ContextKind | undefined
}

/**
 * Create an engine writing to `sink`.
 *
 * The engine owns its stack for the whole session. Key and value order inside
 * objects is not checked here; the builder handles keep it by construction.
 *
 * @param sink - Destination for every emitted character.
 * @param options - Escaping applied to keys and string content.
 * @returns A fresh engine at depth 0.
 *
 * @pure false
 * @effect Sink.append
 * @invariant cursor never goes negative
 * @complexity O(1)
 */
export const makeJsonScribe = (
  sink: Sink,
  options: EscapeOptions = defaultEscapeOptions
): JsonScribe => {
  const stack: Array<ContextFrame> = []

  const top = (): ContextFrame | undefined => stack[stack.length - 1]

  const replaceTop = (update: (frame: ContextFrame) => ContextFrame): void => {
    const frame = top()
    if (frame !== undefined) {
      stack[stack.length - 1] = update(frame)
    }
  }

  // Separator goes out first; frame state only changes once the sink accepted it.
  const enterValue = (): void => {
    const separator = valueSeparator(top())
    if (separator.length > 0) {
      sink.append(separator)
    }
  }

  const push = (kind: ContextKind): void => {
    enterValue()
    sink.append(openDelimiter(kind))
    replaceTop(afterValue)
    stack.push(openFrame(kind))
  }

  const pop = (): void => {
    const frame = top()
    if (frame === undefined) {
      throw noOpenContext(0, -1)
    }
    sink.append(closeDelimiter(frame.kind))
    stack.pop()
    replaceTop(afterValue)
  }

  const appendEscaped = (text: string): void => {
    if (text.length > 0) {
      sink.append(escapeJsonText(text, options))
    }
  }

  return {
    beginArray: () => push("array"),
    beginObject: () => push("object"),
    beginStringValue: (prefix) => {
      push("string-value")
      if (prefix !== undefined) {
        appendEscaped(prefix)
      }
    },
    appendToStringValue: appendEscaped,
    writeKey: (key) => {
      const frame = top()
      const separator = frame === undefined ? "" : keySeparator(frame)
      sink.append(`${separator}"${escapeJsonText(key, options)}":`)
      replaceTop(afterKey)
    },
    writeValueLiteral: (token) => {
      enterValue()
      sink.append(token)
      replaceTop(afterValue)
    },
    endCurrent: pop,
    endTo: (depth) => {
      if (depth < 0 || depth > stack.length) {
        throw noOpenContext(stack.length, depth)
      }
      while (stack.length > depth) {
        pop()
      }
    },
    getCursor: () => stack.length,
    currentKind: () => top()?.kind
  }
}
