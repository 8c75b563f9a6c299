// CHANGE: model one open JSON construct as an immutable frame
// WHY: the engine decides separators and closing delimiters from the innermost frame only
// REF: req-frame-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f ∈ Frame: f.kind ≠ "object" → f.awaitingKey = false
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: frames are replaced, never mutated
// COMPLEXITY: O(1)/O(1)

export type ContextKind = "array" | "object" | "string-value"

export interface ContextFrame {
  readonly kind: ContextKind
  readonly hasEmittedFirstChild: boolean
  readonly awaitingKey: boolean
}

const openDelimiters: Readonly<Record<ContextKind, string>> = {
  array: "[",
  object: "{",
  "string-value": "\""
}

const closeDelimiters: Readonly<Record<ContextKind, string>> = {
  array: "]",
  object: "}",
  "string-value": "\""
}

export const openDelimiter = (kind: ContextKind): string => openDelimiters[kind]

export const closeDelimiter = (kind: ContextKind): string => closeDelimiters[kind]

export const openFrame = (kind: ContextKind): ContextFrame => ({
  kind,
  hasEmittedFirstChild: false,
  awaitingKey: kind === "object"
})

/**
 * Separator that must precede a value written directly into `frame`.
 *
 * Array elements after the first take `,`. Object values follow their key's `:`,
 * string content is never separated, and top level has no frame.
 */
export const valueSeparator = (frame: ContextFrame | undefined): string =>
  frame !== undefined && frame.kind === "array" && frame.hasEmittedFirstChild ? "," : ""

export const keySeparator = (frame: ContextFrame): string => frame.hasEmittedFirstChild ? "," : ""

/**
 * Frame state after a value (literal or nested construct) has been placed in it.
 *
 * @pure true
 * @invariant object frames expect a key next
 */
export const afterValue = (frame: ContextFrame): ContextFrame => {
  if (frame.kind === "string-value") {
    return frame
  }
  return {
    kind: frame.kind,
    hasEmittedFirstChild: true,
    awaitingKey: frame.kind === "object"
  }
}

export const afterKey = (frame: ContextFrame): ContextFrame => ({
  kind: frame.kind,
  hasEmittedFirstChild: true,
  awaitingKey: false
})
