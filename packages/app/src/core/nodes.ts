import type { JsonScalar, Json } from "./json.js"
import type { DecimalString, NumericLiteral } from "./numeric.js"
import { decimal } from "./numeric.js"
import {
  booleanToken,
  inscribeJson,
  inscribeNull,
  inscribeNumber,
  inscribeScalar
} from "./inscribe.js"
import type { JsonScribe } from "./scribe.js"
import { unbalancedClose } from "./errors.js"

// CHANGE: expose typed builder handles for arrays, objects and string values
// WHY: the handle types decide which calls are legal, so the engine stays unchecked
// REF: req-nodes-1
// SOURCE: n/a
// FORMAT THEOREM: ∀n: n.then() = parent(n) ∧ depth(after) = depth(n) - 1
// PURITY: SHELL
// EFFECT: JsonScribe
// INVARIANT: every handle maps to exactly one frame; then() closes only that frame
// COMPLEXITY: O(1) per call plus the size of written text

/**
 * Function given a view of an open construct to write into it; its return value is ignored.
 */
export type Inscription<V> = (view: V) => unknown

/**
 * Writes into an open JSON string literal. Text is escaped and written immediately.
 */
export interface StringWriter<Self> {
  readonly append: (text: string) => Self
  readonly appendAll: (chunks: Iterable<string>) => Self
  readonly inscribe: (inscription: Inscription<InscribedString>) => Self
}

/**
 * Writes elements into an open JSON array.
 *
 * A child handle obtained from `element`, `array` or `object` must be closed
 * before this writer is used again.
 */
export interface ArrayWriter<Self> {
  readonly withNull: () => Self
  readonly withTrue: () => Self
  readonly withFalse: () => Self
  readonly with: (element: JsonScalar) => Self
  readonly withNumber: (element: NumericLiteral | null | undefined) => Self
  readonly withDecimal: (element: DecimalString | null | undefined) => Self
  readonly withJson: (element: Json) => Self
  readonly withAll: (elements: Iterable<JsonScalar> | null | undefined) => Self
  readonly withEmptyArray: () => Self
  readonly withEmptyObject: () => Self
  readonly element: (prefix?: string | null) => JsonValueNode<Self>
  readonly array: () => JsonArrayNode<Self>
  readonly object: () => JsonObjectNode<Self>
  readonly inscribe: (inscription: Inscription<InscribedArray>) => Self
}

/**
 * Writes members into an open JSON object. Every member write takes its key;
 * keys are not de-duplicated.
 */
export interface ObjectWriter<Self> {
  readonly withNull: (key: string) => Self
  readonly withTrue: (key: string) => Self
  readonly withFalse: (key: string) => Self
  readonly with: (key: string, value: JsonScalar) => Self
  readonly withNumber: (key: string, value: NumericLiteral | null | undefined) => Self
  readonly withDecimal: (key: string, value: DecimalString | null | undefined) => Self
  readonly withJson: (key: string, value: Json) => Self
  readonly withAll: (entries: Iterable<readonly [string, JsonScalar]> | null | undefined) => Self
  readonly withEmptyArray: (key: string) => Self
  readonly withEmptyObject: (key: string) => Self
  readonly element: (key: string, prefix?: string | null) => JsonValueNode<Self>
  readonly array: (key: string) => JsonArrayNode<Self>
  readonly object: (key: string) => JsonObjectNode<Self>
  readonly inscribe: (inscription: Inscription<InscribedObject>) => Self
}

// Views handed to inscriptions: they write into the host but cannot close it.
export interface InscribedString extends StringWriter<InscribedString> {}
export interface InscribedArray extends ArrayWriter<InscribedArray> {}
export interface InscribedObject extends ObjectWriter<InscribedObject> {}

/**
 * Open JSON string literal.
 *
 * `then()` throws `NoOpenContext` unless this is the innermost open construct.
 */
export interface JsonValueNode<P> extends StringWriter<JsonValueNode<P>> {
  /** Writes the closing quote and returns the enclosing handle. */
  readonly then: () => P
}

export interface JsonArrayNode<P> extends ArrayWriter<JsonArrayNode<P>> {
  /** Writes `]` and returns the enclosing handle. */
  readonly then: () => P
}

export interface JsonObjectNode<P> extends ObjectWriter<JsonObjectNode<P>> {
  /** Writes `}` and returns the enclosing handle. */
  readonly then: () => P
}

const writeEmptyArray = (scribe: JsonScribe): void => {
  scribe.beginArray()
  scribe.endCurrent()
}

const writeEmptyObject = (scribe: JsonScribe): void => {
  scribe.beginObject()
  scribe.endCurrent()
}

const toDecimalLiteral = (value: DecimalString | null | undefined): NumericLiteral | undefined =>
  value === null || value === undefined ? undefined : decimal(value)

/**
 * Close the construct a handle opened at `depth`.
 *
 * @invariant writes nothing unless getCursor() = depth
 */
const closeAt = (scribe: JsonScribe, depth: number): void => {
  const cursor = scribe.getCursor()
  if (cursor !== depth) {
    throw unbalancedClose(cursor, depth)
  }
  scribe.endTo(depth - 1)
}

const stringWriter = <Self>(scribe: JsonScribe, self: () => Self): StringWriter<Self> => ({
  append: (text) => {
    scribe.appendToStringValue(text)
    return self()
  },
  appendAll: (chunks) => {
    for (const chunk of chunks) {
      scribe.appendToStringValue(chunk)
    }
    return self()
  },
  inscribe: (inscription) => {
    inscription(inscribedString(scribe))
    return self()
  }
})

const arrayWriter = <Self>(scribe: JsonScribe, self: () => Self): ArrayWriter<Self> => {
  const step = (write: () => void): Self => {
    write()
    return self()
  }
  return {
    withNull: () => step(() => inscribeNull(scribe)),
    withTrue: () => step(() => scribe.writeValueLiteral(booleanToken(true))),
    withFalse: () => step(() => scribe.writeValueLiteral(booleanToken(false))),
    with: (element) => step(() => inscribeScalar(scribe, element)),
    withNumber: (element) => step(() => inscribeNumber(scribe, element)),
    withDecimal: (element) => step(() => inscribeNumber(scribe, toDecimalLiteral(element))),
    withJson: (element) => step(() => inscribeJson(scribe, element)),
    withAll: (elements) =>
      step(() => {
        for (const element of elements ?? []) {
          inscribeScalar(scribe, element)
        }
      }),
    withEmptyArray: () => step(() => writeEmptyArray(scribe)),
    withEmptyObject: () => step(() => writeEmptyObject(scribe)),
    element: (prefix) => {
      scribe.beginStringValue(prefix ?? undefined)
      return makeValueNode(scribe, self())
    },
    array: () => {
      scribe.beginArray()
      return makeArrayNode(scribe, self())
    },
    object: () => {
      scribe.beginObject()
      return makeObjectNode(scribe, self())
    },
    inscribe: (inscription) => step(() => inscription(inscribedArray(scribe)))
  }
}

const objectWriter = <Self>(scribe: JsonScribe, self: () => Self): ObjectWriter<Self> => {
  const member = (key: string, write: () => void): Self => {
    scribe.writeKey(key)
    write()
    return self()
  }
  return {
    withNull: (key) => member(key, () => inscribeNull(scribe)),
    withTrue: (key) => member(key, () => scribe.writeValueLiteral(booleanToken(true))),
    withFalse: (key) => member(key, () => scribe.writeValueLiteral(booleanToken(false))),
    with: (key, value) => member(key, () => inscribeScalar(scribe, value)),
    withNumber: (key, value) => member(key, () => inscribeNumber(scribe, value)),
    withDecimal: (key, value) => member(key, () => inscribeNumber(scribe, toDecimalLiteral(value))),
    withJson: (key, value) => member(key, () => inscribeJson(scribe, value)),
    withAll: (entries) => {
      for (const [key, value] of entries ?? []) {
        scribe.writeKey(key)
        inscribeScalar(scribe, value)
      }
      return self()
    },
    withEmptyArray: (key) => member(key, () => writeEmptyArray(scribe)),
    withEmptyObject: (key) => member(key, () => writeEmptyObject(scribe)),
    element: (key, prefix) => {
      scribe.writeKey(key)
      scribe.beginStringValue(prefix ?? undefined)
      return makeValueNode(scribe, self())
    },
    array: (key) => {
      scribe.writeKey(key)
      scribe.beginArray()
      return makeArrayNode(scribe, self())
    },
    object: (key) => {
      scribe.writeKey(key)
      scribe.beginObject()
      return makeObjectNode(scribe, self())
    },
    inscribe: (inscription) => {
      inscription(inscribedObject(scribe))
      return self()
    }
  }
}

const inscribedString = (scribe: JsonScribe): InscribedString => {
  const view: InscribedString = stringWriter<InscribedString>(scribe, () => view)
  return view
}

const inscribedArray = (scribe: JsonScribe): InscribedArray => {
  const view: InscribedArray = arrayWriter<InscribedArray>(scribe, () => view)
  return view
}

const inscribedObject = (scribe: JsonScribe): InscribedObject => {
  const view: InscribedObject = objectWriter<InscribedObject>(scribe, () => view)
  return view
}

/**
 * Bind a string-value handle to the frame the engine just opened.
 */
export const makeValueNode = <P>(scribe: JsonScribe, parent: P): JsonValueNode<P> => {
  const depth = scribe.getCursor()
  const node: JsonValueNode<P> = {
    ...stringWriter<JsonValueNode<P>>(scribe, () => node),
    then: () => {
      closeAt(scribe, depth)
      return parent
    }
  }
  return node
}

/**
 * Bind an array handle to the frame the engine just opened.
 *
 * @param scribe - Engine whose innermost frame is the array.
 * @param parent - Value returned by `then()`.
 *
 * @pure false
 * @invariant then() pops exactly one frame, and only its own
 * @complexity O(1)
 */
export const makeArrayNode = <P>(scribe: JsonScribe, parent: P): JsonArrayNode<P> => {
  const depth = scribe.getCursor()
  const node: JsonArrayNode<P> = {
    ...arrayWriter<JsonArrayNode<P>>(scribe, () => node),
    then: () => {
      closeAt(scribe, depth)
      return parent
    }
  }
  return node
}

/**
 * Bind an object handle to the frame the engine just opened.
 *
 * @pure false
 * @invariant each member write emits exactly one key and one value
 * @complexity O(1)
 */
export const makeObjectNode = <P>(scribe: JsonScribe, parent: P): JsonObjectNode<P> => {
  const depth = scribe.getCursor()
  const node: JsonObjectNode<P> = {
    ...objectWriter<JsonObjectNode<P>>(scribe, () => node),
    then: () => {
      closeAt(scribe, depth)
      return parent
    }
  }
  return node
}
