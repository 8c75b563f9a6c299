export { defaultConfig, resolveConfig } from "./core/config.js"
export type { FileConfig, ResolvedConfig } from "./core/config.js"
export { makeDocument, openArray, openObject, openValue, writeJson, writeScalar } from "./core/document.js"
export type { JsonDocument } from "./core/document.js"
export { NoOpenContext } from "./core/errors.js"
export type { AppError } from "./core/errors.js"
export { defaultEscapeOptions, escapeJsonText, quoteJsonText } from "./core/escape.js"
export type { EscapeOptions } from "./core/escape.js"
export type { ContextKind } from "./core/frame.js"
export type { Json, JsonObject, JsonScalar } from "./core/json.js"
export type {
  ArrayWriter,
  InscribedArray,
  InscribedObject,
  InscribedString,
  Inscription,
  JsonArrayNode,
  JsonObjectNode,
  JsonValueNode,
  ObjectWriter,
  StringWriter
} from "./core/nodes.js"
export {
  bigInteger,
  decimal,
  DecimalString,
  float,
  integer,
  parseDecimal,
  renderNumeric,
  toNumericLiteral
} from "./core/numeric.js"
export type { NumericLiteral } from "./core/numeric.js"
export { makeJsonScribe } from "./core/scribe.js"
export type { JsonScribe } from "./core/scribe.js"
export { makeStringSink } from "./core/sink.js"
export type { Sink, StringSink } from "./core/sink.js"
export { inscribeInto, renderDocument } from "./shell/render.js"
