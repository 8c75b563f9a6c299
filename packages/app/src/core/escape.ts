// CHANGE: escape string content for JSON literals in a single streaming pass
// WHY: content may reach the sink in several chunks before the closing quote
// REF: req-escape-1
// SOURCE: RFC 8259 §7
// FORMAT THEOREM: ∀s: JSON.parse("\"" + escapeJsonText(s) + "\"") = s
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: escaping is per code unit, so escape(a + b) = escape(a) + escape(b)
// COMPLEXITY: O(n)/O(n)

export interface EscapeOptions {
  readonly asciiOnly: boolean
  readonly htmlSafe: boolean
}

export const defaultEscapeOptions: EscapeOptions = {
  asciiOnly: false,
  htmlSafe: false
}

const shortEscapes: ReadonlyMap<number, string> = new Map([
  [0x22, "\\\""],
  [0x5c, "\\\\"],
  [0x08, "\\b"],
  [0x0c, "\\f"],
  [0x0a, "\\n"],
  [0x0d, "\\r"],
  [0x09, "\\t"]
])

const htmlSensitive: ReadonlySet<number> = new Set([0x3c, 0x3e, 0x26, 0x27, 0x3d])

const unicodeEscape = (code: number): string => `\\u${code.toString(16).padStart(4, "0")}`

const escapeCodeUnit = (code: number, options: EscapeOptions): string | undefined => {
  const short = shortEscapes.get(code)
  if (short !== undefined) {
    return short
  }
  if (code < 0x20) {
    return unicodeEscape(code)
  }
  if (options.asciiOnly && code > 0x7e) {
    return unicodeEscape(code)
  }
  if (options.htmlSafe && htmlSensitive.has(code)) {
    return unicodeEscape(code)
  }
  return undefined
}

/**
 * Escape text for placement between the quotes of a JSON string.
 *
 * Runs of characters that need no escaping are copied as slices.
 *
 * @pure true
 * @complexity O(n)
 */
export const escapeJsonText = (
  text: string,
  options: EscapeOptions = defaultEscapeOptions
): string => {
  let result = ""
  let runStart = 0
  for (let index = 0; index < text.length; index++) {
    const escaped = escapeCodeUnit(text.charCodeAt(index), options)
    if (escaped !== undefined) {
      result += text.slice(runStart, index) + escaped
      runStart = index + 1
    }
  }
  return runStart === 0 ? text : result + text.slice(runStart)
}

export const quoteJsonText = (
  text: string,
  options: EscapeOptions = defaultEscapeOptions
): string => `"${escapeJsonText(text, options)}"`
