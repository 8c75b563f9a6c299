import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { escapeJsonText, quoteJsonText } from "../../src/core/escape.js"

describe("escapeJsonText", () => {
  it.effect("escapes quotes and backslashes", () =>
    Effect.sync(() => {
      expect(escapeJsonText("say \"hi\" \\ bye")).toBe("say \\\"hi\\\" \\\\ bye")
    }))

  it.effect("uses two-character forms for common control characters", () =>
    Effect.sync(() => {
      expect(escapeJsonText("\b\f\n\r\t")).toBe("\\b\\f\\n\\r\\t")
    }))

  it.effect("uses unicode escapes for other control characters", () =>
    Effect.sync(() => {
      expect(escapeJsonText("\u0000\u0001\u001f")).toBe("\\u0000\\u0001\\u001f")
    }))

  it.effect("passes printable and non-ASCII text through", () =>
    Effect.sync(() => {
      const text = "héllo ✓ 😀 <b>&'='</b> \u007f"
      expect(escapeJsonText(text)).toBe(text)
    }))

  it.effect("produces literals that parse back to the original text", () =>
    Effect.sync(() => {
      const original = "quote \" slash \\ nul \u0000 bell \u0007 tab \t line\nend 😀"
      expect(JSON.parse(quoteJsonText(original))).toBe(original)
    }))

  it.effect("gives the same result for text split into chunks", () =>
    Effect.sync(() => {
      const left = "a\"b\n"
      const right = "\u0002c\\"
      expect(escapeJsonText(left) + escapeJsonText(right)).toBe(escapeJsonText(left + right))
    }))

  it.effect("escapes everything above ASCII when asciiOnly is set", () =>
    Effect.sync(() => {
      const options = { asciiOnly: true, htmlSafe: false }
      expect(escapeJsonText("é", options)).toBe("\\u00e9")
      expect(escapeJsonText("😀", options)).toBe("\\ud83d\\ude00")
      expect(escapeJsonText("\u007f", options)).toBe("\\u007f")
      expect(escapeJsonText("plain", options)).toBe("plain")
    }))

  it.effect("escapes markup characters when htmlSafe is set", () =>
    Effect.sync(() => {
      const options = { asciiOnly: false, htmlSafe: true }
      expect(escapeJsonText("<a href='x'>&", options)).toBe(
        "\\u003ca href\\u003d\\u0027x\\u0027\\u003e\\u0026"
      )
    }))
})
