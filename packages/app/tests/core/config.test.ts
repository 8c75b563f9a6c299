import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { defaultConfig, resolveConfig } from "../../src/core/config.js"

describe("resolveConfig", () => {
  it.effect("falls back to defaults", () =>
    Effect.sync(() => {
      expect(resolveConfig({ asciiOnly: undefined, htmlSafe: undefined }, undefined)).toEqual(defaultConfig)
    }))

  it.effect("lets CLI flags override the config file", () =>
    Effect.sync(() => {
      const resolved = resolveConfig(
        { asciiOnly: false, htmlSafe: undefined },
        { asciiOnly: true, htmlSafe: true, trailingNewline: false }
      )
      expect(resolved).toEqual({
        escape: { asciiOnly: false, htmlSafe: true },
        trailingNewline: false
      })
    }))
})
