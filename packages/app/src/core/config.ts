import type { CliArgs } from "./cli.js"
import type { EscapeOptions } from "./escape.js"

// CHANGE: define config merging rules and defaults for rendering
// WHY: ensure CLI flags override config file and defaults deterministically
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved config has no undefined fields
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly asciiOnly?: boolean
  readonly htmlSafe?: boolean
  readonly trailingNewline?: boolean
}

export interface ResolvedConfig {
  readonly escape: EscapeOptions
  readonly trailingNewline: boolean
}

export const defaultConfigPath = "./.json-scribe.json"

export const defaultConfig: ResolvedConfig = {
  escape: { asciiOnly: false, htmlSafe: false },
  trailingNewline: true
}

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .json-scribe.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: Pick<CliArgs, "asciiOnly" | "htmlSafe">,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  escape: {
    asciiOnly: cli.asciiOnly ?? fileConfig?.asciiOnly ?? defaultConfig.escape.asciiOnly,
    htmlSafe: cli.htmlSafe ?? fileConfig?.htmlSafe ?? defaultConfig.escape.htmlSafe
  },
  trailingNewline: fileConfig?.trailingNewline ?? defaultConfig.trailingNewline
})
