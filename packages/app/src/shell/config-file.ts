import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"

// CHANGE: decode .json-scribe.json with schema validation
// WHY: keep boundary data typed and reject invalid config early
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing implicit config yields undefined
// COMPLEXITY: O(n)

const RawConfigSchema = Schema.partial(
  Schema.Struct({
    asciiOnly: Schema.Boolean,
    htmlSafe: Schema.Boolean,
    trailingNewline: Schema.Boolean
  })
)

const ConfigSchema = Schema.parseJson(RawConfigSchema)

export const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    Schema.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.asciiOnly === undefined ? {} : { asciiOnly: config.asciiOnly }),
      ...(config.htmlSafe === undefined ? {} : { htmlSafe: config.htmlSafe }),
      ...(config.trailingNewline === undefined ? {} : { trailingNewline: config.trailingNewline })
    })),
    Effect.mapError((error) => configError(ParseResult.TreeFormatter.formatErrorSync(error)))
  )

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    yield* _(Effect.logDebug(`loaded config from ${path}`))
    return yield* _(decodeConfig(contents))
  })
