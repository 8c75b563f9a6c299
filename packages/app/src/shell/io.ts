import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"

// CHANGE: read CLI input and deliver rendered documents to a file or stdout
// WHY: isolate filesystem IO from document rendering
// REF: req-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p,t: deliver(Some(p), t); read(p) = t
// PURITY: SHELL
// EFFECT: Effect<void, AppError, FileSystem>
// INVARIANT: output is written once per run
// COMPLEXITY: O(n)

export const readTextFile = (
  path: string
): Effect.Effect<string, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    return yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
  })

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload)
  })

export const deliverOutput = (
  payload: string,
  outputPath: string | undefined
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    if (outputPath === undefined) {
      return yield* _(writeStdout(payload))
    }
    const fs = yield* _(FileSystem)
    yield* _(
      fs.writeFileString(outputPath, payload).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    yield* _(Effect.logDebug(`wrote ${payload.length} characters to ${outputPath}`))
  })
