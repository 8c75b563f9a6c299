#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { runCli } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) exits 0 ⇔ runCli succeeds
// PURITY: SHELL
// EFFECT: Effect<void, AppError, NodeContext>
// INVARIANT: failures are logged by the runtime and exit non-zero
// COMPLEXITY: O(1)

const main = Effect.gen(function*(_) {
  const result = yield* _(runCli(process.argv, process.env))
  yield* _(Effect.logDebug(`${result.command} wrote ${result.output.length} characters`))
})

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
