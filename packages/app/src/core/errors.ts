import * as Data from "effect/Data"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the JSON writer and its CLI
// WHY: separate thrown programming errors from typed shell failures
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

/**
 * Raised by the engine when a close is requested and no matching construct is open.
 *
 * Nothing has been written to the sink when this is thrown.
 */
export class NoOpenContext extends Data.TaggedError("NoOpenContext")<{
  readonly message: string
  readonly cursor: number
  readonly target: number
}> {}

/**
 * Failure of a close that targets depth `target` while the engine is at `cursor`.
 *
 * A target one below the cursor is a plain single close, which only fails on an empty stack.
 */
export const noOpenContext = (cursor: number, target: number): NoOpenContext =>
  new NoOpenContext({
    message: target === cursor - 1
      ? "No open context to close"
      : `Cannot close to depth ${target}: current depth is ${cursor}`,
    cursor,
    target
  })

/**
 * Failure of a handle whose construct, opened at `depth`, is not the innermost one.
 */
export const unbalancedClose = (cursor: number, depth: number): NoOpenContext =>
  new NoOpenContext({
    message: cursor > depth
      ? `Cannot close depth ${depth}: depth ${cursor} is still open`
      : `Cannot close depth ${depth}: it is already closed at depth ${cursor}`,
    cursor,
    target: depth - 1
  })

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type StructuralMisuse = { readonly _tag: "StructuralMisuse"; readonly message: string }
export type SinkFailure = { readonly _tag: "SinkFailure"; readonly message: string }
export type InvalidDecimal = { readonly _tag: "InvalidDecimal"; readonly input: string; readonly message: string }

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | StructuralMisuse
  | SinkFailure
  | InvalidDecimal

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const structuralMisuse = (message: string): StructuralMisuse => ({
  _tag: "StructuralMisuse",
  message
})

export const sinkFailure = (message: string): SinkFailure => ({
  _tag: "SinkFailure",
  message
})

export const invalidDecimal = (input: string, message: string): InvalidDecimal => ({
  _tag: "InvalidDecimal",
  input,
  message
})
