import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Match } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { defaultConfigPath, resolveConfig } from "../core/config.js"
import type { JsonDocument } from "../core/document.js"
import type { AppError } from "../core/errors.js"
import { splitLines } from "../core/lines.js"
import type { StringSink } from "../core/sink.js"
import { loadConfigFile } from "../shell/config-file.js"
import { deliverOutput, readTextFile } from "../shell/io.js"
import { renderDocument } from "../shell/render.js"

// CHANGE: orchestrate CLI commands with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀cmd: run(cmd) = Right(r) → r.output parses as JSON
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output delivered at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly command: CliArgs["command"]
  readonly output: string
}

export type Environment = Readonly<Record<string, string | undefined>>

type Build = (document: JsonDocument<StringSink>) => unknown

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const linesDocument = (lines: ReadonlyArray<string>, key: string | undefined): Build => (document) =>
  key === undefined
    ? document.array().withAll(lines).then()
    : document.object().array(key).withAll(lines).then().then()

const environmentEntries = (environment: Environment): ReadonlyArray<readonly [string, string]> => {
  const entries: Array<readonly [string, string]> = []
  for (const key of Object.keys(environment).toSorted((left, right) => left.localeCompare(right))) {
    const value = environment[key]
    if (value !== undefined) {
      entries.push([key, value])
    }
  }
  return entries
}

const environmentDocument = (environment: Environment): Build => (document) =>
  document.object().withAll(environmentEntries(environment)).then()

const documentFor = (
  cli: CliArgs,
  environment: Environment
): Effect.Effect<Build, AppError, FileSystemService> =>
  Match.value(cli.command).pipe(
    Match.when("lines", () =>
      Effect.gen(function*(_) {
        const text = yield* _(readTextFile(cli.inputPath ?? ""))
        return linesDocument(splitLines(text), cli.key)
      })),
    Match.when("env", () => Effect.succeed(environmentDocument(environment))),
    Match.exhaustive
  )

const render = (build: Build, config: ResolvedConfig): Effect.Effect<string, AppError> =>
  renderDocument(build, config.escape).pipe(
    Effect.map((text) => config.trailingNewline ? `${text}\n` : text)
  )

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @param environment - Variables written by the env command.
 * @returns ProgramResult with the delivered output.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant output is identical for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>,
  environment: Environment
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const fileConfig = yield* _(loadConfigFile(cli.configPath ?? defaultConfigPath, cli.configPathExplicit))
    const config = resolveConfig(cli, fileConfig)
    const build = yield* _(documentFor(cli, environment))
    const output = yield* _(render(build, config))
    yield* _(deliverOutput(output, cli.outputPath))
    return { command: cli.command, output }
  })
