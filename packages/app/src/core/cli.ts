import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for json-scribe
// WHY: keep CLI decoding pure and testable at the boundary
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "lines" | "env"

export interface CliArgs {
  readonly command: CliCommand
  readonly inputPath: string | undefined
  readonly outputPath: string | undefined
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
  readonly key: string | undefined
  readonly asciiOnly: boolean | undefined
  readonly htmlSafe: boolean | undefined
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("lines", () => Either.right<CliCommand>("lines")),
    Match.when("env", () => Either.right<CliCommand>("env")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  inputPath: undefined,
  outputPath: undefined,
  configPath: undefined,
  configPathExplicit: false,
  key: undefined,
  asciiOnly: undefined,
  htmlSafe: undefined
})

interface ParsedFlag {
  readonly next: CliArgs
  readonly consumed: number
}

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => CliArgs
): Either.Either<ParsedFlag, CliError> =>
  Either.map(readFlagValue(flagName, inlineValue, nextValue), (value) => ({
    next: update(current, value),
    consumed: inlineValue === undefined ? 2 : 1
  }))

// Boolean flags only take a value inline (--ascii-only=false) so they never swallow a command word.
const parseBooleanFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): Either.Either<ParsedFlag, CliError> =>
  Either.map(parseBoolean(inlineValue ?? "true"), (value) => ({
    next: update(current, value),
    consumed: 1
  }))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  input: (current, inlineValue, nextValue) =>
    parseValueFlag("input", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      inputPath: value
    })),
  output: (current, inlineValue, nextValue) =>
    parseValueFlag("output", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      outputPath: value
    })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      configPath: value,
      configPathExplicit: true
    })),
  key: (current, inlineValue, nextValue) =>
    parseValueFlag("key", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      key: value
    })),
  "ascii-only": (current, inlineValue) =>
    parseBooleanFlag(current, inlineValue, (args, value) => ({ ...args, asciiOnly: value })),
  "html-safe": (current, inlineValue) =>
    parseBooleanFlag(current, inlineValue, (args, value) => ({ ...args, htmlSafe: value }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const body = raw.slice(2)
  const separator = body.indexOf("=")
  const name = separator === -1 ? body : body.slice(0, separator)
  const inlineValue = separator === -1 ? undefined : body.slice(separator + 1)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = 1
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

const validate = (args: CliArgs): Either.Either<CliArgs, CliError> => {
  if (args.command === "lines" && args.inputPath === undefined) {
    return Either.left(cliError("Missing value for --input"))
  }
  if (args.command === "env" && args.key !== undefined) {
    return Either.left(cliError("--key is only supported by the lines command"))
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant the first argument after the script is the command
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.left(cliError("Missing command: expected lines or env"))
  }
  return Either.flatMap(
    parseCommand(first),
    (command) => Either.flatMap(parseFlags(rawArgs, defaultArgs(command)), validate)
  )
}
