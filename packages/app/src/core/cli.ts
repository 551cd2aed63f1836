import { Match } from "effect"
import * as Either from "effect/Either"

import type { Leniency } from "./config.js"
import { MAX_PRECISION } from "./float-format.js"
import type { FloatMode } from "./options.js"
import { floatModes, isFloatMode } from "./options.js"

// CHANGE: decode jsonode argv (format/check + codec flags)
// WHY: keep CLI decoding pure and testable at the boundary
// REF: req-cli-parse-1
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.files ≠ ∅
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "format" | "check"

export interface CliArgs {
  readonly command: CliCommand
  readonly files: ReadonlyArray<string>
  readonly write: boolean
  readonly pretty: boolean | undefined
  readonly leniency: Leniency | undefined
  readonly allowComments: boolean | undefined
  readonly allowTrailingComma: boolean | undefined
  readonly allowUnquotedKeys: boolean | undefined
  readonly allowPlusSign: boolean | undefined
  readonly floatMode: FloatMode | undefined
  readonly precision: number | undefined
  readonly maxDepth: number | undefined
  readonly debugDump: boolean
  readonly configPath: string | undefined
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-") && value !== "-"

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parseInteger = (
  flagName: string,
  value: string,
  minimum: number,
  maximum?: number
): Either.Either<number, CliError> => {
  const parsed = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN
  const expected = maximum === undefined
    ? `an integer ≥ ${minimum}`
    : `an integer from ${minimum} to ${maximum}`
  return Number.isSafeInteger(parsed) && parsed >= minimum && (maximum === undefined || parsed <= maximum)
    ? Either.right(parsed)
    : Either.left(cliError(`Invalid value for --${flagName}: ${value} (expected ${expected})`))
}

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("format", () => Either.right<CliCommand>("format")),
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  files: [],
  write: false,
  pretty: undefined,
  leniency: undefined,
  allowComments: undefined,
  allowTrailingComma: undefined,
  allowUnquotedKeys: undefined,
  allowPlusSign: undefined,
  floatMode: undefined,
  precision: undefined,
  maxDepth: undefined,
  debugDump: false,
  configPath: undefined,
  verbose: false
})

interface FlagStep {
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

const setParsedFlag = (next: CliArgs): Either.Either<FlagStep, CliError> => Either.right({ next, consumed: 1 })

const parseValueFlag = <A>(
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  decode: (value: string) => Either.Either<A, CliError>,
  update: (args: CliArgs, value: A) => CliArgs
): Either.Either<FlagStep, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (raw) =>
    Either.map(decode(raw), (value) => ({
      next: update(current, value),
      consumed: inlineValue === undefined ? 2 : 1
    })))

/** `--flag`, `--flag=false`; a bare flag never consumes the next argument, which may be a file. */
const parseSwitchFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): Either.Either<FlagStep, CliError> =>
  Either.map(parseBoolean(inlineValue ?? "true"), (value) => ({
    next: update(current, value),
    consumed: 1
  }))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<FlagStep, CliError>

const decodeFloatMode = (value: string): Either.Either<FloatMode, CliError> =>
  isFloatMode(value)
    ? Either.right(value)
    : Either.left(cliError(`Invalid value for --float-format: ${value} (expected ${floatModes.join(", ")})`))

const flagParsers: Record<string, FlagParser> = {
  write: (current, inlineValue) => parseSwitchFlag(current, inlineValue, (args, value) => ({ ...args, write: value })),
  pretty: (current) => setParsedFlag({ ...current, pretty: true }),
  compact: (current) => setParsedFlag({ ...current, pretty: false }),
  strict: (current) => setParsedFlag({ ...current, leniency: "strict" }),
  lenient: (current) => setParsedFlag({ ...current, leniency: "lenient" }),
  "debug-dump": (current) => setParsedFlag({ ...current, debugDump: true }),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }),
  "allow-comments": (current, inlineValue) =>
    parseSwitchFlag(current, inlineValue, (args, value) => ({ ...args, allowComments: value })),
  "allow-trailing-comma": (current, inlineValue) =>
    parseSwitchFlag(current, inlineValue, (args, value) => ({ ...args, allowTrailingComma: value })),
  "allow-unquoted-keys": (current, inlineValue) =>
    parseSwitchFlag(current, inlineValue, (args, value) => ({ ...args, allowUnquotedKeys: value })),
  "allow-plus-sign": (current, inlineValue) =>
    parseSwitchFlag(current, inlineValue, (args, value) => ({ ...args, allowPlusSign: value })),
  "float-format": (current, inlineValue, nextValue) =>
    parseValueFlag("float-format", current, inlineValue, nextValue, decodeFloatMode, (args, value) => ({
      ...args,
      floatMode: value
    })),
  precision: (current, inlineValue, nextValue) =>
    parseValueFlag(
      "precision",
      current,
      inlineValue,
      nextValue,
      (value) => parseInteger("precision", value, 0, MAX_PRECISION),
      (args, value) => ({ ...args, precision: value })
    ),
  "max-depth": (current, inlineValue, nextValue) =>
    parseValueFlag(
      "max-depth",
      current,
      inlineValue,
      nextValue,
      (value) => parseInteger("max-depth", value, 1),
      (args, value) => ({ ...args, maxDepth: value })
    ),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (value) => Either.right(value), (args, value) => ({
      ...args,
      configPath: value
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<FlagStep, CliError> => {
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

const parseRest = (
  rawArgs: ReadonlyArray<string>,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = 0
  const files: Array<string> = []
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      files.push(current)
      index += 1
      continue
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  if (files.length === 0) {
    return Either.left(cliError(`No input files given to ${args.command}`))
  }
  return Either.right({ ...args, files })
}

export const usage = [
  "usage: jsonode <format|check> <file...> [options]",
  "  --write                 rewrite files in place (format)",
  "  --pretty | --compact    output layout",
  "  --strict | --lenient    parser leniency preset",
  "  --allow-comments --allow-trailing-comma --allow-unquoted-keys --allow-plus-sign",
  `  --float-format=<${floatModes.join("|")}> --precision=<n> --max-depth=<n>`,
  "  --debug-dump --config=<path> --verbose"
].join("\n")

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant flags and files may be interleaved after the command
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.left(cliError(`Missing command\n${usage}`))
  }
  return Either.flatMap(parseCommand(first), (command) => parseRest(rawArgs.slice(1), defaultArgs(command)))
}
