import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Console, Effect, Logger, LogLevel, Match } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import type { FileReport } from "../core/report.js"
import { exitCodeFor, fileReport, hasFailures, renderAppError, renderFileReport } from "../core/report.js"
import { DEFAULT_CONFIG_PATH, loadConfigFile } from "../shell/config-file.js"
import { readJsonFile, renderJson, writeJsonFile } from "../shell/json-file.js"

// CHANGE: orchestrate format/check with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// REF: req-program-1
// FORMAT THEOREM: ∀argv: run(argv) returns exitCode ∈ {0,1,2}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: files are processed sequentially in argv order
// COMPLEXITY: O(total input size)

export interface ProgramResult {
  readonly reports: ReadonlyArray<FileReport>
  readonly exitCode: number
}

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emitReport = (report: FileReport): Effect.Effect<void> =>
  report.status === "failed" ? Console.error(renderFileReport(report)) : Console.log(renderFileReport(report))

const formatFile = (
  cli: CliArgs,
  config: ResolvedConfig,
  path: string
): Effect.Effect<FileReport, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const value = yield* _(readJsonFile(path, config))
    const text = yield* _(renderJson(path, value, config))
    if (cli.write) {
      yield* _(writeJsonFile(path, text))
      return fileReport(path, "written")
    }
    return fileReport(path, "formatted", text)
  })

const checkFile = (
  config: ResolvedConfig,
  path: string
): Effect.Effect<FileReport, AppError, FileSystemService> =>
  readJsonFile(path, config).pipe(
    Effect.as(fileReport(path, "ok")),
    Effect.catchTags({
      ParseFailure: (error) => Effect.succeed(fileReport(path, "failed", error.error.message)),
      FileError: (error) => Effect.succeed(fileReport(path, "failed", error.message))
    })
  )

const processFiles = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ReadonlyArray<FileReport>, AppError, FileSystemService> =>
  Effect.forEach(cli.files, (path) =>
    Match.value(cli.command).pipe(
      Match.when("format", () => formatFile(cli, config, path)),
      Match.when("check", () => checkFile(config, path)),
      Match.exhaustive
    ).pipe(Effect.tap(emitReport)), { concurrency: 1 })

const executeCommand = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const configPath = cli.configPath ?? DEFAULT_CONFIG_PATH
    const fileConfig = yield* _(loadConfigFile(configPath, cli.configPath !== undefined))
    const config = resolveConfig(cli, fileConfig)
    yield* _(
      Effect.logDebug("resolved config").pipe(
        Effect.annotateLogs({
          command: cli.command,
          parseFlags: config.parseFlags,
          writeFlags: config.writeFlags,
          floatFormat: `${config.floatFormat.mode}/${config.floatFormat.precision}`,
          maxDepth: config.maxDepth
        })
      )
    )
    const reports = yield* _(processFiles(cli, config))
    return { reports, exitCode: hasFailures(reports) ? 1 : 0 }
  })

/**
 * Run the CLI and surface application errors as typed failures.
 *
 * @pure false
 * @effect FileSystem, Console
 * @complexity O(total input size)
 */
export const runProgram = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    return yield* _(
      executeCommand(cli).pipe(Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Info))
    )
  })

/**
 * Run CLI program with the provided argv; errors are printed to stderr and mapped to exit codes.
 *
 * @param argv - process.argv array.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant exitCode is 2 for usage/config errors, 1 for file failures, 0 otherwise
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, never, FileSystemService> =>
  runProgram(argv).pipe(
    Effect.catchAll((error) =>
      Console.error(renderAppError(error)).pipe(
        Effect.as<ProgramResult>({ reports: [], exitCode: exitCodeFor(error) })
      )
    )
  )
