import { Match } from "effect"

import type { AppError } from "./errors.js"

// CHANGE: describe per-file outcomes and render them and application errors as text
// WHY: keep reporting pure and deterministic across CLI commands
// REF: req-report-1
// FORMAT THEOREM: ∀r: exitCode(r) = 0 ⇔ every file report is not failed
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: one report per input file, in argv order
// COMPLEXITY: O(n)

export type FileStatus = "ok" | "formatted" | "written" | "failed"

export interface FileReport {
  readonly path: string
  readonly status: FileStatus
  /** Serialized JSON for `formatted`, the error message for `failed`, empty otherwise. */
  readonly output: string
}

export const fileReport = (path: string, status: FileStatus, output = ""): FileReport => ({ path, status, output })

/**
 * Render one line (or the formatted document) for stdout.
 *
 * @pure true
 */
export const renderFileReport = (report: FileReport): string =>
  Match.value(report.status).pipe(
    Match.when("formatted", () => report.output),
    Match.when("ok", () => `${report.path}: ok`),
    Match.when("written", () => `${report.path}: written`),
    Match.when("failed", () => `${report.path}: ${report.output}`),
    Match.exhaustive
  )

export const hasFailures = (reports: ReadonlyArray<FileReport>): boolean =>
  reports.some((report) => report.status === "failed")

/**
 * Render an application error for stderr.
 *
 * @pure true
 * @invariant codec failures keep the codec message verbatim
 */
export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => `jsonode: ${value.message}`),
    Match.tag("ConfigError", (value) => `jsonode: invalid config: ${value.message}`),
    Match.tag("FileError", (value) => `jsonode: ${value.path}: ${value.message}`),
    Match.tag("ParseFailure", (value) => `${value.path}: ${value.error.message}`),
    Match.tag("WriteFailure", (value) => `${value.path}: ${value.error.message}`),
    Match.exhaustive
  )

/** 2 for usage and configuration problems, 1 for per-file failures. */
export const exitCodeFor = (error: AppError): number =>
  Match.value(error).pipe(
    Match.tag("CliError", () => 2),
    Match.tag("ConfigError", () => 2),
    Match.tag("FileError", () => 1),
    Match.tag("ParseFailure", () => 1),
    Match.tag("WriteFailure", () => 1),
    Match.exhaustive
  )
