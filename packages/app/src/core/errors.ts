import { Data } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: define the codec failure classes and the application error algebra
// WHY: codec errors are thrown by the synchronous API and failed in Effect/Either channels alike
// REF: req-errors-1
// PURITY: CORE
// INVARIANT: every error carries a stable _tag; codec errors are Error instances
// COMPLEXITY: O(1)/O(1)

/**
 * What the parser looked at when it gave up.
 */
export type Encountered =
  | { readonly _tag: "Eof" }
  | { readonly _tag: "Char"; readonly code: number }

export interface SourcePosition {
  /** 1-based */
  readonly line: number
  /** 1-based */
  readonly column: number
}

const describeEncountered = (encountered: Encountered): string => {
  if (encountered._tag === "Eof") {
    return "EOF"
  }
  const code = encountered.code
  if (code >= 0x20 && code < 0x7f) {
    return `'${String.fromCharCode(code)}'`
  }
  return `(char)${code.toString(16).padStart(2, "0")}`
}

/**
 * Malformed input text. Raised only by the parser.
 */
export class BadFormat extends Data.TaggedError("BadFormat")<{
  readonly message: string
  readonly reason: string
  readonly encountered: Encountered | undefined
  readonly line: number
  readonly column: number
}> {}

export const badFormat = (
  reason: string,
  position: SourcePosition,
  encountered?: Encountered
): BadFormat => {
  const found = encountered === undefined ? "" : ` but encountered ${describeEncountered(encountered)}`
  return new BadFormat({
    message: `bad_format: ${reason}${found} at line ${position.line} column ${position.column}.`,
    reason,
    encountered,
    line: position.line,
    column: position.column
  })
}

/**
 * A value that has no JSON spelling (an undefined node, NaN). Raised only by the serializer.
 */
export class BadValue extends Data.TaggedError("BadValue")<{
  readonly message: string
  readonly reason: string
}> {}

export const badValue = (reason: string): BadValue => new BadValue({ message: `bad_value: ${reason}`, reason })

/**
 * A typed read against the wrong variant, or a write through a reference that cannot hold a value.
 */
export class BadAccess extends Data.TaggedError("BadAccess")<{
  readonly message: string
  readonly reason: string
}> {}

export const badAccess = (reason: string): BadAccess => new BadAccess({ message: `bad_access: ${reason}`, reason })

export class NestingTooDeep extends Data.TaggedError("NestingTooDeep")<{
  readonly message: string
  readonly limit: number
  readonly position: SourcePosition | undefined
}> {}

export const nestingTooDeep = (limit: number, position?: SourcePosition): NestingTooDeep =>
  new NestingTooDeep({
    message: position === undefined
      ? `nesting_too_deep: more than ${limit} nested arrays/objects`
      : `nesting_too_deep: more than ${limit} nested arrays/objects at line ${position.line} column ${position.column}`,
    limit,
    position
  })

export type ParseError = BadFormat | NestingTooDeep
export type WriteError = BadValue | NestingTooDeep
export type CodecError = BadFormat | BadValue | BadAccess | NestingTooDeep

// Application-level failures: plain tagged records, mapped to exit codes by the program.

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly path: string; readonly message: string }
export type ParseFailure = { readonly _tag: "ParseFailure"; readonly path: string; readonly error: ParseError }
export type WriteFailure = { readonly _tag: "WriteFailure"; readonly path: string; readonly error: WriteError }

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | ParseFailure
  | WriteFailure

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (path: string, message: string): FileError => ({
  _tag: "FileError",
  path,
  message
})

export const parseFailure = (path: string, error: ParseError): ParseFailure => ({
  _tag: "ParseFailure",
  path,
  error
})

export const writeFailure = (path: string, error: WriteError): WriteFailure => ({
  _tag: "WriteFailure",
  path,
  error
})
