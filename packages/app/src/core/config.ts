import type { CliArgs } from "./cli.js"
import type { FloatFormat, FloatMode } from "./options.js"
import { DEFAULT_MAX_DEPTH, defaultFloatFormat, ParseFlag, WriteFlag } from "./options.js"

// CHANGE: define config merging rules and defaults for the codec flags
// WHY: ensure CLI flags override config file and defaults deterministically
// REF: req-config-merge-1
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: individual allow* toggles are applied on top of the leniency preset
// COMPLEXITY: O(1)

export type Leniency = "strict" | "default" | "lenient"

export const leniencies: ReadonlyArray<Leniency> = ["strict", "default", "lenient"]

export interface FileConfig {
  readonly pretty?: boolean | undefined
  readonly leniency?: Leniency | undefined
  readonly allowComments?: boolean | undefined
  readonly allowTrailingComma?: boolean | undefined
  readonly allowUnquotedKeys?: boolean | undefined
  readonly allowPlusSign?: boolean | undefined
  readonly floatFormat?: FloatMode | undefined
  readonly precision?: number | undefined
  readonly maxDepth?: number | undefined
}

export interface ResolvedConfig {
  readonly parseFlags: number
  readonly writeFlags: number
  readonly floatFormat: FloatFormat
  readonly maxDepth: number
}

const presetFlags = (leniency: Leniency): number => {
  switch (leniency) {
    case "strict":
      return ParseFlag.None
    case "default":
      return ParseFlag.Default
    case "lenient":
      return ParseFlag.Lenient
  }
}

const toggle = (flags: number, bit: number, enabled: boolean | undefined): number => {
  if (enabled === undefined) {
    return flags
  }
  return enabled ? flags | bit : flags & ~bit
}

const resolveParseFlags = (cli: CliArgs, fileConfig: FileConfig | undefined): number => {
  const preset = presetFlags(cli.leniency ?? fileConfig?.leniency ?? "default")
  const toggles: ReadonlyArray<readonly [number, boolean | undefined]> = [
    [ParseFlag.AllowComments, cli.allowComments ?? fileConfig?.allowComments],
    [ParseFlag.AllowTrailingComma, cli.allowTrailingComma ?? fileConfig?.allowTrailingComma],
    [ParseFlag.AllowUnquotedObjectKeys, cli.allowUnquotedKeys ?? fileConfig?.allowUnquotedKeys],
    [ParseFlag.AllowNumberWithPlusSign, cli.allowPlusSign ?? fileConfig?.allowPlusSign]
  ]
  return toggles.reduce((flags, [bit, enabled]) => toggle(flags, bit, enabled), preset)
}

const resolveWriteFlags = (cli: CliArgs, fileConfig: FileConfig | undefined): number => {
  const pretty = cli.pretty ?? fileConfig?.pretty ?? false
  return (pretty ? WriteFlag.Pretty : WriteFlag.Compact) | (cli.debugDump ? WriteFlag.DebugDump : 0)
}

/** The CLI rewrites files, so its default keeps every float exactly. */
export const CLI_DEFAULT_FLOAT_MODE: FloatMode = "shortest"

const resolveFloatFormat = (cli: CliArgs, fileConfig: FileConfig | undefined): FloatFormat => ({
  mode: cli.floatMode ?? fileConfig?.floatFormat ?? CLI_DEFAULT_FLOAT_MODE,
  precision: cli.precision ?? fileConfig?.precision ?? defaultFloatFormat.precision
})

/**
 * Resolve the effective codec settings from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .jsonode.json.
 *
 * @pure true
 * @invariant maxDepth ≥ 1
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  parseFlags: resolveParseFlags(cli, fileConfig),
  writeFlags: resolveWriteFlags(cli, fileConfig),
  floatFormat: resolveFloatFormat(cli, fileConfig),
  maxDepth: cli.maxDepth ?? fileConfig?.maxDepth ?? DEFAULT_MAX_DEPTH
})
