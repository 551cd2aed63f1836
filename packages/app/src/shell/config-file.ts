import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"
import * as ParseResult from "effect/ParseResult"
import * as S from "effect/Schema"

import type { FileConfig } from "../core/config.js"
import type { AppError, ConfigError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"
import { MAX_PRECISION } from "../core/float-format.js"
import { ParseFlag } from "../core/options.js"
import { parseEither } from "../core/parser.js"
import { toPlain } from "../core/plain.js"

// CHANGE: decode .jsonode.json with the lenient dialect, then schema validation
// WHY: keep boundary data typed and reject invalid config early; config files may carry comments
// REF: req-config-file-1
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing config yields undefined unless the path was given explicitly
// COMPLEXITY: O(n)

export const DEFAULT_CONFIG_PATH = "./.jsonode.json"

const ConfigSchema = S.partial(
  S.Struct({
    pretty: S.Boolean,
    leniency: S.Literal("strict", "default", "lenient"),
    allowComments: S.Boolean,
    allowTrailingComma: S.Boolean,
    allowUnquotedKeys: S.Boolean,
    allowPlusSign: S.Boolean,
    floatFormat: S.Literal("general", "fixed", "scientific", "shortest"),
    precision: S.Int.pipe(S.between(0, MAX_PRECISION)),
    maxDepth: S.Int.pipe(S.positive())
  })
)

/** Decode config text; `source` only labels error messages. */
export const decodeConfig = (source: string, text: string): Effect.Effect<FileConfig, ConfigError> => {
  const parsed = parseEither(text, ParseFlag.Lenient)
  if (Either.isLeft(parsed)) {
    return Effect.fail(configError(`${source}: ${parsed.left.message}`))
  }
  return pipe(
    S.decodeUnknown(ConfigSchema, { onExcessProperty: "error" })(toPlain(parsed.right)),
    Effect.mapError((error) => configError(`${source}: ${ParseResult.TreeFormatter.formatErrorSync(error)}`))
  )
}

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(path, error.message)))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(path, `Config file not found: ${path}`)))
      }
      return undefined
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(path, error.message)))
    )
    yield* _(Effect.logDebug("loaded config file").pipe(Effect.annotateLogs("file", path)))
    return yield* _(decodeConfig(path, contents))
  })
