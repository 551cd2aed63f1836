import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { AppError } from "../core/errors.js"
import { fileError, parseFailure, writeFailure } from "../core/errors.js"
import type { ResolvedConfig } from "../core/config.js"
import { parseEither } from "../core/parser.js"
import { serializeEither } from "../core/serializer.js"
import type { JsonValue } from "../core/value.js"

// CHANGE: provide JSON file read/write helpers on top of the codec
// WHY: isolate filesystem IO while the codec stays synchronous and pure
// REF: req-json-file-1
// FORMAT THEOREM: ∀p: read(p) = Right(v) → v was parsed under config.parseFlags
// PURITY: SHELL
// EFFECT: Effect<JsonValue | string | void, AppError, FileSystem>
// INVARIANT: files are read as bytes so the BOM rule applies to them
// COMPLEXITY: O(n)

export const readJsonFile = (
  path: string,
  config: ResolvedConfig
): Effect.Effect<JsonValue, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const bytes = yield* _(
      fs.readFile(path).pipe(Effect.mapError((error) => fileError(path, error.message)))
    )
    const parsed = parseEither(bytes, config.parseFlags, config.maxDepth)
    if (Either.isLeft(parsed)) {
      return yield* _(Effect.fail(parseFailure(path, parsed.left)))
    }
    yield* _(Effect.logDebug(`parsed ${bytes.length} bytes`).pipe(Effect.annotateLogs("file", path)))
    return parsed.right
  })

export const renderJson = (
  path: string,
  value: JsonValue,
  config: ResolvedConfig
): Effect.Effect<string, AppError> => {
  const rendered = serializeEither(value, config.writeFlags, config.floatFormat, config.maxDepth)
  return Either.isLeft(rendered)
    ? Effect.fail(writeFailure(path, rendered.left))
    : Effect.succeed(rendered.right)
}

export const writeJsonFile = (
  path: string,
  text: string
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const payload = text.endsWith("\n") ? text : `${text}\n`
    yield* _(
      fs.writeFileString(path, payload).pipe(Effect.mapError((error) => fileError(path, error.message)))
    )
    yield* _(Effect.logDebug("wrote file").pipe(Effect.annotateLogs("file", path)))
  })
