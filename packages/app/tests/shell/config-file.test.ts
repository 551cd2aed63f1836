import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { decodeConfig, loadConfigFile } from "../../src/shell/config-file.js"
import { provideNodeContext, withTempDir } from "../app/test-helpers.js"

describe("decodeConfig", () => {
  it.effect("accepts comments and trailing commas", () =>
    Effect.gen(function*(_) {
      const config = yield* _(
        decodeConfig("cfg", `{\n  // output\n  "pretty": true,\n  "floatFormat": "general",\n  "precision": 17,\n}`)
      )
      expect(config).toEqual({ pretty: true, floatFormat: "general", precision: 17 })
    }))

  it.effect("rejects unknown keys and wrongly typed values", () =>
    Effect.gen(function*(_) {
      const unknownKey = yield* _(Effect.either(decodeConfig("cfg", `{"indent":2}`)))
      const badLeniency = yield* _(Effect.either(decodeConfig("cfg", `{"leniency":"loose"}`)))
      const badDepth = yield* _(Effect.either(decodeConfig("cfg", `{"maxDepth":0}`)))

      for (const result of [unknownKey, badLeniency, badDepth]) {
        expect(Either.isLeft(result)).toBe(true)
        if (Either.isLeft(result)) {
          expect(result.left._tag).toBe("ConfigError")
          expect(result.left.message.startsWith("cfg: ")).toBe(true)
        }
      }
    }))

  it.effect("treats a __proto__ member as an ordinary unknown key", () =>
    Effect.gen(function*(_) {
      const result = yield* _(
        Effect.either(decodeConfig("cfg", `{"__proto__": {"pretty": "yes"}, "precision": 3}`))
      )
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left._tag).toBe("ConfigError")
        expect(result.left.message).toContain("__proto__")
      }
    }))

  it.effect("reports malformed text with the parser message", () =>
    Effect.gen(function*(_) {
      const result = yield* _(Effect.either(decodeConfig("cfg", "{\"pretty\" true}")))
      expect(result).toEqual(
        Either.left({
          _tag: "ConfigError",
          message: "cfg: bad_format: invalid object format: expected a ':' but encountered 't' at line 1 column 11."
        })
      )
    }))
})

describe("loadConfigFile", () => {
  it.effect("returns undefined for a missing implicit config", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const config = yield* _(loadConfigFile(path.join(tempDir, ".jsonode.json"), false))
        expect(config).toBeUndefined()
      })
    ).pipe(provideNodeContext))

  it.effect("fails for a missing explicit config", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const file = path.join(tempDir, "absent.json")
        const result = yield* _(Effect.either(loadConfigFile(file, true)))
        expect(result).toEqual(
          Either.left({ _tag: "FileError", path: file, message: `Config file not found: ${file}` })
        )
      })
    ).pipe(provideNodeContext))

  it.effect("decodes an existing file", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const file = path.join(tempDir, ".jsonode.json")
        yield* _(fs.writeFileString(file, `{"leniency":"strict","maxDepth":16}`))
        const config = yield* _(loadConfigFile(file, false))
        expect(config).toEqual({ leniency: "strict", maxDepth: 16 })
      })
    ).pipe(provideNodeContext))
})
