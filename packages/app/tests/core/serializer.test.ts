import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { BadValue, NestingTooDeep } from "../../src/core/errors.js"
import { WriteFlag } from "../../src/core/options.js"
import { parse } from "../../src/core/parser.js"
import { quoteString, serialize, serializeEither, writeJson } from "../../src/core/serializer.js"
import {
  makeArray,
  makeBoolean,
  makeFloat,
  makeInteger,
  makeNull,
  makeObject,
  makeString,
  makeUndefined
} from "../../src/core/value.js"

describe("serialize: layout", () => {
  it.effect("compact output has no insignificant whitespace", () =>
    Effect.sync(() => {
      const text = `{"a":[1,2.5,"x"],"b":{},"c":[],"d":null,"e":true}`
      expect(serialize(parse(text))).toBe(text)
    }))

  it.effect("pretty output indents by two spaces", () =>
    Effect.sync(() => {
      const value = makeObject([
        ["a", makeArray([makeInteger(1), makeInteger(2)])],
        ["b", makeObject()],
        ["c", makeArray()]
      ])
      expect(serialize(value, WriteFlag.Pretty)).toBe(
        "{\n  \"a\": [\n    1,\n    2\n  ],\n  \"b\": {},\n  \"c\": []\n}"
      )
    }))

  it.effect("writeJson streams the same text into a sink", () =>
    Effect.sync(() => {
      const chunks: Array<string> = []
      const value = makeArray([makeString("x"), makeBoolean(false)])
      writeJson({ write: (chunk) => chunks.push(chunk) }, value, WriteFlag.Pretty)
      expect(chunks.length).toBeGreaterThan(1)
      expect(chunks.join("")).toBe(serialize(value, WriteFlag.Pretty))
    }))
})

describe("serialize: numbers", () => {
  it.effect("writes integers exactly", () =>
    Effect.sync(() => {
      expect(serialize(makeInteger(9223372036854775807n))).toBe("9223372036854775807")
      expect(serialize(makeInteger(-42))).toBe("-42")
    }))

  it.effect("marks integer-looking floats", () =>
    Effect.sync(() => {
      expect(serialize(makeFloat(3))).toBe("3.0")
      expect(serialize(makeFloat(-0))).toBe("-0.0")
      expect(serialize(makeFloat(1e20))).toBe("1e+20")
      expect(serialize(makeFloat(0.1 + 0.2))).toBe("0.3")
      expect(serialize(makeFloat(0.1 + 0.2), WriteFlag.Compact, { mode: "general", precision: 17 })).toBe(
        "0.30000000000000004"
      )
      expect(serialize(makeFloat(3.14159), WriteFlag.Compact, { mode: "fixed", precision: 2 })).toBe("3.14")
    }))

  it.effect("writes infinities as out-of-range sentinels", () =>
    Effect.sync(() => {
      expect(serialize(makeFloat(Number.POSITIVE_INFINITY))).toBe("1.0e999999999")
      expect(serialize(makeFloat(Number.NEGATIVE_INFINITY))).toBe("-1.0e999999999")
    }))
})

describe("serialize: strings", () => {
  it.effect("escapes through the fixed table", () =>
    Effect.sync(() => {
      const input = `a"b\\c/d\n\t` + String.fromCharCode(0x01, 0x7f, 0x0c, 0x08, 0x0d)
      expect(quoteString(input)).toBe("\"a\\\"b\\\\c\\/d\\n\\t\\u0001\\u007F\\f\\b\\r\"")
    }))

  it.effect("leaves other characters verbatim", () =>
    Effect.sync(() => {
      const text = `caf${String.fromCharCode(0xe9)} ${String.fromCharCode(0xff)} ${String.fromCodePoint(0x41, 0x1f603)}`
      expect(serialize(makeString(text))).toBe(`"${text}"`)
    }))
})

describe("serialize: failures and debug dump", () => {
  it.effect("rejects undefined nodes and NaN", () =>
    Effect.sync(() => {
      expect(() => serialize(makeArray([makeUndefined()]))).toThrow(BadValue)
      const result = serializeEither(makeFloat(Number.NaN))
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left._tag).toBe("BadValue")
        expect(result.left.message).toBe("bad_value: NaN is not allowed")
      }
      expect(serializeEither(makeNull())).toEqual(Either.right("null"))
    }))

  it.effect("debug dump annotates every element", () =>
    Effect.sync(() => {
      const value = makeArray([makeUndefined(), makeFloat(Number.NaN), makeInteger(1), makeString("ab")])
      expect(serialize(value, WriteFlag.DebugDump)).toBe(
        "/***  ARRAY[4]  ***/ [/***  UNDEFINED  ***/ undefined /* not allowed */," +
          "/***  FLOATING  ***/ NaN /* not allowed */,/***  INTEGER  ***/ 1,/***  STRING[2]  ***/ \"ab\"]"
      )
      expect(serialize(makeObject([["k", makeNull()]]), WriteFlag.DebugDump)).toBe(
        "/***  OBJECT[1]  ***/ {\"k\":/***  NULL  ***/ null}"
      )
    }))

  it.effect("bounds nesting depth", () =>
    Effect.sync(() => {
      expect(serialize(makeArray([makeArray([makeArray()])]), WriteFlag.Compact, undefined, 2)).toBe("[[[]]]")
      const deep = makeArray([makeArray([makeArray([makeInteger(1)])])])
      expect(() => serialize(deep, WriteFlag.Compact, undefined, 2)).toThrow(NestingTooDeep)
      expect(() => serialize(deep, WriteFlag.Compact, undefined, 2)).toThrow(
        "nesting_too_deep: more than 2 nested arrays/objects"
      )
    }))
})
