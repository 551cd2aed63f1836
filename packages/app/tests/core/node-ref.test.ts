import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import { JsonDocument } from "../../src/core/document.js"
import { BadAccess, BadValue } from "../../src/core/errors.js"
import { NodeRef } from "../../src/core/node-ref.js"
import { ParseFlag, WriteFlag } from "../../src/core/options.js"
import { makeArray, makeInteger, makeNull, makeObject, makeString } from "../../src/core/value.js"

describe("NodeRef reads", () => {
  it.effect("missing keys read as undefined and never throw", () =>
    Effect.sync(() => {
      const doc = JsonDocument.parse(`{"name":"x"}`)
      const missing = doc.at("nokey")
      expect(missing.isDefined()).toBe(false)
      expect(missing.state).toBe("Pending")
      expect(missing.getStringOr("x")).toBe("x")
      expect(Option.isNone(missing.asString())).toBe(true)
      expect(doc.at("nokey").at("deeper").at(3).kind).toBe("Undefined")
      expect(() => missing.getString()).toThrow(BadAccess)
    }))

  it.effect("typed reads delegate to the node", () =>
    Effect.sync(() => {
      const doc = JsonDocument.parse(`{"s":"v","i":42,"f":1.5,"b":true,"n":null,"l":[1,2]}`)
      expect(doc.at("s").getString()).toBe("v")
      expect(doc.at("i").getInteger()).toBe(42n)
      expect(doc.at("i").getNumber()).toBe(42)
      expect(doc.at("f").getFloat()).toBe(1.5)
      expect(() => doc.at("i").getFloat()).toThrow(BadAccess)
      expect(doc.at("i").getFloatOr(0)).toBe(0)
      expect(Option.getOrUndefined(doc.at("b").asBoolean())).toBe(true)
      expect(doc.at("n").getNull()).toBeNull()
      expect(doc.at("n").kind).toBe("Null")
      expect(doc.at("l").size).toBe(2)
      expect(doc.at("l").at(1).getInteger()).toBe(2n)
      expect(doc.ref().size).toBe(6)
    }))

  it.effect("indexing a scalar or with the wrong selector points nowhere", () =>
    Effect.sync(() => {
      const doc = JsonDocument.parse(`{"n":1,"l":[1]}`)
      expect(doc.at("n").at(0).state).toBe("Nowhere")
      expect(doc.at("l").at("key").state).toBe("Nowhere")
      expect(doc.at("l").at(-1).state).toBe("Nowhere")
      expect(doc.at(0).state).toBe("Nowhere")
    }))
})

describe("NodeRef writes", () => {
  it.effect("materializes missing members and pads arrays with null", () =>
    Effect.sync(() => {
      const doc = JsonDocument.parse("{}")
      const ref = doc.at("a").at(2)
      ref.set(makeInteger(5))
      expect(doc.stringify()).toBe(`{"a":[null,null,5]}`)
      expect(ref.state).toBe("Real")
      ref.set(makeInteger(6))
      expect(doc.stringify()).toBe(`{"a":[null,null,6]}`)
    }))

  it.effect("an empty document gains its root on first assignment", () =>
    Effect.sync(() => {
      const doc = new JsonDocument()
      expect(() => doc.stringify()).toThrow(BadValue)
      doc.at(0).set(makeString("x"))
      expect(doc.stringify()).toBe(`["x"]`)
      doc.ref().set(makeObject([["k", makeNull()]]))
      expect(doc.stringify()).toBe(`{"k":null}`)
    }))

  it.effect("replaces existing nodes in place and keeps member order", () =>
    Effect.sync(() => {
      const doc = JsonDocument.parse(`{"a":1,"b":2}`)
      doc.at("a").set(makeString("one"))
      doc.at("c").set(makeInteger(3))
      expect(doc.stringify()).toBe(`{"a":"one","b":2,"c":3}`)
    }))

  it.effect("stores a deep copy", () =>
    Effect.sync(() => {
      const doc = new JsonDocument(makeObject())
      const list = makeArray([makeInteger(1)])
      doc.at("k").set(list)
      list.items.push(makeInteger(2))
      expect(doc.stringify()).toBe(`{"k":[1]}`)
    }))

  it.effect("set returns the reference for chaining", () =>
    Effect.sync(() => {
      const doc = JsonDocument.parse("[]")
      expect(doc.at(1).set(makeInteger(7)).getInteger()).toBe(7n)
      expect(doc.stringify()).toBe("[null,7]")
    }))

  it.effect("assignment through nowhere fails with BadAccess", () =>
    Effect.sync(() => {
      const doc = JsonDocument.parse(`{"n":1}`)
      expect(() => doc.at("n").at(0).set(makeNull())).toThrow(
        "bad_access: cannot assign through a reference to nowhere"
      )
    }))

  it.effect("a pending slot fails when its parent became a scalar", () =>
    Effect.sync(() => {
      const doc = JsonDocument.parse(`{"a":[]}`)
      const pending = doc.at("a").at(3)
      doc.at("a").set(makeInteger(1))
      expect(() => pending.set(makeNull())).toThrow("bad_access: cannot index into Integer with a number")
    }))

  it.effect("a pending reference sees a slot created through a sibling reference", () =>
    Effect.sync(() => {
      const doc = JsonDocument.parse("{}")
      const first = doc.at("x").at("y")
      const second = doc.at("x").at("z")
      first.set(makeInteger(1))
      expect(doc.at("x").at("y").getInteger()).toBe(1n)
      second.set(makeInteger(2))
      expect(doc.stringify()).toBe(`{"x":{"y":1,"z":2}}`)
    }))

  it.effect("a reference into a replaced container refuses writes", () =>
    Effect.sync(() => {
      const doc = JsonDocument.parse(`{"a":[1]}`)
      const element = doc.at("a").at(0)
      doc.at("a").set(makeArray([makeInteger(9)]))
      expect(element.isDefined()).toBe(false)
      expect(() => element.set(makeInteger(5))).toThrow(
        "bad_access: cannot assign through a reference detached from its parent"
      )
      expect(doc.stringify()).toBe(`{"a":[9]}`)
    }))

  it.effect("a reference to an erased entry stays detached after the key returns", () =>
    Effect.sync(() => {
      const doc = JsonDocument.parse(`{"a":1,"b":2}`)
      const entry = doc.at("b")
      expect(doc.at("b").erase()).toBe(true)
      doc.at("b").set(makeInteger(3))
      expect(entry.isDefined()).toBe(false)
      expect(entry.erase()).toBe(false)
      expect(() => entry.set(makeInteger(4))).toThrow(BadAccess)
      expect(doc.stringify()).toBe(`{"a":1,"b":3}`)
    }))

  it.effect("erase removes elements and entries", () =>
    Effect.sync(() => {
      const doc = JsonDocument.parse(`{"a":1,"b":2,"l":[1,2,3]}`)
      expect(doc.at("a").erase()).toBe(true)
      expect(doc.at("zzz").erase()).toBe(false)
      expect(doc.at("l").at(1).erase()).toBe(true)
      expect(doc.ref().erase()).toBe(false)
      expect(doc.stringify()).toBe(`{"b":2,"l":[1,3]}`)
    }))

  it.effect("NodeRef.of edits a standalone tree", () =>
    Effect.sync(() => {
      const tree = makeObject()
      NodeRef.of(tree).at("added").set(makeInteger(1))
      expect(tree.members.keys()).toEqual(["added"])
    }))
})

describe("JsonDocument", () => {
  it.effect("parses with flags and renders with write flags", () =>
    Effect.sync(() => {
      const doc = JsonDocument.parse("{a: [1,],}", ParseFlag.Lenient)
      expect(doc.stringify(WriteFlag.Pretty)).toBe("{\n  \"a\": [\n    1\n  ]\n}")
      const chunks: Array<string> = []
      doc.writeTo({ write: (chunk) => chunks.push(chunk) })
      expect(chunks.join("")).toBe(`{"a":[1]}`)
    }))

  it.effect("parseEither reports bad input without throwing", () =>
    Effect.sync(() => {
      const result = JsonDocument.parseEither("[1,")
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left._tag).toBe("BadFormat")
      }
      expect(Either.isRight(JsonDocument.parseEither("[1]"))).toBe(true)
    }))
})
