import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { OrderedMap } from "../../src/core/ordered-map.js"

describe("OrderedMap", () => {
  it.effect("keeps insertion order and never sorts keys", () =>
    Effect.sync(() => {
      const map = OrderedMap.from<number>([["zeta", 1], ["alpha", 2], ["mid", 3]])
      expect(map.keys()).toEqual(["zeta", "alpha", "mid"])
      expect(map.values()).toEqual([1, 2, 3])
      expect(map.size).toBe(3)
    }))

  it.effect("insertOrAssign overwrites an existing key in place", () =>
    Effect.sync(() => {
      const map = OrderedMap.from<number>([["a", 1], ["b", 2]])
      const [entry, inserted] = map.insertOrAssign("a", 10)
      expect(inserted).toBe(false)
      expect(entry.value).toBe(10)
      expect(map.entries()).toEqual([["a", 10], ["b", 2]])
    }))

  it.effect("insert leaves an existing key untouched", () =>
    Effect.sync(() => {
      const map = OrderedMap.from<number>([["a", 1]])
      const [entry, inserted] = map.insert("a", 99)
      expect(inserted).toBe(false)
      expect(entry.value).toBe(1)
      const [added, appended] = map.insert("b", 2)
      expect(appended).toBe(true)
      expect(added.key).toBe("b")
      expect(map.keys()).toEqual(["a", "b"])
    }))

  it.effect("entries stay valid while other keys are inserted", () =>
    Effect.sync(() => {
      const map = new OrderedMap<string>()
      const [first] = map.insertOrAssign("first", "x")
      map.insertOrAssign("second", "y")
      map.insertOrAssign("third", "z")
      first.value = "changed"
      expect(map.get("first")).toBe("changed")
      expect(map.find("first")).toBe(first)
    }))

  it.effect("erases by key, by index and by entry", () =>
    Effect.sync(() => {
      const map = OrderedMap.from<number>([["a", 1], ["b", 2], ["c", 3], ["d", 4]])
      expect(map.erase("b")).toBe(true)
      expect(map.erase("b")).toBe(false)
      expect(map.eraseAt(0)).toBe(true)
      expect(map.eraseAt(5)).toBe(false)
      const entry = map.find("d")
      expect(entry).toBeDefined()
      if (entry !== undefined) {
        expect(map.eraseEntry(entry)).toBe(true)
      }
      expect(map.keys()).toEqual(["c"])
      map.clear()
      expect(map.size).toBe(0)
    }))

  it.effect("uses the supplied key equivalence", () =>
    Effect.sync(() => {
      const map = new OrderedMap<number>((left, right) => left.toLowerCase() === right.toLowerCase())
      map.insertOrAssign("Key", 1)
      map.insertOrAssign("KEY", 2)
      expect(map.size).toBe(1)
      expect(map.get("key")).toBe(2)
      expect(map.keys()).toEqual(["Key"])
      const doubled = map.map((value) => value * 2)
      expect(doubled.has("kEy")).toBe(true)
      expect(doubled.get("key")).toBe(4)
    }))

  it.effect("positional access and iteration follow insertion order", () =>
    Effect.sync(() => {
      const map = OrderedMap.from<boolean>([["x", true], ["y", false]])
      expect(map.at(1)?.key).toBe("y")
      expect(map.at(2)).toBeUndefined()
      expect(map.indexOf("y")).toBe(1)
      expect(map.indexOf("nope")).toBe(-1)
      expect([...map].map((entry) => entry.key)).toEqual(["x", "y"])
    }))
})
