import { OrderedMap } from "./ordered-map.js"

// CHANGE: replace the structural Json alias with a closed eight-variant tagged union
// WHY: keep integer/float, undefined/null and member order distinct in the tree
// REF: req-value-1
// FORMAT THEOREM: ∀v ∈ JsonValue: v._tag ∈ {Undefined, Null, Boolean, Integer, Float, String, Array, Object}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a container owns its children; no child appears in two places
// COMPLEXITY: O(1) construction, O(n) equality/clone

export type JsonUndefined = { readonly _tag: "Undefined" }
export type JsonNull = { readonly _tag: "Null" }
export type JsonBoolean = { readonly _tag: "Boolean"; readonly value: boolean }
export type JsonInteger = { readonly _tag: "Integer"; readonly value: bigint }
export type JsonFloat = { readonly _tag: "Float"; readonly value: number }
export type JsonString = { readonly _tag: "String"; readonly value: string }
export type JsonArray = { readonly _tag: "Array"; readonly items: Array<JsonValue> }
export type JsonObject = { readonly _tag: "Object"; readonly members: OrderedMap<JsonValue> }

export type JsonValue =
  | JsonUndefined
  | JsonNull
  | JsonBoolean
  | JsonInteger
  | JsonFloat
  | JsonString
  | JsonArray
  | JsonObject

export type JsonKind = JsonValue["_tag"]

export type JsonContainer = JsonArray | JsonObject

export const INTEGER_MIN = -(2n ** 63n)
export const INTEGER_MAX = 2n ** 63n - 1n

export const isIntegerInRange = (value: bigint): boolean => value >= INTEGER_MIN && value <= INTEGER_MAX

/** Shared read-only sentinel returned by lookups that miss. */
export const undefinedNode: JsonUndefined = Object.freeze({ _tag: "Undefined" })

export const makeUndefined = (): JsonUndefined => ({ _tag: "Undefined" })

export const makeNull = (): JsonNull => ({ _tag: "Null" })

export const makeBoolean = (value: boolean): JsonBoolean => ({ _tag: "Boolean", value })

/**
 * Build an integer node.
 *
 * @throws RangeError when `value` is not a safe integer (number) or does not fit 64 bits (bigint).
 */
export const makeInteger = (value: bigint | number): JsonInteger => {
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new RangeError(`not a safe integer: ${value}`)
    }
    return { _tag: "Integer", value: BigInt(value) }
  }
  if (!isIntegerInRange(value)) {
    throw new RangeError(`integer out of 64-bit range: ${value}`)
  }
  return { _tag: "Integer", value }
}

export const makeFloat = (value: number): JsonFloat => ({ _tag: "Float", value })

export const makeString = (value: string): JsonString => ({ _tag: "String", value })

export const makeArray = (items: Iterable<JsonValue> = []): JsonArray => ({
  _tag: "Array",
  items: Array.from(items)
})

/**
 * Build an object node from a map or from key/value pairs.
 * A repeated key keeps its first position and its last value.
 */
export const makeObject = (
  members: OrderedMap<JsonValue> | Iterable<readonly [string, JsonValue]> = []
): JsonObject => ({
  _tag: "Object",
  members: members instanceof OrderedMap ? members : OrderedMap.from(members)
})

export const isContainer = (value: JsonValue): value is JsonContainer =>
  value._tag === "Array" || value._tag === "Object"

/**
 * Deep copy.
 *
 * @pure true
 * @invariant valueEquals(cloneValue(v), v)
 * @complexity O(n)
 */
export const cloneValue = (value: JsonValue): JsonValue => {
  switch (value._tag) {
    case "Undefined":
      return makeUndefined()
    case "Null":
      return makeNull()
    case "Boolean":
    case "Integer":
    case "Float":
    case "String":
      return { ...value }
    case "Array":
      return { _tag: "Array", items: value.items.map(cloneValue) }
    case "Object":
      return { _tag: "Object", members: value.members.map(cloneValue) }
  }
}

const arraysEqual = (left: ReadonlyArray<JsonValue>, right: ReadonlyArray<JsonValue>): boolean => {
  if (left.length !== right.length) {
    return false
  }
  for (let index = 0; index < left.length; index++) {
    const l = left[index]
    const r = right[index]
    if (l === undefined || r === undefined || !valueEquals(l, r)) {
      return false
    }
  }
  return true
}

const objectsEqual = (left: OrderedMap<JsonValue>, right: OrderedMap<JsonValue>): boolean => {
  if (left.size !== right.size) {
    return false
  }
  for (let index = 0; index < left.size; index++) {
    const l = left.at(index)
    const r = right.at(index)
    if (l === undefined || r === undefined || l.key !== r.key || !valueEquals(l.value, r.value)) {
      return false
    }
  }
  return true
}

/**
 * Structural equality. Member order is significant; an integer never equals a float.
 *
 * @pure true
 * @complexity O(n)
 */
export const valueEquals = (left: JsonValue, right: JsonValue): boolean => {
  switch (left._tag) {
    case "Undefined":
    case "Null":
      return right._tag === left._tag
    case "Boolean":
      return right._tag === "Boolean" && right.value === left.value
    case "Integer":
      return right._tag === "Integer" && right.value === left.value
    case "Float":
      return right._tag === "Float" && right.value === left.value
    case "String":
      return right._tag === "String" && right.value === left.value
    case "Array":
      return right._tag === "Array" && arraysEqual(left.items, right.items)
    case "Object":
      return right._tag === "Object" && objectsEqual(left.members, right.members)
  }
}
