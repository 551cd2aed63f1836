import * as Option from "effect/Option"

import { badAccess } from "./errors.js"
import type { OrderedMap } from "./ordered-map.js"
import type { JsonKind, JsonValue } from "./value.js"
import { undefinedNode } from "./value.js"

// CHANGE: provide the two-tier read API over JsonValue
// WHY: reading a missing or mismatched node never throws; only requiring a concrete type does
// REF: req-access-1
// FORMAT THEOREM: ∀v,d: getXOr(v,d) = Option.getOrElse(asX(v), d); getX(v) throws ⇔ asX(v) = None
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: lookup never throws
// COMPLEXITY: O(1) except object lookup O(n)

export const kindOf = (value: JsonValue): JsonKind => value._tag

export const isDefined = (value: JsonValue): boolean => value._tag !== "Undefined"
export const isUndefined = (value: JsonValue): boolean => value._tag === "Undefined"
export const isNull = (value: JsonValue): boolean => value._tag === "Null"
export const isBoolean = (value: JsonValue): boolean => value._tag === "Boolean"
export const isInteger = (value: JsonValue): boolean => value._tag === "Integer"
export const isFloat = (value: JsonValue): boolean => value._tag === "Float"
export const isNumber = (value: JsonValue): boolean => value._tag === "Integer" || value._tag === "Float"
export const isString = (value: JsonValue): boolean => value._tag === "String"
export const isArray = (value: JsonValue): boolean => value._tag === "Array"
export const isObject = (value: JsonValue): boolean => value._tag === "Object"

export const asBoolean = (value: JsonValue): Option.Option<boolean> =>
  value._tag === "Boolean" ? Option.some(value.value) : Option.none()

export const asInteger = (value: JsonValue): Option.Option<bigint> =>
  value._tag === "Integer" ? Option.some(value.value) : Option.none()

export const asFloat = (value: JsonValue): Option.Option<number> =>
  value._tag === "Float" ? Option.some(value.value) : Option.none()

/** Integer or float, read as a double. */
export const asNumber = (value: JsonValue): Option.Option<number> => {
  if (value._tag === "Integer") {
    return Option.some(Number(value.value))
  }
  if (value._tag === "Float") {
    return Option.some(value.value)
  }
  return Option.none()
}

export const asString = (value: JsonValue): Option.Option<string> =>
  value._tag === "String" ? Option.some(value.value) : Option.none()

export const asArray = (value: JsonValue): Option.Option<Array<JsonValue>> =>
  value._tag === "Array" ? Option.some(value.items) : Option.none()

export const asObject = (value: JsonValue): Option.Option<OrderedMap<JsonValue>> =>
  value._tag === "Object" ? Option.some(value.members) : Option.none()

const required = <A>(option: Option.Option<A>, expected: string, value: JsonValue): A => {
  if (Option.isNone(option)) {
    throw badAccess(`expected ${expected} but the node is ${value._tag}`)
  }
  return option.value
}

export const getNull = (value: JsonValue): null => {
  if (value._tag !== "Null") {
    throw badAccess(`expected Null but the node is ${value._tag}`)
  }
  return null
}

export const getBoolean = (value: JsonValue): boolean => required(asBoolean(value), "Boolean", value)
export const getInteger = (value: JsonValue): bigint => required(asInteger(value), "Integer", value)
export const getFloat = (value: JsonValue): number => required(asFloat(value), "Float", value)
export const getNumber = (value: JsonValue): number => required(asNumber(value), "Integer or Float", value)
export const getString = (value: JsonValue): string => required(asString(value), "String", value)
export const getArray = (value: JsonValue): Array<JsonValue> => required(asArray(value), "Array", value)
export const getObject = (value: JsonValue): OrderedMap<JsonValue> => required(asObject(value), "Object", value)

export const getBooleanOr = (value: JsonValue, fallback: boolean): boolean =>
  Option.getOrElse(asBoolean(value), () => fallback)

export const getIntegerOr = (value: JsonValue, fallback: bigint): bigint =>
  Option.getOrElse(asInteger(value), () => fallback)

export const getFloatOr = (value: JsonValue, fallback: number): number =>
  Option.getOrElse(asFloat(value), () => fallback)

export const getNumberOr = (value: JsonValue, fallback: number): number =>
  Option.getOrElse(asNumber(value), () => fallback)

export const getStringOr = (value: JsonValue, fallback: string): string =>
  Option.getOrElse(asString(value), () => fallback)

export const getArrayOr = (value: JsonValue, fallback: Array<JsonValue>): Array<JsonValue> =>
  Option.getOrElse(asArray(value), () => fallback)

export const getObjectOr = (value: JsonValue, fallback: OrderedMap<JsonValue>): OrderedMap<JsonValue> =>
  Option.getOrElse(asObject(value), () => fallback)

/**
 * Read-only child lookup.
 *
 * @returns The child node, or the shared undefined sentinel for any miss.
 *
 * @pure true
 * @invariant never throws
 */
export const lookup = (value: JsonValue, selector: number | string): JsonValue => {
  if (typeof selector === "number") {
    if (value._tag !== "Array" || !Number.isInteger(selector) || selector < 0) {
      return undefinedNode
    }
    return value.items[selector] ?? undefinedNode
  }
  if (value._tag !== "Object") {
    return undefinedNode
  }
  return value.members.get(selector) ?? undefinedNode
}

export const sizeOf = (value: JsonValue): number => {
  switch (value._tag) {
    case "Array":
      return value.items.length
    case "Object":
      return value.members.size
    case "String":
      return value.value.length
    default:
      return 0
  }
}
