import { badValue } from "./errors.js"
import type { JsonValue } from "./value.js"
import {
  makeArray,
  makeBoolean,
  makeFloat,
  makeInteger,
  makeNull,
  makeObject,
  makeString,
  makeUndefined
} from "./value.js"

// CHANGE: bridge JsonValue trees and plain JavaScript values
// WHY: schema decoding works on unknown, not on tagged trees
// REF: req-plain-1
// PURITY: CORE
// INVARIANT: every member becomes an own property, "__proto__" included; plain objects list integer-like keys first
// COMPLEXITY: O(n)

/**
 * Convert to plain data. Integers become numbers, so values beyond
 * Number.MAX_SAFE_INTEGER lose precision; an undefined node becomes `undefined`.
 *
 * @pure true
 */
export const toPlain = (value: JsonValue): unknown => {
  switch (value._tag) {
    case "Undefined":
      return undefined
    case "Null":
      return null
    case "Boolean":
    case "Float":
    case "String":
      return value.value
    case "Integer":
      return Number(value.value)
    case "Array":
      return value.items.map(toPlain)
    case "Object": {
      return Object.fromEntries(value.members.entries().map(([key, member]) => [key, toPlain(member)]))
    }
  }
}

const isRecord = (input: unknown): input is Readonly<Record<string, unknown>> =>
  typeof input === "object" && input !== null && !Array.isArray(input)

/**
 * Convert plain data. Safe integers and bigints become Integer nodes, other numbers Float.
 *
 * @throws BadValue for functions, symbols and out-of-range bigints.
 */
export const fromPlain = (input: unknown): JsonValue => {
  if (input === undefined) {
    return makeUndefined()
  }
  if (input === null) {
    return makeNull()
  }
  switch (typeof input) {
    case "boolean":
      return makeBoolean(input)
    case "string":
      return makeString(input)
    case "number":
      return Number.isSafeInteger(input) && !Object.is(input, -0) ? makeInteger(input) : makeFloat(input)
    case "bigint":
      try {
        return makeInteger(input)
      } catch (error) {
        throw badValue(error instanceof Error ? error.message : String(error))
      }
    default:
      break
  }
  if (Array.isArray(input)) {
    return makeArray(input.map(fromPlain))
  }
  if (isRecord(input)) {
    return makeObject(Object.entries(input).map(([key, member]) => [key, fromPlain(member)] as const))
  }
  throw badValue(`cannot convert a ${typeof input} to JSON`)
}
