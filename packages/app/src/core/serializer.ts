import * as Either from "effect/Either"

import { BadValue, badValue, NestingTooDeep, nestingTooDeep } from "./errors.js"
import type { WriteError } from "./errors.js"
import { formatFloat, withFloatMarker } from "./float-format.js"
import type { FloatFormat } from "./options.js"
import { DEFAULT_MAX_DEPTH, defaultFloatFormat, hasFlag, WriteFlag } from "./options.js"
import type { OrderedMap } from "./ordered-map.js"
import type { JsonValue } from "./value.js"

// CHANGE: render JsonValue trees as JSON text into a chunk sink
// WHY: numeric re-encoding keeps integers exact and non-finite floats readable by any JSON consumer
// REF: req-serializer-1
// SOURCE: RFC 8259
// FORMAT THEOREM: ∀v without Undefined/NaN: parse(serialize(v, f, {general, 17})) ≡ v
// PURITY: CORE
// EFFECT: throws BadValue | NestingTooDeep
// INVARIANT: compact output contains no insignificant whitespace
// COMPLEXITY: O(n) in the size of the tree and its strings

/** Anything with a string `write`, e.g. a Node Writable or an array-backed collector. */
export interface JsonSink {
  write(chunk: string): unknown
}

const POSITIVE_INFINITY_LITERAL = "1.0e999999999"
const NEGATIVE_INFINITY_LITERAL = "-1.0e999999999"

const INDENT_UNIT = "  "

const unicodeEscape = (code: number): string => `\\u${code.toString(16).toUpperCase().padStart(4, "0")}`

const buildEscapeTable = (): ReadonlyArray<string | undefined> => {
  const table: Array<string | undefined> = Array.from({ length: 256 }, () => undefined)
  for (let code = 0; code < 0x20; code++) {
    table[code] = unicodeEscape(code)
  }
  table[0x08] = "\\b"
  table[0x09] = "\\t"
  table[0x0a] = "\\n"
  table[0x0c] = "\\f"
  table[0x0d] = "\\r"
  table[0x22] = "\\\""
  table[0x2f] = "\\/"
  table[0x5c] = "\\\\"
  table[0x7f] = unicodeEscape(0x7f)
  return table
}

/** Replacement text for code units 0x00-0xFF; undefined means verbatim. */
export const escapeTable: ReadonlyArray<string | undefined> = buildEscapeTable()

/**
 * Quote and escape a string. Code units above 0xFF pass through unchanged.
 *
 * @pure true
 * @complexity O(n)
 */
export const quoteString = (text: string): string => {
  let result = "\""
  let runStart = 0
  for (let index = 0; index < text.length; index++) {
    const code = text.charCodeAt(index)
    const replacement = code < 0x100 ? escapeTable[code] : undefined
    if (replacement !== undefined) {
      result += text.slice(runStart, index) + replacement
      runStart = index + 1
    }
  }
  return `${result}${text.slice(runStart)}"`
}

class JsonWriter {
  private indent = ""
  private depth = 0

  constructor(
    private readonly sink: JsonSink,
    private readonly flags: number,
    private readonly floatFormat: FloatFormat,
    private readonly maxDepth: number
  ) {}

  private get pretty(): boolean {
    return hasFlag(this.flags, WriteFlag.Pretty)
  }

  private get debugDump(): boolean {
    return hasFlag(this.flags, WriteFlag.DebugDump)
  }

  private emit(chunk: string): void {
    this.sink.write(chunk)
  }

  private annotate(label: string): void {
    if (this.debugDump) {
      this.emit(`/***  ${label}  ***/ `)
    }
  }

  write(value: JsonValue): void {
    switch (value._tag) {
      case "Undefined":
        if (!this.debugDump) {
          throw badValue("undefined is not allowed")
        }
        this.emit("/***  UNDEFINED  ***/ undefined /* not allowed */")
        return
      case "Null":
        this.annotate("NULL")
        this.emit("null")
        return
      case "Boolean":
        this.annotate("BOOLEAN")
        this.emit(value.value ? "true" : "false")
        return
      case "Integer":
        this.annotate("INTEGER")
        this.emit(value.value.toString())
        return
      case "Float":
        this.writeFloat(value.value)
        return
      case "String":
        this.annotate(`STRING[${value.value.length}]`)
        this.emit(quoteString(value.value))
        return
      case "Array":
        this.writeArray(value.items)
        return
      case "Object":
        this.writeObject(value.members)
        return
    }
  }

  private writeFloat(value: number): void {
    if (Number.isNaN(value)) {
      if (!this.debugDump) {
        throw badValue("NaN is not allowed")
      }
      this.emit("/***  FLOATING  ***/ NaN /* not allowed */")
      return
    }
    this.annotate("FLOATING")
    if (!Number.isFinite(value)) {
      this.emit(value > 0 ? POSITIVE_INFINITY_LITERAL : NEGATIVE_INFINITY_LITERAL)
      return
    }
    this.emit(withFloatMarker(formatFloat(value, this.floatFormat)))
  }

  private enter(): void {
    this.depth += 1
    if (this.depth > this.maxDepth) {
      throw nestingTooDeep(this.maxDepth)
    }
    this.indent += INDENT_UNIT
  }

  private leave(): void {
    this.depth -= 1
    this.indent = this.indent.slice(INDENT_UNIT.length)
  }

  private separate(first: boolean): void {
    if (!first) {
      this.emit(",")
      if (this.pretty) {
        this.emit("\n")
      }
    }
    if (this.pretty) {
      this.emit(this.indent)
    }
  }

  private close(bracket: string): void {
    this.leave()
    if (this.pretty) {
      this.emit(`\n${this.indent}`)
    }
    this.emit(bracket)
  }

  private writeArray(items: ReadonlyArray<JsonValue>): void {
    this.annotate(`ARRAY[${items.length}]`)
    if (items.length === 0) {
      this.emit("[]")
      return
    }
    this.emit(this.pretty ? "[\n" : "[")
    this.enter()
    items.forEach((item, index) => {
      this.separate(index === 0)
      this.write(item)
    })
    this.close("]")
  }

  private writeObject(members: OrderedMap<JsonValue>): void {
    this.annotate(`OBJECT[${members.size}]`)
    if (members.size === 0) {
      this.emit("{}")
      return
    }
    this.emit(this.pretty ? "{\n" : "{")
    this.enter()
    let first = true
    for (const entry of members) {
      this.separate(first)
      first = false
      this.emit(quoteString(entry.key))
      this.emit(this.pretty ? ": " : ":")
      this.write(entry.value)
    }
    this.close("}")
  }
}

/**
 * Write `value` as JSON text into `sink`, chunk by chunk.
 *
 * @throws BadValue for an undefined node or NaN (unless DebugDump), NestingTooDeep past maxDepth.
 */
export const writeJson = (
  sink: JsonSink,
  value: JsonValue,
  flags: number = WriteFlag.Compact,
  floatFormat: FloatFormat = defaultFloatFormat,
  maxDepth: number = DEFAULT_MAX_DEPTH
): void => {
  new JsonWriter(sink, flags, floatFormat, maxDepth).write(value)
}

/**
 * Serialize `value` to a string.
 *
 * @param flags - Bitwise OR of WriteFlag members.
 * @param floatFormat - Mode and precision for finite floats.
 *
 * @pure true
 * @invariant ±Infinity is written as ±1.0e999999999
 * @complexity O(n)
 */
export const serialize = (
  value: JsonValue,
  flags: number = WriteFlag.Compact,
  floatFormat: FloatFormat = defaultFloatFormat,
  maxDepth: number = DEFAULT_MAX_DEPTH
): string => {
  const chunks: Array<string> = []
  writeJson({ write: (chunk) => chunks.push(chunk) }, value, flags, floatFormat, maxDepth)
  return chunks.join("")
}

export const isWriteError = (error: unknown): error is WriteError =>
  error instanceof BadValue || error instanceof NestingTooDeep

export const serializeEither = (
  value: JsonValue,
  flags: number = WriteFlag.Compact,
  floatFormat: FloatFormat = defaultFloatFormat,
  maxDepth: number = DEFAULT_MAX_DEPTH
): Either.Either<string, WriteError> => {
  try {
    return Either.right(serialize(value, flags, floatFormat, maxDepth))
  } catch (error) {
    if (isWriteError(error)) {
      return Either.left(error)
    }
    throw error
  }
}
