import * as Either from "effect/Either"

import type { JsonInput } from "./cursor.js"
import { EOF, SourceCursor } from "./cursor.js"
import type { Encountered, ParseError } from "./errors.js"
import { BadFormat, badFormat, NestingTooDeep, nestingTooDeep } from "./errors.js"
import { DEFAULT_MAX_DEPTH, hasFlag, ParseFlag } from "./options.js"
import { OrderedMap } from "./ordered-map.js"
import type { JsonValue } from "./value.js"
import {
  isIntegerInRange,
  makeArray,
  makeBoolean,
  makeFloat,
  makeInteger,
  makeNull,
  makeObject,
  makeString
} from "./value.js"

// CHANGE: recursive-descent JSON reader with an opt-in leniency dialect
// WHY: materialize text into JsonValue while keeping integer precision and member order
// REF: req-parser-1
// SOURCE: RFC 8259
// FORMAT THEOREM: ∀t ∈ JSON(flags): parse(t, flags) = v → serialize(v) ∈ JSON(None) ∪ {non-finite sentinels}
// PURITY: CORE
// EFFECT: throws BadFormat | NestingTooDeep
// INVARIANT: one code unit of lookahead, no backtracking
// COMPLEXITY: O(n) in the input length (object members add O(k) per duplicate check)

const TAB = 0x09
const LF = 0x0a
const CR = 0x0d
const SPACE = 0x20
const QUOTE = 0x22
const APOSTROPHE = 0x27
const STAR = 0x2a
const PLUS = 0x2b
const COMMA = 0x2c
const MINUS = 0x2d
const DOT = 0x2e
const SLASH = 0x2f
const ZERO = 0x30
const NINE = 0x39
const COLON = 0x3a
const UPPER_E = 0x45
const LEFT_BRACKET = 0x5b
const BACKSLASH = 0x5c
const RIGHT_BRACKET = 0x5d
const LOWER_B = 0x62
const LOWER_E = 0x65
const LOWER_F = 0x66
const LOWER_N = 0x6e
const LOWER_R = 0x72
const LOWER_T = 0x74
const LOWER_U = 0x75
const LEFT_BRACE = 0x7b
const RIGHT_BRACE = 0x7d
const DEL = 0x7f
const BOM = 0xfeff

/** Sign and integer digits kept before further digits turn into exponent offset. */
const INTEGER_LIMIT = 48
/** Whole mantissa (sign, integer, point, fraction) kept before further fraction digits are dropped. */
const MANTISSA_LIMIT = 64
/** Saturation bound of the exponent offset. */
const EXPONENT_LIMIT = Number.MAX_SAFE_INTEGER

const isDigit = (code: number): boolean => code >= ZERO && code <= NINE

const isSpace = (code: number): boolean => code === SPACE || code === TAB || code === CR || code === LF

const hexValue = (code: number): number => {
  if (code >= ZERO && code <= NINE) {
    return code - ZERO
  }
  if (code >= 0x41 && code <= 0x46) {
    return code - 0x41 + 10
  }
  if (code >= 0x61 && code <= 0x66) {
    return code - 0x61 + 10
  }
  return -1
}

const addSaturating = (left: number, right: number): number =>
  Math.max(-EXPONENT_LIMIT, Math.min(EXPONENT_LIMIT, left + right))

const toEncountered = (code: number): Encountered =>
  code === EOF ? { _tag: "Eof" } : { _tag: "Char", code }

const simpleEscapes: ReadonlyMap<number, string> = new Map([
  [QUOTE, "\""],
  [BACKSLASH, "\\"],
  [SLASH, "/"],
  [APOSTROPHE, "'"],
  [LOWER_B, "\b"],
  [LOWER_F, "\f"],
  [LOWER_N, "\n"],
  [LOWER_R, "\r"],
  [LOWER_T, "\t"]
])

class JsonParser {
  private depth = 0

  constructor(
    private readonly input: SourceCursor,
    private readonly flags: number,
    private readonly maxDepth: number
  ) {}

  execute(): JsonValue {
    this.skipBom()
    this.skipWhitespace()
    const value = this.readElement()
    this.skipWhitespace()
    if (this.input.peek() !== EOF) {
      throw this.fail("invalid json format: unexpected content after the element", this.input.peek())
    }
    return value
  }

  private allows(bit: number): boolean {
    return hasFlag(this.flags, bit)
  }

  private fail(reason: string, encountered?: number): BadFormat {
    return encountered === undefined
      ? badFormat(reason, this.input.position())
      : badFormat(reason, this.input.position(), toEncountered(encountered))
  }

  private enter(): void {
    this.depth += 1
    if (this.depth > this.maxDepth) {
      throw nestingTooDeep(this.maxDepth, this.input.position())
    }
  }

  private leave(): void {
    this.depth -= 1
  }

  private readElement(): JsonValue {
    const code = this.input.peek()
    switch (code) {
      case LOWER_N:
        this.readLiteral("null")
        return makeNull()
      case LOWER_T:
        this.readLiteral("true")
        return makeBoolean(true)
      case LOWER_F:
        this.readLiteral("false")
        return makeBoolean(false)
      case QUOTE:
        return makeString(this.readString())
      case LEFT_BRACKET:
        return this.readArray()
      case LEFT_BRACE:
        return this.readObject()
      default:
        if (code === MINUS || code === PLUS || isDigit(code)) {
          return this.readNumber()
        }
        throw this.fail("invalid json format: expected an element", code)
    }
  }

  private readLiteral(literal: string): void {
    for (const char of literal) {
      if (!this.input.eatIf(char.charCodeAt(0))) {
        throw this.fail(`invalid '${literal}' literal: expected '${char}'`, this.input.peek())
      }
    }
  }

  private readNumber(): JsonValue {
    let buffer = ""
    let exponentOffset = 0
    let integral = true

    if (this.input.eatIf(MINUS)) {
      buffer += "-"
    } else if (this.allows(ParseFlag.AllowNumberWithPlusSign)) {
      this.input.eatIf(PLUS)
    }

    if (this.input.eatIf(ZERO)) {
      buffer += "0"
    } else if (isDigit(this.input.peek())) {
      while (isDigit(this.input.peek())) {
        if (buffer.length < INTEGER_LIMIT) {
          buffer += String.fromCharCode(this.input.eat())
        } else if (exponentOffset < EXPONENT_LIMIT) {
          exponentOffset += 1
          this.input.eat()
        } else {
          throw this.fail("invalid number format: too long integer sequence")
        }
      }
    } else {
      throw this.fail("invalid number format: expected a digit", this.input.peek())
    }

    if (this.input.eatIf(DOT)) {
      // once integer digits were dropped, fraction digits are below the kept precision
      const keepFraction = exponentOffset === 0
      buffer += "."
      integral = false
      if (!isDigit(this.input.peek())) {
        throw this.fail("invalid number format: expected a digit", this.input.peek())
      }
      if (buffer === "0." || buffer === "-0.") {
        while (this.input.peek() === ZERO) {
          if (exponentOffset <= -EXPONENT_LIMIT) {
            throw this.fail("invalid number format: too long fraction sequence")
          }
          exponentOffset -= 1
          this.input.eat()
        }
      }
      while (isDigit(this.input.peek())) {
        const digit = this.input.eat()
        if (keepFraction && buffer.length < MANTISSA_LIMIT) {
          buffer += String.fromCharCode(digit)
        }
      }
    }

    const marker = this.input.peek()
    if (marker === LOWER_E || marker === UPPER_E) {
      this.input.eat()
      integral = false
      const negative = this.input.eatIf(MINUS)
      if (!negative) {
        this.input.eatIf(PLUS)
      }
      if (!isDigit(this.input.peek())) {
        throw this.fail("invalid number format: expected a digit", this.input.peek())
      }
      let exponent = 0
      while (isDigit(this.input.peek())) {
        exponent = Math.min(EXPONENT_LIMIT, exponent * 10 + (this.input.eat() - ZERO))
      }
      exponentOffset = addSaturating(exponentOffset, negative ? -exponent : exponent)
    }

    if (integral && exponentOffset === 0) {
      const integer = BigInt(buffer)
      if (isIntegerInRange(integer)) {
        return makeInteger(integer)
      }
    }

    const mantissa = buffer.endsWith(".") ? `${buffer}0` : buffer
    const text = exponentOffset === 0 ? mantissa : `${mantissa}e${exponentOffset}`
    // Out-of-range magnitudes convert to ±Infinity or ±0, never to an error.
    return makeFloat(Number(text))
  }

  private readHex4(): number {
    let code = 0
    for (let index = 0; index < 4; index++) {
      const digit = hexValue(this.input.peek())
      if (digit < 0) {
        throw this.fail("invalid string format: expected hexadecimal digit for \\u????", this.input.peek())
      }
      this.input.eat()
      code = (code << 4) | digit
    }
    return code
  }

  private readUnicodeEscape(): string {
    let code = this.readHex4()
    if ((code & 0xf800) !== 0xd800) {
      return String.fromCharCode(code)
    }
    if (!this.input.eatIf(BACKSLASH) || !this.input.eatIf(LOWER_U)) {
      throw this.fail("invalid string format: expected surrogate pair", this.input.peek())
    }
    let second = this.readHex4()
    if ((code & 0xfc00) === 0xdc00 && (second & 0xfc00) === 0xd800) {
      const low = code
      code = second
      second = low
    }
    if ((code & 0xfc00) !== 0xd800 || (second & 0xfc00) !== 0xdc00) {
      throw this.fail("invalid string format: invalid surrogate pair sequence")
    }
    return String.fromCodePoint((((code & 0x3ff) << 10) | (second & 0x3ff)) + 0x10000)
  }

  private readString(): string {
    this.input.eat()
    let result = ""
    while (true) {
      if (this.input.eatIf(BACKSLASH)) {
        const escape = this.input.peek()
        if (escape === LOWER_U) {
          this.input.eat()
          result += this.readUnicodeEscape()
          continue
        }
        const replacement = simpleEscapes.get(escape)
        if (replacement === undefined) {
          throw this.fail("invalid string format: invalid escape sequence", escape)
        }
        this.input.eat()
        result += replacement
        continue
      }
      const code = this.input.peek()
      if (code === QUOTE) {
        this.input.eat()
        return result
      }
      if (code === EOF) {
        throw this.fail("invalid string format: unexpected eof", code)
      }
      if (code < SPACE || code === DEL) {
        throw this.fail("invalid string format: control character is not allowed", code)
      }
      if (code === SLASH && !this.allows(ParseFlag.AllowUnescapedForwardSlash)) {
        throw this.fail("invalid string format: unescaped '/' is not allowed", code)
      }
      result += String.fromCharCode(this.input.eat())
    }
  }

  private readArray(): JsonValue {
    this.input.eat()
    this.enter()
    const items: Array<JsonValue> = []
    this.skipWhitespace()
    if (this.input.eatIf(RIGHT_BRACKET)) {
      this.leave()
      return makeArray(items)
    }
    while (true) {
      items.push(this.readElement())
      this.skipWhitespace()
      if (this.input.eatIf(COMMA)) {
        this.skipWhitespace()
        if (this.input.peek() === RIGHT_BRACKET) {
          if (!this.allows(ParseFlag.AllowTrailingComma)) {
            throw this.fail(
              "invalid array format: expected an element (trailing comma not allowed)",
              this.input.peek()
            )
          }
          this.input.eat()
          break
        }
      } else if (this.input.eatIf(RIGHT_BRACKET)) {
        break
      } else {
        throw this.fail("invalid array format: ',' or ']' expected", this.input.peek())
      }
    }
    this.leave()
    return makeArray(items)
  }

  private readKey(): string {
    if (this.input.peek() === QUOTE) {
      return this.readString()
    }
    if (!this.allows(ParseFlag.AllowUnquotedObjectKeys)) {
      throw this.fail("invalid object format: expected object key", this.input.peek())
    }
    let key = ""
    for (let code = this.input.peek(); code !== EOF && code > SPACE && code !== COLON; code = this.input.peek()) {
      key += String.fromCharCode(this.input.eat())
    }
    return key
  }

  private readObject(): JsonValue {
    this.input.eat()
    this.enter()
    const members = new OrderedMap<JsonValue>()
    this.skipWhitespace()
    if (this.input.eatIf(RIGHT_BRACE)) {
      this.leave()
      return makeObject(members)
    }
    while (true) {
      const key = this.readKey()
      this.skipWhitespace()
      if (!this.input.eatIf(COLON)) {
        throw this.fail("invalid object format: expected a ':'", this.input.peek())
      }
      this.skipWhitespace()
      members.insertOrAssign(key, this.readElement())
      this.skipWhitespace()
      if (this.input.eatIf(COMMA)) {
        this.skipWhitespace()
        if (this.input.peek() === RIGHT_BRACE) {
          if (!this.allows(ParseFlag.AllowTrailingComma)) {
            throw this.fail(
              "invalid object format: expected an element (trailing comma not allowed)",
              this.input.peek()
            )
          }
          this.input.eat()
          break
        }
      } else if (this.input.eatIf(RIGHT_BRACE)) {
        break
      } else {
        throw this.fail("invalid object format: expected ',' or '}'", this.input.peek())
      }
    }
    this.leave()
    return makeObject(members)
  }

  private skipBom(): void {
    if (this.input.peek() !== BOM) {
      return
    }
    if (!this.allows(ParseFlag.AllowUtf8Bom)) {
      throw this.fail("invalid json format: expected an element (UTF-8 BOM not allowed)", BOM)
    }
    this.input.eat()
  }

  private skipComment(): void {
    this.input.eat()
    if (this.input.eatIf(STAR)) {
      while (true) {
        const code = this.input.eat()
        if (code === EOF) {
          throw this.fail("invalid comment: unterminated block comment", EOF)
        }
        if (code === STAR && this.input.eatIf(SLASH)) {
          return
        }
      }
    }
    if (this.input.eatIf(SLASH)) {
      while (this.input.peek() !== EOF) {
        if (this.input.eat() === LF) {
          return
        }
      }
      return
    }
    throw this.fail("invalid comment: expected '*' or '/'", this.input.peek())
  }

  private skipWhitespace(): void {
    while (true) {
      while (isSpace(this.input.peek())) {
        this.input.eat()
      }
      if (this.input.peek() === SLASH && this.allows(ParseFlag.AllowComments)) {
        this.skipComment()
        continue
      }
      return
    }
  }
}

/**
 * Parse one JSON document.
 *
 * @param input - Text, UTF-8 bytes, or an iterable of text chunks.
 * @param flags - Bitwise OR of ParseFlag members.
 * @param maxDepth - Deepest array/object nesting accepted.
 * @returns The materialized tree.
 * @throws BadFormat on malformed input, NestingTooDeep past maxDepth.
 *
 * @pure true
 * @invariant integers outside 64 bits become floats; out-of-range floats become ±Infinity or ±0
 * @complexity O(n)
 */
export const parse = (
  input: JsonInput,
  flags: number = ParseFlag.Default,
  maxDepth: number = DEFAULT_MAX_DEPTH
): JsonValue => new JsonParser(new SourceCursor(input), flags, maxDepth).execute()

export const isParseError = (error: unknown): error is ParseError =>
  error instanceof BadFormat || error instanceof NestingTooDeep

export const parseEither = (
  input: JsonInput,
  flags: number = ParseFlag.Default,
  maxDepth: number = DEFAULT_MAX_DEPTH
): Either.Either<JsonValue, ParseError> => {
  try {
    return Either.right(parse(input, flags, maxDepth))
  } catch (error) {
    if (isParseError(error)) {
      return Either.left(error)
    }
    throw error
  }
}
