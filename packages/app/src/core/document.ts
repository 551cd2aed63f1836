import * as Either from "effect/Either"

import type { ParseError, WriteError } from "./errors.js"
import type { JsonInput } from "./cursor.js"
import { NodeRef } from "./node-ref.js"
import type { ValueHolder } from "./node-ref.js"
import type { FloatFormat } from "./options.js"
import { DEFAULT_MAX_DEPTH, defaultFloatFormat, ParseFlag, WriteFlag } from "./options.js"
import { parse, parseEither } from "./parser.js"
import type { JsonSink } from "./serializer.js"
import { serialize, serializeEither, writeJson } from "./serializer.js"
import type { JsonValue } from "./value.js"
import { makeUndefined } from "./value.js"

// CHANGE: own a root slot and hand out node references into it
// WHY: a document may start empty and gain its root through the first assignment
// REF: req-document-1
// PURITY: CORE
// INVARIANT: every NodeRef from ref()/at() shares the same root slot
// COMPLEXITY: O(1) besides parse/stringify

export class JsonDocument {
  private readonly slot: ValueHolder

  constructor(root: JsonValue = makeUndefined()) {
    this.slot = { value: root }
  }

  /** @throws BadFormat | NestingTooDeep */
  static parse(
    input: JsonInput,
    flags: number = ParseFlag.Default,
    maxDepth: number = DEFAULT_MAX_DEPTH
  ): JsonDocument {
    return new JsonDocument(parse(input, flags, maxDepth))
  }

  static parseEither(
    input: JsonInput,
    flags: number = ParseFlag.Default,
    maxDepth: number = DEFAULT_MAX_DEPTH
  ): Either.Either<JsonDocument, ParseError> {
    return Either.map(parseEither(input, flags, maxDepth), (root) => new JsonDocument(root))
  }

  get root(): JsonValue {
    return this.slot.value
  }

  set root(value: JsonValue) {
    this.slot.value = value
  }

  ref(): NodeRef {
    return NodeRef.fromHolder(this.slot)
  }

  at(selector: number | string): NodeRef {
    return this.ref().at(selector)
  }

  /** @throws BadValue | NestingTooDeep */
  stringify(
    flags: number = WriteFlag.Compact,
    floatFormat: FloatFormat = defaultFloatFormat,
    maxDepth: number = DEFAULT_MAX_DEPTH
  ): string {
    return serialize(this.slot.value, flags, floatFormat, maxDepth)
  }

  stringifyEither(
    flags: number = WriteFlag.Compact,
    floatFormat: FloatFormat = defaultFloatFormat,
    maxDepth: number = DEFAULT_MAX_DEPTH
  ): Either.Either<string, WriteError> {
    return serializeEither(this.slot.value, flags, floatFormat, maxDepth)
  }

  writeTo(
    sink: JsonSink,
    flags: number = WriteFlag.Compact,
    floatFormat: FloatFormat = defaultFloatFormat,
    maxDepth: number = DEFAULT_MAX_DEPTH
  ): void {
    writeJson(sink, this.slot.value, flags, floatFormat, maxDepth)
  }
}
