export * from "./core/access.js"
export { EOF, SourceCursor } from "./core/cursor.js"
export type { JsonInput } from "./core/cursor.js"
export { JsonDocument } from "./core/document.js"
export {
  BadAccess,
  badAccess,
  BadFormat,
  badFormat,
  BadValue,
  badValue,
  NestingTooDeep,
  nestingTooDeep
} from "./core/errors.js"
export type { CodecError, Encountered, ParseError, SourcePosition, WriteError } from "./core/errors.js"
export { formatFloat, MAX_PRECISION, withFloatMarker } from "./core/float-format.js"
export { NodeRef } from "./core/node-ref.js"
export type { RefState, ValueHolder } from "./core/node-ref.js"
export { DEFAULT_MAX_DEPTH, defaultFloatFormat, floatModes, hasFlag, isFloatMode, ParseFlag, WriteFlag } from "./core/options.js"
export type { FloatFormat, FloatMode } from "./core/options.js"
export { OrderedMap } from "./core/ordered-map.js"
export type { OrderedEntry } from "./core/ordered-map.js"
export { isParseError, parse, parseEither } from "./core/parser.js"
export { fromPlain, toPlain } from "./core/plain.js"
export { escapeTable, isWriteError, quoteString, serialize, serializeEither, writeJson } from "./core/serializer.js"
export type { JsonSink } from "./core/serializer.js"
export * from "./core/value.js"
