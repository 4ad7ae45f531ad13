/**
 * dynpack - dynamic MessagePack values for TypeScript
 *
 * Encodes and decodes MessagePack payloads whose shape is not known ahead of
 * time, through a single tagged `Value` type.
 *
 * @example
 * ```typescript
 * import { encode, parse, mapOf, str, int, asMap, asString } from 'dynpack';
 *
 * const bytes = encode(mapOf([str("hello"), int(42)]));
 * const value = parse(bytes);
 *
 * for (const { key, value: v } of asMap(value)) {
 *   console.log(asString(key), v);
 * }
 * ```
 */

// Value model
export type {
  Value,
  ValueKind,
  MapEntry,
  Extension,
  NilValue,
  BooleanValue,
  IntValue,
  FloatValue,
  StringValue,
  BinaryValue,
  ArrayValue,
  MapValue,
  ExtensionValue,
} from "./value";
export {
  nil,
  bool,
  int,
  float,
  str,
  bin,
  array,
  map,
  mapOf,
  ext,
  equals,
  hashValue,
} from "./value";

// Wire constants
export {
  Tag,
  MinInt64,
  MaxInt64,
  MaxUint64,
  MinExtensionTypeId,
  MaxExtensionTypeId,
} from "./types";

// Errors
export {
  DynpackError,
  EncodeError,
  DecodeError,
  UnexpectedEndError,
  UnknownTagError,
  InvalidStringError,
  TrailingDataError,
  DepthExceededError,
  ConversionError,
  TypeNotRegisteredError,
  UnknownExtensionTypeError,
  DuplicateRegistrationError,
  EndOfStreamError,
  StreamClosedError,
} from "./errors";

// Encoding and decoding
export type { EncodeOptions } from "./encoder";
export { encode, Encoder, fitsFloat32 } from "./encoder";
export type { DecodeOptions, PrefixResult } from "./decoder";
export { parse, parsePrefix, Decoder, DEFAULT_MAX_DEPTH } from "./decoder";
export { Writer } from "./writer";
export { Reader } from "./reader";

// Accessors
export {
  isNil,
  isBoolean,
  isInt,
  isFloat,
  isString,
  isBinary,
  isArray,
  isMap,
  isExtension,
  asBoolean,
  asInt,
  asIntNumber,
  asFloat,
  asString,
  asBinary,
  asArray,
  asMap,
  asExtension,
} from "./accessors";

export { format } from "./format";

// Streams of values
export type { StreamWriterOptions, StreamReaderOptions } from "./stream";
export { StreamWriter, StreamReader } from "./stream";

// Extension registry
export type { ExtensionCodec, Timestamp } from "./registry";
export {
  ExtensionRegistry,
  defaultRegistry,
  register,
  encodeTimestamp,
  decodeTimestamp,
  TIMESTAMP_TYPE_ID,
} from "./registry";

/**
 * Library version.
 */
export const VERSION = "0.1.0";
