import { isExtensionTypeId, isInIntRange, MaxUint64, MinInt64 } from "./types";

/**
 * An application-defined payload tagged with a signed 8-bit type id.
 * Negative ids are reserved for types predefined by MessagePack.
 */
export interface Extension {
  typeId: number;
  data: Uint8Array;
}

/**
 * One key/value pair of a map. Keys may be any value.
 */
export interface MapEntry {
  key: Value;
  value: Value;
}

export interface NilValue {
  readonly kind: "nil";
}

export interface BooleanValue {
  readonly kind: "boolean";
  value: boolean;
}

/**
 * A single integer type for every MessagePack integer family, spanning
 * [-2^63, 2^64 - 1].
 */
export interface IntValue {
  readonly kind: "int";
  value: bigint;
}

export interface FloatValue {
  readonly kind: "float";
  value: number;
}

export interface StringValue {
  readonly kind: "string";
  value: string;
}

export interface BinaryValue {
  readonly kind: "binary";
  value: Uint8Array;
}

export interface ArrayValue {
  readonly kind: "array";
  value: Value[];
}

/**
 * Map entries keep their order and are not deduplicated.
 */
export interface MapValue {
  readonly kind: "map";
  value: MapEntry[];
}

export interface ExtensionValue {
  readonly kind: "extension";
  value: Extension;
}

/**
 * Any MessagePack-encodable value.
 *
 * @example
 * ```typescript
 * import { mapOf, str, int, array, bool, nil } from 'dynpack';
 *
 * const message = mapOf(
 *   [str("hello"), int(42)],
 *   [str("world"), array([bool(true), nil()])],
 * );
 * ```
 */
export type Value =
  | NilValue
  | BooleanValue
  | IntValue
  | FloatValue
  | StringValue
  | BinaryValue
  | ArrayValue
  | MapValue
  | ExtensionValue;

export type ValueKind = Value["kind"];

export function nil(): NilValue {
  return { kind: "nil" };
}

export function bool(value: boolean): BooleanValue {
  return { kind: "boolean", value };
}

/**
 * Creates an int value.
 * @throws RangeError if `value` is not an integer in [-2^63, 2^64 - 1]
 */
export function int(value: number | bigint): IntValue {
  if (typeof value === "number" && !Number.isInteger(value)) {
    throw new RangeError(`${value} is not an integer`);
  }
  const n = BigInt(value);
  if (!isInIntRange(n)) {
    throw new RangeError(`Integer ${n} is outside valid range [${MinInt64}, ${MaxUint64}]`);
  }
  return { kind: "int", value: n };
}

export function float(value: number): FloatValue {
  return { kind: "float", value };
}

export function str(value: string): StringValue {
  return { kind: "string", value };
}

export function bin(value: Uint8Array | readonly number[]): BinaryValue {
  return { kind: "binary", value: value instanceof Uint8Array ? value : Uint8Array.from(value) };
}

export function array(items: Value[]): ArrayValue {
  return { kind: "array", value: items };
}

export function map(entries: MapEntry[]): MapValue {
  return { kind: "map", value: entries };
}

/**
 * Creates a map from key/value tuples, in the given order.
 */
export function mapOf(...pairs: Array<[Value, Value]>): MapValue {
  return map(pairs.map(([key, value]) => ({ key, value })));
}

/**
 * Creates an extension value.
 * @throws RangeError if `typeId` is not an integer in [-128, 127]
 */
export function ext(typeId: number, data: Uint8Array | readonly number[]): ExtensionValue {
  if (!isExtensionTypeId(typeId)) {
    throw new RangeError(`Extension type ID ${typeId} is outside [-128, 127]`);
  }
  const bytes = data instanceof Uint8Array ? data : Uint8Array.from(data);
  return { kind: "extension", value: { typeId, data: bytes } };
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Structural equality. Maps compare entry by entry in stored order, and
 * floats compare with `Object.is`, so NaN equals NaN and 0 differs from -0.
 */
export function equals(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "nil":
      return b.kind === "nil";
    case "boolean":
      return b.kind === "boolean" && a.value === b.value;
    case "int":
      return b.kind === "int" && a.value === b.value;
    case "float":
      return b.kind === "float" && Object.is(a.value, b.value);
    case "string":
      return b.kind === "string" && a.value === b.value;
    case "binary":
      return b.kind === "binary" && bytesEqual(a.value, b.value);
    case "array":
      return (
        b.kind === "array" &&
        a.value.length === b.value.length &&
        a.value.every((item, i) => equals(item, b.value[i]))
      );
    case "map":
      return (
        b.kind === "map" &&
        a.value.length === b.value.length &&
        a.value.every(
          (entry, i) => equals(entry.key, b.value[i].key) && equals(entry.value, b.value[i].value)
        )
      );
    case "extension":
      return (
        b.kind === "extension" &&
        a.value.typeId === b.value.typeId &&
        bytesEqual(a.value.data, b.value.data)
      );
  }
}

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

const KIND_CODES: Record<ValueKind, number> = {
  nil: 0,
  boolean: 1,
  int: 2,
  float: 3,
  string: 4,
  binary: 5,
  array: 6,
  map: 7,
  extension: 8,
};

function mixByte(hash: number, byte: number): number {
  return Math.imul(hash ^ (byte & 0xff), FNV_PRIME) >>> 0;
}

function mixNumber(hash: number, n: number): number {
  hash = mixByte(hash, n);
  hash = mixByte(hash, n >>> 8);
  hash = mixByte(hash, n >>> 16);
  return mixByte(hash, n >>> 24);
}

function mixText(hash: number, text: string): number {
  hash = mixNumber(hash, text.length);
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    hash = mixByte(mixByte(hash, code), code >>> 8);
  }
  return hash;
}

function mixBytes(hash: number, bytes: Uint8Array): number {
  hash = mixNumber(hash, bytes.length);
  for (const b of bytes) {
    hash = mixByte(hash, b);
  }
  return hash;
}

function mixValue(hash: number, v: Value): number {
  hash = mixByte(hash, KIND_CODES[v.kind]);
  switch (v.kind) {
    case "nil":
      return hash;
    case "boolean":
      return mixByte(hash, v.value ? 1 : 0);
    case "int":
      return mixText(hash, v.value.toString());
    case "float":
      return mixText(hash, Object.is(v.value, -0) ? "-0" : String(v.value));
    case "string":
      return mixText(hash, v.value);
    case "binary":
      return mixBytes(hash, v.value);
    case "array":
      hash = mixNumber(hash, v.value.length);
      for (const item of v.value) {
        hash = mixValue(hash, item);
      }
      return hash;
    case "map":
      hash = mixNumber(hash, v.value.length);
      for (const entry of v.value) {
        hash = mixValue(mixValue(hash, entry.key), entry.value);
      }
      return hash;
    case "extension":
      return mixBytes(mixByte(hash, v.value.typeId), v.value.data);
  }
}

/**
 * Unsigned 32-bit FNV-1a hash of a value's structure. Values that are
 * `equals` hash to the same number.
 */
export function hashValue(v: Value): number {
  return mixValue(FNV_OFFSET_BASIS, v);
}
