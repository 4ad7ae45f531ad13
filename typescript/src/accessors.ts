import { ConversionError } from "./errors";
import type {
  ArrayValue,
  BinaryValue,
  BooleanValue,
  Extension,
  ExtensionValue,
  FloatValue,
  IntValue,
  MapEntry,
  MapValue,
  NilValue,
  StringValue,
  Value,
} from "./value";

export function isNil(v: Value): v is NilValue {
  return v.kind === "nil";
}

export function isBoolean(v: Value): v is BooleanValue {
  return v.kind === "boolean";
}

export function isInt(v: Value): v is IntValue {
  return v.kind === "int";
}

export function isFloat(v: Value): v is FloatValue {
  return v.kind === "float";
}

export function isString(v: Value): v is StringValue {
  return v.kind === "string";
}

export function isBinary(v: Value): v is BinaryValue {
  return v.kind === "binary";
}

export function isArray(v: Value): v is ArrayValue {
  return v.kind === "array";
}

export function isMap(v: Value): v is MapValue {
  return v.kind === "map";
}

export function isExtension(v: Value): v is ExtensionValue {
  return v.kind === "extension";
}

/**
 * Returns the boolean payload.
 * @throws ConversionError if `v` is not a boolean
 */
export function asBoolean(v: Value): boolean {
  if (v.kind !== "boolean") {
    throw new ConversionError(v, "boolean");
  }
  return v.value;
}

/**
 * Returns the integer payload with full 64-bit precision.
 * @throws ConversionError if `v` is not an int
 */
export function asInt(v: Value): bigint {
  if (v.kind !== "int") {
    throw new ConversionError(v, "int");
  }
  return v.value;
}

/**
 * Returns the integer payload as a JavaScript number.
 *
 * WARNING: JavaScript numbers can only safely represent integers up to
 * Number.MAX_SAFE_INTEGER (2^53-1). Larger magnitudes lose precision; use
 * asInt() for those.
 *
 * @param warnOnPrecisionLoss - If true (default), logs a warning when
 *                              precision loss occurs
 */
export function asIntNumber(v: Value, warnOnPrecisionLoss: boolean = true): number {
  const value = asInt(v);
  if (warnOnPrecisionLoss) {
    if (value > BigInt(Number.MAX_SAFE_INTEGER) ||
        value < BigInt(Number.MIN_SAFE_INTEGER)) {
      console.warn(
        `dynpack: int value ${value} exceeds safe integer range ` +
        `(${Number.MIN_SAFE_INTEGER} to ${Number.MAX_SAFE_INTEGER}), ` +
        `precision may be lost. Use asInt() for full precision.`
      );
    }
  }
  return Number(value);
}

/**
 * @throws ConversionError if `v` is not a float
 */
export function asFloat(v: Value): number {
  if (v.kind !== "float") {
    throw new ConversionError(v, "float");
  }
  return v.value;
}

/**
 * @throws ConversionError if `v` is not a string
 */
export function asString(v: Value): string {
  if (v.kind !== "string") {
    throw new ConversionError(v, "string");
  }
  return v.value;
}

/**
 * Returns the stored bytes themselves, not a copy.
 * @throws ConversionError if `v` is not binary
 */
export function asBinary(v: Value): Uint8Array {
  if (v.kind !== "binary") {
    throw new ConversionError(v, "binary");
  }
  return v.value;
}

/**
 * Returns the stored element array; changes to it are changes to `v`.
 * @throws ConversionError if `v` is not an array
 */
export function asArray(v: Value): Value[] {
  if (v.kind !== "array") {
    throw new ConversionError(v, "array");
  }
  return v.value;
}

/**
 * Returns the stored entry array, in wire order.
 * @throws ConversionError if `v` is not a map
 */
export function asMap(v: Value): MapEntry[] {
  if (v.kind !== "map") {
    throw new ConversionError(v, "map");
  }
  return v.value;
}

/**
 * @throws ConversionError if `v` is not an extension
 */
export function asExtension(v: Value): Extension {
  if (v.kind !== "extension") {
    throw new ConversionError(v, "extension");
  }
  return v.value;
}
