import {
  DepthExceededError,
  TrailingDataError,
  UnexpectedEndError,
  UnknownTagError,
} from "./errors";
import { Reader } from "./reader";
import { Tag, FIXARRAY_MASK, FIXMAP_MASK, FIXSTR_MASK, POSITIVE_FIXINT_MAX } from "./types";
import type { MapEntry, Value } from "./value";

/** Default limit on nested containers. */
export const DEFAULT_MAX_DEPTH = 512;

/**
 * Options for decoding.
 */
export interface DecodeOptions {
  /** Maximum number of nested arrays/maps. Default: 512 */
  maxDepth?: number;
}

/**
 * Result of decoding one value from the front of a buffer.
 */
export interface PrefixResult {
  value: Value;
  bytesRead: number;
}

/**
 * Decodes a buffer holding exactly one MessagePack value.
 *
 * @throws UnexpectedEndError if the buffer is truncated
 * @throws UnknownTagError if a tag byte matches no MessagePack family
 * @throws InvalidStringError if a string is not valid UTF-8
 * @throws DepthExceededError if containers nest deeper than `maxDepth`
 * @throws TrailingDataError if bytes remain after the value
 */
export function parse(data: Uint8Array, options: DecodeOptions = {}): Value {
  const reader = new Reader(data);
  const value = new Decoder(options).read(reader);
  if (reader.hasMore) {
    throw new TrailingDataError(reader.remaining, reader.position);
  }
  return value;
}

/**
 * Decodes one value starting at `offset` and reports how many bytes it
 * took. Bytes after the value are left alone.
 *
 * @example
 * ```typescript
 * const data = new Uint8Array([0xa2, 0x68, 0x69, 0x00]);
 * const { value, bytesRead } = parsePrefix(data);
 * // value is str("hi"), bytesRead is 3
 * ```
 */
export function parsePrefix(
  data: Uint8Array,
  offset: number = 0,
  options: DecodeOptions = {}
): PrefixResult {
  if (!Number.isInteger(offset) || offset < 0 || offset > data.length) {
    throw new RangeError(`Offset ${offset} is outside the buffer (length ${data.length})`);
  }
  const reader = new Reader(data, offset);
  const value = new Decoder(options).read(reader);
  return { value, bytesRead: reader.position - offset };
}

/**
 * Decoder reconstructs values from a Reader, tracking container depth.
 */
export class Decoder {
  private readonly maxDepth: number;
  private depth = 0;

  constructor(options: DecodeOptions = {}) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  /**
   * Reads one complete value, advancing the reader past it.
   */
  read(reader: Reader): Value {
    const start = reader.position;
    const tag = reader.readByte();

    if (tag <= POSITIVE_FIXINT_MAX) {
      return { kind: "int", value: BigInt(tag) };
    }
    if (tag >= Tag.NegativeFixint) {
      return { kind: "int", value: BigInt(tag - 0x100) };
    }
    if (tag < Tag.FixArray) {
      return this.readMap(reader, tag & FIXMAP_MASK, start);
    }
    if (tag < Tag.FixStr) {
      return this.readArray(reader, tag & FIXARRAY_MASK, start);
    }
    if (tag < Tag.Nil) {
      return { kind: "string", value: reader.readString(tag & FIXSTR_MASK) };
    }

    switch (tag) {
      case Tag.Nil:
        return { kind: "nil" };
      case Tag.False:
        return { kind: "boolean", value: false };
      case Tag.True:
        return { kind: "boolean", value: true };

      case Tag.Bin8:
        return { kind: "binary", value: reader.readBytes(reader.readUint8()) };
      case Tag.Bin16:
        return { kind: "binary", value: reader.readBytes(reader.readUint16()) };
      case Tag.Bin32:
        return { kind: "binary", value: reader.readBytes(reader.readUint32()) };

      case Tag.Ext8:
        return this.readExtension(reader, reader.readUint8());
      case Tag.Ext16:
        return this.readExtension(reader, reader.readUint16());
      case Tag.Ext32:
        return this.readExtension(reader, reader.readUint32());

      case Tag.Float32:
        return { kind: "float", value: reader.readFloat32() };
      case Tag.Float64:
        return { kind: "float", value: reader.readFloat64() };

      case Tag.Uint8:
        return { kind: "int", value: BigInt(reader.readUint8()) };
      case Tag.Uint16:
        return { kind: "int", value: BigInt(reader.readUint16()) };
      case Tag.Uint32:
        return { kind: "int", value: BigInt(reader.readUint32()) };
      case Tag.Uint64:
        return { kind: "int", value: reader.readUint64() };
      case Tag.Int8:
        return { kind: "int", value: BigInt(reader.readInt8()) };
      case Tag.Int16:
        return { kind: "int", value: BigInt(reader.readInt16()) };
      case Tag.Int32:
        return { kind: "int", value: BigInt(reader.readInt32()) };
      case Tag.Int64:
        return { kind: "int", value: reader.readInt64() };

      case Tag.FixExt1:
        return this.readExtension(reader, 1);
      case Tag.FixExt2:
        return this.readExtension(reader, 2);
      case Tag.FixExt4:
        return this.readExtension(reader, 4);
      case Tag.FixExt8:
        return this.readExtension(reader, 8);
      case Tag.FixExt16:
        return this.readExtension(reader, 16);

      case Tag.Str8:
        return { kind: "string", value: reader.readString(reader.readUint8()) };
      case Tag.Str16:
        return { kind: "string", value: reader.readString(reader.readUint16()) };
      case Tag.Str32:
        return { kind: "string", value: reader.readString(reader.readUint32()) };

      case Tag.Array16:
        return this.readArray(reader, reader.readUint16(), start);
      case Tag.Array32:
        return this.readArray(reader, reader.readUint32(), start);
      case Tag.Map16:
        return this.readMap(reader, reader.readUint16(), start);
      case Tag.Map32:
        return this.readMap(reader, reader.readUint32(), start);

      default:
        // 0xc1 is the only byte left unassigned by the format.
        throw new UnknownTagError(tag, start);
    }
  }

  private readExtension(reader: Reader, length: number): Value {
    // Check the whole payload up front so a short buffer reports the
    // payload size, not just the missing type byte.
    reader.checkAvailable(1 + length);
    const typeId = reader.readInt8();
    return { kind: "extension", value: { typeId, data: reader.readBytes(length) } };
  }

  private readArray(reader: Reader, count: number, start: number): Value {
    // Every element takes at least one byte.
    this.checkCount(reader, count);
    this.enter(start);
    try {
      const items: Value[] = [];
      for (let i = 0; i < count; i++) {
        items.push(this.read(reader));
      }
      return { kind: "array", value: items };
    } finally {
      this.depth--;
    }
  }

  private readMap(reader: Reader, count: number, start: number): Value {
    this.checkCount(reader, count * 2);
    this.enter(start);
    try {
      const entries: MapEntry[] = [];
      for (let i = 0; i < count; i++) {
        const key = this.read(reader);
        const value = this.read(reader);
        entries.push({ key, value });
      }
      return { kind: "map", value: entries };
    } finally {
      this.depth--;
    }
  }

  private checkCount(reader: Reader, minBytes: number): void {
    if (minBytes > reader.remaining) {
      throw new UnexpectedEndError(minBytes, reader.remaining, reader.position);
    }
  }

  private enter(start: number): void {
    if (this.depth >= this.maxDepth) {
      throw new DepthExceededError(this.maxDepth, start);
    }
    this.depth++;
  }
}
