import { EncodeError } from "./errors";
import {
  Tag,
  FIXARRAY_MAX,
  FIXEXT_TAGS,
  FIXMAP_MAX,
  FIXSTR_MAX,
  MaxUint8,
  MaxUint16,
  MaxUint32,
  MaxUint64,
  MinInt8,
  MinInt16,
  MinInt32,
  MinInt64,
  NEGATIVE_FIXINT_MIN,
  POSITIVE_FIXINT_MAX,
  isExtensionTypeId,
} from "./types";
import type { Extension, MapEntry, Value } from "./value";
import { Writer } from "./writer";

// Module-level singleton to avoid repeated instantiation
const textEncoder = new TextEncoder();

/**
 * Options for encoding.
 */
export interface EncodeOptions {
  /**
   * Write floats as float32 when that width reproduces the value's exact
   * 64-bit pattern. Default: false (always float64)
   */
  compactFloats?: boolean;
  /** Initial output buffer capacity. Default: 256 */
  initialCapacity?: number;
}

const DEFAULT_INITIAL_CAPACITY = 256;

// Scratch space for the float32 round-trip check.
const floatScratch = new DataView(new ArrayBuffer(16));

/**
 * Returns true if narrowing to float32 and widening back yields the same
 * bit pattern.
 */
export function fitsFloat32(value: number): boolean {
  floatScratch.setFloat64(0, value);
  floatScratch.setFloat32(8, value);
  floatScratch.setFloat64(8, floatScratch.getFloat32(8));
  return floatScratch.getBigUint64(0) === floatScratch.getBigUint64(8);
}

/**
 * Encodes a value to MessagePack.
 *
 * @throws EncodeError if the tree lies outside the value model
 */
export function encode(value: Value, options: EncodeOptions = {}): Uint8Array {
  const encoder = new Encoder(options);
  encoder.write(value);
  return encoder.bytes().slice();
}

/**
 * Encoder writes values into a single growing buffer. One instance can
 * encode several values back to back.
 */
export class Encoder {
  private readonly writer: Writer;
  private readonly compactFloats: boolean;

  constructor(options: EncodeOptions = {}) {
    this.writer = new Writer(options.initialCapacity ?? DEFAULT_INITIAL_CAPACITY);
    this.compactFloats = options.compactFloats ?? false;
  }

  /**
   * Returns the bytes encoded so far, as a view of the internal buffer.
   */
  bytes(): Uint8Array {
    return this.writer.bytes();
  }

  /**
   * Returns the number of bytes encoded so far.
   */
  get position(): number {
    return this.writer.position;
  }

  /**
   * Discards everything encoded so far.
   */
  reset(): void {
    this.writer.reset();
  }

  /**
   * Appends bytes that already hold encoded values, unchanged.
   */
  writeRaw(data: Uint8Array): void {
    this.writer.writeBytes(data);
  }

  /**
   * Appends one encoded value.
   */
  write(value: Value): void {
    switch (value.kind) {
      case "nil":
        this.writer.writeByte(Tag.Nil);
        return;
      case "boolean":
        this.writer.writeByte(value.value ? Tag.True : Tag.False);
        return;
      case "int":
        this.writeInt(value.value);
        return;
      case "float":
        this.writeFloat(value.value);
        return;
      case "string":
        this.writeString(value.value);
        return;
      case "binary":
        this.writeBinary(value.value);
        return;
      case "array":
        this.writeArray(value.value);
        return;
      case "map":
        this.writeMap(value.value);
        return;
      case "extension":
        this.writeExtension(value.value);
        return;
      default: {
        const unknownKind: never = value;
        throw new EncodeError(`Not a value: ${String(unknownKind)}`);
      }
    }
  }

  private writeInt(n: bigint): void {
    const w = this.writer;

    if (n >= 0n) {
      if (n <= BigInt(POSITIVE_FIXINT_MAX)) {
        w.writeByte(Number(n));
      } else if (n <= BigInt(MaxUint8)) {
        w.writeByte(Tag.Uint8);
        w.writeUint8(Number(n));
      } else if (n <= BigInt(MaxUint16)) {
        w.writeByte(Tag.Uint16);
        w.writeUint16(Number(n));
      } else if (n <= BigInt(MaxUint32)) {
        w.writeByte(Tag.Uint32);
        w.writeUint32(Number(n));
      } else if (n <= MaxUint64) {
        w.writeByte(Tag.Uint64);
        w.writeUint64(n);
      } else {
        throw new EncodeError(`Integer ${n} exceeds uint64 maximum ${MaxUint64}`);
      }
      return;
    }

    if (n >= BigInt(NEGATIVE_FIXINT_MIN)) {
      w.writeInt8(Number(n));
    } else if (n >= BigInt(MinInt8)) {
      w.writeByte(Tag.Int8);
      w.writeInt8(Number(n));
    } else if (n >= BigInt(MinInt16)) {
      w.writeByte(Tag.Int16);
      w.writeInt16(Number(n));
    } else if (n >= BigInt(MinInt32)) {
      w.writeByte(Tag.Int32);
      w.writeInt32(Number(n));
    } else if (n >= MinInt64) {
      w.writeByte(Tag.Int64);
      w.writeInt64(n);
    } else {
      throw new EncodeError(`Integer ${n} is below int64 minimum ${MinInt64}`);
    }
  }

  private writeFloat(x: number): void {
    if (this.compactFloats && fitsFloat32(x)) {
      this.writer.writeByte(Tag.Float32);
      this.writer.writeFloat32(x);
      return;
    }
    this.writer.writeByte(Tag.Float64);
    this.writer.writeFloat64(x);
  }

  private writeString(s: string): void {
    const bytes = textEncoder.encode(s);
    const length = bytes.length;

    if (length <= FIXSTR_MAX) {
      this.writer.writeByte(Tag.FixStr | length);
    } else {
      this.writeLength(length, Tag.Str8, Tag.Str16, Tag.Str32, "string");
    }
    this.writer.writeBytes(bytes);
  }

  private writeBinary(data: Uint8Array): void {
    this.writeLength(data.length, Tag.Bin8, Tag.Bin16, Tag.Bin32, "binary");
    this.writer.writeBytes(data);
  }

  private writeArray(items: Value[]): void {
    if (items.length <= FIXARRAY_MAX) {
      this.writer.writeByte(Tag.FixArray | items.length);
    } else {
      this.writeLength(items.length, null, Tag.Array16, Tag.Array32, "array");
    }
    for (const item of items) {
      this.write(item);
    }
  }

  private writeMap(entries: MapEntry[]): void {
    if (entries.length <= FIXMAP_MAX) {
      this.writer.writeByte(Tag.FixMap | entries.length);
    } else {
      this.writeLength(entries.length, null, Tag.Map16, Tag.Map32, "map");
    }
    for (const entry of entries) {
      this.write(entry.key);
      this.write(entry.value);
    }
  }

  private writeExtension(extension: Extension): void {
    const { typeId, data } = extension;
    if (!isExtensionTypeId(typeId)) {
      throw new EncodeError(`Extension type ID ${typeId} is outside [-128, 127]`);
    }

    const fixTag = FIXEXT_TAGS.get(data.length);
    if (fixTag !== undefined) {
      this.writer.writeByte(fixTag);
    } else {
      this.writeLength(data.length, Tag.Ext8, Tag.Ext16, Tag.Ext32, "extension");
    }
    this.writer.writeInt8(typeId);
    this.writer.writeBytes(data);
  }

  /**
   * Writes the narrowest length-prefixed tag that holds `length`. Families
   * without an 8-bit form pass `null` for `tag8`.
   */
  private writeLength(
    length: number,
    tag8: Tag | null,
    tag16: Tag,
    tag32: Tag,
    family: string
  ): void {
    const w = this.writer;
    if (tag8 !== null && length <= MaxUint8) {
      w.writeByte(tag8);
      w.writeUint8(length);
    } else if (length <= MaxUint16) {
      w.writeByte(tag16);
      w.writeUint16(length);
    } else if (length <= MaxUint32) {
      w.writeByte(tag32);
      w.writeUint32(length);
    } else {
      throw new EncodeError(`${family} length ${length} exceeds ${MaxUint32}`);
    }
  }
}
