import { InvalidStringError, UnexpectedEndError } from "./errors";

// Module-level singleton; `fatal` makes malformed UTF-8 throw instead of
// decoding to U+FFFD.
const textDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Reader is a bounds-checked big-endian cursor over a byte buffer.
 */
export class Reader {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  private end: number;

  constructor(data: Uint8Array, offset: number = 0) {
    this.buffer = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.pos = offset;
    this.end = data.length;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return Math.max(0, this.end - this.pos);
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.end;
  }

  /**
   * Throws UnexpectedEndError unless `needed` more bytes are available.
   */
  checkAvailable(needed: number): void {
    if (this.pos + needed > this.end) {
      throw new UnexpectedEndError(needed, this.remaining, this.pos);
    }
  }

  /**
   * Reads a raw byte.
   */
  readByte(): number {
    this.checkAvailable(1);
    return this.buffer[this.pos++];
  }

  /**
   * Reads raw bytes into a fresh copy, so the result does not alias the
   * input buffer.
   */
  readBytes(length: number): Uint8Array {
    this.checkAvailable(length);
    const bytes = this.buffer.slice(this.pos, this.pos + length);
    this.pos += length;
    return bytes;
  }

  /**
   * Advances the cursor without reading.
   */
  skip(length: number): void {
    this.checkAvailable(length);
    this.pos += length;
  }

  readUint8(): number {
    return this.readByte();
  }

  readUint16(): number {
    this.checkAvailable(2);
    const value = this.view.getUint16(this.pos, false);
    this.pos += 2;
    return value;
  }

  readUint32(): number {
    this.checkAvailable(4);
    const value = this.view.getUint32(this.pos, false);
    this.pos += 4;
    return value;
  }

  readUint64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigUint64(this.pos, false);
    this.pos += 8;
    return value;
  }

  readInt8(): number {
    this.checkAvailable(1);
    const value = this.view.getInt8(this.pos);
    this.pos += 1;
    return value;
  }

  readInt16(): number {
    this.checkAvailable(2);
    const value = this.view.getInt16(this.pos, false);
    this.pos += 2;
    return value;
  }

  readInt32(): number {
    this.checkAvailable(4);
    const value = this.view.getInt32(this.pos, false);
    this.pos += 4;
    return value;
  }

  readInt64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigInt64(this.pos, false);
    this.pos += 8;
    return value;
  }

  /**
   * Reads a 32-bit float (IEEE 754). Widening to a JS number is exact.
   */
  readFloat32(): number {
    this.checkAvailable(4);
    const value = this.view.getFloat32(this.pos, false);
    this.pos += 4;
    return value;
  }

  /**
   * Reads a 64-bit float (IEEE 754).
   */
  readFloat64(): number {
    this.checkAvailable(8);
    const value = this.view.getFloat64(this.pos, false);
    this.pos += 8;
    return value;
  }

  /**
   * Reads `length` bytes as strict UTF-8.
   * @throws InvalidStringError if the bytes are not valid UTF-8
   */
  readString(length: number): string {
    this.checkAvailable(length);
    const start = this.pos;
    let value: string;
    try {
      value = textDecoder.decode(this.buffer.subarray(start, start + length));
    } catch (e) {
      if (e instanceof TypeError) {
        throw new InvalidStringError(start);
      }
      throw e;
    }
    this.pos += length;
    return value;
  }
}
