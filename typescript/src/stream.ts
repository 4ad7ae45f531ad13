/**
 * Sequences of MessagePack values.
 *
 * A MessagePack stream is a series of values written back to back with no
 * framing; each value's own tag says where it ends. The classes here write
 * and read such sequences in one complete, in-memory buffer.
 */

import { Decoder, parse, type DecodeOptions } from "./decoder";
import { Encoder, type EncodeOptions } from "./encoder";
import { EndOfStreamError, StreamClosedError } from "./errors";
import { Reader } from "./reader";
import type { Value } from "./value";

/** Default initial buffer capacity for stream writer. */
const DEFAULT_STREAM_BUFFER_CAPACITY = 4096;

/**
 * Options for StreamWriter configuration.
 */
export type StreamWriterOptions = EncodeOptions;

/**
 * Options for StreamReader configuration.
 */
export type StreamReaderOptions = DecodeOptions;

/**
 * StreamWriter appends encoded values to a single buffer.
 *
 * @example
 * ```typescript
 * const stream = new StreamWriter();
 * stream.write(int(1));
 * stream.write(str("two"));
 * const data = stream.bytes(); // 01 a3 74 77 6f
 * ```
 */
export class StreamWriter {
  private encoder: Encoder;
  private closed: boolean;

  constructor(options: StreamWriterOptions = {}) {
    this.encoder = new Encoder({
      ...options,
      initialCapacity: options.initialCapacity ?? DEFAULT_STREAM_BUFFER_CAPACITY,
    });
    this.closed = false;
  }

  /**
   * Returns the current position (bytes written).
   */
  get position(): number {
    return this.encoder.position;
  }

  /**
   * Returns true if the writer is closed.
   */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Encodes and appends a value.
   *
   * @throws StreamClosedError if the writer is closed
   */
  write(value: Value): void {
    if (this.closed) {
      throw new StreamClosedError();
    }
    this.encoder.write(value);
  }

  /**
   * Appends bytes that already hold one encoded value, exactly as given.
   * The bytes are parsed first so a malformed or multi-value chunk never
   * reaches the stream. No depth limit applies, matching `write()`.
   *
   * @throws StreamClosedError if the writer is closed
   * @throws DecodeError if `data` is not exactly one value
   */
  writeEncoded(data: Uint8Array): void {
    if (this.closed) {
      throw new StreamClosedError();
    }
    parse(data, { maxDepth: Number.POSITIVE_INFINITY });
    this.encoder.writeRaw(data);
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.encoder.bytes();
  }

  /**
   * Resets the writer for reuse, clearing all written data.
   */
  reset(): void {
    this.encoder.reset();
    this.closed = false;
  }

  /**
   * Closes the writer. No more values can be written after closing.
   */
  close(): void {
    this.closed = true;
  }
}

/**
 * StreamReader reads consecutive values from a buffer.
 *
 * A value cut off by the end of the buffer throws UnexpectedEndError; only
 * a buffer that ends exactly between values counts as a clean end.
 *
 * @example
 * ```typescript
 * const reader = new StreamReader(data);
 * for (const value of reader) {
 *   console.log(format(value));
 * }
 * ```
 */
export class StreamReader implements Iterable<Value> {
  private reader: Reader;
  private readonly data: Uint8Array;
  private readonly options: StreamReaderOptions;

  constructor(data: Uint8Array, options: StreamReaderOptions = {}) {
    this.data = data;
    this.reader = new Reader(data);
    this.options = options;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.reader.position;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.reader.remaining;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.reader.hasMore;
  }

  /**
   * Reads the next value.
   *
   * @throws EndOfStreamError if no value is left
   * @throws DecodeError if the next value is malformed
   */
  read(): Value {
    const value = this.tryRead();
    if (value === null) {
      throw new EndOfStreamError("No more values");
    }
    return value;
  }

  /**
   * Reads the next value, returning null at a clean end of stream.
   *
   * On a decode error the position is restored to the start of the value.
   */
  tryRead(): Value | null {
    if (!this.hasMore) {
      return null;
    }
    const start = this.reader.position;
    try {
      return new Decoder(this.options).read(this.reader);
    } catch (e) {
      this.reader = new Reader(this.data, start);
      throw e;
    }
  }

  /**
   * Skips the next value without keeping it.
   *
   * @returns The number of bytes skipped
   * @throws EndOfStreamError if no value is left
   */
  skip(): number {
    const start = this.position;
    this.read();
    return this.position - start;
  }

  /**
   * Resets the reader to the beginning of the buffer.
   */
  reset(): void {
    this.reader = new Reader(this.data);
  }

  /**
   * Returns an iterator over the remaining values.
   */
  *values(): IterableIterator<Value> {
    for (let value = this.tryRead(); value !== null; value = this.tryRead()) {
      yield value;
    }
  }

  [Symbol.iterator](): IterableIterator<Value> {
    return this.values();
  }

  /**
   * Collects the remaining values into an array.
   */
  toArray(): Value[] {
    return Array.from(this.values());
  }
}
