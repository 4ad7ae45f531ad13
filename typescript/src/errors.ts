import type { Value } from "./value";

/**
 * Base error class for dynpack errors.
 */
export class DynpackError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DynpackError";
  }
}

/**
 * Error thrown when a tree cannot be encoded because it lies outside the
 * value model (an out-of-range integer or extension type id, an oversized
 * container).
 */
export class EncodeError extends DynpackError {
  constructor(message: string) {
    super(message);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding fails. `offset` is the byte position where the
 * problem was found.
 */
export class DecodeError extends DynpackError {
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(`${message} (at byte ${offset})`);
    this.name = "DecodeError";
    this.offset = offset;
  }
}

/**
 * Error thrown when the buffer ends before a value is complete.
 */
export class UnexpectedEndError extends DecodeError {
  readonly needed: number;
  readonly available: number;

  constructor(needed: number, available: number, offset: number) {
    super(`Unexpected end of input: needed ${needed} bytes, only ${available} available`, offset);
    this.name = "UnexpectedEndError";
    this.needed = needed;
    this.available = available;
  }
}

/**
 * Error thrown when a tag byte matches no MessagePack family.
 */
export class UnknownTagError extends DecodeError {
  readonly tag: number;

  constructor(tag: number, offset: number) {
    super(`Unknown tag byte: 0x${tag.toString(16).padStart(2, "0")}`, offset);
    this.name = "UnknownTagError";
    this.tag = tag;
  }
}

/**
 * Error thrown when a string payload is not valid UTF-8.
 */
export class InvalidStringError extends DecodeError {
  constructor(offset: number) {
    super("Invalid UTF-8 in string payload", offset);
    this.name = "InvalidStringError";
  }
}

/**
 * Error thrown when bytes remain after the top-level value.
 */
export class TrailingDataError extends DecodeError {
  readonly remaining: number;

  constructor(remaining: number, offset: number) {
    super(`Trailing data: ${remaining} bytes after the top-level value`, offset);
    this.name = "TrailingDataError";
    this.remaining = remaining;
  }
}

/**
 * Error thrown when containers nest deeper than the configured limit.
 */
export class DepthExceededError extends DecodeError {
  readonly maxDepth: number;

  constructor(maxDepth: number, offset: number) {
    super(`Nesting depth exceeds limit of ${maxDepth}`, offset);
    this.name = "DepthExceededError";
    this.maxDepth = maxDepth;
  }
}

/**
 * Error thrown when a value is accessed as a variant it does not hold.
 * The original value can be taken back with `recover()`.
 */
export class ConversionError extends DynpackError {
  readonly original: Value;
  readonly attempted: string;

  constructor(original: Value, attempted: string) {
    super(`cannot use ${original.kind} as ${attempted}`);
    this.name = "ConversionError";
    this.original = original;
    this.attempted = attempted;
  }

  /**
   * Returns the value the failed conversion was attempted on.
   */
  recover(): Value {
    return this.original;
  }
}

/**
 * Error thrown when an extension type is not registered.
 */
export class TypeNotRegisteredError extends DynpackError {
  constructor(typeName: string) {
    super(`Extension type not registered: ${typeName}`);
    this.name = "TypeNotRegisteredError";
  }
}

/**
 * Error thrown when an extension type id has no registration.
 */
export class UnknownExtensionTypeError extends DynpackError {
  readonly typeId: number;

  constructor(typeId: number) {
    super(`Unknown extension type ID: ${typeId}`);
    this.name = "UnknownExtensionTypeError";
    this.typeId = typeId;
  }
}

/**
 * Error thrown when an extension name or type id is registered twice.
 */
export class DuplicateRegistrationError extends DynpackError {
  constructor(what: string) {
    super(`Extension already registered: ${what}`);
    this.name = "DuplicateRegistrationError";
  }
}

/**
 * Error thrown when reading past the last value of a stream.
 */
export class EndOfStreamError extends DynpackError {
  constructor(message: string = "End of stream") {
    super(message);
    this.name = "EndOfStreamError";
  }
}

/**
 * Error thrown when writing to a closed stream.
 */
export class StreamClosedError extends DynpackError {
  constructor() {
    super("Stream is closed");
    this.name = "StreamClosedError";
  }
}
