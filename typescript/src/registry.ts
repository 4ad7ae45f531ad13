import {
  ConversionError,
  DecodeError,
  DuplicateRegistrationError,
  TypeNotRegisteredError,
  UnknownExtensionTypeError,
} from "./errors";
import { Reader } from "./reader";
import {
  isExtensionTypeId,
  MaxExtensionTypeId,
  MaxInt64,
  MaxUint32,
  MinInt64,
} from "./types";
import type { ExtensionValue, Value } from "./value";
import { Writer } from "./writer";

/**
 * Converts an application type to and from extension payload bytes.
 */
export interface ExtensionCodec<T> {
  encode(value: T): Uint8Array;
  decode(data: Uint8Array): T;
}

/**
 * Registration information for an extension type.
 */
interface ExtensionRegistration {
  typeId: number;
  name: string;
  codec: ExtensionCodec<unknown>;
}

/**
 * Registry maps application types to extension type ids.
 *
 * @example
 * ```typescript
 * const registry = new ExtensionRegistry();
 * registry.register("point", {
 *   encode: (p: { x: number; y: number }) => new Uint8Array([p.x, p.y]),
 *   decode: (data) => ({ x: data[0], y: data[1] }),
 * }, 7);
 *
 * const value = registry.pack("point", { x: 1, y: 2 });
 * const { name, value: point } = registry.unpack(value);
 * ```
 */
export class ExtensionRegistry {
  private byId: Map<number, ExtensionRegistration> = new Map();
  private byName: Map<string, ExtensionRegistration> = new Map();
  private nextTypeId = 0; // Application ids are 0-127

  /**
   * Registers a codec under a name. Without `typeId`, the lowest free
   * application id is assigned.
   *
   * @returns The type id in use
   * @throws DuplicateRegistrationError if the name or id is taken
   * @throws RangeError if `typeId` is not a signed byte, or no id is free
   */
  register<T>(name: string, codec: ExtensionCodec<T>, typeId?: number): number {
    if (this.byName.has(name)) {
      throw new DuplicateRegistrationError(`name "${name}"`);
    }

    const id = typeId ?? this.allocateTypeId();
    if (!isExtensionTypeId(id)) {
      throw new RangeError(`Extension type ID ${id} is outside [-128, 127]`);
    }
    if (this.byId.has(id)) {
      throw new DuplicateRegistrationError(`type ID ${id}`);
    }

    const registration: ExtensionRegistration = { typeId: id, name, codec };
    this.byId.set(id, registration);
    this.byName.set(name, registration);

    return id;
  }

  private allocateTypeId(): number {
    while (this.byId.has(this.nextTypeId)) {
      this.nextTypeId++;
    }
    if (this.nextTypeId > MaxExtensionTypeId) {
      throw new RangeError("No free application extension type IDs");
    }
    return this.nextTypeId;
  }

  /**
   * Gets the type ID for a registered name.
   */
  getTypeId(name: string): number {
    const reg = this.byName.get(name);
    if (!reg) {
      throw new TypeNotRegisteredError(name);
    }
    return reg.typeId;
  }

  /**
   * Gets the name registered for a type ID.
   */
  getTypeName(typeId: number): string {
    const reg = this.byId.get(typeId);
    if (!reg) {
      throw new UnknownExtensionTypeError(typeId);
    }
    return reg.name;
  }

  /**
   * Encodes an application value as an extension value.
   */
  pack<T>(name: string, value: T): ExtensionValue {
    const reg = this.byName.get(name);
    if (!reg) {
      throw new TypeNotRegisteredError(name);
    }
    return { kind: "extension", value: { typeId: reg.typeId, data: reg.codec.encode(value) } };
  }

  /**
   * Decodes an extension value with the codec registered for its type id.
   *
   * @throws ConversionError if `value` is not an extension
   * @throws UnknownExtensionTypeError if the type id is not registered
   */
  unpack(value: Value): { name: string; value: unknown } {
    if (value.kind !== "extension") {
      throw new ConversionError(value, "extension");
    }

    const reg = this.byId.get(value.value.typeId);
    if (!reg) {
      throw new UnknownExtensionTypeError(value.value.typeId);
    }

    return { name: reg.name, value: reg.codec.decode(value.value.data) };
  }

  /**
   * Checks if a name is registered.
   */
  isRegistered(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Checks if a type ID is registered.
   */
  isRegisteredId(typeId: number): boolean {
    return this.byId.has(typeId);
  }

  /**
   * Clears all registrations.
   */
  clear(): void {
    this.byId.clear();
    this.byName.clear();
    this.nextTypeId = 0;
  }
}

/**
 * The predefined MessagePack timestamp extension type.
 */
export const TIMESTAMP_TYPE_ID = -1;

/**
 * Seconds since the Unix epoch plus a nanosecond part in [0, 999999999].
 */
export interface Timestamp {
  seconds: bigint;
  nanoseconds: number;
}

const MAX_NANOSECONDS = 999_999_999;
const MAX_TIMESTAMP64_SECONDS = (1n << 34n) - 1n;

/**
 * Encodes a timestamp in the smallest of the 4, 8 and 12 byte layouts.
 *
 * @throws RangeError if `nanoseconds` is not an integer in [0, 999999999],
 *         or `seconds` does not fit an int64
 */
export function encodeTimestamp(ts: Timestamp): Uint8Array {
  const { seconds, nanoseconds } = ts;
  if (!Number.isInteger(nanoseconds) || nanoseconds < 0 || nanoseconds > MAX_NANOSECONDS) {
    throw new RangeError(`Nanoseconds ${nanoseconds} are outside [0, ${MAX_NANOSECONDS}]`);
  }
  if (seconds < MinInt64 || seconds > MaxInt64) {
    throw new RangeError(`Seconds ${seconds} are outside the int64 range`);
  }

  const writer = new Writer(12);
  if (seconds >= 0n && seconds <= MAX_TIMESTAMP64_SECONDS) {
    if (nanoseconds === 0 && seconds <= BigInt(MaxUint32)) {
      // timestamp 32: uint32 seconds
      writer.writeUint32(Number(seconds));
    } else {
      // timestamp 64: 30-bit nanoseconds above 34-bit seconds
      writer.writeUint64((BigInt(nanoseconds) << 34n) | seconds);
    }
  } else {
    // timestamp 96: uint32 nanoseconds, int64 seconds
    writer.writeUint32(nanoseconds);
    writer.writeInt64(seconds);
  }
  return writer.bytes().slice();
}

/**
 * Decodes a timestamp extension payload.
 *
 * @throws DecodeError if the payload is not 4, 8 or 12 bytes, or holds
 *         out-of-range nanoseconds
 */
export function decodeTimestamp(data: Uint8Array): Timestamp {
  const reader = new Reader(data);
  let ts: Timestamp;

  switch (data.length) {
    case 4:
      ts = { seconds: BigInt(reader.readUint32()), nanoseconds: 0 };
      break;
    case 8: {
      const packed = reader.readUint64();
      ts = { seconds: packed & MAX_TIMESTAMP64_SECONDS, nanoseconds: Number(packed >> 34n) };
      break;
    }
    case 12: {
      const nanoseconds = reader.readUint32();
      ts = { seconds: reader.readInt64(), nanoseconds };
      break;
    }
    default:
      throw new DecodeError(`Invalid timestamp payload length ${data.length}`, 0);
  }

  if (ts.nanoseconds > MAX_NANOSECONDS) {
    throw new DecodeError(`Timestamp nanoseconds ${ts.nanoseconds} exceed ${MAX_NANOSECONDS}`, 0);
  }
  return ts;
}

/**
 * Global default registry, preloaded with the timestamp extension.
 */
export const defaultRegistry = new ExtensionRegistry();
defaultRegistry.register<Timestamp>(
  "timestamp",
  { encode: encodeTimestamp, decode: decodeTimestamp },
  TIMESTAMP_TYPE_ID
);

/**
 * Registers a codec with the default registry.
 */
export function register<T>(name: string, codec: ExtensionCodec<T>, typeId?: number): number {
  return defaultRegistry.register(name, codec, typeId);
}
