/**
 * MessagePack tag bytes.
 *
 * Fix families carry their value or length in the low bits of the tag; the
 * `*_MASK` constants extract it and the `*_MAX` constants bound it.
 */
export enum Tag {
  /** 0x00 - 0x7f: value in the tag */
  PositiveFixint = 0x00,
  /** 0x80 - 0x8f: pair count in the low 4 bits */
  FixMap = 0x80,
  /** 0x90 - 0x9f: element count in the low 4 bits */
  FixArray = 0x90,
  /** 0xa0 - 0xbf: byte length in the low 5 bits */
  FixStr = 0xa0,
  Nil = 0xc0,
  /** Never used by the format. */
  NeverUsed = 0xc1,
  False = 0xc2,
  True = 0xc3,
  Bin8 = 0xc4,
  Bin16 = 0xc5,
  Bin32 = 0xc6,
  Ext8 = 0xc7,
  Ext16 = 0xc8,
  Ext32 = 0xc9,
  Float32 = 0xca,
  Float64 = 0xcb,
  Uint8 = 0xcc,
  Uint16 = 0xcd,
  Uint32 = 0xce,
  Uint64 = 0xcf,
  Int8 = 0xd0,
  Int16 = 0xd1,
  Int32 = 0xd2,
  Int64 = 0xd3,
  FixExt1 = 0xd4,
  FixExt2 = 0xd5,
  FixExt4 = 0xd6,
  FixExt8 = 0xd7,
  FixExt16 = 0xd8,
  Str8 = 0xd9,
  Str16 = 0xda,
  Str32 = 0xdb,
  Array16 = 0xdc,
  Array32 = 0xdd,
  Map16 = 0xde,
  Map32 = 0xdf,
  /** 0xe0 - 0xff: value in the tag, as a two's complement byte */
  NegativeFixint = 0xe0,
}

export const POSITIVE_FIXINT_MAX = 0x7f;
export const NEGATIVE_FIXINT_MIN = -32;

export const FIXMAP_MASK = 0x0f;
export const FIXARRAY_MASK = 0x0f;
export const FIXSTR_MASK = 0x1f;

/** Largest count or length the inline fix forms can carry. */
export const FIXMAP_MAX = 15;
export const FIXARRAY_MAX = 15;
export const FIXSTR_MAX = 31;

/** Largest length field values per width. */
export const MaxUint8 = 0xff;
export const MaxUint16 = 0xffff;
export const MaxUint32 = 0xffffffff;

/**
 * Integer bounds. The Int variant spans the union of the int64 and uint64
 * wire families.
 */
export const MinInt8 = -0x80;
export const MinInt16 = -0x8000;
export const MinInt32 = -0x80000000;
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1
export const MaxUint64 = BigInt("0xffffffffffffffff"); // 2^64 - 1

/** Extension type ids are signed bytes. */
export const MinExtensionTypeId = -128;
export const MaxExtensionTypeId = 127;

/**
 * Payload sizes that have a dedicated fixext tag.
 */
export const FIXEXT_TAGS: ReadonlyMap<number, Tag> = new Map([
  [1, Tag.FixExt1],
  [2, Tag.FixExt2],
  [4, Tag.FixExt4],
  [8, Tag.FixExt8],
  [16, Tag.FixExt16],
]);

/**
 * Returns true if the bigint fits the Int variant's range.
 */
export function isInIntRange(n: bigint): boolean {
  return n >= MinInt64 && n <= MaxUint64;
}

/**
 * Returns true if the number is a valid extension type id.
 */
export function isExtensionTypeId(typeId: number): boolean {
  return Number.isInteger(typeId) && typeId >= MinExtensionTypeId && typeId <= MaxExtensionTypeId;
}
