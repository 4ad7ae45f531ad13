import { describe, it, expect } from 'vitest';
import { parse, parsePrefix, DEFAULT_MAX_DEPTH } from './decoder';
import { encode } from './encoder';
import {
  DecodeError,
  DepthExceededError,
  InvalidStringError,
  TrailingDataError,
  UnexpectedEndError,
  UnknownTagError,
} from './errors';
import { array, bin, bool, ext, float, int, map, mapOf, nil, str, type Value } from './value';

function bytes(...values: number[]): Uint8Array {
  return new Uint8Array(values);
}

/**
 * Returns the DecodeError thrown by parsing `data`.
 */
function parseError(data: Uint8Array, maxDepth?: number): DecodeError {
  try {
    parse(data, { maxDepth });
  } catch (e) {
    if (e instanceof DecodeError) {
      return e;
    }
    throw e;
  }
  throw new Error('expected parse to fail');
}

describe('parse', () => {
  describe('fixed families', () => {
    it('decodes nil and booleans', () => {
      expect(parse(bytes(0xc0))).toEqual(nil());
      expect(parse(bytes(0xc2))).toEqual(bool(false));
      expect(parse(bytes(0xc3))).toEqual(bool(true));
    });

    it('decodes fixints', () => {
      expect(parse(bytes(0x00))).toEqual(int(0));
      expect(parse(bytes(0x2a))).toEqual(int(42));
      expect(parse(bytes(0x7f))).toEqual(int(127));
      expect(parse(bytes(0xff))).toEqual(int(-1));
      expect(parse(bytes(0xe0))).toEqual(int(-32));
    });
  });

  describe('integers', () => {
    it('widens unsigned families', () => {
      expect(parse(bytes(0xcc, 0xff))).toEqual(int(255));
      expect(parse(bytes(0xcd, 0x01, 0x00))).toEqual(int(256));
      expect(parse(bytes(0xce, 0xff, 0xff, 0xff, 0xff))).toEqual(int(4294967295));
      expect(parse(bytes(0xcf, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff))).toEqual(
        int(18446744073709551615n)
      );
    });

    it('widens signed families', () => {
      expect(parse(bytes(0xd0, 0x80))).toEqual(int(-128));
      expect(parse(bytes(0xd1, 0xff, 0x7f))).toEqual(int(-129));
      expect(parse(bytes(0xd2, 0x80, 0x00, 0x00, 0x00))).toEqual(int(-2147483648));
      expect(parse(bytes(0xd3, 0x80, 0, 0, 0, 0, 0, 0, 0))).toEqual(int(-9223372036854775808n));
      expect(parse(bytes(0xd3, 0x7f, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff))).toEqual(
        int(9223372036854775807n)
      );
    });

    it('accepts non-minimal encodings', () => {
      expect(parse(bytes(0xcc, 0x01))).toEqual(int(1));
      expect(parse(bytes(0xd1, 0x00, 0x05))).toEqual(int(5));
      expect(Array.from(encode(parse(bytes(0xcd, 0x00, 0x01))))).toEqual([0x01]);
    });
  });

  describe('floats', () => {
    it('widens float32 exactly', () => {
      expect(parse(bytes(0xca, 0x3f, 0xc0, 0x00, 0x00))).toEqual(float(1.5));
    });

    it('decodes float64', () => {
      expect(parse(bytes(0xcb, 0x3f, 0xf6, 0xb8, 0x51, 0xeb, 0x85, 0x1e, 0xb8))).toEqual(float(1.42));
    });
  });

  describe('strings and binary', () => {
    it('decodes every string width', () => {
      expect(parse(bytes(0xa0))).toEqual(str(''));
      expect(parse(bytes(0xa2, 0x68, 0x69))).toEqual(str('hi'));
      expect(parse(bytes(0xd9, 0x01, 0x61))).toEqual(str('a'));
      expect(parse(bytes(0xda, 0x00, 0x03, 0x61, 0x62, 0x63))).toEqual(str('abc'));
      expect(parse(bytes(0xdb, 0x00, 0x00, 0x00, 0x02, 0xc3, 0xa9))).toEqual(str('é'));
    });

    it('decodes every binary width', () => {
      expect(parse(bytes(0xc4, 0x00))).toEqual(bin([]));
      expect(parse(bytes(0xc5, 0x00, 0x01, 0x07))).toEqual(bin([7]));
      expect(parse(bytes(0xc6, 0x00, 0x00, 0x00, 0x02, 0x01, 0x02))).toEqual(bin([1, 2]));
    });

    it('copies binary payloads out of the input', () => {
      const data = bytes(0xc4, 0x01, 0x09);
      const value = parse(data);
      data[2] = 0;
      expect(value).toEqual(bin([9]));
    });
  });

  describe('containers', () => {
    it('decodes empty containers as containers', () => {
      expect(parse(bytes(0x90))).toEqual(array([]));
      expect(parse(bytes(0x80))).toEqual(map([]));
      expect(parse(bytes(0xdc, 0x00, 0x00))).toEqual(array([]));
      expect(parse(bytes(0xdf, 0x00, 0x00, 0x00, 0x00))).toEqual(map([]));
    });

    it('decodes array16 and map16', () => {
      expect(parse(bytes(0xdc, 0x00, 0x02, 0x01, 0x02))).toEqual(array([int(1), int(2)]));
      expect(parse(bytes(0xde, 0x00, 0x01, 0xa1, 0x61, 0xc3))).toEqual(mapOf([str('a'), bool(true)]));
    });

    it('keeps map order and duplicate keys', () => {
      const data = bytes(0x83, 0xa1, 0x62, 0x01, 0xa1, 0x61, 0x02, 0xa1, 0x62, 0x03);
      expect(parse(data)).toEqual(
        mapOf([str('b'), int(1)], [str('a'), int(2)], [str('b'), int(3)])
      );
    });

    it('decodes a nested document', () => {
      const data = bytes(
        0x82, 0xa7, 0x63, 0x6f, 0x6d, 0x70, 0x61, 0x63, 0x74, 0xc3, 0xa6, 0x73, 0x63, 0x68, 0x65,
        0x6d, 0x61, 0x93, 0x01, 0x02, 0xcb, 0x3f, 0xf5, 0x1e, 0xb8, 0x51, 0xeb, 0x85, 0x1f
      );
      expect(parse(data)).toEqual(
        mapOf(
          [str('compact'), bool(true)],
          [str('schema'), array([int(1), int(2), float(1.32)])]
        )
      );
    });
  });

  describe('extensions', () => {
    it('decodes fixext sizes', () => {
      expect(parse(bytes(0xd4, 0x01, 0xaa))).toEqual(ext(1, [0xaa]));
      expect(parse(bytes(0xd5, 0x01, 0xaa, 0xbb))).toEqual(ext(1, [0xaa, 0xbb]));
      expect(parse(bytes(0xd6, 0x02, 0x32, 0x4a, 0x67, 0x11))).toEqual(ext(2, [0x32, 0x4a, 0x67, 0x11]));
      expect(parse(bytes(0xd7, 0x03, 1, 2, 3, 4, 5, 6, 7, 8))).toEqual(ext(3, [1, 2, 3, 4, 5, 6, 7, 8]));
      expect(parse(new Uint8Array([0xd8, 0x04, ...new Array<number>(16).fill(9)]))).toEqual(
        ext(4, new Array<number>(16).fill(9))
      );
    });

    it('decodes ext8, ext16 and ext32', () => {
      expect(parse(bytes(0xc7, 0x00, 0x05))).toEqual(ext(5, []));
      expect(parse(bytes(0xc8, 0x00, 0x01, 0x05, 0x63))).toEqual(ext(5, [0x63]));
      expect(parse(bytes(0xc9, 0x00, 0x00, 0x00, 0x02, 0x05, 0x01, 0x02))).toEqual(ext(5, [1, 2]));
    });

    it('reads the type id as a signed byte', () => {
      expect(parse(bytes(0xd4, 0xff, 0x00))).toEqual(ext(-1, [0]));
      expect(parse(bytes(0xd4, 0x80, 0x00))).toEqual(ext(-128, [0]));
    });
  });

  describe('malformed input', () => {
    it('rejects an empty buffer', () => {
      const err = parseError(bytes());
      expect(err).toBeInstanceOf(UnexpectedEndError);
      expect(err.offset).toBe(0);
    });

    it('rejects the never-used tag', () => {
      const err = parseError(bytes(0xc1));
      expect(err).toBeInstanceOf(UnknownTagError);
      expect(err.message).toBe('Unknown tag byte: 0xc1 (at byte 0)');
    });

    it('reports the offset of a nested unknown tag', () => {
      const err = parseError(bytes(0x92, 0x01, 0xc1));
      expect(err).toBeInstanceOf(UnknownTagError);
      expect(err.offset).toBe(2);
    });

    it('rejects invalid UTF-8 instead of replacing it', () => {
      const fix = parseError(bytes(0xa2, 0xc3, 0x28));
      expect(fix).toBeInstanceOf(InvalidStringError);
      expect(fix.offset).toBe(1);

      const str8 = parseError(bytes(0xd9, 0x01, 0xff));
      expect(str8).toBeInstanceOf(InvalidStringError);
      expect(str8.offset).toBe(2);
    });

    it('rejects UTF-16 surrogates encoded as UTF-8', () => {
      expect(parseError(bytes(0xa3, 0xed, 0xa0, 0x80))).toBeInstanceOf(InvalidStringError);
    });

    it('rejects trailing data', () => {
      const err = parseError(bytes(0xc0, 0x00));
      expect(err).toBeInstanceOf(TrailingDataError);
      expect(err.offset).toBe(1);
      expect(err.message).toBe('Trailing data: 1 bytes after the top-level value (at byte 1)');
    });

    it('rejects a length that runs past the end', () => {
      const err = parseError(bytes(0xc4, 0x05, 0x01, 0x02));
      expect(err).toBeInstanceOf(UnexpectedEndError);
      expect(err.offset).toBe(2);
      expect(err.message).toBe('Unexpected end of input: needed 5 bytes, only 2 available (at byte 2)');
    });

    it('fails fast on container counts larger than the buffer', () => {
      const arr = parseError(bytes(0xdd, 0xff, 0xff, 0xff, 0xff));
      expect(arr).toBeInstanceOf(UnexpectedEndError);
      expect(arr.message).toBe(
        'Unexpected end of input: needed 4294967295 bytes, only 0 available (at byte 5)'
      );

      const m = parseError(bytes(0xdf, 0x80, 0x00, 0x00, 0x00, 0x01));
      expect(m).toBeInstanceOf(UnexpectedEndError);
    });

    it('detects truncation of a map missing its last value', () => {
      expect(parseError(bytes(0x81, 0xa1, 0x61))).toBeInstanceOf(UnexpectedEndError);
    });

    it('reports every truncation as UnexpectedEndError', () => {
      const values: Value[] = [
        int(-200),
        int(18446744073709551615n),
        float(1.25),
        str('a'.repeat(40)),
        str('héllo'),
        bin([1, 2, 3]),
        ext(2, [0x32, 0x4a, 0x67, 0x11]),
        ext(9, [1, 2, 3]),
        mapOf(
          [str('hello'), int(0x424242)],
          [
            str('world'),
            array([bool(true), nil(), bin([0x42, 0xff]), ext(-1, [0, 0, 0, 1]), float(-0.5)]),
          ]
        ),
      ];

      for (const value of values) {
        const data = encode(value);
        for (let length = 0; length < data.length; length++) {
          expect(parseError(data.subarray(0, length))).toBeInstanceOf(UnexpectedEndError);
        }
      }
    });
  });

  describe('depth limit', () => {
    function nested(depth: number): Uint8Array {
      const data = new Uint8Array(depth + 1).fill(0x91);
      data[depth] = 0xc0;
      return data;
    }

    it('allows nesting up to the default limit', () => {
      let value = parse(nested(DEFAULT_MAX_DEPTH));
      for (let i = 0; i < DEFAULT_MAX_DEPTH; i++) {
        expect(value.kind).toBe('array');
        value = value.kind === 'array' ? value.value[0] : value;
      }
      expect(value).toEqual(nil());
    });

    it('rejects nesting past the default limit', () => {
      const err = parseError(nested(DEFAULT_MAX_DEPTH + 1));
      expect(err).toBeInstanceOf(DepthExceededError);
      expect(err.offset).toBe(DEFAULT_MAX_DEPTH);
    });

    it('honours a configured limit', () => {
      expect(parse(nested(2), { maxDepth: 2 })).toEqual(array([array([nil()])]));
      expect(parseError(nested(3), 2)).toBeInstanceOf(DepthExceededError);
      expect(parseError(bytes(0x80), 0)).toBeInstanceOf(DepthExceededError);
      expect(parse(bytes(0x01), { maxDepth: 0 })).toEqual(int(1));
    });

    it('counts maps and arrays alike', () => {
      // {[]: nil}
      expect(parseError(bytes(0x81, 0x90, 0xc0), 1)).toBeInstanceOf(DepthExceededError);
    });
  });
});

describe('parsePrefix', () => {
  it('reports the bytes consumed and ignores what follows', () => {
    const data = bytes(0xa2, 0x68, 0x69, 0x00);
    expect(parsePrefix(data)).toEqual({ value: str('hi'), bytesRead: 3 });
  });

  it('starts at an offset', () => {
    const data = bytes(0x01, 0x92, 0xc2, 0xc3, 0xff);
    expect(parsePrefix(data, 1)).toEqual({ value: array([bool(false), bool(true)]), bytesRead: 3 });
  });

  it('rejects offsets outside the buffer', () => {
    expect(() => parsePrefix(bytes(0xc0), 2)).toThrow(RangeError);
    expect(() => parsePrefix(bytes(0xc0), -1)).toThrow(RangeError);
  });

  it('reports an error offset relative to the whole buffer', () => {
    try {
      parsePrefix(bytes(0x00, 0x00, 0xc1), 2);
      expect.unreachable();
    } catch (e) {
      if (!(e instanceof UnknownTagError)) throw e;
      expect(e.offset).toBe(2);
      expect(e.tag).toBe(0xc1);
    }
  });
});
