/**
 * Golden vector tests.
 *
 * Each valid vector is decoded, rendered with format(), and re-encoded;
 * each invalid vector must fail with the named error.
 */

import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { encode, parse, format, DecodeError } from '../../../typescript/src';

const GOLDEN_DIR = path.join(__dirname, '..', '..', 'golden');

interface ValidVector {
  name: string;
  hex: string;
  text: string;
  canonical?: string;
}

interface InvalidVector {
  name: string;
  hex: string;
  error: string;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

function isValidVector(v: unknown): v is ValidVector {
  return (
    isRecord(v) &&
    typeof v.name === 'string' &&
    typeof v.hex === 'string' &&
    typeof v.text === 'string' &&
    (v.canonical === undefined || typeof v.canonical === 'string')
  );
}

function isInvalidVector(v: unknown): v is InvalidVector {
  return isRecord(v) && typeof v.name === 'string' && typeof v.hex === 'string' && typeof v.error === 'string';
}

function loadVectors(): { valid: ValidVector[]; invalid: InvalidVector[] } {
  const raw: unknown = JSON.parse(fs.readFileSync(path.join(GOLDEN_DIR, 'vectors.json'), 'utf-8'));
  if (!isRecord(raw) || !Array.isArray(raw.valid) || !Array.isArray(raw.invalid)) {
    throw new Error('vectors.json must hold "valid" and "invalid" arrays');
  }
  return {
    valid: raw.valid.filter(isValidVector),
    invalid: raw.invalid.filter(isInvalidVector),
  };
}

function fromHex(hex: string): Uint8Array {
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join('');
}

const vectors = loadVectors();

describe('golden vectors', () => {
  it('loads every vector', () => {
    expect(vectors.valid).toHaveLength(36);
    expect(vectors.invalid).toHaveLength(9);
  });

  describe('valid', () => {
    for (const vector of vectors.valid) {
      it(`decodes ${vector.name}`, () => {
        const value = parse(fromHex(vector.hex));
        expect(format(value)).toBe(vector.text);
        expect(toHex(encode(value))).toBe(vector.canonical ?? vector.hex);
      });
    }
  });

  describe('invalid', () => {
    for (const vector of vectors.invalid) {
      it(`rejects ${vector.name}`, () => {
        let caught: unknown;
        try {
          parse(fromHex(vector.hex));
        } catch (e) {
          caught = e;
        }
        expect(caught).toBeInstanceOf(DecodeError);
        expect(caught instanceof Error ? caught.name : undefined).toBe(vector.error);
      });
    }
  });
});
