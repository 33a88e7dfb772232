/**
 * Tests for the compact-u16 codec.
 */

import { describe, it, expect } from 'vitest';
import { MalformedVarintError, UnexpectedEofError, ValueOutOfRangeError } from '@wirecraft/tx-errors';
import { decodeCompactU16, encodeCompactU16 } from '../compact-u16.js';
import { getCompactU16Size } from '../sizes.js';

describe('encodeCompactU16', () => {
  it('should encode boundary values in their minimal form', () => {
    expect(Array.from(encodeCompactU16(0))).toEqual([0x00]);
    expect(Array.from(encodeCompactU16(127))).toEqual([0x7f]);
    expect(Array.from(encodeCompactU16(128))).toEqual([0x80, 0x01]);
    expect(Array.from(encodeCompactU16(16383))).toEqual([0xff, 0x7f]);
    expect(Array.from(encodeCompactU16(16384))).toEqual([0x80, 0x80, 0x01]);
    expect(Array.from(encodeCompactU16(65535))).toEqual([0xff, 0xff, 0x03]);
  });

  it('should reject values outside 0..65535', () => {
    expect(() => encodeCompactU16(65536)).toThrow(ValueOutOfRangeError);
    expect(() => encodeCompactU16(-1)).toThrow(ValueOutOfRangeError);
    expect(() => encodeCompactU16(1.5)).toThrow(ValueOutOfRangeError);
  });

  it('should round-trip every value with the predicted size', () => {
    for (let value = 0; value <= 0xffff; value++) {
      const encoded = encodeCompactU16(value);
      const expectedLength = value < 0x80 ? 1 : value < 0x4000 ? 2 : 3;
      expect(encoded.length).toBe(expectedLength);
      expect(getCompactU16Size(value)).toBe(expectedLength);
      expect(decodeCompactU16(encoded)).toEqual([value, expectedLength]);
    }
  });
});

describe('decodeCompactU16', () => {
  it('should decode from an offset and return the next offset', () => {
    const bytes = new Uint8Array([0xaa, 0x80, 0x01, 0xbb]);
    expect(decodeCompactU16(bytes, 1)).toEqual([128, 3]);
  });

  it('should fail with UnexpectedEofError on a truncated encoding', () => {
    for (const value of [128, 16383, 16384, 65535]) {
      const encoded = encodeCompactU16(value);
      for (let length = 0; length < encoded.length; length++) {
        expect(() => decodeCompactU16(encoded.slice(0, length))).toThrow(UnexpectedEofError);
      }
    }
  });

  it('should report where the input ran out', () => {
    try {
      decodeCompactU16(new Uint8Array([0x80]));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnexpectedEofError);
      if (error instanceof UnexpectedEofError) {
        expect(error.offset).toBe(1);
        expect(error.needed).toBe(1);
        expect(error.available).toBe(0);
      }
    }
  });

  it('should reject a spurious continuation byte', () => {
    expect(() => decodeCompactU16(new Uint8Array([0x85, 0x00]))).toThrow(MalformedVarintError);
    expect(() => decodeCompactU16(new Uint8Array([0xff, 0x80, 0x00]))).toThrow(
      MalformedVarintError
    );
  });

  it('should reject a continuation bit on the third byte', () => {
    expect(() => decodeCompactU16(new Uint8Array([0x80, 0x80, 0x80, 0x01]))).toThrow(
      MalformedVarintError
    );
  });

  it('should reject values above 65535', () => {
    try {
      decodeCompactU16(new Uint8Array([0x00, 0xff, 0xff, 0x04]), 1);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedVarintError);
      if (error instanceof MalformedVarintError) {
        expect(error.offset).toBe(1);
      }
    }
  });
});
