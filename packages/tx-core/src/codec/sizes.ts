/**
 * Byte-size queries for everything the codec writes.
 *
 * @packageDocumentation
 */

import { ValueOutOfRangeError } from '@wirecraft/tx-errors';
import { COMPACT_U16_MAX } from '../constants.js';

export const U8_SIZE = 1;
export const U16_SIZE = 2;
export const U32_SIZE = 4;
export const U64_SIZE = 8;
export const I64_SIZE = 8;
export const IDENTIFIER_SIZE = 32;
export const SIGNATURE_SIZE = 64;

/**
 * Number of bytes `encodeCompactU16(value)` produces: 1 up to 127,
 * 2 up to 16383, 3 up to 65535.
 */
export function getCompactU16Size(value: number): number {
  assertCompactU16(value);
  if (value <= 0x7f) return 1;
  if (value <= 0x3fff) return 2;
  return 3;
}

/**
 * Size of a compact length prefix followed by `length` items of `itemSize` bytes.
 */
export function getPrefixedSize(length: number, itemSize = 1): number {
  return getCompactU16Size(length) + length * itemSize;
}

export function assertCompactU16(value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > COMPACT_U16_MAX) {
    throw new ValueOutOfRangeError('compact-u16', value, 0, COMPACT_U16_MAX);
  }
}

/**
 * Throws `ValueOutOfRangeError` unless `value` is an integer within [min, max].
 */
export function assertIntegerInRange(
  kind: string,
  value: number | bigint,
  min: bigint,
  max: bigint
): void {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new ValueOutOfRangeError(kind, value, min, max);
  }
  const asBigInt = BigInt(value);
  if (asBigInt < min || asBigInt > max) {
    throw new ValueOutOfRangeError(kind, value, min, max);
  }
}

export const U8_RANGE = [0n, 0xffn] as const;
export const U16_RANGE = [0n, 0xffffn] as const;
export const U32_RANGE = [0n, 0xffff_ffffn] as const;
export const U64_RANGE = [0n, 0xffff_ffff_ffff_ffffn] as const;
export const I64_RANGE = [-(2n ** 63n), 2n ** 63n - 1n] as const;
