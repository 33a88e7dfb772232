/**
 * Compact unsigned 16-bit integer ("short u16"): 7 data bits per byte,
 * high bit set when another byte follows, at most 3 bytes.
 *
 * @packageDocumentation
 */

import { getShortU16Encoder, type ReadonlyUint8Array } from '@solana/codecs';
import { MalformedVarintError, UnexpectedEofError } from '@wirecraft/tx-errors';
import { COMPACT_U16_MAX } from '../constants.js';
import { assertCompactU16 } from './sizes.js';

const MAX_COMPACT_U16_BYTES = 3;

/**
 * Encode a value in 0..65535 in its minimal compact form.
 */
export function encodeCompactU16(value: number): ReadonlyUint8Array {
  assertCompactU16(value);
  return getShortU16Encoder().encode(value);
}

/**
 * Decode a compact-u16 starting at `offset`.
 *
 * Unlike the permissive decoder in `@solana/codecs`, this one rejects
 * over-long encodings so that every value has exactly one byte form.
 *
 * @returns The decoded value and the offset just past it
 */
export function decodeCompactU16(
  bytes: ReadonlyUint8Array,
  offset = 0
): [value: number, nextOffset: number] {
  let value = 0;
  for (let index = 0; index < MAX_COMPACT_U16_BYTES; index++) {
    const position = offset + index;
    if (position >= bytes.length) {
      throw new UnexpectedEofError(position, 1, 0);
    }
    const byte = bytes[position];
    value |= (byte & 0x7f) << (7 * index);

    if ((byte & 0x80) === 0) {
      // A trailing zero byte adds nothing the previous byte couldn't carry
      if (index > 0 && byte === 0) {
        throw new MalformedVarintError(position, 'non-minimal encoding');
      }
      if (value > COMPACT_U16_MAX) {
        throw new MalformedVarintError(offset, `value ${value} exceeds ${COMPACT_U16_MAX}`);
      }
      return [value, position + 1];
    }
  }
  throw new MalformedVarintError(
    offset + MAX_COMPACT_U16_BYTES - 1,
    'continuation bit set on the third byte'
  );
}
