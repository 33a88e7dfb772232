/**
 * Growable output buffer for the wire format.
 *
 * @packageDocumentation
 */

import {
  fixEncoderSize,
  getBase58Encoder,
  getI64Encoder,
  getShortU16Encoder,
  getU16Encoder,
  getU32Encoder,
  getU64Encoder,
  getU8Encoder,
  type Encoder,
  type ReadonlyUint8Array,
} from '@solana/codecs';
import { getAddressEncoder, isAddress, type Address } from '@solana/addresses';
import { isBlockhash, type Blockhash } from '@solana/rpc-types';
import { InvalidIdentifierError } from '@wirecraft/tx-errors';
import {
  I64_RANGE,
  I64_SIZE,
  IDENTIFIER_SIZE,
  U16_RANGE,
  U16_SIZE,
  U32_RANGE,
  U32_SIZE,
  U64_RANGE,
  U64_SIZE,
  U8_RANGE,
  U8_SIZE,
  assertIntegerInRange,
  getCompactU16Size,
} from './sizes.js';

const INITIAL_CAPACITY = 256;

const u8Encoder = getU8Encoder();
const u16Encoder = getU16Encoder();
const u32Encoder = getU32Encoder();
const u64Encoder = getU64Encoder();
const i64Encoder = getI64Encoder();
const shortU16Encoder = getShortU16Encoder();
const addressEncoder = getAddressEncoder();
const blockhashEncoder = fixEncoderSize(getBase58Encoder(), IDENTIFIER_SIZE);

/**
 * Appends little-endian integers, compact-u16 values, raw bytes and
 * 32-byte identifiers to a buffer that grows on demand.
 *
 * Every write checks that it appended exactly as many bytes as the
 * matching size query reports.
 *
 * @example
 * ```ts
 * const writer = new ByteWriter();
 * writer.u8(2).u32(200_000);
 * writer.toBytes(); // Uint8Array [2, 64, 13, 3, 0]
 * ```
 */
export class ByteWriter {
  private buffer: Uint8Array;
  private position = 0;

  constructor(initialCapacity = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(1, initialCapacity));
  }

  /**
   * Number of bytes written so far.
   */
  get length(): number {
    return this.position;
  }

  u8(value: number): this {
    assertIntegerInRange('u8', value, ...U8_RANGE);
    return this.write(u8Encoder, value, U8_SIZE);
  }

  u16(value: number): this {
    assertIntegerInRange('u16', value, ...U16_RANGE);
    return this.write(u16Encoder, value, U16_SIZE);
  }

  u32(value: number): this {
    assertIntegerInRange('u32', value, ...U32_RANGE);
    return this.write(u32Encoder, value, U32_SIZE);
  }

  u64(value: number | bigint): this {
    assertIntegerInRange('u64', value, ...U64_RANGE);
    return this.write(u64Encoder, value, U64_SIZE);
  }

  i64(value: number | bigint): this {
    assertIntegerInRange('i64', value, ...I64_RANGE);
    return this.write(i64Encoder, value, I64_SIZE);
  }

  compactU16(value: number): this {
    return this.write(shortU16Encoder, value, getCompactU16Size(value));
  }

  /**
   * Raw bytes with no length prefix.
   */
  bytes(bytes: ReadonlyUint8Array): this {
    this.ensureCapacity(bytes.length);
    this.buffer.set(bytes, this.position);
    this.position += bytes.length;
    return this;
  }

  /**
   * An account or program address as exactly 32 bytes.
   */
  identifier(value: Address): this {
    if (!isAddress(value)) {
      throw new InvalidIdentifierError(value);
    }
    return this.write(addressEncoder, value, IDENTIFIER_SIZE);
  }

  blockhash(value: Blockhash): this {
    if (!isBlockhash(value)) {
      throw new InvalidIdentifierError(value);
    }
    return this.write(blockhashEncoder, value, IDENTIFIER_SIZE);
  }

  /**
   * Copy of the bytes written so far.
   */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.position);
  }

  private write<T>(encoder: Encoder<T>, value: T, expectedSize: number): this {
    this.ensureCapacity(expectedSize);
    const start = this.position;
    this.position = encoder.write(value, this.buffer, this.position);
    if (this.position - start !== expectedSize) {
      throw new Error(
        `Encoder wrote ${this.position - start} bytes where ${expectedSize} were expected`
      );
    }
    return this;
  }

  private ensureCapacity(additional: number): void {
    const required = this.position + additional;
    if (required <= this.buffer.length) return;

    let capacity = this.buffer.length * 2;
    while (capacity < required) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.position));
    this.buffer = next;
  }
}
