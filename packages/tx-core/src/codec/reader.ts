/**
 * Position-tracked cursor over a fixed byte slice.
 *
 * @packageDocumentation
 */

import {
  fixDecoderSize,
  getBase58Decoder,
  getI64Decoder,
  getU16Decoder,
  getU32Decoder,
  getU64Decoder,
  getU8Decoder,
  type Decoder,
  type ReadonlyUint8Array,
} from '@solana/codecs';
import { getAddressDecoder, type Address } from '@solana/addresses';
import { blockhash, type Blockhash } from '@solana/rpc-types';
import { UnexpectedEofError } from '@wirecraft/tx-errors';
import { decodeCompactU16 } from './compact-u16.js';
import { I64_SIZE, IDENTIFIER_SIZE, U16_SIZE, U32_SIZE, U64_SIZE, U8_SIZE } from './sizes.js';

const u8Decoder = getU8Decoder();
const u16Decoder = getU16Decoder();
const u32Decoder = getU32Decoder();
const u64Decoder = getU64Decoder();
const i64Decoder = getI64Decoder();
const addressDecoder = getAddressDecoder();
const blockhashDecoder = fixDecoderSize(getBase58Decoder(), IDENTIFIER_SIZE);

/**
 * Reads wire-format values in order.
 *
 * Any read past the end throws `UnexpectedEofError`. The cursor position
 * after a failed read is unspecified and the reader should be discarded.
 */
export class ByteReader {
  private position: number;

  constructor(
    private readonly source: ReadonlyUint8Array,
    offset = 0
  ) {
    this.position = offset;
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return Math.max(0, this.source.length - this.position);
  }

  u8(): number {
    return this.read(u8Decoder, U8_SIZE);
  }

  u16(): number {
    return this.read(u16Decoder, U16_SIZE);
  }

  u32(): number {
    return this.read(u32Decoder, U32_SIZE);
  }

  u64(): bigint {
    return this.read(u64Decoder, U64_SIZE);
  }

  i64(): bigint {
    return this.read(i64Decoder, I64_SIZE);
  }

  compactU16(): number {
    const [value, nextOffset] = decodeCompactU16(this.source, this.position);
    this.position = nextOffset;
    return value;
  }

  /**
   * Copy of the next `length` bytes.
   */
  bytes(length: number): Uint8Array {
    this.ensureAvailable(length);
    const slice = this.source.slice(this.position, this.position + length);
    this.position += length;
    return slice;
  }

  identifier(): Address {
    return this.read(addressDecoder, IDENTIFIER_SIZE);
  }

  blockhash(): Blockhash {
    return blockhash(this.read(blockhashDecoder, IDENTIFIER_SIZE));
  }

  private read<T>(decoder: Decoder<T>, size: number): T {
    this.ensureAvailable(size);
    const [value, nextOffset] = decoder.read(this.source, this.position);
    this.position = nextOffset;
    return value;
  }

  private ensureAvailable(size: number): void {
    if (this.remaining < size) {
      throw new UnexpectedEofError(this.position, size, this.remaining);
    }
  }
}
