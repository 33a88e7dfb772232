/**
 * Wire encoding of compiled instructions and discriminator helpers.
 *
 * @packageDocumentation
 */

import type { ReadonlyUint8Array } from '@solana/codecs';
import { ByteReader } from '../codec/reader.js';
import type { ByteWriter } from '../codec/writer.js';
import { U8_SIZE, getPrefixedSize } from '../codec/sizes.js';
import type { CompiledInstruction } from './types.js';

/**
 * Anchor-style programs prefix instruction data with 8 bytes.
 */
export const DEFAULT_DISCRIMINATOR_SIZE = 8;

/**
 * Program index, compact-prefixed account indices, compact-prefixed data.
 */
export function writeCompiledInstruction(
  writer: ByteWriter,
  instruction: CompiledInstruction
): void {
  writer.u8(instruction.programAddressIndex);
  writer.compactU16(instruction.accountIndices.length);
  for (const index of instruction.accountIndices) writer.u8(index);
  writer.compactU16(instruction.data.length);
  writer.bytes(instruction.data);
}

export function readCompiledInstruction(reader: ByteReader): CompiledInstruction {
  const programAddressIndex = reader.u8();
  const accountCount = reader.compactU16();
  const accountIndices = Array.from(reader.bytes(accountCount));
  const dataLength = reader.compactU16();
  const data = reader.bytes(dataLength);
  return Object.freeze({
    programAddressIndex,
    accountIndices: Object.freeze(accountIndices),
    data,
  });
}

/**
 * Decode one compiled instruction starting at `offset`.
 */
export function decodeCompiledInstruction(
  bytes: ReadonlyUint8Array,
  offset = 0
): CompiledInstruction {
  return readCompiledInstruction(new ByteReader(bytes, offset));
}

export function getCompiledInstructionSize(instruction: CompiledInstruction): number {
  return (
    U8_SIZE +
    getPrefixedSize(instruction.accountIndices.length) +
    getPrefixedSize(instruction.data.length)
  );
}

/**
 * Leading discriminator bytes of instruction data, or `null` when the data
 * is shorter than `size`.
 */
export function getInstructionDiscriminator(
  data: ReadonlyUint8Array,
  size = DEFAULT_DISCRIMINATOR_SIZE
): Uint8Array | null {
  if (data.length < size) return null;
  return data.slice(0, size);
}

export function matchesDiscriminator(
  data: ReadonlyUint8Array,
  discriminator: ReadonlyUint8Array
): boolean {
  if (data.length < discriminator.length) return false;
  for (let i = 0; i < discriminator.length; i++) {
    if (data[i] !== discriminator[i]) return false;
  }
  return true;
}
