/**
 * Shared test helpers: deterministic addresses, blockhash and signers.
 */

import { getAddressDecoder, type Address } from '@solana/addresses';
import type { ReadonlyUint8Array } from '@solana/codecs';
import { blockhash } from '@solana/rpc-types';
import { InstructionEncoder, type BuiltInstruction } from '@wirecraft/tx-core';
import type { WireSigner } from '../types.js';

const addressDecoder = getAddressDecoder();

/**
 * A distinct, valid address for every seed in 0..65535.
 */
export function testAddress(seed: number): Address {
  const bytes = new Uint8Array(32);
  bytes[0] = seed & 0xff;
  bytes[1] = (seed >> 8) & 0xff;
  bytes[31] = 1;
  return addressDecoder.decode(bytes);
}

export const RECENT_BLOCKHASH = blockhash(testAddress(0xfffe));

export interface StubSigner extends WireSigner {
  /** Every message this signer was asked to sign. */
  readonly messages: ReadonlyUint8Array[];
}

/**
 * Signer whose 64-byte signature is `tag` repeated, with the message
 * length's low byte first.
 */
export function createStubSigner(address: Address, tag = 7): StubSigner {
  const messages: ReadonlyUint8Array[] = [];
  return {
    address,
    messages,
    sign(message) {
      messages.push(message);
      const signature = new Uint8Array(64).fill(tag);
      signature[0] = message.length & 0xff;
      return signature;
    },
  };
}

/**
 * An instruction for `program` with no accounts and `dataLength` bytes of data.
 */
export function dataInstruction(program: Address, dataLength: number): BuiltInstruction {
  return new InstructionEncoder(program).appendData(new Uint8Array(dataLength).fill(1)).build();
}
