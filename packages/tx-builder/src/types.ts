/**
 * Shared types for compiled messages and transactions.
 *
 * @packageDocumentation
 */

import type { Address } from '@solana/addresses';
import type { ReadonlyUint8Array } from '@solana/codecs';
import type { AccountRole } from '@solana/instructions';
import type { Blockhash } from '@solana/rpc-types';
import type { CompiledInstruction, LegacyInstruction } from '@wirecraft/tx-core';

export type { CompiledInstruction } from '@wirecraft/tx-core';

/**
 * Counts from which every account's role is recovered by position.
 */
export interface MessageHeader {
  /** Accounts that must sign; they lead the table. */
  readonly numSignerAccounts: number;
  /** The trailing part of the signer prefix that is read-only. */
  readonly numReadonlySignerAccounts: number;
  /** The trailing part of the table that is read-only and unsigned. */
  readonly numReadonlyNonSignerAccounts: number;
}

/**
 * An account table entry with the role merged across every reference.
 */
export interface AccountTableEntry {
  readonly address: Address;
  readonly role: AccountRole;
}

/**
 * Header, ordered account table, blockhash and index-based instructions.
 * This is exactly what signers sign.
 */
export interface CompiledMessage {
  readonly header: MessageHeader;
  readonly accounts: readonly AccountTableEntry[];
  readonly recentBlockhash: Blockhash;
  readonly instructions: readonly CompiledInstruction[];
}

/**
 * A signature slot is empty until its signer fills it.
 */
export type SignatureSlot = ReadonlyUint8Array | null;

/**
 * A compiled message with one signature slot per required signer,
 * in account table order.
 */
export interface CompiledTransaction {
  readonly message: CompiledMessage;
  readonly signatures: readonly SignatureSlot[];
}

/**
 * Everything the compiler needs.
 */
export interface CompileInput {
  feePayer?: Address | null;
  recentBlockhash?: Blockhash | null;
  instructions: readonly LegacyInstruction[];
}

/**
 * Signing capability. Implementations hold the key material; only the
 * address and a synchronous `sign` are needed here.
 */
export interface WireSigner<TAddress extends string = string> {
  readonly address: Address<TAddress>;
  /**
   * Sign the serialized message. Must return a 64-byte signature.
   */
  sign(message: ReadonlyUint8Array): ReadonlyUint8Array;
}

/**
 * Size of a compiled transaction relative to the wire limit.
 */
export interface TransactionSizeInfo {
  size: number;
  limit: number;
  remaining: number;
  percentUsed: number;
  canFitMore: boolean;
}
