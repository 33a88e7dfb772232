/**
 * Message packing utilities for fitting instructions within transaction size limits.
 *
 * These utilities help you pack as many instructions as possible into a single
 * transaction, and identify which instructions need to be sent in follow-up
 * transactions.
 *
 * @packageDocumentation
 */

import type { Address } from '@solana/addresses';
import { AccountRole } from '@solana/instructions';
import type { Blockhash } from '@solana/rpc-types';
import { TooManyAccountsError, TransactionTooLargeError } from '@wirecraft/tx-errors';
import { TRANSACTION_SIZE_LIMIT, type LegacyInstruction } from '@wirecraft/tx-core';
import { compileTransaction, createUnsignedTransaction } from '../compiler/compile.js';
import { deriveMessageHeader } from '../compiler/accounts.js';
import type { CompiledTransaction } from '../types.js';
import { getTransactionSize } from '../wire/encode.js';

/**
 * What every packed transaction shares: payer, blockhash and any
 * instructions that must come first.
 */
export interface PackingBase {
  feePayer: Address;
  recentBlockhash: Blockhash;
  instructions?: readonly LegacyInstruction[];
}

/**
 * Result of packing instructions into a transaction.
 */
export interface PackResult {
  /** Instructions that fit in the transaction */
  packed: LegacyInstruction[];
  /** Instructions that did not fit (overflow) */
  overflow: LegacyInstruction[];
  /** Base instructions followed by the packed ones, unsigned */
  transaction: CompiledTransaction;
  /** Size information */
  sizeInfo: {
    size: number;
    limit: number;
    remaining: number;
  };
}

/**
 * Compile with every signature slot empty; a payer-only transaction when
 * there are no instructions.
 */
function compileForPacking(
  base: PackingBase,
  instructions: readonly LegacyInstruction[]
): CompiledTransaction {
  if (instructions.length === 0) {
    const accounts = Object.freeze([
      Object.freeze({ address: base.feePayer, role: AccountRole.WRITABLE_SIGNER }),
    ]);
    return createUnsignedTransaction(
      Object.freeze({
        header: deriveMessageHeader(accounts),
        accounts,
        recentBlockhash: base.recentBlockhash,
        instructions: Object.freeze([]),
      })
    );
  }
  return compileTransaction({ ...base, instructions });
}

/**
 * Whether the instructions compile within `limit` bytes. Running out of
 * account indices counts as not fitting.
 */
function fitsWithin(
  base: PackingBase,
  instructions: readonly LegacyInstruction[],
  limit: number
): boolean {
  try {
    return getTransactionSize(compileForPacking(base, instructions)) <= limit;
  } catch (error) {
    if (error instanceof TooManyAccountsError) return false;
    throw error;
  }
}

/**
 * Pack as many instructions as possible into one transaction.
 *
 * Instructions are added in order until the next one no longer fits within
 * the transaction size limit, less `reserveBytes`. Everything from that
 * instruction on is returned as overflow.
 *
 * @example
 * ```ts
 * const result = packInstructions({ feePayer, recentBlockhash }, [ix1, ix2, ix3, ix4, ix5]);
 *
 * // First transaction with packed instructions
 * const tx1 = result.transaction;
 *
 * // Send overflow in next transaction
 * if (result.overflow.length > 0) {
 *   const result2 = packInstructions({ feePayer, recentBlockhash }, result.overflow);
 * }
 * ```
 */
export function packInstructions(
  base: PackingBase,
  instructions: readonly LegacyInstruction[],
  options?: {
    /** Reserve bytes for future instructions (default: 0) */
    reserveBytes?: number;
  }
): PackResult {
  const reserveBytes = options?.reserveBytes ?? 0;
  const effectiveLimit = TRANSACTION_SIZE_LIMIT - reserveBytes;
  const baseInstructions = base.instructions ?? [];

  const packed: LegacyInstruction[] = [];
  for (const instruction of instructions) {
    if (!fitsWithin(base, [...baseInstructions, ...packed, instruction], effectiveLimit)) {
      // This instruction doesn't fit, stop here
      break;
    }
    packed.push(instruction);
  }

  const transaction = compileForPacking(base, [...baseInstructions, ...packed]);
  const size = getTransactionSize(transaction);
  return {
    packed,
    overflow: instructions.slice(packed.length),
    transaction,
    sizeInfo: {
      size,
      limit: TRANSACTION_SIZE_LIMIT,
      remaining: TRANSACTION_SIZE_LIMIT - size,
    },
  };
}

/**
 * Check if an instruction can fit alongside the base instructions.
 *
 * @example
 * ```ts
 * if (canFitInstruction({ feePayer, recentBlockhash, instructions }, newInstruction)) {
 *   instructions.push(newInstruction);
 * } else {
 *   // Need to create a new transaction
 * }
 * ```
 */
export function canFitInstruction(base: PackingBase, instruction: LegacyInstruction): boolean {
  return fitsWithin(base, [...(base.instructions ?? []), instruction], TRANSACTION_SIZE_LIMIT);
}

/**
 * Get remaining bytes available in a transaction.
 *
 * @example
 * ```ts
 * const remaining = getRemainingBytes(transaction);
 * console.log(`Can add approximately ${remaining} more bytes`);
 * ```
 */
export function getRemainingBytes(transaction: CompiledTransaction): number {
  return TRANSACTION_SIZE_LIMIT - getTransactionSize(transaction);
}

/**
 * Split an array of instructions into multiple chunks, each fitting within
 * the transaction size limit when added to the base.
 *
 * @throws TransactionTooLargeError when a single instruction cannot fit on its own
 * @throws TooManyAccountsError when a single instruction references too many accounts
 *
 * @example
 * ```ts
 * const chunks = splitInstructionsIntoChunks({ feePayer, recentBlockhash }, manyInstructions);
 *
 * for (const chunk of chunks) {
 *   const transaction = new TransactionBuilder()
 *     .setFeePayer(feePayer)
 *     .setRecentBlockhash(recentBlockhash)
 *     .addInstructions(chunk)
 *     .buildAndSign([payerSigner]);
 * }
 * ```
 */
export function splitInstructionsIntoChunks(
  base: PackingBase,
  instructions: readonly LegacyInstruction[]
): LegacyInstruction[][] {
  const chunks: LegacyInstruction[][] = [];
  let remaining = [...instructions];

  while (remaining.length > 0) {
    const result = packInstructions(base, remaining);

    if (result.packed.length === 0) {
      // Single instruction is too large to fit
      const alone = compileForPacking(base, [...(base.instructions ?? []), remaining[0]]);
      throw new TransactionTooLargeError(getTransactionSize(alone), TRANSACTION_SIZE_LIMIT);
    }

    chunks.push(result.packed);
    remaining = result.overflow;
  }

  return chunks;
}
