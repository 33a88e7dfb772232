/**
 * Size comparisons against the wire limit.
 *
 * @packageDocumentation
 */

import {
  IDENTIFIER_SIZE,
  TRANSACTION_SIZE_LIMIT,
  U8_SIZE,
  getCompactU16Size,
  getPrefixedSize,
} from '@wirecraft/tx-core';
import type { CompiledTransaction } from '../types.js';
import { getTransactionSize } from '../wire/encode.js';

export interface TransactionComparison {
  /** Size of the first minus size of the second, in bytes. */
  sizeDiff: number;
  instructionDiff: number;
  accountDiff: number;
}

export function compareTransactions(
  first: CompiledTransaction,
  second: CompiledTransaction
): TransactionComparison {
  return {
    sizeDiff: getTransactionSize(first) - getTransactionSize(second),
    instructionDiff: first.message.instructions.length - second.message.instructions.length,
    accountDiff: first.message.accounts.length - second.message.accounts.length,
  };
}

export function exceedsMaxSize(transaction: CompiledTransaction): boolean {
  return getTransactionSize(transaction) > TRANSACTION_SIZE_LIMIT;
}

/**
 * Bytes left before the wire limit; negative when already over it.
 */
export function getAvailableSpace(transaction: CompiledTransaction): number {
  return TRANSACTION_SIZE_LIMIT - getTransactionSize(transaction);
}

/**
 * Whether one more instruction with `dataSize` bytes of data, referencing
 * `newAccounts` non-signer accounts not yet in the table, would still fit.
 * The instruction is assumed to list only those accounts.
 */
export function canAddInstruction(
  transaction: CompiledTransaction,
  dataSize: number,
  newAccounts: number
): boolean {
  const { message } = transaction;
  const instructionBytes =
    U8_SIZE + getPrefixedSize(newAccounts) + getPrefixedSize(dataSize);
  const accountBytes = newAccounts * IDENTIFIER_SIZE;
  const prefixGrowth =
    getCompactU16Size(message.instructions.length + 1) -
    getCompactU16Size(message.instructions.length) +
    getCompactU16Size(message.accounts.length + newAccounts) -
    getCompactU16Size(message.accounts.length);

  return getAvailableSpace(transaction) >= instructionBytes + accountBytes + prefixGrowth;
}
