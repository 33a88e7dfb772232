/**
 * Transaction validation utilities.
 *
 * @packageDocumentation
 */

import { TransactionTooLargeError } from '@wirecraft/tx-errors';
import { TRANSACTION_SIZE_LIMIT } from '@wirecraft/tx-core';
import type { CompiledTransaction, TransactionSizeInfo } from '../types.js';
import { getTransactionSize } from '../wire/encode.js';

/**
 * Maximum transaction size in bytes.
 */
export const MAX_TRANSACTION_SIZE = TRANSACTION_SIZE_LIMIT;

/**
 * Validate transaction size does not exceed maximum.
 */
export function validateTransactionSize(transaction: CompiledTransaction): void {
  const size = getTransactionSize(transaction);
  if (size > MAX_TRANSACTION_SIZE) {
    throw new TransactionTooLargeError(size, MAX_TRANSACTION_SIZE);
  }
}

/**
 * Get transaction size information.
 *
 * @example
 * ```ts
 * const info = getTransactionSizeInfo(transaction);
 * console.log(`Using ${info.percentUsed.toFixed(1)}% of transaction space`);
 * console.log(`${info.remaining} bytes remaining`);
 * ```
 */
export function getTransactionSizeInfo(transaction: CompiledTransaction): TransactionSizeInfo {
  const size = getTransactionSize(transaction);
  return {
    size,
    limit: MAX_TRANSACTION_SIZE,
    remaining: MAX_TRANSACTION_SIZE - size,
    percentUsed: (size / MAX_TRANSACTION_SIZE) * 100,
    canFitMore: size < MAX_TRANSACTION_SIZE,
  };
}
