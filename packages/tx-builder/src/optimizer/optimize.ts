/**
 * Meaning-preserving transformations of compiled transactions.
 *
 * @packageDocumentation
 */

import { UnsafeOptimizationError } from '@wirecraft/tx-errors';
import type { CompiledInstruction } from '@wirecraft/tx-core';
import { classifyComputeBudget } from '../compute-budget/classify.js';
import { deriveMessageHeader, getAccountRoleAtIndex } from '../compiler/accounts.js';
import { decompileInstruction } from '../compiler/compile.js';
import type { AccountTableEntry, CompiledMessage, CompiledTransaction } from '../types.js';
import { getTransactionSize } from '../wire/encode.js';
import { getUnusedAccountIndices } from './analyze.js';

/**
 * - `size`: drop unreferenced accounts
 * - `cost`: suggest compute budget settings, never transform
 * - `balanced`: both
 */
export type OptimizationStrategy = 'size' | 'cost' | 'balanced';

export interface OptimizationChange {
  kind: 'applied' | 'suggested';
  code: string;
  description: string;
}

export interface OptimizationReport {
  strategy: OptimizationStrategy;
  sizeBefore: number;
  sizeAfter: number;
  bytesSaved: number;
  changes: OptimizationChange[];
}

export interface OptimizationResult {
  transaction: CompiledTransaction;
  report: OptimizationReport;
}

/**
 * Optimize a transaction without changing what it does.
 *
 * Only account table entries that no instruction references and that are
 * neither signers nor the fee payer are removed; the remaining entries
 * keep their order, so the header is simply recounted.
 *
 * @throws UnsafeOptimizationError when the result would differ in meaning
 * from the input, or when removing accounts would invalidate signatures
 * that are already present
 *
 * @example
 * ```ts
 * const { transaction, report } = optimizeTransaction(decoded, 'size');
 * console.log(`Saved ${report.bytesSaved} bytes`);
 * ```
 */
export function optimizeTransaction(
  transaction: CompiledTransaction,
  strategy: OptimizationStrategy = 'balanced'
): OptimizationResult {
  const sizeBefore = getTransactionSize(transaction);
  const changes: OptimizationChange[] = [];
  let optimized = transaction;

  if (strategy === 'size' || strategy === 'balanced') {
    const removable = getUnusedAccountIndices(transaction.message).filter(
      index => index >= transaction.message.header.numSignerAccounts
    );
    if (removable.length > 0) {
      optimized = removeAccounts(transaction, new Set(removable));
      changes.push({
        kind: 'applied',
        code: 'remove-unused-accounts',
        description: `Removed ${removable.length} unreferenced account(s): ${removable
          .map(index => transaction.message.accounts[index].address)
          .join(', ')}`,
      });
    }
  }

  if (strategy === 'cost' || strategy === 'balanced') {
    changes.push(...suggestComputeBudget(optimized.message));
  }

  const sizeAfter = getTransactionSize(optimized);
  return {
    transaction: optimized,
    report: {
      strategy,
      sizeBefore,
      sizeAfter,
      bytesSaved: sizeBefore - sizeAfter,
      changes,
    },
  };
}

function removeAccounts(
  transaction: CompiledTransaction,
  removed: ReadonlySet<number>
): CompiledTransaction {
  const filled = transaction.signatures.filter(signature => signature !== null).length;
  if (filled > 0) {
    throw new UnsafeOptimizationError(
      `removing accounts changes the signed message and would invalidate ${filled} signature(s)`
    );
  }

  const { message } = transaction;
  const newIndexOf = new Map<number, number>();
  const accounts: AccountTableEntry[] = [];
  message.accounts.forEach((entry, index) => {
    if (removed.has(index)) return;
    newIndexOf.set(index, accounts.length);
    accounts.push(entry);
  });

  const remap = (index: number): number => {
    const next = newIndexOf.get(index);
    if (next === undefined) {
      throw new UnsafeOptimizationError(
        `account index ${index} is referenced but was removed`,
        message.accounts[index]?.address
      );
    }
    return next;
  };

  const instructions = message.instructions.map(
    (instruction): CompiledInstruction =>
      Object.freeze({
        programAddressIndex: remap(instruction.programAddressIndex),
        accountIndices: Object.freeze(instruction.accountIndices.map(remap)),
        data: instruction.data,
      })
  );

  const optimizedMessage: CompiledMessage = Object.freeze({
    header: deriveMessageHeader(accounts),
    accounts: Object.freeze(accounts),
    recentBlockhash: message.recentBlockhash,
    instructions: Object.freeze(instructions),
  });
  assertEquivalent(message, optimizedMessage);

  return Object.freeze({ message: optimizedMessage, signatures: transaction.signatures });
}

/**
 * Every remaining account must keep its role, both as stored and as
 * recovered from the header, and every instruction must resolve to the
 * same program, accounts and data.
 */
function assertEquivalent(original: CompiledMessage, optimized: CompiledMessage): void {
  const originalRoles = new Map(original.accounts.map(entry => [entry.address, entry.role]));
  optimized.accounts.forEach((entry, index) => {
    const recovered = getAccountRoleAtIndex(optimized.header, optimized.accounts.length, index);
    if (originalRoles.get(entry.address) !== entry.role || recovered !== entry.role) {
      throw new UnsafeOptimizationError('account role would change', entry.address);
    }
  });

  if (original.header.numSignerAccounts !== optimized.header.numSignerAccounts) {
    throw new UnsafeOptimizationError('required signer count would change');
  }

  original.instructions.forEach((instruction, index) => {
    const before = decompileInstruction(original, instruction);
    const after = decompileInstruction(optimized, optimized.instructions[index]);
    const sameAccounts =
      (before.accounts ?? []).length === (after.accounts ?? []).length &&
      (before.accounts ?? []).every((meta, position) => {
        const other = after.accounts?.[position];
        return other?.address === meta.address && other.role === meta.role;
      });
    if (before.programAddress !== after.programAddress || !sameAccounts || before.data !== after.data) {
      throw new UnsafeOptimizationError(`instruction ${index} would resolve differently`);
    }
  });
}

function suggestComputeBudget(message: CompiledMessage): OptimizationChange[] {
  const budget = classifyComputeBudget(message);
  const suggestions: OptimizationChange[] = [];
  if (budget.computeUnitLimit === null) {
    suggestions.push({
      kind: 'suggested',
      code: 'set-compute-unit-limit',
      description:
        'Add a SetComputeUnitLimit instruction sized to actual usage; the default limit overstates the priority fee',
    });
  }
  if (budget.computeUnitPrice === null) {
    suggestions.push({
      kind: 'suggested',
      code: 'set-compute-unit-price',
      description: 'Add a SetComputeUnitPrice instruction to control the priority fee explicitly',
    });
  }
  return suggestions;
}
