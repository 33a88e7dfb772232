/**
 * Tests for transaction analysis and optimization.
 */

import { describe, it, expect } from 'vitest';
import { AccountRole } from '@solana/instructions';
import { UnsafeOptimizationError } from '@wirecraft/tx-errors';
import { InstructionEncoder, type LegacyInstruction } from '@wirecraft/tx-core';
import { RECENT_BLOCKHASH, dataInstruction, testAddress } from '../../__tests__/fixtures.js';
import { compileTransaction, createUnsignedTransaction } from '../../compiler/compile.js';
import {
  createSetComputeUnitLimitInstruction,
  createSetComputeUnitPriceInstruction,
} from '../../compute-budget/instructions.js';
import type { CompiledMessage, CompiledTransaction } from '../../types.js';
import { encodeTransaction, getTransactionSize } from '../../wire/encode.js';
import { decodeTransaction } from '../../wire/decode.js';
import { analyzeTransaction, getSizeBreakdown, getUnusedAccountIndices } from '../analyze.js';
import { optimizeTransaction } from '../optimize.js';
import {
  canAddInstruction,
  compareTransactions,
  exceedsMaxSize,
  getAvailableSpace,
} from '../utils.js';

const PAYER = testAddress(1);
const PROGRAM = testAddress(2);
const A = testAddress(3);
const B = testAddress(4);
const UNUSED = testAddress(5);
const COSIGNER = testAddress(6);

function transactionWith(instructions: LegacyInstruction[]) {
  return compileTransaction({ feePayer: PAYER, recentBlockhash: RECENT_BLOCKHASH, instructions });
}

/**
 * Payer, program and one read-only account that nothing references.
 */
function withUnusedAccount(): CompiledTransaction {
  const message: CompiledMessage = {
    header: { numSignerAccounts: 1, numReadonlySignerAccounts: 0, numReadonlyNonSignerAccounts: 2 },
    accounts: [
      { address: PAYER, role: AccountRole.WRITABLE_SIGNER },
      { address: PROGRAM, role: AccountRole.READONLY },
      { address: UNUSED, role: AccountRole.READONLY },
    ],
    recentBlockhash: RECENT_BLOCKHASH,
    instructions: [{ programAddressIndex: 1, accountIndices: [], data: new Uint8Array([1]) }],
  };
  return createUnsignedTransaction(message);
}

describe('analyzeTransaction', () => {
  it('should break the size down into categories that add up', () => {
    const transaction = transactionWith([
      new InstructionEncoder(PROGRAM).signer(A, false).writable(B).appendU32(1).build(),
      dataInstruction(PROGRAM, 40),
    ]);

    const breakdown = getSizeBreakdown(transaction);
    const total =
      breakdown.signatures.bytes +
      breakdown.header.bytes +
      breakdown.accountKeys.bytes +
      breakdown.instructionMetadata.bytes +
      breakdown.instructionData.bytes;

    expect(total).toBe(encodeTransaction(transaction).length);
    expect(breakdown.signatures.bytes).toBe(1 + 2 * 64);
    expect(breakdown.header.bytes).toBe(35);
    expect(breakdown.accountKeys.bytes).toBe(1 + 4 * 32);
    expect(breakdown.instructionData.bytes).toBe(44);
  });

  it('should score a minimal transaction by its overhead', () => {
    // overhead 104 of 105 message bytes: 100 - 40 × 104/105 ≈ 60.4
    const analysis = analyzeTransaction(transactionWith([dataInstruction(PROGRAM, 1)]));

    expect(analysis.totalSize).toBe(170);
    expect(analysis.numSignatures).toBe(1);
    expect(analysis.numAccounts).toBe(2);
    expect(analysis.numInstructions).toBe(1);
    expect(analysis.unusedAccountIndices).toEqual([]);
    expect(analysis.redundantReferences).toBe(0);
    expect(analysis.efficiencyScore).toBe(60);
    expect(analysis.suggestions).toEqual([]);
  });

  it('should find unreferenced accounts', () => {
    const analysis = analyzeTransaction(withUnusedAccount());

    expect(analysis.unusedAccountIndices).toEqual([2]);
    expect(analysis.efficiencyScore).toBe(47);
    expect(analysis.suggestions.map(suggestion => suggestion.code)).toEqual([
      'low-account-utilization',
    ]);
  });

  it('should never report the fee payer as unused', () => {
    const message = transactionWith([dataInstruction(PROGRAM, 1)]).message;

    expect(getUnusedAccountIndices(message)).toEqual([]);
  });

  it('should count repeated references within one instruction', () => {
    const analysis = analyzeTransaction(
      transactionWith([new InstructionEncoder(PROGRAM).readonly(A).readonly(A).writable(B).build()])
    );

    expect(analysis.redundantReferences).toBe(1);
    expect(analysis.suggestions.map(suggestion => suggestion.code)).toContain(
      'redundant-account-references'
    );
  });

  it('should flag data just past a compact length boundary', () => {
    const analysis = analyzeTransaction(transactionWith([dataInstruction(PROGRAM, 130)]));

    expect(analysis.suggestions.map(suggestion => suggestion.code)).toEqual([
      'compact-length-boundary',
    ]);
  });

  it('should flag transactions near or over the size limit', () => {
    const near = analyzeTransaction(transactionWith([dataInstruction(PROGRAM, 1000)]));
    const over = analyzeTransaction(transactionWith([dataInstruction(PROGRAM, 1300)]));

    expect(near.totalSize).toBe(1170);
    expect(near.suggestions.map(suggestion => suggestion.code)).toEqual(['near-size-limit']);
    expect(over.suggestions.map(suggestion => suggestion.code)).toEqual([
      'exceeds-size-limit',
      'large-instruction-data',
    ]);
  });

  it('should flag many instructions and many accounts', () => {
    const instructions = Array.from({ length: 6 }, () => dataInstruction(PROGRAM, 2));
    const encoder = new InstructionEncoder(PROGRAM);
    for (let seed = 100; seed < 120; seed++) encoder.readonly(testAddress(seed));

    expect(
      analyzeTransaction(transactionWith(instructions)).suggestions.map(suggestion => suggestion.code)
    ).toEqual(['many-instructions']);
    expect(
      analyzeTransaction(transactionWith([encoder.build()])).suggestions.map(
        suggestion => suggestion.code
      )
    ).toEqual(['many-accounts']);
  });
});

describe('optimizeTransaction', () => {
  it('should remove unreferenced accounts and recount the header', () => {
    const { transaction, report } = optimizeTransaction(withUnusedAccount(), 'size');

    expect(transaction.message.accounts.map(entry => entry.address)).toEqual([PAYER, PROGRAM]);
    expect(transaction.message.header).toEqual({
      numSignerAccounts: 1,
      numReadonlySignerAccounts: 0,
      numReadonlyNonSignerAccounts: 1,
    });
    expect(report).toEqual({
      strategy: 'size',
      sizeBefore: 202,
      sizeAfter: 170,
      bytesSaved: 32,
      changes: [
        {
          kind: 'applied',
          code: 'remove-unused-accounts',
          description: `Removed 1 unreferenced account(s): ${UNUSED}`,
        },
      ],
    });
  });

  it('should produce a transaction that encodes and decodes', () => {
    const { transaction } = optimizeTransaction(withUnusedAccount(), 'size');

    const decoded = decodeTransaction(encodeTransaction(transaction));

    expect(decoded.message).toEqual(transaction.message);
    expect(getTransactionSize(decoded)).toBe(170);
  });

  it('should be idempotent', () => {
    const once = optimizeTransaction(withUnusedAccount(), 'size').transaction;

    const twice = optimizeTransaction(once, 'size');

    expect(twice.transaction).toBe(once);
    expect(twice.report.bytesSaved).toBe(0);
    expect(twice.report.changes).toEqual([]);
  });

  it('should keep unreferenced signers', () => {
    const message: CompiledMessage = {
      header: { numSignerAccounts: 2, numReadonlySignerAccounts: 1, numReadonlyNonSignerAccounts: 1 },
      accounts: [
        { address: PAYER, role: AccountRole.WRITABLE_SIGNER },
        { address: COSIGNER, role: AccountRole.READONLY_SIGNER },
        { address: PROGRAM, role: AccountRole.READONLY },
      ],
      recentBlockhash: RECENT_BLOCKHASH,
      instructions: [{ programAddressIndex: 2, accountIndices: [], data: new Uint8Array() }],
    };
    const transaction = createUnsignedTransaction(message);

    const result = optimizeTransaction(transaction, 'size');

    expect(result.transaction).toBe(transaction);
    expect(result.report.changes).toEqual([]);
  });

  it('should refuse to remove accounts from a signed transaction', () => {
    const unsigned = withUnusedAccount();
    const signed: CompiledTransaction = {
      message: unsigned.message,
      signatures: [new Uint8Array(64).fill(1)],
    };

    expect(() => optimizeTransaction(signed, 'size')).toThrow(UnsafeOptimizationError);
  });

  it('should only suggest compute budget changes for the cost strategy', () => {
    const input = withUnusedAccount();

    const { transaction, report } = optimizeTransaction(input, 'cost');

    expect(transaction).toBe(input);
    expect(report.bytesSaved).toBe(0);
    expect(report.changes.map(change => [change.kind, change.code])).toEqual([
      ['suggested', 'set-compute-unit-limit'],
      ['suggested', 'set-compute-unit-price'],
    ]);
  });

  it('should not suggest settings a transaction already has', () => {
    const transaction = transactionWith([
      createSetComputeUnitLimitInstruction(100_000),
      createSetComputeUnitPriceInstruction(1_000),
      dataInstruction(PROGRAM, 1),
    ]);

    expect(optimizeTransaction(transaction, 'cost').report.changes).toEqual([]);
  });

  it('should apply and suggest for the balanced strategy by default', () => {
    const { report } = optimizeTransaction(withUnusedAccount());

    expect(report.strategy).toBe('balanced');
    expect(report.changes.map(change => change.code)).toEqual([
      'remove-unused-accounts',
      'set-compute-unit-limit',
      'set-compute-unit-price',
    ]);
  });
});

describe('size utilities', () => {
  const simple = transactionWith([dataInstruction(PROGRAM, 1)]);

  it('should compare two transactions', () => {
    const original = withUnusedAccount();
    const optimized = optimizeTransaction(original, 'size').transaction;

    expect(compareTransactions(original, optimized)).toEqual({
      sizeDiff: 32,
      instructionDiff: 0,
      accountDiff: 1,
    });
  });

  it('should measure space against the limit', () => {
    expect(getAvailableSpace(simple)).toBe(1062);
    expect(exceedsMaxSize(simple)).toBe(false);
    expect(exceedsMaxSize(transactionWith([dataInstruction(PROGRAM, 1300)]))).toBe(true);
  });

  it('should check whether one more instruction fits', () => {
    expect(canAddInstruction(simple, 1000, 0)).toBe(true);
    expect(canAddInstruction(simple, 1100, 0)).toBe(false);
    // 1 program + 3 account indices + 992 data + 64 addresses = 1060
    expect(canAddInstruction(simple, 990, 2)).toBe(true);
    // 1 + 3 + 995 + 64 = 1063
    expect(canAddInstruction(simple, 993, 2)).toBe(false);
  });
});
