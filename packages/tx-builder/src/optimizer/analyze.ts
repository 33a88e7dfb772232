/**
 * Size and efficiency analysis of compiled transactions.
 *
 * @packageDocumentation
 */

import {
  BLOCKHASH_SIZE,
  IDENTIFIER_SIZE,
  MESSAGE_HEADER_SIZE,
  SIGNATURE_SIZE,
  TRANSACTION_SIZE_LIMIT,
  U8_SIZE,
  getCompactU16Size,
  getPrefixedSize,
} from '@wirecraft/tx-core';
import type { CompiledMessage, CompiledTransaction } from '../types.js';

export interface SizeCategory {
  bytes: number;
  /** Share of the total serialized size, 0-100. */
  percent: number;
}

/**
 * Serialized bytes by category. The categories add up to the total size.
 */
export interface SizeBreakdown {
  /** Signature count prefix and 64-byte slots. */
  signatures: SizeCategory;
  /** The 3-byte message header and the 32-byte blockhash. */
  header: SizeCategory;
  /** Account count prefix and 32-byte addresses. */
  accountKeys: SizeCategory;
  /** Instruction count, program indices, account indices and data length prefixes. */
  instructionMetadata: SizeCategory;
  instructionData: SizeCategory;
}

export interface OptimizationSuggestion {
  code: string;
  description: string;
}

export interface TransactionAnalysis {
  totalSize: number;
  numSignatures: number;
  numAccounts: number;
  numInstructions: number;
  breakdown: SizeBreakdown;
  /** Table indices (never the payer) that no instruction references. */
  unusedAccountIndices: number[];
  /** References to an account an instruction already listed. */
  redundantReferences: number;
  /** 0-100, higher is better. */
  efficiencyScore: number;
  suggestions: OptimizationSuggestion[];
}

const LOW_UTILIZATION_THRESHOLD = 0.9;
const NEAR_LIMIT_THRESHOLD = 0.9;
const COMPACT_BOUNDARY_SLACK = 8;
const COMPACT_BOUNDARIES = [0x7f, 0x3fff];
const MAX_SUGGESTED_INSTRUCTIONS = 5;
const MAX_SUGGESTED_ACCOUNTS = 20;
const MAX_SUGGESTED_DATA_BYTES = 1000;

/**
 * Indices referenced by any instruction, as program or account.
 */
export function getReferencedIndices(message: CompiledMessage): Set<number> {
  const referenced = new Set<number>();
  for (const instruction of message.instructions) {
    referenced.add(instruction.programAddressIndex);
    for (const index of instruction.accountIndices) referenced.add(index);
  }
  return referenced;
}

export function getUnusedAccountIndices(message: CompiledMessage): number[] {
  const referenced = getReferencedIndices(message);
  const unused: number[] = [];
  for (let index = 1; index < message.accounts.length; index++) {
    if (!referenced.has(index)) unused.push(index);
  }
  return unused;
}

function countRedundantReferences(message: CompiledMessage): number {
  let redundant = 0;
  for (const { accountIndices } of message.instructions) {
    redundant += accountIndices.length - new Set(accountIndices).size;
  }
  return redundant;
}

export function getSizeBreakdown(transaction: CompiledTransaction): SizeBreakdown {
  const { message } = transaction;
  const signatures = getPrefixedSize(transaction.signatures.length, SIGNATURE_SIZE);
  const header = MESSAGE_HEADER_SIZE + BLOCKHASH_SIZE;
  const accountKeys = getPrefixedSize(message.accounts.length, IDENTIFIER_SIZE);

  let instructionMetadata = getCompactU16Size(message.instructions.length);
  let instructionData = 0;
  for (const instruction of message.instructions) {
    instructionMetadata +=
      U8_SIZE +
      getPrefixedSize(instruction.accountIndices.length) +
      getCompactU16Size(instruction.data.length);
    instructionData += instruction.data.length;
  }

  const total = signatures + header + accountKeys + instructionMetadata + instructionData;
  const category = (bytes: number): SizeCategory => ({ bytes, percent: (bytes / total) * 100 });

  return {
    signatures: category(signatures),
    header: category(header),
    accountKeys: category(accountKeys),
    instructionMetadata: category(instructionMetadata),
    instructionData: category(instructionData),
  };
}

/**
 * Measure a transaction and suggest where it could be smaller.
 *
 * The efficiency score is
 * `100 - 40 × unused/accounts - 20 × redundant/references - 40 × overhead/message`,
 * clamped to 0-100 and rounded, where overhead is every message byte
 * that is not instruction data.
 */
export function analyzeTransaction(transaction: CompiledTransaction): TransactionAnalysis {
  const { message } = transaction;
  const breakdown = getSizeBreakdown(transaction);
  const totalSize =
    breakdown.signatures.bytes +
    breakdown.header.bytes +
    breakdown.accountKeys.bytes +
    breakdown.instructionMetadata.bytes +
    breakdown.instructionData.bytes;

  const numAccounts = message.accounts.length;
  const unusedAccountIndices = getUnusedAccountIndices(message);
  const redundantReferences = countRedundantReferences(message);
  const totalReferences = message.instructions.reduce(
    (sum, instruction) => sum + instruction.accountIndices.length,
    0
  );

  const overheadBytes =
    breakdown.header.bytes + breakdown.accountKeys.bytes + breakdown.instructionMetadata.bytes;
  const messageBytes = totalSize - breakdown.signatures.bytes;

  const unusedRatio = numAccounts === 0 ? 0 : unusedAccountIndices.length / numAccounts;
  const redundancyRatio = totalReferences === 0 ? 0 : redundantReferences / totalReferences;
  const overheadRatio = messageBytes === 0 ? 0 : overheadBytes / messageBytes;
  const rawScore = 100 - 40 * unusedRatio - 20 * redundancyRatio - 40 * overheadRatio;

  return {
    totalSize,
    numSignatures: transaction.signatures.length,
    numAccounts,
    numInstructions: message.instructions.length,
    breakdown,
    unusedAccountIndices,
    redundantReferences,
    efficiencyScore: Math.round(Math.min(100, Math.max(0, rawScore))),
    suggestions: collectSuggestions(
      message,
      totalSize,
      unusedAccountIndices.length,
      redundantReferences,
      breakdown.instructionData.bytes
    ),
  };
}

function collectSuggestions(
  message: CompiledMessage,
  totalSize: number,
  unusedCount: number,
  redundantReferences: number,
  dataBytes: number
): OptimizationSuggestion[] {
  const suggestions: OptimizationSuggestion[] = [];
  const numAccounts = message.accounts.length;

  if (numAccounts > 0 && (numAccounts - unusedCount) / numAccounts < LOW_UTILIZATION_THRESHOLD) {
    suggestions.push({
      code: 'low-account-utilization',
      description: `${unusedCount} of ${numAccounts} accounts are not referenced by any instruction; removing them saves ${unusedCount * IDENTIFIER_SIZE} bytes`,
    });
  }

  if (redundantReferences > 0) {
    suggestions.push({
      code: 'redundant-account-references',
      description: `${redundantReferences} account references repeat an account already listed by the same instruction`,
    });
  }

  message.instructions.forEach((instruction, index) => {
    const length = instruction.data.length;
    const boundary = COMPACT_BOUNDARIES.find(
      limit => length > limit && length - limit <= COMPACT_BOUNDARY_SLACK
    );
    if (boundary !== undefined) {
      suggestions.push({
        code: 'compact-length-boundary',
        description: `Instruction ${index} carries ${length} data bytes; trimming it to ${boundary} bytes shortens its length prefix by one byte`,
      });
    }
  });

  if (totalSize > TRANSACTION_SIZE_LIMIT) {
    suggestions.push({
      code: 'exceeds-size-limit',
      description: `Transaction is ${totalSize} bytes, over the ${TRANSACTION_SIZE_LIMIT}-byte limit; split its instructions across transactions`,
    });
  } else if (totalSize >= TRANSACTION_SIZE_LIMIT * NEAR_LIMIT_THRESHOLD) {
    suggestions.push({
      code: 'near-size-limit',
      description: `Transaction is ${totalSize} bytes, within 10% of the ${TRANSACTION_SIZE_LIMIT}-byte limit`,
    });
  }

  if (message.instructions.length > MAX_SUGGESTED_INSTRUCTIONS) {
    suggestions.push({
      code: 'many-instructions',
      description: 'Consider batching similar operations into fewer instructions',
    });
  }

  if (numAccounts > MAX_SUGGESTED_ACCOUNTS) {
    suggestions.push({
      code: 'many-accounts',
      description: 'High number of accounts; review if all are necessary',
    });
  }

  if (dataBytes > MAX_SUGGESTED_DATA_BYTES) {
    suggestions.push({
      code: 'large-instruction-data',
      description: 'Large instruction data; consider compressing or restructuring it',
    });
  }

  return suggestions;
}
