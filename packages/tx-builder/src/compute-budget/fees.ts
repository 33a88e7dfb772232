/**
 * Fee estimation for compiled transactions.
 *
 * Everything here is a pure function of the transaction and fixed
 * constants; no network fee data is consulted.
 *
 * @packageDocumentation
 */

import { ValueOutOfRangeError } from '@wirecraft/tx-errors';
import { U32_RANGE, U64_RANGE, assertIntegerInRange } from '@wirecraft/tx-core';
import type { CompiledTransaction } from '../types.js';
import { getTransactionSize } from '../wire/encode.js';
import { classifyComputeBudget } from './classify.js';
import { DEFAULT_COMPUTE_UNIT_LIMIT, MAX_COMPUTE_UNIT_LIMIT } from './instructions.js';

export type FeeStrategy = 'low' | 'medium' | 'high' | 'urgent';

export type TransactionUrgency = 'not-urgent' | 'normal' | 'urgent' | 'critical';

/**
 * Strategies from cheapest to most expensive.
 */
export const FEE_STRATEGIES: readonly FeeStrategy[] = ['low', 'medium', 'high', 'urgent'];

/**
 * Base fee per signature in lamports.
 */
export const LAMPORTS_PER_SIGNATURE = 5_000;

/**
 * Compute unit price used when a transaction sets none, in micro-lamports.
 */
export const DEFAULT_COMPUTE_UNIT_PRICE = 1_000;

/**
 * Price multipliers per strategy. With the default price these give
 * 1,000 / 10,000 / 50,000 / 100,000 micro-lamports per compute unit.
 */
export const FEE_STRATEGY_MULTIPLIERS: Readonly<Record<FeeStrategy, number>> = {
  low: 1,
  medium: 10,
  high: 50,
  urgent: 100,
};

const MICRO_LAMPORTS_PER_LAMPORT = 1_000_000n;

/**
 * Configuration for fee estimation.
 */
export interface FeeCalculatorConfig {
  /** Lamports charged per required signature. */
  lamportsPerSignature?: number;
  /** Micro-lamports per compute unit when no price instruction is present. */
  defaultComputeUnitPrice?: number | bigint;
  /** Compute units assumed per instruction when no limit instruction is present. */
  defaultComputeUnitLimitPerInstruction?: number;
  /** Price multiplier per strategy. Must not decrease from low to urgent. */
  multipliers?: Partial<Record<FeeStrategy, number>>;
}

interface ResolvedFeeCalculatorConfig {
  lamportsPerSignature: bigint;
  defaultComputeUnitPrice: bigint;
  defaultComputeUnitLimitPerInstruction: number;
  multipliers: Record<FeeStrategy, bigint>;
}

export interface FeeEstimate {
  strategy: FeeStrategy;
  /** Signature fees in lamports. */
  baseFee: bigint;
  /** Compute unit limit × price, rounded up to whole lamports. */
  priorityFee: bigint;
  totalFee: bigint;
  computeUnitLimit: number;
  /** Micro-lamports per compute unit after the strategy multiplier. */
  computeUnitPrice: bigint;
}

function resolveConfig(config: FeeCalculatorConfig = {}): ResolvedFeeCalculatorConfig {
  const lamportsPerSignature = config.lamportsPerSignature ?? LAMPORTS_PER_SIGNATURE;
  const defaultComputeUnitPrice = config.defaultComputeUnitPrice ?? DEFAULT_COMPUTE_UNIT_PRICE;
  const defaultComputeUnitLimitPerInstruction =
    config.defaultComputeUnitLimitPerInstruction ?? DEFAULT_COMPUTE_UNIT_LIMIT;
  assertIntegerInRange('lamportsPerSignature', lamportsPerSignature, ...U32_RANGE);
  assertIntegerInRange('defaultComputeUnitPrice', defaultComputeUnitPrice, ...U64_RANGE);
  assertIntegerInRange(
    'defaultComputeUnitLimitPerInstruction',
    defaultComputeUnitLimitPerInstruction,
    0n,
    BigInt(MAX_COMPUTE_UNIT_LIMIT)
  );

  const multipliers = { ...FEE_STRATEGY_MULTIPLIERS, ...config.multipliers };
  const resolvedMultipliers: Record<FeeStrategy, bigint> = { low: 0n, medium: 0n, high: 0n, urgent: 0n };
  for (const strategy of FEE_STRATEGIES) {
    assertIntegerInRange(`${strategy} multiplier`, multipliers[strategy], ...U32_RANGE);
    resolvedMultipliers[strategy] = BigInt(multipliers[strategy]);
  }
  for (let i = 1; i < FEE_STRATEGIES.length; i++) {
    const previous = resolvedMultipliers[FEE_STRATEGIES[i - 1]];
    const current = resolvedMultipliers[FEE_STRATEGIES[i]];
    if (current < previous) {
      throw new ValueOutOfRangeError(
        `${FEE_STRATEGIES[i]} multiplier`,
        current,
        previous,
        U32_RANGE[1]
      );
    }
  }

  return {
    lamportsPerSignature: BigInt(lamportsPerSignature),
    defaultComputeUnitPrice: BigInt(defaultComputeUnitPrice),
    defaultComputeUnitLimitPerInstruction,
    multipliers: resolvedMultipliers,
  };
}

/**
 * Estimate the fee of a transaction under a strategy.
 *
 * The compute unit limit and price come from Compute Budget instructions
 * when present. Otherwise the limit is 200,000 units per other instruction
 * (capped at 1,400,000) and the price is 1,000 micro-lamports. The
 * strategy multiplier applies to the price either way.
 *
 * @example
 * ```ts
 * const estimate = estimateFee(transaction, 'medium');
 * // one signer, one instruction:
 * // baseFee 5000n, priorityFee 2000n (200,000 CU × 10,000 µ-lamports)
 * ```
 */
export function estimateFee(
  transaction: CompiledTransaction,
  strategy: FeeStrategy,
  config?: FeeCalculatorConfig
): FeeEstimate {
  const resolved = resolveConfig(config);
  const budget = classifyComputeBudget(transaction.message);

  const computeUnitLimit =
    budget.computeUnitLimit ??
    Math.min(
      resolved.defaultComputeUnitLimitPerInstruction * budget.otherInstructionCount,
      MAX_COMPUTE_UNIT_LIMIT
    );
  const computeUnitPrice =
    (budget.computeUnitPrice ?? resolved.defaultComputeUnitPrice) * resolved.multipliers[strategy];

  const baseFee =
    BigInt(transaction.message.header.numSignerAccounts) * resolved.lamportsPerSignature;
  const priorityFee = divideRoundingUp(
    BigInt(computeUnitLimit) * computeUnitPrice,
    MICRO_LAMPORTS_PER_LAMPORT
  );

  return {
    strategy,
    baseFee,
    priorityFee,
    totalFee: baseFee + priorityFee,
    computeUnitLimit,
    computeUnitPrice,
  };
}

/**
 * Estimates for every strategy, cheapest first.
 */
export function compareStrategies(
  transaction: CompiledTransaction,
  config?: FeeCalculatorConfig
): FeeEstimate[] {
  return FEE_STRATEGIES.map(strategy => estimateFee(transaction, strategy, config)).sort(
    (a, b) => (a.totalFee < b.totalFee ? -1 : a.totalFee > b.totalFee ? 1 : 0)
  );
}

export function recommendStrategy(urgency: TransactionUrgency): FeeStrategy {
  switch (urgency) {
    case 'not-urgent':
      return 'low';
    case 'normal':
      return 'medium';
    case 'urgent':
      return 'high';
    case 'critical':
      return 'urgent';
  }
}

/**
 * Map a fee percentile (0-100) to a strategy: up to 33 low, up to 66
 * medium, up to 89 high, above that urgent.
 */
export function strategyForPercentile(percentile: number): FeeStrategy {
  if (!Number.isFinite(percentile) || percentile < 0 || percentile > 100) {
    throw new ValueOutOfRangeError('percentile', percentile, 0, 100);
  }
  if (percentile <= 33) return 'low';
  if (percentile <= 66) return 'medium';
  if (percentile <= 89) return 'high';
  return 'urgent';
}

export function estimateOptimalFee(
  transaction: CompiledTransaction,
  percentile: number,
  config?: FeeCalculatorConfig
): FeeEstimate {
  return estimateFee(transaction, strategyForPercentile(percentile), config);
}

/**
 * Total fee in lamports divided by the serialized size in bytes.
 */
export function costPerByte(
  transaction: CompiledTransaction,
  strategy: FeeStrategy,
  config?: FeeCalculatorConfig
): number {
  const { totalFee } = estimateFee(transaction, strategy, config);
  return Number(totalFee) / getTransactionSize(transaction);
}

function divideRoundingUp(numerator: bigint, denominator: bigint): bigint {
  return (numerator + denominator - 1n) / denominator;
}
