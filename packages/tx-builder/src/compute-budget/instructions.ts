/**
 * Compute Budget program instructions.
 *
 * @packageDocumentation
 */

import { address } from '@solana/addresses';
import { InstructionEncoder, type BuiltInstruction } from '@wirecraft/tx-core';

/**
 * Compute Budget program address.
 */
export const COMPUTE_BUDGET_PROGRAM = address('ComputeBudget111111111111111111111111111111');

export const SET_COMPUTE_UNIT_LIMIT_DISCRIMINATOR = 2;
export const SET_COMPUTE_UNIT_PRICE_DISCRIMINATOR = 3;

/**
 * Default compute unit limit per instruction if not specified.
 */
export const DEFAULT_COMPUTE_UNIT_LIMIT = 200_000;

/**
 * Maximum compute unit limit per transaction.
 */
export const MAX_COMPUTE_UNIT_LIMIT = 1_400_000;

/**
 * Create SetComputeUnitLimit instruction.
 * Sets the maximum compute units a transaction can consume.
 *
 * @param units - Maximum compute units (max: 1,400,000)
 *
 * @example
 * ```ts
 * const ix = createSetComputeUnitLimitInstruction(300_000);
 * // data: [2, 0xe0, 0x93, 0x04, 0x00]
 * ```
 */
export function createSetComputeUnitLimitInstruction(
  units: number
): BuiltInstruction {
  return new InstructionEncoder(COMPUTE_BUDGET_PROGRAM)
    .appendU8(SET_COMPUTE_UNIT_LIMIT_DISCRIMINATOR)
    .appendU32(Math.min(units, MAX_COMPUTE_UNIT_LIMIT))
    .build();
}

/**
 * Create SetComputeUnitPrice instruction.
 * Sets the priority fee in micro-lamports per compute unit.
 *
 * @example
 * ```ts
 * const ix = createSetComputeUnitPriceInstruction(10_000);
 * // Sets priority fee to 0.01 lamports per CU
 * ```
 */
export function createSetComputeUnitPriceInstruction(
  microLamports: number | bigint
): BuiltInstruction {
  return new InstructionEncoder(COMPUTE_BUDGET_PROGRAM)
    .appendU8(SET_COMPUTE_UNIT_PRICE_DISCRIMINATOR)
    .appendU64(microLamports)
    .build();
}
