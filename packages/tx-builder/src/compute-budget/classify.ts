/**
 * Reading compute budget settings out of a compiled message.
 *
 * @packageDocumentation
 */

import { ByteReader } from '@wirecraft/tx-core';
import type { CompiledMessage } from '../types.js';
import {
  COMPUTE_BUDGET_PROGRAM,
  MAX_COMPUTE_UNIT_LIMIT,
  SET_COMPUTE_UNIT_LIMIT_DISCRIMINATOR,
  SET_COMPUTE_UNIT_PRICE_DISCRIMINATOR,
} from './instructions.js';

export interface ComputeBudgetClassification {
  /** Last SetComputeUnitLimit value capped at 1,400,000, if any. */
  computeUnitLimit: number | null;
  /** Last SetComputeUnitPrice value in micro-lamports, if any. */
  computeUnitPrice: bigint | null;
  /** Positions of every Compute Budget instruction. */
  budgetInstructionIndices: number[];
  /** Instructions addressed to any other program. */
  otherInstructionCount: number;
}

/**
 * Scan compiled instructions for the Compute Budget program.
 *
 * When an instruction kind appears more than once, the last one wins.
 * Truncated data and other Compute Budget instructions are counted as
 * budget instructions but set nothing.
 */
export function classifyComputeBudget(message: CompiledMessage): ComputeBudgetClassification {
  const result: ComputeBudgetClassification = {
    computeUnitLimit: null,
    computeUnitPrice: null,
    budgetInstructionIndices: [],
    otherInstructionCount: 0,
  };

  message.instructions.forEach((instruction, index) => {
    const program = message.accounts[instruction.programAddressIndex];
    if (program?.address !== COMPUTE_BUDGET_PROGRAM) {
      result.otherInstructionCount++;
      return;
    }
    result.budgetInstructionIndices.push(index);

    const { data } = instruction;
    if (data[0] === SET_COMPUTE_UNIT_LIMIT_DISCRIMINATOR && data.length >= 5) {
      result.computeUnitLimit = Math.min(
        new ByteReader(data, 1).u32(),
        MAX_COMPUTE_UNIT_LIMIT
      );
    } else if (data[0] === SET_COMPUTE_UNIT_PRICE_DISCRIMINATOR && data.length >= 9) {
      result.computeUnitPrice = new ByteReader(data, 1).u64();
    }
  });

  return result;
}
