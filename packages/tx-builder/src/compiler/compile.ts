/**
 * Transaction compiler.
 *
 * Turns a fee payer, a recent blockhash and ordered instructions into a
 * message whose instructions reference accounts by table index.
 *
 * @packageDocumentation
 */

import type { Address } from '@solana/addresses';
import {
  EmptyInstructionListError,
  MissingBlockhashError,
  MissingPayerError,
} from '@wirecraft/tx-errors';
import type { CompiledInstruction, LegacyInstruction } from '@wirecraft/tx-core';
import type {
  AccountTableEntry,
  CompileInput,
  CompiledMessage,
  CompiledTransaction,
} from '../types.js';
import { deriveMessageHeader, orderAccounts, stageAccounts } from './accounts.js';

const EMPTY_DATA = new Uint8Array(0);

/**
 * Compile instructions into a message.
 *
 * @throws MissingPayerError when no fee payer is given
 * @throws MissingBlockhashError when no blockhash is given
 * @throws EmptyInstructionListError when there are no instructions
 * @throws TooManyAccountsError when more than 256 distinct accounts are referenced
 *
 * @example
 * ```ts
 * const message = compileTransactionMessage({
 *   feePayer,
 *   recentBlockhash,
 *   instructions: [transferIx, memoIx],
 * });
 * message.accounts[0].address === feePayer; // true
 * ```
 */
export function compileTransactionMessage(input: CompileInput): CompiledMessage {
  const { feePayer, recentBlockhash, instructions } = input;
  if (!feePayer) throw new MissingPayerError();
  if (!recentBlockhash) throw new MissingBlockhashError();
  if (instructions.length === 0) throw new EmptyInstructionListError();

  const accounts = getAccountTable(feePayer, instructions);
  const indexByAddress = new Map(accounts.map((entry, index) => [entry.address, index]));

  return Object.freeze({
    header: deriveMessageHeader(accounts),
    accounts,
    recentBlockhash,
    instructions: Object.freeze(
      instructions.map(instruction => compileInstruction(instruction, indexByAddress))
    ),
  });
}

/**
 * Compile a transaction with every signature slot empty.
 */
export function compileTransaction(input: CompileInput): CompiledTransaction {
  return createUnsignedTransaction(compileTransactionMessage(input));
}

export function createUnsignedTransaction(message: CompiledMessage): CompiledTransaction {
  return Object.freeze({
    message,
    signatures: Object.freeze(
      Array.from({ length: message.header.numSignerAccounts }, () => null)
    ),
  });
}

/**
 * The deduplicated, ordered account table for a payer and instructions.
 */
export function getAccountTable(
  feePayer: Address,
  instructions: readonly LegacyInstruction[]
): readonly AccountTableEntry[] {
  return Object.freeze(orderAccounts(feePayer, stageAccounts(feePayer, instructions)));
}

function compileInstruction(
  instruction: LegacyInstruction,
  indexByAddress: ReadonlyMap<Address, number>
): CompiledInstruction {
  return Object.freeze({
    programAddressIndex: lookupIndex(indexByAddress, instruction.programAddress),
    accountIndices: Object.freeze(
      (instruction.accounts ?? []).map(meta => lookupIndex(indexByAddress, meta.address))
    ),
    // copied so later writes to the caller's buffer cannot alter the message
    data: instruction.data ? Uint8Array.from(instruction.data) : EMPTY_DATA,
  });
}

function lookupIndex(indexByAddress: ReadonlyMap<Address, number>, address: Address): number {
  const index = indexByAddress.get(address);
  if (index === undefined) {
    throw new Error(`Account ${address} is missing from the account table`);
  }
  return index;
}

/**
 * Resolve a compiled instruction back to addresses. Each account carries
 * its merged table role, not the role it was originally referenced with.
 */
export function decompileInstruction(
  message: CompiledMessage,
  instruction: CompiledInstruction
): LegacyInstruction {
  const entryAt = (index: number): AccountTableEntry => {
    const entry = message.accounts[index];
    if (entry === undefined) {
      throw new RangeError(
        `Account index ${index} is out of range for a table of ${message.accounts.length}`
      );
    }
    return entry;
  };

  return {
    programAddress: entryAt(instruction.programAddressIndex).address,
    accounts: instruction.accountIndices.map(index => {
      const { address, role } = entryAt(index);
      return { address, role };
    }),
    data: instruction.data,
  };
}
