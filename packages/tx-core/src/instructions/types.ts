/**
 * Instruction model.
 *
 * Instructions are Kit `Instruction` values restricted to static account
 * metas; address lookup tables are not part of the legacy wire format.
 *
 * @packageDocumentation
 */

import type { ReadonlyUint8Array } from '@solana/codecs';
import type { AccountMeta, Instruction } from '@solana/instructions';

/**
 * An instruction whose accounts are all static `AccountMeta`s.
 */
export type LegacyInstruction<TProgramAddress extends string = string> = Instruction<
  TProgramAddress,
  readonly AccountMeta[]
>;

/**
 * Instruction produced by `InstructionEncoder.build()`: accounts and data
 * are always present.
 */
export type BuiltInstruction<TProgramAddress extends string = string> =
  LegacyInstruction<TProgramAddress> & {
    readonly accounts: readonly AccountMeta[];
    readonly data: ReadonlyUint8Array;
  };

/**
 * An instruction that references accounts by position in the account table.
 */
export interface CompiledInstruction {
  readonly programAddressIndex: number;
  readonly accountIndices: readonly number[];
  readonly data: ReadonlyUint8Array;
}
