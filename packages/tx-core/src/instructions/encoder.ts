/**
 * Incremental instruction builder.
 *
 * @packageDocumentation
 */

import type { Address } from '@solana/addresses';
import type { ReadonlyUint8Array } from '@solana/codecs';
import type { AccountMeta } from '@solana/instructions';
import { BuilderConsumedError, InstructionDataTooLargeError } from '@wirecraft/tx-errors';
import { ByteWriter } from '../codec/writer.js';
import { I64_SIZE, U16_SIZE, U32_SIZE, U64_SIZE, U8_SIZE } from '../codec/sizes.js';
import { MAX_INSTRUCTION_DATA_SIZE } from '../constants.js';
import { getAccountRole } from './roles.js';
import type { BuiltInstruction } from './types.js';

/**
 * Accumulates account references and data for one program call.
 *
 * Accounts keep the order in which they were added; duplicates are kept
 * as-is and only merged when a transaction is compiled.
 *
 * @example
 * ```ts
 * const instruction = new InstructionEncoder(programAddress)
 *   .signer(owner, true)
 *   .writable(vault)
 *   .appendU8(1)
 *   .appendU64(500_000n)
 *   .build();
 * ```
 */
export class InstructionEncoder<TProgramAddress extends string = string> {
  private readonly metas: AccountMeta[] = [];
  private buffer = new ByteWriter(32);
  private consumed = false;

  constructor(private readonly programAddress: Address<TProgramAddress>) {}

  /**
   * Add a signing account, writable unless `isWritable` is false.
   */
  signer(address: Address, isWritable = true): this {
    return this.account({ address, role: getAccountRole(true, isWritable) });
  }

  /**
   * Add a writable account, optionally as a signer.
   */
  writable(address: Address, isSigner = false): this {
    return this.account({ address, role: getAccountRole(isSigner, true) });
  }

  readonly(address: Address): this {
    return this.account({ address, role: getAccountRole(false, false) });
  }

  account(meta: AccountMeta): this {
    this.assertNotConsumed('account');
    this.metas.push(Object.freeze({ address: meta.address, role: meta.role }));
    return this;
  }

  accounts(metas: readonly AccountMeta[]): this {
    for (const meta of metas) this.account(meta);
    return this;
  }

  appendU8(value: number): this {
    this.reserve('appendU8', U8_SIZE);
    this.buffer.u8(value);
    return this;
  }

  appendU16(value: number): this {
    this.reserve('appendU16', U16_SIZE);
    this.buffer.u16(value);
    return this;
  }

  appendU32(value: number): this {
    this.reserve('appendU32', U32_SIZE);
    this.buffer.u32(value);
    return this;
  }

  appendU64(value: number | bigint): this {
    this.reserve('appendU64', U64_SIZE);
    this.buffer.u64(value);
    return this;
  }

  appendI64(value: number | bigint): this {
    this.reserve('appendI64', I64_SIZE);
    this.buffer.i64(value);
    return this;
  }

  /**
   * Append raw bytes with no length prefix.
   */
  appendData(bytes: ReadonlyUint8Array): this {
    this.reserve('appendData', bytes.length);
    this.buffer.bytes(bytes);
    return this;
  }

  /**
   * Replace the data accumulated so far.
   */
  data(bytes: ReadonlyUint8Array): this {
    this.assertNotConsumed('data');
    if (bytes.length > MAX_INSTRUCTION_DATA_SIZE) {
      throw new InstructionDataTooLargeError(bytes.length, MAX_INSTRUCTION_DATA_SIZE);
    }
    this.buffer = new ByteWriter(bytes.length);
    this.buffer.bytes(bytes);
    return this;
  }

  /**
   * Number of data bytes accumulated so far.
   */
  get dataLength(): number {
    return this.buffer.length;
  }

  /**
   * Produce the instruction. The encoder cannot be used afterwards.
   */
  build(): BuiltInstruction<TProgramAddress> {
    this.assertNotConsumed('build');
    this.consumed = true;
    return Object.freeze({
      programAddress: this.programAddress,
      accounts: Object.freeze([...this.metas]),
      data: this.buffer.toBytes(),
    });
  }

  private reserve(operation: string, size: number): void {
    this.assertNotConsumed(operation);
    const nextLength = this.buffer.length + size;
    if (nextLength > MAX_INSTRUCTION_DATA_SIZE) {
      throw new InstructionDataTooLargeError(nextLength, MAX_INSTRUCTION_DATA_SIZE);
    }
  }

  private assertNotConsumed(operation: string): void {
    if (this.consumed) {
      throw new BuilderConsumedError('InstructionEncoder', operation);
    }
  }
}
