/**
 * Transaction builder facade.
 *
 * Collects a fee payer, a recent blockhash and instructions, compiles them
 * and optionally signs the result.
 *
 * @example
 * ```ts
 * // Unsigned, e.g. to hand to a wallet
 * const unsigned = new TransactionBuilder()
 *   .setFeePayer(payer.address)
 *   .setRecentBlockhash(recentBlockhash)
 *   .addInstruction(ix)
 *   .buildUnsigned();
 *
 * // Signed
 * const signed = new TransactionBuilder({ logLevel: 'minimal' })
 *   .setFeePayer(payer.address)
 *   .setRecentBlockhash(recentBlockhash)
 *   .addInstructions([ix1, ix2])
 *   .buildAndSign([payer, authority]);
 *
 * const wire = encodeTransaction(signed);
 * ```
 *
 * @packageDocumentation
 */

import type { Address } from '@solana/addresses';
import type { Blockhash } from '@solana/rpc-types';
import { BuilderConsumedError } from '@wirecraft/tx-errors';
import type { LegacyInstruction } from '@wirecraft/tx-core';
import { compileTransactionMessage, createUnsignedTransaction } from '../compiler/compile.js';
import { createLeveledLogger, type LeveledLogger, type LogLevel, type Logger } from '../logging/logger.js';
import { signTransaction } from '../signing/sign.js';
import type {
  CompiledMessage,
  CompiledTransaction,
  TransactionSizeInfo,
  WireSigner,
} from '../types.js';
import { getTransactionSizeInfo, validateTransactionSize } from '../validation/validation.js';
import { getTransactionSize } from '../wire/encode.js';

/**
 * Configuration for transaction builder.
 */
export interface TransactionBuilderConfig {
  /**
   * Logging level. Defaults to `silent`.
   */
  logLevel?: LogLevel;

  /**
   * Custom logger function. Defaults to `console.log` with a `[Wirecraft]` prefix.
   */
  logger?: Logger;

  /**
   * Throw `TransactionTooLargeError` from `buildUnsigned()` and
   * `buildAndSign()` when the result exceeds 1232 bytes.
   */
  enforceSizeLimit?: boolean;
}

interface ResolvedTransactionBuilderConfig {
  logLevel: LogLevel;
  logger: Logger | undefined;
  enforceSizeLimit: boolean;
}

/**
 * Mutable accumulator for one transaction.
 *
 * A builder is consumed by its first successful `buildUnsigned()` or
 * `buildAndSign()`; call `clone()` beforehand to build the same inputs
 * again. `compile()` does not consume.
 */
export class TransactionBuilder {
  private feePayer: Address | undefined;
  private recentBlockhash: Blockhash | undefined;
  private instructions: LegacyInstruction[] = [];
  private consumed = false;

  private readonly config: ResolvedTransactionBuilderConfig;
  private readonly log: LeveledLogger;

  constructor(config: TransactionBuilderConfig = {}) {
    this.config = {
      logLevel: config.logLevel ?? 'silent',
      logger: config.logger,
      enforceSizeLimit: config.enforceSizeLimit ?? false,
    };
    this.log = createLeveledLogger(this.config.logLevel, this.config.logger);
  }

  /**
   * Set the fee payer. It always becomes account 0, a writable signer.
   */
  setFeePayer(feePayer: Address): this {
    this.assertNotConsumed('setFeePayer');
    this.feePayer = feePayer;
    return this;
  }

  setRecentBlockhash(recentBlockhash: Blockhash): this {
    this.assertNotConsumed('setRecentBlockhash');
    this.recentBlockhash = recentBlockhash;
    return this;
  }

  /**
   * Add a single instruction to the transaction.
   */
  addInstruction(instruction: LegacyInstruction): this {
    this.assertNotConsumed('addInstruction');
    this.instructions.push(instruction);
    return this;
  }

  /**
   * Add multiple instructions to the transaction.
   */
  addInstructions(instructions: readonly LegacyInstruction[]): this {
    this.assertNotConsumed('addInstructions');
    this.instructions.push(...instructions);
    return this;
  }

  /**
   * Independent copy with the same configuration and inputs.
   */
  clone(): TransactionBuilder {
    this.assertNotConsumed('clone');
    const builder = new TransactionBuilder({
      logLevel: this.config.logLevel,
      enforceSizeLimit: this.config.enforceSizeLimit,
      ...(this.config.logger && { logger: this.config.logger }),
    });
    builder.feePayer = this.feePayer;
    builder.recentBlockhash = this.recentBlockhash;
    builder.instructions = [...this.instructions];
    return builder;
  }

  /**
   * Compile the message without consuming the builder.
   */
  compile(): CompiledMessage {
    this.assertNotConsumed('compile');
    const message = compileTransactionMessage({
      feePayer: this.feePayer,
      recentBlockhash: this.recentBlockhash,
      instructions: this.instructions,
    });
    this.log.verbose('Compiled message', {
      header: message.header,
      accounts: message.accounts.map(entry => entry.address),
      instructions: message.instructions.length,
    });
    return message;
  }

  /**
   * Compile into a transaction with every signature slot empty.
   */
  buildUnsigned(): CompiledTransaction {
    const transaction = this.finalize(createUnsignedTransaction(this.compile()));
    this.log.minimal(`Built unsigned transaction (${getTransactionSize(transaction)} bytes)`);
    return transaction;
  }

  /**
   * Compile and sign with exactly the required signers.
   *
   * @throws UnexpectedSignerError when a signer is not required or is passed twice
   * @throws MissingSignerError when a required signer is not passed
   * @throws SignerFailureError when a signer throws or returns a malformed signature
   */
  buildAndSign(signers: readonly WireSigner[]): CompiledTransaction {
    const unsigned = createUnsignedTransaction(this.compile());
    const transaction = this.finalize(signTransaction(unsigned, signers));
    this.log.minimal(
      `Built transaction with ${transaction.signatures.length} signature(s) (${getTransactionSize(transaction)} bytes)`
    );
    return transaction;
  }

  /**
   * Get current transaction size information.
   * Useful before building to check if more instructions can fit.
   *
   * @example
   * ```ts
   * const info = builder.getSizeInfo();
   * console.log(`Using ${info.percentUsed.toFixed(1)}% of transaction space`);
   * console.log(`${info.remaining} bytes remaining`);
   * ```
   */
  getSizeInfo(): TransactionSizeInfo {
    return getTransactionSizeInfo(createUnsignedTransaction(this.compile()));
  }

  private finalize(transaction: CompiledTransaction): CompiledTransaction {
    if (this.config.enforceSizeLimit) {
      validateTransactionSize(transaction);
    }
    this.log.verbose('Transaction size', { ...getTransactionSizeInfo(transaction) });
    this.consumed = true;
    return transaction;
  }

  private assertNotConsumed(operation: string): void {
    if (this.consumed) {
      throw new BuilderConsumedError('TransactionBuilder', operation);
    }
  }
}
