/**
 * Wire format constants shared by the codec, the compiler and the optimizer.
 *
 * @packageDocumentation
 */

export { TRANSACTION_SIZE_LIMIT } from '@solana/transactions';

/**
 * Largest value a compact-u16 can carry.
 */
export const COMPACT_U16_MAX = 0xffff;

/**
 * Account indices are single bytes.
 */
export const MAX_ACCOUNT_TABLE_ENTRIES = 256;

/**
 * Instruction data is prefixed by a compact-u16 length.
 */
export const MAX_INSTRUCTION_DATA_SIZE = COMPACT_U16_MAX;

/**
 * numSignerAccounts, numReadonlySignerAccounts, numReadonlyNonSignerAccounts.
 */
export const MESSAGE_HEADER_SIZE = 3;

export const BLOCKHASH_SIZE = 32;
