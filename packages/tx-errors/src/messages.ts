/**
 * Human-readable error messages for transaction errors.
 *
 * @packageDocumentation
 */

import {
  type WirecraftErrorType,
  MissingSignerError,
  SignerFailureError,
  TooManyAccountsError,
  TransactionTooLargeError,
  UnexpectedSignerError,
  InstructionDataTooLargeError,
} from './errors.js';

/**
 * Get a human-readable error message for a transaction error.
 */
export function getErrorMessage(error: WirecraftErrorType): string {
  if (error instanceof MissingSignerError) {
    return `The transaction still needs a signature from ${error.address}.`;
  }
  if (error instanceof UnexpectedSignerError) {
    return error.reason === 'duplicate'
      ? `${error.address} was passed as a signer twice.`
      : `${error.address} is not a signer of this transaction.`;
  }
  if (error instanceof SignerFailureError) {
    return `Signing with ${error.address} failed. ${describeCause(error.cause)}`.trim();
  }
  if (error instanceof TooManyAccountsError) {
    return `The transaction references ${error.count} accounts. At most ${error.maxCount} fit in one message.`;
  }
  if (error instanceof TransactionTooLargeError) {
    return `Transaction is too large (${error.size} bytes). Maximum size is ${error.maxSize} bytes.`;
  }
  if (error instanceof InstructionDataTooLargeError) {
    return `Instruction data is too large (${error.size} bytes). Maximum size is ${error.maxSize} bytes.`;
  }
  switch (error.code) {
    case 'MISSING_PAYER':
      return 'Set a fee payer before compiling the transaction.';
    case 'MISSING_BLOCKHASH':
      return 'Set a recent blockhash before compiling the transaction.';
    case 'EMPTY_INSTRUCTION_LIST':
      return 'Add at least one instruction before compiling the transaction.';
    case 'BUILDER_CONSUMED':
      return 'This builder was already used. Clone it before building to reuse it.';
    default:
      return error.message;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'string') return cause;
  return '';
}

/**
 * Get user-friendly error title.
 */
export function getErrorTitle(error: WirecraftErrorType): string {
  switch (error.code) {
    case 'MALFORMED_VARINT':
    case 'UNEXPECTED_EOF':
    case 'MALFORMED_TRANSACTION':
      return 'Malformed Transaction Bytes';
    case 'VALUE_OUT_OF_RANGE':
      return 'Value Out Of Range';
    case 'INVALID_IDENTIFIER':
      return 'Invalid Address';
    case 'INSTRUCTION_DATA_TOO_LARGE':
      return 'Instruction Data Too Large';
    case 'BUILDER_CONSUMED':
      return 'Builder Already Used';
    case 'MISSING_PAYER':
    case 'MISSING_BLOCKHASH':
    case 'EMPTY_INSTRUCTION_LIST':
      return 'Incomplete Transaction';
    case 'TOO_MANY_ACCOUNTS':
      return 'Too Many Accounts';
    case 'MISSING_SIGNER':
    case 'UNEXPECTED_SIGNER':
    case 'SIGNER_FAILURE':
    case 'SIGNATURE_SLOT_OCCUPIED':
      return 'Signing Failed';
    case 'UNSAFE_OPTIMIZATION':
      return 'Unsafe Optimization';
    case 'TRANSACTION_TOO_LARGE':
      return 'Transaction Too Large';
    default:
      return 'Transaction Error';
  }
}
