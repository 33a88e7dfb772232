/**
 * Type guards and predicates for errors.
 *
 * @packageDocumentation
 */

import {
  type WirecraftErrorType,
  TransactionError,
  MalformedVarintError,
  UnexpectedEofError,
  ValueOutOfRangeError,
  InstructionDataTooLargeError,
  BuilderConsumedError,
  TooManyAccountsError,
  MalformedTransactionError,
  MissingSignerError,
  UnexpectedSignerError,
  SignerFailureError,
  UnsafeOptimizationError,
  TransactionTooLargeError,
} from './errors.js';

/**
 * Check if error is a Wirecraft-specific error.
 */
export function isWirecraftError(error: unknown): error is WirecraftErrorType {
  return error instanceof TransactionError;
}

/**
 * Check if error came from decoding malformed bytes
 * (a bad compact integer, a truncated buffer or a structural defect).
 */
export function isDecodeError(
  error: unknown
): error is MalformedVarintError | UnexpectedEofError | MalformedTransactionError {
  return (
    error instanceof MalformedVarintError ||
    error instanceof UnexpectedEofError ||
    error instanceof MalformedTransactionError
  );
}

export function isValueOutOfRangeError(error: unknown): error is ValueOutOfRangeError {
  return error instanceof ValueOutOfRangeError;
}

export function isInstructionDataTooLargeError(
  error: unknown
): error is InstructionDataTooLargeError {
  return error instanceof InstructionDataTooLargeError;
}

export function isBuilderConsumedError(error: unknown): error is BuilderConsumedError {
  return error instanceof BuilderConsumedError;
}

export function isTooManyAccountsError(error: unknown): error is TooManyAccountsError {
  return error instanceof TooManyAccountsError;
}

/**
 * Check if error was raised while matching signers to signature slots.
 */
export function isSigningError(
  error: unknown
): error is MissingSignerError | UnexpectedSignerError | SignerFailureError {
  return (
    error instanceof MissingSignerError ||
    error instanceof UnexpectedSignerError ||
    error instanceof SignerFailureError
  );
}

export function isUnsafeOptimizationError(error: unknown): error is UnsafeOptimizationError {
  return error instanceof UnsafeOptimizationError;
}

/**
 * Check if error is TransactionTooLargeError.
 */
export function isTransactionTooLargeError(error: unknown): error is TransactionTooLargeError {
  return error instanceof TransactionTooLargeError;
}
