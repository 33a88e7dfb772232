/**
 * Tests for error classes, predicates and messages.
 */

import { describe, it, expect } from 'vitest';
import {
  BuilderConsumedError,
  MalformedTransactionError,
  MissingPayerError,
  MissingSignerError,
  SignerFailureError,
  TooManyAccountsError,
  TransactionError,
  TransactionTooLargeError,
  UnexpectedEofError,
  UnexpectedSignerError,
  ValueOutOfRangeError,
} from '../errors.js';
import { getErrorMessage, getErrorTitle } from '../messages.js';
import {
  isDecodeError,
  isSigningError,
  isTransactionTooLargeError,
  isWirecraftError,
} from '../predicates.js';

describe('error classes', () => {
  it('should keep the prototype chain and carry a code', () => {
    const error = new TooManyAccountsError(300, 256);

    expect(error).toBeInstanceOf(TooManyAccountsError);
    expect(error).toBeInstanceOf(TransactionError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('TooManyAccountsError');
    expect(error.code).toBe('TOO_MANY_ACCOUNTS');
    expect(error.message).toBe('Too many accounts: 300 (max: 256)');
    expect(error.context).toEqual({ count: 300, maxCount: 256 });
  });

  it('should format bigint range bounds', () => {
    const error = new ValueOutOfRangeError('u64', -1n, 0n, 18446744073709551615n);

    expect(error.message).toBe('Value -1 is out of range for u64 [0, 18446744073709551615]');
  });

  it('should describe both unexpected signer reasons', () => {
    expect(new UnexpectedSignerError('signer-a').message).toBe(
      'Signer signer-a is not a required signer of this transaction'
    );
    expect(new UnexpectedSignerError('signer-a', 'duplicate').message).toBe(
      'Signer signer-a was provided more than once'
    );
  });
});

describe('predicates', () => {
  it('should recognize library errors only', () => {
    expect(isWirecraftError(new MissingPayerError())).toBe(true);
    expect(isWirecraftError(new Error('other'))).toBe(false);
    expect(isWirecraftError('MISSING_PAYER')).toBe(false);
  });

  it('should group decode errors', () => {
    expect(isDecodeError(new UnexpectedEofError(4, 32, 1))).toBe(true);
    expect(isDecodeError(new MalformedTransactionError(0, 'fee payer must sign'))).toBe(true);
    expect(isDecodeError(new TooManyAccountsError(300, 256))).toBe(false);
  });

  it('should group signing errors', () => {
    expect(isSigningError(new MissingSignerError('signer-a', 1))).toBe(true);
    expect(isSigningError(new SignerFailureError('signer-a', 'the signer threw'))).toBe(true);
    expect(isSigningError(new BuilderConsumedError('TransactionBuilder', 'compile'))).toBe(false);
  });

  it('should narrow TransactionTooLargeError', () => {
    const error: unknown = new TransactionTooLargeError(1300, 1232);

    expect(isTransactionTooLargeError(error) && error.size).toBe(1300);
  });
});

describe('getErrorMessage', () => {
  it('should explain signing errors', () => {
    expect(getErrorMessage(new MissingSignerError('signer-a', 1))).toBe(
      'The transaction still needs a signature from signer-a.'
    );
    expect(
      getErrorMessage(new SignerFailureError('signer-a', 'the signer threw', new Error('locked')))
    ).toBe('Signing with signer-a failed. locked');
    expect(getErrorMessage(new SignerFailureError('signer-a', 'the signer threw'))).toBe(
      'Signing with signer-a failed.'
    );
  });

  it('should explain size errors', () => {
    expect(getErrorMessage(new TransactionTooLargeError(1300, 1232))).toBe(
      'Transaction is too large (1300 bytes). Maximum size is 1232 bytes.'
    );
  });

  it('should explain incomplete input by code', () => {
    expect(getErrorMessage(new MissingPayerError())).toBe(
      'Set a fee payer before compiling the transaction.'
    );
  });

  it('should fall back to the error message', () => {
    const error = new MalformedTransactionError(3, '2 trailing bytes');

    expect(getErrorMessage(error)).toBe('Malformed transaction at offset 3: 2 trailing bytes');
  });
});

describe('getErrorTitle', () => {
  it('should group errors under a title', () => {
    expect(getErrorTitle(new UnexpectedEofError(0, 1, 0))).toBe('Malformed Transaction Bytes');
    expect(getErrorTitle(new MissingPayerError())).toBe('Incomplete Transaction');
    expect(getErrorTitle(new UnexpectedSignerError('signer-a'))).toBe('Signing Failed');
  });
});
