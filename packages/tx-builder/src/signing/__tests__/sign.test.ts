/**
 * Tests for transaction signing.
 */

import { describe, it, expect } from 'vitest';
import {
  MissingSignerError,
  SignatureSlotOccupiedError,
  SignerFailureError,
  UnexpectedSignerError,
} from '@wirecraft/tx-errors';
import { InstructionEncoder } from '@wirecraft/tx-core';
import { RECENT_BLOCKHASH, createStubSigner, testAddress } from '../../__tests__/fixtures.js';
import { compileTransaction } from '../../compiler/compile.js';
import type { WireSigner } from '../../types.js';
import { encodeMessage } from '../../wire/encode.js';
import { isFullySigned, partiallySignTransaction, signTransaction } from '../sign.js';

const PAYER = testAddress(1);
const AUTHORITY = testAddress(2);
const STRANGER = testAddress(3);
const PROGRAM = testAddress(4);

function twoSignerTransaction() {
  return compileTransaction({
    feePayer: PAYER,
    recentBlockhash: RECENT_BLOCKHASH,
    instructions: [new InstructionEncoder(PROGRAM).signer(AUTHORITY, false).appendU8(1).build()],
  });
}

describe('signTransaction', () => {
  it('should fill every slot with the signer at that account index', () => {
    const transaction = twoSignerTransaction();

    // Signer order does not matter
    const signed = signTransaction(transaction, [
      createStubSigner(AUTHORITY, 2),
      createStubSigner(PAYER, 1),
    ]);

    expect(signed.signatures).toHaveLength(2);
    expect(signed.signatures[0]?.[1]).toBe(1);
    expect(signed.signatures[1]?.[1]).toBe(2);
    expect(isFullySigned(signed)).toBe(true);
    expect(isFullySigned(transaction)).toBe(false);
  });

  it('should pass every signer the encoded message once', () => {
    const transaction = twoSignerTransaction();
    const payer = createStubSigner(PAYER);
    const authority = createStubSigner(AUTHORITY);

    const signed = signTransaction(transaction, [payer, authority]);

    const expected = Array.from(encodeMessage(transaction.message));
    expect(payer.messages.map(message => Array.from(message))).toEqual([expected]);
    expect(authority.messages.map(message => Array.from(message))).toEqual([expected]);
    expect(signed.message).toBe(transaction.message);
  });

  it('should not mutate the input transaction', () => {
    const transaction = twoSignerTransaction();

    signTransaction(transaction, [createStubSigner(PAYER), createStubSigner(AUTHORITY)]);

    expect(transaction.signatures).toEqual([null, null]);
  });

  it('should reject a signer that is not required', () => {
    try {
      signTransaction(twoSignerTransaction(), [
        createStubSigner(PAYER),
        createStubSigner(AUTHORITY),
        createStubSigner(STRANGER),
      ]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnexpectedSignerError);
      if (error instanceof UnexpectedSignerError) {
        expect(error.address).toBe(STRANGER);
        expect(error.reason).toBe('not-required');
      }
    }
  });

  it('should reject a signer passed twice', () => {
    try {
      signTransaction(twoSignerTransaction(), [
        createStubSigner(PAYER),
        createStubSigner(AUTHORITY),
        createStubSigner(PAYER),
      ]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnexpectedSignerError);
      if (error instanceof UnexpectedSignerError) {
        expect(error.reason).toBe('duplicate');
      }
    }
  });

  it('should report a missing signer with its account index', () => {
    try {
      signTransaction(twoSignerTransaction(), [createStubSigner(PAYER)]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MissingSignerError);
      if (error instanceof MissingSignerError) {
        expect(error.address).toBe(AUTHORITY);
        expect(error.index).toBe(1);
      }
    }
  });

  it('should report an unexpected signer before a missing one', () => {
    expect(() =>
      signTransaction(twoSignerTransaction(), [createStubSigner(STRANGER)])
    ).toThrow(UnexpectedSignerError);
  });

  it('should not call any signer when validation fails', () => {
    const payer = createStubSigner(PAYER);

    expect(() => signTransaction(twoSignerTransaction(), [payer])).toThrow(MissingSignerError);
    expect(payer.messages).toHaveLength(0);
  });

  it('should wrap a throwing signer in SignerFailureError', () => {
    const cause = new Error('device unavailable');
    const failing: WireSigner = {
      address: AUTHORITY,
      sign() {
        throw cause;
      },
    };

    try {
      signTransaction(twoSignerTransaction(), [createStubSigner(PAYER), failing]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SignerFailureError);
      if (error instanceof SignerFailureError) {
        expect(error.address).toBe(AUTHORITY);
        expect(error.cause).toBe(cause);
      }
    }
  });

  it('should keep its own copy of each signature', () => {
    const returned = new Uint8Array(64).fill(5);
    const signer: WireSigner = { address: PAYER, sign: () => returned };

    const signed = signTransaction(twoSignerTransaction(), [signer, createStubSigner(AUTHORITY)]);
    returned.fill(0);

    expect(signed.signatures[0]).not.toBe(returned);
    expect(signed.signatures[0]?.[0]).toBe(5);
    expect(signed.signatures[0]?.[63]).toBe(5);
  });

  it('should reject a signature that is not 64 bytes', () => {
    const short: WireSigner = {
      address: PAYER,
      sign: () => new Uint8Array(63),
    };

    expect(() =>
      signTransaction(twoSignerTransaction(), [short, createStubSigner(AUTHORITY)])
    ).toThrow(SignerFailureError);
  });
});

describe('partiallySignTransaction', () => {
  it('should leave slots without a signer empty', () => {
    const partial = partiallySignTransaction(twoSignerTransaction(), [createStubSigner(AUTHORITY)]);

    expect(partial.signatures[0]).toBeNull();
    expect(partial.signatures[1]).not.toBeNull();
    expect(isFullySigned(partial)).toBe(false);
  });

  it('should complete in a second pass', () => {
    const partial = partiallySignTransaction(twoSignerTransaction(), [createStubSigner(AUTHORITY)]);

    const complete = signTransaction(partial, [createStubSigner(PAYER)]);

    expect(isFullySigned(complete)).toBe(true);
    expect(complete.signatures[1]).toBe(partial.signatures[1]);
  });

  it('should return the same transaction when no signers are given', () => {
    const transaction = twoSignerTransaction();

    expect(partiallySignTransaction(transaction, [])).toBe(transaction);
  });

  it('should refuse to overwrite a filled slot', () => {
    const partial = partiallySignTransaction(twoSignerTransaction(), [createStubSigner(PAYER)]);

    try {
      partiallySignTransaction(partial, [createStubSigner(PAYER)]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SignatureSlotOccupiedError);
      if (error instanceof SignatureSlotOccupiedError) {
        expect(error.index).toBe(0);
      }
    }
  });
});
