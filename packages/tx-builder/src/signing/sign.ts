/**
 * Filling signature slots of compiled transactions.
 *
 * @packageDocumentation
 */

import type { ReadonlyUint8Array } from '@solana/codecs';
import {
  MissingSignerError,
  SignatureSlotOccupiedError,
  SignerFailureError,
  UnexpectedSignerError,
} from '@wirecraft/tx-errors';
import { SIGNATURE_SIZE } from '@wirecraft/tx-core';
import type { CompiledTransaction, SignatureSlot, WireSigner } from '../types.js';
import { encodeMessage } from '../wire/encode.js';

/**
 * Sign with the given signers, leaving other slots as they are.
 *
 * @throws UnexpectedSignerError when a signer is not a required signer or is passed twice
 * @throws SignatureSlotOccupiedError when a signer's slot is already filled
 * @throws SignerFailureError when a signer throws or returns a signature that is not 64 bytes
 */
export function partiallySignTransaction(
  transaction: CompiledTransaction,
  signers: readonly WireSigner[]
): CompiledTransaction {
  const plan = planSignatures(transaction, signers);
  return applySignatures(transaction, plan);
}

/**
 * Sign with the given signers and require every slot to end up filled.
 *
 * @throws MissingSignerError when an empty slot has no signer
 */
export function signTransaction(
  transaction: CompiledTransaction,
  signers: readonly WireSigner[]
): CompiledTransaction {
  const plan = planSignatures(transaction, signers);
  transaction.signatures.forEach((signature, index) => {
    if (signature === null && !plan.has(index)) {
      throw new MissingSignerError(transaction.message.accounts[index].address, index);
    }
  });
  return applySignatures(transaction, plan);
}

export function isFullySigned(transaction: CompiledTransaction): boolean {
  return transaction.signatures.every(signature => signature !== null);
}

/**
 * Map each signer to its slot, the index of its account in the table.
 */
function planSignatures(
  transaction: CompiledTransaction,
  signers: readonly WireSigner[]
): Map<number, WireSigner> {
  const { accounts, header } = transaction.message;
  const requiredSigners = accounts.slice(0, header.numSignerAccounts).map(entry => entry.address);

  const plan = new Map<number, WireSigner>();
  for (const signer of signers) {
    const index = requiredSigners.indexOf(signer.address);
    if (index === -1) {
      throw new UnexpectedSignerError(signer.address);
    }
    if (plan.has(index)) {
      throw new UnexpectedSignerError(signer.address, 'duplicate');
    }
    if (transaction.signatures[index] !== null) {
      throw new SignatureSlotOccupiedError(signer.address, index);
    }
    plan.set(index, signer);
  }
  return plan;
}

function applySignatures(
  transaction: CompiledTransaction,
  plan: ReadonlyMap<number, WireSigner>
): CompiledTransaction {
  if (plan.size === 0) return transaction;

  const messageBytes = encodeMessage(transaction.message);
  const signatures: SignatureSlot[] = [...transaction.signatures];
  for (const [index, signer] of plan) {
    signatures[index] = invokeSigner(signer, messageBytes);
  }

  return Object.freeze({
    message: transaction.message,
    signatures: Object.freeze(signatures),
  });
}

function invokeSigner(signer: WireSigner, messageBytes: ReadonlyUint8Array): ReadonlyUint8Array {
  let signature: ReadonlyUint8Array;
  try {
    signature = signer.sign(messageBytes);
  } catch (error) {
    throw new SignerFailureError(signer.address, 'the signer threw', error);
  }
  if (signature.length !== SIGNATURE_SIZE) {
    throw new SignerFailureError(
      signer.address,
      `expected a ${SIGNATURE_SIZE}-byte signature, got ${signature.length} bytes`
    );
  }
  return Uint8Array.from(signature);
}
