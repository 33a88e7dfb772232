/**
 * Wire deserialization. Strict: every structural defect is reported with
 * the byte offset where it was found.
 *
 * @packageDocumentation
 */

import type { ReadonlyUint8Array } from '@solana/codecs';
import { MalformedTransactionError } from '@wirecraft/tx-errors';
import {
  ByteReader,
  SIGNATURE_SIZE,
  readCompiledInstruction,
  type CompiledInstruction,
} from '@wirecraft/tx-core';
import { getAccountRoleAtIndex } from '../compiler/accounts.js';
import type {
  AccountTableEntry,
  CompiledMessage,
  CompiledTransaction,
  MessageHeader,
  SignatureSlot,
} from '../types.js';

export function readMessage(reader: ByteReader): CompiledMessage {
  const headerOffset = reader.offset;
  const header: MessageHeader = Object.freeze({
    numSignerAccounts: reader.u8(),
    numReadonlySignerAccounts: reader.u8(),
    numReadonlyNonSignerAccounts: reader.u8(),
  });

  const accountCount = reader.compactU16();
  if (header.numReadonlySignerAccounts > header.numSignerAccounts) {
    throw new MalformedTransactionError(
      headerOffset,
      'more read-only signers than signers'
    );
  }
  if (header.numSignerAccounts + header.numReadonlyNonSignerAccounts > accountCount) {
    throw new MalformedTransactionError(
      headerOffset,
      `header counts exceed the ${accountCount}-entry account table`
    );
  }
  if (accountCount > 0 && header.numSignerAccounts === 0) {
    throw new MalformedTransactionError(headerOffset, 'fee payer must sign');
  }
  if (
    header.numSignerAccounts > 0 &&
    header.numReadonlySignerAccounts === header.numSignerAccounts
  ) {
    throw new MalformedTransactionError(headerOffset, 'fee payer must be writable');
  }

  const accounts: AccountTableEntry[] = [];
  for (let index = 0; index < accountCount; index++) {
    accounts.push(
      Object.freeze({
        address: reader.identifier(),
        role: getAccountRoleAtIndex(header, accountCount, index),
      })
    );
  }

  const recentBlockhash = reader.blockhash();

  const instructionCount = reader.compactU16();
  const instructions: CompiledInstruction[] = [];
  for (let i = 0; i < instructionCount; i++) {
    const instructionOffset = reader.offset;
    const instruction = readCompiledInstruction(reader);
    const outOfRange = [instruction.programAddressIndex, ...instruction.accountIndices].find(
      index => index >= accountCount
    );
    if (outOfRange !== undefined) {
      throw new MalformedTransactionError(
        instructionOffset,
        `account index ${outOfRange} is out of range for a table of ${accountCount}`
      );
    }
    instructions.push(instruction);
  }

  return Object.freeze({
    header,
    accounts: Object.freeze(accounts),
    recentBlockhash,
    instructions: Object.freeze(instructions),
  });
}

/**
 * Decode a message. Roles are recovered from the header and positions.
 */
export function decodeMessage(bytes: ReadonlyUint8Array): CompiledMessage {
  const reader = new ByteReader(bytes);
  const message = readMessage(reader);
  assertFullyConsumed(reader);
  return message;
}

/**
 * Decode a serialized transaction. All-zero signature slots decode as empty.
 */
export function decodeTransaction(bytes: ReadonlyUint8Array): CompiledTransaction {
  const reader = new ByteReader(bytes);

  const signatureCount = reader.compactU16();
  const signatures: SignatureSlot[] = [];
  for (let i = 0; i < signatureCount; i++) {
    const signature = reader.bytes(SIGNATURE_SIZE);
    signatures.push(signature.every(byte => byte === 0) ? null : signature);
  }

  const messageOffset = reader.offset;
  const message = readMessage(reader);
  if (signatureCount !== message.header.numSignerAccounts) {
    throw new MalformedTransactionError(
      messageOffset,
      `${signatureCount} signature slots for ${message.header.numSignerAccounts} required signers`
    );
  }
  assertFullyConsumed(reader);

  return Object.freeze({ message, signatures: Object.freeze(signatures) });
}

function assertFullyConsumed(reader: ByteReader): void {
  if (reader.remaining > 0) {
    throw new MalformedTransactionError(reader.offset, `${reader.remaining} trailing bytes`);
  }
}
