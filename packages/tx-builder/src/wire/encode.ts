/**
 * Wire serialization of compiled messages and transactions.
 *
 * Layout: compact-prefixed 64-byte signature slots, then the message:
 * a 3-byte header, compact-prefixed 32-byte account addresses, the
 * 32-byte blockhash and compact-prefixed compiled instructions.
 *
 * @packageDocumentation
 */

import {
  BLOCKHASH_SIZE,
  ByteWriter,
  IDENTIFIER_SIZE,
  MESSAGE_HEADER_SIZE,
  SIGNATURE_SIZE,
  getCompactU16Size,
  getCompiledInstructionSize,
  getPrefixedSize,
  writeCompiledInstruction,
} from '@wirecraft/tx-core';
import type { CompiledMessage, CompiledTransaction } from '../types.js';

const EMPTY_SIGNATURE = new Uint8Array(SIGNATURE_SIZE);

export function writeMessage(writer: ByteWriter, message: CompiledMessage): void {
  const { header } = message;
  writer
    .u8(header.numSignerAccounts)
    .u8(header.numReadonlySignerAccounts)
    .u8(header.numReadonlyNonSignerAccounts);

  writer.compactU16(message.accounts.length);
  for (const { address } of message.accounts) writer.identifier(address);

  writer.blockhash(message.recentBlockhash);

  writer.compactU16(message.instructions.length);
  for (const instruction of message.instructions) writeCompiledInstruction(writer, instruction);
}

/**
 * The bytes signers sign.
 */
export function encodeMessage(message: CompiledMessage): Uint8Array {
  const writer = new ByteWriter(getMessageSize(message));
  writeMessage(writer, message);
  return writer.toBytes();
}

export function getMessageSize(message: CompiledMessage): number {
  let size =
    MESSAGE_HEADER_SIZE +
    getPrefixedSize(message.accounts.length, IDENTIFIER_SIZE) +
    BLOCKHASH_SIZE +
    getCompactU16Size(message.instructions.length);
  for (const instruction of message.instructions) {
    size += getCompiledInstructionSize(instruction);
  }
  return size;
}

/**
 * Serialize a transaction. Empty signature slots are written as 64 zero bytes.
 */
export function encodeTransaction(transaction: CompiledTransaction): Uint8Array {
  const writer = new ByteWriter(getTransactionSize(transaction));
  writer.compactU16(transaction.signatures.length);
  for (const signature of transaction.signatures) {
    writer.bytes(signature ?? EMPTY_SIGNATURE);
  }
  writeMessage(writer, transaction.message);
  return writer.toBytes();
}

export function getTransactionSize(transaction: CompiledTransaction): number {
  return (
    getPrefixedSize(transaction.signatures.length, SIGNATURE_SIZE) +
    getMessageSize(transaction.message)
  );
}
