/**
 * Account table construction: dedupe, merge roles, order into buckets.
 *
 * @packageDocumentation
 */

import type { Address } from '@solana/addresses';
import { AccountRole, isSignerRole, isWritableRole, mergeRoles } from '@solana/instructions';
import { TooManyAccountsError } from '@wirecraft/tx-errors';
import {
  MAX_ACCOUNT_TABLE_ENTRIES,
  getAccountRole,
  getRoleBucket,
  type LegacyInstruction,
} from '@wirecraft/tx-core';
import type { AccountTableEntry, MessageHeader } from '../types.js';

/**
 * Insertion-ordered map from address to the role merged so far.
 */
export type StagedAccounts = Map<Address, AccountRole>;

/**
 * Collect every account the payer and the instructions reference.
 *
 * The payer is seeded as a writable signer. Account references are merged
 * with a logical OR of their flags. Program addresses are registered as
 * read-only after the instruction's accounts, and never upgrade an
 * existing entry.
 */
export function stageAccounts(
  feePayer: Address,
  instructions: readonly LegacyInstruction[]
): StagedAccounts {
  const staged: StagedAccounts = new Map<Address, AccountRole>([
    [feePayer, AccountRole.WRITABLE_SIGNER],
  ]);

  for (const instruction of instructions) {
    for (const meta of instruction.accounts ?? []) {
      const existing = staged.get(meta.address);
      staged.set(meta.address, existing === undefined ? meta.role : mergeRoles(existing, meta.role));
    }
    if (!staged.has(instruction.programAddress)) {
      staged.set(instruction.programAddress, AccountRole.READONLY);
    }
  }

  return staged;
}

/**
 * Order staged accounts: payer first, then writable signers, read-only
 * signers, writable non-signers and read-only non-signers, each bucket in
 * first-seen order.
 */
export function orderAccounts(feePayer: Address, staged: StagedAccounts): AccountTableEntry[] {
  const buckets: AccountTableEntry[][] = [[], [], [], []];
  for (const [address, role] of staged) {
    if (address === feePayer) continue;
    buckets[getRoleBucket(role)].push(Object.freeze({ address, role }));
  }

  const table = [
    Object.freeze({ address: feePayer, role: AccountRole.WRITABLE_SIGNER }),
    ...buckets.flat(),
  ];
  if (table.length > MAX_ACCOUNT_TABLE_ENTRIES) {
    throw new TooManyAccountsError(table.length, MAX_ACCOUNT_TABLE_ENTRIES);
  }
  return table;
}

/**
 * Count signers, read-only signers and read-only non-signers.
 */
export function deriveMessageHeader(accounts: readonly AccountTableEntry[]): MessageHeader {
  let numSignerAccounts = 0;
  let numReadonlySignerAccounts = 0;
  let numReadonlyNonSignerAccounts = 0;

  for (const { role } of accounts) {
    if (isSignerRole(role)) {
      numSignerAccounts++;
      if (!isWritableRole(role)) numReadonlySignerAccounts++;
    } else if (!isWritableRole(role)) {
      numReadonlyNonSignerAccounts++;
    }
  }

  return Object.freeze({
    numSignerAccounts,
    numReadonlySignerAccounts,
    numReadonlyNonSignerAccounts,
  });
}

/**
 * Recover the role of the entry at `index` from header counts alone.
 *
 * Signers lead the table with their read-only part last; read-only
 * non-signers close the table.
 */
export function getAccountRoleAtIndex(
  header: MessageHeader,
  accountCount: number,
  index: number
): AccountRole {
  const isSigner = index < header.numSignerAccounts;
  const isWritable = isSigner
    ? index < header.numSignerAccounts - header.numReadonlySignerAccounts
    : index < accountCount - header.numReadonlyNonSignerAccounts;
  return getAccountRole(isSigner, isWritable);
}
