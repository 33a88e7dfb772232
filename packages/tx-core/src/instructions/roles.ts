import { AccountRole } from '@solana/instructions';

/**
 * Map signer/writable flags to a Kit `AccountRole`.
 */
export function getAccountRole(isSigner: boolean, isWritable: boolean): AccountRole {
  if (isSigner) {
    return isWritable ? AccountRole.WRITABLE_SIGNER : AccountRole.READONLY_SIGNER;
  }
  return isWritable ? AccountRole.WRITABLE : AccountRole.READONLY;
}

/**
 * Position of a role's bucket in the account table: writable signers,
 * read-only signers, writable non-signers, read-only non-signers.
 */
export function getRoleBucket(role: AccountRole): 0 | 1 | 2 | 3 {
  switch (role) {
    case AccountRole.WRITABLE_SIGNER:
      return 0;
    case AccountRole.READONLY_SIGNER:
      return 1;
    case AccountRole.WRITABLE:
      return 2;
    case AccountRole.READONLY:
      return 3;
  }
}
