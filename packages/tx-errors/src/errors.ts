/**
 * Typed error definitions for transaction encoding, compilation and signing.
 *
 * @packageDocumentation
 */

/**
 * Base error class for all Wirecraft errors.
 */
export class TransactionError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TransactionError';
    Object.setPrototypeOf(this, TransactionError.prototype);
  }
}

// ============================================================================
// Codec
// ============================================================================

/**
 * Error thrown when a compact integer is not in its minimal form or
 * encodes a value above 65535.
 */
export class MalformedVarintError extends TransactionError {
  constructor(
    public readonly offset: number,
    public readonly reason: string
  ) {
    super(`Malformed compact integer at offset ${offset}: ${reason}`, 'MALFORMED_VARINT', {
      offset,
      reason,
    });
    this.name = 'MalformedVarintError';
    Object.setPrototypeOf(this, MalformedVarintError.prototype);
  }
}

/**
 * Error thrown when a read runs past the end of the input.
 */
export class UnexpectedEofError extends TransactionError {
  constructor(
    public readonly offset: number,
    public readonly needed: number,
    public readonly available: number
  ) {
    super(
      `Unexpected end of input at offset ${offset}: needed ${needed} bytes, ${available} available`,
      'UNEXPECTED_EOF',
      { offset, needed, available }
    );
    this.name = 'UnexpectedEofError';
    Object.setPrototypeOf(this, UnexpectedEofError.prototype);
  }
}

/**
 * Error thrown when a value does not fit the integer type it is encoded as.
 */
export class ValueOutOfRangeError extends TransactionError {
  constructor(
    public readonly kind: string,
    public readonly value: number | bigint,
    public readonly min: number | bigint,
    public readonly max: number | bigint
  ) {
    super(
      `Value ${value.toString()} is out of range for ${kind} [${min.toString()}, ${max.toString()}]`,
      'VALUE_OUT_OF_RANGE',
      { kind, value, min, max }
    );
    this.name = 'ValueOutOfRangeError';
    Object.setPrototypeOf(this, ValueOutOfRangeError.prototype);
  }
}

/**
 * Error thrown when an identifier does not decode to exactly 32 bytes.
 */
export class InvalidIdentifierError extends TransactionError {
  constructor(
    public readonly identifier: string,
    public readonly length?: number
  ) {
    super(
      `Invalid identifier ${identifier}${length !== undefined ? ` (${length} bytes)` : ''}`,
      'INVALID_IDENTIFIER',
      { identifier, length }
    );
    this.name = 'InvalidIdentifierError';
    Object.setPrototypeOf(this, InvalidIdentifierError.prototype);
  }
}

// ============================================================================
// Instructions and builders
// ============================================================================

/**
 * Error thrown when instruction data would exceed the compact-length limit.
 */
export class InstructionDataTooLargeError extends TransactionError {
  constructor(
    public readonly size: number,
    public readonly maxSize: number
  ) {
    super(
      `Instruction data too large: ${size} bytes (max: ${maxSize} bytes)`,
      'INSTRUCTION_DATA_TOO_LARGE',
      { size, maxSize }
    );
    this.name = 'InstructionDataTooLargeError';
    Object.setPrototypeOf(this, InstructionDataTooLargeError.prototype);
  }
}

/**
 * Error thrown when a builder is used after it produced its output.
 */
export class BuilderConsumedError extends TransactionError {
  constructor(
    public readonly builder: string,
    public readonly operation: string
  ) {
    super(
      `${builder} has already been built; ${operation}() is not allowed. Clone it before building to reuse it.`,
      'BUILDER_CONSUMED',
      { builder, operation }
    );
    this.name = 'BuilderConsumedError';
    Object.setPrototypeOf(this, BuilderConsumedError.prototype);
  }
}

// ============================================================================
// Compiler
// ============================================================================

/**
 * Error thrown when no fee payer was supplied.
 */
export class MissingPayerError extends TransactionError {
  constructor() {
    super('Fee payer is required', 'MISSING_PAYER');
    this.name = 'MissingPayerError';
    Object.setPrototypeOf(this, MissingPayerError.prototype);
  }
}

/**
 * Error thrown when no recent blockhash was supplied.
 */
export class MissingBlockhashError extends TransactionError {
  constructor() {
    super('Recent blockhash is required', 'MISSING_BLOCKHASH');
    this.name = 'MissingBlockhashError';
    Object.setPrototypeOf(this, MissingBlockhashError.prototype);
  }
}

/**
 * Error thrown when a transaction is compiled without instructions.
 */
export class EmptyInstructionListError extends TransactionError {
  constructor() {
    super('At least one instruction is required', 'EMPTY_INSTRUCTION_LIST');
    this.name = 'EmptyInstructionListError';
    Object.setPrototypeOf(this, EmptyInstructionListError.prototype);
  }
}

/**
 * Error thrown when the account table outgrows single-byte indices.
 */
export class TooManyAccountsError extends TransactionError {
  constructor(
    public readonly count: number,
    public readonly maxCount: number
  ) {
    super(`Too many accounts: ${count} (max: ${maxCount})`, 'TOO_MANY_ACCOUNTS', {
      count,
      maxCount,
    });
    this.name = 'TooManyAccountsError';
    Object.setPrototypeOf(this, TooManyAccountsError.prototype);
  }
}

/**
 * Error thrown when wire bytes decode to a structurally invalid transaction.
 */
export class MalformedTransactionError extends TransactionError {
  constructor(
    public readonly offset: number,
    public readonly reason: string
  ) {
    super(`Malformed transaction at offset ${offset}: ${reason}`, 'MALFORMED_TRANSACTION', {
      offset,
      reason,
    });
    this.name = 'MalformedTransactionError';
    Object.setPrototypeOf(this, MalformedTransactionError.prototype);
  }
}

// ============================================================================
// Signing
// ============================================================================

/**
 * Error thrown when a required signer was not provided.
 */
export class MissingSignerError extends TransactionError {
  constructor(
    public readonly address: string,
    public readonly index: number
  ) {
    super(`Missing signer for ${address} (account index ${index})`, 'MISSING_SIGNER', {
      address,
      index,
    });
    this.name = 'MissingSignerError';
    Object.setPrototypeOf(this, MissingSignerError.prototype);
  }
}

/**
 * Error thrown when a provided signer does not match a required signature slot.
 */
export class UnexpectedSignerError extends TransactionError {
  constructor(
    public readonly address: string,
    public readonly reason: 'not-required' | 'duplicate' = 'not-required'
  ) {
    super(
      reason === 'duplicate'
        ? `Signer ${address} was provided more than once`
        : `Signer ${address} is not a required signer of this transaction`,
      'UNEXPECTED_SIGNER',
      { address, reason }
    );
    this.name = 'UnexpectedSignerError';
    Object.setPrototypeOf(this, UnexpectedSignerError.prototype);
  }
}

/**
 * Error thrown when the signer capability fails or returns a bad signature.
 */
export class SignerFailureError extends TransactionError {
  constructor(
    public readonly address: string,
    message: string,
    public readonly cause?: unknown
  ) {
    super(`Signer ${address} failed: ${message}`, 'SIGNER_FAILURE', { address, cause });
    this.name = 'SignerFailureError';
    Object.setPrototypeOf(this, SignerFailureError.prototype);
  }
}

/**
 * Error thrown when a signature slot that is already filled is signed again.
 */
export class SignatureSlotOccupiedError extends TransactionError {
  constructor(
    public readonly address: string,
    public readonly index: number
  ) {
    super(
      `Signature slot ${index} for ${address} is already filled`,
      'SIGNATURE_SLOT_OCCUPIED',
      { address, index }
    );
    this.name = 'SignatureSlotOccupiedError';
    Object.setPrototypeOf(this, SignatureSlotOccupiedError.prototype);
  }
}

// ============================================================================
// Optimizer and validation
// ============================================================================

/**
 * Error thrown when an optimization would change what the message means.
 */
export class UnsafeOptimizationError extends TransactionError {
  constructor(
    public readonly reason: string,
    public readonly address?: string
  ) {
    super(
      `Unsafe optimization${address ? ` for ${address}` : ''}: ${reason}`,
      'UNSAFE_OPTIMIZATION',
      { reason, address }
    );
    this.name = 'UnsafeOptimizationError';
    Object.setPrototypeOf(this, UnsafeOptimizationError.prototype);
  }
}

/**
 * Error thrown when transaction size exceeds limit.
 */
export class TransactionTooLargeError extends TransactionError {
  constructor(
    public readonly size: number,
    public readonly maxSize: number
  ) {
    super(
      `Transaction too large: ${size} bytes (max: ${maxSize} bytes)`,
      'TRANSACTION_TOO_LARGE',
      { size, maxSize }
    );
    this.name = 'TransactionTooLargeError';
    Object.setPrototypeOf(this, TransactionTooLargeError.prototype);
  }
}

/**
 * Union type of all Wirecraft errors.
 */
export type WirecraftErrorType =
  | MalformedVarintError
  | UnexpectedEofError
  | ValueOutOfRangeError
  | InvalidIdentifierError
  | InstructionDataTooLargeError
  | BuilderConsumedError
  | MissingPayerError
  | MissingBlockhashError
  | EmptyInstructionListError
  | TooManyAccountsError
  | MalformedTransactionError
  | MissingSignerError
  | UnexpectedSignerError
  | SignerFailureError
  | SignatureSlotOccupiedError
  | UnsafeOptimizationError
  | TransactionTooLargeError;
