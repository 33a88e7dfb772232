/**
 * @wirecraft/tx-errors
 *
 * Typed error definitions and error handling utilities for transaction
 * encoding, compilation and signing.
 *
 * @packageDocumentation
 */

export * from './errors.js';
export * from './predicates.js';
export * from './messages.js';
