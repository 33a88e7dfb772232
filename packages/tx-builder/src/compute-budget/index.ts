/**
 * Compute budget instructions and fee estimation.
 *
 * @packageDocumentation
 */

export * from './instructions.js';
export * from './classify.js';
export * from './fees.js';
