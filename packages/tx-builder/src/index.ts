/**
 * @wirecraft/tx-builder
 *
 * Compile instructions into legacy transactions, serialize and sign them,
 * estimate their fees and shrink them.
 *
 * @packageDocumentation
 */

// Types
export * from './types.js';

// Compilation and wire format
export * from './compiler/index.js';
export * from './wire/index.js';

// Builder and signing
export * from './builder/index.js';
export * from './signing/index.js';

// Fees
export * from './compute-budget/index.js';

// Size
export * from './optimizer/index.js';
export * from './validation/index.js';
export * from './packing/index.js';

export * from './logging/index.js';
