/**
 * @wirecraft/tx-core
 *
 * Binary codec, wire constants and the instruction model shared by the
 * transaction compiler and its analysis tools.
 *
 * @packageDocumentation
 */

export * from './constants.js';
export * from './codec/index.js';
export * from './instructions/index.js';
