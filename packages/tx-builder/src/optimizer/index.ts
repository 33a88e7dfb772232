/**
 * Transaction analysis and optimization.
 *
 * @packageDocumentation
 */

export * from './analyze.js';
export * from './optimize.js';
export * from './utils.js';
