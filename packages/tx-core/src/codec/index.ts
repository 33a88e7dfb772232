export * from './sizes.js';
export * from './compact-u16.js';
export * from './writer.js';
export * from './reader.js';
