export * from './types.js';
export * from './roles.js';
export * from './encoder.js';
export * from './compiled.js';
