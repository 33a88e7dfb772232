export * from './encode.js';
export * from './decode.js';
