export * from './accounts.js';
export * from './compile.js';
