export * from './types.js';
export * from './runtime-error.js';
