export * from './context-runtime.js';
export * from './scopes.js';
export * from './propagation.js';
export * from './errors.js';
export * from './error-codes.js';
