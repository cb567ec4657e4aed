export * from './schemas.js';
export * from './env.js';
export * from './scope-config.js';
export * from './errors.js';
export * from './error-codes.js';
