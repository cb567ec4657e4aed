export type { ObjectStore, PutObjectOptions } from './types.js';
export { StorageError } from './errors.js';
export { StorageErrorCode } from './error-codes.js';
