/**
 * @callscope/storage
 *
 * Object store backends for the object-storage span sink. Core owns the `ObjectStore`
 * contract; this package provides the implementations and their config schemas.
 */

export { createObjectStore, inMemoryObjectStoreFactory, localObjectStoreFactory } from './factory.js';
export type { ObjectStoreFactory } from './factory.js';
export { InMemoryObjectStore } from './memory-object-store.js';
export { LocalObjectStore } from './local-object-store.js';
export { assertValidKey } from './keys.js';
export {
    OBJECT_STORE_TYPES,
    ObjectStoreConfigSchema,
    InMemoryObjectStoreSchema,
    LocalObjectStoreSchema,
} from './schemas.js';
export type {
    ObjectStoreType,
    ObjectStoreConfig,
    ObjectStoreConfigInput,
    InMemoryObjectStoreConfig,
    InMemoryObjectStoreConfigInput,
    LocalObjectStoreConfig,
} from './schemas.js';
