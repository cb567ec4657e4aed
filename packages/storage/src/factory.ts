import type { Logger, ObjectStore } from '@callscope/core';
import { StorageError } from '@callscope/core';
import type { z } from 'zod';
import { InMemoryObjectStore } from './memory-object-store.js';
import { LocalObjectStore } from './local-object-store.js';
import { InMemoryObjectStoreSchema, LocalObjectStoreSchema, OBJECT_STORE_TYPES } from './schemas.js';

/**
 * Builds one kind of object store from its validated config
 */
export interface ObjectStoreFactory<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
    configSchema: TSchema;
    create(config: z.output<TSchema>, logger: Logger): ObjectStore;
    metadata: {
        displayName: string;
        description: string;
        requiresNetwork: boolean;
    };
}

export const inMemoryObjectStoreFactory: ObjectStoreFactory<typeof InMemoryObjectStoreSchema> = {
    configSchema: InMemoryObjectStoreSchema,
    create: (config, logger) => new InMemoryObjectStore(config, logger),
    metadata: {
        displayName: 'In-Memory',
        description: 'Keeps objects in process memory',
        requiresNetwork: false,
    },
};

export const localObjectStoreFactory: ObjectStoreFactory<typeof LocalObjectStoreSchema> = {
    configSchema: LocalObjectStoreSchema,
    create: (config, logger) => new LocalObjectStore(config, logger),
    metadata: {
        displayName: 'Local Filesystem',
        description: 'Writes one file per object under a base directory',
        requiresNetwork: false,
    },
};

function readType(config: unknown): string | undefined {
    if (typeof config !== 'object' || config === null || !('type' in config)) {
        return undefined;
    }
    return typeof config.type === 'string' ? config.type : undefined;
}

/**
 * Validates config against the schema of its `type` and builds the store (not yet connected).
 *
 * @example
 * ```typescript
 * const store = createObjectStore({ type: 'local', basePath: './traces' }, logger);
 * await setupTracing({ config: { serviceName: 'api', sinks: ['object-storage'] }, objectStore: store });
 * ```
 */
export function createObjectStore(config: unknown, logger: Logger): ObjectStore {
    const type = readType(config);
    if (type === undefined) {
        throw StorageError.invalidConfig('missing "type"');
    }

    switch (type) {
        case 'in-memory':
            return build(inMemoryObjectStoreFactory, config, logger);
        case 'local':
            return build(localObjectStoreFactory, config, logger);
        default:
            throw StorageError.unknownStoreType(type, [...OBJECT_STORE_TYPES]);
    }
}

function build<TSchema extends z.ZodTypeAny>(
    factory: ObjectStoreFactory<TSchema>,
    config: unknown,
    logger: Logger
): ObjectStore {
    const result = factory.configSchema.safeParse(config);
    if (!result.success) {
        const message = result.error.issues
            .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
            .join('; ');
        throw StorageError.invalidConfig(message, result.error.issues);
    }
    logger.debug(`Creating ${factory.metadata.displayName} object store`);
    return factory.create(result.data, logger);
}
