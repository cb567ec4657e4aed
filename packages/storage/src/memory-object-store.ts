import type { Logger, ObjectStore } from '@callscope/core';
import { LogComponent, StorageError } from '@callscope/core';
import { assertValidKey } from './keys.js';
import { InMemoryObjectStoreSchema } from './schemas.js';
import type { InMemoryObjectStoreConfig, InMemoryObjectStoreConfigInput } from './schemas.js';

/**
 * In-memory object store.
 *
 * Objects live in a Map and are dropped on disconnect. Meant for tests and short-lived
 * processes that read their archived traces back before exiting.
 */
export class InMemoryObjectStore implements ObjectStore {
    private readonly config: InMemoryObjectStoreConfig;
    private readonly objects = new Map<string, string>();
    private readonly logger: Logger;
    private connected = false;

    constructor(config: InMemoryObjectStoreConfigInput, logger: Logger) {
        this.config = InMemoryObjectStoreSchema.parse(config);
        this.logger = logger.createChild(LogComponent.STORAGE);
    }

    async connect(): Promise<void> {
        if (this.connected) return;
        this.connected = true;
        this.logger.debug('InMemoryObjectStore connected');
    }

    async disconnect(): Promise<void> {
        this.objects.clear();
        this.connected = false;
        this.logger.debug('InMemoryObjectStore disconnected');
    }

    isConnected(): boolean {
        return this.connected;
    }

    getStoreType(): string {
        return 'in-memory';
    }

    async put(key: string, body: string): Promise<void> {
        this.ensureConnected();
        assertValidKey(key);
        const size = Buffer.byteLength(body, 'utf-8');
        if (size > this.config.maxObjectSize) {
            throw StorageError.writeFailed(
                key,
                `object is ${size} bytes, limit is ${this.config.maxObjectSize}`
            );
        }
        this.objects.set(key, body);
        this.logger.debug(`Stored object ${key} (${size} bytes)`);
    }

    async get(key: string): Promise<string | undefined> {
        this.ensureConnected();
        assertValidKey(key);
        return this.objects.get(key);
    }

    async list(prefix = ''): Promise<string[]> {
        this.ensureConnected();
        return [...this.objects.keys()].filter((key) => key.startsWith(prefix)).sort();
    }

    async delete(key: string): Promise<boolean> {
        this.ensureConnected();
        assertValidKey(key);
        return this.objects.delete(key);
    }

    private ensureConnected(): void {
        if (!this.connected) {
            throw StorageError.notConnected('in-memory');
        }
    }
}
