import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { Logger, ObjectStore } from '@callscope/core';
import { LogComponent, StorageError } from '@callscope/core';
import { assertValidKey } from './keys.js';
import type { LocalObjectStoreConfig } from './schemas.js';

const TEMP_SUFFIX = '.partial';

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Filesystem object store: each key is a file under basePath, '/' in a key becomes a
 * subdirectory.
 */
export class LocalObjectStore implements ObjectStore {
    private readonly basePath: string;
    private readonly logger: Logger;
    private connected = false;

    constructor(config: LocalObjectStoreConfig, logger: Logger) {
        this.basePath = path.resolve(config.basePath);
        this.logger = logger.createChild(LogComponent.STORAGE);
    }

    async connect(): Promise<void> {
        if (this.connected) return;
        try {
            await fs.mkdir(this.basePath, { recursive: true });
        } catch (error) {
            throw StorageError.connectionFailed(
                'local',
                `cannot create ${this.basePath}: ${error instanceof Error ? error.message : String(error)}`
            );
        }
        this.connected = true;
        this.logger.debug(`LocalObjectStore connected at ${this.basePath}`);
    }

    async disconnect(): Promise<void> {
        this.connected = false;
        this.logger.debug('LocalObjectStore disconnected');
    }

    isConnected(): boolean {
        return this.connected;
    }

    getStoreType(): string {
        return 'local';
    }

    async put(key: string, body: string): Promise<void> {
        const filePath = this.resolveKey(key);
        try {
            await fs.mkdir(path.dirname(filePath), { recursive: true });
            // Write then rename so readers never see a partial object
            const tempPath = `${filePath}.${process.pid}${TEMP_SUFFIX}`;
            await fs.writeFile(tempPath, body, 'utf-8');
            await fs.rename(tempPath, filePath);
        } catch (error) {
            throw StorageError.writeFailed(key, error);
        }
        this.logger.debug(`Stored object ${key}`);
    }

    async get(key: string): Promise<string | undefined> {
        const filePath = this.resolveKey(key);
        try {
            return await fs.readFile(filePath, 'utf-8');
        } catch (error) {
            if (isNotFound(error)) {
                return undefined;
            }
            throw StorageError.readFailed(key, error);
        }
    }

    async list(prefix = ''): Promise<string[]> {
        this.ensureConnected();
        const keys: string[] = [];
        await this.collectKeys(this.basePath, '', keys);
        return keys.filter((key) => key.startsWith(prefix)).sort();
    }

    async delete(key: string): Promise<boolean> {
        const filePath = this.resolveKey(key);
        try {
            await fs.unlink(filePath);
            return true;
        } catch (error) {
            if (isNotFound(error)) {
                return false;
            }
            throw StorageError.deleteFailed(key, error);
        }
    }

    private async collectKeys(dir: string, relative: string, keys: string[]): Promise<void> {
        let entries;
        try {
            entries = await fs.readdir(dir, { withFileTypes: true });
        } catch (error) {
            if (isNotFound(error)) return;
            throw StorageError.readFailed(relative || '.', error);
        }
        for (const entry of entries) {
            const key = relative ? `${relative}/${entry.name}` : entry.name;
            if (entry.isDirectory()) {
                await this.collectKeys(path.join(dir, entry.name), key, keys);
            } else if (entry.isFile() && !entry.name.endsWith(TEMP_SUFFIX)) {
                keys.push(key);
            }
        }
    }

    private resolveKey(key: string): string {
        this.ensureConnected();
        assertValidKey(key);
        return path.join(this.basePath, ...key.split('/'));
    }

    private ensureConnected(): void {
        if (!this.connected) {
            throw StorageError.notConnected('local');
        }
    }
}
