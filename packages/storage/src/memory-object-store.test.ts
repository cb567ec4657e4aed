import { describe, it, expect, beforeEach } from 'vitest';
import { createLogger, StorageErrorCode } from '@callscope/core';
import { InMemoryObjectStore } from './memory-object-store.js';

const logger = createLogger({
    service: 'storage-test',
    config: { level: 'error', transports: [{ type: 'silent' }] },
});

describe('InMemoryObjectStore', () => {
    let store: InMemoryObjectStore;

    beforeEach(async () => {
        store = new InMemoryObjectStore({ type: 'in-memory' }, logger);
        await store.connect();
    });

    it('stores, lists and deletes objects', async () => {
        await store.put('traces/b.ndjson', '{"b":1}\n');
        await store.put('traces/a.ndjson', '{"a":1}\n');
        await store.put('other/c.ndjson', '{}\n');

        expect(await store.get('traces/a.ndjson')).toBe('{"a":1}\n');
        expect(await store.list('traces/')).toEqual(['traces/a.ndjson', 'traces/b.ndjson']);
        expect(await store.list()).toEqual([
            'other/c.ndjson',
            'traces/a.ndjson',
            'traces/b.ndjson',
        ]);

        expect(await store.delete('traces/a.ndjson')).toBe(true);
        expect(await store.delete('traces/a.ndjson')).toBe(false);
        expect(await store.get('traces/a.ndjson')).toBeUndefined();
    });

    it('replaces an existing object', async () => {
        await store.put('k', 'first');
        await store.put('k', 'second');

        expect(await store.get('k')).toBe('second');
    });

    it('rejects bodies over the size limit', async () => {
        const small = new InMemoryObjectStore({ type: 'in-memory', maxObjectSize: 4 }, logger);
        await small.connect();

        await expect(small.put('k', 'too long')).rejects.toMatchObject({
            code: StorageErrorCode.WRITE_FAILED,
        });
    });

    it('rejects keys that escape the store', async () => {
        await expect(store.put('../outside', 'x')).rejects.toMatchObject({
            code: StorageErrorCode.INVALID_KEY,
        });
        await expect(store.get('/abs')).rejects.toMatchObject({
            code: StorageErrorCode.INVALID_KEY,
        });
    });

    it('requires connect() and clears on disconnect', async () => {
        await store.put('k', 'v');
        await store.disconnect();

        expect(store.isConnected()).toBe(false);
        await expect(store.get('k')).rejects.toMatchObject({
            code: StorageErrorCode.NOT_CONNECTED,
        });

        await store.connect();
        expect(await store.list()).toEqual([]);
    });
});
