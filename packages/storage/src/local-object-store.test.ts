import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createLogger, StorageErrorCode } from '@callscope/core';
import { LocalObjectStore } from './local-object-store.js';

const logger = createLogger({
    service: 'storage-test',
    config: { level: 'error', transports: [{ type: 'silent' }] },
});

describe('LocalObjectStore', () => {
    let dir: string;
    let store: LocalObjectStore;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'callscope-objects-'));
        store = new LocalObjectStore({ type: 'local', basePath: path.join(dir, 'store') }, logger);
        await store.connect();
    });

    afterEach(async () => {
        await store.disconnect();
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('creates the base directory on connect', async () => {
        const stat = await fs.stat(path.join(dir, 'store'));
        expect(stat.isDirectory()).toBe(true);
    });

    it('writes one file per key, nesting on "/"', async () => {
        await store.put('svc/trace_1.ndjson', '{"name":"root"}\n');

        const onDisk = await fs.readFile(path.join(dir, 'store', 'svc', 'trace_1.ndjson'), 'utf-8');
        expect(onDisk).toBe('{"name":"root"}\n');
        expect(await store.get('svc/trace_1.ndjson')).toBe('{"name":"root"}\n');
    });

    it('returns undefined for a missing key', async () => {
        expect(await store.get('absent.ndjson')).toBeUndefined();
    });

    it('lists keys sorted and filtered by prefix', async () => {
        await store.put('svc/b.ndjson', 'b');
        await store.put('svc/a.ndjson', 'a');
        await store.put('top.ndjson', 't');

        expect(await store.list()).toEqual(['svc/a.ndjson', 'svc/b.ndjson', 'top.ndjson']);
        expect(await store.list('svc/')).toEqual(['svc/a.ndjson', 'svc/b.ndjson']);
    });

    it('reports whether delete removed anything', async () => {
        await store.put('k.ndjson', 'v');

        expect(await store.delete('k.ndjson')).toBe(true);
        expect(await store.delete('k.ndjson')).toBe(false);
        expect(await store.list()).toEqual([]);
    });

    it('rejects traversal keys', async () => {
        await expect(store.put('svc/../../escape', 'x')).rejects.toMatchObject({
            code: StorageErrorCode.INVALID_KEY,
        });
        await expect(store.put('a\\b', 'x')).rejects.toMatchObject({
            code: StorageErrorCode.INVALID_KEY,
        });
    });

    it('requires connect()', async () => {
        const fresh = new LocalObjectStore({ type: 'local', basePath: dir }, logger);

        await expect(fresh.get('k')).rejects.toMatchObject({
            code: StorageErrorCode.NOT_CONNECTED,
        });
    });
});
