import { describe, test, expect, beforeEach, vi } from 'vitest';
import { createMockLogger } from '../logger/test-utils.js';
import type { Logger } from '../logger/types.js';
import { InstrumentationErrorCode } from './error-codes.js';
import { INSTRUMENTED, InterceptionRegistry, spanNameOf } from './registry.js';
import { asyncWrapper, syncWrapper } from './wrappers.js';
import { createTestTracing, inRootContext } from './test-utils.js';
import type { TestTracing } from './test-utils.js';

class Store {
    get(key: string): string {
        return `value:${key}`;
    }

    async put(key: string): Promise<string> {
        return `stored:${key}`;
    }
}

const client = {
    kv: new Store(),
    ping(): string {
        return 'pong';
    },
};

const originalGet = Store.prototype.get;
const originalPing = client.ping;

describe('InterceptionRegistry', () => {
    let tracing: TestTracing;
    let logger: Logger;
    let loadModule: (specifier: string) => unknown;
    let registry: InterceptionRegistry;

    beforeEach(() => {
        tracing = createTestTracing();
        logger = createMockLogger();
        loadModule = vi.fn((specifier: string) => {
            if (specifier === 'kv-store') {
                return { Store };
            }
            throw new Error(`Cannot find module '${specifier}'`);
        });
        registry = new InterceptionRegistry({
            tracer: tracing.tracer,
            serviceName: 'kv-service',
            logger,
            loadModule,
        });
        return () => registry.unregister();
    });

    test('installs proxies and names spans after the location', () => {
        const result = registry.register([
            { location: { module: 'kv-store', object: 'Store.prototype', method: 'get' }, wrapper: syncWrapper },
        ]);

        expect(result).toEqual({ installed: ['kv-store.Store.prototype.get'], failed: [] });
        expect(Store.prototype.get).not.toBe(originalGet);
        expect(INSTRUMENTED in Store.prototype.get).toBe(true);
        expect(Store.prototype.get.name).toBe('get');

        expect(inRootContext(() => new Store().get('a'))).toBe('value:a');
        expect(tracing.exporter.getFinishedSpans().map((s) => s.name)).toEqual([
            'kv-store.Store.prototype.get',
        ]);
    });

    test('a failing target does not prevent the others from installing', () => {
        const result = registry.register([
            { location: { module: 'not-installed', method: 'run' }, wrapper: syncWrapper },
            { location: { module: 'kv-store', object: 'Store.prototype', method: 'missing' }, wrapper: syncWrapper },
            { location: { module: 'kv-store', object: 'Nope.prototype', method: 'get' }, wrapper: syncWrapper },
            { location: { method: 'get' }, wrapper: syncWrapper },
            { location: { module: 'kv-store', object: 'Store.prototype', method: 'put' }, wrapper: asyncWrapper, handler: 'unknown' },
            { location: { module: 'kv-store', object: 'Store.prototype', method: 'get' }, wrapper: syncWrapper },
        ]);

        expect(result.installed).toEqual(['kv-store.Store.prototype.get']);
        expect(result.failed.map((f) => f.error)).toMatchObject([
            { code: InstrumentationErrorCode.MODULE_NOT_FOUND },
            { code: InstrumentationErrorCode.METHOD_NOT_FOUND },
            { code: InstrumentationErrorCode.OBJECT_NOT_FOUND },
            { code: InstrumentationErrorCode.INVALID_LOCATION },
            { code: InstrumentationErrorCode.HANDLER_NOT_FOUND },
        ]);
        expect(logger.warn).toHaveBeenCalledTimes(5);
    });

    test('refuses to wrap a method twice', () => {
        const spec = {
            location: { module: 'kv-store', object: 'Store.prototype', method: 'get' },
            wrapper: syncWrapper,
        };
        registry.register([spec]);

        const second = new InterceptionRegistry({
            tracer: tracing.tracer,
            serviceName: 'kv-service',
            logger,
            loadModule,
        });
        const result = second.register([spec]);

        expect(result.installed).toEqual([]);
        expect(result.failed[0]?.error).toMatchObject({
            code: InstrumentationErrorCode.ALREADY_INSTRUMENTED,
        });
    });

    test('instruments methods of an object handed over directly', () => {
        registry.register([
            { location: { target: client, object: 'kv', method: 'get' }, wrapper: syncWrapper, spanName: 'kv.get' },
            { location: { target: client, method: 'ping' }, wrapper: syncWrapper },
        ]);

        inRootContext(() => {
            expect(client.kv.get('b')).toBe('value:b');
            expect(client.ping()).toBe('pong');
        });

        expect(tracing.exporter.getFinishedSpans().map((s) => s.name)).toEqual(['kv.get', 'ping']);
    });

    describe('unregister', () => {
        test('restores originals and is idempotent', () => {
            registry.register([
                { location: { module: 'kv-store', object: 'Store.prototype', method: 'get' }, wrapper: syncWrapper },
                { location: { target: client, method: 'ping' }, wrapper: syncWrapper },
            ]);

            registry.unregister();
            registry.unregister();

            expect(Store.prototype.get).toBe(originalGet);
            expect(client.ping).toBe(originalPing);
            expect(Object.getOwnPropertyDescriptor(client, 'ping')?.enumerable).toBe(true);
            expect(registry.installed).toEqual([]);
        });

        test('an instance-level proxy over an inherited method is removed again', () => {
            const store = new Store();
            registry.register([{ location: { target: store, method: 'get' }, wrapper: syncWrapper }]);
            expect(Object.hasOwn(store, 'get')).toBe(true);

            registry.unregister();

            expect(Object.hasOwn(store, 'get')).toBe(false);
            expect(store.get).toBe(originalGet);
        });

        test('a proxy captured before unregister becomes a pass-through', () => {
            registry.register([
                { location: { target: client, method: 'ping' }, wrapper: syncWrapper },
            ]);
            const captured = client.ping;

            registry.unregister();

            expect(inRootContext(() => captured.call(client))).toBe('pong');
            expect(tracing.exporter.getFinishedSpans()).toHaveLength(0);
        });

        test('leaves a method alone when someone wrapped it after us', () => {
            registry.register([
                { location: { target: client, method: 'ping' }, wrapper: syncWrapper },
            ]);
            const ours = client.ping;
            const theirs = function (this: typeof client): string {
                return ours.call(this);
            };
            client.ping = theirs;

            registry.unregister();

            expect(client.ping).toBe(theirs);
            expect(logger.warn).toHaveBeenCalledWith(
                'ping was replaced after instrumentation; leaving it in place'
            );
            client.ping = originalPing;
        });
    });

    test('spanNameOf prefers an explicit name', () => {
        expect(
            spanNameOf({ location: { module: 'm', object: 'A.prototype', method: 'f' }, wrapper: syncWrapper })
        ).toBe('m.A.prototype.f');
        expect(
            spanNameOf({ location: { method: 'f' }, wrapper: syncWrapper, spanName: 'custom' })
        ).toBe('custom');
    });
});
