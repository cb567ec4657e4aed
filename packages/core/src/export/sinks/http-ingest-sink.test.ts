import { describe, test, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { ExportResultCode } from '@opentelemetry/core';
import { createMockLogger } from '../../logger/test-utils.js';
import type { Logger } from '../../logger/types.js';
import { DeferredDeliveryQueue } from '../deferred-delivery.js';
import { ExportErrorCode } from '../error-codes.js';
import { createSpanFactory } from '../test-utils.js';
import { HttpIngestSink } from './http-ingest-sink.js';
import type { HttpIngestSinkOptions } from './http-ingest-sink.js';

const endpoint = 'https://ingest.example.test/api/v1/trace/ingest';

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;
type FetchMock = Mock<FetchFn>;

function respondWith(...statuses: number[]): FetchMock {
    const queue = [...statuses];
    return vi.fn<FetchFn>(async () => new Response(null, { status: queue.shift() ?? 200 }));
}

describe('HttpIngestSink', () => {
    const makeSpan = createSpanFactory('orders');
    let logger: Logger;
    const noSleep = { sleep: async () => {} };

    function createSink(fetchMock: FetchMock, extra: Partial<HttpIngestSinkOptions> = {}) {
        return new HttpIngestSink({
            endpoint,
            apiKey: 'test-secret',
            fetch: fetchMock,
            logger,
            retry: { maxRetries: 3, baseDelayMs: 1, maxDelayMs: 1, jitter: 0 },
            retryHooks: noSleep,
            ...extra,
        });
    }

    beforeEach(() => {
        logger = createMockLogger();
    });

    test('posts the batch envelope with the api key', async () => {
        const fetchMock = respondWith(202);
        const span = makeSpan('place-order');

        const result = await createSink(fetchMock).exportSpans([span]);

        expect(result.code).toBe(ExportResultCode.SUCCESS);
        expect(fetchMock).toHaveBeenCalledTimes(1);
        const [url, init] = fetchMock.mock.calls[0] ?? [];
        expect(url).toBe(endpoint);
        expect(init?.method).toBe('POST');
        expect(init?.headers).toEqual({
            'Content-Type': 'application/json',
            'x-api-key': 'test-secret',
        });
        const body: unknown = JSON.parse(String(init?.body));
        expect(body).toMatchObject({
            batch: [{ name: 'place-order', parent_id: 'None' }],
        });
    });

    test('retries 5xx responses until one succeeds', async () => {
        const fetchMock = respondWith(503, 502, 204);

        const result = await createSink(fetchMock).exportSpans([makeSpan('a')]);

        expect(result.code).toBe(ExportResultCode.SUCCESS);
        expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    test('a 401 fails without retrying', async () => {
        const fetchMock = respondWith(401);

        const result = await createSink(fetchMock).exportSpans([makeSpan('a')]);

        expect(result.code).toBe(ExportResultCode.FAILED);
        expect(result.error).toMatchObject({ code: ExportErrorCode.DELIVERY_FAILED });
        expect(fetchMock).toHaveBeenCalledTimes(1);
        expect(logger.error).toHaveBeenCalledWith(
            "Sink 'http' failed to deliver spans: Ingest endpoint responded with HTTP 401",
            { spans: 1 }
        );
    });

    test('network errors are retried up to maxRetries attempts', async () => {
        const fetchMock = vi.fn<FetchFn>(async () => {
            throw new TypeError('fetch failed');
        });

        const result = await createSink(fetchMock).exportSpans([makeSpan('a')]);

        expect(result.code).toBe(ExportResultCode.FAILED);
        expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    test('aborts requests that exceed the timeout', async () => {
        const fetchMock = vi.fn<FetchFn>(
            (_input, init) =>
                new Promise<Response>((_resolve, reject) => {
                    init?.signal?.addEventListener('abort', () => {
                        const error = new Error('This operation was aborted');
                        error.name = 'AbortError';
                        reject(error);
                    });
                })
        );

        const result = await createSink(fetchMock, { timeoutMs: 5, retry: false }).exportSpans([
            makeSpan('slow'),
        ]);

        expect(result.code).toBe(ExportResultCode.FAILED);
        expect(result.error?.message).toBe(
            `Sink 'http' failed to deliver spans: POST ${endpoint} timed out after 5ms`
        );
    });

    test('exports after shutdown fail without I/O and shutdown is idempotent', async () => {
        const fetchMock = respondWith(200);
        const sink = createSink(fetchMock);

        await sink.shutdown();
        await sink.shutdown();
        const result = await sink.exportSpans([makeSpan('late')]);

        expect(result.code).toBe(ExportResultCode.FAILED);
        expect(result.error).toMatchObject({ code: ExportErrorCode.SINK_SHUTDOWN });
        expect(fetchMock).not.toHaveBeenCalled();
    });

    test('queues the request when deferred delivery is configured', async () => {
        const fetchMock = respondWith(200);
        const queue = new DeferredDeliveryQueue({
            readySignal: async () => {},
            logger,
        });
        const root = makeSpan('handler');

        const result = await createSink(fetchMock, { deferred: queue }).exportSpans([root]);

        expect(result.code).toBe(ExportResultCode.SUCCESS);
        expect(fetchMock).not.toHaveBeenCalled();
        expect(queue.size).toBe(1);

        const cycle = await queue.runCycle();

        expect(cycle).toEqual({ delivered: 1, failed: 0, rootSpanSeen: true });
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });
});
