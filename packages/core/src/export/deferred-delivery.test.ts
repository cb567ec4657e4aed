import { describe, test, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { createMockLogger } from '../logger/test-utils.js';
import type { Logger } from '../logger/types.js';
import { DeferredDeliveryQueue } from './deferred-delivery.js';
import type { DeferredDeliveryOptions } from './deferred-delivery.js';

describe('DeferredDeliveryQueue', () => {
    let logger: Logger;
    let now: number;
    let sleep: Mock<(ms: number) => Promise<void>>;

    function createQueue(extra: Partial<DeferredDeliveryOptions> = {}): DeferredDeliveryQueue {
        return new DeferredDeliveryQueue({
            readySignal: async () => {},
            maxWaitMs: 3000,
            pollIntervalMs: 1000,
            logger,
            sleep,
            now: () => now,
            ...extra,
        });
    }

    beforeEach(() => {
        logger = createMockLogger();
        now = 0;
        sleep = vi.fn(async (ms: number) => {
            now += ms;
        });
    });

    test('a cycle ends as soon as a root span batch was delivered', async () => {
        const queue = createQueue();
        const child = vi.fn(async () => {});
        const root = vi.fn(async () => {});
        queue.queueTask(child, false);
        queue.queueTask(root, true);

        const result = await queue.runCycle();

        expect(result).toEqual({ delivered: 2, failed: 0, rootSpanSeen: true });
        expect(child).toHaveBeenCalledTimes(1);
        expect(root).toHaveBeenCalledTimes(1);
        expect(sleep).not.toHaveBeenCalled();
        expect(queue.size).toBe(0);
    });

    test('without a root span the cycle polls until maxWaitMs', async () => {
        const queue = createQueue();
        queue.queueTask(async () => {}, false);

        const result = await queue.runCycle();

        expect(result).toEqual({ delivered: 1, failed: 0, rootSpanSeen: false });
        expect(sleep.mock.calls).toEqual([[1000], [1000], [1000]]);
    });

    test('work queued while polling is picked up on the next poll', async () => {
        const queue = createQueue();
        const late = vi.fn(async () => {});
        queue.queueTask(async () => {}, false);
        sleep.mockImplementationOnce(async (ms: number) => {
            now += ms;
            queue.queueTask(late, true);
        });

        const result = await queue.runCycle();

        expect(result).toEqual({ delivered: 2, failed: 0, rootSpanSeen: true });
        expect(late).toHaveBeenCalledTimes(1);
        expect(sleep).toHaveBeenCalledTimes(1);
    });

    test('failed deliveries are logged and not queued again', async () => {
        const queue = createQueue();
        const failing = vi.fn(async () => {
            throw new Error('ingest unavailable');
        });
        queue.queueTask(failing, true);

        const result = await queue.runCycle();

        expect(result).toEqual({ delivered: 0, failed: 1, rootSpanSeen: true });
        expect(queue.size).toBe(0);
        expect(failing).toHaveBeenCalledTimes(1);
        expect(logger.error).toHaveBeenCalledWith('Deferred delivery failed; batch dropped', {
            error: 'ingest unavailable',
        });
    });

    test('the background loop waits for the ready signal before delivering', async () => {
        let release: () => void = () => {};
        const readySignal = vi.fn(
            () =>
                new Promise<void>((resolve) => {
                    release = resolve;
                })
        );
        const queue = createQueue({ readySignal });
        const task = vi.fn(async () => {});
        queue.queueTask(task, true);

        queue.start();
        queue.start();
        await Promise.resolve();
        expect(queue.isRunning).toBe(true);
        expect(task).not.toHaveBeenCalled();

        release();
        await vi.waitFor(() => expect(task).toHaveBeenCalledTimes(1));
        await vi.waitFor(() => expect(readySignal).toHaveBeenCalledTimes(2));

        await queue.stop();
        expect(queue.isRunning).toBe(false);
    });

    test('stop delivers whatever is still queued', async () => {
        const queue = createQueue({ readySignal: () => new Promise<void>(() => {}) });
        const task = vi.fn(async () => {});
        queue.start();
        queue.queueTask(task, false);

        const result = await queue.stop();

        expect(result).toEqual({ delivered: 1, failed: 0, rootSpanSeen: false });
        expect(task).toHaveBeenCalledTimes(1);
    });
});
