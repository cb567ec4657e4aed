import { toError } from '../errors/runtime-error.js';
import { getDefaultLogger } from '../logger/factory.js';
import type { Logger } from '../logger/types.js';
import { LogComponent } from '../logger/types.js';
import type { DeliveryTask, TaskQueue } from './types.js';

export const DEFAULT_MAX_WAIT_MS = 30_000;
export const DEFAULT_POLL_INTERVAL_MS = 1_000;

export interface DeferredDeliveryOptions {
    /**
     * Resolves when the host allows background work, e.g. once the current serverless
     * invocation has returned its response. Awaited again before every cycle.
     */
    readySignal: () => Promise<void>;
    /** Upper bound on how long one cycle waits for a root span */
    maxWaitMs?: number | undefined;
    pollIntervalMs?: number | undefined;
    logger?: Logger | undefined;
    sleep?: ((ms: number) => Promise<void>) | undefined;
    now?: (() => number) | undefined;
}

export interface DeliveryCycleResult {
    delivered: number;
    failed: number;
    rootSpanSeen: boolean;
}

interface QueuedTask {
    task: DeliveryTask;
    isRootSpan: boolean;
}

const unrefSleep = (ms: number): Promise<void> =>
    new Promise((resolve) => {
        setTimeout(resolve, ms).unref();
    });

/**
 * Holds delivery work until the host signals it is safe to run, then drains it. A cycle keeps
 * polling the queue until a batch containing a root span went out or maxWaitMs elapsed, and
 * always delivers what is left before waiting for the next signal.
 */
export class DeferredDeliveryQueue implements TaskQueue {
    private readonly readySignal: () => Promise<void>;
    private readonly maxWaitMs: number;
    private readonly pollIntervalMs: number;
    private readonly logger: Logger;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly now: () => number;
    private queue: QueuedTask[] = [];
    private running = false;

    constructor(options: DeferredDeliveryOptions) {
        this.readySignal = options.readySignal;
        this.maxWaitMs = options.maxWaitMs ?? DEFAULT_MAX_WAIT_MS;
        this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
        this.logger = (options.logger ?? getDefaultLogger()).createChild(LogComponent.DELIVERY);
        this.sleep = options.sleep ?? unrefSleep;
        this.now = options.now ?? Date.now;
    }

    get size(): number {
        return this.queue.length;
    }

    get isRunning(): boolean {
        return this.running;
    }

    queueTask(task: DeliveryTask, isRootSpan: boolean): void {
        this.queue.push({ task, isRootSpan });
    }

    /** Starts the background loop; calling it again while running does nothing */
    start(): void {
        if (this.running) {
            return;
        }
        this.running = true;
        void this.loop();
    }

    /**
     * Stops the loop and delivers whatever is still queued
     */
    async stop(): Promise<DeliveryCycleResult> {
        this.running = false;
        return this.drainOnce();
    }

    /** Delivers everything queued now, without waiting for the ready signal */
    drain(): Promise<DeliveryCycleResult> {
        return this.drainOnce();
    }

    async runCycle(): Promise<DeliveryCycleResult> {
        const startedAt = this.now();
        const total: DeliveryCycleResult = { delivered: 0, failed: 0, rootSpanSeen: false };

        for (;;) {
            accumulate(total, await this.drainOnce());
            const elapsed = this.now() - startedAt;
            if (total.rootSpanSeen || elapsed >= this.maxWaitMs) {
                break;
            }
            this.logger.debug('Waiting for root span', { elapsedMs: elapsed });
            await this.sleep(this.pollIntervalMs);
        }

        if (this.queue.length > 0) {
            accumulate(total, await this.drainOnce());
        }

        this.logger.debug('Delivery cycle finished', {
            delivered: total.delivered,
            failed: total.failed,
            rootSpanSeen: total.rootSpanSeen,
        });
        return total;
    }

    private async loop(): Promise<void> {
        while (this.running) {
            try {
                await this.readySignal();
            } catch (error) {
                this.logger.error('Ready signal failed; stopping deferred delivery', {
                    error: toError(error).message,
                });
                this.running = false;
                return;
            }
            if (!this.running) {
                return;
            }
            await this.runCycle();
        }
    }

    private async drainOnce(): Promise<DeliveryCycleResult> {
        const batch = this.queue;
        this.queue = [];
        const result: DeliveryCycleResult = { delivered: 0, failed: 0, rootSpanSeen: false };

        for (const { task, isRootSpan } of batch) {
            result.rootSpanSeen ||= isRootSpan;
            try {
                await task();
                result.delivered++;
            } catch (error) {
                result.failed++;
                this.logger.error('Deferred delivery failed; batch dropped', {
                    error: toError(error).message,
                });
            }
        }
        return result;
    }
}

function accumulate(total: DeliveryCycleResult, next: DeliveryCycleResult): void {
    total.delivered += next.delivered;
    total.failed += next.failed;
    total.rootSpanSeen ||= next.rootSpanSeen;
}
