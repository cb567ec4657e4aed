import { ExportResultCode } from '@opentelemetry/core';
import type { ExportResult } from '@opentelemetry/core';
import type { ReadableSpan } from '@opentelemetry/sdk-trace-base';
import { toError } from '../../errors/runtime-error.js';
import { getDefaultLogger } from '../../logger/factory.js';
import type { Logger } from '../../logger/types.js';
import { LogComponent } from '../../logger/types.js';
import { ExportError } from '../errors.js';
import { retryWithBackoff, DEFAULT_RETRY_OPTIONS } from '../retry.js';
import type { RetryHooks, RetryOptions } from '../retry.js';
import { isRootSpan } from '../serializer.js';
import { settlesWithin } from '../timeout.js';
import type { SpanSink, TaskQueue } from '../types.js';

export const DEFAULT_FLUSH_TIMEOUT_MS = 30000;

export interface BaseSinkOptions {
    logger?: Logger | undefined;
    /** Retry policy for deliver(); false delivers exactly once */
    retry?: Partial<RetryOptions> | false | undefined;
    retryHooks?: RetryHooks | undefined;
    /** When set, deliveries are queued here instead of running inline */
    deferred?: TaskQueue | undefined;
}

/**
 * Shared export plumbing for sinks: shutdown guard, retry, deferred queuing and in-flight
 * tracking. Subclasses implement deliver() and optionally onFlush()/onShutdown().
 */
export abstract class BaseSpanSink implements SpanSink {
    abstract readonly name: string;

    protected readonly logger: Logger;
    private readonly retry: RetryOptions | undefined;
    private readonly retryHooks: RetryHooks;
    private readonly deferred: TaskQueue | undefined;
    private readonly inFlight = new Set<Promise<unknown>>();
    private closed = false;
    private shutdownPromise: Promise<void> | undefined;

    protected constructor(options: BaseSinkOptions = {}) {
        this.logger = (options.logger ?? getDefaultLogger()).createChild(LogComponent.EXPORT);
        this.retry =
            options.retry === false ? undefined : { ...DEFAULT_RETRY_OPTIONS, ...options.retry };
        this.retryHooks = options.retryHooks ?? {};
        this.deferred = options.deferred;
    }

    protected abstract deliver(spans: ReadableSpan[]): Promise<void>;

    /** Writes out anything the sink buffers itself */
    protected async onFlush(): Promise<void> {}

    protected async onShutdown(): Promise<void> {}

    get isShutdown(): boolean {
        return this.closed;
    }

    export(spans: ReadableSpan[], resultCallback: (result: ExportResult) => void): void {
        void this.exportSpans(spans).then(resultCallback);
    }

    async exportSpans(spans: ReadableSpan[]): Promise<ExportResult> {
        if (this.closed) {
            return { code: ExportResultCode.FAILED, error: ExportError.sinkShutdown(this.name) };
        }
        if (spans.length === 0) {
            return { code: ExportResultCode.SUCCESS };
        }

        if (this.deferred) {
            this.deferred.queueTask(() => this.deliverWithRetry(spans), spans.some(isRootSpan));
            return { code: ExportResultCode.SUCCESS };
        }

        const delivery = this.deliverWithRetry(spans);
        this.inFlight.add(delivery);
        try {
            await delivery;
            return { code: ExportResultCode.SUCCESS };
        } catch (error) {
            const exportError = ExportError.deliveryFailed(this.name, error);
            this.logger.error(exportError.message, { spans: spans.length });
            return { code: ExportResultCode.FAILED, error: exportError };
        } finally {
            this.inFlight.delete(delivery);
        }
    }

    protected deliverWithRetry(spans: ReadableSpan[]): Promise<void> {
        if (!this.retry) {
            return this.deliver(spans);
        }
        return retryWithBackoff(() => this.deliver(spans), this.retry, this.logger, this.retryHooks);
    }

    async flush(timeoutMs: number = DEFAULT_FLUSH_TIMEOUT_MS): Promise<boolean> {
        const work = Promise.allSettled([...this.inFlight]).then(() => this.onFlush());
        const completed = await settlesWithin(
            work.catch((error: unknown) => {
                this.logger.warn(`Flushing sink '${this.name}' failed`, {
                    error: toError(error).message,
                });
            }),
            timeoutMs
        );
        if (!completed) {
            this.logger.warn(`Flushing sink '${this.name}' timed out after ${timeoutMs}ms`);
        }
        return completed;
    }

    async forceFlush(): Promise<void> {
        await this.flush();
    }

    shutdown(): Promise<void> {
        if (!this.shutdownPromise) {
            this.closed = true;
            this.shutdownPromise = this.flush().then(() => this.onShutdown());
        }
        return this.shutdownPromise;
    }
}
