import { context, TraceFlags } from '@opentelemetry/api';
import type { Context } from '@opentelemetry/api';
import { ExportResultCode, suppressTracing } from '@opentelemetry/core';
import type { ExportResult } from '@opentelemetry/core';
import type { ReadableSpan, Span, SpanProcessor } from '@opentelemetry/sdk-trace-base';
import { toError } from '../errors/runtime-error.js';
import { getDefaultLogger } from '../logger/factory.js';
import type { Logger } from '../logger/types.js';
import { LogComponent } from '../logger/types.js';
import { settlesWithin } from './timeout.js';
import type { SpanSink } from './types.js';

export interface BatchProcessorOptions {
    maxQueueSize: number;
    maxExportBatchSize: number;
    scheduledDelayMillis: number;
    exportTimeoutMillis: number;
}

export const DEFAULT_BATCH_OPTIONS: BatchProcessorOptions = {
    maxQueueSize: 2048,
    maxExportBatchSize: 512,
    scheduledDelayMillis: 5000,
    exportTimeoutMillis: 30000,
};

/**
 * Buffers finished spans and hands them to the sink in batches of maxExportBatchSize, or after
 * scheduledDelayMillis when fewer arrived. One export runs at a time. When the buffer is full
 * new spans are dropped; each overflow episode is logged once.
 */
export class BatchSpanProcessor implements SpanProcessor {
    private readonly options: BatchProcessorOptions;
    private readonly logger: Logger;
    private buffer: ReadableSpan[] = [];
    private timer: NodeJS.Timeout | undefined;
    private exportChain: Promise<void> = Promise.resolve();
    private scheduled = false;
    private droppedInEpisode = 0;
    private closed = false;
    private shutdownPromise: Promise<void> | undefined;

    constructor(
        private readonly sink: SpanSink,
        options: Partial<BatchProcessorOptions> = {},
        logger?: Logger
    ) {
        this.options = { ...DEFAULT_BATCH_OPTIONS, ...options };
        if (this.options.maxExportBatchSize > this.options.maxQueueSize) {
            this.options.maxExportBatchSize = this.options.maxQueueSize;
        }
        this.logger = (logger ?? getDefaultLogger()).createChild(LogComponent.EXPORT);
    }

    /** Spans waiting to be exported */
    get pending(): number {
        return this.buffer.length;
    }

    /** True while a batch export is queued but has not started */
    get exportScheduled(): boolean {
        return this.scheduled;
    }

    onStart(_span: Span, _parentContext: Context): void {}

    onEnd(span: ReadableSpan): void {
        if (this.closed || (span.spanContext().traceFlags & TraceFlags.SAMPLED) === 0) {
            return;
        }

        if (this.buffer.length >= this.options.maxQueueSize) {
            if (this.droppedInEpisode === 0) {
                this.logger.warn(
                    `Span buffer full (${this.options.maxQueueSize}); dropping new spans until it drains`
                );
            }
            this.droppedInEpisode++;
            return;
        }
        if (this.droppedInEpisode > 0) {
            this.logger.info(`Span buffer drained; ${this.droppedInEpisode} span(s) were dropped`);
            this.droppedInEpisode = 0;
        }

        this.buffer.push(span);
        if (this.buffer.length >= this.options.maxExportBatchSize) {
            void this.scheduleExport();
        } else {
            this.startTimer();
        }
    }

    /**
     * Exports everything buffered and flushes the sink
     * @returns false when timeoutMs elapsed first
     */
    async drain(timeoutMs: number = this.options.exportTimeoutMillis): Promise<boolean> {
        this.clearTimer();
        const work = this.enqueue(async () => {
            while (this.buffer.length > 0) {
                await this.exportBatch();
            }
        }).then(() => this.sink.flush(timeoutMs));

        const completed = await settlesWithin(work, timeoutMs);
        if (!completed) {
            this.logger.warn(`Flush did not complete within ${timeoutMs}ms`, {
                pending: this.buffer.length,
            });
            return false;
        }
        return work;
    }

    async forceFlush(): Promise<void> {
        await this.drain();
    }

    shutdown(): Promise<void> {
        if (!this.shutdownPromise) {
            this.closed = true;
            this.shutdownPromise = this.drain().then(() => this.sink.shutdown());
        }
        return this.shutdownPromise;
    }

    private scheduleExport(): Promise<void> {
        this.clearTimer();
        // the queued step exports whatever is buffered when it starts
        if (this.scheduled) {
            return this.exportChain;
        }
        this.scheduled = true;
        return this.enqueue(async () => {
            this.scheduled = false;
            await this.exportBatch();
            if (this.buffer.length >= this.options.maxExportBatchSize) {
                void this.scheduleExport();
            } else if (this.buffer.length > 0) {
                this.startTimer();
            }
        });
    }

    /** Runs step after every export already queued */
    private enqueue(step: () => Promise<void>): Promise<void> {
        const next = this.exportChain.then(step);
        this.exportChain = next.catch((error: unknown) => {
            this.logger.error('Span export step failed', { error: toError(error).message });
        });
        return this.exportChain;
    }

    private async exportBatch(): Promise<void> {
        const batch = this.buffer.splice(0, this.options.maxExportBatchSize);
        if (batch.length === 0) {
            return;
        }

        const pending = new Promise<ExportResult>((resolve) => {
            // sink I/O must not produce spans of its own
            context.with(suppressTracing(context.active()), () => this.sink.export(batch, resolve));
        });
        const completed = await settlesWithin(pending, this.options.exportTimeoutMillis);
        if (!completed) {
            this.logger.error(
                `Export of ${batch.length} span(s) timed out after ${this.options.exportTimeoutMillis}ms`
            );
            return;
        }

        const result = await pending;
        if (result.code === ExportResultCode.FAILED) {
            this.logger.error(`Export of ${batch.length} span(s) failed`, {
                error: result.error?.message,
            });
        }
    }

    private startTimer(): void {
        if (this.timer) {
            return;
        }
        this.timer = setTimeout(() => {
            this.timer = undefined;
            void this.scheduleExport();
        }, this.options.scheduledDelayMillis);
        this.timer.unref();
    }

    private clearTimer(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = undefined;
        }
    }
}
