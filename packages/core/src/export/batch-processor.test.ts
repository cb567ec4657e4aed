import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { context } from '@opentelemetry/api';
import { ExportResultCode, isTracingSuppressed } from '@opentelemetry/core';
import type { ReadableSpan } from '@opentelemetry/sdk-trace-base';
import { installContextRuntime } from '../context/context-runtime.js';
import { createMockLogger } from '../logger/test-utils.js';
import type { Logger } from '../logger/types.js';
import { BatchSpanProcessor } from './batch-processor.js';
import { BaseSpanSink } from './sinks/base-sink.js';
import { InMemorySpanSink } from './sinks/memory-sink.js';
import { createSpanFactory } from './test-utils.js';

class HangingSink extends BaseSpanSink {
    readonly name = 'hanging';

    constructor(logger: Logger) {
        super({ logger, retry: false });
    }

    protected deliver(_spans: ReadableSpan[]): Promise<void> {
        return new Promise(() => {});
    }
}

class GatedSink extends BaseSpanSink {
    readonly name = 'gated';
    readonly batches: string[][] = [];
    private release: () => void = () => {};
    private readonly gate = new Promise<void>((resolve) => {
        this.release = resolve;
    });

    constructor(logger: Logger) {
        super({ logger, retry: false });
    }

    openGate(): void {
        this.release();
    }

    protected async deliver(spans: ReadableSpan[]): Promise<void> {
        this.batches.push(spans.map((span) => span.name));
        await this.gate;
    }
}

describe('BatchSpanProcessor', () => {
    const makeSpan = createSpanFactory('batch-tests');
    let logger: Logger;
    let sink: InMemorySpanSink;

    beforeEach(() => {
        logger = createMockLogger();
        sink = new InMemorySpanSink({ logger });
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    test('exports as soon as a full batch is buffered', async () => {
        const processor = new BatchSpanProcessor(
            sink,
            { maxExportBatchSize: 2, scheduledDelayMillis: 60_000 },
            logger
        );

        processor.onEnd(makeSpan('a'));
        expect(processor.pending).toBe(1);
        processor.onEnd(makeSpan('b'));

        await vi.waitFor(() => expect(sink.getFinishedSpans()).toHaveLength(2));
        expect(processor.pending).toBe(0);
    });

    test('queues at most one export while another is in flight', async () => {
        const gated = new GatedSink(logger);
        const processor = new BatchSpanProcessor(
            gated,
            { maxExportBatchSize: 2, scheduledDelayMillis: 60_000 },
            logger
        );

        processor.onEnd(makeSpan('a'));
        processor.onEnd(makeSpan('b'));
        await vi.waitFor(() => expect(gated.batches).toEqual([['a', 'b']]));
        expect(processor.exportScheduled).toBe(false);

        processor.onEnd(makeSpan('c'));
        processor.onEnd(makeSpan('d'));
        expect(processor.exportScheduled).toBe(true);
        processor.onEnd(makeSpan('e'));
        processor.onEnd(makeSpan('f'));
        expect(processor.exportScheduled).toBe(true);
        expect(processor.pending).toBe(4);

        gated.openGate();

        await vi.waitFor(() =>
            expect(gated.batches).toEqual([
                ['a', 'b'],
                ['c', 'd'],
                ['e', 'f'],
            ])
        );
        expect(processor.pending).toBe(0);
        expect(processor.exportScheduled).toBe(false);
    });

    test('exports a partial batch after the scheduled delay', async () => {
        vi.useFakeTimers();
        const processor = new BatchSpanProcessor(sink, { scheduledDelayMillis: 5000 }, logger);

        processor.onEnd(makeSpan('lonely'));
        await vi.advanceTimersByTimeAsync(4999);
        expect(sink.getFinishedSpans()).toHaveLength(0);

        await vi.advanceTimersByTimeAsync(1);
        await vi.waitFor(() => expect(sink.getFinishedSpans()).toHaveLength(1));
    });

    test('drops the newest spans on overflow and logs once per episode', async () => {
        const processor = new BatchSpanProcessor(
            sink,
            { maxQueueSize: 2, maxExportBatchSize: 2, scheduledDelayMillis: 60_000 },
            logger
        );

        for (const name of ['a', 'b', 'c', 'd']) {
            processor.onEnd(makeSpan(name));
        }

        expect(logger.warn).toHaveBeenCalledTimes(1);
        expect(logger.warn).toHaveBeenCalledWith(
            'Span buffer full (2); dropping new spans until it drains'
        );

        await expect(processor.drain()).resolves.toBe(true);
        expect(sink.getFinishedSpans().map((s) => s.name)).toEqual(['a', 'b']);

        processor.onEnd(makeSpan('e'));
        expect(logger.info).toHaveBeenCalledWith('Span buffer drained; 2 span(s) were dropped');
    });

    test('drain exports everything in batches and resolves true', async () => {
        const processor = new BatchSpanProcessor(
            sink,
            { maxExportBatchSize: 2, scheduledDelayMillis: 60_000 },
            logger
        );
        const exportSpans = vi.spyOn(sink, 'exportSpans');

        processor.onEnd(makeSpan('a'));
        await expect(processor.drain(1000)).resolves.toBe(true);

        expect(sink.getFinishedSpans()).toHaveLength(1);
        expect(exportSpans).toHaveBeenCalledTimes(1);
    });

    test('drain resolves false when the sink does not finish in time', async () => {
        const processor = new BatchSpanProcessor(new HangingSink(logger), {}, logger);

        processor.onEnd(makeSpan('stuck'));

        await expect(processor.drain(20)).resolves.toBe(false);
    });

    test('runs sink I/O with tracing suppressed', async () => {
        installContextRuntime();
        const suppressed: boolean[] = [];
        class ProbeSink extends InMemorySpanSink {
            protected override async deliver(spans: ReadableSpan[]): Promise<void> {
                suppressed.push(isTracingSuppressed(context.active()));
                await super.deliver(spans);
            }
        }
        const processor = new BatchSpanProcessor(new ProbeSink({ logger }), {}, logger);

        processor.onEnd(makeSpan('a'));
        await processor.drain();

        expect(suppressed).toEqual([true]);
    });

    test('shutdown is idempotent and later spans are ignored', async () => {
        const processor = new BatchSpanProcessor(sink, {}, logger);
        processor.onEnd(makeSpan('before'));

        const first = processor.shutdown();
        expect(processor.shutdown()).toBe(first);
        await first;

        processor.onEnd(makeSpan('after'));
        expect(processor.pending).toBe(0);
        expect(sink.getFinishedSpans().map((s) => s.name)).toEqual(['before']);
        expect(sink.isShutdown).toBe(true);
        await expect(sink.exportSpans([makeSpan('late')])).resolves.toMatchObject({
            code: ExportResultCode.FAILED,
        });
    });
});
