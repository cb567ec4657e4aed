import type { ReadableSpan } from '@opentelemetry/sdk-trace-base';
import { groupByTrace, isRootSpan } from '../serializer.js';
import { BaseSpanSink } from './base-sink.js';
import type { BaseSinkOptions } from './base-sink.js';

export const DEFAULT_TRACE_TIMEOUT_MS = 60_000;

export interface BufferedTraceSinkOptions extends Omit<BaseSinkOptions, 'retry'> {
    /** A trace without a root span is written out once its buffer is this old */
    traceTimeoutMs?: number | undefined;
    now?: (() => Date) | undefined;
}

export interface CompletedTrace {
    traceId: string;
    spans: ReadableSpan[];
    /** When the first span of the trace reached the sink */
    startedAt: Date;
}

/**
 * Collects spans per trace and hands each trace over in one piece once its root span
 * arrives or its buffer times out. Flushing hands over everything still pending.
 * Deliveries are not retried here: writeTrace owns its own retry policy.
 */
export abstract class BufferedTraceSink extends BaseSpanSink {
    protected readonly now: () => Date;
    private readonly traceTimeoutMs: number;
    private readonly traces = new Map<string, CompletedTrace>();

    protected constructor(options: BufferedTraceSinkOptions = {}) {
        super({ ...options, retry: false });
        this.traceTimeoutMs = options.traceTimeoutMs ?? DEFAULT_TRACE_TIMEOUT_MS;
        this.now = options.now ?? (() => new Date());
    }

    protected abstract writeTrace(trace: CompletedTrace): Promise<void>;

    /** Trace ids still waiting for their root span */
    get pendingTraces(): string[] {
        return [...this.traces.keys()];
    }

    protected async deliver(spans: ReadableSpan[]): Promise<void> {
        await this.releaseExpired();

        for (const [traceId, traceSpans] of groupByTrace(spans)) {
            let trace = this.traces.get(traceId);
            if (!trace) {
                trace = { traceId, spans: [], startedAt: this.now() };
                this.traces.set(traceId, trace);
            }
            trace.spans.push(...traceSpans);
            if (traceSpans.some(isRootSpan)) {
                await this.release(traceId);
            }
        }
    }

    protected override async onFlush(): Promise<void> {
        for (const traceId of this.pendingTraces) {
            await this.release(traceId);
        }
    }

    private async releaseExpired(): Promise<void> {
        const cutoff = this.now().getTime() - this.traceTimeoutMs;
        for (const trace of [...this.traces.values()]) {
            if (trace.startedAt.getTime() <= cutoff) {
                this.logger.debug(`Trace ${trace.traceId} timed out waiting for its root span`);
                await this.release(trace.traceId);
            }
        }
    }

    private async release(traceId: string): Promise<void> {
        const trace = this.traces.get(traceId);
        if (!trace) {
            return;
        }
        this.traces.delete(traceId);
        await this.writeTrace(trace);
    }
}

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/** `YYYY-MM-DD_HH.MM.SS` in UTC */
export function formatFileTimestamp(date: Date): string {
    const day = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
    const time = `${pad(date.getUTCHours())}.${pad(date.getUTCMinutes())}.${pad(date.getUTCSeconds())}`;
    return `${day}_${time}`;
}
