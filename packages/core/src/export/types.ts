import type { ExportResult } from '@opentelemetry/core';
import type { ReadableSpan, SpanExporter } from '@opentelemetry/sdk-trace-base';

/**
 * Destination for finished spans. Extends the OpenTelemetry exporter contract with a bounded
 * flush that reports whether it completed in time.
 */
export interface SpanSink extends SpanExporter {
    /** Short identifier used in logs, e.g. 'http', 'file' */
    readonly name: string;

    export(spans: ReadableSpan[], resultCallback: (result: ExportResult) => void): void;

    /** Promise form of export(); never rejects */
    exportSpans(spans: ReadableSpan[]): Promise<ExportResult>;

    /**
     * Waits for in-flight deliveries and buffered data
     * @returns false when timeoutMs elapsed first
     */
    flush(timeoutMs?: number): Promise<boolean>;

    forceFlush(): Promise<void>;

    /** Flushes, releases resources and turns later exports into FAILED results */
    shutdown(): Promise<void>;
}

/** Closure delivering one batch; failures are the queue's to log */
export type DeliveryTask = () => Promise<void>;

/**
 * Accepts delivery work to run later instead of inline with export()
 */
export interface TaskQueue {
    queueTask(task: DeliveryTask, isRootSpan: boolean): void;
}
