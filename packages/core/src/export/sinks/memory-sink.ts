import type { ReadableSpan } from '@opentelemetry/sdk-trace-base';
import { serializeSpan } from '../serializer.js';
import type { SerializedSpan } from '../serializer.js';
import { BaseSpanSink } from './base-sink.js';
import type { BaseSinkOptions } from './base-sink.js';

/**
 * Keeps delivered spans in memory. Used by tests and by hosts that read spans back themselves.
 */
export class InMemorySpanSink extends BaseSpanSink {
    readonly name = 'memory';
    private spans: ReadableSpan[] = [];

    constructor(options: BaseSinkOptions = {}) {
        super({ retry: false, ...options });
    }

    protected async deliver(spans: ReadableSpan[]): Promise<void> {
        this.spans.push(...spans);
    }

    getFinishedSpans(): ReadableSpan[] {
        return [...this.spans];
    }

    getSerializedSpans(): SerializedSpan[] {
        return this.spans.map(serializeSpan);
    }

    reset(): void {
        this.spans = [];
    }
}
