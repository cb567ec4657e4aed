/**
 * Finished-span factory for export tests
 */

import { ROOT_CONTEXT, SpanKind, SpanStatusCode, trace } from '@opentelemetry/api';
import type { Attributes, HrTime } from '@opentelemetry/api';
import { Resource } from '@opentelemetry/resources';
import {
    BasicTracerProvider,
    InMemorySpanExporter,
    SimpleSpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import type { ReadableSpan } from '@opentelemetry/sdk-trace-base';
import { ATTR_SERVICE_NAME } from '@opentelemetry/semantic-conventions';

export interface TestSpanOptions {
    parent?: ReadableSpan;
    kind?: SpanKind;
    attributes?: Attributes;
    startTime?: HrTime;
    endTime?: HrTime;
    error?: string;
}

export type SpanFactory = (name: string, options?: TestSpanOptions) => ReadableSpan;

export function createSpanFactory(serviceName = 'test-service'): SpanFactory {
    const exporter = new InMemorySpanExporter();
    const provider = new BasicTracerProvider({
        resource: new Resource({ [ATTR_SERVICE_NAME]: serviceName }),
    });
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
    const tracer = provider.getTracer('export-tests');

    return (name, options = {}) => {
        const parentContext = options.parent
            ? trace.setSpanContext(ROOT_CONTEXT, options.parent.spanContext())
            : ROOT_CONTEXT;
        const span = tracer.startSpan(
            name,
            {
                kind: options.kind ?? SpanKind.INTERNAL,
                ...(options.attributes && { attributes: options.attributes }),
                ...(options.startTime && { startTime: options.startTime }),
            },
            parentContext
        );
        if (options.error !== undefined) {
            span.setStatus({ code: SpanStatusCode.ERROR, message: options.error });
        }
        span.end(options.endTime);

        const finished = exporter.getFinishedSpans().at(-1);
        if (!finished) {
            throw new Error(`span '${name}' was not exported`);
        }
        return finished;
    };
}
