/**
 * In-process tracer for instrumentation tests
 */

import { ROOT_CONTEXT } from '@opentelemetry/api';
import type { Tracer } from '@opentelemetry/api';
import {
    BasicTracerProvider,
    InMemorySpanExporter,
    SimpleSpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import { getContextRuntime } from '../context/context-runtime.js';

export interface TestTracing {
    tracer: Tracer;
    exporter: InMemorySpanExporter;
    provider: BasicTracerProvider;
}

/**
 * Tracer whose spans land in an InMemorySpanExporter as soon as they end
 */
export function createTestTracing(): TestTracing {
    const exporter = new InMemorySpanExporter();
    const provider = new BasicTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
    return { tracer: provider.getTracer('test'), exporter, provider };
}

/**
 * Runs fn on a fresh root context so attachments made by the test cannot reach other tests
 */
export function inRootContext<T>(fn: () => T): T {
    return getContextRuntime().with(ROOT_CONTEXT, fn);
}
