import { SpanKind, SpanStatusCode, trace } from '@opentelemetry/api';
import type { Attributes, Span, Tracer } from '@opentelemetry/api';
import { getContextRuntime } from '../context/context-runtime.js';
import type { ContextToken, DetachOutcome } from '../context/context-runtime.js';
import { toError } from '../errors/runtime-error.js';
import { ATTR_SDK_LANGUAGE, ATTR_SDK_VERSION, ATTR_SPAN_TYPE } from '../semconv.js';
import { INSTRUMENTATION_SCOPE_NAME, SDK_LANGUAGE, SDK_VERSION } from '../version.js';
import { scopeAttributes } from './span-handler.js';
import { isPromiseLike } from './wrappers.js';

export interface CustomEvent {
    name: string;
    attributes?: Attributes;
}

export interface CustomSpanOptions {
    attributes?: Attributes;
    events?: CustomEvent[];
    kind?: SpanKind;
    /** Defaults to the global provider's tracer for this SDK */
    tracer?: Tracer;
}

export interface StopTraceOptions {
    attributes?: Attributes;
    events?: CustomEvent[];
    /** Ends the span with ERROR status */
    error?: unknown;
}

/**
 * Returned by startTrace; the span stays active in the current execution context until stopTrace
 */
export interface TraceToken {
    readonly span: Span;
    readonly contextToken: ContextToken;
}

const stopped = new WeakSet<TraceToken>();

function getTracer(options: CustomSpanOptions): Tracer {
    return options.tracer ?? trace.getTracer(INSTRUMENTATION_SCOPE_NAME, SDK_VERSION);
}

function addEvents(span: Span, events: readonly CustomEvent[] | undefined): void {
    for (const event of events ?? []) {
        span.addEvent(event.name, event.attributes);
    }
}

function startCustomSpan(name: string, options: CustomSpanOptions): Span {
    const parent = getContextRuntime().active();
    const span = getTracer(options).startSpan(
        name,
        {
            kind: options.kind ?? SpanKind.INTERNAL,
            attributes: {
                [ATTR_SDK_VERSION]: SDK_VERSION,
                [ATTR_SDK_LANGUAGE]: SDK_LANGUAGE,
                [ATTR_SPAN_TYPE]: 'custom',
                ...scopeAttributes(parent),
                ...options.attributes,
            },
        },
        parent
    );
    addEvents(span, options.events);
    return span;
}

function endWithError(span: Span, error: unknown): void {
    const exception = toError(error);
    span.recordException(exception);
    span.setStatus({ code: SpanStatusCode.ERROR, message: exception.message });
    span.end();
}

/**
 * Opens a span around code that is not a single call. Spans created until stopTrace are its
 * children.
 *
 * @example
 * ```typescript
 * const token = startTrace('ingest-batch', { attributes: { 'batch.size': rows.length } });
 * try {
 *     await ingest(rows);
 * } finally {
 *     stopTrace(token);
 * }
 * ```
 */
export function startTrace(name: string, options: CustomSpanOptions = {}): TraceToken {
    const runtime = getContextRuntime();
    const span = startCustomSpan(name, options);
    const contextToken = runtime.attach(trace.setSpan(runtime.active(), span));
    return { span, contextToken };
}

/**
 * Ends the span of startTrace and restores the previous context. A second call is a no-op.
 */
export function stopTrace(token: TraceToken, options: StopTraceOptions = {}): DetachOutcome {
    if (stopped.has(token)) {
        return 'already_released';
    }
    stopped.add(token);

    const { span } = token;
    if (options.attributes) {
        span.setAttributes(options.attributes);
    }
    addEvents(span, options.events);
    if (options.error !== undefined) {
        endWithError(span, options.error);
    } else {
        span.setStatus({ code: SpanStatusCode.OK });
        span.end();
    }
    return getContextRuntime().detach(token.contextToken);
}

/**
 * Runs fn inside a new span. Async functions keep the span open until their promise settles;
 * errors are recorded and re-thrown.
 */
export function withTrace<T>(name: string, fn: (span: Span) => T, options: CustomSpanOptions = {}): T {
    const runtime = getContextRuntime();
    const span = startCustomSpan(name, options);

    let result: T;
    try {
        result = runtime.with(trace.setSpan(runtime.active(), span), () => fn(span));
    } catch (error) {
        endWithError(span, error);
        throw error;
    }

    if (isPromiseLike(result)) {
        void result.then(
            () => {
                span.setStatus({ code: SpanStatusCode.OK });
                span.end();
            },
            (error: unknown) => endWithError(span, error)
        );
        return result;
    }

    span.setStatus({ code: SpanStatusCode.OK });
    span.end();
    return result;
}

/**
 * Higher-order form of withTrace; the span is named after the function unless a name is given
 */
export function traceFunction<A extends unknown[], R>(
    fn: (...args: A) => R,
    name: string = fn.name || 'anonymous',
    options: CustomSpanOptions = {}
): (...args: A) => R {
    return function traced(this: unknown, ...args: A): R {
        return withTrace(name, () => fn.apply(this, args), options);
    };
}
