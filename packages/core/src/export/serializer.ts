import { SpanKind, SpanStatusCode } from '@opentelemetry/api';
import type { Attributes, HrTime, SpanContext } from '@opentelemetry/api';
import type { ReadableSpan } from '@opentelemetry/sdk-trace-base';

/** Placeholder the wire format uses for a span without a parent */
export const NO_PARENT = 'None';

export interface SerializedSpanContext {
    trace_id: string;
    span_id: string;
    /** W3C tracestate header value, empty when unset */
    trace_state: string;
}

export interface SerializedEvent {
    name: string;
    timestamp: string;
    attributes: Attributes;
}

export interface SerializedLink {
    context: SerializedSpanContext;
    attributes: Attributes;
}

export interface SerializedSpan {
    name: string;
    context: SerializedSpanContext;
    kind: string;
    parent_id: string;
    start_time: string;
    end_time: string;
    status: {
        status_code: 'UNSET' | 'OK' | 'ERROR';
        description?: string;
    };
    attributes: Attributes;
    events: SerializedEvent[];
    links: SerializedLink[];
    resource: {
        attributes: Attributes;
        schema_url: string;
    };
}

export interface BatchEnvelope {
    batch: SerializedSpan[];
}

/**
 * ISO-8601 UTC with microsecond precision, e.g. `2024-05-01T10:00:00.123456Z`
 */
export function formatHrTime(time: HrTime): string {
    const [seconds, nanos] = time;
    const whole = new Date(seconds * 1000).toISOString().slice(0, 19);
    const micros = String(Math.floor(nanos / 1000)).padStart(6, '0');
    return `${whole}.${micros}Z`;
}

function statusName(code: SpanStatusCode): 'UNSET' | 'OK' | 'ERROR' {
    switch (code) {
        case SpanStatusCode.OK:
            return 'OK';
        case SpanStatusCode.ERROR:
            return 'ERROR';
        default:
            return 'UNSET';
    }
}

function serializeContext(ctx: SpanContext): SerializedSpanContext {
    return {
        trace_id: ctx.traceId,
        span_id: ctx.spanId,
        trace_state: ctx.traceState?.serialize() ?? '',
    };
}

function schemaUrlOf(span: ReadableSpan): string {
    const { resource } = span;
    if ('schemaUrl' in resource && typeof resource.schemaUrl === 'string') {
        return resource.schemaUrl;
    }
    return '';
}

export function serializeSpan(span: ReadableSpan): SerializedSpan {
    const status: SerializedSpan['status'] = { status_code: statusName(span.status.code) };
    if (span.status.message) {
        status.description = span.status.message;
    }

    return {
        name: span.name,
        context: serializeContext(span.spanContext()),
        kind: `SpanKind.${SpanKind[span.kind]}`,
        parent_id: span.parentSpanId || NO_PARENT,
        start_time: formatHrTime(span.startTime),
        end_time: formatHrTime(span.endTime),
        status,
        attributes: { ...span.attributes },
        events: span.events.map((event) => ({
            name: event.name,
            timestamp: formatHrTime(event.time),
            attributes: { ...event.attributes },
        })),
        links: span.links.map((link) => ({
            context: serializeContext(link.context),
            attributes: { ...link.attributes },
        })),
        resource: {
            attributes: { ...span.resource.attributes },
            schema_url: schemaUrlOf(span),
        },
    };
}

export function toBatchEnvelope(spans: readonly ReadableSpan[]): BatchEnvelope {
    return { batch: spans.map(serializeSpan) };
}

/** Newline-delimited JSON, one span per line */
export function toNdjson(spans: readonly ReadableSpan[]): string {
    return spans.map((span) => JSON.stringify(serializeSpan(span))).join('\n');
}

export function isRootSpan(span: ReadableSpan): boolean {
    return !span.parentSpanId;
}

/**
 * Groups spans by trace id, keeping arrival order inside each trace
 */
export function groupByTrace(spans: readonly ReadableSpan[]): Map<string, ReadableSpan[]> {
    const traces = new Map<string, ReadableSpan[]>();
    for (const span of spans) {
        const traceId = span.spanContext().traceId;
        const group = traces.get(traceId);
        if (group) {
            group.push(span);
        } else {
            traces.set(traceId, [span]);
        }
    }
    return traces;
}
