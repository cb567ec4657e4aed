import { trace } from '@opentelemetry/api';
import type { Context, TextMapGetter, TextMapSetter } from '@opentelemetry/api';
import {
    CompositePropagator,
    W3CBaggagePropagator,
    W3CTraceContextPropagator,
} from '@opentelemetry/core';
import { getContextRuntime } from './context-runtime.js';
import { getScopes, setScopes } from './scopes.js';
import type { ScopeToken, ScopeValues } from './scopes.js';
import { ContextError } from './errors.js';

/**
 * Serializable snapshot of the active trace and scopes, for worker threads and queues
 */
export interface ContextCarrier {
    traceparent?: string;
    tracestate?: string;
    baggage?: string;
}

export type HttpHeaders = Record<string, string | string[] | undefined>;

/** Maps an inbound request header onto a scope */
export interface HttpScopeMapping {
    header: string;
    scope: string;
}

const propagator = new CompositePropagator({
    propagators: [new W3CTraceContextPropagator(), new W3CBaggagePropagator()],
});

const headerGetter: TextMapGetter<HttpHeaders> = {
    keys: (carrier) => Object.keys(carrier),
    get: (carrier, key) => {
        const wanted = key.toLowerCase();
        for (const [name, value] of Object.entries(carrier)) {
            if (name.toLowerCase() === wanted) {
                return value;
            }
        }
        return undefined;
    },
};

const recordSetter: TextMapSetter<Record<string, string>> = {
    set: (carrier, key, value) => {
        carrier[key] = value;
    },
};

let httpScopeMappings: HttpScopeMapping[] = [];

/**
 * Replaces the header→scope mappings applied by extractHttpContext
 */
export function setHttpScopeMappings(mappings: readonly HttpScopeMapping[]): void {
    httpScopeMappings = mappings.map((m) => ({ header: m.header.toLowerCase(), scope: m.scope }));
}

export function getHttpScopeMappings(): readonly HttpScopeMapping[] {
    return httpScopeMappings;
}

/**
 * Snapshot of the active context (or ctx) as W3C headers
 */
export function captureContext(ctx: Context = getContextRuntime().active()): ContextCarrier {
    const headers: Record<string, string> = {};
    propagator.inject(ctx, headers, recordSetter);

    const carrier: ContextCarrier = {};
    if (headers['traceparent']) carrier.traceparent = headers['traceparent'];
    if (headers['tracestate']) carrier.tracestate = headers['tracestate'];
    if (headers['baggage']) carrier.baggage = headers['baggage'];
    return carrier;
}

/**
 * Restores a carrier produced by captureContext and runs fn inside it. Spans created in fn
 * join the captured trace and see the captured scopes.
 */
export function runWithContext<T>(carrier: ContextCarrier, fn: () => T): T {
    if (typeof carrier !== 'object' || carrier === null) {
        throw ContextError.invalidCarrier('expected an object');
    }
    const runtime = getContextRuntime();
    const headers: HttpHeaders = {
        traceparent: carrier.traceparent,
        tracestate: carrier.tracestate,
        baggage: carrier.baggage,
    };
    return runtime.with(propagator.extract(runtime.active(), headers, headerGetter), fn);
}

/**
 * Binds fn to the context active now, for callbacks that run later on another async path
 */
export function bindContext<F extends (...args: never[]) => unknown>(fn: F): F {
    const runtime = getContextRuntime();
    return runtime.bind(runtime.active(), fn);
}

/**
 * Adds traceparent/tracestate/baggage for the active context to outbound headers
 */
export function injectTraceHeaders(
    headers: Record<string, string> = {},
    ctx: Context = getContextRuntime().active()
): Record<string, string> {
    propagator.inject(ctx, headers, recordSetter);
    return headers;
}

/**
 * Builds the context for an inbound request: remote parent from traceparent, baggage, and the
 * scopes configured through header mappings.
 */
export function extractHttpContext(
    headers: HttpHeaders,
    ctx: Context = getContextRuntime().active(),
    mappings: readonly HttpScopeMapping[] = httpScopeMappings
): Context {
    let extracted = propagator.extract(ctx, headers, headerGetter);

    const scopes: ScopeValues = {};
    for (const mapping of mappings) {
        const raw = headerGetter.get(headers, mapping.header);
        const value = Array.isArray(raw) ? raw[0] : raw;
        if (value !== undefined && value !== '') {
            scopes[mapping.scope] = value;
        }
    }
    if (Object.keys(scopes).length > 0) {
        extracted = setScopes(scopes, extracted);
    }
    return extracted;
}

/**
 * Attaches the inbound request context until stopScope is called with the returned token
 */
export function startHttpScopes(headers: HttpHeaders): ScopeToken {
    const runtime = getContextRuntime();
    const extracted = extractHttpContext(headers, runtime.active());
    return {
        names: Object.keys(getScopes(extracted)),
        contextToken: runtime.attach(extracted),
    };
}

/**
 * Block form of startHttpScopes for route handlers
 */
export function withHttpContext<T>(headers: HttpHeaders, fn: () => T): T {
    const runtime = getContextRuntime();
    return runtime.with(extractHttpContext(headers, runtime.active()), fn);
}

/**
 * True when ctx carries a span extracted from a remote caller
 */
export function hasRemoteParent(ctx: Context): boolean {
    return trace.getSpanContext(ctx)?.isRemote === true;
}
