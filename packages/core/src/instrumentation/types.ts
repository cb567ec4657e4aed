import type { AttributeValue, Span, SpanKind, Tracer } from '@opentelemetry/api';
import type { ContextRuntime } from '../context/context-runtime.js';
import type { ScopeValues } from '../context/scopes.js';
import type { Logger } from '../logger/types.js';
import type { SpanHandler } from './span-handler.js';

export type SpanPhase = 'pre_execution' | 'post_execution';

/**
 * Where a method lives. Either `module` (loaded through the registry's module loader) or
 * `target` (an object handed over directly) must be set.
 */
export interface MethodLocation {
    module?: string;
    target?: object;
    /** Dotted path from the module/target to the method holder, e.g. 'Client.prototype' */
    object?: string;
    method: string;
}

/**
 * What an accessor sees. `result` is the return value (or the consumed items of a stream)
 * and is only present in the post_execution phase.
 */
export interface AccessorInput {
    readonly instance: unknown;
    readonly args: readonly unknown[];
    readonly result?: unknown;
    readonly error?: unknown;
    readonly span: Span;
    readonly parentSpan?: Span | undefined;
}

export type AccessorOutput =
    | AttributeValue
    | Record<string, AttributeValue | null | undefined>
    | null
    | undefined;

export type AttributeAccessor = (input: AccessorInput) => AccessorOutput;

/**
 * One attribute of a span or event. Without `attribute`, an object returned by the accessor
 * is spread into individual attributes.
 */
export interface AttributeRule {
    attribute?: string;
    accessor: AttributeAccessor;
    /** Defaults to post_execution */
    phase?: SpanPhase;
}

export interface EventRule {
    name: string;
    attributes: AttributeRule[];
}

/**
 * Declarative attribute mapping for one kind of call, supplied by library adapters.
 * Events are always hydrated after the call; rules sharing an event name merge into one event.
 */
export interface SpanResolver {
    type?: string;
    subtype?: string;
    attributes?: AttributeRule[];
    events?: EventRule[];
}

/**
 * One intercepted invocation as seen by span handlers
 */
export interface CallDetails {
    readonly spec: MethodSpec;
    readonly name: string;
    readonly instance: unknown;
    readonly args: readonly unknown[];
}

/**
 * Everything a wrapper strategy needs to run one call
 */
export interface Invocation {
    readonly call: CallDetails;
    readonly handler: SpanHandler;
    readonly tracer: Tracer;
    readonly runtime: ContextRuntime;
    readonly logger: Logger;
    readonly serviceName: string;
    callOriginal(): unknown;
}

export type WrapperStrategy = (invocation: Invocation) => unknown;

export interface MethodSpec {
    location: MethodLocation;
    wrapper: WrapperStrategy;
    /** Name of a handler registered with the registry; defaults to 'default' */
    handler?: string;
    resolver?: SpanResolver;
    spanName?: string;
    spanKind?: SpanKind;
    /** Run the call without a span */
    skipSpan?: boolean;
    /** Scope strategies: scopes to start around the call */
    scopeName?: string;
    scopeValues?: (call: CallDetails) => ScopeValues;
}

export interface InstallFailure {
    spec: MethodSpec;
    name: string;
    error: Error;
}

export interface InstallResult {
    installed: string[];
    failed: InstallFailure[];
}
