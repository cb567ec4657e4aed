import { SpanKind, SpanStatusCode, trace } from '@opentelemetry/api';
import type { Context, Span } from '@opentelemetry/api';
import { isTracingSuppressed } from '@opentelemetry/core';
import { toError } from '../errors/runtime-error.js';
import { SpanEventBuffer } from './span-handler.js';
import type { CallOutcome } from './span-handler.js';
import type { Invocation, SpanPhase, SpanResolver } from './types.js';

export type LifecycleState =
    | 'created'
    | 'pre_tracing'
    | 'active'
    | 'hydration'
    | 'post_task'
    | 'finished'
    | 'post_tracing'
    | 'closed';

/**
 * Drives one intercepted call through its span's states:
 * created → pre_tracing → active → hydration → post_task → finished → post_tracing → closed.
 *
 * Every handler hook runs guarded: a hook that throws is logged and the call's own result or
 * error is returned to the caller untouched.
 */
export class SpanLifecycle {
    private currentState: LifecycleState = 'created';
    private span: Span | undefined;
    private parentSpan: Span | undefined;
    private resolver: SpanResolver | undefined;
    private spanContext: Context;
    private detectedError = false;
    private readonly events = new SpanEventBuffer();
    private runPostTracing: ((result: unknown) => void) | undefined;

    constructor(private readonly invocation: Invocation) {
        this.spanContext = invocation.runtime.active();
    }

    get state(): LifecycleState {
        return this.currentState;
    }

    /** Undefined when the span was skipped */
    get activeSpan(): Span | undefined {
        return this.span;
    }

    begin(): void {
        const { call, handler, runtime, tracer, serviceName } = this.invocation;
        this.currentState = 'pre_tracing';

        const pre = this.safely('preTracing', () => handler.preTracing(call));
        this.resolver = pre?.resolver ?? call.spec.resolver;
        const token = pre?.token;
        this.runPostTracing = runtime.bindFrame((result: unknown) =>
            handler.postTracing(call, result, token)
        );

        const parentContext = runtime.active();
        this.spanContext = parentContext;
        const skip =
            isTracingSuppressed(parentContext) ||
            call.spec.skipSpan === true ||
            this.safely('skipSpan', () => handler.skipSpan(call)) === true;

        if (!skip) {
            const span = tracer.startSpan(
                call.name,
                { kind: call.spec.spanKind ?? SpanKind.INTERNAL },
                parentContext
            );
            this.span = span;
            this.parentSpan = trace.getSpan(parentContext);
            this.spanContext = trace.setSpan(parentContext, span);

            const isRoot = trace.getSpanContext(parentContext) === undefined;
            this.safely('setDefaultAttributes', () =>
                handler.setDefaultAttributes(span, {
                    call,
                    resolver: this.resolver,
                    parentContext,
                    isRoot,
                    serviceName,
                })
            );
            this.hydrate('pre_execution', {});
        }

        this.currentState = 'active';
    }

    /**
     * Runs fn with the span (or, when skipped, the pre-tracing context) active
     */
    runInSpan<T>(fn: () => T): T {
        return this.invocation.runtime.with(this.spanContext, fn);
    }

    /** The call returned (or its promise resolved, or its stream ended) */
    complete(result: unknown): void {
        const span = this.span;
        if (!span || this.isFinished()) {
            this.currentState = 'finished';
            return;
        }

        this.hydrate('post_execution', { result });
        if (!this.detectedError) {
            span.setStatus({ code: SpanStatusCode.OK });
        }
        this.postTask(span, { result });
        this.finish(span);
    }

    /** The call threw, rejected, or its stream failed or was cancelled */
    fail(error: unknown): void {
        const span = this.span;
        if (!span || this.isFinished()) {
            this.currentState = 'finished';
            return;
        }

        const exception = toError(error);
        this.safely('recordException', () => {
            span.recordException(exception);
            span.setStatus({ code: SpanStatusCode.ERROR, message: exception.message });
        });
        this.hydrate('post_execution', { error });
        this.postTask(span, { error });
        this.finish(span);
    }

    /**
     * Symmetric cleanup of whatever preTracing set up. Runs at most once, in the execution
     * context the call was made in.
     */
    close(result?: unknown): void {
        if (this.currentState === 'post_tracing' || this.currentState === 'closed') {
            return;
        }
        this.currentState = 'post_tracing';
        const runPostTracing = this.runPostTracing;
        if (runPostTracing) {
            this.safely('postTracing', () => runPostTracing(result));
        }
        this.currentState = 'closed';
    }

    private isFinished(): boolean {
        return (
            this.currentState === 'finished' ||
            this.currentState === 'post_tracing' ||
            this.currentState === 'closed'
        );
    }

    private hydrate(phase: SpanPhase, outcome: CallOutcome): void {
        const span = this.span;
        if (!span) {
            return;
        }
        const previous = this.currentState;
        this.currentState = 'hydration';
        const flagged = this.safely('hydrateSpan', () =>
            this.invocation.handler.hydrateSpan(this.invocation.call, phase, {
                span,
                parentSpan: this.parentSpan,
                resolver: this.resolver,
                result: outcome.result,
                error: outcome.error,
                events: this.events,
            })
        );
        this.detectedError = this.detectedError || flagged === true;
        this.currentState = previous;
    }

    private postTask(span: Span, outcome: CallOutcome): void {
        this.currentState = 'post_task';
        this.safely('postTaskProcessing', () =>
            this.invocation.handler.postTaskProcessing(
                span,
                this.parentSpan,
                this.invocation.call,
                outcome
            )
        );
    }

    private finish(span: Span): void {
        this.safely('flushEvents', () => this.events.flush(span));
        span.end();
        this.currentState = 'finished';
    }

    private safely<T>(hook: string, fn: () => T): T | undefined {
        try {
            return fn();
        } catch (error) {
            this.invocation.logger.warn(`Span handler hook '${hook}' failed`, {
                method: this.invocation.call.name,
                error: toError(error).message,
            });
            return undefined;
        }
    }
}
