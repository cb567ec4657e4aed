import type { Context } from '@opentelemetry/api';
import { setScopes } from '../context/scopes.js';
import type { ScopeValues } from '../context/scopes.js';
import { toError } from '../errors/runtime-error.js';
import { SpanLifecycle } from './span-lifecycle.js';
import { TracedAsyncStream, TracedStream } from './traced-stream.js';
import type { Invocation, WrapperStrategy } from './types.js';

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
    return (
        (typeof value === 'object' || typeof value === 'function') &&
        value !== null &&
        'then' in value &&
        typeof value.then === 'function'
    );
}

export function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
    return (
        typeof value === 'object' &&
        value !== null &&
        Symbol.asyncIterator in value &&
        typeof value[Symbol.asyncIterator] === 'function'
    );
}

export function isIterable(value: unknown): value is Iterable<unknown> {
    return (
        typeof value === 'object' &&
        value !== null &&
        Symbol.iterator in value &&
        typeof value[Symbol.iterator] === 'function'
    );
}

function startLifecycle(invocation: Invocation): SpanLifecycle {
    const lifecycle = new SpanLifecycle(invocation);
    lifecycle.begin();
    return lifecycle;
}

function callInSpan(lifecycle: SpanLifecycle, invocation: Invocation): unknown {
    try {
        return lifecycle.runInSpan(() => invocation.callOriginal());
    } catch (error) {
        lifecycle.fail(error);
        lifecycle.close(undefined);
        throw error;
    }
}

function settle(lifecycle: SpanLifecycle, result: unknown): unknown {
    lifecycle.complete(result);
    lifecycle.close(result);
    return result;
}

function settleAsync(lifecycle: SpanLifecycle, pending: PromiseLike<unknown>): Promise<unknown> {
    return Promise.resolve(pending).then(
        (result) => settle(lifecycle, result),
        (error: unknown) => {
            lifecycle.fail(error);
            lifecycle.close(undefined);
            throw error;
        }
    );
}

/**
 * The span covers the call itself
 */
export const syncWrapper: WrapperStrategy = (invocation) =>
    invocation.runtime.isolate(() => {
        const lifecycle = startLifecycle(invocation);
        return settle(lifecycle, callInSpan(lifecycle, invocation));
    });

/**
 * The span stays open until the returned promise settles. The caller receives a native
 * promise chained on the original one.
 */
export const asyncWrapper: WrapperStrategy = (invocation) =>
    invocation.runtime.isolate(() => {
        const lifecycle = startLifecycle(invocation);
        const returned = callInSpan(lifecycle, invocation);
        if (!isPromiseLike(returned)) {
            return settle(lifecycle, returned);
        }
        return settleAsync(lifecycle, returned);
    });

export function isIterator(value: unknown): value is Iterator<unknown> {
    return (
        typeof value === 'object' &&
        value !== null &&
        'next' in value &&
        typeof value.next === 'function'
    );
}

function isAsyncGenerator(value: unknown): boolean {
    return Object.prototype.toString.call(value) === '[object AsyncGenerator]';
}

/**
 * Keeps the original object, its prototype and every member; only the first
 * `for await` over it runs through the traced stream.
 */
function traceIterationOf<T extends AsyncIterable<unknown>>(
    source: T,
    lifecycle: SpanLifecycle
): T {
    let traced = false;
    return new Proxy(source, {
        get(target, property) {
            if (property === Symbol.asyncIterator && !traced) {
                return () => {
                    traced = true;
                    return new TracedAsyncStream(target, lifecycle);
                };
            }
            const member: unknown = Reflect.get(target, property, target);
            return typeof member === 'function' ? member.bind(target) : member;
        },
    });
}

function traceStream(lifecycle: SpanLifecycle, value: unknown): unknown {
    if (isAsyncIterable(value)) {
        return isAsyncGenerator(value)
            ? new TracedAsyncStream(value, lifecycle)
            : traceIterationOf(value, lifecycle);
    }
    // Arrays, Sets and Maps are results, not streams
    if (isIterable(value) && isIterator(value)) {
        return new TracedStream(value, lifecycle);
    }
    return settle(lifecycle, value);
}

/**
 * For methods returning a generator or an async iterable, directly or through a promise.
 * Generators and iterators are replaced by a traced stream that keeps the span open while it
 * is consumed. Other async iterables come back as the same object behind a Proxy that traces
 * their iteration. Any other result, collections included, finishes the span at once.
 */
export const streamWrapper: WrapperStrategy = (invocation) =>
    invocation.runtime.isolate(() => {
        const lifecycle = startLifecycle(invocation);
        const returned = callInSpan(lifecycle, invocation);
        if (!isPromiseLike(returned)) {
            return traceStream(lifecycle, returned);
        }
        return Promise.resolve(returned).then(
            (value) => traceStream(lifecycle, value),
            (error: unknown) => {
                lifecycle.fail(error);
                lifecycle.close(undefined);
                throw error;
            }
        );
    });

/**
 * Creates no span: runs the whole call inside scopes, computed from the call when the MethodSpec
 * carries `scopeValues`, else a fresh id under `scopeName`. Async results keep the scopes
 * through every continuation.
 */
export const scopeWrapper: WrapperStrategy = (invocation) => {
    const { call, runtime } = invocation;
    let scoped: Context;
    try {
        const values: ScopeValues = call.spec.scopeValues
            ? call.spec.scopeValues(call)
            : { [call.spec.scopeName ?? call.name]: undefined };
        scoped = setScopes(values, runtime.active());
    } catch (error) {
        invocation.logger.warn('Could not compute scopes; calling without them', {
            method: call.name,
            error: toError(error).message,
        });
        return invocation.callOriginal();
    }
    return runtime.with(scoped, () => invocation.callOriginal());
};
