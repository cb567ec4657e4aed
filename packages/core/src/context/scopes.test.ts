import { describe, test, expect } from 'vitest';
import { ROOT_CONTEXT, trace, TraceFlags } from '@opentelemetry/api';
import { getContextRuntime } from './context-runtime.js';
import {
    getScopeValue,
    getScopes,
    isScopeSet,
    scopeFunction,
    startScope,
    startScopes,
    stopScope,
    withScope,
    withScopes,
} from './scopes.js';
import {
    captureContext,
    extractHttpContext,
    injectTraceHeaders,
    runWithContext,
    bindContext,
} from './propagation.js';
import { CallscopeRuntimeError } from '../errors/runtime-error.js';
import { ContextErrorCode } from './error-codes.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Runs fn from a clean root so attachments cannot leak between tests */
function isolated<T>(fn: () => T): T {
    return getContextRuntime().with(ROOT_CONTEXT, fn);
}

describe('scopes', () => {
    test('start/stop bounds the scope', () => {
        isolated(() => {
            const token = startScope('req', 'r1');
            expect(getScopeValue('req')).toBe('r1');
            expect(isScopeSet('req')).toBe(true);

            expect(stopScope(token)).toBe('detached');
            expect(getScopeValue('req')).toBeUndefined();
            expect(isScopeSet('req')).toBe(false);
        });
    });

    test('stopping a scope twice is a no-op', () => {
        isolated(() => {
            const token = startScope('req', 'r1');
            stopScope(token);
            expect(stopScope(token)).toBe('already_released');
            expect(getScopes()).toEqual({});
        });
    });

    test('a missing value gets a generated id', () => {
        isolated(() => {
            const token = startScope('conversation');
            expect(getScopeValue('conversation')).toMatch(/^[0-9a-f]{32}$/);
            stopScope(token);
        });
    });

    test('non-string values are stored as strings', () => {
        isolated(() => {
            const token = startScopes({ attempt: 3, replay: false });
            expect(getScopes()).toEqual({ attempt: '3', replay: 'false' });
            stopScope(token);
        });
    });

    test('nested scopes accumulate and the inner value wins for the same name', () => {
        withScopes({ tenant: 'acme', req: 'outer' }, () => {
            withScope('req', 'inner', () => {
                expect(getScopes()).toEqual({ tenant: 'acme', req: 'inner' });
            });
            expect(getScopes()).toEqual({ tenant: 'acme', req: 'outer' });
        });
        expect(getScopes()).toEqual({});
    });

    test('block form stops the scope when the block throws', () => {
        expect(() =>
            withScope('req', 'r1', () => {
                throw new Error('boom');
            })
        ).toThrow('boom');
        expect(getScopeValue('req')).toBeUndefined();
    });

    test('async block form propagates across awaits and timers', async () => {
        const seen = await withScope('session', 's-1', async () => {
            await sleep(1);
            const afterAwait = getScopeValue('session');
            const inTimer = await new Promise<string | undefined>((resolve) =>
                setTimeout(() => resolve(getScopeValue('session')), 1)
            );
            return { afterAwait, inTimer };
        });

        expect(seen).toEqual({ afterAwait: 's-1', inTimer: 's-1' });
        expect(getScopeValue('session')).toBeUndefined();
    });

    test('scopeFunction computes the value from the call arguments', async () => {
        const handle = scopeFunction(
            'user',
            (request: { userId: string }) => request.userId,
            async (request: { userId: string }) => {
                await sleep(1);
                return `${request.userId}:${getScopeValue('user') ?? 'none'}`;
            }
        );

        await expect(handle({ userId: 'u-7' })).resolves.toBe('u-7:u-7');
        expect(getScopeValue('user')).toBeUndefined();
    });

    test('scopeFunction keeps this', () => {
        const counter = {
            label: 'c',
            read: scopeFunction('op', 'read', function (this: { label: string }) {
                return `${this.label}:${getScopeValue('op') ?? ''}`;
            }),
        };
        expect(counter.read()).toBe('c:read');
    });

    test('empty scope names are rejected', () => {
        let caught: unknown;
        try {
            startScope('  ', 'x');
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(CallscopeRuntimeError);
        expect(caught).toMatchObject({ code: ContextErrorCode.SCOPE_NAME_INVALID });
    });
});

describe('propagation', () => {
    test('captureContext and runWithContext carry scopes across a serialization boundary', () => {
        const carrier = withScope('tenant', 'acme', () => captureContext());

        expect(carrier).toEqual({ baggage: 'callscope.scope.tenant=acme' });
        expect(runWithContext(carrier, () => getScopeValue('tenant'))).toBe('acme');
    });

    test('captureContext includes the active span as traceparent', () => {
        const ctx = trace.setSpanContext(ROOT_CONTEXT, {
            traceId: '0af7651916cd43dd8448eb211c80319c',
            spanId: 'b7ad6b7169203331',
            traceFlags: TraceFlags.SAMPLED,
        });

        const carrier = getContextRuntime().with(ctx, () => captureContext());

        expect(carrier.traceparent).toBe('00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01');
        const restored = runWithContext(carrier, () =>
            trace.getSpanContext(getContextRuntime().active())
        );
        expect(restored?.traceId).toBe('0af7651916cd43dd8448eb211c80319c');
        expect(restored?.isRemote).toBe(true);
    });

    test('extractHttpContext reads traceparent and mapped headers case-insensitively', () => {
        const ctx = extractHttpContext(
            {
                traceparent: '00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01',
                'X-Session-Id': 's-42',
            },
            ROOT_CONTEXT,
            [{ header: 'x-session-id', scope: 'session' }]
        );

        expect(trace.getSpanContext(ctx)?.spanId).toBe('b7ad6b7169203331');
        expect(getScopeValue('session', ctx)).toBe('s-42');
    });

    test('injectTraceHeaders writes the outbound traceparent', () => {
        const ctx = trace.setSpanContext(ROOT_CONTEXT, {
            traceId: '4bf92f3577b34da6a3ce929d0e0e4736',
            spanId: '00f067aa0ba902b7',
            traceFlags: TraceFlags.SAMPLED,
        });

        const headers = injectTraceHeaders({ accept: 'application/json' }, ctx);

        expect(headers).toEqual({
            accept: 'application/json',
            traceparent: '00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01',
        });
    });

    test('bindContext keeps scopes for callbacks invoked elsewhere', () => {
        const callback = withScope('job', 'j-1', () => bindContext(() => getScopeValue('job')));
        expect(callback()).toBe('j-1');
    });
});
