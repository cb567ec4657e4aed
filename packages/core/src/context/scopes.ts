import { propagation } from '@opentelemetry/api';
import type { BaggageEntry, Context } from '@opentelemetry/api';
import { RandomIdGenerator } from '@opentelemetry/sdk-trace-base';
import { SCOPE_BAGGAGE_PREFIX } from '../semconv.js';
import { getContextRuntime } from './context-runtime.js';
import type { ContextToken, DetachOutcome } from './context-runtime.js';
import { ContextError } from './errors.js';

/** A missing value is replaced with a generated id */
export type ScopeValue = string | number | boolean | null | undefined;

export type ScopeValues = Record<string, ScopeValue>;

/**
 * Returned by startScope/startScopes and consumed by stopScope
 */
export interface ScopeToken {
    readonly names: readonly string[];
    readonly contextToken: ContextToken;
}

const idGenerator = new RandomIdGenerator();

export function generateScopeId(): string {
    return idGenerator.generateTraceId();
}

function assertScopeName(name: string): void {
    if (typeof name !== 'string' || name.trim().length === 0) {
        throw ContextError.invalidScopeName(name);
    }
}

function toScopeString(value: ScopeValue): string {
    if (value === null || value === undefined) {
        return generateScopeId();
    }
    return String(value);
}

/**
 * Returns a context carrying the given scopes on top of the scopes already in ctx
 */
export function setScopes(values: ScopeValues, ctx: Context = getContextRuntime().active()): Context {
    const entries: Record<string, BaggageEntry> = Object.fromEntries(
        propagation.getBaggage(ctx)?.getAllEntries() ?? []
    );
    for (const [name, value] of Object.entries(values)) {
        assertScopeName(name);
        entries[SCOPE_BAGGAGE_PREFIX + name] = { value: toScopeString(value) };
    }
    return propagation.setBaggage(ctx, propagation.createBaggage(entries));
}

/**
 * Returns a context without the named scopes
 */
export function removeScopes(names: readonly string[], ctx: Context = getContextRuntime().active()): Context {
    const baggage = propagation.getBaggage(ctx);
    if (!baggage) {
        return ctx;
    }
    return propagation.setBaggage(
        ctx,
        baggage.removeEntries(...names.map((name) => SCOPE_BAGGAGE_PREFIX + name))
    );
}

/**
 * Active scopes by name
 */
export function getScopes(ctx: Context = getContextRuntime().active()): Record<string, string> {
    const scopes: Record<string, string> = {};
    for (const [key, entry] of propagation.getBaggage(ctx)?.getAllEntries() ?? []) {
        if (key.startsWith(SCOPE_BAGGAGE_PREFIX)) {
            scopes[key.slice(SCOPE_BAGGAGE_PREFIX.length)] = entry.value;
        }
    }
    return scopes;
}

export function getScopeValue(
    name: string,
    ctx: Context = getContextRuntime().active()
): string | undefined {
    return propagation.getBaggage(ctx)?.getEntry(SCOPE_BAGGAGE_PREFIX + name)?.value;
}

export function isScopeSet(name: string, ctx: Context = getContextRuntime().active()): boolean {
    return getScopeValue(name, ctx) !== undefined;
}

/**
 * Starts a scope for the rest of the current execution context. Every span created until the
 * matching stopScope carries `scope.<name>`.
 *
 * @example
 * ```typescript
 * const token = startScope('conversation', conversationId);
 * try {
 *     await agent.run(prompt);
 * } finally {
 *     stopScope(token);
 * }
 * ```
 */
export function startScope(name: string, value?: ScopeValue): ScopeToken {
    return startScopes({ [name]: value });
}

export function startScopes(values: ScopeValues): ScopeToken {
    const runtime = getContextRuntime();
    const contextToken = runtime.attach(setScopes(values, runtime.active()));
    return { names: Object.keys(values), contextToken };
}

export function stopScope(token: ScopeToken): DetachOutcome {
    return getContextRuntime().detach(token.contextToken);
}

export const stopScopes = stopScope;

/**
 * Runs fn with the scope active. Works for sync and async functions; for async ones the scope
 * follows every continuation of the returned promise.
 */
export function withScope<T>(name: string, value: ScopeValue, fn: () => T): T {
    return withScopes({ [name]: value }, fn);
}

export function withScopes<T>(values: ScopeValues, fn: () => T): T {
    const runtime = getContextRuntime();
    return runtime.with(setScopes(values, runtime.active()), fn);
}

/**
 * Wraps fn so every call runs inside the scope. The value may be computed from the call's
 * arguments, e.g. a session id taken from a request object.
 */
export function scopeFunction<A extends unknown[], R>(
    name: string,
    value: ScopeValue | ((...args: A) => ScopeValue),
    fn: (...args: A) => R
): (...args: A) => R {
    return scopesFunction(
        (...args: A) => ({ [name]: typeof value === 'function' ? value(...args) : value }),
        fn
    );
}

export function scopesFunction<A extends unknown[], R>(
    values: ScopeValues | ((...args: A) => ScopeValues),
    fn: (...args: A) => R
): (...args: A) => R {
    return function scoped(this: unknown, ...args: A): R {
        const resolved = typeof values === 'function' ? values(...args) : values;
        return withScopes(resolved, () => fn.apply(this, args));
    };
}
