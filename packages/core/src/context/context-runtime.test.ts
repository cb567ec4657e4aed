import { describe, test, expect, beforeEach } from 'vitest';
import { ROOT_CONTEXT, createContextKey, context as otelContext } from '@opentelemetry/api';
import { ContextRuntime, getContextRuntime, installContextRuntime } from './context-runtime.js';
import { createMockLogger } from '../logger/test-utils.js';
import type { Logger } from '../logger/types.js';

const KEY = createContextKey('test-key');
const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('ContextRuntime', () => {
    let logger: Logger;
    let runtime: ContextRuntime;

    beforeEach(() => {
        logger = createMockLogger();
        runtime = new ContextRuntime(logger);
    });

    describe('attach/detach', () => {
        test('nested attach and detach restore each previous context', () => {
            runtime.isolate(() => {
                const outer = ROOT_CONTEXT.setValue(KEY, 'outer');
                const inner = ROOT_CONTEXT.setValue(KEY, 'inner');

                const t1 = runtime.attach(outer);
                const t2 = runtime.attach(inner);
                expect(runtime.active().getValue(KEY)).toBe('inner');

                expect(runtime.detach(t2)).toBe('detached');
                expect(runtime.active().getValue(KEY)).toBe('outer');
                expect(runtime.detach(t1)).toBe('detached');
                expect(runtime.active()).toBe(ROOT_CONTEXT);
            });
        });

        test('detaching twice is a logged no-op', () => {
            runtime.isolate(() => {
                const token = runtime.attach(ROOT_CONTEXT.setValue(KEY, 'a'));

                expect(runtime.detach(token)).toBe('detached');
                expect(() => runtime.detach(token)).not.toThrow();
                expect(runtime.detach(token)).toBe('already_released');
                expect(runtime.active()).toBe(ROOT_CONTEXT);
                expect(logger.debug).toHaveBeenCalledWith('Context token already detached', {
                    tokenId: token.id,
                });
            });
        });

        test('out-of-order detach restores the context before the released token', () => {
            runtime.isolate(() => {
                const t1 = runtime.attach(ROOT_CONTEXT.setValue(KEY, 'first'));
                const t2 = runtime.attach(ROOT_CONTEXT.setValue(KEY, 'second'));

                expect(runtime.detach(t1)).toBe('out_of_order');
                expect(runtime.active()).toBe(ROOT_CONTEXT);
                // t2 was released together with t1; detaching it must not re-attach 'first'
                expect(runtime.detach(t2)).toBe('already_released');
                expect(runtime.active()).toBe(ROOT_CONTEXT);
            });
        });

        test('a token from an enclosing execution context is ignored with a warning', () => {
            runtime.isolate(() => {
                const outer = ROOT_CONTEXT.setValue(KEY, 'outer');
                const token = runtime.attach(outer);

                const outcome = runtime.with(ROOT_CONTEXT.setValue(KEY, 'inner'), () =>
                    runtime.detach(token)
                );

                expect(outcome).toBe('foreign');
                expect(logger.warn).toHaveBeenCalledWith(
                    'Ignoring detach of a context token from another execution context',
                    { tokenId: token.id }
                );
                expect(runtime.active()).toBe(outer);
                expect(runtime.detach(token)).toBe('detached');
            });
        });

        test('interleaved async tasks each see and release their own context', async () => {
            const task = (name: string, delayMs: number) =>
                runtime.isolate(async () => {
                    const token = runtime.attach(ROOT_CONTEXT.setValue(KEY, name));
                    await sleep(delayMs);
                    const seen = runtime.active().getValue(KEY);
                    const outcome = runtime.detach(token);
                    return { seen, outcome, after: runtime.active() };
                });

            const [slow, fast] = await Promise.all([task('slow', 20), task('fast', 1)]);

            expect(slow).toEqual({ seen: 'slow', outcome: 'detached', after: ROOT_CONTEXT });
            expect(fast).toEqual({ seen: 'fast', outcome: 'detached', after: ROOT_CONTEXT });
        });

        test('attach inside isolate does not leak to the caller', () => {
            runtime.isolate(() => {
                runtime.attach(ROOT_CONTEXT.setValue(KEY, 'leaky'));
            });
            expect(runtime.active()).toBe(ROOT_CONTEXT);
        });
    });

    describe('with/bind', () => {
        test('with() passes arguments and this, and restores afterwards', () => {
            const ctx = ROOT_CONTEXT.setValue(KEY, 'scoped');
            const holder = {
                factor: 3,
                multiply(this: { factor: number }, value: number) {
                    return { product: value * this.factor, seen: runtime.active().getValue(KEY) };
                },
            };

            const result = runtime.with(ctx, holder.multiply, holder, 5);

            expect(result).toEqual({ product: 15, seen: 'scoped' });
            expect(runtime.active()).toBe(ROOT_CONTEXT);
        });

        test('with() propagates across awaits of an async callback', async () => {
            const ctx = ROOT_CONTEXT.setValue(KEY, 'async');
            const seen = await runtime.with(ctx, async () => {
                await sleep(1);
                return runtime.active().getValue(KEY);
            });
            expect(seen).toBe('async');
        });

        test('bind() pins a callback to the bound context', () => {
            const bound = runtime.bind(ROOT_CONTEXT.setValue(KEY, 'bound'), () =>
                runtime.active().getValue(KEY)
            );
            const seen = runtime.with(ROOT_CONTEXT.setValue(KEY, 'other'), () => bound());
            expect(seen).toBe('bound');
        });

        test('bind() returns non-functions unchanged', () => {
            const target = { value: 1 };
            expect(runtime.bind(ROOT_CONTEXT, target)).toBe(target);
        });
    });
});

describe('installContextRuntime', () => {
    test('installs once and returns the shared runtime on every call', () => {
        const first = installContextRuntime();
        const second = installContextRuntime();

        expect(first).toBe(second);
        expect(first).toBe(getContextRuntime());
    });

    test('the OpenTelemetry context API sees attachments made through the runtime', () => {
        const runtime = installContextRuntime();
        runtime.isolate(() => {
            const token = runtime.attach(ROOT_CONTEXT.setValue(KEY, 'global'));
            expect(otelContext.active().getValue(KEY)).toBe('global');
            runtime.detach(token);
        });
    });
});
