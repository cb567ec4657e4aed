import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { SpanStatusCode, trace } from '@opentelemetry/api';
import { getContextRuntime } from '../context/context-runtime.js';
import { createMockLogger } from '../logger/test-utils.js';
import type { Logger } from '../logger/types.js';
import { DedupSpanHandler } from './dedup-span-handler.js';
import { HttpSpanHandler } from './http-span-handler.js';
import { InterceptionRegistry } from './registry.js';
import { SpanHandler, SpanStatusError } from './span-handler.js';
import type { PreTracingResult } from './span-handler.js';
import type { MethodSpec, SpanResolver } from './types.js';
import { syncWrapper } from './wrappers.js';
import { withTrace } from './custom-spans.js';
import { createTestTracing, inRootContext } from './test-utils.js';
import type { TestTracing } from './test-utils.js';

interface Request {
    headers: Record<string, string>;
    items: number[];
}

class Api {
    handle(request: Request): number {
        request.items.push(0);
        return request.items.length;
    }

    probe(): boolean {
        return true;
    }

    plan(goal: string): string {
        return `plan for ${goal}`;
    }
}

function apiMethod(method: string, extra: Partial<MethodSpec> = {}): MethodSpec {
    return { location: { target: Api.prototype, method }, wrapper: syncWrapper, ...extra };
}

function requestOf(value: unknown): Request | undefined {
    if (typeof value !== 'object' || value === null || !('headers' in value) || !('items' in value)) {
        return undefined;
    }
    const { headers, items } = value;
    if (typeof headers !== 'object' || headers === null || !Array.isArray(items)) {
        return undefined;
    }
    const stringHeaders: Record<string, string> = {};
    for (const [name, header] of Object.entries(headers)) {
        if (typeof header === 'string') {
            stringHeaders[name] = header;
        }
    }
    return {
        headers: stringHeaders,
        items: items.filter((item): item is number => typeof item === 'number'),
    };
}

describe('span handlers', () => {
    let tracing: TestTracing;
    let logger: Logger;
    let registry: InterceptionRegistry;

    function createRegistry(handlers: Record<string, SpanHandler> = {}): InterceptionRegistry {
        registry = new InterceptionRegistry({
            tracer: tracing.tracer,
            serviceName: 'api-service',
            logger,
            handlers,
        });
        return registry;
    }

    beforeEach(() => {
        tracing = createTestTracing();
        logger = createMockLogger();
    });

    afterEach(() => {
        registry.unregister();
    });

    describe('hydration', () => {
        test('applies pre-execution rules before the call mutates its input', () => {
            const resolver: SpanResolver = {
                type: 'http.request',
                attributes: [
                    {
                        attribute: 'items.before',
                        phase: 'pre_execution',
                        accessor: ({ args }) => requestOf(args[0])?.items.length,
                    },
                    { attribute: 'items.after', accessor: ({ result }) => Number(result) },
                ],
            };
            createRegistry().register([apiMethod('handle', { resolver })]);

            const result = inRootContext(() => new Api().handle({ headers: {}, items: [1, 2] }));

            expect(result).toBe(3);
            const [span] = tracing.exporter.getFinishedSpans();
            expect(span?.attributes['items.before']).toBe(2);
            expect(span?.attributes['items.after']).toBe(3);
            expect(span?.attributes['span.type']).toBe('http.request');
        });

        test('an accessor returning an object spreads into prefixed attributes', () => {
            createRegistry().register([
                apiMethod('plan', {
                    resolver: {
                        attributes: [
                            { attribute: 'goal', accessor: ({ args }) => ({ text: String(args[0]), size: 1, empty: null }) },
                            { accessor: () => ({ 'model.name': 'test-model' }) },
                        ],
                    },
                }),
            ]);

            inRootContext(() => new Api().plan('ship'));

            const [span] = tracing.exporter.getFinishedSpans();
            expect(span?.attributes).toMatchObject({
                'goal.text': 'ship',
                'goal.size': 1,
                'model.name': 'test-model',
            });
            expect(span?.attributes['goal.empty']).toBeUndefined();
        });

        test('a broken accessor is logged and the call result is kept', () => {
            createRegistry().register([
                apiMethod('probe', {
                    resolver: {
                        attributes: [
                            {
                                attribute: 'broken',
                                accessor: () => {
                                    throw new Error('bad accessor');
                                },
                            },
                            { attribute: 'fine', accessor: () => 'yes' },
                        ],
                    },
                }),
            ]);

            expect(inRootContext(() => new Api().probe())).toBe(true);

            const [span] = tracing.exporter.getFinishedSpans();
            expect(span?.attributes['fine']).toBe('yes');
            expect(span?.attributes['broken']).toBeUndefined();
            expect(span?.status.code).toBe(SpanStatusCode.OK);
            expect(logger.debug).toHaveBeenCalledWith("Attribute accessor failed for 'broken'", {
                method: 'probe',
                error: 'bad accessor',
            });
        });

        test('SpanStatusError marks the span without failing the call', () => {
            createRegistry().register([
                apiMethod('probe', {
                    resolver: {
                        attributes: [
                            {
                                attribute: 'error.code',
                                accessor: () => {
                                    throw new SpanStatusError('payload carried an error', 'E42');
                                },
                            },
                        ],
                    },
                }),
            ]);

            expect(inRootContext(() => new Api().probe())).toBe(true);

            const [span] = tracing.exporter.getFinishedSpans();
            expect(span?.status).toEqual({
                code: SpanStatusCode.ERROR,
                message: 'payload carried an error',
            });
            expect(span?.attributes['error.code']).toBe('E42');
            expect(span?.attributes['callscope.detected_error']).toBe(true);
        });

        test('event rules with the same name merge into one event', () => {
            createRegistry().register([
                apiMethod('plan', {
                    resolver: {
                        events: [
                            { name: 'data.input', attributes: [{ attribute: 'goal', accessor: ({ args }) => String(args[0]) }] },
                            { name: 'data.output', attributes: [{ attribute: 'plan', accessor: ({ result }) => String(result) }] },
                            { name: 'data.input', attributes: [{ attribute: 'source', accessor: () => 'cli' }] },
                        ],
                    },
                }),
            ]);

            inRootContext(() => new Api().plan('ship'));

            const [span] = tracing.exporter.getFinishedSpans();
            expect(span?.events.map((e) => [e.name, e.attributes])).toEqual([
                ['data.input', { goal: 'ship', source: 'cli' }],
                ['data.output', { plan: 'plan for ship' }],
            ]);
        });
    });

    test('failing hooks are logged and never reach the caller', () => {
        class BrokenHandler extends SpanHandler {
            override preTracing(): PreTracingResult | undefined {
                throw new Error('pre failed');
            }

            override postTaskProcessing(): void {
                throw new Error('post failed');
            }
        }
        createRegistry({ broken: new BrokenHandler(logger) }).register([
            apiMethod('probe', { handler: 'broken' }),
        ]);

        expect(inRootContext(() => new Api().probe())).toBe(true);

        expect(tracing.exporter.getFinishedSpans()).toHaveLength(1);
        expect(logger.warn).toHaveBeenCalledWith("Span handler hook 'preTracing' failed", {
            method: 'probe',
            error: 'pre failed',
        });
        expect(logger.warn).toHaveBeenCalledWith("Span handler hook 'postTaskProcessing' failed", {
            method: 'probe',
            error: 'post failed',
        });
    });

    test('an agent invocation reports its name and span id to the parent', () => {
        createRegistry().register([
            apiMethod('plan', {
                resolver: {
                    type: 'agentic.invocation',
                    attributes: [
                        { attribute: 'entity.1.name', phase: 'pre_execution', accessor: () => 'planner' },
                    ],
                },
            }),
        ]);

        inRootContext(() =>
            withTrace('session', () => new Api().plan('ship'), { tracer: tracing.tracer })
        );

        const spans = tracing.exporter.getFinishedSpans();
        const agent = spans.find((s) => s.name === 'plan');
        const session = spans.find((s) => s.name === 'session');
        expect(session?.attributes['agentic.last_agent.name']).toBe('planner');
        expect(session?.attributes['agentic.last_agent.span_id']).toBe(agent?.spanContext().spanId);
    });

    test('a MethodSpec skipSpan runs the call without a span', () => {
        createRegistry().register([apiMethod('probe', { skipSpan: true })]);

        expect(inRootContext(() => new Api().probe())).toBe(true);
        expect(tracing.exporter.getFinishedSpans()).toHaveLength(0);
    });

    describe('DedupSpanHandler', () => {
        test('only the first of repeated probe calls produces a span', () => {
            createRegistry({ dedup: new DedupSpanHandler({}, logger) }).register([
                apiMethod('probe', { handler: 'dedup' }),
            ]);

            const results = inRootContext(() => [1, 2, 3, 4, 5].map(() => new Api().probe()));

            expect(results).toEqual([true, true, true, true, true]);
            expect(tracing.exporter.getFinishedSpans()).toHaveLength(1);
        });

        test('a call after an idle window produces a new span', () => {
            let now = 0;
            const handler = new DedupSpanHandler({ windowMs: 1000, now: () => now }, logger);
            createRegistry({ dedup: handler }).register([apiMethod('probe', { handler: 'dedup' })]);

            inRootContext(() => {
                const api = new Api();
                api.probe();
                now = 100;
                api.probe();
                now = 900;
                api.probe();
                now = 2000;
                api.probe();
            });

            expect(tracing.exporter.getFinishedSpans()).toHaveLength(2);
        });

        test('keys separate bursts', () => {
            const handler = new DedupSpanHandler({ key: (call) => String(call.args[0]) }, logger);
            createRegistry({ dedup: handler }).register([apiMethod('plan', { handler: 'dedup' })]);

            inRootContext(() => {
                const api = new Api();
                api.plan('a');
                api.plan('a');
                api.plan('b');
            });

            expect(tracing.exporter.getFinishedSpans()).toHaveLength(2);
            handler.reset();
            inRootContext(() => new Api().plan('a'));
            expect(tracing.exporter.getFinishedSpans()).toHaveLength(3);
        });
    });

    describe('HttpSpanHandler', () => {
        const traceId = '11111111111111111111111111111111';
        const remoteSpanId = '2222222222222222';

        test('continues the inbound trace and releases it after the call', () => {
            const handler = new HttpSpanHandler(
                { getHeaders: (call) => requestOf(call.args[0])?.headers },
                logger
            );
            createRegistry({ http: handler }).register([apiMethod('handle', { handler: 'http' })]);

            const activeAfter = inRootContext(() => {
                new Api().handle({
                    headers: {
                        traceparent: `00-${traceId}-${remoteSpanId}-01`,
                        baggage: 'callscope.scope.tenant=acme',
                    },
                    items: [],
                });
                return trace.getSpanContext(getContextRuntime().active());
            });

            expect(activeAfter).toBeUndefined();
            const [span] = tracing.exporter.getFinishedSpans();
            expect(span?.spanContext().traceId).toBe(traceId);
            expect(span?.parentSpanId).toBe(remoteSpanId);
            expect(span?.attributes['scope.tenant']).toBe('acme');
            expect(span?.attributes['entity.1.name']).toBeUndefined();
        });

        test('calls without headers start a new trace', () => {
            const handler = new HttpSpanHandler({ getHeaders: () => undefined }, logger);
            createRegistry({ http: handler }).register([apiMethod('probe', { handler: 'http' })]);

            inRootContext(() => new Api().probe());

            const [span] = tracing.exporter.getFinishedSpans();
            expect(span?.parentSpanId).toBeUndefined();
            expect(span?.spanContext().traceId).not.toBe(traceId);
        });
    });
});
