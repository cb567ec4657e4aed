import path from 'node:path';
import { propagation, trace } from '@opentelemetry/api';
import type { Tracer } from '@opentelemetry/api';
import {
    CompositePropagator,
    W3CBaggagePropagator,
    W3CTraceContextPropagator,
} from '@opentelemetry/core';
import { Resource } from '@opentelemetry/resources';
import { BasicTracerProvider } from '@opentelemetry/sdk-trace-base';
import { ATTR_SERVICE_NAME } from '@opentelemetry/semantic-conventions';
import { ConfigErrorCode } from '../config/error-codes.js';
import { loadConfigFromEnv } from '../config/env.js';
import type { TracingConfig, TracingConfigInput } from '../config/schemas.js';
import {
    DEFAULT_SCOPE_CONFIG_FILE,
    loadScopeConfigFile,
    toHttpScopeMappings,
    toScopeMethodSpecs,
} from '../config/scope-config.js';
import { installContextRuntime } from '../context/context-runtime.js';
import { setHttpScopeMappings } from '../context/propagation.js';
import { isCallscopeError, toError } from '../errors/runtime-error.js';
import { BatchSpanProcessor } from '../export/batch-processor.js';
import { CompositeExporter } from '../export/composite-exporter.js';
import { DeferredDeliveryQueue } from '../export/deferred-delivery.js';
import { DEFAULT_FLUSH_TIMEOUT_MS } from '../export/sinks/base-sink.js';
import { ConsoleSpanSink } from '../export/sinks/console-sink.js';
import { FileSpanSink } from '../export/sinks/file-sink.js';
import { HttpIngestSink } from '../export/sinks/http-ingest-sink.js';
import { InMemorySpanSink } from '../export/sinks/memory-sink.js';
import { ObjectStorageSink } from '../export/sinks/object-storage-sink.js';
import { OtlpSpanSink } from '../export/sinks/otlp-sink.js';
import { settlesWithin } from '../export/timeout.js';
import type { SpanSink, TaskQueue } from '../export/types.js';
import { DedupSpanHandler } from '../instrumentation/dedup-span-handler.js';
import { InterceptionRegistry } from '../instrumentation/registry.js';
import type { ModuleLoader } from '../instrumentation/registry.js';
import type { SpanHandler } from '../instrumentation/span-handler.js';
import type { InstallResult, MethodSpec } from '../instrumentation/types.js';
import { createLogger, getDefaultLogger, setDefaultLogger } from '../logger/factory.js';
import type { Logger } from '../logger/types.js';
import { LogComponent } from '../logger/types.js';
import { ATTR_SDK_LANGUAGE, ATTR_SDK_VERSION } from '../semconv.js';
import type { ObjectStore } from '../storage/types.js';
import { INSTRUMENTATION_SCOPE_NAME, SDK_LANGUAGE, SDK_VERSION } from '../version.js';
import { TelemetryError } from './errors.js';

declare global {
    var __CALLSCOPE_TRACING__: Tracing | undefined;
}

export interface SetupTracingOptions {
    /** Merged over the CALLSCOPE_* environment variables */
    config?: Partial<TracingConfigInput> | undefined;
    env?: NodeJS.ProcessEnv | undefined;
    /** Read CALLSCOPE_* variables from this .env file as well */
    dotenvPath?: string | undefined;
    /** Methods to instrument right away */
    methods?: readonly MethodSpec[] | undefined;
    /** Named span handlers in addition to 'default' and 'dedup' */
    handlers?: Record<string, SpanHandler> | undefined;
    /** Sinks added to the configured ones */
    sinks?: readonly SpanSink[] | undefined;
    /** Backing store of the object-storage sink */
    objectStore?: ObjectStore | undefined;
    /**
     * Host signal for deferred delivery; resolves whenever queued deliveries may run
     * (e.g. after a serverless handler returned)
     */
    readySignal?: (() => Promise<void>) | undefined;
    logger?: Logger | undefined;
    loadModule?: ModuleLoader | undefined;
    /** Flush and shut down when the event loop empties (default: true) */
    shutdownOnExit?: boolean | undefined;
}

interface Pipeline {
    provider: BasicTracerProvider;
    /** Whether our provider and propagator became the global ones */
    ownsGlobals: boolean;
    processor: BatchSpanProcessor;
    exporter: CompositeExporter;
    deferred: DeferredDeliveryQueue | undefined;
}

function buildSinks(
    config: TracingConfig,
    options: SetupTracingOptions,
    logger: Logger,
    deferred: TaskQueue | undefined
): SpanSink[] {
    const sinks: SpanSink[] = [];
    for (const type of new Set(config.sinks)) {
        switch (type) {
            case 'console':
                sinks.push(new ConsoleSpanSink({ logger }));
                break;
            case 'memory':
                sinks.push(new InMemorySpanSink({ logger }));
                break;
            case 'file':
                sinks.push(
                    new FileSpanSink({
                        logger,
                        outputDir: config.file.outputDir,
                        filePrefix: config.file.filePrefix,
                        traceTimeoutMs: config.file.traceTimeoutMs,
                        serviceName: config.serviceName,
                    })
                );
                break;
            case 'http': {
                const { endpoint, apiKey } = config.http;
                // the schema rejects an http sink without both
                if (endpoint && apiKey) {
                    sinks.push(
                        new HttpIngestSink({
                            logger,
                            endpoint,
                            apiKey,
                            timeoutMs: config.http.timeoutMs,
                            headers: config.http.headers,
                            retry: config.retry,
                            deferred,
                        })
                    );
                }
                break;
            }
            case 'otlp':
                sinks.push(
                    new OtlpSpanSink({
                        logger,
                        endpoint: config.otlp.endpoint,
                        headers: config.otlp.headers,
                        timeoutMs: config.otlp.timeoutMs,
                        deferred,
                    })
                );
                break;
            case 'object-storage':
                if (!options.objectStore) {
                    throw TelemetryError.objectStoreRequired();
                }
                sinks.push(
                    new ObjectStorageSink({
                        logger,
                        store: options.objectStore,
                        keyPrefix: config.objectStorage.keyPrefix,
                        traceTimeoutMs: config.objectStorage.traceTimeoutMs,
                        uploadRetry: config.retry,
                        deferred,
                    })
                );
                break;
        }
    }
    return [...sinks, ...(options.sinks ?? [])];
}

/**
 * Handle on the tracing pipeline of the process. Created by setupTracing(); one per process.
 */
export class Tracing {
    readonly serviceName: string;
    readonly config: TracingConfig;
    readonly sinks: readonly SpanSink[];
    private readonly logger: Logger;
    private readonly registry: InterceptionRegistry | undefined;
    private readonly pipeline: Pipeline | undefined;
    private readonly exitHandler: (() => void) | undefined;
    private shutdownPromise: Promise<void> | undefined;
    private static _initPromise?: Promise<Tracing> | undefined;

    private constructor(
        config: TracingConfig,
        logger: Logger,
        sinks: readonly SpanSink[],
        pipeline?: Pipeline,
        registry?: InterceptionRegistry,
        shutdownOnExit = true
    ) {
        this.config = config;
        this.serviceName = config.serviceName;
        this.logger = logger;
        this.sinks = sinks;
        this.pipeline = pipeline;
        this.registry = registry;

        if (pipeline && shutdownOnExit) {
            this.exitHandler = () => {
                void this.shutdown();
            };
            process.once('beforeExit', this.exitHandler);
        }
    }

    /**
     * Sets up tracing once per process. Concurrent calls share the pending setup; later calls
     * return the existing instance until it is shut down.
     */
    static async init(options: SetupTracingOptions = {}): Promise<Tracing> {
        if (globalThis.__CALLSCOPE_TRACING__) return globalThis.__CALLSCOPE_TRACING__;
        if (Tracing._initPromise) return Tracing._initPromise;

        Tracing._initPromise = Tracing.create(options).then(
            (tracing) => {
                globalThis.__CALLSCOPE_TRACING__ = tracing;
                return tracing;
            },
            (error: unknown) => {
                Tracing._initPromise = undefined;
                if (isCallscopeError(error)) {
                    throw error;
                }
                throw TelemetryError.initializationFailed(toError(error).message, error);
            }
        );
        return Tracing._initPromise;
    }

    private static async create(options: SetupTracingOptions): Promise<Tracing> {
        const config = loadConfigFromEnv(options.env ?? process.env, {
            overrides: options.config,
            dotenvPath: options.dotenvPath,
        });

        let baseLogger = options.logger;
        if (!baseLogger && config.logger) {
            baseLogger = createLogger({ config: config.logger, service: config.serviceName });
            setDefaultLogger(baseLogger);
        }
        const logger = (baseLogger ?? getDefaultLogger()).createChild(LogComponent.TELEMETRY);

        if (!config.enabled) {
            logger.info('Tracing disabled by configuration');
            return new Tracing(config, logger, []);
        }

        const runtime = installContextRuntime();

        let deferred: DeferredDeliveryQueue | undefined;
        if (config.deferred.enabled) {
            if (options.readySignal) {
                deferred = new DeferredDeliveryQueue({
                    readySignal: options.readySignal,
                    maxWaitMs: config.deferred.maxWaitMs,
                    pollIntervalMs: config.deferred.pollIntervalMs,
                    logger,
                });
            } else {
                logger.warn(
                    'Deferred delivery is enabled but no readySignal was given; delivering inline'
                );
            }
        }

        const sinks = buildSinks(config, options, logger, deferred);
        const exporter = new CompositeExporter(sinks, {
            ignoredUrlPaths: config.ignoredUrlPaths,
            logger,
        });
        const processor = new BatchSpanProcessor(exporter, config.batch, logger);

        const provider = new BasicTracerProvider({
            resource: Resource.default().merge(
                new Resource({
                    [ATTR_SERVICE_NAME]: config.serviceName,
                    [ATTR_SDK_VERSION]: SDK_VERSION,
                    [ATTR_SDK_LANGUAGE]: SDK_LANGUAGE,
                })
            ),
        });
        provider.addSpanProcessor(processor);
        const ownsGlobals = trace.setGlobalTracerProvider(provider);
        if (ownsGlobals) {
            propagation.setGlobalPropagator(
                new CompositePropagator({
                    propagators: [new W3CTraceContextPropagator(), new W3CBaggagePropagator()],
                })
            );
        } else {
            logger.warn(
                'A global tracer provider is already registered; custom spans go to that provider'
            );
        }

        const registry = new InterceptionRegistry({
            tracer: provider.getTracer(INSTRUMENTATION_SCOPE_NAME, SDK_VERSION),
            serviceName: config.serviceName,
            runtime,
            logger,
            handlers: {
                dedup: new DedupSpanHandler({}, logger),
                ...options.handlers,
            },
            loadModule: options.loadModule,
        });

        deferred?.start();
        const tracing = new Tracing(
            config,
            logger,
            sinks,
            { provider, ownsGlobals, processor, exporter, deferred },
            registry,
            options.shutdownOnExit ?? true
        );

        await tracing.applyScopeConfig();
        if (options.methods && options.methods.length > 0) {
            tracing.register(options.methods);
        }

        logger.info(`Tracing started for '${config.serviceName}'`, {
            sinks: sinks.map((sink) => sink.name),
            deferred: deferred !== undefined,
        });
        return tracing;
    }

    private async applyScopeConfig(): Promise<void> {
        const explicit = this.config.scopeConfigPath;
        const filePath = explicit ?? path.join(process.cwd(), DEFAULT_SCOPE_CONFIG_FILE);
        try {
            const scopeConfig = await loadScopeConfigFile(filePath);
            setHttpScopeMappings(toHttpScopeMappings(scopeConfig.headers));
            this.register(toScopeMethodSpecs(scopeConfig.methods));
        } catch (error) {
            if (
                !explicit &&
                isCallscopeError(error) &&
                error.code === ConfigErrorCode.SCOPE_FILE_NOT_FOUND
            ) {
                return;
            }
            this.logger.warn(`Scope configuration ignored: ${toError(error).message}`);
        }
    }

    /**
     * Get the global tracing instance
     * @throws {CallscopeRuntimeError} If setupTracing() has not completed
     */
    static get(): Tracing {
        if (!globalThis.__CALLSCOPE_TRACING__) {
            throw TelemetryError.notInitialized();
        }
        return globalThis.__CALLSCOPE_TRACING__;
    }

    static hasGlobalInstance(): boolean {
        return globalThis.__CALLSCOPE_TRACING__ !== undefined;
    }

    /**
     * Shuts the global instance down so setupTracing() can run again with a new config
     */
    static async shutdownGlobal(): Promise<void> {
        const pending = Tracing._initPromise;
        if (pending && !globalThis.__CALLSCOPE_TRACING__) {
            await pending.catch(() => undefined);
        }
        if (globalThis.__CALLSCOPE_TRACING__) {
            await globalThis.__CALLSCOPE_TRACING__.shutdown();
        }
        globalThis.__CALLSCOPE_TRACING__ = undefined;
        Tracing._initPromise = undefined;
    }

    isEnabled(): boolean {
        return this.pipeline !== undefined;
    }

    register(specs: readonly MethodSpec[]): InstallResult {
        if (!this.registry || this.shutdownPromise) {
            this.logger.debug(`Tracing inactive; not instrumenting ${specs.length} method(s)`);
            return { installed: [], failed: [] };
        }
        return this.registry.register(specs);
    }

    getTracer(name: string = INSTRUMENTATION_SCOPE_NAME): Tracer {
        return this.pipeline
            ? this.pipeline.provider.getTracer(name, SDK_VERSION)
            : trace.getTracer(name, SDK_VERSION);
    }

    /**
     * Exports every finished span, runs queued deferred deliveries and flushes the sinks
     * @returns false when timeoutMs elapsed first
     */
    async forceFlush(timeoutMs: number = DEFAULT_FLUSH_TIMEOUT_MS): Promise<boolean> {
        if (!this.pipeline) {
            return true;
        }
        const { processor, exporter, deferred } = this.pipeline;
        const startedAt = Date.now();
        const remaining = () => Math.max(0, timeoutMs - (Date.now() - startedAt));

        if (!(await processor.drain(timeoutMs))) {
            return false;
        }
        if (deferred && !(await settlesWithin(deferred.drain(), remaining()))) {
            this.logger.warn(`Deferred deliveries did not finish within ${timeoutMs}ms`);
            return false;
        }
        return exporter.flush(remaining());
    }

    /**
     * Restores instrumented methods, exports what is left and shuts every sink down.
     * Safe to call more than once.
     */
    shutdown(): Promise<void> {
        if (!this.shutdownPromise) {
            this.shutdownPromise = this.doShutdown();
        }
        return this.shutdownPromise;
    }

    private async doShutdown(): Promise<void> {
        if (this.exitHandler) {
            process.off('beforeExit', this.exitHandler);
        }
        this.registry?.unregister();
        if (globalThis.__CALLSCOPE_TRACING__ === this) {
            globalThis.__CALLSCOPE_TRACING__ = undefined;
            Tracing._initPromise = undefined;
        }
        if (!this.pipeline) {
            return;
        }

        const { provider, ownsGlobals, processor, deferred } = this.pipeline;
        try {
            await processor.drain();
            await deferred?.stop();
            await provider.shutdown();
        } catch (error) {
            this.logger.warn(TelemetryError.shutdownFailed(toError(error).message).message);
        } finally {
            if (ownsGlobals) {
                trace.disable();
                propagation.disable();
            }
        }
        this.logger.debug('Tracing shut down');
    }
}

/**
 * Validates configuration and starts the tracing pipeline
 *
 * @example
 * ```typescript
 * const tracing = await setupTracing({
 *     config: { serviceName: 'checkout-api', sinks: ['console'] },
 *     methods: [
 *         {
 *             location: { module: 'pg', object: 'Client.prototype', method: 'query' },
 *             wrapper: asyncWrapper,
 *         },
 *     ],
 * });
 * // ...
 * await tracing.shutdown();
 * ```
 */
export function setupTracing(options: SetupTracingOptions = {}): Promise<Tracing> {
    return Tracing.init(options);
}
