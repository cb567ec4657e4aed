import { createRequire } from 'node:module';
import path from 'node:path';
import type { Tracer } from '@opentelemetry/api';
import { getContextRuntime } from '../context/context-runtime.js';
import type { ContextRuntime } from '../context/context-runtime.js';
import { toError } from '../errors/runtime-error.js';
import type { Logger } from '../logger/types.js';
import { LogComponent } from '../logger/types.js';
import { getDefaultLogger } from '../logger/factory.js';
import { InstrumentationError } from './errors.js';
import { SpanHandler } from './span-handler.js';
import type { InstallFailure, InstallResult, Invocation, MethodSpec } from './types.js';

/** Marks proxies installed by a registry */
export const INSTRUMENTED: unique symbol = Symbol.for('callscope.instrumented');

export const DEFAULT_HANDLER = 'default';

export type ModuleLoader = (specifier: string) => unknown;

export interface InterceptionRegistryOptions {
    tracer: Tracer;
    serviceName: string;
    runtime?: ContextRuntime;
    logger?: Logger;
    /** Named span handlers; 'default' is added when missing */
    handlers?: Record<string, SpanHandler>;
    /** Resolves `MethodLocation.module`; defaults to require() from the working directory */
    loadModule?: ModuleLoader;
}

/** What a live proxy delegates to; cleared on unregister */
interface ProxyBinding {
    current?: { spec: MethodSpec; handler: SpanHandler } | undefined;
}

interface Installation {
    name: string;
    holder: object;
    method: string;
    proxy: Function;
    /** Own property replaced by the proxy; undefined when the method was inherited */
    originalDescriptor: PropertyDescriptor | undefined;
    binding: ProxyBinding;
}

function defaultModuleLoader(): ModuleLoader {
    const require = createRequire(path.join(process.cwd(), 'index.js'));
    return (specifier) => require(specifier);
}

function isObjectLike(value: unknown): value is object {
    return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

function isInstrumented(value: unknown): boolean {
    return typeof value === 'function' && INSTRUMENTED in value;
}

/**
 * Replaces library methods with tracing proxies and puts the originals back on unregister().
 * Each target installs on its own: one that cannot be found or patched is logged and listed
 * in the result, the others still install.
 */
export class InterceptionRegistry {
    private readonly tracer: Tracer;
    private readonly runtime: ContextRuntime;
    private readonly logger: Logger;
    private readonly serviceName: string;
    private readonly handlers = new Map<string, SpanHandler>();
    private readonly loadModule: ModuleLoader;
    private installations: Installation[] = [];

    constructor(options: InterceptionRegistryOptions) {
        this.tracer = options.tracer;
        this.serviceName = options.serviceName;
        this.runtime = options.runtime ?? getContextRuntime();
        this.logger = (options.logger ?? getDefaultLogger()).createChild(
            LogComponent.INSTRUMENTATION
        );
        this.loadModule = options.loadModule ?? defaultModuleLoader();

        for (const [name, handler] of Object.entries(options.handlers ?? {})) {
            this.handlers.set(name, handler);
        }
        if (!this.handlers.has(DEFAULT_HANDLER)) {
            this.handlers.set(DEFAULT_HANDLER, new SpanHandler(this.logger));
        }
    }

    registerHandler(name: string, handler: SpanHandler): void {
        this.handlers.set(name, handler);
    }

    /** Names of the methods currently proxied */
    get installed(): string[] {
        return this.installations.map((i) => i.name);
    }

    register(specs: readonly MethodSpec[]): InstallResult {
        const result: InstallResult = { installed: [], failed: [] };

        for (const spec of specs) {
            const name = spanNameOf(spec);
            try {
                this.install(spec, name);
                result.installed.push(name);
            } catch (error) {
                const failure: InstallFailure = { spec, name, error: toError(error) };
                result.failed.push(failure);
                this.logger.warn(`Skipping instrumentation of ${name}: ${failure.error.message}`);
            }
        }

        this.logger.debug(
            `Instrumented ${result.installed.length} method(s), ${result.failed.length} skipped`
        );
        return result;
    }

    /**
     * Restores every original method, latest installation first. Proxies that were wrapped
     * again by someone else stay in place but turn into plain pass-throughs.
     */
    unregister(): void {
        const installations = this.installations;
        this.installations = [];

        for (const installation of installations.reverse()) {
            installation.binding.current = undefined;

            const own = Object.getOwnPropertyDescriptor(installation.holder, installation.method);
            if (own?.value !== installation.proxy) {
                this.logger.warn(
                    `${installation.name} was replaced after instrumentation; leaving it in place`
                );
                continue;
            }

            try {
                if (installation.originalDescriptor) {
                    Object.defineProperty(
                        installation.holder,
                        installation.method,
                        installation.originalDescriptor
                    );
                } else {
                    Reflect.deleteProperty(installation.holder, installation.method);
                }
            } catch (error) {
                this.logger.warn(`Could not restore ${installation.name}`, {
                    error: toError(error).message,
                });
            }
        }
    }

    private install(spec: MethodSpec, name: string): void {
        const handlerName = spec.handler ?? DEFAULT_HANDLER;
        const handler = this.handlers.get(handlerName);
        if (!handler) {
            throw InstrumentationError.handlerNotFound(handlerName, [...this.handlers.keys()]);
        }

        const holder = this.resolveHolder(spec);
        const { method } = spec.location;
        const original: unknown = Reflect.get(holder, method);
        if (typeof original !== 'function') {
            throw InstrumentationError.methodNotFound(name, method);
        }
        if (isInstrumented(original)) {
            throw InstrumentationError.alreadyInstrumented(name);
        }

        const binding: ProxyBinding = { current: { spec, handler } };
        const proxy = this.createProxy(name, original, binding);
        const originalDescriptor = Object.getOwnPropertyDescriptor(holder, method);

        Object.defineProperty(holder, method, {
            value: proxy,
            writable: true,
            configurable: true,
            enumerable: originalDescriptor?.enumerable ?? false,
        });

        this.installations.push({ name, holder, method, proxy, originalDescriptor, binding });
    }

    private resolveHolder(spec: MethodSpec): object {
        const { module: moduleName, target, object: objectPath } = spec.location;

        let root: unknown;
        let rootLabel: string;
        if (target !== undefined) {
            root = target;
            rootLabel = 'target';
        } else if (moduleName !== undefined) {
            try {
                root = this.loadModule(moduleName);
            } catch (error) {
                throw InstrumentationError.moduleNotFound(moduleName, error);
            }
            rootLabel = moduleName;
        } else {
            throw InstrumentationError.invalidLocation('either module or target is required');
        }

        if (!isObjectLike(root)) {
            throw InstrumentationError.moduleNotFound(rootLabel, 'not an object');
        }
        if (!objectPath) {
            return root;
        }

        let holder: object = root;
        for (const segment of objectPath.split('.')) {
            const next: unknown = Reflect.get(holder, segment);
            if (!isObjectLike(next)) {
                throw InstrumentationError.objectNotFound(rootLabel, objectPath);
            }
            holder = next;
        }
        return holder;
    }

    private createProxy(name: string, original: Function, binding: ProxyBinding): Function {
        const { tracer, runtime, logger, serviceName } = this;

        const proxy = function (this: unknown, ...args: unknown[]): unknown {
            const current = binding.current;
            if (!current) {
                return Reflect.apply(original, this, args);
            }
            const invocation: Invocation = {
                call: { spec: current.spec, name, instance: this, args },
                handler: current.handler,
                tracer,
                runtime,
                logger,
                serviceName,
                callOriginal: () => Reflect.apply(original, this, args),
            };
            return current.spec.wrapper(invocation);
        };

        Object.defineProperty(proxy, 'name', { value: original.name });
        Object.defineProperty(proxy, 'length', { value: original.length });
        Object.defineProperty(proxy, INSTRUMENTED, { value: true });
        return proxy;
    }
}

/**
 * `spanName`, else module, object path and method joined with dots
 */
export function spanNameOf(spec: MethodSpec): string {
    if (spec.spanName) {
        return spec.spanName;
    }
    const { module: moduleName, object: objectPath, method } = spec.location;
    return [moduleName, objectPath, method].filter((part) => part !== undefined && part !== '').join('.');
}
