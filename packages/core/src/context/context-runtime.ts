import { AsyncLocalStorage } from 'node:async_hooks';
import { ROOT_CONTEXT, context as otelContext } from '@opentelemetry/api';
import type { Context, ContextManager } from '@opentelemetry/api';
import type { Logger } from '../logger/types.js';
import { LogComponent } from '../logger/types.js';
import { getDefaultLogger } from '../logger/factory.js';

declare global {
    var __CALLSCOPE_CONTEXT_RUNTIME__: ContextRuntime | undefined;
}

/**
 * One link of the active-context chain. Frames pushed by attach() carry the token that
 * releases them; frames pushed by with() do not.
 */
export interface ContextFrame {
    readonly context: Context;
    readonly parent?: ContextFrame | undefined;
    readonly token?: ContextToken | undefined;
}

const ROOT_FRAME: ContextFrame = { context: ROOT_CONTEXT };

/**
 * Handle returned by attach(). Released at most once.
 */
export class ContextToken {
    private static nextId = 1;

    readonly id: number;
    private released = false;

    /** @internal */
    constructor(readonly previous: ContextFrame) {
        this.id = ContextToken.nextId++;
    }

    isReleased(): boolean {
        return this.released;
    }

    /** @internal */
    release(): void {
        this.released = true;
    }
}

/**
 * Result of a detach call.
 * - detached: the token was the innermost attachment and was released
 * - out_of_order: attachments made after the token were released with it
 * - already_released: no-op
 * - foreign: the token does not belong to the current execution context; no-op
 */
export type DetachOutcome = 'detached' | 'out_of_order' | 'already_released' | 'foreign';

/**
 * AsyncLocalStorage-backed context manager with explicit attach/detach.
 *
 * detach() checks before it releases: a token that is already released, released out of
 * nesting order, or attached in another execution context never throws.
 */
export class ContextRuntime implements ContextManager {
    private readonly storage = new AsyncLocalStorage<ContextFrame>();
    private readonly logger: Logger;

    constructor(logger: Logger) {
        this.logger = logger.createChild(LogComponent.CONTEXT);
    }

    active(): Context {
        return this.currentFrame().context;
    }

    with<A extends unknown[], F extends (...args: A) => ReturnType<F>>(
        context: Context,
        fn: F,
        thisArg?: ThisParameterType<F>,
        ...args: A
    ): ReturnType<F> {
        const frame: ContextFrame = { context, parent: this.currentFrame() };
        return this.storage.run(frame, () => Reflect.apply(fn, thisArg, args));
    }

    bind<T>(context: Context, target: T): T {
        if (typeof target !== 'function') {
            return target;
        }
        return new Proxy(target, {
            apply: (fn, thisArg, args) => this.with(context, () => Reflect.apply(fn, thisArg, args)),
        });
    }

    /**
     * Runs fn in a copy of the current frame so attach() calls inside it cannot leak
     * into the caller's execution context.
     */
    isolate<T>(fn: () => T): T {
        return this.storage.run(this.currentFrame(), fn);
    }

    /**
     * Binds fn to the current frame itself, attachments included, so tokens attached before
     * the call can be detached when fn runs later on another async path.
     */
    bindFrame<A extends unknown[], R>(fn: (...args: A) => R): (...args: A) => R {
        const frame = this.currentFrame();
        return (...args: A) => this.storage.run(frame, () => fn(...args));
    }

    /**
     * Makes ctx the active context for the rest of the current execution context
     */
    attach(context: Context): ContextToken {
        const previous = this.currentFrame();
        const token = new ContextToken(previous);
        this.storage.enterWith({ context, parent: previous, token });
        return token;
    }

    detach(token: ContextToken): DetachOutcome {
        if (token.isReleased()) {
            this.logger.debug('Context token already detached', { tokenId: token.id });
            return 'already_released';
        }

        const current = this.currentFrame();
        if (current.token === token) {
            token.release();
            this.storage.enterWith(token.previous);
            return 'detached';
        }

        // Walk up the chain; a with() boundary means the token's frame is owned by an
        // enclosing execution context that this one cannot restore.
        const above: ContextToken[] = [];
        let frame: ContextFrame | undefined = current;
        while (frame && frame.token !== token) {
            if (!frame.token) {
                frame = undefined;
                break;
            }
            above.push(frame.token);
            frame = frame.parent;
        }

        if (!frame) {
            this.logger.warn('Ignoring detach of a context token from another execution context', {
                tokenId: token.id,
            });
            return 'foreign';
        }

        for (const stale of above) {
            stale.release();
        }
        token.release();
        this.storage.enterWith(token.previous);
        this.logger.debug('Context token detached out of nesting order', {
            tokenId: token.id,
            releasedAbove: above.map((t) => t.id),
        });
        return 'out_of_order';
    }

    enable(): this {
        return this;
    }

    disable(): this {
        this.storage.disable();
        return this;
    }

    private currentFrame(): ContextFrame {
        return this.storage.getStore() ?? ROOT_FRAME;
    }
}

/**
 * Process-wide runtime. Kept on globalThis so duplicate copies of this module share it.
 */
export function getContextRuntime(): ContextRuntime {
    if (!globalThis.__CALLSCOPE_CONTEXT_RUNTIME__) {
        globalThis.__CALLSCOPE_CONTEXT_RUNTIME__ = new ContextRuntime(getDefaultLogger());
    }
    return globalThis.__CALLSCOPE_CONTEXT_RUNTIME__;
}

let installed = false;

/**
 * Registers the runtime as the OpenTelemetry global context manager. Safe to call repeatedly;
 * only the first call registers.
 */
export function installContextRuntime(): ContextRuntime {
    const runtime = getContextRuntime();
    if (installed) {
        return runtime;
    }
    installed = true;

    const registered = otelContext.setGlobalContextManager(runtime);
    if (!registered) {
        getDefaultLogger()
            .createChild(LogComponent.CONTEXT)
            .warn(
                'A global OpenTelemetry context manager is already registered; instrumented calls keep using the callscope runtime'
            );
    }
    return runtime;
}

export function isContextRuntimeInstalled(): boolean {
    return installed;
}
