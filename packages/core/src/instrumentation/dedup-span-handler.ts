import type { Logger } from '../logger/types.js';
import { getDefaultLogger } from '../logger/factory.js';
import { SpanHandler } from './span-handler.js';
import type { CallDetails } from './types.js';

export interface DedupSpanHandlerOptions {
    /** Groups calls into bursts; defaults to the call's span name */
    key?: (call: CallDetails) => string;
    /**
     * Idle time after which a call produces a span again. Without a window only the first call
     * per key is ever traced.
     */
    windowMs?: number;
    now?: () => number;
}

/**
 * Traces only the first call of a burst of repeated probe calls (health checks, listing
 * tools that never change). A call is part of a burst when it follows the previous call with
 * the same key within windowMs.
 */
export class DedupSpanHandler extends SpanHandler {
    private readonly lastSeen = new Map<string, number>();
    private readonly keyOf: (call: CallDetails) => string;
    private readonly windowMs: number | undefined;
    private readonly now: () => number;

    constructor(options: DedupSpanHandlerOptions = {}, logger: Logger = getDefaultLogger()) {
        super(logger);
        this.keyOf = options.key ?? ((call) => call.name);
        this.windowMs = options.windowMs;
        this.now = options.now ?? Date.now;
    }

    override skipSpan(call: CallDetails): boolean {
        const key = this.keyOf(call);
        const now = this.now();
        const last = this.lastSeen.get(key);
        this.lastSeen.set(key, now);

        if (last === undefined) {
            return false;
        }
        if (this.windowMs === undefined) {
            return true;
        }
        return now - last < this.windowMs;
    }

    /** Forgets every burst so the next call of each key is traced again */
    reset(): void {
        this.lastSeen.clear();
    }
}
