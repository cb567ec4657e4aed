import type { HttpHeaders } from '../context/propagation.js';
import { extractHttpContext } from '../context/propagation.js';
import { getContextRuntime } from '../context/context-runtime.js';
import type { Logger } from '../logger/types.js';
import { getDefaultLogger } from '../logger/factory.js';
import { SpanHandler } from './span-handler.js';
import type { PreTracingResult } from './span-handler.js';
import type { CallDetails } from './types.js';

export interface HttpSpanHandlerOptions {
    /** Pulls the inbound request headers out of an intercepted call */
    getHeaders: (call: CallDetails) => HttpHeaders | undefined;
}

/**
 * For request handlers of web frameworks: continues the caller's trace from `traceparent`,
 * restores its baggage and maps configured headers to scopes for the duration of the call.
 */
export class HttpSpanHandler extends SpanHandler {
    private readonly getHeaders: (call: CallDetails) => HttpHeaders | undefined;

    constructor(options: HttpSpanHandlerOptions, logger: Logger = getDefaultLogger()) {
        super(logger);
        this.getHeaders = options.getHeaders;
    }

    override preTracing(call: CallDetails): PreTracingResult | undefined {
        const headers = this.getHeaders(call);
        if (!headers) {
            return undefined;
        }
        const runtime = getContextRuntime();
        const token = runtime.attach(extractHttpContext(headers, runtime.active()));
        return { token };
    }
}
