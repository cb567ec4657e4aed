import type { ReadableSpan } from '@opentelemetry/sdk-trace-base';
import { serializeSpan } from '../serializer.js';
import { BaseSpanSink } from './base-sink.js';
import type { BaseSinkOptions } from './base-sink.js';

export interface ConsoleSinkOptions extends BaseSinkOptions {
    /** Indented output; one line per span when false */
    pretty?: boolean | undefined;
    /** Defaults to process.stdout */
    write?: ((chunk: string) => void) | undefined;
}

/**
 * Prints each span in the wire format, for local debugging
 */
export class ConsoleSpanSink extends BaseSpanSink {
    readonly name = 'console';
    private readonly pretty: boolean;
    private readonly write: (chunk: string) => void;

    constructor(options: ConsoleSinkOptions = {}) {
        super({ retry: false, ...options });
        this.pretty = options.pretty ?? true;
        this.write = options.write ?? ((chunk) => process.stdout.write(chunk));
    }

    protected async deliver(spans: ReadableSpan[]): Promise<void> {
        for (const span of spans) {
            const json = JSON.stringify(serializeSpan(span), null, this.pretty ? 4 : undefined);
            this.write(`${json}\n`);
        }
    }
}
