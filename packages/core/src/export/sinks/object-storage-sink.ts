import type { ObjectStore } from '../../storage/types.js';
import { toError } from '../../errors/runtime-error.js';
import { DEFAULT_RETRY_OPTIONS, retryWithBackoff } from '../retry.js';
import type { RetryHooks, RetryOptions } from '../retry.js';
import { toNdjson } from '../serializer.js';
import { BufferedTraceSink, formatFileTimestamp } from './buffered-trace-sink.js';
import type { BufferedTraceSinkOptions, CompletedTrace } from './buffered-trace-sink.js';

export const DEFAULT_OBJECT_KEY_PREFIX = 'callscope_trace_';

export interface ObjectStorageSinkOptions extends BufferedTraceSinkOptions {
    store: ObjectStore;
    keyPrefix?: string | undefined;
    /** Retry policy for each upload */
    uploadRetry?: Partial<RetryOptions> | undefined;
    retryHooks?: RetryHooks | undefined;
}

/**
 * Uploads each trace as newline-delimited JSON: `<prefix><YYYY-MM-DD_HH.MM.SS>_<traceId>.ndjson`.
 * An upload that still fails after its retries is logged and dropped.
 */
export class ObjectStorageSink extends BufferedTraceSink {
    readonly name = 'object-storage';
    private readonly store: ObjectStore;
    private readonly keyPrefix: string;
    private readonly uploadRetry: RetryOptions;
    private readonly uploadRetryHooks: RetryHooks;

    constructor(options: ObjectStorageSinkOptions) {
        super(options);
        this.store = options.store;
        this.keyPrefix = options.keyPrefix ?? DEFAULT_OBJECT_KEY_PREFIX;
        this.uploadRetry = { ...DEFAULT_RETRY_OPTIONS, ...options.uploadRetry };
        this.uploadRetryHooks = options.retryHooks ?? {};
    }

    keyFor(trace: CompletedTrace): string {
        return `${this.keyPrefix}${formatFileTimestamp(trace.startedAt)}_${trace.traceId}.ndjson`;
    }

    protected async writeTrace(trace: CompletedTrace): Promise<void> {
        const key = this.keyFor(trace);
        const body = `${toNdjson(trace.spans)}\n`;
        try {
            if (!this.store.isConnected()) {
                await this.store.connect();
            }
            await retryWithBackoff(
                () => this.store.put(key, body, { contentType: 'application/x-ndjson' }),
                this.uploadRetry,
                this.logger,
                this.uploadRetryHooks
            );
            this.logger.debug(`Uploaded ${trace.spans.length} span(s) to ${key}`);
        } catch (error) {
            this.logger.error(`Failed to upload trace ${trace.traceId}`, {
                key,
                store: this.store.getStoreType(),
                error: toError(error).message,
            });
        }
    }

    protected override async onShutdown(): Promise<void> {
        if (this.store.isConnected()) {
            await this.store.disconnect();
        }
    }
}
