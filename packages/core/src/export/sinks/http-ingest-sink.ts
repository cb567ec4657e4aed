import type { ReadableSpan } from '@opentelemetry/sdk-trace-base';
import { CallscopeRuntimeError } from '../../errors/runtime-error.js';
import { ExportError } from '../errors.js';
import { toBatchEnvelope } from '../serializer.js';
import { BaseSpanSink } from './base-sink.js';
import type { BaseSinkOptions } from './base-sink.js';

export const SUCCESS_STATUS_CODES: readonly number[] = [200, 202, 204];
export const DEFAULT_INGEST_TIMEOUT_MS = 15_000;

export interface HttpIngestSinkOptions extends BaseSinkOptions {
    endpoint: string;
    apiKey: string;
    timeoutMs?: number | undefined;
    headers?: Record<string, string> | undefined;
    /** Defaults to the global fetch */
    fetch?: typeof fetch | undefined;
}

/**
 * POSTs batches as `{"batch": [...]}` to an ingest endpoint authenticated with `x-api-key`
 */
export class HttpIngestSink extends BaseSpanSink {
    readonly name = 'http';
    readonly endpoint: string;
    private readonly apiKey: string;
    private readonly timeoutMs: number;
    private readonly headers: Record<string, string>;
    private readonly fetchFn: typeof fetch;

    constructor(options: HttpIngestSinkOptions) {
        super(options);
        this.endpoint = options.endpoint;
        this.apiKey = options.apiKey;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_INGEST_TIMEOUT_MS;
        this.headers = options.headers ?? {};
        this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    }

    protected async deliver(spans: ReadableSpan[]): Promise<void> {
        const body = JSON.stringify(toBatchEnvelope(spans));

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

        try {
            const response = await this.fetchFn(this.endpoint, {
                method: 'POST',
                headers: {
                    ...this.headers,
                    'Content-Type': 'application/json',
                    'x-api-key': this.apiKey,
                },
                body,
                signal: controller.signal,
            });

            if (!SUCCESS_STATUS_CODES.includes(response.status)) {
                const text = await response.text().catch(() => '');
                throw ExportError.httpStatus(this.endpoint, response.status, text);
            }
            this.logger.debug(`Exported ${spans.length} span(s) to ${this.endpoint}`);
        } catch (error) {
            if (error instanceof CallscopeRuntimeError) {
                throw error;
            }
            if (error instanceof Error && error.name === 'AbortError') {
                throw ExportError.timeout(`POST ${this.endpoint}`, this.timeoutMs);
            }
            throw ExportError.network(this.endpoint, error);
        } finally {
            clearTimeout(timeoutId);
        }
    }
}
