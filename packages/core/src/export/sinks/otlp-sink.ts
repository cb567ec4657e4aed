import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { ExportResultCode } from '@opentelemetry/core';
import type { ExportResult } from '@opentelemetry/core';
import type { ReadableSpan, SpanExporter } from '@opentelemetry/sdk-trace-base';
import { ExportError } from '../errors.js';
import { BaseSpanSink } from './base-sink.js';
import type { BaseSinkOptions } from './base-sink.js';

export interface OtlpSinkOptions extends BaseSinkOptions {
    /** Collector traces endpoint, e.g. http://localhost:4318/v1/traces */
    endpoint?: string | undefined;
    headers?: Record<string, string> | undefined;
    timeoutMs?: number | undefined;
    /** Replaces the OTLP/HTTP exporter built from the options above */
    exporter?: SpanExporter | undefined;
}

/**
 * Forwards spans to an OpenTelemetry collector over OTLP/HTTP
 */
export class OtlpSpanSink extends BaseSpanSink {
    readonly name = 'otlp';
    private readonly exporter: SpanExporter;

    constructor(options: OtlpSinkOptions = {}) {
        // the OTLP exporter retries transient failures itself
        super({ retry: false, ...options });
        this.exporter = options.exporter ?? createOtlpExporter(options);
    }

    protected deliver(spans: ReadableSpan[]): Promise<void> {
        return new Promise((resolve, reject) => {
            this.exporter.export(spans, (result: ExportResult) => {
                if (result.code === ExportResultCode.SUCCESS) {
                    resolve();
                } else {
                    reject(result.error ?? ExportError.deliveryFailed(this.name, 'collector rejected the batch'));
                }
            });
        });
    }

    protected override async onFlush(): Promise<void> {
        await this.exporter.forceFlush?.();
    }

    protected override async onShutdown(): Promise<void> {
        await this.exporter.shutdown();
    }
}

function createOtlpExporter(options: OtlpSinkOptions): OTLPTraceExporter {
    const config: { url?: string; headers?: Record<string, string>; timeoutMillis?: number } = {};
    if (options.endpoint) {
        config.url = options.endpoint;
    }
    if (options.headers) {
        config.headers = options.headers;
    }
    if (options.timeoutMs !== undefined) {
        config.timeoutMillis = options.timeoutMs;
    }
    return new OTLPTraceExporter(config);
}
