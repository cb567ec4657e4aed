import { ExportResultCode } from '@opentelemetry/core';
import type { ExportResult } from '@opentelemetry/core';
import type { ReadableSpan } from '@opentelemetry/sdk-trace-base';
import { toError } from '../errors/runtime-error.js';
import { getDefaultLogger } from '../logger/factory.js';
import type { Logger } from '../logger/types.js';
import { LogComponent } from '../logger/types.js';
import type { SpanSink } from './types.js';

const URL_ATTRIBUTES = ['http.target', 'http.route', 'http.url', 'url.path', 'url.full'];

/**
 * Normalizes URL paths for consistent comparison
 * Handles both full URLs and path-only strings
 * @returns Normalized lowercase path without trailing slash
 */
export function normalizeUrlPath(url: string): string {
    let pathname: string;
    try {
        pathname = new URL(url).pathname;
    } catch {
        // not a full URL, treat it as a path
        pathname = url;
    }
    pathname = pathname.toLowerCase().trim();
    return pathname.endsWith('/') ? pathname.slice(0, -1) : pathname;
}

export interface CompositeExporterOptions {
    /**
     * Traces touching one of these paths (or a sub-path) are not exported, e.g. the ingest
     * endpoint's own route when the service hosting it is traced too
     */
    ignoredUrlPaths?: readonly string[] | undefined;
    logger?: Logger | undefined;
}

/**
 * Fans each batch out to every sink in parallel. The result is FAILED when any sink fails.
 *
 * @example
 * ```typescript
 * const exporter = new CompositeExporter([
 *     new ConsoleSpanSink(),
 *     new HttpIngestSink({ endpoint, apiKey }),
 * ]);
 * ```
 */
export class CompositeExporter implements SpanSink {
    readonly name = 'composite';
    readonly sinks: readonly SpanSink[];
    private readonly ignoredPaths: string[];
    private readonly logger: Logger;

    constructor(sinks: SpanSink[], options: CompositeExporterOptions = {}) {
        this.sinks = sinks;
        this.ignoredPaths = (options.ignoredUrlPaths ?? []).map(normalizeUrlPath);
        this.logger = (options.logger ?? getDefaultLogger()).createChild(LogComponent.EXPORT);
    }

    export(spans: ReadableSpan[], resultCallback: (result: ExportResult) => void): void {
        void this.exportSpans(spans).then(resultCallback);
    }

    async exportSpans(spans: ReadableSpan[]): Promise<ExportResult> {
        const filtered = this.withoutIgnoredTraces(spans);
        if (filtered.length === 0) {
            return { code: ExportResultCode.SUCCESS };
        }

        try {
            const results = await Promise.all(this.sinks.map((sink) => sink.exportSpans(filtered)));
            const failed = results.find((r) => r.code === ExportResultCode.FAILED);
            return failed ?? { code: ExportResultCode.SUCCESS };
        } catch (error) {
            this.logger.error('Composite export failed', { error: toError(error).message });
            return { code: ExportResultCode.FAILED, error: toError(error) };
        }
    }

    async flush(timeoutMs?: number): Promise<boolean> {
        const results = await Promise.all(this.sinks.map((sink) => sink.flush(timeoutMs)));
        return results.every(Boolean);
    }

    async forceFlush(): Promise<void> {
        await this.flush();
    }

    async shutdown(): Promise<void> {
        await Promise.all(this.sinks.map((sink) => sink.shutdown()));
    }

    private withoutIgnoredTraces(spans: ReadableSpan[]): ReadableSpan[] {
        if (this.ignoredPaths.length === 0) {
            return spans;
        }
        const ignoredTraceIds = new Set(
            spans.filter((span) => this.touchesIgnoredPath(span)).map((span) => span.spanContext().traceId)
        );
        return spans.filter((span) => !ignoredTraceIds.has(span.spanContext().traceId));
    }

    private touchesIgnoredPath(span: ReadableSpan): boolean {
        return URL_ATTRIBUTES.some((key) => {
            const value = span.attributes[key];
            if (typeof value !== 'string') {
                return false;
            }
            const path = normalizeUrlPath(value);
            return this.ignoredPaths.some((ignored) => path === ignored || path.startsWith(`${ignored}/`));
        });
    }
}
