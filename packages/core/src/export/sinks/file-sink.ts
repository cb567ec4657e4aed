import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ReadableSpan } from '@opentelemetry/sdk-trace-base';
import { ATTR_SERVICE_NAME } from '@opentelemetry/semantic-conventions';
import { toError } from '../../errors/runtime-error.js';
import { serializeSpan } from '../serializer.js';
import { BufferedTraceSink, formatFileTimestamp } from './buffered-trace-sink.js';
import type { BufferedTraceSinkOptions, CompletedTrace } from './buffered-trace-sink.js';

export const DEFAULT_FILE_PREFIX = 'callscope_trace_';
export const DEFAULT_TRACE_DIR = '.callscope';

export interface FileSinkOptions extends BufferedTraceSinkOptions {
    outputDir?: string | undefined;
    filePrefix?: string | undefined;
    /** Overrides the service.name resource attribute in file names */
    serviceName?: string | undefined;
}

/**
 * Writes one JSON array file per trace:
 * `<prefix><service>_<traceId>_<YYYY-MM-DD_HH.MM.SS>.json`
 */
export class FileSpanSink extends BufferedTraceSink {
    readonly name = 'file';
    readonly outputDir: string;
    private readonly filePrefix: string;
    private readonly serviceName: string | undefined;
    private lastWritten: string | undefined;

    constructor(options: FileSinkOptions = {}) {
        super(options);
        this.outputDir = options.outputDir ?? path.join(process.cwd(), DEFAULT_TRACE_DIR);
        this.filePrefix = options.filePrefix ?? DEFAULT_FILE_PREFIX;
        this.serviceName = options.serviceName;
    }

    /** Path of the most recent trace file */
    get lastWrittenFile(): string | undefined {
        return this.lastWritten;
    }

    fileNameFor(trace: CompletedTrace): string {
        const service = this.serviceName ?? serviceNameOf(trace.spans) ?? 'unknown_service';
        return `${this.filePrefix}${service}_${trace.traceId}_${formatFileTimestamp(trace.startedAt)}.json`;
    }

    protected async writeTrace(trace: CompletedTrace): Promise<void> {
        const filePath = path.join(this.outputDir, this.fileNameFor(trace));
        try {
            await mkdir(this.outputDir, { recursive: true });
            await writeFile(filePath, JSON.stringify(trace.spans.map(serializeSpan), null, 4), 'utf8');
        } catch (error) {
            this.logger.error(`Failed to write trace file ${filePath}`, {
                error: toError(error).message,
            });
            throw error;
        }
        this.lastWritten = filePath;
        this.logger.debug(`Wrote ${trace.spans.length} span(s) to ${filePath}`);
    }
}

function serviceNameOf(spans: readonly ReadableSpan[]): string | undefined {
    const value = spans[0]?.resource.attributes[ATTR_SERVICE_NAME];
    return typeof value === 'string' && value !== '' ? value : undefined;
}
