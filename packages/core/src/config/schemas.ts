/**
 * Tracing Configuration Schemas
 *
 * Validated shape of everything setupTracing() accepts. Environment variables and explicit
 * options are both reduced to TracingConfigInput and parsed here, so defaults live in one place.
 */

import { z } from 'zod';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { LoggerConfigSchema } from '../logger/schemas.js';
import { ConfigErrorCode } from './error-codes.js';

export const SINK_TYPES = ['console', 'file', 'http', 'memory', 'otlp', 'object-storage'] as const;

export type SinkType = (typeof SINK_TYPES)[number];

const HeadersSchema = z.record(z.string()).default({}).describe('Extra request headers');

export const HttpSinkConfigSchema = z
    .object({
        endpoint: z.string().url().optional().describe('Ingest URL receiving {"batch": [...]}'),
        apiKey: z.string().min(1).optional().describe('Sent as the x-api-key header'),
        timeoutMs: z.number().int().positive().default(15_000).describe('Per-request timeout'),
        headers: HeadersSchema,
    })
    .strict()
    .describe('HTTP ingest sink');

export const FileSinkConfigSchema = z
    .object({
        outputDir: z
            .string()
            .min(1)
            .optional()
            .describe('Directory for trace files (default: ./.callscope)'),
        filePrefix: z.string().default('callscope_trace_').describe('Trace file name prefix'),
        traceTimeoutMs: z
            .number()
            .int()
            .positive()
            .default(60_000)
            .describe('Write a trace without its root span after this long'),
    })
    .strict()
    .describe('Per-trace JSON file sink');

export const OtlpSinkConfigSchema = z
    .object({
        endpoint: z
            .string()
            .url()
            .optional()
            .describe('OTLP/HTTP traces URL (default: http://localhost:4318/v1/traces)'),
        headers: HeadersSchema,
        timeoutMs: z.number().int().positive().optional(),
    })
    .strict()
    .describe('OTLP over HTTP sink');

export const ObjectStorageSinkConfigSchema = z
    .object({
        keyPrefix: z.string().default('callscope_trace_').describe('Object key prefix'),
        traceTimeoutMs: z.number().int().positive().default(60_000),
    })
    .strict()
    .describe('NDJSON-per-trace object storage sink; the store itself is passed to setupTracing()');

export const BatchConfigSchema = z
    .object({
        maxQueueSize: z.number().int().positive().default(2048),
        maxExportBatchSize: z.number().int().positive().default(512),
        scheduledDelayMillis: z.number().int().nonnegative().default(5000),
        exportTimeoutMillis: z.number().int().positive().default(30_000),
    })
    .strict()
    .describe('Batch span processor tuning');

export const RetryConfigSchema = z
    .object({
        maxRetries: z.number().int().min(1).default(3).describe('Total delivery attempts'),
        baseDelayMs: z.number().nonnegative().default(1000),
        maxDelayMs: z.number().nonnegative().default(10_000),
        jitter: z.number().min(0).max(1).default(0.1).describe('Fraction of the delay added at random'),
    })
    .strict()
    .describe('Retry with exponential backoff for HTTP ingest');

export const DeferredConfigSchema = z
    .object({
        enabled: z.boolean().default(false),
        maxWaitMs: z.number().int().positive().default(30_000),
        pollIntervalMs: z.number().int().positive().default(1000),
    })
    .strict()
    .describe('Queue deliveries and run them once the host signals it is idle');

export const TracingConfigSchema = z
    .object({
        serviceName: z
            .string()
            .trim()
            .min(1)
            .describe('Workflow name stamped on every span and used as service.name'),
        enabled: z.boolean().default(true),
        sinks: z.array(z.enum(SINK_TYPES)).min(1).default(['file']),
        http: HttpSinkConfigSchema.default({}),
        file: FileSinkConfigSchema.default({}),
        otlp: OtlpSinkConfigSchema.default({}),
        objectStorage: ObjectStorageSinkConfigSchema.default({}),
        batch: BatchConfigSchema.default({}),
        retry: RetryConfigSchema.default({}),
        deferred: DeferredConfigSchema.default({}),
        scopeConfigPath: z
            .string()
            .min(1)
            .optional()
            .describe('JSON scope configuration (default: ./callscope_scopes.json when present)'),
        ignoredUrlPaths: z
            .array(z.string().min(1))
            .default([])
            .describe('Traces touching these URL paths are not exported'),
        logger: LoggerConfigSchema.optional(),
    })
    .strict()
    .describe('Tracing configuration')
    .superRefine((data, ctx) => {
        if (data.sinks.includes('http')) {
            for (const field of ['endpoint', 'apiKey'] as const) {
                if (!data.http[field]) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        message: `The http sink requires http.${field}`,
                        path: ['http', field],
                        params: {
                            code: ConfigErrorCode.HTTP_SINK_INCOMPLETE,
                            scope: ErrorScope.CONFIG,
                            type: ErrorType.USER,
                        },
                    });
                }
            }
        }
        if (data.batch.maxExportBatchSize > data.batch.maxQueueSize) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: 'batch.maxExportBatchSize cannot exceed batch.maxQueueSize',
                path: ['batch', 'maxExportBatchSize'],
            });
        }
        if (data.retry.baseDelayMs > data.retry.maxDelayMs) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: 'retry.baseDelayMs cannot exceed retry.maxDelayMs',
                path: ['retry', 'baseDelayMs'],
            });
        }
    });

export type TracingConfig = z.output<typeof TracingConfigSchema>;
export type TracingConfigInput = z.input<typeof TracingConfigSchema>;
