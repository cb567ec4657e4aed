/**
 * Logger Configuration Schemas
 */

import { z } from 'zod';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'silly'] as const;

const SilentTransportSchema = z
    .object({
        type: z.literal('silent'),
    })
    .strict()
    .describe('Silent transport that discards all logs');

const ConsoleTransportSchema = z
    .object({
        type: z.literal('console'),
        colorize: z.boolean().default(true).describe('Enable colored output'),
    })
    .strict()
    .describe('Console transport for terminal output');

const FileTransportSchema = z
    .object({
        type: z.literal('file'),
        path: z.string().describe('Absolute path to log file'),
        maxSize: z
            .number()
            .positive()
            .default(10 * 1024 * 1024)
            .describe('Max file size in bytes before rotation (default: 10MB)'),
        maxFiles: z
            .number()
            .int()
            .positive()
            .default(5)
            .describe('Max number of rotated files to keep (default: 5)'),
    })
    .strict()
    .describe('File transport with rotation support');

export const LoggerTransportSchema = z.discriminatedUnion('type', [
    SilentTransportSchema,
    ConsoleTransportSchema,
    FileTransportSchema,
]);

export type LoggerTransportConfig = z.output<typeof LoggerTransportSchema>;

export const LoggerConfigSchema = z
    .object({
        level: z.enum(LOG_LEVELS).default('warn').describe('Minimum log level to record'),
        transports: z
            .array(LoggerTransportSchema)
            .min(1)
            .default([{ type: 'console', colorize: true }])
            .describe('Log output destinations'),
    })
    .strict()
    .describe('Logger configuration with multi-transport support');

export type LoggerConfig = z.output<typeof LoggerConfigSchema>;
export type LoggerConfigInput = z.input<typeof LoggerConfigSchema>;
