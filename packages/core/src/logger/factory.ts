/**
 * Logger Factory
 *
 * Creates logger instances from validated logger configuration, and holds the
 * process-wide default logger used by module-level APIs (scopes, context runtime).
 */

import { z } from 'zod';
import type { LoggerConfigInput } from './schemas.js';
import { LOG_LEVELS, LoggerConfigSchema } from './schemas.js';
import type { Logger, LogLevel } from './types.js';
import { LogComponent } from './types.js';
import { CallscopeLogger } from './logger.js';
import { createTransports } from './transport-factory.js';
import { LoggerError } from './errors.js';

export interface CreateLoggerOptions {
    config: LoggerConfigInput;
    /** Service name stamped on every entry */
    service: string;
    /** Component identifier (defaults to TELEMETRY) */
    component?: LogComponent;
}

/**
 * @example
 * ```typescript
 * const logger = createLogger({
 *   config: { level: 'info', transports: [{ type: 'console' }] },
 *   service: 'checkout-api',
 * });
 * logger.createChild(LogComponent.EXPORT).info('sink ready');
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
    const { service, component = LogComponent.TELEMETRY } = options;
    const config = LoggerConfigSchema.parse(options.config);

    return new CallscopeLogger({
        level: config.level,
        component,
        service,
        transports: createTransports(config.transports),
    });
}

const LogLevelSchema = z.enum(LOG_LEVELS);

export function parseLogLevel(value: string): LogLevel {
    const result = LogLevelSchema.safeParse(value.trim().toLowerCase());
    if (!result.success) {
        throw LoggerError.invalidLogLevel(value, LOG_LEVELS);
    }
    return result.data;
}

let defaultLogger: Logger | undefined;

/**
 * Process-wide logger, created on first use from CALLSCOPE_LOG_LEVEL (default 'warn')
 */
export function getDefaultLogger(): Logger {
    if (!defaultLogger) {
        const envLevel = LogLevelSchema.safeParse(process.env.CALLSCOPE_LOG_LEVEL?.toLowerCase());
        defaultLogger = createLogger({
            service: process.env.CALLSCOPE_SERVICE_NAME ?? 'callscope',
            config: {
                level: envLevel.success ? envLevel.data : 'warn',
                transports: [{ type: 'console', colorize: true }],
            },
        });
    }
    return defaultLogger;
}

export function setDefaultLogger(logger: Logger): void {
    defaultLogger = logger;
}
