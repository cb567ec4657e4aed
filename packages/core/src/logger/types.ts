/**
 * Logger Types and Interfaces
 *
 * Core abstractions for the multi-transport logger.
 */

/**
 * Log levels in order of severity
 * Following Winston convention: error < warn < info < debug < silly
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silly';

/**
 * Component identifiers for structured logging
 * Mirrors ErrorScope, with a few finer-grained pipeline stages
 */
export enum LogComponent {
    INSTRUMENTATION = 'instrumentation',
    CONTEXT = 'context',
    SCOPE = 'scope',
    EXPORT = 'export',
    DELIVERY = 'delivery',
    STORAGE = 'storage',
    CONFIG = 'config',
    TELEMETRY = 'telemetry',
}

/**
 * Structured log entry
 * All logs are converted to this format before being sent to transports
 */
export interface LogEntry {
    /** Log level */
    level: LogLevel;
    /** Primary log message */
    message: string;
    /** ISO timestamp */
    timestamp: string;
    /** Component that generated the log */
    component: LogComponent;
    /** Service the SDK is tracing */
    service: string;
    /** Optional structured context data */
    context?: Record<string, unknown> | undefined;
}

/**
 * Logger type
 * All logger implementations must implement this shape.
 */
export type Logger = {
    debug(message: string, context?: Record<string, unknown>): void;

    /**
     * Most verbose level, for full payload dumps
     */
    silly(message: string, context?: Record<string, unknown>): void;

    info(message: string, context?: Record<string, unknown>): void;

    warn(message: string, context?: Record<string, unknown>): void;

    error(message: string, context?: Record<string, unknown>): void;

    /**
     * Track exception with stack trace
     */
    trackException(error: Error, context?: Record<string, unknown>): void;

    /**
     * Create a child logger with a different component
     * Shares the same transports, service and level but uses a different component identifier
     */
    createChild(component: LogComponent): Logger;

    /**
     * Set the log level dynamically
     * Affects this logger and all child loggers created from it (shared level reference)
     */
    setLevel(level: LogLevel): void;

    getLevel(): LogLevel;

    /**
     * Get the log file path if file logging is enabled
     * @returns Log file path or null if file logging is not configured
     */
    getLogFilePath(): string | null;

    /**
     * Cleanup resources and close transports
     */
    destroy(): Promise<void>;
};

/**
 * Base transport interface
 * All transport implementations must implement this interface
 */
export type LoggerTransport = {
    write(entry: LogEntry): void | Promise<void>;

    /**
     * Cleanup resources when logger is destroyed
     */
    destroy?(): void | Promise<void>;
};
