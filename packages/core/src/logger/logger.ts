/**
 * Callscope Logger
 *
 * Multi-transport logger with structured entries and component-based categorization.
 */

import type { Logger, LoggerTransport, LogEntry, LogLevel, LogComponent } from './types.js';
import { FileTransport } from './transports/file-transport.js';

export interface CallscopeLoggerConfig {
    /** Minimum log level to record */
    level: LogLevel;
    /** Component identifier */
    component: LogComponent;
    /** Service name stamped on every entry */
    service: string;
    /** Transport instances */
    transports: LoggerTransport[];
}

interface LevelRef {
    value: LogLevel;
}

/**
 * CallscopeLogger - Multi-transport logger with structured logging
 */
export class CallscopeLogger implements Logger {
    private levelRef: LevelRef;
    private component: LogComponent;
    private service: string;
    private transports: LoggerTransport[];

    // Lower number = more severe
    // If level is 'debug', logs error(0), warn(1), info(2), debug(3) but not silly(4)
    private static readonly LEVELS: Record<LogLevel, number> = {
        error: 0,
        warn: 1,
        info: 2,
        debug: 3,
        silly: 4,
    };

    constructor(config: CallscopeLoggerConfig, levelRef?: LevelRef) {
        this.levelRef = levelRef ?? { value: config.level };
        this.component = config.component;
        this.service = config.service;
        this.transports = config.transports;
    }

    debug(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('debug')) {
            this.log('debug', message, context);
        }
    }

    silly(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('silly')) {
            this.log('silly', message, context);
        }
    }

    info(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('info')) {
            this.log('info', message, context);
        }
    }

    warn(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('warn')) {
            this.log('warn', message, context);
        }
    }

    error(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('error')) {
            this.log('error', message, context);
        }
    }

    trackException(error: Error, context?: Record<string, unknown>): void {
        this.error(error.message, {
            ...context,
            errorName: error.name,
            errorStack: error.stack,
            errorType: error.constructor.name,
        });
    }

    private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.component,
            service: this.service,
            context,
        };

        for (const transport of this.transports) {
            try {
                const pending = transport.write(entry);
                if (pending instanceof Promise) {
                    pending.catch((error: unknown) => {
                        console.error('Logger transport error:', error);
                    });
                }
            } catch (error) {
                // Don't let transport errors break logging
                console.error('Logger transport error:', error);
            }
        }
    }

    private shouldLog(level: LogLevel): boolean {
        return CallscopeLogger.LEVELS[level] <= CallscopeLogger.LEVELS[this.levelRef.value];
    }

    /**
     * Create a child logger for a different component
     * Shares the same transports and level reference
     */
    createChild(component: LogComponent): CallscopeLogger {
        return new CallscopeLogger(
            {
                level: this.levelRef.value,
                component,
                service: this.service,
                transports: this.transports,
            },
            this.levelRef
        );
    }

    setLevel(level: LogLevel): void {
        this.levelRef.value = level;
    }

    getLevel(): LogLevel {
        return this.levelRef.value;
    }

    getLogFilePath(): string | null {
        for (const transport of this.transports) {
            if (transport instanceof FileTransport) {
                return transport.getFilePath();
            }
        }
        return null;
    }

    async destroy(): Promise<void> {
        for (const transport of this.transports) {
            if (transport.destroy) {
                try {
                    await transport.destroy();
                } catch (error) {
                    console.error('Error destroying transport:', error);
                }
            }
        }
    }
}
