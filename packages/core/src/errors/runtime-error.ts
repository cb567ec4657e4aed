import type { CallscopeErrorCode, ErrorScope, ErrorType } from './types.js';

/**
 * Runtime error carrying a typed code, the domain that raised it and its HTTP-style type.
 * Domain factories (ExportError, ConfigError, ...) are the usual way to create one.
 */
export class CallscopeRuntimeError<C = Record<string, unknown>> extends Error {
    constructor(
        public readonly code: CallscopeErrorCode | string,
        public readonly scope: ErrorScope | string,
        public readonly type: ErrorType,
        message: string,
        public readonly context?: C,
        public readonly recovery?: string | string[]
    ) {
        super(message);
        this.name = 'CallscopeRuntimeError';
    }

    toJSON(): Record<string, unknown> {
        return {
            code: this.code,
            message: this.message,
            scope: this.scope,
            type: this.type,
            context: this.context,
            recovery: this.recovery,
        };
    }
}

/**
 * Type guard for errors raised by this SDK
 */
export function isCallscopeError(error: unknown): error is CallscopeRuntimeError {
    return error instanceof CallscopeRuntimeError;
}

/**
 * Normalizes anything thrown into an Error for logging
 */
export function toError(value: unknown): Error {
    if (value instanceof Error) {
        return value;
    }
    return new Error(typeof value === 'string' ? value : safeDescribe(value));
}

function safeDescribe(value: unknown): string {
    try {
        return JSON.stringify(value) ?? String(value);
    } catch {
        return String(value);
    }
}
