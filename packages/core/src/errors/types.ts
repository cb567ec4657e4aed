import type { ConfigErrorCode } from '../config/error-codes.js';
import type { ContextErrorCode } from '../context/error-codes.js';
import type { ExportErrorCode } from '../export/error-codes.js';
import type { InstrumentationErrorCode } from '../instrumentation/error-codes.js';
import type { LoggerErrorCode } from '../logger/error-codes.js';
import type { StorageErrorCode } from '../storage/error-codes.js';
import type { TelemetryErrorCode } from '../telemetry/error-codes.js';

/**
 * Error scopes representing functional domains in the SDK
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    CONFIG = 'config', // Configuration loading, env parsing, scope config files
    CONTEXT = 'context', // Context runtime, scopes, carriers
    INSTRUMENTATION = 'instrumentation', // Method interception and span lifecycle
    EXPORT = 'export', // Batching, serialization, sink delivery
    STORAGE = 'storage', // Object store backends
    LOGGER = 'logger', // Logging system operations, transports, and configuration
    TELEMETRY = 'telemetry', // Tracing setup and shutdown
}

/**
 * Error types that map directly to HTTP status codes
 * Each type represents the nature of the error
 */
export enum ErrorType {
    USER = 'user', // 400 - bad input, config errors, validation failures
    FORBIDDEN = 'forbidden', // 403 - permission denied, unauthorized
    NOT_FOUND = 'not_found', // 404 - resource doesn't exist
    TIMEOUT = 'timeout', // 408 - operation timed out
    CONFLICT = 'conflict', // 409 - resource conflict, concurrent operation
    RATE_LIMIT = 'rate_limit', // 429 - too many requests
    SYSTEM = 'system', // 500 - bugs, internal failures, unexpected states
    THIRD_PARTY = 'third_party', // 502 - upstream backend failures
    UNKNOWN = 'unknown', // 500 - unclassified errors, fallback
}

/**
 * Union type for all error codes across domains
 */
export type CallscopeErrorCode =
    | ConfigErrorCode
    | ContextErrorCode
    | ExportErrorCode
    | InstrumentationErrorCode
    | LoggerErrorCode
    | StorageErrorCode
    | TelemetryErrorCode;

/** Severity of an issue */
export type Severity = 'error' | 'warning';

/** Generic issue type for validation results */
export interface Issue<C = unknown> {
    code: CallscopeErrorCode | string;
    message: string;
    scope: ErrorScope | string;
    type: ErrorType;
    severity: Severity;
    path?: Array<string | number>;
    context?: C;
}
