import { CallscopeRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { ExportErrorCode } from './error-codes.js';

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Maps an HTTP status onto the error type used to decide whether a retry can help
 */
function errorTypeForStatus(status: number): ErrorType {
    if (status === 401 || status === 403) return ErrorType.FORBIDDEN;
    if (status === 404) return ErrorType.NOT_FOUND;
    if (status === 408) return ErrorType.TIMEOUT;
    if (status === 409) return ErrorType.CONFLICT;
    if (status === 429) return ErrorType.RATE_LIMIT;
    if (status >= 500) return ErrorType.THIRD_PARTY;
    if (status >= 400) return ErrorType.USER;
    return ErrorType.UNKNOWN;
}

/**
 * Export error factory with typed methods for sink and delivery errors
 * Each method creates a properly typed error with EXPORT scope
 */
export class ExportError {
    static sinkShutdown(sink: string) {
        return new CallscopeRuntimeError(
            ExportErrorCode.SINK_SHUTDOWN,
            ErrorScope.EXPORT,
            ErrorType.USER,
            `Sink '${sink}' has been shut down`,
            { sink }
        );
    }

    static httpStatus(endpoint: string, status: number, body?: string) {
        return new CallscopeRuntimeError(
            ExportErrorCode.HTTP_STATUS,
            ErrorScope.EXPORT,
            errorTypeForStatus(status),
            `Ingest endpoint responded with HTTP ${status}`,
            { endpoint, status, body }
        );
    }

    static timeout(operation: string, timeoutMs: number) {
        return new CallscopeRuntimeError(
            ExportErrorCode.TIMEOUT,
            ErrorScope.EXPORT,
            ErrorType.TIMEOUT,
            `${operation} timed out after ${timeoutMs}ms`,
            { operation, timeoutMs }
        );
    }

    static network(endpoint: string, cause: unknown) {
        return new CallscopeRuntimeError(
            ExportErrorCode.NETWORK,
            ErrorScope.EXPORT,
            ErrorType.THIRD_PARTY,
            `Network error while contacting ${endpoint}: ${describe(cause)}`,
            { endpoint, cause: describe(cause) }
        );
    }

    static retriesExhausted(attempts: number, lastError: unknown) {
        return new CallscopeRuntimeError(
            ExportErrorCode.RETRIES_EXHAUSTED,
            ErrorScope.EXPORT,
            ErrorType.THIRD_PARTY,
            `Giving up after ${attempts} attempt(s): ${describe(lastError)}`,
            { attempts, lastError: describe(lastError) }
        );
    }

    static deliveryFailed(sink: string, cause: unknown) {
        return new CallscopeRuntimeError(
            ExportErrorCode.DELIVERY_FAILED,
            ErrorScope.EXPORT,
            ErrorType.SYSTEM,
            `Sink '${sink}' failed to deliver spans: ${describe(cause)}`,
            { sink, cause: describe(cause) }
        );
    }

    static serializationFailed(spanName: string, cause: unknown) {
        return new CallscopeRuntimeError(
            ExportErrorCode.SERIALIZATION_FAILED,
            ErrorScope.EXPORT,
            ErrorType.SYSTEM,
            `Could not serialize span '${spanName}': ${describe(cause)}`,
            { spanName, cause: describe(cause) }
        );
    }

    static flushTimeout(timeoutMs: number) {
        return new CallscopeRuntimeError(
            ExportErrorCode.FLUSH_TIMEOUT,
            ErrorScope.EXPORT,
            ErrorType.TIMEOUT,
            `Flush did not complete within ${timeoutMs}ms`,
            { timeoutMs }
        );
    }
}

/**
 * Whether another attempt may succeed: timeouts, network errors, 429, 5xx and anything
 * unclassified. Validation, auth and not-found failures are permanent.
 */
export function isTransientError(error: unknown): boolean {
    if (!(error instanceof CallscopeRuntimeError)) {
        return true;
    }
    switch (error.type) {
        case ErrorType.USER:
        case ErrorType.FORBIDDEN:
        case ErrorType.NOT_FOUND:
        case ErrorType.CONFLICT:
            return false;
        default:
            return true;
    }
}
