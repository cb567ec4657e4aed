import { CallscopeRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { TelemetryErrorCode } from './error-codes.js';

/**
 * Tracing setup error factory
 */
export class TelemetryError {
    /**
     * Tracing setup failed for a reason other than invalid configuration
     */
    static initializationFailed(reason: string, originalError?: unknown): CallscopeRuntimeError {
        return new CallscopeRuntimeError(
            TelemetryErrorCode.INITIALIZATION_FAILED,
            ErrorScope.TELEMETRY,
            ErrorType.SYSTEM,
            `Failed to initialize tracing: ${reason}`,
            {
                reason,
                originalError:
                    originalError instanceof Error ? originalError.message : String(originalError),
            }
        );
    }

    static notInitialized(): CallscopeRuntimeError {
        return new CallscopeRuntimeError<Record<string, unknown>>(
            TelemetryErrorCode.NOT_INITIALIZED,
            ErrorScope.TELEMETRY,
            ErrorType.USER,
            'Tracing not initialized. Call setupTracing() first.',
            undefined,
            'Await setupTracing() before calling Tracing.get()'
        );
    }

    /**
     * The object-storage sink is configured but no store was passed in
     */
    static objectStoreRequired(): CallscopeRuntimeError {
        return new CallscopeRuntimeError<Record<string, unknown>>(
            TelemetryErrorCode.OBJECT_STORE_REQUIRED,
            ErrorScope.TELEMETRY,
            ErrorType.USER,
            "The 'object-storage' sink needs an objectStore",
            undefined,
            'Pass objectStore to setupTracing(), e.g. createObjectStore() from @callscope/storage'
        );
    }

    /**
     * Shutdown did not finish cleanly (non-blocking warning)
     */
    static shutdownFailed(reason: string): CallscopeRuntimeError {
        return new CallscopeRuntimeError(
            TelemetryErrorCode.SHUTDOWN_FAILED,
            ErrorScope.TELEMETRY,
            ErrorType.SYSTEM,
            `Tracing shutdown failed: ${reason}`,
            { reason }
        );
    }
}
