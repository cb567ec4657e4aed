import { CallscopeRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { LoggerErrorCode } from './error-codes.js';

/**
 * Logger error factory
 * Each method creates a properly typed error with LOGGER scope
 */
export class LoggerError {
    static unknownTransportType(transportType: string): CallscopeRuntimeError {
        return new CallscopeRuntimeError(
            LoggerErrorCode.TRANSPORT_UNKNOWN_TYPE,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Unknown transport type: ${transportType}`,
            { transportType }
        );
    }

    static transportInitializationFailed(
        transportType: string,
        reason: string
    ): CallscopeRuntimeError {
        return new CallscopeRuntimeError(
            LoggerErrorCode.TRANSPORT_INITIALIZATION_FAILED,
            ErrorScope.LOGGER,
            ErrorType.SYSTEM,
            `Failed to initialize ${transportType} transport: ${reason}`,
            { transportType, reason }
        );
    }

    static invalidConfig(message: string, context?: Record<string, unknown>): CallscopeRuntimeError {
        return new CallscopeRuntimeError(
            LoggerErrorCode.INVALID_CONFIG,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Invalid logger configuration: ${message}`,
            context
        );
    }

    static invalidLogLevel(level: string, validLevels: readonly string[]): CallscopeRuntimeError {
        return new CallscopeRuntimeError(
            LoggerErrorCode.INVALID_LOG_LEVEL,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Invalid log level '${level}'. Valid levels: ${validLevels.join(', ')}`,
            { level, validLevels }
        );
    }
}
