import { CallscopeRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { InstrumentationErrorCode } from './error-codes.js';

/**
 * Instrumentation error factory
 * Raised while installing proxies; the registry logs and isolates them per target
 */
export class InstrumentationError {
    static moduleNotFound(moduleName: string, originalError?: unknown): CallscopeRuntimeError {
        return new CallscopeRuntimeError(
            InstrumentationErrorCode.MODULE_NOT_FOUND,
            ErrorScope.INSTRUMENTATION,
            ErrorType.NOT_FOUND,
            `Module '${moduleName}' could not be loaded`,
            {
                moduleName,
                originalError:
                    originalError instanceof Error ? originalError.message : String(originalError),
            }
        );
    }

    static objectNotFound(target: string, objectPath: string): CallscopeRuntimeError {
        return new CallscopeRuntimeError(
            InstrumentationErrorCode.OBJECT_NOT_FOUND,
            ErrorScope.INSTRUMENTATION,
            ErrorType.NOT_FOUND,
            `Object '${objectPath}' not found on ${target}`,
            { target, objectPath }
        );
    }

    static methodNotFound(target: string, method: string): CallscopeRuntimeError {
        return new CallscopeRuntimeError(
            InstrumentationErrorCode.METHOD_NOT_FOUND,
            ErrorScope.INSTRUMENTATION,
            ErrorType.NOT_FOUND,
            `Method '${method}' is not a function on ${target}`,
            { target, method }
        );
    }

    static alreadyInstrumented(target: string): CallscopeRuntimeError {
        return new CallscopeRuntimeError(
            InstrumentationErrorCode.ALREADY_INSTRUMENTED,
            ErrorScope.INSTRUMENTATION,
            ErrorType.CONFLICT,
            `${target} is already instrumented`,
            { target }
        );
    }

    static handlerNotFound(handlerName: string, available: string[]): CallscopeRuntimeError {
        return new CallscopeRuntimeError(
            InstrumentationErrorCode.HANDLER_NOT_FOUND,
            ErrorScope.INSTRUMENTATION,
            ErrorType.USER,
            `Span handler '${handlerName}' is not registered. Available handlers: ${available.join(', ')}`,
            { handlerName, available }
        );
    }

    static invalidLocation(reason: string): CallscopeRuntimeError {
        return new CallscopeRuntimeError(
            InstrumentationErrorCode.INVALID_LOCATION,
            ErrorScope.INSTRUMENTATION,
            ErrorType.USER,
            `Invalid method location: ${reason}`,
            { reason }
        );
    }
}
