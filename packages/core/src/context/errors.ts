import { CallscopeRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { ContextErrorCode } from './error-codes.js';

/**
 * Context error factory
 */
export class ContextError {
    static invalidScopeName(name: unknown): CallscopeRuntimeError {
        return new CallscopeRuntimeError(
            ContextErrorCode.SCOPE_NAME_INVALID,
            ErrorScope.CONTEXT,
            ErrorType.USER,
            `Scope name must be a non-empty string, got ${JSON.stringify(name)}`,
            { name }
        );
    }

    static invalidCarrier(reason: string): CallscopeRuntimeError {
        return new CallscopeRuntimeError(
            ContextErrorCode.CARRIER_INVALID,
            ErrorScope.CONTEXT,
            ErrorType.USER,
            `Invalid context carrier: ${reason}`,
            { reason }
        );
    }
}
