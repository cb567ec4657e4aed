import { CallscopeRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { StorageErrorCode } from './error-codes.js';

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Storage error factory with typed methods for object store errors
 * Each method creates a properly typed error with STORAGE scope
 */
export class StorageError {
    static connectionFailed(storeType: string, reason: string) {
        return new CallscopeRuntimeError(
            StorageErrorCode.CONNECTION_FAILED,
            ErrorScope.STORAGE,
            ErrorType.THIRD_PARTY,
            `${storeType} store connection failed: ${reason}`,
            { storeType, reason }
        );
    }

    static notConnected(storeType: string) {
        return new CallscopeRuntimeError(
            StorageErrorCode.NOT_CONNECTED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `${storeType} store not connected`,
            { storeType },
            'Call connect() before using the store'
        );
    }

    static readFailed(key: string, cause: unknown) {
        return new CallscopeRuntimeError(
            StorageErrorCode.READ_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Failed to read object '${key}': ${describe(cause)}`,
            { key, cause: describe(cause) }
        );
    }

    static writeFailed(key: string, cause: unknown) {
        return new CallscopeRuntimeError(
            StorageErrorCode.WRITE_FAILED,
            ErrorScope.STORAGE,
            ErrorType.THIRD_PARTY,
            `Failed to write object '${key}': ${describe(cause)}`,
            { key, cause: describe(cause) }
        );
    }

    static deleteFailed(key: string, cause: unknown) {
        return new CallscopeRuntimeError(
            StorageErrorCode.DELETE_FAILED,
            ErrorScope.STORAGE,
            ErrorType.SYSTEM,
            `Failed to delete object '${key}': ${describe(cause)}`,
            { key, cause: describe(cause) }
        );
    }

    static invalidKey(key: string, reason: string) {
        return new CallscopeRuntimeError(
            StorageErrorCode.INVALID_KEY,
            ErrorScope.STORAGE,
            ErrorType.USER,
            `Invalid object key '${key}': ${reason}`,
            { key, reason }
        );
    }

    static invalidConfig(message: string, issues?: unknown) {
        return new CallscopeRuntimeError(
            StorageErrorCode.INVALID_CONFIG,
            ErrorScope.STORAGE,
            ErrorType.USER,
            `Invalid object store configuration: ${message}`,
            { issues }
        );
    }

    static unknownStoreType(type: string, available: string[]) {
        return new CallscopeRuntimeError(
            StorageErrorCode.UNKNOWN_STORE_TYPE,
            ErrorScope.STORAGE,
            ErrorType.USER,
            `Unknown object store type '${type}'. Available: ${available.join(', ')}`,
            { type, available }
        );
    }
}
