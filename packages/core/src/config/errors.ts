import type { ZodIssue } from 'zod';
import { CallscopeRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { ConfigErrorCode } from './error-codes.js';

function describeIssues(issues: readonly ZodIssue[]): string {
    return issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ` : '') + issue.message)
        .join('; ');
}

/**
 * Configuration error factory
 */
export class ConfigError {
    static invalidConfig(issues: readonly ZodIssue[]) {
        return new CallscopeRuntimeError(
            ConfigErrorCode.INVALID_CONFIG,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Invalid tracing configuration: ${describeIssues(issues)}`,
            { issues },
            'Check the options passed to setupTracing()'
        );
    }

    static invalidEnv(issues: readonly ZodIssue[]) {
        return new CallscopeRuntimeError(
            ConfigErrorCode.ENV_INVALID,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Invalid CALLSCOPE_* environment: ${describeIssues(issues)}`,
            { issues },
            'Fix the listed environment variables or unset them to use the defaults'
        );
    }

    static dotenvReadFailed(path: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        return new CallscopeRuntimeError(
            ConfigErrorCode.DOTENV_READ_FAILED,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Failed to read env file ${path}: ${reason}`,
            { path, reason }
        );
    }

    static scopeFileNotFound(path: string) {
        return new CallscopeRuntimeError(
            ConfigErrorCode.SCOPE_FILE_NOT_FOUND,
            ErrorScope.CONFIG,
            ErrorType.NOT_FOUND,
            `Scope configuration file not found: ${path}`,
            { path },
            'Point CALLSCOPE_SCOPE_CONFIG at an existing JSON file'
        );
    }

    static scopeFileReadFailed(path: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        return new CallscopeRuntimeError(
            ConfigErrorCode.SCOPE_FILE_READ_FAILED,
            ErrorScope.CONFIG,
            ErrorType.SYSTEM,
            `Failed to read scope configuration ${path}: ${reason}`,
            { path, reason }
        );
    }

    static scopeFileParseFailed(path: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        return new CallscopeRuntimeError(
            ConfigErrorCode.SCOPE_FILE_PARSE_FAILED,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Scope configuration ${path} is not valid JSON: ${reason}`,
            { path, reason }
        );
    }

    static scopeFileInvalid(path: string, issues: readonly ZodIssue[]) {
        return new CallscopeRuntimeError(
            ConfigErrorCode.SCOPE_FILE_INVALID,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Invalid scope configuration ${path}: ${describeIssues(issues)}`,
            { path, issues }
        );
    }
}
