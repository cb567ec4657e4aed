import { toError } from '../errors/runtime-error.js';
import type { Logger } from '../logger/types.js';
import { ExportError, isTransientError } from './errors.js';

export interface RetryOptions {
    /** Total attempts, including the first */
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
    /** Extra random delay as a fraction of the backoff (0 disables) */
    jitter: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    maxRetries: 3,
    baseDelayMs: 1000,
    maxDelayMs: 10000,
    jitter: 0.1,
};

export interface RetryHooks {
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

const defaultSleep = (ms: number): Promise<void> =>
    new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Backoff before the attempt following `attempt` (0-based)
 */
export function backoffDelay(attempt: number, options: RetryOptions, random: () => number): number {
    const delay = Math.min(options.baseDelayMs * Math.pow(2, attempt), options.maxDelayMs);
    return delay + delay * options.jitter * random();
}

/**
 * Runs operation until it succeeds, fails permanently, or maxRetries attempts were made.
 * Permanent failures are re-thrown as they are; running out of attempts throws
 * `export_retries_exhausted` carrying the last error.
 */
export async function retryWithBackoff<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions,
    logger: Logger,
    hooks: RetryHooks = {}
): Promise<T> {
    const sleep = hooks.sleep ?? defaultSleep;
    const random = hooks.random ?? Math.random;
    const attempts = Math.max(1, options.maxRetries);

    let lastError: unknown;
    for (let attempt = 0; attempt < attempts; attempt++) {
        try {
            return await operation(attempt);
        } catch (error) {
            lastError = error;
            if (!isTransientError(error)) {
                logger.debug('Permanent export failure, not retrying', {
                    attempt: attempt + 1,
                    error: toError(error).message,
                });
                throw error;
            }
            if (attempt + 1 >= attempts) {
                break;
            }
            const delay = backoffDelay(attempt, options, random);
            logger.debug(`Export attempt ${attempt + 1}/${attempts} failed, retrying in ${Math.round(delay)}ms`, {
                error: toError(error).message,
            });
            await sleep(delay);
        }
    }

    throw ExportError.retriesExhausted(attempts, lastError);
}
