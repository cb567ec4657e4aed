import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LOG_LEVELS } from '../logger/schemas.js';
import { SINK_TYPES, TracingConfigSchema } from './schemas.js';
import type { TracingConfig, TracingConfigInput } from './schemas.js';

export interface LoadConfigOptions {
    /** Explicit options; these win over the environment */
    overrides?: TracingConfigInput | Partial<TracingConfigInput> | undefined;
    /** Read this .env file; a missing file is an error */
    dotenvPath?: string | undefined;
    /** Read ./.env when present */
    loadDotenv?: boolean | undefined;
}

const FLAG_VALUES = ['true', '1', 'yes', 'on', 'false', '0', 'no', 'off'] as const;
const TRUE_VALUES: readonly string[] = FLAG_VALUES.slice(0, 4);

const EnvFlag = z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(FLAG_VALUES))
    .transform((value) => TRUE_VALUES.includes(value));

const EnvList = z.string().transform((value) =>
    value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
);

const EnvInt = z.coerce.number().int();
const EnvNumber = z.coerce.number();

/**
 * CALLSCOPE_* variables, coerced from strings. Range checks happen in TracingConfigSchema.
 */
const TracingEnvSchema = z.object({
    CALLSCOPE_SERVICE_NAME: z.string().optional(),
    CALLSCOPE_ENABLED: EnvFlag.optional(),
    CALLSCOPE_SINKS: EnvList.pipe(z.array(z.enum(SINK_TYPES))).optional(),
    CALLSCOPE_HTTP_ENDPOINT: z.string().optional(),
    CALLSCOPE_API_KEY: z.string().optional(),
    CALLSCOPE_HTTP_TIMEOUT_MS: EnvInt.optional(),
    CALLSCOPE_TRACE_OUTPUT_PATH: z.string().optional(),
    CALLSCOPE_FILE_PREFIX: z.string().optional(),
    CALLSCOPE_OTLP_ENDPOINT: z.string().optional(),
    CALLSCOPE_OBJECT_KEY_PREFIX: z.string().optional(),
    CALLSCOPE_BATCH_MAX_QUEUE_SIZE: EnvInt.optional(),
    CALLSCOPE_BATCH_MAX_EXPORT_SIZE: EnvInt.optional(),
    CALLSCOPE_BATCH_DELAY_MS: EnvInt.optional(),
    CALLSCOPE_EXPORT_TIMEOUT_MS: EnvInt.optional(),
    CALLSCOPE_RETRY_MAX: EnvInt.optional(),
    CALLSCOPE_RETRY_BASE_DELAY_MS: EnvNumber.optional(),
    CALLSCOPE_RETRY_MAX_DELAY_MS: EnvNumber.optional(),
    CALLSCOPE_RETRY_JITTER: EnvNumber.optional(),
    CALLSCOPE_DEFERRED: EnvFlag.optional(),
    CALLSCOPE_DEFERRED_MAX_WAIT_MS: EnvInt.optional(),
    CALLSCOPE_DEFERRED_POLL_INTERVAL_MS: EnvInt.optional(),
    CALLSCOPE_SCOPE_CONFIG: z.string().optional(),
    CALLSCOPE_IGNORED_URL_PATHS: EnvList.optional(),
    CALLSCOPE_LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).optional(),
});

type TracingEnv = z.output<typeof TracingEnvSchema>;

/** Copies the keys whose value is defined, so unset values never shadow others when merged */
function withoutUndefined<T extends object>(value: T): Partial<T> {
    const result: Partial<T> = {};
    for (const [key, entry] of Object.entries(value)) {
        if (entry !== undefined) {
            Reflect.set(result, key, entry);
        }
    }
    return result;
}

function section<T extends object>(value: T): Partial<T> | undefined {
    const kept = withoutUndefined(value);
    return Object.keys(kept).length > 0 ? kept : undefined;
}

function mergeSection<T extends object>(base: T | undefined, override: T | undefined): T | undefined {
    if (!base) {
        return override;
    }
    if (!override) {
        return base;
    }
    return { ...base, ...withoutUndefined(override) };
}

function envToConfigInput(env: TracingEnv): Partial<TracingConfigInput> {
    return withoutUndefined({
        serviceName: env.CALLSCOPE_SERVICE_NAME,
        enabled: env.CALLSCOPE_ENABLED,
        sinks: env.CALLSCOPE_SINKS,
        http: section({
            endpoint: env.CALLSCOPE_HTTP_ENDPOINT,
            apiKey: env.CALLSCOPE_API_KEY,
            timeoutMs: env.CALLSCOPE_HTTP_TIMEOUT_MS,
        }),
        file: section({
            outputDir: env.CALLSCOPE_TRACE_OUTPUT_PATH,
            filePrefix: env.CALLSCOPE_FILE_PREFIX,
        }),
        otlp: section({ endpoint: env.CALLSCOPE_OTLP_ENDPOINT }),
        objectStorage: section({ keyPrefix: env.CALLSCOPE_OBJECT_KEY_PREFIX }),
        batch: section({
            maxQueueSize: env.CALLSCOPE_BATCH_MAX_QUEUE_SIZE,
            maxExportBatchSize: env.CALLSCOPE_BATCH_MAX_EXPORT_SIZE,
            scheduledDelayMillis: env.CALLSCOPE_BATCH_DELAY_MS,
            exportTimeoutMillis: env.CALLSCOPE_EXPORT_TIMEOUT_MS,
        }),
        retry: section({
            maxRetries: env.CALLSCOPE_RETRY_MAX,
            baseDelayMs: env.CALLSCOPE_RETRY_BASE_DELAY_MS,
            maxDelayMs: env.CALLSCOPE_RETRY_MAX_DELAY_MS,
            jitter: env.CALLSCOPE_RETRY_JITTER,
        }),
        deferred: section({
            enabled: env.CALLSCOPE_DEFERRED,
            maxWaitMs: env.CALLSCOPE_DEFERRED_MAX_WAIT_MS,
            pollIntervalMs: env.CALLSCOPE_DEFERRED_POLL_INTERVAL_MS,
        }),
        scopeConfigPath: env.CALLSCOPE_SCOPE_CONFIG,
        ignoredUrlPaths: env.CALLSCOPE_IGNORED_URL_PATHS,
        logger: env.CALLSCOPE_LOG_LEVEL ? { level: env.CALLSCOPE_LOG_LEVEL } : undefined,
    });
}

function readDotenv(options: LoadConfigOptions): Record<string, string> {
    if (!options.dotenvPath && !options.loadDotenv) {
        return {};
    }
    const envPath = options.dotenvPath ?? path.join(process.cwd(), '.env');
    const result = dotenv.config({ path: envPath, processEnv: {} });
    if (result.error) {
        const missing = 'code' in result.error && result.error.code === 'ENOENT';
        if (missing && !options.dotenvPath) {
            return {};
        }
        throw ConfigError.dotenvReadFailed(envPath, result.error);
    }
    return result.parsed ?? {};
}

/**
 * Merges two partial configs; nested sink/batch/retry sections merge key by key
 */
export function mergeConfigInputs(
    base: Partial<TracingConfigInput>,
    override: Partial<TracingConfigInput>
): Partial<TracingConfigInput> {
    return {
        ...base,
        ...withoutUndefined(override),
        http: mergeSection(base.http, override.http),
        file: mergeSection(base.file, override.file),
        otlp: mergeSection(base.otlp, override.otlp),
        objectStorage: mergeSection(base.objectStorage, override.objectStorage),
        batch: mergeSection(base.batch, override.batch),
        retry: mergeSection(base.retry, override.retry),
        deferred: mergeSection(base.deferred, override.deferred),
    };
}

/**
 * Reads CALLSCOPE_* variables into a partial config input. Values set in the process
 * environment win over the .env file; empty values count as unset.
 */
export function readConfigFromEnv(
    env: NodeJS.ProcessEnv = process.env,
    options: LoadConfigOptions = {}
): Partial<TracingConfigInput> {
    const raw: Record<string, string> = { ...readDotenv(options) };
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value !== '') {
            raw[key] = value;
        }
    }

    const parsed = TracingEnvSchema.safeParse(raw);
    if (!parsed.success) {
        throw ConfigError.invalidEnv(parsed.error.issues);
    }

    return envToConfigInput(parsed.data);
}

/**
 * Validates a config input, raising a ConfigError that lists every zod issue
 */
export function parseTracingConfig(input: unknown): TracingConfig {
    const result = TracingConfigSchema.safeParse(input);
    if (!result.success) {
        throw ConfigError.invalidConfig(result.error.issues);
    }
    return result.data;
}

/**
 * Environment first, then explicit overrides, validated through TracingConfigSchema
 *
 * @example
 * ```typescript
 * const config = loadConfigFromEnv(process.env, {
 *   overrides: { serviceName: 'checkout-api', sinks: ['console'] },
 * });
 * ```
 */
export function loadConfigFromEnv(
    env: NodeJS.ProcessEnv = process.env,
    options: LoadConfigOptions = {}
): TracingConfig {
    const fromEnv = readConfigFromEnv(env, options);
    return parseTracingConfig(mergeConfigInputs(fromEnv, options.overrides ?? {}));
}
