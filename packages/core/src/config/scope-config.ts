import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { HttpScopeMapping } from '../context/propagation.js';
import { scopeWrapper } from '../instrumentation/wrappers.js';
import type { MethodSpec } from '../instrumentation/types.js';
import { ConfigError } from './errors.js';

export const DEFAULT_SCOPE_CONFIG_FILE = 'callscope_scopes.json';

/**
 * Runs every call of package[.object].method inside a fresh `scope_name` scope.
 * Unknown keys (such as the legacy `async` flag) are ignored: one wrapper covers
 * sync and async methods.
 */
const MethodScopeEntrySchema = z.object({
    scope_name: z.string().min(1),
    package: z.string().min(1),
    object: z.string().min(1).optional(),
    method: z.string().min(1),
});

/** Copies an inbound request header into the `scope_name` scope */
const HeaderScopeEntrySchema = z.object({
    scope_name: z.string().min(1),
    http_header: z.string().min(1),
});

export const ScopeConfigFileSchema = z
    .array(z.union([HeaderScopeEntrySchema, MethodScopeEntrySchema]))
    .describe('Scope configuration file');

export type MethodScopeEntry = z.output<typeof MethodScopeEntrySchema>;
export type HeaderScopeEntry = z.output<typeof HeaderScopeEntrySchema>;

export interface ScopeConfig {
    methods: MethodScopeEntry[];
    headers: HeaderScopeEntry[];
}

export function parseScopeConfig(raw: unknown, source = '<inline>'): ScopeConfig {
    const result = ScopeConfigFileSchema.safeParse(raw);
    if (!result.success) {
        throw ConfigError.scopeFileInvalid(source, result.error.issues);
    }

    const config: ScopeConfig = { methods: [], headers: [] };
    for (const entry of result.data) {
        if ('http_header' in entry) {
            config.headers.push(entry);
        } else {
            config.methods.push(entry);
        }
    }
    return config;
}

export async function loadScopeConfigFile(filePath: string): Promise<ScopeConfig> {
    const absolutePath = path.resolve(filePath);
    let text: string;
    try {
        text = await fs.readFile(absolutePath, 'utf-8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw ConfigError.scopeFileNotFound(absolutePath);
        }
        throw ConfigError.scopeFileReadFailed(absolutePath, error);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw ConfigError.scopeFileParseFailed(absolutePath, error);
    }
    return parseScopeConfig(raw, absolutePath);
}

export function toScopeMethodSpecs(entries: readonly MethodScopeEntry[]): MethodSpec[] {
    return entries.map((entry) => ({
        location: {
            module: entry.package,
            ...(entry.object !== undefined && { object: entry.object }),
            method: entry.method,
        },
        wrapper: scopeWrapper,
        scopeName: entry.scope_name,
    }));
}

export function toHttpScopeMappings(entries: readonly HeaderScopeEntry[]): HttpScopeMapping[] {
    return entries.map((entry) => ({ header: entry.http_header, scope: entry.scope_name }));
}
