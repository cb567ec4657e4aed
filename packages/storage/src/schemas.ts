import { z } from 'zod';

export const OBJECT_STORE_TYPES = ['in-memory', 'local'] as const;
export type ObjectStoreType = (typeof OBJECT_STORE_TYPES)[number];

export const InMemoryObjectStoreSchema = z
    .object({
        type: z.literal('in-memory'),
        maxObjectSize: z
            .number()
            .int()
            .positive()
            .default(10 * 1024 * 1024)
            .describe('Largest body accepted by put(), in bytes'),
    })
    .strict()
    .describe('Process-local object store, cleared on disconnect');

export const LocalObjectStoreSchema = z
    .object({
        type: z.literal('local'),
        basePath: z.string().min(1).describe('Directory holding one file per object key'),
    })
    .strict()
    .describe('Filesystem object store');

export const ObjectStoreConfigSchema = z
    .discriminatedUnion('type', [InMemoryObjectStoreSchema, LocalObjectStoreSchema], {
        errorMap: (issue, ctx) => {
            if (issue.code === z.ZodIssueCode.invalid_union_discriminator) {
                return {
                    message: `Invalid object store type. Expected one of: ${OBJECT_STORE_TYPES.join(', ')}`,
                };
            }
            return { message: ctx.defaultError };
        },
    })
    .describe('Object store configuration');

export type InMemoryObjectStoreConfig = z.output<typeof InMemoryObjectStoreSchema>;
export type InMemoryObjectStoreConfigInput = z.input<typeof InMemoryObjectStoreSchema>;
export type LocalObjectStoreConfig = z.output<typeof LocalObjectStoreSchema>;
export type ObjectStoreConfig = z.output<typeof ObjectStoreConfigSchema>;
export type ObjectStoreConfigInput = z.input<typeof ObjectStoreConfigSchema>;
