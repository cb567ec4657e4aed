import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
    resolve: {
        alias: {
            // Workspace packages resolve to their sources so tests need no build
            '@callscope/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
        },
    },
    test: {
        globals: true,
        environment: 'node',
        include: ['packages/*/src/**/*.test.ts'],
        watch: false,
    },
});
