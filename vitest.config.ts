import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
    resolve: {
        alias: {
            // Workspace packages resolve to their sources in tests
            '@plugin-depot/core/test-utils': fromRoot('./packages/core/src/logger/test-utils.ts'),
            '@plugin-depot/core': fromRoot('./packages/core/src/index.ts'),
        },
    },
    test: {
        environment: 'node',
        include: ['packages/*/src/**/*.test.ts'],
        watch: false,
    },
});
