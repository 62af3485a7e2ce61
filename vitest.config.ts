import { defineConfig } from 'vitest/config';
import { resolve } from 'path';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['packages/*/test/**/*.test.ts', 'test/**/*.test.ts'],
        setupFiles: ['./test/setup.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['packages/*/src/**/*.ts'],
            exclude: ['packages/cli/src/**', 'packages/pageforge/src/**'],
        },
    },
    resolve: {
        alias: {
            '@pageforge/cli': resolve('./packages/cli/src/index.ts'),
            '@pageforge/converters': resolve(
                './packages/converters/src/index.ts',
            ),
            '@pageforge/http': resolve('./packages/http/src/index.ts'),
            '@pageforge/manifest': resolve('./packages/manifest/src/index.ts'),
            '@pageforge/scraper': resolve('./packages/scraper/src/index.ts'),
            '@pageforge/server': resolve('./packages/server/src/index.ts'),
            '@pageforge/types': resolve('./packages/types/src/index.ts'),
            '@pageforge/utils': resolve('./packages/utils/src/index.ts'),
        },
    },
});
