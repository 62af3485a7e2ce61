import { defineConfig } from 'tsdown';

export default defineConfig({
    entry: ['src/index.ts'],
    format: 'esm',
    target: 'node20',
    outDir: 'dist',
    clean: true,
    external: ['@hono/node-server', 'hono', 'prompts'],
    // Bundle all @pageforge/* packages and pure JS deps
    noExternal: [
        /^@pageforge\//,
        'chalk',
        'ora',
        'commander',
        'picocolors',
        'node-html-parser',
        'yaml',
    ],
    shims: true,
    sourcemap: true,
});
