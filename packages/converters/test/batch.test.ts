import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Manifest } from '@pageforge/types';
import {
    batchConvert,
    batchFilename,
    convertManifest,
    writeConversionResult,
} from '../src/index.js';

function page(title: string): Manifest {
    return {
        metadata: { title },
        styles: {},
        imports: {},
        structure: { h1: title },
    };
}

const PAGES: Record<string, Manifest> = {
    'pages/a.yaml': page('Shared'),
    'pages/b.yaml': page('Shared'),
};

async function load(source: string): Promise<Manifest> {
    const manifest = PAGES[source];
    if (manifest === undefined) {
        throw new Error(`No manifest at ${source}`);
    }
    return manifest;
}

describe('batchConvert', () => {
    let outputDir: string;

    beforeEach(async () => {
        outputDir = await mkdtemp(join(tmpdir(), 'pageforge-batch-'));
    });

    afterEach(async () => {
        await rm(outputDir, { recursive: true, force: true });
    });

    it('should convert each source and keep going after a failure', async () => {
        const onItemComplete = vi.fn();

        const report = await batchConvert(
            ['pages/a.yaml', 'pages/missing.yaml', 'pages/b.yaml'],
            {
                format: 'html',
                load,
                concurrency: 2,
                outputDir,
                converterOptions: { headerComment: false },
                onItemComplete,
            },
        );

        expect(report.succeeded).toBe(2);
        expect(report.failed).toBe(1);
        expect(report.items.map((item) => [item.source, item.status])).toEqual([
            ['pages/a.yaml', 'success'],
            ['pages/missing.yaml', 'error'],
            ['pages/b.yaml', 'success'],
        ]);

        const failure = report.items[1];
        expect(failure.status === 'error' && failure.error.message).toBe(
            'No manifest at pages/missing.yaml',
        );

        const first = report.items[0];
        expect(first.status === 'success' && first.outputPath).toBe(
            join(outputDir, 'a.html'),
        );
        const written = await readFile(join(outputDir, 'b.html'), 'utf-8');
        expect(written).toContain('  <h1>Shared</h1>');

        expect(onItemComplete).toHaveBeenCalledTimes(3);
        expect(onItemComplete.mock.calls.map((call) => call[1])).toEqual([
            1, 2, 3,
        ]);
        expect(onItemComplete.mock.calls.every((call) => call[2] === 3)).toBe(
            true,
        );
    });

    it('should keep results in memory without an output directory', async () => {
        const report = await batchConvert(['pages/a.yaml'], {
            format: 'vue',
            load,
        });

        const [item] = report.items;
        expect(item.status).toBe('success');
        expect(item.status === 'success' && item.outputPath).toBeUndefined();
        expect(item.status === 'success' && item.result.filename).toBe(
            'Shared.vue',
        );
    });

    it('should wrap thrown values that are not errors', async () => {
        const report = await batchConvert(['x'], {
            format: 'html',
            load: () => Promise.reject('boom'),
        });

        const [item] = report.items;
        expect(item.status === 'error' && item.error).toBeInstanceOf(Error);
        expect(item.status === 'error' && item.error.message).toBe('boom');
    });

    it('should return an empty report for no sources', async () => {
        const report = await batchConvert([], { format: 'php', load });

        expect(report).toEqual({ items: [], succeeded: 0, failed: 0 });
    });
});

describe('batchFilename', () => {
    it('should combine the source stem with the output extension', () => {
        const result = convertManifest(page('Anything'), 'react');

        expect(batchFilename('site/landing.page.yml', result)).toBe(
            'landing.page.jsx',
        );
    });
});

describe('writeConversionResult', () => {
    let outputDir: string;

    beforeEach(async () => {
        outputDir = await mkdtemp(join(tmpdir(), 'pageforge-write-'));
    });

    afterEach(async () => {
        await rm(outputDir, { recursive: true, force: true });
    });

    it('should create the directory and write the content', async () => {
        const result = convertManifest(page('Home'), 'html');

        const path = await writeConversionResult(
            result,
            join(outputDir, 'nested', 'dir'),
        );

        expect(path).toBe(join(outputDir, 'nested', 'dir', 'home.html'));
        expect(await readFile(path, 'utf-8')).toBe(result.content);
    });
});
