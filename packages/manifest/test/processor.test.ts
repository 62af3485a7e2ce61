import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
    ManifestProcessor,
    MemoryManifestLoader,
    FileManifestLoader,
    TemplateError,
    ValidationError,
    processManifestFile,
} from '../src/index.js';
import { REMOTE_BASE_MANIFEST_URL } from '../../../test/helpers/msw-handlers.js';
import { captureAsyncError } from '../../../test/helpers/errors.js';

const LAYOUT = {
    metadata: { title: 'Layout', description: 'Shared' },
    styles: { frame: 'margin:0' },
    structure: { main: { style: 'frame', children: [{ slot: 'content' }] } },
};

function processor(strict = false) {
    return new ManifestProcessor({
        loader: new MemoryManifestLoader({ layout: LAYOUT }),
        strict,
    });
}

describe('ManifestProcessor', () => {
    it('should normalize styles of a standalone manifest', async () => {
        const { manifest, warnings } = await processor().process({
            metadata: { title: 'Home', description: 'd' },
            styles: { box: ['color:red', 'padding: 4px'] },
            structure: { div: { style: 'box', text: 'Hi' } },
        });

        expect(manifest.styles).toEqual({ box: 'color:red; padding: 4px;' });
        expect(warnings).toEqual([]);
    });

    it('should report each warning once', async () => {
        const { warnings } = await processor().process({
            metadata: { title: 'Home' },
            structure: { p: 'x' },
        });

        expect(warnings).toEqual(['Consider adding a description to metadata']);
    });

    it('should throw ValidationError for an invalid manifest', async () => {
        const error = await captureAsyncError(
            processor().process({ structure: { p: 'x' } }),
        );

        expect(error).toBeInstanceOf(ValidationError);
        expect(error).toMatchObject({
            errors: ['Metadata must include a title'],
        });
    });

    it('should escalate warnings in strict mode', async () => {
        await expect(
            processor(true).process({
                metadata: { title: 'Home' },
                structure: { p: 'x' },
            }),
        ).rejects.toThrow(
            'Manifest validation failed: Consider adding a description to metadata',
        );
    });

    it('should skip validation when disabled', async () => {
        const loose = new ManifestProcessor({
            loader: new MemoryManifestLoader(),
            validate: false,
        });

        const { manifest } = await loose.process({ structure: 'x' });

        expect(manifest.metadata).toEqual({});
    });

    it('should let a child omit what its ancestor provides', async () => {
        const { manifest, warnings } = await processor().process({
            metadata: { title: 'Child', extends: 'layout' },
            structure: { content: { p: 'Body' } },
        });

        expect(warnings).toEqual([]);
        expect(manifest).toEqual({
            metadata: { title: 'Child', description: 'Shared' },
            styles: { frame: 'margin:0;' },
            imports: {},
            structure: {
                main: { style: 'frame', children: [{ p: 'Body' }] },
            },
        });
    });

    it('should warn when a child both extends and declares slots', async () => {
        const child = {
            metadata: { title: 'Child', description: 'd', extends: 'layout' },
            template_slots: { main: 'x' },
            structure: { content: { p: 'Body' } },
        };

        const { warnings } = await processor().process(child);

        expect(warnings).toEqual([
            'Template inheritance and template_slots both present - ensure compatibility',
        ]);
        await expect(processor(true).process(child)).rejects.toThrow(
            'Manifest validation failed: Template inheritance and template_slots both present - ensure compatibility',
        );
    });

    it('should keep child structure that fills no slot', async () => {
        const { manifest, warnings } = await processor().process({
            metadata: { title: 'Child', extends: 'layout' },
            structure: { content: { p: 'Body' }, aside: { p: 'More' } },
        });

        expect(warnings).toEqual([]);
        expect(manifest.structure).toEqual({
            main: { style: 'frame', children: [{ p: 'Body' }] },
            aside: { p: 'More' },
        });
    });

    it('should report child structure that clashes with the layout', async () => {
        const { manifest, warnings } = await processor().process({
            metadata: { title: 'Child', extends: 'layout' },
            structure: { content: { p: 'Body' }, main: { p: 'Clash' } },
        });

        expect(warnings).toEqual([
            "Structure key 'main' fills no template slot and was dropped",
        ]);
        expect(manifest.structure).toEqual({
            main: { style: 'frame', children: [{ p: 'Body' }] },
        });
    });

    it('should collect unresolved variable warnings', async () => {
        const { manifest, warnings } = await processor().process(
            {
                metadata: { title: 'Home', description: 'd' },
                structure: { p: 'Hi {{ who }} from {{ place }}' },
            },
            { variables: { place: 'Oslo' } },
        );

        expect(manifest.structure).toEqual({ p: 'Hi {{ who }} from Oslo' });
        expect(warnings).toEqual(["Unresolved template variable 'who'"]);
    });

    it('should surface loader failures as TemplateError', async () => {
        const error = await captureAsyncError(
            processor().process({
                metadata: { title: 'Child', extends: 'nope' },
                structure: 'x',
            }),
        );

        expect(error).toBeInstanceOf(TemplateError);
        expect(error).toMatchObject({
            message: "Failed to load parent template 'nope'",
        });
    });

    it('should extend a remote layout', async () => {
        const remote = new ManifestProcessor({
            loader: new FileManifestLoader(),
        });

        const { manifest } = await remote.process({
            metadata: { title: 'Child', extends: REMOTE_BASE_MANIFEST_URL },
            structure: { content: { p: 'Hi' } },
        });

        expect(manifest).toEqual({
            metadata: { title: 'Child', description: 'Shared layout' },
            styles: { frame: 'margin: 0 auto;' },
            imports: {},
            structure: {
                div: { style: 'frame', children: [{ p: 'Hi' }] },
            },
        });
    });
});

describe('processManifestFile', () => {
    let dir: string | undefined;

    afterEach(async () => {
        if (dir) await rm(dir, { recursive: true, force: true });
        dir = undefined;
    });

    it('should resolve relative extends against the file and substitute variables', async () => {
        dir = await mkdtemp(join(tmpdir(), 'pageforge-processor-'));
        await mkdir(join(dir, 'pages'));
        await writeFile(
            join(dir, 'base.yaml'),
            [
                'metadata:',
                '  title: Base',
                '  description: Base layout',
                'structure:',
                '  main:',
                '    slot: content',
                '',
            ].join('\n'),
        );
        const page = join(dir, 'pages', 'home.yaml');
        await writeFile(
            page,
            [
                'metadata:',
                '  title: Home',
                '  extends: ../base.yaml',
                'structure:',
                '  content:',
                '    p: "{{ metadata.title }} {{ year }}"',
                '',
            ].join('\n'),
        );

        const { manifest } = await processManifestFile(page, {
            variables: { year: 2026 },
        });

        expect(manifest.structure).toEqual({ main: { p: 'Home 2026' } });
        expect(manifest.metadata.description).toBe('Base layout');
    });
});
