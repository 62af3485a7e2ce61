import { describe, it, expect, vi } from 'vitest';
import type { StructureValue } from '@pageforge/types';
import {
    resolveInheritance,
    normalizeManifest,
    substituteSlots,
    MemoryManifestLoader,
    TemplateError,
} from '../src/index.js';
import { captureAsyncError } from '../../../test/helpers/errors.js';

const BASE = {
    metadata: { title: 'Base', description: 'Shared', author: 'Ada' },
    styles: { frame: 'margin: 0', text: 'color: black' },
    imports: { scripts: ['base.js'] },
    structure: {
        div: {
            style: 'frame',
            children: [
                { header: 'Head' },
                { slot: 'content' },
                { footer: 'Foot' },
            ],
        },
    },
};

function memoryLoader(documents: Record<string, Record<string, unknown>>) {
    const loader = new MemoryManifestLoader(documents);
    return (reference: string) => loader.load(reference);
}

describe('resolveInheritance', () => {
    it('should return a copy without calling the loader when nothing is extended', async () => {
        const loader = vi.fn();
        const manifest = normalizeManifest({
            metadata: { title: 'Solo' },
            structure: { p: 'x' },
        });

        const resolved = await resolveInheritance(manifest, loader);

        expect(resolved).toEqual(manifest);
        expect(resolved).not.toBe(manifest);
        expect(loader).not.toHaveBeenCalled();
    });

    it('should merge sections with the child winning and fill slots', async () => {
        const child = normalizeManifest({
            metadata: { title: 'Child', extends: 'base' },
            styles: { text: 'color: red' },
            structure: { content: { main: { p: 'Body' } } },
        });

        const resolved = await resolveInheritance(
            child,
            memoryLoader({ base: BASE }),
        );

        expect(resolved).toEqual({
            metadata: { title: 'Child', description: 'Shared', author: 'Ada' },
            styles: { frame: 'margin: 0', text: 'color: red' },
            imports: { scripts: ['base.js'] },
            structure: {
                div: {
                    style: 'frame',
                    children: [
                        { header: 'Head' },
                        { main: { p: 'Body' } },
                        { footer: 'Foot' },
                    ],
                },
            },
        });
    });

    it('should accept a bare string as slot content', async () => {
        const child = normalizeManifest({
            metadata: { title: 'Child', extends: 'base' },
            structure: { content: 'Just text' },
        });

        const resolved = await resolveInheritance(
            child,
            memoryLoader({ base: BASE }),
        );

        expect(resolved.structure).toEqual({
            div: {
                style: 'frame',
                children: [{ header: 'Head' }, 'Just text', { footer: 'Foot' }],
            },
        });
    });

    it('should append child keys that fill no slot after the ancestor nodes', async () => {
        const child = normalizeManifest({
            metadata: { title: 'Child', extends: 'base' },
            structure: { sidebar: { p: 'extra' } },
        });

        const resolved = await resolveInheritance(
            child,
            memoryLoader({ base: BASE }),
        );

        expect(resolved.structure).toEqual({
            ...BASE.structure,
            sidebar: { p: 'extra' },
        });
    });

    it('should report child keys that collide with ancestor nodes', async () => {
        const onWarning = vi.fn();
        const child = normalizeManifest({
            metadata: { title: 'Child', extends: 'base' },
            structure: { content: 'Body', div: 'Clash' },
        });

        const resolved = await resolveInheritance(
            child,
            memoryLoader({ base: BASE }),
            { onWarning },
        );

        expect(onWarning).toHaveBeenCalledWith(
            "Structure key 'div' fills no template slot and was dropped",
        );
        expect(resolved.structure).toEqual({
            div: {
                style: 'frame',
                children: [{ header: 'Head' }, 'Body', { footer: 'Foot' }],
            },
        });
    });

    it('should replace the ancestor structure when the child overrides it', async () => {
        const child = normalizeManifest({
            metadata: { title: 'Child', extends: 'base' },
            structure: { _override: true, section: 'Only' },
        });

        const resolved = await resolveInheritance(
            child,
            memoryLoader({ base: BASE }),
        );

        expect(resolved.structure).toEqual({ section: 'Only' });
    });

    it('should resolve multi-level chains ancestor first', async () => {
        const loader = memoryLoader({
            base: BASE,
            layout: {
                metadata: { title: 'Layout', extends: 'base' },
                styles: { frame: 'margin: 0 auto' },
                structure: {
                    content: { div: [{ slot: 'body' }, { aside: 'Links' }] },
                },
            },
        });
        const page = normalizeManifest({
            metadata: { title: 'Page', extends: 'layout' },
            structure: { body: { p: 'Hello' } },
        });

        const resolved = await resolveInheritance(page, loader);

        expect(resolved.metadata).toEqual({
            title: 'Page',
            description: 'Shared',
            author: 'Ada',
        });
        expect(resolved.styles.frame).toBe('margin: 0 auto');
        expect(resolved.structure).toEqual({
            div: {
                style: 'frame',
                children: [
                    { header: 'Head' },
                    { div: [{ p: 'Hello' }, { aside: 'Links' }] },
                    { footer: 'Foot' },
                ],
            },
        });
    });

    it('should accept a synchronous loader', async () => {
        const child = normalizeManifest({
            metadata: { title: 'Child', extends: 'base' },
            structure: { content: 'x' },
        });

        const resolved = await resolveInheritance(child, () => BASE);

        expect(resolved.metadata.author).toBe('Ada');
    });

    it('should detect cycles and name the chain', async () => {
        const loader = memoryLoader({
            a: { metadata: { title: 'A', extends: 'b' }, structure: { p: 'a' } },
            b: { metadata: { title: 'B', extends: 'a' }, structure: { p: 'b' } },
        });
        const a = normalizeManifest({
            metadata: { title: 'A', extends: 'b' },
            structure: { p: 'a' },
        });

        const error = await captureAsyncError(
            resolveInheritance(a, loader, { reference: 'a' }),
        );

        expect(error).toBeInstanceOf(TemplateError);
        expect(error).toMatchObject({
            message: 'Cyclic template inheritance: a -> b -> a',
            reference: 'a',
        });
    });

    it('should detect a manifest that extends itself', async () => {
        const loader = memoryLoader({
            x: { metadata: { title: 'X', extends: 'x' }, structure: 'x' },
        });
        const start = normalizeManifest({
            metadata: { title: 'Start', extends: 'x' },
            structure: 'start',
        });

        await expect(resolveInheritance(start, loader)).rejects.toThrow(
            'Cyclic template inheritance: x -> x',
        );
    });

    it('should stop chains longer than maxDepth', async () => {
        const loader = memoryLoader({
            l1: { metadata: { title: 'L1', extends: 'l2' }, structure: 'a' },
            l2: { metadata: { title: 'L2' }, structure: 'b' },
        });
        const start = normalizeManifest({
            metadata: { title: 'Start', extends: 'l1' },
            structure: 'c',
        });

        await expect(
            resolveInheritance(start, loader, { maxDepth: 1 }),
        ).rejects.toThrow("Template inheritance chain exceeds 1 levels at 'l2'");
    });

    it('should wrap loader failures in TemplateError with the cause', async () => {
        const failure = new Error('disk on fire');
        const child = normalizeManifest({
            metadata: { title: 'Child', extends: 'missing' },
            structure: 'x',
        });

        const error = await captureAsyncError(
            resolveInheritance(child, () => {
                throw failure;
            }),
        );

        expect(error).toBeInstanceOf(TemplateError);
        expect(error).toMatchObject({
            message: "Failed to load parent template 'missing'",
            reference: 'missing',
            cause: failure,
        });
    });

    it('should reject ancestors that are not manifests', async () => {
        const child = normalizeManifest({
            metadata: { title: 'Child', extends: 'odd' },
            structure: 'x',
        });

        await expect(
            resolveInheritance(child, () => 'not a mapping'),
        ).rejects.toThrow(
            "Parent template 'odd' is not a valid manifest: Manifest must be a mapping",
        );
    });

    it('should canonicalize references before loading', async () => {
        const loader = vi.fn(() => BASE);
        const child = normalizeManifest({
            metadata: { title: 'Child', extends: 'base' },
            structure: { content: 'x' },
        });

        await resolveInheritance(child, loader, {
            reference: 'pages/home',
            resolveReference: (reference) => `layouts/${reference}`,
        });

        expect(loader).toHaveBeenCalledWith('layouts/base', 'pages/home');
    });
});

describe('substituteSlots', () => {
    it('should leave slots without a matching fill in place', () => {
        const structure = { div: [{ slot: 'a' }, { slot: 'b' }] };

        expect(substituteSlots(structure, { a: { p: 'A' } })).toEqual({
            div: [{ p: 'A' }, { slot: 'b' }],
        });
    });

    it('should keep numbers and booleans of the ancestor as they are', () => {
        const structure: StructureValue = {
            div: { children: [{ slot: 'a' }, { input: { size: 20, hidden: true } }] },
        };

        expect(substituteSlots(structure, { a: { p: 'A' } })).toEqual({
            div: { children: [{ p: 'A' }, { input: { size: 20, hidden: true } }] },
        });
    });

    it('should copy the fill rather than share it', () => {
        const fill = { p: 'A' };
        const result = substituteSlots({ slot: 'a' }, { a: fill });

        expect(result).toEqual(fill);
        expect(result).not.toBe(fill);
    });
});
