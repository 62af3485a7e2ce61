import { describe, it, expect } from 'vitest';
import type { Manifest } from '@pageforge/types';
import {
    ConversionError,
    HtmlConverter,
    PhpConverter,
    ReactConverter,
    VueConverter,
    convertAll,
    convertManifest,
    createConverter,
    isConversionFormat,
} from '../src/index.js';

const MANIFEST: Manifest = {
    metadata: { title: 'Home' },
    styles: { box: 'color: red' },
    imports: {},
    structure: { div: { text: 'Hi', style: 'box' } },
};

describe('isConversionFormat', () => {
    it('should accept only known formats', () => {
        expect(isConversionFormat('vue')).toBe(true);
        expect(isConversionFormat('svelte')).toBe(false);
        expect(isConversionFormat('HTML')).toBe(false);
    });
});

describe('createConverter', () => {
    it.each([
        ['html', HtmlConverter],
        ['react', ReactConverter],
        ['vue', VueConverter],
        ['php', PhpConverter],
    ] as const)('should create the %s converter', (format, type) => {
        const converter = createConverter(format);

        expect(converter).toBeInstanceOf(type);
        expect(converter.format).toBe(format);
    });

    it('should apply defaults given at creation', () => {
        const result = createConverter('react', { typescript: true }).convert(
            MANIFEST,
        );

        expect(result.filename).toBe('Home.tsx');
    });
});

describe('convertManifest', () => {
    it('should convert to the requested format', () => {
        const result = convertManifest(MANIFEST, 'vue');

        expect(result.formatType).toBe('vue');
        expect(result.filename).toBe('Home.vue');
    });
});

describe('convertAll', () => {
    it('should produce a result for every format', () => {
        const results = convertAll(MANIFEST);

        expect(Object.keys(results)).toEqual(['html', 'react', 'vue', 'php']);
        expect(
            Object.values(results).map((result) =>
                result instanceof ConversionError ? null : result.filename,
            ),
        ).toEqual(['home.html', 'Home.jsx', 'Home.vue', 'Home.php']);
    });

    it('should report a failing format without affecting the others', () => {
        const results = convertAll(MANIFEST, { phpNamespace: '1nvalid' });

        expect(results.php).toBeInstanceOf(ConversionError);
        expect(results.html).not.toBeInstanceOf(ConversionError);
        expect(results.react).not.toBeInstanceOf(ConversionError);
        expect(results.vue).not.toBeInstanceOf(ConversionError);
    });

    it('should report a malformed manifest for each format', () => {
        // Parsed input reaches converters untyped; style values are checked
        const malformed: Manifest = JSON.parse(
            '{"metadata":{},"styles":{"box":["x"]},"imports":{},"structure":{}}',
        );

        const results = convertAll(malformed);

        for (const format of ['html', 'react', 'vue', 'php'] as const) {
            expect(results[format]).toBeInstanceOf(ConversionError);
            expect(results[format]).toMatchObject({
                targetFormat: format,
                path: 'styles.box',
                message: `Cannot convert manifest to ${format}: Style 'box' must be a string`,
            });
        }
    });

    it.each([
        [
            { div: { text: ['a'] } },
            'structure.div.text',
            "'text' must be a scalar value at structure.div.text",
        ],
        [
            { button: { text: 'Go', '@click': 'go()' } },
            'structure.button.@click',
            "Invalid attribute name '@click' at structure.button.@click",
        ],
    ])(
        'should report the structure defect %j the same way for each format',
        (structure, path, details) => {
            const results = convertAll({ ...MANIFEST, structure });

            for (const format of ['html', 'react', 'vue', 'php'] as const) {
                expect(results[format]).toBeInstanceOf(ConversionError);
                expect(results[format]).toMatchObject({
                    targetFormat: format,
                    path,
                    details,
                });
            }
        },
    );
});
