import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
    CliError,
    loadConfig,
    parseConfig,
    parseVariables,
    resolveConversionSettings,
} from '../src/index.js';
import {
    captureAsyncError,
    captureError,
} from '../../../test/helpers/errors.js';

describe('parseConfig', () => {
    it('should split converter options from variables', () => {
        const config = parseConfig(
            {
                optimize: true,
                doctype: 'xhtml',
                phpNamespace: 'App\\Pages',
                typescript: false,
                variables: { site: 'Docs', year: 2026, nav: ['a', 'b'] },
            },
            'pageforge.yaml',
        );

        expect(config).toEqual({
            converterOptions: {
                optimize: true,
                typescript: false,
                doctype: 'xhtml',
                phpNamespace: 'App\\Pages',
            },
            variables: { site: 'Docs', year: 2026, nav: ['a', 'b'] },
        });
    });

    it('should treat an empty document as no settings', () => {
        expect(parseConfig(null, 'empty.yaml')).toEqual({
            converterOptions: {},
            variables: {},
        });
    });

    it('should name every unknown key', () => {
        const error = captureError(() =>
            parseConfig({ colour: 'red', optimize: true, size: 2 }, 'c.yaml'),
        );

        expect(error).toBeInstanceOf(CliError);
        expect(error).toMatchObject({
            message: 'Unknown config key(s) in c.yaml: colour, size',
        });
    });

    it('should reject values of the wrong type', () => {
        expect(() => parseConfig({ optimize: 'yes' }, 'c.yaml')).toThrow(
            'Config c.yaml: "optimize" must be a boolean',
        );
        expect(() => parseConfig({ doctype: 'html3' }, 'c.yaml')).toThrow(
            'Config c.yaml: "doctype" must be one of html5, html4, xhtml',
        );
        expect(() => parseConfig({ phpNamespace: 3 }, 'c.yaml')).toThrow(
            'Config c.yaml: "phpNamespace" must be a string',
        );
        expect(() => parseConfig({ variables: ['a'] }, 'c.yaml')).toThrow(
            'Config c.yaml: "variables" must be a mapping',
        );
        expect(() => parseConfig(['optimize'], 'c.yaml')).toThrow(
            'Config c.yaml must be a mapping',
        );
    });
});

describe('loadConfig', () => {
    let dir: string;

    beforeAll(async () => {
        dir = await mkdtemp(join(tmpdir(), 'pageforge-config-'));
        await writeFile(
            join(dir, 'settings.json'),
            JSON.stringify({ minify: false, variables: { site: 'Json' } }),
        );
        await writeFile(
            join(dir, 'settings.yaml'),
            'includeMetaTags: false\nvariables:\n  site: Yaml\n',
        );
        await writeFile(join(dir, 'broken.json'), '{ "optimize": ');
    });

    afterAll(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should read JSON by extension', async () => {
        expect(await loadConfig(join(dir, 'settings.json'))).toEqual({
            converterOptions: { minify: false },
            variables: { site: 'Json' },
        });
    });

    it('should read anything else as YAML', async () => {
        expect(await loadConfig(join(dir, 'settings.yaml'))).toEqual({
            converterOptions: { includeMetaTags: false },
            variables: { site: 'Yaml' },
        });
    });

    it('should report a missing file', async () => {
        const path = join(dir, 'absent.yaml');
        const error = await captureAsyncError(loadConfig(path));

        expect(error).toBeInstanceOf(CliError);
        expect(error).toMatchObject({ message: `Cannot read config ${path}` });
    });

    it('should report a file that does not parse', async () => {
        const error = await captureAsyncError(
            loadConfig(join(dir, 'broken.json')),
        );

        expect(error).toBeInstanceOf(CliError);
        expect(error).toMatchObject({
            message: expect.stringMatching(/^Cannot parse config .*broken\.json: /),
        });
    });

    it('should let --var override config variables', async () => {
        const settings = await resolveConversionSettings({
            config: join(dir, 'settings.yaml'),
            var: ['site=Cli', 'extra=1'],
            optimize: true,
        });

        expect(settings).toEqual({
            converterOptions: { includeMetaTags: false, optimize: true },
            variables: { site: 'Cli', extra: '1' },
        });
    });
});

describe('parseVariables', () => {
    it('should split at the first equals sign', () => {
        expect(parseVariables(['name=Ada', 'query=a=b', 'empty='])).toEqual({
            name: 'Ada',
            query: 'a=b',
            empty: '',
        });
    });

    it('should reject pairs without a valid name', () => {
        for (const pair of ['novalue', '=x', '1st=x']) {
            const error = captureError(() => parseVariables([pair]));
            expect(error).toBeInstanceOf(CliError);
            expect(error).toMatchObject({ message: `Invalid --var "${pair}"` });
        }
    });
});
