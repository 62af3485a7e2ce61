/**
 * Tests for the development server routes
 */

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Hono } from 'hono';
import { VERSION } from '@pageforge/utils';
import { ValidationError } from '@pageforge/manifest';
import { createApp, errorStatus, loggerMiddleware } from '../src/index.js';

const HOME_YAML = `metadata:
  title: Home
  description: Landing
styles:
  hero: "color: navy"
structure:
  h1:
    text: "Welcome {{ name }}"
    style: hero
`;

const UNTITLED_YAML = `metadata:
  description: No title here
structure:
  p: Hi
`;

function post(body: string): RequestInit {
    return {
        method: 'POST',
        headers: { 'Content-Type': 'application/yaml' },
        body,
    };
}

describe('createApp', () => {
    let dir: string;
    let homeFile: string;
    let untitledFile: string;
    let app: Hono;

    beforeAll(async () => {
        dir = await mkdtemp(join(tmpdir(), 'pageforge-server-'));
        homeFile = join(dir, 'home.yaml');
        untitledFile = join(dir, 'untitled.yaml');
        await writeFile(homeFile, HOME_YAML);
        await writeFile(untitledFile, UNTITLED_YAML);
        app = createApp({
            manifestFile: homeFile,
            host: 'localhost',
            port: 8080,
            variables: { name: 'Ada' },
        });
    });

    afterAll(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    describe('GET /', () => {
        it('should render the manifest as an HTML page', async () => {
            const res = await app.request('/');

            expect(res.status).toBe(200);
            expect(res.headers.get('content-type')).toContain('text/html');
            const html = await res.text();
            expect(html).toContain('  <h1 class="hero">Welcome Ada</h1>');
            expect(html).toContain('    .hero { color: navy; }');
        });

        it('should render an error page for an invalid manifest', async () => {
            const res = await createApp({ manifestFile: untitledFile }).request(
                '/',
            );

            expect(res.status).toBe(500);
            const html = await res.text();
            expect(html).toContain('<h1>ValidationError</h1>');
            expect(html).toContain('Metadata must include a title');
        });
    });

    describe('GET /manifest', () => {
        it('should return the processed manifest', async () => {
            const res = await app.request('/manifest');

            expect(res.status).toBe(200);
            expect(await res.json()).toMatchObject({
                manifest: {
                    metadata: { title: 'Home', description: 'Landing' },
                    structure: {
                        h1: { text: 'Welcome Ada', style: 'hero' },
                    },
                },
                warnings: [],
            });
        });

        it('should answer 404 when the file is missing', async () => {
            const res = await createApp({
                manifestFile: join(dir, 'absent.yaml'),
            }).request('/manifest');

            expect(res.status).toBe(404);
            expect(await res.json()).toMatchObject({
                error: expect.stringContaining('ENOENT'),
                details: [],
            });
        });
    });

    describe('GET /convert/:format', () => {
        it('should return converted content with its content type', async () => {
            const res = await app.request('/convert/react');

            expect(res.status).toBe(200);
            expect(res.headers.get('content-type')).toBe(
                'text/javascript; charset=UTF-8',
            );
            expect(await res.text()).toContain('export default function Home() {');
        });

        it('should reject an unsupported format', async () => {
            const res = await app.request('/convert/svelte');

            expect(res.status).toBe(400);
            expect(await res.json()).toEqual({
                error: 'Unsupported format: svelte',
                supported: ['html', 'react', 'vue', 'php'],
            });
        });

        it('should report validation errors as a bad request', async () => {
            const res = await createApp({ manifestFile: untitledFile }).request(
                '/convert/html',
            );

            expect(res.status).toBe(400);
            expect(await res.json()).toEqual({
                error: 'Manifest validation failed: Metadata must include a title',
                details: ['Metadata must include a title'],
            });
        });
    });

    describe('POST /convert/:format', () => {
        it('should convert a posted manifest', async () => {
            const res = await app.request(
                '/convert/vue',
                post('metadata:\n  title: Posted\nstructure:\n  p: "{{ name }}"\n'),
            );

            expect(res.status).toBe(200);
            expect(await res.json()).toMatchObject({
                status: 'success',
                content: expect.stringContaining('  <p>Ada</p>'),
                filename: 'Posted.vue',
                metadata: { title: 'Posted', elementCount: 1 },
                warnings: ['Consider adding a description to metadata'],
            });
        });

        it('should reject unparsable YAML', async () => {
            const res = await app.request('/convert/html', post('- a\n- b\n'));

            expect(res.status).toBe(400);
            expect(await res.json()).toEqual({
                status: 'error',
                error: 'Failed to parse manifest <request body>: document is a sequence, expected a mapping',
                details: [],
            });
        });
    });

    describe('API routes', () => {
        it('should report health', async () => {
            const res = await app.request('/api/health');

            expect(res.status).toBe(200);
            expect(await res.json()).toMatchObject({
                status: 'healthy',
                version: VERSION,
                manifest: homeFile,
            });
        });

        it('should describe the server', async () => {
            const res = await app.request('/api/info');

            expect(await res.json()).toEqual({
                version: VERSION,
                manifestFile: homeFile,
                host: 'localhost',
                port: 8080,
                strict: false,
                formats: ['html', 'react', 'vue', 'php'],
            });
        });

        it('should validate a posted manifest', async () => {
            const res = await app.request(
                '/api/validate',
                post('metadata:\n  title: Ok\nstructure:\n  p: Hi\n'),
            );

            expect(await res.json()).toEqual({
                valid: true,
                errors: [],
                warnings: ['Consider adding a description to metadata'],
            });
        });

        it('should list validation errors', async () => {
            const res = await app.request('/api/validate', post(UNTITLED_YAML));

            expect(res.status).toBe(200);
            expect(await res.json()).toEqual({
                valid: false,
                errors: ['Metadata must include a title'],
                warnings: [],
            });
        });

        it('should answer 400 for unparsable YAML', async () => {
            const res = await app.request('/api/validate', post('a: [1'));

            expect(res.status).toBe(400);
            expect(await res.json()).toMatchObject({
                valid: false,
                errors: [
                    expect.stringMatching(
                        /^Failed to parse manifest <request body>: /,
                    ),
                ],
                warnings: [],
            });
        });
    });

    it('should answer unknown routes with a JSON 404', async () => {
        const res = await app.request('/nope');

        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({
            error: 'Not Found',
            message: 'No route for GET /nope',
        });
    });
});

describe('errorStatus', () => {
    it('should map pipeline failures to client errors', () => {
        expect(errorStatus(new ValidationError(['x']))).toBe(400);
        expect(errorStatus(new Error('boom'))).toBe(500);
        expect(
            errorStatus(Object.assign(new Error('missing'), { code: 'ENOENT' })),
        ).toBe(404);
    });
});

describe('loggerMiddleware', () => {
    it('should write one line per request', async () => {
        const write = vi.fn();
        const app = new Hono();
        app.use('*', loggerMiddleware({ enabled: true, write }));
        app.get('/x', (c) => c.text('ok'));

        await app.request('/x');

        expect(write).toHaveBeenCalledTimes(1);
        // eslint-disable-next-line no-control-regex
        const line = String(write.mock.calls[0][0]).replace(/\x1b\[[0-9;]*m/g, '');
        expect(line).toMatch(/^ {2}GET \/x 200 \d+ms$/);
    });

    it('should stay silent when disabled', async () => {
        const write = vi.fn();
        const app = new Hono();
        app.use('*', loggerMiddleware({ enabled: false, write }));
        app.get('/x', (c) => c.text('ok'));

        await app.request('/x');

        expect(write).not.toHaveBeenCalled();
    });
});
