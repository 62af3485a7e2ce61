/**
 * Hono app factory - creates the development server application
 */

import { Hono, type Context } from 'hono';
import {
    CONVERSION_FORMATS,
    type ConversionFormat,
    type ProcessedManifest,
} from '@pageforge/types';
import {
    ManifestParseError,
    ManifestProcessor,
    TemplateError,
    ValidationError,
    parseManifestYaml,
    processManifestFile,
} from '@pageforge/manifest';
import {
    ConversionError,
    convertManifest,
    isConversionFormat,
} from '@pageforge/converters';
import { VERSION } from '@pageforge/utils';

import type {
    AppOptions,
    HealthResponse,
    ServerOptions,
    ValidateResponse,
} from '../types.js';
import { loggerMiddleware } from '../middleware/logger.js';
import { renderErrorPage } from './error-page.js';

/** Response content type per output format */
export const CONTENT_TYPES: Record<ConversionFormat, string> = {
    html: 'text/html; charset=UTF-8',
    react: 'text/javascript; charset=UTF-8',
    vue: 'text/javascript; charset=UTF-8',
    php: 'text/x-php; charset=UTF-8',
};

const REQUEST_SOURCE = '<request body>';

// ============================================================================
// ERROR MAPPING
// ============================================================================

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * HTTP status for a failure: 404 for a missing manifest file, 400 for a
 * manifest the pipeline rejected, 500 for anything else.
 */
export function errorStatus(error: unknown): 400 | 404 | 500 {
    if (isMissingFile(error)) return 404;
    if (
        error instanceof ValidationError ||
        error instanceof TemplateError ||
        error instanceof ManifestParseError ||
        error instanceof ConversionError
    ) {
        return 400;
    }
    return 500;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function errorDetails(error: unknown): string[] {
    return error instanceof ValidationError ? [...error.errors] : [];
}

function errorTitle(error: unknown): string {
    return error instanceof Error ? error.name : 'Error';
}

function jsonError(c: Context, error: unknown) {
    return c.json(
        { error: errorMessage(error), details: errorDetails(error) },
        errorStatus(error),
    );
}

// ============================================================================
// APP
// ============================================================================

/**
 * Create a Hono app serving one manifest file. The file is processed anew
 * on every request, so edits show up on reload.
 */
export function createApp(options: AppOptions): Hono {
    const app = new Hono();
    const startedAt = Date.now();
    const { manifestFile, converterOptions } = options;

    const processFile = (): Promise<ProcessedManifest> =>
        processManifestFile(manifestFile, {
            strict: options.strict,
            variables: options.variables,
        });

    const processBody = async (c: Context): Promise<ProcessedManifest> => {
        const document = parseManifestYaml(await c.req.text(), REQUEST_SOURCE);
        const processor = new ManifestProcessor({ strict: options.strict });
        return processor.process(document, { variables: options.variables });
    };

    if (options.verbose) {
        app.use('*', loggerMiddleware({ enabled: true }));
    }

    app.get('/', async (c) => {
        try {
            const { manifest } = await processFile();
            const result = convertManifest(manifest, 'html', converterOptions);
            return c.html(result.content);
        } catch (error) {
            const details = errorDetails(error);
            const message = [errorMessage(error), ...details].join('\n  ');
            return c.html(renderErrorPage(errorTitle(error), message), 500);
        }
    });

    app.get('/manifest', async (c) => {
        try {
            return c.json(await processFile());
        } catch (error) {
            return jsonError(c, error);
        }
    });

    app.get('/convert/:format', async (c) => {
        const format = c.req.param('format');
        if (!isConversionFormat(format)) {
            return c.json(
                {
                    error: `Unsupported format: ${format}`,
                    supported: CONVERSION_FORMATS,
                },
                400,
            );
        }

        try {
            const { manifest } = await processFile();
            const result = convertManifest(manifest, format, converterOptions);
            return c.body(result.content, 200, {
                'Content-Type': CONTENT_TYPES[format],
            });
        } catch (error) {
            return jsonError(c, error);
        }
    });

    app.post('/convert/:format', async (c) => {
        const format = c.req.param('format');
        if (!isConversionFormat(format)) {
            return c.json(
                { status: 'error', error: `Unsupported format: ${format}` },
                400,
            );
        }

        try {
            const { manifest, warnings } = await processBody(c);
            const result = convertManifest(manifest, format, converterOptions);
            return c.json({
                status: 'success',
                content: result.content,
                filename: result.filename,
                metadata: result.metadata,
                warnings,
            });
        } catch (error) {
            return c.json(
                {
                    status: 'error',
                    error: errorMessage(error),
                    details: errorDetails(error),
                },
                errorStatus(error),
            );
        }
    });

    app.get('/api/health', (c) => {
        const body: HealthResponse = {
            status: 'healthy',
            version: VERSION,
            manifest: manifestFile,
            uptime: (Date.now() - startedAt) / 1000,
        };
        return c.json(body);
    });

    app.get('/api/info', (c) => {
        return c.json({
            version: VERSION,
            manifestFile,
            host: options.host ?? null,
            port: options.port ?? null,
            strict: options.strict ?? false,
            formats: CONVERSION_FORMATS,
        });
    });

    app.post('/api/validate', async (c) => {
        let result: ValidateResponse;
        try {
            const { warnings } = await processBody(c);
            result = { valid: true, errors: [], warnings };
        } catch (error) {
            if (error instanceof ManifestParseError) {
                result = { valid: false, errors: [error.message], warnings: [] };
                return c.json(result, 400);
            }
            if (error instanceof ValidationError) {
                result = {
                    valid: false,
                    errors: [...error.errors],
                    warnings: [...error.warnings],
                };
            } else if (error instanceof TemplateError) {
                result = { valid: false, errors: [error.message], warnings: [] };
            } else {
                throw error;
            }
        }
        return c.json(result);
    });

    app.notFound((c) => {
        return c.json(
            {
                error: 'Not Found',
                message: `No route for ${c.req.method} ${c.req.path}`,
            },
            404,
        );
    });

    app.onError((err, c) => {
        console.error('Server error:', err);
        return c.json(
            {
                error: 'Internal Server Error',
                message: err.message,
            },
            500,
        );
    });

    return app;
}

/**
 * Get server info for display
 */
export function getServerInfo(options: ServerOptions): string[] {
    return [
        `Manifest: ${options.manifestFile}`,
        `Formats: ${CONVERSION_FORMATS.join(', ')}`,
        '',
        `Listening on: http://${options.host}:${options.port}`,
        '',
        'Routes:',
        '  GET  /                  rendered HTML page',
        '  GET  /manifest          processed manifest (JSON)',
        '  GET  /convert/:format   converted output',
        '  POST /convert/:format   convert a posted manifest',
        '  GET  /api/health',
        '  GET  /api/info',
        '  POST /api/validate',
    ];
}
