/**
 * Type definitions for the development server.
 *
 * @packageDocumentation
 */

import type { ConverterOptions } from '@pageforge/types';
import type { TemplateVariables } from '@pageforge/manifest';

/**
 * Configuration options for the development server.
 *
 * @example
 * ```typescript
 * const options: ServerOptions = {
 *     manifestFile: './pages/home.yaml',
 *     port: 8080,
 *     host: 'localhost',
 *     verbose: true,
 * };
 * ```
 */
export interface ServerOptions {
    /** Manifest rendered by `/`, `/manifest` and `GET /convert/:format`. */
    manifestFile: string;

    /** Port to listen on. */
    port: number;

    /** Host to bind to. */
    host: string;

    /** Enable request logging. */
    verbose?: boolean;

    /** Escalate validation warnings to errors. */
    strict?: boolean;

    /** Values for `{{ name }}` placeholders. */
    variables?: TemplateVariables;

    /** Defaults for every conversion the server performs. */
    converterOptions?: ConverterOptions;
}

/**
 * Options accepted by {@link createApp}; the listening address is only
 * reported, never bound.
 */
export type AppOptions = Pick<ServerOptions, 'manifestFile'> &
    Partial<Omit<ServerOptions, 'manifestFile'>>;

/** Body of `GET /api/health`. */
export interface HealthResponse {
    status: 'healthy';
    version: string;
    manifest: string;
    /** Seconds since the app was created. */
    uptime: number;
}

/** Body of `POST /api/validate`. */
export interface ValidateResponse {
    valid: boolean;
    errors: string[];
    warnings: string[];
}
