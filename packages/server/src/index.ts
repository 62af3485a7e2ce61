/**
 * `@pageforge/server` - Development server for manifests.
 *
 * Renders one manifest file on request, as an HTML page or in any output
 * format, and accepts posted manifests for conversion and validation. The
 * file is re-read on every request; there is no file watching.
 *
 * ## Usage
 *
 * ### CLI
 *
 * ```bash
 * pageforge serve pages/home.yaml --port 8080
 * ```
 *
 * ### Programmatic
 *
 * ```typescript
 * import { createApp, runServer } from '@pageforge/server';
 * import { serve } from '@hono/node-server';
 *
 * // Option 1: Use runServer for simple cases
 * runServer({
 *     manifestFile: 'pages/home.yaml',
 *     port: 8080,
 *     host: 'localhost',
 * });
 *
 * // Option 2: Use createApp for more control
 * const app = createApp({ manifestFile: 'pages/home.yaml' });
 * serve({ fetch: app.fetch, port: 8080 });
 * ```
 *
 * @packageDocumentation
 */

export {
    createApp,
    getServerInfo,
    errorStatus,
    renderErrorPage,
    CONTENT_TYPES,
} from './server/index.js';
export { loggerMiddleware, type LoggerOptions } from './middleware/index.js';
export { runServer } from './runner.js';
export type {
    ServerOptions,
    AppOptions,
    HealthResponse,
    ValidateResponse,
} from './types.js';
