/**
 * Programmatic interface for running the development server.
 *
 * @packageDocumentation
 */

import { serve, type ServerType } from '@hono/node-server';
import pc from 'picocolors';
import { createApp, getServerInfo } from './server/app.js';
import type { ServerOptions } from './types.js';

/**
 * Starts the development server and prints its address and routes.
 *
 * The server runs until it is closed or the process is terminated (e.g.,
 * with Ctrl+C).
 *
 * @param options - Server configuration options
 * @returns The underlying Node.js server
 *
 * @example
 * ```typescript
 * import { runServer } from '@pageforge/server';
 *
 * runServer({
 *     manifestFile: './pages/home.yaml',
 *     port: 8080,
 *     host: 'localhost',
 *     verbose: true,
 * });
 * ```
 */
export function runServer(options: ServerOptions): ServerType {
    console.log(pc.bold(pc.cyan('\n  pageforge dev server')));
    console.log(pc.gray('  ' + '─'.repeat(30)));
    console.log();

    const app = createApp(options);

    for (const line of getServerInfo(options)) {
        console.log(`  ${line}`);
    }
    console.log();

    const server = serve({
        fetch: app.fetch,
        port: options.port,
        hostname: options.host,
    });

    console.log(pc.green(`  Server started!`));
    console.log();
    console.log(pc.gray(`  Press ${pc.bold('Ctrl+C')} to stop`));
    console.log();

    return server;
}
