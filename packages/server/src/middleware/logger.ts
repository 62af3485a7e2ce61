/**
 * Request logging middleware.
 *
 * Prints `METHOD path STATUS elapsed` after each response, colour-coded
 * with picocolors.
 *
 * @packageDocumentation
 */

import type { MiddlewareHandler } from 'hono';
import pc from 'picocolors';

/**
 * Configuration options for the logger middleware.
 */
export interface LoggerOptions {
    /** Whether request logging is enabled. */
    enabled: boolean;
    /** Line sink (default: `console.log`). */
    write?: (line: string) => void;
}

const METHOD_COLORS: Record<string, (text: string) => string> = {
    GET: pc.green,
    POST: pc.yellow,
    PUT: pc.blue,
    DELETE: pc.red,
    PATCH: pc.magenta,
};

function formatMethod(method: string): string {
    return (METHOD_COLORS[method] ?? pc.gray)(method);
}

/**
 * Colours a status code by class: 2xx green, 3xx cyan, 4xx yellow,
 * 5xx red.
 */
export function formatStatus(status: number): string {
    const text = String(status);
    if (status >= 500) return pc.red(text);
    if (status >= 400) return pc.yellow(text);
    if (status >= 300) return pc.cyan(text);
    if (status >= 200) return pc.green(text);
    return text;
}

/**
 * Colours a duration: under 100ms green, under 500ms yellow, else red.
 */
export function formatTime(ms: number): string {
    const text = `${ms.toFixed(0)}ms`;
    if (ms < 100) return pc.green(text);
    if (ms < 500) return pc.yellow(text);
    return pc.red(text);
}

/**
 * Creates a Hono middleware that logs each request once its response is
 * ready.
 *
 * @example
 * ```typescript
 * app.use('*', loggerMiddleware({ enabled: true }));
 * // Output:
 * //   GET /convert/react 200 12ms
 * ```
 */
export function loggerMiddleware(
    options: LoggerOptions = { enabled: true },
): MiddlewareHandler {
    const write = options.write ?? ((line: string) => console.log(line));

    return async (c, next) => {
        if (!options.enabled) {
            return next();
        }

        const start = Date.now();
        const method = c.req.method;
        const path = c.req.path;

        await next();

        write(
            `  ${formatMethod(method)} ${path} ${formatStatus(c.res.status)} ${formatTime(Date.now() - start)}`,
        );
    };
}
