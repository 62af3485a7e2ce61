/**
 * Hono middleware for the development server.
 *
 * @packageDocumentation
 */

export {
    loggerMiddleware,
    formatStatus,
    formatTime,
    type LoggerOptions,
} from './logger.js';
