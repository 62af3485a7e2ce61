/**
 * Core server functionality: the Hono app factory and its error page.
 *
 * @packageDocumentation
 */

export {
    createApp,
    getServerInfo,
    errorStatus,
    CONTENT_TYPES,
} from './app.js';
export { renderErrorPage } from './error-page.js';
