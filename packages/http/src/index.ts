/**
 * @pageforge/http
 *
 * Fetch wrapper used wherever pageforge reaches the network: loading remote
 * ancestor manifests and scraping live pages. Retries transient failures and
 * turns undici's nested error causes into readable messages.
 */

// ============================================================================
// SIGNAL UTILITIES
// ============================================================================

/**
 * Creates an AbortSignal that combines a timeout with an optional user signal.
 * If both are provided, the signal aborts when either triggers.
 *
 * @param timeout - Timeout in milliseconds
 * @param signal - Optional user-provided AbortSignal
 * @returns Combined AbortSignal, or undefined if neither provided
 */
export function createSignalWithTimeout(
    timeout?: number,
    signal?: AbortSignal,
): AbortSignal | undefined {
    if (!timeout && !signal) return undefined;
    if (!timeout) return signal;

    const timeoutSignal = AbortSignal.timeout(timeout);
    if (!signal) return timeoutSignal;

    return AbortSignal.any([signal, timeoutSignal]);
}

// ============================================================================
// BROWSER HEADERS
// ============================================================================

/**
 * Browser-like request headers sent when scraping pages
 */
export const BROWSER_HEADERS = {
    'User-Agent':
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.5',
};

// ============================================================================
// ERROR DETAILS
// ============================================================================

/** Error codes that are considered transient and worth retrying */
const TRANSIENT_ERROR_CODES = new Set([
    'ECONNRESET',
    'ETIMEDOUT',
    'ECONNREFUSED',
    'EPIPE',
    'ENOTFOUND', // DNS can be flaky
    'EAI_AGAIN',
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_SOCKET',
]);

/** Default number of retry attempts for transient errors */
const DEFAULT_RETRY_ATTEMPTS = 2;

/** Delay between retry attempts in milliseconds */
const RETRY_DELAY_MS = 1000;

interface HintRule {
    codes: readonly string[];
    /** Lower-case fragment of any message in the cause chain */
    text?: string;
    hint: string;
}

/** First match wins */
const HINT_RULES: readonly HintRule[] = [
    {
        codes: ['ENOTFOUND', 'EAI_AGAIN'],
        text: 'getaddrinfo',
        hint: 'DNS lookup failed. Check the host name in the URL.',
    },
    {
        codes: ['ECONNREFUSED'],
        hint: 'Connection refused. Nothing is listening at that address.',
    },
    {
        codes: ['ECONNRESET', 'UND_ERR_SOCKET'],
        text: 'socket hang up',
        hint: 'The server closed the connection. Retrying may help.',
    },
    {
        codes: ['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT'],
        text: 'timeout',
        hint: 'Request timed out. Slow hosts need a longer --timeout.',
    },
    {
        codes: ['CERT_HAS_EXPIRED', 'DEPTH_ZERO_SELF_SIGNED_CERT'],
        text: 'certificate',
        hint: 'The TLS certificate was rejected as invalid or expired.',
    },
];

/**
 * Details pulled out of a fetch failure
 */
export interface FetchErrorDetails {
    message: string;
    code?: string;
    cause?: string;
    hint?: string;
}

function errorCode(error: Error): string | undefined {
    if ('code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

function errorCause(error: Error): Error | undefined {
    return error.cause instanceof Error ? error.cause : undefined;
}

/**
 * Extracts detailed error information from a fetch error.
 * Node.js fetch errors (via undici) wrap the actual cause in error.cause,
 * which can be nested multiple levels deep.
 */
export function getFetchErrorDetails(error: unknown): FetchErrorDetails {
    if (!(error instanceof Error)) {
        return { message: String(error) };
    }

    const causes: string[] = [];
    let current: Error | undefined = error;
    let code: string | undefined;

    while (current) {
        code ??= errorCode(current);

        if (current.message && !causes.includes(current.message)) {
            causes.push(current.message);
        }

        current = errorCause(current);
    }

    let causeStr = causes.length > 1 ? causes.slice(1).join(' -> ') : undefined;
    if (code && causeStr) {
        causeStr = `[${code}] ${causeStr}`;
    } else if (code) {
        causeStr = `[${code}]`;
    }

    const fullText = causes.join(' ').toLowerCase();
    const hint = HINT_RULES.find(
        (rule) =>
            (code !== undefined && rule.codes.includes(code)) ||
            (rule.text !== undefined && fullText.includes(rule.text)),
    )?.hint;

    return {
        message: causes[0] || 'Unknown error',
        code,
        cause: causeStr,
        hint,
    };
}

/**
 * Raised when a request fails at the transport level or answers with a
 * non-success status.
 */
export class NetworkError extends Error {
    readonly name = 'NetworkError';
    /** HTTP status, when the server answered */
    public readonly status?: number;
    public readonly code?: string;
    public readonly hint?: string;

    constructor(
        public readonly url: string,
        message: string,
        options: {
            status?: number;
            code?: string;
            hint?: string;
            cause?: unknown;
        } = {},
    ) {
        super(
            message,
            options.cause !== undefined ? { cause: options.cause } : undefined,
        );
        this.status = options.status;
        this.code = options.code;
        this.hint = options.hint;
    }

    /**
     * Wraps a transport failure thrown by fetch.
     */
    static fromFetchFailure(url: string, error: unknown): NetworkError {
        const details = getFetchErrorDetails(error);
        const message = details.cause
            ? `${details.message} (${details.cause})`
            : details.message;
        return new NetworkError(url, message, {
            code: details.code,
            hint: details.hint,
            cause: error,
        });
    }

    /**
     * Builds the error for a response that arrived with a failure status.
     */
    static fromResponse(url: string, response: Response): NetworkError {
        const statusText = response.statusText ? ` ${response.statusText}` : '';
        return new NetworkError(url, `HTTP ${response.status}${statusText}`, {
            status: response.status,
        });
    }

}

/**
 * Checks if an error is transient and worth retrying
 */
function isTransientError(error: unknown): boolean {
    if (!(error instanceof Error)) {
        return false;
    }

    let current: Error | undefined = error;
    while (current) {
        const code = errorCode(current);
        if (code && TRANSIENT_ERROR_CODES.has(code)) {
            return true;
        }
        current = errorCause(current);
    }

    const message = error.message.toLowerCase();
    return (
        message.includes('socket hang up') ||
        message.includes('other side closed') ||
        message.includes('connection reset')
    );
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parses the Retry-After header value.
 * Can be either a number of seconds or an HTTP date.
 *
 * @returns Delay in milliseconds, or null if parsing fails
 */
function parseRetryAfter(retryAfter: string | null): number | null {
    if (!retryAfter) return null;

    const seconds = parseInt(retryAfter, 10);
    if (!isNaN(seconds)) {
        return seconds * 1000;
    }

    const date = Date.parse(retryAfter);
    if (!isNaN(date)) {
        const delay = date - Date.now();
        return delay > 0 ? delay : null;
    }

    return null;
}

/**
 * Adds up to `jitterFactor` of random jitter to a delay
 */
function addJitter(delay: number, jitterFactor: number = 0.25): number {
    const jitter = delay * jitterFactor * Math.random();
    return Math.floor(delay + jitter);
}

// ============================================================================
// FETCH
// ============================================================================

export interface RobustFetchOptions extends RequestInit {
    /** Number of retry attempts for transient errors (default: 2) */
    retries?: number;
    /** Per-request timeout in milliseconds */
    timeout?: number;
}

/**
 * Wrapper around fetch that retries on transient errors (including 429 rate
 * limits and 5xx responses) and provides improved error messages.
 *
 * A response with a failure status is still returned once retries are
 * exhausted; the caller decides what to do with it.
 *
 * @param url - The URL to fetch
 * @param options - Fetch options plus optional retry count and timeout
 * @returns The fetch Response
 * @throws NetworkError with detailed error information on transport failure
 */
export async function robustFetch(
    url: string,
    options: RobustFetchOptions = {},
): Promise<Response> {
    const {
        retries = DEFAULT_RETRY_ATTEMPTS,
        timeout,
        signal,
        ...fetchOptions
    } = options;

    let lastError: unknown;
    let lastResponse: Response | undefined;

    for (let attempt = 0; attempt <= retries; attempt++) {
        try {
            const response = await fetch(url, {
                ...fetchOptions,
                signal: createSignalWithTimeout(timeout, signal ?? undefined),
            });

            if (response.status === 429 && attempt < retries) {
                lastResponse = response;

                const retryAfterDelay = parseRetryAfter(
                    response.headers.get('Retry-After'),
                );
                const backoffDelay = RETRY_DELAY_MS * Math.pow(2, attempt);
                await sleep(addJitter(retryAfterDelay ?? backoffDelay));
                continue;
            }

            if (response.status >= 500 && attempt < retries) {
                lastResponse = response;
                await sleep(addJitter(RETRY_DELAY_MS * Math.pow(2, attempt)));
                continue;
            }

            return response;
        } catch (error) {
            lastError = error;

            if (attempt < retries && isTransientError(error)) {
                // Exponential backoff: 1s, 2s, 4s, etc.
                await sleep(addJitter(RETRY_DELAY_MS * Math.pow(2, attempt)));
                continue;
            }

            throw NetworkError.fromFetchFailure(url, error);
        }
    }

    if (lastResponse) {
        return lastResponse;
    }

    throw NetworkError.fromFetchFailure(url, lastError);
}

/**
 * Fetches a URL and returns its body as text.
 *
 * @throws NetworkError when the request fails or the final status is not 2xx
 */
export async function fetchText(
    url: string,
    options: RobustFetchOptions = {},
): Promise<string> {
    const response = await robustFetch(url, options);
    if (!response.ok) {
        throw NetworkError.fromResponse(url, response);
    }
    return response.text();
}
