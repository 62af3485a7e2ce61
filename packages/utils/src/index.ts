/**
 * @pageforge/utils
 *
 * Shared utility functions for pageforge packages
 */

/**
 * The current version of pageforge
 *
 * Used for displaying version information in CLI, server and generated headers.
 */
export const VERSION = '0.1.0';

/**
 * Converts a camelCase, PascalCase, snake_case or spaced name to kebab-case.
 *
 * @param value - The name to convert
 * @returns The kebab-case form, e.g. `heroTitle` becomes `hero-title`
 */
export function toKebabCase(value: string): string {
    return value
        .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
        .replace(/[\s_]+/g, '-')
        .toLowerCase();
}

/**
 * Converts arbitrary text to a PascalCase identifier.
 *
 * Non-alphanumeric characters separate words. Returns an empty string when
 * the input holds no letters or digits.
 *
 * @param value - The text to convert (e.g. a page title)
 * @returns The PascalCase identifier, e.g. `my landing page` becomes `MyLandingPage`
 */
export function toPascalCase(value: string): string {
    return value
        .split(/[^A-Za-z0-9]+/)
        .filter(Boolean)
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
        .join('');
}

/**
 * Converts arbitrary text to a lower-case, hyphen-separated file name stem.
 *
 * @param value - The text to convert
 * @returns The slug, e.g. `My Page!` becomes `my-page`
 */
export function slugify(value: string): string {
    return value
        .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
}

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
};

/**
 * Escapes text for use in HTML content and quoted attribute values.
 *
 * @param value - Raw text
 * @returns The text with `& < > " '` replaced by entities
 */
export function escapeHtml(value: string): string {
    return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * Type guard for plain mappings such as those produced by a YAML or JSON
 * parser. Arrays, class instances (including `Date`) and `null` are rejected.
 */
export function isPlainObject(
    value: unknown,
): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null) return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/**
 * Executes async functions concurrently with a limit, reporting progress
 * as each individual item completes (not waiting for the whole batch).
 *
 * Unlike Promise.all with batching, this uses a worker pool pattern that
 * immediately starts the next item when one completes, maximizing throughput.
 *
 * @param items - Array of items to process
 * @param concurrency - Maximum number of concurrent executions
 * @param fn - Async function to execute for each item
 * @param onItemComplete - Optional callback fired when each item completes
 * @returns Array of results in the same order as input items
 *
 * @example
 * ```ts
 * const results = await runConcurrent(
 *   manifestFiles,
 *   4,
 *   async (file) => convertFile(file),
 *   (result, index, completed, total) => {
 *     console.log(`Completed ${completed}/${total}`);
 *   }
 * );
 * ```
 */
export async function runConcurrent<T, R>(
    items: T[],
    concurrency: number,
    fn: (item: T, index: number) => Promise<R>,
    onItemComplete?: (
        result: R,
        index: number,
        completed: number,
        total: number,
    ) => void,
): Promise<R[]> {
    if (items.length === 0) {
        return [];
    }

    const results: R[] = new Array(items.length);
    const total = items.length;
    let nextIndex = 0;
    let completedCount = 0;

    async function worker(): Promise<void> {
        while (nextIndex < items.length) {
            const index = nextIndex++;
            const item = items[index];
            const result = await fn(item, index);
            results[index] = result;
            completedCount++;
            onItemComplete?.(result, index, completedCount, total);
        }
    }

    // Start workers up to the concurrency limit (or item count if smaller)
    const workerCount = Math.min(concurrency, items.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    return results;
}
