/**
 * CLI error type and the terminal rendering of pipeline failures.
 */

import chalk from 'chalk';
import {
    ManifestParseError,
    TemplateError,
    ValidationError,
} from '@pageforge/manifest';
import { ConversionError } from '@pageforge/converters';
import { NetworkError } from '@pageforge/http';

/**
 * Error raised by the CLI itself: bad option values, refused overwrites,
 * unreadable config files.
 */
export class CliError extends Error {
    readonly name = 'CliError';

    /**
     * @param message - What went wrong
     * @param hint - How the user can fix it
     * @param cause - The underlying failure, if any
     */
    constructor(
        message: string,
        public readonly hint?: string,
        cause?: unknown,
    ) {
        super(message, cause !== undefined ? { cause } : undefined);
    }
}

export interface FormatErrorOptions {
    /** Append the stack trace */
    debug?: boolean;
}

function detailLines(error: Error): string[] {
    if (error instanceof ValidationError) {
        return [
            ...error.errors.map((message) => `  - ${message}`),
            ...error.warnings.map((message) => `  warning: ${message}`),
        ];
    }
    if (error instanceof TemplateError) {
        return error.reference ? [`  reference: ${error.reference}`] : [];
    }
    if (error instanceof ConversionError) {
        return error.path ? [`  path: ${error.path}`] : [];
    }
    if (error instanceof ManifestParseError) {
        return [`  source: ${error.source}`];
    }
    if (error instanceof NetworkError) {
        const lines = [`  url: ${error.url}`];
        if (error.hint) lines.push(`  hint: ${error.hint}`);
        return lines;
    }
    if (error instanceof CliError) {
        return error.hint ? [`  hint: ${error.hint}`] : [];
    }
    return [];
}

/**
 * Renders a failure as plain lines: `[Name] message` followed by whatever
 * context the error carries.
 *
 * @example
 * ```typescript
 * formatError(new ValidationError(['Manifest must have a structure section']));
 * // [
 * //   '[ValidationError] Manifest validation failed: Manifest must have a structure section',
 * //   '  - Manifest must have a structure section',
 * // ]
 * ```
 */
export function formatError(
    error: unknown,
    options: FormatErrorOptions = {},
): string[] {
    if (!(error instanceof Error)) {
        return [`[Error] ${String(error)}`];
    }

    const lines = [`[${error.name}] ${error.message}`, ...detailLines(error)];
    if (options.debug && error.stack) {
        lines.push('', error.stack);
    }
    return lines;
}

/**
 * Prints a failure to stderr, headline in red. Stacks are shown when the
 * `DEBUG` environment variable is set.
 */
export function printError(error: unknown): void {
    const [headline, ...details] = formatError(error, {
        debug: Boolean(process.env.DEBUG),
    });
    console.error(chalk.red(headline));
    for (const line of details) {
        console.error(chalk.gray(line));
    }
}
