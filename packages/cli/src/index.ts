/**
 * @module @pageforge/cli
 *
 * The `pageforge` command line: convert, validate, scrape, batch and serve.
 */

import { createProgram } from './cli.js';
import { printError } from './errors.js';

export * from './cli.js';
export * from './config.js';
export * from './errors.js';
export * from './output-file.js';
export * from './run-convert.js';
export * from './run-validate.js';
export * from './run-scrape.js';
export * from './run-batch.js';

/**
 * Main CLI entry point. Prints any failure and sets exit code 1.
 *
 * @param argv - Process arguments, `node` and script path first
 */
export async function main(argv: string[] = process.argv): Promise<void> {
    try {
        await createProgram().parseAsync(argv);
    } catch (error) {
        printError(error);
        process.exitCode = 1;
    }
}
