#!/usr/bin/env node
/**
 * Entry point for the pageforge CLI application.
 *
 * This module serves as the executable wrapper that bootstraps the CLI by
 * importing and invoking the main function from `@pageforge/cli`, which
 * reports its own failures. Anything escaping it is fatal.
 *
 * @packageDocumentation
 */

import { main } from '@pageforge/cli';

main().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`\n[pageforge] A fatal, unhandled error occurred: ${message}`);
    if (process.env.DEBUG && error instanceof Error) {
        console.error(error.stack);
    }
    process.exit(1);
});
