/**
 * Output file checks.
 */

import { existsSync } from 'fs';
import prompts from 'prompts';
import { CliError } from './errors.js';

export interface ConfirmOverwriteOptions {
    /** Replace existing files without prompting */
    overwrite?: boolean;
    /** Whether a prompt can be shown (default: stdin is a TTY) */
    interactive?: boolean;
}

/**
 * Makes sure `path` may be written.
 *
 * - If the file doesn't exist, or --overwrite is set: resolve
 * - If stdin is not a terminal: refuse with a hint about --overwrite
 * - Otherwise: ask, and refuse unless the user confirms
 *
 * @throws CliError when the file must not be replaced
 */
export async function confirmOverwrite(
    path: string,
    options: ConfirmOverwriteOptions = {},
): Promise<void> {
    const {
        overwrite = false,
        interactive = Boolean(process.stdin.isTTY),
    } = options;

    if (!existsSync(path) || overwrite) {
        return;
    }

    if (!interactive) {
        throw new CliError(
            `Output file '${path}' already exists`,
            'Pass --overwrite to replace it',
        );
    }

    const response = await prompts({
        type: 'confirm',
        name: 'overwrite',
        message: `Output file '${path}' already exists. Overwrite?`,
        initial: false,
    });

    // Ctrl+C leaves the answer undefined
    if (response.overwrite !== true) {
        throw new CliError('Operation cancelled.');
    }
}
