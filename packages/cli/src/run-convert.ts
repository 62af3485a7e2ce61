/**
 * Convert command implementation
 *
 * Processes one manifest file and renders it in one format (written to a
 * file or stdout) or in every format (written into a directory).
 */

import chalk from 'chalk';
import { basename, dirname, join } from 'path';
import {
    CONVERSION_FORMATS,
    type ConversionFormat,
    type ConverterOptions,
} from '@pageforge/types';
import {
    processManifestFile,
    type TemplateVariables,
} from '@pageforge/manifest';
import {
    ConversionError,
    convertAll,
    convertManifest,
    writeConversionResult,
    type ConversionResult,
} from '@pageforge/converters';
import { confirmOverwrite } from './output-file.js';
import { CliError } from './errors.js';

/**
 * Target of the convert command: one format, or all of them.
 */
export type ConvertTarget = ConversionFormat | 'all';

export interface ConvertOptions {
    manifest: string;
    format: ConvertTarget;
    /** File for one format, directory for `all`; stdout when omitted for one format */
    output?: string;
    strict: boolean;
    overwrite: boolean;
    variables: TemplateVariables;
    converterOptions: ConverterOptions;
}

export interface ConvertOutcome {
    /** Written file per format */
    written: Partial<Record<ConversionFormat, string>>;
    failed: Partial<Record<ConversionFormat, ConversionError>>;
    warnings: string[];
}

function printWarnings(warnings: readonly string[]): void {
    for (const warning of warnings) {
        console.warn(chalk.yellow(`  ⚠ ${warning}`));
    }
}

async function writeResult(
    result: ConversionResult,
    path: string,
    overwrite: boolean,
): Promise<string> {
    await confirmOverwrite(path, { overwrite });
    return writeConversionResult(result, dirname(path), basename(path));
}

/**
 * Runs the convert command.
 *
 * @throws CliError when `all` was requested and any format failed
 */
export async function runConvert(
    options: ConvertOptions,
): Promise<ConvertOutcome> {
    const { manifest, warnings } = await processManifestFile(options.manifest, {
        strict: options.strict,
        variables: options.variables,
    });
    printWarnings(warnings);

    const outcome: ConvertOutcome = { written: {}, failed: {}, warnings };

    if (options.format !== 'all') {
        const result = convertManifest(
            manifest,
            options.format,
            options.converterOptions,
        );
        if (options.output === undefined) {
            process.stdout.write(result.content);
            return outcome;
        }
        const path = await writeResult(result, options.output, options.overwrite);
        outcome.written[options.format] = path;
        console.log(
            `${chalk.green('✓')} ${options.format} written to ${chalk.cyan(path)}`,
        );
        return outcome;
    }

    const outputDir = options.output ?? '.';
    const results = convertAll(manifest, options.converterOptions);
    for (const format of CONVERSION_FORMATS) {
        const result = results[format];
        if (result instanceof ConversionError) {
            outcome.failed[format] = result;
            console.log(`${chalk.red('✗')} ${format}: ${result.message}`);
            continue;
        }
        const path = await writeResult(
            result,
            join(outputDir, result.filename),
            options.overwrite,
        );
        outcome.written[format] = path;
        console.log(
            `${chalk.green('✓')} ${format} written to ${chalk.cyan(path)}`,
        );
    }

    const failedCount = Object.keys(outcome.failed).length;
    if (failedCount > 0) {
        throw new CliError(
            `${failedCount} of ${CONVERSION_FORMATS.length} formats failed`,
        );
    }
    return outcome;
}
