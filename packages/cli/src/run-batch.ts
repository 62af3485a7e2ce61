/**
 * Batch command implementation
 */

import chalk from 'chalk';
import ora from 'ora';
import type { ConversionFormat, ConverterOptions } from '@pageforge/types';
import {
    processManifestFile,
    type TemplateVariables,
} from '@pageforge/manifest';
import { batchConvert, type BatchReport } from '@pageforge/converters';

export const DEFAULT_BATCH_OUTPUT = 'output';

export interface BatchCommandOptions {
    manifests: string[];
    format: ConversionFormat;
    output: string;
    concurrency: number;
    strict: boolean;
    variables: TemplateVariables;
    converterOptions: ConverterOptions;
}

/**
 * Converts every manifest into `output`, one file per manifest named after
 * its source.
 *
 * @returns The batch report; failures are listed, not thrown
 */
export async function runBatch(
    options: BatchCommandOptions,
): Promise<BatchReport> {
    const total = options.manifests.length;
    const spinner = ora({
        text: `Converting ${total} manifests to ${options.format}...`,
        color: 'cyan',
    }).start();

    const report = await batchConvert(options.manifests, {
        format: options.format,
        outputDir: options.output,
        concurrency: options.concurrency,
        converterOptions: options.converterOptions,
        load: async (source) => {
            const { manifest } = await processManifestFile(source, {
                strict: options.strict,
                variables: options.variables,
            });
            return manifest;
        },
        onItemComplete: (_item, completed) => {
            spinner.text = `Converting manifests to ${options.format} (${completed}/${total})`;
        },
    });

    const summary = `Converted ${chalk.green(report.succeeded)}/${total} manifests to ${options.format}`;
    if (report.failed === 0) {
        spinner.succeed(summary);
    } else {
        spinner.fail(`${summary}, ${chalk.red(report.failed)} failed`);
    }

    for (const item of report.items) {
        if (item.status === 'success') {
            console.log(
                `  ${chalk.green('✓')} ${item.source} -> ${chalk.cyan(item.outputPath ?? item.result.filename)}`,
            );
        } else {
            console.log(
                `  ${chalk.red('✗')} ${item.source}: ${item.error.message}`,
            );
        }
    }

    return report;
}
