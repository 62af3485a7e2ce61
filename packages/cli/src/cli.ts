/**
 * Command line argument parsing and CLI setup for pageforge.
 *
 * This module defines all CLI commands, options, and their handlers using commander.js.
 */

import { existsSync } from 'fs';
import { resolve } from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { CONVERSION_FORMATS, type ConversionFormat } from '@pageforge/types';
import {
    DEFAULT_BATCH_CONCURRENCY,
    isConversionFormat,
} from '@pageforge/converters';
import { VERSION } from '@pageforge/utils';
import { resolveConversionSettings } from './config.js';
import { CliError } from './errors.js';
import { runConvert, type ConvertTarget } from './run-convert.js';
import { runValidate } from './run-validate.js';
import { DEFAULT_SCRAPE_OUTPUT, runScrape } from './run-scrape.js';
import { DEFAULT_BATCH_OUTPUT, runBatch } from './run-batch.js';

// ============================================================================
// OPTION TYPES
// ============================================================================

/**
 * Options for the `convert` subcommand, as parsed by commander.
 */
export interface ConvertCliOptions {
    format: ConvertTarget;
    output?: string;
    optimize: boolean;
    strict: boolean;
    overwrite: boolean;
    var: string[];
    config?: string;
}

interface ValidateCliOptions {
    strict: boolean;
}

interface ScrapeCliOptions {
    output: string;
    overwrite: boolean;
    timeout: number;
}

interface BatchCliOptions {
    format: ConversionFormat;
    output: string;
    concurrency: number;
    optimize: boolean;
    strict: boolean;
    var: string[];
    config?: string;
}

interface ServeCliOptions {
    port: number;
    host: string;
    verbose: boolean;
    strict: boolean;
    var: string[];
    config?: string;
}

// ============================================================================
// ARGUMENT PARSERS
// ============================================================================

/**
 * Parses `--format` for `convert`, which also takes `all`.
 */
export function parseConvertTarget(value: string): ConvertTarget {
    if (value === 'all' || isConversionFormat(value)) {
        return value;
    }
    throw new InvalidArgumentError(
        `Expected one of ${[...CONVERSION_FORMATS, 'all'].join(', ')}.`,
    );
}

/**
 * Parses `--format` for `batch`.
 */
export function parseFormat(value: string): ConversionFormat {
    if (isConversionFormat(value)) {
        return value;
    }
    throw new InvalidArgumentError(
        `Expected one of ${CONVERSION_FORMATS.join(', ')}.`,
    );
}

/**
 * Parses a positive integer option such as `--port` or `--concurrency`.
 */
export function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

/**
 * Adds the options shared by commands that convert manifests.
 */
function conversionCliOptions(command: Command): Command {
    return command
        .option('--optimize', 'Optimize the output (minify, drop comments)', false)
        .option('--strict', 'Treat validation warnings as errors', false)
        .option(
            '--var <key=value>',
            'Template variable (repeatable), overrides --config',
            collect,
            [],
        )
        .option('--config <file>', 'Converter defaults (JSON or YAML)');
}

// ============================================================================
// PROGRAM
// ============================================================================

/**
 * Builds the `pageforge` program with its subcommands: convert, validate,
 * scrape, batch and serve.
 *
 * Subcommand actions run the matching `run*` function; failures propagate
 * to the caller of `parseAsync`.
 *
 * @example
 * ```typescript
 * await createProgram().parseAsync(['node', 'pageforge', 'validate', 'home.yaml']);
 * ```
 */
export function createProgram(): Command {
    const program = new Command();

    program
        .name('pageforge')
        .description(
            'Regenerate web pages from declarative YAML manifests as HTML, React, Vue and PHP',
        )
        .version(VERSION);

    /**
     * Convert command - render one manifest
     */
    conversionCliOptions(
        program
            .command('convert')
            .description('Convert a manifest to HTML, React, Vue or PHP')
            .argument('<manifest>', 'Manifest file (YAML)')
            .option(
                '-f, --format <format>',
                `Output format (${CONVERSION_FORMATS.join(', ')} or all)`,
                parseConvertTarget,
                'html',
            )
            .option(
                '-o, --output <path>',
                'Output file; a directory with --format all (default: stdout, or . for all)',
            )
            .option('--overwrite', 'Replace existing files without prompting', false),
    ).action(async (manifest: string, opts: ConvertCliOptions) => {
        const settings = await resolveConversionSettings(opts);
        await runConvert({
            manifest,
            format: opts.format,
            output: opts.output,
            strict: opts.strict,
            overwrite: opts.overwrite,
            ...settings,
        });
    });

    /**
     * Validate command - report errors, warnings and structure figures
     */
    program
        .command('validate')
        .description('Validate a manifest and analyze its structure')
        .argument('<manifest>', 'Manifest file (YAML)')
        .option('--strict', 'Treat validation warnings as errors', false)
        .action(async (manifest: string, opts: ValidateCliOptions) => {
            const outcome = await runValidate({ manifest, strict: opts.strict });
            if (!outcome.valid) {
                process.exitCode = 1;
            }
        });

    /**
     * Scrape command - build a manifest from a live page
     */
    program
        .command('scrape')
        .description('Scrape a web page into a manifest')
        .argument('<url>', 'Page URL (https:// is assumed when omitted)')
        .option('-o, --output <file>', 'Output manifest file', DEFAULT_SCRAPE_OUTPUT)
        .option('--overwrite', 'Replace an existing file without prompting', false)
        .option(
            '-t, --timeout <ms>',
            'Request timeout in milliseconds',
            parsePositiveInt,
            30_000,
        )
        .action(async (url: string, opts: ScrapeCliOptions) => {
            await runScrape({
                url,
                output: opts.output,
                overwrite: opts.overwrite,
                timeout: opts.timeout,
            });
        });

    /**
     * Batch command - convert many manifests to one format
     */
    conversionCliOptions(
        program
            .command('batch')
            .description('Convert several manifests to one format')
            .argument('<manifests...>', 'Manifest files (YAML)')
            .option(
                '-f, --format <format>',
                `Output format (${CONVERSION_FORMATS.join(', ')})`,
                parseFormat,
                'html',
            )
            .option('-o, --output <dir>', 'Output directory', DEFAULT_BATCH_OUTPUT)
            .option(
                '-c, --concurrency <number>',
                'Number of manifests converted at once',
                parsePositiveInt,
                DEFAULT_BATCH_CONCURRENCY,
            ),
    ).action(async (manifests: string[], opts: BatchCliOptions) => {
        const settings = await resolveConversionSettings(opts);
        const report = await runBatch({
            manifests,
            format: opts.format,
            output: opts.output,
            concurrency: opts.concurrency,
            strict: opts.strict,
            ...settings,
        });
        if (report.failed > 0) {
            process.exitCode = 1;
        }
    });

    /**
     * Serve command - start the development server
     */
    program
        .command('serve')
        .description('Serve a manifest as a live page and conversion API')
        .argument('[manifest]', 'Manifest file (YAML)', 'manifest.yaml')
        .option('-p, --port <number>', 'Server port', parsePositiveInt, 8080)
        .option('-H, --host <string>', 'Server host', 'localhost')
        .option('-v, --verbose', 'Log every request', false)
        .option('--strict', 'Treat validation warnings as errors', false)
        .option(
            '--var <key=value>',
            'Template variable (repeatable), overrides --config',
            collect,
            [],
        )
        .option('--config <file>', 'Converter defaults (JSON or YAML)')
        .action(async (manifest: string, opts: ServeCliOptions) => {
            const manifestFile = resolve(manifest);
            if (!existsSync(manifestFile)) {
                throw new CliError(
                    `Manifest file '${manifest}' not found`,
                    'Pass the manifest path: pageforge serve <manifest>',
                );
            }

            const settings = await resolveConversionSettings(opts);
            const { runServer } = await import('@pageforge/server');
            runServer({
                manifestFile,
                port: opts.port,
                host: opts.host,
                verbose: opts.verbose,
                strict: opts.strict,
                ...settings,
            });
        });

    return program;
}
