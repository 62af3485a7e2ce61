/**
 * Scrape command implementation
 *
 * Fetches a live page, turns it into a cleaned manifest and writes it as
 * YAML.
 */

import chalk from 'chalk';
import ora from 'ora';
import { dirname } from 'path';
import { mkdir, writeFile } from 'fs/promises';
import {
    analyzeStructure,
    stringifyManifestYaml,
} from '@pageforge/manifest';
import { cleanManifest, scrapeUrl } from '@pageforge/scraper';
import { confirmOverwrite } from './output-file.js';

export const DEFAULT_SCRAPE_OUTPUT = 'scraped-manifest.yaml';

export interface ScrapeCommandOptions {
    url: string;
    output: string;
    overwrite: boolean;
    /** Request timeout in milliseconds */
    timeout?: number;
}

export interface ScrapeCommandOutcome {
    output: string;
    elementCount: number;
    warnings: string[];
}

/**
 * Normalizes a URL by adding https:// if no protocol is specified.
 *
 * This allows users to pass URLs like "example.com" without the protocol.
 */
export function normalizeUrl(url: string): string {
    if (url.startsWith('http://') || url.startsWith('https://')) {
        return url;
    }
    return `https://${url}`;
}

/**
 * Runs the scrape command.
 */
export async function runScrape(
    options: ScrapeCommandOptions,
): Promise<ScrapeCommandOutcome> {
    const url = normalizeUrl(options.url);
    await confirmOverwrite(options.output, { overwrite: options.overwrite });

    const warnings: string[] = [];
    const spinner = ora({
        text: `Scraping ${chalk.cyan(url)}...`,
        color: 'cyan',
    }).start();

    let yaml: string;
    let elementCount: number;
    try {
        const manifest = await scrapeUrl(url, {
            timeout: options.timeout,
            onWarning: (message) => warnings.push(message),
        });
        const cleaned = cleanManifest(manifest);
        elementCount = analyzeStructure(cleaned.structure).elementCount;
        yaml = stringifyManifestYaml(cleaned);
    } catch (error) {
        spinner.fail(`Failed to scrape ${url}`);
        throw error;
    }

    await mkdir(dirname(options.output), { recursive: true });
    await writeFile(options.output, yaml, 'utf-8');

    spinner.succeed(
        `Scraped ${chalk.green(elementCount)} elements into ${chalk.cyan(options.output)}`,
    );
    for (const warning of warnings) {
        console.warn(chalk.yellow(`  ⚠ ${warning}`));
    }

    return { output: options.output, elementCount, warnings };
}
