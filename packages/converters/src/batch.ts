/**
 * Batch conversion
 *
 * Converts many manifests with a bounded worker pool. Each source succeeds
 * or fails on its own; a failure is recorded and never stops its siblings.
 */

import { basename, extname } from 'path';
import type {
    ConversionFormat,
    ConverterOptions,
    Manifest,
} from '@pageforge/types';
import { runConcurrent } from '@pageforge/utils';
import { convertManifest } from './registry.js';
import { writeConversionResult, type ConversionResult } from './result.js';

export const DEFAULT_BATCH_CONCURRENCY = 4;

export type BatchItemResult =
    | {
          source: string;
          status: 'success';
          result: ConversionResult;
          /** Set when the result was written to disk */
          outputPath?: string;
      }
    | {
          source: string;
          status: 'error';
          error: Error;
      };

export interface BatchReport {
    items: BatchItemResult[];
    succeeded: number;
    failed: number;
}

export interface BatchOptions {
    format: ConversionFormat;
    /** Turns a source reference into a resolved manifest */
    load: (source: string) => Promise<Manifest>;
    /** Maximum conversions in flight (default: 4) */
    concurrency?: number;
    /** Write each result here, named after its source file */
    outputDir?: string;
    converterOptions?: ConverterOptions;
    /** Called as each source finishes */
    onItemComplete?: (
        item: BatchItemResult,
        completed: number,
        total: number,
    ) => void;
}

/**
 * Output file name for a source: the source's stem with the extension of
 * the generated file, so that sources sharing a title do not collide.
 */
export function batchFilename(source: string, result: ConversionResult): string {
    const stem = basename(source, extname(source));
    return `${stem}${extname(result.filename)}`;
}

async function convertSource(
    source: string,
    options: BatchOptions,
): Promise<BatchItemResult> {
    try {
        const manifest = await options.load(source);
        const result = convertManifest(
            manifest,
            options.format,
            options.converterOptions,
        );
        if (options.outputDir === undefined) {
            return { source, status: 'success', result };
        }
        const outputPath = await writeConversionResult(
            result,
            options.outputDir,
            batchFilename(source, result),
        );
        return { source, status: 'success', result, outputPath };
    } catch (error) {
        return {
            source,
            status: 'error',
            error: error instanceof Error ? error : new Error(String(error)),
        };
    }
}

/**
 * Converts every source to one format.
 *
 * @returns Per-source outcomes in input order, with counts
 */
export async function batchConvert(
    sources: string[],
    options: BatchOptions,
): Promise<BatchReport> {
    const items = await runConcurrent(
        sources,
        Math.max(1, options.concurrency ?? DEFAULT_BATCH_CONCURRENCY),
        (source) => convertSource(source, options),
        (item, _index, completed, total) =>
            options.onItemComplete?.(item, completed, total),
    );

    const succeeded = items.filter((item) => item.status === 'success').length;
    return { items, succeeded, failed: items.length - succeeded };
}
