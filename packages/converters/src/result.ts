/**
 * Conversion results and their persistence.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { ConversionFormat, ConversionMetadata } from '@pageforge/types';

/**
 * Output of one converter run. Frozen once created.
 */
export interface ConversionResult {
    readonly content: string;
    readonly filename: string;
    readonly formatType: ConversionFormat;
    readonly metadata: Readonly<ConversionMetadata>;
}

/**
 * Creates a frozen conversion result.
 */
export function createConversionResult(init: {
    content: string;
    filename: string;
    formatType: ConversionFormat;
    metadata: ConversionMetadata;
}): ConversionResult {
    return Object.freeze({
        content: init.content,
        filename: init.filename,
        formatType: init.formatType,
        metadata: Object.freeze({ ...init.metadata }),
    });
}

/**
 * Writes a result's content into `directory`, creating it when needed.
 *
 * @param result - The conversion result
 * @param directory - Target directory
 * @param filename - Overrides `result.filename`
 * @returns Path of the written file
 */
export async function writeConversionResult(
    result: ConversionResult,
    directory: string,
    filename: string = result.filename,
): Promise<string> {
    await mkdir(directory, { recursive: true });
    const outputPath = join(directory, filename);
    await writeFile(outputPath, result.content, 'utf-8');
    return outputPath;
}
