/**
 * Converter lookup and multi-format conversion.
 */

import {
    CONVERSION_FORMATS,
    type ConversionFormat,
    type ConverterOptions,
    type Manifest,
} from '@pageforge/types';
import { ConversionError } from './errors.js';
import { HtmlConverter } from './html-converter.js';
import { PhpConverter } from './php-converter.js';
import { ReactConverter } from './react-converter.js';
import type { ConversionResult } from './result.js';
import { VueConverter } from './vue-converter.js';

/**
 * What callers need from any converter.
 */
export interface Converter {
    readonly format: ConversionFormat;
    convert(manifest: Manifest, options?: ConverterOptions): ConversionResult;
}

/**
 * Type guard for supported format names.
 */
export function isConversionFormat(value: string): value is ConversionFormat {
    return CONVERSION_FORMATS.some((format) => format === value);
}

/**
 * Creates the converter for a format.
 *
 * @param options - Defaults for every conversion made with it
 */
export function createConverter(
    format: ConversionFormat,
    options: ConverterOptions = {},
): Converter {
    switch (format) {
        case 'html':
            return new HtmlConverter(options);
        case 'react':
            return new ReactConverter(options);
        case 'vue':
            return new VueConverter(options);
        case 'php':
            return new PhpConverter(options);
    }
}

/**
 * Converts a manifest to one format.
 *
 * @throws ConversionError
 */
export function convertManifest(
    manifest: Manifest,
    format: ConversionFormat,
    options: ConverterOptions = {},
): ConversionResult {
    return createConverter(format, options).convert(manifest);
}

/**
 * Runs every converter independently; one format failing does not affect
 * the others.
 *
 * @returns Result or error per format
 */
export function convertAll(
    manifest: Manifest,
    options: ConverterOptions = {},
): Record<ConversionFormat, ConversionResult | ConversionError> {
    const attempt = (format: ConversionFormat) => {
        try {
            return convertManifest(manifest, format, options);
        } catch (error) {
            if (error instanceof ConversionError) return error;
            const message = error instanceof Error ? error.message : String(error);
            return new ConversionError(format, message, undefined, error);
        }
    };

    return {
        html: attempt('html'),
        react: attempt('react'),
        vue: attempt('vue'),
        php: attempt('php'),
    };
}
