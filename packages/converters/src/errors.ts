/**
 * `@pageforge/converters` - Error definitions
 */

import type { ConversionFormat } from '@pageforge/types';

/**
 * Error thrown when a manifest cannot be rendered in a target format.
 *
 * Every failure inside a converter, whatever its origin, reaches the caller
 * as this one error kind.
 */
export class ConversionError extends Error {
    readonly name = 'ConversionError';
    readonly sourceFormat = 'manifest';

    /**
     * @param targetFormat - Format being generated
     * @param details - What could not be rendered
     * @param path - Location of the offending value (e.g. `styles.box`)
     * @param cause - The underlying error, if any
     */
    constructor(
        public readonly targetFormat: ConversionFormat,
        public readonly details: string,
        public readonly path?: string,
        cause?: unknown,
    ) {
        super(
            `Cannot convert manifest to ${targetFormat}: ${details}`,
            cause !== undefined ? { cause } : undefined,
        );
    }
}
