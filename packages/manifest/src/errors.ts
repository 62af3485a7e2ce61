/**
 * `@pageforge/manifest` - Error definitions
 *
 * Custom error classes for manifest parsing, validation and inheritance.
 */

/**
 * Error thrown when a manifest violates the required shape.
 */
export class ValidationError extends Error {
    readonly name = 'ValidationError';

    /**
     * @param errors - Every blocking problem found
     * @param warnings - Non-fatal findings collected alongside
     */
    constructor(
        public readonly errors: readonly string[],
        public readonly warnings: readonly string[] = [],
    ) {
        super(
            errors.length === 1
                ? `Manifest validation failed: ${errors[0]}`
                : `Manifest validation failed with ${errors.length} errors`,
        );
    }
}

/**
 * Error thrown when template inheritance or variable substitution fails.
 */
export class TemplateError extends Error {
    readonly name = 'TemplateError';

    /**
     * @param message - What went wrong
     * @param reference - The template reference being resolved, if known
     * @param cause - The underlying failure (e.g. a loader error)
     */
    constructor(
        message: string,
        public readonly reference?: string,
        cause?: unknown,
    ) {
        super(message, cause !== undefined ? { cause } : undefined);
    }
}

/**
 * Error thrown when manifest text cannot be parsed into a mapping.
 */
export class ManifestParseError extends Error {
    readonly name = 'ManifestParseError';

    /**
     * @param source - File path or URL the text came from
     * @param details - Parser message
     * @param cause - The parser's own error
     */
    constructor(
        public readonly source: string,
        public readonly details: string,
        cause?: unknown,
    ) {
        super(
            `Failed to parse manifest ${source}: ${details}`,
            cause !== undefined ? { cause } : undefined,
        );
    }
}

/**
 * Error thrown when the raw structure cannot be turned into elements.
 * Converters wrap it into their own error kind.
 */
export class StructureError extends Error {
    readonly name = 'StructureError';

    constructor(
        message: string,
        public readonly path: string,
    ) {
        super(`${message} at ${path}`);
    }
}
