/**
 * YAML reading and writing for manifests.
 */

import { parse, stringify, YAMLParseError } from 'yaml';
import { isPlainObject } from '@pageforge/utils';
import { ManifestParseError } from './errors.js';

/**
 * Parses manifest text into a raw mapping.
 *
 * @param text - YAML (or JSON) source
 * @param source - File path or URL, used in error messages
 * @throws ManifestParseError on syntax errors or when the document is not
 *   a mapping
 */
export function parseManifestYaml(
    text: string,
    source = '<inline>',
): Record<string, unknown> {
    let document: unknown;
    try {
        document = parse(text);
    } catch (error) {
        if (error instanceof YAMLParseError) {
            throw new ManifestParseError(source, error.message, error);
        }
        throw error;
    }

    if (!isPlainObject(document)) {
        const shape =
            document === null || document === undefined
                ? 'empty'
                : Array.isArray(document)
                  ? 'a sequence'
                  : `a ${typeof document}`;
        throw new ManifestParseError(
            source,
            `document is ${shape}, expected a mapping`,
        );
    }
    return document;
}

/**
 * Serializes a manifest (or any plain value) as YAML.
 */
export function stringifyManifestYaml(value: unknown): string {
    return stringify(value, { lineWidth: 0 });
}
