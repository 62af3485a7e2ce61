/**
 * Ingestion normalizer
 *
 * The one place where raw parsed YAML (or a scraper's output) becomes a
 * {@link Manifest}. Every field that may arrive either as a list or as a
 * string is coerced to its canonical shape here, so nothing downstream has
 * to guess.
 */

import type {
    Manifest,
    ManifestImports,
    ManifestMetadata,
    ScalarValue,
    StructureMap,
    StructureValue,
    StyleMap,
} from '@pageforge/types';
import { isPlainObject } from '@pageforge/utils';
import { ValidationError } from './errors.js';

// ============================================================================
// VALUE COERCION
// ============================================================================

function isScalar(value: unknown): value is ScalarValue {
    return (
        value === null ||
        typeof value === 'string' ||
        typeof value === 'number' ||
        typeof value === 'boolean'
    );
}

function scalarToString(value: unknown): string {
    if (value === null || value === undefined) return '';
    if (value instanceof Date) return value.toISOString();
    return String(value);
}

/**
 * Copies an arbitrary parsed value into a {@link StructureValue}.
 * Anything that is not JSON-like is stringified.
 */
export function toStructureValue(value: unknown): StructureValue {
    if (value === undefined) return null;
    if (isScalar(value)) return value;
    if (Array.isArray(value)) return value.map(toStructureValue);
    if (isPlainObject(value)) return toStructureMap(value);
    return scalarToString(value);
}

function toStructureMap(value: Record<string, unknown>): StructureMap {
    const result: StructureMap = {};
    for (const [key, entry] of Object.entries(value)) {
        result[key] = toStructureValue(entry);
    }
    return result;
}

// ============================================================================
// SECTIONS
// ============================================================================

function normalizeMetadata(raw: unknown): ManifestMetadata {
    if (!isPlainObject(raw)) return {};

    const metadata: ManifestMetadata = {};
    for (const [key, value] of Object.entries(raw)) {
        if (isScalar(value)) {
            metadata[key] = value;
        } else if (Array.isArray(value)) {
            metadata[key] = value
                .filter((item) => item !== null && item !== undefined)
                .map(scalarToString)
                .join(', ');
        } else if (value instanceof Date) {
            metadata[key] = value.toISOString();
        }
        // Nested mappings carry no meaning in metadata and are dropped.
    }
    return metadata;
}

/**
 * Joins one style value into a declaration string.
 *
 * Lists become `item; item` (each item trimmed, its trailing `;` removed),
 * mappings become `prop: value; prop: value`.
 */
export function joinStyleValue(value: unknown): string {
    if (typeof value === 'string') return value;
    if (value === null || value === undefined) return '';

    if (Array.isArray(value)) {
        return value
            .map((item) =>
                scalarToString(item)
                    .trim()
                    .replace(/;+\s*$/, ''),
            )
            .filter((item) => item.length > 0)
            .join('; ');
    }

    if (isPlainObject(value)) {
        return Object.entries(value)
            .map(([prop, propValue]) => `${prop}: ${scalarToString(propValue)}`)
            .join('; ');
    }

    return scalarToString(value);
}

function normalizeStyleSection(raw: Record<string, unknown>): StyleMap {
    const styles: StyleMap = {};
    for (const [name, value] of Object.entries(raw)) {
        styles[name] = joinStyleValue(value);
    }
    return styles;
}

function toStringList(value: unknown): string[] {
    if (value === null || value === undefined) return [];
    if (Array.isArray(value)) {
        return value
            .filter((item) => item !== null && item !== undefined)
            .map(scalarToString);
    }
    return [scalarToString(value)];
}

function normalizeImportSection(raw: Record<string, unknown>): ManifestImports {
    const imports: ManifestImports = {};
    for (const [key, value] of Object.entries(raw)) {
        if (value === null || value === undefined) continue;

        if (key === 'inline_scripts') {
            imports.inline_scripts = Array.isArray(value)
                ? toStringList(value).join('\n\n')
                : scalarToString(value);
        } else {
            imports[key] = toStringList(value);
        }
    }
    return imports;
}

function optionalMapping(
    raw: unknown,
): Record<string, StructureValue> | undefined {
    return isPlainObject(raw) ? toStructureMap(raw) : undefined;
}

// ============================================================================
// ENTRY POINT
// ============================================================================

/**
 * Converts a raw parsed document into a {@link Manifest}.
 *
 * Pure: the input is never modified and the result shares no mutable
 * structure with it.
 *
 * @param raw - Parsed YAML/JSON value or scraper output
 * @returns The canonical manifest
 * @throws ValidationError when the input, its `styles` or its `imports` is
 *   not a mapping
 */
export function normalizeManifest(raw: unknown): Manifest {
    if (!isPlainObject(raw)) {
        throw new ValidationError(['Manifest must be a mapping']);
    }

    const problems: string[] = [];
    const { styles: rawStyles, imports: rawImports } = raw;

    if (
        rawStyles !== undefined &&
        rawStyles !== null &&
        !isPlainObject(rawStyles)
    ) {
        problems.push('Styles must be a mapping');
    }
    if (
        rawImports !== undefined &&
        rawImports !== null &&
        !isPlainObject(rawImports)
    ) {
        problems.push('Imports must be a mapping');
    }
    if (problems.length > 0) {
        throw new ValidationError(problems);
    }

    const manifest: Manifest = {
        metadata: normalizeMetadata(raw.metadata),
        styles: isPlainObject(rawStyles) ? normalizeStyleSection(rawStyles) : {},
        imports: isPlainObject(rawImports)
            ? normalizeImportSection(rawImports)
            : {},
    };

    if (raw.structure !== undefined) {
        manifest.structure = toStructureValue(raw.structure);
    }

    const interactions = optionalMapping(raw.interactions);
    if (interactions) manifest.interactions = interactions;

    const slots = optionalMapping(raw.template_slots);
    if (slots) manifest.template_slots = slots;

    const vars = optionalMapping(raw.template_vars);
    if (vars) manifest.template_vars = vars;

    return manifest;
}

/**
 * Deep-copies a manifest. Sections are plain data, so a structural copy is
 * exact.
 */
export function cloneManifest(manifest: Manifest): Manifest {
    return structuredClone(manifest);
}
