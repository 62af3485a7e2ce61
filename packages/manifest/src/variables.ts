/**
 * Template variable substitution
 *
 * Replaces `{{ name }}` and `{{ a.b.c }}` placeholders in every string value
 * of a manifest. Keys are never rewritten.
 */

import type {
    Manifest,
    ManifestImports,
    ManifestMetadata,
    StructureMap,
    StructureValue,
    StyleMap,
} from '@pageforge/types';
import { isPlainObject } from '@pageforge/utils';
import { cloneManifest } from './normalize.js';
import type { WarningCallback } from './style-registry.js';

export type TemplateVariables = Record<string, StructureValue>;

const PLACEHOLDER_PATTERN =
    /\{\{\s*([A-Za-z_][\w-]*(?:\.[A-Za-z_][\w-]*)*)\s*\}\}/g;

// ============================================================================
// LOOKUP
// ============================================================================

type LookupResult =
    | { found: true; value: string }
    | { found: false; reason: 'unknown' | 'not-scalar' };

function lookup(context: StructureMap, name: string): LookupResult {
    let current: StructureValue = context;
    for (const segment of name.split('.')) {
        if (!isPlainObject(current) || !Object.hasOwn(current, segment)) {
            return { found: false, reason: 'unknown' };
        }
        current = current[segment];
    }

    if (current === null || typeof current === 'object') {
        return { found: false, reason: 'not-scalar' };
    }
    return { found: true, value: String(current) };
}

function metadataContext(metadata: ManifestMetadata): StructureMap {
    const result: StructureMap = {};
    for (const [key, value] of Object.entries(metadata)) {
        if (value !== undefined) result[key] = value;
    }
    return result;
}

// ============================================================================
// SUBSTITUTION
// ============================================================================

class Substituter {
    private readonly reported = new Set<string>();

    constructor(
        private readonly context: StructureMap,
        private readonly onWarning?: WarningCallback,
    ) {}

    text(value: string): string {
        if (!value.includes('{{')) return value;

        return value.replace(PLACEHOLDER_PATTERN, (placeholder, name: string) => {
            const result = lookup(this.context, name);
            if (result.found) return result.value;

            this.warn(
                result.reason === 'unknown'
                    ? `Unresolved template variable '${name}'`
                    : `Template variable '${name}' is not a scalar value`,
            );
            return placeholder;
        });
    }

    value(value: StructureValue): StructureValue {
        if (typeof value === 'string') return this.text(value);
        if (Array.isArray(value)) return value.map((item) => this.value(item));
        if (isPlainObject(value)) return this.mapping(value);
        return value;
    }

    mapping(value: StructureMap): StructureMap {
        const result: StructureMap = {};
        for (const [key, entry] of Object.entries(value)) {
            result[key] = this.value(entry);
        }
        return result;
    }

    private warn(message: string): void {
        if (this.reported.has(message)) return;
        this.reported.add(message);
        this.onWarning?.(message);
    }
}

function substituteMetadata(
    metadata: ManifestMetadata,
    substituter: Substituter,
): ManifestMetadata {
    const result: ManifestMetadata = {};
    for (const [key, value] of Object.entries(metadata)) {
        result[key] = typeof value === 'string' ? substituter.text(value) : value;
    }
    return result;
}

function substituteStyles(styles: StyleMap, substituter: Substituter): StyleMap {
    const result: StyleMap = {};
    for (const [name, css] of Object.entries(styles)) {
        result[name] = substituter.text(css);
    }
    return result;
}

function substituteImports(
    imports: ManifestImports,
    substituter: Substituter,
): ManifestImports {
    const result: ManifestImports = {};
    for (const [key, value] of Object.entries(imports)) {
        if (value === undefined) continue;
        result[key] =
            typeof value === 'string'
                ? substituter.text(value)
                : value.map((item) => substituter.text(item));
    }
    return result;
}

/**
 * Substitutes template variables throughout a manifest.
 *
 * Names are looked up in `variables`, then in the manifest's
 * `template_vars`; `metadata.<key>` reads the manifest's own metadata.
 * Unknown names and non-scalar values leave the placeholder untouched and
 * are reported once each through `onWarning`.
 *
 * @param manifest - The resolved manifest
 * @param variables - Caller-supplied values, taking precedence
 * @param onWarning - Receives unresolved-placeholder messages
 * @returns A new manifest; the input is returned as a copy when there is
 *   nothing to substitute with
 */
export function substituteVariables(
    manifest: Manifest,
    variables: TemplateVariables = {},
    onWarning?: WarningCallback,
): Manifest {
    const templateVars = manifest.template_vars ?? {};
    if (
        Object.keys(variables).length === 0 &&
        Object.keys(templateVars).length === 0
    ) {
        return cloneManifest(manifest);
    }

    const context: StructureMap = {
        ...templateVars,
        ...variables,
        metadata: metadataContext(manifest.metadata),
    };
    const substituter = new Substituter(context, onWarning);

    const result: Manifest = {
        ...cloneManifest(manifest),
        metadata: substituteMetadata(manifest.metadata, substituter),
        styles: substituteStyles(manifest.styles, substituter),
        imports: substituteImports(manifest.imports, substituter),
    };

    if (manifest.structure !== undefined) {
        result.structure = substituter.value(manifest.structure);
    }
    if (manifest.interactions) {
        result.interactions = substituter.mapping(manifest.interactions);
    }

    return result;
}
