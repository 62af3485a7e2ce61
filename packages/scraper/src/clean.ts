/**
 * Post-processing for scraped manifests.
 */

import type { Manifest, StructureValue, StyleMap } from '@pageforge/types';
import { isPlainObject } from '@pageforge/utils';

/**
 * A manifest with empty sections left out.
 */
export type CleanedManifest = Partial<Manifest>;

/**
 * Canonical form of a declaration string for duplicate detection:
 * trimmed declarations, sorted, joined with `; `.
 */
export function normalizeCssForComparison(css: string): string {
    return css
        .split(';')
        .map((declaration) => declaration.trim())
        .filter(Boolean)
        .sort()
        .join('; ');
}

/**
 * Keeps the first style of every group with the same declarations.
 */
export function dedupeStyles(styles: StyleMap): StyleMap {
    const seen = new Set<string>();
    const result: StyleMap = {};
    for (const [name, css] of Object.entries(styles)) {
        const key = normalizeCssForComparison(css);
        if (seen.has(key)) continue;
        seen.add(key);
        result[name] = css;
    }
    return result;
}

function isEmpty(value: StructureValue | undefined): boolean {
    if (value === null || value === undefined || value === '') return true;
    if (Array.isArray(value)) return value.length === 0;
    if (isPlainObject(value)) return Object.keys(value).length === 0;
    return false;
}

/**
 * Drops null, empty-string, empty-list and empty-mapping values at every
 * depth. Values emptied by the pruning are dropped too.
 */
export function pruneStructure(value: StructureValue): StructureValue {
    if (Array.isArray(value)) {
        return value.map(pruneStructure).filter((item) => !isEmpty(item));
    }
    if (isPlainObject(value)) {
        const result: Record<string, StructureValue> = {};
        for (const [key, child] of Object.entries(value)) {
            const pruned = pruneStructure(child);
            if (!isEmpty(pruned)) {
                result[key] = pruned;
            }
        }
        return result;
    }
    return value;
}

/**
 * Tidies a scraped manifest for saving.
 */
export function cleanManifest(manifest: Manifest): CleanedManifest {
    const cleaned: CleanedManifest = {};

    if (Object.keys(manifest.metadata).length > 0) {
        cleaned.metadata = manifest.metadata;
    }

    const styles = dedupeStyles(manifest.styles);
    if (Object.keys(styles).length > 0) {
        cleaned.styles = styles;
    }

    if (Object.keys(manifest.imports).length > 0) {
        cleaned.imports = manifest.imports;
    }

    if (manifest.structure !== undefined) {
        const structure = pruneStructure(manifest.structure);
        if (!isEmpty(structure)) {
            cleaned.structure = structure;
        }
    }

    return cleaned;
}
