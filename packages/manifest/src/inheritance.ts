/**
 * Inheritance Resolver
 *
 * Resolves `metadata.extends` chains into one effective manifest. Ancestors
 * are fetched through an injected loader, resolved first, and then merged
 * with the child: shallow section merges with the child winning, plus slot
 * substitution in the ancestor's structure.
 */

import type {
    Manifest,
    ManifestMetadata,
    StructureMap,
    StructureValue,
} from '@pageforge/types';
import { isPlainObject } from '@pageforge/utils';
import { TemplateError, ValidationError } from './errors.js';
import { cloneManifest, normalizeManifest } from './normalize.js';

/**
 * Loads the raw (or already normalized) document an `extends` reference
 * points at. May be synchronous or asynchronous.
 *
 * @param reference - The `extends` value
 * @param fromReference - Reference of the manifest that contains it
 */
export type AncestorLoader = (
    reference: string,
    fromReference?: string,
) => unknown;

/**
 * Turns an `extends` value into a canonical reference (e.g. an absolute
 * path), relative to the manifest that contains it.
 */
export type ReferenceResolver = (
    reference: string,
    fromReference?: string,
) => string;

export interface ResolveOptions {
    /** Reference of the manifest being resolved, used for relative lookups */
    reference?: string;
    /** Maximum number of ancestors (default: 32) */
    maxDepth?: number;
    /** Canonicalizes references before cycle checks and loading */
    resolveReference?: ReferenceResolver;
    /** Receives child structure keys that could not be placed */
    onWarning?: (message: string) => void;
}

interface ChainState {
    loader: AncestorLoader;
    resolveReference: ReferenceResolver;
    maxDepth: number;
    onWarning?: (message: string) => void;
}

export const DEFAULT_MAX_INHERITANCE_DEPTH = 32;

/** Marks a child structure that replaces the ancestor's wholesale */
export const OVERRIDE_MARKER = '_override';

// ============================================================================
// STRUCTURE MERGING
// ============================================================================

function fillSlots(
    value: StructureValue,
    fills: StructureMap,
    used: Set<string>,
): StructureValue {
    if (Array.isArray(value)) {
        return value.map((item) => fillSlots(item, fills, used));
    }
    if (!isPlainObject(value)) return value;

    const slot = value.slot;
    if (typeof slot === 'string' && Object.hasOwn(fills, slot)) {
        used.add(slot);
        return structuredClone(fills[slot]);
    }

    const result: StructureMap = {};
    for (const [key, child] of Object.entries(value)) {
        result[key] = fillSlots(child, fills, used);
    }
    return result;
}

/**
 * Replaces every ancestor node whose `slot` names a key of `fills` with a
 * deep copy of that value. Nodes naming unknown slots are left in place and
 * every other value, scalars included, is kept as it is.
 */
export function substituteSlots(
    structure: StructureValue,
    fills: StructureMap,
): StructureValue {
    const used = new Set<string>();
    const result = fillSlots(structure, fills, used);
    return used.size > 0 ? result : structure;
}

function mergeStructure(
    ancestor: StructureValue | undefined,
    child: StructureValue | undefined,
    onWarning?: (message: string) => void,
): StructureValue | undefined {
    if (child === undefined) return ancestor;
    if (!isPlainObject(child)) {
        // Only a mapping can fill slots; anything else replaces the layout
        return child;
    }

    if (child[OVERRIDE_MARKER] === true) {
        const replacement: StructureMap = {};
        for (const [key, value] of Object.entries(child)) {
            if (key !== OVERRIDE_MARKER) replacement[key] = value;
        }
        return replacement;
    }

    if (ancestor === undefined) return child;

    const used = new Set<string>();
    const merged = fillSlots(ancestor, child, used);

    // Keys that fill no slot are appended after the ancestor's own nodes
    for (const [key, value] of Object.entries(child)) {
        if (used.has(key)) continue;
        if (isPlainObject(merged) && !Object.hasOwn(merged, key)) {
            merged[key] = value;
        } else {
            onWarning?.(
                `Structure key '${key}' fills no template slot and was dropped`,
            );
        }
    }
    return merged;
}

function withoutExtends(metadata: ManifestMetadata): ManifestMetadata {
    const result: ManifestMetadata = {};
    for (const [key, value] of Object.entries(metadata)) {
        if (key !== 'extends') result[key] = value;
    }
    return result;
}

function mergeOptional<T>(
    ancestor: Record<string, T> | undefined,
    child: Record<string, T> | undefined,
): Record<string, T> | undefined {
    if (ancestor === undefined && child === undefined) return undefined;
    return { ...ancestor, ...child };
}

/**
 * Merges a child into its already-resolved ancestor.
 *
 * Sections are shallow-merged with the child's keys winning; the structure
 * goes through slot substitution unless the child overrides it. Child
 * structure keys that fill no slot are appended to a mapping ancestor when
 * the key is free, and reported through `onWarning` otherwise.
 */
export function mergeManifests(
    ancestor: Manifest,
    child: Manifest,
    onWarning?: (message: string) => void,
): Manifest {
    const base = cloneManifest(ancestor);
    const own = cloneManifest(child);

    const merged: Manifest = {
        metadata: withoutExtends({ ...base.metadata, ...own.metadata }),
        styles: { ...base.styles, ...own.styles },
        imports: { ...base.imports, ...own.imports },
    };

    const structure = mergeStructure(base.structure, own.structure, onWarning);
    if (structure !== undefined) merged.structure = structure;

    const interactions = mergeOptional(base.interactions, own.interactions);
    if (interactions) merged.interactions = interactions;

    const slots = mergeOptional(base.template_slots, own.template_slots);
    if (slots) merged.template_slots = slots;

    const vars = mergeOptional(base.template_vars, own.template_vars);
    if (vars) merged.template_vars = vars;

    return merged;
}

// ============================================================================
// RESOLUTION
// ============================================================================

async function loadAncestor(
    loader: AncestorLoader,
    reference: string,
    fromReference: string | undefined,
): Promise<Manifest> {
    let raw: unknown;
    try {
        raw = await loader(reference, fromReference);
    } catch (error) {
        throw new TemplateError(
            `Failed to load parent template '${reference}'`,
            reference,
            error,
        );
    }

    try {
        return normalizeManifest(raw);
    } catch (error) {
        if (error instanceof ValidationError) {
            throw new TemplateError(
                `Parent template '${reference}' is not a valid manifest: ${error.errors.join('; ')}`,
                reference,
                error,
            );
        }
        throw error;
    }
}

async function resolveChain(
    manifest: Manifest,
    reference: string | undefined,
    chain: readonly string[],
    depth: number,
    state: ChainState,
): Promise<Manifest> {
    const { extends: extendsValue } = manifest.metadata;
    if (typeof extendsValue !== 'string' || extendsValue.trim() === '') {
        return cloneManifest(manifest);
    }

    const parentRef = state.resolveReference(extendsValue.trim(), reference);
    const { maxDepth } = state;

    if (chain.includes(parentRef)) {
        throw new TemplateError(
            `Cyclic template inheritance: ${[...chain, parentRef].join(' -> ')}`,
            parentRef,
        );
    }

    if (depth >= maxDepth) {
        throw new TemplateError(
            `Template inheritance chain exceeds ${maxDepth} levels at '${parentRef}'`,
            parentRef,
        );
    }

    const ancestor = await loadAncestor(state.loader, parentRef, reference);
    const resolvedAncestor = await resolveChain(
        ancestor,
        parentRef,
        [...chain, parentRef],
        depth + 1,
        state,
    );

    return mergeManifests(resolvedAncestor, manifest, state.onWarning);
}

/**
 * Resolves the `extends` chain of a manifest.
 *
 * Returns a copy when the manifest extends nothing. Ancestors are resolved
 * before they are merged, so multi-level chains work.
 *
 * @param manifest - The (normalized) child manifest
 * @param loader - Fetches ancestors; never called for a manifest without `extends`
 * @param options - Reference of `manifest` and the chain limit
 * @throws TemplateError on a cycle, an overlong chain or a loader failure
 */
export async function resolveInheritance(
    manifest: Manifest,
    loader: AncestorLoader,
    options: ResolveOptions = {},
): Promise<Manifest> {
    const {
        reference,
        maxDepth = DEFAULT_MAX_INHERITANCE_DEPTH,
        resolveReference = (ref) => ref,
        onWarning,
    } = options;
    return resolveChain(
        manifest,
        reference,
        reference === undefined ? [] : [reference],
        0,
        { loader, resolveReference, maxDepth, onWarning },
    );
}
