/**
 * Structure Walker
 *
 * Depth-first traversal over the raw structure tree. Every consumer of the
 * tree (slot substitution, validation, element counting, variable
 * substitution) goes through {@link walkStructure} so they all see nodes in
 * the same order and report the same paths.
 */

import type { StructureMap, StructureValue } from '@pageforge/types';
import { isPlainObject } from '@pageforge/utils';
import { isKnownElement, RESERVED_KEYS } from './html-elements.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Position of a node in the structure tree.
 */
export interface WalkContext {
    /** 0 at the root, +1 per mapping key descended */
    depth: number;
    /** e.g. `structure.div.children[2]` */
    path: string;
}

/**
 * Called for every mapping node before its contents are walked.
 *
 * Returning a different value replaces the node (and that value is not
 * walked). Returning the node itself, or nothing, continues the traversal.
 */
export type StructureVisitor = (
    node: StructureMap,
    context: WalkContext,
) => StructureValue | void;

/**
 * Summary figures of a structure tree.
 */
export interface StructureAnalysis {
    elementCount: number;
    maxDepth: number;
    /** `elementCount * (maxDepth + 1)` */
    complexityScore: number;
}

export const ROOT_PATH = 'structure';

const RESERVED_ORDER: readonly string[] = RESERVED_KEYS;

// ============================================================================
// TRAVERSAL
// ============================================================================

/**
 * Orders a mapping's keys for processing: reserved keys first, then the
 * remaining keys in source order, then `children`.
 */
function processingOrder(node: StructureMap): string[] {
    const keys = Object.keys(node);
    const reserved = RESERVED_ORDER.filter((key) => keys.includes(key));
    const rest = keys.filter(
        (key) => key !== 'children' && !RESERVED_ORDER.includes(key),
    );
    return keys.includes('children')
        ? [...reserved, ...rest, 'children']
        : [...reserved, ...rest];
}

function walkSequence(
    items: StructureValue[],
    visitor: StructureVisitor,
    context: WalkContext,
): StructureValue[] {
    return items.map((item, index) =>
        walkStructure(item, visitor, {
            depth: context.depth,
            path: `${context.path}[${index}]`,
        }),
    );
}

function walkChildren(
    children: StructureValue,
    visitor: StructureVisitor,
    context: WalkContext,
): StructureValue {
    if (Array.isArray(children)) {
        return walkSequence(children, visitor, context);
    }
    // A single child is visited as item 0 but handed back unwrapped
    return walkStructure(children, visitor, {
        depth: context.depth,
        path: `${context.path}[0]`,
    });
}

function walkMapping(
    node: StructureMap,
    visitor: StructureVisitor,
    context: WalkContext,
): StructureValue {
    const replacement = visitor(node, context);
    if (replacement !== undefined && replacement !== node) {
        return replacement;
    }

    const processed = new Map<string, StructureValue>();
    for (const key of processingOrder(node)) {
        const childContext = {
            depth: context.depth + 1,
            path: `${context.path}.${key}`,
        };
        const value = node[key];
        processed.set(
            key,
            key === 'children'
                ? walkChildren(value, visitor, childContext)
                : walkStructure(value, visitor, childContext),
        );
    }

    const result: StructureMap = {};
    for (const key of Object.keys(node)) {
        result[key] = processed.get(key) ?? null;
    }
    return result;
}

/**
 * Walks `node` depth-first, calling `visitor` on every mapping.
 *
 * Strings and `null` are returned unchanged, numbers and booleans are
 * stringified, sequences and mappings are rebuilt. Never throws on its own;
 * errors raised by the visitor propagate.
 *
 * @param node - Root of the (sub)tree
 * @param visitor - Callback for mapping nodes
 * @param context - Position of `node`; defaults to the structure root
 * @returns The rebuilt tree
 */
export function walkStructure(
    node: StructureValue,
    visitor: StructureVisitor,
    context: WalkContext = { depth: 0, path: ROOT_PATH },
): StructureValue {
    if (node === null || typeof node === 'string') {
        return node;
    }
    if (typeof node === 'number' || typeof node === 'boolean') {
        return String(node);
    }
    if (Array.isArray(node)) {
        return walkSequence(node, visitor, context);
    }
    if (isPlainObject(node)) {
        return walkMapping(node, visitor, context);
    }
    return String(node);
}

// ============================================================================
// ANALYSIS
// ============================================================================

/**
 * Whether a mapping defines an element: it has an explicit `tag` or at
 * least one recognized element-name key.
 */
export function definesElement(node: StructureMap): boolean {
    if (typeof node.tag === 'string') return true;
    return Object.keys(node).some((key) => isKnownElement(key));
}

/**
 * Counts the element-defining mappings of a structure tree.
 */
export function countElements(structure: StructureValue | undefined): number {
    return analyzeStructure(structure).elementCount;
}

/**
 * Computes element count, maximum mapping depth and a complexity score.
 */
export function analyzeStructure(
    structure: StructureValue | undefined,
): StructureAnalysis {
    let elementCount = 0;
    let maxDepth = 0;

    if (structure !== undefined) {
        walkStructure(structure, (node, { depth }) => {
            if (definesElement(node)) elementCount++;
            maxDepth = Math.max(maxDepth, depth);
        });
    }

    return {
        elementCount,
        maxDepth,
        complexityScore: elementCount * (maxDepth + 1),
    };
}
