/**
 * Element-tree adapter
 *
 * Inspects the raw structure once and turns it into tagged
 * {@link ElementNode}s. Renderers only ever see this tree, so the rules for
 * which mapping key names the element live here and nowhere else.
 *
 * Classification of the keys of a structure mapping:
 *
 * - content: `text`, `content`, `children`
 * - `style`: kept as an unresolved style reference
 * - control: `tag`, `slot`, `_override` (never rendered)
 * - element: a recognized element name, or any other key whose value is a
 *   mapping or a sequence
 * - attribute: everything else
 */

import type {
    ElementAttribute,
    ElementNode,
    ElementTreeNode,
    StructureMap,
    StructureValue,
} from '@pageforge/types';
import { isPlainObject } from '@pageforge/utils';
import { StructureError } from './errors.js';
import { CONTROL_KEYS, isKnownElement, isVoidElement } from './html-elements.js';
import { ROOT_PATH } from './walker.js';

const CONTENT_KEYS: ReadonlySet<string> = new Set(['text', 'content']);
const CONTROL_KEY_SET: ReadonlySet<string> = new Set(CONTROL_KEYS);

/** Attributes whose values must be scalar */
const KNOWN_ATTRIBUTES: ReadonlySet<string> = new Set([
    'class',
    'id',
    'href',
    'src',
    'alt',
    'title',
    'name',
    'type',
    'value',
    'placeholder',
    'role',
    'for',
    'target',
    'rel',
]);

const DEFAULT_CONTAINER = 'div';

/** Names every target can write as-is, with at most one namespace prefix */
const ATTRIBUTE_NAME_PATTERN = /^[A-Za-z_][\w-]*(:[A-Za-z_][\w-]*)?$/;

type KeyKind =
    | 'content'
    | 'children'
    | 'style'
    | 'control'
    | 'element'
    | 'attribute';

function isKnownAttribute(key: string): boolean {
    return KNOWN_ATTRIBUTES.has(key) || /^(data|aria)-/.test(key);
}

function classifyKey(key: string, value: StructureValue): KeyKind {
    if (CONTENT_KEYS.has(key)) return 'content';
    if (key === 'children') return 'children';
    if (key === 'style') return 'style';
    if (CONTROL_KEY_SET.has(key)) return 'control';
    if (isKnownAttribute(key)) return 'attribute';
    if (isKnownElement(key)) return 'element';
    if (Array.isArray(value) || isPlainObject(value)) return 'element';
    return 'attribute';
}

/**
 * Resolves an element name: recognized names are lower-cased, anything else
 * becomes a generic container.
 */
export function resolveTagName(name: string): string {
    return isKnownElement(name) ? name.toLowerCase() : DEFAULT_CONTAINER;
}

// ============================================================================
// ELEMENT PARTS
// ============================================================================

/**
 * Attributes, style reference and children gathered for one element,
 * possibly from two mappings (the outer mapping and the element body).
 */
class ElementParts {
    readonly attributes: ElementAttribute[] = [];
    styleRef?: string;
    private readonly text: ElementNode[] = [];
    private readonly content: ElementNode[] = [];

    add(key: string, value: StructureValue, path: string): void {
        switch (classifyKey(key, value)) {
            case 'content': {
                const text = scalarText(key, value, path);
                if (text !== undefined) {
                    this.text.push({ kind: 'text', value: text, path });
                }
                break;
            }
            case 'children':
                this.content.push(...buildNodes(value, path, true));
                break;
            case 'style': {
                const style = scalarText(key, value, path);
                if (style !== undefined && style.trim() !== '') {
                    this.styleRef = style;
                }
                break;
            }
            case 'control':
                break;
            case 'element':
                this.content.push(elementFromKey(key, value, path));
                break;
            case 'attribute':
                this.addAttribute(key, value, path);
                break;
        }
    }

    addAll(node: StructureMap, path: string, skipElements = false): void {
        for (const [key, value] of Object.entries(node)) {
            if (skipElements && classifyKey(key, value) === 'element') continue;
            this.add(key, value, `${path}.${key}`);
        }
    }

    toElement(tag: string, path: string): ElementTreeNode {
        const element: ElementTreeNode = {
            kind: 'element',
            tag,
            attributes: this.attributes,
            children: isVoidElement(tag) ? [] : [...this.text, ...this.content],
            path,
        };
        if (this.styleRef !== undefined) element.styleRef = this.styleRef;
        return element;
    }

    private addAttribute(
        key: string,
        value: StructureValue,
        path: string,
    ): void {
        if (!ATTRIBUTE_NAME_PATTERN.test(key)) {
            throw new StructureError(`Invalid attribute name '${key}'`, path);
        }
        if (value === null || value === false) return;
        if (value === true) {
            this.attributes.push({ name: key, value: true });
            return;
        }
        if (typeof value === 'string' || typeof value === 'number') {
            this.attributes.push({ name: key, value: String(value) });
            return;
        }
        throw new StructureError(
            `Attribute '${key}' must be a string, number or boolean`,
            path,
        );
    }
}

function scalarText(
    key: string,
    value: StructureValue,
    path: string,
): string | undefined {
    if (value === null) return undefined;
    if (
        typeof value === 'string' ||
        typeof value === 'number' ||
        typeof value === 'boolean'
    ) {
        return String(value);
    }
    throw new StructureError(`'${key}' must be a scalar value`, path);
}

// ============================================================================
// BUILDING
// ============================================================================

function elementFromKey(
    key: string,
    body: StructureValue,
    path: string,
    outer?: { node: StructureMap; path: string },
): ElementTreeNode {
    const parts = new ElementParts();
    if (outer) parts.addAll(outer.node, outer.path, true);

    if (isPlainObject(body)) {
        parts.addAll(body, path);
    } else if (Array.isArray(body)) {
        parts.add('children', body, path);
    } else if (body !== null) {
        parts.add('text', body, path);
    }

    return parts.toElement(resolveTagName(key), path);
}

function hasOnlyControlKeys(node: StructureMap): boolean {
    return Object.keys(node).every((key) => CONTROL_KEY_SET.has(key));
}

function buildMapping(node: StructureMap, path: string): ElementNode[] {
    const tag = node.tag;
    if (typeof tag === 'string' && tag.trim() !== '') {
        const parts = new ElementParts();
        parts.addAll(node, path);
        return [parts.toElement(resolveTagName(tag.trim()), path)];
    }

    // An unfilled slot placeholder renders nothing
    if (Object.keys(node).length > 0 && hasOnlyControlKeys(node)) {
        return [];
    }

    const entries = Object.entries(node);
    const elementKeys = entries
        .filter(([key, value]) => classifyKey(key, value) === 'element')
        .map(([key]) => key);
    const ownKeys = entries.filter(
        ([key, value]) =>
            !CONTROL_KEY_SET.has(key) && classifyKey(key, value) !== 'element',
    );

    if (elementKeys.length === 1) {
        const [key] = elementKeys;
        return [
            elementFromKey(key, node[key], `${path}.${key}`, { node, path }),
        ];
    }

    if (elementKeys.length > 1 && ownKeys.length === 0) {
        return elementKeys.map((key) =>
            elementFromKey(key, node[key], `${path}.${key}`),
        );
    }

    const parts = new ElementParts();
    parts.addAll(node, path);
    return [parts.toElement(DEFAULT_CONTAINER, path)];
}

/**
 * Builds nodes from any structure value.
 *
 * @param sequenceIndexes - Whether a single non-sequence value is still
 *   addressed as item 0 (used for `children`)
 */
function buildNodes(
    value: StructureValue,
    path: string,
    sequenceIndexes = false,
): ElementNode[] {
    if (value === null) return [];
    if (Array.isArray(value)) {
        return value.flatMap((item, index) =>
            buildNodes(item, `${path}[${index}]`),
        );
    }
    const itemPath = sequenceIndexes ? `${path}[0]` : path;
    if (isPlainObject(value)) {
        return buildMapping(value, itemPath);
    }
    return [{ kind: 'text', value: String(value), path: itemPath }];
}

/**
 * Converts a resolved raw structure into the tagged element tree.
 *
 * @param structure - The manifest's structure
 * @returns Top-level nodes in source order
 * @throws StructureError when a content, style or known attribute key holds
 *   a sequence or mapping, or when an attribute name is not a plain
 *   (optionally namespaced) identifier
 */
export function buildElementTree(
    structure: StructureValue | undefined,
): ElementNode[] {
    if (structure === undefined) return [];
    return buildNodes(structure, ROOT_PATH);
}

/**
 * Counts element nodes of a built tree.
 */
export function countTreeElements(nodes: readonly ElementNode[]): number {
    let count = 0;
    for (const node of nodes) {
        if (node.kind === 'element') {
            count += 1 + countTreeElements(node.children);
        }
    }
    return count;
}
