/**
 * Element vocabulary shared by the walker, the validator and the
 * element-tree adapter.
 */

import data from './data/html-elements.json' with { type: 'json' };

const ELEMENT_NAMES: ReadonlySet<string> = new Set(data.elements);
const VOID_ELEMENT_NAMES: ReadonlySet<string> = new Set(data.voidElements);

/**
 * Keys that carry content or attributes rather than naming an element.
 * They are processed before `children` and never count as element names.
 */
export const RESERVED_KEYS = [
    'text',
    'style',
    'class',
    'id',
    'href',
    'src',
    'alt',
    'title',
] as const;

/** Keys that steer processing and are never rendered. */
export const CONTROL_KEYS = ['tag', 'slot', '_override'] as const;

const RESERVED_KEY_SET: ReadonlySet<string> = new Set<string>([
    ...RESERVED_KEYS,
    ...CONTROL_KEYS,
    'children',
    'content',
]);

/**
 * Whether `name` is a body element pageforge recognizes.
 */
export function isKnownElement(name: string): boolean {
    return ELEMENT_NAMES.has(name.toLowerCase());
}

/**
 * Whether `name` is a void element, rendered without children.
 */
export function isVoidElement(name: string): boolean {
    return VOID_ELEMENT_NAMES.has(name.toLowerCase());
}

/**
 * Whether `key` is a content, attribute or control key of a structure
 * mapping.
 */
export function isReservedKey(key: string): boolean {
    return RESERVED_KEY_SET.has(key);
}
