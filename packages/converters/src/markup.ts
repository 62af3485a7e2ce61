/**
 * Markup helpers shared by the HTML-family renderers.
 */

import type {
    ElementAttribute,
    ElementNode,
    ElementTreeNode,
    StyleMap,
} from '@pageforge/types';
import { isVoidElement, resolveReference } from '@pageforge/manifest';
import { escapeHtml } from '@pageforge/utils';

export const INDENT = '  ';

/**
 * Returns the node's attributes with its style reference applied: a named
 * style adds a class (or an id), anything else becomes a `style` attribute.
 * A class from a style is appended to an explicit `class`.
 */
export function resolveAttributes(
    node: ElementTreeNode,
    styles: StyleMap,
): ElementAttribute[] {
    const attributes = node.attributes.map((attribute) => ({ ...attribute }));
    if (node.styleRef === undefined) return attributes;

    const reference = resolveReference(node.styleRef, styles);
    switch (reference.kind) {
        case 'class': {
            const existing = attributes.find((a) => a.name === 'class');
            if (existing && typeof existing.value === 'string') {
                existing.value = `${existing.value} ${reference.className}`;
            } else if (existing) {
                existing.value = reference.className;
            } else {
                attributes.push({ name: 'class', value: reference.className });
            }
            break;
        }
        case 'id':
            if (!attributes.some((a) => a.name === 'id')) {
                attributes.push({ name: 'id', value: reference.id });
            }
            break;
        case 'inline':
            attributes.push({ name: 'style', value: reference.style });
            break;
    }
    return attributes;
}

/**
 * Whether an element renders on one line: no children, or a single text
 * child without line breaks.
 */
export function isInline(node: ElementTreeNode): boolean {
    if (node.children.length === 0) return true;
    if (node.children.length > 1) return false;
    const [child] = node.children;
    return child.kind === 'text' && !child.value.includes('\n');
}

// ============================================================================
// HTML MARKUP
// ============================================================================

export interface MarkupOptions {
    /** Escapes text content (default: HTML entity escaping) */
    escapeText?: (text: string) => string;
    /** Ending of void elements: `>` for HTML, ` />` for XHTML */
    voidEnding?: string;
    /** Called for each attribute before it is written; may throw */
    checkAttribute?: (attribute: ElementAttribute, node: ElementTreeNode) => void;
}

function htmlAttributes(attributes: ElementAttribute[]): string {
    return attributes
        .map(({ name, value }) =>
            value === true ? ` ${name}` : ` ${name}="${escapeHtml(value)}"`,
        )
        .join('');
}

function renderHtmlNode(
    node: ElementNode,
    styles: StyleMap,
    level: number,
    options: Required<MarkupOptions>,
): string[] {
    const pad = INDENT.repeat(level);
    if (node.kind === 'text') {
        return node.value
            .split('\n')
            .map((line) => (line === '' ? '' : pad + options.escapeText(line)));
    }

    const attributes = resolveAttributes(node, styles);
    attributes.forEach((attribute) => options.checkAttribute(attribute, node));
    const open = `<${node.tag}${htmlAttributes(attributes)}`;
    if (isVoidElement(node.tag)) {
        return [`${pad}${open}${options.voidEnding}`];
    }

    const close = `</${node.tag}>`;
    if (isInline(node)) {
        const [child] = node.children;
        const text = child?.kind === 'text' ? options.escapeText(child.value) : '';
        return [`${pad}${open}>${text}${close}`];
    }

    return [
        `${pad}${open}>`,
        ...node.children.flatMap((child) =>
            renderHtmlNode(child, styles, level + 1, options),
        ),
        `${pad}${close}`,
    ];
}

/**
 * Renders element nodes as indented HTML lines (two spaces per level).
 *
 * @param nodes - Top-level nodes
 * @param styles - Named styles, for resolving style references
 * @param level - Indentation level of the top-level nodes
 */
export function renderMarkup(
    nodes: readonly ElementNode[],
    styles: StyleMap,
    level: number,
    options: MarkupOptions = {},
): string[] {
    const resolved: Required<MarkupOptions> = {
        escapeText: options.escapeText ?? escapeHtml,
        voidEnding: options.voidEnding ?? '>',
        checkAttribute: options.checkAttribute ?? (() => {}),
    };
    return nodes.flatMap((node) => renderHtmlNode(node, styles, level, resolved));
}

/**
 * Indents every non-empty line of a block of text.
 */
export function indentBlock(text: string, pad: string): string[] {
    return text.split('\n').map((line) => (line.trim() === '' ? '' : pad + line));
}
