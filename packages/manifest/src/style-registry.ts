/**
 * Style Registry
 *
 * Normalizes named CSS declaration strings and decides how a `style`
 * attribute value is rendered: as a class or id reference to a named rule,
 * or verbatim as an inline style.
 */

import type { StyleMap, StyleReference } from '@pageforge/types';
import { toKebabCase } from '@pageforge/utils';

export type WarningCallback = (message: string) => void;

/**
 * Splits a declaration string on `;`, dropping empty segments.
 */
function segments(css: string): string[] {
    return css
        .split(';')
        .map((segment) => segment.trim())
        .filter((segment) => segment.length > 0);
}

/**
 * Returns the declaration segments that lack a `prop: value` colon.
 */
export function findInvalidSegments(css: string): string[] {
    return segments(css).filter((segment) => !segment.includes(':'));
}

/**
 * Normalizes one declaration string: trims it, collapses whitespace runs
 * to a single space, and appends `;` when missing.
 *
 * Segments without a colon are reported through `onWarning` and kept.
 *
 * @param css - Declarations, e.g. `color:red;  padding: 4px`
 * @param name - Style name used in warning messages
 * @param onWarning - Receives one message per suspicious segment
 */
export function normalizeDeclarations(
    css: string,
    name = 'inline',
    onWarning?: WarningCallback,
): string {
    const collapsed = css.trim().replace(/\s+/g, ' ');
    if (collapsed.length === 0) return '';

    for (const segment of findInvalidSegments(collapsed)) {
        onWarning?.(
            `Potentially invalid CSS declaration in '${name}': '${segment}'`,
        );
    }

    return collapsed.endsWith(';') ? collapsed : `${collapsed};`;
}

/**
 * Normalizes every entry of a style map. Returns a new map; never throws.
 */
export function normalizeStyles(
    styles: StyleMap,
    onWarning?: WarningCallback,
): StyleMap {
    const result: StyleMap = {};
    for (const [name, css] of Object.entries(styles)) {
        result[name] = normalizeDeclarations(css, name, onWarning);
    }
    return result;
}

/**
 * Formats a style name as a CSS selector: camelCase becomes kebab-case and
 * a `.` is prefixed unless the name already starts with `.` or `#`.
 *
 * @example
 * selectorFor('heroTitle') // '.hero-title'
 * selectorFor('#main')     // '#main'
 */
export function selectorFor(name: string): string {
    if (name.startsWith('.') || name.startsWith('#')) {
        return name;
    }
    return `.${toKebabCase(name)}`;
}

/**
 * Resolves a `style` attribute value against the named styles.
 *
 * A value naming a style yields a class reference (or an id reference for
 * `#` names); anything else is an inline style passed through verbatim.
 */
export function resolveReference(
    value: string,
    styles: StyleMap,
): StyleReference {
    if (!Object.hasOwn(styles, value)) {
        return { kind: 'inline', style: value };
    }

    const selector = selectorFor(value);
    if (selector.startsWith('#')) {
        return { kind: 'id', id: selector.slice(1) };
    }
    return { kind: 'class', className: selector.slice(1) };
}

/**
 * Splits a declaration string into declarations, each ending in `;`.
 */
export function splitDeclarations(css: string): string[] {
    return segments(css).map((segment) => `${segment};`);
}

/**
 * Renders one rule on a single line: `.box { color: red; padding: 4px; }`.
 */
export function renderRule(name: string, css: string): string {
    const declarations = splitDeclarations(css);
    if (declarations.length === 0) {
        return `${selectorFor(name)} { }`;
    }
    return `${selectorFor(name)} { ${declarations.join(' ')} }`;
}

/**
 * Renders the whole style map, one rule per entry.
 */
export function renderStyleSheet(styles: StyleMap): string[] {
    return Object.entries(styles).map(([name, css]) => renderRule(name, css));
}

/**
 * Parses an inline style into `[property, value]` pairs. Segments without
 * a colon are skipped.
 */
export function parseInlineStyle(css: string): Array<[string, string]> {
    const pairs: Array<[string, string]> = [];
    for (const segment of segments(css)) {
        const colon = segment.indexOf(':');
        if (colon <= 0) continue;
        const property = segment.slice(0, colon).trim();
        const value = segment.slice(colon + 1).trim();
        pairs.push([property, value]);
    }
    return pairs;
}
