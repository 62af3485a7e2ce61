/**
 * React converter
 *
 * Generates a function component that renders the element tree as JSX,
 * sets the document title and loads scripts in an effect.
 */

import type {
    ElementAttribute,
    ElementNode,
    ReactConverterOptions,
    StyleMap,
} from '@pageforge/types';
import {
    isVoidElement,
    parseInlineStyle,
    renderStyleSheet,
} from '@pageforge/manifest';
import { BaseConverter, type RenderContext } from './base-converter.js';
import { INDENT, isInline, resolveAttributes } from './markup.js';
import { scriptLoader } from './script-loader.js';

/** HTML attribute names that differ in JSX */
const JSX_ATTRIBUTE_NAMES: Record<string, string> = {
    class: 'className',
    for: 'htmlFor',
    tabindex: 'tabIndex',
    readonly: 'readOnly',
    maxlength: 'maxLength',
    minlength: 'minLength',
    colspan: 'colSpan',
    rowspan: 'rowSpan',
    crossorigin: 'crossOrigin',
    autocomplete: 'autoComplete',
    autofocus: 'autoFocus',
    contenteditable: 'contentEditable',
    enctype: 'encType',
    srcset: 'srcSet',
    novalidate: 'noValidate',
    frameborder: 'frameBorder',
    allowfullscreen: 'allowFullScreen',
    usemap: 'useMap',
    datetime: 'dateTime',
    accesskey: 'accessKey',
    spellcheck: 'spellCheck',
    'accept-charset': 'acceptCharset',
    'http-equiv': 'httpEquiv',
};

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/** Top-level names the generated module declares itself */
const MODULE_NAMES: ReadonlySet<string> = new Set(['React', 'useEffect', 'css']);

// ============================================================================
// JSX
// ============================================================================

/**
 * Converts a CSS property to its React style-object key.
 *
 * @example
 * styleKey('background-color')   // 'backgroundColor'
 * styleKey('-webkit-transition') // 'WebkitTransition'
 * styleKey('--accent')           // '"--accent"'
 */
export function styleKey(property: string): string {
    if (property.startsWith('--')) return JSON.stringify(property);
    const key = property
        .toLowerCase()
        .replace(/^-ms-/, 'ms-')
        .replace(/-([a-z])/g, (_match, letter: string) => letter.toUpperCase());
    return IDENTIFIER.test(key) ? key : JSON.stringify(key);
}

/**
 * Renders an inline style as a JSX style object expression.
 */
export function styleObject(css: string): string | undefined {
    const entries = parseInlineStyle(css).map(
        ([property, value]) => `${styleKey(property)}: ${JSON.stringify(value)}`,
    );
    return entries.length > 0 ? `{{ ${entries.join(', ')} }}` : undefined;
}

function jsxAttribute({ name, value }: ElementAttribute): string | undefined {
    const jsxName = JSX_ATTRIBUTE_NAMES[name.toLowerCase()] ?? name;
    if (value === true) return jsxName;
    if (name === 'style') {
        const object = styleObject(value);
        return object === undefined ? undefined : `style=${object}`;
    }
    return /["&\n]/.test(value)
        ? `${jsxName}={${JSON.stringify(value)}}`
        : `${jsxName}="${value}"`;
}

/**
 * Renders text as JSX children; text containing JSX specials or
 * significant whitespace becomes a string expression.
 */
export function jsxText(value: string): string {
    const plain = !/[{}<>&\n]/.test(value) && value === value.trim();
    return plain ? value : `{${JSON.stringify(value)}}`;
}

function renderJsxNode(
    node: ElementNode,
    styles: StyleMap,
    level: number,
): string[] {
    const pad = INDENT.repeat(level);
    if (node.kind === 'text') {
        return [pad + jsxText(node.value)];
    }

    const attributes = resolveAttributes(node, styles)
        .map(jsxAttribute)
        .filter((attribute): attribute is string => attribute !== undefined)
        .map((attribute) => ` ${attribute}`)
        .join('');
    const open = `<${node.tag}${attributes}`;

    if (isVoidElement(node.tag)) {
        return [`${pad}${open} />`];
    }

    const close = `</${node.tag}>`;
    if (isInline(node)) {
        const [child] = node.children;
        const text = child?.kind === 'text' ? jsxText(child.value) : '';
        return [`${pad}${open}>${text}${close}`];
    }

    return [
        `${pad}${open}>`,
        ...node.children.flatMap((child) =>
            renderJsxNode(child, styles, level + 1),
        ),
        `${pad}${close}`,
    ];
}

/**
 * Escapes text for a JavaScript template literal.
 */
function templateLiteral(text: string): string {
    return text
        .replace(/\\/g, '\\\\')
        .replace(/`/g, '\\`')
        .replace(/\$\{/g, '\\${');
}

// ============================================================================
// CONVERTER
// ============================================================================

export class ReactConverter extends BaseConverter<ReactConverterOptions> {
    readonly format = 'react';

    constructor(defaults: ReactConverterOptions = {}) {
        super(defaults);
    }

    protected isReservedName(name: string): boolean {
        return MODULE_NAMES.has(name);
    }

    protected renderDocument(
        context: RenderContext<ReactConverterOptions>,
    ): string {
        const { styles, imports, tree, componentName, options } = context;
        const rules = renderStyleSheet(styles);
        const loader = scriptLoader(imports);
        const returnType = options.typescript ? ': React.ReactElement' : '';

        const lines = ["import React, { useEffect } from 'react';", ''];
        if (rules.length > 0) {
            lines.push(
                'const css = `',
                ...rules.map(templateLiteral),
                '`;',
                '',
            );
        }

        lines.push(
            `export default function ${componentName}()${returnType} {`,
            `${INDENT}useEffect(() => {`,
            `${INDENT.repeat(2)}document.title = ${JSON.stringify(context.title)};`,
            ...loader.setup.map((line) => INDENT.repeat(2) + line),
        );
        if (loader.cleanup.length > 0) {
            lines.push(
                `${INDENT.repeat(2)}return () => {`,
                ...loader.cleanup.map((line) => INDENT.repeat(3) + line),
                `${INDENT.repeat(2)}};`,
            );
        }
        lines.push(
            `${INDENT}}, []);`,
            '',
            `${INDENT}return (`,
            `${INDENT.repeat(2)}<>`,
        );

        const head = INDENT.repeat(3);
        const stylesheets = [...(imports.styles ?? []), ...(imports.fonts ?? [])];
        for (const href of stylesheets) {
            lines.push(
                `${head}<link rel="stylesheet" href={${JSON.stringify(href)}} />`,
            );
        }
        if (rules.length > 0) {
            lines.push(`${head}<style>{css}</style>`);
        }

        lines.push(
            ...tree.flatMap((node) => renderJsxNode(node, styles, 3)),
            `${INDENT.repeat(2)}</>`,
            `${INDENT});`,
            '}',
            '',
        );
        return lines.join('\n');
    }

    protected formatHeader(lines: string[]): string {
        const body = lines
            .map((line) => ` * ${line.replace(/\*\//g, '* /')}`)
            .join('\n');
        return `/**\n${body}\n */`;
    }

    protected defaultFilename(
        context: RenderContext<ReactConverterOptions>,
    ): string {
        const extension = context.options.typescript ? 'tsx' : 'jsx';
        return `${context.componentName}.${extension}`;
    }
}
