/**
 * HTML converter
 *
 * Generates a standalone HTML document: doctype, head with meta tags,
 * stylesheet and font links and one inline style sheet, the element tree as
 * the body, and scripts before `</body>`.
 */

import type {
    HtmlConverterOptions,
    HtmlDoctype,
    ManifestImports,
    ManifestMetadata,
} from '@pageforge/types';
import { renderStyleSheet } from '@pageforge/manifest';
import { escapeHtml, slugify } from '@pageforge/utils';
import { BaseConverter, type RenderContext } from './base-converter.js';
import { indentBlock, INDENT, renderMarkup } from './markup.js';

const DOCTYPES: Record<HtmlDoctype, string> = {
    html5: '<!DOCTYPE html>',
    html4: '<!DOCTYPE HTML PUBLIC "-//W3C//DTD HTML 4.01 Transitional//EN" "http://www.w3.org/TR/html4/loose.dtd">',
    xhtml: '<!DOCTYPE html PUBLIC "-//W3C//DTD XHTML 1.0 Transitional//EN" "http://www.w3.org/TR/xhtml1/DTD/xhtml1-transitional.dtd">',
};

const FONT_PRECONNECTS = [
    '<link rel="preconnect" href="https://fonts.googleapis.com">',
    '<link rel="preconnect" href="https://fonts.gstatic.com" crossorigin>',
];

/**
 * The pieces of an HTML document, in output order. The PHP converter
 * re-emits the same pieces as PHP statements.
 */
export interface HtmlDocumentParts {
    doctype: string;
    /** The `<html ...>` opening tag */
    htmlOpen: string;
    /** Charset, viewport and descriptive meta tags, unindented */
    meta: string[];
    /** Stylesheet and font links, unindented */
    links: string[];
    /** One rule per entry */
    styleRules: string[];
    /** Body markup, indented one level */
    body: string[];
    /** Script elements, indented one level */
    scripts: string[];
}

function metaTags(
    metadata: ManifestMetadata,
    options: HtmlConverterOptions,
): string[] {
    const doctype = options.doctype ?? 'html5';
    const tags = [
        doctype === 'html5'
            ? '<meta charset="UTF-8">'
            : '<meta http-equiv="Content-Type" content="text/html; charset=UTF-8">',
    ];

    if (options.responsiveDesign ?? true) {
        tags.push(
            '<meta name="viewport" content="width=device-width, initial-scale=1.0">',
        );
    }

    if (options.includeMetaTags ?? true) {
        for (const name of ['description', 'author', 'keywords'] as const) {
            const value = metadata[name];
            if (value) {
                tags.push(`<meta name="${name}" content="${escapeHtml(value)}">`);
            }
        }
        if (metadata.title) {
            tags.push(
                `<meta property="og:title" content="${escapeHtml(metadata.title)}">`,
            );
        }
        if (metadata.description) {
            tags.push(
                `<meta property="og:description" content="${escapeHtml(metadata.description)}">`,
            );
        }
        tags.push('<meta property="og:type" content="website">');
    }

    return tags;
}

function linkTags(imports: ManifestImports): string[] {
    const links = (imports.styles ?? []).map(
        (href) => `<link rel="stylesheet" href="${escapeHtml(href)}">`,
    );
    const fonts = imports.fonts ?? [];
    if (fonts.length > 0) {
        links.push(...FONT_PRECONNECTS);
        for (const href of fonts) {
            links.push(`<link rel="stylesheet" href="${escapeHtml(href)}">`);
        }
    }
    return links;
}

function scriptTags(imports: ManifestImports): string[] {
    const scripts = (imports.scripts ?? []).map(
        (src) => `${INDENT}<script src="${escapeHtml(src)}"></script>`,
    );
    const inline = imports.inline_scripts?.trim();
    if (inline) {
        scripts.push(
            `${INDENT}<script>`,
            ...indentBlock(inline, INDENT.repeat(2)),
            `${INDENT}</script>`,
        );
    }
    return scripts;
}

/**
 * Computes the parts of the HTML document for a manifest.
 */
export function htmlDocumentParts(
    context: RenderContext<HtmlConverterOptions>,
): HtmlDocumentParts {
    const { options, metadata, styles, imports, tree } = context;
    const doctype = options.doctype ?? 'html5';
    const lang = escapeHtml(metadata.language ?? 'en');

    return {
        doctype: DOCTYPES[doctype],
        htmlOpen:
            doctype === 'xhtml'
                ? `<html xmlns="http://www.w3.org/1999/xhtml" lang="${lang}" xml:lang="${lang}">`
                : `<html lang="${lang}">`,
        meta: metaTags(metadata, options),
        links: linkTags(imports),
        styleRules: renderStyleSheet(styles),
        body: renderMarkup(tree, styles, 1, {
            voidEnding: doctype === 'xhtml' ? ' />' : '>',
        }),
        scripts: scriptTags(imports),
    };
}

/**
 * Removes whitespace between tags and comments other than conditional ones.
 */
export function minifyHtml(html: string): string {
    return html.replace(/<!--(?!\[if)[\s\S]*?-->/g, '').replace(/>\s+</g, '><');
}

export class HtmlConverter extends BaseConverter<HtmlConverterOptions> {
    readonly format = 'html';

    constructor(defaults: HtmlConverterOptions = {}) {
        super(defaults);
    }

    protected renderDocument(
        context: RenderContext<HtmlConverterOptions>,
    ): string {
        const parts = htmlDocumentParts(context);
        const head = [
            '<head>',
            ...parts.meta.map((tag) => INDENT + tag),
            `${INDENT}<title>${escapeHtml(context.title)}</title>`,
            ...parts.links.map((tag) => INDENT + tag),
        ];
        if (parts.styleRules.length > 0) {
            head.push(
                `${INDENT}<style>`,
                ...parts.styleRules.map((rule) => INDENT.repeat(2) + rule),
                `${INDENT}</style>`,
            );
        }
        head.push('</head>');

        return [
            parts.doctype,
            parts.htmlOpen,
            ...head,
            '<body>',
            ...parts.body,
            ...parts.scripts,
            '</body>',
            '</html>',
            '',
        ].join('\n');
    }

    protected formatHeader(lines: string[]): string {
        const body = lines
            .map((line) => INDENT + line.replace(/--/g, '- -'))
            .join('\n');
        return `<!--\n${body}\n-->`;
    }

    protected defaultFilename(
        context: RenderContext<HtmlConverterOptions>,
    ): string {
        return `${slugify(context.metadata.title ?? '') || 'index'}.html`;
    }

    protected optimize(content: string, minify: boolean): string {
        const optimized = super.optimize(content, minify);
        return minify ? minifyHtml(optimized) : optimized;
    }
}
