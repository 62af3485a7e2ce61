/**
 * Vue converter
 *
 * Generates a single-file component: the element tree as the template, an
 * options-API script holding the title, and a scoped style block.
 */

import type {
    ElementAttribute,
    ElementTreeNode,
    VueConverterOptions,
} from '@pageforge/types';
import { renderStyleSheet, StructureError } from '@pageforge/manifest';
import { escapeHtml } from '@pageforge/utils';
import { BaseConverter, type RenderContext } from './base-converter.js';
import { INDENT, renderMarkup } from './markup.js';
import { scriptLoader } from './script-loader.js';

/**
 * Escapes template text so that `{{` is never read as interpolation.
 */
export function escapeVueText(text: string): string {
    return escapeHtml(text).replace(/\{\{/g, '&#123;&#123;');
}

/**
 * Rejects attribute names the template compiler would read as a directive
 * (`v-html`, `:href`, `@click`, `#default`).
 */
export function checkVueAttribute(
    { name }: ElementAttribute,
    node: ElementTreeNode,
): void {
    if (/^(v-|[:@#])/i.test(name)) {
        throw new StructureError(
            `Attribute '${name}' would be read as a Vue directive`,
            node.path,
        );
    }
}

export class VueConverter extends BaseConverter<VueConverterOptions> {
    readonly format = 'vue';

    constructor(defaults: VueConverterOptions = {}) {
        super(defaults);
    }

    protected renderDocument(
        context: RenderContext<VueConverterOptions>,
    ): string {
        const { styles, imports, tree, componentName } = context;
        const loader = scriptLoader(imports, 'this');

        const lines = [
            '<template>',
            ...renderMarkup(tree, styles, 1, {
                escapeText: escapeVueText,
                checkAttribute: checkVueAttribute,
            }),
            '</template>',
            '',
            '<script>',
            'export default {',
            `${INDENT}name: '${componentName}',`,
            `${INDENT}data() {`,
            `${INDENT.repeat(2)}return {`,
            `${INDENT.repeat(3)}title: ${JSON.stringify(context.title)},`,
            `${INDENT.repeat(2)}};`,
            `${INDENT}},`,
            `${INDENT}mounted() {`,
            `${INDENT.repeat(2)}document.title = this.title;`,
            ...loader.setup.map((line) => INDENT.repeat(2) + line),
            `${INDENT}},`,
        ];
        if (loader.cleanup.length > 0) {
            lines.push(
                `${INDENT}beforeUnmount() {`,
                ...loader.cleanup.map((line) => INDENT.repeat(2) + line),
                `${INDENT}},`,
            );
        }
        lines.push('};', '</script>');

        const stylesheets = [...(imports.styles ?? []), ...(imports.fonts ?? [])];
        const rules = renderStyleSheet(styles);
        if (stylesheets.length > 0 || rules.length > 0) {
            lines.push(
                '',
                '<style scoped>',
                ...stylesheets.map(
                    (href) => `@import url(${JSON.stringify(href)});`,
                ),
                ...rules,
                '</style>',
            );
        }

        lines.push('');
        return lines.join('\n');
    }

    protected formatHeader(lines: string[]): string {
        const body = lines
            .map((line) => INDENT + line.replace(/--/g, '- -'))
            .join('\n');
        return `<!--\n${body}\n-->`;
    }

    protected defaultFilename(
        context: RenderContext<VueConverterOptions>,
    ): string {
        return `${context.componentName}.vue`;
    }
}
