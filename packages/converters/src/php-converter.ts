/**
 * PHP converter
 *
 * Generates a class whose `render()` method assembles the same document as
 * the HTML converter, one `$html .= '...' . "\n";` statement per line, and
 * echoes it when the file is run directly.
 */

import type { PhpConverterOptions } from '@pageforge/types';
import reserved from './data/php-reserved.json' with { type: 'json' };
import { BaseConverter, type RenderContext } from './base-converter.js';
import { ConversionError } from './errors.js';
import { htmlDocumentParts } from './html-converter.js';
import { INDENT } from './markup.js';

const NAMESPACE_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\\[A-Za-z_][A-Za-z0-9_]*)*$/;
const PHP_OPEN = '<?php\n';

// PHP compares these case-insensitively
const RESERVED_NAMES: ReadonlySet<string> = new Set([
    ...reserved.keywords,
    ...reserved.typeNames,
]);

const MEMBER = '    ';
const STATEMENT = MEMBER.repeat(2);

/**
 * Quotes a value as a single-quoted PHP string literal.
 */
export function phpString(value: string): string {
    return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function appendLine(variable: string, line: string): string {
    return `${STATEMENT}$${variable} .= ${phpString(line)} . "\\n";`;
}

export class PhpConverter extends BaseConverter<PhpConverterOptions> {
    readonly format = 'php';

    constructor(defaults: PhpConverterOptions = {}) {
        super(defaults);
    }

    protected isReservedName(name: string): boolean {
        return RESERVED_NAMES.has(name.toLowerCase());
    }

    protected renderDocument(
        context: RenderContext<PhpConverterOptions>,
    ): string {
        const namespace = context.options.phpNamespace ?? 'Pages';
        if (!NAMESPACE_PATTERN.test(namespace)) {
            throw new ConversionError(
                this.format,
                `Invalid PHP namespace '${namespace}'`,
            );
        }

        const parts = htmlDocumentParts(context);
        const className = context.componentName;
        const styles = parts.styleRules
            .map((rule) => INDENT.repeat(2) + rule)
            .join('\n');

        return [
            '<?php',
            '',
            `namespace ${namespace};`,
            '',
            `class ${className}`,
            '{',
            `${MEMBER}private string $title = ${phpString(context.title)};`,
            '',
            `${MEMBER}private string $styles = ${phpString(styles)};`,
            '',
            `${MEMBER}public function render(): string`,
            `${MEMBER}{`,
            `${STATEMENT}$html = '';`,
            appendLine('html', parts.doctype),
            appendLine('html', parts.htmlOpen),
            `${STATEMENT}$html .= $this->renderHead();`,
            appendLine('html', '<body>'),
            ...parts.body.map((line) => appendLine('html', line)),
            ...parts.scripts.map((line) => appendLine('html', line)),
            appendLine('html', '</body>'),
            appendLine('html', '</html>'),
            '',
            `${STATEMENT}return $html;`,
            `${MEMBER}}`,
            '',
            `${MEMBER}private function renderHead(): string`,
            `${MEMBER}{`,
            `${STATEMENT}$head = '<head>' . "\\n";`,
            ...parts.meta.map((tag) => appendLine('head', INDENT + tag)),
            `${STATEMENT}$head .= '${INDENT}<title>' . $this->escape($this->title) . '</title>' . "\\n";`,
            ...parts.links.map((tag) => appendLine('head', INDENT + tag)),
            `${STATEMENT}$head .= $this->renderStyles();`,
            appendLine('head', '</head>'),
            '',
            `${STATEMENT}return $head;`,
            `${MEMBER}}`,
            '',
            `${MEMBER}private function renderStyles(): string`,
            `${MEMBER}{`,
            `${STATEMENT}if ($this->styles === '') {`,
            `${STATEMENT}${MEMBER}return '';`,
            `${STATEMENT}}`,
            '',
            `${STATEMENT}return '${INDENT}<style>' . "\\n" . $this->styles . "\\n" . '${INDENT}</style>' . "\\n";`,
            `${MEMBER}}`,
            '',
            `${MEMBER}private function escape(string $value): string`,
            `${MEMBER}{`,
            `${STATEMENT}return htmlspecialchars($value, ENT_QUOTES, 'UTF-8');`,
            `${MEMBER}}`,
            '}',
            '',
            "if (realpath($_SERVER['SCRIPT_FILENAME'] ?? '') === __FILE__) {",
            `${MEMBER}echo (new ${className}())->render();`,
            '}',
            '',
        ].join('\n');
    }

    protected formatHeader(lines: string[]): string {
        const body = lines
            .map((line) => ` * ${line.replace(/\*\//g, '* /')}`)
            .join('\n');
        return `/**\n${body}\n */`;
    }

    /**
     * Puts the header after the opening tag, where PHP comments are valid.
     */
    protected applyHeader(content: string, header: string): string {
        if (!content.startsWith(PHP_OPEN)) {
            return super.applyHeader(content, header);
        }
        return `${PHP_OPEN}${header}\n${content.slice(PHP_OPEN.length)}`;
    }

    protected defaultFilename(
        context: RenderContext<PhpConverterOptions>,
    ): string {
        return `${context.componentName}.php`;
    }
}
