/**
 * Converter skeleton
 *
 * Every target format runs the same steps: defensive checks, element tree,
 * format-specific rendering, optional optimization, header comment and
 * packaging. Subclasses only supply the rendering strategy and the comment
 * syntax of their format.
 */

import type {
    BaseConverterOptions,
    ConversionFormat,
    ConversionMetadata,
    ElementNode,
    Manifest,
    ManifestImports,
    ManifestMetadata,
    StyleMap,
} from '@pageforge/types';
import {
    buildElementTree,
    countElements,
    StructureError,
} from '@pageforge/manifest';
import { isPlainObject, toPascalCase, VERSION } from '@pageforge/utils';
import { ConversionError } from './errors.js';
import { createConversionResult, type ConversionResult } from './result.js';

/**
 * Everything a renderer needs, extracted once per conversion.
 */
export interface RenderContext<TOptions extends BaseConverterOptions> {
    manifest: Manifest;
    metadata: ManifestMetadata;
    styles: StyleMap;
    imports: ManifestImports;
    tree: ElementNode[];
    options: TOptions;
    /** Display title (`Untitled` when the manifest has none) */
    title: string;
    /** PascalCase identifier derived from the title (fallback `Page`) */
    componentName: string;
}

const LIST_IMPORTS = ['styles', 'scripts', 'fonts'] as const;

/**
 * Derives a component/class name from a page title. Names starting with a
 * digit, or taken by the target (`isReserved`), get a `Page` prefix.
 *
 * @example
 * componentNameFor('my landing page') // 'MyLandingPage'
 * componentNameFor('404 page')        // 'Page404Page'
 * componentNameFor('')                // 'Page'
 */
export function componentNameFor(
    title: string | undefined,
    isReserved: (name: string) => boolean = () => false,
): string {
    const name = toPascalCase(title ?? '');
    if (name === '') return 'Page';
    return /^[0-9]/.test(name) || isReserved(name) ? `Page${name}` : name;
}

/**
 * Whether the manifest references any external or inline resource.
 */
export function hasImports(imports: ManifestImports): boolean {
    return Object.values(imports).some((value) =>
        typeof value === 'string' ? value.trim() !== '' : (value?.length ?? 0) > 0,
    );
}

// ============================================================================
// BASE CONVERTER
// ============================================================================

export abstract class BaseConverter<TOptions extends BaseConverterOptions> {
    abstract readonly format: ConversionFormat;

    /**
     * @param defaults - Options applied to every conversion, overridable per call
     */
    constructor(protected readonly defaults: TOptions) {}

    /**
     * Converts a resolved manifest.
     *
     * @throws ConversionError for any failure, whatever its origin
     */
    convert(manifest: Manifest, options?: TOptions): ConversionResult {
        const settings = options ? { ...this.defaults, ...options } : this.defaults;

        try {
            this.checkManifest(manifest);

            const context = this.createContext(manifest, settings);
            let content = this.renderDocument(context);

            if (settings.optimize) {
                content = this.optimize(content, settings.minify ?? true);
            }

            const generatedAt = new Date().toISOString();
            if (settings.headerComment ?? true) {
                content = this.applyHeader(
                    content,
                    this.formatHeader(headerLines(context, generatedAt)),
                );
            }

            const metadata: ConversionMetadata = {
                title: context.title,
                hasStyles: Object.keys(context.styles).length > 0,
                hasImports: hasImports(context.imports),
                elementCount: countElements(manifest.structure),
                size: Buffer.byteLength(content, 'utf-8'),
                generatedAt,
            };

            return createConversionResult({
                content,
                filename: settings.filename ?? this.defaultFilename(context),
                formatType: this.format,
                metadata,
            });
        } catch (error) {
            throw this.wrapError(error);
        }
    }

    // ========================================================================
    // STRATEGY
    // ========================================================================

    /** Renders the complete output document */
    protected abstract renderDocument(context: RenderContext<TOptions>): string;

    /** Wraps header lines in the format's comment syntax */
    protected abstract formatHeader(lines: string[]): string;

    /** File name used when the caller supplies none */
    protected abstract defaultFilename(context: RenderContext<TOptions>): string;

    /**
     * Whether a generated component/class name would clash with a name the
     * output already declares or the target language reserves.
     */
    protected isReservedName(_name: string): boolean {
        return false;
    }

    /**
     * Places the header comment; most formats simply prepend it.
     */
    protected applyHeader(content: string, header: string): string {
        return `${header}\n${content}`;
    }

    /**
     * Strips trailing whitespace and collapses runs of blank lines.
     * Formats with a markup body add minification on top.
     */
    protected optimize(content: string, _minify: boolean): string {
        return content.replace(/[ \t]+$/gm, '').replace(/\n{3,}/g, '\n\n');
    }

    // ========================================================================
    // SHARED STEPS
    // ========================================================================

    private createContext(
        manifest: Manifest,
        options: TOptions,
    ): RenderContext<TOptions> {
        const { metadata, styles, imports } = manifest;
        return {
            manifest,
            metadata,
            styles,
            imports,
            tree: buildElementTree(manifest.structure),
            options,
            title: metadata.title ?? 'Untitled',
            componentName: componentNameFor(metadata.title, (name) =>
                this.isReservedName(name),
            ),
        };
    }

    /**
     * Rejects value shapes that the ingestion boundary should have removed.
     */
    private checkManifest(manifest: Manifest): void {
        const styles: unknown = manifest.styles;
        if (!isPlainObject(styles)) {
            throw new ConversionError(
                this.format,
                'Styles must be a mapping',
                'styles',
            );
        }
        for (const [name, css] of Object.entries(styles)) {
            if (typeof css !== 'string') {
                throw new ConversionError(
                    this.format,
                    `Style '${name}' must be a string`,
                    `styles.${name}`,
                );
            }
        }

        const imports: unknown = manifest.imports;
        if (!isPlainObject(imports)) {
            throw new ConversionError(
                this.format,
                'Imports must be a mapping',
                'imports',
            );
        }
        for (const key of LIST_IMPORTS) {
            const value = imports[key];
            if (
                value !== undefined &&
                !(
                    Array.isArray(value) &&
                    value.every((item) => typeof item === 'string')
                )
            ) {
                throw new ConversionError(
                    this.format,
                    `Import '${key}' must be a list of strings`,
                    `imports.${key}`,
                );
            }
        }
        const inline = imports.inline_scripts;
        if (inline !== undefined && typeof inline !== 'string') {
            throw new ConversionError(
                this.format,
                "Import 'inline_scripts' must be a string",
                'imports.inline_scripts',
            );
        }

        const metadata: unknown = manifest.metadata;
        if (!isPlainObject(metadata)) {
            throw new ConversionError(
                this.format,
                'Metadata must be a mapping',
                'metadata',
            );
        }
        if (metadata.title !== undefined && typeof metadata.title !== 'string') {
            throw new ConversionError(
                this.format,
                'Metadata title must be a string',
                'metadata.title',
            );
        }
    }

    private wrapError(error: unknown): ConversionError {
        if (error instanceof ConversionError) return error;
        if (error instanceof StructureError) {
            return new ConversionError(
                this.format,
                error.message,
                error.path,
                error,
            );
        }
        const message = error instanceof Error ? error.message : String(error);
        return new ConversionError(this.format, message, undefined, error);
    }
}

function headerLines(
    context: RenderContext<BaseConverterOptions>,
    generatedAt: string,
): string[] {
    const lines = [`Generated by pageforge ${VERSION} - ${context.title}`];
    const { description } = context.metadata;
    if (typeof description === 'string' && description !== '') {
        lines.push(`Description: ${description}`);
    }
    lines.push(`Generated on: ${generatedAt}`);
    return lines;
}
