/**
 * `@pageforge/types`
 *
 * Shared TypeScript types for pageforge packages.
 * This module provides type definitions for manifests, the raw structure
 * tree, the tagged element tree handed to renderers, and conversion results.
 *
 * @packageDocumentation
 */

// ============================================================================
// RAW STRUCTURE
// ============================================================================

/**
 * Scalar values that may appear anywhere in a parsed manifest.
 */
export type ScalarValue = string | number | boolean | null;

/**
 * A mapping node of the raw structure tree, exactly as parsed from YAML.
 */
export interface StructureMap {
    [key: string]: StructureValue;
}

/**
 * One value of the raw structure tree: text, a mapping, or a sequence.
 *
 * This is the format-agnostic shape that the inheritance resolver, the
 * validator and the structure walker operate on.
 */
export type StructureValue = ScalarValue | StructureValue[] | StructureMap;

// ============================================================================
// MANIFEST
// ============================================================================

/**
 * Manifest metadata. After ingestion every value is a scalar.
 */
export interface ManifestMetadata {
    /** Page title. Required for a manifest to validate. */
    title?: string;
    description?: string;
    author?: string;
    /** Comma-separated keyword list. */
    keywords?: string;
    /** Document language, used for `<html lang>`. */
    language?: string;
    /** Reference (path or URL) of the parent manifest. */
    extends?: string;
    template_type?: string;
    version?: string;
    [key: string]: ScalarValue | undefined;
}

/**
 * Named CSS declaration strings, e.g. `{ box: "color: red; padding: 4px;" }`.
 */
export type StyleMap = Record<string, string>;

/**
 * External resources referenced by the page.
 *
 * List-valued keys are always genuine sequences; `inline_scripts` is always
 * one joined string.
 */
export interface ManifestImports {
    styles?: string[];
    scripts?: string[];
    fonts?: string[];
    inline_scripts?: string;
    [key: string]: string[] | string | undefined;
}

/**
 * The declarative page description exchanged across the whole pipeline.
 */
export interface Manifest {
    metadata: ManifestMetadata;
    styles: StyleMap;
    /** Absent only when the source omitted it; the validator reports that. */
    structure?: StructureValue;
    imports: ManifestImports;
    interactions?: Record<string, StructureValue>;
    /** Slot names a parent manifest offers to its children. */
    template_slots?: Record<string, StructureValue>;
    /** Variables available to `{{ name }}` placeholders. */
    template_vars?: Record<string, StructureValue>;
}

/**
 * Outcome of validating a manifest.
 */
export interface ValidationResult {
    /** Problems that block conversion. */
    errors: string[];
    /** Non-fatal findings. */
    warnings: string[];
}

/**
 * A manifest that went through the full processing pipeline, together with
 * every warning collected on the way.
 */
export interface ProcessedManifest {
    manifest: Manifest;
    warnings: string[];
}

// ============================================================================
// ELEMENT TREE
// ============================================================================

/**
 * A rendered attribute. `true` marks a boolean attribute (`disabled`).
 */
export interface ElementAttribute {
    name: string;
    value: string | true;
}

/**
 * Literal text content.
 */
export interface TextNode {
    kind: 'text';
    value: string;
    /** Location in the raw structure, e.g. `structure.div.children[2]`. */
    path: string;
}

/**
 * A tagged element with its attributes and children.
 */
export interface ElementTreeNode {
    kind: 'element';
    /** Lower-case element name; unknown tags are already resolved to `div`. */
    tag: string;
    attributes: ElementAttribute[];
    /** Raw `style` value, resolved per target by the style registry. */
    styleRef?: string;
    children: ElementNode[];
    path: string;
}

/**
 * One node of the tagged element tree consumed by renderers.
 */
export type ElementNode = TextNode | ElementTreeNode;

// ============================================================================
// STYLES
// ============================================================================

/**
 * How a `style` attribute value is rendered: as a reference to a named rule
 * in the style sheet, or verbatim as an inline style.
 */
export type StyleReference =
    | { kind: 'class'; className: string }
    | { kind: 'id'; id: string }
    | { kind: 'inline'; style: string };

// ============================================================================
// CONVERSION
// ============================================================================

/**
 * Supported output formats.
 */
export const CONVERSION_FORMATS = ['html', 'react', 'vue', 'php'] as const;

/**
 * One of the supported output formats.
 */
export type ConversionFormat = (typeof CONVERSION_FORMATS)[number];

/**
 * Facts about one conversion run.
 */
export interface ConversionMetadata {
    title: string;
    hasStyles: boolean;
    hasImports: boolean;
    /** Number of element-defining mappings in the structure. */
    elementCount: number;
    /** Size of the generated content in UTF-8 bytes. */
    size: number;
    /** ISO timestamp of the conversion. */
    generatedAt: string;
}

/**
 * Options understood by every converter.
 */
export interface BaseConverterOptions {
    /** Apply output optimizations (default: false). */
    optimize?: boolean;
    /** When optimizing, collapse whitespace and strip comments (default: true). */
    minify?: boolean;
    /** Prefix the output with a generated-by comment (default: true). */
    headerComment?: boolean;
    /** Output filename; derived from the title when omitted. */
    filename?: string;
}

/**
 * HTML document type emitted by the HTML converter.
 */
export type HtmlDoctype = 'html5' | 'html4' | 'xhtml';

/**
 * HTML converter options.
 */
export interface HtmlConverterOptions extends BaseConverterOptions {
    doctype?: HtmlDoctype;
    /** Emit description/author/keywords/Open Graph meta tags (default: true). */
    includeMetaTags?: boolean;
    /** Emit the responsive viewport meta tag (default: true). */
    responsiveDesign?: boolean;
}

/**
 * React converter options.
 */
export interface ReactConverterOptions extends BaseConverterOptions {
    /** Emit a `.tsx` component with type annotations (default: false). */
    typescript?: boolean;
}

/**
 * Vue converter options.
 */
export type VueConverterOptions = BaseConverterOptions;

/**
 * PHP converter options.
 */
export interface PhpConverterOptions extends HtmlConverterOptions {
    /** Namespace of the generated class (default: `Pages`). */
    phpNamespace?: string;
}

/**
 * Union of every converter option, as read from a config file.
 */
export interface ConverterOptions
    extends HtmlConverterOptions,
        ReactConverterOptions,
        PhpConverterOptions {}
