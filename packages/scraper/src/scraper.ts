/**
 * Page scraping for `@pageforge/scraper`
 *
 * Turns a live HTML page into a manifest: head metadata, inline and
 * class-level CSS, external resources, and the main content area as a
 * structure tree. The result is a starting point for hand editing, not a
 * faithful copy of the page.
 */

import { parse as parseHTML, HTMLElement, TextNode } from 'node-html-parser';
import type {
    Manifest,
    ManifestImports,
    ManifestMetadata,
    StructureMap,
    StructureValue,
    StyleMap,
} from '@pageforge/types';
import { BROWSER_HEADERS, NetworkError, robustFetch } from '@pageforge/http';
import { runConcurrent } from '@pageforge/utils';

// ============================================================================
// OPTIONS
// ============================================================================

export interface ScrapeOptions {
    /** Collect inline and `<style>` CSS (default: true) */
    extractStyles?: boolean;
    /** Collect `<script src>` URLs (default: true) */
    extractScripts?: boolean;
    /** Receives non-fatal findings, such as a non-HTML content type */
    onWarning?: (message: string) => void;
}

export interface ScrapeUrlOptions extends ScrapeOptions {
    /** Request timeout in milliseconds (default: 30000) */
    timeout?: number;
    /** Retry attempts for transient failures */
    retries?: number;
}

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Candidates for the page's main content, outer containers first.
 */
const MAIN_CONTENT_SELECTORS = [
    '.container',
    '.wrapper',
    '#container',
    '#wrapper',
    'main',
    '[role="main"]',
    '.main-content',
    '.content',
    '#main',
    '#content',
    'article',
    '.post-content',
    '.entry-content',
];

/** Minimum text length for a candidate to count as the main content */
const SUBSTANTIAL_TEXT_LENGTH = 100;

/** Attributes carried over into the structure tree */
const KEPT_ATTRIBUTES = new Set([
    'class',
    'id',
    'style',
    'src',
    'href',
    'alt',
    'title',
]);

/** Elements whose content is code rather than page text */
const SKIPPED_ELEMENTS = new Set(['script', 'style', 'noscript', 'template']);

const FONT_HOST_PATTERN = /fonts\.googleapis\.com|fonts\.gstatic\.com/;

// ============================================================================
// METADATA
// ============================================================================

function metaContent(root: HTMLElement, name: string): string | undefined {
    const tag =
        root.querySelector(`meta[name="${name}"]`) ??
        root.querySelector(`meta[property="${name}"]`);
    return tag?.getAttribute('content')?.trim() || undefined;
}

function openGraph(root: HTMLElement): Record<string, string> {
    const entries: Record<string, string> = {};
    for (const tag of root.querySelectorAll('meta[property^="og:"]')) {
        const property = tag.getAttribute('property');
        const content = tag.getAttribute('content');
        if (property && content) {
            entries[property.slice('og:'.length)] = content;
        }
    }
    return entries;
}

function extractMetadata(root: HTMLElement, pageUrl: string): ManifestMetadata {
    const host = new URL(pageUrl).host;
    const title = root.querySelector('title')?.text.trim() || undefined;
    const og = openGraph(root);

    const description =
        metaContent(root, 'description') ??
        og['description'] ??
        (title
            ? `Content from ${title} - scraped from ${host}`
            : `Web content scraped from ${host}`);

    const metadata: ManifestMetadata = {
        title: title ?? `Content from ${host}`,
        description,
    };

    const keywords = metaContent(root, 'keywords');
    if (keywords) metadata.keywords = keywords;
    const author = metaContent(root, 'author');
    if (author) metadata.author = author;

    const language = root.querySelector('html')?.getAttribute('lang');
    if (language) metadata.language = language;

    metadata.source_url = pageUrl;
    metadata.extracted_at = new Date().toISOString();

    for (const [name, content] of Object.entries(og)) {
        metadata[`og_${name.replace(/[^A-Za-z0-9]+/g, '_')}`] = content;
    }

    return metadata;
}

// ============================================================================
// STYLES
// ============================================================================

const STYLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Reads `.class { ... }` rules out of a style sheet. Other selectors are
 * ignored; declarations are joined with `; `.
 */
export function parseClassRules(css: string): StyleMap {
    const styles: StyleMap = {};
    for (const match of css.matchAll(/([^{]+)\{([^}]+)\}/g)) {
        const selector = match[1].trim();
        if (!selector.startsWith('.')) continue;

        const name = selector.slice(1).replace(/[-\s]+/g, '_');
        if (!STYLE_NAME_PATTERN.test(name)) continue;

        styles[name] = match[2]
            .split(';')
            .map((declaration) => declaration.trim())
            .filter(Boolean)
            .join('; ');
    }
    return styles;
}

function extractStyles(root: HTMLElement): StyleMap {
    const styles: StyleMap = {};

    root.querySelectorAll('[style]').forEach((element, index) => {
        const css = element.getAttribute('style')?.trim();
        if (!css) return;
        const tag = element.tagName.toLowerCase();
        const id = element.getAttribute('id') || `element_${index}`;
        styles[`${tag}_${id}`.replace(/-/g, '_')] = css;
    });

    for (const sheet of root.querySelectorAll('style')) {
        Object.assign(styles, parseClassRules(sheet.rawText));
    }

    return styles;
}

// ============================================================================
// IMPORTS
// ============================================================================

function absoluteUrl(reference: string, pageUrl: string): string | undefined {
    try {
        return new URL(reference, pageUrl).href;
    } catch {
        return undefined;
    }
}

function collectUrls(
    elements: HTMLElement[],
    attribute: string,
    pageUrl: string,
): string[] {
    const urls: string[] = [];
    for (const element of elements) {
        const value = element.getAttribute(attribute);
        const url = value ? absoluteUrl(value, pageUrl) : undefined;
        if (url && !urls.includes(url)) {
            urls.push(url);
        }
    }
    return urls;
}

function extractImports(
    root: HTMLElement,
    pageUrl: string,
    extractScripts: boolean,
): ManifestImports {
    const stylesheets = collectUrls(
        root.querySelectorAll('link[rel="stylesheet"]'),
        'href',
        pageUrl,
    );
    const fonts = stylesheets.filter((url) => FONT_HOST_PATTERN.test(url));

    const imports: ManifestImports = {};
    const styles = stylesheets.filter((url) => !fonts.includes(url));
    if (styles.length > 0) imports.styles = styles;
    if (fonts.length > 0) imports.fonts = fonts;

    if (extractScripts) {
        const scripts = collectUrls(
            root.querySelectorAll('script[src]'),
            'src',
            pageUrl,
        );
        if (scripts.length > 0) imports.scripts = scripts;
    }

    return imports;
}

// ============================================================================
// STRUCTURE
// ============================================================================

function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/**
 * Converts an element into a one-key structure mapping. Text is kept only
 * on elements without element children; a single child is stored directly
 * rather than in a list.
 */
export function elementToStructure(
    element: HTMLElement,
    tagName: string = element.tagName.toLowerCase(),
): StructureMap {
    const content: StructureMap = {};

    for (const [name, value] of Object.entries(element.attributes)) {
        const key = name.toLowerCase();
        if (KEPT_ATTRIBUTES.has(key)) {
            content[key] = value;
        }
    }

    const texts: string[] = [];
    const children: StructureValue[] = [];
    for (const child of element.childNodes) {
        if (child instanceof HTMLElement) {
            if (SKIPPED_ELEMENTS.has(child.tagName.toLowerCase())) continue;
            children.push(elementToStructure(child));
        } else if (child instanceof TextNode) {
            const text = collapseWhitespace(child.text);
            if (text) texts.push(text);
        }
    }

    if (children.length === 1) {
        content.children = children[0];
    } else if (children.length > 1) {
        content.children = children;
    } else if (texts.length > 0) {
        content.text = texts.join(' ');
    }

    return { [tagName]: content };
}

function findMainContent(root: HTMLElement): HTMLElement | undefined {
    for (const selector of MAIN_CONTENT_SELECTORS) {
        const element = root.querySelector(selector);
        if (element && element.text.trim().length > SUBSTANTIAL_TEXT_LENGTH) {
            return element;
        }
    }
    return undefined;
}

function extractStructure(root: HTMLElement): StructureValue {
    const main = findMainContent(root);
    if (main) {
        return elementToStructure(main);
    }
    const body = root.querySelector('body');
    if (body) {
        return elementToStructure(body, 'div');
    }
    return { div: { text: 'No content found' } };
}

// ============================================================================
// ENTRY POINTS
// ============================================================================

/**
 * Builds a manifest from an HTML document.
 *
 * @param html - The page source
 * @param pageUrl - Address the page was served from; relative resource
 *   references are resolved against it
 */
export function scrapeHtml(
    html: string,
    pageUrl: string,
    options: ScrapeOptions = {},
): Manifest {
    const root = parseHTML(html);

    return {
        metadata: extractMetadata(root, pageUrl),
        styles: options.extractStyles === false ? {} : extractStyles(root),
        imports: extractImports(root, pageUrl, options.extractScripts ?? true),
        structure: extractStructure(root),
    };
}

/**
 * Fetches a page and builds a manifest from it.
 *
 * @throws NetworkError when the request fails or answers with a non-OK status
 *
 * @example
 * ```typescript
 * const manifest = cleanManifest(await scrapeUrl('https://example.com'));
 * ```
 */
export async function scrapeUrl(
    url: string,
    options: ScrapeUrlOptions = {},
): Promise<Manifest> {
    const response = await robustFetch(url, {
        headers: BROWSER_HEADERS,
        timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
        retries: options.retries,
    });
    if (!response.ok) {
        throw NetworkError.fromResponse(url, response);
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (!contentType.includes('text/html')) {
        options.onWarning?.(
            `${url} may not be HTML (content type: ${contentType || 'none'})`,
        );
    }

    // Resolve resources against the address after redirects
    const finalUrl = response.url || url;
    return scrapeHtml(await response.text(), finalUrl, options);
}

export type ScrapeOutcome =
    | { url: string; status: 'success'; manifest: Manifest }
    | { url: string; status: 'error'; error: Error };

/**
 * Scrapes several pages concurrently. Each page succeeds or fails on its
 * own.
 *
 * @returns One outcome per URL, in input order
 */
export async function scrapeUrls(
    urls: string[],
    options: ScrapeUrlOptions & { concurrency?: number } = {},
): Promise<ScrapeOutcome[]> {
    return runConcurrent<string, ScrapeOutcome>(
        urls,
        options.concurrency ?? 4,
        async (url) => {
            try {
                const manifest = await scrapeUrl(url, options);
                return { url, status: 'success', manifest };
            } catch (error) {
                return {
                    url,
                    status: 'error',
                    error:
                        error instanceof Error ? error : new Error(String(error)),
                };
            }
        },
    );
}
