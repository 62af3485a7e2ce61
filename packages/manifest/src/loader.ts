/**
 * Manifest loaders
 *
 * Reads manifest documents from local files and http(s) URLs. Used as the
 * ancestor loader of the inheritance resolver and by the CLI and server.
 */

import { readFile } from 'fs/promises';
import { dirname, isAbsolute, resolve } from 'path';
import { fetchText, type RobustFetchOptions } from '@pageforge/http';
import type { AncestorLoader, ReferenceResolver } from './inheritance.js';
import { parseManifestYaml } from './yaml.js';

/**
 * Source of raw manifest documents.
 */
export interface ManifestLoader {
    /**
     * Turns a reference into its canonical form (absolute path or URL).
     */
    resolveReference(reference: string, fromReference?: string): string;

    /**
     * Loads and parses the document `reference` points at.
     */
    load(
        reference: string,
        fromReference?: string,
    ): Promise<Record<string, unknown>>;
}

export interface FileManifestLoaderOptions {
    /** Directory relative references are resolved against (default: cwd) */
    baseDir?: string;
    /** Options for remote manifests */
    fetchOptions?: RobustFetchOptions;
}

/**
 * Whether a reference is an http(s) URL.
 */
export function isRemoteReference(reference: string): boolean {
    return /^https?:\/\//i.test(reference);
}

/**
 * Loads manifests from the file system and over HTTP, caching each parsed
 * document for the lifetime of the loader.
 */
export class FileManifestLoader implements ManifestLoader {
    private readonly cache = new Map<
        string,
        Promise<Record<string, unknown>>
    >();
    private readonly baseDir: string;

    constructor(private readonly options: FileManifestLoaderOptions = {}) {
        this.baseDir = resolve(options.baseDir ?? process.cwd());
    }

    resolveReference(reference: string, fromReference?: string): string {
        if (isRemoteReference(reference)) {
            return reference;
        }
        if (fromReference && isRemoteReference(fromReference)) {
            return new URL(reference, fromReference).href;
        }
        if (isAbsolute(reference)) {
            return reference;
        }
        const base = fromReference ? dirname(fromReference) : this.baseDir;
        return resolve(base, reference);
    }

    load(
        reference: string,
        fromReference?: string,
    ): Promise<Record<string, unknown>> {
        const resolved = this.resolveReference(reference, fromReference);

        const cached = this.cache.get(resolved);
        if (cached) return cached;

        const pending = this.read(resolved);
        this.cache.set(resolved, pending);
        // A failed read may succeed later (file written, server back up)
        pending.catch(() => this.cache.delete(resolved));
        return pending;
    }

    /**
     * Adapts the loader to the inheritance resolver's function contract.
     */
    asAncestorLoader(): AncestorLoader {
        return (reference, fromReference) => this.load(reference, fromReference);
    }

    /**
     * Adapts the loader's reference resolution for the inheritance resolver.
     */
    asReferenceResolver(): ReferenceResolver {
        return (reference, fromReference) =>
            this.resolveReference(reference, fromReference);
    }

    /** Forgets every cached document */
    clear(): void {
        this.cache.clear();
    }

    private async read(resolved: string): Promise<Record<string, unknown>> {
        const text = isRemoteReference(resolved)
            ? await fetchText(resolved, this.options.fetchOptions)
            : await readFile(resolved, 'utf-8');
        return parseManifestYaml(text, resolved);
    }
}

/**
 * In-memory loader keyed by reference, for tests and embedding.
 */
export class MemoryManifestLoader implements ManifestLoader {
    private readonly documents: Map<string, Record<string, unknown>>;

    constructor(documents: Record<string, Record<string, unknown>> = {}) {
        this.documents = new Map(Object.entries(documents));
    }

    resolveReference(reference: string): string {
        return reference;
    }

    set(reference: string, document: Record<string, unknown>): void {
        this.documents.set(reference, document);
    }

    async load(reference: string): Promise<Record<string, unknown>> {
        const document = this.documents.get(reference);
        if (!document) {
            throw new Error(`Manifest '${reference}' not found`);
        }
        return structuredClone(document);
    }
}
