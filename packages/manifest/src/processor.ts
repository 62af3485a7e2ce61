/**
 * Manifest processor
 *
 * Runs a raw document through the whole pipeline:
 * normalize → validate → resolve inheritance → substitute variables →
 * normalize styles → validate again.
 */

import type { Manifest, ProcessedManifest } from '@pageforge/types';
import { ValidationError } from './errors.js';
import { resolveInheritance } from './inheritance.js';
import { FileManifestLoader, type ManifestLoader } from './loader.js';
import { normalizeManifest } from './normalize.js';
import { normalizeStyles } from './style-registry.js';
import { validateManifest, validateTemplateUsage } from './validator.js';
import { substituteVariables, type TemplateVariables } from './variables.js';

export interface ManifestProcessorOptions {
    /** Loader for `extends` references (default: a {@link FileManifestLoader}) */
    loader?: ManifestLoader;
    /** Escalate validation warnings to errors */
    strict?: boolean;
    /** Validate before and after resolution (default: true) */
    validate?: boolean;
    /** Maximum inheritance depth */
    maxDepth?: number;
}

export interface ProcessOptions {
    /** Values for `{{ name }}` placeholders, overriding `template_vars` */
    variables?: TemplateVariables;
    /** Canonical reference of the source, for relative `extends` */
    reference?: string;
}

/**
 * Turns raw manifest documents into resolved, validated manifests.
 */
export class ManifestProcessor {
    private readonly loader: ManifestLoader;
    private readonly strict: boolean;
    private readonly validate: boolean;
    private readonly maxDepth?: number;

    constructor(options: ManifestProcessorOptions = {}) {
        this.loader = options.loader ?? new FileManifestLoader();
        this.strict = options.strict ?? false;
        this.validate = options.validate ?? true;
        this.maxDepth = options.maxDepth;
    }

    /**
     * Processes a raw document (or an already normalized manifest).
     *
     * @returns The resolved manifest with every warning collected on the way
     * @throws ValidationError, TemplateError
     */
    async process(
        source: unknown,
        options: ProcessOptions = {},
    ): Promise<ProcessedManifest> {
        const warnings: string[] = [];
        const addWarning = (message: string) => {
            if (!warnings.includes(message)) warnings.push(message);
        };

        const normalized = normalizeManifest(source);
        // The child alone may omit sections its ancestor provides
        if (this.validate) {
            this.check(
                normalized,
                addWarning,
                normalized.metadata.extends === undefined
                    ? validateManifest
                    : validateTemplateUsage,
            );
        }

        const resolved = await resolveInheritance(
            normalized,
            (reference, fromReference) =>
                this.loader.load(reference, fromReference),
            {
                reference: options.reference,
                maxDepth: this.maxDepth,
                resolveReference: (reference, fromReference) =>
                    this.loader.resolveReference(reference, fromReference),
                onWarning: addWarning,
            },
        );

        const substituted = substituteVariables(
            resolved,
            options.variables,
            addWarning,
        );

        // Suspicious declarations are reported by the validator below
        const manifest: Manifest = {
            ...substituted,
            styles: normalizeStyles(substituted.styles),
        };

        if (this.validate) {
            this.check(manifest, addWarning);
        }

        return { manifest, warnings };
    }

    /**
     * Loads a manifest through the loader and processes it.
     */
    async processReference(
        reference: string,
        options: Omit<ProcessOptions, 'reference'> = {},
    ): Promise<ProcessedManifest> {
        const canonical = this.loader.resolveReference(reference);
        const document = await this.loader.load(canonical);
        return this.process(document, { ...options, reference: canonical });
    }

    private check(
        manifest: Manifest,
        addWarning: (message: string) => void,
        validate: typeof validateManifest = validateManifest,
    ): void {
        const { errors, warnings } = validate(manifest, {
            strict: this.strict,
        });
        warnings.forEach(addWarning);
        if (errors.length > 0) {
            throw new ValidationError(errors, warnings);
        }
    }
}

/**
 * Convenience wrapper: processes the manifest file at `path` with a fresh
 * {@link FileManifestLoader}.
 */
export async function processManifestFile(
    path: string,
    options: ManifestProcessorOptions & Pick<ProcessOptions, 'variables'> = {},
): Promise<ProcessedManifest> {
    const { variables, ...processorOptions } = options;
    const processor = new ManifestProcessor(processorOptions);
    return processor.processReference(path, { variables });
}
