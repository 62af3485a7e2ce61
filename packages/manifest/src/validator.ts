/**
 * Manifest validator
 *
 * Separates problems that block conversion (errors) from findings that are
 * only worth mentioning (warnings). Never mutates its input.
 */

import type {
    Manifest,
    StructureValue,
    ValidationResult,
} from '@pageforge/types';
import { isPlainObject } from '@pageforge/utils';
import { ValidationError } from './errors.js';
import { isReservedKey } from './html-elements.js';
import { findInvalidSegments } from './style-registry.js';
import { walkStructure } from './walker.js';

export interface ValidateOptions {
    /** Escalate every warning to an error */
    strict?: boolean;
}

const ELEMENT_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9-]*$/;
const SLOT_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_-]*$/;

// `data-*` and `aria-*` attribute keys
const ATTRIBUTE_PREFIX_PATTERN = /^(data|aria)-/;

function isEmptyStructure(structure: StructureValue): boolean {
    if (structure === null) return true;
    if (typeof structure === 'string') return structure.trim() === '';
    if (Array.isArray(structure)) return structure.length === 0;
    if (isPlainObject(structure)) return Object.keys(structure).length === 0;
    return false;
}

function checkMetadata(manifest: Manifest, result: ValidationResult): void {
    const metadata: unknown = manifest.metadata;
    if (!isPlainObject(metadata)) {
        result.errors.push('Metadata must include a title');
        return;
    }

    const { title, description } = metadata;
    if (typeof title !== 'string' || title.trim() === '') {
        result.errors.push('Metadata must include a title');
    }

    if (
        description === undefined ||
        description === null ||
        description === ''
    ) {
        result.warnings.push('Consider adding a description to metadata');
    }

    const parent = metadata.extends;
    if (
        parent !== undefined &&
        (typeof parent !== 'string' || parent.trim() === '')
    ) {
        result.errors.push("Template 'extends' must be a non-empty string");
    }
}

function checkStyles(manifest: Manifest, result: ValidationResult): void {
    const styles: unknown = manifest.styles;
    if (styles === undefined) return;
    if (!isPlainObject(styles)) {
        result.errors.push('Styles must be a mapping');
        return;
    }

    for (const [name, css] of Object.entries(styles)) {
        if (typeof css !== 'string') {
            result.errors.push(`Style '${name}' must be a string`);
            continue;
        }
        for (const segment of findInvalidSegments(css)) {
            result.warnings.push(
                `Style '${name}' may have invalid CSS: '${segment}'`,
            );
        }
    }
}

function checkStructure(manifest: Manifest, result: ValidationResult): void {
    const { structure } = manifest;
    if (structure === undefined || isEmptyStructure(structure)) {
        result.errors.push('Structure is required');
        return;
    }

    walkStructure(structure, (node, { path }) => {
        for (const key of Object.keys(node)) {
            if (isReservedKey(key) || ATTRIBUTE_PREFIX_PATTERN.test(key)) {
                continue;
            }
            if (!ELEMENT_NAME_PATTERN.test(key)) {
                result.warnings.push(
                    `Unusual element name at ${path}.${key}: '${key}'`,
                );
            }
        }
    });
}

function checkTemplates(manifest: Manifest, result: ValidationResult): void {
    const slots: unknown = manifest.template_slots;
    if (!isPlainObject(slots)) return;

    const metadata: unknown = manifest.metadata;
    if (isPlainObject(metadata) && metadata.extends !== undefined) {
        result.warnings.push(
            'Template inheritance and template_slots both present - ensure compatibility',
        );
    }

    for (const name of Object.keys(slots)) {
        if (!SLOT_NAME_PATTERN.test(name)) {
            result.warnings.push(`Invalid template slot name: '${name}'`);
        }
    }
}

/**
 * Validates a manifest.
 *
 * `errors` is empty exactly when the title is a non-blank string, the
 * structure is non-empty and the optional sections have the right shape.
 *
 * @param manifest - The manifest to check
 * @param options - `strict` escalates warnings to errors
 */
export function validateManifest(
    manifest: Manifest,
    options: ValidateOptions = {},
): ValidationResult {
    const result: ValidationResult = { errors: [], warnings: [] };

    checkMetadata(manifest, result);
    checkStructure(manifest, result);
    checkStyles(manifest, result);
    checkTemplates(manifest, result);

    return options.strict ? escalate(result) : result;
}

/**
 * Runs only the template checks. Used on a manifest with `extends` before
 * resolution, when its own title and structure may still come from the
 * ancestor and `extends` is about to be merged away.
 */
export function validateTemplateUsage(
    manifest: Manifest,
    options: ValidateOptions = {},
): ValidationResult {
    const result: ValidationResult = { errors: [], warnings: [] };
    checkTemplates(manifest, result);
    return options.strict ? escalate(result) : result;
}

function escalate(result: ValidationResult): ValidationResult {
    return { errors: [...result.errors, ...result.warnings], warnings: [] };
}

/**
 * Validates a manifest and throws when errors remain.
 *
 * @returns The warnings of a manifest that passed
 * @throws ValidationError listing every error
 */
export function assertValid(
    manifest: Manifest,
    options: ValidateOptions = {},
): string[] {
    const { errors, warnings } = validateManifest(manifest, options);
    if (errors.length > 0) {
        throw new ValidationError(errors, warnings);
    }
    return warnings;
}
