/**
 * Validate command implementation
 */

import chalk from 'chalk';
import {
    TemplateError,
    ValidationError,
    analyzeStructure,
    processManifestFile,
    type StructureAnalysis,
} from '@pageforge/manifest';

export interface ValidateOptions {
    manifest: string;
    strict: boolean;
}

export interface ValidateOutcome {
    valid: boolean;
    errors: string[];
    warnings: string[];
    /** Present when the manifest resolved */
    analysis?: StructureAnalysis;
}

/**
 * Processes a manifest and reports what is wrong with it. Validation and
 * template failures are reported, not thrown; anything else (a missing
 * file, a parse error) propagates.
 */
export async function checkManifest(
    options: ValidateOptions,
): Promise<ValidateOutcome> {
    try {
        const { manifest, warnings } = await processManifestFile(
            options.manifest,
            { strict: options.strict },
        );
        return {
            valid: true,
            errors: [],
            warnings,
            analysis: analyzeStructure(manifest.structure),
        };
    } catch (error) {
        if (error instanceof ValidationError) {
            return {
                valid: false,
                errors: [...error.errors],
                warnings: [...error.warnings],
            };
        }
        if (error instanceof TemplateError) {
            return { valid: false, errors: [error.message], warnings: [] };
        }
        throw error;
    }
}

/**
 * Runs the validate command and prints its report.
 */
export async function runValidate(
    options: ValidateOptions,
): Promise<ValidateOutcome> {
    const outcome = await checkManifest(options);

    if (outcome.valid) {
        console.log(`${chalk.green('✓')} ${chalk.bold(options.manifest)} is valid`);
    } else {
        console.log(`${chalk.red('✗')} ${chalk.bold(options.manifest)} is invalid`);
        for (const error of outcome.errors) {
            console.log(chalk.red(`  - ${error}`));
        }
    }

    for (const warning of outcome.warnings) {
        console.log(chalk.yellow(`  ⚠ ${warning}`));
    }

    if (outcome.analysis) {
        const { elementCount, maxDepth, complexityScore } = outcome.analysis;
        console.log(
            chalk.gray(
                `  Structure: ${elementCount} elements, depth ${maxDepth}, complexity ${complexityScore}`,
            ),
        );
    }

    return outcome;
}
