/**
 * Converter defaults from `--config` files and `--var` pairs.
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import { parse } from 'yaml';
import type { ConverterOptions, HtmlDoctype } from '@pageforge/types';
import { toStructureValue, type TemplateVariables } from '@pageforge/manifest';
import { isPlainObject } from '@pageforge/utils';
import { CliError } from './errors.js';

/** Keys a config file may set */
export const CONFIG_KEYS = [
    'optimize',
    'minify',
    'doctype',
    'includeMetaTags',
    'responsiveDesign',
    'headerComment',
    'typescript',
    'phpNamespace',
    'variables',
] as const;

const BOOLEAN_KEYS = [
    'optimize',
    'minify',
    'includeMetaTags',
    'responsiveDesign',
    'headerComment',
    'typescript',
] as const;

const DOCTYPES: readonly HtmlDoctype[] = ['html5', 'html4', 'xhtml'];

const VARIABLE_NAME = /^[A-Za-z_][\w-]*$/;

/**
 * Converter options and template variables resolved for one command.
 */
export interface CliConfig {
    converterOptions: ConverterOptions;
    variables: TemplateVariables;
}

function isDoctype(value: unknown): value is HtmlDoctype {
    return DOCTYPES.some((doctype) => doctype === value);
}

function isConfigKey(key: string): boolean {
    return CONFIG_KEYS.some((known) => known === key);
}

/**
 * Checks a parsed config document and splits it into converter options and
 * variables.
 *
 * @param document - Parsed JSON or YAML
 * @param source - Where the document came from, for messages
 * @throws CliError when a key is unknown or a value has the wrong type
 */
export function parseConfig(document: unknown, source: string): CliConfig {
    if (document === null || document === undefined) {
        return { converterOptions: {}, variables: {} };
    }
    if (!isPlainObject(document)) {
        throw new CliError(`Config ${source} must be a mapping`);
    }

    const unknownKeys = Object.keys(document).filter((key) => !isConfigKey(key));
    if (unknownKeys.length > 0) {
        throw new CliError(
            `Unknown config key(s) in ${source}: ${unknownKeys.join(', ')}`,
            `Allowed keys: ${CONFIG_KEYS.join(', ')}`,
        );
    }

    const converterOptions: ConverterOptions = {};
    for (const key of BOOLEAN_KEYS) {
        const value = document[key];
        if (value === undefined) continue;
        if (typeof value !== 'boolean') {
            throw new CliError(`Config ${source}: "${key}" must be a boolean`);
        }
        converterOptions[key] = value;
    }

    if (document.doctype !== undefined) {
        if (!isDoctype(document.doctype)) {
            throw new CliError(
                `Config ${source}: "doctype" must be one of ${DOCTYPES.join(', ')}`,
            );
        }
        converterOptions.doctype = document.doctype;
    }

    if (document.phpNamespace !== undefined) {
        if (typeof document.phpNamespace !== 'string') {
            throw new CliError(
                `Config ${source}: "phpNamespace" must be a string`,
            );
        }
        converterOptions.phpNamespace = document.phpNamespace;
    }

    const variables: TemplateVariables = {};
    if (document.variables !== undefined) {
        if (!isPlainObject(document.variables)) {
            throw new CliError(
                `Config ${source}: "variables" must be a mapping`,
            );
        }
        for (const [name, value] of Object.entries(document.variables)) {
            variables[name] = toStructureValue(value);
        }
    }

    return { converterOptions, variables };
}

/**
 * Reads a config file. `.json` files are parsed as JSON, anything else as
 * YAML.
 */
export async function loadConfig(path: string): Promise<CliConfig> {
    let text: string;
    try {
        text = await readFile(path, 'utf-8');
    } catch (error) {
        throw new CliError(`Cannot read config ${path}`, undefined, error);
    }

    let document: unknown;
    try {
        document = extname(path) === '.json' ? JSON.parse(text) : parse(text);
    } catch (error) {
        const details = error instanceof Error ? error.message : String(error);
        throw new CliError(
            `Cannot parse config ${path}: ${details}`,
            undefined,
            error,
        );
    }
    return parseConfig(document, path);
}

/**
 * Parses repeated `--var key=value` pairs. Values stay strings; the first
 * `=` separates name from value.
 *
 * @throws CliError for a pair without `=` or with an invalid name
 */
export function parseVariables(pairs: readonly string[]): TemplateVariables {
    const variables: TemplateVariables = {};
    for (const pair of pairs) {
        const separator = pair.indexOf('=');
        const name = separator === -1 ? '' : pair.slice(0, separator).trim();
        if (!VARIABLE_NAME.test(name)) {
            throw new CliError(
                `Invalid --var "${pair}"`,
                'Expected key=value with a key such as site_name',
            );
        }
        variables[name] = pair.slice(separator + 1);
    }
    return variables;
}

/**
 * Options shared by every command that converts manifests.
 */
export interface ConversionFlags {
    config?: string;
    var: string[];
    optimize?: boolean;
}

/**
 * Combines a config file, `--var` pairs and `--optimize`. Command-line
 * values win over the config file.
 */
export async function resolveConversionSettings(
    flags: ConversionFlags,
): Promise<CliConfig> {
    const fromFile: CliConfig = flags.config
        ? await loadConfig(flags.config)
        : { converterOptions: {}, variables: {} };

    const converterOptions = { ...fromFile.converterOptions };
    if (flags.optimize) converterOptions.optimize = true;

    return {
        converterOptions,
        variables: { ...fromFile.variables, ...parseVariables(flags.var) },
    };
}
