import { describe, it, expect } from 'vitest';
import {
    ManifestParseError,
    TemplateError,
    ValidationError,
} from '@pageforge/manifest';
import { ConversionError } from '@pageforge/converters';
import { NetworkError } from '@pageforge/http';
import { CliError, formatError } from '../src/index.js';

describe('formatError', () => {
    it('should list validation errors and warnings', () => {
        const error = new ValidationError(
            ['Metadata must include a title', 'Manifest must have a structure section'],
            ['Consider adding a description to metadata'],
        );

        expect(formatError(error)).toEqual([
            '[ValidationError] Manifest validation failed with 2 errors',
            '  - Metadata must include a title',
            '  - Manifest must have a structure section',
            '  warning: Consider adding a description to metadata',
        ]);
    });

    it('should show the template reference', () => {
        const error = new TemplateError('Template not found', 'base.yaml');

        expect(formatError(error)).toEqual([
            '[TemplateError] Template not found',
            '  reference: base.yaml',
        ]);
    });

    it('should show the path of a conversion failure', () => {
        const error = new ConversionError('php', 'Invalid namespace', 'options.phpNamespace');

        expect(formatError(error)).toEqual([
            '[ConversionError] Cannot convert manifest to php: Invalid namespace',
            '  path: options.phpNamespace',
        ]);
    });

    it('should show the source of a parse failure', () => {
        const error = new ManifestParseError('page.yaml', 'bad indentation');

        expect(formatError(error)).toEqual([
            '[ManifestParseError] Failed to parse manifest page.yaml: bad indentation',
            '  source: page.yaml',
        ]);
    });

    it('should show the url and hint of a network failure', () => {
        const error = new NetworkError('https://site.test/', 'DNS lookup failed', {
            hint: 'Check the host name',
        });

        expect(formatError(error)).toEqual([
            '[NetworkError] DNS lookup failed',
            '  url: https://site.test/',
            '  hint: Check the host name',
        ]);
    });

    it('should show CLI hints', () => {
        expect(formatError(new CliError('Output exists', 'Pass --overwrite'))).toEqual([
            '[CliError] Output exists',
            '  hint: Pass --overwrite',
        ]);
        expect(formatError(new CliError('Operation cancelled.'))).toEqual([
            '[CliError] Operation cancelled.',
        ]);
    });

    it('should handle plain errors and thrown values', () => {
        expect(formatError(new Error('boom'))).toEqual(['[Error] boom']);
        expect(formatError('boom')).toEqual(['[Error] boom']);
    });

    it('should append the stack in debug mode', () => {
        const error = new Error('boom');
        const lines = formatError(error, { debug: true });

        expect(lines.slice(0, 2)).toEqual(['[Error] boom', '']);
        expect(lines[2]).toBe(error.stack);
    });
});
