/**
 * @module @pageforge/converters
 *
 * Renders resolved manifests as HTML documents, React components, Vue
 * single-file components and PHP classes.
 *
 * @example
 * ```typescript
 * import { convertManifest, writeConversionResult } from '@pageforge/converters';
 *
 * const result = convertManifest(manifest, 'react', { typescript: true });
 * await writeConversionResult(result, 'dist');
 * ```
 */

export * from './errors.js';
export * from './result.js';
export * from './base-converter.js';
export * from './markup.js';
export * from './html-converter.js';
export * from './react-converter.js';
export * from './vue-converter.js';
export * from './php-converter.js';
export * from './registry.js';
export * from './batch.js';
