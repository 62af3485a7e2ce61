/**
 * @module @pageforge/manifest
 *
 * The manifest transformation core: ingestion, validation, template
 * inheritance, variable substitution, style normalization and the
 * element-tree adapter renderers build on.
 *
 * @example
 * ```typescript
 * import { ManifestProcessor, buildElementTree } from '@pageforge/manifest';
 *
 * const processor = new ManifestProcessor({ strict: false });
 * const { manifest, warnings } = await processor.processReference('page.yaml');
 * const tree = buildElementTree(manifest.structure);
 * ```
 */

export * from './errors.js';
export * from './normalize.js';
export * from './walker.js';
export * from './style-registry.js';
export * from './validator.js';
export * from './inheritance.js';
export * from './variables.js';
export * from './element-tree.js';
export * from './html-elements.js';
export * from './yaml.js';
export * from './loader.js';
export * from './processor.js';
