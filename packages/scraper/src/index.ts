/**
 * @pageforge/scraper
 *
 * Live page to manifest extraction
 */

// From scraper.ts
export {
    type ScrapeOptions,
    type ScrapeUrlOptions,
    type ScrapeOutcome,
    scrapeHtml,
    scrapeUrl,
    scrapeUrls,
    parseClassRules,
    elementToStructure,
} from './scraper.js';

// From clean.ts
export {
    type CleanedManifest,
    cleanManifest,
    dedupeStyles,
    normalizeCssForComparison,
    pruneStructure,
} from './clean.js';
