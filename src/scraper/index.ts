/**
 * Scraper Module
 *
 * Page fetching and posting extraction (structural first, heuristic fallback)
 */

export { fetchPage, charsetOf, DEFAULT_MAX_BYTES, type FetchPageOptions } from './fetcher.js';

export {
  extractPostings,
  extractSiteTotal,
  normalizeTitles,
  DEFAULT_STRATEGIES,
} from './extractor.js';

export {
  structuralStrategy,
  heuristicStrategy,
  jsonLdTitles,
  looseAnchorTitles,
  isPostingLink,
} from './strategies.js';

export type { ExtractionStrategy, NamedStrategy } from './types.js';
