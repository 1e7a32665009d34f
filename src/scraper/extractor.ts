/**
 * Posting Extractor
 *
 * Runs the strategies in order and keeps the first non-empty result.
 */

import * as cheerio from 'cheerio';
import { heuristicStrategy, structuralStrategy } from './strategies.js';
import type { NamedStrategy } from './types.js';
import type { ExtractionResult, Posting } from '../types/index.js';

export const DEFAULT_STRATEGIES: readonly NamedStrategy[] = [
  { name: 'primary', run: structuralStrategy },
  { name: 'fallback', run: heuristicStrategy },
];

/** Counter element the board renders above the list */
const SITE_TOTAL_SELECTOR = 'body > main > div > div:nth-of-type(2) > div > span';

/**
 * Trim, drop empties, dedupe (case-sensitive) keeping first-seen order
 */
export function normalizeTitles(titles: readonly string[]): Posting[] {
  const seen = new Set<string>();
  const postings: Posting[] = [];

  for (const raw of titles) {
    const title = raw.trim();
    if (!title || seen.has(title)) {
      continue;
    }
    seen.add(title);
    postings.push(title);
  }

  return postings;
}

/**
 * Total advertised by the page, if its counter is present
 */
export function extractSiteTotal(html: string): number | undefined {
  const $ = cheerio.load(html);
  const text = $(SITE_TOTAL_SELECTOR).first().text();
  const match = /\d+/.exec(text);
  return match ? Number.parseInt(match[0], 10) : undefined;
}

/**
 * Extract posting titles from raw markup
 */
export function extractPostings(
  html: string,
  strategies: readonly NamedStrategy[] = DEFAULT_STRATEGIES
): ExtractionResult {
  const siteTotal = extractSiteTotal(html);

  for (const strategy of strategies) {
    const postings = normalizeTitles(strategy.run(html));
    if (postings.length > 0) {
      return { postings, strategy: strategy.name, siteTotal };
    }
  }

  return { postings: [], strategy: 'none', siteTotal };
}
