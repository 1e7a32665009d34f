/**
 * Scraper Types
 */

import type { ExtractionStrategyName } from '../types/index.js';

/**
 * Pure function from raw markup to raw, un-normalized titles
 */
export type ExtractionStrategy = (html: string) => string[];

/**
 * A strategy together with the name reported when it wins
 */
export interface NamedStrategy {
  name: ExtractionStrategyName;
  run: ExtractionStrategy;
}
