import { describe, expect, it, vi } from 'vitest';
import { extractPostings, extractSiteTotal, normalizeTitles } from './extractor.js';
import { heuristicStrategy } from './strategies.js';
import type { NamedStrategy } from './types.js';
import { DRIFTED_PAGE, EMPTY_PAGE, JSON_LD_PAGE, LISTING_PAGE } from '../__fixtures__/pages.js';

describe('normalizeTitles', () => {
  it('trims, dedupes and keeps first-seen order', () => {
    expect(normalizeTitles(['A', ' A ', 'B', 'A'])).toEqual(['A', 'B']);
  });

  it('drops empty titles', () => {
    expect(normalizeTitles(['', '   ', 'QA Lead'])).toEqual(['QA Lead']);
  });

  it('compares case-sensitively', () => {
    expect(normalizeTitles(['qa lead', 'QA Lead'])).toEqual(['qa lead', 'QA Lead']);
  });
});

describe('extractPostings', () => {
  it('returns unique structural titles in document order', () => {
    const result = extractPostings(LISTING_PAGE);

    expect(result.strategy).toBe('primary');
    expect(result.postings).toEqual(['QA Engineer (Mobile)', 'QA Automation Engineer (Backend)']);
  });

  it('falls back to the heuristic scan when markup drifts', () => {
    const result = extractPostings(DRIFTED_PAGE);

    expect(result.strategy).toBe('fallback');
    expect(result.postings).toEqual(['QA Engineer (Mobile)', 'QA Lead & Mentor']);
  });

  it('decodes named entities on the fallback path', () => {
    const result = extractPostings('<a href="/vacancy/qa-1">QA &laquo;Mobile&raquo; &mdash; Senior</a>');

    expect(result).toMatchObject({ strategy: 'fallback', postings: ['QA «Mobile» — Senior'] });
  });

  it('equals the normalized heuristic output whenever the structural parser finds nothing', () => {
    for (const html of [DRIFTED_PAGE, JSON_LD_PAGE, EMPTY_PAGE]) {
      expect(extractPostings(html).postings).toEqual(normalizeTitles(heuristicStrategy(html)));
    }
  });

  it('prefers JSON-LD postings inside the fallback', () => {
    expect(extractPostings(JSON_LD_PAGE)).toEqual({
      postings: ['QA Engineer (Mobile)', 'Performance QA Engineer'],
      strategy: 'fallback',
      siteTotal: undefined,
    });
  });

  it('reports none for a page without postings', () => {
    expect(extractPostings(EMPTY_PAGE)).toEqual({ postings: [], strategy: 'none', siteTotal: undefined });
  });

  it('is idempotent', () => {
    expect(extractPostings(LISTING_PAGE)).toEqual(extractPostings(LISTING_PAGE));
    expect(extractPostings(DRIFTED_PAGE)).toEqual(extractPostings(DRIFTED_PAGE));
  });

  it('never runs later strategies once one yields titles', () => {
    const fallback = vi.fn(() => ['B']);
    const strategies: NamedStrategy[] = [
      { name: 'primary', run: () => [' A ', 'A'] },
      { name: 'fallback', run: fallback },
    ];

    expect(extractPostings('<p></p>', strategies).postings).toEqual(['A']);
    expect(fallback).not.toHaveBeenCalled();
  });

  it('moves on when a strategy yields only blank titles', () => {
    const fallback = vi.fn(() => ['B']);
    const strategies: NamedStrategy[] = [
      { name: 'primary', run: () => ['  ', ''] },
      { name: 'fallback', run: fallback },
    ];

    const result = extractPostings('<p></p>', strategies);

    expect(result.strategy).toBe('fallback');
    expect(result.postings).toEqual(['B']);
    expect(fallback).toHaveBeenCalledWith('<p></p>');
  });
});

describe('extractSiteTotal', () => {
  it('reads the counter rendered above the list', () => {
    expect(extractSiteTotal(LISTING_PAGE)).toBe(3);
    expect(extractPostings(LISTING_PAGE).siteTotal).toBe(3);
  });

  it('is undefined when the counter is missing', () => {
    expect(extractSiteTotal(EMPTY_PAGE)).toBeUndefined();
  });
});
