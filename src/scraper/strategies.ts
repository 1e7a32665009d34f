/**
 * Posting title strategies
 *
 * Each strategy is a pure `(html) => titles` function. The structural one
 * relies on the board's link markup; the heuristic one only scans text and
 * keeps working when that markup drifts.
 */

import * as cheerio from 'cheerio';
import { hasChildren, isText, type AnyNode } from 'domhandler';
import { decodeHTML } from 'entities';
import { normalizeWhitespace } from '../utils/text.js';
import type { ExtractionStrategy } from './types.js';

const NAVIGATION_LABELS = new Set([
  'vacancies',
  'back',
  'view vacancies',
  'вакансии',
  'назад',
  'смотреть вакансии',
]);

const MIN_TITLE_LENGTH = 5;

/**
 * Decide whether an anchor points at a single posting rather than at the
 * listing itself, a filter or a navigation item.
 */
export function isPostingLink(
  href: string,
  text: string,
  isListingSegment: (segment: string) => boolean = (segment) => segment === 'vacancies'
): boolean {
  const label = text.trim().toLowerCase();
  if (label.length < MIN_TITLE_LENGTH || NAVIGATION_LABELS.has(label)) {
    return false;
  }
  if (href.includes('action=filter')) {
    return false;
  }

  const path = href.split(/[?#]/)[0] ?? '';
  const segments = path.split('/').filter(Boolean);
  const index = segments.findIndex((segment) => isListingSegment(segment.toLowerCase()));

  // posting links have at least one segment below the listing
  return index >= 0 && segments.length - (index + 1) >= 1;
}

/** Inner markup to plain text, with a space wherever a tag was. */
export function textFromMarkup(markup: string): string {
  return normalizeWhitespace(decodeHTML(markup.replace(/<[^>]*>/g, ' ')));
}

function textNodes(nodes: readonly AnyNode[]): string[] {
  return nodes.flatMap((node) => {
    if (isText(node)) {
      return [node.data];
    }
    return hasChildren(node) ? textNodes(node.children) : [];
  });
}

/** Text of a parsed element, its text nodes joined by a space. */
export function textFromNode(node: AnyNode): string {
  return normalizeWhitespace(textNodes([node]).join(' '));
}

/**
 * Structural strategy: anchors into the `/vacancies/` tree
 */
export const structuralStrategy: ExtractionStrategy = (html) => {
  const $ = cheerio.load(html);
  const titles: string[] = [];

  $('a[href*="/vacancies/"]').each((_, anchor) => {
    const href = $(anchor).attr('href') ?? '';
    const text = textFromNode(anchor);
    if (isPostingLink(href, text)) {
      titles.push(text);
    }
  });

  return titles;
};

const JSON_LD_BLOCK = /<script[^>]+type\s*=\s*["']application\/ld\+json["'][^>]*>([\s\S]*?)<\/script>/gi;
const ANCHOR = /<a\b([^>]*)>([\s\S]*?)<\/a\s*>/gi;
const HREF_ATTRIBUTE = /\bhref\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+))/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function jsonLdItems(data: unknown): Record<string, unknown>[] {
  if (Array.isArray(data)) {
    return data.flatMap(jsonLdItems);
  }
  if (!isRecord(data)) {
    return [];
  }
  const graph = data['@graph'];
  return Array.isArray(graph) ? [data, ...graph.flatMap(jsonLdItems)] : [data];
}

function isJobItem(item: Record<string, unknown>): boolean {
  const type = String(item['@type'] ?? '').toLowerCase();
  return type.includes('jobposting') || type.includes('job') || type.includes('vacancy');
}

/**
 * JobPosting titles from JSON-LD blocks; unparseable blocks are skipped
 */
export function jsonLdTitles(html: string): string[] {
  const titles: string[] = [];

  for (const match of html.matchAll(JSON_LD_BLOCK)) {
    let data: unknown;
    try {
      data = JSON.parse(decodeHTML(match[1] ?? '').trim());
    } catch {
      continue;
    }

    for (const item of jsonLdItems(data)) {
      if (!isJobItem(item)) {
        continue;
      }
      const title = item['jobTitle'] ?? item['title'];
      if (typeof title === 'string') {
        titles.push(title);
      }
    }
  }

  return titles;
}

/**
 * Anchors whose href mentions any `/vacanc...` segment, found without a DOM
 */
export function looseAnchorTitles(html: string): string[] {
  const titles: string[] = [];

  for (const match of html.matchAll(ANCHOR)) {
    const attributes = match[1] ?? '';
    const hrefMatch = HREF_ATTRIBUTE.exec(attributes);
    const href = decodeHTML(hrefMatch?.[1] ?? hrefMatch?.[2] ?? hrefMatch?.[3] ?? '');
    if (!/\/vacanc/i.test(href)) {
      continue;
    }

    const text = textFromMarkup(match[2] ?? '');
    if (isPostingLink(href, text, (segment) => segment.startsWith('vacanc'))) {
      titles.push(text);
    }
  }

  return titles;
}

/**
 * Heuristic strategy: JSON-LD first, then the loose anchor scan
 */
export const heuristicStrategy: ExtractionStrategy = (html) => {
  const fromJsonLd = jsonLdTitles(html);
  return fromJsonLd.some((title) => title.trim()) ? fromJsonLd : looseAnchorTitles(html);
};
