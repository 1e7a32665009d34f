/**
 * Report and summary formatting
 */

import { escapeHtml } from '../utils/text.js';
import type { ExtractionResult } from '../types/index.js';

type Summary = Pick<ExtractionResult, 'postings' | 'siteTotal'>;

/** Telegram caps messages at 4096 characters */
export const MAX_MESSAGE_LENGTH = 4000;

function pluralize(count: number): string {
  return `${count} posting${count === 1 ? '' : 's'}`;
}

/**
 * Plain-text report for stdout
 */
export function formatConsoleReport({ postings, siteTotal }: Summary): string {
  if (postings.length === 0) {
    return 'No postings found';
  }

  const reported =
    siteTotal !== undefined && siteTotal !== postings.length ? ` (page reports ${siteTotal})` : '';

  return [`Found ${pluralize(postings.length)}${reported}:`, ...postings.map((title) => `- ${title}`)].join('\n');
}

/**
 * HTML summary for Telegram (parse_mode=HTML)
 *
 * Titles that do not fit in `maxLength` are replaced by a `+N more` line;
 * the heading, count and link are always kept.
 */
export function formatTelegramSummary(
  { postings }: Summary,
  url: string,
  heading: string,
  maxLength = MAX_MESSAGE_LENGTH
): string {
  const head = [`<b>${escapeHtml(heading)}</b>`];
  const link = `Link: ${escapeHtml(url)}`;

  if (postings.length === 0) {
    return [...head, '0 postings found', link].join('\n');
  }

  head.push(`Found: <b>${pluralize(postings.length)}</b>`);
  const titles = postings.map(escapeHtml);
  const render = (shown: number): string => {
    const hidden = titles.length - shown;
    return [...head, ...titles.slice(0, shown), ...(hidden > 0 ? [`+${hidden} more`] : []), link].join('\n');
  };

  let shown = titles.length;
  let text = render(shown);
  while (text.length > maxLength && shown > 0) {
    shown -= 1;
    text = render(shown);
  }
  return text;
}

/**
 * Cut a message to the last whole line that fits. A single oversized line is
 * cut on a code point boundary, without a dangling entity or tag.
 */
export function fitMessage(text: string, maxLength = MAX_MESSAGE_LENGTH): string {
  if (text.length <= maxLength) {
    return text;
  }

  let fitted = '';
  for (const line of text.split('\n')) {
    const next = fitted ? `${fitted}\n${line}` : line;
    if (next.length > maxLength) {
      break;
    }
    fitted = next;
  }
  if (fitted) {
    return fitted;
  }

  let cut = '';
  for (const char of text) {
    if (cut.length + char.length > maxLength) {
      break;
    }
    cut += char;
  }
  return cut.replace(/&[^;\s]*$|<[^>]*$/, '');
}
