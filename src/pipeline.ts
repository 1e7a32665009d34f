/**
 * Watch Pipeline
 *
 * Orchestrates one run:
 * 1. Fetch the listing page (fatal on failure)
 * 2. Extract posting titles (degrades to an empty result)
 * 3. Write the console report
 * 4. Send the Telegram summary unless disabled or unconfigured
 */

import { formatConsoleReport, formatTelegramSummary } from './notifier/format.js';
import { logger } from './utils/logger.js';
import { NetworkError } from './utils/errors.js';
import type {
  ExtractionResult,
  NotificationConfig,
  NotificationOutcome,
  PageContent,
  RunOutcome,
} from './types/index.js';

/**
 * Collaborators, injected so a run can be exercised without the network
 */
export interface WatchDependencies {
  fetchPage: (url: string) => Promise<PageContent>;
  extractPostings: (html: string) => ExtractionResult;
  notify: (config: NotificationConfig, text: string) => Promise<NotificationOutcome>;
  writeReport: (report: string) => void;
}

/**
 * Run options
 */
export interface WatchOptions {
  url: string;
  /** False when notifications are turned off on the command line */
  notify: boolean;
  notification: NotificationConfig;
  heading: string;
}

function extractSafely(
  page: PageContent,
  extractPostings: WatchDependencies['extractPostings']
): ExtractionResult {
  try {
    return extractPostings(page.body);
  } catch (error) {
    logger.error({ error, url: page.url }, 'Extraction failed, reporting no postings');
    return { postings: [], strategy: 'none' };
  }
}

/**
 * Run the watch pipeline once
 */
export async function runWatch(options: WatchOptions, deps: WatchDependencies): Promise<RunOutcome> {
  const startTime = Date.now();
  logger.info({ url: options.url, notify: options.notify }, 'Starting watch run');

  // Step 1: Fetch
  let page: PageContent;
  try {
    page = await deps.fetchPage(options.url);
  } catch (error) {
    if (!(error instanceof NetworkError)) {
      throw error;
    }
    logger.error({ error, url: error.url, reason: error.reason, status: error.status }, 'Fetch failed');
    return {
      status: 'failed',
      exitCode: 1,
      count: 0,
      titles: [],
      strategy: 'none',
      notification: { status: 'skipped', reason: 'fetch failed' },
      error,
    };
  }

  // Step 2: Extract
  const extraction = extractSafely(page, deps.extractPostings);
  logger.info(
    { count: extraction.postings.length, strategy: extraction.strategy, siteTotal: extraction.siteTotal },
    'Extraction complete'
  );
  if (extraction.strategy === 'fallback') {
    logger.warn({ url: options.url }, 'Structural parser found nothing, postings come from the heuristic scan');
  }

  // Step 3: Report
  deps.writeReport(formatConsoleReport(extraction));

  // Step 4: Notify
  let notification: NotificationOutcome;
  if (!options.notify) {
    notification = { status: 'skipped', reason: 'disabled by --no-telegram' };
  } else {
    const summary = formatTelegramSummary(extraction, options.url, options.heading);
    notification = await deps.notify(options.notification, summary);
  }

  if (notification.status === 'skipped') {
    logger.info({ reason: notification.reason }, 'Notification skipped');
  } else if (notification.status === 'failed') {
    logger.warn({ reason: notification.reason }, 'Notification failed, run still succeeds');
  }

  logger.info(
    { count: extraction.postings.length, notification: notification.status, durationMs: Date.now() - startTime },
    'Watch run complete'
  );

  return {
    status: 'completed',
    exitCode: 0,
    count: extraction.postings.length,
    titles: extraction.postings,
    strategy: extraction.strategy,
    siteTotal: extraction.siteTotal,
    notification,
  };
}
