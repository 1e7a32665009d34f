/**
 * Core types for the job postings watcher
 */

/**
 * Raw page as returned by the fetcher
 */
export interface PageContent {
  url: string;
  finalUrl: string;
  status: number;
  contentType: string;
  body: string;
  truncated: boolean;
}

/** A single job title, trimmed and non-empty. */
export type Posting = string;

export type ExtractionStrategyName = 'primary' | 'fallback';

export interface ExtractionResult {
  postings: Posting[];
  strategy: ExtractionStrategyName | 'none';
  /** Total advertised by the page's own counter, when it has one */
  siteTotal?: number;
}

export interface NotificationConfig {
  token?: string;
  chatId?: string;
}

export type NotificationOutcome =
  | { status: 'sent' }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; reason: string };

export type RunStatus = 'completed' | 'failed';

export interface RunOutcome {
  status: RunStatus;
  exitCode: number;
  count: number;
  titles: Posting[];
  strategy: ExtractionResult['strategy'];
  siteTotal?: number;
  notification: NotificationOutcome;
  error?: Error;
}

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}
