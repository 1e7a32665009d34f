/**
 * Page Fetcher
 *
 * Single HTTPS GET against the watched listing, verified against an explicit
 * certificate list. Retries only when a retry policy is passed in.
 */

import type { ReadableStream } from 'node:stream/web';
import { fetch, type Dispatcher } from 'undici';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { createTrustedAgent } from '../utils/tls.js';
import { NetworkError } from '../utils/errors.js';
import type { PageContent, RetryConfig } from '../types/index.js';

export const DEFAULT_MAX_BYTES = 5 * 1024 * 1024;

/**
 * Fetch options
 */
export interface FetchPageOptions {
  timeoutMs: number;
  /** PEM certificates trusted for this request */
  ca: string[];
  userAgent?: string;
  maxBytes?: number;
  /** Omit for a single attempt */
  retry?: Partial<RetryConfig>;
  /** Overrides the trusted agent built from `ca` */
  dispatcher?: Dispatcher;
}

function isRetryable(error: Error): boolean {
  if (!(error instanceof NetworkError)) {
    return false;
  }
  if (error.reason === 'timeout' || error.reason === 'connection') {
    return true;
  }
  const status = error.status ?? 0;
  return status === 408 || status === 429 || (status >= 500 && status <= 599);
}

/**
 * Pick the charset declared in a Content-Type header
 */
export function charsetOf(contentType: string): string {
  const match = /charset=["']?([\w-]+)/i.exec(contentType);
  return match?.[1]?.toLowerCase() ?? 'utf-8';
}

function decode(bytes: Uint8Array, charset: string): string {
  let decoder: InstanceType<typeof TextDecoder>;
  try {
    decoder = new TextDecoder(charset);
  } catch {
    logger.warn({ charset }, 'Unknown charset, decoding as utf-8');
    decoder = new TextDecoder('utf-8');
  }
  return decoder.decode(bytes);
}

async function readCapped(
  body: ReadableStream<Uint8Array>,
  maxBytes: number
): Promise<{ bytes: Uint8Array; truncated: boolean }> {
  const reader = body.getReader();
  const chunks: Uint8Array[] = [];
  let size = 0;
  let truncated = false;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    if (size + value.byteLength > maxBytes) {
      chunks.push(value.subarray(0, maxBytes - size));
      size = maxBytes;
      truncated = true;
      await reader.cancel();
      break;
    }
    chunks.push(value);
    size += value.byteLength;
  }

  const bytes = new Uint8Array(size);
  let offset = 0;
  for (const chunk of chunks) {
    bytes.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return { bytes, truncated };
}

function classify(error: unknown, url: string, timeoutMs: number): NetworkError {
  if (error instanceof NetworkError) {
    return error;
  }
  const name = error instanceof Error ? error.name : '';
  if (name === 'TimeoutError' || name === 'AbortError') {
    return new NetworkError(`Request to ${url} timed out after ${timeoutMs}ms`, { url, reason: 'timeout' }, { cause: error });
  }
  const detail = error instanceof Error && error.cause instanceof Error ? error.cause.message : String(error);
  return new NetworkError(`Request to ${url} failed: ${detail}`, { url, reason: 'connection' }, { cause: error });
}

async function fetchOnce(
  url: string,
  options: FetchPageOptions,
  dispatcher: Dispatcher,
  attempt: number
): Promise<PageContent> {
  const { timeoutMs, userAgent, maxBytes = DEFAULT_MAX_BYTES } = options;

  logger.info({ url, attempt }, 'Fetching page');

  try {
    const response = await fetch(url, {
      dispatcher,
      signal: AbortSignal.timeout(timeoutMs),
      headers: {
        'user-agent': userAgent ?? 'Mozilla/5.0 (compatible; JobPostingsWatch/1.0)',
        accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      },
    });

    if (!response.ok) {
      await response.body?.cancel();
      throw new NetworkError(`Request to ${url} returned HTTP ${response.status}`, {
        url,
        reason: 'status',
        status: response.status,
      });
    }

    const contentType = response.headers.get('content-type') ?? '';
    const { bytes, truncated } = response.body
      ? await readCapped(response.body, maxBytes)
      : { bytes: new Uint8Array(0), truncated: false };

    const body = decode(bytes, charsetOf(contentType));
    if (!body.trim()) {
      throw new NetworkError(`Request to ${url} returned an empty body`, {
        url,
        reason: 'empty-body',
        status: response.status,
      });
    }

    if (truncated) {
      logger.warn({ url, maxBytes }, 'Response body exceeded the size cap and was truncated');
    }

    logger.info({ url, status: response.status, bytes: bytes.byteLength }, 'Page fetched');

    return {
      url,
      finalUrl: response.url || url,
      status: response.status,
      contentType,
      body,
      truncated,
    };
  } catch (error) {
    throw classify(error, url, timeoutMs);
  }
}

/**
 * Fetch the watched page
 */
export async function fetchPage(url: string, options: FetchPageOptions): Promise<PageContent> {
  if (options.dispatcher) {
    return fetchWithPolicy(url, options, options.dispatcher);
  }

  const agent = createTrustedAgent(options.ca);
  try {
    return await fetchWithPolicy(url, options, agent);
  } finally {
    await agent.close();
  }
}

function fetchWithPolicy(url: string, options: FetchPageOptions, dispatcher: Dispatcher): Promise<PageContent> {
  return withRetry((attempt) => fetchOnce(url, options, dispatcher, attempt), {
    ...options.retry,
    maxAttempts: options.retry?.maxAttempts ?? 1,
    shouldRetry: isRetryable,
    context: { url },
  });
}
