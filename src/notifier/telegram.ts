/**
 * Telegram Notifier
 *
 * Sends the run summary through the Bot API `sendMessage` method.
 * Failures are returned as values: a lost notification never fails the run.
 */

import { fetch, type Dispatcher } from 'undici';
import { logger } from '../utils/logger.js';
import { createTrustedAgent } from '../utils/tls.js';
import { fitMessage, MAX_MESSAGE_LENGTH } from './format.js';
import type { NotificationConfig, NotificationOutcome } from '../types/index.js';

export { MAX_MESSAGE_LENGTH };

/**
 * Notifier options
 */
export interface NotifyOptions {
  apiBaseUrl?: string;
  timeoutMs?: number;
  /** PEM certificates trusted for the Bot API connection */
  ca?: string[];
  /** Overrides the agent built from `ca` */
  dispatcher?: Dispatcher;
}

/**
 * Both destination fields, trimmed, or null when notifications are disabled
 */
export function resolveDestination(config: NotificationConfig): { token: string; chatId: string } | null {
  const token = config.token?.trim() ?? '';
  const chatId = config.chatId?.trim() ?? '';
  return token && chatId ? { token, chatId } : null;
}

/**
 * Check if notifications are configured
 */
export function isTelegramConfigured(config: NotificationConfig): boolean {
  return resolveDestination(config) !== null;
}

async function describeFailure(response: { status: number; text(): Promise<string> }): Promise<string> {
  const body = await response.text().catch(() => '');
  let description = body || `HTTP ${response.status}`;

  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === 'object' && parsed !== null && 'description' in parsed && typeof parsed.description === 'string') {
      description = parsed.description;
    }
  } catch {
    // not JSON, keep the raw body
  }

  const reason = `HTTP ${response.status}: ${description}`;
  return response.status === 401 ? `${reason} (check TELEGRAM_BOT_TOKEN/TELEGRAM_CHAT_ID)` : reason;
}

async function send(
  destination: { token: string; chatId: string },
  text: string,
  options: NotifyOptions,
  dispatcher: Dispatcher
): Promise<NotificationOutcome> {
  const { apiBaseUrl = 'https://api.telegram.org', timeoutMs = 20000 } = options;
  const endpoint = `${apiBaseUrl.replace(/\/+$/, '')}/bot${destination.token}/sendMessage`;

  const payload = new URLSearchParams({
    chat_id: destination.chatId,
    text: fitMessage(text),
    parse_mode: 'HTML',
    disable_web_page_preview: 'true',
  });

  try {
    const response = await fetch(endpoint, {
      method: 'POST',
      dispatcher,
      signal: AbortSignal.timeout(timeoutMs),
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: payload.toString(),
    });

    if (!response.ok) {
      const reason = await describeFailure(response);
      logger.warn({ status: response.status, reason }, 'Telegram rejected the notification');
      return { status: 'failed', reason };
    }

    await response.body?.cancel();
    logger.info({ chatId: destination.chatId }, 'Telegram notification sent');
    return { status: 'sent' };
  } catch (error) {
    const reason =
      error instanceof Error && error.name === 'TimeoutError'
        ? `timed out after ${timeoutMs}ms`
        : error instanceof Error && error.cause instanceof Error
          ? error.cause.message
          : String(error);
    logger.warn({ error, reason }, 'Failed to send Telegram notification');
    return { status: 'failed', reason };
  }
}

/**
 * Send the summary if a destination is configured
 */
export async function notify(
  config: NotificationConfig,
  text: string,
  options: NotifyOptions = {}
): Promise<NotificationOutcome> {
  const destination = resolveDestination(config);
  if (!destination) {
    return { status: 'skipped', reason: 'TELEGRAM_BOT_TOKEN/TELEGRAM_CHAT_ID not configured' };
  }

  if (options.dispatcher) {
    return send(destination, text, options, options.dispatcher);
  }

  const agent = createTrustedAgent(options.ca);
  try {
    return await send(destination, text, options, agent);
  } finally {
    await agent.close();
  }
}
