#!/usr/bin/env node
/**
 * Job Postings Watch
 *
 * Run-once watcher that:
 * 1. Fetches a job board listing page over HTTPS
 * 2. Extracts the posting titles (structural parser, heuristic fallback)
 * 3. Prints the count and titles to stdout
 * 4. Sends a summary to Telegram when TELEGRAM_BOT_TOKEN/TELEGRAM_CHAT_ID are set
 *
 * Usage:
 *   node dist/index.js                    - Watch TARGET_URL and notify
 *   node dist/index.js --no-telegram      - Print only
 *   node dist/index.js --url <https-url>  - Watch another listing
 *
 * Scheduling is left to cron or a systemd timer.
 */

import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { ConfigError, toWatcherError } from './utils/errors.js';
import { loadTrustedCertificates } from './utils/tls.js';
import { parseArgs, USAGE, type CliOptions } from './cli.js';
import { runWatch } from './pipeline.js';
import { fetchPage, extractPostings } from './scraper/index.js';
import { notify, isTelegramConfigured } from './notifier/index.js';

function registerSignalHandlers(): void {
  const exitOn = (signal: NodeJS.Signals, code: number): void => {
    process.on(signal, () => {
      logger.warn({ signal }, 'Received signal, shutting down');
      process.exit(code);
    });
  };

  exitOn('SIGINT', 130);
  exitOn('SIGTERM', 143);
}

async function main(): Promise<number> {
  let cli: CliOptions;
  try {
    cli = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ConfigError) {
      process.stderr.write(`${error.message}\n\n${USAGE}\n`);
      return 2;
    }
    throw error;
  }

  if (cli.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  registerSignalHandlers();

  const destination = { token: config.telegram.token, chatId: config.telegram.chatId };
  logger.debug(
    { env: config.app.env, telegram: isTelegramConfigured(destination), notify: cli.notify },
    'Configuration loaded'
  );

  let ca: string[];
  try {
    ca = await loadTrustedCertificates(config.fetcher.caBundlePath);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ error }, 'Invalid TLS configuration');
      return 2;
    }
    throw error;
  }

  const outcome = await runWatch(
    {
      url: cli.url ?? config.target.url,
      notify: cli.notify,
      notification: destination,
      heading: config.telegram.heading,
    },
    {
      fetchPage: (url) =>
        fetchPage(url, {
          ca,
          timeoutMs: config.fetcher.timeout,
          userAgent: config.fetcher.userAgent,
          maxBytes: config.fetcher.maxBytes,
          retry: config.retry,
        }),
      extractPostings,
      notify: (destination, text) =>
        notify(destination, text, {
          ca,
          apiBaseUrl: config.telegram.apiBaseUrl,
          timeoutMs: config.telegram.timeout,
        }),
      writeReport: (report) => {
        process.stdout.write(`${report}\n`);
      },
    }
  );

  if (outcome.status === 'failed') {
    process.stderr.write(`Fetch failed: ${outcome.error?.message ?? 'unknown error'}\n`);
  }

  return outcome.exitCode;
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.fatal({ error: toWatcherError(error) }, 'Application failed');
    process.exitCode = 1;
  });
