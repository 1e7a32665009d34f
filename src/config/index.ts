/**
 * Application configuration
 */

import { env } from './env.js';

export const config = {
  app: {
    name: 'job-postings-watch',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  target: {
    url: env.TARGET_URL,
  },

  telegram: {
    token: env.TELEGRAM_BOT_TOKEN,
    chatId: env.TELEGRAM_CHAT_ID,
    apiBaseUrl: env.TELEGRAM_API_BASE_URL,
    heading: env.NOTIFY_HEADING,
    timeout: env.NOTIFY_TIMEOUT_MS,
  },

  fetcher: {
    userAgent: env.USER_AGENT,
    timeout: env.FETCH_TIMEOUT_MS,
    maxBytes: env.MAX_RESPONSE_BYTES,
    caBundlePath: env.CA_BUNDLE_PATH,
  },

  logging: {
    level: env.NODE_ENV === 'test' ? 'silent' : env.LOG_LEVEL,
    file: env.LOG_FILE,
  },

  retry: {
    maxAttempts: env.FETCH_MAX_ATTEMPTS,
    initialDelayMs: 1000,
    maxDelayMs: 30000,
    factor: 2,
  },
} as const;

export type Config = typeof config;
export { env, parseEnv, type Env } from './env.js';
