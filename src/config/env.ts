/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';
import { ConfigError } from '../utils/errors.js';

const DEFAULT_TARGET_URL =
  'https://career.avito.com/vacancies/razrabotka/?q=&action=filter&direction=razrabotka&tags%5B%5D=s26502';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36';

/** Unset and blank values both mean "not configured". */
const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

export const envSchema = z.object({
  // Target page
  TARGET_URL: z.string().url().startsWith('https://').default(DEFAULT_TARGET_URL),

  // Telegram (both optional: notifications are disabled unless both are set)
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_CHAT_ID: optionalString,
  TELEGRAM_API_BASE_URL: z.string().url().default('https://api.telegram.org'),
  NOTIFY_HEADING: z.string().min(1).default('Job postings watch'),

  // Fetching
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(25000),
  NOTIFY_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  FETCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(1),
  MAX_RESPONSE_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  CA_BUNDLE_PATH: optionalString,
  USER_AGENT: optionalString.transform((value) => value ?? DEFAULT_USER_AGENT),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_FILE: optionalString,

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    throw new ConfigError(
      `Environment validation failed:\n${JSON.stringify(errors, null, 2)}`,
      { keys: Object.keys(errors) }
    );
  }

  return result.data;
}

export const env = parseEnv(process.env);
