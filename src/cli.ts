/**
 * Command line parsing
 */

import { ConfigError } from './utils/errors.js';

export interface CliOptions {
  url?: string;
  notify: boolean;
  help: boolean;
}

export const USAGE = `Usage: job-postings-watch [options]

Options:
  --url <url>      Listing page to watch (default: TARGET_URL)
  --no-telegram    Do not send the Telegram summary
  --help           Show this message`;

export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { notify: true, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg === '--no-telegram') {
      options.notify = false;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--url') {
      const value = args[i + 1];
      if (!value || value.startsWith('--')) {
        throw new ConfigError('--url requires a value', { arg });
      }
      options.url = value;
      i++;
    } else if (arg.startsWith('--url=')) {
      options.url = arg.slice('--url='.length);
    } else {
      throw new ConfigError(`Unknown option: ${arg}`, { arg });
    }
  }

  if (options.url !== undefined && !/^https:\/\/\S+$/.test(options.url)) {
    throw new ConfigError(`--url must be an https URL, got "${options.url}"`, { url: options.url });
  }

  return options;
}
