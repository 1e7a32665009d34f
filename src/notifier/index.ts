/**
 * Notifier Module
 *
 * Telegram summary of a watch run
 */

export {
  notify,
  isTelegramConfigured,
  resolveDestination,
  MAX_MESSAGE_LENGTH,
  type NotifyOptions,
} from './telegram.js';

export { formatConsoleReport, formatTelegramSummary, fitMessage } from './format.js';
