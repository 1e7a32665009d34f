/**
 * Application logger (pino)
 *
 * Writes JSON lines to stderr so stdout stays reserved for the report,
 * and mirrors them to LOG_FILE when one is configured.
 */

import pino, { type DestinationStream } from 'pino';
import { config } from '../config/index.js';

/** stderr, mirrored to `file` through a synchronous stream when one is set */
export function createDestination(file?: string): DestinationStream {
  const stderr = pino.destination(2);
  if (!file) {
    return stderr;
  }

  // entries pass everything through; the logger level does the filtering
  return pino.multistream([
    { level: 'trace', stream: stderr },
    {
      level: 'trace',
      stream: pino.destination({ dest: file, mkdir: true, sync: true }),
    },
  ]);
}

export const logger = pino(
  {
    name: config.app.name,
    level: config.logging.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      error: pino.stdSerializers.err,
    },
  },
  createDestination(config.logging.file)
);
