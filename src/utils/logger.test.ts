import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pino } from 'pino';
import { createDestination } from './logger.js';

describe('createDestination', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'watch-log-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('has the log file written by the time the call returns', () => {
    const file = join(dir, 'nested', 'watch.log');
    const log = pino({ level: 'fatal' }, createDestination(file));

    log.fatal({ code: 1 }, 'Application failed');

    const lines = readFileSync(file, 'utf8').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({ level: 60, msg: 'Application failed', code: 1 });
  });
});
