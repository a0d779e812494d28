import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createFileLogger, formatLogLine } from '../logger.js';

const FIXED = new Date('2026-01-02T03:04:05.000Z');

describe('formatLogLine', () => {
  it('should write timestamp, level and message', () => {
    expect(formatLogLine(FIXED, 'warn', 'slow response')).toBe('2026-01-02T03:04:05.000Z - WARN - slow response\n');
  });
});

describe('createFileLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'recall-log-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should append lines at or above the threshold', () => {
    const file = join(dir, 'debug.log');
    const logger = createFileLogger({ file, level: 'info', now: () => FIXED });

    logger.debug('hidden');
    logger.info('Startup: Complete.');
    logger.error('Generation error: boom');

    expect(readFileSync(file, 'utf-8')).toBe(
      '2026-01-02T03:04:05.000Z - INFO - Startup: Complete.\n' +
        '2026-01-02T03:04:05.000Z - ERROR - Generation error: boom\n'
    );
  });

  it('should create missing parent directories', () => {
    const file = join(dir, 'logs', 'nested', 'recall.log');
    const logger = createFileLogger({ file, now: () => FIXED });

    logger.warn('first line');

    expect(readFileSync(file, 'utf-8')).toBe('2026-01-02T03:04:05.000Z - WARN - first line\n');
  });

  it('should not touch the disk when everything is filtered', () => {
    const file = join(dir, 'quiet', 'recall.log');
    const logger = createFileLogger({ file, level: 'error', now: () => FIXED });

    logger.info('ignored');

    expect(existsSync(file)).toBe(false);
  });
});
