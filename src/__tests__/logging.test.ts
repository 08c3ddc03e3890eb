import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLogger, formatContext } from '../logging.js';

describe('createLogger', () => {
  let level: typeof chalk.level;
  let dir: string;

  beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'eln-migrate-log-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes messages at or above the console level', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'warn', write: (line) => lines.push(line) });

    logger.debug('noise');
    logger.info('progress');
    logger.warn('disk slow', { path: '/tmp/x' });
    logger.error('boom');

    expect(lines).toEqual(['⚠ disk slow (path=/tmp/x)', '✗ boom']);
  });

  it('appends every level to the log file', async () => {
    const lines: string[] = [];
    const file = join(dir, 'logs', 'run.log');
    const logger = createLogger({ level: 'silent', file, write: (line) => lines.push(line) });

    logger.debug('fetched page', { offset: 0 });
    logger.error('failed');
    await logger.close();

    const written = (await readFile(file, 'utf-8')).split('\n');
    expect(lines).toEqual([]);
    expect(written[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+Z \[DEBUG\] fetched page \(offset=0\)$/);
    expect(written[1]).toMatch(/^\S+ \[ERROR\] failed$/);
    expect(written[2]).toBe('');
  });
});

describe('formatContext', () => {
  it('skips undefined values', () => {
    expect(formatContext({ a: 1, b: undefined, c: null })).toBe(' (a=1, c=null)');
    expect(formatContext({})).toBe('');
    expect(formatContext()).toBe('');
  });
});
