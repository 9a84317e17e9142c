import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createLogger, formatLogLine } from '../src/logger.js';

describe('formatLogLine', () => {
  it('formats time, level, scope and message', () => {
    expect(formatLogLine('warn', 'shepherd:shop-api', 'Poll failed', new Date('2026-03-01T10:00:00.000Z'))).toBe(
      '[2026-03-01T10:00:00.000Z] [WARN] [shepherd:shop-api] Poll failed'
    );
  });
});

describe('createLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'shepherd-logger-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('appends every level to the file, creating its directory', () => {
    const file = join(dir, 'nested', 'shepherd.log');
    const logger = createLogger({ filePath: file });

    logger.info('started');
    logger.child('shop-api').debug('tick');

    const lines = readFileSync(file, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[.+\] \[INFO\] \[shepherd\] started$/);
    expect(lines[1]).toMatch(/^\[.+\] \[DEBUG\] \[shepherd:shop-api\] tick$/);
  });

  it('echoes debug records to stderr only when verbose', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    createLogger({ filePath: null }).debug('quiet');
    expect(stderr).not.toHaveBeenCalled();

    createLogger({ filePath: null, verbose: true }).debug('loud');
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0]?.[0])).toMatch(/\[DEBUG\] \[shepherd\] loud\n$/);
  });

  it('disables the file sink after a failed append and says so once', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    // The log path is a directory, so appends fail
    const logger = createLogger({ filePath: dir });

    logger.info('one');
    logger.info('two');

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0]?.[0])).toContain(`[shepherd] Logging to ${dir} disabled:`);
  });
});
