/**
 * Unit tests for Logger
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Logger, runStamp } from '../../../../src/shared/utils/logger.js';

describe('Logger', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'pentad-logger-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    if (testDir) {
      await rm(testDir, { recursive: true, force: true });
    }
  });

  it('should enable file logging in a writable directory', async () => {
    const logger = new Logger({ logDir: join(testDir, 'logs'), fileName: 'fixer.log', console: false });

    logger.info('Agent started', { role: 'fixer' });
    logger.child('supervisor').debug('Hidden below info');

    expect(logger.fileLogging).toBe(true);
    await logger.close();
  });

  it('should fall back to console-only logging when the directory cannot be created', async () => {
    const blocker = join(testDir, 'not-a-dir');
    await writeFile(blocker, 'x');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new Logger({ logDir: join(blocker, 'logs'), console: false });

    expect(logger.fileLogging).toBe(false);
    expect(warn).toHaveBeenCalledTimes(1);
    await logger.close();
  });
});

describe('runStamp', () => {
  it('should format local time as a sortable stamp', () => {
    expect(runStamp(new Date(2026, 9, 18, 9, 30, 5))).toBe('20261018-093005');
  });
});
