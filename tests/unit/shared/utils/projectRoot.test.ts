/**
 * Unit tests for findProjectRoot and titleOverrides
 */

import { describe, it, expect } from 'vitest';
import path from 'path';
import { findProjectRoot } from '../../../../src/shared/utils/projectRoot.js';
import { titleOverrides } from '../../../../src/shared/utils/titles.js';
import { ConfigLoader } from '../../../../src/shared/config/ConfigLoader.js';
import { MockFileSystem, RecordingLogger } from '../../../helpers/mocks.js';

describe('findProjectRoot', () => {
  it('should walk up to the nearest .git directory', async () => {
    const fs = new MockFileSystem();
    await fs.mkdir('/work/repo/.git', { recursive: true });
    await fs.mkdir('/work/repo/src/deep', { recursive: true });

    expect(await findProjectRoot(fs, '/work/repo/src/deep')).toBe(path.resolve('/work/repo'));
  });

  it('should return the start directory when no repository is found', async () => {
    const fs = new MockFileSystem();

    expect(await findProjectRoot(fs, '/tmp/scratch')).toBe(path.resolve('/tmp/scratch'));
  });
});

describe('titleOverrides', () => {
  it('should collect configured titles per role', () => {
    const config = new ConfigLoader(new MockFileSystem(), new RecordingLogger()).getDefaults();
    config.agents = { fixer: { title: 'QA' }, governor: {} };

    expect(titleOverrides(config)).toEqual({ fixer: 'QA' });
  });
});
