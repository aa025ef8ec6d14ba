/**
 * Unit tests for PentadInitializer
 */

import { describe, it, expect, beforeEach } from 'vitest';
import yaml from 'yaml';
import { GoalParser } from '@pentad/core';
import { PentadInitializer } from '../../../src/core/PentadInitializer.js';
import { ConfigLoader } from '../../../src/shared/config/ConfigLoader.js';
import { workspacePaths } from '../../../src/shared/config/paths.js';
import { MockFileSystem, RecordingLogger } from '../../helpers/mocks.js';

const ROOT = '/project';
const NOW = new Date('2026-03-01T12:00:00.000Z');

class FailingFileSystem extends MockFileSystem {
  async mkdir(): Promise<void> {
    throw new Error('disk full');
  }
}

describe('PentadInitializer', () => {
  let fs: MockFileSystem;
  let logger: RecordingLogger;
  let configLoader: ConfigLoader;
  let initializer: PentadInitializer;
  const paths = workspacePaths(ROOT);

  beforeEach(() => {
    fs = new MockFileSystem();
    logger = new RecordingLogger();
    configLoader = new ConfigLoader(fs, logger);
    initializer = new PentadInitializer(fs, configLoader, logger, () => NOW);
  });

  describe('initializeWorkspace', () => {
    it('should create every directory and file', async () => {
      const result = await initializer.initializeWorkspace(ROOT);

      expect(result.success).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.created).toEqual([
        '.pentad/',
        '.pentad/protocols/',
        '.pentad/logs/',
        '.pentad/communication/',
        'features/',
        '.pentad/goal.yaml',
        '.pentad/protocols/rules.yml',
        '.pentad/communication/config.yml',
        '.pentad/.gitignore',
      ]);
    });

    it('should stamp the goal template with the current time', async () => {
      await initializer.initializeWorkspace(ROOT);

      const goal = new GoalParser().parse(fs.getFileContent(paths.goal) ?? '');

      expect(goal?.primary).toBe('Describe the single most important outcome of this repository');
      expect(goal?.metadata.created).toBe('2026-03-01T12:00:00.000Z');
      expect(goal?.metadata.lastUpdated).toBe('2026-03-01T12:00:00.000Z');
      expect(goal?.scope.excluded).toBe('');
    });

    it('should write the default rules and broker config', async () => {
      await initializer.initializeWorkspace(ROOT);

      const rules = yaml.parse(fs.getFileContent(paths.rules) ?? '');
      expect(rules.created).toBe('2026-03-01T12:00:00.000Z');
      expect(rules.maxRulesLimit).toBe(10);

      const config = await configLoader.load({ projectRoot: ROOT, env: {} });
      expect(config).toEqual(configLoader.getDefaults());
    });

    it('should never overwrite existing files', async () => {
      await fs.writeFile(paths.goal, 'goal:\n  primary: "Keep me"\n');

      const result = await initializer.initializeWorkspace(ROOT);

      expect(result.created).not.toContain('.pentad/goal.yaml');
      expect(fs.getFileContent(paths.goal)).toBe('goal:\n  primary: "Keep me"\n');
    });

    it('should create nothing on a second run', async () => {
      await initializer.initializeWorkspace(ROOT);

      const second = await initializer.initializeWorkspace(ROOT);

      expect(second).toEqual({ success: true, created: [], errors: [] });
    });

    it('should report a filesystem failure', async () => {
      const failing = new FailingFileSystem();
      const broken = new PentadInitializer(failing, new ConfigLoader(failing, logger), logger, () => NOW);

      const result = await broken.initializeWorkspace(ROOT);

      expect(result.success).toBe(false);
      expect(result.errors).toEqual(['Initialization failed: disk full']);
      expect(logger.messages('error')).toEqual(['Workspace initialization failed']);
    });
  });

  describe('isWorkspaceInitialized', () => {
    it('should be false before init and true after', async () => {
      expect(await initializer.isWorkspaceInitialized(ROOT)).toBe(false);

      await initializer.initializeWorkspace(ROOT);

      expect(await initializer.isWorkspaceInitialized(ROOT)).toBe(true);
    });

    it('should need the broker config as well as the directory', async () => {
      await fs.mkdir(paths.workspace, { recursive: true });

      expect(await initializer.isWorkspaceInitialized(ROOT)).toBe(false);
    });
  });
});
