/**
 * Unit tests for ConfigLoader
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ConfigLoader } from '../../../../src/shared/config/ConfigLoader.js';
import { workspacePaths } from '../../../../src/shared/config/paths.js';
import { MockFileSystem, RecordingLogger } from '../../../helpers/mocks.js';

const ROOT = '/project';

describe('ConfigLoader', () => {
  let fs: MockFileSystem;
  let logger: RecordingLogger;
  let loader: ConfigLoader;
  const paths = workspacePaths(ROOT);

  beforeEach(() => {
    fs = new MockFileSystem();
    logger = new RecordingLogger();
    loader = new ConfigLoader(fs, logger);
  });

  describe('load', () => {
    it('should return defaults when nothing is configured', async () => {
      const config = await loader.load({ projectRoot: ROOT, env: {} });

      expect(config).toEqual(loader.getDefaults());
    });

    it('should apply project config over defaults', async () => {
      await fs.writeFile(
        paths.communicationConfig,
        'broker:\n  host: broker.internal\n  port: 5673\nagents:\n  fixer:\n    title: QA\n'
      );

      const config = await loader.load({ projectRoot: ROOT, env: {} });

      expect(config.broker.host).toBe('broker.internal');
      expect(config.broker.port).toBe(5673);
      expect(config.broker.username).toBe('guest');
      expect(config.agents).toEqual({ fixer: { title: 'QA' } });
    });

    it('should let environment variables win over the project file', async () => {
      await fs.writeFile(paths.communicationConfig, 'broker:\n  host: from-file\n');

      const config = await loader.load({
        projectRoot: ROOT,
        env: { PENTAD_BROKER_HOST: 'from-env', PENTAD_BROKER_PASSWORD: 'test-secret' },
      });

      expect(config.broker.host).toBe('from-env');
      expect(config.broker.password).toBe('test-secret');
    });

    it('should read .env but prefer the process environment', async () => {
      await fs.writeFile(paths.env, 'PENTAD_BROKER_HOST=dotenv-host\nPENTAD_BROKER_VHOST=/agents\n');

      const config = await loader.load({
        projectRoot: ROOT,
        env: { PENTAD_BROKER_HOST: 'process-host' },
      });

      expect(config.broker.host).toBe('process-host');
      expect(config.broker.virtualHost).toBe('/agents');
    });

    it('should let CLI flags win over everything', async () => {
      const config = await loader.load({
        projectRoot: ROOT,
        env: { PENTAD_BROKER_PORT: '5680' },
        cliFlags: { broker: { port: 5699 } },
      });

      expect(config.broker.port).toBe(5699);
    });

    it('should ignore a non-numeric port', async () => {
      const config = await loader.load({ projectRoot: ROOT, env: { PENTAD_BROKER_PORT: 'abc' } });

      expect(config.broker.port).toBe(5672);
      expect(logger.messages('warn')).toContain('Ignoring invalid PENTAD_BROKER_PORT');
    });

    it('should fall back to defaults when the project file is unreadable', async () => {
      await fs.writeFile(paths.communicationConfig, 'broker:\n  port: [unclosed\n');

      const config = await loader.load({ projectRoot: ROOT, env: {} });

      expect(config.broker.port).toBe(5672);
      expect(logger.messages('warn')).toContain('Failed to load project config, using defaults');
    });
  });

  describe('protocol rules', () => {
    it('should return default rules when the file is missing', async () => {
      const rules = await loader.loadProtocolRules(ROOT);

      expect(Object.keys(rules.rules)).toEqual(['goal_alignment', 'simplicity_first', 'user_friendly']);
      expect(rules.maxRulesLimit).toBe(10);
      expect(logger.messages('warn')).toEqual(['Protocol rules not found, using defaults']);
    });

    it('should save and reload rules', async () => {
      const rules = loader.getDefaultRules('2026-01-01T00:00:00.000Z');
      rules.rules = { ...rules.rules, recurring_build: 'Handle recurring "build" activity consistently' };

      await loader.saveProtocolRules(ROOT, rules);
      const reloaded = await loader.loadProtocolRules(ROOT);

      expect(reloaded).toEqual(rules);
    });

    it('should fill missing rule fields with defaults', async () => {
      await fs.writeFile(paths.rules, 'rules:\n  only_rule: Keep it small\n');

      const rules = await loader.loadProtocolRules(ROOT);

      expect(rules.rules).toEqual({ only_rule: 'Keep it small' });
      expect(rules.maxRulesLimit).toBe(10);
      expect(rules.version).toBe('1.0.0');
    });

    it('should fall back to defaults on an invalid rules file', async () => {
      await fs.writeFile(paths.rules, 'maxRulesLimit: -1\n');

      const rules = await loader.loadProtocolRules(ROOT);

      expect(rules).toEqual(loader.getDefaultRules());
      expect(logger.messages('warn')).toEqual(['Failed to load protocol rules, using defaults']);
    });
  });
});
