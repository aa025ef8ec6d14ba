/**
 * Unit tests for the init, start, status, stop and agent commands
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { InitCommand } from '../../../../src/cli/commands/InitCommand.js';
import { StartCommand } from '../../../../src/cli/commands/StartCommand.js';
import { StatusCommand } from '../../../../src/cli/commands/StatusCommand.js';
import { StopCommand } from '../../../../src/cli/commands/StopCommand.js';
import { AgentCommand } from '../../../../src/cli/commands/AgentCommand.js';
import { ConfigLoader } from '../../../../src/shared/config/ConfigLoader.js';
import { workspacePaths } from '../../../../src/shared/config/paths.js';
import { CLI_ENTRY } from '../../../../src/features/supervisor/createSupervisor.js';
import { MockFileSystem, MockProcessExecutor, RecordingLogger } from '../../../helpers/mocks.js';

const ROOT = '/project';
const BROKER_FOUND = { stdout: '/usr/sbin/rabbitmq-server\n' };

describe('commands', () => {
  let fs: MockFileSystem;
  let executor: MockProcessExecutor;
  let logger: RecordingLogger;
  let configLoader: ConfigLoader;
  let log: MockInstance;

  const output = (): string[] => log.mock.calls.map((call) => String(call[0]));

  beforeEach(async () => {
    fs = new MockFileSystem();
    executor = new MockProcessExecutor();
    logger = new RecordingLogger();
    configLoader = new ConfigLoader(fs, logger);
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await fs.writeFile(CLI_ENTRY, '');
    executor.setResult('which rabbitmq-server', BROKER_FOUND);
    executor.setResult('where rabbitmq-server', BROKER_FOUND);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const init = (): Promise<boolean> => new InitCommand(fs, executor, configLoader, logger).execute(ROOT);
  const start = (offline = false): Promise<boolean> =>
    new StartCommand(fs, executor, configLoader, logger).execute(ROOT, { offline });

  describe('init', () => {
    it('should report what was created', async () => {
      expect(await init()).toBe(true);

      expect(output()).toHaveLength(1);
      expect(output()[0]).toContain('✅ Pentad initialized in /project (9 items created)');
    });

    it('should warn about a missing broker but still succeed', async () => {
      executor.setResult('which rabbitmq-server', { exitCode: 1 });
      executor.setResult('where rabbitmq-server', { exitCode: 1 });

      expect(await init()).toBe(true);

      expect(output()[0]).toContain('⚠️  Pentad initialized with missing dependencies: rabbitmq-server');
    });
  });

  describe('start', () => {
    it('should refuse an uninitialized workspace', async () => {
      expect(await start()).toBe(false);

      expect(output()[0]).toContain('❌ Workspace not initialized. Run "pentad init" first.');
      expect(executor.spawned).toEqual([]);
    });

    it('should refuse to start without the broker unless offline', async () => {
      await init();
      executor.setResult('which rabbitmq-server', { exitCode: 1 });
      executor.setResult('where rabbitmq-server', { exitCode: 1 });

      expect(await start()).toBe(false);

      expect(output()[1]).toContain('❌ Missing dependencies: rabbitmq-server. Install them or use --offline.');
    });

    it('should launch all five agents', async () => {
      await init();

      expect(await start()).toBe(true);

      expect(executor.spawned.map((call) => call.args.slice(1))).toEqual([
        ['agent', 'interactive', ROOT],
        ['agent', 'fixer', ROOT],
        ['agent', 'governor', ROOT],
        ['agent', 'auditor', ROOT],
        ['agent', 'insight', ROOT],
      ]);
      expect(executor.spawned[0]?.options.env?.PENTAD_OFFLINE).toBeUndefined();
      expect(output()[1]).toContain('🚀 Launched 5/5 agents');
      expect(JSON.parse(fs.getFileContent(workspacePaths(ROOT).registry) ?? '{}')).toEqual({
        interactive: 4100,
        fixer: 4101,
        governor: 4102,
        auditor: 4103,
        insight: 4104,
      });
    });

    it('should mark agents offline', async () => {
      await init();
      executor.setResult('which rabbitmq-server', { exitCode: 1 });

      expect(await start(true)).toBe(true);

      expect(executor.spawned[0]?.options.env?.PENTAD_OFFLINE).toBe('1');
      expect(output()[1]).toContain('🚀 Launched 5/5 agents (offline)');
    });

    it('should not start twice', async () => {
      await init();
      await start();

      expect(await start()).toBe(false);

      expect(output()[2]).toContain('⚠️  Agents already running. Run "pentad stop" first.');
      expect(executor.spawned).toHaveLength(5);
    });

    it('should allow a new start after one that launched nothing', async () => {
      await init();
      await fs.unlink(CLI_ENTRY);

      expect(await start()).toBe(false);
      await fs.writeFile(CLI_ENTRY, '');
      expect(await start()).toBe(true);

      expect(output()[1]).toContain('❌ No agents launched (0 failed, 5 skipped)');
      expect(output()[2]).toContain('🚀 Launched 5/5 agents');
      expect(executor.spawned).toHaveLength(5);
    });

    it('should report agents that failed to launch', async () => {
      await init();
      executor.failSpawnWhenArgsInclude('governor');

      expect(await start()).toBe(false);

      expect(output()[1]).toContain('🚀 Launched 4/5 agents; not started: governor');
    });
  });

  describe('status', () => {
    it('should report a stopped team', async () => {
      await new StatusCommand(fs, executor, logger).execute(ROOT);

      expect(output()).toHaveLength(1);
      expect(output()[0]).toContain('📊 Not running · goal missing');
    });

    it('should list registered agents and the goal', async () => {
      await init();
      await start();
      log.mockClear();

      await new StatusCommand(fs, executor, logger).execute(ROOT);

      expect(output()).toHaveLength(6);
      expect(output()[0]).toContain('interactive');
      expect(output()[0]).toContain('PID 4100');
      expect(output()[5]).toContain(
        '📊 5 agents registered · Describe the single most important outcome of this repository'
      );
      expect(executor.kills).toEqual([]);
    });
  });

  describe('stop', () => {
    it('should report when nothing is running', async () => {
      expect(await new StopCommand(fs, executor, logger).execute(ROOT)).toBe(true);

      expect(output()[0]).toContain('⚠️  No running agents found');
    });

    it('should terminate every registered agent', async () => {
      await init();
      await start();

      expect(await new StopCommand(fs, executor, logger).execute(ROOT)).toBe(true);

      expect(output()[2]).toContain('🛑 Stopped 5 agents');
      expect(executor.kills.map((kill) => kill.signal)).toEqual(Array(5).fill('SIGTERM'));
      expect(await fs.exists(workspacePaths(ROOT).registry)).toBe(false);
    });
  });

  describe('agent', () => {
    it('should reject an unknown role', async () => {
      expect(await new AgentCommand().execute('reviewer', ROOT)).toBe(false);

      expect(output()[0]).toContain(
        '❌ Unknown agent role "reviewer". Expected one of: interactive, fixer, governor, auditor, insight'
      );
    });
  });
});
