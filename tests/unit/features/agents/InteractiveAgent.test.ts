/**
 * Unit tests for InteractiveAgent
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InteractiveAgent } from '../../../../src/features/agents/InteractiveAgent.js';
import { AgentHarness, ScriptedIO } from '../../../helpers/agentHarness.js';

const GOAL = 'goal:\n  primary: "Build fast APIs"\nscope:\n  excluded: "mobile clients"\n';

describe('InteractiveAgent', () => {
  let harness: AgentHarness;

  beforeEach(async () => {
    harness = new AgentHarness();
    await harness.writeGoal(GOAL);
  });

  async function runScript(inputs: string[]): Promise<ScriptedIO> {
    const io = new ScriptedIO([...inputs, 'exit']);
    await new InteractiveAgent(harness.context('interactive'), io, { heartbeatMs: 60_000 }).run();
    return io;
  }

  describe('session', () => {
    it('should greet with the goal and stop on exit', async () => {
      const io = await runScript([]);

      expect(io.printed).toEqual([
        '🎯 Pentad-Dev-Interactive',
        'PRIMARY GOAL: Build fast APIs || EXCLUDED: mobile clients',
        'Type "help" for commands.',
      ]);
      expect(io.closed).toBe(true);
      expect(harness.bus.consumeModes).toEqual(['background']);
      expect(harness.published('interactive.activity.shutdown')).toEqual({ reason: 'user_request' });
    });

    it('should stop when input runs out', async () => {
      const io = new ScriptedIO([]);
      const running = new InteractiveAgent(harness.context('interactive'), io).run();
      await vi.waitFor(() => expect(io.prompts).toEqual(['\n👤 You: ']));

      io.end();
      await running;

      expect(io.closed).toBe(true);
    });

    it('should run headless without a terminal', async () => {
      const agent = new InteractiveAgent(harness.context('interactive'), null, { heartbeatMs: 60_000 });
      const running = agent.run();
      await vi.waitFor(() =>
        expect(harness.logger.messages('info')).toContain('No terminal attached, running headless')
      );

      await agent.shutdown();
      await running;

      expect(harness.published('interactive.activity.shutdown')).toEqual({ reason: 'signal' });
    });

    it('should show protocol updates and insights from other roles', async () => {
      const io = new ScriptedIO([]);
      const running = new InteractiveAgent(harness.context('interactive'), io).run();
      await vi.waitFor(() => expect(io.prompts).toHaveLength(1));

      harness.router('governor').sendProtocolUpdate('pattern_detected', { rule: 'recurring_x' });
      harness.router('insight').sendFeatureInsight('change_recorded', {
        summary: 'fixer automatic_fix (1 files)',
      });
      await harness.bus.flush();
      io.end();
      await running;

      expect(io.printed).toContain('📋 Protocol updated (protocol.pattern_detected)');
      expect(io.printed).toContain('💡 Insight: fixer automatic_fix (1 files)');
      expect(harness.published('interactive.activity.protocol_received')).toEqual({
        updateType: 'protocol.pattern_detected',
        acknowledged: true,
      });
    });
  });

  describe('prompts', () => {
    it('should forward an aligned prompt with its alignment', async () => {
      const io = await runScript(['Make the build fast']);

      expect(io.printed).toContain('✅ Goal-aligned request (keywords: build, fast)');
      expect(io.printed).toContain('📤 Sent: Make the build fast');
      expect(harness.published('interactive.activity.user_prompt')).toEqual({
        prompt: 'Make the build fast',
        repositoryGoal: 'Build fast APIs',
        alignment: { aligned: true, confidence: 2 / 3, matchingKeywords: ['build', 'fast'] },
      });
    });

    it('should forward a weakly matching prompt without asking', async () => {
      const io = await runScript(['Write documentation']);

      expect(io.printed).toContain('📤 Sent: Write documentation');
      expect(io.prompts).toEqual(['\n👤 You: ', '\n👤 You: ']);
    });

    it('should cancel an excluded-scope prompt unless confirmed', async () => {
      const io = await runScript(['Add mobile login', 'n']);

      expect(io.printed).toContain(
        '⚠️  Goal alignment warning: Request may fall under excluded scope: mobile clients'
      );
      expect(io.printed).toContain('   Consider if this fits: Build fast APIs');
      expect(io.printed).toContain('   Request cancelled.');
      expect(io.prompts[1]).toBe('   Continue anyway? (y/N): ');
      expect(harness.published('interactive.activity.user_prompt')).toBeUndefined();
    });

    it('should forward an excluded-scope prompt once confirmed', async () => {
      await runScript(['Add mobile login', 'YES']);

      expect(harness.published('interactive.activity.user_prompt')).toMatchObject({
        prompt: 'Add mobile login',
        alignment: { aligned: false, confidence: 0.9 },
      });
    });

    it('should truncate long prompts in the confirmation line', async () => {
      const prompt = 'Write a guide '.repeat(5).trim();

      const io = await runScript([prompt]);

      expect(io.printed).toContain(`📤 Sent: ${prompt.slice(0, 50)}...`);
    });
  });

  describe('handleInput', () => {
    let io: ScriptedIO;
    let agent: InteractiveAgent;

    beforeEach(() => {
      io = new ScriptedIO();
      agent = new InteractiveAgent(harness.context('interactive'), io);
    });

    it('should recognise exit commands', async () => {
      expect(await agent.handleInput('QUIT')).toBe(false);
      expect(await agent.handleInput('stop')).toBe(false);
      expect(await agent.handleInput('   ')).toBe(true);
    });

    it('should list protocol rules', async () => {
      await agent.handleInput('rules');

      expect(io.printed).toEqual([
        '  • goal_alignment: Every change must serve the repository goal',
        '  • simplicity_first: Choose simple solutions over complex ones',
        '  • user_friendly: Use clear, understandable language in all communications',
      ]);
    });

    it('should report status from the process registry', async () => {
      await harness.fs.writeFile(harness.paths.registry, JSON.stringify({ interactive: 4100, fixer: 4101 }));

      await agent.handleInput('status');

      expect(io.printed).toEqual([
        '📊 Broker: connected',
        '   interactive  PID 4100',
        '   fixer        PID 4101',
        '   governor     not registered',
        '   auditor      not registered',
        '   insight      not registered',
        '   Goal: not defined',
        '   Rules: 3/10',
      ]);
    });

    it('should update the goal', async () => {
      await agent.handleInput('goal Serve reliable webhooks');

      expect(io.printed).toEqual(['✅ Goal updated: Serve reliable webhooks']);
      expect(harness.published('interactive.activity.goal_updated')).toEqual({
        primary: 'Serve reliable webhooks',
      });

      io.printed.length = 0;
      await agent.handleInput('goal');
      expect(io.printed).toEqual(['PRIMARY GOAL: Serve reliable webhooks || EXCLUDED: mobile clients']);
    });

    it('should print goal update failures', async () => {
      await harness.writeGoal('goal: [unclosed\n');

      await agent.handleInput('goal Anything');

      expect(io.printed).toEqual(['❌ Goal document has no goal.primary entry to update']);
    });

    it('should report code changes', async () => {
      await agent.handleInput('change feature_added src/a.ts src/b.ts');

      expect(io.printed).toEqual(['📤 Reported feature_added (2 files)']);
      expect(harness.published('interactive.code.feature_added')).toEqual({
        changeType: 'feature_added',
        files: ['src/a.ts', 'src/b.ts'],
      });
    });

    it('should explain change usage', async () => {
      await agent.handleInput('change');

      expect(io.printed).toEqual(['Usage: change <type> <files...>']);
      expect(harness.bus.published).toEqual([]);
    });
  });
});
