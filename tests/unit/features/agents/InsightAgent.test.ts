/**
 * Unit tests for InsightAgent
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createEnvelope } from '@pentad/core';
import { InsightAgent, formatInsightLine } from '../../../../src/features/agents/InsightAgent.js';
import { AgentHarness, NOW } from '../../../helpers/agentHarness.js';

describe('formatInsightLine', () => {
  it('should list the files of a change', () => {
    expect(formatInsightLine('T', 'fixer', 'automatic_fix', ['a.ts', 'b.ts'])).toBe(
      '- T [fixer] automatic_fix: a.ts, b.ts\n'
    );
  });

  it('should omit the file list when empty', () => {
    expect(formatInsightLine('T', 'interactive', 'refactor', [])).toBe('- T [interactive] refactor\n');
  });
});

describe('InsightAgent', () => {
  let harness: AgentHarness;
  let insight: InsightAgent;

  beforeEach(() => {
    harness = new AgentHarness();
    insight = new InsightAgent(harness.context('insight'));
  });

  it('should start the insights file and announce the change', async () => {
    await insight.recordChange(
      createEnvelope('fixer.code.automatic_fix', { files: ['src/api.ts', 'src/db.ts'] }, 'fixer', NOW)
    );

    expect(harness.fs.getFileContent(harness.paths.insights)).toBe(
      '# Feature Insights\n\n- 2026-04-01T08:00:00.000Z [fixer] automatic_fix: src/api.ts, src/db.ts\n'
    );
    expect(harness.published('feature.change_recorded')).toEqual({
      source: 'fixer',
      changeType: 'automatic_fix',
      files: ['src/api.ts', 'src/db.ts'],
      summary: 'fixer automatic_fix (2 files)',
    });
  });

  it('should append to an existing file', async () => {
    await harness.fs.writeFile(harness.paths.insights, '# Feature Insights\n\n- earlier\n');

    await insight.recordChange(createEnvelope('interactive.code.refactor', {}, 'interactive', NOW));

    expect(harness.fs.getFileContent(harness.paths.insights)).toBe(
      '# Feature Insights\n\n- earlier\n- 2026-04-01T08:00:00.000Z [interactive] refactor\n'
    );
  });

  it('should tolerate a malformed file list', async () => {
    await insight.recordChange(
      createEnvelope('interactive.code.refactor', { files: 'src/a.ts' }, 'interactive', NOW)
    );

    expect(harness.published('feature.change_recorded')).toMatchObject({ files: [], summary: 'interactive refactor (0 files)' });
  });
});
