/**
 * InteractiveAgent - the human-facing hub
 *
 * Reads commands and prompts from the terminal, gates prompts against the
 * repository goal and forwards accepted ones to the other roles. Without an
 * attached terminal it only listens.
 */

import {
  ConfigurationError,
  ProcessRegistry,
  ROLE_IDS,
  checkRequestAlignment,
  summarizeGoal,
  type MessageEnvelope,
  type ProcessRegistryEntries,
} from '@pentad/core';
import { BaseAgent } from './BaseAgent.js';
import { FeatureInsightSchema } from './payloads.js';
import type { AgentContext, AgentIO, AgentTimers } from './types.js';

/** A misaligned request this confident asks for confirmation */
export const CONFIRMATION_CONFIDENCE = 0.7;

const EXIT_COMMANDS = new Set(['exit', 'quit', 'stop']);

const HELP_LINES = [
  'Commands:',
  '  help                      Show this help',
  '  status                    Show agents, goal and rules',
  '  goal                      Show the repository goal',
  '  goal <text>               Replace the primary goal',
  '  rules                     List active protocol rules',
  '  change <type> <files...>  Report a code change to the other agents',
  '  exit                      Stop this agent',
  'Anything else is sent to the team as a prompt.',
];

export class InteractiveAgent extends BaseAgent {
  constructor(
    context: AgentContext,
    private io: AgentIO | null,
    timers?: AgentTimers
  ) {
    super(context, timers);
  }

  protected async subscribe(): Promise<void> {
    await this.context.router.listenForProtocolUpdates((envelope) =>
      this.onProtocolUpdate(envelope)
    );
    await this.context.router.listenOnRoleQueue((envelope) => this.onFeatureInsight(envelope));
  }

  protected async work(): Promise<void> {
    await this.context.router.startConsuming('background');

    if (this.io === null) {
      this.context.logger.info('No terminal attached, running headless');
      await this.idle();
      return;
    }

    this.print(`🎯 ${this.context.definition.title}`);
    this.print(summarizeGoal(this.goal));
    this.print('Type "help" for commands.');

    while (!this.stopped) {
      const line = await this.io.read('\n👤 You: ');
      if (line === null || !(await this.handleInput(line))) {
        break;
      }
    }
    await this.shutdown('user_request');
  }

  protected async onShutdown(): Promise<void> {
    this.io?.close();
  }

  /**
   * Process one line of input. Returns false when the user asked to exit.
   */
  async handleInput(input: string): Promise<boolean> {
    const text = input.trim();
    if (text === '') {
      return true;
    }

    const lower = text.toLowerCase();
    if (EXIT_COMMANDS.has(lower)) {
      return false;
    }

    if (lower === 'help') {
      HELP_LINES.forEach((line) => this.print(line));
    } else if (lower === 'status') {
      await this.showStatus();
    } else if (lower === 'goal') {
      this.print(summarizeGoal(this.goal));
    } else if (lower === 'rules') {
      this.showRules();
    } else if (lower.startsWith('goal ')) {
      await this.updateGoal(text.slice(5).trim());
    } else if (lower === 'change' || lower.startsWith('change ')) {
      this.reportChange(text.slice(6).trim());
    } else {
      await this.submitPrompt(text);
    }
    return true;
  }

  private async submitPrompt(prompt: string): Promise<void> {
    const alignment = checkRequestAlignment(this.goal, prompt);

    if (!alignment.aligned && alignment.confidence > CONFIRMATION_CONFIDENCE) {
      this.print(`⚠️  Goal alignment warning: ${alignment.reason}`);
      if (this.goal !== null) {
        this.print(`   Consider if this fits: ${this.goal.primary}`);
      }
      const answer = (await this.io?.read('   Continue anyway? (y/N): ')) ?? '';
      if (!['y', 'yes'].includes(answer.trim().toLowerCase())) {
        this.print('   Request cancelled.');
        this.context.logger.info('Prompt cancelled after alignment warning', { prompt });
        return;
      }
    } else if (alignment.aligned && alignment.matchingKeywords.length > 0) {
      this.print(`✅ Goal-aligned request (keywords: ${alignment.matchingKeywords.slice(0, 3).join(', ')})`);
    }

    const sent = this.context.router.sendActivity('user_prompt', {
      prompt,
      repositoryGoal: this.goal?.primary ?? null,
      alignment: {
        aligned: alignment.aligned,
        confidence: alignment.confidence,
        matchingKeywords: alignment.matchingKeywords,
      },
    });
    this.print(sent ? `📤 Sent: ${truncate(prompt, 50)}` : '❌ Prompt could not be delivered');
  }

  private reportChange(args: string): void {
    const [changeType, ...files] = args.split(/\s+/).filter((part) => part !== '');
    if (changeType === undefined) {
      this.print('Usage: change <type> <files...>');
      return;
    }
    const sent = this.context.router.sendCodeChange(changeType, { changeType, files });
    this.print(sent ? `📤 Reported ${changeType} (${files.length} files)` : '❌ Change could not be delivered');
  }

  private async updateGoal(primary: string): Promise<void> {
    try {
      this.goal = await this.context.goals.updatePrimary(primary, this.now());
      this.print(`✅ Goal updated: ${primary}`);
      this.context.router.sendActivity('goal_updated', { primary });
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      this.print(`❌ ${error.message}`);
    }
  }

  private async showStatus(): Promise<void> {
    const registry = new ProcessRegistry(
      this.context.fs,
      this.context.paths.registry,
      this.context.paths.communication
    );
    let entries: ProcessRegistryEntries = {};
    try {
      entries = (await registry.read()) ?? {};
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      this.print(`⚠️  ${error.message}`);
    }

    this.print(`📊 Broker: ${this.context.router.online ? 'connected' : 'offline'}`);
    for (const role of ROLE_IDS) {
      const pid = entries[role];
      this.print(`   ${role.padEnd(12)} ${pid === undefined ? 'not registered' : `PID ${pid}`}`);
    }
    this.print(`   Goal: ${this.goal?.primary ?? 'not defined'}`);
    this.print(`   Rules: ${Object.keys(this.protocols.rules).length}/${this.protocols.maxRulesLimit}`);
  }

  private showRules(): void {
    const rules = Object.entries(this.protocols.rules);
    if (rules.length === 0) {
      this.print('No protocol rules defined');
      return;
    }
    rules.forEach(([name, text]) => this.print(`  • ${name}: ${text}`));
  }

  private async onProtocolUpdate(envelope: MessageEnvelope): Promise<void> {
    await this.acknowledgeProtocolUpdate(envelope);
    this.print(`📋 Protocol updated (${envelope.routingKey})`);
  }

  private onFeatureInsight(envelope: MessageEnvelope): void {
    const parsed = FeatureInsightSchema.safeParse(envelope.data);
    const summary = parsed.success ? parsed.data.summary : envelope.routingKey;
    this.print(`💡 Insight: ${summary}`);
  }

  private print(line: string): void {
    if (this.io !== null) {
      this.io.print(line);
    } else {
      this.context.logger.info(line);
    }
  }
}

function truncate(text: string, length: number): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}
