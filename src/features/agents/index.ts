export { BaseAgent } from './BaseAgent.js';
export { InteractiveAgent, CONFIRMATION_CONFIDENCE } from './InteractiveAgent.js';
export { FixerAgent, analyzePrompt, reviewCodeChange, PERIODIC_CHECK_MS } from './FixerAgent.js';
export type { PromptAnalysis, ChangeReview, FixerTimers } from './FixerAgent.js';
export { GovernorAgent, PATTERN_THRESHOLD } from './GovernorAgent.js';
export type { GovernorOptions } from './GovernorAgent.js';
export { AuditorAgent, reviewProtocols, MAX_RULE_LENGTH } from './AuditorAgent.js';
export type { ProtocolReview, Verdict } from './AuditorAgent.js';
export { InsightAgent, formatInsightLine } from './InsightAgent.js';
export { TerminalIO } from './TerminalIO.js';
export { createAgent } from './createAgent.js';
export { runAgent } from './runAgent.js';
export type { RunAgentOptions } from './runAgent.js';
export type { AgentContext, AgentIO, AgentTimers } from './types.js';
