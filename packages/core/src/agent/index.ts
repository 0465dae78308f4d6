/**
 * @fileoverview Agent exports
 */

export {
  AgentLoop,
  createAgentLoop,
  DEFAULT_MAX_TOOL_ROUNDS,
  DEFAULT_TYPING_INTERVAL_MS,
  MAX_ROUNDS_REPLY,
} from './agent-loop.js';
export { CollectingChannel } from './collecting-channel.js';
export {
  createSubAgentRunner,
  buildSubAgentPrompt,
  SUBAGENT_CHANNEL,
  type SubAgentRequest,
  type SubAgentResult,
  type SubAgentRunner,
} from './subagent.js';
export type { AgentLoopConfig, ConversationMemory, RunOptions, TurnOutcome, TurnStatus } from './types.js';
