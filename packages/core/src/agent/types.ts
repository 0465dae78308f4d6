/**
 * @fileoverview Agent loop types
 */

import type { Message } from '../types/messages.js';
import type { ModelPort } from '../types/ports.js';
import type { Session } from '../types/session.js';
import type { BurrowTool } from '../types/tools.js';
import type { ToolRegistry } from '../tools/registry.js';

/**
 * The slice of MemoryManager the loop depends on
 */
export interface ConversationMemory {
  buildContext(session: Session, systemPrompt: string, userText: string): Promise<Message[]>;
  persistExchange(session: Session, userText: string, reply: string): Promise<void>;
}

export interface AgentLoopConfig {
  model: ModelPort;
  memory: ConversationMemory;
  registry: ToolRegistry;
  /** Base system prompt, typically the workspace AGENTS.md */
  systemPrompt: string;
  /** Model/tool rounds per turn before giving up (default 20) */
  maxToolRounds?: number;
  /** Typing indicator refresh while a turn runs (default 4000ms) */
  typingIntervalMs?: number;
}

export interface RunOptions {
  /** Model for this run only */
  model?: ModelPort;
  /** Tools for this run only; they shadow registry tools of the same name */
  extraTools?: BurrowTool[];
  /** Attached to every outbound message of this run */
  metadata?: Record<string, unknown>;
  signal?: AbortSignal;
}

export type TurnStatus = 'completed' | 'max_rounds' | 'model_error' | 'aborted';

export interface TurnOutcome {
  status: TurnStatus;
  /** Final text delivered to the user (error line for model_error) */
  reply: string;
  /** Rounds that ended in tool calls */
  rounds: number;
}
