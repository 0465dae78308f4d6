/**
 * @fileoverview Port interfaces
 *
 * Contracts between the core and its collaborators. Adapters implement them
 * structurally; nothing here inherits.
 */

import type { Message, ToolCall } from './messages.js';
import type { InboundMessage, OutboundMessage } from './session.js';
import type { ToolDefinition } from './tools.js';
import type { ScheduledJob } from './jobs.js';
import type { SkillMetadata } from '../skills/types.js';

// =============================================================================
// Model
// =============================================================================

export interface TextDeltaEvent {
  type: 'text_delta';
  delta: string;
}

/**
 * Terminal event of a response that requests tools
 */
export interface ToolCallsEvent {
  type: 'tool_calls';
  toolCalls: ToolCall[];
  reasoning?: string;
}

export type ModelEvent = TextDeltaEvent | ToolCallsEvent;

export interface ChatOptions {
  stream?: boolean;
  signal?: AbortSignal;
}

/**
 * Language model client. Must accept an empty tool list.
 */
export interface ModelPort {
  chat(messages: Message[], tools: ToolDefinition[], options?: ChatOptions): AsyncIterable<ModelEvent>;
}

// =============================================================================
// Channel
// =============================================================================

/**
 * Message transport. Streaming channels receive each text delta as it
 * arrives; others receive the final reply once.
 */
export interface ChannelPort {
  readonly streaming: boolean;
  receive(): AsyncIterable<InboundMessage>;
  send(message: OutboundMessage): Promise<void>;
  /** May be a no-op */
  sendTyping(sessionId: string, active: boolean): Promise<void>;
}

// =============================================================================
// Skills
// =============================================================================

export interface SkillsPort {
  listSkills(): Promise<SkillMetadata[]>;
  loadSkillBody(name: string): Promise<string>;
}

// =============================================================================
// Storage
// =============================================================================

export interface LoadHistoryOptions {
  /** Return only the most recent N valid records */
  lastN?: number;
}

export interface StoragePort {
  appendMessage(sessionId: string, message: Message): Promise<void>;
  loadHistory(sessionId: string, options?: LoadHistoryOptions): Promise<Message[]>;
  countMessages(sessionId: string): Promise<number>;
  listSessions(): Promise<string[]>;

  loadGlobalMemory(): Promise<string>;
  saveGlobalMemory(content: string): Promise<void>;

  loadSessionSummary(sessionId: string): Promise<string>;
  saveSessionSummary(sessionId: string, summary: string): Promise<void>;
  loadConsolidatedCursor(sessionId: string): Promise<number>;
  saveConsolidatedCursor(sessionId: string, cursor: number): Promise<void>;

  loadJobs(): Promise<ScheduledJob[]>;
  saveJobs(jobs: ScheduledJob[]): Promise<void>;
}
