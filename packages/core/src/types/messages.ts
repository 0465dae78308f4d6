/**
 * @fileoverview Conversation message types
 *
 * Messages are immutable once appended to a session log. Timestamps are
 * ISO-8601 strings so records round-trip through JSON unchanged.
 */

// =============================================================================
// Tool Calls
// =============================================================================

/**
 * A tool invocation requested by the model. Ids are unique within a turn.
 */
export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * Outcome of one tool invocation, stamped with the originating call id.
 */
export interface ToolResult {
  toolCallId: string;
  content: string;
  isError: boolean;
}

// =============================================================================
// Messages
// =============================================================================

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface Message {
  role: MessageRole;
  content: string;
  /** Present on assistant messages that request tools */
  toolCalls?: ToolCall[];
  /** Always present on tool messages */
  toolCallId?: string;
  /** Model reasoning returned alongside tool calls, replayed verbatim */
  reasoning?: string;
  timestamp: string;
  /** Originating channel of a user message, e.g. "matrix" */
  channel?: string;
  /** Sender within the channel, or "assistant" for replies */
  senderId?: string;
}

// =============================================================================
// Factories
// =============================================================================

type MessageExtras = Partial<Omit<Message, 'role' | 'content'>>;

function createMessage(role: MessageRole, content: string, extras: MessageExtras = {}): Message {
  return { role, content, ...extras, timestamp: extras.timestamp ?? new Date().toISOString() };
}

export function systemMessage(content: string): Message {
  return createMessage('system', content);
}

export function userMessage(content: string, extras?: MessageExtras): Message {
  return createMessage('user', content, extras);
}

export function assistantMessage(content: string, extras?: MessageExtras): Message {
  return createMessage('assistant', content, extras);
}

export function toolResultMessage(result: ToolResult): Message {
  return createMessage('tool', result.content, { toolCallId: result.toolCallId });
}
