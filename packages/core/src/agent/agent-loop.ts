/**
 * @fileoverview Agent loop
 *
 * Turns one inbound message into a reply:
 * - builds context through the memory manager
 * - calls the model, streaming text to channels that stream
 * - executes requested tools and feeds results back, up to a round limit
 * - delivers the reply and persists the exchange
 *
 * The loop owns no persistent state. Memory failures degrade the turn
 * (no history, or no persistence) but never stop the reply.
 */

import type { Message, ToolCall, ToolResult } from '../types/messages.js';
import type { ChannelPort, ModelPort } from '../types/ports.js';
import type { Session } from '../types/session.js';
import type { BurrowTool, ToolDefinition } from '../types/tools.js';
import { assistantMessage, systemMessage, toolResultMessage, userMessage } from '../types/messages.js';
import { getSessionId } from '../types/session.js';
import { executeTool, type ToolRegistry } from '../tools/registry.js';
import { createLogger } from '../logging/logger.js';
import { updateLoggingContext, withLoggingContext } from '../logging/log-context.js';
import { errorMessage, formatModelError } from '../utils/errors.js';
import type { AgentLoopConfig, ConversationMemory, RunOptions, TurnOutcome } from './types.js';

const logger = createLogger('agent');

export const DEFAULT_MAX_TOOL_ROUNDS = 20;
export const DEFAULT_TYPING_INTERVAL_MS = 4000;
export const MAX_ROUNDS_REPLY = 'Error: maximum tool call rounds exceeded.';

interface ModelResponse {
  text: string;
  toolCalls: ToolCall[];
  reasoning?: string;
}

interface TurnContext {
  session: Session;
  channel: ChannelPort;
  metadata: Record<string, unknown>;
  signal?: AbortSignal;
}

export class AgentLoop {
  private readonly model: ModelPort;
  private readonly memory: ConversationMemory;
  private readonly registry: ToolRegistry;
  private readonly systemPrompt: string;
  private readonly maxToolRounds: number;
  private readonly typingIntervalMs: number;
  private turnCounter = 0;

  constructor(config: AgentLoopConfig) {
    this.model = config.model;
    this.memory = config.memory;
    this.registry = config.registry;
    this.systemPrompt = config.systemPrompt;
    this.maxToolRounds = config.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
    this.typingIntervalMs = config.typingIntervalMs ?? DEFAULT_TYPING_INTERVAL_MS;
  }

  /**
   * Process one user message and deliver the reply to `channel`.
   * Callers run at most one turn per session at a time.
   */
  async run(session: Session, userText: string, channel: ChannelPort, options: RunOptions = {}): Promise<TurnOutcome> {
    const sessionId = getSessionId(session);
    const turn = ++this.turnCounter;

    return withLoggingContext({ sessionId, channel: session.channel, turn }, async () => {
      const stopTyping = this.startTyping(channel, sessionId);
      try {
        const outcome = await this.runTurn(userText, options, {
          session,
          channel,
          metadata: options.metadata ?? {},
          signal: options.signal,
        });
        logger.info('Turn finished', { status: outcome.status, rounds: outcome.rounds });
        return outcome;
      } finally {
        await stopTyping();
      }
    });
  }

  private async runTurn(userText: string, options: RunOptions, ctx: TurnContext): Promise<TurnOutcome> {
    const model = options.model ?? this.model;
    const messages = await this.buildMessages(ctx.session, userText);
    const { definitions, extraTools } = this.toolSet(options.extraTools);

    let rounds = 0;
    let reply = '';
    // Last non-empty text from any round, including rounds that called tools
    let lastText = '';
    let usedFallback = false;
    let status: TurnOutcome['status'] = 'completed';

    for (;;) {
      if (ctx.signal?.aborted) {
        return { status: 'aborted', reply: '', rounds };
      }
      if (rounds >= this.maxToolRounds) {
        logger.warn('Tool round limit reached', { rounds });
        reply = lastText || MAX_ROUNDS_REPLY;
        usedFallback = !lastText;
        status = 'max_rounds';
        break;
      }

      updateLoggingContext({ round: rounds });
      let response: ModelResponse;
      try {
        response = await this.callModel(model, messages, definitions, ctx);
      } catch (error) {
        if (ctx.signal?.aborted) {
          return { status: 'aborted', reply: '', rounds };
        }
        const text = formatModelError(error);
        logger.error('Model call failed', error instanceof Error ? error : { error: String(error) });
        await this.send(ctx, text);
        return { status: 'model_error', reply: text, rounds };
      }

      if (ctx.signal?.aborted) {
        return { status: 'aborted', reply: '', rounds };
      }

      if (response.text) {
        lastText = response.text;
      }
      if (response.toolCalls.length === 0) {
        reply = lastText;
        break;
      }

      messages.push(
        assistantMessage(response.text, { toolCalls: response.toolCalls, reasoning: response.reasoning })
      );
      for (const call of response.toolCalls) {
        const result = await this.executeCall(call, extraTools);
        messages.push(toolResultMessage(result));
      }
      rounds++;
    }

    // Streaming channels already saw the text as deltas
    if (reply && (!ctx.channel.streaming || usedFallback)) {
      await this.send(ctx, reply);
    }

    try {
      await this.memory.persistExchange(ctx.session, userText, reply);
    } catch (error) {
      logger.error('Failed to persist exchange', error instanceof Error ? error : { error: String(error) });
    }

    return { status, reply, rounds };
  }

  private async buildMessages(session: Session, userText: string): Promise<Message[]> {
    try {
      return await this.memory.buildContext(session, this.systemPrompt, userText);
    } catch (error) {
      logger.warn('Context build failed, continuing without history', { error: errorMessage(error) });
      return [systemMessage(this.systemPrompt), userMessage(userText)];
    }
  }

  /**
   * Registry definitions plus per-run tools, the latter winning on name clashes
   */
  private toolSet(extra: BurrowTool[] = []): { definitions: ToolDefinition[]; extraTools: Map<string, BurrowTool> } {
    const extraTools = new Map(extra.map((tool) => [tool.name, tool]));
    const definitions = [
      ...this.registry.definitions().filter((definition) => !extraTools.has(definition.name)),
      ...[...extraTools.values()].map(({ name, description, parameters }) => ({ name, description, parameters })),
    ];
    return { definitions, extraTools };
  }

  private async callModel(
    model: ModelPort,
    messages: Message[],
    definitions: ToolDefinition[],
    ctx: TurnContext
  ): Promise<ModelResponse> {
    let text = '';
    let toolCalls: ToolCall[] = [];
    let reasoning: string | undefined;

    const stream = model.chat(messages, definitions, { stream: ctx.channel.streaming, signal: ctx.signal });
    for await (const event of stream) {
      if (ctx.signal?.aborted) break;
      if (event.type === 'text_delta') {
        text += event.delta;
        if (ctx.channel.streaming && event.delta) {
          await this.send(ctx, event.delta);
        }
      } else {
        toolCalls = event.toolCalls;
        reasoning = event.reasoning;
      }
    }

    return { text, toolCalls, reasoning };
  }

  private async executeCall(call: ToolCall, extraTools: Map<string, BurrowTool>): Promise<ToolResult> {
    const extra = extraTools.get(call.name);
    return extra ? executeTool(extra, call.id, call.arguments) : this.registry.execute(call.name, call.id, call.arguments);
  }

  private async send(ctx: TurnContext, text: string): Promise<void> {
    await ctx.channel.send({ session: ctx.session, text, metadata: { ...ctx.metadata } });
  }

  /**
   * Show a typing indicator now and keep refreshing it. The returned
   * function stops the refresh and clears the indicator.
   */
  private startTyping(channel: ChannelPort, sessionId: string): () => Promise<void> {
    const refresh = async (active: boolean): Promise<void> => {
      try {
        await channel.sendTyping(sessionId, active);
      } catch (error) {
        logger.debug('Typing indicator failed', { active, error: errorMessage(error) });
      }
    };

    void refresh(true);
    const timer = setInterval(() => void refresh(true), this.typingIntervalMs);

    return async () => {
      clearInterval(timer);
      await refresh(false);
    };
  }
}

export function createAgentLoop(config: AgentLoopConfig): AgentLoop {
  return new AgentLoop(config);
}
