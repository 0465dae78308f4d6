/**
 * @fileoverview AgentLoop tests
 *
 * Real MemoryManager over in-memory storage; the model and channel are
 * scripted fakes.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { AgentLoop, MAX_ROUNDS_REPLY, createAgentLoop } from '../../src/agent/agent-loop.js';
import type { ConversationMemory } from '../../src/agent/types.js';
import { MemoryManager } from '../../src/memory/manager.js';
import { ToolRegistry } from '../../src/tools/registry.js';
import type { BurrowTool, ToolExecutionResult } from '../../src/types/tools.js';
import type { Session } from '../../src/types/session.js';
import { InMemoryStorage, RecordingChannel, ScriptedModel, textReply, toolCallReply } from '../helpers/fakes.js';

const session: Session = { channel: 'cli', senderId: 'local' };
const SESSION_ID = 'cli:local';
const BASE = 'You are a helpful assistant.';

function replyTool(name: string, reply: string): BurrowTool {
  return {
    name,
    description: `Replies ${reply}`,
    parameters: { type: 'object', properties: { text: { type: 'string' } } },
    async execute(args): Promise<ToolExecutionResult> {
      return { content: typeof args.text === 'string' ? `${reply}: ${args.text}` : reply };
    },
  };
}

describe('AgentLoop', () => {
  let storage: InMemoryStorage;
  let memory: MemoryManager;
  let registry: ToolRegistry;

  beforeEach(() => {
    storage = new InMemoryStorage();
    memory = new MemoryManager({ storage });
    registry = new ToolRegistry();
  });

  function loopWith(model: ScriptedModel, maxToolRounds?: number): AgentLoop {
    return createAgentLoop({ model, memory, registry, systemPrompt: BASE, maxToolRounds });
  }

  describe('plain replies', () => {
    it('should send the reply and persist the exchange', async () => {
      const channel = new RecordingChannel();

      const outcome = await loopWith(new ScriptedModel([textReply('Hello!')])).run(session, 'hi', channel);

      expect(outcome).toEqual({ status: 'completed', reply: 'Hello!', rounds: 0 });
      expect(channel.texts).toEqual(['Hello!']);
      expect(channel.sent[0]?.session).toEqual(session);
      expect(storage.history.get(SESSION_ID)?.map((m) => [m.role, m.content])).toEqual([
        ['user', 'hi'],
        ['assistant', 'Hello!'],
      ]);
    });

    it('should stream deltas to streaming channels without resending the reply', async () => {
      const channel = new RecordingChannel(true);
      const model = new ScriptedModel([textReply('Hello!')]);

      await loopWith(model).run(session, 'hi', channel);

      expect(channel.texts).toEqual(['Hel', 'lo!']);
      expect(model.calls[0]?.options.stream).toBe(true);
    });

    it('should show typing while the turn runs and clear it after', async () => {
      const channel = new RecordingChannel();

      await loopWith(new ScriptedModel([textReply('ok')])).run(session, 'hi', channel);

      expect(channel.typing[0]).toEqual({ sessionId: SESSION_ID, active: true });
      expect(channel.typing[channel.typing.length - 1]).toEqual({ sessionId: SESSION_ID, active: false });
    });

    it('should give the model system prompt, history and the user message', async () => {
      await storage.appendMessage(SESSION_ID, { role: 'user', content: 'earlier', timestamp: '2026-01-01T00:00:00.000Z' });
      const model = new ScriptedModel([textReply('ok')]);

      await loopWith(model).run(session, 'now', new RecordingChannel());

      expect(model.calls[0]?.messages.map((m) => [m.role, m.content])).toEqual([
        ['system', BASE],
        ['user', 'earlier'],
        ['user', 'now'],
      ]);
    });

    it('should attach run metadata to outbound messages', async () => {
      const channel = new RecordingChannel();

      await loopWith(new ScriptedModel([textReply('ok')])).run(session, 'hi', channel, {
        metadata: { room: '!abc:example.org' },
      });

      expect(channel.sent[0]?.metadata).toEqual({ room: '!abc:example.org' });
    });
  });

  describe('tool rounds', () => {
    it('should execute requested tools and feed results back', async () => {
      registry.register(replyTool('echo', 'echoed'));
      const model = new ScriptedModel([toolCallReply('echo', { text: 'ping' }, 'call_1'), textReply('Done')]);

      const outcome = await loopWith(model).run(session, 'hi', new RecordingChannel());

      expect(outcome).toEqual({ status: 'completed', reply: 'Done', rounds: 1 });
      expect(model.calls).toHaveLength(2);
      expect(model.calls[0]?.tools.map((tool) => tool.name)).toEqual(['echo']);
      const second = model.calls[1]?.messages ?? [];
      expect(second.slice(-2).map((m) => [m.role, m.content, m.toolCallId])).toEqual([
        ['assistant', '', undefined],
        ['tool', 'echoed: ping', 'call_1'],
      ]);
      expect(second[second.length - 2]?.toolCalls).toEqual([{ id: 'call_1', name: 'echo', arguments: { text: 'ping' } }]);
    });

    it('should persist only the user message and the final reply', async () => {
      registry.register(replyTool('echo', 'echoed'));
      const model = new ScriptedModel([toolCallReply('echo', { text: 'ping' }), textReply('Done')]);

      await loopWith(model).run(session, 'hi', new RecordingChannel());

      expect(storage.history.get(SESSION_ID)?.map((m) => m.content)).toEqual(['hi', 'Done']);
    });

    it('should report unknown tools to the model', async () => {
      const model = new ScriptedModel([toolCallReply('missing_tool', {}, 'call_x'), textReply('Sorry')]);

      await loopWith(model).run(session, 'hi', new RecordingChannel());

      const last = model.calls[1]?.messages.at(-1);
      expect(last).toMatchObject({ role: 'tool', toolCallId: 'call_x', content: "Error: unknown tool 'missing_tool'" });
    });

    it('should stop after the maximum number of rounds', async () => {
      registry.register(replyTool('echo', 'again'));
      const model = new ScriptedModel([toolCallReply('echo')]);
      const channel = new RecordingChannel();

      const outcome = await loopWith(model, 3).run(session, 'loop forever', channel);

      expect(outcome).toEqual({ status: 'max_rounds', reply: MAX_ROUNDS_REPLY, rounds: 3 });
      expect(model.calls).toHaveLength(3);
      expect(channel.texts).toEqual([MAX_ROUNDS_REPLY]);
      expect(storage.history.get(SESSION_ID)?.map((m) => m.content)).toEqual(['loop forever', MAX_ROUNDS_REPLY]);
    });

    it('should keep text written alongside a tool call when the final round is empty', async () => {
      registry.register(replyTool('echo', 'echoed'));
      const model = new ScriptedModel([
        { toolCalls: [{ id: 'call_1', name: 'echo', arguments: {} }], text: 'I saved that for you.' },
        textReply(''),
      ]);
      const channel = new RecordingChannel();

      const outcome = await loopWith(model).run(session, 'remember X', channel);

      expect(outcome).toEqual({ status: 'completed', reply: 'I saved that for you.', rounds: 1 });
      expect(channel.texts).toEqual(['I saved that for you.']);
      expect(storage.history.get(SESSION_ID)?.map((m) => m.content)).toEqual(['remember X', 'I saved that for you.']);
    });

    it('should prefer earlier text over the round limit message', async () => {
      registry.register(replyTool('echo', 'again'));
      const model = new ScriptedModel([{ toolCalls: [{ id: 'call_1', name: 'echo', arguments: {} }], text: 'Working on it.' }]);
      const channel = new RecordingChannel();

      const outcome = await loopWith(model, 2).run(session, 'hi', channel);

      expect(outcome).toEqual({ status: 'max_rounds', reply: 'Working on it.', rounds: 2 });
      expect(channel.texts).toEqual(['Working on it.']);
    });

    it('should send the round limit message to streaming channels too', async () => {
      registry.register(replyTool('echo', 'again'));
      const channel = new RecordingChannel(true);

      await loopWith(new ScriptedModel([toolCallReply('echo')]), 2).run(session, 'hi', channel);

      expect(channel.texts).toEqual([MAX_ROUNDS_REPLY]);
    });

    it('should let per-run tools shadow registry tools', async () => {
      registry.register(replyTool('echo', 'registry'));
      const model = new ScriptedModel([toolCallReply('echo', {}, 'call_1'), textReply('Done')]);

      await loopWith(model).run(session, 'hi', new RecordingChannel(), { extraTools: [replyTool('echo', 'extra')] });

      expect(model.calls[0]?.tools.map((tool) => [tool.name, tool.description])).toEqual([['echo', 'Replies extra']]);
      expect(model.calls[1]?.messages.at(-1)?.content).toBe('extra');
    });

    it('should use the per-run model when given', async () => {
      const configured = new ScriptedModel([textReply('configured')]);
      const override = new ScriptedModel([textReply('override')]);

      const outcome = await loopWith(configured).run(session, 'hi', new RecordingChannel(), { model: override });

      expect(outcome.reply).toBe('override');
      expect(configured.calls).toHaveLength(0);
    });
  });

  describe('failures', () => {
    it('should send a readable error and persist nothing when the model fails', async () => {
      const model = new ScriptedModel([{ error: Object.assign(new Error('Too Many Requests'), { status: 429 }) }]);
      const channel = new RecordingChannel();

      const outcome = await loopWith(model).run(session, 'hi', channel);

      expect(outcome).toEqual({
        status: 'model_error',
        reply: 'Error: rate limit reached. Try again in a moment.',
        rounds: 0,
      });
      expect(channel.texts).toEqual(['Error: rate limit reached. Try again in a moment.']);
      expect(storage.history.get(SESSION_ID)).toBeUndefined();
    });

    it('should continue without history when context cannot be built', async () => {
      const broken: ConversationMemory = {
        async buildContext() {
          throw new Error('storage offline');
        },
        async persistExchange() {},
      };
      const model = new ScriptedModel([textReply('still here')]);
      const loop = new AgentLoop({ model, memory: broken, registry, systemPrompt: BASE });

      const outcome = await loop.run(session, 'hi', new RecordingChannel());

      expect(outcome.reply).toBe('still here');
      expect(model.calls[0]?.messages.map((m) => [m.role, m.content])).toEqual([
        ['system', BASE],
        ['user', 'hi'],
      ]);
    });

    it('should still deliver the reply when persisting fails', async () => {
      const failing: ConversationMemory = {
        buildContext: (s, prompt, text) => memory.buildContext(s, prompt, text),
        async persistExchange() {
          throw new Error('read-only filesystem');
        },
      };
      const channel = new RecordingChannel();
      const loop = new AgentLoop({ model: new ScriptedModel([textReply('ok')]), memory: failing, registry, systemPrompt: BASE });

      const outcome = await loop.run(session, 'hi', channel);

      expect(outcome.status).toBe('completed');
      expect(channel.texts).toEqual(['ok']);
    });

    it('should stop before calling the model when already aborted', async () => {
      const model = new ScriptedModel([textReply('never')]);
      const controller = new AbortController();
      controller.abort();

      const outcome = await loopWith(model).run(session, 'hi', new RecordingChannel(), { signal: controller.signal });

      expect(outcome).toEqual({ status: 'aborted', reply: '', rounds: 0 });
      expect(model.calls).toHaveLength(0);
      expect(storage.history.get(SESSION_ID)).toBeUndefined();
    });
  });
});
