/**
 * @fileoverview Unit tests for ChatService
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ChatService,
  ConversationNotFoundError,
  CONVERSATION_NOT_FOUND_MESSAGE,
  DEFAULT_CONVERSATION_TITLE,
  STORAGE_FAILURE_MESSAGE,
  usedToolNames,
} from './chat-service.js';
import { ReActLoop } from './react-loop.js';
import { createSystemPrompt } from './context-builder.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { InMemoryConversationStore } from '../storage/memory-store.js';
import type { NewMessage, StoredMessage } from '../storage/types.js';
import { ScriptedCompletionClient } from '../testing/scripted-completion.js';
import { Logger, MemoryTransport } from '../observability/logger.js';
import { Severity, toolSuccess, type AgentConfig } from '../types/index.js';

class FailingHistoryStore extends InMemoryConversationStore {
  override async getRecentMessages(): Promise<StoredMessage[]> {
    throw new Error('connection refused');
  }
}

class FailingAnswerStore extends InMemoryConversationStore {
  override async saveMessage(message: NewMessage): Promise<StoredMessage> {
    if (message.role === 'assistant') {
      throw new Error('insert rejected');
    }
    return super.saveMessage(message);
  }
}

function createRegistry(): ToolRegistry {
  return new ToolRegistry().register({
    name: 'web_search',
    displayName: 'Web Search',
    description: 'Search the web.',
    invoke: async input => toolSuccess(`results for ${input}`),
  });
}

describe('ChatService', () => {
  let store: InMemoryConversationStore;
  let tools: ToolRegistry;

  function createService(
    completion: ScriptedCompletionClient,
    config: Partial<AgentConfig> = {},
    options: { store?: InMemoryConversationStore; logger?: Logger } = {},
  ): ChatService {
    return new ChatService({
      loop: new ReActLoop({ completion, tools, config }),
      tools,
      store: options.store ?? store,
      logger: options.logger,
    });
  }

  beforeEach(() => {
    store = new InMemoryConversationStore();
    tools = createRegistry();
  });

  it('should stream the answer and persist both turns', async () => {
    const conversation = await store.createConversation('user-1', 'Greetings');
    const completion = new ScriptedCompletionClient({ replies: ['Hello there.'], streams: [['Hello ', 'there.']] });
    const service = createService(completion);

    const events = await service
      .processMessage({ conversationId: conversation.id, userId: 'user-1', text: 'Hi' })
      .collect();

    const saved = await store.getRecentMessages(conversation.id, 'user-1', 10);
    expect(saved.map(message => [message.role, message.content, message.toolCalls])).toEqual([
      ['user', 'Hi', null],
      ['assistant', 'Hello there.', null],
    ]);
    expect(events).toEqual([
      { type: 'token', text: 'Hello ' },
      { type: 'token', text: 'there.' },
      { type: 'done', messageId: saved[1].id },
    ]);
  });

  it('should build the context from the system prompt and the history window', async () => {
    const conversation = await store.createConversation('user-1', 'Chat');
    for (const [role, content] of [['user', 'u1'], ['assistant', 'a1'], ['user', 'u2']] as const) {
      await store.saveMessage({ conversationId: conversation.id, userId: 'user-1', role, content });
    }
    const completion = new ScriptedCompletionClient({ replies: ['ok'], streams: [['ok']] });
    const service = createService(completion, { historyWindow: 2 });

    await service.processMessage({ conversationId: conversation.id, userId: 'user-1', text: 'u3' }).collect();

    expect(completion.completeCalls[0]).toEqual([
      { role: 'system', content: createSystemPrompt(tools.list()) },
      { role: 'assistant', content: 'a1' },
      { role: 'user', content: 'u2' },
      { role: 'user', content: 'u3' },
    ]);
  });

  it('should record the tools used on the assistant message', async () => {
    const conversation = await store.createConversation('user-1', 'Space');
    const completion = new ScriptedCompletionClient({
      replies: ['ACTION: web_search\nINPUT: eclipse', 'The eclipse is trending.'],
      streams: [['The eclipse is trending.']],
    });
    const service = createService(completion);

    const events = await service
      .processMessage({ conversationId: conversation.id, userId: 'user-1', text: 'What about the eclipse?' })
      .collect();

    const saved = await store.getRecentMessages(conversation.id, 'user-1', 10);
    expect(saved[1].toolCalls).toEqual(['web_search']);
    expect(events.map(event => event.type)).toEqual(['tool_activity', 'tool_activity', 'token', 'done']);
  });

  it('should emit one error for a conversation the user does not own', async () => {
    const conversation = await store.createConversation('user-1', 'Private');
    const completion = new ScriptedCompletionClient({ replies: ['never'] });
    const service = createService(completion);

    const events = await service
      .processMessage({ conversationId: conversation.id, userId: 'user-2', text: 'Hi' })
      .collect();

    expect(events).toEqual([{ type: 'error', message: CONVERSATION_NOT_FOUND_MESSAGE }]);
    expect(completion.completeCalls).toHaveLength(0);
    expect(await store.getRecentMessages(conversation.id, 'user-1', 10)).toEqual([]);
  });

  it('should emit one error when history cannot be loaded', async () => {
    const failing = new FailingHistoryStore();
    const conversation = await failing.createConversation('user-1', 'Broken');
    const completion = new ScriptedCompletionClient({ replies: ['never'] });
    const transport = new MemoryTransport();
    const logger = new Logger({ minLevel: Severity.DEBUG, transports: [transport] });
    const service = createService(completion, {}, { store: failing, logger });

    const events = await service
      .processMessage({ conversationId: conversation.id, userId: 'user-1', text: 'Hi', correlationId: 'req-1' })
      .collect();

    expect(events).toEqual([{ type: 'error', message: STORAGE_FAILURE_MESSAGE }]);
    expect(completion.completeCalls).toHaveLength(0);

    const errors = transport.findByLevel(Severity.ERROR);
    expect(errors).toHaveLength(1);
    expect(errors[0].message).toBe('Could not prepare conversation');
    expect(errors[0].correlationId).toBe('req-1');
    expect(errors[0].error?.message).toBe('connection refused');
  });

  it('should finish with a null message ID when the answer cannot be saved', async () => {
    const failing = new FailingAnswerStore();
    const conversation = await failing.createConversation('user-1', 'Lossy');
    const completion = new ScriptedCompletionClient({ replies: ['Sure.'], streams: [['Sure.']] });
    const service = createService(completion, {}, { store: failing });

    const events = await service
      .processMessage({ conversationId: conversation.id, userId: 'user-1', text: 'Hi' })
      .collect();

    expect(events).toEqual([
      { type: 'token', text: 'Sure.' },
      { type: 'done', messageId: null },
    ]);
  });

  it('should keep concurrent conversations apart', async () => {
    const first = await store.createConversation('user-1', 'One');
    const second = await store.createConversation('user-2', 'Two');
    const completion = new ScriptedCompletionClient({
      replies: [messages => `echo ${messages[messages.length - 1]?.content ?? ''}`],
      streams: [[]],
      delayMs: 2,
    });
    const service = createService(completion);

    const [a, b] = await Promise.all([
      service.processMessage({ conversationId: first.id, userId: 'user-1', text: 'alpha' }).collect(),
      service.processMessage({ conversationId: second.id, userId: 'user-2', text: 'beta' }).collect(),
    ]);

    expect(a[0]).toEqual({ type: 'token', text: 'echo alpha' });
    expect(b[0]).toEqual({ type: 'token', text: 'echo beta' });
    expect((await store.getRecentMessages(first.id, 'user-1', 10)).map(m => m.content)).toEqual(['alpha', 'echo alpha']);
    expect((await store.getRecentMessages(second.id, 'user-2', 10)).map(m => m.content)).toEqual(['beta', 'echo beta']);
  });

  describe('requireConversation()', () => {
    it('should return an owned conversation', async () => {
      const conversation = await store.createConversation('user-1', 'Mine');
      const service = createService(new ScriptedCompletionClient({ replies: [''] }));

      await expect(service.requireConversation(conversation.id, 'user-1')).resolves.toEqual(conversation);
    });

    it('should reject a conversation owned by someone else', async () => {
      const conversation = await store.createConversation('user-1', 'Mine');
      const service = createService(new ScriptedCompletionClient({ replies: [''] }));

      await expect(service.requireConversation(conversation.id, 'user-2')).rejects.toBeInstanceOf(
        ConversationNotFoundError,
      );
    });
  });

  describe('conversations', () => {
    it('should start a conversation with the default title', async () => {
      const service = createService(new ScriptedCompletionClient({ replies: [''] }));

      const conversation = await service.startConversation('user-1');

      expect(conversation.title).toBe(DEFAULT_CONVERSATION_TITLE);
      expect(await service.listConversations('user-1')).toEqual([conversation]);
      expect(await service.listConversations('user-2')).toEqual([]);
    });

    it('should return the full history of an owned conversation', async () => {
      const conversation = await store.createConversation('user-1', 'Chat');
      for (const content of ['u1', 'u2', 'u3']) {
        await store.saveMessage({ conversationId: conversation.id, userId: 'user-1', role: 'user', content });
      }
      const service = createService(new ScriptedCompletionClient({ replies: [''] }));

      const history = await service.getHistory(conversation.id, 'user-1');

      expect(history.map(message => message.content)).toEqual(['u1', 'u2', 'u3']);
      await expect(service.getHistory(conversation.id, 'user-2')).rejects.toBeInstanceOf(ConversationNotFoundError);
    });
  });

  it('should list each tool once in call order', () => {
    expect(
      usedToolNames({ toolResults: [{ toolName: 'web_search' }, { toolName: 'google_trends' }, { toolName: 'web_search' }] }),
    ).toEqual(['web_search', 'google_trends']);
  });
});
