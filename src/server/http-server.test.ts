/**
 * @fileoverview Round-trip tests for the HTTP transport on an ephemeral port
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ChatServer, type ChatServerConfig } from './http-server.js';
import { parseSseFrames } from './sse.js';
import { ChatService } from '../agent/chat-service.js';
import { ReActLoop } from '../agent/react-loop.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { InMemoryConversationStore } from '../storage/memory-store.js';
import type { Conversation } from '../storage/types.js';
import { ScriptedCompletionClient } from '../testing/scripted-completion.js';
import { toolSuccess } from '../types/index.js';

describe('ChatServer', () => {
  let store: InMemoryConversationStore;
  let tools: ToolRegistry;
  let server: ChatServer | null;
  let conversation: Conversation;

  async function startServer(
    completion: ScriptedCompletionClient,
    overrides: Partial<ChatServerConfig> = {},
  ): Promise<{ baseUrl: string; loop: ReActLoop }> {
    const loop = new ReActLoop({ completion, tools });
    const chat = new ChatService({ loop, tools, store });
    server = new ChatServer({ chat, tools, host: '127.0.0.1', port: 0, ...overrides });
    const { port } = await server.start();
    return { baseUrl: `http://127.0.0.1:${port}`, loop };
  }

  function postMessage(baseUrl: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> {
    return fetch(`${baseUrl}/chat/message`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'x-user-id': 'user-1', ...headers },
      body: JSON.stringify(body),
    });
  }

  beforeEach(async () => {
    server = null;
    store = new InMemoryConversationStore();
    tools = new ToolRegistry().register({
      name: 'web_search',
      displayName: 'Web Search',
      description: 'Search the web.',
      invoke: async input => toolSuccess(`results for ${input}`),
    });
    conversation = await store.createConversation('user-1', 'Test');
  });

  afterEach(async () => {
    await server?.stop();
  });

  describe('GET /health', () => {
    it('should report the tools and trends health', async () => {
      const { baseUrl } = await startServer(new ScriptedCompletionClient({ replies: [''] }), {
        trendsHealth: async () => false,
      });

      const response = await fetch(`${baseUrl}/health`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ status: 'ok', tools: ['web_search'], trends: 'unavailable' });
    });

    it('should report unknown trends health when no check is configured', async () => {
      const { baseUrl } = await startServer(new ScriptedCompletionClient({ replies: [''] }));

      const response = await fetch(`${baseUrl}/health`);

      expect(await response.json()).toEqual({ status: 'ok', tools: ['web_search'], trends: 'unknown' });
    });
  });

  describe('conversations', () => {
    function request(baseUrl: string, path: string, init: RequestInit = {}, userId = 'user-1'): Promise<Response> {
      return fetch(`${baseUrl}${path}`, {
        ...init,
        headers: { 'Content-Type': 'application/json', 'x-user-id': userId },
      });
    }

    it('should create a conversation for the caller', async () => {
      const { baseUrl } = await startServer(new ScriptedCompletionClient({ replies: [''] }));

      const response = await request(baseUrl, '/chat/conversations', {
        method: 'POST',
        body: JSON.stringify({ title: '  Eclipse questions ' }),
      });

      expect(response.status).toBe(201);
      const body: unknown = await response.json();
      const created = await store.listConversations('user-1');
      expect(created.map(c => c.title)).toEqual(['Eclipse questions', 'Test']);
      expect(body).toEqual({
        id: created[0].id,
        user_id: 'user-1',
        title: 'Eclipse questions',
        created_at: created[0].createdAt,
        updated_at: created[0].updatedAt,
      });
    });

    it('should use a default title when none is given', async () => {
      const { baseUrl } = await startServer(new ScriptedCompletionClient({ replies: [''] }));

      const response = await request(baseUrl, '/chat/conversations', { method: 'POST' }, 'user-2');

      expect(response.status).toBe(201);
      expect(await response.json()).toMatchObject({ user_id: 'user-2', title: 'New Conversation' });
    });

    it('should answer 422 for an empty title', async () => {
      const { baseUrl } = await startServer(new ScriptedCompletionClient({ replies: [''] }));

      const response = await request(baseUrl, '/chat/conversations', {
        method: 'POST',
        body: JSON.stringify({ title: '   ' }),
      });

      expect(response.status).toBe(422);
      expect(await response.json()).toMatchObject({ error: 'Invalid request body', details: [{ field: 'title' }] });
    });

    it('should list only the caller\'s conversations', async () => {
      await store.createConversation('user-2', 'Not yours');
      const { baseUrl } = await startServer(new ScriptedCompletionClient({ replies: [''] }));

      const response = await request(baseUrl, '/chat/conversations');

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        conversations: [
          {
            id: conversation.id,
            user_id: 'user-1',
            title: 'Test',
            created_at: conversation.createdAt,
            updated_at: conversation.updatedAt,
          },
        ],
        count: 1,
      });
    });

    it('should create a conversation, chat in it and read the history back', async () => {
      const completion = new ScriptedCompletionClient({ replies: ['Hello there.'], streams: [['Hello there.']] });
      const { baseUrl } = await startServer(completion);

      const created = await request(baseUrl, '/chat/conversations', {
        method: 'POST',
        body: JSON.stringify({ title: 'Greetings' }),
      });
      const createdBody: unknown = await created.json();
      const parsed = typeof createdBody === 'object' && createdBody !== null && 'id' in createdBody ? createdBody.id : null;
      if (typeof parsed !== 'string') {
        expect.unreachable('created conversation should carry an id');
        return;
      }
      const chat = await postMessage(baseUrl, { conversation_id: parsed, content: 'Hi' });
      await chat.text();

      const history = await request(baseUrl, `/chat/conversations/${parsed}/messages`);

      expect(history.status).toBe(200);
      expect(await history.json()).toMatchObject({
        conversation_id: parsed,
        count: 2,
        messages: [
          { conversation_id: parsed, user_id: 'user-1', role: 'user', content: 'Hi', tool_calls: null },
          { conversation_id: parsed, user_id: 'user-1', role: 'assistant', content: 'Hello there.', tool_calls: null },
        ],
      });
    });

    it('should answer 404 for the history of someone else\'s conversation', async () => {
      const { baseUrl } = await startServer(new ScriptedCompletionClient({ replies: [''] }));

      const response = await request(baseUrl, `/chat/conversations/${conversation.id}/messages`, {}, 'user-2');

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: 'Conversation not found' });
    });

    it('should require a user identity', async () => {
      const { baseUrl } = await startServer(new ScriptedCompletionClient({ replies: [''] }));

      const response = await request(baseUrl, '/chat/conversations', {}, '');

      expect(response.status).toBe(401);
    });

    it('should answer 405 for other methods', async () => {
      const { baseUrl } = await startServer(new ScriptedCompletionClient({ replies: [''] }));

      const response = await request(baseUrl, `/chat/conversations/${conversation.id}/messages`, { method: 'DELETE' });

      expect(response.status).toBe(405);
    });
  });

  describe('POST /chat/message', () => {
    it('should stream SSE frames ending with done', async () => {
      const completion = new ScriptedCompletionClient({
        replies: ['ACTION: web_search\nINPUT: eclipse', 'It is trending.'],
        streams: [['It is ', 'trending.']],
      });
      const { baseUrl } = await startServer(completion);

      const response = await postMessage(
        baseUrl,
        { conversation_id: conversation.id, content: 'Is the eclipse trending?' },
        { 'x-request-id': 'req-7' },
      );

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('text/event-stream; charset=utf-8');
      expect(response.headers.get('x-request-id')).toBe('req-7');

      const frames = parseSseFrames(await response.text());
      const saved = await store.getRecentMessages(conversation.id, 'user-1', 10);
      expect(frames).toEqual([
        { event: 'tool_activity', data: { type: 'tool_activity', toolName: 'web_search', phase: 'started' } },
        { event: 'tool_activity', data: { type: 'tool_activity', toolName: 'web_search', phase: 'completed' } },
        { event: 'token', data: { type: 'token', text: 'It is ' } },
        { event: 'token', data: { type: 'token', text: 'trending.' } },
        { event: 'done', data: { type: 'done', messageId: saved[1].id } },
      ]);
    });

    it('should reject a missing or wrong API key', async () => {
      const { baseUrl } = await startServer(new ScriptedCompletionClient({ replies: [''] }), {
        apiKey: 'test-secret',
      });
      const body = { conversation_id: conversation.id, content: 'Hi' };

      const missing = await postMessage(baseUrl, body);
      const wrong = await postMessage(baseUrl, body, { Authorization: 'Bearer nope' });

      expect(missing.status).toBe(401);
      expect(await missing.json()).toEqual({ error: 'Unauthorized' });
      expect(wrong.status).toBe(401);
    });

    it('should accept the right API key', async () => {
      const { baseUrl } = await startServer(new ScriptedCompletionClient({ replies: ['Hi.'], streams: [['Hi.']] }), {
        apiKey: 'test-secret',
      });

      const response = await postMessage(
        baseUrl,
        { conversation_id: conversation.id, content: 'Hi' },
        { Authorization: 'Bearer test-secret' },
      );

      expect(response.status).toBe(200);
      await response.text();
    });

    it('should reject requests without a user identity', async () => {
      const { baseUrl } = await startServer(new ScriptedCompletionClient({ replies: [''] }));

      const response = await postMessage(baseUrl, { conversation_id: conversation.id, content: 'Hi' }, { 'x-user-id': '' });

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({ error: 'Missing user identity' });
    });

    it('should answer 422 for an invalid body', async () => {
      const { baseUrl } = await startServer(new ScriptedCompletionClient({ replies: [''] }));

      const empty = await postMessage(baseUrl, { conversation_id: conversation.id, content: '' });
      const tooLong = await postMessage(baseUrl, { conversation_id: conversation.id, content: 'x'.repeat(4097) });

      expect(empty.status).toBe(422);
      const emptyBody: unknown = await empty.json();
      expect(emptyBody).toMatchObject({ error: 'Invalid request body', details: [{ field: 'content' }] });
      expect(tooLong.status).toBe(422);
    });

    it('should answer 400 for malformed JSON', async () => {
      const { baseUrl } = await startServer(new ScriptedCompletionClient({ replies: [''] }));

      const response = await fetch(`${baseUrl}/chat/message`, {
        method: 'POST',
        headers: { 'x-user-id': 'user-1' },
        body: '{not json',
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: 'Invalid JSON' });
    });

    it('should answer 404 for a conversation owned by someone else', async () => {
      const completion = new ScriptedCompletionClient({ replies: ['never'] });
      const { baseUrl } = await startServer(completion);

      const response = await postMessage(
        baseUrl,
        { conversation_id: conversation.id, content: 'Hi' },
        { 'x-user-id': 'user-2' },
      );

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: 'Conversation not found' });
      expect(completion.completeCalls).toHaveLength(0);
    });

    it('should cancel the loop when the client disconnects', async () => {
      const completion = new ScriptedCompletionClient({
        replies: ['A long answer.'],
        streams: [Array.from({ length: 50 }, (_, i) => `token${i} `)],
        delayMs: 10,
      });
      const { baseUrl, loop } = await startServer(completion);
      const cancelled = new Promise<void>(resolve => loop.once('loop:cancelled', () => resolve()));
      const controller = new AbortController();

      const response = await fetch(`${baseUrl}/chat/message`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'x-user-id': 'user-1' },
        body: JSON.stringify({ conversation_id: conversation.id, content: 'Tell me a story' }),
        signal: controller.signal,
      });
      const body = response.body;
      if (body === null) {
        expect.unreachable('SSE response should have a body');
        return;
      }
      const reader = body.getReader();
      await reader.read();
      controller.abort();

      await cancelled;
      const saved = await store.getRecentMessages(conversation.id, 'user-1', 10);
      expect(saved.map(message => message.role)).toEqual(['user']);
    });
  });

  it('should answer 404 for unknown paths and 405 for wrong methods', async () => {
    const { baseUrl } = await startServer(new ScriptedCompletionClient({ replies: [''] }));

    const unknown = await fetch(`${baseUrl}/nope`);
    const wrongMethod = await fetch(`${baseUrl}/chat/message`);

    expect(unknown.status).toBe(404);
    expect(wrongMethod.status).toBe(405);
  });
});
