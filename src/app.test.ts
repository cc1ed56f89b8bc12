/**
 * @fileoverview Wiring tests for the composition root
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createApp, createToolRegistry, REQUIRED_TOOLS } from './app.js';
import { loadConfig } from './config.js';
import { InMemoryConversationStore } from './storage/memory-store.js';
import { ScriptedCompletionClient } from './testing/scripted-completion.js';
import type { ChatServer } from './server/http-server.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('createApp()', () => {
  let server: ChatServer | null = null;

  afterEach(async () => {
    await server?.stop();
    server = null;
  });

  it('should register both required tools', () => {
    const config = loadConfig({ LLM_API_KEY: 'test-secret' });

    const registry = createToolRegistry(config);

    expect(registry.names()).toEqual(['web_search', 'google_trends']);
    expect(REQUIRED_TOOLS).toEqual(['web_search', 'google_trends']);
  });

  it('should answer a message end to end through the configured tools', async () => {
    const config = loadConfig({ LLM_API_KEY: 'test-secret', TAVILY_API_KEY: 'test-secret', HISTORY_WINDOW: '4' });
    const fetchStub = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({ answer: 'Yes.', results: [] }),
    );
    const store = new InMemoryConversationStore();
    const completion = new ScriptedCompletionClient({
      replies: ['ACTION: web_search\nINPUT: solar eclipse', 'There is an eclipse today.'],
      streams: [['There is an eclipse today.']],
    });
    const app = createApp(config, { completion, store, fetch: fetchStub });
    const conversation = await store.createConversation('user-1', 'Sky');

    const events = await app.chat
      .processMessage({ conversationId: conversation.id, userId: 'user-1', text: 'Any eclipse?' })
      .collect();

    expect(fetchStub).toHaveBeenCalledTimes(1);
    expect(fetchStub.mock.calls[0]?.[0]).toBe('https://api.tavily.com/search');
    expect(completion.completeCalls[1]?.[3]).toEqual({
      role: 'tool_result',
      content: "Tool result (web_search):\nSearch results for 'solar eclipse':\n\nAnswer: Yes.\n\nNo results found.",
    });
    expect(events[events.length - 1]?.type).toBe('done');
    expect(app.loop.getConfig().historyWindow).toBe(4);
  });

  it('should check the trends server for health', async () => {
    const config = loadConfig({ LLM_API_KEY: 'test-secret', MCP_URL: 'http://trends.test:5000' });
    const fetchStub = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => new Response('ok'));
    const app = createApp(config, {
      completion: new ScriptedCompletionClient({ replies: [''] }),
      store: new InMemoryConversationStore(),
      fetch: fetchStub,
    });
    server = app.createServer({ host: '127.0.0.1', port: 0 });
    await server.start();

    const health = await server.health();

    expect(health).toEqual({ status: 'ok', tools: ['web_search', 'google_trends'], trends: 'ok' });
    expect(fetchStub.mock.calls[0]?.[0]).toBe('http://trends.test:5000/healthz');
  });

  it('should require UUID user ids when Supabase stores the conversations', async () => {
    const config = loadConfig({
      LLM_API_KEY: 'test-secret',
      SUPABASE_URL: 'http://supabase.test',
      SUPABASE_KEY: 'test-secret',
    });
    const app = createApp(config, {
      completion: new ScriptedCompletionClient({ replies: [''] }),
      store: new InMemoryConversationStore(),
    });
    server = app.createServer({ host: '127.0.0.1', port: 0 });
    const { port } = await server.start();
    const list = (userId: string): Promise<Response> =>
      fetch(`http://127.0.0.1:${port}/chat/conversations`, { headers: { 'x-user-id': userId } });

    const rejected = await list('user-1');
    const accepted = await list('6f1c2a9e-4b7d-4e21-9a3f-0c5d8e7b1a24');

    expect(rejected.status).toBe(401);
    expect(await rejected.json()).toEqual({ error: 'Missing user identity' });
    expect(accepted.status).toBe(200);
    expect(await accepted.json()).toEqual({ conversations: [], count: 0 });
  });
});
