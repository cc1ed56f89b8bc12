/**
 * @fileoverview Unit tests for the in-memory conversation store
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryConversationStore } from './memory-store.js';

describe('InMemoryConversationStore', () => {
  let store: InMemoryConversationStore;

  beforeEach(() => {
    store = new InMemoryConversationStore();
  });

  it('should only return conversations to their owner', async () => {
    const conversation = await store.createConversation('user-a', 'Trends');

    expect(await store.getConversation(conversation.id, 'user-a')).toEqual(conversation);
    expect(await store.getConversation(conversation.id, 'user-b')).toBeNull();
    expect(await store.getConversation('missing', 'user-a')).toBeNull();
  });

  it('should return the most recent messages oldest first', async () => {
    const { id } = await store.createConversation('user-a', 'Chat');
    for (const content of ['m1', 'm2', 'm3', 'm4']) {
      await store.saveMessage({ conversationId: id, userId: 'user-a', role: 'user', content });
    }

    const recent = await store.getRecentMessages(id, 'user-a', 2);

    expect(recent.map(m => m.content)).toEqual(['m3', 'm4']);
    expect(await store.getRecentMessages(id, 'user-a', 0)).toEqual([]);
  });

  it('should scope messages by user', async () => {
    const { id } = await store.createConversation('user-a', 'Chat');
    await store.saveMessage({ conversationId: id, userId: 'user-a', role: 'user', content: 'mine' });

    expect(await store.getRecentMessages(id, 'user-b', 10)).toEqual([]);
  });

  it('should store tool names with assistant answers', async () => {
    const { id } = await store.createConversation('user-a', 'Chat');

    const saved = await store.saveMessage({
      conversationId: id,
      userId: 'user-a',
      role: 'assistant',
      content: 'The eclipse is trending.',
      toolCalls: ['google_trends'],
    });

    expect(saved.toolCalls).toEqual(['google_trends']);
    expect(saved.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should list only the owner\'s conversations, most recently updated first', async () => {
    const older = await store.createConversation('user-a', 'Older');
    const newer = await store.createConversation('user-a', 'Newer');
    await store.createConversation('user-b', 'Theirs');

    const listed = await store.listConversations('user-a');

    expect(listed.map(c => c.id)).toEqual([newer.id, older.id]);
    expect(await store.listConversations('user-c')).toEqual([]);
  });

  it('should return every message of a conversation oldest first', async () => {
    const { id } = await store.createConversation('user-a', 'Chat');
    for (const content of ['m1', 'm2', 'm3']) {
      await store.saveMessage({ conversationId: id, userId: 'user-a', role: 'user', content });
    }

    expect((await store.getMessages(id, 'user-a')).map(m => m.content)).toEqual(['m1', 'm2', 'm3']);
    expect(await store.getMessages(id, 'user-b')).toEqual([]);
  });
});
