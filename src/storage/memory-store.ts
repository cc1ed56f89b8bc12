/**
 * @fileoverview In-process conversation store for tests and the CLI.
 *
 * @module scoutline/storage/memory-store
 */

import { v4 as uuidv4 } from 'uuid';
import type { Conversation, ConversationStore, NewMessage, StoredMessage } from './types.js';

export class InMemoryConversationStore implements ConversationStore {
  private readonly conversations: Map<string, Conversation> = new Map();

  /** Insertion order doubles as chronological order */
  private readonly messages: StoredMessage[] = [];

  async getConversation(conversationId: string, userId: string): Promise<Conversation | null> {
    const conversation = this.conversations.get(conversationId);
    return conversation !== undefined && conversation.userId === userId ? conversation : null;
  }

  async createConversation(userId: string, title: string): Promise<Conversation> {
    const now = new Date().toISOString();
    const conversation: Conversation = { id: uuidv4(), userId, title, createdAt: now, updatedAt: now };
    this.conversations.set(conversation.id, conversation);
    return conversation;
  }

  async listConversations(userId: string): Promise<Conversation[]> {
    return [...this.conversations.values()]
      .filter(conversation => conversation.userId === userId)
      .reverse()
      .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  async getMessages(conversationId: string, userId: string): Promise<StoredMessage[]> {
    return this.messages.filter(message => message.conversationId === conversationId && message.userId === userId);
  }

  async getRecentMessages(conversationId: string, userId: string, limit: number): Promise<StoredMessage[]> {
    if (limit <= 0) {
      return [];
    }
    return this.messages
      .filter(message => message.conversationId === conversationId && message.userId === userId)
      .slice(-limit);
  }

  async saveMessage(message: NewMessage): Promise<StoredMessage> {
    const stored: StoredMessage = {
      id: uuidv4(),
      conversationId: message.conversationId,
      userId: message.userId,
      role: message.role,
      content: message.content,
      toolCalls: message.toolCalls !== undefined ? [...message.toolCalls] : null,
      createdAt: new Date().toISOString(),
    };
    this.messages.push(stored);

    const conversation = this.conversations.get(message.conversationId);
    if (conversation !== undefined) {
      this.conversations.set(conversation.id, { ...conversation, updatedAt: stored.createdAt });
    }
    return stored;
  }

  clear(): void {
    this.conversations.clear();
    this.messages.length = 0;
  }
}
