/**
 * @fileoverview Supabase-backed conversation store.
 *
 * Tables `conversations` and `messages` (see `sql/001_create_tables.sql`).
 * Every query filters on `user_id` as well as relying on row-level security.
 *
 * @module scoutline/storage/supabase-store
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { Conversation, ConversationStore, NewMessage, StoredMessage } from './types.js';
import { StorageError } from './types.js';

const ConversationRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  title: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

const MessageRowSchema = z.object({
  id: z.string(),
  conversation_id: z.string(),
  user_id: z.string(),
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  tool_calls: z.array(z.string()).nullable().default(null),
  created_at: z.string(),
});

export function toConversation(row: unknown): Conversation {
  const parsed = ConversationRowSchema.parse(row);
  return {
    id: parsed.id,
    userId: parsed.user_id,
    title: parsed.title,
    createdAt: parsed.created_at,
    updatedAt: parsed.updated_at,
  };
}

export function toStoredMessage(row: unknown): StoredMessage {
  const parsed = MessageRowSchema.parse(row);
  return {
    id: parsed.id,
    conversationId: parsed.conversation_id,
    userId: parsed.user_id,
    role: parsed.role,
    content: parsed.content,
    toolCalls: parsed.tool_calls,
    createdAt: parsed.created_at,
  };
}

export class SupabaseConversationStore implements ConversationStore {
  constructor(private readonly client: SupabaseClient) {}

  static connect(url: string, key: string): SupabaseConversationStore {
    return new SupabaseConversationStore(
      createClient(url, key, {
        auth: {
          autoRefreshToken: false,
          persistSession: false,
        },
      }),
    );
  }

  async getConversation(conversationId: string, userId: string): Promise<Conversation | null> {
    const { data, error } = await this.client
      .from('conversations')
      .select('*')
      .eq('id', conversationId)
      .eq('user_id', userId)
      .maybeSingle();

    if (error) {
      throw new StorageError('getConversation', error.message, { cause: error });
    }
    return data === null ? null : this.mapRow('getConversation', () => toConversation(data));
  }

  async createConversation(userId: string, title: string): Promise<Conversation> {
    const { data, error } = await this.client
      .from('conversations')
      .insert({ user_id: userId, title })
      .select()
      .single();

    if (error) {
      throw new StorageError('createConversation', error.message, { cause: error });
    }
    return this.mapRow('createConversation', () => toConversation(data));
  }

  async listConversations(userId: string): Promise<Conversation[]> {
    const { data, error } = await this.client
      .from('conversations')
      .select('*')
      .eq('user_id', userId)
      .order('updated_at', { ascending: false });

    if (error) {
      throw new StorageError('listConversations', error.message, { cause: error });
    }
    const rows: unknown[] = data ?? [];
    return this.mapRow('listConversations', () => rows.map(toConversation));
  }

  async getMessages(conversationId: string, userId: string): Promise<StoredMessage[]> {
    const { data, error } = await this.client
      .from('messages')
      .select('*')
      .eq('conversation_id', conversationId)
      .eq('user_id', userId)
      .order('created_at', { ascending: true });

    if (error) {
      throw new StorageError('getMessages', error.message, { cause: error });
    }
    const rows: unknown[] = data ?? [];
    return this.mapRow('getMessages', () => rows.map(toStoredMessage));
  }

  async getRecentMessages(conversationId: string, userId: string, limit: number): Promise<StoredMessage[]> {
    if (limit <= 0) {
      return [];
    }

    const { data, error } = await this.client
      .from('messages')
      .select('*')
      .eq('conversation_id', conversationId)
      .eq('user_id', userId)
      .order('created_at', { ascending: false })
      .limit(limit);

    if (error) {
      throw new StorageError('getRecentMessages', error.message, { cause: error });
    }
    const rows: unknown[] = data ?? [];
    return this.mapRow('getRecentMessages', () => rows.map(toStoredMessage).reverse());
  }

  async saveMessage(message: NewMessage): Promise<StoredMessage> {
    const { data, error } = await this.client
      .from('messages')
      .insert({
        conversation_id: message.conversationId,
        user_id: message.userId,
        role: message.role,
        content: message.content,
        tool_calls: message.toolCalls ?? null,
      })
      .select()
      .single();

    if (error) {
      throw new StorageError('saveMessage', error.message, { cause: error });
    }
    return this.mapRow('saveMessage', () => toStoredMessage(data));
  }

  // ============ Private Methods ============

  private mapRow<T>(operation: string, map: () => T): T {
    try {
      return map();
    } catch (error) {
      throw new StorageError(operation, 'unexpected row shape', { cause: error });
    }
  }
}
