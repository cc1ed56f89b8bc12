/**
 * @fileoverview Storage module public exports.
 *
 * @module scoutline/storage
 */

export {
  StorageError,
  type Conversation,
  type ConversationStore,
  type NewMessage,
  type StoredMessage,
  type StoredRole,
} from './types.js';
export { InMemoryConversationStore } from './memory-store.js';
export { SupabaseConversationStore, toConversation, toStoredMessage } from './supabase-store.js';
