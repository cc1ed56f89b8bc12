/**
 * @fileoverview Storage collaborator contract.
 *
 * The agent reads a window of prior turns and writes the user message and
 * the assistant answer. Every call is scoped by the caller's user ID; a
 * conversation that belongs to someone else does not exist.
 *
 * @module scoutline/storage
 * @version 0.1.0
 */

export interface Conversation {
  readonly id: string;
  readonly userId: string;
  readonly title: string;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/** Only user and assistant turns are persisted */
export type StoredRole = 'user' | 'assistant';

export interface StoredMessage {
  readonly id: string;
  readonly conversationId: string;
  readonly userId: string;
  readonly role: StoredRole;
  readonly content: string;

  /** Names of the tools used to produce an assistant answer */
  readonly toolCalls: ReadonlyArray<string> | null;

  readonly createdAt: string;
}

export interface NewMessage {
  readonly conversationId: string;
  readonly userId: string;
  readonly role: StoredRole;
  readonly content: string;
  readonly toolCalls?: ReadonlyArray<string>;
}

export interface ConversationStore {
  getConversation(conversationId: string, userId: string): Promise<Conversation | null>;

  createConversation(userId: string, title: string): Promise<Conversation>;

  /** The user's conversations, most recently updated first */
  listConversations(userId: string): Promise<Conversation[]>;

  /** Every message of a conversation, oldest first */
  getMessages(conversationId: string, userId: string): Promise<StoredMessage[]>;

  /** The last `limit` messages, oldest first */
  getRecentMessages(conversationId: string, userId: string, limit: number): Promise<StoredMessage[]>;

  saveMessage(message: NewMessage): Promise<StoredMessage>;
}

export class StorageError extends Error {
  readonly code = 'STORAGE_ERROR';

  constructor(
    readonly operation: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${operation} failed: ${message}`, options);
    this.name = 'StorageError';
  }
}
