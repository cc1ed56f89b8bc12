/**
 * @fileoverview Chat Service - the inbound operation. Turns one user
 * message into an {@link EventStream}: loads the conversation window,
 * persists the message, runs the loop, persists the answer.
 *
 * @module scoutline/agent/chat-service
 * @version 0.1.0
 */

import { v4 as uuidv4 } from 'uuid';
import type { Message } from '../types/core.types.js';
import { createUniqueId } from '../types/core.types.js';
import type { Conversation, ConversationStore, StoredMessage } from '../storage/types.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import { EventStream } from '../events/event-stream.js';
import { type Logger, createSilentLogger } from '../observability/logger.js';
import type { FinalizeHook, LoopOutcome, ReActLoop } from './react-loop.js';
import { buildContext, createSystemPrompt } from './context-builder.js';

/** Sent when the conversation cannot be read or written before the loop starts */
export const STORAGE_FAILURE_MESSAGE = 'Could not load the conversation. Please try again.';

export const CONVERSATION_NOT_FOUND_MESSAGE = 'Conversation not found';

export const DEFAULT_CONVERSATION_TITLE = 'New Conversation';

export interface ChatRequest {
  readonly conversationId: string;
  readonly userId: string;
  readonly text: string;

  /** Shared by every log entry of this request; generated when absent */
  readonly correlationId?: string;
}

export interface ChatServiceOptions {
  readonly loop: ReActLoop;
  readonly tools: ToolRegistry;
  readonly store: ConversationStore;

  /** Overrides the prompt rendered from the registered tools */
  readonly systemPrompt?: string;

  readonly logger?: Logger;
}

export class ConversationNotFoundError extends Error {
  readonly code = 'CONVERSATION_NOT_FOUND';

  constructor(readonly conversationId: string) {
    super(`${CONVERSATION_NOT_FOUND_MESSAGE}: ${conversationId}`);
    this.name = 'ConversationNotFoundError';
  }
}

export function toMessage(stored: StoredMessage): Message {
  return { role: stored.role, content: stored.content };
}

/**
 * Distinct tool names in call order.
 */
export function usedToolNames(outcome: { readonly toolResults: ReadonlyArray<{ readonly toolName: string }> }): string[] {
  return [...new Set(outcome.toolResults.map(result => result.toolName))];
}

export class ChatService {
  private readonly loop: ReActLoop;
  private readonly store: ConversationStore;
  private readonly systemPrompt: string;
  private readonly logger: Logger;

  constructor(options: ChatServiceOptions) {
    this.loop = options.loop;
    this.store = options.store;
    this.systemPrompt = options.systemPrompt ?? createSystemPrompt(options.tools.list());
    this.logger = (options.logger ?? createSilentLogger()).child({ module: 'agent.chat' });
  }

  /**
   * Looks up a conversation owned by `userId`.
   *
   * @throws ConversationNotFoundError
   */
  async requireConversation(conversationId: string, userId: string): Promise<Conversation> {
    const conversation = await this.store.getConversation(conversationId, userId);
    if (conversation === null) {
      throw new ConversationNotFoundError(conversationId);
    }
    return conversation;
  }

  async startConversation(userId: string, title: string = DEFAULT_CONVERSATION_TITLE): Promise<Conversation> {
    const conversation = await this.store.createConversation(userId, title);
    this.logger.info('Conversation created', { conversationId: conversation.id });
    return conversation;
  }

  listConversations(userId: string): Promise<Conversation[]> {
    return this.store.listConversations(userId);
  }

  /**
   * Every stored message of a conversation owned by `userId`, oldest first.
   *
   * @throws ConversationNotFoundError
   */
  async getHistory(conversationId: string, userId: string): Promise<StoredMessage[]> {
    await this.requireConversation(conversationId, userId);
    return this.store.getMessages(conversationId, userId);
  }

  /**
   * Starts processing a message and returns its event stream at once.
   * The stream always ends with exactly one `done` or `error` event unless
   * the consumer cancels it.
   */
  processMessage(request: ChatRequest): EventStream {
    const stream = new EventStream();
    const correlationId = request.correlationId ?? uuidv4();
    const logger = this.logger.child({ correlationId });

    void this.drive(request, stream, correlationId, logger).catch((error: unknown) => {
      logger.error('Chat request failed', { conversationId: request.conversationId }, error);
      stream.fail(STORAGE_FAILURE_MESSAGE);
    });

    return stream;
  }

  // ============ Private Methods ============

  private async drive(
    request: ChatRequest,
    stream: EventStream,
    correlationId: string,
    logger: Logger,
  ): Promise<LoopOutcome | null> {
    const { conversationId, userId, text } = request;
    const historyWindow = this.loop.getConfig().historyWindow;

    let history: StoredMessage[];
    try {
      const conversation = await this.store.getConversation(conversationId, userId);
      if (conversation === null) {
        logger.warn('Conversation not found', { conversationId });
        stream.fail(CONVERSATION_NOT_FOUND_MESSAGE);
        return null;
      }

      history = await this.store.getRecentMessages(conversationId, userId, historyWindow);
      await this.store.saveMessage({ conversationId, userId, role: 'user', content: text });
    } catch (error) {
      logger.error('Could not prepare conversation', { conversationId }, error);
      stream.fail(STORAGE_FAILURE_MESSAGE);
      return null;
    }

    if (stream.isCancelled()) {
      logger.info('Consumer left before the loop started', { conversationId });
      return null;
    }

    logger.info('Processing message', { conversationId, historyMessages: history.length });

    const messages = buildContext({
      systemPrompt: this.systemPrompt,
      history: history.map(toMessage),
      userMessage: text,
      historyWindow,
    });

    const finalize: FinalizeHook = async (finalAnswer, context) => {
      const toolCalls = usedToolNames(context);
      const saved = await this.store.saveMessage({
        conversationId,
        userId,
        role: 'assistant',
        content: finalAnswer,
        ...(toolCalls.length > 0 ? { toolCalls } : {}),
      });
      return saved.id;
    };

    return this.loop.run(messages, stream, {
      runId: createUniqueId(correlationId),
      finalize,
      logger,
    });
  }
}
