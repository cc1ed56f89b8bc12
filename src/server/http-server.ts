/**
 * @fileoverview HTTP transport for the chat service.
 *
 * - `GET /health` reports the registered tools and trends-server health
 * - `POST /chat/conversations` creates a conversation for the caller
 * - `GET /chat/conversations` lists the caller's conversations
 * - `GET /chat/conversations/:id/messages` returns a conversation's history
 * - `POST /chat/message` streams the answer as Server-Sent Events
 *
 * @example
 * ```typescript
 * const server = new ChatServer({ chat, tools, port: 8000, apiKey: process.env.API_KEY });
 * const { port } = await server.start();
 * ```
 *
 * @module scoutline/server/http-server
 * @version 0.1.0
 */

import * as http from 'node:http';
import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { ToolRegistry } from '../tools/tool-registry.js';
import type { Conversation, StoredMessage } from '../storage/types.js';
import { type ChatService, ConversationNotFoundError } from '../agent/chat-service.js';
import { type Logger, createSilentLogger } from '../observability/logger.js';
import { SSE_HEADERS, encodeSseFrame } from './sse.js';

export const MAX_MESSAGE_LENGTH = 4096;

const MAX_BODY_BYTES = 64 * 1024;

export const ChatMessageBodySchema = z.object({
  conversation_id: z.string().min(1),
  content: z.string().min(1).max(MAX_MESSAGE_LENGTH),
});

export type ChatMessageBody = z.infer<typeof ChatMessageBodySchema>;

export const CreateConversationBodySchema = z.object({
  title: z.string().trim().min(1).max(200).optional(),
});

const CONVERSATION_MESSAGES_PATH = /^\/chat\/conversations\/([^/]+)\/messages$/;

/**
 * Maps a request to the caller's user ID; null rejects it with 401.
 */
export type UserResolver = (req: http.IncomingMessage) => string | null;

export const headerUserResolver: UserResolver = req => {
  const value = req.headers['x-user-id'];
  const userId = Array.isArray(value) ? value[0] : value;
  return userId !== undefined && userId.trim() !== '' ? userId.trim() : null;
};

const UserIdSchema = z.string().uuid();

/** Like `headerUserResolver`, but only accepts UUIDs (the Supabase `user_id` column type) */
export const uuidHeaderUserResolver: UserResolver = req => {
  const userId = headerUserResolver(req);
  return userId !== null && UserIdSchema.safeParse(userId).success ? userId : null;
};

export function conversationBody(conversation: Conversation) {
  return {
    id: conversation.id,
    user_id: conversation.userId,
    title: conversation.title,
    created_at: conversation.createdAt,
    updated_at: conversation.updatedAt,
  };
}

export function messageBody(message: StoredMessage) {
  return {
    id: message.id,
    conversation_id: message.conversationId,
    user_id: message.userId,
    role: message.role,
    content: message.content,
    tool_calls: message.toolCalls,
    created_at: message.createdAt,
  };
}

export interface ChatServerConfig {
  readonly chat: ChatService;
  readonly tools: ToolRegistry;

  /** Default: 8000; 0 picks a free port */
  readonly port?: number;

  /** Default: 0.0.0.0 */
  readonly host?: string;

  /** Bearer key required on chat requests when set */
  readonly apiKey?: string | undefined;

  readonly resolveUser?: UserResolver;

  /** Checks the trends server for `/health`; omitted means `unknown` */
  readonly trendsHealth?: () => Promise<boolean>;

  readonly logger?: Logger;
}

export interface ChatServerEvents {
  'listening': (address: { host: string; port: number }) => void;
  'request': (method: string, path: string, status: number) => void;
}

export interface HealthReport {
  readonly status: 'ok';
  readonly tools: ReadonlyArray<string>;
  readonly trends: 'ok' | 'unavailable' | 'unknown';
}

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class ChatServer extends EventEmitter<ChatServerEvents> {
  private readonly config: ChatServerConfig;
  private readonly resolveUser: UserResolver;
  private readonly logger: Logger;
  private httpServer: http.Server | null = null;

  constructor(config: ChatServerConfig) {
    super();
    this.config = config;
    this.resolveUser = config.resolveUser ?? headerUserResolver;
    this.logger = (config.logger ?? createSilentLogger()).child({ module: 'server.http' });
  }

  /**
   * Starts listening and resolves with the bound address.
   */
  async start(): Promise<{ host: string; port: number }> {
    if (this.httpServer !== null) {
      throw new Error('Server already started');
    }

    const server = http.createServer((req, res) => {
      void this.handleRequest(req, res).catch((error: unknown) => {
        this.logger.error('Unhandled request error', { method: req.method, url: req.url }, error);
        if (!res.headersSent) {
          this.sendJson(res, 500, { error: 'Internal server error' });
        } else {
          res.end();
        }
      });
    });
    this.httpServer = server;

    const host = this.config.host ?? '0.0.0.0';
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port ?? 8000, host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const address = this.address();
    this.logger.info('HTTP server listening', address);
    this.emit('listening', address);
    return address;
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    if (server === null) {
      return;
    }
    this.httpServer = null;

    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
    this.logger.info('HTTP server stopped');
  }

  address(): { host: string; port: number } {
    const address = this.httpServer?.address();
    if (address === null || address === undefined || typeof address === 'string') {
      throw new Error('Server is not listening');
    }
    return { host: address.address, port: address.port };
  }

  async health(): Promise<HealthReport> {
    let trends: HealthReport['trends'] = 'unknown';
    if (this.config.trendsHealth) {
      trends = (await this.config.trendsHealth()) ? 'ok' : 'unavailable';
    }
    return { status: 'ok', tools: this.config.tools.names(), trends };
  }

  // ============ Private Methods ============

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;

    res.once('finish', () => this.emit('request', method, path, res.statusCode));

    try {
      switch (path) {
        case '/':
        case '/health':
          this.requireMethod(method, 'GET');
          this.sendJson(res, 200, await this.health());
          return;

        case '/chat/conversations':
          if (method === 'POST') {
            await this.handleCreateConversation(req, res);
            return;
          }
          this.requireMethod(method, 'GET');
          await this.handleListConversations(req, res);
          return;

        case '/chat/message':
          this.requireMethod(method, 'POST');
          await this.handleChatMessage(req, res);
          return;

        default: {
          const conversationId = CONVERSATION_MESSAGES_PATH.exec(path)?.[1];
          if (conversationId === undefined) {
            throw new HttpError(404, 'Not found');
          }
          this.requireMethod(method, 'GET');
          await this.handleListMessages(req, res, conversationId);
          return;
        }
      }
    } catch (error) {
      if (!(error instanceof HttpError)) {
        throw error;
      }
      const body = error.details === undefined ? { error: error.message } : { error: error.message, details: error.details };
      this.sendJson(res, error.status, body);
    }
  }

  private async handleCreateConversation(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const userId = this.identify(req);
    const { title } = this.validate(CreateConversationBodySchema, await this.readBody(req));

    const conversation = await this.config.chat.startConversation(userId, title);
    this.sendJson(res, 201, conversationBody(conversation));
  }

  private async handleListConversations(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const userId = this.identify(req);

    const conversations = await this.config.chat.listConversations(userId);
    this.sendJson(res, 200, { conversations: conversations.map(conversationBody), count: conversations.length });
  }

  private async handleListMessages(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    conversationId: string,
  ): Promise<void> {
    const userId = this.identify(req);

    const messages = await this.withConversation(() => this.config.chat.getHistory(conversationId, userId));
    this.sendJson(res, 200, {
      conversation_id: conversationId,
      messages: messages.map(messageBody),
      count: messages.length,
    });
  }

  private async handleChatMessage(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const userId = this.identify(req);
    const { conversation_id: conversationId, content } = this.validate(ChatMessageBodySchema, await this.readBody(req));

    await this.withConversation(() => this.config.chat.requireConversation(conversationId, userId));

    const requestHeader = req.headers['x-request-id'];
    const correlationId = typeof requestHeader === 'string' && requestHeader !== '' ? requestHeader : uuidv4();

    res.writeHead(200, { ...SSE_HEADERS, 'X-Request-Id': correlationId });
    res.flushHeaders();

    const stream = this.config.chat.processMessage({ conversationId, userId, text: content, correlationId });
    res.on('close', () => stream.cancel('Client disconnected'));

    for await (const event of stream) {
      res.write(encodeSseFrame(event));
    }
    res.end();
  }

  /**
   * Checks the API key and resolves the caller's user ID.
   */
  private identify(req: http.IncomingMessage): string {
    this.authenticate(req);

    const userId = this.resolveUser(req);
    if (userId === null) {
      throw new HttpError(401, 'Missing user identity');
    }
    return userId;
  }

  private validate<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new HttpError(
        422,
        'Invalid request body',
        parsed.error.issues.map(issue => ({ field: issue.path.join('.'), message: issue.message })),
      );
    }
    return parsed.data;
  }

  private async withConversation<T>(load: () => Promise<T>): Promise<T> {
    try {
      return await load();
    } catch (error) {
      if (error instanceof ConversationNotFoundError) {
        throw new HttpError(404, 'Conversation not found');
      }
      throw error;
    }
  }

  private authenticate(req: http.IncomingMessage): void {
    const apiKey = this.config.apiKey;
    if (apiKey === undefined || apiKey === '') {
      return;
    }
    if (req.headers.authorization !== `Bearer ${apiKey}`) {
      throw new HttpError(401, 'Unauthorized');
    }
  }

  private requireMethod(actual: string, expected: string): void {
    if (actual !== expected) {
      throw new HttpError(405, 'Method not allowed');
    }
  }

  private async readBody(req: http.IncomingMessage): Promise<unknown> {
    const chunks: Buffer[] = [];
    let size = 0;
    for await (const chunk of req) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      size += buffer.length;
      if (size > MAX_BODY_BYTES) {
        throw new HttpError(413, 'Request body too large');
      }
      chunks.push(buffer);
    }
    if (size === 0) {
      return {};
    }

    try {
      return JSON.parse(Buffer.concat(chunks).toString('utf8'));
    } catch {
      throw new HttpError(400, 'Invalid JSON');
    }
  }

  private sendJson(res: http.ServerResponse, status: number, body: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
  }
}
