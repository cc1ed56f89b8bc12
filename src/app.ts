/**
 * @fileoverview Composition root: builds the tool registry, completion
 * client, store, loop and chat service from an {@link AppConfig}.
 *
 * @module scoutline/app
 * @version 0.1.0
 */

import type { AppConfig } from './config.js';
import type { CompletionClient } from './providers/base.js';
import { OpenAICompletionClient } from './providers/openai.js';
import type { ConversationStore } from './storage/types.js';
import { InMemoryConversationStore } from './storage/memory-store.js';
import { SupabaseConversationStore } from './storage/supabase-store.js';
import { ToolRegistry } from './tools/tool-registry.js';
import { WEB_SEARCH_TOOL_NAME, createWebSearchTool } from './tools/web-search.js';
import { TRENDS_TOOL_NAME, checkTrendsHealth, createTrendsTool } from './tools/trends.js';
import { ReActLoop } from './agent/react-loop.js';
import { ChatService } from './agent/chat-service.js';
import {
  ChatServer,
  headerUserResolver,
  uuidHeaderUserResolver,
  type ChatServerConfig,
} from './server/http-server.js';
import { type Logger, createSilentLogger } from './observability/logger.js';

/** Tools every deployment must register before serving */
export const REQUIRED_TOOLS: ReadonlyArray<string> = [WEB_SEARCH_TOOL_NAME, TRENDS_TOOL_NAME];

export interface AppOverrides {
  readonly completion?: CompletionClient;
  readonly store?: ConversationStore;

  /** Used by both tools */
  readonly fetch?: typeof fetch;

  readonly logger?: Logger;
}

export interface App {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly tools: ToolRegistry;
  readonly completion: CompletionClient;
  readonly store: ConversationStore;
  readonly loop: ReActLoop;
  readonly chat: ChatService;

  createServer(overrides?: Partial<Pick<ChatServerConfig, 'port' | 'host' | 'resolveUser'>>): ChatServer;
}

export function createToolRegistry(config: AppConfig, options: { fetch?: typeof fetch; logger?: Logger } = {}): ToolRegistry {
  const registry = new ToolRegistry({ defaultTimeoutMs: config.agent.toolTimeoutMs, logger: options.logger });

  registry.register(
    createWebSearchTool({
      apiKey: config.search.apiKey ?? '',
      endpoint: config.search.endpoint,
      fetch: options.fetch,
    }),
  );
  registry.register(
    createTrendsTool({
      baseUrl: config.trends.baseUrl,
      defaultGeo: config.trends.defaultGeo,
      timeoutMs: config.trends.timeoutMs,
      fetch: options.fetch,
    }),
  );

  registry.assertRegistered(REQUIRED_TOOLS);
  return registry;
}

export function createStore(config: AppConfig, logger: Logger): ConversationStore {
  if (config.supabase === null) {
    logger.warn('Supabase is not configured; conversations are kept in memory');
    return new InMemoryConversationStore();
  }
  return SupabaseConversationStore.connect(config.supabase.url, config.supabase.key);
}

export function createApp(config: AppConfig, overrides: AppOverrides = {}): App {
  const logger = overrides.logger ?? createSilentLogger();
  const tools = createToolRegistry(config, { fetch: overrides.fetch, logger });
  const completion =
    overrides.completion ??
    new OpenAICompletionClient({
      apiKey: config.llm.apiKey,
      baseURL: config.llm.baseURL,
      model: config.llm.model,
      temperature: config.llm.temperature,
      maxTokens: config.llm.maxTokens,
      timeoutMs: Math.max(config.agent.timeoutMs, config.agent.finalizeTimeoutMs),
      logger,
    });
  const store = overrides.store ?? createStore(config, logger);
  const loop = new ReActLoop({ completion, tools, config: config.agent, logger });
  const chat = new ChatService({ loop, tools, store, logger });

  logger.info('Application ready', {
    model: completion.name,
    tools: tools.names(),
    storage: config.supabase === null ? 'memory' : 'supabase',
  });

  return {
    config,
    logger,
    tools,
    completion,
    store,
    loop,
    chat,
    createServer: serverOverrides =>
      new ChatServer({
        chat,
        tools,
        host: config.server.host,
        port: config.server.port,
        apiKey: config.server.apiKey,
        resolveUser: config.supabase === null ? headerUserResolver : uuidHeaderUserResolver,
        trendsHealth: () =>
          checkTrendsHealth(config.trends.baseUrl, { timeoutMs: config.trends.timeoutMs, fetch: overrides.fetch }),
        logger,
        ...serverOverrides,
      }),
  };
}
