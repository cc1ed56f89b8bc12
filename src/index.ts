/**
 * @fileoverview Scoutline - a conversational ReAct agent backend.
 *
 * A chat message runs through a reason/act loop that may call the
 * `web_search` and `google_trends` tools before it streams an answer as
 * `token`, `tool_activity`, `done` and `error` events.
 *
 * @example
 * ```typescript
 * import { createApp, loadConfig } from 'scoutline';
 *
 * const app = createApp(loadConfig());
 * const server = app.createServer();
 * await server.start();
 * ```
 *
 * @module scoutline
 * @version 0.1.0
 */

export * from './types/index.js';
export * from './agent/index.js';
export * from './tools/index.js';
export * from './providers/index.js';
export * from './storage/index.js';
export * from './observability/index.js';
export { EventStream, isTerminalEvent, type EventStreamEvents, type EventStreamStatus } from './events/event-stream.js';
export {
  ChatServer,
  ChatMessageBodySchema,
  MAX_MESSAGE_LENGTH,
  headerUserResolver,
  type ChatMessageBody,
  type ChatServerConfig,
  type ChatServerEvents,
  type HealthReport,
  type UserResolver,
} from './server/http-server.js';
export { encodeSseFrame, parseSseFrames, SSE_HEADERS } from './server/sse.js';
export { loadConfig, loadEnvFile, ConfigError, type AppConfig } from './config.js';
export { createApp, createStore, createToolRegistry, REQUIRED_TOOLS, type App, type AppOverrides } from './app.js';
