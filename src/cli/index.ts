#!/usr/bin/env node
/**
 * @fileoverview Scoutline CLI
 *
 * Usage:
 *   scoutline serve [-p port] [--host host] [--verbose]
 *   scoutline ask "<message>" [--verbose]
 *   scoutline tools
 *   scoutline --help
 */

import { loadConfig, loadEnvFile, ConfigError, type AppConfig } from '../config.js';
import { createApp } from '../app.js';
import { InMemoryConversationStore } from '../storage/memory-store.js';
import { JsonTransport, createLogger, type Logger } from '../observability/logger.js';
import { Severity } from '../types/index.js';
import { parseArgs, UsageError, type CliCommand } from './args.js';

const VERSION = '0.1.0';

const CLI_USER_ID = 'cli';

function printHelp(): void {
  console.log(`
scoutline - conversational agent with web search and trends tools

USAGE:
  scoutline <command> [options]

COMMANDS:
  serve             Start the HTTP server (default)
  ask "<message>"   Answer one message and exit
  tools             List the registered tools
  help              Show this help message
  version           Show version

OPTIONS:
  -p, --port <number>   HTTP port (default: PORT or 8000)
  --host <address>      Bind address (default: HOST or 0.0.0.0)
  --verbose             Log at DEBUG

ENDPOINTS:
  GET  /health          Tools and trends-server health
  POST /chat/message    { "conversation_id", "content" } -> text/event-stream

Configuration is read from the environment and .env; see .env.example.
`);
}

function createCliLogger(level: Severity): Logger {
  return createLogger('scoutline', { minLevel: level, transports: [new JsonTransport()] });
}

function listTools(config: AppConfig): void {
  const app = createApp(config);

  console.log('\nAVAILABLE TOOLS\n');
  for (const tool of app.tools.list()) {
    console.log(`  ${tool.name}  (${tool.displayName})`);
    console.log(`     ${tool.description}`);
    console.log('');
  }
  console.log(`Total: ${app.tools.names().length} tools\n`);
}

async function ask(config: AppConfig, message: string, verbose: boolean): Promise<void> {
  const store = new InMemoryConversationStore();
  const logger = createCliLogger(verbose ? Severity.DEBUG : Severity.WARN);
  const app = createApp(config, { store, logger });
  const conversation = await store.createConversation(CLI_USER_ID, message.slice(0, 80));

  const stream = app.chat.processMessage({ conversationId: conversation.id, userId: CLI_USER_ID, text: message });
  process.once('SIGINT', () => stream.cancel('Interrupted'));

  for await (const event of stream) {
    switch (event.type) {
      case 'token':
        process.stdout.write(event.text);
        break;
      case 'tool_activity':
        process.stderr.write(`[${event.toolName} ${event.phase}]\n`);
        break;
      case 'done':
        process.stdout.write('\n');
        break;
      case 'error':
        process.stderr.write(`Error: ${event.message}\n`);
        process.exitCode = 1;
        break;
    }
  }
}

async function serve(config: AppConfig, command: Extract<CliCommand, { command: 'serve' }>): Promise<void> {
  const logger = createCliLogger(command.verbose ? Severity.DEBUG : config.logLevel);
  const app = createApp(config, { logger });
  const server = app.createServer({
    ...(command.port !== undefined ? { port: command.port } : {}),
    ...(command.host !== undefined ? { host: command.host } : {}),
  });

  const { host, port } = await server.start();
  console.error(`scoutline v${VERSION} listening on http://${host}:${port}`);
  console.error(`  Health:  GET  http://${host}:${port}/health`);
  console.error(`  Chat:    POST http://${host}:${port}/chat/message`);
  console.error(`  Auth:    ${config.server.apiKey !== undefined ? 'API key required' : 'none'}`);

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    void server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', {}, error);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

async function main(): Promise<void> {
  const command = parseArgs(process.argv.slice(2));

  switch (command.command) {
    case 'help':
      printHelp();
      return;

    case 'version':
      console.log(`scoutline v${VERSION}`);
      return;

    default:
      break;
  }

  loadEnvFile();
  const config = loadConfig();

  switch (command.command) {
    case 'tools':
      listTools(config);
      break;

    case 'ask':
      await ask(config, command.message, command.verbose);
      break;

    case 'serve':
      await serve(config, command);
      break;
  }
}

main().catch((error: unknown) => {
  if (error instanceof UsageError || error instanceof ConfigError) {
    console.error(error.message);
    if (error instanceof UsageError) {
      console.error('Run "scoutline help" for usage.');
    }
  } else {
    console.error('Fatal error:', error);
  }
  process.exit(1);
});
