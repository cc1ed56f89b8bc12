/**
 * @fileoverview Conversation Context Builder - assembles the message list a
 * loop execution starts from.
 *
 * `[system] + last N prior turns (oldest first) + [new user message]`
 *
 * @module scoutline/agent/context-builder
 * @version 0.1.0
 */

import type { Message } from '../types/core.types.js';
import type { ToolDefinition } from '../types/tools.types.js';

export interface ContextInput {
  readonly systemPrompt: string;

  /** Prior turns, oldest first. Never modified. */
  readonly history: ReadonlyArray<Message>;

  readonly userMessage: string;

  /** How many prior turns to keep */
  readonly historyWindow: number;
}

/**
 * Renders the default system instruction: the tool list and the
 * `ACTION:` / `INPUT:` convention the action parser reads.
 */
export function createSystemPrompt(tools: ReadonlyArray<Pick<ToolDefinition, 'name' | 'description'>>): string {
  const toolLines = tools.map((tool, index) => `${index + 1}. ${tool.name}: ${tool.description}`);
  const toolNames = tools.map(tool => tool.name).join(' or ');

  return [
    'You are a helpful AI assistant with access to tools.',
    '',
    'You have access to the following tools:',
    ...toolLines,
    '',
    'When you need to use a tool, respond with:',
    'ACTION: <tool_name>',
    'INPUT: <tool_input>',
    '',
    'Then I will provide the tool result, and you can continue.',
    '',
    "If you don't need tools, just provide your answer directly.",
    '',
    `Tool names must be exactly: ${toolNames}`,
  ].join('\n');
}

export function buildContext(input: ContextInput): Message[] {
  const turns = input.history.filter(message => message.role !== 'system');
  const window = input.historyWindow > 0 ? turns.slice(-input.historyWindow) : [];

  return [
    { role: 'system', content: input.systemPrompt },
    ...window,
    { role: 'user', content: input.userMessage },
  ];
}
