/**
 * @fileoverview OpenAI-compatible completion client.
 *
 * Works against any host that speaks the OpenAI chat completions API
 * (OpenAI itself, Groq, OpenRouter, a local vLLM) by pointing `baseURL` at it.
 *
 * @see https://platform.openai.com/docs/api-reference/chat
 */

import OpenAI, { APIError, APIUserAbortError } from 'openai';
import type { Message } from '../types/core.types.js';
import { type CompletionClient, type CompletionOptions, CompletionError } from './base.js';
import { type Logger, createSilentLogger } from '../observability/logger.js';

export interface OpenAICompletionConfig {
  readonly apiKey: string;

  /** Defaults to the OpenAI API */
  readonly baseURL?: string;

  readonly model: string;
  readonly temperature: number;
  readonly maxTokens: number;

  /** Per-request ceiling (ms); the loop's own budgets abort earlier through the signal */
  readonly timeoutMs?: number;

  readonly logger?: Logger;
}

export const DEFAULT_OPENAI_COMPLETION_CONFIG = {
  model: 'llama-3.3-70b-versatile',
  temperature: 0.7,
  maxTokens: 1024,
  timeoutMs: 30_000,
} as const;

/**
 * Maps loop messages to chat messages. Tool results go back as user turns:
 * the model only ever sees its own text protocol, never native tool calls.
 */
export function toChatMessages(messages: ReadonlyArray<Message>): OpenAI.ChatCompletionMessageParam[] {
  return messages.map((message): OpenAI.ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'assistant':
        return { role: 'assistant', content: message.content };
      case 'user':
      case 'tool_result':
        return { role: 'user', content: message.content };
    }
  });
}

/**
 * Converts whatever the SDK threw into a {@link CompletionError}.
 */
export function classifyCompletionError(error: unknown, signal?: AbortSignal): CompletionError {
  if (error instanceof CompletionError) {
    return error;
  }
  if (error instanceof APIUserAbortError || signal?.aborted === true) {
    return new CompletionError('ABORTED', 'Completion request was aborted', null, { cause: error });
  }
  if (error instanceof APIError) {
    const status = error.status ?? null;
    const code = status === 429 ? 'QUOTA_EXCEEDED' : 'UPSTREAM_UNAVAILABLE';
    return new CompletionError(code, error.message, status, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CompletionError('UPSTREAM_UNAVAILABLE', message, null, { cause: error });
}

export class OpenAICompletionClient implements CompletionClient {
  readonly name: string;
  private readonly client: OpenAI;
  private readonly config: OpenAICompletionConfig;
  private readonly logger: Logger;

  constructor(config: OpenAICompletionConfig) {
    this.config = config;
    this.name = `openai:${config.model}`;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      maxRetries: 0,
      timeout: config.timeoutMs ?? DEFAULT_OPENAI_COMPLETION_CONFIG.timeoutMs,
    });
    this.logger = (config.logger ?? createSilentLogger()).child({ module: 'providers.openai' });
  }

  async complete(messages: ReadonlyArray<Message>, options: CompletionOptions = {}): Promise<string> {
    let response: OpenAI.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages: toChatMessages(messages),
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
        },
        { signal: options.signal },
      );
    } catch (error) {
      throw classifyCompletionError(error, options.signal);
    }

    const choice = response.choices[0];
    if (choice === undefined) {
      throw new CompletionError('EMPTY_COMPLETION', 'Completion response carried no choices');
    }

    this.logger.debug('Completion received', {
      model: response.model,
      finishReason: choice.finish_reason,
      promptTokens: response.usage?.prompt_tokens,
      completionTokens: response.usage?.completion_tokens,
    });
    return choice.message.content ?? '';
  }

  async *stream(messages: ReadonlyArray<Message>, options: CompletionOptions = {}): AsyncGenerator<string> {
    let chunks: AsyncIterable<OpenAI.ChatCompletionChunk>;
    try {
      chunks = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages: toChatMessages(messages),
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
          stream: true,
        },
        { signal: options.signal },
      );
    } catch (error) {
      throw classifyCompletionError(error, options.signal);
    }

    try {
      for await (const chunk of chunks) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) {
          yield delta;
        }
      }
    } catch (error) {
      throw classifyCompletionError(error, options.signal);
    }
  }
}
