/**
 * @fileoverview Completion client boundary.
 *
 * The loop treats the language model as an opaque text-completion service
 * with a blocking call (intermediate reasoning turns) and a streaming call
 * (the user-visible final answer). Any chat model can sit behind it.
 *
 * @module scoutline/providers
 * @version 0.1.0
 */

import type { Message } from '../types/core.types.js';

export interface CompletionOptions {
  /** Aborts the request, e.g. when the consumer disconnects */
  readonly signal?: AbortSignal;
}

/**
 * Opaque completion service.
 */
export interface CompletionClient {
  /** Human-readable identifier, e.g. "openai:llama-3.3-70b-versatile" */
  readonly name: string;

  complete(messages: ReadonlyArray<Message>, options?: CompletionOptions): Promise<string>;

  stream(messages: ReadonlyArray<Message>, options?: CompletionOptions): AsyncIterable<string>;
}

export type CompletionErrorCode =
  | 'UPSTREAM_UNAVAILABLE'
  | 'QUOTA_EXCEEDED'
  | 'EMPTY_COMPLETION'
  | 'ABORTED';

/**
 * The only error a {@link CompletionClient} raises. `message` may carry
 * upstream detail and is meant for logs, not for end users.
 */
export class CompletionError extends Error {
  constructor(
    readonly code: CompletionErrorCode,
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CompletionError';
  }
}

export function isCompletionError(error: unknown): error is CompletionError {
  return error instanceof CompletionError;
}
