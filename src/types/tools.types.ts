/**
 * @fileoverview Tool contract type definitions.
 *
 * A tool takes text in and gives text (or a typed failure) back. The core
 * does not care whether a tool talks HTTP, runs a subprocess or calls a
 * local function; only this contract matters.
 *
 * @module scoutline/types/tools
 * @version 0.1.0
 */

import { z } from 'zod';
import type { UniqueId } from './core.types.js';

/**
 * Complete definition of a tool the model may request.
 */
export interface ToolDefinition {
  /** Name the model uses after the ACTION marker; `\w+` characters only */
  readonly name: string;

  /** Human-readable label, e.g. "Web Search" */
  readonly displayName: string;

  /** One-line description rendered into the system prompt */
  readonly description: string;

  /** Per-tool execution budget; falls back to the registry default */
  readonly timeoutMs?: number;

  readonly invoke: ToolInvoker;
}

export type ToolInvoker = (input: string, context: ToolInvocationContext) => Promise<ToolOutcome>;

/**
 * What a tool reports back. Tools should return failures rather than throw,
 * but the dispatcher converts thrown errors as well.
 */
export type ToolOutcome =
  | { readonly success: true; readonly output: string }
  | { readonly success: false; readonly error: string };

/**
 * Context handed to a running tool.
 */
export interface ToolInvocationContext {
  /** Unique ID for this execution */
  readonly executionId: UniqueId;

  /** Aborted on timeout or when the consumer goes away */
  readonly signal: AbortSignal;

  readonly logger: ExecutionLogger;
}

/**
 * Logger interface for tool execution.
 */
export interface ExecutionLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Runtime check applied to whatever a tool resolves with.
 */
export const ToolOutcomeSchema = z.discriminatedUnion('success', [
  z.object({ success: z.literal(true), output: z.string() }),
  z.object({ success: z.literal(false), error: z.string() }),
]);

/**
 * Valid tool names: what the ACTION marker can capture.
 */
export const ToolNameSchema = z.string().regex(/^\w+$/, 'Tool names may only contain letters, digits and underscores');

export function toolSuccess(output: string): ToolOutcome {
  return { success: true, output };
}

export function toolFailure(error: string): ToolOutcome {
  return { success: false, error };
}
