/**
 * @fileoverview Core type definitions for the Scoutline agent runtime.
 *
 * These types form the shared vocabulary of the ReAct loop: the messages
 * fed to the completion service, the tool requests parsed out of its
 * replies, the results folded back in, and the events streamed to callers.
 *
 * @module scoutline/types
 * @version 0.1.0
 */

/**
 * Unique identifier type used throughout the system.
 * Format: UUID v4 string for global uniqueness.
 */
export type UniqueId = string & { readonly __brand: 'UniqueId' };

/**
 * Unix timestamp in milliseconds.
 */
export type Timestamp = number & { readonly __brand: 'Timestamp' };

/**
 * Phase of one loop execution.
 *
 * @remarks
 * - IDLE: created, nothing sent to the model yet
 * - REASONING: waiting on a non-streaming completion
 * - ACTING: running the tool the model asked for
 * - FINALIZING: streaming the user-visible answer
 * - DONE: terminal, exactly one `done` or `error` event has been emitted
 */
export enum AgentPhase {
  IDLE = 'IDLE',
  REASONING = 'REASONING',
  ACTING = 'ACTING',
  FINALIZING = 'FINALIZING',
  DONE = 'DONE',
}

/**
 * Severity levels for logging.
 */
export enum Severity {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL',
}

/**
 * Roles a message can carry in the loop's history.
 * `tool_result` messages hold tool output (or a failure description).
 */
export type MessageRole = 'system' | 'user' | 'assistant' | 'tool_result';

export interface Message {
  readonly role: MessageRole;
  readonly content: string;
}

/**
 * A tool invocation requested by the model, valid for one iteration only.
 */
export interface ActionRequest {
  readonly toolName: string;
  readonly toolInput: string;
}

/**
 * Normalized outcome of one tool invocation.
 * Immutable once created.
 */
export interface ToolResult {
  /** Unique identifier for this execution */
  readonly id: UniqueId;

  /** Registered name of the tool that ran */
  readonly toolName: string;

  /** Tool output; empty string when the call failed */
  readonly output: string;

  readonly succeeded: boolean;

  /** Failure description, null on success */
  readonly error: string | null;

  /** Wall-clock execution time in milliseconds */
  readonly durationMs: number;

  readonly completedAt: Timestamp;
}

/**
 * State of one loop execution. Never shared between requests;
 * every transition produces a new value.
 */
export interface LoopState {
  readonly iteration: number;
  readonly messages: ReadonlyArray<Message>;
  readonly startedAt: Timestamp;
  readonly finalAnswer: string | null;
}

export type ToolActivityPhase = 'started' | 'completed' | 'failed';

/**
 * Externally observable progress of a loop execution, strictly ordered.
 */
export type StreamEvent =
  | { readonly type: 'token'; readonly text: string }
  | { readonly type: 'tool_activity'; readonly toolName: string; readonly phase: ToolActivityPhase }
  | { readonly type: 'done'; readonly messageId: string | null }
  | { readonly type: 'error'; readonly message: string };

export type StreamEventType = StreamEvent['type'];

/**
 * Tunables for the ReAct loop.
 */
export interface AgentConfig {
  /** Maximum number of tool-invoking turns */
  readonly maxIterations: number;

  /**
   * Wall-clock budget for reasoning and acting, tool calls included (ms).
   * A completion or tool call still running at the deadline is aborted.
   */
  readonly timeoutMs: number;

  /** Budget for streaming the final answer once reasoning stops (ms) */
  readonly finalizeTimeoutMs: number;

  /**
   * Budget for a tool call when the tool declares none (ms). Always
   * capped by what is left of `timeoutMs`.
   */
  readonly toolTimeoutMs: number;

  /** Number of prior conversation turns fed to the model */
  readonly historyWindow: number;

  /**
   * How many times the model is asked to correct an action that names
   * an unregistered tool before its text is taken as the final answer.
   */
  readonly malformedActionRetries: number;
}

/**
 * Creates a branded UniqueId from a string.
 */
export function createUniqueId(value: string): UniqueId {
  return value as UniqueId;
}

/**
 * Creates a branded Timestamp from current time.
 */
export function createTimestamp(value?: number): Timestamp {
  return (value ?? Date.now()) as Timestamp;
}

export const DEFAULT_AGENT_CONFIG: Readonly<AgentConfig> = {
  maxIterations: 10,
  timeoutMs: 30_000,
  finalizeTimeoutMs: 15_000,
  toolTimeoutMs: 10_000,
  historyWindow: 10,
  malformedActionRetries: 0,
} as const;
