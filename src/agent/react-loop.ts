/**
 * @fileoverview ReAct Loop - alternates reasoning (completions) and acting
 * (tool calls) until the model answers or a budget runs out, then streams
 * the user-visible answer.
 *
 * Cycle:
 * 1. REASONING - blocking completion over the current messages
 * 2. ACTING - run the tool the completion asked for, fold its result in
 * 3. FINALIZING - streaming completion over the same messages
 *
 * A `ReActLoop` holds no per-run state: every call to {@link ReActLoop.run}
 * threads its own immutable {@link LoopState}, so one instance serves
 * concurrent requests.
 *
 * @module scoutline/agent/react-loop
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import type {
  UniqueId,
  AgentConfig,
  ActionRequest,
  LoopState,
  Message,
  ToolResult,
} from '../types/core.types.js';
import { AgentPhase, DEFAULT_AGENT_CONFIG, createTimestamp, createUniqueId } from '../types/core.types.js';
import type { CompletionClient } from '../providers/base.js';
import { CompletionError } from '../providers/base.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import type { EventStream } from '../events/event-stream.js';
import { type Logger, createSilentLogger } from '../observability/logger.js';
import { LifecycleController } from './lifecycle.js';
import { parseAction } from './action-parser.js';

/**
 * The only text a consumer ever sees about a completion failure.
 */
export const COMPLETION_FAILURE_MESSAGE = 'The assistant is unavailable right now. Please try again.';

/**
 * Streamed when neither the final stream nor any earlier completion
 * produced answer text, e.g. every turn was a tool request.
 */
export const FALLBACK_ANSWER = "I couldn't put together an answer this time. Please try asking again.";

/**
 * Why the loop stopped reasoning.
 */
export type FinalizeReason = 'no_action' | 'unknown_tool' | 'max_iterations' | 'timeout';

/**
 * Observability events. Every payload carries the run ID, so listeners on a
 * shared loop can tell concurrent runs apart.
 */
export interface ReActLoopEvents {
  'loop:start': (runId: UniqueId) => void;
  'loop:action': (runId: UniqueId, request: ActionRequest, iteration: number) => void;
  'loop:tool-result': (runId: UniqueId, result: ToolResult) => void;
  'loop:retry': (runId: UniqueId, toolName: string, attempt: number) => void;
  'loop:finalizing': (runId: UniqueId, reason: FinalizeReason) => void;
  'loop:complete': (runId: UniqueId, outcome: CompletedLoop) => void;
  'loop:failed': (runId: UniqueId, error: CompletionError) => void;
  'loop:cancelled': (runId: UniqueId) => void;
}

export interface FinalizeContext {
  readonly runId: UniqueId;
  readonly toolResults: ReadonlyArray<ToolResult>;
}

/**
 * Runs after the answer is streamed and before `done`; returns the ID of
 * the persisted answer.
 */
export type FinalizeHook = (finalAnswer: string, context: FinalizeContext) => Promise<string | null>;

export interface RunOptions {
  readonly runId?: UniqueId;
  readonly finalize?: FinalizeHook;

  /** Request-scoped logger; defaults to the loop's own */
  readonly logger?: Logger;
}

export interface CompletedLoop {
  readonly status: 'completed';
  readonly runId: UniqueId;
  readonly finalAnswer: string;
  readonly finalizeReason: FinalizeReason;
  readonly messageId: string | null;
  readonly state: LoopState;
  readonly toolResults: ReadonlyArray<ToolResult>;
}

export type LoopOutcome =
  | CompletedLoop
  | {
      readonly status: 'failed';
      readonly runId: UniqueId;
      readonly error: CompletionError;
      readonly state: LoopState;
      readonly toolResults: ReadonlyArray<ToolResult>;
    }
  | {
      readonly status: 'cancelled';
      readonly runId: UniqueId;
      readonly state: LoopState;
      readonly toolResults: ReadonlyArray<ToolResult>;
    };

export interface ReActLoopOptions {
  readonly completion: CompletionClient;
  readonly tools: ToolRegistry;
  readonly config?: Partial<AgentConfig>;
  readonly logger?: Logger;
}

// ============ Loop State ============

export function createLoopState(messages: ReadonlyArray<Message>): LoopState {
  return {
    iteration: 0,
    messages: [...messages],
    startedAt: createTimestamp(),
    finalAnswer: null,
  };
}

export function appendMessages(state: LoopState, ...messages: Message[]): LoopState {
  return { ...state, messages: [...state.messages, ...messages] };
}

/**
 * Folds one tool cycle into the state: the completion that asked for the
 * tool, then the tool's result. Counts as one iteration.
 */
export function recordToolCycle(state: LoopState, completion: string, result: ToolResult): LoopState {
  return {
    ...appendMessages(
      state,
      { role: 'assistant', content: completion },
      { role: 'tool_result', content: formatToolResultMessage(result) },
    ),
    iteration: state.iteration + 1,
  };
}

/**
 * Text of the `tool_result` message for a tool outcome. Failures tell the
 * model not to pretend the tool answered.
 */
export function formatToolResultMessage(result: ToolResult): string {
  if (result.succeeded) {
    return `Tool result (${result.toolName}):\n${result.output}`;
  }
  return (
    `Tool ${result.toolName} failed: ${result.error ?? 'unknown error'}. ` +
    `Answer from your own knowledge and do not claim that ${result.toolName} returned results.`
  );
}

export function formatCorrectionMessage(toolName: string, available: ReadonlyArray<string>): string {
  return (
    `There is no tool named '${toolName}'. Available tools: ${available.join(', ')}. ` +
    'Request one of them with ACTION and INPUT, or answer directly.'
  );
}

/**
 * The ReAct loop controller.
 *
 * @example
 * ```typescript
 * const loop = new ReActLoop({ completion, tools: registry, config: { maxIterations: 5 } });
 * const stream = new EventStream();
 *
 * void loop.run(buildContext({ systemPrompt, history, userMessage, historyWindow: 10 }), stream);
 * for await (const event of stream) {
 *   console.log(event);
 * }
 * ```
 */
export class ReActLoop extends EventEmitter<ReActLoopEvents> {
  private readonly completion: CompletionClient;
  private readonly tools: ToolRegistry;
  private readonly config: AgentConfig;
  private readonly logger: Logger;

  constructor(options: ReActLoopOptions) {
    super();
    this.completion = options.completion;
    this.tools = options.tools;
    this.config = { ...DEFAULT_AGENT_CONFIG, ...options.config };
    this.logger = (options.logger ?? createSilentLogger()).child({ module: 'agent.loop' });
  }

  getConfig(): Readonly<AgentConfig> {
    return this.config;
  }

  /**
   * Runs one loop execution, writing its events to `stream`.
   *
   * Resolves once the stream has received its terminal event or the
   * consumer has gone away; never rejects for completion or tool failures.
   */
  async run(messages: ReadonlyArray<Message>, stream: EventStream, options: RunOptions = {}): Promise<LoopOutcome> {
    const runId = options.runId ?? createUniqueId(uuidv4());
    const logger = (options.logger ?? this.logger).child({ module: 'agent.loop' });
    const lifecycle = new LifecycleController(runId);
    lifecycle.on('transition', (from, to, reason) => logger.debug(`${from} → ${to}`, { reason }));

    const deadline = Date.now() + this.config.timeoutMs;
    const signal = stream.signal;
    const toolResults: ToolResult[] = [];
    let state = createLoopState(messages);
    let candidate = '';
    let retries = 0;

    const cancelled = (): LoopOutcome => {
      lifecycle.finish('Consumer disconnected');
      logger.info('Loop cancelled', { iteration: state.iteration, phase: lifecycle.getState().previousPhase });
      this.emit('loop:cancelled', runId);
      return { status: 'cancelled', runId, state, toolResults };
    };

    this.emit('loop:start', runId);
    lifecycle.transition(AgentPhase.REASONING, 'Loop started');

    try {
      let finalizeReason: FinalizeReason | null = null;

      while (finalizeReason === null) {
        if (stream.isCancelled()) {
          return cancelled();
        }
        if (state.iteration > 0 && Date.now() >= deadline) {
          finalizeReason = 'timeout';
          break;
        }

        const budget = AbortSignal.timeout(Math.max(1, deadline - Date.now()));
        let completion: string;
        try {
          completion = await logger.time('Reasoning completion', () =>
            this.completion.complete(state.messages, { signal: AbortSignal.any([signal, budget]) }),
          );
        } catch (error) {
          if (budget.aborted && !stream.isCancelled()) {
            logger.warn('Reasoning completion ran past the time budget', { iteration: state.iteration });
            finalizeReason = 'timeout';
            break;
          }
          throw error;
        }
        if (stream.isCancelled()) {
          return cancelled();
        }

        const parsed = parseAction(completion, this.tools);
        if (parsed.kind === 'none' && parsed.reason === 'final_answer') {
          candidate = parsed.answer;
        } else if (parsed.kind === 'none' && parsed.reason === 'no_marker') {
          candidate = completion;
        }

        if (parsed.kind === 'none') {
          if (parsed.reason === 'unknown_tool' && retries < this.config.malformedActionRetries && Date.now() < deadline) {
            retries++;
            logger.info('Model named an unregistered tool; asking it to correct', {
              tool: parsed.toolName,
              attempt: retries,
            });
            this.emit('loop:retry', runId, parsed.toolName, retries);
            state = appendMessages(
              state,
              { role: 'assistant', content: completion },
              { role: 'tool_result', content: formatCorrectionMessage(parsed.toolName, this.tools.names()) },
            );
            continue;
          }
          finalizeReason = parsed.reason === 'unknown_tool' ? 'unknown_tool' : 'no_action';
          break;
        }

        if (state.iteration >= this.config.maxIterations) {
          finalizeReason = 'max_iterations';
          break;
        }
        if (Date.now() >= deadline) {
          finalizeReason = 'timeout';
          break;
        }

        lifecycle.transition(AgentPhase.ACTING, `Model requested ${parsed.request.toolName}`, {
          tool: parsed.request.toolName,
        });
        this.emit('loop:action', runId, parsed.request, state.iteration);

        const result = await this.tools.dispatch({
          toolName: parsed.request.toolName,
          toolInput: parsed.request.toolInput,
          defaultTimeoutMs: this.config.toolTimeoutMs,
          maxTimeoutMs: Math.max(1, deadline - Date.now()),
          signal,
          onActivity: activity => stream.toolActivity(activity.toolName, activity.phase),
        });
        toolResults.push(result);
        state = recordToolCycle(state, completion, result);
        this.emit('loop:tool-result', runId, result);

        if (stream.isCancelled()) {
          return cancelled();
        }
        lifecycle.transition(AgentPhase.REASONING, `${result.toolName} ${result.succeeded ? 'completed' : 'failed'}`);
      }

      return await this.finalize({
        runId,
        stream,
        lifecycle,
        logger,
        state,
        candidate,
        finalizeReason,
        toolResults,
        finalizeHook: options.finalize,
        cancelled,
      });
    } catch (error) {
      if (stream.isCancelled()) {
        return cancelled();
      }

      const failure =
        error instanceof CompletionError
          ? error
          : new CompletionError('UPSTREAM_UNAVAILABLE', error instanceof Error ? error.message : String(error), null, {
              cause: error,
            });
      logger.error('Completion failed', { code: failure.code, status: failure.status, iteration: state.iteration }, failure);
      stream.fail(COMPLETION_FAILURE_MESSAGE);
      lifecycle.finish('Completion failed');
      this.emit('loop:failed', runId, failure);
      return { status: 'failed', runId, error: failure, state, toolResults };
    }
  }

  // ============ Private Methods ============

  private async finalize(run: {
    runId: UniqueId;
    stream: EventStream;
    lifecycle: LifecycleController;
    logger: Logger;
    state: LoopState;
    candidate: string;
    finalizeReason: FinalizeReason;
    toolResults: ReadonlyArray<ToolResult>;
    finalizeHook: FinalizeHook | undefined;
    cancelled: () => LoopOutcome;
  }): Promise<LoopOutcome> {
    const { runId, stream, lifecycle, logger, finalizeReason } = run;

    lifecycle.transition(AgentPhase.FINALIZING, `Finalizing (${finalizeReason})`);
    logger.info('Finalizing answer', { reason: finalizeReason, iteration: run.state.iteration });
    this.emit('loop:finalizing', runId, finalizeReason);

    const budget = AbortSignal.timeout(this.config.finalizeTimeoutMs);
    let streamed = '';
    try {
      for await (const token of this.completion.stream(run.state.messages, {
        signal: AbortSignal.any([stream.signal, budget]),
      })) {
        if (!stream.token(token)) {
          return run.cancelled();
        }
        streamed += token;
      }
    } catch (error) {
      if (!budget.aborted || stream.isCancelled()) {
        throw error;
      }
      logger.warn('Answer stream ran past the time budget', { streamedChars: streamed.length });
    }
    if (stream.isCancelled()) {
      return run.cancelled();
    }

    if (streamed.trim() === '') {
      streamed = run.candidate.trim() !== '' ? run.candidate : FALLBACK_ANSWER;
      stream.token(streamed);
    }

    const state: LoopState = { ...run.state, finalAnswer: streamed };
    let messageId: string | null = null;
    if (run.finalizeHook) {
      try {
        messageId = await run.finalizeHook(streamed, { runId, toolResults: run.toolResults });
      } catch (error) {
        logger.error('Finalize hook failed', {}, error);
      }
    }

    stream.done(messageId);
    lifecycle.finish('Answer delivered');

    const outcome: CompletedLoop = {
      status: 'completed',
      runId,
      finalAnswer: streamed,
      finalizeReason,
      messageId,
      state,
      toolResults: run.toolResults,
    };
    logger.info('Loop completed', {
      reason: finalizeReason,
      iterations: state.iteration,
      tools: run.toolResults.map(result => result.toolName),
      durationMs: Date.now() - state.startedAt,
    });
    this.emit('loop:complete', runId, outcome);
    return outcome;
  }
}
