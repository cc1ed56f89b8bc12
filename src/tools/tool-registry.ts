/**
 * @fileoverview Tool Registry - closed registry and dispatcher for tools.
 *
 * The registry maps a finite set of tool names to their invokers, checked
 * at startup. Dispatching enforces a time budget and turns every outcome,
 * thrown errors and timeouts included, into a {@link ToolResult}. Nothing
 * a tool does can make `dispatch()` reject.
 *
 * @module scoutline/tools/tool-registry
 * @version 0.1.0
 */

import { v4 as uuidv4 } from 'uuid';
import { EventEmitter } from 'eventemitter3';
import type { UniqueId, ToolResult, ToolActivityPhase, Timestamp } from '../types/core.types.js';
import { createUniqueId, createTimestamp } from '../types/core.types.js';
import type { ToolDefinition, ToolOutcome } from '../types/tools.types.js';
import { ToolNameSchema, ToolOutcomeSchema } from '../types/tools.types.js';
import { type Logger, createSilentLogger } from '../observability/logger.js';

/**
 * Registry-wide events, for observability only. Per-request activity
 * goes through {@link DispatchRequest.onActivity}.
 */
export interface ToolRegistryEvents {
  'tool:registered': (name: string) => void;
  'tool:started': (name: string, executionId: UniqueId) => void;
  'tool:completed': (name: string, executionId: UniqueId, result: ToolResult) => void;
  'tool:failed': (name: string, executionId: UniqueId, result: ToolResult) => void;
}

export interface ToolRegistryConfig {
  /** Budget for tools that declare none (ms) */
  readonly defaultTimeoutMs: number;

  readonly logger?: Logger;
}

export const DEFAULT_REGISTRY_CONFIG: ToolRegistryConfig = {
  defaultTimeoutMs: 10_000,
};

export interface ToolActivity {
  readonly toolName: string;
  readonly phase: ToolActivityPhase;
  readonly executionId: UniqueId;
}

/**
 * Request to run one tool.
 */
export interface DispatchRequest {
  readonly toolName: string;
  readonly toolInput: string;

  /** Overrides the tool's own budget */
  readonly timeoutMs?: number;

  /** Used when the tool declares no budget; replaces the registry default */
  readonly defaultTimeoutMs?: number;

  /** Upper bound applied after the override, e.g. what is left of a deadline */
  readonly maxTimeoutMs?: number;

  /** Caller cancellation, e.g. the consumer disconnected */
  readonly signal?: AbortSignal;

  /** Receives `started` before the call and one terminal phase after */
  readonly onActivity?: (activity: ToolActivity) => void;
}

/**
 * Registry entry with usage metrics.
 */
export interface ToolRegistryEntry {
  readonly definition: ToolDefinition;
  readonly registeredAt: Timestamp;
  readonly invocationCount: number;
  readonly lastInvokedAt: Timestamp | null;
  readonly averageDurationMs: number;
}

/**
 * Thrown at startup when the registry does not match what the agent
 * was configured with.
 */
export class ToolConfigurationError extends Error {
  readonly code = 'TOOL_CONFIGURATION';

  constructor(message: string) {
    super(message);
    this.name = 'ToolConfigurationError';
  }
}

class ToolTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Tool execution timed out after ${timeoutMs}ms`);
    this.name = 'ToolTimeoutError';
  }
}

/**
 * Central registry and dispatcher.
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry({ defaultTimeoutMs: 10_000 });
 * registry.register(createWebSearchTool({ apiKey }));
 * registry.assertRegistered(['web_search']);
 *
 * const result = await registry.dispatch({
 *   toolName: 'web_search',
 *   toolInput: 'typescript 5.5 release notes',
 *   onActivity: a => console.log(a.toolName, a.phase),
 * });
 * ```
 */
export class ToolRegistry extends EventEmitter<ToolRegistryEvents> {
  /** Keyed by lower-cased name */
  private readonly tools: Map<string, ToolRegistryEntry>;
  private readonly config: ToolRegistryConfig;
  private readonly logger: Logger;

  constructor(config: Partial<ToolRegistryConfig> = {}) {
    super();
    this.tools = new Map();
    this.config = { ...DEFAULT_REGISTRY_CONFIG, ...config };
    this.logger = (config.logger ?? createSilentLogger()).child({ module: 'tools.registry' });
  }

  /**
   * Registers a tool.
   *
   * @throws ToolConfigurationError if the name is invalid or already taken
   */
  register(definition: ToolDefinition): this {
    const parsedName = ToolNameSchema.safeParse(definition.name);
    if (!parsedName.success) {
      throw new ToolConfigurationError(`Invalid tool name '${definition.name}': ${parsedName.error.issues[0]?.message ?? 'invalid'}`);
    }

    const key = definition.name.toLowerCase();
    if (this.tools.has(key)) {
      throw new ToolConfigurationError(`Tool '${definition.name}' is already registered`);
    }

    this.tools.set(key, {
      definition,
      registeredAt: createTimestamp(),
      invocationCount: 0,
      lastInvokedAt: null,
      averageDurationMs: 0,
    });
    this.emit('tool:registered', definition.name);
    return this;
  }

  /**
   * Startup check that every tool the agent expects is present.
   *
   * @throws ToolConfigurationError listing the missing names
   */
  assertRegistered(names: ReadonlyArray<string>): void {
    const missing = names.filter(name => !this.has(name));
    if (missing.length > 0) {
      throw new ToolConfigurationError(`Missing tools: ${missing.join(', ')}`);
    }
  }

  has(name: string): boolean {
    return this.tools.has(name.toLowerCase());
  }

  /**
   * Maps a name in any casing to its registered spelling.
   */
  resolve(name: string): string | null {
    return this.tools.get(name.toLowerCase())?.definition.name ?? null;
  }

  get(name: string): ToolDefinition | null {
    return this.tools.get(name.toLowerCase())?.definition ?? null;
  }

  list(): ReadonlyArray<ToolDefinition> {
    return Array.from(this.tools.values(), entry => entry.definition);
  }

  names(): ReadonlyArray<string> {
    return this.list().map(definition => definition.name);
  }

  getMetrics(name: string): ToolRegistryEntry | null {
    return this.tools.get(name.toLowerCase()) ?? null;
  }

  /**
   * Runs a tool under its time budget. Always resolves.
   */
  async dispatch(request: DispatchRequest): Promise<ToolResult> {
    const executionId = createUniqueId(uuidv4());
    const startTime = Date.now();
    const entry = this.tools.get(request.toolName.toLowerCase());
    const toolName = entry?.definition.name ?? request.toolName;

    const notify = (phase: ToolActivityPhase): void => {
      request.onActivity?.({ toolName, phase, executionId });
    };

    notify('started');
    this.emit('tool:started', toolName, executionId);

    if (!entry) {
      const result = this.createResult(executionId, toolName, startTime, {
        success: false,
        error: `Unknown tool: ${request.toolName}`,
      });
      this.logger.warn('Dispatch to unregistered tool', { tool: request.toolName });
      notify('failed');
      this.emit('tool:failed', toolName, executionId, result);
      return result;
    }

    const timeoutMs = Math.min(
      request.timeoutMs ?? entry.definition.timeoutMs ?? request.defaultTimeoutMs ?? this.config.defaultTimeoutMs,
      request.maxTimeoutMs ?? Number.POSITIVE_INFINITY,
    );
    const outcome = await this.executeWithTimeout(entry.definition, request.toolInput, executionId, timeoutMs, request.signal);
    const result = this.createResult(executionId, toolName, startTime, outcome);

    this.updateMetrics(entry, result.durationMs);

    if (result.succeeded) {
      this.logger.debug('Tool completed', { tool: toolName, durationMs: result.durationMs });
      notify('completed');
      this.emit('tool:completed', toolName, executionId, result);
    } else {
      this.logger.warn('Tool failed', { tool: toolName, durationMs: result.durationMs, error: result.error });
      notify('failed');
      this.emit('tool:failed', toolName, executionId, result);
    }

    return result;
  }

  // ============ Private Methods ============

  private async executeWithTimeout(
    definition: ToolDefinition,
    input: string,
    executionId: UniqueId,
    timeoutMs: number,
    parentSignal: AbortSignal | undefined,
  ): Promise<ToolOutcome> {
    if (parentSignal?.aborted === true) {
      return { success: false, error: 'Tool call cancelled before it started' };
    }

    const controller = new AbortController();
    const onParentAbort = (): void => controller.abort(parentSignal?.reason);
    parentSignal?.addEventListener('abort', onParentAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new ToolTimeoutError(timeoutMs);
        reject(error);
        controller.abort(error);
      }, timeoutMs);
    });
    const cancelled = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(new Error('Tool call cancelled')), { once: true });
    });

    const context = {
      executionId,
      signal: controller.signal,
      logger: this.logger.child({ module: `tools.${definition.name}` }),
    };

    try {
      const raw: unknown = await Promise.race([definition.invoke(input, context), timeout, cancelled]);
      const parsed = ToolOutcomeSchema.safeParse(raw);
      if (!parsed.success) {
        return { success: false, error: 'Tool returned a malformed result' };
      }
      return parsed.data;
    } catch (error) {
      return { success: false, error: error instanceof Error ? error.message : String(error) };
    } finally {
      clearTimeout(timer);
      parentSignal?.removeEventListener('abort', onParentAbort);
    }
  }

  private createResult(
    executionId: UniqueId,
    toolName: string,
    startTime: number,
    outcome: ToolOutcome,
  ): ToolResult {
    return {
      id: executionId,
      toolName,
      output: outcome.success ? outcome.output : '',
      succeeded: outcome.success,
      error: outcome.success ? null : outcome.error,
      durationMs: Date.now() - startTime,
      completedAt: createTimestamp(),
    };
  }

  private updateMetrics(registered: ToolRegistryEntry, durationMs: number): void {
    const key = registered.definition.name.toLowerCase();
    const entry = this.tools.get(key) ?? registered;
    const newCount = entry.invocationCount + 1;
    const newAverage = (entry.averageDurationMs * entry.invocationCount + durationMs) / newCount;

    this.tools.set(key, {
      ...entry,
      invocationCount: newCount,
      lastInvokedAt: createTimestamp(),
      averageDurationMs: newAverage,
    });
  }
}
