/**
 * @fileoverview Structured Logger.
 *
 * Leveled, structured logging with per-request correlation IDs and
 * pluggable transports. Every entry is JSON-serializable so the JSON
 * transport can ship it straight to a log collector.
 *
 * @module scoutline/observability/logger
 * @version 0.1.0
 */

import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { Severity, createTimestamp, createUniqueId } from '../types/core.types.js';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /** Unique ID for this log entry */
  readonly id: UniqueId;

  /** When the entry was written */
  readonly timestamp: Timestamp;

  /** Severity level */
  readonly level: Severity;

  /** Log message */
  readonly message: string;

  /** Module that generated the log */
  readonly module: string;

  /** Request-scoped ID, shared by every entry one chat message produces */
  readonly correlationId: string | null;

  /** Additional structured data */
  readonly data: Readonly<Record<string, unknown>>;

  /** Error information if applicable */
  readonly error: LogError | null;

  /** Timing metrics if applicable */
  readonly metrics: LogMetrics | null;
}

/**
 * Error information in a log entry.
 */
export interface LogError {
  readonly name: string;
  readonly message: string;
  readonly stack: string | undefined;
  readonly code: string | undefined;
}

/**
 * Timing metrics in a log entry.
 */
export interface LogMetrics {
  readonly durationMs?: number;
  readonly custom?: Readonly<Record<string, number>>;
}

/**
 * Transport for outputting logs.
 */
export interface LogTransport {
  readonly name: string;
  write(entry: LogEntry): void;
}

/**
 * Configuration for the logger.
 */
export interface LoggerConfig {
  /** Minimum level to log */
  readonly minLevel: Severity;

  /** Module name for this logger instance */
  readonly module: string;

  /** Transports to write to */
  readonly transports: LogTransport[];

  /** Correlation ID stamped on every entry */
  readonly correlationId?: string | undefined;
}

const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  FATAL: 4,
};

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: Severity.INFO,
  module: 'scoutline',
  transports: [],
};

/**
 * Parses a level name such as "info" or "WARN". Unknown names yield null.
 */
export function parseSeverity(name: string): Severity | null {
  const upper = name.trim().toUpperCase();
  for (const level of Object.values(Severity)) {
    if (level === upper) {
      return level;
    }
  }
  return null;
}

/**
 * Console transport - human-readable output for local runs.
 */
export class ConsoleTransport implements LogTransport {
  readonly name = 'console';

  constructor(private readonly useColors: boolean = true) {}

  write(entry: LogEntry): void {
    const line = `${this.formatPrefix(entry)} ${entry.message}`;
    const args: unknown[] = Object.keys(entry.data).length > 0 ? [line, entry.data] : [line];

    switch (entry.level) {
      case Severity.DEBUG:
        console.debug(...args);
        break;
      case Severity.INFO:
        console.info(...args);
        break;
      case Severity.WARN:
        console.warn(...args);
        break;
      case Severity.ERROR:
      case Severity.FATAL:
        console.error(...args, entry.error ?? '');
        break;
    }
  }

  private formatPrefix(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toISOString();
    const level = entry.level.padEnd(5);
    const scope = entry.correlationId !== null ? `${entry.module} ${entry.correlationId.slice(0, 8)}` : entry.module;

    if (this.useColors) {
      return `\x1b[90m${timestamp}\x1b[0m ${this.getLevelColor(entry.level)}${level}\x1b[0m \x1b[36m[${scope}]\x1b[0m`;
    }

    return `${timestamp} ${level} [${scope}]`;
  }

  private getLevelColor(level: Severity): string {
    switch (level) {
      case Severity.DEBUG: return '\x1b[90m';
      case Severity.INFO: return '\x1b[32m';
      case Severity.WARN: return '\x1b[33m';
      case Severity.ERROR: return '\x1b[31m';
      case Severity.FATAL: return '\x1b[35m';
      default: return '\x1b[0m';
    }
  }
}

/**
 * JSON transport - one line per entry on stderr, stdout stays free
 * for CLI output.
 */
export class JsonTransport implements LogTransport {
  readonly name = 'json';

  constructor(private readonly out: NodeJS.WritableStream = process.stderr) {}

  write(entry: LogEntry): void {
    this.out.write(
      JSON.stringify({
        ...entry.data,
        timestamp: new Date(entry.timestamp).toISOString(),
        level: entry.level,
        module: entry.module,
        correlationId: entry.correlationId ?? undefined,
        message: entry.message,
        ...(entry.error !== null ? { error: entry.error } : {}),
        ...(entry.metrics?.durationMs !== undefined ? { durationMs: entry.metrics.durationMs } : {}),
      }) + '\n',
    );
  }
}

/**
 * Memory transport - stores logs in memory for tests.
 */
export class MemoryTransport implements LogTransport {
  readonly name = 'memory';

  private readonly entries: LogEntry[] = [];

  constructor(private readonly maxEntries: number = 1000) {}

  write(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  getEntries(): ReadonlyArray<LogEntry> {
    return [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }

  findByCorrelationId(correlationId: string): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.correlationId === correlationId);
  }

  findByLevel(level: Severity): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.level === level);
  }
}

/**
 * Structured logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger('agent.loop', { minLevel: Severity.DEBUG });
 * const requestLogger = logger.child({ correlationId: requestId });
 * requestLogger.info('Tool requested', { tool: 'web_search' });
 * ```
 */
export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    const merged: LoggerConfig = { ...DEFAULT_CONFIG, ...config };
    this.config = merged.transports.length === 0
      ? { ...merged, transports: [new ConsoleTransport()] }
      : merged;
  }

  get minLevel(): Severity {
    return this.config.minLevel;
  }

  /**
   * Creates a child logger sharing this logger's transports.
   */
  child(context: { module?: string; correlationId?: string }): Logger {
    return new Logger({
      minLevel: this.config.minLevel,
      module: context.module ?? this.config.module,
      transports: this.config.transports,
      correlationId: context.correlationId ?? this.config.correlationId,
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.DEBUG, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.INFO, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.WARN, message, data);
  }

  error(message: string, data?: Record<string, unknown>, error?: unknown): void {
    this.log(Severity.ERROR, message, data, error);
  }

  fatal(message: string, data?: Record<string, unknown>, error?: unknown): void {
    this.log(Severity.FATAL, message, data, error);
  }

  /**
   * Times an async operation and logs its duration.
   * Failures are logged at ERROR and rethrown.
   */
  async time<T>(
    label: string,
    fn: () => Promise<T>,
    level: Severity = Severity.DEBUG,
  ): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      this.logWithMetrics(level, `${label} completed`, { durationMs: Date.now() - start });
      return result;
    } catch (error) {
      this.logWithMetrics(Severity.ERROR, `${label} failed`, { durationMs: Date.now() - start }, error);
      throw error;
    }
  }

  private log(level: Severity, message: string, data?: Record<string, unknown>, error?: unknown): void {
    if (!this.isEnabled(level)) {
      return;
    }
    this.writeEntry(this.createEntry(level, message, data, error, undefined));
  }

  private logWithMetrics(level: Severity, message: string, metrics: LogMetrics, error?: unknown): void {
    if (!this.isEnabled(level)) {
      return;
    }
    this.writeEntry(this.createEntry(level, message, undefined, error, metrics));
  }

  private isEnabled(level: Severity): boolean {
    return SEVERITY_ORDER[level] >= SEVERITY_ORDER[this.config.minLevel];
  }

  private createEntry(
    level: Severity,
    message: string,
    data: Record<string, unknown> | undefined,
    error: unknown,
    metrics: LogMetrics | undefined,
  ): LogEntry {
    return {
      id: createUniqueId(uuidv4()),
      timestamp: createTimestamp(),
      level,
      message,
      module: this.config.module,
      correlationId: this.config.correlationId ?? null,
      data: data ?? {},
      error: error === undefined ? null : formatError(error),
      metrics: metrics ?? null,
    };
  }

  private writeEntry(entry: LogEntry): void {
    for (const transport of this.config.transports) {
      try {
        transport.write(entry);
      } catch (transportError) {
        console.error(`Logger transport '${transport.name}' failed:`, transportError);
      }
    }
  }
}

function formatError(error: unknown): LogError {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { name: error.name, message: error.message, stack: error.stack, code };
  }
  return { name: 'NonError', message: String(error), stack: undefined, code: undefined };
}

/**
 * Creates a logger for a specific module.
 */
export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({ ...config, module });
}

/**
 * Logger that drops everything; the default for library classes
 * constructed without one.
 */
export function createSilentLogger(): Logger {
  return new Logger({ transports: [{ name: 'silent', write: () => undefined }] });
}
