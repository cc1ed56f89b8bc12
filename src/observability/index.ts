/**
 * @fileoverview Observability module public exports.
 *
 * @module scoutline/observability
 */

export {
  Logger,
  ConsoleTransport,
  JsonTransport,
  MemoryTransport,
  createLogger,
  createSilentLogger,
  parseSeverity,
  type LogEntry,
  type LogError,
  type LogMetrics,
  type LogTransport,
  type LoggerConfig,
} from './logger.js';
