/**
 * @fileoverview Type module public exports.
 *
 * @module scoutline/types
 */

export {
  AgentPhase,
  Severity,
  createUniqueId,
  createTimestamp,
  DEFAULT_AGENT_CONFIG,
  type UniqueId,
  type Timestamp,
  type MessageRole,
  type Message,
  type ActionRequest,
  type ToolResult,
  type LoopState,
  type ToolActivityPhase,
  type StreamEvent,
  type StreamEventType,
  type AgentConfig,
} from './core.types.js';

export {
  ToolOutcomeSchema,
  ToolNameSchema,
  toolSuccess,
  toolFailure,
  type ToolDefinition,
  type ToolInvoker,
  type ToolOutcome,
  type ToolInvocationContext,
  type ExecutionLogger,
} from './tools.types.js';
