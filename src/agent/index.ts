/**
 * @fileoverview Agent module public exports.
 *
 * @module scoutline/agent
 * @version 0.1.0
 */

export {
  LifecycleController,
  LifecycleTransitionError,
  type LifecycleEvents,
  type PhaseMetadata,
  type LifecycleError,
  type LifecycleState,
  type PhaseHistoryEntry,
} from './lifecycle.js';

export { parseAction, type ActionParseResult, type ToolNameResolver } from './action-parser.js';

export { buildContext, createSystemPrompt, type ContextInput } from './context-builder.js';

export {
  ReActLoop,
  COMPLETION_FAILURE_MESSAGE,
  FALLBACK_ANSWER,
  createLoopState,
  appendMessages,
  recordToolCycle,
  formatToolResultMessage,
  formatCorrectionMessage,
  type ReActLoopEvents,
  type ReActLoopOptions,
  type RunOptions,
  type FinalizeHook,
  type FinalizeContext,
  type FinalizeReason,
  type CompletedLoop,
  type LoopOutcome,
} from './react-loop.js';

export {
  ChatService,
  ConversationNotFoundError,
  CONVERSATION_NOT_FOUND_MESSAGE,
  STORAGE_FAILURE_MESSAGE,
  toMessage,
  usedToolNames,
  type ChatRequest,
  type ChatServiceOptions,
} from './chat-service.js';
