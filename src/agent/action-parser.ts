/**
 * @fileoverview Action Parser - decides whether a completion requests a tool.
 *
 * Two encodings are understood. A completion that is exactly one JSON object
 * is read as structured output (`{"action": {...}}` or `{"final_answer": ...}`).
 * Anything else falls back to the free-text marker convention:
 *
 * ```text
 * ACTION: web_search
 * INPUT: typescript 5.5 release notes
 * ```
 *
 * An action naming a tool that is not registered is "no action": the text is
 * taken as the final answer instead of being retried forever.
 *
 * @module scoutline/agent/action-parser
 * @version 0.1.0
 */

import { z } from 'zod';
import type { ActionRequest } from '../types/core.types.js';

/**
 * The part of the registry the parser needs.
 */
export interface ToolNameResolver {
  /** Registered spelling of `name` in any casing, or null */
  resolve(name: string): string | null;
}

export type ActionParseResult =
  | { readonly kind: 'action'; readonly request: ActionRequest }
  | { readonly kind: 'none'; readonly reason: 'no_marker' }
  | { readonly kind: 'none'; readonly reason: 'final_answer'; readonly answer: string }
  | { readonly kind: 'none'; readonly reason: 'unknown_tool'; readonly toolName: string };

const StructuredOutputSchema = z.union([
  z.object({
    action: z.object({
      tool: z.string(),
      input: z.string().optional(),
    }),
  }),
  z.object({ final_answer: z.string() }),
]);

const ACTION_MARKER = /ACTION:[ \t]*(\w+)/i;
const INPUT_MARKER = /INPUT:/i;
const BLANK_LINE = /\r?\n[ \t]*\r?\n/;

/**
 * Parses one completion. Pure.
 */
export function parseAction(text: string, tools: ToolNameResolver): ActionParseResult {
  const structured = parseStructured(text);
  if (structured !== null) {
    if ('final_answer' in structured) {
      return { kind: 'none', reason: 'final_answer', answer: structured.final_answer };
    }
    return resolveRequest(structured.action.tool, (structured.action.input ?? '').trim(), tools);
  }

  const action = ACTION_MARKER.exec(text);
  if (action === null) {
    return { kind: 'none', reason: 'no_marker' };
  }

  const afterAction = text.slice(action.index + action[0].length);
  return resolveRequest(action[1], extractInput(afterAction), tools);
}

// ============ Private Helpers ============

function parseStructured(text: string): z.infer<typeof StructuredOutputSchema> | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{') || !trimmed.endsWith('}')) {
    return null;
  }

  let value: unknown;
  try {
    value = JSON.parse(trimmed);
  } catch {
    return null;
  }

  const parsed = StructuredOutputSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/**
 * The input block runs from `INPUT:` to the first blank line.
 */
function extractInput(afterAction: string): string {
  const marker = INPUT_MARKER.exec(afterAction);
  if (marker === null) {
    return '';
  }

  const block = afterAction.slice(marker.index + marker[0].length);
  const end = BLANK_LINE.exec(block);
  return (end === null ? block : block.slice(0, end.index)).trim();
}

function resolveRequest(name: string, toolInput: string, tools: ToolNameResolver): ActionParseResult {
  const toolName = tools.resolve(name);
  if (toolName === null) {
    return { kind: 'none', reason: 'unknown_tool', toolName: name };
  }
  return { kind: 'action', request: { toolName, toolInput } };
}
