/**
 * @fileoverview Trending-topics tool backed by a Google News Trends MCP
 * server reached over HTTP.
 *
 * @module scoutline/tools/trends
 * @version 0.1.0
 */

import { z } from 'zod';
import type { ToolDefinition, ToolOutcome } from '../types/tools.types.js';
import { toolFailure, toolSuccess } from '../types/tools.types.js';

export const TRENDS_TOOL_NAME = 'google_trends';

export interface TrendsToolOptions {
  /** Base URL of the MCP server, e.g. http://mcp:5000 */
  readonly baseUrl: string;

  /** Region used when the model passes none */
  readonly defaultGeo?: string;

  readonly timeoutMs?: number;
  readonly fetch?: typeof fetch;
}

const TrendItemSchema = z.union([
  z.string(),
  z
    .object({
      keyword: z.string().optional(),
      volume: z.union([z.string(), z.number()]).optional(),
    })
    .passthrough(),
]);

const TrendsResponseSchema = z.union([
  z.object({ content: z.array(TrendItemSchema) }).passthrough(),
  z.array(TrendItemSchema),
]);

export type TrendItem = z.infer<typeof TrendItemSchema>;

const MAX_LISTED_TRENDS = 10;

/**
 * Picks the region for a call: a two-letter code in the input wins.
 */
export function resolveGeo(input: string, defaultGeo: string): string {
  const candidate = input.trim();
  return /^[a-z]{2}$/i.test(candidate) ? candidate.toUpperCase() : defaultGeo;
}

export function formatTrends(geo: string, trends: ReadonlyArray<TrendItem>): string {
  const header = `Google Trends (${geo}):`;
  if (trends.length === 0) {
    return `${header}\n\nNo trends data available.`;
  }

  const lines = trends.slice(0, MAX_LISTED_TRENDS).map((trend, index) => {
    if (typeof trend === 'string') {
      return `${index + 1}. ${trend}`;
    }
    return `${index + 1}. ${trend.keyword ?? 'No keyword'} (Volume: ${trend.volume ?? 'N/A'})`;
  });

  return `${header}\n\n${lines.join('\n')}`;
}

function trimTrailingSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

export function createTrendsTool(options: TrendsToolOptions): ToolDefinition {
  const baseUrl = trimTrailingSlash(options.baseUrl);
  const defaultGeo = options.defaultGeo ?? 'US';
  const doFetch = options.fetch ?? fetch;

  return {
    name: TRENDS_TOOL_NAME,
    displayName: 'Google Trends',
    description: 'Get trending topics and popular searches. Input: optional two-letter region code (default US).',
    timeoutMs: options.timeoutMs,
    invoke: async (input, context): Promise<ToolOutcome> => {
      const geo = resolveGeo(input, defaultGeo);
      context.logger.info('Fetching trending terms', { geo });

      let response: Response;
      try {
        response = await doFetch(`${baseUrl}/mcp/tools/call`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            name: 'get_trending_terms',
            arguments: { geo, full_data: false },
          }),
          signal: context.signal,
        });
      } catch (error) {
        return toolFailure(`Trends request failed: ${error instanceof Error ? error.message : String(error)}`);
      }

      if (!response.ok) {
        return toolFailure(`Trends service responded with HTTP ${response.status}`);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch {
        return toolFailure('Trends service returned invalid JSON');
      }

      const parsed = TrendsResponseSchema.safeParse(body);
      if (!parsed.success) {
        return toolFailure('Trends service returned an unexpected payload');
      }

      const trends = Array.isArray(parsed.data) ? parsed.data : parsed.data.content;
      return toolSuccess(formatTrends(geo, trends));
    },
  };
}

/**
 * Calls the MCP server's health endpoint. Never throws.
 */
export async function checkTrendsHealth(
  baseUrl: string,
  options: { timeoutMs?: number; fetch?: typeof fetch } = {},
): Promise<boolean> {
  const doFetch = options.fetch ?? fetch;
  try {
    const response = await doFetch(`${trimTrailingSlash(baseUrl)}/healthz`, {
      signal: AbortSignal.timeout(options.timeoutMs ?? 5_000),
    });
    return response.status === 200;
  } catch {
    return false;
  }
}
