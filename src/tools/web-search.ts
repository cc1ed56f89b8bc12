/**
 * @fileoverview Web search tool backed by a Tavily-compatible search API.
 *
 * @module scoutline/tools/web-search
 * @version 0.1.0
 */

import { z } from 'zod';
import type { ToolDefinition, ToolOutcome } from '../types/tools.types.js';
import { toolFailure, toolSuccess } from '../types/tools.types.js';

export const WEB_SEARCH_TOOL_NAME = 'web_search';

export const DEFAULT_SEARCH_ENDPOINT = 'https://api.tavily.com/search';

export interface WebSearchToolOptions {
  readonly apiKey: string;
  readonly endpoint?: string;
  readonly maxResults?: number;
  readonly timeoutMs?: number;

  /** Injected for tests; defaults to the global fetch */
  readonly fetch?: typeof fetch;
}

const SearchResponseSchema = z.object({
  answer: z.string().nullish(),
  results: z
    .array(
      z.object({
        title: z.string().nullish(),
        url: z.string().nullish(),
        content: z.string().nullish(),
      }),
    )
    .default([]),
});

export type SearchResponse = z.infer<typeof SearchResponseSchema>;

/**
 * Renders a search response as plain text for the model.
 */
export function formatSearchResults(query: string, response: SearchResponse): string {
  const lines: string[] = [`Search results for '${query}':`, ''];

  if (response.answer) {
    lines.push(`Answer: ${response.answer}`, '');
  }

  if (response.results.length === 0) {
    lines.push('No results found.');
    return lines.join('\n');
  }

  lines.push('Top results:');
  response.results.forEach((result, index) => {
    lines.push(
      '',
      `${index + 1}. ${result.title ?? 'No title'}`,
      `   URL: ${result.url ?? 'No URL'}`,
      `   ${result.content ?? 'No content'}`,
    );
  });

  return lines.join('\n');
}

export function createWebSearchTool(options: WebSearchToolOptions): ToolDefinition {
  const endpoint = options.endpoint ?? DEFAULT_SEARCH_ENDPOINT;
  const maxResults = options.maxResults ?? 5;
  const doFetch = options.fetch ?? fetch;

  return {
    name: WEB_SEARCH_TOOL_NAME,
    displayName: 'Web Search',
    description: 'Search the web for current information, news, and recent events. Input: the search query.',
    timeoutMs: options.timeoutMs,
    invoke: async (input, context): Promise<ToolOutcome> => {
      if (options.apiKey === '') {
        return toolFailure('Web search is not configured');
      }

      const query = input.trim();
      if (query === '') {
        return toolFailure('Search query is empty');
      }

      context.logger.info('Searching the web', { query });

      let response: Response;
      try {
        response = await doFetch(endpoint, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            api_key: options.apiKey,
            query,
            max_results: maxResults,
            include_answer: true,
          }),
          signal: context.signal,
        });
      } catch (error) {
        return toolFailure(`Search request failed: ${error instanceof Error ? error.message : String(error)}`);
      }

      if (!response.ok) {
        return toolFailure(`Search API responded with HTTP ${response.status}`);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch {
        return toolFailure('Search API returned invalid JSON');
      }

      const parsed = SearchResponseSchema.safeParse(body);
      if (!parsed.success) {
        return toolFailure('Search API returned an unexpected payload');
      }

      context.logger.info('Search completed', { query, results: parsed.data.results.length });
      return toolSuccess(formatSearchResults(query, parsed.data));
    },
  };
}
