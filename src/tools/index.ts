/**
 * @fileoverview Tools module public exports.
 *
 * @module scoutline/tools
 */

export {
  ToolRegistry,
  ToolConfigurationError,
  DEFAULT_REGISTRY_CONFIG,
  type ToolRegistryConfig,
  type ToolRegistryEvents,
  type ToolRegistryEntry,
  type ToolActivity,
  type DispatchRequest,
} from './tool-registry.js';

export {
  createWebSearchTool,
  formatSearchResults,
  WEB_SEARCH_TOOL_NAME,
  DEFAULT_SEARCH_ENDPOINT,
  type WebSearchToolOptions,
  type SearchResponse,
} from './web-search.js';

export {
  createTrendsTool,
  checkTrendsHealth,
  formatTrends,
  resolveGeo,
  TRENDS_TOOL_NAME,
  type TrendsToolOptions,
  type TrendItem,
} from './trends.js';
