/**
 * @fileoverview Environment configuration.
 *
 * Variables are read from `process.env` after `.env` has been loaded with
 * dotenv, coerced and validated with zod. Invalid values fail fast with a
 * {@link ConfigError} naming every offending variable.
 *
 * @module scoutline/config
 * @version 0.1.0
 */

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import type { AgentConfig } from './types/core.types.js';
import { Severity } from './types/core.types.js';
import { parseSeverity } from './observability/logger.js';
import { DEFAULT_SEARCH_ENDPOINT } from './tools/web-search.js';

export interface AppConfig {
  readonly llm: {
    readonly apiKey: string;
    readonly baseURL: string | undefined;
    readonly model: string;
    readonly temperature: number;
    readonly maxTokens: number;
  };
  readonly search: {
    readonly apiKey: string | undefined;
    readonly endpoint: string;
  };
  readonly trends: {
    readonly baseUrl: string;
    readonly timeoutMs: number;
    readonly defaultGeo: string;
  };
  readonly agent: AgentConfig;

  /** Null when Supabase is not configured; an in-memory store is used instead */
  readonly supabase: { readonly url: string; readonly key: string } | null;

  readonly server: {
    readonly host: string;
    readonly port: number;
    readonly apiKey: string | undefined;
  };
  readonly logLevel: Severity;
}

export class ConfigError extends Error {
  readonly code = 'CONFIG_INVALID';

  constructor(readonly issues: ReadonlyArray<string>) {
    super(`Invalid configuration:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

function emptyToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());
const optionalUrl = z.preprocess(emptyToUndefined, z.string().url().optional());

function withDefault<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(emptyToUndefined, schema);
}

const milliseconds = (fallback: number) => withDefault(z.coerce.number().int().positive().default(fallback));

const EnvSchema = z.object({
  LLM_API_KEY: z.preprocess(emptyToUndefined, z.string({ required_error: 'is required' })),
  LLM_BASE_URL: optionalUrl,
  LLM_MODEL: withDefault(z.string().default('llama-3.3-70b-versatile')),
  LLM_TEMPERATURE: withDefault(z.coerce.number().min(0).max(2).default(0.7)),
  LLM_MAX_TOKENS: withDefault(z.coerce.number().int().positive().default(1024)),

  TAVILY_API_KEY: optionalString,
  TAVILY_URL: withDefault(z.string().url().default(DEFAULT_SEARCH_ENDPOINT)),

  MCP_URL: withDefault(z.string().url().default('http://mcp:5000')),
  MCP_TIMEOUT_MS: milliseconds(10_000),
  TRENDS_DEFAULT_GEO: withDefault(
    z
      .string()
      .regex(/^[A-Za-z]{2}$/, 'must be a two-letter region code')
      .default('US')
      .transform(value => value.toUpperCase()),
  ),

  TOOL_TIMEOUT_MS: milliseconds(10_000),
  AGENT_MAX_ITERATIONS: withDefault(z.coerce.number().int().min(0).default(10)),
  AGENT_TIMEOUT_MS: milliseconds(30_000),
  FINALIZE_TIMEOUT_MS: milliseconds(15_000),
  HISTORY_WINDOW: withDefault(z.coerce.number().int().min(0).default(10)),
  MALFORMED_ACTION_RETRIES: withDefault(z.coerce.number().int().min(0).max(5).default(0)),

  SUPABASE_URL: optionalUrl,
  SUPABASE_KEY: optionalString,

  HOST: withDefault(z.string().default('0.0.0.0')),
  PORT: withDefault(z.coerce.number().int().min(0).max(65_535).default(8000)),
  API_KEY: optionalString,

  LOG_LEVEL: withDefault(
    z
      .string()
      .default(Severity.INFO)
      .transform((value, ctx) => {
        const level = parseSeverity(value);
        if (level === null) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown level '${value}'` });
          return z.NEVER;
        }
        return level;
      }),
  ),
});

/**
 * Loads `.env` into `process.env`. Variables already set win.
 */
export function loadEnvFile(path = '.env'): void {
  loadEnv({ path });
}

/**
 * Validates an environment and builds the application config.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }

  const vars = result.data;
  const issues: string[] = [];
  if ((vars.SUPABASE_URL === undefined) !== (vars.SUPABASE_KEY === undefined)) {
    issues.push('SUPABASE_URL: SUPABASE_URL and SUPABASE_KEY must be set together');
  }
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return {
    llm: {
      apiKey: vars.LLM_API_KEY,
      baseURL: vars.LLM_BASE_URL,
      model: vars.LLM_MODEL,
      temperature: vars.LLM_TEMPERATURE,
      maxTokens: vars.LLM_MAX_TOKENS,
    },
    search: {
      apiKey: vars.TAVILY_API_KEY,
      endpoint: vars.TAVILY_URL,
    },
    trends: {
      baseUrl: vars.MCP_URL,
      timeoutMs: vars.MCP_TIMEOUT_MS,
      defaultGeo: vars.TRENDS_DEFAULT_GEO,
    },
    agent: {
      maxIterations: vars.AGENT_MAX_ITERATIONS,
      timeoutMs: vars.AGENT_TIMEOUT_MS,
      finalizeTimeoutMs: vars.FINALIZE_TIMEOUT_MS,
      toolTimeoutMs: vars.TOOL_TIMEOUT_MS,
      historyWindow: vars.HISTORY_WINDOW,
      malformedActionRetries: vars.MALFORMED_ACTION_RETRIES,
    },
    supabase:
      vars.SUPABASE_URL !== undefined && vars.SUPABASE_KEY !== undefined
        ? { url: vars.SUPABASE_URL, key: vars.SUPABASE_KEY }
        : null,
    server: {
      host: vars.HOST,
      port: vars.PORT,
      apiKey: vars.API_KEY,
    },
    logLevel: vars.LOG_LEVEL,
  };
}
