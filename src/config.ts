/**
 * Configuration.
 * Reads optional conclave.config.json, merges it section by section over the
 * defaults, applies environment overrides and validates the result.
 * Data path resolves relative to where the process is launched.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors.js';
import { MAX_BACKENDS } from './types/index.js';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const Tier = z.enum(['minimal', 'standard', 'comprehensive']);
const BackendList = z.array(z.string().min(1)).min(1).max(MAX_BACKENDS);
const LogLevel = z.enum(['debug', 'info', 'warn', 'error', 'silent', 'off']);

export const WorkspaceSchema = z.object({
  description: z.string().default(''),
  backends: z.object({
    simple: BackendList,
    moderate: BackendList,
    complex: BackendList,
    expert: BackendList,
  }),
  tools: z.array(z.string()).default([]),
  rag_enabled: z.boolean().default(false),
  synthesis_tier: Tier.optional(),
});

export const BackendSchema = z.object({
  backend_id: z.string().min(1),
  provider: z.enum(['openrouter', 'anthropic', 'openai']),
  api_model_id: z.string().min(1),
  display_name: z.string().min(1),
  cost_input_per_mtok: z.number().nonnegative(),
  cost_output_per_mtok: z.number().nonnegative(),
  general_purpose: z.boolean().default(true),
  low_cost: z.boolean().default(false),
});

export const ConfigSchema = z.object({
  budgets: z.object({
    daily_limit_usd: z.number().positive(),
    query_limit_usd: z.number().positive(),
    reset_hour_utc: z.number().int().min(0).max(23),
  }),
  cache: z.object({
    store: z.enum(['memory', 'redis']),
    max_entries: z.number().int().positive(),
    ttl_seconds: z.number().int().positive(),
    redis_url: z.string().optional(),
    key_prefix: z.string(),
  }),
  timeouts: z.object({
    classifier_ms: z.number().int().positive(),
    tool_ms: z.number().int().positive(),
    tools_total_ms: z.number().int().positive(),
    stage1_ms: z.number().int().positive(),
    stage2_ms: z.number().int().positive(),
    stage3_ms: z.number().int().positive(),
    stage4_ms: z.number().int().positive(),
    summarizer_ms: z.number().int().positive(),
  }),
  generation: z.object({
    temperature: z.number().min(0).max(2),
    classifier_max_tokens: z.number().int().positive(),
    stage1_max_tokens: z.number().int().positive(),
    ranking_max_tokens: z.number().int().positive(),
    synthesis_max_tokens: z.number().int().positive(),
    judge_max_tokens: z.number().int().positive(),
    summarizer_max_tokens: z.number().int().positive(),
  }),
  roles: z.object({
    classifier: z.string().min(1),
    synthesizer: z.string().min(1),
    judge: z.string().min(1),
    summarizer: z.string().min(1),
  }),
  features: z.object({
    intent_classification: z.boolean(),
    tools: z.boolean(),
    rag: z.boolean(),
    judge: z.boolean(),
  }),
  synthesis: z.object({
    default_tier: Tier,
    context_token_cap: z.number().int().positive(),
    summarize_threshold_tokens: z.number().int().positive(),
  }),
  ranking: z.object({
    tie_break: z.array(z.enum(['missing_votes', 'label'])).min(1),
  }),
  rag: z.object({
    top_k: z.number().int().positive(),
    min_score: z.number().min(0).max(1),
  }),
  storage: z.object({
    base_path: z.string().min(1),
    persist: z.boolean(),
  }),
  logging: z.object({
    level: LogLevel,
  }),
  backends: z.array(BackendSchema),
  workspaces: z.record(WorkspaceSchema).refine((w) => 'General' in w, {
    message: 'A "General" workspace is required',
  }),
});

export type ConclaveConfig = z.infer<typeof ConfigSchema>;
export type WorkspaceConfig = z.infer<typeof WorkspaceSchema>;
export type TieBreakKey = ConclaveConfig['ranking']['tie_break'][number];

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

function resolveDataPath(): string {
  if (process.env.CONCLAVE_DATA_PATH) return resolve(process.env.CONCLAVE_DATA_PATH);
  return resolve(process.cwd(), 'data');
}

const COUNCIL = [
  'openai/gpt-5.1',
  'google/gemini-3-pro-preview',
  'anthropic/claude-sonnet-4.5',
  'x-ai/grok-4',
];

function defaults(): ConclaveConfig {
  return {
    budgets: { daily_limit_usd: 100, query_limit_usd: 5, reset_hour_utc: 0 },
    cache: { store: 'memory', max_entries: 1000, ttl_seconds: 3600, key_prefix: 'conclave:cache:' },
    timeouts: {
      classifier_ms: 900,
      tool_ms: 8_000,
      tools_total_ms: 15_000,
      stage1_ms: 90_000,
      stage2_ms: 90_000,
      stage3_ms: 120_000,
      stage4_ms: 60_000,
      summarizer_ms: 20_000,
    },
    generation: {
      temperature: 0.7,
      classifier_max_tokens: 200,
      stage1_max_tokens: 2_000,
      ranking_max_tokens: 1_200,
      synthesis_max_tokens: 3_000,
      judge_max_tokens: 800,
      summarizer_max_tokens: 600,
    },
    roles: {
      classifier: 'google/gemini-2.5-flash',
      synthesizer: 'google/gemini-3-pro-preview',
      judge: 'openai/gpt-5.1',
      summarizer: 'google/gemini-2.5-flash',
    },
    features: { intent_classification: true, tools: true, rag: true, judge: false },
    synthesis: { default_tier: 'standard', context_token_cap: 3_000, summarize_threshold_tokens: 1_500 },
    ranking: { tie_break: ['missing_votes', 'label'] },
    rag: { top_k: 5, min_score: 0.7 },
    storage: { base_path: resolveDataPath(), persist: true },
    logging: { level: 'info' },
    backends: [],
    workspaces: {
      General: {
        description: 'Routes by complexity across the general-purpose council',
        backends: {
          simple: ['google/gemini-3-pro-preview'],
          moderate: ['anthropic/claude-sonnet-4.5', 'openai/gpt-5.1'],
          complex: ['anthropic/claude-sonnet-4.5', 'openai/gpt-5.1', 'google/gemini-3-pro-preview'],
          expert: COUNCIL,
        },
        tools: ['web_search', 'calculator', 'code_execution'],
        rag_enabled: false,
        synthesis_tier: 'standard',
      },
      Editorial: {
        description: 'Long-form writing; full council and workspace documents',
        backends: { simple: COUNCIL, moderate: COUNCIL, complex: COUNCIL, expert: COUNCIL },
        tools: ['rag_search', 'web_search'],
        rag_enabled: true,
        synthesis_tier: 'comprehensive',
      },
      Quant: {
        description: 'Numerical analysis with reasoning-focused backends',
        backends: {
          simple: ['anthropic/claude-sonnet-4.5'],
          moderate: ['anthropic/claude-sonnet-4.5', 'openai/gpt-5.1'],
          complex: ['anthropic/claude-sonnet-4.5', 'openai/gpt-5.1'],
          expert: ['anthropic/claude-sonnet-4.5', 'openai/gpt-5.1', 'google/gemini-3-pro-preview'],
        },
        tools: ['calculator', 'code_execution', 'web_search'],
        rag_enabled: false,
        synthesis_tier: 'minimal',
      },
    },
  };
}

/** A fresh copy of the built-in configuration. */
export function defaultConfig(): ConclaveConfig {
  return defaults();
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function merge(file: Record<string, unknown>): Record<string, unknown> {
  const base: Record<string, unknown> = { ...defaults() };
  for (const [key, value] of Object.entries(file)) {
    const current = base[key];
    base[key] = isRecord(current) && isRecord(value) ? { ...current, ...value } : value;
  }
  return base;
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = raw[key];
  const copy = isRecord(existing) ? { ...existing } : {};
  raw[key] = copy;
  return copy;
}

function flag(value: string): boolean | string {
  if (['1', 'true', 'yes', 'on'].includes(value.toLowerCase())) return true;
  if (['0', 'false', 'no', 'off'].includes(value.toLowerCase())) return false;
  return value;
}

const FEATURE_ENV: Record<string, string> = {
  FEATURE_INTENT_CLASSIFICATION: 'intent_classification',
  FEATURE_TOOLS: 'tools',
  FEATURE_RAG: 'rag',
  FEATURE_JUDGE: 'judge',
};

function applyEnv(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): void {
  if (env.CONCLAVE_DATA_PATH) section(raw, 'storage').base_path = resolve(env.CONCLAVE_DATA_PATH);
  if (env.DAILY_COST_LIMIT) section(raw, 'budgets').daily_limit_usd = Number(env.DAILY_COST_LIMIT);
  if (env.QUERY_COST_LIMIT) section(raw, 'budgets').query_limit_usd = Number(env.QUERY_COST_LIMIT);
  if (env.CACHE_TTL) section(raw, 'cache').ttl_seconds = Number(env.CACHE_TTL);
  if (env.REDIS_URL) {
    const cache = section(raw, 'cache');
    cache.store = 'redis';
    cache.redis_url = env.REDIS_URL;
  }
  if (env.CONCLAVE_LOG_LEVEL) section(raw, 'logging').level = env.CONCLAVE_LOG_LEVEL.toLowerCase();
  for (const [name, key] of Object.entries(FEATURE_ENV)) {
    const value = env[name];
    if (value !== undefined) section(raw, 'features')[key] = flag(value);
  }
}

/**
 * Validate a raw configuration object (already merged with defaults).
 * Throws ConfigurationError listing every schema issue.
 */
export function parseConfig(raw: unknown): ConclaveConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  if (parsed.data.cache.store === 'redis' && !parsed.data.cache.redis_url) {
    throw new ConfigurationError('cache.store is "redis" but no cache.redis_url or REDIS_URL was given');
  }
  return parsed.data;
}

/** Build a configuration from a file object and an environment, without caching. */
export function buildConfig(file: Record<string, unknown> = {}, env: NodeJS.ProcessEnv = {}): ConclaveConfig {
  const raw = merge(file);
  applyEnv(raw, env);
  return parseConfig(raw);
}

function readConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read ${path}: ${errorMessage(err)}`, { path });
  }
  if (!isRecord(parsed)) throw new ConfigurationError(`${path} must contain a JSON object`, { path });
  return parsed;
}

export function loadConfig(configPath?: string): ConclaveConfig {
  const candidates = [
    configPath,
    process.env.CONCLAVE_CONFIG,
    resolve(process.cwd(), 'conclave.config.json'),
  ].filter((p): p is string => typeof p === 'string' && p.length > 0);

  const found = candidates.find((p) => existsSync(p));
  return buildConfig(found ? readConfigFile(found) : {}, process.env);
}
