/**
 * Tool catalog — how each known tool is parameterised, ordered and rendered
 * into the augmentation block. Tool implementations themselves are
 * collaborators supplied by the host.
 */

import { z } from 'zod';
import type { ChatMessage, CompletionParams, ModelResponse, ToolResult } from '../types/index.js';

// ---------------------------------------------------------------------------
// Collaborator contract
// ---------------------------------------------------------------------------

/** Completion handle for model-backed tools; every call goes through the governor. */
export type GovernedCompletion = (
  backendId: string,
  messages: ChatMessage[],
  params?: CompletionParams,
) => Promise<ModelResponse>;

export interface ToolInvokeOptions {
  timeout_ms: number;
  /** Aborts when the tool's own timeout, the coordinator deadline or the caller fires. */
  signal: AbortSignal;
  /** Present only for catalog entries marked `priced`. */
  complete?: GovernedCompletion;
}

export interface ToolCollaborator {
  invoke(params: Record<string, unknown>, options: ToolInvokeOptions): Promise<ToolResult>;
}

// ---------------------------------------------------------------------------
// Catalog entries
// ---------------------------------------------------------------------------

export interface ToolParamContext {
  query: string;
  workspace: string;
  rag: { top_k: number; min_score: number };
  /** Caller-supplied extras, e.g. a code snippet for code_execution. */
  extra: Record<string, unknown>;
}

export interface ToolCatalogEntry {
  tool_id: string;
  /** Lower renders first in the augmentation block. */
  priority: number;
  /** Model-backed: receives a governed completion handle. */
  priced: boolean;
  /** Cap on the rendered block for this tool, in characters. */
  max_chars: number;
  buildParams(ctx: ToolParamContext): Record<string, unknown>;
  format(data: unknown): string[];
}

const Scalar = z.union([z.string(), z.number(), z.boolean()]);

const WebResults = z.array(z.object({
  title: z.string(),
  snippet: z.string().optional(),
  content: z.string().optional(),
  url: z.string().optional(),
}));

const RagResults = z.object({
  results: z.array(z.object({ text: z.string(), score: z.number(), source: z.string() })),
});

const CodeOutput = z.object({
  stdout: z.string().optional(),
  stderr: z.string().optional(),
  return_value: z.unknown().optional(),
});

const Game = z.object({
  name: z.string().default('Unknown game'),
  home_team: z.string().optional(),
  away_team: z.string().optional(),
  home_score: Scalar.optional(),
  away_score: Scalar.optional(),
  status: z.string().optional(),
  date: z.string().optional(),
});

const SportsData = z.object({
  source: z.string().default('unknown'),
  games: z.array(Game).optional(),
  upcoming_games: z.array(Game).optional(),
  stats: z.object({
    team: z.string().default('Unknown'),
    wins: z.number().default(0),
    losses: z.number().default(0),
  }).optional(),
});

function asText(data: unknown): string {
  return typeof data === 'string' ? data : JSON.stringify(data);
}

function formatCalculator(data: unknown): string[] {
  const scalar = Scalar.safeParse(data);
  if (scalar.success) return [`Calculation Result: ${scalar.data}`];
  const wrapped = z.object({ result: Scalar }).safeParse(data);
  return [`Calculation Result: ${wrapped.success ? wrapped.data.result : asText(data)}`];
}

function formatWebSearch(data: unknown): string[] {
  const direct = WebResults.safeParse(data);
  const nested = z.object({ results: WebResults }).safeParse(data);
  const items = direct.success ? direct.data : nested.success ? nested.data.results : null;
  if (!items) return [asText(data)];
  const lines = ['Search Results:'];
  for (const item of items.slice(0, 3)) {
    lines.push(`- ${item.title}`);
    lines.push(`  ${(item.snippet ?? item.content ?? '').slice(0, 200)}`);
    lines.push(`  URL: ${item.url ?? 'N/A'}`);
  }
  return lines;
}

function formatRag(data: unknown): string[] {
  const parsed = RagResults.safeParse(data);
  if (!parsed.success) return [asText(data)];
  if (parsed.data.results.length === 0) return ['No relevant documents found'];
  const lines = [`Found ${parsed.data.results.length} relevant document(s):`];
  for (const doc of parsed.data.results) {
    lines.push(`- [${doc.source}] (Relevance: ${doc.score.toFixed(2)})`);
    lines.push(`  ${doc.text.length > 300 ? `${doc.text.slice(0, 300)}...` : doc.text}`);
  }
  return lines;
}

function formatCode(data: unknown): string[] {
  const parsed = CodeOutput.safeParse(data);
  if (!parsed.success) return [asText(data)];
  const lines: string[] = [];
  if (parsed.data.stdout) lines.push(`Output: ${parsed.data.stdout}`);
  if (parsed.data.return_value !== undefined && parsed.data.return_value !== null) {
    lines.push(`Return Value: ${asText(parsed.data.return_value)}`);
  }
  if (parsed.data.stderr) lines.push(`Errors: ${parsed.data.stderr}`);
  return lines;
}

function formatSports(data: unknown): string[] {
  const parsed = SportsData.safeParse(data);
  if (!parsed.success) return [asText(data)];
  const { source, games, upcoming_games, stats } = parsed.data;
  const lines = [`Source: ${source}`];
  if (games) {
    lines.push(`Found ${games.length} game(s):`);
    for (const g of games.slice(0, 5)) {
      lines.push(`- ${g.name}`);
      if (g.home_score !== undefined) {
        lines.push(`  Score: ${g.away_team ?? 'Away'} ${g.away_score ?? 0} - ${g.home_team ?? 'Home'} ${g.home_score}`);
      }
      if (g.status) lines.push(`  Status: ${g.status}`);
    }
  } else if (upcoming_games) {
    lines.push(`Found ${upcoming_games.length} upcoming game(s):`);
    for (const g of upcoming_games.slice(0, 5)) lines.push(`- ${g.name} on ${g.date ?? 'TBD'}`);
  } else if (stats) {
    lines.push(`Team: ${stats.team}`);
    lines.push(`Record: ${stats.wins}-${stats.losses}`);
  }
  return lines;
}

function sportsParams(query: string): Record<string, unknown> {
  const q = query.toLowerCase();
  const has = (words: string[]): boolean => words.some((w) => q.includes(w));

  let sport = 'americanfootball_ncaaf';
  if (has(['nfl', 'pro football'])) sport = 'americanfootball_nfl';
  else if (has(['nba', 'basketball'])) sport = 'basketball_nba';
  else if (has(['mlb', 'baseball'])) sport = 'baseball_mlb';

  let dataType = 'scores';
  if (has(['odds', 'line', 'spread', 'betting', 'vegas'])) dataType = 'odds';
  else if (has(['schedule', 'upcoming', 'next game'])) dataType = 'schedule';
  else if (has(['stats', 'statistics', 'record'])) dataType = 'stats';

  return { sport, data_type: dataType };
}

export const DEFAULT_CATALOG: ToolCatalogEntry[] = [
  {
    tool_id: 'rag_search',
    priority: 10,
    priced: false,
    max_chars: 4_000,
    buildParams: (ctx) => ({ query: ctx.query, workspace: ctx.workspace, top_k: ctx.rag.top_k, min_score: ctx.rag.min_score }),
    format: formatRag,
  },
  {
    tool_id: 'calculator',
    priority: 20,
    priced: false,
    max_chars: 1_000,
    buildParams: (ctx) => ({ expression: ctx.query }),
    format: formatCalculator,
  },
  {
    tool_id: 'code_execution',
    priority: 30,
    priced: false,
    max_chars: 2_000,
    buildParams: (ctx) => ({ code: typeof ctx.extra.code === 'string' ? ctx.extra.code : '# No code provided' }),
    format: formatCode,
  },
  {
    tool_id: 'sports_data',
    priority: 40,
    priced: false,
    max_chars: 2_000,
    buildParams: (ctx) => sportsParams(ctx.query),
    format: formatSports,
  },
  {
    tool_id: 'web_search',
    priority: 50,
    priced: false,
    max_chars: 2_000,
    buildParams: (ctx) => ({ query: ctx.query, num_results: 5, include_content: false }),
    format: formatWebSearch,
  },
];

const GENERIC_PRIORITY = 100;

function genericEntry(toolId: string): ToolCatalogEntry {
  return {
    tool_id: toolId,
    priority: GENERIC_PRIORITY,
    priced: false,
    max_chars: 2_000,
    buildParams: (ctx) => ({ query: ctx.query }),
    format: (data) => [asText(data)],
  };
}

export class ToolCatalog {
  private entries = new Map<string, ToolCatalogEntry>();

  constructor(entries: ToolCatalogEntry[] = DEFAULT_CATALOG) {
    for (const e of entries) this.entries.set(e.tool_id, e);
  }

  register(entry: ToolCatalogEntry): void {
    this.entries.set(entry.tool_id, entry);
  }

  /** Known entry, or a generic one (query param, JSON rendering, lowest priority). */
  entry(toolId: string): ToolCatalogEntry {
    return this.entries.get(toolId) ?? genericEntry(toolId);
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }
}
