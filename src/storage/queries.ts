/**
 * Query records: one JSON document per answered or failed query.
 *
 * A record carries every entity of the run except the label↔backend
 * mapping: rankings keep their labels and raters, Stage1 responses keep
 * their backends, nothing links the two.
 */

import { z } from 'zod';
import { JsonStore } from './json-store.js';
import type { IntentDecision, PipelineResult } from '../types/index.js';

const Failure = z.object({ kind: z.string(), message: z.string() });

const ResponseRecord = z.object({
  backend_id: z.string(),
  text: z.string(),
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  latency_ms: z.number(),
  cost_usd: z.number(),
  success: z.boolean(),
  cached: z.boolean(),
  failure: Failure.optional(),
});

const ToolRecord = z.object({
  tool_id: z.string(),
  params: z.record(z.unknown()),
  ok: z.boolean(),
  /** Tool payload serialised as JSON; absent on failure. */
  data_json: z.string().optional(),
  failure: Failure.optional(),
  latency_ms: z.number(),
  cost_usd: z.number(),
});

export const QueryRecordSchema = z.object({
  query_id: z.string(),
  text: z.string(),
  workspace: z.string(),
  submitted_at: z.string(),
  status: z.enum(['done', 'failed']),
  intent: z.object({
    complexity: z.enum(['simple', 'moderate', 'complex', 'expert']),
    workflow: z.enum(['quick', 'dual_check', 'deliberation', 'expert_panel']),
    backends: z.array(z.string()),
    tools: z.array(z.string()),
    rationale: z.string(),
    confidence: z.number(),
    source: z.string(),
  }).nullable(),
  tools: z.array(ToolRecord),
  stage1: z.array(ResponseRecord),
  rankings: z.array(z.object({
    rater_backend_id: z.string(),
    labels: z.array(z.string()),
    raw_text: z.string(),
  })),
  aggregate: z.array(z.object({
    label: z.string(),
    mean_rank: z.number(),
    votes: z.number(),
    missing_votes: z.number(),
  })),
  synthesis: z.object({
    status: z.enum(['skipped', 'available', 'unavailable']),
    author_backend_id: z.string().optional(),
    tier: z.enum(['minimal', 'standard', 'comprehensive']).optional(),
    text: z.string().optional(),
    reason: z.string().optional(),
  }),
  judge: z.object({
    status: z.enum(['skipped', 'available', 'unavailable']),
    judge_backend_id: z.string().optional(),
    scores: z.object({ accuracy: z.number(), completeness: z.number(), coherence: z.number() }).optional(),
    overall: z.number().optional(),
    recommendation: z.enum(['approve', 'revise']).optional(),
    concerns: z.array(z.string()).optional(),
    reasoning: z.string().optional(),
    reason: z.string().optional(),
  }),
  final: z.object({
    text: z.string(),
    source: z.enum(['stage1', 'synthesis']),
    backend_id: z.string(),
  }).nullable(),
  total_cost_usd: z.number(),
  latency_ms: z.number(),
  error: z.object({ code: z.string(), message: z.string() }).optional(),
});

export type QueryRecord = z.infer<typeof QueryRecordSchema>;

function intentRecord(intent: IntentDecision): NonNullable<QueryRecord['intent']> {
  return { ...intent, backends: [...intent.backends], tools: [...intent.tools] };
}

export function recordFromResult(result: PipelineResult): QueryRecord {
  const { query, intent, synthesis, judge } = result;
  return {
    query_id: query.query_id,
    text: query.text,
    workspace: query.workspace,
    submitted_at: query.submitted_at,
    status: 'done',
    intent: intentRecord(intent),
    tools: (result.tools?.invocations ?? []).map((i) => ({
      tool_id: i.tool_id,
      params: i.params,
      ok: i.result.ok,
      ...(i.result.ok
        ? { data_json: JSON.stringify(i.result.data) ?? 'null' }
        : { failure: { kind: i.result.kind, message: i.result.message } }),
      latency_ms: i.latency_ms,
      cost_usd: i.cost_usd,
    })),
    stage1: result.stage1.map((r) => ({ ...r })),
    rankings: result.stage2?.rankings.map((r) => ({ ...r, labels: [...r.labels] })) ?? [],
    aggregate: result.stage2?.aggregate.map((a) => ({ ...a })) ?? [],
    synthesis: synthesis.status === 'available'
      ? {
          status: 'available',
          author_backend_id: synthesis.result.author_backend_id,
          tier: synthesis.result.tier,
          text: synthesis.result.text,
        }
      : { status: synthesis.status, reason: synthesis.reason },
    judge: judge.status === 'available'
      ? { status: 'available', ...judge.verdict }
      : { status: judge.status, reason: judge.reason },
    final: { ...result.final },
    total_cost_usd: result.cost.total_cost_usd,
    latency_ms: result.latency_ms,
  };
}

export interface QueryFailure {
  query_id: string;
  text: string;
  workspace: string;
  submitted_at: string;
  /** Null when the query was refused before classification. */
  intent: IntentDecision | null;
  total_cost_usd: number;
  latency_ms: number;
  error: { code: string; message: string };
}

export function recordFromFailure(failure: QueryFailure): QueryRecord {
  return {
    query_id: failure.query_id,
    text: failure.text,
    workspace: failure.workspace,
    submitted_at: failure.submitted_at,
    status: 'failed',
    intent: failure.intent ? intentRecord(failure.intent) : null,
    tools: [],
    stage1: [],
    rankings: [],
    aggregate: [],
    synthesis: { status: 'skipped', reason: 'Query failed' },
    judge: { status: 'skipped', reason: 'Query failed' },
    final: null,
    total_cost_usd: failure.total_cost_usd,
    latency_ms: failure.latency_ms,
    error: failure.error,
  };
}

export class QueryStore {
  private store: JsonStore<QueryRecord>;

  constructor(baseDir: string) {
    this.store = new JsonStore(baseDir, 'queries', (r) => r.query_id, (raw) => QueryRecordSchema.parse(raw));
  }

  save(record: QueryRecord): void {
    this.store.upsert(record);
  }

  get(queryId: string): QueryRecord | null {
    return this.store.get(queryId);
  }

  /** Newest first. */
  list(limit = 20, workspace?: string): QueryRecord[] {
    return this.store
      .list(workspace ? (r) => r.workspace === workspace : undefined)
      .sort((a, b) => b.submitted_at.localeCompare(a.submitted_at))
      .slice(0, limit);
  }
}
