/**
 * MCP Tool registrations.
 *
 *   ask          — full deliberation for one question
 *   classify     — intent decision only, no pipeline
 *   cost_summary — spend per day, backend and stage against the budgets
 *   cache_stats  — governor counters and cache size
 *   get_query    — a stored query record, or the most recent ones
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Conclave } from '../orchestrator.js';
import { errorMessage, isConclaveError } from '../errors.js';
import type { PipelineResult, ToolOutput } from '../types/index.js';

function output(o: ToolOutput) {
  const data: Record<string, unknown> = { ...o.data };
  if (o.next) data.next_action = { control: o.next.control, description: o.next.description };

  const parts: string[] = [];
  parts.push(JSON.stringify(data, null, 2));
  parts.push('');
  parts.push(`**Status**: ${o.status} — ${o.message}`);
  if (o.next) parts.push(`**Next step**: ${o.next.description}`);
  return { content: [{ type: 'text' as const, text: parts.join('\n') }] };
}

const HistorySchema = z.array(z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
})).optional().describe('Earlier turns of the conversation, oldest first; the classifier reads the last few');

function failure(err: unknown, what: string) {
  if (isConclaveError(err) && err.code === 'ADMISSION_DENIED') {
    return output({
      status: 'denied',
      data: { code: err.code, ...err.details },
      message: err.message,
      next: { control: 'user', description: 'The budget is exhausted. Wait for the daily reset or raise the limit.' },
    });
  }
  return output({
    status: 'error',
    data: isConclaveError(err) ? { code: err.code, ...err.details } : { error: errorMessage(err) },
    message: `${what} failed: ${errorMessage(err)}`,
    next: { control: 'user', description: 'Review the error and retry.' },
  });
}

/** Compact view of a run; full texts only for the final answer. */
export function describeResult(result: PipelineResult): Record<string, unknown> {
  return {
    query_id: result.query.query_id,
    workspace: result.query.workspace,
    answer: result.final.text,
    answer_source: result.final.source,
    intent: {
      complexity: result.intent.complexity,
      workflow: result.intent.workflow,
      backends: result.intent.backends,
      tools: result.intent.tools,
      source: result.intent.source,
    },
    tools: result.tools?.invocations.map((i) => ({ tool_id: i.tool_id, ok: i.result.ok })) ?? [],
    stage1: result.stage1.map((r) => ({
      backend_id: r.backend_id,
      success: r.success,
      cached: r.cached,
      latency_ms: r.latency_ms,
      ...(r.failure ? { failure: r.failure.kind } : {}),
    })),
    ranking: result.stage2
      ? { parsed: result.stage2.rankings.length, discarded: result.stage2.discarded, aggregate: result.stage2.aggregate }
      : null,
    synthesis: result.synthesis.status === 'available'
      ? { status: 'available', tier: result.synthesis.result.tier, candidates: result.synthesis.result.candidate_labels }
      : result.synthesis,
    judge: result.judge.status === 'available'
      ? { status: 'available', ...result.judge.verdict }
      : result.judge,
    cost: result.cost,
    latency_ms: result.latency_ms,
    events: result.events.map((e) => e.type),
  };
}

export function registerTools(server: McpServer, conclave: Conclave): void {

  server.tool(
    'ask',
    'Ask the model council a question. The question is classified, optionally augmented with tool results, answered by one or more backends, peer-ranked and synthesized according to its complexity. Returns the final answer with a summary of every stage and its cost.',
    {
      question: z.string().min(1).describe('The question to answer'),
      workspace: z.string().optional().describe('Workspace profile (backends, tools, style). Defaults to "General".'),
      tier: z.enum(['minimal', 'standard', 'comprehensive']).optional().describe('Synthesis input tier; overrides the workspace default'),
      high_stakes: z.boolean().optional().describe('Request a judge review regardless of complexity (needs the judge feature)'),
      code: z.string().optional().describe('Code for the code_execution tool, when the question concerns a snippet'),
      history: HistorySchema,
    },
    async (args) => {
      try {
        const result = await conclave.ask({
          text: args.question,
          workspace: args.workspace,
          tier: args.tier,
          high_stakes: args.high_stakes,
          extra: args.code ? { code: args.code } : undefined,
          history: args.history,
        });
        return output({
          status: 'success',
          data: describeResult(result),
          message: `Answered via ${result.intent.workflow} (${result.stage1.filter((r) => r.success).length}/${result.stage1.length} backends) for $${result.cost.total_cost_usd.toFixed(4)}`,
          next: null,
        });
      } catch (err) {
        return failure(err, 'Query');
      }
    },
  );

  server.tool(
    'classify',
    'Classify a question without answering it: complexity, workflow, selected backends and tools. Pattern rules are free; a low-cost model is consulted only when no rule matches.',
    {
      question: z.string().min(1).describe('The question to classify'),
      workspace: z.string().optional().describe('Workspace profile. Defaults to "General".'),
      history: HistorySchema,
    },
    async (args) => {
      try {
        const decision = await conclave.classify(args.question, args.workspace, args.history);
        return output({
          status: 'success',
          data: { ...decision },
          message: `${decision.complexity} → ${decision.workflow} with ${decision.backends.length} backend(s) (${decision.source})`,
          next: null,
        });
      } catch (err) {
        return failure(err, 'Classification');
      }
    },
  );

  server.tool(
    'cost_summary',
    'Spend per day for the last N days, broken down by backend and stage, with the remaining daily budget.',
    {
      days: z.number().int().min(1).max(90).optional().describe('Days to include, newest first (default 7)'),
    },
    async (args) => {
      const report = conclave.costReport(args.days ?? 7);
      return output({
        status: 'success',
        data: { ...report },
        message: `$${report.budgets.amount.toFixed(4)} spent today of $${report.budgets.limit.toFixed(2)}`,
        next: null,
      });
    },
  );

  server.tool(
    'cache_stats',
    'Response cache and governor counters: cache size, hits, misses, shared in-flight calls, priced, failed and denied calls.',
    {
      clear: z.boolean().optional().describe('Empty the response cache after reading the counters'),
    },
    async (args) => {
      try {
        const stats = await conclave.stats();
        if (args.clear) await conclave.governor.clearCache();
        return output({
          status: 'success',
          data: { ...stats, cleared: args.clear ?? false },
          message: `${stats.cache_entries} cached response(s), ${stats.cache_hits} hit(s), ${stats.cache_misses} miss(es)`,
          next: null,
        });
      } catch (err) {
        return failure(err, 'Cache statistics');
      }
    },
  );

  server.tool(
    'get_query',
    'Fetch a stored query record by id, or list the most recent queries when no id is given.',
    {
      query_id: z.string().optional().describe('Query id returned by ask'),
      workspace: z.string().optional().describe('Only list queries from this workspace'),
      limit: z.number().int().min(1).max(100).optional().describe('How many recent queries to list (default 20)'),
    },
    async (args) => {
      if (args.query_id) {
        const record = conclave.getQuery(args.query_id);
        if (!record) {
          return output({
            status: 'error',
            data: {},
            message: `Query "${args.query_id}" not found.`,
            next: { control: 'user', description: 'Check the id, or call get_query without one to list recent queries.' },
          });
        }
        return output({ status: 'success', data: { ...record }, message: `Query ${record.query_id} (${record.status})`, next: null });
      }
      const records = conclave.listQueries(args.limit ?? 20, args.workspace);
      return output({
        status: 'success',
        data: {
          queries: records.map((r) => ({
            query_id: r.query_id,
            workspace: r.workspace,
            submitted_at: r.submitted_at,
            status: r.status,
            text: r.text.slice(0, 120),
            total_cost_usd: r.total_cost_usd,
          })),
        },
        message: `${records.length} recent quer${records.length === 1 ? 'y' : 'ies'}`,
        next: null,
      });
    },
  );
}
