/**
 * Tool Coordinator — runs requested tools concurrently and merges their
 * output into one augmentation block.
 *
 * Each tool gets its own timeout inside an overall coordinator deadline.
 * A failed, unknown or timed-out tool yields a typed failure for that tool
 * only. The block is rendered in catalog-priority order, never in
 * completion order.
 */

import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { boundedSignal, untilAborted, type BoundedSignal } from '../util/abort.js';
import type { CostGovernor } from '../governor/governor.js';
import type { GovernedCompletion, ToolCatalog, ToolCollaborator } from './catalog.js';
import type { ToolBatch, ToolInvocation, ToolRequest, ToolResult } from '../types/index.js';

export interface ToolRunContext {
  query_id: string;
  workspace: string;
  signal?: AbortSignal;
  /** Passed to parameter builders, e.g. `code` for code_execution. */
  extra?: Record<string, unknown>;
}

export interface ToolCoordinatorOptions {
  catalog: ToolCatalog;
  collaborators: Record<string, ToolCollaborator>;
  /** Needed only when a priced (model-backed) tool is registered. */
  governor?: CostGovernor;
  timeouts: { tool_ms: number; tools_total_ms: number };
  rag: { top_k: number; min_score: number };
  now?: () => number;
}

export class ToolCoordinator {
  private readonly collaborators: Map<string, ToolCollaborator>;
  private readonly now: () => number;

  constructor(private readonly options: ToolCoordinatorOptions) {
    this.collaborators = new Map(Object.entries(options.collaborators));
    this.now = options.now ?? Date.now;
  }

  has(toolId: string): boolean {
    return this.collaborators.has(toolId);
  }

  /** Build each tool's parameters from the query via its catalog entry. */
  prepare(toolIds: string[], query: string, ctx: Pick<ToolRunContext, 'workspace' | 'extra'>): ToolRequest[] {
    return [...new Set(toolIds)].map((toolId) => ({
      tool_id: toolId,
      params: this.options.catalog.entry(toolId).buildParams({
        query,
        workspace: ctx.workspace,
        rag: this.options.rag,
        extra: ctx.extra ?? {},
      }),
    }));
  }

  /** Run every request concurrently. Never rejects; result order is catalog priority. */
  async execute(requests: ToolRequest[], ctx: ToolRunContext): Promise<ToolInvocation[]> {
    const unique = requests.filter((r, i) => requests.findIndex((o) => o.tool_id === r.tool_id) === i);
    const overall = boundedSignal(this.options.timeouts.tools_total_ms, ctx.signal);
    try {
      const invocations = await Promise.all(unique.map((r) => this.invokeOne(r, overall, ctx)));
      const order = (id: string): number => this.options.catalog.entry(id).priority;
      return invocations
        .map((inv, index) => ({ inv, index }))
        .sort((a, b) => order(a.inv.tool_id) - order(b.inv.tool_id) || a.index - b.index)
        .map(({ inv }) => inv);
    } finally {
      overall.dispose();
    }
  }

  /**
   * Merge invocation results into the Stage1 prompt. With no successful
   * tool the query goes to Stage1 unchanged.
   */
  augment(queryText: string, invocations: ToolInvocation[]): ToolBatch {
    const succeeded = invocations.filter((i) => i.result.ok);
    if (succeeded.length === 0) return { invocations, context: '', augmented_query: queryText };

    const lines: string[] = ['Additional Context from Tools:', ''];
    for (const inv of succeeded) {
      if (!inv.result.ok) continue;
      const entry = this.options.catalog.entry(inv.tool_id);
      let body = entry.format(inv.result.data).join('\n');
      if (body.length > entry.max_chars) body = `${body.slice(0, entry.max_chars)}\n[truncated]`;
      lines.push(`--- ${inv.tool_id.toUpperCase()} ---`, body, '');
    }

    const failures = invocations.filter((i) => !i.result.ok);
    if (failures.length > 0) {
      lines.push('Note: Some tools failed:');
      for (const inv of failures) {
        if (inv.result.ok) continue;
        lines.push(`- ${inv.tool_id}: ${inv.result.message}`);
      }
    }

    const context = lines.join('\n').trimEnd();
    return { invocations, context, augmented_query: `User Question: ${queryText}\n\n${context}` };
  }

  async run(toolIds: string[], queryText: string, ctx: ToolRunContext): Promise<ToolBatch> {
    const requests = this.prepare(toolIds, queryText, ctx);
    const invocations = await this.execute(requests, ctx);
    const ok = invocations.filter((i) => i.result.ok).length;
    logger.debug('Tools: batch complete', { query_id: ctx.query_id, requested: requests.length, succeeded: ok });
    return this.augment(queryText, invocations);
  }

  // -------------------------------------------------------------------------

  private async invokeOne(request: ToolRequest, overall: BoundedSignal, ctx: ToolRunContext): Promise<ToolInvocation> {
    const started = this.now();
    const collaborator = this.collaborators.get(request.tool_id);
    if (!collaborator) {
      return {
        tool_id: request.tool_id,
        params: request.params,
        result: { ok: false, kind: 'unknown_tool', message: `No tool registered as ${request.tool_id}` },
        latency_ms: 0,
        cost_usd: 0,
      };
    }

    const entry = this.options.catalog.entry(request.tool_id);
    const timeoutMs = this.options.timeouts.tool_ms;
    const local = boundedSignal(timeoutMs, overall.signal);
    let cost = 0;

    const governor = this.options.governor;
    const complete: GovernedCompletion | undefined = entry.priced && governor
      ? async (backendId, messages, params = {}) => {
          const response = await governor.complete(
            { query_id: ctx.query_id, workspace: ctx.workspace, stage: 'tool' },
            backendId, messages, { ...params, signal: params.signal ?? local.signal },
          );
          cost += response.cost_usd;
          return response;
        }
      : undefined;

    let result: ToolResult;
    try {
      const raced = await untilAborted(
        collaborator.invoke(request.params, { timeout_ms: timeoutMs, signal: local.signal, complete }),
        local.signal,
      );
      if (!raced.aborted) result = raced.value;
      else if (local.timedOut) result = { ok: false, kind: 'timeout', message: `Timed out after ${timeoutMs}ms` };
      else if (overall.timedOut) result = { ok: false, kind: 'timeout', message: `Tool deadline of ${this.options.timeouts.tools_total_ms}ms reached` };
      else result = { ok: false, kind: 'aborted', message: 'Aborted by caller' };
    } catch (err) {
      result = { ok: false, kind: 'error', message: errorMessage(err) };
    } finally {
      local.dispose();
    }

    if (!result.ok) {
      logger.warn('Tools: tool failed', { query_id: ctx.query_id, tool: request.tool_id, kind: result.kind, message: result.message });
    }

    return { tool_id: request.tool_id, params: request.params, result, latency_ms: this.now() - started, cost_usd: cost };
  }
}
