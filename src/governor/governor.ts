/**
 * Cost Governor: the only path from the engine to the Model Gateway.
 *
 * Every priced call goes: cache lookup → single-flight join → pre-flight
 * admission (reserving the worst-case estimate) → gateway call under a
 * timeout → release + ledger append → cache fill. A call is billed at most
 * its reservation, so recorded spend stays within both budgets.
 *
 * Admission denials return a failed ModelResponse of kind
 * `admission_denied`; they cost nothing and leave the ledger unchanged,
 * so they are counted here instead.
 */

import { randomUUID } from 'node:crypto';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { promptTokenBound, type BackendRegistry } from '../routing/models.js';
import { boundedSignal, untilAborted } from '../util/abort.js';
import { cacheKey, type CacheStore, type CachedCompletion } from './cache.js';
import type { CircuitBreaker, QueryAdmission } from './breaker.js';
import type { CostLedger } from './ledger.js';
import type {
  BudgetSnapshot, CallStage, ChatMessage, CompletionParams, CostSummary,
  FailureKind, GatewayResult, LedgerEntry, ModelGateway, ModelResponse,
} from '../types/index.js';

export interface CallContext {
  query_id: string;
  workspace: string;
  stage: CallStage;
}

export interface GovernorStats {
  cache_store: 'memory' | 'redis';
  cache_entries: number;
  cache_hits: number;
  cache_misses: number;
  shared_calls: number;
  priced_calls: number;
  failed_calls: number;
  denied_calls: number;
  outstanding_reservations: number;
}

export interface DailyCost {
  day: string;
  total_cost_usd: number;
  calls: number;
  failed_calls: number;
  by_backend: Record<string, { calls: number; cost_usd: number }>;
  by_stage: Record<string, number>;
}

export interface CostReport {
  budgets: BudgetSnapshot;
  days: DailyCost[];
}

export interface CostGovernorOptions {
  gateway: ModelGateway;
  registry: BackendRegistry;
  ledger: CostLedger;
  breaker: CircuitBreaker;
  cache: CacheStore;
  cacheTtlSeconds: number;
  /** Completion allowance assumed when a call sets no max_tokens. */
  defaultMaxTokens?: number;
  now?: () => number;
}

interface QueryCounters {
  cache_hits: number;
  denied_calls: number;
}

const DAY_MS = 86_400_000;

/** Failures that depend on the caller's own signal, timeout or budget. */
const CALLER_SCOPED: ReadonlySet<FailureKind> = new Set<FailureKind>(['admission_denied', 'aborted', 'timeout', 'deadline']);

type Joined = { aborted: false; value: ModelResponse } | { aborted: true; timedOut: boolean };

export class CostGovernor {
  private readonly gateway: ModelGateway;
  private readonly registry: BackendRegistry;
  private readonly ledger: CostLedger;
  private readonly breaker: CircuitBreaker;
  private readonly cache: CacheStore;
  private readonly ttl: number;
  private readonly defaultMaxTokens: number;
  private readonly now: () => number;

  private inflight = new Map<string, Promise<ModelResponse>>();
  private perQuery = new Map<string, QueryCounters>();
  private counters = {
    cache_hits: 0, cache_misses: 0, shared_calls: 0,
    priced_calls: 0, failed_calls: 0, denied_calls: 0,
  };

  constructor(options: CostGovernorOptions) {
    this.gateway = options.gateway;
    this.registry = options.registry;
    this.ledger = options.ledger;
    this.breaker = options.breaker;
    this.cache = options.cache;
    this.ttl = options.cacheTtlSeconds;
    this.defaultMaxTokens = options.defaultMaxTokens ?? 1024;
    this.now = options.now ?? Date.now;
  }

  /**
   * Governed completion. Never throws for call-level problems: timeouts,
   * provider errors and denials come back as `success: false`.
   */
  async complete(
    ctx: CallContext,
    backendId: string,
    messages: ChatMessage[],
    params: CompletionParams = {},
  ): Promise<ModelResponse> {
    const key = cacheKey(backendId, messages);

    const pending = this.inflight.get(key);
    if (pending) {
      const joined = await this.join(pending, params);
      if (joined.aborted) {
        return joined.timedOut
          ? failed(backendId, 'timeout', `No response within ${params.timeout_ms}ms`, 0)
          : failed(backendId, 'aborted', 'Call aborted', 0);
      }
      const shared = joined.value;
      if (shared.success) {
        this.counters.shared_calls++;
        this.countersFor(ctx.query_id).cache_hits++;
        logger.debug('Governor: joined in-flight call', { backend: backendId, stage: ctx.stage });
        return { ...shared, cached: true, cost_usd: 0, latency_ms: 0 };
      }
      // Denials, timeouts and cancellations belong to the other caller; this caller dispatches its own call.
      if (!shared.failure || !CALLER_SCOPED.has(shared.failure.kind)) return { ...shared };
    }

    const call = this.dispatch(ctx, key, backendId, messages, params);
    this.inflight.set(key, call);
    try {
      return await call;
    } finally {
      if (this.inflight.get(key) === call) this.inflight.delete(key);
    }
  }

  admitQuery(): QueryAdmission {
    return this.breaker.admitQuery();
  }

  costSummary(queryId: string): CostSummary {
    const entries = this.ledger.forQuery(queryId);
    const counters = this.perQuery.get(queryId);
    return {
      query_id: queryId,
      total_cost_usd: entries.reduce((s, e) => s + e.cost_usd, 0),
      calls: entries.length,
      failed_calls: entries.filter((e) => !e.success).length,
      cache_hits: counters?.cache_hits ?? 0,
      denied_calls: counters?.denied_calls ?? 0,
      budgets: this.breaker.snapshot(queryId),
    };
  }

  /** Drop per-query counters once a query's summary has been taken. */
  endQuery(queryId: string): void {
    this.perQuery.delete(queryId);
  }

  costReport(days = 7): CostReport {
    const daily: DailyCost[] = [];
    for (let i = 0; i < days; i++) {
      const day = this.breaker.dayKey(this.now() - i * DAY_MS);
      const entries = this.ledger.forDay(day);
      const byBackend: DailyCost['by_backend'] = {};
      const byStage: DailyCost['by_stage'] = {};
      for (const e of entries) {
        const b = byBackend[e.backend_id] ?? { calls: 0, cost_usd: 0 };
        b.calls++;
        b.cost_usd += e.cost_usd;
        byBackend[e.backend_id] = b;
        byStage[e.stage] = (byStage[e.stage] ?? 0) + e.cost_usd;
      }
      daily.push({
        day,
        total_cost_usd: entries.reduce((s, e) => s + e.cost_usd, 0),
        calls: entries.length,
        failed_calls: entries.filter((e) => !e.success).length,
        by_backend: byBackend,
        by_stage: byStage,
      });
    }
    return { budgets: this.breaker.daySnapshot(), days: daily };
  }

  async stats(): Promise<GovernorStats> {
    return {
      cache_store: this.cache.kind,
      cache_entries: await this.cache.size(),
      ...this.counters,
      outstanding_reservations: this.ledger.outstanding(),
    };
  }

  async clearCache(): Promise<void> {
    await this.cache.clear();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async dispatch(
    ctx: CallContext,
    key: string,
    backendId: string,
    messages: ChatMessage[],
    params: CompletionParams,
  ): Promise<ModelResponse> {
    const hit = await this.lookup(key);
    if (hit) {
      this.counters.cache_hits++;
      this.countersFor(ctx.query_id).cache_hits++;
      logger.debug('Governor: cache hit', { backend: backendId, stage: ctx.stage });
      return {
        backend_id: backendId,
        text: hit.text,
        prompt_tokens: hit.prompt_tokens,
        completion_tokens: hit.completion_tokens,
        latency_ms: 0,
        cost_usd: 0,
        success: true,
        cached: true,
      };
    }
    this.counters.cache_misses++;

    const maxTokens = params.max_tokens ?? this.defaultMaxTokens;
    const estimate = this.registry.estimate(backendId, promptTokenBound(messages), maxTokens);

    const admission = this.breaker.admit(ctx.query_id, estimate);
    if (!admission.admitted) {
      this.counters.denied_calls++;
      this.countersFor(ctx.query_id).denied_calls++;
      logger.warn('Governor: admission denied', {
        backend: backendId, stage: ctx.stage, scope: admission.scope,
        estimate, spent: admission.snapshot.amount, limit: admission.snapshot.limit,
      });
      return failed(backendId, 'admission_denied',
        `${admission.scope} budget would be exceeded ($${admission.snapshot.amount.toFixed(4)} + $${estimate.toFixed(4)} > $${admission.snapshot.limit.toFixed(2)})`, 0);
    }

    const started = this.now();
    const bounded = boundedSignal(params.timeout_ms, params.signal);
    let result: GatewayResult;
    try {
      const raced = await untilAborted(
        this.gateway.complete(backendId, messages, { ...params, max_tokens: maxTokens, signal: bounded.signal }),
        bounded.signal,
      );
      result = raced.aborted
        ? { ok: false, kind: bounded.timedOut ? 'timeout' : 'aborted', message: bounded.timedOut ? `No response within ${params.timeout_ms}ms` : 'Call aborted' }
        : raced.value;
    } catch (err) {
      result = { ok: false, kind: 'provider_error', message: errorMessage(err) };
    } finally {
      bounded.dispose();
    }

    const latency = result.ok ? result.latency_ms : (result.latency_ms ?? this.now() - started);
    const usageCost = result.ok ? this.registry.cost(backendId, result.prompt_tokens, result.completion_tokens) : 0;
    // Spend never passes what admission reserved.
    const cost = Math.min(usageCost, estimate);
    if (usageCost > estimate) {
      logger.warn('Governor: reported usage above the reservation, billed at the reservation', {
        backend: backendId, stage: ctx.stage, reported: usageCost, reserved: estimate,
      });
    }

    // Release and append together: no await between them.
    this.breaker.release(admission.reservation_id);
    const entry: LedgerEntry = {
      entry_id: randomUUID(),
      query_id: ctx.query_id,
      workspace: ctx.workspace,
      stage: ctx.stage,
      backend_id: backendId,
      prompt_tokens: result.ok ? result.prompt_tokens : 0,
      completion_tokens: result.ok ? result.completion_tokens : 0,
      latency_ms: latency,
      cost_usd: cost,
      success: result.ok,
      ...(result.ok ? {} : { failure_kind: result.kind, error_message: result.message }),
      day: admission.day,
      timestamp: new Date(this.now()).toISOString(),
      budgets: this.breaker.snapshot(ctx.query_id, cost),
    };
    this.ledger.record(entry);
    this.counters.priced_calls++;

    if (!result.ok) {
      this.counters.failed_calls++;
      logger.warn('Governor: backend call failed', {
        backend: backendId, stage: ctx.stage, kind: result.kind, message: result.message,
      });
      return failed(backendId, result.kind, result.message, latency);
    }

    await this.fill(key, { text: result.text, prompt_tokens: result.prompt_tokens, completion_tokens: result.completion_tokens });
    logger.debug('Governor: call recorded', { backend: backendId, stage: ctx.stage, cost, latency });

    return {
      backend_id: backendId,
      text: result.text,
      prompt_tokens: result.prompt_tokens,
      completion_tokens: result.completion_tokens,
      latency_ms: latency,
      cost_usd: cost,
      success: true,
      cached: false,
    };
  }

  /** Wait for another caller's call under this caller's own timeout and signal. */
  private async join(pending: Promise<ModelResponse>, params: CompletionParams): Promise<Joined> {
    const bounded = boundedSignal(params.timeout_ms, params.signal);
    try {
      const raced = await untilAborted(pending, bounded.signal);
      return raced.aborted ? { aborted: true, timedOut: bounded.timedOut } : raced;
    } finally {
      bounded.dispose();
    }
  }

  private async lookup(key: string): Promise<CachedCompletion | null> {
    try {
      return await this.cache.get(key);
    } catch (err) {
      logger.warn('Governor: cache read failed, treating as miss', { error: errorMessage(err) });
      return null;
    }
  }

  private async fill(key: string, value: CachedCompletion): Promise<void> {
    try {
      await this.cache.set(key, value, this.ttl);
    } catch (err) {
      logger.warn('Governor: cache write failed', { error: errorMessage(err) });
    }
  }

  private countersFor(queryId: string): QueryCounters {
    let c = this.perQuery.get(queryId);
    if (!c) {
      c = { cache_hits: 0, denied_calls: 0 };
      this.perQuery.set(queryId, c);
    }
    return c;
  }
}

function failed(backendId: string, kind: FailureKind, message: string, latency: number): ModelResponse {
  return {
    backend_id: backendId,
    text: '',
    prompt_tokens: 0,
    completion_tokens: 0,
    latency_ms: latency,
    cost_usd: 0,
    success: false,
    cached: false,
    failure: { kind, message },
  };
}
