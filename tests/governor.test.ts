/**
 * Tests for the Cost Governor: ledger entries, cache, single-flight,
 * admission and reservations.
 */

import { describe, expect, test } from 'vitest';
import { CircuitBreaker } from '../src/governor/breaker.js';
import { CostLedger, MemoryLedgerStore } from '../src/governor/ledger.js';
import type { CallContext } from '../src/governor/governor.js';
import type { ChatMessage, GatewayResult } from '../src/types/index.js';
import {
  NOW, ScriptedGateway, fail, flush, hang, harness, ledgerEntry, ok, testConfig,
} from './helpers/fakes.js';

const CLAUDE = 'anthropic/claude-sonnet-4.5';
const GPT = 'openai/gpt-5.1';
const QUESTION: ChatMessage[] = [{ role: 'user', content: 'Capital of France?' }];

function ctx(queryId: string): CallContext {
  return { query_id: queryId, workspace: 'General', stage: 'stage1' };
}

describe('CostGovernor.complete', () => {
  test('prices a call and appends one ledger entry', async () => {
    const gateway = new ScriptedGateway(() => ok('Paris'));
    const h = harness(gateway);

    const response = await h.governor.complete(ctx('q1'), CLAUDE, QUESTION);

    expect(response).toMatchObject({ backend_id: CLAUDE, text: 'Paris', success: true, cached: false, latency_ms: 10 });
    expect(response.cost_usd).toBeCloseTo(0.0105, 10);
    const [entry] = h.ledger.all();
    expect(entry).toMatchObject({
      query_id: 'q1', workspace: 'General', stage: 'stage1', backend_id: CLAUDE,
      prompt_tokens: 1000, completion_tokens: 500, success: true,
      day: '2026-03-10', timestamp: new Date(NOW).toISOString(),
    });
    expect(entry.budgets[0]).toMatchObject({ scope: 'query', key: 'q1', limit: 5 });
    expect(entry.budgets[0].amount).toBeCloseTo(0.0105, 10);
    expect(entry.budgets[1]).toMatchObject({ scope: 'day', key: '2026-03-10', limit: 100 });
  });

  test('passes the default completion allowance to the gateway', async () => {
    const gateway = new ScriptedGateway(() => ok('Paris'));
    const h = harness(gateway);
    await h.governor.complete(ctx('q1'), CLAUDE, QUESTION, { temperature: 0.2 });
    expect(gateway.calls[0].params).toMatchObject({ max_tokens: 1024, temperature: 0.2 });
  });

  test('serves a repeated call from the cache at zero cost', async () => {
    const gateway = new ScriptedGateway(() => ok('Paris'));
    const h = harness(gateway);

    await h.governor.complete(ctx('q1'), CLAUDE, QUESTION);
    const second = await h.governor.complete(ctx('q2'), CLAUDE, QUESTION);

    expect(second).toMatchObject({ text: 'Paris', success: true, cached: true, cost_usd: 0, latency_ms: 0 });
    expect(gateway.calls).toHaveLength(1);
    expect(h.ledger.all()).toHaveLength(1);
    expect(h.governor.costSummary('q2')).toMatchObject({ total_cost_usd: 0, calls: 0, cache_hits: 1 });
    expect(await h.governor.stats()).toMatchObject({
      cache_store: 'memory', cache_entries: 1, cache_hits: 1, cache_misses: 1, priced_calls: 1,
    });
  });

  test('does not share cache entries across backends', async () => {
    const gateway = new ScriptedGateway(() => ok('Paris'));
    const h = harness(gateway);
    await h.governor.complete(ctx('q1'), CLAUDE, QUESTION);
    const other = await h.governor.complete(ctx('q1'), GPT, QUESTION);
    expect(other.cached).toBe(false);
    expect(gateway.calls.map((c) => c.backend_id)).toEqual([CLAUDE, GPT]);
  });

  test('records failures at zero cost and never caches them', async () => {
    const gateway = new ScriptedGateway(() => fail());
    const h = harness(gateway);

    const first = await h.governor.complete(ctx('q1'), CLAUDE, QUESTION);
    await h.governor.complete(ctx('q1'), CLAUDE, QUESTION);

    expect(first).toMatchObject({ success: false, cost_usd: 0, latency_ms: 5, failure: { kind: 'provider_error', message: 'upstream 500' } });
    expect(gateway.calls).toHaveLength(2);
    expect(h.ledger.all().map((e) => [e.success, e.cost_usd, e.failure_kind])).toEqual([
      [false, 0, 'provider_error'],
      [false, 0, 'provider_error'],
    ]);
    expect(await h.governor.stats()).toMatchObject({ cache_entries: 0, failed_calls: 2 });
  });

  test('turns a thrown gateway error into a provider_error', async () => {
    const gateway = new ScriptedGateway(() => {
      throw new Error('socket hang up');
    });
    const h = harness(gateway);
    const response = await h.governor.complete(ctx('q1'), CLAUDE, QUESTION);
    expect(response.failure).toEqual({ kind: 'provider_error', message: 'socket hang up' });
  });

  test('times out a call that does not answer', async () => {
    const gateway = new ScriptedGateway((_b, _k, _m, params) => hang(params));
    const h = harness(gateway);

    const response = await h.governor.complete(ctx('q1'), CLAUDE, QUESTION, { timeout_ms: 20 });

    expect(response.failure).toEqual({ kind: 'timeout', message: 'No response within 20ms' });
    expect(h.ledger.all()[0]).toMatchObject({ success: false, failure_kind: 'timeout', cost_usd: 0 });
    expect(h.ledger.outstanding()).toBe(0);
  });

  test('joins an identical in-flight call', async () => {
    const gateway = new ScriptedGateway(async () => {
      await flush();
      return ok('Paris');
    });
    const h = harness(gateway);

    const [a, b] = await Promise.all([
      h.governor.complete(ctx('q1'), CLAUDE, QUESTION),
      h.governor.complete(ctx('q2'), CLAUDE, QUESTION),
    ]);

    expect(a.cached).toBe(false);
    expect(b).toMatchObject({ text: 'Paris', cached: true, cost_usd: 0 });
    expect(gateway.calls).toHaveLength(1);
    expect(h.ledger.all()).toHaveLength(1);
    expect(h.governor.costSummary('q2').cache_hits).toBe(1);
    expect((await h.governor.stats()).shared_calls).toBe(1);
  });

  test('a cancelled call does not cancel the caller sharing it', async () => {
    const gateway: ScriptedGateway = new ScriptedGateway((_b, _k, _m, params) => (gateway.calls.length === 1 ? hang(params) : ok('Paris')));
    const h = harness(gateway);
    const controller = new AbortController();

    const first = h.governor.complete(ctx('q1'), CLAUDE, QUESTION, { signal: controller.signal });
    const second = h.governor.complete(ctx('q2'), CLAUDE, QUESTION);
    await flush();
    controller.abort();

    expect((await first).failure).toEqual({ kind: 'aborted', message: 'Call aborted' });
    expect(await second).toMatchObject({ text: 'Paris', success: true, cached: false });
    expect(gateway.calls).toHaveLength(2);
    expect(h.ledger.all().map((e) => [e.query_id, e.success])).toEqual([['q1', false], ['q2', true]]);
  });

  test('a caller waiting on a shared call honours its own signal', async () => {
    const gateway = new ScriptedGateway((_b, _k, _m, params) => hang(params));
    const h = harness(gateway);
    const owner = new AbortController();
    const joiner = new AbortController();

    const first = h.governor.complete(ctx('q1'), CLAUDE, QUESTION, { signal: owner.signal });
    const second = h.governor.complete(ctx('q2'), CLAUDE, QUESTION, { signal: joiner.signal });
    await flush();
    joiner.abort();

    expect((await second).failure).toEqual({ kind: 'aborted', message: 'Call aborted' });
    expect(gateway.calls).toHaveLength(1);
    owner.abort();
    expect((await first).failure?.kind).toBe('aborted');
  });
});

describe('admission', () => {
  test('a denied call reaches no gateway and leaves the ledger unchanged', async () => {
    const gateway = new ScriptedGateway(() => ok('Paris'));
    const h = harness(gateway, testConfig({ budgets: { query_limit_usd: 0.001 } }));

    const response = await h.governor.complete(ctx('q1'), CLAUDE, QUESTION);

    expect(response.success).toBe(false);
    expect(response.failure?.kind).toBe('admission_denied');
    expect(gateway.calls).toHaveLength(0);
    expect(h.ledger.all()).toHaveLength(0);
    expect(h.governor.costSummary('q1')).toMatchObject({ calls: 0, denied_calls: 1, total_cost_usd: 0 });
    expect((await h.governor.stats()).denied_calls).toBe(1);
  });

  test('reported usage above the reservation is billed at the reservation', async () => {
    const gateway = new ScriptedGateway(() => ok('Paris', 2000, 500));
    const h = harness(gateway, testConfig({ budgets: { query_limit_usd: 0.012 } }));

    // Prompt bound: 18 bytes + 4 per message + 3 = 25 tokens.
    // Reservation: (25 × $3 + 500 × $15) / 1M = $0.007575; reported usage would cost $0.0135.
    const response = await h.governor.complete(ctx('q1'), CLAUDE, QUESTION, { max_tokens: 500 });

    expect(response.cost_usd).toBeCloseTo(0.007575, 10);
    expect(h.ledger.all()[0]).toMatchObject({ prompt_tokens: 2000, completion_tokens: 500 });
    expect(h.ledger.spentOnQuery('q1')).toBeCloseTo(0.007575, 10);

    const next = await h.governor.complete(ctx('q1'), CLAUDE, [{ role: 'user', content: 'Capital of Spain?' }], { max_tokens: 500 });
    expect(next.failure?.kind).toBe('admission_denied');
    expect(h.ledger.spentOnQuery('q1')).toBeLessThanOrEqual(0.012);
  });

  test('in-flight reservations count against the query budget', async () => {
    const pending: Array<(r: GatewayResult) => void> = [];
    const gateway = new ScriptedGateway(() => new Promise<GatewayResult>((resolve) => pending.push(resolve)));
    const h = harness(gateway, testConfig({ budgets: { query_limit_usd: 0.03 } }));
    const ask = (content: string) => h.governor.complete(ctx('q1'), CLAUDE, [{ role: 'user', content }], { max_tokens: 1000 });

    // Each estimate: ((bytes + 7) prompt tokens × $3 + 1000 completion tokens × $15) / 1M ≈ $0.01506
    const first = ask('first question');
    await flush();
    expect(h.ledger.outstanding()).toBe(1);

    const second = await ask('second question');
    expect(second.failure?.kind).toBe('admission_denied');

    pending[0](ok('done'));
    await first;
    expect(h.ledger.outstanding()).toBe(0);

    const third = ask('third question');
    await flush();
    expect(gateway.calls).toHaveLength(2);
    pending[1](ok('done again'));
    expect((await third).success).toBe(true);
  });
});

describe('CircuitBreaker', () => {
  const budgets = { daily_limit_usd: 100, query_limit_usd: 5, reset_hour_utc: 0 };

  test('denies a call that would cross the daily limit', () => {
    const ledger = new CostLedger(new MemoryLedgerStore([ledgerEntry({ cost_usd: 99.99 })]));
    const breaker = new CircuitBreaker(ledger, budgets, () => NOW);

    const denied = breaker.admit('q1', 0.02);
    expect(denied.admitted).toBe(false);
    if (!denied.admitted) {
      expect(denied.scope).toBe('day');
      expect(denied.snapshot.amount).toBeCloseTo(99.99, 10);
    }

    const admitted = breaker.admit('q1', 0.005);
    expect(admitted.admitted).toBe(true);
    expect(ledger.reservedOnDay('2026-03-10')).toBeCloseTo(0.005, 10);
  });

  test('denies a call that would cross the per-query limit', () => {
    const ledger = new CostLedger(new MemoryLedgerStore([ledgerEntry({ query_id: 'q1', cost_usd: 4.5 })]));
    const breaker = new CircuitBreaker(ledger, budgets, () => NOW);

    const denied = breaker.admit('q1', 0.6);
    expect(denied.admitted).toBe(false);
    if (!denied.admitted) expect(denied.scope).toBe('query');
    expect(breaker.admit('q2', 0.6).admitted).toBe(true);
  });

  test('refuses new queries once the day is spent', () => {
    const spent = new CircuitBreaker(new CostLedger(new MemoryLedgerStore([ledgerEntry({ cost_usd: 100 })])), budgets, () => NOW);
    expect(spent.admitQuery().admitted).toBe(false);

    const yesterday = new CircuitBreaker(
      new CostLedger(new MemoryLedgerStore([ledgerEntry({ cost_usd: 100, day: '2026-03-09' })])), budgets, () => NOW,
    );
    expect(yesterday.admitQuery().admitted).toBe(true);
  });

  test('starts the budget day at the reset hour', () => {
    const breaker = new CircuitBreaker(new CostLedger(new MemoryLedgerStore()), { ...budgets, reset_hour_utc: 6 }, () => NOW);
    expect(breaker.dayKey()).toBe('2026-03-10');
    expect(breaker.dayKey(Date.UTC(2026, 2, 10, 5, 59))).toBe('2026-03-09');
  });
});

describe('costReport', () => {
  test('breaks spend down by day, backend and stage', async () => {
    const gateway = new ScriptedGateway(() => ok('Paris'));
    const h = harness(gateway);
    await h.governor.complete(ctx('q1'), CLAUDE, QUESTION);
    await h.governor.complete({ ...ctx('q1'), stage: 'stage2' }, GPT, QUESTION);

    const report = h.governor.costReport(3);

    expect(report.days.map((d) => d.day)).toEqual(['2026-03-10', '2026-03-09', '2026-03-08']);
    expect(report.days[0].calls).toBe(2);
    expect(report.days[0].total_cost_usd).toBeCloseTo(0.018, 10);
    expect(report.days[0].by_backend[CLAUDE].calls).toBe(1);
    expect(report.days[0].by_stage.stage2).toBeCloseTo(0.0075, 10);
    expect(report.days[1].calls).toBe(0);
    expect(report.budgets.amount).toBeCloseTo(0.018, 10);
  });
});
