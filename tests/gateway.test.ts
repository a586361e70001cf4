/**
 * Tests for the HTTP gateway and the Redis cache store, against in-process
 * stand-ins for fetch and the Redis client.
 */

import { afterEach, describe, expect, test, vi } from 'vitest';
import { HttpModelGateway } from '../src/routing/providers.js';
import { BackendRegistry } from '../src/routing/models.js';
import { RedisCacheStore, type RedisCacheClient } from '../src/governor/redis-cache.js';
import type { ChatMessage } from '../src/types/index.js';

const MESSAGES: ChatMessage[] = [
  { role: 'system', content: 'Be brief.' },
  { role: 'user', content: 'Capital of France?' },
];

function respond(status: number, body: unknown) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
    new Response(typeof body === 'string' ? body : JSON.stringify(body), { status }));
}

function sentBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : null;
}

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('HttpModelGateway', () => {
  const registry = new BackendRegistry([{
    backend_id: 'direct/claude',
    provider: 'anthropic',
    api_model_id: 'claude-sonnet-4-5',
    display_name: 'Claude (direct)',
    cost_input_per_mtok: 3,
    cost_output_per_mtok: 15,
    general_purpose: false,
    low_cost: false,
  }]);

  test('calls OpenRouter with the chat completions shape', async () => {
    vi.stubEnv('OPENROUTER_API_KEY', 'test-secret');
    const fetchImpl = respond(200, { choices: [{ message: { content: 'Paris' } }], usage: { prompt_tokens: 12, completion_tokens: 3 } });
    const gateway = new HttpModelGateway(registry, fetchImpl);

    const result = await gateway.complete('anthropic/claude-sonnet-4.5', MESSAGES, { max_tokens: 50, temperature: 0 });

    expect(result).toMatchObject({ ok: true, text: 'Paris', prompt_tokens: 12, completion_tokens: 3 });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://openrouter.ai/api/v1/chat/completions');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(sentBody(init)).toEqual({ model: 'anthropic/claude-sonnet-4.5', messages: MESSAGES, max_tokens: 50, temperature: 0 });
  });

  test('bills the worst case when the provider reports no usage', async () => {
    vi.stubEnv('OPENROUTER_API_KEY', 'test-secret');
    const gateway = new HttpModelGateway(registry, respond(200, { choices: [{ message: { content: 'Paris' } }] }));

    const result = await gateway.complete('anthropic/claude-sonnet-4.5', MESSAGES, { max_tokens: 50 });

    // (9 + 4) + (18 + 4) + 3 prompt tokens; the whole completion allowance.
    expect(result).toMatchObject({ ok: true, text: 'Paris', prompt_tokens: 38, completion_tokens: 50 });
  });

  test('moves system messages out of the Anthropic message list', async () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');
    const fetchImpl = respond(200, { content: [{ type: 'text', text: 'Paris' }], usage: { input_tokens: 9, output_tokens: 2 } });
    const gateway = new HttpModelGateway(registry, fetchImpl);

    const result = await gateway.complete('direct/claude', MESSAGES, {});

    expect(result).toMatchObject({ ok: true, text: 'Paris', prompt_tokens: 9, completion_tokens: 2 });
    expect(sentBody(fetchImpl.mock.calls[0][1])).toEqual({
      model: 'claude-sonnet-4-5',
      max_tokens: 1024,
      temperature: 0.7,
      messages: [{ role: 'user', content: 'Capital of France?' }],
      system: 'Be brief.',
    });
  });

  test('reports a missing API key without calling out', async () => {
    vi.stubEnv('OPENROUTER_API_KEY', '');
    const fetchImpl = respond(200, {});
    const result = await new HttpModelGateway(registry, fetchImpl).complete('openai/gpt-5.1', MESSAGES, {});
    expect(result).toEqual({
      ok: false, kind: 'provider_error', message: 'No API key for openrouter. Set OPENROUTER_API_KEY.', latency_ms: 0,
    });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  test('reports an unknown backend', async () => {
    const result = await new HttpModelGateway(registry, respond(200, {})).complete('nobody/none', MESSAGES, {});
    expect(result).toMatchObject({ ok: false, kind: 'provider_error', message: 'Unknown backend nobody/none' });
  });

  test('maps error statuses, bad bodies and network errors to failure kinds', async () => {
    vi.stubEnv('OPENROUTER_API_KEY', 'test-secret');

    const status = await new HttpModelGateway(registry, respond(503, 'overloaded')).complete('openai/gpt-5.1', MESSAGES, {});
    expect(status).toMatchObject({ ok: false, kind: 'provider_error', message: 'openrouter 503: overloaded' });

    const shape = await new HttpModelGateway(registry, respond(200, { choices: [] })).complete('openai/gpt-5.1', MESSAGES, {});
    expect(shape).toMatchObject({ ok: false, kind: 'invalid_response', message: 'Unexpected openrouter response shape' });

    const notJson = await new HttpModelGateway(registry, respond(200, '<html>')).complete('openai/gpt-5.1', MESSAGES, {});
    expect(notJson).toMatchObject({ ok: false, kind: 'invalid_response' });

    const offline = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    const network = await new HttpModelGateway(registry, offline).complete('openai/gpt-5.1', MESSAGES, {});
    expect(network).toMatchObject({ ok: false, kind: 'network', message: 'fetch failed' });
  });
});

// ---------------------------------------------------------------------------

class FakeRedis implements RedisCacheClient {
  readonly data = new Map<string, { value: string; ttl: number }>();

  async get(key: string): Promise<string | null> {
    return this.data.get(key)?.value ?? null;
  }

  async set(key: string, value: string, _token: 'EX', seconds: number): Promise<unknown> {
    this.data.set(key, { value, ttl: seconds });
    return 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    let removed = 0;
    for (const k of keys) if (this.data.delete(k)) removed++;
    return removed;
  }

  /** Two keys per page; the cursor is the last key returned, so deletes between pages are safe. */
  async scan(cursor: string, _m: 'MATCH', pattern: string, _c: 'COUNT', _count: number): Promise<[string, string[]]> {
    const prefix = pattern.replace(/\*$/, '');
    const keys = [...this.data.keys()].filter((k) => k.startsWith(prefix)).sort();
    const rest = cursor === '0' ? keys : keys.filter((k) => k > cursor);
    const page = rest.slice(0, 2);
    return [rest.length > 2 ? page[page.length - 1] : '0', page];
  }

  async quit(): Promise<unknown> {
    return 'OK';
  }
}

describe('RedisCacheStore', () => {
  const entry = { text: 'Paris', prompt_tokens: 10, completion_tokens: 2 };

  test('stores JSON under the prefix with an expiry', async () => {
    const redis = new FakeRedis();
    const store = new RedisCacheStore(redis, 'conclave:cache:');

    await store.set('abc', entry, 3600);

    expect(redis.data.get('conclave:cache:abc')).toEqual({ value: JSON.stringify(entry), ttl: 3600 });
    expect(await store.get('abc')).toEqual(entry);
    expect(await store.get('missing')).toBeNull();
  });

  test('drops malformed entries', async () => {
    const redis = new FakeRedis();
    const store = new RedisCacheStore(redis, 'p:');
    await redis.set('p:bad', '{"text":1}', 'EX', 60);
    await redis.set('p:worse', 'not json', 'EX', 60);

    expect(await store.get('bad')).toBeNull();
    expect(await store.get('worse')).toBeNull();
    expect(redis.data.size).toBe(0);
  });

  test('counts and clears only its own keys', async () => {
    const redis = new FakeRedis();
    const store = new RedisCacheStore(redis, 'p:');
    for (const k of ['a', 'b', 'c']) await store.set(k, entry, 60);
    await redis.set('other:key', 'x', 'EX', 60);

    expect(await store.size()).toBe(3);
    await store.clear();
    expect(await store.size()).toBe(0);
    expect([...redis.data.keys()]).toEqual(['other:key']);
  });
});
