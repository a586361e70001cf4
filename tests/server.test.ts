/**
 * Tests for the MCP surface: tool and resource registrations, driven
 * through an in-memory client.
 */

import { afterEach, describe, expect, test } from 'vitest';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { createServer } from '../src/server.js';
import { createConclave } from '../src/orchestrator.js';
import { MemoryLedgerStore } from '../src/governor/ledger.js';
import { NOW, ScriptedGateway, ledgerEntry, ok, testConfig } from './helpers/fakes.js';

const TextResult = z.object({ content: z.array(z.object({ type: z.literal('text'), text: z.string() })).min(1) });
const ResourceResult = z.object({ contents: z.array(z.object({ uri: z.string(), text: z.string() })).min(1) });

interface Parsed {
  data: Record<string, unknown>;
  status: string;
}

function parseOutput(result: unknown): Parsed {
  const [first] = TextResult.parse(result).content;
  const [json, ...rest] = first.text.split('\n\n');
  return { data: z.record(z.unknown()).parse(JSON.parse(json)), status: rest.join('\n\n').split('\n')[0] };
}

const closers: Array<() => Promise<void>> = [];

afterEach(async () => {
  for (const close of closers.splice(0)) await close();
});

async function connect(ledgerStore = new MemoryLedgerStore(), gateway = new ScriptedGateway(() => ok('4'))) {
  const conclave = createConclave({
    config: testConfig(),
    gateway,
    ledgerStore,
    rag: { semanticSearch: async () => [] },
    now: () => NOW,
  });
  const server = createServer(conclave);
  const client = new Client({ name: 'test-client', version: '1.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  closers.push(async () => {
    await client.close();
    await server.close();
  });
  return client;
}

describe('tools', () => {
  test('registers the engine operations', async () => {
    const client = await connect();
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual(['ask', 'cache_stats', 'classify', 'cost_summary', 'get_query']);
  });

  test('ask returns the answer and a stage summary', async () => {
    const client = await connect();
    const out = parseOutput(await client.callTool({ name: 'ask', arguments: { question: '2+2?' } }));

    expect(out.status.startsWith('**Status**: success — Answered via quick (1/1 backends)')).toBe(true);
    expect(out.data).toMatchObject({ answer: '4', answer_source: 'stage1', workspace: 'General' });
  });

  test('ask passes earlier turns to the classifier for a follow-up', async () => {
    const gateway = new ScriptedGateway((_backend, kind) =>
      kind === 'classifier' ? ok('{"complexity":"simple"}', 100, 20) : ok('The bar-tailed godwit.'));
    const client = await connect(new MemoryLedgerStore(), gateway);

    const out = parseOutput(await client.callTool({
      name: 'ask',
      arguments: {
        question: 'And the one after that?',
        history: [
          { role: 'user', content: 'Which tern migrates furthest?' },
          { role: 'assistant', content: 'The arctic tern.' },
        ],
      },
    }));

    expect(out.data).toMatchObject({ answer: 'The bar-tailed godwit.', intent: { complexity: 'simple', source: 'model' } });
    expect(gateway.callsOf('classifier')[0].messages[1].content).toBe(
      'Conversation so far:\nuser: Which tern migrates furthest?\nassistant: The arctic tern.\n\nClassify this query:\n\nAnd the one after that?',
    );
    expect(gateway.callsOf('stage1').map((c) => c.messages[0].content)).toEqual(['And the one after that?']);
  });

  test('ask reports a spent budget as denied', async () => {
    const client = await connect(new MemoryLedgerStore([ledgerEntry({ cost_usd: 100 })]));
    const out = parseOutput(await client.callTool({ name: 'ask', arguments: { question: '2+2?' } }));

    expect(out.status).toBe('**Status**: denied — Daily budget exhausted: $100.0000 of $100.00 used');
    expect(out.data).toMatchObject({ code: 'ADMISSION_DENIED', scope: 'day' });
  });

  test('classify describes the routing decision', async () => {
    const client = await connect();
    const out = parseOutput(await client.callTool({ name: 'classify', arguments: { question: '2+2?' } }));
    expect(out.status).toBe('**Status**: success — simple → quick with 1 backend(s) (rules)');
    expect(out.data).toMatchObject({ workflow: 'quick', backends: ['google/gemini-3-pro-preview'] });
  });

  test('get_query lists recent queries and reports unknown ids', async () => {
    const client = await connect();
    const listed = parseOutput(await client.callTool({ name: 'get_query', arguments: {} }));
    expect(listed.status).toBe('**Status**: success — 0 recent queries');

    const missing = parseOutput(await client.callTool({ name: 'get_query', arguments: { query_id: 'nope' } }));
    expect(missing.status).toBe('**Status**: error — Query "nope" not found.');
  });

  test('cache_stats reads and clears the cache', async () => {
    const client = await connect();
    await client.callTool({ name: 'ask', arguments: { question: '2+2?' } });

    const before = parseOutput(await client.callTool({ name: 'cache_stats', arguments: { clear: true } }));
    expect(before.data).toMatchObject({ cache_entries: 1, cache_misses: 1, cleared: true });

    const after = parseOutput(await client.callTool({ name: 'cache_stats', arguments: {} }));
    expect(after.data).toMatchObject({ cache_entries: 0, cleared: false });
  });
});

describe('resources', () => {
  test('conclave://workspaces lists the profiles', async () => {
    const client = await connect();
    const { contents } = ResourceResult.parse(await client.readResource({ uri: 'conclave://workspaces' }));
    const body = z.object({
      default_tier: z.string(),
      workspaces: z.array(z.object({ name: z.string() })),
    }).parse(JSON.parse(contents[0].text));
    expect(body.default_tier).toBe('standard');
    expect(body.workspaces.map((w) => w.name)).toEqual(['General', 'Editorial', 'Quant']);
  });

  test('conclave://costs reports today first', async () => {
    const client = await connect();
    const { contents } = ResourceResult.parse(await client.readResource({ uri: 'conclave://costs' }));
    const body = z.object({ days: z.array(z.object({ day: z.string() })) }).parse(JSON.parse(contents[0].text));
    expect(body.days).toHaveLength(7);
    expect(body.days[0].day).toBe('2026-03-10');
  });
});
