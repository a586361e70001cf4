/**
 * Tests for the Intent Classifier: rule tier, model fallback and defaults.
 */

import { describe, expect, test } from 'vitest';
import {
  IntentClassifier, classifyByRules, parseClassification, workflowFor,
} from '../src/routing/classifier.js';
import type { ConclaveConfig } from '../src/config.js';
import type { Query } from '../src/types/index.js';
import { NOW, ScriptedGateway, fail, harness, ok, testConfig, type Responder } from './helpers/fakes.js';

const CLAUDE = 'anthropic/claude-sonnet-4.5';
const GPT = 'openai/gpt-5.1';
const GEMINI = 'google/gemini-3-pro-preview';
const FLASH = 'google/gemini-2.5-flash';

function query(text: string, workspace = 'General'): Query {
  return { query_id: 'q1', text, workspace, submitted_at: new Date(NOW).toISOString() };
}

function setup(
  responder: Responder = () => ok('{}'),
  config: ConclaveConfig = testConfig(),
  toolAvailable?: (toolId: string) => boolean,
) {
  const gateway = new ScriptedGateway(responder);
  const h = harness(gateway, config);
  const classifier = new IntentClassifier({
    governor: h.governor, registry: h.registry, workspaces: h.workspaces, config: h.config, toolAvailable,
  });
  return { gateway, classifier, h };
}

describe('classifyByRules', () => {
  test('short arithmetic is simple', () => {
    expect(classifyByRules('2+2?')).toMatchObject({ complexity: 'simple', tools: [] });
  });

  test('code questions are moderate and suggest calculator and code execution', () => {
    expect(classifyByRules('Why does my TypeScript function return undefined after the await?')).toMatchObject({
      complexity: 'moderate',
      tools: ['calculator', 'code_execution'],
    });
  });

  test('comparisons are complex', () => {
    expect(classifyByRules('Compare the economic policies of Keynes and Hayek')?.complexity).toBe('complex');
  });

  test('current events suggest web search', () => {
    expect(classifyByRules('Summarize the latest developments in battery storage research for grid operators')).toMatchObject({
      complexity: 'moderate',
      tools: ['web_search'],
    });
  });

  test('returns null when nothing matches', () => {
    expect(classifyByRules('Tell me about the migration patterns of arctic terns')).toBeNull();
  });
});

describe('parseClassification', () => {
  test('reads JSON inside a fenced block', () => {
    expect(parseClassification('```json\n{"complexity":"complex","reasoning":"Multi-part","tools_needed":[],"confidence":0.8}\n```')).toEqual({
      complexity: 'complex', reasoning: 'Multi-part', tools_needed: [], confidence: 0.8,
    });
  });

  test('fills defaults for missing fields', () => {
    expect(parseClassification('Sure: {"complexity":"simple"}')).toEqual({
      complexity: 'simple', reasoning: 'Model classification', tools_needed: [], confidence: 0.7,
    });
  });

  test('rejects unknown complexity and broken JSON', () => {
    expect(parseClassification('{"complexity":"trivial"}')).toBeNull();
    expect(parseClassification('{"complexity": simple}')).toBeNull();
    expect(parseClassification('no json here')).toBeNull();
  });
});

describe('workflowFor', () => {
  test('maps complexity and backend count to a workflow', () => {
    expect(workflowFor('simple', 1)).toBe('quick');
    expect(workflowFor('moderate', 2)).toBe('dual_check');
    expect(workflowFor('moderate', 3)).toBe('deliberation');
    expect(workflowFor('complex', 3)).toBe('deliberation');
    expect(workflowFor('expert', 4)).toBe('expert_panel');
  });
});

describe('IntentClassifier', () => {
  test('a simple rule match uses one backend and costs nothing', async () => {
    const { classifier, gateway } = setup();
    const decision = await classifier.classify(query('2+2?'));

    expect(decision).toEqual({
      complexity: 'simple',
      workflow: 'quick',
      backends: [GEMINI],
      tools: [],
      rationale: 'Short query with simple pattern',
      confidence: 0.9,
      source: 'rules',
    });
    expect(gateway.calls).toHaveLength(0);
  });

  test('suggested tools are limited to the workspace allow-list', async () => {
    const { classifier } = setup();
    const decision = await classifier.classify(query('Calculate the compound interest on 5000 at 4% for 10 years'));
    expect(decision).toMatchObject({
      complexity: 'moderate',
      workflow: 'dual_check',
      backends: [CLAUDE, GPT],
      tools: ['calculator', 'code_execution'],
    });
  });

  test('tools without an implementation are dropped', async () => {
    const { classifier } = setup(undefined, testConfig(), (toolId) => toolId === 'code_execution');
    const decision = await classifier.classify(query('Calculate the compound interest on 5000 at 4% for 10 years'));
    expect(decision.tools).toEqual(['code_execution']);
  });

  test('no tools when the tools feature is off', async () => {
    const { classifier } = setup(undefined, testConfig({ features: { tools: false } }));
    const decision = await classifier.classify(query('Calculate the compound interest on 5000 at 4% for 10 years'));
    expect(decision.tools).toEqual([]);
  });

  test('backends follow the workspace profile', async () => {
    const { classifier } = setup();
    expect((await classifier.classify(query('2+2?', 'Quant'))).backends).toEqual([CLAUDE]);
    expect((await classifier.classify(query('2+2?', 'Nowhere'))).backends).toEqual([GEMINI]);
  });

  test('falls back to the low-cost model when no rule matches', async () => {
    const { classifier, gateway, h } = setup(() =>
      ok('```json\n{"complexity":"expert","reasoning":"Broad topic","tools_needed":["web_search","rag_search"],"confidence":0.6}\n```', 120, 30));

    const decision = await classifier.classify(query('Tell me about the migration patterns of arctic terns'));

    expect(decision).toEqual({
      complexity: 'expert',
      workflow: 'expert_panel',
      backends: [GPT, GEMINI, CLAUDE, 'x-ai/grok-4'],
      tools: ['web_search'],
      rationale: 'Broad topic',
      confidence: 0.6,
      source: 'model',
    });
    expect(gateway.calls).toHaveLength(1);
    expect(gateway.calls[0]).toMatchObject({ backend_id: FLASH, kind: 'classifier' });
    expect(gateway.calls[0].params).toMatchObject({ temperature: 0, max_tokens: 200 });
    expect(h.ledger.all()[0].stage).toBe('classifier');
  });

  test('includes recent conversation turns in the fallback prompt', async () => {
    const { classifier, gateway } = setup(() => ok('{"complexity":"simple"}'));
    await classifier.classify(query('And the one after that?'), [
      { role: 'system', content: 'ignored' },
      { role: 'user', content: 'Which tern migrates furthest?' },
      { role: 'assistant', content: 'The arctic tern.' },
    ]);
    expect(gateway.calls[0].messages[1].content).toBe(
      'Conversation so far:\nuser: Which tern migrates furthest?\nassistant: The arctic tern.\n\nClassify this query:\n\nAnd the one after that?',
    );
  });

  test('unparseable fallback output yields the default decision', async () => {
    const { classifier } = setup(() => ok('I would say it is fairly hard.'));
    const decision = await classifier.classify(query('Tell me about the migration patterns of arctic terns'));
    expect(decision).toEqual({
      complexity: 'moderate',
      workflow: 'deliberation',
      backends: [CLAUDE, GPT],
      tools: [],
      rationale: 'Classifier returned unparseable output',
      confidence: 0.3,
      source: 'default',
    });
  });

  test('a failed fallback call yields the default decision', async () => {
    const { classifier } = setup(() => fail('timeout', 'slow'));
    const decision = await classifier.classify(query('Tell me about the migration patterns of arctic terns'));
    expect(decision).toMatchObject({ source: 'default', rationale: 'Classifier unavailable (timeout)' });
  });

  test('disabled classification always uses the default', async () => {
    const { classifier, gateway } = setup(undefined, testConfig({ features: { intent_classification: false } }));
    const decision = await classifier.classify(query('2+2?'));
    expect(decision).toMatchObject({ source: 'default', rationale: 'Intent classification disabled', backends: [CLAUDE, GPT] });
    expect(gateway.calls).toHaveLength(0);
  });
});
