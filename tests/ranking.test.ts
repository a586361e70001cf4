/**
 * Tests for Stage2: anonymization, ranking extraction and aggregation.
 */

import { describe, expect, test } from 'vitest';
import { anonymize, cryptoShuffle, labelFor } from '../src/deliberation/anonymize.js';
import { aggregateRankings, buildRankingPrompt, parseRanking } from '../src/deliberation/ranking.js';
import type { ModelResponse } from '../src/types/index.js';
import { identityShuffle, reverseShuffle } from './helpers/fakes.js';

function response(backendId: string, text: string): ModelResponse {
  return {
    backend_id: backendId, text, prompt_tokens: 10, completion_tokens: 10,
    latency_ms: 1, cost_usd: 0.001, success: true, cached: false,
  };
}

const LABELS = ['Response A', 'Response B', 'Response C'];

describe('anonymize', () => {
  const survivors = [response('alpha/one', 'first'), response('beta/two', 'second'), response('gamma/three', 'third')];

  test('labels follow the shuffled order', () => {
    const map = anonymize(survivors, reverseShuffle);
    expect(map.labels).toEqual(LABELS);
    expect(map.labelOf('gamma/three')).toBe('Response A');
    expect(map.labelOf('alpha/one')).toBe('Response C');
    expect(map.entries[1]).toEqual({ label: 'Response B', response: survivors[1] });
  });

  test('is a bijection over survivors', () => {
    const map = anonymize(survivors, cryptoShuffle);
    const backends = map.entries.map((e) => e.response.backend_id);
    expect([...backends].sort()).toEqual(['alpha/one', 'beta/two', 'gamma/three']);
    expect(map.labelOf('unknown/backend')).toBeUndefined();
  });

  test('labelFor counts from A', () => {
    expect(labelFor(0)).toBe('Response A');
    expect(labelFor(4)).toBe('Response E');
  });
});

describe('buildRankingPrompt', () => {
  test('shows labeled texts and never the backend ids', () => {
    const map = anonymize([response('alpha/one', 'Paris'), response('beta/two', 'Lyon')], identityShuffle);
    const [message] = buildRankingPrompt('Capital of France?', map.entries);
    expect(message.role).toBe('user');
    expect(message.content).toContain('Question: Capital of France?');
    expect(message.content).toContain('Response A:\nParis');
    expect(message.content).toContain('Response B:\nLyon');
    expect(message.content).not.toContain('alpha/one');
    expect(message.content).not.toContain('beta/two');
  });
});

describe('parseRanking', () => {
  test('reads the numbered list after the marker', () => {
    const text = 'Response A is thin.\nResponse C is best.\n\nFINAL RANKING:\n1. Response C\n2. Response A\n3. Response B';
    expect(parseRanking(text, LABELS)).toEqual(['Response C', 'Response A', 'Response B']);
  });

  test('returns null without the marker', () => {
    expect(parseRanking('1. Response A\n2. Response B', LABELS)).toBeNull();
  });

  test('falls back to label mentions when the list is not numbered', () => {
    expect(parseRanking('FINAL RANKING: Response B, then Response A', LABELS)).toEqual(['Response B', 'Response A']);
  });

  test('ignores mentions before the marker', () => {
    expect(parseRanking('Response B is great.\nFINAL RANKING:\n1. Response A', LABELS)).toEqual(['Response A']);
  });

  test('drops unknown labels and repeats', () => {
    const text = 'FINAL RANKING:\n1. Response D\n2. Response A\n3. Response A\n4. Response B';
    expect(parseRanking(text, LABELS)).toEqual(['Response A', 'Response B']);
  });

  test('returns null when no known label remains', () => {
    expect(parseRanking('FINAL RANKING:\n1. Response Q', LABELS)).toBeNull();
  });
});

describe('aggregateRankings', () => {
  test('averages positions and breaks ties deterministically', () => {
    const aggregate = aggregateRankings([
      ['Response A', 'Response B', 'Response C'],
      ['Response B', 'Response A', 'Response C'],
    ]);
    expect(aggregate).toEqual([
      { label: 'Response A', mean_rank: 1.5, votes: 2, missing_votes: 0 },
      { label: 'Response B', mean_rank: 1.5, votes: 2, missing_votes: 0 },
      { label: 'Response C', mean_rank: 3, votes: 2, missing_votes: 0 },
    ]);
  });

  test('does not depend on the order rankings arrive in', () => {
    const a = aggregateRankings([['Response A', 'Response B'], ['Response B', 'Response A']]);
    const b = aggregateRankings([['Response B', 'Response A'], ['Response A', 'Response B']]);
    expect(a).toEqual(b);
  });

  test('fewer missing votes wins a tie before label order', () => {
    const rankings = [
      ['Response D', 'Response B', 'Response C'],
      ['Response B', 'Response A', 'Response D'],
    ];
    expect(aggregateRankings(rankings).map((e) => e.label))
      .toEqual(['Response B', 'Response D', 'Response A', 'Response C']);
    expect(aggregateRankings(rankings, ['label']).map((e) => e.label))
      .toEqual(['Response B', 'Response A', 'Response D', 'Response C']);
  });

  test('leaves out labels no ranking mentions', () => {
    expect(aggregateRankings([['Response A']])).toEqual([
      { label: 'Response A', mean_rank: 1, votes: 1, missing_votes: 0 },
    ]);
    expect(aggregateRankings([])).toEqual([]);
  });
});
