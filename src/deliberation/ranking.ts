/**
 * Stage2 peer review: ranking prompt, ranking extraction and aggregation.
 */

import type { TieBreakKey } from '../config.js';
import type { AggregateRankingEntry, ChatMessage } from '../types/index.js';
import type { LabeledResponse } from './anonymize.js';

export const RANKING_MARKER = 'FINAL RANKING:';

export function buildRankingPrompt(question: string, entries: LabeledResponse[]): ChatMessage[] {
  const responses = entries.map((e) => `${e.label}:\n${e.response.text}`).join('\n\n');
  const example = entries.map((e, i) => `${i + 1}. ${e.label}`).join('\n');

  const content = `You are evaluating different responses to the following question:

Question: ${question}

Here are the responses from different models (anonymized):

${responses}

Your task:
1. First, evaluate each response individually. For each response, explain what it does well and what it does poorly.
2. Then, at the very end of your response, provide a final ranking.

IMPORTANT: Your final ranking MUST be formatted EXACTLY as follows:
- Start with the line "${RANKING_MARKER}" (all caps, with colon)
- Then list the responses from best to worst as a numbered list
- Each line should be: number, period, space, then ONLY the response label (e.g., "1. Response A")
- Do not add any other text or explanations in the ranking section

Example of the ranking section:

${RANKING_MARKER}
${example}

Now provide your evaluation and ranking:`;

  return [{ role: 'user', content }];
}

/**
 * Ordered labels from the section after the ranking marker, or null when the
 * marker is missing or names no known label. Duplicates keep first position.
 */
export function parseRanking(text: string, validLabels: readonly string[]): string[] | null {
  const at = text.indexOf(RANKING_MARKER);
  if (at === -1) return null;
  const section = text.slice(at + RANKING_MARKER.length);

  const numbered = [...section.matchAll(/\d+\.\s*(Response [A-Z])\b/g)].map((m) => m[1]);
  const found = numbered.length > 0
    ? numbered
    : [...section.matchAll(/Response [A-Z]\b/g)].map((m) => m[0]);

  const known = new Set(validLabels);
  const labels: string[] = [];
  for (const label of found) {
    if (known.has(label) && !labels.includes(label)) labels.push(label);
  }
  return labels.length > 0 ? labels : null;
}

/**
 * Mean rank position per label over the rankings that include it. Labels no
 * ranking mentions are left out. Ties resolve by `tieBreak` in order, then by
 * label, so the result depends only on the set of rankings.
 */
export function aggregateRankings(
  rankings: readonly string[][],
  tieBreak: readonly TieBreakKey[] = ['missing_votes', 'label'],
): AggregateRankingEntry[] {
  const positions = new Map<string, number[]>();
  for (const ranking of rankings) {
    ranking.forEach((label, i) => {
      const list = positions.get(label) ?? [];
      list.push(i + 1);
      positions.set(label, list);
    });
  }

  const entries: AggregateRankingEntry[] = [...positions.entries()].map(([label, ranks]) => ({
    label,
    mean_rank: ranks.reduce((a, b) => a + b, 0) / ranks.length,
    votes: ranks.length,
    missing_votes: rankings.length - ranks.length,
  }));

  const compare = (a: AggregateRankingEntry, b: AggregateRankingEntry, key: TieBreakKey): number =>
    key === 'missing_votes' ? a.missing_votes - b.missing_votes : a.label < b.label ? -1 : a.label > b.label ? 1 : 0;

  return entries.sort((a, b) => {
    if (a.mean_rank !== b.mean_rank) return a.mean_rank - b.mean_rank;
    for (const key of tieBreak) {
      const c = compare(a, b, key);
      if (c !== 0) return c;
    }
    return compare(a, b, 'label');
  });
}
