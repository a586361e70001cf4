/**
 * Stage3 synthesis: tier-based candidate selection, tool-context capping and
 * the synthesizer prompt.
 */

import { estimateTokens } from '../routing/models.js';
import type {
  AggregateRankingEntry, ChatMessage, PeerRanking, SynthesisTier,
} from '../types/index.js';
import type { LabeledResponse } from './anonymize.js';

export interface StyleGuide {
  getStyle(workspace: string): Promise<string | null>;
}

/**
 * Survivors best first: ranked labels by aggregate order, then unranked
 * labels in their Stage1 position. Without an aggregate, Stage1 order.
 */
export function orderCandidates(
  entries: LabeledResponse[],
  stage1Order: string[],
  aggregate: AggregateRankingEntry[],
): LabeledResponse[] {
  const position = (e: LabeledResponse): number => {
    const i = stage1Order.indexOf(e.response.backend_id);
    return i === -1 ? stage1Order.length : i;
  };
  const byStage1 = [...entries].sort((a, b) => position(a) - position(b));
  if (aggregate.length === 0) return byStage1;

  const ranked = aggregate
    .map((a) => entries.find((e) => e.label === a.label))
    .filter((e): e is LabeledResponse => e !== undefined);
  return [...ranked, ...byStage1.filter((e) => !ranked.includes(e))];
}

export function selectCandidates(tier: SynthesisTier, ordered: LabeledResponse[]): LabeledResponse[] {
  switch (tier) {
    case 'minimal': return ordered.slice(0, 1);
    case 'standard': return ordered.slice(0, 2);
    case 'comprehensive': return [...ordered];
  }
}

/** Cut to roughly `tokenCap` tokens. */
export function capContext(text: string, tokenCap: number): string {
  const maxChars = tokenCap * 4;
  return text.length > maxChars ? `${text.slice(0, maxChars)}\n[truncated]` : text;
}

export function needsSummary(text: string, thresholdTokens: number): boolean {
  return estimateTokens(text) > thresholdTokens;
}

export const SUMMARIZER_PROMPT =
  'Summarize the following reference material for another model. Keep every fact, figure, name and source that ' +
  'could matter for answering a question about it. Drop boilerplate. Reply with the summary only.';

export function buildSummaryPrompt(context: string): ChatMessage[] {
  return [
    { role: 'system', content: SUMMARIZER_PROMPT },
    { role: 'user', content: context },
  ];
}

export interface SynthesisPromptInput {
  question: string;
  tier: SynthesisTier;
  candidates: LabeledResponse[];
  aggregate: AggregateRankingEntry[];
  /** Included only for the comprehensive tier. */
  rankings: PeerRanking[];
  context: string;
  style: string | null;
}

function rankingSection(input: SynthesisPromptInput): string {
  if (input.tier === 'minimal') return '(Rankings omitted for efficiency)';
  if (input.aggregate.length === 0) return '(No peer rankings available)';

  const lines = input.aggregate.map((a) =>
    `${a.label}: average position ${a.mean_rank.toFixed(2)} across ${a.votes} ranking(s)`);
  if (input.tier === 'comprehensive' && input.rankings.length > 0) {
    lines.push('');
    input.rankings.forEach((r, i) => lines.push(`Reviewer ${i + 1}:\n${r.raw_text}`, ''));
  }
  return lines.join('\n').trimEnd();
}

export function buildSynthesisPrompt(input: SynthesisPromptInput): ChatMessage[] {
  const responses = input.candidates.map((c) => `${c.label}:\n${c.response.text}`).join('\n\n');

  const parts = [
    'You are the Chairman of a council of AI models. Several models answered a user\'s question, and then ranked each other\'s responses.',
    '',
    `Original Question: ${input.question}`,
    '',
    'STAGE 1 - Individual Responses:',
    responses,
    '',
    'STAGE 2 - Peer Rankings:',
    rankingSection(input),
  ];

  if (input.context) {
    parts.push('', 'Reference Context:', input.context);
  }

  parts.push(
    '',
    'Your task as Chairman is to synthesize all of this information into a single, comprehensive, accurate answer to the user\'s original question. Consider:',
    '- The individual responses and their insights',
    '- The peer rankings and what they reveal about response quality',
    '- Any patterns of agreement or disagreement',
  );

  if (input.style) {
    parts.push('', 'Style Instructions:', input.style);
  }

  parts.push('', 'Provide a clear, well-reasoned final answer that represents the council\'s collective wisdom:');
  return [{ role: 'user', content: parts.join('\n') }];
}
