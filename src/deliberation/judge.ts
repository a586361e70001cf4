/**
 * Stage4 judge: an independent backend scores the final answer.
 */

import type {
  ChatMessage, Complexity, IntentDecision, JudgeDimension, JudgeVerdict,
} from '../types/index.js';
import type { LabeledResponse } from './anonymize.js';

const HIGH_STAKES: readonly Complexity[] = ['complex', 'expert'];

export function isHighStakes(intent: IntentDecision, explicit = false): boolean {
  return explicit || HIGH_STAKES.includes(intent.complexity) || intent.workflow === 'expert_panel';
}

export function buildJudgePrompt(question: string, finalText: string, stage1: LabeledResponse[]): ChatMessage[] {
  const individual = stage1.map((e) => `${e.label}:\n${e.response.text}`).join('\n\n');

  const content = `You are an independent judge evaluating the quality of a multi-model council's response.

**Original Question:**
${question}

**Individual Model Responses (Stage 1):**
${individual}

**Council's Final Answer:**
${finalText}

**Your Task:**
Evaluate the final answer for:
1. **Accuracy**: Is the information factually correct?
2. **Completeness**: Does it fully address all aspects of the question?
3. **Coherence**: Is it well-structured and easy to understand?
4. **Concerns**: Are there any errors, contradictions, or missing information?

Provide your evaluation in the following format:

ACCURACY SCORE: [0-10]
COMPLETENESS SCORE: [0-10]
COHERENCE SCORE: [0-10]

CONCERNS:
- [List any concerns, or write "None"]

RECOMMENDATION: [APPROVE | REVISE | ESCALATE]
REASONING: [Brief explanation of your recommendation]

Guidelines:
- APPROVE: Response is high quality and ready to send
- REVISE: Minor issues that should be addressed
- ESCALATE: Significant errors or inadequacies requiring major revision`;

  return [{ role: 'user', content }];
}

const SCORE_PATTERNS: Record<JudgeDimension, RegExp> = {
  accuracy: /ACCURACY SCORE:\s*(\d+(?:\.\d+)?)/i,
  completeness: /COMPLETENESS SCORE:\s*(\d+(?:\.\d+)?)/i,
  coherence: /COHERENCE SCORE:\s*(\d+(?:\.\d+)?)/i,
};

const NO_CONCERNS = new Set(['none', 'n/a', 'no concerns']);

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function readScore(text: string, dimension: JudgeDimension): number | null {
  const match = SCORE_PATTERNS[dimension].exec(text);
  if (!match) return null;
  return round2(Math.min(Math.max(Number(match[1]), 0), 10) / 10);
}

/**
 * Structured verdict, or null when any score or the recommendation is
 * missing. Scores are read on a 0-10 scale and normalised to [0,1];
 * ESCALATE counts as revise.
 */
export function parseVerdict(text: string, judgeBackendId: string): JudgeVerdict | null {
  const accuracy = readScore(text, 'accuracy');
  const completeness = readScore(text, 'completeness');
  const coherence = readScore(text, 'coherence');
  if (accuracy === null || completeness === null || coherence === null) return null;

  const rec = /RECOMMENDATION:\s*\[?\s*(APPROVE|REVISE|ESCALATE)/i.exec(text);
  if (!rec) return null;

  const concernsBlock = /CONCERNS:\s*([\s\S]*?)(?=RECOMMENDATION:|$)/i.exec(text);
  const concerns = (concernsBlock?.[1] ?? '')
    .split('\n')
    .map((line) => line.trim().replace(/^[-•*]+/, '').trim())
    .filter((line) => line.length > 0 && !NO_CONCERNS.has(line.toLowerCase().replace(/\.$/, '')));

  const reasoning = /REASONING:\s*([\s\S]*)$/i.exec(text)?.[1].trim() ?? '';

  return {
    judge_backend_id: judgeBackendId,
    scores: { accuracy, completeness, coherence },
    overall: round2((accuracy + completeness + coherence) / 3),
    recommendation: rec[1].toUpperCase() === 'APPROVE' ? 'approve' : 'revise',
    concerns,
    reasoning,
  };
}
