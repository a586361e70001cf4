/**
 * Intent Classifier — decides complexity, backends, tools and workflow.
 *
 * Two tiers:
 *   1. Keyword/pattern rules: immediate, zero cost
 *   2. One low-cost backend asked for a JSON decision, only when no rule
 *      matches, bounded by the classifier timeout, routed through the governor
 *
 * Classification never fails a request: any fallback problem degrades to
 * the fixed default decision.
 */

import { z } from 'zod';
import { logger } from '../logger.js';
import type { ConclaveConfig } from '../config.js';
import type { CostGovernor } from '../governor/governor.js';
import type { BackendRegistry } from './models.js';
import type { WorkspaceDirectory } from './workspaces.js';
import {
  MAX_BACKENDS,
  type ChatMessage, type Complexity, type DecisionSource, type IntentDecision,
  type Query, type Workflow, type WorkspaceProfile,
} from '../types/index.js';

// ---------------------------------------------------------------------------
// Rule tier
// ---------------------------------------------------------------------------

const SIMPLE_PATTERNS = [
  /\b(what is|what's|define|meaning of)\b/,
  /^\d+\s*[+\-*/]\s*\d+/,
  /\b(hello|hi|hey|thanks|thank you)\b/,
];

const MATH_CODE_PATTERNS = [
  /\b(calculate|compute|algorithm|optimize|solve)\b/,
  /\b(code|script|program|function|class)\b/,
  /\b(python|javascript|typescript|java|sql)\b/,
  /\b(api|endpoint|database)\b/,
];

const SPORTS_PATTERNS = [
  /\b(spread|total|parlay|slate|vegas|line|odds)\b/,
  /\b(cfb|nfl|nba|mlb)\b/,
  /\b(team|player|game|match|score)\b.*\b(stats|statistics|data)\b/,
];

const CREATIVE_PATTERNS = [
  /\b(write|draft|compose|create)\b.*\b(article|essay|story|blog|post)\b/,
  /\b(style|tone|voice)\b/,
];

const COMPLEX_PATTERNS = [
  /\b(compare|contrast|analyze|evaluate|assess)\b/,
  /\b(why|how|explain|elaborate)\b.*\b(and|or)\b/,
  /\b(pros and cons|advantages and disadvantages)\b/,
  /\b(comprehensive|detailed|thorough)\b.*\b(analysis|review|report)\b/,
];

const CURRENT_EVENTS_PATTERNS = [
  /\b(latest|recent|current|today|this week|news)\b/,
  /\b(who is|who are|what happened|when did)\b/,
  /\b(price|cost|value)\b.*\b(of|for)\b/,
];

export interface RuleMatch {
  complexity: Complexity;
  confidence: number;
  rationale: string;
  tools: string[];
}

function matches(text: string, patterns: RegExp[]): boolean {
  return patterns.some((p) => p.test(text));
}

export function countWords(text: string): number {
  return text.trim().split(/\s+/).filter(Boolean).length;
}

/** First matching rule family wins; null means "ask the model". */
export function classifyByRules(text: string): RuleMatch | null {
  const lower = text.toLowerCase().trim();
  const words = countWords(lower);

  if (words < 10 && matches(lower, SIMPLE_PATTERNS)) {
    return { complexity: 'simple', confidence: 0.9, rationale: 'Short query with simple pattern', tools: [] };
  }
  if (matches(lower, MATH_CODE_PATTERNS)) {
    return { complexity: 'moderate', confidence: 0.8, rationale: 'Math or code-related query', tools: ['calculator', 'code_execution'] };
  }
  if (matches(lower, SPORTS_PATTERNS)) {
    return { complexity: 'moderate', confidence: 0.85, rationale: 'Sports data query', tools: ['sports_data', 'web_search'] };
  }
  if (matches(lower, CREATIVE_PATTERNS)) {
    return { complexity: 'complex', confidence: 0.8, rationale: 'Creative or content production query', tools: ['rag_search', 'web_search'] };
  }
  if (matches(lower, COMPLEX_PATTERNS)) {
    return { complexity: 'complex', confidence: 0.85, rationale: 'Complex analytical query requiring multiple perspectives', tools: [] };
  }
  if (matches(lower, CURRENT_EVENTS_PATTERNS)) {
    return { complexity: 'moderate', confidence: 0.7, rationale: 'Query requires current information', tools: ['web_search'] };
  }
  if (words > 50) {
    return { complexity: 'complex', confidence: 0.75, rationale: 'Long, detailed query', tools: [] };
  }
  return null;
}

// ---------------------------------------------------------------------------
// Model tier
// ---------------------------------------------------------------------------

const CLASSIFIER_SYSTEM_PROMPT = `You are an intent classifier for a multi-model orchestration system.

Classify the query complexity and determine which tools might be needed.

Complexity levels:
- simple: quick factual questions, greetings, basic math (1 model)
- moderate: questions needing some analysis or current info (2-3 models)
- complex: multi-faceted questions, comparisons, detailed analysis (3-4 models)
- expert: high-stakes content, deep analysis, multiple domains (4+ models)

Available tools: calculator, web_search, code_execution, sports_data, rag_search

Respond with JSON only:
{"complexity": "simple|moderate|complex|expert", "reasoning": "10 words or less", "tools_needed": ["tool"], "confidence": 0.0-1.0}`;

const FallbackDecisionSchema = z.object({
  complexity: z.enum(['simple', 'moderate', 'complex', 'expert']),
  reasoning: z.string().default('Model classification'),
  tools_needed: z.array(z.string()).default([]),
  confidence: z.number().min(0).max(1).default(0.7),
});

export type FallbackDecision = z.infer<typeof FallbackDecisionSchema>;

/** Extract and validate the JSON object from model output. Null when unusable. */
export function parseClassification(text: string): FallbackDecision | null {
  const stripped = text.replace(/```(?:json)?/gi, '').trim();
  const start = stripped.indexOf('{');
  const end = stripped.lastIndexOf('}');
  if (start === -1 || end <= start) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(stripped.slice(start, end + 1));
  } catch {
    return null;
  }
  const parsed = FallbackDecisionSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

const HISTORY_TURNS = 6;

function buildPrompt(text: string, history: ChatMessage[]): ChatMessage[] {
  const recent = history.filter((m) => m.role !== 'system').slice(-HISTORY_TURNS);
  const context = recent.length > 0
    ? `Conversation so far:\n${recent.map((m) => `${m.role}: ${m.content}`).join('\n')}\n\n`
    : '';
  return [
    { role: 'system', content: CLASSIFIER_SYSTEM_PROMPT },
    { role: 'user', content: `${context}Classify this query:\n\n${text}` },
  ];
}

// ---------------------------------------------------------------------------
// Classifier
// ---------------------------------------------------------------------------

export function workflowFor(complexity: Complexity, backendCount: number): Workflow {
  switch (complexity) {
    case 'simple': return 'quick';
    case 'moderate': return backendCount === 2 ? 'dual_check' : 'deliberation';
    case 'complex': return 'deliberation';
    case 'expert': return 'expert_panel';
  }
}

export interface IntentClassifierDeps {
  governor: CostGovernor;
  registry: BackendRegistry;
  workspaces: WorkspaceDirectory;
  config: ConclaveConfig;
  /** Whether a tool has an implementation; suggestions without one are dropped. */
  toolAvailable?: (toolId: string) => boolean;
}

export class IntentClassifier {
  constructor(private readonly deps: IntentClassifierDeps) {}

  async classify(query: Query, history: ChatMessage[] = [], signal?: AbortSignal): Promise<IntentDecision> {
    const profile = this.deps.workspaces.profile(query.workspace);

    if (!this.deps.config.features.intent_classification) {
      return this.defaultDecision(profile, 'Intent classification disabled');
    }

    const rule = classifyByRules(query.text);
    if (rule) {
      logger.debug('Classifier: rule match', { query_id: query.query_id, complexity: rule.complexity });
      return this.decide(profile, rule.complexity, rule.tools, rule.rationale, rule.confidence, 'rules');
    }

    const { roles, timeouts, generation } = this.deps.config;
    const response = await this.deps.governor.complete(
      { query_id: query.query_id, workspace: profile.name, stage: 'classifier' },
      roles.classifier,
      buildPrompt(query.text, history),
      { timeout_ms: timeouts.classifier_ms, max_tokens: generation.classifier_max_tokens, temperature: 0, signal },
    );

    if (!response.success) {
      logger.warn('Classifier: fallback call failed, using default', { query_id: query.query_id, kind: response.failure?.kind });
      return this.defaultDecision(profile, `Classifier unavailable (${response.failure?.kind ?? 'unknown'})`);
    }

    const parsed = parseClassification(response.text);
    if (!parsed) {
      logger.warn('Classifier: unparseable fallback output, using default', { query_id: query.query_id });
      return this.defaultDecision(profile, 'Classifier returned unparseable output');
    }

    return this.decide(profile, parsed.complexity, parsed.tools_needed, parsed.reasoning, parsed.confidence, 'model');
  }

  /**
   * moderate, two general-purpose backends, full deliberation. The workspace's
   * moderate list is preferred, topped up from the registry.
   */
  defaultDecision(profile: WorkspaceProfile, rationale: string): IntentDecision {
    const general = this.deps.registry.generalPurpose();
    const backends = [...new Set([...profile.backends.moderate, ...general])]
      .filter((id) => general.includes(id))
      .slice(0, 2);
    return {
      complexity: 'moderate',
      workflow: 'deliberation',
      backends,
      tools: [],
      rationale,
      confidence: 0.3,
      source: 'default',
    };
  }

  private decide(
    profile: WorkspaceProfile, complexity: Complexity, suggested: string[],
    rationale: string, confidence: number, source: DecisionSource,
  ): IntentDecision {
    const backends = this.selectBackends(profile, complexity);
    return {
      complexity,
      workflow: workflowFor(complexity, backends.length),
      backends,
      tools: this.allowedTools(profile, suggested),
      rationale,
      confidence,
      source,
    };
  }

  private selectBackends(profile: WorkspaceProfile, complexity: Complexity): string[] {
    const unique = [...new Set(profile.backends[complexity])].filter((id) => this.deps.registry.has(id));
    const chosen = unique.slice(0, MAX_BACKENDS);
    return chosen.length > 0 ? chosen : this.deps.registry.generalPurpose().slice(0, 1);
  }

  private allowedTools(profile: WorkspaceProfile, suggested: string[]): string[] {
    const { features } = this.deps.config;
    if (!features.tools) return [];
    const ragAllowed = features.rag && profile.rag_enabled;
    const available = this.deps.toolAvailable ?? (() => true);
    return [...new Set(suggested)].filter((t) =>
      profile.tools.includes(t) && (t !== 'rag_search' || ragAllowed) && available(t));
  }
}
