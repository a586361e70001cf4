/**
 * Core type definitions for Model Conclave.
 *
 * Organized into: Intent, Gateway, Tools, Deliberation, Ledger, Events.
 * Configuration types live beside their schema in config.ts.
 */

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

export type Complexity = 'simple' | 'moderate' | 'complex' | 'expert';

export type Workflow = 'quick' | 'dual_check' | 'deliberation' | 'expert_panel';

export type SynthesisTier = 'minimal' | 'standard' | 'comprehensive';

export type ProviderName = 'openrouter' | 'anthropic' | 'openai';

/** Which part of the engine issued a priced call. */
export type CallStage = 'classifier' | 'tool' | 'stage1' | 'stage2' | 'stage3' | 'stage4' | 'summarizer';

export type PipelineState = 'INIT' | 'TOOLS' | 'STAGE1' | 'STAGE2' | 'STAGE3' | 'STAGE4' | 'DONE' | 'FAILED';

export type DecisionSource = 'rules' | 'model' | 'default';

export const MAX_BACKENDS = 5;

// ---------------------------------------------------------------------------
// Query & Intent
// ---------------------------------------------------------------------------

export interface Query {
  query_id: string;
  text: string;
  workspace: string;
  submitted_at: string;
}

export interface IntentDecision {
  complexity: Complexity;
  workflow: Workflow;
  /** 1–5 distinct backend ids, in dispatch order. */
  backends: string[];
  tools: string[];
  rationale: string;
  confidence: number;
  source: DecisionSource;
}

export interface WorkspaceProfile {
  name: string;
  description: string;
  backends: Record<Complexity, string[]>;
  tools: string[];
  rag_enabled: boolean;
  /** Falls back to the configured default tier when absent. */
  synthesis_tier?: SynthesisTier;
}

export interface BackendProfile {
  backend_id: string;
  provider: ProviderName;
  api_model_id: string;
  display_name: string;
  cost_input_per_mtok: number;
  cost_output_per_mtok: number;
  general_purpose: boolean;
  low_cost: boolean;
}

// ---------------------------------------------------------------------------
// Model Gateway
// ---------------------------------------------------------------------------

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionParams {
  max_tokens?: number;
  temperature?: number;
  timeout_ms?: number;
  signal?: AbortSignal;
}

export type FailureKind =
  | 'timeout' | 'provider_error' | 'network' | 'aborted'
  | 'invalid_response' | 'admission_denied' | 'deadline';

export interface GatewayCompletion {
  ok: true;
  text: string;
  prompt_tokens: number;
  completion_tokens: number;
  latency_ms: number;
}

export interface GatewayFailure {
  ok: false;
  kind: FailureKind;
  message: string;
  latency_ms?: number;
}

export type GatewayResult = GatewayCompletion | GatewayFailure;

/** Uniform call contract to any backend. Implementations resolve backend ids themselves. */
export interface ModelGateway {
  complete(backendId: string, messages: ChatMessage[], params: CompletionParams): Promise<GatewayResult>;
}

// ---------------------------------------------------------------------------
// Model responses
// ---------------------------------------------------------------------------

export interface ModelResponse {
  backend_id: string;
  text: string;
  prompt_tokens: number;
  completion_tokens: number;
  latency_ms: number;
  cost_usd: number;
  success: boolean;
  cached: boolean;
  failure?: { kind: FailureKind; message: string };
}

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

export type ToolFailureKind = 'timeout' | 'error' | 'unknown_tool' | 'aborted';

export interface ToolSuccess {
  ok: true;
  data: unknown;
}

export interface ToolFailure {
  ok: false;
  kind: ToolFailureKind;
  message: string;
}

export type ToolResult = ToolSuccess | ToolFailure;

export interface ToolRequest {
  tool_id: string;
  params: Record<string, unknown>;
}

export interface ToolInvocation {
  tool_id: string;
  params: Record<string, unknown>;
  result: ToolResult;
  latency_ms: number;
  cost_usd: number;
}

export interface ToolBatch {
  /** Catalog-priority order, never completion order. */
  invocations: ToolInvocation[];
  /** Formatted tool context only, without the user question. Empty when nothing succeeded. */
  context: string;
  /** User question followed by the tool context; what Stage1 backends receive. */
  augmented_query: string;
}

// ---------------------------------------------------------------------------
// Deliberation
// ---------------------------------------------------------------------------

export interface PeerRanking {
  rater_backend_id: string;
  /** Anonymized labels, best first. */
  labels: string[];
  raw_text: string;
}

export interface AggregateRankingEntry {
  label: string;
  mean_rank: number;
  votes: number;
  missing_votes: number;
}

export interface Stage2Result {
  rankings: PeerRanking[];
  /** Raters whose output had no usable ranking. */
  discarded: number;
  /** Raters whose call failed. */
  failed: number;
  aggregate: AggregateRankingEntry[];
}

export interface SynthesisResult {
  author_backend_id: string;
  text: string;
  tier: SynthesisTier;
  candidate_labels: string[];
}

export type SynthesisOutcome =
  | { status: 'skipped'; reason: string }
  | { status: 'available'; result: SynthesisResult }
  | { status: 'unavailable'; reason: string };

export type JudgeDimension = 'accuracy' | 'completeness' | 'coherence';

export interface JudgeVerdict {
  judge_backend_id: string;
  scores: Record<JudgeDimension, number>;
  overall: number;
  recommendation: 'approve' | 'revise';
  concerns: string[];
  reasoning: string;
}

export type JudgeOutcome =
  | { status: 'skipped'; reason: string }
  | { status: 'available'; verdict: JudgeVerdict }
  | { status: 'unavailable'; reason: string };

export interface FinalAnswer {
  text: string;
  source: 'stage1' | 'synthesis';
  backend_id: string;
}

// ---------------------------------------------------------------------------
// Ledger
// ---------------------------------------------------------------------------

export type BudgetScope = 'query' | 'day';

export interface BudgetSnapshot {
  scope: BudgetScope;
  /** Query id or UTC budget day (YYYY-MM-DD). */
  key: string;
  amount: number;
  limit: number;
  remaining: number;
}

/** One priced call. Written once, never mutated. */
export interface LedgerEntry {
  entry_id: string;
  query_id: string;
  workspace: string;
  stage: CallStage;
  backend_id: string;
  prompt_tokens: number;
  completion_tokens: number;
  latency_ms: number;
  cost_usd: number;
  success: boolean;
  failure_kind?: FailureKind;
  error_message?: string;
  day: string;
  timestamp: string;
  budgets: BudgetSnapshot[];
}

export interface CostSummary {
  query_id: string;
  total_cost_usd: number;
  calls: number;
  failed_calls: number;
  cache_hits: number;
  denied_calls: number;
  budgets: BudgetSnapshot[];
}

// ---------------------------------------------------------------------------
// Lifecycle events
// ---------------------------------------------------------------------------

export type LifecycleEventType =
  | 'intent_decided'
  | 'tools_completed'
  | 'stage1_response'
  | 'stage1_complete'
  | 'stage2_ranking'
  | 'stage2_complete'
  | 'stage3_complete'
  | 'stage4_complete'
  | 'cost_summary'
  | 'complete'
  | 'error';

export interface LifecycleEvent {
  type: LifecycleEventType;
  query_id: string;
  sequence: number;
  timestamp: number;
  data: Record<string, unknown>;
}

export type LifecycleObserver = (event: LifecycleEvent) => void;

// ---------------------------------------------------------------------------
// Pipeline result
// ---------------------------------------------------------------------------

export interface PipelineResult {
  query: Query;
  intent: IntentDecision;
  state: PipelineState;
  tools: ToolBatch | null;
  stage1: ModelResponse[];
  stage2: Stage2Result | null;
  synthesis: SynthesisOutcome;
  judge: JudgeOutcome;
  final: FinalAnswer;
  cost: CostSummary;
  latency_ms: number;
  events: LifecycleEvent[];
}

// ---------------------------------------------------------------------------
// MCP tool output
// ---------------------------------------------------------------------------

export interface ToolOutput {
  status: 'success' | 'error' | 'denied';
  data: Record<string, unknown>;
  message: string;
  next: {
    control: 'agent' | 'user';
    description: string;
  } | null;
}
