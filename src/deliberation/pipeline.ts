/**
 * Deliberation Pipeline — drives one query through
 * INIT → (TOOLS) → STAGE1 → (STAGE2) → (STAGE3) → (STAGE4) → DONE.
 *
 * Stages narrow their working set on per-call failures and degrade to the
 * best partial result. Only an empty Stage1 is fatal. Every model call goes
 * through the Cost Governor.
 */

import { logger } from '../logger.js';
import { PipelineFailureError, errorMessage, isConclaveError } from '../errors.js';
import { collectWithin } from '../util/abort.js';
import type { ConclaveConfig } from '../config.js';
import type { CallContext, CostGovernor } from '../governor/governor.js';
import type { ToolCoordinator } from '../augmentation/coordinator.js';
import type { WorkspaceDirectory } from '../routing/workspaces.js';
import type {
  CallStage, ChatMessage, FinalAnswer, IntentDecision, JudgeOutcome, ModelResponse,
  PeerRanking, PipelineResult, Query, Stage2Result, SynthesisOutcome, SynthesisTier,
  ToolBatch, WorkspaceProfile,
} from '../types/index.js';
import { anonymize, cryptoShuffle, type LabelMap, type LabeledResponse, type Shuffle } from './anonymize.js';
import type { LifecycleChannel } from './events.js';
import { aggregateRankings, buildRankingPrompt, parseRanking } from './ranking.js';
import { PipelineStateMachine } from './state.js';
import {
  buildSummaryPrompt, buildSynthesisPrompt, capContext, needsSummary, orderCandidates,
  selectCandidates, type StyleGuide,
} from './synthesis.js';
import { buildJudgePrompt, isHighStakes, parseVerdict } from './judge.js';

export interface PipelineDeps {
  governor: CostGovernor;
  workspaces: WorkspaceDirectory;
  config: ConclaveConfig;
  /** Absent when no tools are wired; the TOOLS stage is then skipped. */
  tools?: ToolCoordinator;
  styleGuide?: StyleGuide;
  shuffle?: Shuffle;
  now?: () => number;
}

export interface PipelineRunOptions {
  tier?: SynthesisTier;
  high_stakes?: boolean;
  signal?: AbortSignal;
  /** Forwarded to tool parameter builders. */
  extra?: Record<string, unknown>;
}

interface RunScope {
  query: Query;
  intent: IntentDecision;
  profile: WorkspaceProfile;
  channel: LifecycleChannel;
  signal?: AbortSignal;
}

function summarize(r: ModelResponse): Record<string, unknown> {
  return {
    backend_id: r.backend_id,
    success: r.success,
    cached: r.cached,
    latency_ms: r.latency_ms,
    cost_usd: r.cost_usd,
    ...(r.failure ? { failure: r.failure } : {}),
  };
}

function lateResponse(backendId: string, kind: 'deadline' | 'aborted', message: string): ModelResponse {
  return {
    backend_id: backendId,
    text: '',
    prompt_tokens: 0,
    completion_tokens: 0,
    latency_ms: 0,
    cost_usd: 0,
    success: false,
    cached: false,
    failure: { kind, message },
  };
}

export class DeliberationPipeline {
  private readonly shuffle: Shuffle;
  private readonly now: () => number;

  constructor(private readonly deps: PipelineDeps) {
    this.shuffle = deps.shuffle ?? cryptoShuffle;
    this.now = deps.now ?? Date.now;
  }

  async run(
    query: Query,
    intent: IntentDecision,
    channel: LifecycleChannel,
    options: PipelineRunOptions = {},
  ): Promise<PipelineResult> {
    const { config, governor } = this.deps;
    const started = this.now();
    const machine = new PipelineStateMachine();
    const profile = this.deps.workspaces.profile(query.workspace);
    const scope: RunScope = { query, intent, profile, channel, signal: options.signal };

    try {
      // TOOLS
      let tools: ToolBatch | null = null;
      let prompt = query.text;
      if (this.deps.tools && config.features.tools && intent.tools.length > 0) {
        machine.transition('TOOLS');
        tools = await this.deps.tools.run(intent.tools, query.text, {
          query_id: query.query_id,
          workspace: profile.name,
          signal: options.signal,
          extra: options.extra,
        });
        prompt = tools.augmented_query;
        channel.emit('tools_completed', {
          tools: tools.invocations.map((i) => ({
            tool_id: i.tool_id,
            ok: i.result.ok,
            latency_ms: i.latency_ms,
            cost_usd: i.cost_usd,
            ...(i.result.ok ? {} : { kind: i.result.kind, message: i.result.message }),
          })),
        });
      }

      // STAGE1
      machine.transition('STAGE1');
      const stage1 = await this.stage1(scope, prompt);
      const survivors = stage1.filter((r) => r.success);
      channel.emit('stage1_complete', {
        attempted: stage1.length,
        succeeded: survivors.length,
        failed: stage1.filter((r) => !r.success).map((r) => r.backend_id),
      });

      if (survivors.length === 0) {
        const failures: Record<string, string> = {};
        for (const r of stage1) failures[r.backend_id] = r.failure?.message ?? 'no response';
        throw new PipelineFailureError(intent.backends, failures);
      }

      const labels = anonymize(survivors, this.shuffle);
      const deliberative = labels.entries.length >= 2;

      // STAGE2
      let stage2: Stage2Result | null = null;
      if (deliberative && (intent.workflow === 'deliberation' || intent.workflow === 'expert_panel')) {
        machine.transition('STAGE2');
        stage2 = await this.stage2(scope, labels);
      }

      const ordered = orderCandidates(labels.entries, intent.backends, stage2?.aggregate ?? []);
      const top = ordered[0].response;
      let final: FinalAnswer = { text: top.text, source: 'stage1', backend_id: top.backend_id };

      // STAGE3
      let synthesis: SynthesisOutcome = {
        status: 'skipped',
        reason: deliberative ? 'Quick workflow' : 'Single surviving response',
      };
      if (deliberative && intent.workflow !== 'quick') {
        machine.transition('STAGE3');
        const tier = options.tier ?? profile.synthesis_tier ?? config.synthesis.default_tier;
        synthesis = await this.stage3(scope, tier, ordered, stage2, tools?.context ?? '');
        if (synthesis.status === 'available') {
          final = { text: synthesis.result.text, source: 'synthesis', backend_id: synthesis.result.author_backend_id };
        }
        channel.emit('stage3_complete', {
          status: synthesis.status,
          tier,
          ...(synthesis.status === 'available'
            ? { candidates: synthesis.result.candidate_labels }
            : { reason: synthesis.reason }),
          final_source: final.source,
        });
      }

      // STAGE4
      let judge: JudgeOutcome;
      if (!config.features.judge) {
        judge = { status: 'skipped', reason: 'Judge disabled' };
      } else if (!isHighStakes(intent, options.high_stakes)) {
        judge = { status: 'skipped', reason: 'Not a high-stakes query' };
      } else {
        machine.transition('STAGE4');
        judge = await this.stage4(scope, final, labels);
        channel.emit('stage4_complete', judge.status === 'available'
          ? {
              status: judge.status,
              recommendation: judge.verdict.recommendation,
              overall: judge.verdict.overall,
              scores: judge.verdict.scores,
            }
          : { status: judge.status, reason: judge.reason });
      }

      const cost = governor.costSummary(query.query_id);
      channel.emit('cost_summary', { ...cost });

      machine.transition('DONE');
      const latency = this.now() - started;
      channel.emit('complete', { state: machine.state, final_source: final.source, latency_ms: latency });
      logger.info('Pipeline: query complete', {
        query_id: query.query_id,
        workflow: intent.workflow,
        path: machine.path.join(' → '),
        cost_usd: cost.total_cost_usd,
        latency_ms: latency,
      });

      return {
        query,
        intent,
        state: machine.state,
        tools,
        stage1,
        stage2,
        synthesis,
        judge,
        final,
        cost,
        latency_ms: latency,
        events: channel.history(),
      };
    } catch (err) {
      const failedIn = machine.state;
      if (!machine.isTerminal()) machine.transition('FAILED');
      channel.emit('error', {
        state: failedIn,
        code: isConclaveError(err) ? err.code : 'INTERNAL',
        message: errorMessage(err),
        ...(isConclaveError(err) ? { details: err.details } : {}),
      });
      logger.error('Pipeline: query failed', { query_id: query.query_id, state: failedIn, error: errorMessage(err) });
      throw err;
    }
  }

  // -------------------------------------------------------------------------
  // Stages
  // -------------------------------------------------------------------------

  private ctx(scope: RunScope, stage: CallStage): CallContext {
    return { query_id: scope.query.query_id, workspace: scope.profile.name, stage };
  }

  private async stage1(scope: RunScope, prompt: string): Promise<ModelResponse[]> {
    const { config, governor } = this.deps;
    const backends = scope.intent.backends;
    const messages: ChatMessage[] = [{ role: 'user', content: prompt }];
    const deadline = config.timeouts.stage1_ms;

    const collected = await collectWithin(
      backends.map((backendId) => (signal: AbortSignal) => governor.complete(
        this.ctx(scope, 'stage1'), backendId, messages,
        { max_tokens: config.generation.stage1_max_tokens, temperature: config.generation.temperature, signal },
      )),
      deadline,
      { signal: scope.signal, onSettled: (r) => scope.channel.emit('stage1_response', summarize(r)) },
    );

    return collected.map((c, i) => {
      if (c.status === 'settled') return c.value;
      const late = scope.signal?.aborted
        ? lateResponse(backends[i], 'aborted', 'Aborted by caller')
        : lateResponse(backends[i], 'deadline', `No response within the ${deadline}ms Stage1 deadline`);
      logger.warn('Pipeline: Stage1 call abandoned', { query_id: scope.query.query_id, backend: backends[i], kind: late.failure?.kind });
      scope.channel.emit('stage1_response', summarize(late));
      return late;
    });
  }

  private async stage2(scope: RunScope, labels: LabelMap): Promise<Stage2Result> {
    const { config, governor } = this.deps;
    const messages = buildRankingPrompt(scope.query.text, labels.entries);
    // Raters in selected order so the rankings list does not depend on arrival.
    const raters = scope.intent.backends.filter((b) => labels.labelOf(b) !== undefined);
    const parsed: Array<string[] | null> = raters.map(() => null);

    const collected = await collectWithin(
      raters.map((backendId) => (signal: AbortSignal) => governor.complete(
        this.ctx(scope, 'stage2'), backendId, messages,
        { max_tokens: config.generation.ranking_max_tokens, temperature: config.generation.temperature, signal },
      )),
      config.timeouts.stage2_ms,
      {
        signal: scope.signal,
        onSettled: (r, index) => {
          const labelsOut = r.success ? parseRanking(r.text, labels.labels) : null;
          parsed[index] = labelsOut;
          scope.channel.emit('stage2_ranking', {
            rater_backend_id: r.backend_id,
            success: r.success,
            parsed: labelsOut !== null,
            ...(labelsOut ? { labels: labelsOut } : {}),
          });
        },
      },
    );

    const rankings: PeerRanking[] = [];
    let discarded = 0;
    let failed = 0;
    collected.forEach((c, i) => {
      if (c.status === 'late' || !c.value.success) {
        failed++;
        return;
      }
      const order = parsed[i];
      if (order) rankings.push({ rater_backend_id: raters[i], labels: order, raw_text: c.value.text });
      else discarded++;
    });
    if (discarded > 0) {
      logger.warn('Pipeline: rankings discarded', { query_id: scope.query.query_id, discarded });
    }

    const aggregate = aggregateRankings(rankings.map((r) => r.labels), config.ranking.tie_break);
    scope.channel.emit('stage2_complete', { parsed: rankings.length, discarded, failed, aggregate });
    return { rankings, discarded, failed, aggregate };
  }

  private async stage3(
    scope: RunScope,
    tier: SynthesisTier,
    ordered: LabeledResponse[],
    stage2: Stage2Result | null,
    toolContext: string,
  ): Promise<SynthesisOutcome> {
    const { config, governor } = this.deps;
    const candidates = selectCandidates(tier, ordered);
    const context = toolContext ? await this.prepareContext(scope, toolContext) : '';
    const style = await this.lookupStyle(scope);

    const messages = buildSynthesisPrompt({
      question: scope.query.text,
      tier,
      candidates,
      aggregate: stage2?.aggregate ?? [],
      rankings: tier === 'comprehensive' ? stage2?.rankings ?? [] : [],
      context,
      style,
    });

    const synthesizer = config.roles.synthesizer;
    const response = await governor.complete(this.ctx(scope, 'stage3'), synthesizer, messages, {
      max_tokens: config.generation.synthesis_max_tokens,
      temperature: config.generation.temperature,
      timeout_ms: config.timeouts.stage3_ms,
      signal: scope.signal,
    });

    if (!response.success || !response.text.trim()) {
      const reason = response.failure?.message ?? 'Synthesizer returned an empty answer';
      logger.warn('Pipeline: synthesis unavailable, using top Stage1 answer', { query_id: scope.query.query_id, reason });
      return { status: 'unavailable', reason };
    }

    return {
      status: 'available',
      result: {
        author_backend_id: synthesizer,
        text: response.text.trim(),
        tier,
        candidate_labels: candidates.map((c) => c.label),
      },
    };
  }

  private async stage4(scope: RunScope, final: FinalAnswer, labels: LabelMap): Promise<JudgeOutcome> {
    const { config, governor } = this.deps;
    const judgeId = config.roles.judge;
    const response = await governor.complete(
      this.ctx(scope, 'stage4'), judgeId, buildJudgePrompt(scope.query.text, final.text, labels.entries),
      {
        max_tokens: config.generation.judge_max_tokens,
        temperature: 0,
        timeout_ms: config.timeouts.stage4_ms,
        signal: scope.signal,
      },
    );

    if (!response.success) {
      const reason = response.failure?.message ?? 'Judge call failed';
      logger.warn('Pipeline: judge unavailable', { query_id: scope.query.query_id, reason });
      return { status: 'unavailable', reason };
    }
    const verdict = parseVerdict(response.text, judgeId);
    if (!verdict) {
      logger.warn('Pipeline: judge verdict unparseable', { query_id: scope.query.query_id });
      return { status: 'unavailable', reason: 'Judge verdict could not be parsed' };
    }
    return { status: 'available', verdict };
  }

  // -------------------------------------------------------------------------
  // Stage3 inputs
  // -------------------------------------------------------------------------

  /** Cap tool context; summarize it first when it is over the threshold. */
  private async prepareContext(scope: RunScope, context: string): Promise<string> {
    const { config, governor } = this.deps;
    const cap = config.synthesis.context_token_cap;
    if (!needsSummary(context, config.synthesis.summarize_threshold_tokens)) return capContext(context, cap);

    const summary = await governor.complete(this.ctx(scope, 'summarizer'), config.roles.summarizer, buildSummaryPrompt(context), {
      max_tokens: config.generation.summarizer_max_tokens,
      temperature: 0,
      timeout_ms: config.timeouts.summarizer_ms,
      signal: scope.signal,
    });
    if (summary.success && summary.text.trim()) return capContext(summary.text.trim(), cap);

    logger.warn('Pipeline: context summary failed, truncating', {
      query_id: scope.query.query_id,
      reason: summary.failure?.message ?? 'empty summary',
    });
    return capContext(context, cap);
  }

  private async lookupStyle(scope: RunScope): Promise<string | null> {
    if (!this.deps.styleGuide) return null;
    try {
      const style = await this.deps.styleGuide.getStyle(scope.profile.name);
      return style?.trim() ? style.trim() : null;
    } catch (err) {
      logger.warn('Pipeline: style lookup failed', { workspace: scope.profile.name, error: errorMessage(err) });
      return null;
    }
  }
}
