/**
 * Conclave — wires the registry, governor, classifier, tool coordinator and
 * pipeline into one engine and runs queries end to end.
 *
 *   admit → classify → (tools) → stage1 → (rank) → (synthesize) → (judge)
 *
 * Configuration problems surface from createConclave(), before any priced
 * call can happen.
 */

import { randomUUID } from 'node:crypto';
import { logger } from './logger.js';
import { AdmissionDeniedError, ConfigurationError, errorMessage, isConclaveError } from './errors.js';
import type { ConclaveConfig } from './config.js';
import {
  BackendRegistry, ConfigWorkspaceDirectory, DEFAULT_WORKSPACE, HttpModelGateway, IntentClassifier,
  type WorkspaceDirectory,
} from './routing/index.js';
import { MemoryCacheStore, type CacheStore } from './governor/cache.js';
import { createRedisCacheStore, type RedisCacheStore } from './governor/redis-cache.js';
import { CostLedger, MemoryLedgerStore, type LedgerStore } from './governor/ledger.js';
import { CircuitBreaker } from './governor/breaker.js';
import { CostGovernor, type CostReport, type GovernorStats } from './governor/governor.js';
import { ToolCatalog, type ToolCollaborator } from './augmentation/catalog.js';
import { ToolCoordinator } from './augmentation/coordinator.js';
import { createRagSearchTool, type RagCollaborator } from './augmentation/rag.js';
import { DeliberationPipeline } from './deliberation/pipeline.js';
import { createLifecycleChannel } from './deliberation/events.js';
import type { Shuffle } from './deliberation/anonymize.js';
import type { StyleGuide } from './deliberation/synthesis.js';
import {
  JsonlLedgerStore, QueryStore, recordFromFailure, recordFromResult, type QueryRecord,
} from './storage/index.js';
import type {
  BackendProfile, ChatMessage, IntentDecision, LifecycleObserver, ModelGateway,
  PipelineResult, Query, SynthesisTier, WorkspaceProfile,
} from './types/index.js';

export interface ConclaveOptions {
  config: ConclaveConfig;
  /** Defaults to the HTTP gateway over the registry's providers. */
  gateway?: ModelGateway;
  /** Tool implementations keyed by tool id. */
  tools?: Record<string, ToolCollaborator>;
  rag?: RagCollaborator;
  styleGuide?: StyleGuide;
  catalog?: ToolCatalog;
  /** Overrides the store chosen by `config.cache`. */
  cache?: CacheStore;
  /** Overrides the store chosen by `config.storage`. */
  ledgerStore?: LedgerStore;
  /** null disables query records. */
  queryStore?: QueryStore | null;
  shuffle?: Shuffle;
  now?: () => number;
}

export interface AskInput {
  text: string;
  workspace?: string;
  tier?: SynthesisTier;
  high_stakes?: boolean;
  history?: ChatMessage[];
  signal?: AbortSignal;
  observer?: LifecycleObserver;
  extra?: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validate(config: ConclaveConfig, registry: BackendRegistry, hasRag: boolean): void {
  const problems: string[] = [];

  for (const [role, id] of Object.entries(config.roles)) {
    if (!registry.has(id)) problems.push(`roles.${role}: unknown backend "${id}"`);
  }
  for (const [name, ws] of Object.entries(config.workspaces)) {
    for (const [complexity, ids] of Object.entries(ws.backends)) {
      for (const id of ids) {
        if (!registry.has(id)) problems.push(`workspaces.${name}.backends.${complexity}: unknown backend "${id}"`);
      }
    }
    if (config.features.rag && ws.rag_enabled && ws.tools.includes('rag_search') && !hasRag) {
      problems.push(`workspaces.${name}: RAG enabled but no retrieval collaborator supplied`);
    }
  }
  if (config.features.judge && config.roles.judge === config.roles.synthesizer) {
    problems.push(`roles.judge must differ from roles.synthesizer ("${config.roles.synthesizer}")`);
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid engine configuration: ${problems.join('; ')}`, { problems });
  }
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class Conclave {
  readonly registry: BackendRegistry;
  readonly workspaces: WorkspaceDirectory;
  readonly governor: CostGovernor;
  private readonly classifier: IntentClassifier;
  private readonly pipeline: DeliberationPipeline;
  private readonly queries: QueryStore | null;
  private readonly redis: RedisCacheStore | null;
  private readonly now: () => number;

  constructor(readonly config: ConclaveConfig, options: Omit<ConclaveOptions, 'config'> = {}) {
    this.now = options.now ?? Date.now;
    this.registry = new BackendRegistry(config.backends);
    validate(config, this.registry, options.rag !== undefined);

    this.workspaces = new ConfigWorkspaceDirectory(config.workspaces);

    let cache = options.cache;
    this.redis = null;
    if (!cache && config.cache.store === 'redis') {
      if (!config.cache.redis_url) throw new ConfigurationError('cache.store is "redis" but no redis_url is set');
      this.redis = createRedisCacheStore(config.cache.redis_url, config.cache.key_prefix);
      cache = this.redis;
    }

    const ledgerStore = options.ledgerStore
      ?? (config.storage.persist ? new JsonlLedgerStore(config.storage.base_path) : new MemoryLedgerStore());
    const ledger = new CostLedger(ledgerStore);

    this.governor = new CostGovernor({
      gateway: options.gateway ?? new HttpModelGateway(this.registry),
      registry: this.registry,
      ledger,
      breaker: new CircuitBreaker(ledger, config.budgets, this.now),
      cache: cache ?? new MemoryCacheStore(config.cache.max_entries, this.now),
      cacheTtlSeconds: config.cache.ttl_seconds,
      now: this.now,
    });

    const collaborators: Record<string, ToolCollaborator> = { ...options.tools };
    if (options.rag) collaborators.rag_search = createRagSearchTool(options.rag);
    const tools = new ToolCoordinator({
      catalog: options.catalog ?? new ToolCatalog(),
      collaborators,
      governor: this.governor,
      timeouts: { tool_ms: config.timeouts.tool_ms, tools_total_ms: config.timeouts.tools_total_ms },
      rag: config.rag,
      now: this.now,
    });

    this.classifier = new IntentClassifier({
      governor: this.governor,
      registry: this.registry,
      workspaces: this.workspaces,
      config,
      toolAvailable: (toolId) => tools.has(toolId),
    });

    this.pipeline = new DeliberationPipeline({
      governor: this.governor,
      workspaces: this.workspaces,
      config,
      tools,
      styleGuide: options.styleGuide,
      shuffle: options.shuffle,
      now: this.now,
    });

    this.queries = options.queryStore !== undefined
      ? options.queryStore
      : config.storage.persist ? new QueryStore(config.storage.base_path) : null;
  }

  /** Run one query through admission, classification and the pipeline. */
  async ask(input: AskInput): Promise<PipelineResult> {
    const started = this.now();
    const profile = this.workspaces.profile(input.workspace ?? DEFAULT_WORKSPACE);
    const query: Query = {
      query_id: randomUUID(),
      text: input.text,
      workspace: profile.name,
      submitted_at: new Date(this.now()).toISOString(),
    };
    const channel = createLifecycleChannel(query.query_id, input.observer, this.now);
    let intent: IntentDecision | null = null;

    try {
      const admission = this.governor.admitQuery();
      if (!admission.admitted) {
        const err = new AdmissionDeniedError(admission.scope, admission.snapshot);
        channel.emit('error', { state: 'INIT', code: err.code, message: err.message, details: err.details });
        logger.warn('Conclave: query refused', { query_id: query.query_id, scope: admission.scope });
        throw err;
      }

      intent = await this.classifier.classify(query, input.history ?? [], input.signal);
      channel.emit('intent_decided', { ...intent });
      logger.debug('Conclave: intent decided', {
        query_id: query.query_id,
        complexity: intent.complexity,
        workflow: intent.workflow,
        backends: intent.backends,
      });

      const result = await this.pipeline.run(query, intent, channel, {
        tier: input.tier,
        high_stakes: input.high_stakes,
        signal: input.signal,
        extra: input.extra,
      });
      this.persist(recordFromResult(result));
      return result;
    } catch (err) {
      // The pipeline reports its own failures; anything earlier is reported here.
      if (!channel.history().some((e) => e.type === 'error')) {
        channel.emit('error', {
          state: 'INIT',
          code: isConclaveError(err) ? err.code : 'INTERNAL',
          message: errorMessage(err),
        });
      }
      this.persist(recordFromFailure({
        query_id: query.query_id,
        text: query.text,
        workspace: query.workspace,
        submitted_at: query.submitted_at,
        intent,
        total_cost_usd: this.governor.costSummary(query.query_id).total_cost_usd,
        latency_ms: this.now() - started,
        error: { code: isConclaveError(err) ? err.code : 'INTERNAL', message: errorMessage(err) },
      }));
      throw err;
    } finally {
      this.governor.endQuery(query.query_id);
    }
  }

  /** Classification only; runs no pipeline stage. */
  async classify(text: string, workspace = DEFAULT_WORKSPACE, history: ChatMessage[] = []): Promise<IntentDecision> {
    const profile = this.workspaces.profile(workspace);
    const query: Query = {
      query_id: randomUUID(),
      text,
      workspace: profile.name,
      submitted_at: new Date(this.now()).toISOString(),
    };
    try {
      return await this.classifier.classify(query, history);
    } finally {
      this.governor.endQuery(query.query_id);
    }
  }

  costReport(days = 7): CostReport {
    return this.governor.costReport(days);
  }

  stats(): Promise<GovernorStats> {
    return this.governor.stats();
  }

  getQuery(queryId: string): QueryRecord | null {
    return this.queries?.get(queryId) ?? null;
  }

  listQueries(limit = 20, workspace?: string): QueryRecord[] {
    return this.queries?.list(limit, workspace) ?? [];
  }

  backends(): Array<BackendProfile & { available: boolean }> {
    return this.registry.summary();
  }

  workspaceProfiles(): WorkspaceProfile[] {
    return this.workspaces.list();
  }

  async close(): Promise<void> {
    if (this.redis) await this.redis.close();
  }

  private persist(record: QueryRecord): void {
    if (!this.queries) return;
    try {
      this.queries.save(record);
    } catch (err) {
      logger.error('Conclave: could not save query record', { query_id: record.query_id, error: errorMessage(err) });
    }
  }
}

export function createConclave(options: ConclaveOptions): Conclave {
  const { config, ...rest } = options;
  return new Conclave(config, rest);
}
