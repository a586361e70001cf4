/**
 * Backend Registry — profiles and prices for every callable backend.
 *
 * API keys are checked LIVE on every call (not cached), so adding a key
 * to the process environment makes that provider available without a
 * restart. Prices are USD per million tokens.
 */

import type { BackendProfile, ChatMessage, ProviderName } from '../types/index.js';

const SEED_BACKENDS: BackendProfile[] = [
  {
    backend_id: 'openai/gpt-5.1',
    provider: 'openrouter',
    api_model_id: 'openai/gpt-5.1',
    display_name: 'GPT-5.1',
    cost_input_per_mtok: 2.5,
    cost_output_per_mtok: 10,
    general_purpose: true,
    low_cost: false,
  },
  {
    backend_id: 'google/gemini-3-pro-preview',
    provider: 'openrouter',
    api_model_id: 'google/gemini-3-pro-preview',
    display_name: 'Gemini 3 Pro',
    cost_input_per_mtok: 1.25,
    cost_output_per_mtok: 5,
    general_purpose: true,
    low_cost: false,
  },
  {
    backend_id: 'anthropic/claude-sonnet-4.5',
    provider: 'openrouter',
    api_model_id: 'anthropic/claude-sonnet-4.5',
    display_name: 'Claude Sonnet 4.5',
    cost_input_per_mtok: 3,
    cost_output_per_mtok: 15,
    general_purpose: true,
    low_cost: false,
  },
  {
    backend_id: 'x-ai/grok-4',
    provider: 'openrouter',
    api_model_id: 'x-ai/grok-4',
    display_name: 'Grok 4',
    cost_input_per_mtok: 2,
    cost_output_per_mtok: 8,
    general_purpose: true,
    low_cost: false,
  },
  {
    backend_id: 'google/gemini-2.5-flash',
    provider: 'openrouter',
    api_model_id: 'google/gemini-2.5-flash',
    display_name: 'Gemini 2.5 Flash',
    cost_input_per_mtok: 0.075,
    cost_output_per_mtok: 0.3,
    general_purpose: false,
    low_cost: true,
  },
];

/** Flat rate for ids the registry does not know: $0.001 per 1K tokens. */
const FALLBACK_PER_MTOK = 1;

const ENV_KEYS: Record<ProviderName, string> = {
  openrouter: 'OPENROUTER_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
};

// ---------------------------------------------------------------------------
// Live key detection, checked on every call
// ---------------------------------------------------------------------------

export function getApiKey(provider: ProviderName): string | null {
  const val = process.env[ENV_KEYS[provider]];
  return (typeof val === 'string' && val.length > 0) ? val : null;
}

export function envKeyName(provider: ProviderName): string {
  return ENV_KEYS[provider];
}

/** Rough token count for size thresholds: four characters per token. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/** Role markers and separators around each message. */
const MESSAGE_OVERHEAD_TOKENS = 4;
/** Tokens that prime the assistant reply. */
const REPLY_PRIMING_TOKENS = 3;

/**
 * Upper bound on the prompt tokens a provider can bill for `messages`.
 * Every token encodes at least one UTF-8 byte.
 */
export function promptTokenBound(messages: ChatMessage[]): number {
  return messages.reduce(
    (n, m) => n + Buffer.byteLength(m.content, 'utf8') + MESSAGE_OVERHEAD_TOKENS,
    REPLY_PRIMING_TOKENS,
  );
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class BackendRegistry {
  private backends = new Map<string, BackendProfile>();

  /** Extra profiles replace seeds with the same id. */
  constructor(extra: BackendProfile[] = []) {
    for (const b of [...SEED_BACKENDS, ...extra]) this.backends.set(b.backend_id, { ...b });
  }

  get(id: string): BackendProfile | null {
    return this.backends.get(id) ?? null;
  }

  has(id: string): boolean {
    return this.backends.has(id);
  }

  list(): BackendProfile[] {
    return [...this.backends.values()];
  }

  generalPurpose(): string[] {
    return this.list().filter((b) => b.general_purpose).map((b) => b.backend_id);
  }

  cost(id: string, promptTokens: number, completionTokens: number): number {
    const b = this.get(id);
    const inRate = b?.cost_input_per_mtok ?? FALLBACK_PER_MTOK;
    const outRate = b?.cost_output_per_mtok ?? FALLBACK_PER_MTOK;
    return (promptTokens * inRate + completionTokens * outRate) / 1_000_000;
  }

  /** Worst case: the prompt bound at input price plus the full completion allowance at output price. */
  estimate(id: string, promptTokens: number, maxCompletionTokens: number): number {
    return this.cost(id, promptTokens, maxCompletionTokens);
  }

  summary(): Array<BackendProfile & { available: boolean }> {
    return this.list().map((b) => ({ ...b, available: getApiKey(b.provider) !== null }));
  }
}
