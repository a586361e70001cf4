/**
 * HTTP Model Gateway — thin provider wrappers over Node 20 native fetch.
 *
 * Supports: OpenRouter, Anthropic, OpenAI. Never throws for call-level
 * problems; every failure comes back typed so the governor can record it.
 */

import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { getApiKey, envKeyName, promptTokenBound, type BackendRegistry } from './models.js';
import type {
  ChatMessage, CompletionParams, FailureKind, GatewayResult, ModelGateway,
} from '../types/index.js';

const DEFAULT_TIMEOUT_MS = 120_000;
const DEFAULT_MAX_TOKENS = 1024;

const OpenAIStyleResponse = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })).min(1),
  usage: z.object({ prompt_tokens: z.number(), completion_tokens: z.number() }).optional(),
});

const AnthropicResponse = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }),
});

interface Usage {
  prompt_tokens: number;
  completion_tokens: number;
}

interface Endpoint {
  url: string;
  headers(key: string): Record<string, string>;
  body(model: string, messages: ChatMessage[], maxTokens: number, temperature: number): unknown;
  /** `usage` is null when the provider omitted token counts. */
  parse(data: unknown): { text: string; usage: Usage | null } | null;
}

// ---------------------------------------------------------------------------
// Chat Completions (OpenRouter and OpenAI share the wire shape)
// ---------------------------------------------------------------------------

function chatCompletions(url: string, extraHeaders: Record<string, string> = {}): Endpoint {
  return {
    url,
    headers: (key) => ({ 'Authorization': `Bearer ${key}`, 'Content-Type': 'application/json', ...extraHeaders }),
    body: (model, messages, maxTokens, temperature) => ({ model, messages, max_tokens: maxTokens, temperature }),
    parse(data) {
      const r = OpenAIStyleResponse.safeParse(data);
      if (!r.success) return null;
      return {
        text: r.data.choices[0]?.message.content ?? '',
        usage: r.data.usage ?? null,
      };
    },
  };
}

// ---------------------------------------------------------------------------
// Anthropic Messages API
// ---------------------------------------------------------------------------

const anthropic: Endpoint = {
  url: 'https://api.anthropic.com/v1/messages',
  headers: (key) => ({ 'x-api-key': key, 'anthropic-version': '2023-06-01', 'content-type': 'application/json' }),
  body(model, messages, maxTokens, temperature) {
    const system = messages.filter((m) => m.role === 'system').map((m) => m.content).join('\n\n');
    const body: Record<string, unknown> = {
      model,
      max_tokens: maxTokens,
      temperature,
      messages: messages.filter((m) => m.role !== 'system'),
    };
    if (system) body.system = system;
    return body;
  },
  parse(data) {
    const r = AnthropicResponse.safeParse(data);
    if (!r.success) return null;
    return {
      text: r.data.content.map((c) => c.text ?? '').join(''),
      usage: { prompt_tokens: r.data.usage.input_tokens, completion_tokens: r.data.usage.output_tokens },
    };
  },
};

const ENDPOINTS = {
  openrouter: chatCompletions('https://openrouter.ai/api/v1/chat/completions', { 'X-Title': 'model-conclave' }),
  openai: chatCompletions('https://api.openai.com/v1/chat/completions'),
  anthropic,
};

// ---------------------------------------------------------------------------
// Gateway
// ---------------------------------------------------------------------------

export class HttpModelGateway implements ModelGateway {
  constructor(
    private readonly registry: BackendRegistry,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async complete(backendId: string, messages: ChatMessage[], params: CompletionParams): Promise<GatewayResult> {
    const profile = this.registry.get(backendId);
    if (!profile) return fail('provider_error', `Unknown backend ${backendId}`, 0);

    const key = getApiKey(profile.provider);
    if (!key) return fail('provider_error', `No API key for ${profile.provider}. Set ${envKeyName(profile.provider)}.`, 0);

    const endpoint = ENDPOINTS[profile.provider];
    const start = Date.now();
    const timeoutMs = params.timeout_ms ?? DEFAULT_TIMEOUT_MS;
    const maxTokens = params.max_tokens ?? DEFAULT_MAX_TOKENS;

    let resp: Response;
    try {
      resp = await fetchWithTimeout(this.fetchImpl, endpoint.url, {
        method: 'POST',
        headers: endpoint.headers(key),
        body: JSON.stringify(endpoint.body(profile.api_model_id, messages, maxTokens, params.temperature ?? 0.7)),
      }, timeoutMs, params.signal);
    } catch (err) {
      const kind: FailureKind = params.signal?.aborted ? 'aborted' : isAbort(err) ? 'timeout' : 'network';
      return fail(kind, errorMessage(err), Date.now() - start);
    }

    if (!resp.ok) {
      const detail = await resp.text().catch((err: unknown) => errorMessage(err));
      return fail('provider_error', `${profile.provider} ${resp.status}: ${detail.slice(0, 500)}`, Date.now() - start);
    }

    let data: unknown;
    try {
      data = await resp.json();
    } catch (err) {
      return fail('invalid_response', `Response body is not JSON: ${errorMessage(err)}`, Date.now() - start);
    }

    const parsed = endpoint.parse(data);
    if (!parsed) return fail('invalid_response', `Unexpected ${profile.provider} response shape`, Date.now() - start);

    // Without reported usage, bill the admission worst case rather than nothing.
    const usage = parsed.usage ?? { prompt_tokens: promptTokenBound(messages), completion_tokens: maxTokens };
    return { ok: true, text: parsed.text, ...usage, latency_ms: Date.now() - start };
  }
}

// ---------------------------------------------------------------------------
// Fetch helper with timeout
// ---------------------------------------------------------------------------

async function fetchWithTimeout(
  fetchImpl: typeof fetch, url: string, init: RequestInit, timeoutMs: number, parent?: AbortSignal,
): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = (): void => controller.abort();
  if (parent?.aborted) controller.abort();
  else parent?.addEventListener('abort', onAbort, { once: true });
  try {
    return await fetchImpl(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onAbort);
  }
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

function fail(kind: FailureKind, message: string, latency: number): GatewayResult {
  return { ok: false, kind, message, latency_ms: latency };
}
