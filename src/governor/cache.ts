/**
 * Response cache for priced calls.
 *
 * Keys are the SHA-256 of the backend id plus the fully resolved message
 * list, so identical prompts to different backends never collide. Stores
 * are async so a shared Redis store can sit behind the same interface.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import type { ChatMessage } from '../types/index.js';

export const CachedCompletionSchema = z.object({
  text: z.string(),
  prompt_tokens: z.number().int().nonnegative(),
  completion_tokens: z.number().int().nonnegative(),
});

export type CachedCompletion = z.infer<typeof CachedCompletionSchema>;

export interface CacheStore {
  readonly kind: 'memory' | 'redis';
  get(key: string): Promise<CachedCompletion | null>;
  set(key: string, value: CachedCompletion, ttlSeconds: number): Promise<void>;
  clear(): Promise<void>;
  size(): Promise<number>;
}

export function cacheKey(backendId: string, messages: ChatMessage[]): string {
  const canonical = messages.map((m) => ({ role: m.role, content: m.content }));
  return createHash('sha256').update(`${backendId}:${JSON.stringify(canonical)}`).digest('hex');
}

// ---------------------------------------------------------------------------
// In-process store
// ---------------------------------------------------------------------------

interface Slot {
  value: CachedCompletion;
  expires_at: number;
}

/**
 * Bounded map with TTL expiry and LRU eviction. Map iteration order is
 * insertion order, so a read re-inserts the slot to mark it recent.
 */
export class MemoryCacheStore implements CacheStore {
  readonly kind = 'memory' as const;
  private slots = new Map<string, Slot>();

  constructor(
    private readonly maxEntries: number,
    private readonly now: () => number = Date.now,
  ) {}

  async get(key: string): Promise<CachedCompletion | null> {
    const slot = this.slots.get(key);
    if (!slot) return null;
    this.slots.delete(key);
    if (slot.expires_at <= this.now()) return null;
    this.slots.set(key, slot);
    return { ...slot.value };
  }

  async set(key: string, value: CachedCompletion, ttlSeconds: number): Promise<void> {
    this.slots.delete(key);
    this.slots.set(key, { value: { ...value }, expires_at: this.now() + ttlSeconds * 1000 });
    while (this.slots.size > this.maxEntries) {
      const oldest = this.slots.keys().next();
      if (oldest.done) break;
      this.slots.delete(oldest.value);
    }
  }

  async clear(): Promise<void> {
    this.slots.clear();
  }

  async size(): Promise<number> {
    const now = this.now();
    for (const [key, slot] of this.slots) {
      if (slot.expires_at <= now) this.slots.delete(key);
    }
    return this.slots.size;
  }
}
