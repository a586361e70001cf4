/**
 * Shared cache store on Redis.
 *
 * Values are JSON with a native EX expiry; Redis evicts by its own policy,
 * so capacity is configured server-side rather than here.
 */

import { Redis } from 'ioredis';
import { logger } from '../logger.js';
import { CachedCompletionSchema, type CacheStore, type CachedCompletion } from './cache.js';

/** The subset of the ioredis client this store calls. */
export interface RedisCacheClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, secondsToken: 'EX', seconds: number): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  scan(cursor: string, patternToken: 'MATCH', pattern: string, countToken: 'COUNT', count: number): Promise<[string, string[]]>;
  quit(): Promise<unknown>;
}

export class RedisCacheStore implements CacheStore {
  readonly kind = 'redis' as const;

  constructor(
    private readonly client: RedisCacheClient,
    private readonly prefix: string,
  ) {}

  async get(key: string): Promise<CachedCompletion | null> {
    const raw = await this.client.get(this.prefix + key);
    if (raw === null) return null;
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      logger.warn('Cache: unreadable Redis entry dropped', { key });
      await this.client.del(this.prefix + key);
      return null;
    }
    const parsed = CachedCompletionSchema.safeParse(decoded);
    if (!parsed.success) {
      logger.warn('Cache: malformed Redis entry dropped', { key });
      await this.client.del(this.prefix + key);
      return null;
    }
    return parsed.data;
  }

  async set(key: string, value: CachedCompletion, ttlSeconds: number): Promise<void> {
    await this.client.set(this.prefix + key, JSON.stringify(value), 'EX', ttlSeconds);
  }

  async clear(): Promise<void> {
    for await (const keys of this.scanKeys()) {
      if (keys.length > 0) await this.client.del(...keys);
    }
  }

  async size(): Promise<number> {
    let total = 0;
    for await (const keys of this.scanKeys()) total += keys.length;
    return total;
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  private async *scanKeys(): AsyncGenerator<string[]> {
    let cursor = '0';
    do {
      const [next, keys] = await this.client.scan(cursor, 'MATCH', `${this.prefix}*`, 'COUNT', 100);
      cursor = next;
      yield keys;
    } while (cursor !== '0');
  }
}

export function createRedisCacheStore(url: string, prefix: string): RedisCacheStore {
  const client = new Redis(url, {
    maxRetriesPerRequest: 2,
    enableReadyCheck: true,
    lazyConnect: true,
  });
  client.on('error', (err: Error) => logger.error('Cache: Redis connection error', { error: err.message }));
  return new RedisCacheStore(client, prefix);
}
