/**
 * Typed JSON file store.
 *
 * Each collection is a directory. Each record is a JSON file named by its ID.
 * Records are validated on read; files that fail to parse are skipped.
 */

import { mkdirSync, writeFileSync, readFileSync, existsSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';

export type RecordParser<T> = (raw: unknown) => T;

export class JsonStore<T> {
  private dir: string;

  constructor(
    baseDir: string,
    collection: string,
    private readonly idOf: (item: T) => string,
    private readonly parse: RecordParser<T>,
  ) {
    this.dir = join(baseDir, collection);
    mkdirSync(this.dir, { recursive: true });
  }

  private filePath(id: string): string {
    const safe = id.replace(/[^a-zA-Z0-9_-]/g, '_');
    return join(this.dir, `${safe}.json`);
  }

  private read(path: string): T | null {
    try {
      return this.parse(JSON.parse(readFileSync(path, 'utf-8')));
    } catch (err) {
      logger.warn('Store: skipping unreadable record', { path, error: errorMessage(err) });
      return null;
    }
  }

  get(id: string): T | null {
    const p = this.filePath(id);
    if (!existsSync(p)) return null;
    return this.read(p);
  }

  list(filter?: (item: T) => boolean): T[] {
    if (!existsSync(this.dir)) return [];
    const items: T[] = [];
    for (const f of readdirSync(this.dir).filter((name) => name.endsWith('.json'))) {
      const item = this.read(join(this.dir, f));
      if (item !== null && (!filter || filter(item))) items.push(item);
    }
    return items;
  }

  upsert(item: T): void {
    writeFileSync(this.filePath(this.idOf(item)), JSON.stringify(item, null, 2));
  }
}
