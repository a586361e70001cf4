/**
 * Append-only cost ledger on disk: one JSONL line per priced call.
 * Hash-chained for tamper evidence; reloaded on start so the daily budget
 * survives restarts.
 */

import { appendFileSync, mkdirSync, existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { createHash } from 'node:crypto';
import { z } from 'zod';
import { logger } from '../logger.js';
import type { LedgerStore } from '../governor/ledger.js';
import type { LedgerEntry } from '../types/index.js';

const GENESIS = '0'.repeat(64);

const BudgetSnapshotSchema = z.object({
  scope: z.enum(['query', 'day']),
  key: z.string(),
  amount: z.number(),
  limit: z.number(),
  remaining: z.number(),
});

export const LedgerEntrySchema = z.object({
  entry_id: z.string(),
  query_id: z.string(),
  workspace: z.string(),
  stage: z.enum(['classifier', 'tool', 'stage1', 'stage2', 'stage3', 'stage4', 'summarizer']),
  backend_id: z.string(),
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  latency_ms: z.number(),
  cost_usd: z.number(),
  success: z.boolean(),
  failure_kind: z.enum([
    'timeout', 'provider_error', 'network', 'aborted', 'invalid_response', 'admission_denied', 'deadline',
  ]).optional(),
  error_message: z.string().optional(),
  day: z.string(),
  timestamp: z.string(),
  budgets: z.array(BudgetSnapshotSchema),
});

const LineSchema = LedgerEntrySchema.extend({ h: z.string().length(64) });

function chain(entry: LedgerEntry, prev: string): string {
  return createHash('sha256').update(JSON.stringify(entry) + prev).digest('hex');
}

function stripHash(line: z.infer<typeof LineSchema>): LedgerEntry {
  const { h: _h, ...entry } = line;
  return entry;
}

export interface LedgerVerification {
  valid: boolean;
  entries: number;
  /** 1-based line of the first broken link. */
  broken_at?: number;
}

export class JsonlLedgerStore implements LedgerStore {
  private readonly file: string;
  private lastHash = GENESIS;

  constructor(baseDir: string, fileName = 'ledger.jsonl') {
    this.file = join(baseDir, 'ledger', fileName);
    mkdirSync(dirname(this.file), { recursive: true });
  }

  get path(): string {
    return this.file;
  }

  load(): LedgerEntry[] {
    const integrity = this.verify();
    if (!integrity.valid) {
      logger.error('Ledger: hash chain broken', { file: this.file, broken_at: integrity.broken_at, intact_entries: integrity.entries });
    }
    const entries: LedgerEntry[] = [];
    for (const [index, raw] of this.lines().entries()) {
      const parsed = this.parseLine(raw);
      if (!parsed) {
        logger.warn('Ledger: skipping corrupt line', { file: this.file, line: index + 1 });
        continue;
      }
      entries.push(stripHash(parsed));
      this.lastHash = parsed.h;
    }
    return entries;
  }

  append(entry: LedgerEntry): void {
    // Hash the schema-ordered form so verify() reproduces it from the parsed line.
    const normalized = LedgerEntrySchema.parse(entry);
    const h = chain(normalized, this.lastHash);
    appendFileSync(this.file, JSON.stringify({ ...normalized, h }) + '\n');
    this.lastHash = h;
  }

  /** Walk the chain from the genesis hash. */
  verify(): LedgerVerification {
    let prev = GENESIS;
    const lines = this.lines();
    for (const [index, raw] of lines.entries()) {
      const parsed = this.parseLine(raw);
      if (!parsed || chain(stripHash(parsed), prev) !== parsed.h) {
        return { valid: false, entries: index, broken_at: index + 1 };
      }
      prev = parsed.h;
    }
    return { valid: true, entries: lines.length };
  }

  private lines(): string[] {
    if (!existsSync(this.file)) return [];
    return readFileSync(this.file, 'utf-8').split('\n').filter((l) => l.trim().length > 0);
  }

  private parseLine(raw: string): z.infer<typeof LineSchema> | null {
    try {
      const result = LineSchema.safeParse(JSON.parse(raw));
      return result.success ? result.data : null;
    } catch {
      return null;
    }
  }
}
