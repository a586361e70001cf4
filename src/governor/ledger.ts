/**
 * Cost ledger — append-only record of every priced call, plus the
 * outstanding reservations admitted calls hold while in flight.
 *
 * All mutation here is synchronous: a reservation, its release and the
 * entry append each complete inside one event-loop turn, so concurrent
 * calls always see a consistent balance.
 */

import { randomUUID } from 'node:crypto';
import type { LedgerEntry } from '../types/index.js';

export interface LedgerStore {
  load(): LedgerEntry[];
  append(entry: LedgerEntry): void;
}

export class MemoryLedgerStore implements LedgerStore {
  private entries: LedgerEntry[] = [];

  constructor(seed: LedgerEntry[] = []) {
    this.entries = [...seed];
  }

  load(): LedgerEntry[] {
    return [...this.entries];
  }

  append(entry: LedgerEntry): void {
    this.entries.push(entry);
  }
}

interface Reservation {
  query_id: string;
  day: string;
  amount: number;
}

export class CostLedger {
  private entries: LedgerEntry[] = [];
  private spentByDay = new Map<string, number>();
  private spentByQuery = new Map<string, number>();
  private reservations = new Map<string, Reservation>();

  constructor(private readonly store: LedgerStore) {
    for (const entry of store.load()) this.index(entry);
  }

  /** Persist first, then index: a failed write leaves the in-memory view unchanged. */
  record(entry: LedgerEntry): void {
    this.store.append(entry);
    this.index(entry);
  }

  reserve(queryId: string, day: string, amount: number): string {
    const id = randomUUID();
    this.reservations.set(id, { query_id: queryId, day, amount });
    return id;
  }

  release(reservationId: string): void {
    this.reservations.delete(reservationId);
  }

  spentOnDay(day: string): number {
    return this.spentByDay.get(day) ?? 0;
  }

  spentOnQuery(queryId: string): number {
    return this.spentByQuery.get(queryId) ?? 0;
  }

  reservedOnDay(day: string): number {
    let total = 0;
    for (const r of this.reservations.values()) if (r.day === day) total += r.amount;
    return total;
  }

  reservedOnQuery(queryId: string): number {
    let total = 0;
    for (const r of this.reservations.values()) if (r.query_id === queryId) total += r.amount;
    return total;
  }

  outstanding(): number {
    return this.reservations.size;
  }

  forQuery(queryId: string): LedgerEntry[] {
    return this.entries.filter((e) => e.query_id === queryId);
  }

  forDay(day: string): LedgerEntry[] {
    return this.entries.filter((e) => e.day === day);
  }

  all(): LedgerEntry[] {
    return [...this.entries];
  }

  private index(entry: LedgerEntry): void {
    this.entries.push(entry);
    this.spentByDay.set(entry.day, this.spentOnDay(entry.day) + entry.cost_usd);
    this.spentByQuery.set(entry.query_id, this.spentOnQuery(entry.query_id) + entry.cost_usd);
  }
}
