/**
 * Circuit breaker — pre-flight budget admission.
 *
 * Decisions are derived live from the ledger plus outstanding reservations.
 * A call is admitted only if its worst-case estimate fits under both the
 * per-query and the daily limit; admission reserves the estimate in the same
 * synchronous step so concurrent calls cannot jointly overshoot.
 */

import type { ConclaveConfig } from '../config.js';
import type { BudgetScope, BudgetSnapshot } from '../types/index.js';
import type { CostLedger } from './ledger.js';

export interface Denial {
  admitted: false;
  scope: BudgetScope;
  snapshot: BudgetSnapshot;
}

export type Admission = { admitted: true; reservation_id: string; day: string } | Denial;
export type QueryAdmission = { admitted: true } | Denial;

const HOUR_MS = 3_600_000;

export class CircuitBreaker {
  constructor(
    private readonly ledger: CostLedger,
    private readonly budgets: ConclaveConfig['budgets'],
    private readonly now: () => number = Date.now,
  ) {}

  /** Budget day (YYYY-MM-DD); a new day starts at `reset_hour_utc`. */
  dayKey(at: number = this.now()): string {
    return new Date(at - this.budgets.reset_hour_utc * HOUR_MS).toISOString().slice(0, 10);
  }

  /** Spend so far, plus `pending` for a call about to be recorded. */
  snapshot(queryId: string, pending = 0): BudgetSnapshot[] {
    const day = this.dayKey();
    const querySpent = this.ledger.spentOnQuery(queryId) + pending;
    const daySpent = this.ledger.spentOnDay(day) + pending;
    return [
      snap('query', queryId, querySpent, this.budgets.query_limit_usd),
      snap('day', day, daySpent, this.budgets.daily_limit_usd),
    ];
  }

  daySnapshot(at: number = this.now()): BudgetSnapshot {
    const day = this.dayKey(at);
    return snap('day', day, this.ledger.spentOnDay(day), this.budgets.daily_limit_usd);
  }

  admit(queryId: string, estimate: number): Admission {
    const day = this.dayKey();

    const queryCommitted = this.ledger.spentOnQuery(queryId) + this.ledger.reservedOnQuery(queryId);
    if (queryCommitted + estimate > this.budgets.query_limit_usd) {
      return { admitted: false, scope: 'query', snapshot: snap('query', queryId, queryCommitted, this.budgets.query_limit_usd) };
    }

    const dayCommitted = this.ledger.spentOnDay(day) + this.ledger.reservedOnDay(day);
    if (dayCommitted + estimate > this.budgets.daily_limit_usd) {
      return { admitted: false, scope: 'day', snapshot: snap('day', day, dayCommitted, this.budgets.daily_limit_usd) };
    }

    return { admitted: true, reservation_id: this.ledger.reserve(queryId, day, estimate), day };
  }

  release(reservationId: string): void {
    this.ledger.release(reservationId);
  }

  /** Whole-query gate: refuse new work once the day has no budget left. */
  admitQuery(): QueryAdmission {
    const day = this.dayKey();
    const committed = this.ledger.spentOnDay(day) + this.ledger.reservedOnDay(day);
    if (committed >= this.budgets.daily_limit_usd) {
      return { admitted: false, scope: 'day', snapshot: snap('day', day, committed, this.budgets.daily_limit_usd) };
    }
    return { admitted: true };
  }
}

function snap(scope: BudgetScope, key: string, amount: number, limit: number): BudgetSnapshot {
  return { scope, key, amount, limit, remaining: Math.max(0, limit - amount) };
}
