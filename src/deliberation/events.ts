/**
 * Lifecycle channel — ordered per-query checkpoints pushed to observers.
 *
 * One channel per query. Events carry a monotonic sequence number so
 * consumers can order them even when timestamps collide.
 */

import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import type { LifecycleEvent, LifecycleEventType, LifecycleObserver } from '../types/index.js';

export interface LifecycleChannel {
  readonly query_id: string;
  emit(type: LifecycleEventType, data?: Record<string, unknown>): LifecycleEvent;
  /** Subscribe. Returns an unsubscribe function. */
  on(observer: LifecycleObserver): () => void;
  history(): LifecycleEvent[];
}

export function createLifecycleChannel(
  queryId: string,
  observer?: LifecycleObserver,
  now: () => number = Date.now,
): LifecycleChannel {
  const observers = new Set<LifecycleObserver>();
  if (observer) observers.add(observer);
  const events: LifecycleEvent[] = [];
  let sequence = 0;

  return {
    query_id: queryId,

    emit(type, data = {}) {
      const event: LifecycleEvent = { type, query_id: queryId, sequence: sequence++, timestamp: now(), data };
      events.push(event);
      for (const o of observers) {
        try {
          o(event);
        } catch (err) {
          logger.warn('Events: observer threw', { query_id: queryId, type, error: errorMessage(err) });
        }
      }
      return event;
    },

    on(o) {
      observers.add(o);
      return () => {
        observers.delete(o);
      };
    },

    history() {
      return [...events];
    },
  };
}
