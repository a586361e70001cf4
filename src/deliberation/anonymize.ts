/**
 * Per-query anonymization of Stage1 survivors.
 *
 * Labels are assigned after a fresh shuffle so that label order carries no
 * information about which backend wrote which answer.
 */

import { randomInt } from 'node:crypto';
import type { ModelResponse } from '../types/index.js';

export type Shuffle = <T>(items: readonly T[]) => T[];

/** Fisher-Yates over a CSPRNG. */
export const cryptoShuffle: Shuffle = (items) => {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = randomInt(i + 1);
    const tmp = out[i];
    out[i] = out[j];
    out[j] = tmp;
  }
  return out;
};

export interface LabeledResponse {
  label: string;
  response: ModelResponse;
}

export interface LabelMap {
  /** Sorted by label. */
  readonly entries: LabeledResponse[];
  readonly labels: string[];
  labelOf(backendId: string): string | undefined;
}

export function labelFor(index: number): string {
  return `Response ${String.fromCharCode(65 + index)}`;
}

export function anonymize(survivors: ModelResponse[], shuffle: Shuffle = cryptoShuffle): LabelMap {
  const entries = shuffle(survivors).map((response, i) => ({ label: labelFor(i), response }));
  const byBackend = new Map(entries.map((e) => [e.response.backend_id, e.label]));
  return {
    entries,
    labels: entries.map((e) => e.label),
    labelOf: (backendId) => byBackend.get(backendId),
  };
}
