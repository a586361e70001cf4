/**
 * Abort and deadline helpers shared by the governor, the tool coordinator
 * and the pipeline stages.
 */

export class DeadlineExceeded extends Error {
  constructor(message = 'Deadline exceeded') {
    super(message);
    this.name = 'DeadlineExceeded';
  }
}

export interface BoundedSignal {
  readonly signal: AbortSignal;
  /** True once the local timeout (not the parent) caused the abort. */
  readonly timedOut: boolean;
  dispose(): void;
}

/**
 * A signal that aborts when the parent aborts or when `timeoutMs` elapses,
 * whichever comes first. Call dispose() once the guarded work settles.
 */
export function boundedSignal(timeoutMs: number | undefined, parent?: AbortSignal): BoundedSignal {
  const controller = new AbortController();
  let timedOut = false;

  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) controller.abort(parent.reason);
  else parent?.addEventListener('abort', onParentAbort, { once: true });

  const timer = timeoutMs === undefined ? undefined : setTimeout(() => {
    timedOut = true;
    controller.abort(new DeadlineExceeded(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  return {
    signal: controller.signal,
    get timedOut() { return timedOut; },
    dispose() {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

export type Raced<T> = { aborted: false; value: T } | { aborted: true };

/**
 * Settle with the promise's value, or with `{ aborted: true }` as soon as the
 * signal aborts. The promise keeps its handlers, so a late rejection is absorbed.
 */
export function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<Raced<T>> {
  return new Promise<Raced<T>>((resolve, reject) => {
    const onAbort = (): void => resolve({ aborted: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve({ aborted: false, value });
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });
  });
}

export type Collected<T> = { status: 'settled'; value: T } | { status: 'late' };

export interface CollectOptions<T> {
  signal?: AbortSignal;
  /** Called once per task that settles before the deadline, in arrival order. */
  onSettled?: (value: T, index: number) => void;
}

/**
 * Start every task at once and wait until all settle or the deadline passes.
 * Outstanding tasks are aborted at the deadline and reported as `late`; their
 * eventual values are never returned. Results keep task order.
 */
export function collectWithin<T>(
  tasks: Array<(signal: AbortSignal) => Promise<T>>,
  deadlineMs: number,
  options: CollectOptions<T> = {},
): Promise<Collected<T>[]> {
  const results: Collected<T>[] = tasks.map(() => ({ status: 'late' }));
  if (tasks.length === 0) return Promise.resolve(results);

  const bounded = boundedSignal(deadlineMs, options.signal);
  if (bounded.signal.aborted) {
    bounded.dispose();
    return Promise.resolve(results);
  }
  let remaining = tasks.length;
  let open = true;

  return new Promise<Collected<T>[]>((resolve, reject) => {
    const close = (): void => {
      if (!open) return;
      open = false;
      bounded.dispose();
      resolve(results);
    };

    bounded.signal.addEventListener('abort', close, { once: true });

    tasks.forEach((task, index) => {
      let started: Promise<T>;
      try {
        started = task(bounded.signal);
      } catch (err) {
        started = Promise.reject(err);
      }
      started.then(
        (value) => {
          if (!open) return;
          results[index] = { status: 'settled', value };
          options.onSettled?.(value, index);
          remaining--;
          if (remaining === 0) close();
        },
        (err: unknown) => {
          if (!open) return;
          open = false;
          bounded.dispose();
          reject(err);
        },
      );
    });
  });
}
