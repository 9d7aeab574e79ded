/**
 * Bounded-concurrency gate (counting semaphore) with a FIFO wait queue.
 * Slots are handed directly to the next waiter on release.
 */

import { abortError, GateQueueFullError } from '../errors.js';

export type Release = () => void;

export type Gate = {
  acquire(signal?: AbortSignal): Promise<Release>;
  run<T>(fn: () => Promise<T> | T, signal?: AbortSignal): Promise<T>;
  readonly limit: number;
  readonly active: number;
  readonly pending: number;
};

export type GateOptions = {
  /** Waiters allowed beyond the active slots; unbounded when omitted */
  queueLimit?: number;
};

type Waiter = {
  grant: () => void;
  cancel: () => void;
};

export function createGate(limit: number, options: GateOptions = {}): Gate {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Gate limit must be a positive integer, got ${limit}`);
  }

  const queue: Waiter[] = [];
  let active = 0;

  const makeRelease = (): Release => {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = queue.shift();
      if (next) {
        // Slot passes straight to the next waiter
        next.grant();
      } else {
        active--;
      }
    };
  };

  const acquire = (signal?: AbortSignal): Promise<Release> => {
    if (signal?.aborted) {
      return Promise.reject(abortError(signal));
    }
    if (active < limit) {
      active++;
      return Promise.resolve(makeRelease());
    }
    if (options.queueLimit !== undefined && queue.length >= options.queueLimit) {
      return Promise.reject(new GateQueueFullError(options.queueLimit));
    }

    return new Promise<Release>((resolve, reject) => {
      const onAbort = (): void => waiter.cancel();
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve(makeRelease());
        },
        cancel: () => {
          const index = queue.indexOf(waiter);
          if (index >= 0) queue.splice(index, 1);
          if (signal) reject(abortError(signal));
        }
      };
      queue.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  };

  const run = async <T>(fn: () => Promise<T> | T, signal?: AbortSignal): Promise<T> => {
    const release = await acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  };

  return {
    acquire,
    run,
    limit,
    get active() {
      return active;
    },
    get pending() {
      return queue.length;
    }
  };
}
