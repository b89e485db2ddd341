/**
 * @module utils/clock
 * Injectable time source. Retry backoff and job polling sleep through a
 * Clock so tests can advance time without real delays.
 */

import { CancelledError } from '../errors.js';

export interface Clock {
  /** Milliseconds since an arbitrary epoch. */
  now(): number;
  /** Resolve after `ms`, or reject with CancelledError when `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/** Abortable sleep. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) return reject(cancelled(signal));
    const onAbort = () => {
      clearTimeout(timer);
      reject(cancelled(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function cancelled(signal?: AbortSignal): CancelledError {
  const reason: unknown = signal?.reason;
  if (reason instanceof CancelledError) return reason;
  return new CancelledError('Run cancelled', reason);
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

/** Throw CancelledError if `signal` has already fired. */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw cancelled(signal);
}
