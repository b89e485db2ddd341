/**
 * @module retry
 * RetryExecutor: bounded exponential backoff around a fallible operation.
 *
 * Fatal errors abort on the spot; transient errors wait
 * `baseDelayMs * multiplier^retryIndex` and try again. Policies are frozen
 * values built per call site; attempt counters live inside `execute`, so
 * one executor can serve any number of concurrent runs.
 */

import type { Logger } from './context.js';
import type { RetryConfig } from './config.js';
import { CancelledError, RetryExhaustedError, isTransient, messageOf, toError } from './errors.js';
import { systemClock, throwIfAborted, type Clock } from './utils/clock.js';

// ---------------------------------------------------------------------------
// Retry policy
// ---------------------------------------------------------------------------

export interface RetryPolicy {
  /** Maximum number of attempts (1 = no retry). */
  readonly maxAttempts: number;
  /** Delay before the first retry, in ms. */
  readonly baseDelayMs: number;
  /** Factor applied to the delay on each further retry. */
  readonly multiplier: number;
  /** Returns true when the error is worth another attempt. */
  readonly isRetryable: (err: unknown) => boolean;
}

const DEFAULT_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  multiplier: 2,
  isRetryable: isTransient,
};

/** Build an immutable policy from defaults, a config block, and overrides. */
export function retryPolicy(
  overrides: Partial<RetryPolicy> | RetryConfig = {},
): RetryPolicy {
  const policy = { ...DEFAULT_POLICY, ...overrides };
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${policy.maxAttempts}`);
  }
  return Object.freeze(policy);
}

/** Delay before retry number `retryIndex` (0 for the first retry). */
export function backoffDelay(policy: RetryPolicy, retryIndex: number): number {
  return policy.baseDelayMs * Math.pow(policy.multiplier, retryIndex);
}

// ---------------------------------------------------------------------------
// Executor
// ---------------------------------------------------------------------------

export interface RetryInfo {
  /** 1-based attempt that just failed. */
  attempt: number;
  delayMs: number;
  error: Error;
}

export interface ExecuteOptions {
  /** Human-readable name used in logs and the exhaustion message. */
  label: string;
  signal?: AbortSignal;
  /** Called before each backoff delay. */
  onRetry?: (info: RetryInfo) => void;
}

export class RetryExecutor {
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(deps: { logger: Logger; clock?: Clock }) {
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Run `operation` until it succeeds, fails fatally, or runs out of attempts.
   * Fatal errors are rethrown unchanged; exhaustion raises RetryExhaustedError
   * wrapping the last cause.
   */
  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    opts: ExecuteOptions,
  ): Promise<T> {
    const { label, signal, onRetry } = opts;
    let lastError: unknown;

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
      throwIfAborted(signal);
      this.logger.debug(`${label}: attempt ${attempt}/${policy.maxAttempts}`);

      try {
        return await operation(attempt);
      } catch (err) {
        if (err instanceof CancelledError || signal?.aborted) {
          throw err instanceof CancelledError ? err : new CancelledError(`${label} cancelled`, err);
        }
        if (!policy.isRetryable(err)) {
          this.logger.debug(`${label}: fatal error on attempt ${attempt}: ${messageOf(err)}`);
          throw err;
        }
        lastError = err;
        if (attempt === policy.maxAttempts) break;

        const delayMs = backoffDelay(policy, attempt - 1);
        this.logger.warn(
          `${label} attempt ${attempt}/${policy.maxAttempts} failed (${messageOf(err)}), retrying in ${delayMs}ms…`,
        );
        onRetry?.({ attempt, delayMs, error: toError(err) });
        await this.clock.sleep(delayMs, signal);
      }
    }

    this.logger.error(`${label}: giving up after ${policy.maxAttempts} attempts`);
    throw new RetryExhaustedError(label, policy.maxAttempts, lastError);
  }
}
