/**
 * @module poller
 * AsyncJobPoller: waits for a remote asynchronous job to reach a terminal state.
 *
 *   Submitted → InProgress → { Completed | Failed | TimedOut }
 *
 * A failed status *request* (network hiccup) is not a failed *job*: transient
 * status errors back off for longer than the normal cadence and try again,
 * while a job that reports Failed ends the wait immediately.
 */

import type { Logger } from './context.js';
import {
  CancelledError,
  FormatError,
  JobTimeoutError,
  TranscriptionError,
  isTransient,
  messageOf,
} from './errors.js';
import { RetryExecutor, retryPolicy, type RetryPolicy } from './retry.js';
import { systemClock, throwIfAborted, type Clock } from './utils/clock.js';

// ---------------------------------------------------------------------------
// States
// ---------------------------------------------------------------------------

export type JobState = 'Submitted' | 'InProgress' | 'Completed' | 'Failed' | 'TimedOut';

/** States a remote service can report. TimedOut is decided locally. */
export type RemoteJobState = Exclude<JobState, 'TimedOut'>;

export const TERMINAL_STATES: ReadonlySet<JobState> = new Set(['Completed', 'Failed', 'TimedOut']);

export interface JobStatus {
  state: RemoteJobState;
  /** Remote-reported reason, for Failed. */
  failureReason?: string;
  /** Where the result can be fetched from, for Completed. */
  resultRef?: string;
}

/**
 * Tracks one job's state and rejects any transition out of a terminal state.
 * Moving back from InProgress to Submitted is ignored.
 */
export class JobStateMachine {
  private current: JobState = 'Submitted';
  private readonly trail: JobState[] = ['Submitted'];

  get state(): JobState {
    return this.current;
  }

  get history(): readonly JobState[] {
    return this.trail;
  }

  isTerminal(): boolean {
    return TERMINAL_STATES.has(this.current);
  }

  /** Returns the previous state when the state changed, otherwise null. */
  transition(next: JobState): JobState | null {
    if (this.isTerminal()) {
      throw new Error(`Illegal job transition ${this.current} → ${next}: ${this.current} is terminal`);
    }
    if (next === this.current) return null;
    if (next === 'Submitted' && this.current === 'InProgress') return null;
    const prev = this.current;
    this.current = next;
    this.trail.push(next);
    return prev;
  }
}

// ---------------------------------------------------------------------------
// Poll spec
// ---------------------------------------------------------------------------

export interface PollSpec {
  /** Normal wait between status checks. */
  readonly intervalMs: number;
  /** Deadline measured from the first status check. */
  readonly timeoutMs: number;
  /** Wait after a transient status-check failure. */
  readonly transientBackoffMs: number;
  readonly terminalStates: ReadonlySet<JobState>;
  /** Retry policy for downloading the result of a completed job. */
  readonly resultRetry: RetryPolicy;
}

/** Build an immutable spec. `transientBackoffMs` defaults to twice the interval. */
export function pollSpec(
  opts: Pick<PollSpec, 'intervalMs' | 'timeoutMs'> & Partial<PollSpec>,
): PollSpec {
  return Object.freeze({
    intervalMs: opts.intervalMs,
    timeoutMs: opts.timeoutMs,
    transientBackoffMs: opts.transientBackoffMs ?? opts.intervalMs * 2,
    terminalStates: opts.terminalStates ?? TERMINAL_STATES,
    resultRetry:
      opts.resultRetry ??
      retryPolicy({ maxAttempts: 3, baseDelayMs: 1_000, multiplier: 2 }),
  });
}

// ---------------------------------------------------------------------------
// Poller
// ---------------------------------------------------------------------------

export interface AwaitOptions<T> {
  signal?: AbortSignal;
  /** Rejects structurally invalid results; a false return raises FormatError. */
  isValid?: (value: T) => boolean;
  /** Called on every state change. */
  onTransition?: (from: JobState, to: JobState) => void;
}

export class AsyncJobPoller {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly retry: RetryExecutor;

  constructor(deps: { logger: Logger; clock?: Clock }) {
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
    this.retry = new RetryExecutor({ logger: deps.logger, clock: this.clock });
  }

  async await<T>(
    jobId: string,
    fetchStatus: (jobId: string) => Promise<JobStatus>,
    fetchResult: (resultRef: string) => Promise<T>,
    spec: PollSpec,
    opts: AwaitOptions<T> = {},
  ): Promise<T> {
    const { signal, isValid, onTransition } = opts;
    const machine = new JobStateMachine();
    const startedAt = this.clock.now();
    let polls = 0;

    const moveTo = (next: JobState) => {
      const prev = machine.transition(next);
      if (prev !== null) {
        this.logger.debug(`Job ${jobId}: ${prev} → ${next}`);
        onTransition?.(prev, next);
      }
    };

    const checkDeadline = () => {
      const elapsed = this.clock.now() - startedAt;
      if (elapsed > spec.timeoutMs) {
        moveTo('TimedOut');
        throw new JobTimeoutError(jobId, elapsed, spec.timeoutMs);
      }
    };

    for (;;) {
      throwIfAborted(signal);
      checkDeadline();
      polls++;

      let status: JobStatus;
      try {
        status = await fetchStatus(jobId);
      } catch (err) {
        if (err instanceof CancelledError || signal?.aborted || !isTransient(err)) throw err;
        this.logger.warn(
          `Status check for job ${jobId} failed (${messageOf(err)}), retrying in ${spec.transientBackoffMs}ms`,
        );
        await this.clock.sleep(spec.transientBackoffMs, signal);
        continue;
      }

      if (spec.terminalStates.has(status.state)) {
        moveTo(status.state);
        const elapsed = this.clock.now() - startedAt;
        if (status.state === 'Failed') {
          const reason = status.failureReason ?? 'Unknown error';
          throw new TranscriptionError(`Job ${jobId} failed: ${reason}`, { reason });
        }
        this.logger.info(`Job ${jobId} completed after ${elapsed}ms (${polls} status checks)`);
        return this.fetchCompleted(jobId, status, fetchResult, spec, signal, isValid);
      }

      moveTo(status.state);
      if (polls % 6 === 0) {
        this.logger.info(`Job ${jobId} ${status.state} (${this.clock.now() - startedAt}ms elapsed)`);
      }
      checkDeadline();
      await this.clock.sleep(spec.intervalMs, signal);
    }
  }

  private async fetchCompleted<T>(
    jobId: string,
    status: JobStatus,
    fetchResult: (resultRef: string) => Promise<T>,
    spec: PollSpec,
    signal: AbortSignal | undefined,
    isValid: ((value: T) => boolean) | undefined,
  ): Promise<T> {
    const ref = status.resultRef;
    if (!ref) {
      throw new FormatError(`Job ${jobId} completed without a result reference`);
    }
    const result = await this.retry.execute(() => fetchResult(ref), spec.resultRetry, {
      label: `Download result of job ${jobId}`,
      signal,
    });
    if (isValid && !isValid(result)) {
      throw new FormatError(`Job ${jobId} returned an invalid result`);
    }
    return result;
  }
}
