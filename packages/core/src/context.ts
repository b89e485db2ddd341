/**
 * @module context
 * RunContext: the per-run state threaded through every stage.
 */

import type { TouchConfig } from './config.js';
import type { PipelineEmitter } from './events.js';
import type { ResourceLedger } from './ledger.js';
import type { Clock } from './utils/clock.js';

// ---------------------------------------------------------------------------
// Logger interface (swappable by consumers)
// ---------------------------------------------------------------------------

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

/**
 * Minimal console-based logger with level filtering.
 * Used as the default when no custom logger is supplied.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly debugEnabled: boolean = false) { }
  debug(msg: string, ...args: unknown[]) {
    if (this.debugEnabled) console.debug(`[debug] ${msg}`, ...args);
  }
  info(msg: string, ...args: unknown[]) {
    console.info(`[info]  ${msg}`, ...args);
  }
  warn(msg: string, ...args: unknown[]) {
    console.warn(`[warn]  ${msg}`, ...args);
  }
  error(msg: string, ...args: unknown[]) {
    console.error(`[error] ${msg}`, ...args);
  }
}

/** Prefixes every line so interleaved concurrent runs stay readable. */
export class ScopedLogger implements Logger {
  constructor(
    private readonly inner: Logger,
    private readonly scope: string,
  ) { }
  debug(msg: string, ...args: unknown[]) {
    this.inner.debug(`[${this.scope}] ${msg}`, ...args);
  }
  info(msg: string, ...args: unknown[]) {
    this.inner.info(`[${this.scope}] ${msg}`, ...args);
  }
  warn(msg: string, ...args: unknown[]) {
    this.inner.warn(`[${this.scope}] ${msg}`, ...args);
  }
  error(msg: string, ...args: unknown[]) {
    this.inner.error(`[${this.scope}] ${msg}`, ...args);
  }
}

/** Discards everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

// ---------------------------------------------------------------------------
// RunContext
// ---------------------------------------------------------------------------

export interface RunContext {
  /** Validated, merged configuration. */
  readonly config: TouchConfig;
  /** Typed event emitter for progress / status. */
  readonly emitter: PipelineEmitter;
  /** Unique run identifier (UUID v4). */
  readonly runId: string;
  /** Fires on external cancellation or when the run deadline passes. */
  readonly signal: AbortSignal;
  /** Logger scoped to this run. */
  readonly logger: Logger;
  readonly clock: Clock;
  /** Owns every ephemeral artifact the run creates. */
  readonly ledger: ResourceLedger;
}
