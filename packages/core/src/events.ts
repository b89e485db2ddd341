/**
 * @module events
 * Typed event definitions for conversion runs.
 *
 * The core uses Node's EventEmitter with string event names.
 * This module defines the payload shapes and a typed emitter wrapper.
 * Events are observational only; nothing in a run depends on a listener.
 */

import { EventEmitter } from 'node:events';

import type { PipelineStage } from './errors.js';
import type { ArtifactKind } from './ledger.js';
import type { JobState } from './poller.js';
import type { TransformMode } from './fallback.js';

// ---------------------------------------------------------------------------
// Event payloads
// ---------------------------------------------------------------------------

export interface RunStartEvent {
  runId: string;
  input: string;
  mode: TransformMode;
}

export interface StageStartEvent {
  runId: string;
  stage: PipelineStage;
}

export interface StageCompleteEvent {
  runId: string;
  stage: PipelineStage;
  durationMs: number;
}

export interface StageRetryEvent {
  runId: string;
  stage: PipelineStage;
  /** 1-based attempt that just failed. */
  attempt: number;
  delayMs: number;
  error: Error;
}

export interface JobStateEvent {
  runId: string;
  jobId: string;
  from: JobState;
  to: JobState;
}

export interface TransformDegradedEvent {
  runId: string;
  mode: TransformMode;
  reason: string;
}

export interface ArtifactRegisteredEvent {
  runId: string;
  kind: ArtifactKind;
  location: string;
}

export interface RunCompleteEvent {
  runId: string;
  outputPath: string;
  durationMs: number;
  degraded: boolean;
}

export interface RunErrorEvent {
  runId: string;
  stage?: PipelineStage;
  error: Error;
}

// ---------------------------------------------------------------------------
// Event name → payload mapping
// ---------------------------------------------------------------------------

export interface PipelineEventMap {
  'run:start': RunStartEvent;
  'stage:start': StageStartEvent;
  'stage:complete': StageCompleteEvent;
  'stage:retry': StageRetryEvent;
  'job:state': JobStateEvent;
  'transform:degraded': TransformDegradedEvent;
  'artifact:registered': ArtifactRegisteredEvent;
  'run:complete': RunCompleteEvent;
  'run:error': RunErrorEvent;
}

// ---------------------------------------------------------------------------
// Typed emitter
// ---------------------------------------------------------------------------

/**
 * A strongly-typed EventEmitter.
 * Consumers get autocomplete on event names and payloads.
 */
export class PipelineEmitter {
  private ee = new EventEmitter();

  /** Set maximum listeners (default 20 to allow many run subscriptions). */
  constructor(maxListeners = 20) {
    this.ee.setMaxListeners(maxListeners);
  }

  on<K extends keyof PipelineEventMap>(
    event: K,
    listener: (payload: PipelineEventMap[K]) => void,
  ): this {
    this.ee.on(event, listener);
    return this;
  }

  once<K extends keyof PipelineEventMap>(
    event: K,
    listener: (payload: PipelineEventMap[K]) => void,
  ): this {
    this.ee.once(event, listener);
    return this;
  }

  off<K extends keyof PipelineEventMap>(
    event: K,
    listener: (payload: PipelineEventMap[K]) => void,
  ): this {
    this.ee.off(event, listener);
    return this;
  }

  emit<K extends keyof PipelineEventMap>(event: K, payload: PipelineEventMap[K]): boolean {
    return this.ee.emit(event, payload);
  }

  removeAllListeners(event?: keyof PipelineEventMap): this {
    this.ee.removeAllListeners(event);
    return this;
  }
}
