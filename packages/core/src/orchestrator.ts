/**
 * @module orchestrator
 * PipelineOrchestrator: runs one end-to-end conversion:
 *
 *   validate → (fetch) → extract → upload → transcribe → await → transform → write
 *
 * Stages run strictly in order. Every artifact a stage creates is registered
 * with the run's ResourceLedger before the next stage starts, and the ledger
 * is drained on every exit path. Runs share no mutable state, so one
 * orchestrator can drive many runs concurrently.
 *
 * Usage:
 *   const orchestrator = new PipelineOrchestrator({ services, config });
 *   orchestrator.on('stage:complete', (e) => spinner.message(e.stage));
 *   await orchestrator.run('talk.mp4', 'out/talk.brf', 'literal');
 */

import fs from 'node:fs';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';

import { TouchConfigSchema, type TouchConfig } from './config.js';
import { ConsoleLogger, ScopedLogger, type Logger, type RunContext } from './context.js';
import {
  CancelledError,
  ExtractionError,
  FormatError,
  InputError,
  OutputError,
  TouchError,
  TranscriptionError,
  TransformError,
  UploadError,
  describeError,
  messageOf,
  toError,
  type PipelineStage,
} from './errors.js';
import { PipelineEmitter, type PipelineEventMap } from './events.js';
import { FallbackConverter, type TransformMode } from './fallback.js';
import { ResourceLedger, type ArtifactKind, type ReleaseReport } from './ledger.js';
import { AsyncJobPoller, pollSpec, type PollSpec } from './poller.js';
import { RetryExecutor, retryPolicy, type RetryInfo } from './retry.js';
import type { PipelineServices } from './services.js';
import { removeFile, writeTextAtomic } from './utils/fs.js';
import { systemClock, throwIfAborted, type Clock } from './utils/clock.js';

// ---------------------------------------------------------------------------
// Run records
// ---------------------------------------------------------------------------

export type RunStatus = 'Running' | 'Succeeded' | 'Failed';

export interface PipelineRun {
  readonly runId: string;
  /** Path or URL as given by the caller. */
  readonly input: string;
  stage: PipelineStage;
  status: RunStatus;
  readonly createdAt: Date;
  readonly ledger: ResourceLedger;
}

export interface PipelineRunResult {
  runId: string;
  outputPath: string;
  mode: TransformMode;
  completedStages: PipelineStage[];
  /** True when the transform stage fell back to its local result. */
  degraded: boolean;
  degradedReason?: string;
  durationMs: number;
  cleanup: ReleaseReport;
}

export interface RunOptions {
  /** External cancellation. */
  signal?: AbortSignal;
  /** Deadline for the whole run. Defaults to config.work.runTimeoutMs. */
  timeoutMs?: number;
}

export interface OrchestratorOptions {
  services: PipelineServices;
  config?: TouchConfig;
  logger?: Logger;
  clock?: Clock;
  emitter?: PipelineEmitter;
}

type InputSource = { kind: 'file'; path: string } | { kind: 'url'; url: string };

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class PipelineOrchestrator {
  readonly emitter: PipelineEmitter;
  private readonly services: PipelineServices;
  private readonly config: TouchConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly retry: RetryExecutor;
  private readonly poller: AsyncJobPoller;
  private readonly converter: FallbackConverter;

  constructor(opts: OrchestratorOptions) {
    this.services = opts.services;
    this.config = opts.config ?? TouchConfigSchema.parse({});
    this.logger = opts.logger ?? new ConsoleLogger(this.config.debug);
    this.clock = opts.clock ?? systemClock;
    this.emitter = opts.emitter ?? new PipelineEmitter();
    this.retry = new RetryExecutor({ logger: this.logger, clock: this.clock });
    this.poller = new AsyncJobPoller({ logger: this.logger, clock: this.clock });
    this.converter = new FallbackConverter({
      service: opts.services.transform,
      logger: this.logger,
      literalMinLengthRatio: this.config.transform.literalMinLengthRatio,
    });
  }

  /** Subscribe to run events. */
  on<K extends keyof PipelineEventMap>(
    event: K,
    listener: (payload: PipelineEventMap[K]) => void,
  ): this {
    this.emitter.on(event, listener);
    return this;
  }

  /** Convert `input` and write the result to `outputPath`. Resolves to `outputPath`. */
  async run(
    input: string,
    outputPath: string,
    mode: TransformMode,
    opts: RunOptions = {},
  ): Promise<string> {
    const result = await this.runDetailed(input, outputPath, mode, opts);
    return result.outputPath;
  }

  async runDetailed(
    input: string,
    outputPath: string,
    mode: TransformMode,
    opts: RunOptions = {},
  ): Promise<PipelineRunResult> {
    const t0 = this.clock.now();
    const runId = uuidv4();
    const logger = new ScopedLogger(this.logger, `run ${runId.slice(0, 8)}`);
    const { signal, dispose } = linkSignals(opts.signal, opts.timeoutMs ?? this.config.work.runTimeoutMs);
    const ledger = new ResourceLedger(this.releasers(), logger);

    const run: PipelineRun = {
      runId,
      input,
      stage: 'validate-input',
      status: 'Running',
      createdAt: new Date(),
      ledger,
    };
    const ctx: RunContext = {
      config: this.config,
      emitter: this.emitter,
      runId,
      signal,
      logger,
      clock: this.clock,
      ledger,
    };
    const completedStages: PipelineStage[] = [];
    const target = path.resolve(outputPath);

    this.notify(ctx, 'run:start', { runId, input, mode });
    logger.info(`Converting ${input} → ${target} (${mode})`);

    try {
      const conversion = await this.execute(run, ctx, target, mode, completedStages);
      run.status = 'Succeeded';
      const cleanup = await ledger.releaseAll();
      const durationMs = this.clock.now() - t0;

      this.notify(ctx, 'run:complete', {
        runId,
        outputPath: target,
        durationMs,
        degraded: conversion.degraded,
      });
      logger.info(`Run completed in ${durationMs}ms (${completedStages.length} stages)`);

      return {
        runId,
        outputPath: target,
        mode,
        completedStages,
        degraded: conversion.degraded,
        degradedReason: conversion.reason,
        durationMs,
        cleanup,
      };
    } catch (err) {
      run.status = 'Failed';
      const error = contextualize(err, run, target, signal);
      this.notify(ctx, 'run:error', { runId, stage: error.stage, error });
      logger.error(`Run failed: ${describeError(error)}`);
      throw error;
    } finally {
      // No-op after a successful drain; releases everything on failure paths.
      await ledger.releaseAll();
      dispose();
    }
  }

  // -----------------------------------------------------------------------
  // Stages
  // -----------------------------------------------------------------------

  private async execute(
    run: PipelineRun,
    ctx: RunContext,
    target: string,
    mode: TransformMode,
    completed: PipelineStage[],
  ) {
    const { config, signal, runId } = ctx;
    const { extractor, store, transcription, fetcher } = this.services;

    const stage = async <T>(name: PipelineStage, fn: () => Promise<T>): Promise<T> => {
      throwIfAborted(signal);
      run.stage = name;
      const stageT0 = ctx.clock.now();
      this.notify(ctx, 'stage:start', { runId, stage: name });
      const value = await fn();
      // Once the output is in place the run has succeeded.
      if (name !== 'write-output') throwIfAborted(signal);
      const durationMs = ctx.clock.now() - stageT0;
      completed.push(name);
      this.notify(ctx, 'stage:complete', { runId, stage: name, durationMs });
      ctx.logger.info(`Stage "${name}" completed in ${durationMs}ms`);
      return value;
    };

    const onRetry = (name: PipelineStage) => (info: RetryInfo) =>
      this.notify(ctx, 'stage:retry', { runId, stage: name, ...info });

    const source = await stage('validate-input', () => this.validateInput(run.input, target));

    let inputPath: string;
    if (source.kind === 'url') {
      inputPath = await stage('fetch-input', async () => {
        if (!fetcher) throw new InputError('URL inputs need a media fetcher', source.url);
        try {
          const fetched = await fetcher.fetch(source.url, { runId, signal });
          this.track(ctx, 'LocalFile', fetched);
          return fetched;
        } catch (err) {
          if (err instanceof CancelledError || signal.aborted) throw err;
          throw new InputError(`Could not fetch ${source.url}: ${messageOf(err)}`, source.url, err);
        }
      });
    } else {
      inputPath = source.path;
    }

    const audioPath = await stage('extract-audio', async () => {
      const produced = await extractor.extract(inputPath, { runId, signal });
      this.track(ctx, 'LocalFile', produced);
      return produced;
    });

    const remoteUri = await stage('upload', () =>
      this.retry.execute(
        async () => {
          const uri = await store.put(audioPath, `${config.upload.keyPrefix}/${runId}`, signal);
          this.track(ctx, 'RemoteObject', uri);
          return uri;
        },
        retryPolicy(config.upload.retry),
        { label: `Upload to ${store.name}`, signal, onRetry: onRetry('upload') },
      ),
    );

    const jobId = await stage('start-transcription', async () => {
      // Tracked before submission: a submit whose response is lost may still have created the job.
      const jobName = `touch-${runId}`;
      this.track(ctx, 'RemoteJob', jobName);
      const id = await this.retry.execute(
        () => transcription.submit(remoteUri, jobName, signal),
        retryPolicy(config.transcription.submit),
        { label: `Submit ${transcription.name} job`, signal, onRetry: onRetry('start-transcription') },
      );
      if (id !== jobName) this.track(ctx, 'RemoteJob', id);
      return id;
    });

    const transcript = await stage('await-transcription', () =>
      this.poller.await(
        jobId,
        (id) => transcription.getStatus(id, signal),
        (ref) => transcription.fetchResult(ref, signal),
        this.pollSpec(),
        {
          signal,
          isValid: (text) => text.trim().length > 0,
          onTransition: (from, to) => this.notify(ctx, 'job:state', { runId, jobId, from, to }),
        },
      ),
    );

    const conversion = await stage('transform-text', () =>
      this.converter.convertDetailed(transcript, mode, signal),
    );
    if (conversion.degraded) {
      this.notify(ctx, 'transform:degraded', {
        runId,
        mode,
        reason: conversion.reason ?? 'fallback used',
      });
    }

    await stage('write-output', async () => {
      const partial = `${target}.${runId}.part`;
      this.track(ctx, 'LocalFile', partial);
      try {
        await writeTextAtomic(target, partial, conversion.text, signal);
      } catch (err) {
        if (err instanceof CancelledError) throw err;
        throw new OutputError(`Cannot write ${target}: ${messageOf(err)}`, target, err);
      }
    });

    return conversion;
  }

  /** Create the output directory and check the input before any remote call. */
  private async validateInput(input: string, target: string): Promise<InputSource> {
    const outDir = path.dirname(target);
    try {
      await fs.promises.mkdir(outDir, { recursive: true });
    } catch (err) {
      throw new OutputError(`Cannot create output directory ${outDir}`, target, err);
    }

    if (/^https?:\/\//i.test(input)) {
      try {
        return { kind: 'url', url: new URL(input).toString() };
      } catch (err) {
        throw new InputError(`Malformed URL: ${input}`, input, err);
      }
    }
    if (/^[a-z][a-z0-9+.-]*:\/\//i.test(input)) {
      throw new InputError(`Unsupported URL scheme: ${input}`, input);
    }

    const filePath = path.resolve(input);
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(filePath);
    } catch (err) {
      throw new InputError(`Input not found: ${filePath}`, input, err);
    }
    if (!stat.isFile()) throw new InputError(`Input is not a file: ${filePath}`, input);
    if (stat.size === 0) throw new InputError(`Input is empty: ${filePath}`, input);

    const allowed = this.config.input.allowedExtensions;
    const ext = path.extname(filePath).toLowerCase();
    if (allowed.length > 0 && !allowed.includes(ext)) {
      throw new InputError(`Unsupported input type "${ext || '(none)'}": ${filePath}`, input);
    }

    try {
      await fs.promises.access(filePath, fs.constants.R_OK);
    } catch (err) {
      throw new InputError(`Input is not readable: ${filePath}`, input, err);
    }
    return { kind: 'file', path: filePath };
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private pollSpec(): PollSpec {
    const t = this.config.transcription;
    return pollSpec({
      intervalMs: t.pollIntervalMs,
      timeoutMs: t.timeoutMs,
      transientBackoffMs: t.transientBackoffMs,
      resultRetry: retryPolicy(t.resultDownload),
    });
  }

  private releasers() {
    const { store, transcription } = this.services;
    return {
      LocalFile: removeFile,
      RemoteObject: (uri: string) => store.delete(uri),
      RemoteJob: (jobId: string) => transcription.delete(jobId),
    };
  }

  private track(ctx: RunContext, kind: ArtifactKind, location: string): void {
    ctx.ledger.register(kind, location);
    this.notify(ctx, 'artifact:registered', { runId: ctx.runId, kind, location });
  }

  /** Listeners are observers: a throwing listener is logged, never propagated. */
  private notify<K extends keyof PipelineEventMap>(
    ctx: RunContext,
    event: K,
    payload: PipelineEventMap[K],
  ): void {
    try {
      ctx.emitter.emit(event, payload);
    } catch (err) {
      ctx.logger.warn(`Listener for "${event}" threw: ${messageOf(err)}`);
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Combine the caller's signal with an optional run deadline. */
function linkSignals(
  external: AbortSignal | undefined,
  timeoutMs: number | undefined,
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onAbort = () => controller.abort(new CancelledError('Run cancelled', external?.reason));

  if (external?.aborted) onAbort();
  else external?.addEventListener('abort', onAbort, { once: true });

  const timer = timeoutMs
    ? setTimeout(
      () => controller.abort(new CancelledError(`Run exceeded its ${timeoutMs}ms deadline`)),
      timeoutMs,
    )
    : undefined;

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer);
      external?.removeEventListener('abort', onAbort);
    },
  };
}

/**
 * Map whatever a stage threw onto the taxonomy and attach the stage.
 * Taxonomy errors pass through unchanged, except that upload failures are
 * reported as UploadError, and submit or await failures as TranscriptionError.
 * FormatError from the await stage is kept as is.
 */
function contextualize(
  err: unknown,
  run: PipelineRun,
  target: string,
  signal: AbortSignal,
): TouchError {
  const stage = run.stage;
  let error: TouchError;

  if (err instanceof CancelledError) {
    error = err;
  } else if (signal.aborted) {
    const reason: unknown = signal.reason;
    error = reason instanceof CancelledError ? reason : new CancelledError(`Run cancelled during ${stage}`, err);
  } else if (stage === 'upload' && !(err instanceof UploadError)) {
    error = new UploadError(`Upload failed: ${messageOf(err)}`, err);
  } else if (stage === 'start-transcription' && !(err instanceof TranscriptionError)) {
    error = new TranscriptionError(`Could not start transcription: ${messageOf(err)}`, {
      cause: err,
      code: 'submit-failed',
    });
  } else if (
    stage === 'await-transcription' &&
    !(err instanceof TranscriptionError) &&
    !(err instanceof FormatError)
  ) {
    error = new TranscriptionError(`Transcription job could not be awaited: ${messageOf(err)}`, { cause: err });
  } else if (err instanceof TouchError) {
    error = err;
  } else {
    error = wrapForStage(stage, toError(err), run.input, target);
  }

  error.stage ??= stage;
  return error;
}

function wrapForStage(stage: PipelineStage, err: Error, input: string, target: string): TouchError {
  switch (stage) {
    case 'validate-input':
    case 'fetch-input':
      return new InputError(err.message, input, err);
    case 'extract-audio':
      return new ExtractionError(`Audio extraction failed: ${err.message}`, 'unreadable-input', err);
    case 'upload':
      return new UploadError(`Upload failed: ${err.message}`, err);
    case 'start-transcription':
    case 'await-transcription':
      return new TranscriptionError(`Transcription failed: ${err.message}`, { cause: err });
    case 'transform-text':
      return new TransformError(err.message, err);
    case 'write-output':
      return new OutputError(err.message, target, err);
  }
}
