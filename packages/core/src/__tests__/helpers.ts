/**
 * Shared test doubles: a manual clock, a recording logger, and in-process
 * fakes for every pipeline collaborator.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type { Logger } from '../context.js';
import { CancelledError, ServiceError } from '../errors.js';
import type { TextTransformService, TransformMode } from '../fallback.js';
import type { JobStatus } from '../poller.js';
import type {
  AsyncTranscriptionService,
  MediaExtractor,
  MediaFetcher,
  ObjectStore,
  RunScope,
} from '../services.js';
import type { Clock } from '../utils/clock.js';

// ---------------------------------------------------------------------------
// Clock & logger
// ---------------------------------------------------------------------------

/** Sleeping advances time instantly and records the requested delay. */
export class ManualClock implements Clock {
  time = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.time;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new CancelledError('Run cancelled', signal.reason);
    this.sleeps.push(ms);
    this.time += ms;
    await Promise.resolve();
  }
}

export class RecordingLogger implements Logger {
  readonly lines: Array<{ level: 'debug' | 'info' | 'warn' | 'error'; msg: string }> = [];
  debug(msg: string) {
    this.lines.push({ level: 'debug', msg });
  }
  info(msg: string) {
    this.lines.push({ level: 'info', msg });
  }
  warn(msg: string) {
    this.lines.push({ level: 'warn', msg });
  }
  error(msg: string) {
    this.lines.push({ level: 'error', msg });
  }
  at(level: 'debug' | 'info' | 'warn' | 'error'): string[] {
    return this.lines.filter((l) => l.level === level).map((l) => l.msg);
  }
}

export function tempDir(prefix = 'touch-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

// ---------------------------------------------------------------------------
// Collaborator fakes
// ---------------------------------------------------------------------------

/** Writes a small placeholder "wav" into `workDir`. */
export class FakeExtractor implements MediaExtractor {
  readonly name = 'fake-extractor';
  readonly produced: string[] = [];
  failWith?: Error;
  /** Real-time delay before producing output. */
  delayMs = 0;

  constructor(private readonly workDir: string) { }

  async extract(_inputPath: string, scope: RunScope): Promise<string> {
    if (this.delayMs) await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    if (this.failWith) throw this.failWith;
    const out = path.join(this.workDir, `touch-${scope.runId}.wav`);
    await fs.promises.writeFile(out, 'RIFF');
    this.produced.push(out);
    return out;
  }
}

export class FakeStore implements ObjectStore {
  readonly name = 'fake-store';
  readonly objects = new Set<string>();
  readonly deleted: string[] = [];
  putCalls = 0;
  /** Errors thrown by successive `put` calls before one succeeds. */
  putFailures: Error[] = [];
  onPut?: () => void;

  async put(localPath: string, keyPrefix: string): Promise<string> {
    this.putCalls++;
    const failure = this.putFailures.shift();
    if (failure) throw failure;
    const uri = `mem://bucket/${keyPrefix}/${path.basename(localPath)}`;
    this.objects.add(uri);
    this.onPut?.();
    return uri;
  }

  async delete(remoteUri: string): Promise<void> {
    this.deleted.push(remoteUri);
    if (!this.objects.delete(remoteUri)) {
      throw new ServiceError('fake-store', 'not-found', `no object ${remoteUri}`);
    }
  }
}

export class FakeTranscription implements AsyncTranscriptionService {
  readonly name = 'fake-transcription';
  readonly jobs = new Set<string>();
  readonly deleted: string[] = [];
  readonly submitted: Array<{ remoteUri: string; jobName: string }> = [];
  /** Statuses returned in order; the last one repeats. */
  statuses: JobStatus[] = [{ state: 'Completed', resultRef: 'result://1' }];
  transcript = 'hello world';
  statusCalls = 0;
  /** Errors thrown by successive `submit` calls; `jobCreated` leaves the job behind first. */
  submitFailures: Array<{ error: Error; jobCreated?: boolean }> = [];
  /** Thrown by every status check when set. */
  statusError?: Error;
  /** Thrown by every result download when set. */
  resultError?: Error;

  async submit(remoteUri: string, jobName: string): Promise<string> {
    this.submitted.push({ remoteUri, jobName });
    const failure = this.submitFailures.shift();
    if (failure) {
      if (failure.jobCreated) this.jobs.add(jobName);
      throw failure.error;
    }
    this.jobs.add(jobName);
    return jobName;
  }

  async getStatus(): Promise<JobStatus> {
    this.statusCalls++;
    if (this.statusError) throw this.statusError;
    const next = this.statuses.length > 1 ? this.statuses.shift() : this.statuses[0];
    if (!next) throw new Error('no status configured');
    return next;
  }

  async fetchResult(): Promise<string> {
    if (this.resultError) throw this.resultError;
    return this.transcript;
  }

  async delete(jobId: string): Promise<void> {
    this.deleted.push(jobId);
    if (!this.jobs.delete(jobId)) {
      throw new ServiceError('fake-transcription', 'not-found', `no job ${jobId}`);
    }
  }
}

export class FakeTransform implements TextTransformService {
  readonly name = 'fake';
  readonly calls: Array<{ text: string; mode: TransformMode }> = [];

  constructor(private readonly respond: (text: string, mode: TransformMode) => string | Promise<string>) { }

  async transform(text: string, mode: TransformMode): Promise<string> {
    this.calls.push({ text, mode });
    return this.respond(text, mode);
  }
}

export class FakeFetcher implements MediaFetcher {
  readonly name = 'fake-fetcher';

  constructor(private readonly workDir: string) { }

  async fetch(_url: string, scope: RunScope): Promise<string> {
    const out = path.join(this.workDir, `touch-${scope.runId}-source.m4a`);
    await fs.promises.writeFile(out, 'audio');
    return out;
  }
}
