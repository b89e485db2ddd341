/**
 * @module services
 * Collaborator contracts consumed by the orchestrator.
 *
 * Handles are passed in at construction; nothing here is a global client.
 * Adapters report remote failures as `ServiceError` so retry and cleanup can
 * classify them (auth / not-found fatal, throttled / network transient).
 */

import type { JobStatus } from './poller.js';
import type { TextTransformService } from './fallback.js';

export interface RunScope {
  /** Embedded in every file or key the adapter creates. */
  runId: string;
  signal?: AbortSignal;
}

/** Normalises media to mono 16 kHz 16-bit PCM. */
export interface MediaExtractor {
  readonly name: string;
  /** Returns the path of the new audio file. Throws ExtractionError. */
  extract(inputPath: string, scope: RunScope): Promise<string>;
}

export interface ObjectStore {
  readonly name: string;
  /** Uploads under `keyPrefix` and returns the object URI. */
  put(localPath: string, keyPrefix: string, signal?: AbortSignal): Promise<string>;
  delete(remoteUri: string): Promise<void>;
}

export interface AsyncTranscriptionService {
  readonly name: string;
  /** Starts a job named `jobName` and returns its id. */
  submit(remoteUri: string, jobName: string, signal?: AbortSignal): Promise<string>;
  getStatus(jobId: string, signal?: AbortSignal): Promise<JobStatus>;
  /** Downloads the transcript text. Throws FormatError on a malformed document. */
  fetchResult(resultRef: string, signal?: AbortSignal): Promise<string>;
  delete(jobId: string): Promise<void>;
}

/** Downloads remote media (URL inputs) to a local file. */
export interface MediaFetcher {
  readonly name: string;
  fetch(url: string, scope: RunScope): Promise<string>;
}

export interface PipelineServices {
  extractor: MediaExtractor;
  store: ObjectStore;
  transcription: AsyncTranscriptionService;
  /** Optional: without it every transform uses the local fallback. */
  transform?: TextTransformService;
  /** Optional: without it URL inputs are rejected. */
  fetcher?: MediaFetcher;
}

export type { TextTransformService };
