/**
 * @module errors
 * Error taxonomy for conversion runs.
 *
 * Every class extends `TouchError`, sets `.name`, carries a machine-readable
 * `code`, and preserves cause chains. The orchestrator attaches the failing
 * `stage` before an error leaves a run, so callers can pattern-match on the
 * class instead of inspecting message strings.
 */

// ---------------------------------------------------------------------------
// Stage names & severity
// ---------------------------------------------------------------------------

export type PipelineStage =
  | 'validate-input'
  | 'fetch-input'
  | 'extract-audio'
  | 'upload'
  | 'start-transcription'
  | 'await-transcription'
  | 'transform-text'
  | 'write-output';

/** fatal: abort now. transient: retry. ignorable: log and carry on. */
export type Severity = 'fatal' | 'transient' | 'ignorable';

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

export class TouchError extends Error {
  readonly code: string;
  /** Stage in which the error surfaced. Filled in by the orchestrator. */
  stage?: PipelineStage;
  override readonly cause?: unknown;

  constructor(message: string, code: string, opts: { cause?: unknown; stage?: PipelineStage } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'TouchError';
    this.code = code;
    this.cause = opts.cause;
    this.stage = opts.stage;
  }

  get severity(): Severity {
    return 'fatal';
  }
}

// ---------------------------------------------------------------------------
// Pipeline errors
// ---------------------------------------------------------------------------

/** Missing, unreadable, empty, or unsupported input. Raised before any remote call. */
export class InputError extends TouchError {
  readonly input: string;

  constructor(message: string, input: string, cause?: unknown) {
    super(message, 'invalid-input', { cause });
    this.name = 'InputError';
    this.input = input;
  }
}

export type ExtractionFailure = 'no-audio-track' | 'unreadable-input' | 'tool-missing';

export class ExtractionError extends TouchError {
  constructor(message: string, code: ExtractionFailure, cause?: unknown) {
    super(message, code, { cause });
    this.name = 'ExtractionError';
  }
}

export class UploadError extends TouchError {
  constructor(message: string, cause?: unknown) {
    super(message, 'upload-failed', { cause });
    this.name = 'UploadError';
  }
}

/**
 * The remote transcription job reported failure, or could not be awaited.
 * The job itself is never resubmitted.
 */
export class TranscriptionError extends TouchError {
  /** Failure reason reported by the remote service, when there is one. */
  readonly reason?: string;
  readonly timedOut: boolean;

  constructor(
    message: string,
    opts: { reason?: string; cause?: unknown; code?: string; timedOut?: boolean } = {},
  ) {
    super(message, opts.code ?? 'transcription-failed', { cause: opts.cause });
    this.name = 'TranscriptionError';
    this.reason = opts.reason;
    this.timedOut = opts.timedOut ?? false;
  }
}

export class JobTimeoutError extends TranscriptionError {
  readonly jobId: string;
  readonly elapsedMs: number;

  constructor(jobId: string, elapsedMs: number, timeoutMs: number) {
    super(`Job ${jobId} did not finish within ${timeoutMs}ms (elapsed ${elapsedMs}ms)`, {
      code: 'timed-out',
      timedOut: true,
    });
    this.name = 'JobTimeoutError';
    this.jobId = jobId;
    this.elapsedMs = elapsedMs;
  }
}

/** A job result that is structurally invalid. Never retried. */
export class FormatError extends TouchError {
  constructor(message: string, cause?: unknown) {
    super(message, 'invalid-format', { cause });
    this.name = 'FormatError';
  }
}

/** Only ever created inside FallbackConverter; absorbed into a degraded result. */
export class TransformError extends TouchError {
  constructor(message: string, cause?: unknown) {
    super(message, 'transform-failed', { cause });
    this.name = 'TransformError';
  }
}

export class OutputError extends TouchError {
  readonly outputPath: string;

  constructor(message: string, outputPath: string, cause?: unknown) {
    super(message, 'output-failed', { cause });
    this.name = 'OutputError';
    this.outputPath = outputPath;
  }
}

export class CancelledError extends TouchError {
  constructor(message = 'Run cancelled', cause?: unknown) {
    super(message, 'cancelled', { cause });
    this.name = 'CancelledError';
  }
}

export class RetryExhaustedError extends TouchError {
  readonly attempts: number;

  constructor(label: string, attempts: number, lastCause: unknown) {
    super(`${label} failed after ${attempts} attempts: ${messageOf(lastCause)}`, 'exhausted-retries', {
      cause: lastCause,
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

// ---------------------------------------------------------------------------
// ServiceError: raised by collaborator adapters
// ---------------------------------------------------------------------------

export type ServiceErrorKind =
  | 'auth'
  | 'permission'
  | 'not-found'
  | 'invalid-input'
  | 'throttled'
  | 'network'
  | 'remote';

const TRANSIENT_KINDS: ReadonlySet<ServiceErrorKind> = new Set(['throttled', 'network', 'remote']);

export class ServiceError extends TouchError {
  readonly kind: ServiceErrorKind;
  /** Name of the service that failed, e.g. "s3" or "transcribe". */
  readonly service: string;

  constructor(service: string, kind: ServiceErrorKind, message: string, cause?: unknown) {
    super(`${service}: ${message}`, kind, { cause });
    this.name = 'ServiceError';
    this.service = service;
    this.kind = kind;
  }

  /** not-found is ignorable when deleting, and never worth a retry. */
  override get severity(): Severity {
    if (this.kind === 'not-found') return 'ignorable';
    return TRANSIENT_KINDS.has(this.kind) ? 'transient' : 'fatal';
  }
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

const TRANSIENT_SYSTEM_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

/**
 * Decide whether an error is worth retrying.
 * Errors outside the taxonomy count as unspecified remote errors (transient),
 * except Node system errors that are not network related.
 */
export function classifyError(err: unknown): Severity {
  if (err instanceof TouchError) return err.severity;
  const code = systemCode(err);
  if (code) return TRANSIENT_SYSTEM_CODES.has(code) ? 'transient' : 'fatal';
  return 'transient';
}

export function isTransient(err: unknown): boolean {
  return classifyError(err) === 'transient';
}

/** The resource is already gone; a delete that hits this has nothing left to do. */
export function isIgnorable(err: unknown): boolean {
  return classifyError(err) === 'ignorable';
}

function systemCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  const { code } = err;
  return typeof code === 'string' ? code : undefined;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * One human-readable line naming the failing stage and the underlying cause.
 * The cause is appended only when its message is not already included.
 */
export function describeError(err: unknown): string {
  if (!(err instanceof TouchError)) return messageOf(err);
  const prefix = err.stage ? `[${err.stage}] ` : '';
  const cause = err.cause === undefined ? '' : messageOf(err.cause);
  const suffix = cause && !err.message.includes(cause) ? `: ${cause}` : '';
  return `${prefix}${err.message}${suffix}`;
}
