/**
 * @touch/core
 *
 * Orchestration core for turning spoken media into Braille text:
 * retry, job polling, artifact cleanup, transform fallback, and the
 * pipeline orchestrator that wires them together.
 *
 * Usage:
 *   import { PipelineOrchestrator, FfmpegExtractor, loadConfig } from '@touch/core';
 *   const config = loadConfig();
 *   const orchestrator = new PipelineOrchestrator({ services, config });
 *   orchestrator.on('stage:complete', (e) => console.log(e.stage));
 *   await orchestrator.run('lecture.mp4', 'lecture.brf', 'literal');
 */

// --- Orchestrator ---
export {
  PipelineOrchestrator,
  type OrchestratorOptions,
  type PipelineRun,
  type PipelineRunResult,
  type RunOptions,
  type RunStatus,
} from './orchestrator.js';

// --- Collaborator contracts ---
export {
  type PipelineServices,
  type MediaExtractor,
  type ObjectStore,
  type AsyncTranscriptionService,
  type MediaFetcher,
  type RunScope,
} from './services.js';

// --- Retry ---
export {
  RetryExecutor,
  retryPolicy,
  backoffDelay,
  type RetryPolicy,
  type RetryInfo,
  type ExecuteOptions,
} from './retry.js';

// --- Polling ---
export {
  AsyncJobPoller,
  JobStateMachine,
  pollSpec,
  TERMINAL_STATES,
  type JobState,
  type RemoteJobState,
  type JobStatus,
  type PollSpec,
  type AwaitOptions,
} from './poller.js';

// --- Cleanup ---
export {
  ResourceLedger,
  type Artifact,
  type ArtifactKind,
  type ArtifactReleasers,
  type ReleaseFailure,
  type ReleaseReport,
} from './ledger.js';

// --- Transform ---
export {
  FallbackConverter,
  isAcceptable,
  normalizeLiteral,
  normalizeOptimized,
  LITERAL_MIN_LENGTH_RATIO,
  TRANSFORM_MODES,
  type TransformMode,
  type TextTransformService,
  type ConversionResult,
  type FallbackConverterOptions,
} from './fallback.js';
export {
  brailleTable,
  filterBraille,
  isBrailleCell,
  toBrailleLiteral,
  BRAILLE_RANGE_START,
  BRAILLE_RANGE_END,
  type BrailleTable,
} from './braille.js';

// --- Errors ---
export {
  TouchError,
  InputError,
  ExtractionError,
  UploadError,
  TranscriptionError,
  JobTimeoutError,
  FormatError,
  TransformError,
  OutputError,
  CancelledError,
  RetryExhaustedError,
  ServiceError,
  classifyError,
  isTransient,
  isIgnorable,
  describeError,
  messageOf,
  toError,
  type PipelineStage,
  type Severity,
  type ExtractionFailure,
  type ServiceErrorKind,
} from './errors.js';

// --- Events ---
export {
  PipelineEmitter,
  type PipelineEventMap,
  type RunStartEvent,
  type StageStartEvent,
  type StageCompleteEvent,
  type StageRetryEvent,
  type JobStateEvent,
  type TransformDegradedEvent,
  type ArtifactRegisteredEvent,
  type RunCompleteEvent,
  type RunErrorEvent,
} from './events.js';

// --- Context ---
export {
  type RunContext,
  type Logger,
  ConsoleLogger,
  ScopedLogger,
  silentLogger,
} from './context.js';

// --- Config ---
export {
  TouchConfigSchema,
  AwsConfigSchema,
  RetryConfigSchema,
  TranscriptionConfigSchema,
  UploadConfigSchema,
  LLMConfigSchema,
  TransformConfigSchema,
  InputConfigSchema,
  WorkConfigSchema,
  loadConfig,
  type LoadConfigOptions,
  type TouchConfig,
  type AwsConfig,
  type RetryConfig,
  type TranscriptionConfig,
  type UploadConfig,
  type LLMConfig,
  type TransformConfig,
  type InputConfig,
  type WorkConfig,
} from './config.js';

// --- Providers ---
export {
  FfmpegExtractor,
  ffmpegArgs,
  classifyFfmpegFailure,
  type FfmpegExtractorOptions,
} from './providers/ffmpeg.js';
export {
  LLMTextTransformService,
  createTransformService,
  httpErrorKind,
  type LLMTextTransformOptions,
} from './providers/llm.js';

// --- Utilities ---
export {
  shellStreaming,
  hasCommand,
  ensureDir,
  removeFile,
  runFilePath,
  writeTextAtomic,
  loadDotenv,
  systemClock,
  sleep,
  throwIfAborted,
  type Clock,
  type ShellResult,
  type ShellOptions,
} from './utils/index.js';
