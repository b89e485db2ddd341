/**
 * @module config
 * Run configuration schema powered by Zod.
 *
 * Load order (later wins):
 *   defaults → .touch.json → .env (unset keys only) → env vars → explicit overrides
 */

import { z } from 'zod';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { loadDotenv } from './utils/env.js';

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

export const AwsConfigSchema = z.object({
  region: z.string().default('ap-northeast-2'),
  /** Bucket that receives the normalised audio. Required by the S3 store. */
  bucket: z.string().default(''),
});

export const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  baseDelayMs: z.number().int().min(0).default(1_000),
  multiplier: z.number().min(1).default(2),
});

export const TranscriptionConfigSchema = z.object({
  languageCode: z.string().default('en-US'),
  /** Normal cadence between job status checks. */
  pollIntervalMs: z.number().int().positive().default(10_000),
  /** Overall deadline for the job, measured from the first status check. */
  timeoutMs: z.number().int().positive().default(30 * 60_000),
  /** Wait after a status check failed on the network. Defaults to twice the interval. */
  transientBackoffMs: z.number().int().positive().optional(),
  /** Retry policy for submitting the job. */
  submit: RetryConfigSchema.default(() => RetryConfigSchema.parse({})),
  /** Retry policy for downloading the finished transcript. */
  resultDownload: RetryConfigSchema.default(() => RetryConfigSchema.parse({})),
});

export const UploadConfigSchema = z.object({
  keyPrefix: z.string().default('audio'),
  retry: RetryConfigSchema.default(() => RetryConfigSchema.parse({})),
});

export const LLMConfigSchema = z.object({
  provider: z.enum(['openai', 'openrouter']).default('openrouter'),
  model: z.string().default('openrouter/auto'),
  /** Empty means no primary transform: every run uses the local fallback. */
  apiKey: z.string().default(''),
  temperature: z.number().min(0).max(2).default(0.3),
  maxTokens: z.number().int().positive().default(4096),
});

export const TransformConfigSchema = z.object({
  /** Literal output shorter than this share of the input is discarded. */
  literalMinLengthRatio: z.number().min(0).max(1).default(0.3),
});

export const InputConfigSchema = z.object({
  /** Accepted local file extensions (lowercase, with dot). Empty accepts anything. */
  allowedExtensions: z
    .array(z.string())
    .default([
      '.mp4', '.mov', '.mkv', '.webm', '.avi', '.m4v',
      '.wav', '.mp3', '.m4a', '.ogg', '.flac', '.aac', '.opus',
    ]),
});

export const WorkConfigSchema = z.object({
  /** Directory for temporary per-run files. */
  dir: z.string().default(os.tmpdir()),
  /** Optional deadline for a whole run. */
  runTimeoutMs: z.number().int().positive().optional(),
});

// ---------------------------------------------------------------------------
// Root schema
// ---------------------------------------------------------------------------

export const TouchConfigSchema = z.object({
  /** Enable verbose debug logging. */
  debug: z.boolean().default(false),
  aws: AwsConfigSchema.default(() => AwsConfigSchema.parse({})),
  upload: UploadConfigSchema.default(() => UploadConfigSchema.parse({})),
  transcription: TranscriptionConfigSchema.default(() => TranscriptionConfigSchema.parse({})),
  llm: LLMConfigSchema.default(() => LLMConfigSchema.parse({})),
  transform: TransformConfigSchema.default(() => TransformConfigSchema.parse({})),
  input: InputConfigSchema.default(() => InputConfigSchema.parse({})),
  work: WorkConfigSchema.default(() => WorkConfigSchema.parse({})),
});

export type TouchConfig = z.infer<typeof TouchConfigSchema>;
export type AwsConfig = z.infer<typeof AwsConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type TranscriptionConfig = z.infer<typeof TranscriptionConfigSchema>;
export type UploadConfig = z.infer<typeof UploadConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type TransformConfig = z.infer<typeof TransformConfigSchema>;
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type WorkConfig = z.infer<typeof WorkConfigSchema>;

// ---------------------------------------------------------------------------
// Config loader
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  /** Directory holding .touch.json and .env. Default: process.cwd() */
  cwd?: string;
  /** Environment to read. Default: process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and validate configuration by merging layers:
 *   defaults → .touch.json → env → overrides
 *
 * Throws a ZodError with detailed messages if the merged config is invalid.
 */
export function loadConfig(
  overrides: Record<string, unknown> = {},
  opts: LoadConfigOptions = {},
): TouchConfig {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;
  const layers: Record<string, unknown>[] = [];

  // Layer 1: .touch.json in CWD
  const localJson = readJsonSafe(path.resolve(cwd, '.touch.json'));
  if (localJson) layers.push(localJson);

  // Layer 2: environment variables (.env fills in unset keys first)
  loadDotenv(cwd, env);
  layers.push(envLayer(env));

  // Layer 3: explicit overrides
  if (Object.keys(overrides).length > 0) layers.push(overrides);

  return TouchConfigSchema.parse(deepMerge({}, ...layers));
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function readJsonSafe(filepath: string): Record<string, unknown> | null {
  let raw: string;
  try {
    raw = fs.readFileSync(filepath, 'utf8');
  } catch {
    return null; // no project config
  }
  const parsed: unknown = JSON.parse(raw);
  return isPlainObject(parsed) ? parsed : null;
}

/** Map recognized env vars to our schema. */
function envLayer(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const aws: Record<string, unknown> = {};
  const llm: Record<string, unknown> = {};
  const transcription: Record<string, unknown> = {};
  const work: Record<string, unknown> = {};

  if (env.AWS_REGION) aws.region = env.AWS_REGION;
  if (env.TOUCH_S3_BUCKET) aws.bucket = env.TOUCH_S3_BUCKET;
  if (env.TOUCH_LANGUAGE) transcription.languageCode = env.TOUCH_LANGUAGE;

  if (env.OPENROUTER_API_KEY) llm.apiKey = env.OPENROUTER_API_KEY;
  if (env.OPENAI_API_KEY && !env.OPENROUTER_API_KEY) {
    llm.apiKey = env.OPENAI_API_KEY;
    llm.provider = 'openai';
    llm.model = 'gpt-4o-mini';
  }
  if (env.TOUCH_LLM_MODEL) llm.model = env.TOUCH_LLM_MODEL;

  if (env.TOUCH_WORK_DIR) work.dir = env.TOUCH_WORK_DIR;
  if (env.TOUCH_DEBUG === '1') out.debug = true;

  if (Object.keys(aws).length) out.aws = aws;
  if (Object.keys(llm).length) out.llm = llm;
  if (Object.keys(transcription).length) out.transcription = transcription;
  if (Object.keys(work).length) out.work = work;

  return out;
}

/** Simple recursive merge for plain objects (arrays are replaced, not merged). */
function deepMerge(
  target: Record<string, unknown>,
  ...sources: Record<string, unknown>[]
): Record<string, unknown> {
  for (const source of sources) {
    for (const key of Object.keys(source)) {
      const sv = source[key];
      const tv = target[key];
      if (isPlainObject(sv) && isPlainObject(tv)) {
        target[key] = deepMerge(tv, sv);
      } else if (isPlainObject(sv)) {
        target[key] = deepMerge({}, sv);
      } else if (sv !== undefined) {
        target[key] = sv;
      }
    }
  }
  return target;
}

function isPlainObject(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null && !Array.isArray(val);
}
