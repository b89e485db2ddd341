/**
 * @module commands/doctor
 * `touch doctor`: check environment readiness.
 *
 * Prints a JSON summary of checks and hints; exits non-zero when a
 * required check fails.
 */

import { hasCommand, loadConfig, type TouchConfig } from '@touch/core';
import { isLanguageCode } from '@touch/engine-aws';

export interface ToolAvailability {
  ffmpeg: boolean;
  ytDlp: boolean;
}

export interface DoctorReport {
  ok: boolean;
  checks: Record<string, string | boolean>;
  hints: string[];
}

/** Evaluate readiness from config, environment and tool presence. */
export function doctorReport(
  config: TouchConfig,
  env: NodeJS.ProcessEnv,
  tools: ToolAvailability,
): DoctorReport {
  const bucket = Boolean(config.aws.bucket);
  const credentials = Boolean(
    (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) || env.AWS_PROFILE || env.AWS_WEB_IDENTITY_TOKEN_FILE,
  );
  const language = isLanguageCode(config.transcription.languageCode);
  const llmKey = Boolean(config.llm.apiKey);

  const checks = {
    nodeVersion: process.version,
    ffmpeg: tools.ffmpeg,
    ytDlp: tools.ytDlp,
    awsRegion: config.aws.region,
    s3Bucket: bucket,
    awsCredentials: credentials,
    languageCode: language,
    llmKey,
  };

  const hints: string[] = [
    tools.ffmpeg ? '' : 'Install ffmpeg to extract audio from media files.',
    tools.ytDlp ? '' : 'Install yt-dlp to convert URL inputs.',
    bucket ? '' : 'Set TOUCH_S3_BUCKET (or aws.bucket in .touch.json).',
    credentials ? '' : 'No AWS credentials in the environment; the SDK will try shared config and instance roles.',
    language ? '' : `Transcribe does not support language "${config.transcription.languageCode}".`,
    llmKey ? '' : 'Set OPENROUTER_API_KEY or OPENAI_API_KEY; without one every run uses the local fallback.',
  ].filter(Boolean);

  return { ok: tools.ffmpeg && bucket && language, checks, hints };
}

export async function cmdDoctor(): Promise<void> {
  const config = loadConfig();
  const [ffmpeg, ytDlp] = await Promise.all([hasCommand('ffmpeg'), hasCommand('yt-dlp')]);
  const report = doctorReport(config, process.env, { ffmpeg, ytDlp });
  console.log(JSON.stringify(report, null, 2));
  if (!report.ok) process.exitCode = 1;
}
