/**
 * @module providers/ffmpeg
 * Audio extraction via the ffmpeg CLI.
 *
 * Output is always mono, 16 kHz, 16-bit PCM WAV written to
 * `<workDir>/touch-<runId>.wav`. A partial file is removed before the
 * error leaves this module.
 */

import fs from 'node:fs';

import { ExtractionError, type ExtractionFailure } from '../errors.js';
import type { Logger } from '../context.js';
import type { MediaExtractor, RunScope } from '../services.js';
import { ensureDir, removeFile, runFilePath, shellStreaming, type ShellResult } from '../utils/index.js';

export interface FfmpegExtractorOptions {
  /** Directory for extracted audio. */
  workDir: string;
  logger: Logger;
  /** Executable to run. Default: `ffmpeg` */
  bin?: string;
  /** Default: 10 min */
  timeoutMs?: number;
}

/** Arguments for a mono 16 kHz PCM extraction. */
export function ffmpegArgs(inputPath: string, outputPath: string): string[] {
  return ['-y', '-i', inputPath, '-vn', '-ac', '1', '-ar', '16000', '-acodec', 'pcm_s16le', outputPath];
}

const NO_AUDIO_PATTERNS = [
  /does not contain any stream/i,
  /matches no streams/i,
  /Output file is empty/i,
  /Output file #0 does not contain any stream/i,
];

/** Map an ffmpeg failure (stderr text) to an extraction failure code. */
export function classifyFfmpegFailure(stderr: string): ExtractionFailure {
  return NO_AUDIO_PATTERNS.some((re) => re.test(stderr)) ? 'no-audio-track' : 'unreadable-input';
}

/** Last non-empty stderr line, which is where ffmpeg puts the actual error. */
function lastLine(stderr: string): string {
  const lines = stderr.split('\n').map((l) => l.trim()).filter(Boolean);
  return lines[lines.length - 1] ?? 'no output';
}

export class FfmpegExtractor implements MediaExtractor {
  readonly name = 'ffmpeg';
  private readonly workDir: string;
  private readonly bin: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(opts: FfmpegExtractorOptions) {
    this.workDir = opts.workDir;
    this.bin = opts.bin ?? 'ffmpeg';
    this.timeoutMs = opts.timeoutMs ?? 600_000;
    this.logger = opts.logger;
  }

  async extract(inputPath: string, scope: RunScope): Promise<string> {
    ensureDir(this.workDir);
    const outPath = runFilePath(this.workDir, scope.runId, '.wav');
    this.logger.debug(`${this.bin} ${ffmpegArgs(inputPath, outPath).join(' ')}`);

    let result: ShellResult;
    try {
      result = await shellStreaming(this.bin, ffmpegArgs(inputPath, outPath), {
        timeoutMs: this.timeoutMs,
        signal: scope.signal,
      });
    } catch (err) {
      await removeFile(outPath);
      if (isMissingBinary(err)) {
        throw new ExtractionError(`${this.bin} not found on PATH`, 'tool-missing', err);
      }
      throw err;
    }

    if (result.exitCode !== 0) {
      await removeFile(outPath);
      const code = result.exitCode === 124 ? 'unreadable-input' : classifyFfmpegFailure(result.stderr);
      const detail = result.exitCode === 124 ? `timed out after ${this.timeoutMs}ms` : lastLine(result.stderr);
      throw new ExtractionError(
        code === 'no-audio-track'
          ? `No audio track in ${inputPath}`
          : `Cannot extract audio from ${inputPath}: ${detail}`,
        code,
      );
    }

    const size = await fileSize(outPath);
    if (size === 0) {
      await removeFile(outPath);
      throw new ExtractionError(`No audio track in ${inputPath}`, 'no-audio-track');
    }

    this.logger.debug(`Extracted ${size} bytes of audio to ${outPath}`);
    return outPath;
  }
}

function isMissingBinary(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

async function fileSize(filePath: string): Promise<number> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.size;
  } catch {
    return 0;
  }
}
