/**
 * @module fetcher
 * MediaFetcher backed by yt-dlp: downloads the best audio stream of a
 * remote video into the run's work directory.
 */

import fs from 'node:fs';
import path from 'node:path';
import ytDlpWrap from 'yt-dlp-wrap';

import {
  InputError,
  ensureDir,
  messageOf,
  removeFile,
  type Logger,
  type MediaFetcher,
  type RunScope,
} from '@touch/core';

/** Runs yt-dlp with `args` and resolves to its stdout. */
export type YtDlpRunner = (args: string[], signal?: AbortSignal) => Promise<string>;

export interface YtDlpFetcherOptions {
  workDir: string;
  logger: Logger;
  /** yt-dlp executable. Default: `yt-dlp` from PATH */
  binaryPath?: string;
  /** Replaces the yt-dlp-wrap runner (tests). */
  runner?: YtDlpRunner;
}

/**
 * Extract a video id from the common YouTube URL shapes
 * (`watch?v=`, `youtu.be/`, `/shorts/`). Null when there is none.
 */
export function videoIdOf(raw: string): string | null {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    return null;
  }
  if (url.hostname.endsWith('youtu.be')) {
    return url.pathname.slice(1).split('/')[0] || null;
  }
  if (!url.hostname.endsWith('youtube.com')) return null;
  const v = url.searchParams.get('v');
  if (v) return v;
  const parts = url.pathname.split('/').filter(Boolean);
  const idx = parts.indexOf('shorts');
  return idx !== -1 ? parts[idx + 1] ?? null : null;
}

/** yt-dlp arguments for a single-video best-audio download. */
export function ytDlpArgs(url: string, outputTemplate: string): string[] {
  return [
    url,
    '-f', 'bestaudio/best',
    '--no-playlist',
    '--no-progress',
    '-o', outputTemplate,
    '--print', 'after_move:filepath',
  ];
}

function defaultRunner(binaryPath: string): YtDlpRunner {
  const ytdlp = new ytDlpWrap.default(binaryPath);
  return (args, signal) => ytdlp.execPromise(args, undefined, signal);
}

export class YtDlpFetcher implements MediaFetcher {
  readonly name = 'yt-dlp';
  private readonly workDir: string;
  private readonly logger: Logger;
  private readonly run: YtDlpRunner;

  constructor(opts: YtDlpFetcherOptions) {
    this.workDir = opts.workDir;
    this.logger = opts.logger;
    this.run = opts.runner ?? defaultRunner(opts.binaryPath ?? 'yt-dlp');
  }

  async fetch(url: string, scope: RunScope): Promise<string> {
    ensureDir(this.workDir);
    const template = path.join(this.workDir, `touch-${scope.runId}-source.%(ext)s`);
    const id = videoIdOf(url);
    this.logger.info(`Downloading audio${id ? ` for video ${id}` : ''} from ${url}`);

    let stdout: string;
    try {
      stdout = await this.run(ytDlpArgs(url, template), scope.signal);
    } catch (err) {
      await this.discardPartials(scope.runId);
      throw new InputError(`yt-dlp could not download ${url}: ${messageOf(err)}`, url, err);
    }

    const downloaded = stdout
      .split('\n')
      .map((l) => l.trim())
      .filter(Boolean)
      .pop();
    if (!downloaded || !fs.existsSync(downloaded)) {
      await this.discardPartials(scope.runId);
      throw new InputError(`yt-dlp reported no downloaded file for ${url}`, url);
    }

    this.logger.debug(`Downloaded ${url} → ${downloaded}`);
    return downloaded;
  }

  /** Remove whatever a failed download left under this run's name, `.part` files included. */
  private async discardPartials(runId: string): Promise<void> {
    const prefix = `touch-${runId}-source.`;
    const entries = await fs.promises.readdir(this.workDir);
    await Promise.all(
      entries.filter((name) => name.startsWith(prefix)).map((name) => removeFile(path.join(this.workDir, name))),
    );
  }
}
