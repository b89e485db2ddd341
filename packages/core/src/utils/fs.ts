/**
 * @module utils/fs
 * File system helpers shared by the orchestrator and adapters.
 */

import fs from 'node:fs';
import path from 'node:path';

import { throwIfAborted } from './clock.js';

/** Ensure a directory exists (recursive). */
export function ensureDir(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

/** Delete a file. A missing file is not an error. */
export async function removeFile(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { force: true });
}

/** Per-run temp file path: `<dir>/touch-<runId><suffix>`. */
export function runFilePath(dir: string, runId: string, suffix: string): string {
  return path.join(dir, `touch-${runId}${suffix}`);
}

/**
 * Write `text` next to `target`, then rename it into place, so `target`
 * either holds the complete text or is left untouched. An aborted `signal`
 * stops before the rename with CancelledError.
 */
export async function writeTextAtomic(
  target: string,
  tmpPath: string,
  text: string,
  signal?: AbortSignal,
): Promise<void> {
  await fs.promises.writeFile(tmpPath, text, 'utf8');
  throwIfAborted(signal);
  await fs.promises.rename(tmpPath, target);
}
