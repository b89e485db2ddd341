/**
 * @module utils/shell
 * Subprocess execution with timeout and abort signal.
 */

import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';

export interface ShellResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ShellOptions {
  /** Working directory. Default: process.cwd() */
  cwd?: string;
  /** Timeout in ms. Default: 120_000 (2 min). Use 0 for no timeout. */
  timeoutMs?: number;
  /** AbortSignal for cancellation. */
  signal?: AbortSignal;
  /** Environment variables to merge with process.env. */
  env?: Record<string, string>;
  /**
   * Called for every line written to stderr by the child process.
   * Useful for real-time progress parsing (e.g. ffmpeg time= lines).
   */
  onStderrLine?: (line: string) => void;
  /** Called for every line written to stdout by the child process. */
  onStdoutLine?: (line: string) => void;
}

/**
 * Run a command via `spawn` with line-by-line stdout/stderr streaming.
 *
 * Resolves on exit, including non-zero exits (check `exitCode`; 124 means
 * killed by timeout). Rejects on spawn failure (e.g. ENOENT when the binary
 * is missing) or when `signal` aborts.
 *
 * @param bin   Executable name (e.g. `'ffmpeg'`).
 * @param args  Argument array, passed without shell quoting.
 */
export function shellStreaming(
  bin: string,
  args: string[],
  opts: ShellOptions = {},
): Promise<ShellResult> {
  const { cwd, timeoutMs = 120_000, signal, env, onStderrLine, onStdoutLine } = opts;

  return new Promise<ShellResult>((resolve, reject) => {
    if (signal?.aborted) {
      return reject(new Error(`Command aborted before start: ${bin} ${args.join(' ')}`));
    }

    const child = spawn(bin, args, {
      cwd,
      env: env ? { ...process.env, ...env } : undefined,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdoutChunks: string[] = [];
    const stderrChunks: string[] = [];
    let killed = false;

    const kill = () => {
      killed = true;
      child.kill('SIGTERM');
      setTimeout(() => {
        if (child.exitCode === null) child.kill('SIGKILL');
      }, 5000).unref();
    };

    // ── Timeout handling ─────────────────────────────────────────────
    let timer: ReturnType<typeof setTimeout> | undefined;
    if (timeoutMs > 0) {
      timer = setTimeout(kill, timeoutMs);
    }

    // ── Abort signal ─────────────────────────────────────────────────
    if (signal) {
      signal.addEventListener('abort', kill, { once: true });
    }

    // ── Line streaming ───────────────────────────────────────────────
    createInterface({ input: child.stdout }).on('line', (line) => {
      stdoutChunks.push(line);
      onStdoutLine?.(line);
    });
    createInterface({ input: child.stderr }).on('line', (line) => {
      stderrChunks.push(line);
      onStderrLine?.(line);
    });

    // ── Exit handling ────────────────────────────────────────────────
    child.on('error', (err) => {
      if (timer) clearTimeout(timer);
      if (signal) signal.removeEventListener('abort', kill);
      reject(err);
    });

    child.on('close', (code, sig) => {
      if (timer) clearTimeout(timer);
      if (signal) signal.removeEventListener('abort', kill);

      if (signal?.aborted) {
        return reject(new Error('Command aborted'));
      }

      let exitCode = code ?? 0;
      if (killed || sig) {
        exitCode = 124;
      }

      resolve({
        stdout: stdoutChunks.join('\n'),
        stderr: stderrChunks.join('\n'),
        exitCode,
      });
    });
  });
}

/** Check if a CLI tool is available on PATH. */
export async function hasCommand(name: string): Promise<boolean> {
  try {
    const result = await shellStreaming('sh', ['-c', `command -v ${name}`], { timeoutMs: 5000 });
    return result.exitCode === 0;
  } catch {
    return false;
  }
}
