/**
 * @module utils/args
 * Minimal argv helpers. All functions take the argument list after the
 * command name, so they can be exercised without touching process.argv.
 */

import path from 'node:path';

import { TRANSFORM_MODES, type TransformMode } from '@touch/core';
import { UsageError } from './errors.js';

/** Flags that take a value. */
const VALUE_FLAGS = new Set(['--output', '-o', '--mode', '--timeout']);

export function argValue(args: readonly string[], ...flags: string[]): string | undefined {
  for (const flag of flags) {
    const i = args.indexOf(flag);
    if (i === -1) continue;
    const value = args[i + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new UsageError(`${flag} needs a value`, flag);
    }
    return value;
  }
  return undefined;
}

export function hasFlag(args: readonly string[], flag: string): boolean {
  return args.includes(flag);
}

/** Arguments that are neither flags nor flag values. */
export function positionals(args: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const item = args[i];
    if (item === undefined) continue;
    if (VALUE_FLAGS.has(item)) {
      i++;
      continue;
    }
    if (!item.startsWith('-')) out.push(item);
  }
  return out;
}

// ---------------------------------------------------------------------------
// convert
// ---------------------------------------------------------------------------

export interface ConvertArgs {
  input: string;
  output: string;
  mode: TransformMode;
  timeoutMs?: number;
  debug: boolean;
}

function isTransformMode(value: string): value is TransformMode {
  return TRANSFORM_MODES.some((m) => m === value);
}

/**
 * `talk.mp4` → `talk.brf` next to the working directory.
 * URL inputs use the last path segment, or `touch-output`.
 */
export function defaultOutputPath(input: string): string {
  let base: string;
  if (/^https?:\/\//i.test(input)) {
    const segment = URL.canParse(input)
      ? new URL(input).pathname.split('/').filter(Boolean).pop() ?? ''
      : '';
    base = segment.replace(/[^\w.-]+/g, '-') || 'touch-output';
  } else {
    base = path.basename(input);
  }
  const ext = path.extname(base);
  return `${ext ? base.slice(0, -ext.length) : base}.brf`;
}

export function parseConvertArgs(args: readonly string[]): ConvertArgs {
  const [input, extra] = positionals(args);
  if (!input) throw new UsageError('Missing <input>: a media file path or URL', 'input');
  if (extra) throw new UsageError(`Unexpected argument: ${extra}`, 'input');

  const mode = argValue(args, '--mode') ?? 'literal';
  if (!isTransformMode(mode)) {
    throw new UsageError(`--mode must be one of ${TRANSFORM_MODES.join(', ')}`, '--mode', mode);
  }

  let timeoutMs: number | undefined;
  const timeout = argValue(args, '--timeout');
  if (timeout !== undefined) {
    const seconds = Number(timeout);
    if (!Number.isFinite(seconds) || seconds <= 0) {
      throw new UsageError('--timeout must be a positive number of seconds', '--timeout', timeout);
    }
    timeoutMs = Math.round(seconds * 1000);
  }

  return {
    input,
    output: argValue(args, '--output', '-o') ?? defaultOutputPath(input),
    mode,
    timeoutMs,
    debug: hasFlag(args, '--debug'),
  };
}
