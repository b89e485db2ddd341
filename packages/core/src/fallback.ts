/**
 * @module fallback
 * FallbackConverter: the text-transform stage, which never fails a run.
 *
 * Each mode owns a chain: call the primary service, normalise, validate,
 * and degrade to a local result when the primary is absent, throws, or
 * returns suspect output.
 *
 *   literal    primary → keep Braille cells → isAcceptable? → else table lookup
 *   optimized  primary → strip boilerplate   → non-empty?   → else original text
 */

import type { Logger } from './context.js';
import { TransformError, messageOf } from './errors.js';
import { brailleTable, filterBraille, toBrailleLiteral, type BrailleTable } from './braille.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TransformMode = 'literal' | 'optimized';

export const TRANSFORM_MODES: readonly TransformMode[] = ['literal', 'optimized'];

export interface TextTransformService {
  readonly name: string;
  transform(text: string, mode: TransformMode, signal?: AbortSignal): Promise<string>;
}

/**
 * Literal output shorter than this share of the input (in code points)
 * is treated as incomplete.
 */
export const LITERAL_MIN_LENGTH_RATIO = 0.3;

export interface ConversionResult {
  text: string;
  mode: TransformMode;
  source: 'primary' | 'fallback';
  /** True whenever the fallback produced the text. */
  degraded: boolean;
  /** Why the primary result was not used. */
  reason?: string;
  /** Set when the primary service threw. */
  error?: TransformError;
}

interface FallbackChain {
  /** Clean up raw primary output. */
  normalize(raw: string): string;
  /** Returns a rejection reason, or null when the output is usable. */
  validate(output: string, input: string): string | null;
  /** Deterministic local result. */
  degrade(input: string): string;
}

// ---------------------------------------------------------------------------
// Completeness heuristic
// ---------------------------------------------------------------------------

/** Non-empty and at least `minRatio` of the input length, counted in code points. */
export function isAcceptable(
  output: string,
  input: string,
  minRatio: number = LITERAL_MIN_LENGTH_RATIO,
): boolean {
  const outLen = [...output].length;
  if (outLen === 0) return false;
  return outLen >= [...input].length * minRatio;
}

// ---------------------------------------------------------------------------
// Normalisers
// ---------------------------------------------------------------------------

const BOILERPLATE_PREFIXES: readonly RegExp[] = [
  /^(sure|certainly|of course)[!,.]?\s*/i,
  /^here(?:'s| is) (?:the|a|your) [^:\n]*:\s*/i,
  /^(?:simplified|optimized|braille[- ]optimized|braille[- ]friendly) (?:text|version)[^:\n]*:\s*/i,
];

/** Strip assistant preambles and collapse whitespace. */
export function normalizeOptimized(raw: string): string {
  let text = raw.trim();
  let stripped = true;
  while (stripped) {
    stripped = false;
    for (const re of BOILERPLATE_PREFIXES) {
      const next = text.replace(re, '');
      if (next !== text) {
        text = next.trimStart();
        stripped = true;
      }
    }
  }
  return text
    .replace(/^["“]|["”]$/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Whitespace runs become one blank cell and everything outside the Braille
 * block is dropped. Blank runs left behind by dropped prose collapse to one
 * cell, and leading or trailing blanks are removed.
 */
export function normalizeLiteral(raw: string, table: BrailleTable = brailleTable()): string {
  const cells = filterBraille(raw.replace(/\s+/g, table.blank));
  return cells
    .replace(new RegExp(`${table.blank}{2,}`, 'gu'), table.blank)
    .replace(new RegExp(`^${table.blank}|${table.blank}$`, 'gu'), '');
}

// ---------------------------------------------------------------------------
// Converter
// ---------------------------------------------------------------------------

export interface FallbackConverterOptions {
  /** Primary service. Absent means every call degrades. */
  service?: TextTransformService;
  logger: Logger;
  literalMinLengthRatio?: number;
}

export class FallbackConverter {
  private readonly service?: TextTransformService;
  private readonly logger: Logger;
  private readonly chains: Record<TransformMode, FallbackChain>;

  constructor(opts: FallbackConverterOptions) {
    this.service = opts.service;
    this.logger = opts.logger;
    const minRatio = opts.literalMinLengthRatio ?? LITERAL_MIN_LENGTH_RATIO;

    this.chains = {
      literal: {
        normalize: (raw) => normalizeLiteral(raw),
        validate: (output, input) =>
          isAcceptable(output, input, minRatio)
            ? null
            : `literal output too short (${[...output].length} cells for ${[...input].length} characters)`,
        degrade: (input) => toBrailleLiteral(input),
      },
      optimized: {
        normalize: normalizeOptimized,
        validate: (output) => (output.length > 0 ? null : 'optimized output is empty'),
        // No local paraphraser exists; the untransformed text is the degraded result.
        degrade: (input) => input,
      },
    };
  }

  /** Transformed text. Never rejects. */
  async convert(text: string, mode: TransformMode, signal?: AbortSignal): Promise<string> {
    const result = await this.convertDetailed(text, mode, signal);
    return result.text;
  }

  async convertDetailed(
    text: string,
    mode: TransformMode,
    signal?: AbortSignal,
  ): Promise<ConversionResult> {
    const chain = this.chains[mode];

    if (!this.service) {
      return this.degrade(chain, text, mode, 'no transform service configured');
    }

    let raw: string;
    try {
      raw = await this.service.transform(text, mode, signal);
    } catch (err) {
      const error = new TransformError(`${this.service.name} transform failed: ${messageOf(err)}`, err);
      return this.degrade(chain, text, mode, error.message, error);
    }

    const output = chain.normalize(raw);
    const rejection = chain.validate(output, text);
    if (rejection) {
      return this.degrade(chain, text, mode, rejection);
    }

    this.logger.debug(`${mode} transform via ${this.service.name}: ${[...output].length} characters`);
    return { text: output, mode, source: 'primary', degraded: false };
  }

  private degrade(
    chain: FallbackChain,
    text: string,
    mode: TransformMode,
    reason: string,
    error?: TransformError,
  ): ConversionResult {
    this.logger.warn(`Using ${mode} fallback: ${reason}`);
    return { text: chain.degrade(text), mode, source: 'fallback', degraded: true, reason, error };
  }
}
