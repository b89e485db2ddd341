/**
 * @module braille
 * Unicode Braille cells (U+2800–U+28FF) and the deterministic
 * character-to-cell table used when no primary transform is usable.
 */

import fs from 'node:fs';
import { z } from 'zod';

export const BRAILLE_RANGE_START = 0x2800;
export const BRAILLE_RANGE_END = 0x28ff;

const BrailleCell = z
  .string()
  .refine((s) => [...s].length === 1 && isBrailleCell(s), 'must be a single Braille cell');

const BrailleTableSchema = z.object({
  /** Cell written for characters the table does not know. */
  blank: BrailleCell,
  /** Lowercase character → cell. */
  cells: z.record(z.string().length(1), BrailleCell),
});

export type BrailleTable = z.infer<typeof BrailleTableSchema>;

const TABLE_URL = new URL('../data/braille-table.json', import.meta.url);

let cached: BrailleTable | undefined;

/** Load and validate the bundled table (read once per process). */
export function brailleTable(): BrailleTable {
  cached ??= BrailleTableSchema.parse(JSON.parse(fs.readFileSync(TABLE_URL, 'utf8')));
  return cached;
}

export function isBrailleCell(ch: string): boolean {
  const cp = ch.codePointAt(0);
  return cp !== undefined && cp >= BRAILLE_RANGE_START && cp <= BRAILLE_RANGE_END;
}

/** Keep only Braille cells. */
export function filterBraille(text: string): string {
  return [...text].filter(isBrailleCell).join('');
}

/**
 * One cell per input code point: case-insensitive lookup, blank for
 * anything unmapped (including whitespace and line breaks).
 */
export function toBrailleLiteral(text: string, table: BrailleTable = brailleTable()): string {
  let out = '';
  for (const ch of text) {
    const lower = ch.toLowerCase();
    out += (lower.length === 1 ? table.cells[lower] : undefined) ?? table.blank;
  }
  return out;
}
