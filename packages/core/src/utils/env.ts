/**
 * @module utils/env
 * .env file loader.
 */

import fs from 'node:fs';
import path from 'node:path';

/**
 * Load key=value pairs from a .env file into `env`.
 * Only sets keys that are NOT already present (real env vars take precedence).
 * Supports # comments, quoted values, and empty lines.
 */
export function loadDotenv(dir: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): void {
  const envPath = path.resolve(dir, '.env');
  let content: string;
  try {
    content = fs.readFileSync(envPath, 'utf8');
  } catch {
    return; // no .env
  }

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eqIdx = trimmed.indexOf('=');
    if (eqIdx === -1) continue;

    const key = trimmed.slice(0, eqIdx).trim();
    const val = trimmed
      .slice(eqIdx + 1)
      .trim()
      .replace(/^["']|["']$/g, '');

    if (key && !(key in env)) {
      env[key] = val;
    }
  }
}
