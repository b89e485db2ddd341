/**
 * @module utils/index
 * Re-exports all shared utilities.
 */

export { shellStreaming, hasCommand, type ShellResult, type ShellOptions } from './shell.js';
export { ensureDir, removeFile, runFilePath, writeTextAtomic } from './fs.js';
export { loadDotenv } from './env.js';
export { type Clock, systemClock, sleep, throwIfAborted } from './clock.js';
