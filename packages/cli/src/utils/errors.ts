/**
 * @module utils/errors
 * CLI-only error types. Pipeline failures arrive as TouchError from core.
 */

/**
 * Bad command-line usage. Carries the offending flag or argument and,
 * when there is one, the rejected value.
 */
export class UsageError extends Error {
  readonly field: string;
  readonly value?: string;

  constructor(message: string, field: string, value?: unknown) {
    super(message);
    this.name = 'UsageError';
    this.field = field;
    this.value = value !== undefined ? String(value) : undefined;
  }
}
