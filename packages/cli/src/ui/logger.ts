/**
 * @module ui/logger
 * Logger that renders through @clack/prompts: info lines drive the spinner
 * message, everything else goes to clack's log.
 */

import * as clack from '@clack/prompts';

import type { Logger } from '@touch/core';

type Spinner = ReturnType<typeof clack.spinner>;

function format(msg: string, args: unknown[]): string {
  return args.length ? `${msg} ${args.map((a) => String(a)).join(' ')}` : msg;
}

export class ClackLogger implements Logger {
  constructor(
    private readonly spin: Spinner,
    private readonly debugEnabled = false,
  ) { }

  debug(msg: string, ...args: unknown[]) {
    if (this.debugEnabled) clack.log.message(format(msg, args));
  }
  info(msg: string, ...args: unknown[]) {
    this.spin.message(format(msg, args));
  }
  warn(msg: string, ...args: unknown[]) {
    clack.log.warn(format(msg, args));
  }
  error(msg: string, ...args: unknown[]) {
    clack.log.error(format(msg, args));
  }
}
