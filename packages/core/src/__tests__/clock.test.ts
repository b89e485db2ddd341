import { describe, expect, it } from 'vitest';

import { CancelledError } from '../errors.js';
import { sleep, throwIfAborted } from '../utils/clock.js';

describe('sleep', () => {
  it('resolves after the delay', async () => {
    await expect(sleep(5)).resolves.toBeUndefined();
  });

  it('rejects an in-flight wait as soon as the signal aborts', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const started = Date.now();
    const err = await sleep(10_000, controller.signal).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CancelledError);
    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it('rejects with the CancelledError the signal was aborted with', async () => {
    const controller = new AbortController();
    const reason = new CancelledError('Run exceeded its 50ms deadline');
    setTimeout(() => controller.abort(reason), 10);

    await expect(sleep(10_000, controller.signal)).rejects.toBe(reason);
  });

  it('rejects at once when the signal has already fired', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(10_000, controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});

describe('throwIfAborted', () => {
  it('does nothing without an aborted signal', () => {
    expect(() => throwIfAborted(new AbortController().signal)).not.toThrow();
    expect(() => throwIfAborted(undefined)).not.toThrow();
  });
});
