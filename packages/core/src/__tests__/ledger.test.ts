import { describe, expect, it } from 'vitest';

import { ServiceError } from '../errors.js';
import { ResourceLedger, type ArtifactKind, type ArtifactReleasers } from '../ledger.js';
import { RecordingLogger } from './helpers.js';

function recordingReleasers(failOn: Partial<Record<string, Error>> = {}) {
  const calls: Array<[ArtifactKind, string]> = [];
  const make = (kind: ArtifactKind) => async (location: string) => {
    calls.push([kind, location]);
    const failure = failOn[location];
    if (failure) throw failure;
  };
  const releasers: ArtifactReleasers = {
    LocalFile: make('LocalFile'),
    RemoteObject: make('RemoteObject'),
    RemoteJob: make('RemoteJob'),
  };
  return { calls, releasers };
}

describe('ResourceLedger', () => {
  it('releases artifacts in reverse registration order', async () => {
    const { calls, releasers } = recordingReleasers();
    const ledger = new ResourceLedger(releasers, new RecordingLogger());
    ledger.register('LocalFile', '/tmp/a.wav');
    ledger.register('RemoteObject', 's3://bucket/a.wav');
    ledger.register('RemoteJob', 'touch-1');

    const report = await ledger.releaseAll();

    expect(calls).toEqual([
      ['RemoteJob', 'touch-1'],
      ['RemoteObject', 's3://bucket/a.wav'],
      ['LocalFile', '/tmp/a.wav'],
    ]);
    expect(report.attempted).toBe(3);
    expect(report.released).toHaveLength(3);
    expect(report.failures).toEqual([]);
  });

  it('attempts each release exactly once across repeated calls', async () => {
    const { calls, releasers } = recordingReleasers();
    const ledger = new ResourceLedger(releasers, new RecordingLogger());
    ledger.register('LocalFile', '/tmp/a.wav');

    await ledger.releaseAll();
    const second = await ledger.releaseAll();

    expect(calls).toHaveLength(1);
    expect(second).toEqual({ attempted: 0, released: [], failures: [] });
    expect(ledger.released).toBe(true);
  });

  it('keeps releasing after a failure and logs a cleanup warning', async () => {
    const { calls, releasers } = recordingReleasers({ 's3://bucket/a.wav': new Error('boom') });
    const logger = new RecordingLogger();
    const ledger = new ResourceLedger(releasers, logger);
    ledger.register('LocalFile', '/tmp/a.wav');
    ledger.register('RemoteObject', 's3://bucket/a.wav');
    ledger.register('RemoteJob', 'touch-1');

    const report = await ledger.releaseAll();

    expect(calls).toHaveLength(3);
    expect(report.released.map((a) => a.location)).toEqual(['touch-1', '/tmp/a.wav']);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]?.artifact.location).toBe('s3://bucket/a.wav');
    expect(report.failures[0]?.error.message).toBe('boom');
    expect(logger.at('warn')).toEqual(['Cleanup of RemoteObject s3://bucket/a.wav failed: boom']);
  });

  it('counts an already-deleted resource as released', async () => {
    const { releasers } = recordingReleasers({
      'touch-1': new ServiceError('transcribe', 'not-found', 'no such job'),
    });
    const logger = new RecordingLogger();
    const ledger = new ResourceLedger(releasers, logger);
    ledger.register('RemoteJob', 'touch-1');

    const report = await ledger.releaseAll();

    expect(report.released.map((a) => a.location)).toEqual(['touch-1']);
    expect(report.failures).toEqual([]);
    expect(logger.at('warn')).toEqual([]);
  });

  it('refuses registrations after release', async () => {
    const { releasers } = recordingReleasers();
    const ledger = new ResourceLedger(releasers, new RecordingLogger());
    await ledger.releaseAll();
    expect(() => ledger.register('LocalFile', '/tmp/late.wav')).toThrow(/already released/);
  });

  it('lists a frozen snapshot in registration order', () => {
    const { releasers } = recordingReleasers();
    const ledger = new ResourceLedger(releasers, new RecordingLogger());
    ledger.register('LocalFile', '/tmp/a.wav');
    ledger.register('RemoteObject', 's3://bucket/a.wav');

    const list = ledger.list();
    expect(list.map((a) => a.kind)).toEqual(['LocalFile', 'RemoteObject']);
    expect(Object.isFrozen(list[0])).toBe(true);
    expect(ledger.size).toBe(2);
  });
});
