/**
 * @module ledger
 * ResourceLedger: owns every ephemeral artifact a run creates.
 *
 * Artifacts are registered the moment they exist and released in reverse
 * registration order by `releaseAll`, which never throws: each failure is
 * logged as a cleanup warning and the remaining artifacts are still released.
 */

import type { Logger } from './context.js';
import { isIgnorable, messageOf, toError } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ArtifactKind = 'LocalFile' | 'RemoteObject' | 'RemoteJob';

export interface Artifact {
  readonly kind: ArtifactKind;
  /** File path, object URI, or job id. */
  readonly location: string;
  readonly createdAt: Date;
}

/** One delete function per artifact kind. */
export type ArtifactReleasers = Readonly<Record<ArtifactKind, (location: string) => Promise<void>>>;

export interface ReleaseFailure {
  artifact: Artifact;
  error: Error;
}

export interface ReleaseReport {
  /** Number of release attempts made by this call. */
  attempted: number;
  released: Artifact[];
  failures: ReleaseFailure[];
}

// ---------------------------------------------------------------------------
// Ledger
// ---------------------------------------------------------------------------

export class ResourceLedger {
  private readonly artifacts: Artifact[] = [];
  private drained = false;

  constructor(
    private readonly releasers: ArtifactReleasers,
    private readonly logger: Logger,
  ) { }

  register(kind: ArtifactKind, location: string): Artifact {
    if (this.drained) {
      throw new Error(`Cannot register ${kind} ${location}: ledger already released`);
    }
    const artifact: Artifact = Object.freeze({ kind, location, createdAt: new Date() });
    this.artifacts.push(artifact);
    this.logger.debug(`Registered ${kind}: ${location}`);
    return artifact;
  }

  /** Snapshot of registered artifacts in registration order. */
  list(): readonly Artifact[] {
    return [...this.artifacts];
  }

  get size(): number {
    return this.artifacts.length;
  }

  get released(): boolean {
    return this.drained;
  }

  /**
   * Release everything, newest first. Safe to call more than once: only the
   * first call attempts any deletion.
   */
  async releaseAll(): Promise<ReleaseReport> {
    const report: ReleaseReport = { attempted: 0, released: [], failures: [] };
    if (this.drained) return report;
    this.drained = true;

    for (const artifact of [...this.artifacts].reverse()) {
      report.attempted++;
      try {
        await this.releasers[artifact.kind](artifact.location);
        report.released.push(artifact);
        this.logger.debug(`Released ${artifact.kind}: ${artifact.location}`);
      } catch (err) {
        if (isIgnorable(err)) {
          report.released.push(artifact);
          this.logger.debug(`${artifact.kind} already gone: ${artifact.location}`);
          continue;
        }
        report.failures.push({ artifact, error: toError(err) });
        this.logger.warn(`Cleanup of ${artifact.kind} ${artifact.location} failed: ${messageOf(err)}`);
      }
    }

    return report;
  }
}
