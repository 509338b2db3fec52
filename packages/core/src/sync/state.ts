/**
 * Runtime sync state
 *
 * Per-source bookkeeping keyed by source name. None of it is persisted:
 * it starts empty on activation and is cleared on deactivation and on
 * document load, since names can be reused across those boundaries.
 */

import type { EvaluateOptions, InteractionMode } from '../host/types.js';

/**
 * What a target's current artifact was built from
 */
export interface BuiltRecord {
  digest: string;
  applyModifiers: boolean;
  preserveAllDataLayers: boolean;
}

export class SyncState {
  /** Last observed fingerprint per source */
  readonly fingerprints = new Map<string, string>();
  /** Last observed interaction mode per source */
  readonly modes = new Map<string, InteractionMode>();
  /** Source digest and build options at each target's last successful regeneration */
  private readonly built = new Map<string, Map<string, BuiltRecord>>();

  /**
   * Digest the target was last built from, if any
   */
  builtDigest(sourceName: string, targetId: string): string | undefined {
    return this.built.get(sourceName)?.get(targetId)?.digest;
  }

  /**
   * Was the target last built from this digest with these options?
   */
  isBuiltFrom(sourceName: string, targetId: string, digest: string, options: EvaluateOptions): boolean {
    const record = this.built.get(sourceName)?.get(targetId);
    return (
      record !== undefined &&
      record.digest === digest &&
      record.applyModifiers === options.applyModifiers &&
      record.preserveAllDataLayers === options.preserveAllDataLayers
    );
  }

  /**
   * Record a successful build. A null digest (unknown) clears the entry so
   * the next update always rebuilds.
   */
  recordBuilt(sourceName: string, targetId: string, digest: string | null, options: EvaluateOptions): void {
    let perTarget = this.built.get(sourceName);
    if (digest === null) {
      perTarget?.delete(targetId);
      return;
    }
    if (!perTarget) {
      perTarget = new Map();
      this.built.set(sourceName, perTarget);
    }
    perTarget.set(targetId, {
      digest,
      applyModifiers: options.applyModifiers,
      preserveAllDataLayers: options.preserveAllDataLayers,
    });
  }

  /**
   * Drop everything known about one source
   */
  forget(sourceName: string): void {
    this.fingerprints.delete(sourceName);
    this.modes.delete(sourceName);
    this.built.delete(sourceName);
  }

  clear(): void {
    this.fingerprints.clear();
    this.modes.clear();
    this.built.clear();
  }

  get isEmpty(): boolean {
    return this.fingerprints.size === 0 && this.modes.size === 0 && this.built.size === 0;
  }
}
