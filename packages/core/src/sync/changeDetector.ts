/**
 * Change detection
 *
 * Two independent triggers: a fingerprint comparison, and the exit from
 * edit mode (some hosts do not report geometry updates while a source is
 * being edited directly, so leaving that mode counts as a change).
 */

import type { SourceObject } from '../host/types.js';
import { fingerprint } from '../fingerprint/fingerprint.js';
import type { ModifierSchemaTable } from '../fingerprint/modifierSchema.js';
import type { SyncState } from './state.js';

export class ChangeDetector {
  constructor(
    private readonly state: SyncState,
    private readonly schema: ModifierSchemaTable
  ) {}

  /**
   * Has the source's shape-relevant content changed since last observed?
   * Updates the cache when it has. Unknown fingerprints count as changed.
   */
  changed(source: SourceObject): boolean {
    const digest = fingerprint(source, this.schema);
    if (digest === null) {
      return true;
    }
    if (this.state.fingerprints.get(source.name) === digest) {
      return false;
    }
    this.state.fingerprints.set(source.name, digest);
    return true;
  }

  /**
   * Record the source's mode; true exactly on the edge leaving edit mode
   */
  exitedDirectEdit(source: SourceObject): boolean {
    const previous = this.state.modes.get(source.name);
    this.state.modes.set(source.name, source.mode);
    return previous === 'edit' && source.mode !== 'edit';
  }
}
