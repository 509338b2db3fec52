/**
 * MeshSyncEngine - keeps linked meshes in step with their sources
 *
 * Owns all runtime state (fingerprint cache, mode cache, pending tasks) and
 * exposes the operations the host's command layer calls. State lives and
 * dies with activation: `activate()` subscribes to the host's feeds on a
 * clean slate, `deactivate()` unsubscribes and drops everything.
 */

import { buildArtifact } from '../artifact/build.js';
import { swapArtifact } from '../artifact/swap.js';
import { resolveSyncConfig, type SyncConfig, type SyncConfigInput } from '../config.js';
import { fingerprint } from '../fingerprint/fingerprint.js';
import { DEFAULT_MODIFIER_SCHEMA, type ModifierSchemaTable } from '../fingerprint/modifierSchema.js';
import {
  isSourceObject,
  type EvaluateOptions,
  type SourceObject,
  type SyncHost,
  type TargetObject,
  type Unsubscribe,
  type UpdateBatch,
} from '../host/types.js';
import { targetsFor } from '../link/registry.js';
import type { Link } from '../link/schema.js';
import type { MeshArtifact } from '../mesh/types.js';
import { ChangeDetector } from './changeDetector.js';
import { EventRouter } from './router.js';
import { DebounceScheduler } from './scheduler.js';
import { SyncState } from './state.js';
import { errorMessage, type TargetOutcome, type UpdateReport } from './types.js';

export interface MeshSyncEngineOptions {
  config?: SyncConfigInput;
  /** Override the modifier schema table used for fingerprints */
  modifierSchema?: ModifierSchemaTable;
}

export interface UpdateOptions {
  includeDisabled?: boolean;
  /** Rebuild even targets whose last build used the current digest */
  force?: boolean;
}

const LOG_TAG = '[CurveLink]';

function buildOptionsOf(link: Link): EvaluateOptions {
  return { applyModifiers: link.applyModifiers, preserveAllDataLayers: link.preserveAllDataLayers };
}

export class MeshSyncEngine {
  readonly config: SyncConfig;
  readonly state = new SyncState();
  readonly detector: ChangeDetector;
  readonly scheduler: DebounceScheduler;
  private readonly router: EventRouter;
  private readonly modifierSchema: ModifierSchemaTable;
  private subscriptions: Unsubscribe[] | null = null;

  constructor(
    readonly host: SyncHost,
    options: MeshSyncEngineOptions = {}
  ) {
    this.config = resolveSyncConfig(options.config ?? {});
    this.modifierSchema = options.modifierSchema ?? DEFAULT_MODIFIER_SCHEMA;
    this.detector = new ChangeDetector(this.state, this.modifierSchema);
    this.scheduler = new DebounceScheduler(host.scene, host.timers, (name, force) =>
      this.runScheduledUpdate(name, force)
    );
    this.router = new EventRouter(host.scene, this.detector, this.scheduler, (name) =>
      this.forgetFingerprint(name)
    );
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  get isActive(): boolean {
    return this.subscriptions !== null;
  }

  /**
   * Subscribe to the host's feeds. Calling it again while active is a no-op.
   */
  activate(): void {
    if (this.subscriptions !== null) {
      return;
    }
    this.resetRuntimeState();
    this.subscriptions = [
      this.host.events.onSceneChanged((batch) => this.onSceneChanged(batch)),
      this.host.events.onDocumentLoaded(() => this.onDocumentLoaded()),
    ];
    console.log(`${LOG_TAG} Activated`);
  }

  /**
   * Unsubscribe, cancel pending work and clear all runtime state
   */
  deactivate(): void {
    if (this.subscriptions === null) {
      return;
    }
    for (const unsubscribe of this.subscriptions) {
      unsubscribe();
    }
    this.subscriptions = null;
    this.resetRuntimeState();
    console.log(`${LOG_TAG} Deactivated`);
  }

  // ==========================================================================
  // Handlers
  // ==========================================================================

  onSceneChanged(batch: UpdateBatch): void {
    this.router.onSceneChanged(batch);
  }

  /**
   * Source names may be reused across a load, so nothing carries over
   */
  onDocumentLoaded(): void {
    this.resetRuntimeState();
  }

  // ==========================================================================
  // Queries & commands
  // ==========================================================================

  linkedMeshesForSource(source: SourceObject | null | undefined, includeDisabled = false): TargetObject[] {
    return targetsFor(this.host.scene, source, { includeDisabled });
  }

  /**
   * Purge cached state and any pending task for a source name
   */
  forgetFingerprint(sourceName: string): void {
    this.state.forget(sourceName);
    this.scheduler.cancel(sourceName);
  }

  /**
   * Regenerate every linked target of the named source right away.
   *
   * Targets whose last successful build used the source's current digest
   * are skipped unless `force` is set. Failures are per target and never
   * thrown.
   */
  updateNowByName(sourceName: string, { includeDisabled = false, force = false }: UpdateOptions = {}): UpdateReport {
    const source = this.host.scene.getObject(sourceName);
    if (!isSourceObject(source)) {
      this.forgetFingerprint(sourceName);
      return { source: sourceName, missing: true, outcomes: [] };
    }

    const digest = fingerprint(source, this.modifierSchema);
    const outcomes = targetsFor(this.host.scene, source, { includeDisabled }).map((target) =>
      this.updateTarget(source, target, digest, force)
    );
    return { source: sourceName, missing: false, outcomes };
  }

  /**
   * Record that `target` currently reflects `source`, e.g. right after a
   * mesh copy was created from it.
   */
  markBuilt(source: SourceObject, target: TargetObject): void {
    if (target.link === null) {
      return;
    }
    const digest = fingerprint(source, this.modifierSchema);
    this.state.recordBuilt(source.name, target.id, digest, buildOptionsOf(target.link));
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private updateTarget(
    source: SourceObject,
    target: TargetObject,
    digest: string | null,
    force: boolean
  ): TargetOutcome {
    const link = target.link;
    if (link === null || link.source === null) {
      return { status: 'skipped', target: target.name, reason: 'unlinked' };
    }
    const options = buildOptionsOf(link);
    if (!force && digest !== null && this.state.isBuiltFrom(source.name, target.id, digest, options)) {
      return { status: 'skipped', target: target.name, reason: 'unchanged' };
    }

    let artifact: MeshArtifact;
    try {
      artifact = buildArtifact(this.host.evaluator, source, options);
    } catch (err) {
      console.error(`${LOG_TAG} Update failed for ${target.name}: ${errorMessage(err)}`);
      return { status: 'failed', target: target.name, failure: { stage: 'build', message: errorMessage(err), cause: err } };
    }

    try {
      const swapped = swapArtifact(this.host.scene, this.host.resources, target, artifact);
      this.state.recordBuilt(source.name, target.id, digest, options);
      return { status: 'updated', target: target.name, resource: swapped.resource, released: swapped.released };
    } catch (err) {
      console.error(`${LOG_TAG} Swap failed for ${target.name}: ${errorMessage(err)}`);
      return { status: 'failed', target: target.name, failure: { stage: 'swap', message: errorMessage(err), cause: err } };
    }
  }

  private runScheduledUpdate(sourceName: string, force: boolean): void {
    try {
      this.updateNowByName(sourceName, { force });
    } catch (err) {
      // Runs from a timer; nothing above us can handle it
      console.error(`${LOG_TAG} Scheduled update for ${sourceName} failed:`, err);
    }
  }

  private resetRuntimeState(): void {
    this.scheduler.clear();
    this.state.clear();
  }
}
