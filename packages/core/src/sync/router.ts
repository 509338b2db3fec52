/**
 * Event router
 *
 * Entry point for the host's change feed. Decides, per notification, which
 * sources need a change check and hands the changed ones to the scheduler.
 */

import { isSourceObject, type SceneGraph, type SourceObject, type UpdateBatch } from '../host/types.js';
import { sourcesUsingCurve } from '../link/registry.js';
import type { ChangeDetector } from './changeDetector.js';
import type { DebounceScheduler } from './scheduler.js';

export class EventRouter {
  constructor(
    private readonly scene: SceneGraph,
    private readonly detector: ChangeDetector,
    private readonly scheduler: DebounceScheduler,
    private readonly forget: (sourceName: string) => void
  ) {}

  /**
   * Handle one batch of scene updates
   */
  onSceneChanged(batch: UpdateBatch): void {
    if (!batch.objectsUpdated && !batch.curvesUpdated) {
      return;
    }

    for (const entry of batch.updates) {
      if (entry.kind === 'object') {
        const obj = this.scene.getObject(entry.name);
        if (obj === undefined) {
          this.forget(entry.name);
        } else if (isSourceObject(obj)) {
          this.evaluate(obj, entry.geometry);
        }
        continue;
      }

      // Geometry flags are not reliable for shared curve data, so every
      // user of the resource is checked.
      for (const source of sourcesUsingCurve(this.scene, entry.name)) {
        this.evaluate(source, true);
      }
    }
  }

  private evaluate(source: SourceObject, geometry: boolean): void {
    const modeExit = this.detector.exitedDirectEdit(source);
    const geometryChanged = geometry && this.detector.changed(source);
    if (geometryChanged || modeExit) {
      this.scheduler.schedule(source, { force: modeExit });
    }
  }
}
