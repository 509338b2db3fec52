/**
 * Artifact swapper
 *
 * Replaces a target's content resource. Materials belong to the target's
 * usage, not to the regenerated geometry, so they are carried over. The old
 * resource is removed once nothing references it, and the new one takes
 * its name so references by name keep working.
 */

import type { MeshArtifact } from '../mesh/types.js';
import type { ResourceStore, SceneGraph, TargetObject } from '../host/types.js';

export interface SwapResult {
  /** Name of the resource now attached to the target */
  resource: string;
  /** Resource that was attached before, if any */
  previous: string | null;
  /** Whether the previous resource was removed */
  released: boolean;
}

export function swapArtifact(
  scene: SceneGraph,
  resources: ResourceStore,
  target: TargetObject,
  artifact: MeshArtifact
): SwapResult {
  const previous = target.data;
  const created = resources.create(artifact, previous ?? target.name);

  if (previous !== null) {
    resources.setMaterials(created, [...resources.getMaterials(previous)]);
  }
  scene.assignData(target, created);

  if (previous === null || resources.users(previous) > 0) {
    return { resource: created, previous, released: false };
  }

  resources.remove(previous);
  const resource = resources.rename(created, previous);
  return { resource, previous, released: true };
}
