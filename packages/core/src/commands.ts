/**
 * Commands for the host's UI layer
 *
 * Each command reports success or a user-facing error instead of throwing.
 */

import { buildArtifact } from './artifact/build.js';
import {
  isSourceObject,
  isTargetObject,
  type SceneObject,
  type TargetObject,
} from './host/types.js';
import { resolveSourceRef, sourceRefOf } from './link/registry.js';
import { createLink } from './link/schema.js';
import { copy4, invertAffine4 } from './num/mat4.js';
import type { MeshSyncEngine } from './sync/engine.js';
import { errorMessage, type UpdateReport } from './sync/types.js';

export type CommandResult<T> =
  | { success: true; value: T; message: string }
  | { success: false; error: string };

/**
 * Create a mesh copy of `source` and link it for automatic updates
 */
export function linkMeshCopy(
  engine: MeshSyncEngine,
  source: SceneObject | null | undefined
): CommandResult<TargetObject> {
  if (!isSourceObject(source)) {
    return { success: false, error: 'Select a curve or surface object' };
  }
  const { scene, resources, evaluator } = engine.host;
  const { config } = engine;

  const name = `${source.name}${config.meshSuffix}`;
  let resource: string;
  try {
    const artifact = buildArtifact(evaluator, source, { applyModifiers: true, preserveAllDataLayers: true });
    resource = resources.create(artifact, name);
  } catch (err) {
    return { success: false, error: `Could not build mesh from ${source.name}: ${errorMessage(err)}` };
  }

  const parentInverse = config.autoParent ? invertAffine4(source.matrixWorld) : null;
  const target = scene.addMeshObject({
    name,
    data: resource,
    link: createLink({ source: sourceRefOf(source), debounce: config.defaultDebounce }),
    matrixWorld: copy4(source.matrixWorld),
    parent: parentInverse ? { name: source.name, parentInverse } : null,
  });
  engine.markBuilt(source, target);

  return { success: true, value: target, message: `Linked mesh created: ${target.name}` };
}

/**
 * Regenerate immediately, bypassing the debounce and the unchanged check.
 *
 * Accepts either a linked mesh (its source is updated) or a source.
 */
export function updateNow(
  engine: MeshSyncEngine,
  active: SceneObject | null | undefined
): CommandResult<UpdateReport> {
  let sourceName: string | undefined;
  if (isTargetObject(active) && active.link?.source) {
    sourceName = resolveSourceRef(engine.host.scene, active.link.source)?.name;
  } else if (isSourceObject(active)) {
    sourceName = active.name;
  }
  if (sourceName === undefined) {
    return { success: false, error: 'Select a linked mesh or its curve/surface source' };
  }

  const report = engine.updateNowByName(sourceName, { force: true });
  const failed = report.outcomes.filter((outcome) => outcome.status === 'failed').length;
  const message = failed > 0 ? `Updated with ${failed} failure(s)` : `Updated meshes for ${sourceName}`;
  return { success: true, value: report, message };
}

/**
 * Detach a linked mesh from its source
 */
export function unlink(engine: MeshSyncEngine, target: SceneObject | null | undefined): CommandResult<TargetObject> {
  if (!isTargetObject(target) || target.link === null || target.link.source === null) {
    return { success: false, error: 'Select a linked mesh to unlink' };
  }
  const ref = target.link.source;
  const sourceName = resolveSourceRef(engine.host.scene, ref)?.name ?? ref.name;
  engine.host.scene.setLink(target, { ...target.link, source: null });
  engine.forgetFingerprint(sourceName);
  return { success: true, value: target, message: 'Unlinked mesh from source' };
}
