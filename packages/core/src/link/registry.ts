/**
 * Link registry
 *
 * Resolves the many-to-one relation between derived mesh targets and their
 * source. Nothing here caches object handles: every lookup goes back to the
 * scene, matching by identity first and by stable name as a fallback.
 */

import {
  isSourceObject,
  isTargetObject,
  type SceneGraph,
  type SourceObject,
  type TargetObject,
} from '../host/types.js';
import type { SourceRef } from './schema.js';

export interface TargetQuery {
  /** Include targets whose link has autoUpdate turned off */
  includeDisabled?: boolean;
}

/**
 * Build a weak reference to a source object
 */
export function sourceRefOf(source: SourceObject): SourceRef {
  return { id: source.id, name: source.name };
}

/**
 * Does the reference resolve to this source?
 *
 * The stored name is only consulted when the stored id no longer belongs to
 * a live source; a renamed source keeps its links even after another
 * object takes its old name.
 */
export function refersTo(scene: SceneGraph, ref: SourceRef, source: SourceObject): boolean {
  return resolveSourceRef(scene, ref)?.id === source.id;
}

/**
 * Resolve a weak source reference against the current scene.
 *
 * The object with the referenced id wins if it is still a source; otherwise
 * the source currently carrying the referenced name; otherwise undefined.
 */
export function resolveSourceRef(scene: SceneGraph, ref: SourceRef | null): SourceObject | undefined {
  if (ref === null) {
    return undefined;
  }
  let byName: SourceObject | undefined;
  for (const obj of scene.objects()) {
    if (!isSourceObject(obj)) continue;
    if (obj.id === ref.id) {
      return obj;
    }
    if (byName === undefined && obj.name === ref.name) {
      byName = obj;
    }
  }
  return byName;
}

/**
 * All mesh targets linked to `source`, in scene order
 */
export function targetsFor(
  scene: SceneGraph,
  source: SourceObject | null | undefined,
  { includeDisabled = false }: TargetQuery = {}
): TargetObject[] {
  if (!source) {
    return [];
  }
  const result: TargetObject[] = [];
  const seen = new Set<string>();
  for (const obj of scene.objects()) {
    if (!isTargetObject(obj) || obj.link === null || obj.link.source === null) continue;
    if (!includeDisabled && !obj.link.autoUpdate) continue;
    if (seen.has(obj.id) || !refersTo(scene, obj.link.source, source)) continue;
    seen.add(obj.id);
    result.push(obj);
  }
  return result;
}

/**
 * Source objects that use the named curve-data resource
 */
export function sourcesUsingCurve(scene: SceneGraph, curveName: string): SourceObject[] {
  const result: SourceObject[] = [];
  for (const obj of scene.objects()) {
    if (isSourceObject(obj) && obj.data !== null && obj.data.name === curveName) {
      result.push(obj);
    }
  }
  return result;
}
