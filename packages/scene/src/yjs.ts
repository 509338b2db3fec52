/**
 * Yjs utilities and helpers for the scene document
 */

import * as Y from 'yjs';
import { SceneDocumentError } from './errors.js';

// ============================================================================
// Document Interface
// ============================================================================

export interface SceneDocument {
  ydoc: Y.Doc;
  root: Y.Map<unknown>;
  meta: Y.Map<unknown>;
  /** Object records keyed by object id */
  objects: Y.Map<unknown>;
  /** Object ids in scene order */
  objectOrder: Y.Array<string>;
  /** Curve-data records keyed by curve name */
  curves: Y.Map<unknown>;
  /** Mesh resources keyed by mesh name */
  meshes: Y.Map<unknown>;
}

// ============================================================================
// Accessors
// ============================================================================

/**
 * Get the root map from a Y.Doc
 * All scene state lives under this map
 */
export function getRoot(ydoc: Y.Doc): Y.Map<unknown> {
  return ydoc.getMap('root');
}

/**
 * Get a child Y.Map, failing if the document is not laid out as expected
 */
export function requireMap(parent: Y.Map<unknown>, key: string): Y.Map<unknown> {
  const value = parent.get(key);
  if (!(value instanceof Y.Map)) {
    throw new SceneDocumentError([`${key}: expected a map`]);
  }
  return value;
}

function requireArray(parent: Y.Map<unknown>, key: string): Y.Array<string> {
  const value = parent.get(key);
  if (!(value instanceof Y.Array)) {
    throw new SceneDocumentError([`${key}: expected an array`]);
  }
  return value;
}

/**
 * Wrap an existing Y.Doc that already has the scene layout
 */
export function openSceneDocument(ydoc: Y.Doc): SceneDocument {
  const root = getRoot(ydoc);
  return {
    ydoc,
    root,
    meta: requireMap(root, 'meta'),
    objects: requireMap(root, 'objects'),
    objectOrder: requireArray(root, 'objectOrder'),
    curves: requireMap(root, 'curves'),
    meshes: requireMap(root, 'meshes'),
  };
}

/**
 * Record map stored under `key` in `parent`, if present
 */
export function getRecordMap(parent: Y.Map<unknown>, key: string): Y.Map<unknown> | undefined {
  const value = parent.get(key);
  return value instanceof Y.Map ? value : undefined;
}

// ============================================================================
// Y.Map Creation Helpers
// ============================================================================

/**
 * Insert a new record map under `key` and fill it.
 * The map is integrated into its parent before any property is set.
 */
export function insertRecordMap(parent: Y.Map<unknown>, key: string, props: object): Y.Map<unknown> {
  const map = new Y.Map<unknown>();
  parent.set(key, map);
  setMapProperties(map, props);
  return map;
}

/**
 * Set all properties on a Y.Map from a plain object
 */
export function setMapProperties(map: Y.Map<unknown>, props: object): void {
  for (const [key, value] of Object.entries(props)) {
    if (value !== undefined) {
      map.set(key, value);
    }
  }
}

// ============================================================================
// Naming
// ============================================================================

/**
 * Return `hint`, or `hint.001`, `hint.002`, ... whichever is free first
 */
export function uniqueName(hint: string, taken: (name: string) => boolean): string {
  if (!taken(hint)) {
    return hint;
  }
  for (let i = 1; ; i++) {
    const candidate = `${hint}.${String(i).padStart(3, '0')}`;
    if (!taken(candidate)) {
      return candidate;
    }
  }
}
