/**
 * Scene document creation
 *
 * Uses Y.Map and Y.Array for the persisted model.
 */

import * as Y from 'yjs';
import { SCHEMA_VERSION } from './schema.js';
import { openSceneDocument, type SceneDocument } from './yjs.js';

/**
 * Create an empty scene document
 *
 * Layout:
 * - root: Y.Map
 *   - meta: Y.Map (schemaVersion, name, created, modified)
 *   - objects: Y.Map<id, Y.Map> (object records)
 *   - objectOrder: Y.Array<id> (scene order)
 *   - curves: Y.Map<name, Y.Map> (curve-data records)
 *   - meshes: Y.Map<name, Y.Map> (mesh resources)
 */
export function createSceneDocument(name = 'Untitled'): SceneDocument {
  const ydoc = new Y.Doc();

  ydoc.transact(() => {
    const root = ydoc.getMap('root');

    const meta = new Y.Map<unknown>();
    root.set('meta', meta);
    meta.set('schemaVersion', SCHEMA_VERSION);
    meta.set('name', name);
    meta.set('created', Date.now());
    meta.set('modified', Date.now());

    root.set('objects', new Y.Map());
    root.set('objectOrder', new Y.Array<string>());
    root.set('curves', new Y.Map());
    root.set('meshes', new Y.Map());
  });

  return openSceneDocument(ydoc);
}

/**
 * Load a document from an encoded Yjs update
 */
export function loadSceneDocument(update: Uint8Array): SceneDocument {
  const ydoc = new Y.Doc();
  Y.applyUpdate(ydoc, update);
  return openSceneDocument(ydoc);
}

/**
 * Encode the whole document as a Yjs update
 */
export function saveSceneDocument(doc: SceneDocument): Uint8Array {
  return Y.encodeStateAsUpdate(doc.ydoc);
}
