/**
 * YjsScene - a scene graph, resource store and change feed over a Y.Doc
 *
 * Engine-facing methods implement the host ports of @curvelink/core.
 * Editing methods mirror what a host UI does to the document; each runs in
 * one transaction and so produces one update batch.
 */

import { randomUUID } from 'node:crypto';
import type * as Y from 'yjs';
import {
  defaultCurveSettings,
  identity4,
  isSourceObject,
  isTargetObject,
  type CurveData,
  type CurveSettings,
  type InteractionMode,
  type Link,
  type Mat4,
  type MaterialSlot,
  type MeshArtifact,
  type Modifier,
  type NewMeshObject,
  type ResourceStore,
  type SceneEventBus,
  type SceneGraph,
  type SceneObject,
  type SourceObject,
  type Spline,
  type TargetObject,
  type Unsubscribe,
  type UpdateBatch,
} from '@curvelink/core';
import { batchFromEvents } from './changeFeed.js';
import { createSceneDocument, loadSceneDocument, saveSceneDocument } from './createDocument.js';
import { SceneDocumentError, UnknownEntityError } from './errors.js';
import {
  artifactToRecord,
  readCurveRecord,
  readMeshRecord,
  readObjectRecord,
  recordToArtifact,
  toCurveData,
  toSceneObject,
} from './records.js';
import type { ObjectRecord } from './schema.js';
import { validateDocument } from './validate.js';
import { getRecordMap, insertRecordMap, setMapProperties, uniqueName, type SceneDocument } from './yjs.js';

export interface NewSourceObject {
  name: string;
  type?: 'curve' | 'surface';
  /** Curve-data resource name; created from `splines`/`settings` if missing */
  curve: string;
  settings?: Partial<CurveSettings>;
  splines?: Spline[];
  modifiers?: Modifier[];
  matrixWorld?: Mat4;
}

type EventsHandler = (events: Array<Y.YEvent<Y.AbstractType<unknown>>>) => void;

export class YjsScene implements SceneGraph, ResourceStore, SceneEventBus {
  private doc: SceneDocument;
  private readonly sceneHandlers = new Set<(batch: UpdateBatch) => void>();
  private readonly loadHandlers = new Set<() => void>();
  /** Object names as of the last processed transaction, by id */
  private knownNames = new Map<string, string>();
  private readonly observer: EventsHandler = (events) => this.handleEvents(events);

  constructor(doc: SceneDocument = createSceneDocument()) {
    this.doc = doc;
    this.attach();
  }

  get document(): SceneDocument {
    return this.doc;
  }

  // ==========================================================================
  // SceneGraph
  // ==========================================================================

  *objects(): Iterable<SceneObject> {
    for (const id of this.doc.objectOrder.toArray()) {
      const record = this.readObject(id);
      if (record) {
        yield toSceneObject(record, (name) => this.getCurve(name));
      }
    }
  }

  getObject(name: string): SceneObject | undefined {
    const record = this.findRecord(name);
    return record ? toSceneObject(record, (curve) => this.getCurve(curve)) : undefined;
  }

  assignData(target: TargetObject, resource: string): void {
    this.requireObjectMap(target.id).set('data', resource);
  }

  addMeshObject(spec: NewMeshObject): TargetObject {
    const id = randomUUID();
    const record: ObjectRecord = {
      id,
      name: uniqueName(spec.name, (name) => this.findRecord(name) !== undefined),
      type: 'mesh',
      data: spec.data,
      link: spec.link,
      parent: spec.parent?.name ?? null,
      parentInverse: spec.parent?.parentInverse ?? null,
      visible: true,
      selected: false,
      matrixWorld: spec.matrixWorld,
    };
    this.doc.ydoc.transact(() => {
      insertRecordMap(this.doc.objects, id, record);
      this.doc.objectOrder.push([id]);
    });
    const created = this.getObject(record.name);
    if (!isTargetObject(created)) {
      throw new SceneDocumentError([`objects.${id}: mesh object was not stored`]);
    }
    return created;
  }

  setLink(target: TargetObject, link: Link | null): void {
    this.requireObjectMap(target.id).set('link', link);
  }

  // ==========================================================================
  // ResourceStore
  // ==========================================================================

  create(artifact: MeshArtifact, nameHint: string): string {
    const name = uniqueName(nameHint, (candidate) => this.doc.meshes.has(candidate));
    insertRecordMap(this.doc.meshes, name, artifactToRecord(artifact));
    return name;
  }

  getMaterials(resource: string): MaterialSlot[] {
    const map = getRecordMap(this.doc.meshes, resource);
    return map ? readMeshRecord(map, resource).materials : [];
  }

  setMaterials(resource: string, materials: MaterialSlot[]): void {
    const map = getRecordMap(this.doc.meshes, resource);
    if (!map) {
      throw new UnknownEntityError('mesh', resource);
    }
    map.set('materials', [...materials]);
  }

  users(resource: string): number {
    let count = 0;
    for (const obj of this.objects()) {
      if (isTargetObject(obj) && obj.data === resource) count++;
    }
    return count;
  }

  remove(resource: string): void {
    this.doc.meshes.delete(resource);
  }

  /**
   * Move a mesh resource to a new name. Objects using it follow.
   */
  rename(resource: string, name: string): string {
    const map = getRecordMap(this.doc.meshes, resource);
    if (!map) {
      throw new UnknownEntityError('mesh', resource);
    }
    const record = readMeshRecord(map, resource);
    const applied = uniqueName(name, (candidate) => candidate !== resource && this.doc.meshes.has(candidate));
    if (applied === resource) {
      return resource;
    }
    this.doc.ydoc.transact(() => {
      this.doc.meshes.delete(resource);
      insertRecordMap(this.doc.meshes, applied, record);
      for (const obj of this.objects()) {
        if (isTargetObject(obj) && obj.data === resource) {
          this.requireObjectMap(obj.id).set('data', applied);
        }
      }
    });
    return applied;
  }

  /**
   * Read a mesh resource back as an artifact
   */
  getArtifact(resource: string): MeshArtifact | undefined {
    const map = getRecordMap(this.doc.meshes, resource);
    return map ? recordToArtifact(readMeshRecord(map, resource)) : undefined;
  }

  meshNames(): string[] {
    return [...this.doc.meshes.keys()];
  }

  // ==========================================================================
  // SceneEventBus
  // ==========================================================================

  onSceneChanged(handler: (batch: UpdateBatch) => void): Unsubscribe {
    this.sceneHandlers.add(handler);
    return () => {
      this.sceneHandlers.delete(handler);
    };
  }

  onDocumentLoaded(handler: () => void): Unsubscribe {
    this.loadHandlers.add(handler);
    return () => {
      this.loadHandlers.delete(handler);
    };
  }

  // ==========================================================================
  // Editing
  // ==========================================================================

  getCurve(name: string): CurveData | undefined {
    const map = getRecordMap(this.doc.curves, name);
    return map ? toCurveData(name, readCurveRecord(map, name)) : undefined;
  }

  /**
   * Add a curve or surface object, creating its curve data when needed
   */
  addSourceObject(spec: NewSourceObject): SourceObject {
    const id = randomUUID();
    const name = uniqueName(spec.name, (candidate) => this.findRecord(candidate) !== undefined);
    this.doc.ydoc.transact(() => {
      if (!this.doc.curves.has(spec.curve)) {
        insertRecordMap(this.doc.curves, spec.curve, {
          settings: { ...defaultCurveSettings(), ...spec.settings },
          splines: spec.splines ?? [],
        });
      }
      const record: ObjectRecord = {
        id,
        name,
        type: spec.type ?? 'curve',
        data: spec.curve,
        modifiers: spec.modifiers ?? [],
        mode: 'object',
        visible: true,
        selected: false,
        matrixWorld: spec.matrixWorld ?? identity4(),
      };
      insertRecordMap(this.doc.objects, id, record);
      this.doc.objectOrder.push([id]);
    });
    const created = this.getObject(name);
    if (!isSourceObject(created)) {
      throw new SceneDocumentError([`objects.${id}: source object was not stored`]);
    }
    return created;
  }

  /**
   * Add an object with no data
   */
  addEmpty(name: string, matrixWorld: Mat4 = identity4()): SceneObject {
    const id = randomUUID();
    const applied = uniqueName(name, (candidate) => this.findRecord(candidate) !== undefined);
    this.doc.ydoc.transact(() => {
      insertRecordMap(this.doc.objects, id, {
        id,
        name: applied,
        type: 'empty',
        visible: true,
        selected: false,
        matrixWorld,
      });
      this.doc.objectOrder.push([id]);
    });
    return this.requireObject(applied);
  }

  /**
   * Replace settings and/or splines of a curve-data resource
   */
  updateCurve(name: string, update: { settings?: Partial<CurveSettings>; splines?: Spline[] }): void {
    const map = getRecordMap(this.doc.curves, name);
    if (!map) {
      throw new UnknownEntityError('curve', name);
    }
    const current = readCurveRecord(map, name);
    this.doc.ydoc.transact(() => {
      if (update.settings) {
        map.set('settings', { ...current.settings, ...update.settings });
      }
      if (update.splines) {
        map.set('splines', update.splines);
      }
    });
  }

  setModifiers(objectName: string, modifiers: Modifier[]): void {
    this.updateObject(objectName, { modifiers });
  }

  setMode(objectName: string, mode: InteractionMode): void {
    this.updateObject(objectName, { mode });
  }

  setMatrixWorld(objectName: string, matrixWorld: Mat4): void {
    this.updateObject(objectName, { matrixWorld });
  }

  setSelected(objectName: string, selected: boolean): void {
    this.updateObject(objectName, { selected });
  }

  /**
   * Point an object at another curve-data or mesh resource
   */
  setObjectData(objectName: string, data: string | null): void {
    this.updateObject(objectName, { data });
  }

  renameObject(objectName: string, newName: string): string {
    const applied = uniqueName(newName, (candidate) => this.findRecord(candidate) !== undefined);
    this.updateObject(objectName, { name: applied });
    return applied;
  }

  deleteObject(objectName: string): void {
    const record = this.findRecord(objectName);
    if (!record) {
      throw new UnknownEntityError('object', objectName);
    }
    this.doc.ydoc.transact(() => {
      this.doc.objects.delete(record.id);
      const index = this.doc.objectOrder.toArray().indexOf(record.id);
      if (index >= 0) {
        this.doc.objectOrder.delete(index, 1);
      }
    });
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  save(): Uint8Array {
    return saveSceneDocument(this.doc);
  }

  /**
   * Replace the document with a saved one and notify load subscribers
   *
   * @throws SceneDocumentError if the update does not hold a valid scene;
   *   the current document is kept in that case
   */
  load(update: Uint8Array): void {
    const next = loadSceneDocument(update);
    const result = validateDocument(next);
    if (!result.ok) {
      throw new SceneDocumentError(result.errors);
    }
    this.detach();
    this.doc = next;
    this.attach();
    for (const handler of this.loadHandlers) {
      handler();
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private attach(): void {
    this.knownNames = this.scanNames();
    this.doc.root.observeDeep(this.observer);
  }

  private detach(): void {
    this.doc.root.unobserveDeep(this.observer);
  }

  private handleEvents(events: Array<Y.YEvent<Y.AbstractType<unknown>>>): void {
    const batch = batchFromEvents(events, {
      previous: this.knownNames,
      current: (id) => this.readObjectName(id),
    });
    this.knownNames = this.scanNames();
    if (!batch.objectsUpdated && !batch.curvesUpdated) {
      return;
    }
    for (const handler of this.sceneHandlers) {
      handler(batch);
    }
  }

  private scanNames(): Map<string, string> {
    const names = new Map<string, string>();
    for (const id of this.doc.objects.keys()) {
      const name = this.readObjectName(id);
      if (name !== undefined) names.set(id, name);
    }
    return names;
  }

  /**
   * Name of an object record without validating the rest of it
   */
  private readObjectName(id: string): string | undefined {
    const name = getRecordMap(this.doc.objects, id)?.get('name');
    return typeof name === 'string' ? name : undefined;
  }

  private readObject(id: string): ObjectRecord | undefined {
    const map = getRecordMap(this.doc.objects, id);
    return map ? readObjectRecord(map, id) : undefined;
  }

  private findRecord(name: string): ObjectRecord | undefined {
    for (const id of this.doc.objectOrder.toArray()) {
      const record = this.readObject(id);
      if (record?.name === name) {
        return record;
      }
    }
    return undefined;
  }

  private requireObject(name: string): SceneObject {
    const obj = this.getObject(name);
    if (!obj) {
      throw new UnknownEntityError('object', name);
    }
    return obj;
  }

  private requireObjectMap(id: string): Y.Map<unknown> {
    const map = getRecordMap(this.doc.objects, id);
    if (!map) {
      throw new UnknownEntityError('object', id);
    }
    return map;
  }

  private updateObject(objectName: string, props: object): void {
    const record = this.findRecord(objectName);
    if (!record) {
      throw new UnknownEntityError('object', objectName);
    }
    const map = this.requireObjectMap(record.id);
    this.doc.ydoc.transact(() => setMapProperties(map, props));
  }
}
