/**
 * Host ports
 *
 * The engine does not own the scene. Everything it needs from the host
 * application (objects, content resources, tessellation, timers and the
 * change feed) comes through these interfaces.
 */

import type { Mat4 } from '../num/mat4.js';
import type { MeshArtifact } from '../mesh/types.js';
import type { CurveData, Modifier } from '../source/types.js';
import type { Link } from '../link/schema.js';

// ============================================================================
// Scene objects
// ============================================================================

export type InteractionMode = 'object' | 'edit';

interface SceneObjectBase {
  /** Host identity; stable for the lifetime of the document session */
  id: string;
  /** Stable name, unique among objects at a point in time */
  name: string;
  visible: boolean;
  selected: boolean;
  matrixWorld: Mat4;
}

/**
 * A parametric curve or surface object
 */
export interface SourceObject extends SceneObjectBase {
  type: 'curve' | 'surface';
  /** Shared curve-data resource; null when the host could not read it */
  data: CurveData | null;
  modifiers: Modifier[];
  mode: InteractionMode;
}

/**
 * A mesh object that may be linked to a source
 */
export interface TargetObject extends SceneObjectBase {
  type: 'mesh';
  /** Name of the content resource currently attached */
  data: string | null;
  link: Link | null;
  parent: string | null;
}

export interface EmptyObject extends SceneObjectBase {
  type: 'empty';
}

export type SceneObject = SourceObject | TargetObject | EmptyObject;

export function isSourceObject(obj: SceneObject | undefined | null): obj is SourceObject {
  return obj != null && (obj.type === 'curve' || obj.type === 'surface');
}

export function isTargetObject(obj: SceneObject | undefined | null): obj is TargetObject {
  return obj != null && obj.type === 'mesh';
}

// ============================================================================
// Ports
// ============================================================================

export interface NewMeshObject {
  name: string;
  data: string;
  link: Link;
  /** Initial world transform */
  matrixWorld: Mat4;
  parent: { name: string; parentInverse: Mat4 } | null;
}

export interface SceneGraph {
  /** All objects, in a stable host order */
  objects(): Iterable<SceneObject>;
  getObject(name: string): SceneObject | undefined;
  /** Attach a content resource to a mesh object */
  assignData(target: TargetObject, resource: string): void;
  addMeshObject(spec: NewMeshObject): TargetObject;
  setLink(target: TargetObject, link: Link | null): void;
}

/**
 * Material slot: a material's stable name, or null for an empty slot
 */
export type MaterialSlot = string | null;

export interface ResourceStore {
  /** Create a content resource; returns its (possibly uniquified) name */
  create(artifact: MeshArtifact, nameHint: string): string;
  getMaterials(resource: string): MaterialSlot[];
  setMaterials(resource: string, materials: MaterialSlot[]): void;
  /** Number of objects currently referencing the resource */
  users(resource: string): number;
  remove(resource: string): void;
  /** Rename a resource; returns the name actually applied */
  rename(resource: string, name: string): string;
}

export interface EvaluateOptions {
  applyModifiers: boolean;
  preserveAllDataLayers: boolean;
}

export interface EvaluationService {
  /** Tessellate a source. May throw for unevaluable configurations. */
  evaluate(source: SourceObject, options: EvaluateOptions): MeshArtifact;
}

export type TimerCallback = () => void;

export interface TimerFacility {
  register(callback: TimerCallback, delaySeconds: number): void;
  unregister(callback: TimerCallback): void;
  isRegistered(callback: TimerCallback): boolean;
}

// ============================================================================
// Scene change feed
// ============================================================================

export type UpdateEntry =
  | {
      kind: 'object';
      /** Object name at notification time */
      name: string;
      /** Whether the host flagged the update as touching geometry */
      geometry: boolean;
    }
  | {
      kind: 'curve-data';
      /** Curve-data resource name */
      name: string;
    };

export interface UpdateBatch {
  objectsUpdated: boolean;
  curvesUpdated: boolean;
  updates: UpdateEntry[];
}

export type Unsubscribe = () => void;

export interface SceneEventBus {
  onSceneChanged(handler: (batch: UpdateBatch) => void): Unsubscribe;
  onDocumentLoaded(handler: () => void): Unsubscribe;
}

/**
 * Everything the engine needs from its host
 */
export interface SyncHost {
  scene: SceneGraph;
  resources: ResourceStore;
  evaluator: EvaluationService;
  timers: TimerFacility;
  events: SceneEventBus;
}
