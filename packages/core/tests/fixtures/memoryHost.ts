/**
 * In-memory host for engine tests
 *
 * Plain objects stand in for the scene; the event bus is driven by hand
 * through `emit` and `emitLoaded`.
 */

import { vi } from "vitest";
import type {
  EvaluateOptions,
  EvaluationService,
  MaterialSlot,
  NewMeshObject,
  ResourceStore,
  SceneEventBus,
  SceneGraph,
  SceneObject,
  SourceObject,
  SyncHost,
  TargetObject,
  Unsubscribe,
  UpdateBatch,
} from "../../src/host/types.js";
import { isTargetObject } from "../../src/host/types.js";
import { createLink, type Link, type LinkInput } from "../../src/link/schema.js";
import { createMesh, type MeshArtifact } from "../../src/mesh/types.js";
import { identity4 } from "../../src/num/mat4.js";
import { projectHomogeneous, type Vec3 } from "../../src/num/vec3.js";
import type { CurveData, Modifier } from "../../src/source/types.js";
import { createNodeTimers, type NodeTimerFacility } from "../../src/sync/timers.js";

interface StoredMesh {
  artifact: MeshArtifact;
  materials: MaterialSlot[];
}

export class MemoryScene implements SceneGraph, ResourceStore, SceneEventBus {
  readonly list: SceneObject[] = [];
  readonly meshes = new Map<string, StoredMesh>();
  /** Every addMeshObject request, in order */
  readonly meshRequests: NewMeshObject[] = [];
  private readonly sceneHandlers = new Set<(batch: UpdateBatch) => void>();
  private readonly loadHandlers = new Set<() => void>();
  private nextId = 1;

  // --------------------------------------------------------------------------
  // Test setup helpers
  // --------------------------------------------------------------------------

  addSource(name: string, data: CurveData, modifiers: Modifier[] = []): SourceObject {
    const source: SourceObject = {
      id: `obj-${this.nextId++}`,
      name,
      type: "curve",
      data,
      modifiers,
      mode: "object",
      visible: true,
      selected: false,
      matrixWorld: identity4(),
    };
    this.list.push(source);
    return source;
  }

  addTarget(name: string, source: SourceObject | null, link: LinkInput = {}): TargetObject {
    const resource = this.create(createMesh([0, 0, 0], [0, 0, 1], []), name);
    const target: TargetObject = {
      id: `obj-${this.nextId++}`,
      name,
      type: "mesh",
      data: resource,
      link: createLink({ source: source ? { id: source.id, name: source.name } : null, ...link }),
      parent: null,
      visible: true,
      selected: false,
      matrixWorld: identity4(),
    };
    this.list.push(target);
    return target;
  }

  removeObject(name: string): void {
    const index = this.list.findIndex((obj) => obj.name === name);
    if (index >= 0) this.list.splice(index, 1);
  }

  emit(batch: UpdateBatch): void {
    for (const handler of this.sceneHandlers) handler(batch);
  }

  /**
   * Emit a geometry update for one object
   */
  emitGeometry(name: string): void {
    this.emit({ objectsUpdated: true, curvesUpdated: false, updates: [{ kind: "object", name, geometry: true }] });
  }

  emitLoaded(): void {
    for (const handler of this.loadHandlers) handler();
  }

  get subscriberCount(): number {
    return this.sceneHandlers.size + this.loadHandlers.size;
  }

  // --------------------------------------------------------------------------
  // SceneGraph
  // --------------------------------------------------------------------------

  objects(): Iterable<SceneObject> {
    return this.list;
  }

  getObject(name: string): SceneObject | undefined {
    return this.list.find((obj) => obj.name === name);
  }

  assignData(target: TargetObject, resource: string): void {
    const obj = this.list.find((candidate) => candidate.id === target.id);
    if (isTargetObject(obj)) obj.data = resource;
  }

  addMeshObject(spec: NewMeshObject): TargetObject {
    this.meshRequests.push(spec);
    const target: TargetObject = {
      id: `obj-${this.nextId++}`,
      name: this.uniqueName(spec.name, (name) => this.getObject(name) !== undefined),
      type: "mesh",
      data: spec.data,
      link: spec.link,
      parent: spec.parent?.name ?? null,
      visible: true,
      selected: false,
      matrixWorld: spec.matrixWorld,
    };
    this.list.push(target);
    return target;
  }

  setLink(target: TargetObject, link: Link | null): void {
    const obj = this.list.find((candidate) => candidate.id === target.id);
    if (isTargetObject(obj)) obj.link = link;
  }

  // --------------------------------------------------------------------------
  // ResourceStore
  // --------------------------------------------------------------------------

  create(artifact: MeshArtifact, nameHint: string): string {
    const name = this.uniqueName(nameHint, (candidate) => this.meshes.has(candidate));
    this.meshes.set(name, { artifact, materials: [] });
    return name;
  }

  getMaterials(resource: string): MaterialSlot[] {
    return this.meshes.get(resource)?.materials ?? [];
  }

  setMaterials(resource: string, materials: MaterialSlot[]): void {
    const mesh = this.meshes.get(resource);
    if (mesh) mesh.materials = materials;
  }

  users(resource: string): number {
    return this.list.filter((obj) => isTargetObject(obj) && obj.data === resource).length;
  }

  remove(resource: string): void {
    this.meshes.delete(resource);
  }

  rename(resource: string, name: string): string {
    const mesh = this.meshes.get(resource);
    if (!mesh) return resource;
    this.meshes.delete(resource);
    const applied = this.uniqueName(name, (candidate) => this.meshes.has(candidate));
    this.meshes.set(applied, mesh);
    for (const obj of this.list) {
      if (isTargetObject(obj) && obj.data === resource) obj.data = applied;
    }
    return applied;
  }

  // --------------------------------------------------------------------------
  // SceneEventBus
  // --------------------------------------------------------------------------

  onSceneChanged(handler: (batch: UpdateBatch) => void): Unsubscribe {
    this.sceneHandlers.add(handler);
    return () => this.sceneHandlers.delete(handler);
  }

  onDocumentLoaded(handler: () => void): Unsubscribe {
    this.loadHandlers.add(handler);
    return () => this.loadHandlers.delete(handler);
  }

  private uniqueName(hint: string, taken: (name: string) => boolean): string {
    if (!taken(hint)) return hint;
    for (let i = 1; ; i++) {
      const candidate = `${hint}.${String(i).padStart(3, "0")}`;
      if (!taken(candidate)) return candidate;
    }
  }
}

/**
 * Evaluator that emits one vertex per control point
 */
export class FakeEvaluator implements EvaluationService {
  readonly calls: Array<{ source: string; options: EvaluateOptions }> = [];
  /** Evaluations matching this predicate throw */
  failWhen: (source: SourceObject, options: EvaluateOptions) => boolean = () => false;

  evaluate(source: SourceObject, options: EvaluateOptions): MeshArtifact {
    this.calls.push({ source: source.name, options });
    if (this.failWhen(source, options)) {
      throw new Error("unevaluable modifier configuration");
    }
    const positions: number[] = [];
    for (const spline of source.data?.splines ?? []) {
      const points: Vec3[] =
        spline.kind === "bezier"
          ? spline.bezierPoints.map((point) => point.co)
          : spline.kind === "surface"
            ? spline.rows.flat().map((point) => projectHomogeneous(point.co))
            : spline.points.map((point) => projectHomogeneous(point.co));
      for (const point of points) positions.push(...point);
    }
    const normals = positions.map((_, i) => (i % 3 === 2 ? 1 : 0));
    const layers: Record<string, number[]> = options.preserveAllDataLayers ? { uv: positions.map(() => 0.5) } : {};
    return createMesh(positions, normals, [], layers);
  }
}

export interface TestHost extends SyncHost {
  scene: MemoryScene;
  resources: MemoryScene;
  events: MemoryScene;
  evaluator: FakeEvaluator;
  timers: NodeTimerFacility;
}

export function createTestHost(): TestHost {
  const scene = new MemoryScene();
  return {
    scene,
    resources: scene,
    events: scene,
    evaluator: new FakeEvaluator(),
    timers: createNodeTimers(),
  };
}

/**
 * Silence the engine's console output for a test file
 */
export function muteConsole() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => undefined),
    error: vi.spyOn(console, "error").mockImplementation(() => undefined),
  };
}
