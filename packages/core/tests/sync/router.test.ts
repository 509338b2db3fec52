import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { EventRouter } from "../../src/sync/router.js";
import { ChangeDetector } from "../../src/sync/changeDetector.js";
import { DebounceScheduler } from "../../src/sync/scheduler.js";
import { SyncState } from "../../src/sync/state.js";
import { createNodeTimers, type NodeTimerFacility } from "../../src/sync/timers.js";
import { DEFAULT_MODIFIER_SCHEMA } from "../../src/fingerprint/modifierSchema.js";
import type { UpdateBatch } from "../../src/host/types.js";
import { MemoryScene } from "../fixtures/memoryHost.js";
import { simpleCurve } from "../fixtures/curves.js";

function objectBatch(name: string, geometry: boolean): UpdateBatch {
  return { objectsUpdated: true, curvesUpdated: false, updates: [{ kind: "object", name, geometry }] };
}

describe("EventRouter", () => {
  let scene: MemoryScene;
  let state: SyncState;
  let timers: NodeTimerFacility;
  let scheduler: DebounceScheduler;
  let forget: Mock<(name: string) => void>;
  let router: EventRouter;

  beforeEach(() => {
    vi.useFakeTimers();
    scene = new MemoryScene();
    state = new SyncState();
    timers = createNodeTimers();
    scheduler = new DebounceScheduler(scene, timers, vi.fn());
    forget = vi.fn<(name: string) => void>();
    router = new EventRouter(scene, new ChangeDetector(state, DEFAULT_MODIFIER_SCHEMA), scheduler, forget);
  });

  afterEach(() => {
    timers.clear();
    vi.useRealTimers();
  });

  it("should ignore a batch with neither flag set", () => {
    const source = scene.addSource("Curve", simpleCurve());
    scene.addTarget("Mesh", source);

    router.onSceneChanged({
      objectsUpdated: false,
      curvesUpdated: false,
      updates: [
        { kind: "object", name: "Curve", geometry: true },
        { kind: "object", name: "Gone", geometry: true },
      ],
    });

    expect(scheduler.size).toBe(0);
    expect(forget).not.toHaveBeenCalled();
  });

  it("should forget a name that no longer resolves", () => {
    router.onSceneChanged(objectBatch("Gone", true));
    expect(forget).toHaveBeenCalledWith("Gone");
    expect(scheduler.size).toBe(0);
  });

  it("should ignore updates on mesh targets", () => {
    const source = scene.addSource("Curve", simpleCurve());
    scene.addTarget("Mesh", source);

    router.onSceneChanged(objectBatch("Mesh", true));

    expect(scheduler.size).toBe(0);
    expect(forget).not.toHaveBeenCalled();
  });

  it("should schedule a source whose geometry changed", () => {
    const source = scene.addSource("Curve", simpleCurve());
    scene.addTarget("Mesh", source);

    router.onSceneChanged(objectBatch("Curve", true));

    expect(scheduler.pending("Curve")?.force).toBe(false);
    expect(state.fingerprints.has("Curve")).toBe(true);
  });

  it("should not fingerprint a non-geometry update", () => {
    const source = scene.addSource("Curve", simpleCurve());
    scene.addTarget("Mesh", source);

    router.onSceneChanged(objectBatch("Curve", false));

    expect(scheduler.size).toBe(0);
    expect(state.fingerprints.has("Curve")).toBe(false);
    expect(state.modes.get("Curve")).toBe("object");
  });

  it("should not reschedule an unchanged source", () => {
    const source = scene.addSource("Curve", simpleCurve());
    scene.addTarget("Mesh", source);
    router.onSceneChanged(objectBatch("Curve", true));
    scheduler.cancel("Curve");

    router.onSceneChanged(objectBatch("Curve", true));

    expect(scheduler.pending("Curve")).toBeUndefined();
  });

  it("should force an update on leaving edit mode", () => {
    const source = scene.addSource("Curve", simpleCurve());
    scene.addTarget("Mesh", source);
    source.mode = "edit";
    router.onSceneChanged(objectBatch("Curve", false));
    expect(scheduler.size).toBe(0);

    source.mode = "object";
    router.onSceneChanged(objectBatch("Curve", false));

    expect(scheduler.pending("Curve")?.force).toBe(true);
  });

  it("should check every user of changed curve data", () => {
    const first = scene.addSource("First", simpleCurve("Shared"));
    const second = scene.addSource("Second", simpleCurve("Shared"));
    const other = scene.addSource("Other", simpleCurve("Elsewhere"));
    scene.addTarget("FirstMesh", first);
    scene.addTarget("SecondMesh", second);
    scene.addTarget("OtherMesh", other);

    router.onSceneChanged({ objectsUpdated: false, curvesUpdated: true, updates: [{ kind: "curve-data", name: "Shared" }] });

    expect(scheduler.pending("First")).toBeDefined();
    expect(scheduler.pending("Second")).toBeDefined();
    expect(scheduler.pending("Other")).toBeUndefined();
  });
});
