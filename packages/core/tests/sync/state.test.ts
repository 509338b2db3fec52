import { describe, it, expect } from "vitest";
import { SyncState } from "../../src/sync/state.js";

const FULL = { applyModifiers: true, preserveAllDataLayers: true };

describe("SyncState", () => {
  it("should start empty", () => {
    expect(new SyncState().isEmpty).toBe(true);
  });

  it("should track built digests per source and target", () => {
    const state = new SyncState();
    state.recordBuilt("Curve", "t1", "aaa", FULL);
    state.recordBuilt("Curve", "t2", "bbb", FULL);

    expect(state.builtDigest("Curve", "t1")).toBe("aaa");
    expect(state.builtDigest("Curve", "t2")).toBe("bbb");
    expect(state.builtDigest("Other", "t1")).toBeUndefined();
  });

  it("should match a build only with the same digest and options", () => {
    const state = new SyncState();
    state.recordBuilt("Curve", "t1", "aaa", FULL);

    expect(state.isBuiltFrom("Curve", "t1", "aaa", FULL)).toBe(true);
    expect(state.isBuiltFrom("Curve", "t1", "bbb", FULL)).toBe(false);
    expect(state.isBuiltFrom("Curve", "t1", "aaa", { ...FULL, applyModifiers: false })).toBe(false);
    expect(state.isBuiltFrom("Curve", "t1", "aaa", { ...FULL, preserveAllDataLayers: false })).toBe(false);
    expect(state.isBuiltFrom("Curve", "t2", "aaa", FULL)).toBe(false);
  });

  it("should clear a target's digest when recorded as unknown", () => {
    const state = new SyncState();
    state.recordBuilt("Curve", "t1", "aaa", FULL);
    state.recordBuilt("Curve", "t1", null, FULL);
    expect(state.builtDigest("Curve", "t1")).toBeUndefined();
  });

  it("should forget one source without touching others", () => {
    const state = new SyncState();
    state.fingerprints.set("Curve", "aaa");
    state.modes.set("Curve", "edit");
    state.recordBuilt("Curve", "t1", "aaa", FULL);
    state.fingerprints.set("Other", "bbb");

    state.forget("Curve");

    expect(state.fingerprints.has("Curve")).toBe(false);
    expect(state.modes.has("Curve")).toBe(false);
    expect(state.builtDigest("Curve", "t1")).toBeUndefined();
    expect(state.fingerprints.get("Other")).toBe("bbb");
  });

  it("should clear everything", () => {
    const state = new SyncState();
    state.fingerprints.set("Curve", "aaa");
    state.modes.set("Curve", "object");
    state.recordBuilt("Curve", "t1", "aaa", FULL);

    state.clear();

    expect(state.isEmpty).toBe(true);
  });
});
