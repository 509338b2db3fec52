import { describe, it, expect } from "vitest";
import { ChangeDetector } from "../../src/sync/changeDetector.js";
import { SyncState } from "../../src/sync/state.js";
import { DEFAULT_MODIFIER_SCHEMA } from "../../src/fingerprint/modifierSchema.js";
import { fingerprint } from "../../src/fingerprint/fingerprint.js";
import { MemoryScene } from "../fixtures/memoryHost.js";
import { simpleCurve } from "../fixtures/curves.js";

function setup() {
  const state = new SyncState();
  const detector = new ChangeDetector(state, DEFAULT_MODIFIER_SCHEMA);
  const source = new MemoryScene().addSource("Curve", simpleCurve());
  return { state, detector, source };
}

describe("ChangeDetector", () => {
  describe("changed", () => {
    it("should report a first observation as changed and cache it", () => {
      const { state, detector, source } = setup();
      expect(detector.changed(source)).toBe(true);
      expect(state.fingerprints.get("Curve")).toBe(fingerprint(source));
    });

    it("should report an identical fingerprint as unchanged", () => {
      const { detector, source } = setup();
      detector.changed(source);
      expect(detector.changed(source)).toBe(false);
    });

    it("should report a modified source as changed once", () => {
      const { detector, source } = setup();
      detector.changed(source);
      if (source.data) source.data.settings.extrude = 0.5;
      expect(detector.changed(source)).toBe(true);
      expect(detector.changed(source)).toBe(false);
    });

    it("should fail open when the fingerprint is unknown", () => {
      const { state, detector, source } = setup();
      source.data = null;
      expect(detector.changed(source)).toBe(true);
      expect(detector.changed(source)).toBe(true);
      expect(state.fingerprints.has("Curve")).toBe(false);
    });

    it("should treat a forgotten source as new", () => {
      const { state, detector, source } = setup();
      detector.changed(source);
      state.forget("Curve");
      expect(detector.changed(source)).toBe(true);
    });
  });

  describe("exitedDirectEdit", () => {
    it("should fire only on the edge leaving edit mode", () => {
      const { detector, source } = setup();
      expect(detector.exitedDirectEdit(source)).toBe(false);
      source.mode = "edit";
      expect(detector.exitedDirectEdit(source)).toBe(false);
      expect(detector.exitedDirectEdit(source)).toBe(false);
      source.mode = "object";
      expect(detector.exitedDirectEdit(source)).toBe(true);
      expect(detector.exitedDirectEdit(source)).toBe(false);
    });

    it("should not fire when the first observation is already outside edit mode", () => {
      const { detector, source } = setup();
      source.mode = "object";
      expect(detector.exitedDirectEdit(source)).toBe(false);
    });
  });
});
