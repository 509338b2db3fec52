import { describe, it, expect } from "vitest";
import {
  createEmptyMesh,
  createMesh,
  getMeshTriangleCount,
  getMeshVertexCount,
  translateMesh,
} from "../../src/mesh/types.js";

describe(`mesh artifact`, () => {
  it(`should count vertices and triangles`, () => {
    const mesh = createMesh([0, 0, 0, 1, 0, 0, 0, 1, 0], [0, 0, 1, 0, 0, 1, 0, 0, 1], [0, 1, 2]);
    expect(getMeshVertexCount(mesh)).toBe(3);
    expect(getMeshTriangleCount(mesh)).toBe(1);
    expect(getMeshVertexCount(createEmptyMesh())).toBe(0);
  });

  it(`should convert layers to typed arrays`, () => {
    const mesh = createMesh([0, 0, 0], [0, 0, 1], [], { weight: [0.5] });
    expect(mesh.layers.weight).toBeInstanceOf(Float32Array);
    expect(Array.from(mesh.layers.weight ?? [])).toEqual([0.5]);
  });

  it(`should translate positions into a new array`, () => {
    const mesh = createMesh([1, 1, 1, 2, 2, 2], [0, 0, 1, 0, 0, 1], []);
    const moved = translateMesh(mesh, [-1, 0, 1]);
    expect(Array.from(moved.positions)).toEqual([0, 1, 2, 1, 2, 3]);
    expect(Array.from(mesh.positions)).toEqual([1, 1, 1, 2, 2, 2]);
    expect(moved.indices).toBe(mesh.indices);
  });
});
