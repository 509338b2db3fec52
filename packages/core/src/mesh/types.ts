/**
 * Mesh artifact types
 *
 * The tessellated mesh produced by the evaluation service for a source.
 * Layout follows the usual GPU-friendly flat arrays.
 */

import type { Vec3 } from '../num/vec3.js';

/**
 * Tessellated mesh artifact
 *
 * - positions: vertex positions (xyzxyz...)
 * - normals: vertex normals (xyzxyz...), same length as positions
 * - indices: triangle indices (abc, abc, ...)
 * - layers: auxiliary per-vertex/per-face data (UVs, weights, ...), only
 *   populated when the evaluation was asked to preserve them
 */
export interface MeshArtifact {
  positions: Float32Array;
  normals: Float32Array;
  indices: Uint32Array;
  layers: Record<string, Float32Array>;
}

/**
 * Create an empty mesh artifact
 */
export function createEmptyMesh(): MeshArtifact {
  return {
    positions: new Float32Array(0),
    normals: new Float32Array(0),
    indices: new Uint32Array(0),
    layers: {},
  };
}

/**
 * Create a mesh artifact from arrays
 */
export function createMesh(
  positions: number[],
  normals: number[],
  indices: number[],
  layers: Record<string, number[]> = {}
): MeshArtifact {
  const typedLayers: Record<string, Float32Array> = {};
  for (const [name, values] of Object.entries(layers)) {
    typedLayers[name] = new Float32Array(values);
  }
  return {
    positions: new Float32Array(positions),
    normals: new Float32Array(normals),
    indices: new Uint32Array(indices),
    layers: typedLayers,
  };
}

/**
 * Return a copy of the mesh with every position shifted by `offset`.
 * Normals, indices and layers are shared with the input.
 */
export function translateMesh(mesh: MeshArtifact, offset: Vec3): MeshArtifact {
  const positions = new Float32Array(mesh.positions.length);
  for (let i = 0; i < mesh.positions.length; i += 3) {
    positions[i] = mesh.positions[i] + offset[0];
    positions[i + 1] = mesh.positions[i + 1] + offset[1];
    positions[i + 2] = mesh.positions[i + 2] + offset[2];
  }
  return { ...mesh, positions };
}

/**
 * Get the number of vertices in a mesh
 */
export function getMeshVertexCount(mesh: MeshArtifact): number {
  return mesh.positions.length / 3;
}

/**
 * Get the number of triangles in a mesh
 */
export function getMeshTriangleCount(mesh: MeshArtifact): number {
  return mesh.indices.length / 3;
}
