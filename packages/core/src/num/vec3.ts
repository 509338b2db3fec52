/**
 * 3D and homogeneous vector operations
 *
 * Vectors are plain tuples.
 * All operations are pure functions.
 */

export type Vec3 = [number, number, number];

/**
 * Homogeneous control point coordinate (x, y, z, w)
 */
export type Vec4 = [number, number, number, number];

/**
 * Create a 3D vector
 */
export function vec3(x: number, y: number, z: number): Vec3 {
  return [x, y, z];
}

/**
 * Zero vector
 */
export const ZERO3: Vec3 = [0, 0, 0];

/**
 * Add two vectors: a + b
 */
export function add3(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

/**
 * Subtract two vectors: a - b
 */
export function sub3(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

/**
 * Multiply vector by scalar: v * s
 */
export function mul3(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

/**
 * Cross product: a × b
 */
export function cross3(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

/**
 * Length of vector
 */
export function length3(v: Vec3): number {
  return Math.sqrt(v[0] * v[0] + v[1] * v[1] + v[2] * v[2]);
}

/**
 * Normalize vector to unit length
 * Returns zero vector if input is zero
 */
export function normalize3(v: Vec3): Vec3 {
  const len = length3(v);
  if (len === 0) {
    return [0, 0, 0];
  }
  return [v[0] / len, v[1] / len, v[2] / len];
}

/**
 * Linear interpolation between a and b
 */
export function lerp3(a: Vec3, b: Vec3, t: number): Vec3 {
  return [a[0] + (b[0] - a[0]) * t, a[1] + (b[1] - a[1]) * t, a[2] + (b[2] - a[2]) * t];
}

/**
 * Check whether two vectors are exactly equal
 */
export function equals3(a: Vec3, b: Vec3): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2];
}

/**
 * Project a control point coordinate into 3D space.
 *
 * A 4-component coordinate is divided through by its weight; a zero weight
 * leaves the spatial part as is. 3-component coordinates pass through.
 */
export function projectHomogeneous(co: Vec3 | Vec4): Vec3 {
  if (co.length === 3) {
    return [co[0], co[1], co[2]];
  }
  const w = co[3];
  if (w === 0) {
    return [co[0], co[1], co[2]];
  }
  return [co[0] / w, co[1] / w, co[2] / w];
}
