/**
 * 4x4 matrix operations
 *
 * Matrices are represented as 16-element arrays in column-major order:
 * [m00, m10, m20, m30, m01, m11, m21, m31, m02, m12, m22, m32, m03, m13, m23, m33]
 *
 * Scene objects carry their world transform in this layout.
 * All operations are pure functions.
 */

import type { Vec3 } from './vec3.js';

export type Mat4 = [
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
];

/**
 * Identity matrix
 */
export function identity4(): Mat4 {
  return [
    1, 0, 0, 0,
    0, 1, 0, 0,
    0, 0, 1, 0,
    0, 0, 0, 1,
  ];
}

/**
 * Copy a matrix
 */
export function copy4(m: Mat4): Mat4 {
  const result = identity4();
  for (let i = 0; i < 16; i++) {
    result[i] = m[i];
  }
  return result;
}

/**
 * Translation matrix
 */
export function translation4(t: Vec3): Mat4 {
  return [
    1, 0, 0, 0,
    0, 1, 0, 0,
    0, 0, 1, 0,
    t[0], t[1], t[2], 1,
  ];
}

/**
 * Uniform scale matrix
 */
export function scale4(s: number): Mat4 {
  return [
    s, 0, 0, 0,
    0, s, 0, 0,
    0, 0, s, 0,
    0, 0, 0, 1,
  ];
}

/**
 * Multiply two matrices: A * B
 */
export function mul4(a: Mat4, b: Mat4): Mat4 {
  const result = identity4();
  for (let i = 0; i < 4; i++) {
    for (let j = 0; j < 4; j++) {
      let sum = 0;
      for (let k = 0; k < 4; k++) {
        sum += a[i + k * 4] * b[k + j * 4];
      }
      result[i + j * 4] = sum;
    }
  }
  return result;
}

/**
 * Transform a 3D point by a 4x4 matrix (assumes w=1)
 */
export function transformPoint3(m: Mat4, v: Vec3): Vec3 {
  const x = m[0] * v[0] + m[4] * v[1] + m[8] * v[2] + m[12];
  const y = m[1] * v[0] + m[5] * v[1] + m[9] * v[2] + m[13];
  const z = m[2] * v[0] + m[6] * v[1] + m[10] * v[2] + m[14];
  return [x, y, z];
}

/**
 * Invert an affine transform (rotation/scale/shear + translation).
 *
 * Returns null when the linear part is singular.
 */
export function invertAffine4(m: Mat4): Mat4 | null {
  const a = m[0], b = m[4], c = m[8];
  const d = m[1], e = m[5], f = m[9];
  const g = m[2], h = m[6], i = m[10];

  const A = e * i - f * h;
  const B = -(d * i - f * g);
  const C = d * h - e * g;
  const det = a * A + b * B + c * C;
  if (det === 0) {
    return null;
  }
  const inv = 1 / det;

  // Inverse of the 3x3 block (row-major cofactors, transposed)
  const r00 = A * inv;
  const r01 = -(b * i - c * h) * inv;
  const r02 = (b * f - c * e) * inv;
  const r10 = B * inv;
  const r11 = (a * i - c * g) * inv;
  const r12 = -(a * f - c * d) * inv;
  const r20 = C * inv;
  const r21 = -(a * h - b * g) * inv;
  const r22 = (a * e - b * d) * inv;

  const tx = m[12], ty = m[13], tz = m[14];
  return [
    r00, r10, r20, 0,
    r01, r11, r21, 0,
    r02, r12, r22, 0,
    -(r00 * tx + r01 * ty + r02 * tz),
    -(r10 * tx + r11 * ty + r12 * tz),
    -(r20 * tx + r21 * ty + r22 * tz),
    1,
  ];
}
