/**
 * 3x3 Matrix utilities for 2D affine transformations
 * Matrices are stored in column-major order (WebGL convention)
 */

import type { Vec2 } from "./vec2";

export type Mat3 = Float32Array;

/** Create an identity matrix */
export function create(): Mat3 {
  const m = new Float32Array(9);
  m[0] = 1;
  m[4] = 1;
  m[8] = 1;
  return m;
}

/**
 * Create a matrix from the six affine coefficients, row by row:
 * x' = a*x + b*y + c, y' = d*x + e*y + f.
 * The bottom row is fixed to (0, 0, 1).
 */
export function fromAffine(
  a: number,
  b: number,
  c: number,
  d: number,
  e: number,
  f: number
): Mat3 {
  const m = new Float32Array(9);
  m[0] = a;
  m[1] = d;
  m[3] = b;
  m[4] = e;
  m[6] = c;
  m[7] = f;
  m[8] = 1;
  return m;
}

/** The six affine coefficients [a, b, c, d, e, f] (inverse of fromAffine) */
export function toAffine(m: Mat3): [number, number, number, number, number, number] {
  return [m[0], m[3], m[6], m[1], m[4], m[7]];
}

/** Multiply two matrices: out = a * b */
export function multiply(a: Mat3, b: Mat3): Mat3 {
  const out = new Float32Array(9);

  // Column 0
  out[0] = a[0] * b[0] + a[3] * b[1] + a[6] * b[2];
  out[1] = a[1] * b[0] + a[4] * b[1] + a[7] * b[2];
  out[2] = a[2] * b[0] + a[5] * b[1] + a[8] * b[2];

  // Column 1
  out[3] = a[0] * b[3] + a[3] * b[4] + a[6] * b[5];
  out[4] = a[1] * b[3] + a[4] * b[4] + a[7] * b[5];
  out[5] = a[2] * b[3] + a[5] * b[4] + a[8] * b[5];

  // Column 2
  out[6] = a[0] * b[6] + a[3] * b[7] + a[6] * b[8];
  out[7] = a[1] * b[6] + a[4] * b[7] + a[7] * b[8];
  out[8] = a[2] * b[6] + a[5] * b[7] + a[8] * b[8];

  return out;
}

/** Create a translation matrix */
export function translate(x: number, y: number): Mat3 {
  return fromAffine(1, 0, x, 0, 1, y);
}

/** Create a scale matrix */
export function scale(sx: number, sy: number): Mat3 {
  return fromAffine(sx, 0, 0, 0, sy, 0);
}

/** Create a counter-clockwise rotation matrix (radians, y up) */
export function rotate(angle: number): Mat3 {
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  return fromAffine(c, -s, 0, s, c, 0);
}

export function determinant(m: Mat3): number {
  return (
    m[0] * (m[8] * m[4] - m[5] * m[7]) +
    m[1] * (-m[8] * m[3] + m[5] * m[6]) +
    m[2] * (m[7] * m[3] - m[4] * m[6])
  );
}

/**
 * Invert via the adjugate and determinant.
 *
 * There is no singularity check: a zero determinant yields Infinity/NaN entries.
 * Upstream validation (validateProgram) is responsible for rejecting such input.
 */
export function invert(m: Mat3): Mat3 {
  const a00 = m[0], a01 = m[1], a02 = m[2];
  const a10 = m[3], a11 = m[4], a12 = m[5];
  const a20 = m[6], a21 = m[7], a22 = m[8];

  const b01 = a22 * a11 - a12 * a21;
  const b11 = -a22 * a10 + a12 * a20;
  const b21 = a21 * a10 - a11 * a20;

  const invDet = 1 / (a00 * b01 + a01 * b11 + a02 * b21);

  const out = new Float32Array(9);
  out[0] = b01 * invDet;
  out[1] = (-a22 * a01 + a02 * a21) * invDet;
  out[2] = (a12 * a01 - a02 * a11) * invDet;
  out[3] = b11 * invDet;
  out[4] = (a22 * a00 - a02 * a20) * invDet;
  out[5] = (-a12 * a00 + a02 * a10) * invDet;
  out[6] = b21 * invDet;
  out[7] = (-a21 * a00 + a01 * a20) * invDet;
  out[8] = (a11 * a00 - a01 * a10) * invDet;
  return out;
}

/** Apply the affine part of a matrix to a point */
export function transformPoint(m: Mat3, p: Readonly<Vec2>): Vec2 {
  return [m[0] * p[0] + m[3] * p[1] + m[6], m[1] * p[0] + m[4] * p[1] + m[7]];
}
