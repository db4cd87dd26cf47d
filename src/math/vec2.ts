/**
 * 2D vector utilities for distance field evaluation
 */

/** 2D vector as [x, y] tuple */
export type Vec2 = [number, number];

export function add(a: Readonly<Vec2>, b: Readonly<Vec2>): Vec2 {
  return [a[0] + b[0], a[1] + b[1]];
}

export function sub(a: Readonly<Vec2>, b: Readonly<Vec2>): Vec2 {
  return [a[0] - b[0], a[1] - b[1]];
}

export function scale(v: Readonly<Vec2>, s: number): Vec2 {
  return [v[0] * s, v[1] * s];
}

export function dot(a: Readonly<Vec2>, b: Readonly<Vec2>): number {
  return a[0] * b[0] + a[1] * b[1];
}

/** Z component of the 3D cross product of (a, 0) and (b, 0) */
export function cross(a: Readonly<Vec2>, b: Readonly<Vec2>): number {
  return a[0] * b[1] - a[1] * b[0];
}

export function length(v: Readonly<Vec2>): number {
  return Math.sqrt(v[0] * v[0] + v[1] * v[1]);
}

export function distance(a: Readonly<Vec2>, b: Readonly<Vec2>): number {
  return length(sub(a, b));
}

/**
 * Normalize a 2D vector.
 * Returns a new normalized vector (does not mutate input); the zero vector stays zero.
 */
export function normalize(v: Readonly<Vec2>): Vec2 {
  const len = length(v);
  if (len > 0) {
    return [v[0] / len, v[1] / len];
  }
  return [0, 0];
}

export function mix(a: Readonly<Vec2>, b: Readonly<Vec2>, t: number): Vec2 {
  return [a[0] + (b[0] - a[0]) * t, a[1] + (b[1] - a[1]) * t];
}
