/**
 * Scalar helpers with shader-language semantics.
 *
 * These deliberately mirror GLSL's built-ins, including their behavior on
 * degenerate input: smoothstep with equal edges divides by zero.
 */

export function clamp(x: number, lo: number, hi: number): number {
  return Math.min(Math.max(x, lo), hi);
}

export function mix(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

export function smoothstep(edge0: number, edge1: number, x: number): number {
  const t = clamp((x - edge0) / (edge1 - edge0), 0, 1);
  return t * t * (3 - 2 * t);
}

/** Logistic function 1 / (1 + e^-t) */
export function sigmoid(t: number): number {
  return 1 / (1 + Math.exp(-t));
}

/** Median of three values */
export function median3(a: number, b: number, c: number): number {
  return Math.max(Math.min(a, b), Math.min(Math.max(a, b), c));
}
