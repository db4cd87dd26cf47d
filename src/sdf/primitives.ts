/**
 * Primitive distance functions
 *
 * Every function maps a sample point to a signed distance: positive outside,
 * negative inside, zero on the boundary. Points are in shape-local space.
 */

import { clamp } from "../math/scalar";
import { cross, dot, length, sub, type Vec2 } from "../math/vec2";

/** Corner radii in screen orientation (y down): left-top, right-top, right-bottom, left-bottom */
export type CornerRadii = [number, number, number, number];

export function sdCircle(p: Readonly<Vec2>, center: Readonly<Vec2>, radius: number): number {
  return length(sub(p, center)) - radius;
}

/** Unsigned distance from p to the segment a-b */
export function sdSegment(p: Readonly<Vec2>, a: Readonly<Vec2>, b: Readonly<Vec2>): number {
  const pa = sub(p, a);
  const ba = sub(b, a);
  const h = clamp(dot(pa, ba) / dot(ba, ba), 0, 1);
  return length([pa[0] - ba[0] * h, pa[1] - ba[1] * h]);
}

/**
 * Signed distance to a triangle of either winding.
 * The sample is inside when it lies on the same side of all three edges.
 */
export function sdTriangle(
  p: Readonly<Vec2>,
  a: Readonly<Vec2>,
  b: Readonly<Vec2>,
  c: Readonly<Vec2>
): number {
  const d = Math.min(sdSegment(p, a, b), sdSegment(p, b, c), sdSegment(p, c, a));

  const winding =
    Math.sign(cross(sub(b, a), sub(p, a))) +
    Math.sign(cross(sub(c, b), sub(p, b))) +
    Math.sign(cross(sub(a, c), sub(p, c)));

  return Math.abs(winding) > 2 ? -d : d;
}

/**
 * Signed distance to an axis-aligned rectangle with independent corner rounding.
 *
 * @param min - Left-top corner
 * @param max - Right-bottom corner
 * @param radii - Corner radii, each clamped to half the shorter side
 */
export function sdRoundedRect(
  p: Readonly<Vec2>,
  min: Readonly<Vec2>,
  max: Readonly<Vec2>,
  radii: Readonly<CornerRadii>
): number {
  const hx = Math.abs(max[0] - min[0]) / 2;
  const hy = Math.abs(max[1] - min[1]) / 2;
  const qx = p[0] - (min[0] + max[0]) / 2;
  const qy = p[1] - (min[1] + max[1]) / 2;

  // Pick the radius of the quadrant the sample falls in
  let r: number;
  if (qx < 0) {
    r = qy < 0 ? radii[0] : radii[3];
  } else {
    r = qy < 0 ? radii[1] : radii[2];
  }
  r = clamp(r, 0, Math.min(hx, hy));

  const dx = Math.abs(qx) - hx + r;
  const dy = Math.abs(qy) - hy + r;
  const outside = Math.sqrt(Math.max(dx, 0) ** 2 + Math.max(dy, 0) ** 2);
  return Math.min(Math.max(dx, dy), 0) + outside - r;
}

/**
 * Signed distance to the infinite line through `from` and `to`.
 * Points to the left of the direction (negative (p - from) x (to - from)) are inside.
 */
export function sdHalfPlane(p: Readonly<Vec2>, from: Readonly<Vec2>, to: Readonly<Vec2>): number {
  const dir = sub(to, from);
  return cross(sub(p, from), dir) / length(dir);
}

/**
 * Analytic signed distance to a quadratic Bézier curve.
 *
 * The nearest point satisfies a cubic in the curve parameter t. After reduction
 * to depressed form the discriminant selects the solution: one real root via
 * Cardano's formula, or three real roots via the trigonometric form (the third
 * root can never be the closest one and is skipped). The sign comes from the
 * tangent at the nearest point, oriented like sdHalfPlane.
 */
export function sdQuadBezier(
  p: Readonly<Vec2>,
  start: Readonly<Vec2>,
  control: Readonly<Vec2>,
  end: Readonly<Vec2>
): number {
  const a = sub(control, start);
  const b: Vec2 = [start[0] - 2 * control[0] + end[0], start[1] - 2 * control[1] + end[1]];
  const c: Vec2 = [a[0] * 2, a[1] * 2];
  const d = sub(start, p);

  const bb = dot(b, b);
  if (bb < 1e-12) {
    // Evenly parameterised straight curve: the cubic collapses
    const s = Math.sign(sdHalfPlane(p, start, end)) || 1;
    return s * sdSegment(p, start, end);
  }

  const kk = 1 / bb;
  const kx = kk * dot(a, b);
  const ky = (kk * (2 * dot(a, a) + dot(d, b))) / 3;
  const kz = kk * dot(d, a);

  const pp = ky - kx * kx;
  const q = kx * (2 * kx * kx - 3 * ky) + kz;
  const h = q * q + 4 * pp * pp * pp;

  if (h >= 0) {
    const sh = Math.sqrt(h);
    const u = Math.cbrt((sh - q) / 2);
    const v = Math.cbrt((-sh - q) / 2);
    const t = clamp(u + v - kx, 0, 1);
    return signedAt(t, b, c, d);
  }

  const z = Math.sqrt(-pp);
  const phi = Math.acos(q / (pp * z * 2)) / 3;
  const m = Math.cos(phi);
  const n = Math.sin(phi) * Math.sqrt(3);
  const t0 = clamp((m + m) * z - kx, 0, 1);
  const t1 = clamp((-n - m) * z - kx, 0, 1);

  const s0 = signedAt(t0, b, c, d);
  const s1 = signedAt(t1, b, c, d);
  return Math.abs(s0) < Math.abs(s1) ? s0 : s1;
}

/** Signed distance from the sample to the curve point at t */
function signedAt(t: number, b: Readonly<Vec2>, c: Readonly<Vec2>, d: Readonly<Vec2>): number {
  // curve(t) - sample
  const qx = d[0] + (c[0] + b[0] * t) * t;
  const qy = d[1] + (c[1] + b[1] * t) * t;
  const tangent: Vec2 = [c[0] + 2 * b[0] * t, c[1] + 2 * b[1] * t];
  const dist = Math.sqrt(qx * qx + qy * qy);
  return cross(tangent, [qx, qy]) < 0 ? -dist : dist;
}
