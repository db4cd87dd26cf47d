/**
 * Shape evaluation with central-difference gradients
 */

import { GRADIENT_EPSILON } from "../constants";
import { length, normalize, type Vec2 } from "../math/vec2";
import type { ShapeOp } from "../program/types";
import {
  sdCircle,
  sdHalfPlane,
  sdQuadBezier,
  sdRoundedRect,
  sdTriangle,
} from "../sdf/primitives";
import { sdGlyph, sdTexture } from "../sdf/textureFields";
import type { LocalSamples } from "./TransformState";
import type { Atlases } from "./types";

export interface ShapeContext {
  atlases: Atlases;
  scaleFactor: number;
}

export interface ShapeSample {
  /** Distance at the sample centre */
  distance: number;
  /** Screen-space gradient estimate */
  gradient: Vec2;
  /** Unit gradient direction; zero when the gradient vanishes */
  direction: Vec2;
}

/** Distance of a single shape at a local point */
export function shapeDistance(op: ShapeOp, p: Readonly<Vec2>, ctx: ShapeContext): number {
  switch (op.kind) {
    case "circle":
      return sdCircle(p, op.center, op.radius);
    case "triangle":
      return sdTriangle(p, op.a, op.b, op.c);
    case "rectangle":
      return sdRoundedRect(p, op.min, op.max, op.radii);
    case "halfPlane":
      return sdHalfPlane(p, op.from, op.to);
    case "quadBezier":
      return sdQuadBezier(p, op.start, op.control, op.end);
    case "sdfTexture":
      return sdTexture(p, op.min, op.max, op.layer, ctx.atlases.texture, ctx.scaleFactor);
    case "glyph":
      return sdGlyph(p, op.position, op.fontSize, op.glyphId, ctx.atlases.glyphs);
    default: {
      const exhaustive: never = op;
      return exhaustive;
    }
  }
}

/** Central difference of `f` over the neighbour samples */
export function estimateGradient(
  f: (p: Readonly<Vec2>) => number,
  samples: LocalSamples
): Vec2 {
  const step = 2 * GRADIENT_EPSILON;
  return [
    (f(samples.xPlus) - f(samples.xMinus)) / step,
    (f(samples.yPlus) - f(samples.yMinus)) / step,
  ];
}

export function evaluateShape(op: ShapeOp, samples: LocalSamples, ctx: ShapeContext): ShapeSample {
  const f = (p: Readonly<Vec2>): number => shapeDistance(op, p, ctx);
  const gradient = estimateGradient(f, samples);
  return {
    distance: f(samples.center),
    gradient,
    direction: normalize(gradient),
  };
}

/** Magnitude of a gradient, the Lipschitz factor applied to a distance */
export function gradientMagnitude(gradient: Readonly<Vec2>): number {
  return length(gradient);
}
