/**
 * Paint operations: colour sources applied inside the current shape
 */

import { EDGE_WIDTH } from "../constants";
import { clamp, mix } from "../math/scalar";
import { distance, dot, sub, type Vec2 } from "../math/vec2";
import type { PaintOp } from "../program/types";
import { cloneColor, mixColor, type Color } from "../types/color";
import type { Atlases } from "../vm/types";

/**
 * Coverage of a pixel whose shape distance is `d`: 1 at one edge width
 * inside, 0 on the boundary and beyond.
 */
export function antialiasFactor(d: number): number {
  return clamp(-d / EDGE_WIDTH, 0, 1);
}

/** Straight-alpha colour of a paint operation at local point `p` */
export function paintColor(op: PaintOp, p: Readonly<Vec2>, atlases: Atlases): Color {
  switch (op.kind) {
    case "fill":
      return cloneColor(op.color);

    case "linearGradient": {
      const axis = sub(op.to, op.from);
      const t = clamp(Math.abs(dot(sub(p, op.from), axis) / dot(axis, axis)), 0, 1);
      return mixColor(op.startColor, op.endColor, t);
    }

    case "radialGradient": {
      const t = clamp(distance(p, op.center) / op.radius, 0, 1);
      return mixColor(op.innerColor, op.outerColor, t);
    }

    case "textureFill": {
      if (!atlases.texture) return [0, 0, 0, 0];
      const sx = (p[0] - op.min[0]) / (op.max[0] - op.min[0]);
      const sy = (p[1] - op.min[1]) / (op.max[1] - op.min[1]);
      const u = mix(op.uvMin[0], op.uvMax[0], sx);
      const v = mix(op.uvMin[1], op.uvMax[1], sy);
      return atlases.texture.sample(op.layer, u, v);
    }

    default: {
      const exhaustive: never = op;
      return exhaustive;
    }
  }
}
