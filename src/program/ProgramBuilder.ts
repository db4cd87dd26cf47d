/**
 * Fluent construction of programs.
 *
 * @example
 * ```ts
 * const program = new ProgramBuilder()
 *   .circle([0, 0], 50)
 *   .fill([1, 0, 0, 1])
 *   .build();
 * ```
 */

import { DISCARD_REGISTER, FILL_STROKE, REGISTER_COUNT, SHAPE_REGISTER } from "../constants";
import {
  create,
  fromAffine,
  multiply,
  rotate as rotation,
  scale as scaling,
  translate as translation,
  type Mat3,
} from "../math/mat3";
import type { Vec2 } from "../math/vec2";
import type { CornerRadii } from "../sdf/primitives";
import type { Color } from "../types/color";
import type { BlendMode, CombineOp, Instruction, LoadOp, Operation, ShapeOp } from "./types";

/** Per-instruction overrides for shape and load operations */
export interface ShapeOptions {
  /** Stroke width; negative fills */
  stroke?: number;
  combine?: CombineOp;
  /** Register receiving the result */
  target?: number;
  parameter?: number;
}

export const DEFAULT_SHAPE_OPTIONS: Required<ShapeOptions> = {
  stroke: FILL_STROKE,
  combine: "replace",
  target: SHAPE_REGISTER,
  parameter: 0,
};

function checkRegister(index: number, role: string): void {
  if (!Number.isInteger(index) || index < 0 || index >= REGISTER_COUNT) {
    throw new RangeError(`${role} register ${index} is outside 0..${REGISTER_COUNT - 1}`);
  }
}

export class ProgramBuilder {
  private readonly instructions: Instruction[] = [];
  // Transform set by the latest setTransform, for compose()
  private current: Mat3 = create();

  get length(): number {
    return this.instructions.length;
  }

  /** Append a shape or load with the given combine settings */
  shape(op: ShapeOp | LoadOp, options: ShapeOptions = {}): this {
    const { stroke, combine, target, parameter } = { ...DEFAULT_SHAPE_OPTIONS, ...options };
    checkRegister(target, "Target");
    this.instructions.push({
      op,
      strokeWidth: stroke,
      parameter,
      combine,
      smoothFunction: 0,
      smoothParameter: 0,
      target,
    });
    return this;
  }

  circle(center: Vec2, radius: number, options?: ShapeOptions): this {
    return this.shape({ kind: "circle", center, radius }, options);
  }

  triangle(a: Vec2, b: Vec2, c: Vec2, options?: ShapeOptions): this {
    return this.shape({ kind: "triangle", a, b, c }, options);
  }

  rectangle(
    min: Vec2,
    max: Vec2,
    radii: CornerRadii = [0, 0, 0, 0],
    options?: ShapeOptions
  ): this {
    return this.shape({ kind: "rectangle", min, max, radii }, options);
  }

  halfPlane(from: Vec2, to: Vec2, options?: ShapeOptions): this {
    return this.shape({ kind: "halfPlane", from, to }, options);
  }

  quadBezier(start: Vec2, control: Vec2, end: Vec2, options?: ShapeOptions): this {
    return this.shape({ kind: "quadBezier", start, control, end }, options);
  }

  sdfTexture(min: Vec2, max: Vec2, layer: number, options?: ShapeOptions): this {
    return this.shape({ kind: "sdfTexture", min, max, layer }, options);
  }

  glyph(position: Vec2, fontSize: number, glyphId: number, options?: ShapeOptions): this {
    return this.shape({ kind: "glyph", position, fontSize, glyphId }, options);
  }

  /** Copy register `source` into the target through the combine op */
  load(source: number, options?: ShapeOptions): this {
    checkRegister(source, "Source");
    return this.shape({ kind: "load", register: source }, options);
  }

  fill(color: Color): this {
    return this.passive({ kind: "fill", color });
  }

  linearGradient(startColor: Color, endColor: Color, from: Vec2, to: Vec2): this {
    return this.passive({ kind: "linearGradient", startColor, endColor, from, to });
  }

  radialGradient(innerColor: Color, outerColor: Color, center: Vec2, radius: number): this {
    return this.passive({ kind: "radialGradient", innerColor, outerColor, center, radius });
  }

  textureFill(min: Vec2, max: Vec2, uvMin: Vec2, uvMax: Vec2, layer: number): this {
    return this.passive({ kind: "textureFill", min, max, uvMin, uvMax, layer });
  }

  /** Set the local-to-screen transform from a matrix */
  transform(matrix: Mat3): this {
    this.current = matrix;
    return this.passive({ kind: "setTransform", matrix });
  }

  /** Apply `matrix` in local space, inside the current transform */
  compose(matrix: Mat3): this {
    return this.transform(multiply(this.current, matrix));
  }

  translate(x: number, y: number): this {
    return this.compose(translation(x, y));
  }

  scale(sx: number, sy: number = sx): this {
    return this.compose(scaling(sx, sy));
  }

  /** Counter-clockwise rotation in radians */
  rotate(angle: number): this {
    return this.compose(rotation(angle));
  }

  /** Set the local-to-screen transform from affine coefficients */
  affine(a: number, b: number, c: number, d: number, e: number, f: number): this {
    return this.transform(fromAffine(a, b, c, d, e, f));
  }

  blendMode(mode: BlendMode): this {
    return this.passive({ kind: "setBlendMode", mode });
  }

  /** Append an already built instruction unchanged */
  push(instruction: Instruction): this {
    if (instruction.op.kind === "setTransform") {
      this.current = instruction.op.matrix;
    }
    this.instructions.push(instruction);
    return this;
  }

  build(): Instruction[] {
    return this.instructions.slice();
  }

  // Paint and control ops produce no scalar
  private passive(op: Operation): this {
    this.instructions.push({
      op,
      strokeWidth: FILL_STROKE,
      parameter: 0,
      combine: "none",
      smoothFunction: 0,
      smoothParameter: 0,
      target: DISCARD_REGISTER,
    });
    return this;
  }
}
