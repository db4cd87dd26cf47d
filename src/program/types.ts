/**
 * Instruction model
 *
 * The wire format stores every instruction as a flat record of numbers (see
 * codec.ts). The interpreter consumes the typed form below: one operation
 * variant per opcode, decoded once on the host side.
 */

import { REGISTER_COUNT } from "../constants";
import type { Mat3 } from "../math/mat3";
import type { Vec2 } from "../math/vec2";
import type { CornerRadii } from "../sdf/primitives";
import type { Color } from "../types/color";

/** Numeric opcode ids of the wire format */
export const Opcode = {
  None: 0,
  Circle: 1,
  Triangle: 2,
  Rectangle: 3,
  HalfPlane: 4,
  QuadBezier: 5,
  SdfTexture: 6,
  Glyph: 7,
  Fill: 8,
  LinearGradient: 9,
  RadialGradient: 10,
  TextureFill: 11,
  SetTransform: 12,
  SetBlendMode: 13,
  Load: 14,
} as const;

export type OpcodeId = (typeof Opcode)[keyof typeof Opcode];

/** How a freshly evaluated scalar merges into its target register */
export type CombineOp =
  | "none"
  | "replace"
  | "replaceIfInside"
  | "replaceIfOutside"
  | "and"
  | "or"
  | "xor"
  | "subtract"
  | "negate"
  | "lerp"
  | "smoothstep"
  | "sigmoid"
  | "unknown";

/** Wire ids, indexed by id; "unknown" has no id of its own */
export const COMBINE_OPS: readonly Exclude<CombineOp, "unknown">[] = [
  "none",
  "replace",
  "replaceIfInside",
  "replaceIfOutside",
  "and",
  "or",
  "xor",
  "subtract",
  "negate",
  "lerp",
  "smoothstep",
  "sigmoid",
];

export type BlendMode =
  | "replace"
  | "add"
  | "multiply"
  | "subtract"
  | "divide"
  | "min"
  | "max"
  | "alphaUnder";

/** Wire ids, indexed by id */
export const BLEND_MODES: readonly BlendMode[] = [
  "replace",
  "add",
  "multiply",
  "subtract",
  "divide",
  "min",
  "max",
  "alphaUnder",
];

export interface CircleOp {
  kind: "circle";
  center: Vec2;
  radius: number;
}

export interface TriangleOp {
  kind: "triangle";
  a: Vec2;
  b: Vec2;
  c: Vec2;
}

export interface RectangleOp {
  kind: "rectangle";
  /** Left-top corner */
  min: Vec2;
  /** Right-bottom corner */
  max: Vec2;
  radii: CornerRadii;
}

export interface HalfPlaneOp {
  kind: "halfPlane";
  from: Vec2;
  to: Vec2;
}

export interface QuadBezierOp {
  kind: "quadBezier";
  start: Vec2;
  control: Vec2;
  end: Vec2;
}

export interface SdfTextureOp {
  kind: "sdfTexture";
  min: Vec2;
  max: Vec2;
  layer: number;
}

export interface GlyphOp {
  kind: "glyph";
  /** Top-left of the glyph cell */
  position: Vec2;
  fontSize: number;
  glyphId: number;
}

export interface LoadOp {
  kind: "load";
  register: number;
}

export interface FillOp {
  kind: "fill";
  color: Color;
}

export interface LinearGradientOp {
  kind: "linearGradient";
  startColor: Color;
  endColor: Color;
  from: Vec2;
  to: Vec2;
}

export interface RadialGradientOp {
  kind: "radialGradient";
  innerColor: Color;
  outerColor: Color;
  center: Vec2;
  radius: number;
}

export interface TextureFillOp {
  kind: "textureFill";
  min: Vec2;
  max: Vec2;
  uvMin: Vec2;
  uvMax: Vec2;
  layer: number;
}

export interface SetTransformOp {
  kind: "setTransform";
  /** Local-to-screen affine transform */
  matrix: Mat3;
}

export interface SetBlendModeOp {
  kind: "setBlendMode";
  mode: BlendMode;
}

export interface NoOp {
  kind: "none";
}

/** An opcode this version does not know; evaluated as a no-op */
export interface UnknownOp {
  kind: "unknown";
  opcode: number;
}

/** Operations that evaluate a distance field */
export type ShapeOp =
  | CircleOp
  | TriangleOp
  | RectangleOp
  | HalfPlaneOp
  | QuadBezierOp
  | SdfTextureOp
  | GlyphOp;

export type PaintOp = FillOp | LinearGradientOp | RadialGradientOp | TextureFillOp;

export type ControlOp = SetTransformOp | SetBlendModeOp;

export type Operation = ShapeOp | LoadOp | PaintOp | ControlOp | NoOp | UnknownOp;

export interface Instruction {
  op: Operation;
  /** Negative: fill; otherwise the distance becomes |d| - strokeWidth / 2 */
  strokeWidth: number;
  /** Factor for lerp, x for smoothstep, steepness for sigmoid */
  parameter: number;
  combine: CombineOp;
  /** Reserved; carried through the wire format unchanged */
  smoothFunction: number;
  /** Reserved; carried through the wire format unchanged */
  smoothParameter: number;
  /** Register receiving the result; >= REGISTER_COUNT discards it */
  target: number;
}

/** Per-frame constants shared by every pixel */
export interface Uniforms {
  windowSize: Vec2;
  pointer: Vec2;
  /** Seconds since start */
  time: number;
  /** Device pixel scale factor */
  scaleFactor: number;
  /** Logical register-stack length; always REGISTER_COUNT today */
  registerCount: number;
  /** Number of instructions to execute */
  instructionCount: number;
}

export const DEFAULT_UNIFORMS: Uniforms = {
  windowSize: [0, 0],
  pointer: [0, 0],
  time: 0,
  scaleFactor: 1,
  registerCount: REGISTER_COUNT,
  instructionCount: 0,
};

export function isShapeOp(op: Operation): op is ShapeOp {
  switch (op.kind) {
    case "circle":
    case "triangle":
    case "rectangle":
    case "halfPlane":
    case "quadBezier":
    case "sdfTexture":
    case "glyph":
      return true;
    default:
      return false;
  }
}
