/**
 * Binary wire format for instructions and uniforms
 *
 * Instruction record (96 bytes, little-endian):
 *   0  u32  opcode
 *   4  f32  stroke width
 *   8  f32  parameter
 *   12 u32  smooth function
 *   16 f32  operands[16]
 *   80 u32  combine op
 *   84 f32  smooth parameter
 *   88 u32  target register
 *   92      padding
 *
 * Uniform block (32 bytes): window size f32x2, pointer f32x2, time f32,
 * scale factor f32, register count u32, instruction count u32.
 */

import { FILL_STROKE } from "../constants";
import { fromAffine, toAffine } from "../math/mat3";
import type { Vec2 } from "../math/vec2";
import type { Color } from "../types/color";
import {
  BLEND_MODES,
  COMBINE_OPS,
  Opcode,
  type CombineOp,
  type Instruction,
  type Operation,
  type Uniforms,
} from "./types";

export const INSTRUCTION_SIZE = 96;
export const OPERAND_COUNT = 16;
export const UNIFORM_SIZE = 32;

/** Wire id written for the "unknown" combine op; decodes back to "unknown" */
export const UNKNOWN_COMBINE_ID = 0xffffffff;

const OPERANDS_OFFSET = 16;

/** Numeric opcode of an operation */
export function opcodeOf(op: Operation): number {
  switch (op.kind) {
    case "none":
      return Opcode.None;
    case "circle":
      return Opcode.Circle;
    case "triangle":
      return Opcode.Triangle;
    case "rectangle":
      return Opcode.Rectangle;
    case "halfPlane":
      return Opcode.HalfPlane;
    case "quadBezier":
      return Opcode.QuadBezier;
    case "sdfTexture":
      return Opcode.SdfTexture;
    case "glyph":
      return Opcode.Glyph;
    case "fill":
      return Opcode.Fill;
    case "linearGradient":
      return Opcode.LinearGradient;
    case "radialGradient":
      return Opcode.RadialGradient;
    case "textureFill":
      return Opcode.TextureFill;
    case "setTransform":
      return Opcode.SetTransform;
    case "setBlendMode":
      return Opcode.SetBlendMode;
    case "load":
      return Opcode.Load;
    case "unknown":
      return op.opcode;
    default: {
      const exhaustive: never = op;
      return exhaustive;
    }
  }
}

/** Flatten an operation into its 16 operand slots */
export function operandsOf(op: Operation): Float32Array {
  const o = new Float32Array(OPERAND_COUNT);
  switch (op.kind) {
    case "circle":
      o.set([...op.center, op.radius]);
      break;
    case "triangle":
      o.set([...op.a, ...op.b, ...op.c]);
      break;
    case "rectangle":
      o.set([...op.min, ...op.max, ...op.radii]);
      break;
    case "halfPlane":
      o.set([...op.from, ...op.to]);
      break;
    case "quadBezier":
      o.set([...op.start, ...op.control, ...op.end]);
      break;
    case "sdfTexture":
      o.set([...op.min, ...op.max, op.layer]);
      break;
    case "glyph":
      o.set([...op.position, op.fontSize, op.glyphId]);
      break;
    case "fill":
      o.set(op.color);
      break;
    case "linearGradient":
      o.set([...op.startColor, ...op.endColor, ...op.from, ...op.to]);
      break;
    case "radialGradient":
      o.set([...op.innerColor, ...op.outerColor, ...op.center, op.radius]);
      break;
    case "textureFill":
      o.set([...op.min, ...op.max, ...op.uvMin, ...op.uvMax, op.layer]);
      break;
    case "setTransform":
      o.set(toAffine(op.matrix));
      break;
    case "setBlendMode":
      o[0] = BLEND_MODES.indexOf(op.mode);
      break;
    case "load":
      o[0] = op.register;
      break;
    case "none":
    case "unknown":
      break;
    default: {
      const exhaustive: never = op;
      return exhaustive;
    }
  }
  return o;
}

/** Rebuild a typed operation from an opcode and its operand slots */
export function operationFrom(opcode: number, o: ArrayLike<number>): Operation {
  const vec = (i: number): Vec2 => [o[i], o[i + 1]];
  // Id slots (layers, glyphs, registers, modes) are truncated toward zero like the shader's int()
  const id = (i: number): number => Math.trunc(o[i]);
  const color = (i: number): Color => [o[i], o[i + 1], o[i + 2], o[i + 3]];

  switch (opcode) {
    case Opcode.None:
      return { kind: "none" };
    case Opcode.Circle:
      return { kind: "circle", center: vec(0), radius: o[2] };
    case Opcode.Triangle:
      return { kind: "triangle", a: vec(0), b: vec(2), c: vec(4) };
    case Opcode.Rectangle:
      return { kind: "rectangle", min: vec(0), max: vec(2), radii: [o[4], o[5], o[6], o[7]] };
    case Opcode.HalfPlane:
      return { kind: "halfPlane", from: vec(0), to: vec(2) };
    case Opcode.QuadBezier:
      return { kind: "quadBezier", start: vec(0), control: vec(2), end: vec(4) };
    case Opcode.SdfTexture:
      return { kind: "sdfTexture", min: vec(0), max: vec(2), layer: id(4) };
    case Opcode.Glyph:
      return { kind: "glyph", position: vec(0), fontSize: o[2], glyphId: id(3) };
    case Opcode.Fill:
      return { kind: "fill", color: color(0) };
    case Opcode.LinearGradient:
      return {
        kind: "linearGradient",
        startColor: color(0),
        endColor: color(4),
        from: vec(8),
        to: vec(10),
      };
    case Opcode.RadialGradient:
      return {
        kind: "radialGradient",
        innerColor: color(0),
        outerColor: color(4),
        center: vec(8),
        radius: o[10],
      };
    case Opcode.TextureFill:
      return {
        kind: "textureFill",
        min: vec(0),
        max: vec(2),
        uvMin: vec(4),
        uvMax: vec(6),
        layer: id(8),
      };
    case Opcode.SetTransform:
      return { kind: "setTransform", matrix: fromAffine(o[0], o[1], o[2], o[3], o[4], o[5]) };
    case Opcode.SetBlendMode:
      // Unknown modes behave as replace
      return { kind: "setBlendMode", mode: BLEND_MODES[id(0)] ?? "replace" };
    case Opcode.Load:
      return { kind: "load", register: id(0) };
    default:
      return { kind: "unknown", opcode };
  }
}

export function combineOpId(combine: CombineOp): number {
  if (combine === "unknown") return UNKNOWN_COMBINE_ID;
  return COMBINE_OPS.indexOf(combine);
}

export function combineOpFrom(id: number): CombineOp {
  return COMBINE_OPS[id] ?? "unknown";
}

/** Write one instruction record at a byte offset */
export function writeInstruction(view: DataView, offset: number, inst: Instruction): void {
  view.setUint32(offset, opcodeOf(inst.op), true);
  view.setFloat32(offset + 4, inst.strokeWidth, true);
  view.setFloat32(offset + 8, inst.parameter, true);
  view.setUint32(offset + 12, inst.smoothFunction, true);
  const operands = operandsOf(inst.op);
  for (let i = 0; i < OPERAND_COUNT; i++) {
    view.setFloat32(offset + OPERANDS_OFFSET + i * 4, operands[i], true);
  }
  view.setUint32(offset + 80, combineOpId(inst.combine), true);
  view.setFloat32(offset + 84, inst.smoothParameter, true);
  view.setUint32(offset + 88, inst.target, true);
  view.setUint32(offset + 92, 0, true);
}

/** Read one instruction record at a byte offset */
export function readInstruction(view: DataView, offset: number): Instruction {
  const operands = new Float32Array(OPERAND_COUNT);
  for (let i = 0; i < OPERAND_COUNT; i++) {
    operands[i] = view.getFloat32(offset + OPERANDS_OFFSET + i * 4, true);
  }
  return {
    op: operationFrom(view.getUint32(offset, true), operands),
    strokeWidth: view.getFloat32(offset + 4, true),
    parameter: view.getFloat32(offset + 8, true),
    smoothFunction: view.getUint32(offset + 12, true),
    combine: combineOpFrom(view.getUint32(offset + 80, true)),
    smoothParameter: view.getFloat32(offset + 84, true),
    target: view.getUint32(offset + 88, true),
  };
}

/** Encode a single instruction as one 96-byte record */
export function encodeInstruction(inst: Instruction): ArrayBuffer {
  const buffer = new ArrayBuffer(INSTRUCTION_SIZE);
  writeInstruction(new DataView(buffer), 0, inst);
  return buffer;
}

export function decodeInstruction(buffer: ArrayBuffer, byteOffset = 0): Instruction {
  if (buffer.byteLength - byteOffset < INSTRUCTION_SIZE) {
    throw new RangeError(
      `Instruction record needs ${INSTRUCTION_SIZE} bytes at offset ${byteOffset}, got ${buffer.byteLength - byteOffset}`
    );
  }
  return readInstruction(new DataView(buffer), byteOffset);
}

/** Pack instructions into a tightly packed buffer of records */
export function encodeProgram(instructions: readonly Instruction[]): ArrayBuffer {
  const buffer = new ArrayBuffer(instructions.length * INSTRUCTION_SIZE);
  const view = new DataView(buffer);
  instructions.forEach((inst, i) => writeInstruction(view, i * INSTRUCTION_SIZE, inst));
  return buffer;
}

/**
 * Decode the first `count` records of a buffer.
 * Trailing bytes beyond `count` records are ignored; a count larger than the
 * buffer holds is clamped to the complete records present.
 */
export function decodeProgram(
  buffer: ArrayBuffer,
  count: number = Math.floor(buffer.byteLength / INSTRUCTION_SIZE)
): Instruction[] {
  const view = new DataView(buffer);
  const n = Math.min(count, Math.floor(buffer.byteLength / INSTRUCTION_SIZE));
  const out: Instruction[] = [];
  for (let i = 0; i < n; i++) {
    out.push(readInstruction(view, i * INSTRUCTION_SIZE));
  }
  return out;
}

/**
 * Flatten an instruction into 24 floats (the record with every field as f32),
 * the layout used by the GPU backend's instruction texture.
 */
export function instructionToFloats(inst: Instruction, out: Float32Array, offset: number): void {
  out[offset] = opcodeOf(inst.op);
  out[offset + 1] = inst.strokeWidth;
  out[offset + 2] = inst.parameter;
  out[offset + 3] = inst.smoothFunction;
  out.set(operandsOf(inst.op), offset + 4);
  out[offset + 20] = combineOpId(inst.combine);
  out[offset + 21] = inst.smoothParameter;
  out[offset + 22] = inst.target;
  out[offset + 23] = 0;
}

export function encodeUniforms(uniforms: Uniforms): ArrayBuffer {
  const buffer = new ArrayBuffer(UNIFORM_SIZE);
  const view = new DataView(buffer);
  view.setFloat32(0, uniforms.windowSize[0], true);
  view.setFloat32(4, uniforms.windowSize[1], true);
  view.setFloat32(8, uniforms.pointer[0], true);
  view.setFloat32(12, uniforms.pointer[1], true);
  view.setFloat32(16, uniforms.time, true);
  view.setFloat32(20, uniforms.scaleFactor, true);
  view.setUint32(24, uniforms.registerCount, true);
  view.setUint32(28, uniforms.instructionCount, true);
  return buffer;
}

export function decodeUniforms(buffer: ArrayBuffer): Uniforms {
  if (buffer.byteLength < UNIFORM_SIZE) {
    throw new RangeError(`Uniform block needs ${UNIFORM_SIZE} bytes, got ${buffer.byteLength}`);
  }
  const view = new DataView(buffer);
  return {
    windowSize: [view.getFloat32(0, true), view.getFloat32(4, true)],
    pointer: [view.getFloat32(8, true), view.getFloat32(12, true)],
    time: view.getFloat32(16, true),
    scaleFactor: view.getFloat32(20, true),
    registerCount: view.getUint32(24, true),
    instructionCount: view.getUint32(28, true),
  };
}

/** An instruction with every field at its neutral value */
export function emptyInstruction(op: Operation = { kind: "none" }): Instruction {
  return {
    op,
    strokeWidth: FILL_STROKE,
    parameter: 0,
    combine: "none",
    smoothFunction: 0,
    smoothParameter: 0,
    target: 0,
  };
}
