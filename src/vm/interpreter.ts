/**
 * Per-pixel register-machine interpreter
 *
 * Runs a decoded program for one sample point. Each pixel starts from a fresh
 * InterpreterState; nothing is shared between pixels. The interpreter never
 * throws: unknown opcodes and combine ops do nothing, and degenerate
 * numerics flow through as NaN or Infinity.
 */

import { SHAPE_REGISTER } from "../constants";
import type { Vec2 } from "../math/vec2";
import { blend, gammaEncode } from "../paint/composite";
import { antialiasFactor, paintColor } from "../paint/paint";
import { isShapeOp, type BlendMode, type Instruction, type Uniforms } from "../program/types";
import type { Color } from "../types/color";
import { RegisterStack } from "./registers";
import { evaluateShape, gradientMagnitude } from "./shapes";
import { TransformState } from "./TransformState";
import type { Atlases } from "./types";

export class InterpreterState {
  readonly transform = new TransformState();
  readonly registers = new RegisterStack();
  blendMode: BlendMode = "alphaUnder";
  /** Accumulated straight-alpha colour, before gamma encoding */
  color: Color = [0, 0, 0, 0];
  /**
   * Unit gradient direction of the most recent shape; zero after a load.
   * Diagnostic output only: no paint or combine step reads it.
   */
  direction: Vec2 = [0, 0];
}

/** Number of instructions a frame executes */
export function executedCount(program: readonly Instruction[], uniforms: Uniforms): number {
  return Math.max(0, Math.min(uniforms.instructionCount, program.length));
}

/** Execute one instruction against the state */
export function step(
  state: InterpreterState,
  inst: Instruction,
  pixel: Readonly<Vec2>,
  uniforms: Uniforms,
  atlases: Atlases
): void {
  const { op } = inst;

  switch (op.kind) {
    case "none":
    case "unknown":
      return;
    case "setTransform":
      state.transform.set(op.matrix);
      return;
    case "setBlendMode":
      state.blendMode = op.mode;
      return;
    case "fill":
    case "linearGradient":
    case "radialGradient":
    case "textureFill": {
      const d = state.registers.get(SHAPE_REGISTER);
      if (!(d < 0)) return;
      const src = paintColor(op, state.transform.toLocal(pixel), atlases);
      src[3] *= antialiasFactor(d);
      state.color = blend(state.blendMode, state.color, src);
      return;
    }
  }

  let result: number;
  let magnitude = 0;
  if (isShapeOp(op)) {
    const sample = evaluateShape(op, state.transform.samples(pixel), {
      atlases,
      scaleFactor: uniforms.scaleFactor,
    });
    result = sample.distance;
    magnitude = gradientMagnitude(sample.gradient);
    state.direction = sample.direction;
  } else {
    result = state.registers.get(op.register);
    state.direction = [0, 0];
  }

  if (inst.strokeWidth >= 0) {
    result = Math.abs(result) - inst.strokeWidth / 2;
  }
  if (magnitude !== 0) {
    result /= magnitude;
  }
  state.registers.apply(inst.target, inst.combine, result, inst.parameter);
}

/** Run a program for one pixel and return the final state */
export function runPixel(
  pixel: Readonly<Vec2>,
  program: readonly Instruction[],
  uniforms: Uniforms,
  atlases: Atlases = {}
): InterpreterState {
  const state = new InterpreterState();
  const count = executedCount(program, uniforms);
  for (let i = 0; i < count; i++) {
    step(state, program[i], pixel, uniforms, atlases);
  }
  return state;
}

/** Gamma-encoded output colour of one pixel */
export function evaluatePixel(
  pixel: Readonly<Vec2>,
  program: readonly Instruction[],
  uniforms: Uniforms,
  atlases: Atlases = {}
): Color {
  return gammaEncode(runPixel(pixel, program, uniforms, atlases).color);
}
