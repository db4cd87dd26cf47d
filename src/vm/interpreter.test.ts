import { describe, it, expect } from "vitest";
import { evaluatePixel, runPixel, executedCount } from "./interpreter";
import { ProgramBuilder } from "../program/ProgramBuilder";
import { decodeProgram, emptyInstruction, encodeProgram } from "../program/codec";
import { DEFAULT_UNIFORMS, type Instruction, type Uniforms } from "../program/types";

function uniformsFor(program: readonly Instruction[]): Uniforms {
  return { ...DEFAULT_UNIFORMS, windowSize: [200, 200], instructionCount: program.length };
}

describe("evaluatePixel", () => {
  describe("filled circle", () => {
    const program = new ProgramBuilder().circle([0, 0], 50).fill([1, 0, 0, 1]).build();
    const uniforms = uniformsFor(program);

    it("paints the center opaque", () => {
      expect(evaluatePixel([0, 0], program, uniforms)).toEqual([1, 0, 0, 1]);
    });

    it("leaves the outside transparent", () => {
      expect(evaluatePixel([100, 0], program, uniforms)).toEqual([0, 0, 0, 0]);
    });

    it("is deterministic", () => {
      const a = evaluatePixel([37.5, 12.25], program, uniforms);
      const b = evaluatePixel([37.5, 12.25], program, uniforms);

      expect(a).toEqual(b);
    });
  });

  describe("intersected circles", () => {
    const program = new ProgramBuilder()
      .circle([0, 0], 30)
      .circle([40, 0], 30, { combine: "and" })
      .fill([0, 1, 0, 1])
      .build();
    const uniforms = uniformsFor(program);

    it("fills the overlap", () => {
      expect(evaluatePixel([20, 0], program, uniforms)).toEqual([0, 1, 0, 1]);
    });

    it("leaves areas covered by one circle unfilled", () => {
      expect(evaluatePixel([-20, 0], program, uniforms)).toEqual([0, 0, 0, 0]);
      expect(evaluatePixel([60, 0], program, uniforms)).toEqual([0, 0, 0, 0]);
    });
  });

  describe("scaled rectangle", () => {
    const program = new ProgramBuilder()
      .affine(2, 0, 0, 0, 2, 0)
      .rectangle([-10, -10], [10, 10])
      .fill([1, 1, 1, 1])
      .build();
    const uniforms = uniformsFor(program);

    it("measures distance in screen pixels", () => {
      const state = runPixel([19, 0], program, uniforms);

      expect(state.registers.get(1)).toBeCloseTo(-1, 6);
    });

    it("is opaque one pixel inside the scaled edge", () => {
      expect(evaluatePixel([19, 0], program, uniforms)[3]).toBeCloseTo(1, 5);
    });

    it("is transparent one pixel outside", () => {
      expect(evaluatePixel([21, 0], program, uniforms)[3]).toBe(0);
    });

    it("is half covered half a pixel inside", () => {
      const color = evaluatePixel([19.5, 0], program, uniforms);

      expect(color[0]).toBeCloseTo(1, 9);
      expect(color[3]).toBeCloseTo(0.5, 5);
    });
  });

  describe("stroked circle", () => {
    const program = new ProgramBuilder()
      .circle([0, 0], 50, { stroke: 4 })
      .fill([0, 0, 1, 1])
      .build();
    const uniforms = uniformsFor(program);

    it("is opaque on the outline", () => {
      expect(evaluatePixel([50, 0], program, uniforms)[3]).toBe(1);
    });

    it("fades at the inner edge", () => {
      expect(evaluatePixel([48.5, 0], program, uniforms)[3]).toBeCloseTo(0.5, 5);
    });

    it("is hollow inside and clear outside", () => {
      expect(evaluatePixel([45, 0], program, uniforms)[3]).toBe(0);
      expect(evaluatePixel([55, 0], program, uniforms)[3]).toBe(0);
    });
  });

  it("raises the output color to the 2.2 power", () => {
    const program = new ProgramBuilder().circle([0, 0], 50).fill([0.5, 0.5, 0.5, 1]).build();

    expect(evaluatePixel([0, 0], program, uniformsFor(program))).toEqual([
      Math.pow(0.5, 2.2),
      Math.pow(0.5, 2.2),
      Math.pow(0.5, 2.2),
      1,
    ]);
  });

  it("runs only the requested number of instructions", () => {
    const program = new ProgramBuilder().circle([0, 0], 50).fill([1, 0, 0, 1]).build();
    const uniforms = { ...uniformsFor(program), instructionCount: 1 };

    expect(evaluatePixel([0, 0], program, uniforms)).toEqual([0, 0, 0, 0]);
  });

  it("skips unknown opcodes", () => {
    const program = new ProgramBuilder()
      .circle([0, 0], 50)
      .push(emptyInstruction({ kind: "unknown", opcode: 200 }))
      .fill([1, 0, 0, 1])
      .build();

    expect(evaluatePixel([0, 0], program, uniformsFor(program))).toEqual([1, 0, 0, 1]);
  });

  it("renders nothing through a singular transform", () => {
    const program = new ProgramBuilder()
      .affine(0, 0, 0, 0, 0, 0)
      .circle([0, 0], 50)
      .fill([1, 0, 0, 1])
      .build();

    expect(evaluatePixel([0, 0], program, uniformsFor(program))).toEqual([0, 0, 0, 0]);
  });
});

describe("runPixel", () => {
  const uniforms = { ...DEFAULT_UNIFORMS, instructionCount: 10 };

  it("starts from zeroed registers and alpha-under blending", () => {
    const state = runPixel([0, 0], [], uniforms);

    expect(state.registers.toArray().every((v) => v === 0)).toBe(true);
    expect(state.blendMode).toBe("alphaUnder");
    expect(state.color).toEqual([0, 0, 0, 0]);
  });

  it("copies registers with load", () => {
    const program = new ProgramBuilder()
      .circle([0, 0], 50, { target: 2 })
      .load(2)
      .build();
    const state = runPixel([0, 0], program, uniforms);

    expect(state.registers.get(2)).toBe(-50);
    expect(state.registers.get(1)).toBe(-50);
  });

  it("loads from the truncated register of a decoded fractional index", () => {
    const program = new ProgramBuilder()
      .circle([0, 0], 50, { target: 2 })
      .push({ ...emptyInstruction({ kind: "load", register: 2.5 }), combine: "replace", target: 1 })
      .build();
    const state = runPixel([0, 0], decodeProgram(encodeProgram(program)), uniforms);

    expect(state.registers.get(1)).toBe(-50);
  });

  it("normalizes shape distances by the gradient", () => {
    const program = new ProgramBuilder().circle([0, 0], 10, { target: 3 }).build();
    const state = runPixel([30, 0], program, uniforms);

    expect(state.registers.get(3)).toBeCloseTo(20, 6);
    expect(state.direction[0]).toBeCloseTo(1, 6);
    expect(state.direction[1]).toBeCloseTo(0, 6);
  });

  it("unions shapes with or", () => {
    const program = new ProgramBuilder()
      .circle([0, 0], 10)
      .circle([100, 0], 10, { combine: "or" })
      .build();

    expect(runPixel([100, 0], program, uniforms).registers.get(1)).toBe(-10);
  });

  it("switches blend modes", () => {
    const program = new ProgramBuilder()
      .circle([0, 0], 50)
      .fill([0.5, 0, 0, 0.5])
      .blendMode("add")
      .fill([0.25, 0, 0, 0.25])
      .build();
    const state = runPixel([0, 0], program, uniforms);

    expect(state.blendMode).toBe("add");
    expect(state.color).toEqual([0.75, 0, 0, 0.75]);
  });

  it("does not paint outside the current shape", () => {
    const program = new ProgramBuilder().circle([0, 0], 5).fill([1, 1, 1, 1]).build();

    expect(runPixel([50, 50], program, uniforms).color).toEqual([0, 0, 0, 0]);
  });
});

describe("executedCount", () => {
  it("is the smaller of the uniform count and the program length", () => {
    const program = new ProgramBuilder().circle([0, 0], 1).build();

    expect(executedCount(program, { ...DEFAULT_UNIFORMS, instructionCount: 5 })).toBe(1);
    expect(executedCount(program, { ...DEFAULT_UNIFORMS, instructionCount: 0 })).toBe(0);
  });
});
