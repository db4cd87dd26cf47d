import { describe, it, expect, vi, afterEach } from "vitest";
import { Rasterizer, tilesFor, toByte } from "./Rasterizer";
import { ProgramBuilder } from "../program/ProgramBuilder";
import { emptyInstruction } from "../program/codec";
import { DEFAULT_UNIFORMS, type Instruction } from "../program/types";
import type { Frame } from "./Rasterizer";

function frame(program: Instruction[], width = 4, height = 2): Frame {
  return {
    width,
    height,
    program,
    uniforms: { ...DEFAULT_UNIFORMS, windowSize: [width, height], instructionCount: program.length },
  };
}

describe("tilesFor", () => {
  it("covers the frame row by row with clipped edge tiles", () => {
    expect(tilesFor(5, 3, 4)).toEqual([
      { x: 0, y: 0, width: 4, height: 3 },
      { x: 4, y: 0, width: 1, height: 3 },
    ]);
  });

  it("returns nothing for an empty frame", () => {
    expect(tilesFor(0, 10, 4)).toEqual([]);
  });
});

describe("toByte", () => {
  it("scales, rounds and clamps", () => {
    expect(toByte(1)).toBe(255);
    expect(toByte(0.5)).toBe(128);
    expect(toByte(-2)).toBe(0);
    expect(toByte(7)).toBe(255);
  });

  it("maps non-finite values to zero", () => {
    expect(toByte(NaN)).toBe(0);
    expect(toByte(Infinity)).toBe(0);
  });
});

describe("Rasterizer", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("rejects invalid tile sizes", () => {
    expect(() => new Rasterizer({ tileSize: 0 })).toThrow(RangeError);
  });

  it("rejects invalid frame sizes", () => {
    expect(() => new Rasterizer().render(frame([], -1, 2))).toThrow(
      "Frame size must be non-negative integers, got -1x2"
    );
  });

  it("samples pixel centres", () => {
    const program = new ProgramBuilder()
      .rectangle([-100, -100], [2.5, 100])
      .fill([1, 0, 0, 1])
      .build();
    const result = new Rasterizer().render(frame(program));

    expect(Array.from(result.data.subarray(0, 16))).toEqual([
      255, 0, 0, 255, 255, 0, 0, 255, 0, 0, 0, 0, 0, 0, 0, 0,
    ]);
    expect(Array.from(result.data.subarray(16, 32))).toEqual(
      Array.from(result.data.subarray(0, 16))
    );
  });

  it("reports frame statistics", () => {
    const program = new ProgramBuilder().circle([0, 0], 1).fill([1, 1, 1, 1]).build();
    const { stats } = new Rasterizer({ tileSize: 2 }).render(frame(program));

    expect(stats.pixels).toBe(8);
    expect(stats.tiles).toBe(2);
    expect(stats.instructions).toBe(2);
    expect(stats.elapsedMs).toBeGreaterThanOrEqual(0);
  });

  it("renders the same frame with any tile size", () => {
    const program = new ProgramBuilder().circle([3, 3], 2.5).fill([0, 1, 0, 1]).build();
    const a = new Rasterizer({ tileSize: 1 }).render(frame(program, 7, 5));
    const b = new Rasterizer({ tileSize: 64 }).render(frame(program, 7, 5));

    expect(Array.from(a.data)).toEqual(Array.from(b.data));
  });

  it("warns about each validation issue once", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const program = new ProgramBuilder()
      .push(emptyInstruction({ kind: "unknown", opcode: 77 }))
      .build();
    const rasterizer = new Rasterizer();

    rasterizer.render(frame(program));
    rasterizer.render(frame(program));

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "[Rasterizer] warning unknown-opcode: Instruction 0: unknown opcode 77 is ignored"
    );
  });

  it("forgets reported messages when the program changes", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const first = [emptyInstruction({ kind: "unknown", opcode: 77 })];
    const second = [emptyInstruction({ kind: "unknown", opcode: 78 })];
    const rasterizer = new Rasterizer();

    rasterizer.render(frame(first));
    rasterizer.render(frame(second));
    rasterizer.render(frame(first));

    expect(warn).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenLastCalledWith(
      "[Rasterizer] warning unknown-opcode: Instruction 0: unknown opcode 77 is ignored"
    );
  });

  it("skips validation when disabled", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const program = [emptyInstruction({ kind: "unknown", opcode: 77 })];

    new Rasterizer({ validate: false }).render(frame(program));

    expect(warn).not.toHaveBeenCalled();
  });
});
