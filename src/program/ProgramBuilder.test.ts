import { describe, it, expect } from "vitest";
import { ProgramBuilder } from "./ProgramBuilder";
import { DISCARD_REGISTER } from "../constants";
import { toAffine } from "../math/mat3";

describe("ProgramBuilder", () => {
  it("fills shapes into register 1 by default", () => {
    const [inst] = new ProgramBuilder().circle([0, 0], 50).build();

    expect(inst).toEqual({
      op: { kind: "circle", center: [0, 0], radius: 50 },
      strokeWidth: -1,
      parameter: 0,
      combine: "replace",
      smoothFunction: 0,
      smoothParameter: 0,
      target: 1,
    });
  });

  it("applies shape options", () => {
    const [inst] = new ProgramBuilder()
      .rectangle([0, 0], [10, 10], [1, 2, 3, 4], { stroke: 2, combine: "lerp", target: 5, parameter: 0.3 })
      .build();

    expect(inst.op).toEqual({ kind: "rectangle", min: [0, 0], max: [10, 10], radii: [1, 2, 3, 4] });
    expect(inst.strokeWidth).toBe(2);
    expect(inst.combine).toBe("lerp");
    expect(inst.target).toBe(5);
    expect(inst.parameter).toBe(0.3);
  });

  it("defaults rectangles to sharp corners", () => {
    const [inst] = new ProgramBuilder().rectangle([0, 0], [1, 1]).build();

    expect(inst.op).toEqual({ kind: "rectangle", min: [0, 0], max: [1, 1], radii: [0, 0, 0, 0] });
  });

  it("discards the result of paint and control instructions", () => {
    const program = new ProgramBuilder()
      .fill([1, 1, 1, 1])
      .blendMode("add")
      .affine(1, 0, 0, 0, 1, 0)
      .build();

    for (const inst of program) {
      expect(inst.combine).toBe("none");
      expect(inst.target).toBe(DISCARD_REGISTER);
    }
  });

  it("builds transforms from affine coefficients", () => {
    const [inst] = new ProgramBuilder().affine(2, 0, 5, 0, 2, 6).build();

    expect(inst.op.kind).toBe("setTransform");
    if (inst.op.kind === "setTransform") {
      expect(toAffine(inst.op.matrix)).toEqual([2, 0, 5, 0, 2, 6]);
    }
  });

  describe("transform composition", () => {
    function lastTransform(builder: ProgramBuilder): number[] {
      const op = builder.build()[builder.length - 1].op;
      if (op.kind !== "setTransform") throw new Error(`expected setTransform, got ${op.kind}`);
      return toAffine(op.matrix);
    }

    it("applies later steps in local space", () => {
      const builder = new ProgramBuilder().scale(2).translate(5, 0);

      expect(builder.length).toBe(2);
      expect(lastTransform(builder)).toEqual([2, 0, 10, 0, 2, 0]);
    });

    it("composes onto a pushed transform", () => {
      const [inst] = new ProgramBuilder().affine(1, 0, 3, 0, 1, 4).build();
      const builder = new ProgramBuilder().push(inst).scale(3, 2);

      expect(lastTransform(builder)).toEqual([3, 0, 3, 0, 2, 4]);
    });

    it("rotates counter-clockwise", () => {
      const [a, b, c, d, e, f] = lastTransform(new ProgramBuilder().rotate(Math.PI / 2));

      expect(a).toBeCloseTo(0, 6);
      expect(b).toBeCloseTo(-1, 6);
      expect(d).toBeCloseTo(1, 6);
      expect(e).toBeCloseTo(0, 6);
      expect([c, f]).toEqual([0, 0]);
    });
  });

  it("rejects registers outside the stack", () => {
    const builder = new ProgramBuilder();

    expect(() => builder.circle([0, 0], 1, { target: 64 })).toThrow(RangeError);
    expect(() => builder.circle([0, 0], 1, { target: -1 })).toThrow(RangeError);
    expect(() => builder.load(70)).toThrow("Source register 70 is outside 0..63");
    expect(builder.length).toBe(0);
  });

  it("returns a copy on build", () => {
    const builder = new ProgramBuilder().circle([0, 0], 1);
    const first = builder.build();
    builder.fill([1, 0, 0, 1]);

    expect(first).toHaveLength(1);
    expect(builder.build()).toHaveLength(2);
  });
});
