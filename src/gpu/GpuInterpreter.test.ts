import { describe, it, expect, vi } from "vitest";
import { GpuInterpreter, packProgram } from "./GpuInterpreter";
import { interpreterFragmentShader, TEXELS_PER_INSTRUCTION } from "./shaders";
import { createMockGL } from "./mockGL";
import { GlyphAtlas } from "../atlas/GlyphAtlas";
import { TextureAtlas } from "../atlas/TextureAtlas";
import { ProgramBuilder } from "../program/ProgramBuilder";
import { DEFAULT_UNIFORMS } from "../program/types";

const program = new ProgramBuilder().circle([10, 20], 5).fill([1, 0, 0, 1]).build();

type Setter = "uniform1i" | "uniform1f" | "uniform2f";

function callsOf(gl: WebGL2RenderingContext, setter: Setter): readonly (readonly unknown[])[] {
  switch (setter) {
    case "uniform1i":
      return vi.mocked(gl.uniform1i).mock.calls;
    case "uniform1f":
      return vi.mocked(gl.uniform1f).mock.calls;
    case "uniform2f":
      return vi.mocked(gl.uniform2f).mock.calls;
  }
}

// Mock locations are { name } objects
function uniformCall(gl: WebGL2RenderingContext, setter: Setter, name: string) {
  return callsOf(gl, setter).find(([location]) => {
    return typeof location === "object" && location !== null && "name" in location && location.name === name;
  });
}

describe("packProgram", () => {
  it("writes one row of six texels per instruction", () => {
    const data = packProgram(program);

    expect(data.length).toBe(2 * TEXELS_PER_INSTRUCTION * 4);
    expect(Array.from(data.subarray(0, 7))).toEqual([1, -1, 0, 0, 10, 20, 5]);
  });

  it("keeps one empty row for an empty program", () => {
    expect(packProgram([])).toEqual(new Float32Array(TEXELS_PER_INSTRUCTION * 4));
  });
});

describe("interpreterFragmentShader", () => {
  it("takes its constants from the CPU definitions", () => {
    expect(interpreterFragmentShader).toContain("#define REGISTER_COUNT 64");
    expect(interpreterFragmentShader).toContain("#define GRADIENT_EPSILON 0.0001");
    expect(interpreterFragmentShader).toContain("#define OP_LOAD 14");
    expect(interpreterFragmentShader).toContain("#define C_SIGMOID 11");
    expect(interpreterFragmentShader).toContain("#define BLEND_ALPHA_UNDER 7");
  });
});

describe("GpuInterpreter", () => {
  it("compiles the interpreter and uploads an empty program", () => {
    const gl = createMockGL();
    const gpu = new GpuInterpreter(gl);

    expect(gl.linkProgram).toHaveBeenCalledTimes(1);
    expect(gl.texImage2D).toHaveBeenCalledTimes(1);
    expect(gpu.length).toBe(0);
  });

  it("throws if the vertex array cannot be created", () => {
    const gl = createMockGL();
    vi.mocked(gl.createVertexArray).mockReturnValue(null);

    expect(() => new GpuInterpreter(gl)).toThrow("Failed to create vertex array");
    expect(gl.deleteProgram).toHaveBeenCalled();
  });

  it("uploads programs as float rows", () => {
    const gl = createMockGL();
    const gpu = new GpuInterpreter(gl);

    gpu.setProgram(program);

    expect(gpu.length).toBe(2);
    expect(gl.texImage2D).toHaveBeenLastCalledWith(
      gl.TEXTURE_2D, 0, gl.RGBA32F, TEXELS_PER_INSTRUCTION, 2, 0, gl.RGBA, gl.FLOAT, packProgram(program)
    );
  });

  it("draws one full-screen pair of triangles without blending", () => {
    const gl = createMockGL();
    const gpu = new GpuInterpreter(gl);
    gpu.setProgram(program);

    gpu.render({ ...DEFAULT_UNIFORMS, windowSize: [320, 200], instructionCount: 2 });

    expect(gl.viewport).toHaveBeenCalledWith(0, 0, 320, 200);
    expect(gl.disable).toHaveBeenCalledWith(gl.BLEND);
    expect(gl.drawArrays).toHaveBeenCalledWith(gl.TRIANGLES, 0, 6);
    expect(uniformCall(gl, "uniform2f", "u_windowSize")).toEqual([{ name: "u_windowSize" }, 320, 200]);
  });

  it("clamps the instruction count to the uploaded program", () => {
    const gl = createMockGL();
    const gpu = new GpuInterpreter(gl);
    gpu.setProgram(program);

    gpu.render({ ...DEFAULT_UNIFORMS, instructionCount: 50 });

    expect(uniformCall(gl, "uniform1i", "u_instructionCount")).toEqual([
      { name: "u_instructionCount" },
      2,
    ]);
  });

  it("uploads atlases as array textures", () => {
    const gl = createMockGL();
    const gpu = new GpuInterpreter(gl);
    const atlas = new TextureAtlas({ width: 2, height: 2, layers: 3 });
    const glyphs = new GlyphAtlas({ pageSize: 8, cellSize: 4 });

    gpu.setAtlas(atlas);
    gpu.setGlyphAtlas(glyphs);
    gpu.render(DEFAULT_UNIFORMS);

    expect(gl.texImage3D).toHaveBeenCalledWith(
      gl.TEXTURE_2D_ARRAY, 0, gl.RGBA8, 2, 2, 3, 0, gl.RGBA, gl.UNSIGNED_BYTE, atlas.data
    );
    expect(uniformCall(gl, "uniform1i", "u_hasAtlas")).toEqual([{ name: "u_hasAtlas" }, 1]);
    expect(uniformCall(gl, "uniform1f", "u_glyphCellsPerRow")).toEqual([
      { name: "u_glyphCellsPerRow" },
      2,
    ]);
  });

  it("releases an atlas replaced by null", () => {
    const gl = createMockGL();
    const gpu = new GpuInterpreter(gl);
    gpu.setAtlas(new TextureAtlas({ width: 1, height: 1 }));

    gpu.setAtlas(null);
    gpu.render(DEFAULT_UNIFORMS);

    expect(gl.deleteTexture).toHaveBeenCalledTimes(1);
    expect(uniformCall(gl, "uniform1i", "u_hasAtlas")).toEqual([{ name: "u_hasAtlas" }, 0]);
  });

  it("releases everything on destroy and refuses further use", () => {
    const gl = createMockGL();
    const gpu = new GpuInterpreter(gl);

    gpu.destroy();
    gpu.destroy();

    expect(gpu.destroyed).toBe(true);
    expect(gl.deleteProgram).toHaveBeenCalledTimes(1);
    expect(gl.deleteVertexArray).toHaveBeenCalledTimes(1);
    expect(() => gpu.render(DEFAULT_UNIFORMS)).toThrow("Cannot render with destroyed GpuInterpreter");
    expect(() => gpu.setProgram(program)).toThrow("Cannot set program on destroyed GpuInterpreter");
  });
});
