/**
 * GPU Interpreter
 *
 * Runs programs on WebGL2: the instruction list lives in a float texture and a
 * full-screen fragment shader interprets it per pixel. Output matches the CPU
 * evaluator up to float precision.
 */

import type { GlyphAtlas } from "../atlas/GlyphAtlas";
import type { TextureAtlas } from "../atlas/TextureAtlas";
import { instructionToFloats } from "../program/codec";
import type { Instruction, Uniforms } from "../program/types";
import { createProgram } from "./compile";
import {
  interpreterFragmentShader,
  interpreterVertexShader,
  TEXELS_PER_INSTRUCTION,
} from "./shaders";
import { Texture } from "./Texture";

const FLOATS_PER_INSTRUCTION = TEXELS_PER_INSTRUCTION * 4;

// Texture units
const PROGRAM_UNIT = 0;
const ATLAS_UNIT = 1;
const GLYPH_UNIT = 2;

type UniformName =
  | "program"
  | "atlas"
  | "glyphs"
  | "windowSize"
  | "pointer"
  | "time"
  | "scaleFactor"
  | "instructionCount"
  | "glyphCellsPerRow"
  | "hasAtlas"
  | "hasGlyphs";

function uniformLocations(
  gl: WebGL2RenderingContext,
  program: WebGLProgram
): Record<UniformName, WebGLUniformLocation | null> {
  const location = (name: UniformName) => gl.getUniformLocation(program, `u_${name}`);
  return {
    program: location("program"),
    atlas: location("atlas"),
    glyphs: location("glyphs"),
    windowSize: location("windowSize"),
    pointer: location("pointer"),
    time: location("time"),
    scaleFactor: location("scaleFactor"),
    instructionCount: location("instructionCount"),
    glyphCellsPerRow: location("glyphCellsPerRow"),
    hasAtlas: location("hasAtlas"),
    hasGlyphs: location("hasGlyphs"),
  };
}

/** Pack a program as RGBA32F rows, one row of six texels per instruction */
export function packProgram(instructions: readonly Instruction[]): Float32Array {
  // At least one row so the texture is never zero-sized
  const rows = Math.max(1, instructions.length);
  const data = new Float32Array(rows * FLOATS_PER_INSTRUCTION);
  instructions.forEach((inst, i) => instructionToFloats(inst, data, i * FLOATS_PER_INSTRUCTION));
  return data;
}

export class GpuInterpreter {
  readonly gl: WebGL2RenderingContext;

  private program: WebGLProgram;
  private vao: WebGLVertexArrayObject;
  // Locations of uniforms the compiler optimized away are null, which WebGL ignores
  private uniforms: Record<UniformName, WebGLUniformLocation | null>;

  private programTexture: Texture;
  private atlasTexture: Texture | null = null;
  private glyphTexture: Texture | null = null;
  private glyphCellsPerRow = 1;
  private programLength = 0;

  private _destroyed = false;

  constructor(gl: WebGL2RenderingContext) {
    this.gl = gl;
    this.program = createProgram(gl, interpreterVertexShader, interpreterFragmentShader);

    const vao = gl.createVertexArray();
    if (!vao) {
      gl.deleteProgram(this.program);
      throw new Error("Failed to create vertex array");
    }
    this.vao = vao;

    this.uniforms = uniformLocations(gl, this.program);

    this.programTexture = new Texture(gl, "2d", "nearest");
    this.programTexture.setFloatData(TEXELS_PER_INSTRUCTION, 1, packProgram([]));
  }

  /** Number of instructions currently uploaded */
  get length(): number {
    return this.programLength;
  }

  /** Upload a program, replacing the previous one */
  setProgram(instructions: readonly Instruction[]): void {
    this.assertAlive("set program on");
    this.programTexture.setFloatData(
      TEXELS_PER_INSTRUCTION,
      Math.max(1, instructions.length),
      packProgram(instructions)
    );
    this.programLength = instructions.length;
  }

  /** Upload the generic texture atlas, or remove it with null */
  setAtlas(atlas: TextureAtlas | null): void {
    this.assertAlive("set atlas on");
    this.atlasTexture?.destroy();
    this.atlasTexture = null;
    if (!atlas) return;

    const texture = new Texture(this.gl, "2dArray", "linear");
    texture.setLayers(atlas.width, atlas.height, atlas.layers, atlas.data);
    this.atlasTexture = texture;
  }

  /** Upload the glyph atlas, or remove it with null */
  setGlyphAtlas(atlas: GlyphAtlas | null): void {
    this.assertAlive("set glyph atlas on");
    this.glyphTexture?.destroy();
    this.glyphTexture = null;
    if (!atlas) return;

    const { texture: pages } = atlas;
    const texture = new Texture(this.gl, "2dArray", "linear");
    texture.setLayers(pages.width, pages.height, pages.layers, pages.data);
    this.glyphTexture = texture;
    this.glyphCellsPerRow = atlas.cellsPerRow;
  }

  /** Draw one frame into the current framebuffer */
  render(uniforms: Uniforms): void {
    this.assertAlive("render with");
    const gl = this.gl;
    const u = this.uniforms;

    gl.viewport(0, 0, uniforms.windowSize[0], uniforms.windowSize[1]);
    gl.disable(gl.BLEND);
    gl.useProgram(this.program);

    this.programTexture.bind(PROGRAM_UNIT);
    gl.uniform1i(u.program, PROGRAM_UNIT);
    this.atlasTexture?.bind(ATLAS_UNIT);
    gl.uniform1i(u.atlas, ATLAS_UNIT);
    this.glyphTexture?.bind(GLYPH_UNIT);
    gl.uniform1i(u.glyphs, GLYPH_UNIT);

    gl.uniform2f(u.windowSize, uniforms.windowSize[0], uniforms.windowSize[1]);
    gl.uniform2f(u.pointer, uniforms.pointer[0], uniforms.pointer[1]);
    gl.uniform1f(u.time, uniforms.time);
    gl.uniform1f(u.scaleFactor, uniforms.scaleFactor);
    gl.uniform1i(
      u.instructionCount,
      Math.max(0, Math.min(uniforms.instructionCount, this.programLength))
    );
    gl.uniform1f(u.glyphCellsPerRow, this.glyphCellsPerRow);
    gl.uniform1i(u.hasAtlas, this.atlasTexture ? 1 : 0);
    gl.uniform1i(u.hasGlyphs, this.glyphTexture ? 1 : 0);

    gl.bindVertexArray(this.vao);
    gl.drawArrays(gl.TRIANGLES, 0, 6);
    gl.bindVertexArray(null);
  }

  /** Release all GPU resources */
  destroy(): void {
    if (this._destroyed) return;

    this.programTexture.destroy();
    this.atlasTexture?.destroy();
    this.glyphTexture?.destroy();
    this.atlasTexture = null;
    this.glyphTexture = null;

    this.gl.deleteVertexArray(this.vao);
    this.gl.deleteProgram(this.program);
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  private assertAlive(action: string): void {
    if (this._destroyed) {
      throw new Error(`Cannot ${action} destroyed GpuInterpreter`);
    }
  }
}
