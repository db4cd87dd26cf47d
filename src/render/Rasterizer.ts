/**
 * CPU frame rasterizer
 *
 * Evaluates every pixel centre of a frame through the interpreter, tile by
 * tile, and writes 8-bit RGBA.
 */

import type { Instruction, Uniforms } from "../program/types";
import { validateProgram } from "../program/validate";
import { executedCount, evaluatePixel } from "../vm/interpreter";
import type { Atlases } from "../vm/types";

export interface RasterOptions {
  /** Edge length of the square tiles the frame is split into */
  tileSize?: number;
  /** Run validateProgram before each frame and warn about issues */
  validate?: boolean;
}

export const DEFAULT_RASTER_OPTIONS: Required<RasterOptions> = {
  tileSize: 64,
  validate: true,
};

export interface Frame {
  width: number;
  height: number;
  program: readonly Instruction[];
  uniforms: Uniforms;
  atlases?: Atlases;
}

export interface RasterStats {
  pixels: number;
  tiles: number;
  /** Instructions executed per pixel */
  instructions: number;
  elapsedMs: number;
}

export interface RasterResult {
  width: number;
  height: number;
  /** Row-major RGBA8, top row first */
  data: Uint8ClampedArray;
  stats: RasterStats;
}

export interface Tile {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Split a width x height grid into tiles, row by row */
export function tilesFor(width: number, height: number, tileSize: number): Tile[] {
  const tiles: Tile[] = [];
  for (let y = 0; y < height; y += tileSize) {
    for (let x = 0; x < width; x += tileSize) {
      tiles.push({
        x,
        y,
        width: Math.min(tileSize, width - x),
        height: Math.min(tileSize, height - y),
      });
    }
  }
  return tiles;
}

/** Convert a colour channel to a byte; non-finite values become 0 */
export function toByte(c: number): number {
  if (!Number.isFinite(c)) return 0;
  return Math.round(Math.min(Math.max(c, 0), 1) * 255);
}

export class Rasterizer {
  private readonly options: Required<RasterOptions>;
  // Messages already reported for the most recently rendered program
  private readonly reported = new Set<string>();
  private reportedFor: readonly Instruction[] | null = null;

  constructor(options: RasterOptions = {}) {
    this.options = { ...DEFAULT_RASTER_OPTIONS, ...options };
    if (!Number.isInteger(this.options.tileSize) || this.options.tileSize <= 0) {
      throw new RangeError(`Tile size must be a positive integer, got ${this.options.tileSize}`);
    }
  }

  render(frame: Frame): RasterResult {
    const { width, height, program, uniforms, atlases = {} } = frame;
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
      throw new RangeError(`Frame size must be non-negative integers, got ${width}x${height}`);
    }

    if (this.options.validate) {
      this.report(program, uniforms);
    }

    const start = performance.now();
    const data = new Uint8ClampedArray(width * height * 4);
    const tiles = tilesFor(width, height, this.options.tileSize);

    for (const tile of tiles) {
      this.renderTile(tile, frame.width, data, program, uniforms, atlases);
    }

    return {
      width,
      height,
      data,
      stats: {
        pixels: width * height,
        tiles: tiles.length,
        instructions: executedCount(program, uniforms),
        elapsedMs: performance.now() - start,
      },
    };
  }

  private renderTile(
    tile: Tile,
    stride: number,
    data: Uint8ClampedArray,
    program: readonly Instruction[],
    uniforms: Uniforms,
    atlases: Atlases
  ): void {
    for (let y = tile.y; y < tile.y + tile.height; y++) {
      for (let x = tile.x; x < tile.x + tile.width; x++) {
        const color = evaluatePixel([x + 0.5, y + 0.5], program, uniforms, atlases);
        const i = (y * stride + x) * 4;
        data[i] = toByte(color[0]);
        data[i + 1] = toByte(color[1]);
        data[i + 2] = toByte(color[2]);
        data[i + 3] = toByte(color[3]);
      }
    }
  }

  // Each distinct message is reported once per program
  private report(program: readonly Instruction[], uniforms: Uniforms): void {
    if (program !== this.reportedFor) {
      this.reported.clear();
      this.reportedFor = program;
    }
    for (const issue of validateProgram(program, uniforms)) {
      if (this.reported.has(issue.message)) continue;
      this.reported.add(issue.message);
      console.warn(`[Rasterizer] ${issue.severity} ${issue.code}: ${issue.message}`);
    }
  }
}
