/**
 * Multi-channel signed distance glyph atlas
 *
 * Every layer ("page") is a square grid of equal-size cells, one glyph per
 * cell. A glyph id addresses a cell directly:
 *   glyphId = page * cellsPerPage + cellIndex
 *   column = cellIndex % cellsPerRow, row = floor(cellIndex / cellsPerRow)
 * Only the RGB channels carry distance data.
 */

import type { Color } from "../types/color";
import { TextureAtlas } from "./TextureAtlas";

export interface GlyphAtlasOptions {
  /** Side length of a page in texels (default: 2048) */
  pageSize?: number;
  /** Side length of a glyph cell in texels (default: 64) */
  cellSize?: number;
  /** Number of pages (default: 1) */
  pages?: number;
}

export const DEFAULT_GLYPH_ATLAS_OPTIONS: Required<GlyphAtlasOptions> = {
  pageSize: 2048,
  cellSize: 64,
  pages: 1,
};

/** Location of a glyph cell inside the atlas */
export interface GlyphCell {
  page: number;
  column: number;
  row: number;
}

export class GlyphAtlas {
  readonly pageSize: number;
  readonly cellSize: number;
  readonly cellsPerRow: number;
  readonly cellsPerPage: number;
  readonly texture: TextureAtlas;

  constructor(options: GlyphAtlasOptions = {}) {
    const { pageSize, cellSize, pages } = { ...DEFAULT_GLYPH_ATLAS_OPTIONS, ...options };
    if (cellSize <= 0 || pageSize % cellSize !== 0) {
      throw new RangeError(`Cell size ${cellSize} must divide page size ${pageSize}`);
    }
    this.pageSize = pageSize;
    this.cellSize = cellSize;
    this.cellsPerRow = pageSize / cellSize;
    this.cellsPerPage = this.cellsPerRow * this.cellsPerRow;
    this.texture = new TextureAtlas({ width: pageSize, height: pageSize, layers: pages });
  }

  /** Total number of addressable glyph ids */
  get capacity(): number {
    return this.cellsPerPage * this.texture.layers;
  }

  /** Fractional ids are truncated toward zero */
  cell(glyphId: number): GlyphCell {
    const id = Math.trunc(glyphId);
    const page = Math.floor(id / this.cellsPerPage);
    const index = id % this.cellsPerPage;
    return {
      page,
      column: index % this.cellsPerRow,
      row: Math.floor(index / this.cellsPerRow),
    };
  }

  /**
   * Store the distance texels of one glyph.
   *
   * @param pixels - RGBA8 data of exactly cellSize * cellSize texels
   */
  setGlyph(glyphId: number, pixels: ArrayLike<number>): void {
    if (!Number.isInteger(glyphId) || glyphId < 0 || glyphId >= this.capacity) {
      throw new RangeError(`Glyph id ${glyphId} is outside 0..${this.capacity - 1}`);
    }
    const expected = this.cellSize * this.cellSize * 4;
    if (pixels.length !== expected) {
      throw new RangeError(`Glyph data must be ${expected} bytes, got ${pixels.length}`);
    }
    const { page, column, row } = this.cell(glyphId);
    const { data, width, height } = this.texture;
    for (let y = 0; y < this.cellSize; y++) {
      const src = y * this.cellSize * 4;
      const dst = ((page * height + row * this.cellSize + y) * width + column * this.cellSize) * 4;
      for (let i = 0; i < this.cellSize * 4; i++) {
        data[dst + i] = pixels[src + i];
      }
    }
  }

  /**
   * Sample a glyph at cell-relative coordinates (0-1 across the cell).
   * Filtering happens on the whole page, as on the GPU.
   */
  sample(glyphId: number, u: number, v: number): Color {
    const { page, column, row } = this.cell(glyphId);
    return this.texture.sample(
      page,
      (column + u) / this.cellsPerRow,
      (row + v) / this.cellsPerRow
    );
  }
}
