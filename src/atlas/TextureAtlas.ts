/**
 * Layered RGBA texture atlas
 *
 * CPU-side counterpart of a TEXTURE_2D_ARRAY: fixed physical size, several
 * layers, bilinear filtering with clamp-to-edge addressing. The same bytes are
 * uploaded unchanged by the GPU backend.
 */

import type { Color } from "../types/color";

export interface TextureAtlasOptions {
  /** Physical width of every layer in texels */
  width: number;
  /** Physical height of every layer in texels */
  height: number;
  /** Number of layers (default: 1) */
  layers?: number;
}

export class TextureAtlas {
  readonly width: number;
  readonly height: number;
  readonly layers: number;
  /** RGBA8 texels, layer after layer */
  readonly data: Uint8Array;

  constructor(options: TextureAtlasOptions) {
    const layers = options.layers ?? 1;
    if (
      !Number.isInteger(options.width) ||
      !Number.isInteger(options.height) ||
      !Number.isInteger(layers) ||
      options.width <= 0 ||
      options.height <= 0 ||
      layers <= 0
    ) {
      throw new RangeError(
        `Invalid atlas size ${options.width}x${options.height}x${layers}`
      );
    }
    this.width = options.width;
    this.height = options.height;
    this.layers = layers;
    this.data = new Uint8Array(this.width * this.height * this.layers * 4);
  }

  /** Replace a whole layer with RGBA8 pixels (width * height * 4 bytes) */
  setLayer(layer: number, pixels: ArrayLike<number>): void {
    this.checkLayer(layer);
    const size = this.width * this.height * 4;
    if (pixels.length !== size) {
      throw new RangeError(`Layer data must be ${size} bytes, got ${pixels.length}`);
    }
    this.data.set(pixels, layer * size);
  }

  /** Write one texel from a 0-1 color */
  setTexel(layer: number, x: number, y: number, color: Readonly<Color>): void {
    this.checkLayer(layer);
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) {
      throw new RangeError(`Texel (${x}, ${y}) is outside the ${this.width}x${this.height} atlas`);
    }
    const idx = this.offset(layer, x, y);
    for (let i = 0; i < 4; i++) {
      this.data[idx + i] = Math.round(Math.min(Math.max(color[i], 0), 1) * 255);
    }
  }

  /** Read one texel as a 0-1 color; coordinates are clamped to the edge */
  texel(layer: number, x: number, y: number): Color {
    const idx = this.offset(
      this.clampLayer(layer),
      Math.min(Math.max(x, 0), this.width - 1),
      Math.min(Math.max(y, 0), this.height - 1)
    );
    const d = this.data;
    return [d[idx] / 255, d[idx + 1] / 255, d[idx + 2] / 255, d[idx + 3] / 255];
  }

  /**
   * Bilinear sample at normalized coordinates.
   * Texel centers sit at (i + 0.5) / size; the layer index is rounded and
   * clamped like a texture array lookup.
   */
  sample(layer: number, u: number, v: number): Color {
    const x = u * this.width - 0.5;
    const y = v * this.height - 0.5;
    const x0 = Math.floor(x);
    const y0 = Math.floor(y);
    const fx = x - x0;
    const fy = y - y0;

    const c00 = this.texel(layer, x0, y0);
    const c10 = this.texel(layer, x0 + 1, y0);
    const c01 = this.texel(layer, x0, y0 + 1);
    const c11 = this.texel(layer, x0 + 1, y0 + 1);

    const out: Color = [0, 0, 0, 0];
    for (let i = 0; i < 4; i++) {
      const top = c00[i] + (c10[i] - c00[i]) * fx;
      const bottom = c01[i] + (c11[i] - c01[i]) * fx;
      out[i] = top + (bottom - top) * fy;
    }
    return out;
  }

  private offset(layer: number, x: number, y: number): number {
    return ((layer * this.height + y) * this.width + x) * 4;
  }

  private clampLayer(layer: number): number {
    return Math.min(Math.max(Math.round(layer), 0), this.layers - 1);
  }

  private checkLayer(layer: number): void {
    if (!Number.isInteger(layer) || layer < 0 || layer >= this.layers) {
      throw new RangeError(`Layer ${layer} is outside 0..${this.layers - 1}`);
    }
  }
}
