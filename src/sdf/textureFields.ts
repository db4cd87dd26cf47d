/**
 * Distance fields read from texture atlases
 */

import type { GlyphAtlas } from "../atlas/GlyphAtlas";
import type { TextureAtlas } from "../atlas/TextureAtlas";
import { MSDF_EDGE, TEXTURE_SDF_RANGE } from "../constants";
import { median3, smoothstep } from "../math/scalar";
import type { Vec2 } from "../math/vec2";
import { luminance } from "../types/color";

/**
 * Signed distance from rasterized art: luminance above 0.5 is inside.
 * The box [min, max] is stretched over the whole atlas layer; without an atlas
 * every sample reads as black, i.e. outside.
 */
export function sdTexture(
  p: Readonly<Vec2>,
  min: Readonly<Vec2>,
  max: Readonly<Vec2>,
  layer: number,
  atlas: TextureAtlas | undefined,
  scaleFactor: number
): number {
  let lum = 0;
  if (atlas) {
    const u = (p[0] - min[0]) / (max[0] - min[0]);
    const v = (p[1] - min[1]) / (max[1] - min[1]);
    const [r, g, b] = atlas.sample(layer, u, v);
    lum = luminance(r, g, b);
  }
  return (0.5 - lum) * scaleFactor * TEXTURE_SDF_RANGE;
}

/**
 * Inside/outside signal of an MSDF glyph drawn in the square
 * [position, position + fontSize]: -1 well inside, 1 outside, 0 on the edge.
 * This is not a Euclidean distance.
 */
export function sdGlyph(
  p: Readonly<Vec2>,
  position: Readonly<Vec2>,
  fontSize: number,
  glyphId: number,
  glyphs: GlyphAtlas | undefined
): number {
  const u = (p[0] - position[0]) / fontSize;
  const v = (p[1] - position[1]) / fontSize;
  if (!glyphs || !(u >= 0 && u <= 1 && v >= 0 && v <= 1)) {
    return 1;
  }
  const [r, g, b] = glyphs.sample(glyphId, u, v);
  const coverage = smoothstep(0.5 - MSDF_EDGE, 0.5 + MSDF_EDGE, median3(r, g, b));
  return 1 - 2 * coverage;
}
