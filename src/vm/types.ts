import type { GlyphAtlas } from "../atlas/GlyphAtlas";
import type { TextureAtlas } from "../atlas/TextureAtlas";

/** Read-only texture inputs of a frame; missing atlases sample as black */
export interface Atlases {
  texture?: TextureAtlas;
  glyphs?: GlyphAtlas;
}
