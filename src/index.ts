/**
 * Vellum - a signed-distance-field vector renderer driven by a per-pixel
 * register machine, with a CPU rasterizer and a WebGL2 backend
 */

export const VERSION = "0.1.0";

export * as mat3 from "./math/mat3";
export * as vec2 from "./math/vec2";
export type { Mat3 } from "./math/mat3";
export type { Vec2 } from "./math/vec2";
export { type Color, TRANSPARENT } from "./types/color";

export * from "./constants";

// Distance fields
export {
  sdCircle,
  sdSegment,
  sdTriangle,
  sdRoundedRect,
  sdHalfPlane,
  sdQuadBezier,
  type CornerRadii,
} from "./sdf/primitives";
export { sdTexture, sdGlyph } from "./sdf/textureFields";

// Atlases
export { TextureAtlas, type TextureAtlasOptions } from "./atlas/TextureAtlas";
export {
  GlyphAtlas,
  DEFAULT_GLYPH_ATLAS_OPTIONS,
  type GlyphAtlasOptions,
  type GlyphCell,
} from "./atlas/GlyphAtlas";

// Programs
export * from "./program/types";
export {
  INSTRUCTION_SIZE,
  UNIFORM_SIZE,
  encodeInstruction,
  decodeInstruction,
  encodeProgram,
  decodeProgram,
  encodeUniforms,
  decodeUniforms,
} from "./program/codec";
export { ProgramBuilder, DEFAULT_SHAPE_OPTIONS, type ShapeOptions } from "./program/ProgramBuilder";
export {
  validateProgram,
  type ProgramIssue,
  type IssueCode,
  type IssueSeverity,
} from "./program/validate";
export {
  parseProgramDocument,
  toProgramDocument,
  ProgramDocumentError,
  type ProgramDocument,
  type DocumentInstruction,
  type DocumentOperation,
} from "./program/document";

// Evaluation
export { combine, RegisterStack } from "./vm/registers";
export { InterpreterState, runPixel, evaluatePixel, step } from "./vm/interpreter";
export type { Atlases } from "./vm/types";
export { antialiasFactor, paintColor } from "./paint/paint";
export { blend, gammaEncode } from "./paint/composite";

// Rendering
export {
  Rasterizer,
  DEFAULT_RASTER_OPTIONS,
  type RasterOptions,
  type Frame,
  type RasterResult,
  type RasterStats,
} from "./render/Rasterizer";
export { GpuInterpreter } from "./gpu/GpuInterpreter";
