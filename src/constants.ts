/**
 * Interpreter constants shared by the CPU evaluator and the GPU shader
 */

/** Size of the per-pixel register stack */
export const REGISTER_COUNT = 64;

/** Register inspected by every paint operation */
export const SHAPE_REGISTER = 1;

/** Any target register >= REGISTER_COUNT discards the result; this is the canonical one */
export const DISCARD_REGISTER = 0xffffffff;

/** Screen-space offset of the central-difference gradient samples */
export const GRADIENT_EPSILON = 1e-4;

/** Width of the antialiased edge, in pixels */
export const EDGE_WIDTH = 1;

/** Exponent applied to RGB of the final color */
export const OUTPUT_GAMMA = 2.2;

/** Distance (pixels at scale factor 1) spanned by a luminance step of 1 in an SDF texture */
export const TEXTURE_SDF_RANGE = 16;

/** Half-width of the smoothstep around the 0.5 MSDF threshold */
export const MSDF_EDGE = 0.1;

/** Stroke width meaning "fill, no stroke" */
export const FILL_STROKE = -1;
