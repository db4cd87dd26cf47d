import { OUTPUT_GAMMA } from "../constants";
import type { BlendMode } from "../program/types";
import type { Color } from "../types/color";

function componentwise(
  dst: Readonly<Color>,
  src: Readonly<Color>,
  fn: (d: number, s: number) => number
): Color {
  return [fn(dst[0], src[0]), fn(dst[1], src[1]), fn(dst[2], src[2]), fn(dst[3], src[3])];
}

/**
 * Composite `src` onto the accumulated colour `dst`.
 * Every mode except alphaUnder treats all four channels alike.
 */
export function blend(mode: BlendMode, dst: Readonly<Color>, src: Readonly<Color>): Color {
  switch (mode) {
    case "replace":
      return [src[0], src[1], src[2], src[3]];
    case "add":
      return componentwise(dst, src, (d, s) => d + s);
    case "multiply":
      return componentwise(dst, src, (d, s) => d * s);
    case "subtract":
      return componentwise(dst, src, (d, s) => d - s);
    case "divide":
      return componentwise(dst, src, (d, s) => s / d);
    case "min":
      return componentwise(dst, src, Math.min);
    case "max":
      return componentwise(dst, src, Math.max);
    case "alphaUnder":
      return alphaUnder(dst, src);
    default: {
      const exhaustive: never = mode;
      return exhaustive;
    }
  }
}

function alphaUnder(dst: Readonly<Color>, src: Readonly<Color>): Color {
  const sa = src[3];
  const dw = dst[3] * (1 - sa);
  const a = sa + dw;
  if (a === 0) return [0, 0, 0, 0];
  return [
    (src[0] * sa + dst[0] * dw) / a,
    (src[1] * sa + dst[1] * dw) / a,
    (src[2] * sa + dst[2] * dw) / a,
    a,
  ];
}

/** Output transfer: RGB raised to OUTPUT_GAMMA, alpha unchanged */
export function gammaEncode(color: Readonly<Color>): Color {
  return [
    Math.pow(color[0], OUTPUT_GAMMA),
    Math.pow(color[1], OUTPUT_GAMMA),
    Math.pow(color[2], OUTPUT_GAMMA),
    color[3],
  ];
}
