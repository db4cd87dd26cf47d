/**
 * RGBA color in straight (non-premultiplied) form, each channel 0-1.
 */
export type Color = [number, number, number, number];

export const TRANSPARENT: Readonly<Color> = [0, 0, 0, 0];

/** Copy a color so callers can mutate the result freely */
export function cloneColor(color: Readonly<Color>): Color {
  return [color[0], color[1], color[2], color[3]];
}

/** Componentwise linear interpolation between two colors */
export function mixColor(a: Readonly<Color>, b: Readonly<Color>, t: number): Color {
  return [
    a[0] + (b[0] - a[0]) * t,
    a[1] + (b[1] - a[1]) * t,
    a[2] + (b[2] - a[2]) * t,
    a[3] + (b[3] - a[3]) * t,
  ];
}

/** Rec. 709 relative luminance of the RGB channels */
export function luminance(r: number, g: number, b: number): number {
  return 0.2126 * r + 0.7152 * g + 0.0722 * b;
}
