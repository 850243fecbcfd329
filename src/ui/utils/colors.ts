/**
 * Colour helpers shared by the policies and the terminal presenter
 */

import type { Rgb } from "../../policy/types";

/** Glyph tints: blue, red, yellow, pink, navy, green, orange, magenta, cyan. */
export const GLYPH_PALETTE: ReadonlyArray<Rgb> = [
  [0, 0, 255],
  [255, 0, 0],
  [255, 255, 0],
  [255, 0, 128],
  [0, 0, 128],
  [0, 255, 0],
  [255, 128, 0],
  [255, 0, 255],
  [0, 255, 255],
];

/**
 * Converts HSV to RGB
 * @param hue - Degrees, any value (wrapped into [0, 360))
 * @param saturation - 0-1
 * @param value - 0-1
 */
export function hsvToRgb(hue: number, saturation = 1, value = 1): Rgb {
  const h = ((hue % 360) + 360) % 360;
  const c = value * saturation;
  const x = c * (1 - Math.abs(((h / 60) % 2) - 1));
  const m = value - c;
  let rgb: [number, number, number];
  if (h < 60) rgb = [c, x, 0];
  else if (h < 120) rgb = [x, c, 0];
  else if (h < 180) rgb = [0, c, x];
  else if (h < 240) rgb = [0, x, c];
  else if (h < 300) rgb = [x, 0, c];
  else rgb = [c, 0, x];
  const to255 = (n: number): number => Math.round((n + m) * 255);
  return [to255(rgb[0]), to255(rgb[1]), to255(rgb[2])];
}

/** 24-bit ANSI foreground escape. */
export function ansiForeground([r, g, b]: Rgb): string {
  return `\x1b[38;2;${String(r)};${String(g)};${String(b)}m`;
}

export const ANSI_RESET = "\x1b[0m";
