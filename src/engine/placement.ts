import type { RandomSource } from "../core/rng";

export type Size = Readonly<{ width: number; height: number }>;
export type Position = Readonly<{ x: number; y: number }>;

/**
 * Random top-left corner keeping the whole image on screen where it fits.
 * An image larger than the canvas is pinned to the origin on that axis.
 */
export function placeImage(
  rng: RandomSource,
  canvas: Size,
  image: Size,
): Position {
  return {
    x: rng.intBetween(0, canvas.width - image.width),
    y: rng.intBetween(0, canvas.height - image.height),
  };
}

/** Random centre for a glyph so that its box stays on screen. */
export function placeGlyph(
  rng: RandomSource,
  canvas: Size,
  glyph: Size,
): Position {
  const halfW = Math.floor(glyph.width / 2);
  const halfH = Math.floor(glyph.height / 2);
  return {
    x: rng.intBetween(halfW, canvas.width - halfW),
    y: rng.intBetween(halfH, canvas.height - halfH),
  };
}
