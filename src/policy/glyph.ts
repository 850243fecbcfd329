import { PolicyError } from "../errors";
import { characterOf, isPrintableChar, type InputEvent } from "../input/events";
import { GLYPH_PALETTE } from "../ui/utils/colors";

import type { RandomSource } from "../core/rng";
import type { GlyphResponse, PolicyArgs, ResponsePolicy } from "./types";

export const GLYPH_FONT_SIZE = 256;

export type GlyphOptions = Readonly<{ uppercase: boolean }>;

/** Renders the event's character in a random palette colour. */
export class GlyphRenderPolicy implements ResponsePolicy<GlyphResponse> {
  readonly kind = "font" as const;

  constructor(
    private readonly rng: RandomSource,
    private readonly options: GlyphOptions,
  ) {}

  validate(_args?: PolicyArgs): void {
    // Stateless: any setup can render glyphs
  }

  select(event: InputEvent, _args?: PolicyArgs): GlyphResponse {
    const ch = characterOf(event);
    if (ch === undefined || !isPrintableChar(ch)) {
      throw new PolicyError(
        this.kind,
        `${event.kind} event carries no printable character`,
      );
    }
    return {
      color: this.rng.pick(GLYPH_PALETTE),
      fontSize: GLYPH_FONT_SIZE,
      kind: "glyph",
      text: this.options.uppercase ? ch.toUpperCase() : ch,
    };
  }
}
