import { placeGlyph, placeImage, type Size } from "../engine/placement";
import { ANSI_RESET, ansiForeground } from "../ui/utils/colors";

import type { RandomSource } from "../core/rng";
import type { EngineAction } from "../engine/types";
import type { TerminalOutputStream } from "../input/terminal";
import type { ImageResponse } from "../policy/types";

const ESC = "\x1b";
const CLEAR_SCREEN = `${ESC}[2J${ESC}[H`;
const HIDE_CURSOR = `${ESC}[?25l`;
const SHOW_CURSOR = `${ESC}[?25h`;
const BELL = "\x07";
const DARK_BACKGROUND = `${ESC}[40m`;
const LIGHT_BACKGROUND = `${ESC}[107m`;
const CIRCLE_MARK = "●";

export const WELCOME_CAPTION = "Commands: quit, mute, unmute";

export type PresenterOptions = Readonly<{ dark: boolean; bell: boolean }>;

/** Cursor position escape; positions are 0-based cells. */
export function moveTo(x: number, y: number): string {
  return `${ESC}[${String(Math.round(y) + 1)};${String(Math.round(x) + 1)}H`;
}

/**
 * Renders engine actions as coloured text. Placement draws from the session
 * generator so that a seeded run lays out the same way every time.
 */
export class TerminalPresenter {
  constructor(
    private readonly out: TerminalOutputStream,
    private readonly rng: RandomSource,
    private readonly options: PresenterOptions,
  ) {}

  private get canvas(): Size {
    return { height: this.out.rows ?? 24, width: this.out.columns ?? 80 };
  }

  private background(): string {
    return this.options.dark ? DARK_BACKGROUND : LIGHT_BACKGROUND;
  }

  clear(): void {
    this.out.write(`${this.background()}${CLEAR_SCREEN}`);
  }

  welcome(): void {
    this.out.write(HIDE_CURSOR);
    this.clear();
    this.out.write(`${moveTo(2, 0)}${WELCOME_CAPTION}`);
  }

  restore(): void {
    this.out.write(`${ANSI_RESET}${CLEAR_SCREEN}${SHOW_CURSOR}`);
  }

  present<S, I>(action: EngineAction<S, I>): void {
    switch (action.type) {
      case "ClearCanvas":
        this.clear();
        return;
      case "PlaySound":
        if (this.options.bell) this.out.write(BELL);
        return;
      case "ShowImage":
        this.out.write(this.renderImage(action.image));
        return;
      case "SilenceSounds":
      case "Terminate":
        return;
    }
  }

  private renderImage<I>(image: ImageResponse<I>): string {
    const { width, height } = this.canvas;
    switch (image.kind) {
      case "glyph": {
        const at = placeGlyph(
          this.rng,
          { height: height - 1, width: width - 1 },
          { height: 1, width: 1 },
        );
        return `${moveTo(at.x, at.y)}${ansiForeground(image.color)}${image.text}${ANSI_RESET}`;
      }
      case "circle":
        return `${moveTo(image.center.x, image.center.y)}${ansiForeground(image.color)}${CIRCLE_MARK}${ANSI_RESET}`;
      case "resource": {
        const label = `[${image.name}]`;
        const at = placeImage(this.rng, this.canvas, {
          height: 1,
          width: label.length,
        });
        return `${moveTo(at.x, at.y)}${label}`;
      }
    }
  }
}
