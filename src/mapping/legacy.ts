import { BUILT_IN_SOURCE, type EventMapper } from "./types";

import type { InputEvent } from "../input/events";
import type { Channel, PolicyCall } from "../policy/types";

export type LegacyOptions = Readonly<{ deterministicSounds: boolean }>;

const RANDOM: PolicyCall = { args: undefined, policy: "random" };
const DETERMINISTIC: PolicyCall = { args: undefined, policy: "deterministic" };
const FONT: PolicyCall = { args: undefined, policy: "font" };
const CIRCLE: PolicyCall = { args: undefined, policy: "circle" };

/**
 * Fixed rules used when no extension is active:
 * - sound: random, or keyed by key code for key presses in deterministic mode
 * - image: the typed letter or digit, a mark under the pointer, otherwise a
 *   random picture
 */
export class LegacyMapper implements EventMapper {
  readonly source = BUILT_IN_SOURCE;

  constructor(
    readonly channel: Channel,
    private readonly options: LegacyOptions = { deterministicSounds: false },
  ) {}

  map(event: InputEvent): PolicyCall {
    return this.channel === "sound"
      ? this.mapSound(event)
      : this.mapImage(event);
  }

  private mapSound(event: InputEvent): PolicyCall {
    if (this.options.deterministicSounds && event.kind === "KeyDown") {
      return DETERMINISTIC;
    }
    return RANDOM;
  }

  private mapImage(event: InputEvent): PolicyCall {
    switch (event.kind) {
      case "KeyDown":
        return event.isAlpha || event.isDigit ? FONT : RANDOM;
      case "PointerDown":
      case "PointerMove":
        return CIRCLE;
      default:
        return RANDOM;
    }
  }

  routes(): ReadonlyArray<PolicyCall> {
    if (this.channel === "image") return [FONT, CIRCLE, RANDOM];
    return this.options.deterministicSounds
      ? [DETERMINISTIC, RANDOM]
      : [RANDOM];
  }
}
