import { PolicyError } from "../errors";
import { isPointerEvent, type InputEvent } from "../input/events";
import { hsvToRgb } from "../ui/utils/colors";

import type { CircleResponse, PolicyArgs, ResponsePolicy } from "./types";

export const CIRCLE_RADIUS = 30;

// One full trip round the colour wheel every 18 seconds
const MS_PER_HUE_DEGREE = 50;

export type Clock = () => number;

export function hueAt(ms: number): number {
  return (ms / MS_PER_HUE_DEGREE) % 360;
}

/** Filled circle under the pointer, tinted by elapsed time. */
export class CircleMarkPolicy implements ResponsePolicy<CircleResponse> {
  readonly kind = "circle" as const;
  private readonly startedAt: number;

  constructor(private readonly clock: Clock = () => performance.now()) {
    this.startedAt = clock();
  }

  validate(_args?: PolicyArgs): void {
    // Stateless apart from the clock
  }

  select(event: InputEvent, _args?: PolicyArgs): CircleResponse {
    if (!isPointerEvent(event)) {
      throw new PolicyError(
        this.kind,
        `${event.kind} event carries no pointer position`,
      );
    }
    return {
      center: event.position,
      color: hsvToRgb(hueAt(this.clock() - this.startedAt)),
      kind: "circle",
      radius: CIRCLE_RADIUS,
    };
  }
}
