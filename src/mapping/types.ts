import type { InputEvent } from "../input/events";
import type { PolicyCall } from "../policy/types";

/** Decides which policy answers an event on one channel. */
export type EventMapper = {
  /** Where the rules came from, for error messages ("built-in" or a file). */
  readonly source: string;
  map(event: InputEvent): PolicyCall;
  /** Every call `map` can return, for validation at engine construction. */
  routes(): ReadonlyArray<PolicyCall>;
};

export const BUILT_IN_SOURCE = "built-in";
