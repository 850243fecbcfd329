/*
 * Session sound state as a robot3 machine.
 *
 * armed  --MUTE-->   muted
 * muted  --UNMUTE--> armed
 * any    --QUIT-->   terminated (no transitions out)
 *
 * Events without a transition from the current state are ignored, so muting
 * twice or quitting twice is harmless.
 */

import {
  createMachine,
  interpret,
  reduce,
  state,
  transition,
} from "robot3";

import type { CommandWord } from "./commands";
import type {
  Machine,
  MachineState,
  MachineStates,
  Service,
  Transition,
} from "robot3";

export type SoundState = "armed" | "muted" | "terminated";

export type SoundEvent =
  | { type: "MUTE" }
  | { type: "UNMUTE" }
  | { type: "QUIT" };

export type SoundContext = {
  lastCommand: CommandWord | undefined;
  transitions: number;
};

type SoundEventType = SoundEvent["type"];
type SoundStatesObject = Record<SoundState, MachineState<SoundEventType>>;
export type SoundMachine = Machine<
  SoundStatesObject,
  SoundContext,
  SoundState,
  SoundEventType
>;

const COMMAND_FOR_EVENT: Record<SoundEventType, CommandWord> = {
  MUTE: "mute",
  QUIT: "quit",
  UNMUTE: "unmute",
};

export const recordCommand = (
  ctx: SoundContext,
  event: SoundEvent,
): SoundContext => ({
  ...ctx,
  lastCommand: COMMAND_FOR_EVENT[event.type],
  transitions: ctx.transitions + 1,
});

// robot3 infers a state's event type from its first transition unless told
type SoundTransition = Transition<SoundEventType>;

const armedState = (): MachineState<SoundEventType> =>
  state<SoundTransition>(
    transition("MUTE", "muted", reduce(recordCommand)),
    transition("QUIT", "terminated", reduce(recordCommand)),
  );

const mutedState = (): MachineState<SoundEventType> =>
  state<SoundTransition>(
    transition("UNMUTE", "armed", reduce(recordCommand)),
    transition("QUIT", "terminated", reduce(recordCommand)),
  );

const terminatedState = (): MachineState<SoundEventType> =>
  state<SoundTransition>();

export const createSoundMachine = (initial: SoundState): SoundMachine => {
  const states = {
    armed: armedState(),
    muted: mutedState(),
    terminated: terminatedState(),
  } as const;

  // robot3 widens the event type to `string`; keep our narrower typing at the
  // boundary of this module.
  return createMachine(
    initial,
    states as unknown as MachineStates<SoundStatesObject, SoundEventType>,
    (): SoundContext => ({ lastCommand: undefined, transitions: 0 }),
  ) as unknown as SoundMachine;
};

/** Thin wrapper holding the interpreted machine and its current state name. */
export class SoundStateService {
  private readonly service: Service<SoundMachine>;
  private current: SoundState;

  constructor(initial: "armed" | "muted") {
    this.current = initial;
    this.service = interpret(createSoundMachine(initial), (service) => {
      this.current = service.machine.state.name;
    });
  }

  send(event: SoundEvent): SoundState {
    this.service.send(event);
    return this.current;
  }

  get state(): SoundState {
    return this.current;
  }

  get context(): Readonly<SoundContext> {
    return { ...this.service.context };
  }
}
