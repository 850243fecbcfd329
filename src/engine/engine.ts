import { createRandom, type RandomSource } from "../core/rng";
import { ConfigurationError } from "../errors";
import { LegacyMapper } from "../mapping/legacy";
import {
  createImageRegistry,
  createSoundRegistry,
  type PolicyRegistry,
} from "../policy/registry";
import { debugLog } from "../utils/debug";

import { CommandDetector, type CommandWord } from "./commands";
import { SoundStateService, type SoundState } from "./sound-state.machine";
import {
  CLEAR_CANVAS_RATE,
  MUTE_FADE_MS,
  type EngineAction,
  type EngineOptions,
} from "./types";

import type {
  DeviceButtonDownEvent,
  InputEvent,
  KeyDownEvent,
} from "../input/events";
import type { EventMap } from "../mapping/extension";
import type { EventMapper } from "../mapping/types";
import type { Clock } from "../policy/circle";
import type { ImageResponse, SoundResponse } from "../policy/types";
import type { ResourceSet } from "../resources/resource-set";

export type EngineSetup<S, I> = Readonly<{
  options: EngineOptions;
  sounds: ResourceSet<S>;
  images: ResourceSet<I>;
  /** Rules of the active extension, already loaded by the caller. */
  extension?: EventMap;
  /** Overrides the generator built from `options.randomSeed`. */
  random?: RandomSource;
  clock?: Clock;
}>;

const TERMINATE = [{ type: "Terminate" }] as const;

/**
 * Routes one input event at a time to command detection or to the sound and
 * image policies, and reports what the caller should render or play.
 */
export class ResponseEngine<S, I> {
  readonly random: RandomSource;
  private readonly options: EngineOptions;
  private readonly detector = new CommandDetector();
  private readonly soundState: SoundStateService;
  private readonly soundMapper: EventMapper | undefined;
  private readonly imageMapper: EventMapper;
  private readonly soundPolicies: PolicyRegistry<SoundResponse<S>> | undefined;
  private readonly imagePolicies: PolicyRegistry<ImageResponse<I>>;
  private pointerHeld = false;

  constructor(setup: EngineSetup<S, I>) {
    const { options, extension } = setup;
    this.options = options;
    this.random = setup.random ?? createRandom(options.randomSeed);
    debugLog("rng", `seed ${String(this.random.seed)}`);

    if (options.activeExtensionName !== undefined && extension === undefined) {
      throw new ConfigurationError(
        `extension "${options.activeExtensionName}" has no loaded event map`,
      );
    }

    this.imageMapper = extension?.image ?? new LegacyMapper("image");
    this.imagePolicies = createImageRegistry(setup.images, this.random, {
      clock: setup.clock,
      uppercase: options.uppercaseLetters,
    });
    this.imagePolicies.validateRoutes(this.imageMapper.routes());

    if (options.soundEnabled) {
      this.soundMapper =
        extension !== undefined
          ? extension.sound
          : new LegacyMapper("sound", {
              deterministicSounds: options.deterministicSounds,
            });
      if (this.soundMapper === undefined) {
        throw new ConfigurationError(
          "sound rules are required when sound is enabled",
          { file: extension?.file, key: "sound" },
        );
      }
      this.soundPolicies = createSoundRegistry(setup.sounds, this.random);
      this.soundPolicies.validateRoutes(this.soundMapper.routes());
    }

    this.soundState = new SoundStateService(
      options.startMuted ? "muted" : "armed",
    );
  }

  get state(): SoundState {
    return this.soundState.state;
  }

  get isPointerHeld(): boolean {
    return this.pointerHeld;
  }

  /** Characters typed toward a command word so far. */
  get pendingCommand(): string {
    return this.detector.buffer;
  }

  handle(event: InputEvent): ReadonlyArray<EngineAction<S, I>> {
    if (this.soundState.state === "terminated") return TERMINATE;

    switch (event.kind) {
      case "Quit":
        this.soundState.send({ type: "QUIT" });
        return TERMINATE;
      case "PointerDown":
        this.pointerHeld = true;
        return [this.showImage(event)];
      case "PointerMove":
        return this.pointerHeld ? [this.showImage(event)] : [];
      case "PointerUp":
        this.pointerHeld = false;
        return [];
      case "KeyDown":
      case "DeviceButtonDown":
        return this.respond(event);
    }
  }

  private respond(
    event: KeyDownEvent | DeviceButtonDownEvent,
  ): ReadonlyArray<EngineAction<S, I>> {
    const actions: Array<EngineAction<S, I>> = [];

    if (
      event.kind === "KeyDown" &&
      event.isAlpha &&
      event.character !== undefined
    ) {
      const command = this.detector.observe(event.character);
      if (command !== undefined) {
        if (command === "quit") {
          this.soundState.send({ type: "QUIT" });
          return TERMINATE;
        }
        if (this.applySoundCommand(command)) {
          actions.push({ fadeMs: MUTE_FADE_MS, type: "SilenceSounds" });
        }
      }
    }

    if (this.random.next() < CLEAR_CANVAS_RATE) {
      actions.push({ type: "ClearCanvas" });
    }

    if (
      this.soundMapper !== undefined &&
      this.soundPolicies !== undefined &&
      this.soundState.state === "armed"
    ) {
      const call = this.soundMapper.map(event);
      actions.push({
        sound: this.soundPolicies.dispatch(event, call),
        type: "PlaySound",
      });
    }

    actions.push(this.showImage(event));
    return actions;
  }

  /** Returns true when the session just became muted. */
  private applySoundCommand(command: Exclude<CommandWord, "quit">): boolean {
    if (!this.options.soundEnabled) return false;
    const before = this.soundState.state;
    const after = this.soundState.send({
      type: command === "mute" ? "MUTE" : "UNMUTE",
    });
    debugLog("engine", `${command}: ${before} -> ${after}`);
    return before === "armed" && after === "muted";
  }

  private showImage(event: InputEvent): EngineAction<S, I> {
    const call = this.imageMapper.map(event);
    return {
      image: this.imagePolicies.dispatch(event, call),
      type: "ShowImage",
    };
  }
}
