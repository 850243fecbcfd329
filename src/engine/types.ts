import type { ImageResponse, SoundResponse } from "../policy/types";

/** Startup switches, sourced from the command line by the host. */
export type EngineOptions = Readonly<{
  uppercaseLetters: boolean;
  deterministicSounds: boolean;
  startMuted: boolean;
  soundEnabled: boolean;
  randomSeed?: number;
  activeExtensionName?: string;
}>;

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  deterministicSounds: false,
  soundEnabled: true,
  startMuted: false,
  uppercaseLetters: false,
};

/** Chance that a key press first wipes the canvas. */
export const CLEAR_CANVAS_RATE = 0.1;

/** Fade applied to playing sounds when the session is muted. */
export const MUTE_FADE_MS = 1000;

export type ClearCanvasAction = Readonly<{ type: "ClearCanvas" }>;
export type SilenceSoundsAction = Readonly<{
  type: "SilenceSounds";
  fadeMs: number;
}>;
export type PlaySoundAction<S> = Readonly<{
  type: "PlaySound";
  sound: SoundResponse<S>;
}>;
export type ShowImageAction<I> = Readonly<{
  type: "ShowImage";
  image: ImageResponse<I>;
}>;
export type TerminateAction = Readonly<{ type: "Terminate" }>;

/**
 * What the caller should do, in order. An empty list means nothing to do.
 */
export type EngineAction<S, I> =
  | ClearCanvasAction
  | SilenceSoundsAction
  | PlaySoundAction<S>
  | ShowImageAction<I>
  | TerminateAction;
