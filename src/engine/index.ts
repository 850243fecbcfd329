export {
  CommandDetector,
  COMMAND_PRIORITY,
  MAX_SEQUENCE_LENGTH,
  type CommandWord,
} from "./commands";
export { ResponseEngine, type EngineSetup } from "./engine";
export { placeGlyph, placeImage, type Position, type Size } from "./placement";
export {
  createSoundMachine,
  SoundStateService,
  type SoundEvent,
  type SoundState,
} from "./sound-state.machine";
export * from "./types";
