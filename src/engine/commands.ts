import { isAlphaChar } from "../input/events";
import { debugLog } from "../utils/debug";

export type CommandWord = "quit" | "mute" | "unmute";

// "unmute" contains "mute", so it must be checked first
export const COMMAND_PRIORITY: ReadonlyArray<CommandWord> = [
  "quit",
  "unmute",
  "mute",
];

/**
 * Longest suffix worth keeping. The buffer is searched after every append and
 * cleared on a match, so a new match can only end at the newest character.
 */
export const MAX_SEQUENCE_LENGTH = Math.max(
  ...COMMAND_PRIORITY.map((w) => w.length),
);

/**
 * Spots command words typed through the normal keyboard stream, with no
 * dedicated command mode and no time limit between keystrokes.
 */
export class CommandDetector {
  private sequence = "";

  get buffer(): string {
    return this.sequence;
  }

  /** Feed one typed character; returns the command it completes, if any. */
  observe(character: string): CommandWord | undefined {
    if (!isAlphaChar(character)) return undefined;
    this.sequence = (this.sequence + character.toLowerCase()).slice(
      -MAX_SEQUENCE_LENGTH,
    );
    for (const word of COMMAND_PRIORITY) {
      if (this.sequence.includes(word)) {
        debugLog("commands", `recognized "${word}"`);
        this.sequence = "";
        return word;
      }
    }
    return undefined;
  }

  reset(): void {
    this.sequence = "";
  }
}
