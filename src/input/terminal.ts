/**
 * Raw-mode terminal adapter: decodes keypress bytes and SGR (1006) mouse
 * reports into InputEvents.
 *
 * Special keys get SDL-style key codes (arrows 273-276 and so on) so that
 * deterministic sounds stay stable across hosts.
 */

import { debugLog } from "../utils/debug";

import { keyDown, pointer, quit, type InputEvent } from "./events";

const ESC = "\x1b";
const CTRL_C = 3;
const ENTER = 13;

// Terminal mouse tracking: button events, drag events, SGR coordinates
export const MOUSE_TRACKING_ON = `${ESC}[?1000h${ESC}[?1002h${ESC}[?1006h`;
export const MOUSE_TRACKING_OFF = `${ESC}[?1006l${ESC}[?1002l${ESC}[?1000l`;

// eslint-disable-next-line no-control-regex
const SGR_MOUSE = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])/;
// eslint-disable-next-line no-control-regex
const CSI = /^\x1b\[([\d;]*)([A-Za-z~])/;
// eslint-disable-next-line no-control-regex
const SS3 = /^\x1bO([A-Za-z])/;
// A CSI or SGR mouse sequence still missing its final byte
// eslint-disable-next-line no-control-regex
const UNFINISHED_CSI = /\x1b\[<?[\d;]*$/;

const CSI_FINAL_CODES: Readonly<Record<string, number>> = {
  A: 273, // up
  B: 274, // down
  C: 275, // right
  D: 276, // left
  F: 279, // end
  H: 278, // home
};

const CSI_TILDE_CODES: Readonly<Record<string, number>> = {
  "2": 277, // insert
  "3": 127, // delete
  "5": 280, // page up
  "6": 281, // page down
};

const SS3_CODES: Readonly<Record<string, number>> = {
  ...CSI_FINAL_CODES,
  P: 282, // F1
  Q: 283,
  R: 284,
  S: 285,
};

function csiKeyCode(params: string, final: string): number {
  if (final === "~") {
    const [first] = params.split(";");
    return CSI_TILDE_CODES[first ?? ""] ?? ESC.charCodeAt(0);
  }
  return CSI_FINAL_CODES[final] ?? ESC.charCodeAt(0);
}

// Button code bits: 0-1 button, 32 motion, 64 wheel
function mouseEvent(
  code: number,
  col: number,
  row: number,
  final: string,
): InputEvent | undefined {
  if ((code & 64) !== 0) return undefined;
  const x = Math.max(0, col - 1);
  const y = Math.max(0, row - 1);
  if (final === "m") return pointer("PointerUp", x, y);
  if ((code & 32) !== 0) return pointer("PointerMove", x, y);
  return pointer("PointerDown", x, y);
}

function charEvent(ch: string): InputEvent {
  const code = ch.codePointAt(0) ?? 0;
  if (code === CTRL_C) return quit();
  if (code === ENTER || code === 10) return keyDown(ENTER);
  return keyDown(code, ch);
}

/** Decode one chunk of terminal input (a chunk may hold several keys). */
export function decodeTerminalInput(chunk: string): ReadonlyArray<InputEvent> {
  const events: Array<InputEvent> = [];
  let rest = chunk;

  while (rest.length > 0) {
    const mouse = SGR_MOUSE.exec(rest);
    if (mouse !== null) {
      const [all, code = "0", col = "1", row = "1", final = "M"] = mouse;
      const ev = mouseEvent(Number(code), Number(col), Number(row), final);
      if (ev !== undefined) events.push(ev);
      rest = rest.slice(all.length);
      continue;
    }
    const csi = CSI.exec(rest);
    if (csi !== null) {
      const [all, params = "", final = ""] = csi;
      events.push(keyDown(csiKeyCode(params, final)));
      rest = rest.slice(all.length);
      continue;
    }
    const ss3 = SS3.exec(rest);
    if (ss3 !== null) {
      const [all, final = ""] = ss3;
      events.push(keyDown(SS3_CODES[final] ?? ESC.charCodeAt(0)));
      rest = rest.slice(all.length);
      continue;
    }
    // Keep surrogate pairs together
    const cp = String.fromCodePoint(rest.codePointAt(0) ?? 0);
    events.push(charEvent(cp));
    rest = rest.slice(cp.length);
  }

  return events;
}

/**
 * Split off an escape sequence cut short at the end of a chunk; the terminal
 * sends its remainder with the next one. A lone ESC is a key of its own and
 * is never held back.
 */
export function splitUnfinishedSequence(
  chunk: string,
): Readonly<{ complete: string; pending: string }> {
  const match = UNFINISHED_CSI.exec(chunk);
  if (match === null) return { complete: chunk, pending: "" };
  return {
    complete: chunk.slice(0, match.index),
    pending: chunk.slice(match.index),
  };
}

export type TerminalInputStream = {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  on(event: "data", listener: (chunk: string) => void): unknown;
  off(event: "data", listener: (chunk: string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
};

export type TerminalOutputStream = {
  write(data: string): boolean;
  columns?: number;
  rows?: number;
};

export type TerminalDriver = {
  /** Begin listening (impure): raw mode, mouse tracking, data listener. */
  start: (onEvent: (event: InputEvent) => void) => void;
  /** Restore the terminal and stop listening. */
  stop: () => void;
};

export function createTerminalDriver(
  input: TerminalInputStream,
  output: TerminalOutputStream,
  options: { mouse: boolean } = { mouse: true },
): TerminalDriver {
  let listener: ((chunk: string) => void) | undefined;
  let pending = "";

  return {
    start: (onEvent): void => {
      if (listener !== undefined) return;
      if (input.isTTY === true) input.setRawMode?.(true);
      input.setEncoding("utf8");
      if (options.mouse) output.write(MOUSE_TRACKING_ON);
      listener = (chunk: string): void => {
        const split = splitUnfinishedSequence(pending + chunk);
        pending = split.pending;
        const events = decodeTerminalInput(split.complete);
        debugLog("input", `decoded ${String(events.length)} events`, events);
        events.forEach(onEvent);
      };
      input.on("data", listener);
      input.resume();
    },
    stop: (): void => {
      if (listener === undefined) return;
      input.off("data", listener);
      listener = undefined;
      pending = "";
      if (options.mouse) output.write(MOUSE_TRACKING_OFF);
      if (input.isTTY === true) input.setRawMode?.(false);
      input.pause();
    },
  };
}
