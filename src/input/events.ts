import {
  createKeyCode,
  createScreenCoord,
  type KeyCode,
  type ScreenCoord,
} from "../types/brands";

/**
 * Normalized input events. Device adapters (terminal, gamepad, test drivers)
 * turn concrete notifications into these; the engine never sees raw input.
 */
export type EventKind =
  | "KeyDown"
  | "PointerMove"
  | "PointerDown"
  | "PointerUp"
  | "DeviceButtonDown"
  | "Quit";

export type Point = Readonly<{ x: ScreenCoord; y: ScreenCoord }>;

export type KeyDownEvent = Readonly<{
  kind: "KeyDown";
  keyCode: KeyCode;
  /** Single printable character, when the key produced text. */
  character: string | undefined;
  isAlpha: boolean;
  isDigit: boolean;
}>;

export type DeviceButtonDownEvent = Readonly<{
  kind: "DeviceButtonDown";
  keyCode: KeyCode;
  /** Which joystick / gamepad the button belongs to. */
  device: number;
}>;

export type PointerEvent = Readonly<{
  kind: "PointerDown" | "PointerMove" | "PointerUp";
  position: Point;
}>;

export type QuitEvent = Readonly<{ kind: "Quit" }>;

export type InputEvent =
  | KeyDownEvent
  | DeviceButtonDownEvent
  | PointerEvent
  | QuitEvent;

/** Event kinds that can be routed to a mapper. */
export type RoutableKind = Exclude<EventKind, "Quit" | "PointerUp">;

export const ROUTABLE_KINDS: ReadonlyArray<RoutableKind> = [
  "KeyDown",
  "PointerDown",
  "PointerMove",
  "DeviceButtonDown",
];

export function isRoutableKind(s: unknown): s is RoutableKind {
  return (
    typeof s === "string" &&
    (ROUTABLE_KINDS as ReadonlyArray<string>).includes(s)
  );
}

// Letters and digits in any script, like a text widget would classify them
const ALPHA = /^\p{L}$/u;
const DIGIT = /^\p{Nd}$/u;

export function isAlphaChar(ch: string): boolean {
  return ALPHA.test(ch);
}

export function isDigitChar(ch: string): boolean {
  return DIGIT.test(ch);
}

/** A single code point that is not a control character. */
export function isPrintableChar(ch: string): boolean {
  return [...ch].length === 1 && !/^\p{C}$/u.test(ch);
}

export function keyDown(keyCode: number, character?: string): KeyDownEvent {
  const text =
    character !== undefined && isPrintableChar(character)
      ? character
      : undefined;
  return {
    character: text,
    isAlpha: text !== undefined && isAlphaChar(text),
    isDigit: text !== undefined && isDigitChar(text),
    keyCode: createKeyCode(keyCode),
    kind: "KeyDown",
  };
}

export function deviceButtonDown(
  button: number,
  device = 0,
): DeviceButtonDownEvent {
  return { device, keyCode: createKeyCode(button), kind: "DeviceButtonDown" };
}

export function pointer(
  kind: PointerEvent["kind"],
  x: number,
  y: number,
): PointerEvent {
  return {
    kind,
    position: { x: createScreenCoord(x), y: createScreenCoord(y) },
  };
}

export function quit(): QuitEvent {
  return { kind: "Quit" };
}

export function isPointerEvent(e: InputEvent): e is PointerEvent {
  return (
    e.kind === "PointerDown" ||
    e.kind === "PointerMove" ||
    e.kind === "PointerUp"
  );
}

export function keyCodeOf(e: InputEvent): KeyCode | undefined {
  return e.kind === "KeyDown" || e.kind === "DeviceButtonDown"
    ? e.keyCode
    : undefined;
}

export function characterOf(e: InputEvent): string | undefined {
  return e.kind === "KeyDown" ? e.character : undefined;
}
