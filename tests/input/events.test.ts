import { describe, expect, it } from "@jest/globals";

import {
  characterOf,
  deviceButtonDown,
  isAlphaChar,
  isDigitChar,
  isPointerEvent,
  isPrintableChar,
  isRoutableKind,
  keyCodeOf,
  keyDown,
  pointer,
  quit,
} from "@/input/events";

describe("character classes", () => {
  it("recognizes letters and digits in any script", () => {
    expect(isAlphaChar("a")).toBe(true);
    expect(isAlphaChar("Ж")).toBe(true);
    expect(isAlphaChar("1")).toBe(false);
    expect(isDigitChar("7")).toBe(true);
    expect(isDigitChar("٣")).toBe(true);
    expect(isDigitChar("x")).toBe(false);
  });

  it("treats one non-control code point as printable", () => {
    expect(isPrintableChar(" ")).toBe(true);
    expect(isPrintableChar("😀")).toBe(true);
    expect(isPrintableChar("ab")).toBe(false);
    expect(isPrintableChar("\t")).toBe(false);
    expect(isPrintableChar("")).toBe(false);
  });
});

describe("event constructors", () => {
  it("classifies key presses by their character", () => {
    expect(keyDown(97, "a")).toEqual({
      character: "a",
      isAlpha: true,
      isDigit: false,
      keyCode: 97,
      kind: "KeyDown",
    });
    expect(keyDown(53, "5")).toMatchObject({ isAlpha: false, isDigit: true });
  });

  it("drops characters that are not printable", () => {
    expect(keyDown(8, "\b")).toEqual({
      character: undefined,
      isAlpha: false,
      isDigit: false,
      keyCode: 8,
      kind: "KeyDown",
    });
  });

  it("rejects invalid key codes", () => {
    expect(() => keyDown(-1)).toThrow("KeyCode must be a non-negative integer");
    expect(() => deviceButtonDown(1.5)).toThrow();
  });

  it("builds pointer, button and quit events", () => {
    expect(pointer("PointerMove", 3, 4)).toEqual({
      kind: "PointerMove",
      position: { x: 3, y: 4 },
    });
    expect(deviceButtonDown(2, 1)).toEqual({
      device: 1,
      keyCode: 2,
      kind: "DeviceButtonDown",
    });
    expect(quit()).toEqual({ kind: "Quit" });
  });
});

describe("event accessors", () => {
  it("exposes key codes and characters where the event has them", () => {
    expect(keyCodeOf(keyDown(65, "A"))).toBe(65);
    expect(keyCodeOf(deviceButtonDown(4))).toBe(4);
    expect(keyCodeOf(pointer("PointerDown", 0, 0))).toBeUndefined();
    expect(characterOf(keyDown(65, "A"))).toBe("A");
    expect(characterOf(deviceButtonDown(65))).toBeUndefined();
  });

  it("narrows by kind", () => {
    expect(isPointerEvent(pointer("PointerUp", 0, 0))).toBe(true);
    expect(isPointerEvent(quit())).toBe(false);
  });

  it("only routes kinds a rule can name", () => {
    expect(isRoutableKind("DeviceButtonDown")).toBe(true);
    expect(isRoutableKind("PointerUp")).toBe(false);
    expect(isRoutableKind("Quit")).toBe(false);
  });
});
