import { afterEach, describe, expect, it, jest } from "@jest/globals";

import { debugLog, isDebugEnabled, logInfo, logWarn } from "@/utils/debug";

const saved = process.env["KEYMASH_DEBUG"];

afterEach(() => {
  if (saved === undefined) delete process.env["KEYMASH_DEBUG"];
  else process.env["KEYMASH_DEBUG"] = saved;
});

describe("debug topics", () => {
  it("are off by default", () => {
    delete process.env["KEYMASH_DEBUG"];
    expect(isDebugEnabled("engine")).toBe(false);
    expect(isDebugEnabled()).toBe(false);
  });

  it("can be enabled all at once or one by one", () => {
    process.env["KEYMASH_DEBUG"] = "on";
    expect(isDebugEnabled("rng")).toBe(true);

    process.env["KEYMASH_DEBUG"] = " Engine, mapping ";
    expect(isDebugEnabled("engine")).toBe(true);
    expect(isDebugEnabled("mapping")).toBe(true);
    expect(isDebugEnabled("rng")).toBe(false);
  });

  it("only logs enabled topics", () => {
    const warn = jest
      .spyOn(console, "warn")
      .mockImplementation(() => undefined);
    process.env["KEYMASH_DEBUG"] = "engine";
    debugLog("engine", "mute: armed -> muted");
    debugLog("rng", "seed 1");
    debugLog("engine", "with data", { n: 1 });
    expect(warn.mock.calls).toEqual([
      ["[DBG:engine] mute: armed -> muted"],
      ["[DBG:engine] with data", { n: 1 }],
    ]);
  });
});

describe("operational messages", () => {
  it("are always printed with the app prefix", () => {
    const warn = jest
      .spyOn(console, "warn")
      .mockImplementation(() => undefined);
    const info = jest
      .spyOn(console, "info")
      .mockImplementation(() => undefined);
    delete process.env["KEYMASH_DEBUG"];
    logWarn("Cannot load sound: x.wav", "boom");
    logInfo("Extra data dir: /d");
    expect(warn).toHaveBeenCalledWith(
      "[keymash] Cannot load sound: x.wav",
      "boom",
    );
    expect(info).toHaveBeenCalledWith("[keymash] Extra data dir: /d");
  });
});
