import { describe, expect, it } from "@jest/globals";

import { ConfigurationError } from "@/errors";
import { keyDown, pointer } from "@/input/events";
import {
  createImageRegistry,
  createSoundRegistry,
  resolvePolicyName,
} from "@/policy/registry";
import { isPolicyKind } from "@/policy/types";

import {
  IMAGE_NAMES,
  namedSet,
  ScriptedRandom,
  SOUND_NAMES,
} from "../test-helpers";

describe("resolvePolicyName", () => {
  it("accepts the known names", () => {
    expect(resolvePolicyName("named_file")).toBe("named_file");
    expect(isPolicyKind("circle")).toBe(true);
    expect(isPolicyKind("Circle")).toBe(false);
    expect(isPolicyKind(3)).toBe(false);
  });

  it("rejects anything else with its location", () => {
    expect(() =>
      resolvePolicyName("sparkle", { file: "f.yaml", key: "image[0].policy" }),
    ).toThrow(
      'f.yaml: key "image[0].policy": unknown policy "sparkle" (expected one of random, deterministic, named_file, font, circle)',
    );
    expect(() => resolvePolicyName(undefined)).toThrow(ConfigurationError);
  });
});

describe("PolicyRegistry", () => {
  const rng = new ScriptedRandom([0.5]);
  const sounds = createSoundRegistry(namedSet(SOUND_NAMES), rng);
  const images = createImageRegistry(namedSet(IMAGE_NAMES), rng, {
    clock: () => 0,
    uppercase: false,
  });

  it("offers resource policies for sound and everything for images", () => {
    expect(sounds.kinds()).toEqual(["random", "deterministic", "named_file"]);
    expect(images.kinds()).toEqual([
      "random",
      "deterministic",
      "named_file",
      "font",
      "circle",
    ]);
  });

  it("rejects policies the channel does not have", () => {
    expect(() => sounds.get("circle")).toThrow(
      'policy "circle" is not available for sound',
    );
  });

  it("validates every route", () => {
    expect(() =>
      sounds.validateRoutes([
        { args: undefined, policy: "random" },
        { args: ["a.wav"], policy: "named_file" },
      ]),
    ).not.toThrow();
    expect(() =>
      sounds.validateRoutes([{ args: ["nope.wav"], policy: "named_file" }]),
    ).toThrow('file "nope.wav" is not among the loaded resources');
  });

  it("dispatches to the chosen policy", () => {
    expect(
      sounds.dispatch(keyDown(1), { args: ["c.wav"], policy: "named_file" }),
    ).toEqual({ handle: "c.wav", kind: "resource", name: "c.wav" });
    expect(
      images.dispatch(pointer("PointerDown", 2, 3), {
        args: undefined,
        policy: "circle",
      }).kind,
    ).toBe("circle");
  });
});
