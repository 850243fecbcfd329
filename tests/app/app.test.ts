import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  jest,
} from "@jest/globals";

import {
  createEngine,
  KeymashApp,
  loadFile,
  loadResources,
  type FileHandle,
  type LoadedResources,
} from "@/app";
import { configFromOptions } from "@/app/config";
import { ResponseEngine } from "@/engine/engine";
import { DEFAULT_ENGINE_OPTIONS } from "@/engine/types";
import { ConfigurationError, ResourceBatchError } from "@/errors";
import { keyDown, pointer } from "@/input/events";
import { MOUSE_TRACKING_OFF, MOUSE_TRACKING_ON } from "@/input/terminal";
import { parseEventMap } from "@/mapping/extension";
import { ResourceSet } from "@/resources/resource-set";

import { captureOutput, FakeInput, muteConsole } from "../test-helpers";

import type { EngineOptions } from "@/engine/types";
import type { EventMap } from "@/mapping/extension";

let root: string;
let env: NodeJS.ProcessEnv;

function write(content: string, ...parts: ReadonlyArray<string>): string {
  const path = join(root, ...parts);
  mkdirSync(join(path, ".."), { recursive: true });
  writeFileSync(path, content);
  return path;
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "keymash-app-"));
  env = { XDG_DATA_HOME: join(root, "xdg") };
  muteConsole();
});

afterEach(() => {
  rmSync(root, { force: true, recursive: true });
});

describe("loadFile", () => {
  it("accepts readable, non-empty regular files", () => {
    const path = write("RIFF", "a.wav");
    expect(loadFile(path)).toEqual({ path, size: 4 });
  });

  it("rejects empty files and directories", () => {
    expect(() => loadFile(write("", "empty.wav"))).toThrow("file is empty");
    expect(() => loadFile(root)).toThrow("not a regular file");
  });
});

describe("loadResources", () => {
  it("loads sounds and images from the data directories", () => {
    write("x", "data", "sounds", "a.wav");
    write("x", "data", "images", "b.png");
    write("x", "data", "images", "skip.png");

    const resources = loadResources(
      configFromOptions({ imageBlacklist: ["skip*"] }, {}),
      { bundledDataDir: join(root, "data"), env },
    );
    expect(resources.sounds.names()).toEqual(["a.wav"]);
    expect(resources.images.names()).toEqual(["b.png"]);
    expect(resources.options.soundEnabled).toBe(true);
    expect(resources.extension).toBeUndefined();
  });

  it("disables sound when there are no sounds", () => {
    write("x", "data", "images", "b.png");
    const resources = loadResources(configFromOptions({}, {}), {
      bundledDataDir: join(root, "data"),
      env,
    });
    expect(resources.options.soundEnabled).toBe(false);
    expect(console.warn).toHaveBeenCalledWith(
      "[keymash] No sounds found, sound disabled.",
    );
  });

  it("does not look for sounds with sound off", () => {
    write("x", "data", "sounds", "a.wav");
    write("x", "data", "images", "b.png");
    const loadFn = jest.fn((path: string): FileHandle => ({ path, size: 1 }));
    const resources = loadResources(configFromOptions({ sound: false }, {}), {
      bundledDataDir: join(root, "data"),
      env,
      loadFn,
    });
    expect(resources.sounds.isEmpty).toBe(true);
    expect(loadFn).toHaveBeenCalledTimes(1);
  });

  it("fails when every image is unreadable", () => {
    write("", "data", "images", "broken.png");
    write("x", "data", "sounds", "a.wav");
    expect(() =>
      loadResources(configFromOptions({}, {}), {
        bundledDataDir: join(root, "data"),
        env,
      }),
    ).toThrow(ResourceBatchError);
  });

  it("takes an extension's rules and sounds", () => {
    write("x", "data", "sounds", "general.wav");
    write("x", "data", "images", "b.png");
    write("x", "extensions", "ext", "sounds", "own.wav");
    write(
      "apiVersion: 0\nimage:\n  - policy: random\nsound:\n  - policy: random\n",
      "extensions",
      "ext",
      "event_map.yaml",
    );

    const resources = loadResources(
      configFromOptions({ extension: "ext" }, {}),
      { bundledDataDir: join(root, "data"), env },
    );
    expect(resources.sounds.names()).toEqual(["own.wav"]);
    expect(resources.extension?.file).toBe(
      join(root, "extensions", "ext", "event_map.yaml"),
    );
  });

  it("reports a missing extension", () => {
    write("x", "data", "images", "b.png");
    expect(() =>
      loadResources(configFromOptions({ extension: "nope" }, {}), {
        bundledDataDir: join(root, "data"),
        env,
      }),
    ).toThrow(ConfigurationError);
  });

  it("loads the bundled data and demo extension", () => {
    const plain = loadResources(configFromOptions({}, {}), { env });
    expect(plain.sounds.names()).toEqual(["boop.wav", "ding.wav", "pop.wav"]);
    expect(plain.images.names()).toEqual([
      "square.svg",
      "sun.svg",
      "triangle.svg",
    ]);

    const demo = loadResources(configFromOptions({ extension: "demo" }, {}), {
      env,
    });
    expect(demo.sounds.names()).toEqual(["high.wav", "low.wav"]);
    const engine = createEngine(demo, () => 0);
    expect(engine.state).toBe("armed");
  });
});

function handle(path: string): FileHandle {
  return { path, size: 1 };
}

function fileEngine(
  options: Partial<EngineOptions> = {},
  extension?: EventMap,
): ResponseEngine<FileHandle, FileHandle> {
  return new ResponseEngine<FileHandle, FileHandle>({
    clock: () => 0,
    extension,
    images: ResourceSet.fromLoaded([["/d/b.png", handle("/d/b.png")]]),
    options: { ...DEFAULT_ENGINE_OPTIONS, randomSeed: 1, ...options },
    sounds: ResourceSet.fromLoaded([["/d/a.wav", handle("/d/a.wav")]]),
  });
}

describe("createEngine", () => {
  const resources: LoadedResources = {
    extension: undefined,
    images: ResourceSet.fromLoaded([["/d/b.png", handle("/d/b.png")]]),
    options: { ...DEFAULT_ENGINE_OPTIONS, randomSeed: 7 },
    sounds: ResourceSet.fromLoaded([["/d/a.wav", handle("/d/a.wav")]]),
  };

  it("replays a seeded session identically under a fixed clock", () => {
    const events = [
      keyDown(97, "a"),
      pointer("PointerDown", 3, 4),
      keyDown(50, "2"),
      pointer("PointerMove", 5, 4),
    ];
    const first = createEngine(resources, () => 1000);
    const second = createEngine(resources, () => 1000);
    for (const event of events) {
      expect(first.handle(event)).toEqual(second.handle(event));
    }
  });

  it("tints circle marks by the time elapsed on its clock", () => {
    let now = 0;
    const engine = createEngine(resources, () => now);
    now = 4500;
    expect(engine.handle(pointer("PointerDown", 3, 4))).toEqual([
      {
        image: {
          center: { x: 3, y: 4 },
          color: [128, 255, 0],
          kind: "circle",
          radius: 30,
        },
        type: "ShowImage",
      },
    ]);
  });
});

describe("KeymashApp", () => {
  it("runs a session from welcome to quit", async () => {
    const input = new FakeInput();
    const output = captureOutput();
    const app = new KeymashApp(
      fileEngine(),
      { input, output },
      { dark: false },
    );

    const done = app.run();
    expect(output.chunks).toEqual([
      "\x1b[?25l",
      "\x1b[107m\x1b[2J\x1b[H",
      "\x1b[1;3HCommands: quit, mute, unmute",
      MOUSE_TRACKING_ON,
    ]);

    input.emit("data", "\x1b[<32;5;5M");
    expect(output.chunks).toHaveLength(4);

    input.emit("data", "a");
    expect(output.chunks[4]).toBe("\x1b[107m\x1b[2J\x1b[H");
    expect(output.chunks.slice(5)).toContain("\x07");

    const beforeB = output.chunks.length;
    input.emit("data", "b");
    expect(output.chunks.slice(beforeB)).toContain("\x07");

    input.emit("data", "quit!");
    await expect(done).resolves.toBe(0);
    expect(output.chunks.slice(-2)).toEqual([
      MOUSE_TRACKING_OFF,
      "\x1b[0m\x1b[2J\x1b[H\x1b[?25h",
    ]);
    expect(input.listenerCount("data")).toBe(0);
    expect(input.rawModes).toEqual([true, false]);
  });

  it("ends the session when quit is the very first input", async () => {
    const input = new FakeInput();
    const output = captureOutput();
    const app = new KeymashApp(
      fileEngine(),
      { input, output },
      { dark: false },
    );
    const done = app.run();
    input.emit("data", "q");
    input.emit("data", "u");
    input.emit("data", "i");
    input.emit("data", "t");
    await expect(done).resolves.toBe(0);
    expect(input.listenerCount("data")).toBe(0);
  });

  it("keeps the caption up through pointer moves and releases", async () => {
    const input = new FakeInput();
    const output = captureOutput();
    const app = new KeymashApp(
      fileEngine(),
      { input, output },
      { dark: false },
    );
    const done = app.run();
    input.emit("data", "\x1b[<35;5;5M\x1b[<0;5;5m");
    expect(output.chunks).toHaveLength(4);
    input.emit("data", "\x03");
    await expect(done).resolves.toBe(0);
  });

  it("ends on ctrl-c even during the welcome screen", async () => {
    const input = new FakeInput();
    const app = new KeymashApp(
      fileEngine(),
      { input, output: captureOutput() },
      { dark: true },
    );
    const done = app.run();
    input.emit("data", "\x03");
    await expect(done).resolves.toBe(0);
  });

  it("fails the session when an event cannot be answered", async () => {
    const narrow = parseEventMap(
      {
        apiVersion: 0,
        image: [{ check: [{ type: "KeyDown" }], policy: "font" }],
      },
      "narrow.yaml",
      { soundEnabled: false },
    );
    const input = new FakeInput();
    const app = new KeymashApp(
      fileEngine(
        { activeExtensionName: "narrow", soundEnabled: false },
        narrow,
      ),
      { input, output: captureOutput() },
      { dark: false },
    );
    const done = app.run();
    input.emit("data", "a");
    input.emit("data", "\x1b[<0;3;3M");
    await expect(done).rejects.toThrow(
      'narrow.yaml: key "image": no image rule matches a PointerDown event',
    );
    expect(input.listenerCount("data")).toBe(0);
  });
});
