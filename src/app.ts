import { closeSync, openSync, statSync } from "node:fs";

import { ResponseEngine, type EngineOptions } from "./engine";
import {
  createTerminalDriver,
  type TerminalDriver,
  type TerminalInputStream,
  type TerminalOutputStream,
} from "./input/terminal";
import { loadEventMap, type EventMap } from "./mapping/extension";
import { TerminalPresenter } from "./presentation/terminal";
import {
  extensionRoots,
  findExtension,
  findFiles,
  IMAGE_PATTERNS,
  resolveDataDirs,
  SOUND_PATTERNS,
} from "./resources/discovery";
import { loadItems, type LoadFn } from "./resources/loader";
import { ResourceSet } from "./resources/resource-set";
import { logWarn } from "./utils/debug";

import type { AppConfig } from "./app/config";
import type { InputEvent } from "./input/events";
import type { Clock } from "./policy";

/** What the terminal host keeps for a sound or image file. */
export type FileHandle = Readonly<{ path: string; size: number }>;

export function loadFile(path: string): FileHandle {
  const stat = statSync(path);
  if (!stat.isFile()) throw new Error("not a regular file");
  if (stat.size === 0) throw new Error("file is empty");
  // Opening proves the file is readable
  closeSync(openSync(path, "r"));
  return { path, size: stat.size };
}

export type LoadedResources = Readonly<{
  sounds: ResourceSet<FileHandle>;
  images: ResourceSet<FileHandle>;
  extension: EventMap | undefined;
  /** May be switched off when no sounds exist at all. */
  options: EngineOptions;
}>;

export type ResourceDeps = Readonly<{
  loadFn?: LoadFn<FileHandle>;
  env?: NodeJS.ProcessEnv;
  bundledDataDir?: string;
}>;

/**
 * Discover and load everything the engine needs. Runs once, before the
 * engine exists; failures here are fatal.
 */
export function loadResources(
  config: AppConfig,
  deps: ResourceDeps = {},
): LoadedResources {
  const env = deps.env ?? process.env;
  const loadFn = deps.loadFn ?? loadFile;
  const dataDirs = resolveDataDirs(config.dataDirs, env, deps.bundledDataDir);
  let options = config.engine;

  let extension: EventMap | undefined;
  let soundDirs = dataDirs;
  if (options.activeExtensionName !== undefined) {
    const location = findExtension(
      options.activeExtensionName,
      extensionRoots(dataDirs, env),
    );
    extension = loadEventMap(location.eventMapFile, {
      soundEnabled: options.soundEnabled,
    });
    // An extension brings its own sounds in place of the general ones
    soundDirs = [location.soundsDir];
  }

  let sounds = ResourceSet.empty<FileHandle>();
  if (options.soundEnabled) {
    sounds = loadItems(
      "sounds",
      findFiles(soundDirs, SOUND_PATTERNS),
      config.soundBlacklist,
      loadFn,
    );
    if (sounds.isEmpty && extension === undefined) {
      logWarn("No sounds found, sound disabled.");
      options = { ...options, soundEnabled: false };
    }
  }

  const images = loadItems(
    "images",
    findFiles(dataDirs, IMAGE_PATTERNS),
    config.imageBlacklist,
    loadFn,
  );

  return { extension, images, options, sounds };
}

/** Milliseconds since process start; drives the circle mark's hue. */
export const wallClock: Clock = () => performance.now();

/**
 * The seed fixes every random draw. Circle colours follow the clock instead,
 * so a replay with a fixed clock is needed for identical colours.
 */
export function createEngine(
  resources: LoadedResources,
  clock: Clock = wallClock,
): ResponseEngine<FileHandle, FileHandle> {
  return new ResponseEngine<FileHandle, FileHandle>({
    clock,
    extension: resources.extension,
    images: resources.images,
    options: resources.options,
    sounds: resources.sounds,
  });
}

export type AppIo = Readonly<{
  input: TerminalInputStream;
  output: TerminalOutputStream;
}>;

/**
 * Terminal session: welcome caption, then every decoded event goes through
 * the engine and its actions are presented until the engine terminates.
 */
export class KeymashApp {
  private readonly presenter: TerminalPresenter;
  private readonly driver: TerminalDriver;
  private welcomeShown = false;

  constructor(
    private readonly engine: ResponseEngine<FileHandle, FileHandle>,
    io: AppIo,
    options: { dark: boolean },
  ) {
    this.presenter = new TerminalPresenter(io.output, engine.random, {
      bell: true,
      dark: options.dark,
    });
    this.driver = createTerminalDriver(io.input, io.output);
  }

  /** Resolves with the exit status once the session ends. */
  run(): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      let finished = false;
      const finish = (error?: unknown): void => {
        finished = true;
        this.driver.stop();
        this.presenter.restore();
        if (error === undefined) resolve(0);
        else reject(error);
      };

      this.presenter.welcome();
      this.welcomeShown = true;
      this.driver.start((event) => {
        // Rest of a chunk that arrived together with the final event
        if (finished) return;
        try {
          if (this.dispatch(event)) finish();
        } catch (error: unknown) {
          finish(error);
        }
      });
    });
  }

  /** Returns true when the session is over. */
  dispatch(event: InputEvent): boolean {
    if (this.welcomeShown && event.kind !== "Quit") {
      // Moves and releases leave the caption up
      if (event.kind === "PointerMove" || event.kind === "PointerUp") {
        return false;
      }
      this.welcomeShown = false;
      this.presenter.clear();
    }
    for (const action of this.engine.handle(event)) {
      if (action.type === "Terminate") return true;
      this.presenter.present(action);
    }
    return false;
  }
}
