// Startup configuration: command-line options (plus environment fallbacks)
// validated into the engine options and host settings

import { DEFAULT_ENGINE_OPTIONS, type EngineOptions } from "../engine/types";
import { ConfigurationError } from "../errors";

export type AppConfig = Readonly<{
  engine: EngineOptions;
  soundBlacklist: ReadonlyArray<string>;
  imageBlacklist: ReadonlyArray<string>;
  /** Extra data directories, searched after the bundled and per-user ones. */
  dataDirs: ReadonlyArray<string>;
  dark: boolean;
}>;

const SEED_ENV_KEY = "KEYMASH_SEED";

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function isBoolean(x: unknown): x is boolean {
  return typeof x === "boolean";
}

function isString(x: unknown): x is string {
  return typeof x === "string";
}

function isStringArray(a: unknown): a is Array<string> {
  return Array.isArray(a) && a.every((s) => typeof s === "string");
}

function flag(
  opts: Record<string, unknown>,
  key: string,
  fallback: boolean,
): boolean {
  const v = opts[key];
  return isBoolean(v) ? v : fallback;
}

function list(opts: Record<string, unknown>, key: string): Array<string> {
  const v = opts[key];
  if (v === undefined) return [];
  if (isString(v)) return [v];
  if (isStringArray(v)) return [...v];
  throw new ConfigurationError("must be a list of strings", { key });
}

export function parseSeed(raw: string, key: string): number {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ConfigurationError(`seed must be an integer, got "${raw}"`, {
      key,
    });
  }
  const n = Number(trimmed);
  if (!Number.isSafeInteger(n)) {
    throw new ConfigurationError(`seed is out of range: ${raw}`, { key });
  }
  return n;
}

function seedFrom(
  opts: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): number | undefined {
  const v = opts["seed"];
  if (isString(v)) return parseSeed(v, "--seed");
  if (typeof v === "number") return parseSeed(String(v), "--seed");
  const fromEnv = env[SEED_ENV_KEY];
  if (fromEnv !== undefined && fromEnv.length > 0) {
    return parseSeed(fromEnv, SEED_ENV_KEY);
  }
  return undefined;
}

/**
 * Build the app configuration from parsed command-line options. Keys follow
 * the camel-cased long option names.
 */
export function configFromOptions(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const opts: Record<string, unknown> = isRecord(raw) ? raw : {};
  const extension = opts["extension"];
  if (extension !== undefined && (!isString(extension) || extension === "")) {
    throw new ConfigurationError("must name an extension", {
      key: "--extension",
    });
  }
  const randomSeed = seedFrom(opts, env);

  const engine: EngineOptions = {
    deterministicSounds: flag(
      opts,
      "deterministicSounds",
      DEFAULT_ENGINE_OPTIONS.deterministicSounds,
    ),
    soundEnabled: flag(opts, "sound", DEFAULT_ENGINE_OPTIONS.soundEnabled),
    startMuted: flag(opts, "mute", DEFAULT_ENGINE_OPTIONS.startMuted),
    uppercaseLetters: flag(
      opts,
      "uppercase",
      DEFAULT_ENGINE_OPTIONS.uppercaseLetters,
    ),
    ...(randomSeed !== undefined ? { randomSeed } : {}),
    ...(isString(extension) ? { activeExtensionName: extension } : {}),
  };

  return {
    dark: flag(opts, "dark", false),
    dataDirs: list(opts, "dataDir"),
    engine,
    imageBlacklist: list(opts, "imageBlacklist"),
    soundBlacklist: list(opts, "soundBlacklist"),
  };
}
