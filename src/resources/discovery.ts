import { existsSync, statSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";

import { globSync } from "glob";

import { ConfigurationError } from "../errors";
import { debugLog, logInfo } from "../utils/debug";

export const APP_DIR_NAME = "keymash";
export const EXTENSION_FILE = "event_map.yaml";

export const SOUND_PATTERNS: ReadonlyArray<string> = ["*.wav", "*.ogg"];
export const IMAGE_PATTERNS: ReadonlyArray<string> = [
  "*.gif",
  "*.jpg",
  "*.png",
  "*.svg",
];

// Shipped data lives beside the package root, both from src/ and dist/
export const BUNDLED_DATA_DIR = resolve(__dirname, "..", "..", "data");

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

export function xdgDataHome(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env["XDG_DATA_HOME"];
  return fromEnv !== undefined && fromEnv.length > 0
    ? fromEnv
    : join(homedir(), ".local", "share");
}

/**
 * Data directories in lookup order: bundled data, the per-user data dir when
 * present, then any directories given explicitly.
 */
export function resolveDataDirs(
  extra: ReadonlyArray<string> = [],
  env: NodeJS.ProcessEnv = process.env,
  bundled: string = BUNDLED_DATA_DIR,
): ReadonlyArray<string> {
  const dirs = [bundled];
  const userDir = join(xdgDataHome(env), APP_DIR_NAME, "data");
  if (isDirectory(userDir)) {
    logInfo(`Extra data dir: ${userDir}`);
    dirs.push(userDir);
  }
  for (const dir of extra) dirs.push(resolve(dir));
  return dirs.filter(isDirectory);
}

/** Recursively collect files matching any pattern, sorted for stable order. */
export function findFiles(
  dirs: ReadonlyArray<string>,
  patterns: ReadonlyArray<string>,
): ReadonlyArray<string> {
  const files: Array<string> = [];
  for (const dir of dirs) {
    const found = globSync(
      patterns.map((p) => `**/${p}`),
      { absolute: true, cwd: dir, nocase: true, nodir: true },
    );
    files.push(...found.sort());
  }
  debugLog("resources", `found ${String(files.length)} files`, { patterns });
  return files;
}

export type ExtensionLocation = Readonly<{
  name: string;
  dir: string;
  eventMapFile: string;
  soundsDir: string;
}>;

export function extensionRoots(
  dataDirs: ReadonlyArray<string>,
  env: NodeJS.ProcessEnv = process.env,
): ReadonlyArray<string> {
  const roots = dataDirs.map((d) => resolve(d, "..", "extensions"));
  roots.push(join(xdgDataHome(env), APP_DIR_NAME, "extensions"));
  return [...new Set(roots)];
}

export function findExtension(
  name: string,
  roots: ReadonlyArray<string>,
): ExtensionLocation {
  if (!/^[\w.-]+$/.test(name) || name === "." || name === "..") {
    throw new ConfigurationError(`invalid extension name "${name}"`);
  }
  for (const root of roots) {
    const dir = join(root, name);
    const eventMapFile = join(dir, EXTENSION_FILE);
    if (isDirectory(dir) && existsSync(eventMapFile)) {
      return { dir, eventMapFile, name, soundsDir: join(dir, "sounds") };
    }
  }
  throw new ConfigurationError(
    `extension "${name}" not found (looked in ${roots.join(", ")})`,
  );
}

export function listExtensions(
  roots: ReadonlyArray<string>,
): ReadonlyArray<string> {
  const names = new Set<string>();
  for (const root of roots) {
    if (!isDirectory(root)) continue;
    for (const file of globSync(`*/${EXTENSION_FILE}`, { cwd: root })) {
      const [name] = file.split(/[\\/]/);
      if (name !== undefined) names.add(name);
    }
  }
  return [...names].sort();
}
