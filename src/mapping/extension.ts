import { readFileSync } from "node:fs";

import { load, YAMLException } from "js-yaml";

import { ConfigurationError, describeError } from "../errors";
import { debugLog } from "../utils/debug";

import { DeclarativeMapper } from "./declarative";
import { parseRules } from "./rules";

export const SUPPORTED_API_VERSION = 0;

const TOP_LEVEL_KEYS = ["apiVersion", "image", "sound"] as const;

export type EventMap = Readonly<{
  file: string;
  image: DeclarativeMapper;
  /** Absent when the file has no sound rules; only legal with sound off. */
  sound: DeclarativeMapper | undefined;
}>;

export type EventMapOptions = Readonly<{ soundEnabled: boolean }>;

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

/** Validate a parsed document and build the image and sound mappers. */
export function parseEventMap(
  doc: unknown,
  file: string,
  options: EventMapOptions,
): EventMap {
  if (!isRecord(doc)) {
    throw new ConfigurationError("top level must be a mapping", { file });
  }
  for (const key of Object.keys(doc)) {
    if (!(TOP_LEVEL_KEYS as ReadonlyArray<string>).includes(key)) {
      throw new ConfigurationError(
        `unrecognized top-level key (expected ${TOP_LEVEL_KEYS.join(", ")})`,
        { file, key },
      );
    }
  }
  if (doc["apiVersion"] !== SUPPORTED_API_VERSION) {
    const got = JSON.stringify(doc["apiVersion"]) ?? "nothing";
    throw new ConfigurationError(
      `unsupported apiVersion ${got} (expected ${String(SUPPORTED_API_VERSION)})`,
      { file, key: "apiVersion" },
    );
  }
  if (!("image" in doc)) {
    throw new ConfigurationError("is required", { file, key: "image" });
  }
  const image = new DeclarativeMapper(
    file,
    "image",
    parseRules(doc["image"], file, "image"),
  );

  let sound: DeclarativeMapper | undefined;
  if ("sound" in doc) {
    sound = new DeclarativeMapper(
      file,
      "sound",
      parseRules(doc["sound"], file, "sound"),
    );
  } else if (options.soundEnabled) {
    throw new ConfigurationError("is required when sound is enabled", {
      file,
      key: "sound",
    });
  }

  debugLog("mapping", `loaded ${file}`, {
    image: image.size,
    sound: sound?.size ?? 0,
  });
  return { file, image, sound };
}

export function parseEventMapSource(
  source: string,
  file: string,
  options: EventMapOptions,
): EventMap {
  let doc: unknown;
  try {
    doc = load(source, { filename: file });
  } catch (error: unknown) {
    if (error instanceof YAMLException) {
      throw new ConfigurationError(`invalid YAML: ${error.reason}`, { file });
    }
    throw error;
  }
  return parseEventMap(doc, file, options);
}

export function loadEventMap(
  file: string,
  options: EventMapOptions,
): EventMap {
  let source: string;
  try {
    source = readFileSync(file, "utf8");
  } catch (error: unknown) {
    throw new ConfigurationError(`cannot read: ${describeError(error)}`, {
      file,
    });
  }
  return parseEventMapSource(source, file, options);
}
