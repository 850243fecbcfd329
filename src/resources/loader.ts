import { minimatch } from "minimatch";

import {
  describeError,
  ResourceBatchError,
  type ResourceCategory,
} from "../errors";
import { debugLog, logInfo, logWarn } from "../utils/debug";

import { ResourceSet } from "./resource-set";

export type LoadFn<H> = (path: string) => H;

/**
 * Blacklist patterns are shell globs. A pattern without a slash is matched
 * against the base name, otherwise against the whole path.
 */
export function isBlacklisted(
  path: string,
  patterns: ReadonlyArray<string>,
): boolean {
  return patterns.some((p) =>
    minimatch(path, p, { dot: true, matchBase: true }),
  );
}

/**
 * Load every non-blacklisted path. A failing item is logged and skipped; only
 * a category where everything failed is fatal. No paths at all is an empty set.
 */
export function loadItems<H>(
  category: ResourceCategory,
  paths: ReadonlyArray<string>,
  blacklist: ReadonlyArray<string>,
  loadFn: LoadFn<H>,
): ResourceSet<H> {
  const loaded: Array<readonly [string, H]> = [];
  const skipped: Array<string> = [];
  const failed: Array<string> = [];

  for (const path of paths) {
    if (isBlacklisted(path, blacklist)) {
      logInfo(`Skipping blacklisted item: ${path}`);
      skipped.push(path);
      continue;
    }
    try {
      loaded.push([path, loadFn(path)]);
    } catch (error: unknown) {
      logWarn(
        `Cannot load ${category.slice(0, -1)}: ${path}`,
        describeError(error),
      );
      failed.push(path);
    }
  }

  debugLog("resources", `${category}: ${String(loaded.length)} loaded`, {
    failed: failed.length,
    skipped: skipped.length,
  });

  if (loaded.length === 0 && failed.length > 0) {
    throw new ResourceBatchError(category, failed);
  }
  return ResourceSet.fromLoaded(loaded);
}
