import { basename } from "node:path";

import { logWarn } from "../utils/debug";

export type ResourceEntry<H> = Readonly<{ name: string; handle: H }>;

/**
 * Immutable collection of loaded sounds or images keyed by base file name.
 * Index order is load order; deterministic selection depends on it.
 */
export class ResourceSet<H> {
  private readonly entries: ReadonlyArray<ResourceEntry<H>>;
  private readonly byName: ReadonlyMap<string, ResourceEntry<H>>;

  private constructor(entries: ReadonlyArray<ResourceEntry<H>>) {
    this.entries = entries;
    this.byName = new Map(entries.map((e) => [e.name, e]));
  }

  static empty<H>(): ResourceSet<H> {
    return new ResourceSet<H>([]);
  }

  /**
   * Build from `[path, handle]` pairs. Paths are reduced to their base name;
   * on a clash the first entry wins.
   */
  static fromLoaded<H>(
    loaded: Iterable<readonly [string, H]>,
  ): ResourceSet<H> {
    const entries: Array<ResourceEntry<H>> = [];
    const seen = new Set<string>();
    for (const [path, handle] of loaded) {
      const name = basename(path);
      if (seen.has(name)) {
        logWarn(`Ignoring duplicate resource name: ${path}`);
        continue;
      }
      seen.add(name);
      entries.push(Object.freeze({ handle, name }));
    }
    return new ResourceSet(Object.freeze(entries));
  }

  get size(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): ResourceEntry<H> | undefined {
    return this.byName.get(name);
  }

  at(index: number): ResourceEntry<H> | undefined {
    return this.entries[index];
  }

  names(): ReadonlyArray<string> {
    return this.entries.map((e) => e.name);
  }

  toArray(): ReadonlyArray<ResourceEntry<H>> {
    return this.entries;
  }
}
