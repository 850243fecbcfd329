import { createSeed, seedAsNumber, type Seed } from "../types/brands";

/**
 * Source of randomness shared by the engine and every policy.
 * One instance per session; a fixed seed makes a whole run reproducible.
 */
export type RandomSource = {
  readonly seed: Seed;
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [0, maxExclusive). */
  nextInt(maxExclusive: number): number;
  /** Uniform integer in [min, max], both inclusive. */
  intBetween(min: number, max: number): number;
  pick<T>(items: ReadonlyArray<T>): T;
};

// Simple string hash (FNV-1a, 32-bit) for stable seeds
export function hashString(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0; // unsigned 32-bit
}

// Linear congruential step (Numerical Recipes constants), stays within 2^53
function nextState(state: number): number {
  return (state * 1664525 + 1013904223) % 2 ** 32;
}

export class SeededRandom implements RandomSource {
  readonly seed: Seed;
  private state: number;

  constructor(seed: Seed) {
    this.seed = seed;
    this.state = seedAsNumber(seed);
  }

  next(): number {
    this.state = nextState(this.state);
    return this.state / 4294967296;
  }

  nextInt(maxExclusive: number): number {
    if (!Number.isInteger(maxExclusive) || maxExclusive <= 0) {
      throw new Error("nextInt bound must be a positive integer");
    }
    // High bits mapped to [0, n) to reduce modulo bias
    return Math.floor(this.next() * maxExclusive);
  }

  intBetween(min: number, max: number): number {
    if (max < min) return min;
    return min + this.nextInt(max - min + 1);
  }

  pick<T>(items: ReadonlyArray<T>): T {
    const item = items[this.nextInt(items.length)];
    if (item === undefined) {
      throw new Error("Cannot pick from an empty collection");
    }
    return item;
  }
}

/**
 * Create the session generator. Without an explicit seed one is derived from
 * the clock; callers log it so an interesting run can be replayed.
 */
export function createRandom(seed?: number | string): SeededRandom {
  if (typeof seed === "string") {
    return new SeededRandom(createSeed(hashString(seed)));
  }
  if (seed !== undefined) return new SeededRandom(createSeed(seed));
  return new SeededRandom(createSeed(Date.now()));
}
