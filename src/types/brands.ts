// Branded primitive types for type safety and domain modeling

// Raw key or button code as reported by the device
declare const KeyCodeBrand: unique symbol;
export type KeyCode = number & { readonly [KeyCodeBrand]: true };

// RNG seed - unsigned 32-bit integer
declare const SeedBrand: unique symbol;
export type Seed = number & { readonly [SeedBrand]: true };

// Screen coordinate in the presenter's units (pixels or terminal cells)
declare const ScreenCoordBrand: unique symbol;
export type ScreenCoord = number & { readonly [ScreenCoordBrand]: true };

// KeyCode constructor
export function createKeyCode(value: number): KeyCode {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error("KeyCode must be a non-negative integer");
  }
  return value as KeyCode;
}

// Seed constructor
export function createSeed(value: number): Seed {
  if (!Number.isSafeInteger(value)) {
    throw new Error("Seed must be an integer");
  }
  // Fold into the unsigned 32-bit range the generator works in
  return (value >>> 0) as Seed;
}

// ScreenCoord constructor
export function createScreenCoord(value: number): ScreenCoord {
  if (!Number.isFinite(value)) {
    throw new Error("ScreenCoord must be a finite number");
  }
  return value as ScreenCoord;
}

// Conversion helpers for interop at boundaries
export const keyCodeAsNumber = (k: KeyCode): number => k as number;
export const seedAsNumber = (s: Seed): number => s as number;
