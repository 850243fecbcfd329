/**
 * Error taxonomy for startup and dispatch failures.
 *
 * Everything here is fatal for the session: the CLI prints the message and
 * exits. Per-item resource load failures are not errors; the loader logs and
 * skips them.
 */

export class KeymashError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad extension file, unknown key, unmatched event, bad CLI value. */
export class ConfigurationError extends KeymashError {
  readonly file: string | undefined;
  readonly key: string | undefined;

  constructor(message: string, where?: { file?: string; key?: string }) {
    const parts: Array<string> = [];
    if (where?.file !== undefined) parts.push(where.file);
    if (where?.key !== undefined) parts.push(`key "${where.key}"`);
    super(parts.length > 0 ? `${parts.join(": ")}: ${message}` : message);
    this.file = where?.file;
    this.key = where?.key;
  }
}

export type ResourceCategory = "sounds" | "images";

/** Every item of a category failed to load. */
export class ResourceBatchError extends KeymashError {
  readonly category: ResourceCategory;
  readonly failures: ReadonlyArray<string>;

  constructor(category: ResourceCategory, failures: ReadonlyArray<string>) {
    super(`All ${category} failed to load.`);
    this.category = category;
    this.failures = failures;
  }
}

/** A policy was asked for something its setup cannot serve. */
export class PolicyError extends KeymashError {
  readonly policy: string;

  constructor(policy: string, detail: string) {
    super(`policy "${policy}": ${detail}`);
    this.policy = policy;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
