import { ConfigurationError } from "../errors";
import {
  isRoutableKind,
  ROUTABLE_KINDS,
  type InputEvent,
  type RoutableKind,
} from "../input/events";
import { resolvePolicyName } from "../policy/registry";

import type { PolicyArgs, PolicyKind } from "../policy/types";

export type UnicodeCheck =
  | Readonly<{ value: string }>
  | Readonly<{ isalpha: boolean }>
  | Readonly<{ isdigit: boolean }>;

/** One predicate; exactly one key per check. */
export type Check =
  | Readonly<{ type: RoutableKind }>
  | Readonly<{ unicode: UnicodeCheck }>;

export type Rule = Readonly<{
  /** Conjunction; empty matches every event. */
  predicates: ReadonlyArray<Check>;
  policyName: PolicyKind;
  policyArgs: PolicyArgs | undefined;
}>;

function matchesUnicode(check: UnicodeCheck, event: InputEvent): boolean {
  // Only key presses with text have a character to test
  if (event.kind !== "KeyDown" || event.character === undefined) return false;
  if ("value" in check) return event.character === check.value;
  if ("isalpha" in check) return event.isAlpha === check.isalpha;
  return event.isDigit === check.isdigit;
}

export function checkMatches(check: Check, event: InputEvent): boolean {
  if ("type" in check) return event.kind === check.type;
  return matchesUnicode(check.unicode, event);
}

export function ruleMatches(rule: Rule, event: InputEvent): boolean {
  return rule.predicates.every((c) => checkMatches(c, event));
}

// Parsing from untrusted documents

const RULE_KEYS = ["check", "policy", "args"] as const;
const CHECK_KEYS = ["type", "unicode"] as const;
const UNICODE_KEYS = ["value", "isalpha", "isdigit"] as const;

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

type Where = Readonly<{ file: string; path: string }>;

function fail(where: Where, key: string, message: string): never {
  throw new ConfigurationError(message, {
    file: where.file,
    key: `${where.path}.${key}`,
  });
}

function rejectUnknownKeys(
  obj: Record<string, unknown>,
  allowed: ReadonlyArray<string>,
  where: Where,
): void {
  for (const key of Object.keys(obj)) {
    if (!allowed.includes(key)) {
      fail(
        where,
        key,
        `unrecognized key (expected one of ${allowed.join(", ")})`,
      );
    }
  }
}

function exactlyOneKey(
  obj: Record<string, unknown>,
  allowed: ReadonlyArray<string>,
  where: Where,
): string {
  rejectUnknownKeys(obj, allowed, where);
  const keys = Object.keys(obj);
  const [only] = keys;
  if (only === undefined || keys.length !== 1) {
    const got = keys.length === 0 ? "none" : keys.join(", ");
    throw new ConfigurationError(
      `expected exactly one of ${allowed.join(", ")}, got ${got}`,
      { file: where.file, key: where.path },
    );
  }
  return only;
}

function parseUnicodeCheck(raw: unknown, where: Where): UnicodeCheck {
  if (!isRecord(raw)) {
    throw new ConfigurationError("unicode check must be a mapping", {
      file: where.file,
      key: where.path,
    });
  }
  const key = exactlyOneKey(raw, UNICODE_KEYS, where);
  const v = raw[key];
  if (key === "value") {
    if (typeof v !== "string" || [...v].length !== 1) {
      fail(where, key, "must be a single character");
    }
    return { value: v };
  }
  if (typeof v !== "boolean") fail(where, key, "must be true or false");
  return key === "isalpha" ? { isalpha: v } : { isdigit: v };
}

export function parseCheck(raw: unknown, where: Where): Check {
  if (!isRecord(raw)) {
    throw new ConfigurationError("check must be a mapping", {
      file: where.file,
      key: where.path,
    });
  }
  const key = exactlyOneKey(raw, CHECK_KEYS, where);
  if (key === "type") {
    const v = raw[key];
    if (!isRoutableKind(v)) {
      fail(where, key, `must be one of ${ROUTABLE_KINDS.join(", ")}`);
    }
    return { type: v };
  }
  return {
    unicode: parseUnicodeCheck(raw[key], {
      ...where,
      path: `${where.path}.unicode`,
    }),
  };
}

function parseArgs(raw: unknown, where: Where): PolicyArgs | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (!Array.isArray(raw)) fail(where, "args", "must be a list");
  return raw.map((a: unknown, i) => {
    if (typeof a === "string") return a;
    if (typeof a === "number" || typeof a === "boolean") return String(a);
    return fail(where, `args[${String(i)}]`, "must be a scalar");
  });
}

export function parseRule(raw: unknown, where: Where): Rule {
  if (!isRecord(raw)) {
    throw new ConfigurationError("rule must be a mapping", {
      file: where.file,
      key: where.path,
    });
  }
  rejectUnknownKeys(raw, RULE_KEYS, where);

  const checks = raw["check"];
  let predicates: ReadonlyArray<Check> = [];
  if (checks !== undefined && checks !== null) {
    if (!Array.isArray(checks)) fail(where, "check", "must be a list");
    predicates = checks.map((c: unknown, i) =>
      parseCheck(c, { ...where, path: `${where.path}.check[${String(i)}]` }),
    );
  }

  if (!("policy" in raw)) fail(where, "policy", "is required");
  const policyName = resolvePolicyName(raw["policy"], {
    file: where.file,
    key: `${where.path}.policy`,
  });

  return {
    policyArgs: parseArgs(raw["args"], where),
    policyName,
    predicates,
  };
}

export function parseRules(
  raw: unknown,
  file: string,
  listKey: string,
): ReadonlyArray<Rule> {
  if (!Array.isArray(raw)) {
    throw new ConfigurationError("must be a list of rules", {
      file,
      key: listKey,
    });
  }
  return raw.map((r: unknown, i) =>
    parseRule(r, { file, path: `${listKey}[${String(i)}]` }),
  );
}
