import { ConfigurationError } from "../errors";
import { debugLog } from "../utils/debug";

import { CircleMarkPolicy, type Clock } from "./circle";
import { DeterministicPolicy } from "./deterministic";
import { GlyphRenderPolicy } from "./glyph";
import { NamedFilePolicy } from "./named-file";
import { RandomPolicy } from "./random";
import {
  isPolicyKind,
  POLICY_KINDS,
  type Channel,
  type ImageResponse,
  type PolicyCall,
  type PolicyKind,
  type ResponsePolicy,
  type SoundResponse,
} from "./types";

import type { RandomSource } from "../core/rng";
import type { InputEvent } from "../input/events";
import type { ResourceSet } from "../resources/resource-set";

/**
 * Translate an external policy name into the closed PolicyKind union.
 * This is the only place where strings become policy identities.
 */
export function resolvePolicyName(
  name: unknown,
  where?: { file?: string; key?: string },
): PolicyKind {
  if (isPolicyKind(name)) return name;
  throw new ConfigurationError(
    `unknown policy ${JSON.stringify(name)} (expected one of ${POLICY_KINDS.join(", ")})`,
    where,
  );
}

/** Policy instances available to one channel; immutable once built. */
export class PolicyRegistry<R> {
  private readonly policies: ReadonlyMap<PolicyKind, ResponsePolicy<R>>;

  constructor(
    readonly channel: Channel,
    policies: ReadonlyArray<ResponsePolicy<R>>,
  ) {
    this.policies = new Map(policies.map((p) => [p.kind, p]));
  }

  kinds(): ReadonlyArray<PolicyKind> {
    return [...this.policies.keys()];
  }

  get(kind: PolicyKind): ResponsePolicy<R> {
    const policy = this.policies.get(kind);
    if (policy === undefined) {
      throw new ConfigurationError(
        `policy "${kind}" is not available for ${this.channel}`,
      );
    }
    return policy;
  }

  /** Check every route a mapper can produce against this registry. */
  validateRoutes(routes: Iterable<PolicyCall>): void {
    for (const route of routes) {
      this.get(route.policy).validate(route.args);
    }
  }

  dispatch(event: InputEvent, call: PolicyCall): R {
    debugLog("mapping", `${this.channel} -> ${call.policy}`, call.args);
    return this.get(call.policy).select(event, call.args);
  }
}

export function createSoundRegistry<S>(
  sounds: ResourceSet<S>,
  rng: RandomSource,
): PolicyRegistry<SoundResponse<S>> {
  return new PolicyRegistry<SoundResponse<S>>("sound", [
    new RandomPolicy(sounds, rng),
    new DeterministicPolicy(sounds),
    new NamedFilePolicy(sounds),
  ]);
}

export type ImageRegistryOptions = Readonly<{
  uppercase: boolean;
  clock?: Clock;
}>;

export function createImageRegistry<I>(
  images: ResourceSet<I>,
  rng: RandomSource,
  options: ImageRegistryOptions,
): PolicyRegistry<ImageResponse<I>> {
  return new PolicyRegistry<ImageResponse<I>>("image", [
    new RandomPolicy(images, rng),
    new DeterministicPolicy(images),
    new NamedFilePolicy(images),
    new GlyphRenderPolicy(rng, { uppercase: options.uppercase }),
    new CircleMarkPolicy(options.clock),
  ]);
}
