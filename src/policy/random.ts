import { PolicyError } from "../errors";

import type { RandomSource } from "../core/rng";
import type { ResourceSet } from "../resources/resource-set";
import type { InputEvent } from "../input/events";
import type { PolicyArgs, ResourceResponse, ResponsePolicy } from "./types";

/** Uniform pick from the backing set; ignores the event. */
export class RandomPolicy<H> implements ResponsePolicy<ResourceResponse<H>> {
  readonly kind = "random" as const;

  constructor(
    private readonly items: ResourceSet<H>,
    private readonly rng: RandomSource,
  ) {}

  validate(_args?: PolicyArgs): void {
    if (this.items.isEmpty) {
      throw new PolicyError(this.kind, "no resources to choose from");
    }
  }

  select(_event?: InputEvent, _args?: PolicyArgs): ResourceResponse<H> {
    this.validate();
    const entry = this.rng.pick(this.items.toArray());
    return { handle: entry.handle, kind: "resource", name: entry.name };
  }
}
