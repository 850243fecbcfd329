import { PolicyError } from "../errors";
import { keyCodeOf, type InputEvent } from "../input/events";
import { keyCodeAsNumber } from "../types/brands";

import type { ResourceSet } from "../resources/resource-set";
import type { PolicyArgs, ResourceResponse, ResponsePolicy } from "./types";

/** Index for a key code; same key, same resource. */
export function deterministicIndex(keyCode: number, size: number): number {
  return keyCode % size;
}

export class DeterministicPolicy<H>
  implements ResponsePolicy<ResourceResponse<H>>
{
  readonly kind = "deterministic" as const;

  constructor(private readonly items: ResourceSet<H>) {}

  validate(_args?: PolicyArgs): void {
    if (this.items.isEmpty) {
      throw new PolicyError(this.kind, "no resources to choose from");
    }
  }

  select(event: InputEvent, _args?: PolicyArgs): ResourceResponse<H> {
    this.validate();
    const keyCode = keyCodeOf(event);
    if (keyCode === undefined) {
      throw new PolicyError(
        this.kind,
        `${event.kind} event carries no key code`,
      );
    }
    const entry = this.items.at(
      deterministicIndex(keyCodeAsNumber(keyCode), this.items.size),
    );
    if (entry === undefined) {
      throw new PolicyError(this.kind, "index out of range");
    }
    return { handle: entry.handle, kind: "resource", name: entry.name };
  }
}
