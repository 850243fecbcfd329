import { PolicyError } from "../errors";

import type { InputEvent } from "../input/events";
import type { ResourceSet } from "../resources/resource-set";
import type { PolicyArgs, ResourceResponse, ResponsePolicy } from "./types";

/** Always the resource named by the single argument. */
export class NamedFilePolicy<H> implements ResponsePolicy<ResourceResponse<H>> {
  readonly kind = "named_file" as const;

  constructor(private readonly items: ResourceSet<H>) {}

  private fileName(args: PolicyArgs | undefined): string {
    const [name, ...rest] = args ?? [];
    if (name === undefined || rest.length > 0) {
      throw new PolicyError(
        this.kind,
        `expects exactly one file name argument, got ${String(args?.length ?? 0)}`,
      );
    }
    return name;
  }

  validate(args: PolicyArgs | undefined): void {
    const name = this.fileName(args);
    if (!this.items.has(name)) {
      throw new PolicyError(
        this.kind,
        `file "${name}" is not among the loaded resources`,
      );
    }
  }

  select(
    _event: InputEvent,
    args: PolicyArgs | undefined,
  ): ResourceResponse<H> {
    const name = this.fileName(args);
    const entry = this.items.get(name);
    if (entry === undefined) {
      throw new PolicyError(
        this.kind,
        `file "${name}" is not among the loaded resources`,
      );
    }
    return { handle: entry.handle, kind: "resource", name: entry.name };
  }
}
