import { ConfigurationError } from "../errors";
import { debugLog } from "../utils/debug";

import { ruleMatches, type Rule } from "./rules";

import type { InputEvent } from "../input/events";
import type { Channel, PolicyCall } from "../policy/types";
import type { EventMapper } from "./types";

/** Ordered rule list; the first rule whose checks all hold decides. */
export class DeclarativeMapper implements EventMapper {
  constructor(
    readonly source: string,
    readonly channel: Channel,
    private readonly rules: ReadonlyArray<Rule>,
  ) {}

  map(event: InputEvent): PolicyCall {
    const index = this.rules.findIndex((r) => ruleMatches(r, event));
    const rule = this.rules[index];
    if (rule === undefined) {
      throw new ConfigurationError(
        `no ${this.channel} rule matches a ${event.kind} event`,
        { file: this.source, key: this.channel },
      );
    }
    debugLog("mapping", `${this.channel} rule ${String(index)} matched`);
    return { args: rule.policyArgs, policy: rule.policyName };
  }

  routes(): ReadonlyArray<PolicyCall> {
    return this.rules.map((r) => ({
      args: r.policyArgs,
      policy: r.policyName,
    }));
  }

  get size(): number {
    return this.rules.length;
  }
}
