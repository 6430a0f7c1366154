/**
 * Automation policy decisions
 *
 * | Intent        | Gate        | Gate off             | + autoConfirm |
 * |---------------|-------------|----------------------|---------------|
 * | create/update | autoSync    | require-confirmation | execute       |
 * | delete        | autoDelete  | require-confirmation | execute       |
 * | unmapped      | -           | suppress             | suppress      |
 */

import type { AutomationPolicy, SyncIntent, UnmappedChange } from "./types.js";

export type Decision = "execute" | "require-confirmation" | "suppress";

export const DEFAULT_POLICY: AutomationPolicy = {
  autoConfirm: true,
  autoSync: true,
  autoDelete: true,
};

function isMapped(candidate: SyncIntent | UnmappedChange): candidate is SyncIntent {
  return "targetPath" in candidate;
}

export function decide(
  candidate: SyncIntent | UnmappedChange,
  policy: AutomationPolicy
): Decision {
  if (!isMapped(candidate)) {
    return "suppress";
  }

  const gate = candidate.kind === "delete" ? policy.autoDelete : policy.autoSync;
  return gate ? "execute" : "require-confirmation";
}

/**
 * autoConfirm answers the confirmation step on the operator's behalf.
 * It never overrides a suppression.
 */
export function applyAutoConfirm(decision: Decision, policy: AutomationPolicy): Decision {
  if (decision === "require-confirmation" && policy.autoConfirm) {
    return "execute";
  }
  return decision;
}

export function describePolicy(policy: AutomationPolicy): string {
  const flag = (value: boolean) => (value ? "on" : "off");
  return `auto-confirm ${flag(policy.autoConfirm)}, auto-sync ${flag(policy.autoSync)}, auto-delete ${flag(policy.autoDelete)}`;
}
