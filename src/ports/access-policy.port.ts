// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/access-policy`
 * Purpose: Capability checks for every mutating entry point.
 * Scope: Answers whether a resolved caller holds a capability. Does not authenticate; callers are resolved at the edge.
 * Invariants: Pure decision; features raise UnauthorizedCallerError on a false answer.
 * Side-effects: none (interface definition only)
 * Links: RoleAccessPolicy
 * @public
 */

import type { AccountAddress } from "@/core";

export type Capability = "settle" | "meter" | "withdraw" | "admin";

export type Caller =
  | { kind: "facilitator"; id: string }
  | { kind: "admin"; id: string }
  | { kind: "beneficiary"; address: AccountAddress }
  | { kind: "anonymous" };

export interface AccessPolicy {
  can(caller: Caller, capability: Capability): boolean;
}

export function describeCaller(caller: Caller): string {
  switch (caller.kind) {
    case "facilitator":
    case "admin":
      return `${caller.kind}:${caller.id}`;
    case "beneficiary":
      return `beneficiary:${caller.address}`;
    case "anonymous":
      return "anonymous";
  }
}
