// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/auth/role-access-policy`
 * Purpose: Static role-to-capability table.
 * Scope: Facilitators settle and meter, admins administer, beneficiaries withdraw. Does not authenticate callers.
 * Invariants: Anonymous callers hold no capability; admins do not inherit facilitator capabilities.
 * Side-effects: none
 * Links: Implements AccessPolicy port; callers resolved by bootstrap/http/auth
 * @public
 */

import type { AccessPolicy, Caller, Capability } from "@/ports";

const CAPABILITIES: Record<Caller["kind"], ReadonlySet<Capability>> = {
  facilitator: new Set<Capability>(["settle", "meter"]),
  admin: new Set<Capability>(["admin"]),
  beneficiary: new Set<Capability>(["withdraw"]),
  anonymous: new Set<Capability>(),
};

export class RoleAccessPolicy implements AccessPolicy {
  can(caller: Caller, capability: Capability): boolean {
    return CAPABILITIES[caller.kind].has(capability);
  }
}
