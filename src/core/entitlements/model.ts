// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/entitlements/model`
 * Purpose: Entitlement record per (agentId, payer) and the grant shapes that mutate it.
 * Scope: Type definitions only. Does not read time or storage.
 * Invariants: callCredits >= 0; validUntil is unix seconds, 0 meaning never granted. Records are never destroyed.
 * Side-effects: none
 * Links: core/entitlements/rules
 * @public
 */

import type { AccountAddress } from "../settlement/model";

export interface EntitlementRecord {
  agentId: bigint;
  payer: AccountAddress;
  callCredits: bigint;
  /** Unix seconds, inclusive upper bound of period access */
  validUntil: bigint;
}

export type EntitlementGrant =
  | { kind: "call" }
  | { kind: "period"; periodSeconds: bigint; now: bigint };
