// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/settlement/services/access`
 * Purpose: Read-only access query over the entitlement ledger.
 * Scope: hasAccess and the entitlement snapshot served to resource servers. Does not mutate.
 * Invariants: Access iff callCredits > 0 or validUntil >= now (unix seconds from the Clock port).
 * Side-effects: IO (ledger read)
 * @public
 */

import type { AccountAddress, EntitlementRecord } from "@/core";
import { hasAccess as entitlementGrantsAccess, toUnixSeconds } from "@/core";
import type { Clock, SettlementLedgerRepository } from "@/ports";

export interface AccessSnapshot {
  agentId: bigint;
  payer: AccountAddress;
  hasAccess: boolean;
  callCredits: bigint;
  validUntil: bigint;
  /** True when the active period window alone grants access */
  periodActive: boolean;
  checkedAt: bigint;
}

export async function getAccessSnapshot(
  deps: { ledger: SettlementLedgerRepository; clock: Clock },
  agentId: bigint,
  payer: AccountAddress
): Promise<AccessSnapshot> {
  const now = toUnixSeconds(deps.clock.now());
  const record: EntitlementRecord = await deps.ledger.getEntitlement(
    agentId,
    payer
  );
  return {
    agentId,
    payer,
    hasAccess: entitlementGrantsAccess(record, now),
    callCredits: record.callCredits,
    validUntil: record.validUntil,
    periodActive: record.validUntil >= now,
    checkedAt: now,
  };
}

export async function hasAccess(
  deps: { ledger: SettlementLedgerRepository; clock: Clock },
  agentId: bigint,
  payer: AccountAddress
): Promise<boolean> {
  const snapshot = await getAccessSnapshot(deps, agentId, payer);
  return snapshot.hasAccess;
}
