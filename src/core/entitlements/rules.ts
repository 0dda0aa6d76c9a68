// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/entitlements/rules`
 * Purpose: Pure entitlement arithmetic: grant application, access check and credit consumption.
 * Scope: Operates on EntitlementRecord values. Does not persist; adapters mirror these rules in SQL.
 * Invariants:
 * - Period grants stack: validUntil' = max(validUntil, now) + periodSeconds.
 * - Access iff callCredits > 0 or validUntil >= now.
 * - Consuming a call never takes callCredits below zero.
 * Side-effects: none (pure functions)
 * Links: adapters/test/settlement/in-memory-ledger.adapter, adapters/server/settlement/drizzle-ledger.adapter
 * @public
 */

import type { AccountAddress, LicenseType, Sku } from "../settlement/model";
import type { EntitlementGrant, EntitlementRecord } from "./model";

export function emptyEntitlement(
  agentId: bigint,
  payer: AccountAddress
): EntitlementRecord {
  return { agentId, payer, callCredits: 0n, validUntil: 0n };
}

/**
 * Derives the grant for one settled SKU at `now` (unix seconds)
 */
export function grantForSku(sku: Sku, now: bigint): EntitlementGrant {
  const kinds: Record<LicenseType, () => EntitlementGrant> = {
    PER_CALL: () => ({ kind: "call" }),
    PER_PERIOD: () => ({
      kind: "period",
      periodSeconds: sku.periodSeconds,
      now,
    }),
  };
  return kinds[sku.licenseType]();
}

export function applyGrant(
  record: EntitlementRecord,
  grant: EntitlementGrant
): EntitlementRecord {
  if (grant.kind === "call") {
    return { ...record, callCredits: record.callCredits + 1n };
  }
  const base = record.validUntil > grant.now ? record.validUntil : grant.now;
  return { ...record, validUntil: base + grant.periodSeconds };
}

export function hasAccess(record: EntitlementRecord, now: bigint): boolean {
  return record.callCredits > 0n || record.validUntil >= now;
}

/**
 * Returns the record with one credit removed, or null when there is none to remove
 */
export function consumeCredit(
  record: EntitlementRecord
): EntitlementRecord | null {
  if (record.callCredits <= 0n) return null;
  return { ...record, callCredits: record.callCredits - 1n };
}
