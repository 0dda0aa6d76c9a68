// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/entitlements/public`
 * Purpose: Public API for the entitlement domain.
 * Scope: Barrel export. Does not expose internals.
 * Invariants: Named exports only.
 * Side-effects: none (re-exports only)
 * Links: Imported via core/public
 * @public
 */

export type { EntitlementGrant, EntitlementRecord } from "./model";
export {
  applyGrant,
  consumeCredit,
  emptyEntitlement,
  grantForSku,
  hasAccess,
} from "./rules";
