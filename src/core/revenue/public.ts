// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/revenue/public`
 * Purpose: Public API for the revenue domain.
 * Scope: Barrel export. Does not expose internals.
 * Invariants: Named exports only.
 * Side-effects: none (re-exports only)
 * Links: Imported via core/public
 * @public
 */

export type { RevenueBalance, WithdrawalRequest } from "./model";
export { assertWithdrawable, isDeadlinePassed } from "./rules";
