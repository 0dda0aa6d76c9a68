// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/settlement/public`
 * Purpose: Public API for the settlement feature - settle, access, metering, withdrawal and admin services.
 * Scope: Re-exports service functions and their result types. Does not export internals.
 * Invariants: Named exports only.
 * Side-effects: none
 * Links: bootstrap/http/routes
 * @public
 */

export {
  type FeeConfig,
  isSettlementDomainError,
  type SettlementDomainError,
  type SettlementErrorCode,
} from "@/core";
export {
  type AccessSnapshot,
  getAccessSnapshot,
  hasAccess,
} from "./services/access";
export { getFeeConfig, setFeeBasisPoints, setTreasury } from "./services/admin";
export { requireCapability, type SettlementDeps } from "./services/deps";
export { consumeCall } from "./services/metering";
export {
  getAuthorizationState,
  getPaymentStatus,
  type PaymentStatus,
} from "./services/payments";
export {
  resolveAgentOwner,
  type SettleResult,
  settle,
} from "./services/settle";
export { verifySku } from "./services/verifySku";
export {
  getRevenueBalance,
  type WithdrawResult,
  withdraw,
  withdrawWithSignature,
} from "./services/withdraw";
