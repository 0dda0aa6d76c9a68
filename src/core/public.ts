// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/public`
 * Purpose: Stable core entry point - explicit named exports to control public surface.
 * Scope: Re-exports only approved domain interfaces, prevents accidental creep/cycles. Does not modify or transform exports.
 * Invariants: Named exports only, no export *, controlled public API surface
 * Side-effects: none
 * Notes: Single entry point for all core domain access
 * Links: Used by features, ports and adapters via \@/core alias
 * @public
 */

export type {
  EntitlementGrant,
  EntitlementRecord,
} from "./entitlements/public";
export {
  applyGrant,
  consumeCredit,
  emptyEntitlement,
  grantForSku,
  hasAccess,
} from "./entitlements/public";
export type { RevenueBalance, WithdrawalRequest } from "./revenue/public";
export { assertWithdrawable, isDeadlinePassed } from "./revenue/public";
export type {
  AccountAddress,
  AuthorizationProof,
  FeeConfig,
  FundsPullFailureReason,
  HexString,
  LicenseType,
  PaymentReceipt,
  RevenueSplit,
  SettlementDomainError,
  SettlementErrorCode,
  WithdrawalAuthorizationFailure,
  SettlementRecord,
  Sku,
} from "./settlement/public";
export {
  AmountMismatchError,
  assertReceiptMatchesSku,
  assertSkuOffered,
  assertValidFeeBasisPoints,
  BASIS_POINTS_DENOMINATOR,
  FundsPullError,
  InactiveSkuError,
  InsufficientBalanceError,
  InvalidFeeError,
  InvalidWithdrawalAuthorizationError,
  InvalidPayerError,
  isBytes32Hex,
  isFundsPullError,
  isReplayError,
  isSettlementDomainError,
  isUsableAddress,
  MAX_FEE_BASIS_POINTS,
  NoCreditsError,
  ReplayError,
  SettlementIncompleteError,
  sameAddress,
  SkuMismatchError,
  splitRevenue,
  toUnixSeconds,
  TransferFailedError,
  type TransferOutcome,
  UnauthorizedCallerError,
  UnknownAgentError,
  WrongTokenError,
  ZERO_ADDRESS,
} from "./settlement/public";
