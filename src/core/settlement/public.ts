// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/settlement/public`
 * Purpose: Public API for the settlement domain.
 * Scope: Barrel export for settlement core. Does not expose internal implementation details.
 * Invariants: Only exports stable public interfaces and functions.
 * Side-effects: none (re-exports only)
 * Notes: Entry point for other layers importing settlement logic.
 * Links: Imported by ports, features, and adapters via core/public
 * @public
 */

// Errors
export {
  AmountMismatchError,
  FundsPullError,
  type FundsPullFailureReason,
  InactiveSkuError,
  InsufficientBalanceError,
  InvalidFeeError,
  InvalidWithdrawalAuthorizationError,
  InvalidPayerError,
  isFundsPullError,
  isReplayError,
  isSettlementDomainError,
  NoCreditsError,
  ReplayError,
  SettlementIncompleteError,
  type SettlementDomainError,
  type SettlementErrorCode,
  type WithdrawalAuthorizationFailure,
  SkuMismatchError,
  TransferFailedError,
  type TransferOutcome,
  UnauthorizedCallerError,
  UnknownAgentError,
  WrongTokenError,
} from "./errors";
// Model types
export type {
  AccountAddress,
  AuthorizationProof,
  FeeConfig,
  HexString,
  LicenseType,
  PaymentReceipt,
  RevenueSplit,
  SettlementRecord,
  Sku,
} from "./model";

// Rules and validation
export {
  assertReceiptMatchesSku,
  assertSkuOffered,
  assertValidFeeBasisPoints,
  BASIS_POINTS_DENOMINATOR,
  isUsableAddress,
  MAX_FEE_BASIS_POINTS,
  sameAddress,
  splitRevenue,
  ZERO_ADDRESS,
} from "./rules";

// Utilities
export { isBytes32Hex, toUnixSeconds } from "./util";
