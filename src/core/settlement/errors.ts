// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/settlement/errors`
 * Purpose: Domain errors for settlement, metering, withdrawal and fee administration.
 * Scope: Pure error types with no infrastructure dependencies. Does not map to HTTP status codes.
 * Invariants: Every error carries a readonly `code` discriminant; all are terminal for the call that raised them.
 * Side-effects: none (error definitions only)
 * Notes: Adapters throw port-level errors; feature services translate them into these.
 *        The HTTP layer maps `code` to a status in bootstrap/http/errorMapping.
 * Links: features/settlement/services, bootstrap/http/errorMapping
 * @public
 */

import type { HexString } from "./model";

/**
 * Payment id already consumed. Permanent: retrying with the same id never succeeds.
 */
export class ReplayError extends Error {
  public readonly code = "REPLAY" as const;

  constructor(public readonly paymentId: HexString) {
    super(`Payment ${paymentId} has already been consumed`);
    this.name = "ReplayError";
  }
}

export class InactiveSkuError extends Error {
  public readonly code = "SKU_INACTIVE" as const;

  constructor(public readonly skuId: bigint) {
    super(`SKU ${skuId} is not active`);
    this.name = "InactiveSkuError";
  }
}

export class SkuMismatchError extends Error {
  public readonly code = "SKU_AGENT_MISMATCH" as const;

  constructor(
    public readonly skuId: bigint,
    /** Agent the SKU belongs to */
    public readonly skuAgentId: bigint,
    /** Agent named on the receipt */
    public readonly receiptAgentId: bigint
  ) {
    super(
      `SKU ${skuId} belongs to agent ${skuAgentId}, receipt names agent ${receiptAgentId}`
    );
    this.name = "SkuMismatchError";
  }
}

export class WrongTokenError extends Error {
  public readonly code = "WRONG_TOKEN" as const;

  constructor(
    public readonly skuId: bigint,
    public readonly pricingToken: string,
    public readonly settlementToken: string
  ) {
    super(
      `SKU ${skuId} is priced in ${pricingToken}, settlement token is ${settlementToken}`
    );
    this.name = "WrongTokenError";
  }
}

/**
 * Receipt amount differs from the SKU price. Partial payment and overpayment are both rejected.
 */
export class AmountMismatchError extends Error {
  public readonly code = "AMOUNT_MISMATCH" as const;

  constructor(
    public readonly skuId: bigint,
    public readonly price: bigint,
    public readonly amount: bigint
  ) {
    super(`SKU ${skuId} costs ${price}, receipt carries ${amount}`);
    this.name = "AmountMismatchError";
  }
}

export class InvalidPayerError extends Error {
  public readonly code = "INVALID_PAYER" as const;

  constructor(public readonly payer: string) {
    super(`Invalid payer: ${payer || "<empty>"}`);
    this.name = "InvalidPayerError";
  }
}

export class UnknownAgentError extends Error {
  public readonly code = "UNKNOWN_AGENT" as const;

  constructor(public readonly agentId: bigint) {
    super(`Agent ${agentId} is not registered`);
    this.name = "UnknownAgentError";
  }
}

/**
 * Reasons reported by the token authorization primitive.
 */
export type FundsPullFailureReason =
  | "NOT_YET_VALID"
  | "EXPIRED"
  | "NONCE_USED"
  | "INVALID_SIGNATURE"
  | "INSUFFICIENT_FUNDS"
  | "REVERTED";

/**
 * Funds pull rejected by the token layer.
 * The paymentId is burned by the time this is raised; a retry needs a fresh paymentId and nonce.
 */
export class FundsPullError extends Error {
  public readonly code = "FUNDS_PULL_FAILED" as const;

  constructor(
    public readonly paymentId: HexString,
    public readonly reason: FundsPullFailureReason,
    detail: string
  ) {
    super(`Funds pull for payment ${paymentId} failed (${reason}): ${detail}`);
    this.name = "FundsPullError";
  }
}

export class NoCreditsError extends Error {
  public readonly code = "NO_CREDITS" as const;

  constructor(
    public readonly agentId: bigint,
    public readonly payer: string
  ) {
    super(`Payer ${payer} has no call credits for agent ${agentId}`);
    this.name = "NoCreditsError";
  }
}

export class InsufficientBalanceError extends Error {
  public readonly code = "INSUFFICIENT_BALANCE" as const;

  constructor(
    public readonly beneficiary: string,
    public readonly requested: bigint,
    public readonly available: bigint
  ) {
    super(
      `Beneficiary ${beneficiary} requested ${requested}, available ${available}`
    );
    this.name = "InsufficientBalanceError";
  }
}

export interface TransferOutcome {
  /** The debit was credited back; nothing left custody */
  balanceRestored: boolean;
  /** Hash of a broadcast transaction whose receipt was never confirmed */
  pendingTxHash: HexString | null;
}

/**
 * Outbound transfer failed. When the token rejected it outright the debit is restored;
 * when the outcome is unknown the debit stands and `pendingTxHash` names the transaction to reconcile.
 */
export class TransferFailedError extends Error {
  public readonly code = "TRANSFER_FAILED" as const;
  public readonly balanceRestored: boolean;
  public readonly pendingTxHash: HexString | null;

  constructor(
    public readonly to: string,
    public readonly amount: bigint,
    detail: string,
    outcome: TransferOutcome
  ) {
    super(`Transfer of ${amount} to ${to} failed: ${detail}`);
    this.name = "TransferFailedError";
    this.balanceRestored = outcome.balanceRestored;
    this.pendingTxHash = outcome.pendingTxHash;
  }
}

export class InvalidFeeError extends Error {
  public readonly code = "INVALID_FEE" as const;

  constructor(
    public readonly feeBasisPoints: number,
    public readonly maxBasisPoints: number
  ) {
    super(
      `Fee of ${feeBasisPoints} basis points is outside 0..${maxBasisPoints}`
    );
    this.name = "InvalidFeeError";
  }
}

/**
 * Funds reached custody (or may have) but the settlement was not recorded.
 * The payment id stays burned; `txHash` ties the pulled funds to the payment for reconciliation.
 */
export class SettlementIncompleteError extends Error {
  public readonly code = "SETTLEMENT_INCOMPLETE" as const;

  constructor(
    public readonly paymentId: HexString,
    public readonly txHash: HexString,
    detail: string
  ) {
    super(
      `Payment ${paymentId} pulled in ${txHash} but not recorded: ${detail}`
    );
    this.name = "SettlementIncompleteError";
  }
}

export type WithdrawalAuthorizationFailure =
  | "BAD_SIGNATURE"
  | "DEADLINE_PASSED"
  | "NONCE_USED";

/**
 * Signed withdrawal rejected before any balance was touched.
 */
export class InvalidWithdrawalAuthorizationError extends Error {
  public readonly code = "INVALID_WITHDRAWAL_AUTHORIZATION" as const;

  constructor(
    public readonly beneficiary: string,
    public readonly reason: WithdrawalAuthorizationFailure
  ) {
    super(`Withdrawal authorization for ${beneficiary} rejected: ${reason}`);
    this.name = "InvalidWithdrawalAuthorizationError";
  }
}

export class UnauthorizedCallerError extends Error {
  public readonly code = "UNAUTHORIZED" as const;

  constructor(
    public readonly caller: string,
    public readonly capability: string
  ) {
    super(`Caller ${caller} lacks capability ${capability}`);
    this.name = "UnauthorizedCallerError";
  }
}

export type SettlementDomainError =
  | ReplayError
  | InactiveSkuError
  | SkuMismatchError
  | WrongTokenError
  | AmountMismatchError
  | InvalidPayerError
  | UnknownAgentError
  | FundsPullError
  | SettlementIncompleteError
  | NoCreditsError
  | InsufficientBalanceError
  | TransferFailedError
  | InvalidFeeError
  | InvalidWithdrawalAuthorizationError
  | UnauthorizedCallerError;

export type SettlementErrorCode = SettlementDomainError["code"];

const SETTLEMENT_ERROR_NAMES: ReadonlySet<string> = new Set([
  "ReplayError",
  "InactiveSkuError",
  "SkuMismatchError",
  "WrongTokenError",
  "AmountMismatchError",
  "InvalidPayerError",
  "UnknownAgentError",
  "FundsPullError",
  "SettlementIncompleteError",
  "NoCreditsError",
  "InsufficientBalanceError",
  "TransferFailedError",
  "InvalidFeeError",
  "InvalidWithdrawalAuthorizationError",
  "UnauthorizedCallerError",
]);

/**
 * Type guard for any settlement domain error
 */
export function isSettlementDomainError(
  error: unknown
): error is SettlementDomainError {
  return (
    error instanceof Error &&
    SETTLEMENT_ERROR_NAMES.has(error.name) &&
    "code" in error
  );
}

/**
 * Type guard to check if error is ReplayError
 */
export function isReplayError(error: unknown): error is ReplayError {
  return isSettlementDomainError(error) && error.code === "REPLAY";
}

/**
 * Type guard to check if error is FundsPullError
 */
export function isFundsPullError(error: unknown): error is FundsPullError {
  return isSettlementDomainError(error) && error.code === "FUNDS_PULL_FAILED";
}
