// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/settlement-token`
 * Purpose: Settlement token port: authorization-based pulls into custody and outbound transfers from custody.
 * Scope: Wraps the EIP-3009 primitive and plain transfers. Does not verify payer intents or retry.
 * Invariants:
 * - The token enforces its own nonce replay protection and validity window.
 * - Rejections surface as port errors carrying a reason; nothing is retried here.
 * - A broadcast transaction whose receipt cannot be read surfaces as TransactionUnconfirmedPortError, never as a rejection.
 * Side-effects: none (interface definition only)
 * Links: ViemUsdcTokenAdapter, FakeUsdcTokenAdapter
 * @public
 */

import type {
  AccountAddress,
  AuthorizationProof,
  FundsPullFailureReason,
  HexString,
} from "@/core";

export type { FundsPullFailureReason } from "@/core";

/**
 * Port-level error thrown when transferWithAuthorization is rejected
 */
export class AuthorizationRejectedPortError extends Error {
  constructor(
    public readonly reason: FundsPullFailureReason,
    public readonly detail: string
  ) {
    super(`Authorization rejected (${reason}): ${detail}`);
    this.name = "AuthorizationRejectedPortError";
  }
}

export function isAuthorizationRejectedPortError(
  error: unknown
): error is AuthorizationRejectedPortError {
  return (
    error instanceof Error && error.name === "AuthorizationRejectedPortError"
  );
}

/**
 * Port-level error thrown when an outbound transfer fails or reverts
 */
export class TransferRejectedPortError extends Error {
  constructor(
    public readonly to: string,
    public readonly detail: string
  ) {
    super(`Transfer to ${to} rejected: ${detail}`);
    this.name = "TransferRejectedPortError";
  }
}

export function isTransferRejectedPortError(
  error: unknown
): error is TransferRejectedPortError {
  return error instanceof Error && error.name === "TransferRejectedPortError";
}

/**
 * Port-level error thrown when a transaction was broadcast but its receipt could not be read.
 * Funds may have moved; callers must not treat this as a rejection.
 */
export class TransactionUnconfirmedPortError extends Error {
  constructor(
    public readonly txHash: HexString,
    public readonly detail: string
  ) {
    super(`Transaction ${txHash} unconfirmed: ${detail}`);
    this.name = "TransactionUnconfirmedPortError";
  }
}

export function isTransactionUnconfirmedPortError(
  error: unknown
): error is TransactionUnconfirmedPortError {
  return (
    error instanceof Error && error.name === "TransactionUnconfirmedPortError"
  );
}

export interface PullWithAuthorizationParams {
  from: AccountAddress;
  to: AccountAddress;
  amount: bigint;
  proof: AuthorizationProof;
}

export interface TokenTransferResult {
  txHash: HexString;
}

export interface SettlementToken {
  /** Token contract address; SKUs must be priced in it */
  readonly tokenAddress: AccountAddress;
  /** Engine custody address that receives pulled funds and funds withdrawals */
  readonly custodyAddress: AccountAddress;

  /** @throws AuthorizationRejectedPortError | TransactionUnconfirmedPortError */
  pullWithAuthorization(
    params: PullWithAuthorizationParams
  ): Promise<TokenTransferResult>;

  isAuthorizationUsed(
    authorizer: AccountAddress,
    nonce: HexString
  ): Promise<boolean>;

  /** @throws TransferRejectedPortError | TransactionUnconfirmedPortError */
  transfer(to: AccountAddress, amount: bigint): Promise<TokenTransferResult>;
}
