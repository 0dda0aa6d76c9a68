// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/settlement-ledger`
 * Purpose: Repository port over the replay guard, entitlement ledger, revenue ledger and fee configuration.
 * Scope: Defines persistence contracts used by settlement, metering, withdrawal and admin services. Does not implement persistence logic.
 * Invariants:
 * - consumePaymentId is insert-if-absent on a unique key; of two concurrent calls for one id exactly one returns true.
 * - applySettlement commits the entitlement grant, both revenue credits and the settlement row in one transaction.
 * - consumeCallCredit and debitBalance are conditional single-statement updates; they never go below zero.
 * - Entitlement records and balances are never deleted.
 * Side-effects: none (interface definition only)
 * Links: DrizzleSettlementLedgerAdapter, InMemorySettlementLedgerAdapter
 * @public
 */

import type {
  AccountAddress,
  EntitlementGrant,
  EntitlementRecord,
  FeeConfig,
  HexString,
  SettlementRecord,
} from "@/core";

export interface ApplySettlementParams {
  settlement: SettlementRecord;
  grant: EntitlementGrant;
}

export interface SettlementLedgerRepository {
  isPaymentConsumed(paymentId: HexString): Promise<boolean>;

  /**
   * Burns a payment id.
   * @returns true if this call inserted it, false if it was already consumed
   */
  consumePaymentId(paymentId: HexString, consumedAt: Date): Promise<boolean>;

  /**
   * Applies grant + owner net credit + treasury fee credit + settlement row atomically
   * @returns Entitlement record after the grant
   */
  applySettlement(params: ApplySettlementParams): Promise<EntitlementRecord>;

  findSettlement(paymentId: HexString): Promise<SettlementRecord | null>;

  /** Returns an empty record (0 credits, validUntil 0) when none exists */
  getEntitlement(
    agentId: bigint,
    payer: AccountAddress
  ): Promise<EntitlementRecord>;

  /**
   * Decrements callCredits by one when positive
   * @returns Updated record, or null if there were no credits (nothing mutated)
   */
  consumeCallCredit(
    agentId: bigint,
    payer: AccountAddress
  ): Promise<EntitlementRecord | null>;

  getBalance(beneficiary: AccountAddress): Promise<bigint>;

  /**
   * Debits when balance >= amount
   * @returns New balance, or null if insufficient (nothing mutated)
   */
  debitBalance(
    beneficiary: AccountAddress,
    amount: bigint
  ): Promise<bigint | null>;

  /** @returns New balance */
  creditBalance(beneficiary: AccountAddress, amount: bigint): Promise<bigint>;

  /**
   * Reads the fee config, seeding it with `defaults` on first read
   */
  getFeeConfig(defaults: FeeConfig): Promise<FeeConfig>;

  /**
   * Updates the given fields, seeding the remaining ones from `defaults` if no row exists
   * @returns Stored config after the update
   */
  updateFeeConfig(
    patch: Partial<FeeConfig>,
    defaults: FeeConfig
  ): Promise<FeeConfig>;

  /**
   * Burns a withdrawal nonce for a beneficiary.
   * @returns true if newly consumed, false if already used
   */
  consumeWithdrawalNonce(
    beneficiary: AccountAddress,
    nonce: HexString
  ): Promise<boolean>;
}
