// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/settlement/services/payments`
 * Purpose: Payment id and token authorization status queries.
 * Scope: Read-only lookups so facilitators can tell a consumed id or burned nonce from a transient failure.
 * Invariants: A consumed id without a settlement row means the pull or ledger write failed after the burn.
 * Side-effects: IO (ledger and token reads)
 * @public
 */

import type { AccountAddress, HexString, SettlementRecord } from "@/core";
import type { SettlementLedgerRepository, SettlementToken } from "@/ports";

export interface PaymentStatus {
  paymentId: HexString;
  consumed: boolean;
  settlement: SettlementRecord | null;
}

export async function getPaymentStatus(
  ledger: SettlementLedgerRepository,
  paymentId: HexString
): Promise<PaymentStatus> {
  const [consumed, settlement] = await Promise.all([
    ledger.isPaymentConsumed(paymentId),
    ledger.findSettlement(paymentId),
  ]);
  return { paymentId, consumed, settlement };
}

export async function getAuthorizationState(
  token: SettlementToken,
  payer: AccountAddress,
  nonce: HexString
): Promise<{ payer: AccountAddress; nonce: HexString; used: boolean }> {
  return { payer, nonce, used: await token.isAuthorizationUsed(payer, nonce) };
}
