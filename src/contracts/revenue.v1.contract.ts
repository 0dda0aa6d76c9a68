// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/revenue.v1.contract`
 * Purpose: Contracts for revenue balance reads and signed withdrawals.
 * Scope: GET /v1/revenue/:beneficiary and POST /v1/revenue/withdraw.
 * Invariants: Withdrawal requests carry an EIP-712 signature by the beneficiary over (beneficiary, to, amount, nonce, deadline).
 * Side-effects: none
 * Links: features/settlement/services/withdraw
 * @public
 */

import { z } from "zod";

import {
  addressSchema,
  bytes32Schema,
  hexOutputSchema,
  signatureSchema,
  uintOutputSchema,
  uintStringSchema,
} from "./wire.v1";

export const revenueBalanceOperation = {
  id: "revenue.balance.v1",
  summary: "Read accrued revenue",
  description: "Withdrawable balance of an agent owner or the treasury.",
  input: z.object({ beneficiary: addressSchema }),
  output: z.object({
    beneficiary: hexOutputSchema,
    balance: uintOutputSchema,
  }),
} as const;

export const revenueWithdrawOperation = {
  id: "revenue.withdraw.v1",
  summary: "Withdraw accrued revenue",
  description:
    "Debits the signer's balance and transfers the amount from custody to `to`; the debit is restored if the transfer fails.",
  input: z.object({
    beneficiary: addressSchema,
    to: addressSchema,
    amount: uintStringSchema,
    nonce: bytes32Schema,
    deadline: uintStringSchema,
    signature: signatureSchema,
  }),
  output: z.object({
    beneficiary: hexOutputSchema,
    to: hexOutputSchema,
    amount: uintOutputSchema,
    remainingBalance: uintOutputSchema,
    txHash: hexOutputSchema,
  }),
} as const;

export type RevenueBalanceOutput = z.infer<
  typeof revenueBalanceOperation.output
>;
export type RevenueWithdrawOutput = z.infer<
  typeof revenueWithdrawOperation.output
>;
