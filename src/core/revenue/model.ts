// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/revenue/model`
 * Purpose: Revenue balance and withdrawal request types.
 * Scope: Type definitions only. Does not perform I/O.
 * Invariants: Balances are unsigned accumulators, never negative.
 * Side-effects: none
 * Links: core/revenue/rules, features/settlement/services/withdraw
 * @public
 */

import type { AccountAddress, HexString } from "../settlement/model";

export interface RevenueBalance {
  beneficiary: AccountAddress;
  balance: bigint;
}

/**
 * Withdrawal as signed by the beneficiary (EIP-712 `Withdrawal`).
 * nonce is write-once; deadline is unix seconds.
 */
export interface WithdrawalRequest {
  beneficiary: AccountAddress;
  to: AccountAddress;
  amount: bigint;
  nonce: HexString;
  deadline: bigint;
}
