// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/revenue/rules`
 * Purpose: Withdrawal admission rules.
 * Scope: Pure checks against a known balance. Does not debit; the repository debit is the atomic gate.
 * Invariants: 0 < amount <= balance, otherwise InsufficientBalanceError.
 * Side-effects: none
 * Links: features/settlement/services/withdraw
 * @public
 */

import { InsufficientBalanceError } from "../settlement/errors";

/**
 * @throws InsufficientBalanceError when amount is not positive or exceeds balance
 */
export function assertWithdrawable(
  beneficiary: string,
  amount: bigint,
  balance: bigint
): void {
  if (amount <= 0n || amount > balance) {
    throw new InsufficientBalanceError(beneficiary, amount, balance);
  }
}

export function isDeadlinePassed(deadline: bigint, now: bigint): boolean {
  return now > deadline;
}
