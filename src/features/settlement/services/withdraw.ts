// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/settlement/services/withdraw`
 * Purpose: Pay out accrued revenue from custody to a destination of the beneficiary's choosing.
 * Scope: Balance debit, outbound transfer and restore-on-failure. Signed variant verifies the EIP-712 request first.
 * Invariants:
 * - Only the caller's own balance is debited; `to` is the destination only.
 * - Debit happens before transfer; a transfer the token rejected credits the amount back.
 * - A transfer with an unknown outcome keeps the debit and publishes revenue.withdrawal_unconfirmed.
 * - A balance never goes negative (conditional debit).
 * - Signed requests: signature, then deadline, then write-once nonce.
 * Side-effects: IO (ledger, token transfer, event sink)
 * Links: core/revenue/rules, ports/withdrawal-authorizer
 * @public
 */

import type { AccountAddress, HexString, WithdrawalRequest } from "@/core";
import {
  assertWithdrawable,
  InsufficientBalanceError,
  InvalidWithdrawalAuthorizationError,
  isDeadlinePassed,
  toUnixSeconds,
  TransferFailedError,
  UnauthorizedCallerError,
} from "@/core";
import {
  type Caller,
  describeCaller,
  isTransactionUnconfirmedPortError,
  isTransferRejectedPortError,
} from "@/ports";
import { requireCapability, type SettlementDeps } from "./deps";

export interface WithdrawResult {
  beneficiary: AccountAddress;
  to: AccountAddress;
  amount: bigint;
  remainingBalance: bigint;
  txHash: HexString;
}

type WithdrawDeps = Pick<
  SettlementDeps,
  "ledger" | "token" | "events" | "accessPolicy"
>;

export async function getRevenueBalance(
  deps: Pick<SettlementDeps, "ledger">,
  beneficiary: AccountAddress
): Promise<{ beneficiary: AccountAddress; balance: bigint }> {
  return { beneficiary, balance: await deps.ledger.getBalance(beneficiary) };
}

async function payOut(
  deps: WithdrawDeps,
  beneficiary: AccountAddress,
  to: AccountAddress,
  amount: bigint
): Promise<WithdrawResult> {
  assertWithdrawable(
    beneficiary,
    amount,
    await deps.ledger.getBalance(beneficiary)
  );

  const remainingBalance = await deps.ledger.debitBalance(beneficiary, amount);
  if (remainingBalance === null) {
    // Lost a race with another withdrawal
    throw new InsufficientBalanceError(
      beneficiary,
      amount,
      await deps.ledger.getBalance(beneficiary)
    );
  }

  let txHash: HexString;
  try {
    ({ txHash } = await deps.token.transfer(to, amount));
  } catch (error) {
    if (isTransferRejectedPortError(error)) {
      await deps.ledger.creditBalance(beneficiary, amount);
      throw new TransferFailedError(to, amount, error.detail, {
        balanceRestored: true,
        pendingTxHash: null,
      });
    }

    // Outcome unknown: the transfer may have landed, so the debit stands
    let pendingTxHash: HexString | null = null;
    let detail = error instanceof Error ? error.message : String(error);
    if (isTransactionUnconfirmedPortError(error)) {
      pendingTxHash = error.txHash;
      detail = error.detail;
    }
    deps.events.publish({
      type: "revenue.withdrawal_unconfirmed",
      beneficiary,
      to,
      amount,
      pendingTxHash,
      detail,
    });
    throw new TransferFailedError(to, amount, detail, {
      balanceRestored: false,
      pendingTxHash,
    });
  }

  deps.events.publish({
    type: "revenue.withdrawn",
    beneficiary,
    to,
    amount,
    txHash,
  });
  return { beneficiary, to, amount, remainingBalance, txHash };
}

/**
 * Withdraws from the authenticated beneficiary's own balance.
 *
 * @throws UnauthorizedCallerError | InsufficientBalanceError | TransferFailedError
 */
export async function withdraw(
  deps: WithdrawDeps,
  caller: Caller,
  to: AccountAddress,
  amount: bigint
): Promise<WithdrawResult> {
  requireCapability(deps.accessPolicy, caller, "withdraw");
  if (caller.kind !== "beneficiary") {
    // Only a beneficiary has a balance to debit
    throw new UnauthorizedCallerError(describeCaller(caller), "withdraw");
  }
  return payOut(deps, caller.address, to, amount);
}

/**
 * Withdraws against an EIP-712 signed request; the signature identifies the beneficiary.
 *
 * @throws InvalidWithdrawalAuthorizationError | InsufficientBalanceError | TransferFailedError
 */
export async function withdrawWithSignature(
  deps: WithdrawDeps &
    Pick<SettlementDeps, "withdrawalAuthorizer" | "clock">,
  request: WithdrawalRequest,
  signature: HexString
): Promise<WithdrawResult> {
  const { beneficiary } = request;

  if (
    !(await deps.withdrawalAuthorizer.isSignedByBeneficiary(request, signature))
  ) {
    throw new InvalidWithdrawalAuthorizationError(beneficiary, "BAD_SIGNATURE");
  }
  if (isDeadlinePassed(request.deadline, toUnixSeconds(deps.clock.now()))) {
    throw new InvalidWithdrawalAuthorizationError(
      beneficiary,
      "DEADLINE_PASSED"
    );
  }
  if (!(await deps.ledger.consumeWithdrawalNonce(beneficiary, request.nonce))) {
    throw new InvalidWithdrawalAuthorizationError(beneficiary, "NONCE_USED");
  }

  return withdraw(
    deps,
    { kind: "beneficiary", address: beneficiary },
    request.to,
    request.amount
  );
}
