// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/presenters`
 * Purpose: Render service results into v1 wire shapes.
 * Scope: bigint → decimal string, Date → ISO-8601. No validation (routes parse with the output schema).
 * Side-effects: none
 * @public
 */

import type { AccessReadOutput } from "@/contracts/access.read.v1.contract";
import type { FeeConfigOutput } from "@/contracts/admin.fee-config.v1.contract";
import type { PaymentStatusOutput } from "@/contracts/payments.status.v1.contract";
import type { RevenueWithdrawOutput } from "@/contracts/revenue.v1.contract";
import type { SettleOutput } from "@/contracts/settlement.settle.v1.contract";
import type {
  AccessSnapshot,
  FeeConfig,
  PaymentStatus,
  SettleResult,
  WithdrawResult,
} from "@/features/settlement/public";

export function presentSettlement(result: SettleResult): SettleOutput {
  return {
    paymentId: result.paymentId,
    txHash: result.txHash,
    owner: result.owner,
    treasury: result.treasury,
    fee: result.fee.toString(),
    net: result.net.toString(),
    entitlement: {
      callCredits: result.entitlement.callCredits.toString(),
      validUntil: result.entitlement.validUntil.toString(),
    },
  };
}

export function presentAccess(snapshot: AccessSnapshot): AccessReadOutput {
  return {
    agentId: snapshot.agentId.toString(),
    payer: snapshot.payer,
    hasAccess: snapshot.hasAccess,
    callCredits: snapshot.callCredits.toString(),
    validUntil: snapshot.validUntil.toString(),
    periodActive: snapshot.periodActive,
    checkedAt: snapshot.checkedAt.toString(),
  };
}

export function presentWithdrawal(
  result: WithdrawResult
): RevenueWithdrawOutput {
  return {
    beneficiary: result.beneficiary,
    to: result.to,
    amount: result.amount.toString(),
    remainingBalance: result.remainingBalance.toString(),
    txHash: result.txHash,
  };
}

export function presentFeeConfig(config: FeeConfig): FeeConfigOutput {
  return {
    feeBasisPoints: config.feeBasisPoints,
    treasuryAddress: config.treasuryAddress,
  };
}

export function presentPaymentStatus(
  status: PaymentStatus
): PaymentStatusOutput {
  const { settlement } = status;
  return {
    paymentId: status.paymentId,
    consumed: status.consumed,
    settlement: settlement
      ? {
          paymentId: settlement.paymentId,
          skuId: settlement.skuId.toString(),
          agentId: settlement.agentId.toString(),
          payer: settlement.payer,
          amount: settlement.amount.toString(),
          licenseType: settlement.licenseType,
          owner: settlement.owner,
          treasury: settlement.treasury,
          fee: settlement.fee.toString(),
          net: settlement.net.toString(),
          settledAt: settlement.settledAt.toISOString(),
        }
      : null,
  };
}
