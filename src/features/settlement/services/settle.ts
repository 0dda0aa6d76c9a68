// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/settlement/services/settle`
 * Purpose: Settle one paid receipt: replay check, SKU validation, burn, funds pull, entitlement grant, revenue split, events.
 * Scope: Feature-layer orchestration over ports; does not expose HTTP handling or retry anything.
 * Invariants:
 * - Validation (replay, SKU, payer, agent owner) runs before any state change.
 * - The payment id is burned before the pull; a pull failure leaves it burned.
 * - Owner is read from the identity registry on every settlement; fee config is read per settlement.
 * - owner net + treasury fee === receipt amount.
 * - Events are published only after applySettlement commits.
 * - Once funds may have moved, any failure publishes settlement.apply_failed with the tx hash and raises SettlementIncompleteError.
 * Side-effects: IO (via ports)
 * Links: core/settlement/rules, ports/settlement-ledger
 * @public
 */

import type {
  AccountAddress,
  AuthorizationProof,
  EntitlementRecord,
  HexString,
  PaymentReceipt,
  SettlementRecord,
} from "@/core";
import {
  assertReceiptMatchesSku,
  FundsPullError,
  grantForSku,
  ReplayError,
  SettlementIncompleteError,
  splitRevenue,
  toUnixSeconds,
  UnknownAgentError,
} from "@/core";
import type { Caller, IdentityRegistry } from "@/ports";
import {
  isAgentNotFoundPortError,
  isAuthorizationRejectedPortError,
  isTransactionUnconfirmedPortError,
} from "@/ports";
import { requireCapability, type SettlementDeps } from "./deps";

export interface SettleResult {
  paymentId: HexString;
  txHash: HexString;
  owner: AccountAddress;
  treasury: AccountAddress;
  fee: bigint;
  net: bigint;
  entitlement: EntitlementRecord;
}

/**
 * Owner lookup with the port error translated into the domain error
 */
export async function resolveAgentOwner(
  identity: IdentityRegistry,
  agentId: bigint
): Promise<AccountAddress> {
  try {
    return await identity.ownerOf(agentId);
  } catch (error) {
    if (isAgentNotFoundPortError(error)) {
      throw new UnknownAgentError(agentId);
    }
    throw error;
  }
}

/**
 * Funds are in custody (or may be) without a settlement record; publish what ties them to the payment
 */
function reportIncomplete(
  deps: Pick<SettlementDeps, "events">,
  receipt: PaymentReceipt,
  txHash: HexString,
  detail: string
): SettlementIncompleteError {
  deps.events.publish({
    type: "settlement.apply_failed",
    paymentId: receipt.paymentId,
    agentId: receipt.agentId,
    payer: receipt.payer,
    amount: receipt.amount,
    txHash,
    detail,
  });
  return new SettlementIncompleteError(receipt.paymentId, txHash, detail);
}

/**
 * @throws UnauthorizedCallerError | ReplayError | InactiveSkuError | SkuMismatchError | WrongTokenError
 *   | AmountMismatchError | InvalidPayerError | UnknownAgentError | FundsPullError | SettlementIncompleteError
 */
export async function settle(
  deps: SettlementDeps,
  caller: Caller,
  receipt: PaymentReceipt,
  proof: AuthorizationProof
): Promise<SettleResult> {
  requireCapability(deps.accessPolicy, caller, "settle");

  // 1. Replay guard (read)
  if (await deps.ledger.isPaymentConsumed(receipt.paymentId)) {
    throw new ReplayError(receipt.paymentId);
  }

  // 2. Validation, no state change
  const sku = assertReceiptMatchesSku(
    receipt,
    await deps.skus.getSku(receipt.skuId),
    deps.token.tokenAddress
  );
  const owner = await resolveAgentOwner(deps.identity, receipt.agentId);
  const feeConfig = await deps.ledger.getFeeConfig(deps.feeDefaults);

  // 3. Burn; a concurrent settlement of the same id loses here
  const burned = await deps.ledger.consumePaymentId(
    receipt.paymentId,
    new Date(deps.clock.now())
  );
  if (!burned) {
    throw new ReplayError(receipt.paymentId);
  }

  // 4. Pull funds into custody
  let txHash: HexString;
  try {
    ({ txHash } = await deps.token.pullWithAuthorization({
      from: receipt.payer,
      to: deps.token.custodyAddress,
      amount: receipt.amount,
      proof,
    }));
  } catch (error) {
    if (isAuthorizationRejectedPortError(error)) {
      throw new FundsPullError(receipt.paymentId, error.reason, error.detail);
    }
    if (isTransactionUnconfirmedPortError(error)) {
      throw reportIncomplete(deps, receipt, error.txHash, error.detail);
    }
    throw error;
  }

  // 5-7. Grant + split + credit, one commit
  const settledAtIso = deps.clock.now();
  const grant = grantForSku(sku, toUnixSeconds(settledAtIso));
  const { fee, net } = splitRevenue(receipt.amount, feeConfig.feeBasisPoints);

  const settlement: SettlementRecord = {
    paymentId: receipt.paymentId,
    skuId: receipt.skuId,
    agentId: receipt.agentId,
    payer: receipt.payer,
    amount: receipt.amount,
    licenseType: sku.licenseType,
    owner,
    treasury: feeConfig.treasuryAddress,
    fee,
    net,
    settledAt: new Date(settledAtIso),
  };
  let entitlement: EntitlementRecord;
  try {
    entitlement = await deps.ledger.applySettlement({ settlement, grant });
  } catch (error) {
    throw reportIncomplete(
      deps,
      receipt,
      txHash,
      error instanceof Error ? error.message : String(error)
    );
  }

  // 8. Events
  deps.events.publish({
    type: "settlement.receipt_anchored",
    paymentId: receipt.paymentId,
    skuId: receipt.skuId,
    agentId: receipt.agentId,
    payer: receipt.payer,
    amount: receipt.amount,
    txHash,
  });
  deps.events.publish({
    type: "settlement.entitlement_granted",
    paymentId: receipt.paymentId,
    agentId: receipt.agentId,
    payer: receipt.payer,
    licenseType: sku.licenseType,
    callCredits: entitlement.callCredits,
    validUntil: entitlement.validUntil,
  });
  deps.events.publish({
    type: "settlement.revenue_accrued",
    paymentId: receipt.paymentId,
    owner,
    net,
    treasury: feeConfig.treasuryAddress,
    fee,
  });

  return {
    paymentId: receipt.paymentId,
    txHash,
    owner,
    treasury: feeConfig.treasuryAddress,
    fee,
    net,
    entitlement,
  };
}
