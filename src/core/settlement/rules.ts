// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/settlement/rules`
 * Purpose: Business rules for settlement intake: SKU/receipt validation order, fee cap and revenue split.
 * Scope: Pure validation and arithmetic with no side effects. Does not perform I/O or state mutations.
 * Invariants:
 * - Validation order: active → agent match → pricing token → exact amount → payer.
 * - fee = floor(amount * bps / 10000); fee + net === amount.
 * - Fee never exceeds MAX_FEE_BASIS_POINTS (20%).
 * Side-effects: none (pure functions)
 * Links: features/settlement/services/settle
 * @public
 */

import {
  AmountMismatchError,
  InactiveSkuError,
  InvalidFeeError,
  InvalidPayerError,
  SkuMismatchError,
  WrongTokenError,
} from "./errors";
import type {
  AccountAddress,
  PaymentReceipt,
  RevenueSplit,
  Sku,
} from "./model";

export const BASIS_POINTS_DENOMINATOR = 10_000n;

/** Hard cap on the platform fee: 2000 bps = 20% */
export const MAX_FEE_BASIS_POINTS = 2_000;

export const ZERO_ADDRESS: AccountAddress =
  "0x0000000000000000000000000000000000000000";

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

/**
 * Case-insensitive address equality
 */
export function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * True for a well-formed, non-zero 20-byte address
 */
export function isUsableAddress(value: string | null | undefined): boolean {
  if (!value || !ADDRESS_PATTERN.test(value)) return false;
  return !sameAddress(value, ZERO_ADDRESS);
}

/**
 * Checks that a SKU is on offer for an agent and priced in the settlement token.
 * A null SKU (unknown id) is treated as inactive.
 *
 * @throws InactiveSkuError | SkuMismatchError | WrongTokenError
 */
export function assertSkuOffered(
  sku: Sku | null,
  params: { skuId: bigint; agentId: bigint },
  settlementToken: AccountAddress
): Sku {
  if (!sku || !sku.active) {
    throw new InactiveSkuError(params.skuId);
  }
  if (sku.agentId !== params.agentId) {
    throw new SkuMismatchError(params.skuId, sku.agentId, params.agentId);
  }
  if (!sameAddress(sku.pricingToken, settlementToken)) {
    throw new WrongTokenError(params.skuId, sku.pricingToken, settlementToken);
  }
  return sku;
}

/**
 * Validates a receipt against the SKU it names: offer checks, then exact amount, then payer.
 *
 * @throws InactiveSkuError | SkuMismatchError | WrongTokenError | AmountMismatchError | InvalidPayerError
 */
export function assertReceiptMatchesSku(
  receipt: PaymentReceipt,
  sku: Sku | null,
  settlementToken: AccountAddress
): Sku {
  const offered = assertSkuOffered(sku, receipt, settlementToken);
  if (offered.price !== receipt.amount) {
    throw new AmountMismatchError(receipt.skuId, offered.price, receipt.amount);
  }
  if (!isUsableAddress(receipt.payer)) {
    throw new InvalidPayerError(receipt.payer);
  }
  return offered;
}

/**
 * Validates fee basis points against the hard cap
 *
 * @throws InvalidFeeError if not an integer in 0..MAX_FEE_BASIS_POINTS
 */
export function assertValidFeeBasisPoints(feeBasisPoints: number): void {
  if (
    !Number.isInteger(feeBasisPoints) ||
    feeBasisPoints < 0 ||
    feeBasisPoints > MAX_FEE_BASIS_POINTS
  ) {
    throw new InvalidFeeError(feeBasisPoints, MAX_FEE_BASIS_POINTS);
  }
}

/**
 * Splits a settled amount into treasury fee and owner net.
 * Floor rounding on the fee; the remainder always goes to the owner.
 */
export function splitRevenue(
  amount: bigint,
  feeBasisPoints: number
): RevenueSplit {
  if (amount < 0n) {
    throw new RangeError("Amount cannot be negative");
  }
  assertValidFeeBasisPoints(feeBasisPoints);

  const fee = (amount * BigInt(feeBasisPoints)) / BASIS_POINTS_DENOMINATOR;
  return { fee, net: amount - fee };
}
