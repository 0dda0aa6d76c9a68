// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/payer/services/paymentIntent`
 * Purpose: Build a complete payment intent (receipt + signed authorization) for one SKU purchase.
 * Scope: Pre-verifies the SKU, prices the receipt at the SKU price and signs the USDC authorization to custody.
 * Invariants:
 * - amount === sku.price, so a verified intent never trips AMOUNT_MISMATCH.
 * - validAfter sits AUTHORIZATION_SKEW_SECONDS in the past to tolerate clock drift.
 * Side-effects: IO (SKU registry read)
 * Links: features/settlement/services/verifySku, features/payer/api/facilitatorClient
 * @public
 */

import type { LocalAccount } from "viem";

import type {
  AccountAddress,
  AuthorizationProof,
  HexString,
  PaymentReceipt,
} from "@/core";
import { verifySku } from "@/features/settlement/public";
import type { SkuRegistry } from "@/ports";
import { normalizePaymentId } from "@/shared/web3";

import { buildUsdcAuthorization, randomBytes32 } from "./authorization";

export const AUTHORIZATION_SKEW_SECONDS = 60n;
export const DEFAULT_AUTHORIZATION_TTL_SECONDS = 3_600n;

export interface PaymentIntent {
  receipt: PaymentReceipt;
  proof: AuthorizationProof;
}

export interface BuildPaymentIntentParams {
  skus: SkuRegistry;
  account: LocalAccount;
  chainId: number;
  tokenAddress: AccountAddress;
  custodyAddress: AccountAddress;
  skuId: bigint;
  agentId: bigint;
  /** Unix seconds */
  now: bigint;
  /** Caller-chosen id; hashed to bytes32 when not already one. Random when omitted. */
  paymentId?: string;
  nonce?: HexString;
  ttlSeconds?: bigint;
}

/**
 * @throws InactiveSkuError | SkuMismatchError | WrongTokenError
 */
export async function buildPaymentIntent(
  params: BuildPaymentIntentParams
): Promise<PaymentIntent> {
  const sku = await verifySku(
    params.skus,
    { skuId: params.skuId, agentId: params.agentId },
    params.tokenAddress
  );

  const ttl = params.ttlSeconds ?? DEFAULT_AUTHORIZATION_TTL_SECONDS;
  const signed = await buildUsdcAuthorization({
    account: params.account,
    chainId: params.chainId,
    tokenAddress: params.tokenAddress,
    to: params.custodyAddress,
    value: sku.price,
    validAfter: params.now - AUTHORIZATION_SKEW_SECONDS,
    validBefore: params.now + ttl,
    ...(params.nonce ? { nonce: params.nonce } : {}),
  });

  return {
    receipt: {
      paymentId: params.paymentId
        ? normalizePaymentId(params.paymentId)
        : randomBytes32(),
      skuId: sku.skuId,
      agentId: sku.agentId,
      payer: params.account.address,
      amount: sku.price,
    },
    proof: {
      validAfter: signed.validAfter,
      validBefore: signed.validBefore,
      nonce: signed.nonce,
      signature: signed.signature,
    },
  };
}
