// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/settlement.settle.v1.contract`
 * Purpose: Contract for POST /v1/settlements, submitted by the facilitator.
 * Scope: Receipt plus EIP-3009 authorization fields. Does not authenticate.
 * Invariants: uint256 fields are decimal strings; usdcAuth is forwarded to the token unmodified.
 * Side-effects: none
 * Links: features/settlement/services/settle, features/payer/services/facilitatorClient
 * @public
 */

import { z } from "zod";

import {
  addressSchema,
  bytes32Schema,
  hexOutputSchema,
  paymentIdSchema,
  signatureSchema,
  uintOutputSchema,
  uintStringSchema,
} from "./wire.v1";

export const usdcAuthSchema = z.object({
  validAfter: uintStringSchema,
  validBefore: uintStringSchema,
  nonce: bytes32Schema,
  signature: signatureSchema,
});

export const settleOperation = {
  id: "settlement.settle.v1",
  summary: "Settle a paid receipt",
  description:
    "Consumes the payment id, pulls the authorized USDC into custody, grants the entitlement and splits revenue between agent owner and treasury.",
  input: z.object({
    paymentId: paymentIdSchema,
    skuId: uintStringSchema,
    agentId: uintStringSchema,
    payer: addressSchema,
    amount: uintStringSchema,
    usdcAuth: usdcAuthSchema,
  }),
  output: z.object({
    paymentId: hexOutputSchema,
    txHash: hexOutputSchema,
    owner: hexOutputSchema,
    treasury: hexOutputSchema,
    fee: uintOutputSchema,
    net: uintOutputSchema,
    entitlement: z.object({
      callCredits: uintOutputSchema,
      validUntil: uintOutputSchema,
    }),
  }),
} as const;

export type SettleInput = z.infer<typeof settleOperation.input>;
/** Wire shape before parsing (what a facilitator sends) */
export type SettleRequestBody = z.input<typeof settleOperation.input>;
export type SettleOutput = z.infer<typeof settleOperation.output>;
