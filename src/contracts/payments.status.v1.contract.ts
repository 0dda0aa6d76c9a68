// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/payments.status.v1.contract`
 * Purpose: Contracts for payment id and token authorization status.
 * Scope: GET /v1/payments/:paymentId and GET /v1/authorizations/:payer/:nonce.
 * Invariants: consumed=true with settlement=null means the id was burned but funds were not settled.
 * Side-effects: none
 * @public
 */

import { z } from "zod";

import {
  addressSchema,
  bytes32Schema,
  hexOutputSchema,
  paymentIdSchema,
  uintOutputSchema,
} from "./wire.v1";

export const settlementRecordOutputSchema = z.object({
  paymentId: hexOutputSchema,
  skuId: uintOutputSchema,
  agentId: uintOutputSchema,
  payer: hexOutputSchema,
  amount: uintOutputSchema,
  licenseType: z.enum(["PER_CALL", "PER_PERIOD"]),
  owner: hexOutputSchema,
  treasury: hexOutputSchema,
  fee: uintOutputSchema,
  net: uintOutputSchema,
  settledAt: z.string(),
});

export const paymentStatusOperation = {
  id: "payments.status.v1",
  summary: "Payment id status",
  description:
    "Whether a payment id has been consumed, with its settlement record when one was written.",
  input: z.object({ paymentId: paymentIdSchema }),
  output: z.object({
    paymentId: hexOutputSchema,
    consumed: z.boolean(),
    settlement: settlementRecordOutputSchema.nullable(),
  }),
} as const;

export const authorizationStateOperation = {
  id: "authorizations.state.v1",
  summary: "Token authorization nonce state",
  description:
    "Whether the token has already used an authorization nonce for the payer.",
  input: z.object({ payer: addressSchema, nonce: bytes32Schema }),
  output: z.object({
    payer: hexOutputSchema,
    nonce: hexOutputSchema,
    used: z.boolean(),
  }),
} as const;

export type PaymentStatusOutput = z.infer<typeof paymentStatusOperation.output>;
export type AuthorizationStateOutput = z.infer<
  typeof authorizationStateOperation.output
>;
