// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/payer/api/facilitatorClient`
 * Purpose: Typed HTTP client that submits a payment intent to POST /v1/settlements.
 * Scope: Wire serialization (bigint → decimal string) and response parsing. Does not retry.
 * Invariants: Always parses the body so server error codes surface in FacilitatorHttpError.body.
 * Side-effects: IO (fetch)
 * Links: contracts/settlement.settle.v1.contract
 * @public
 */

import {
  type SettleOutput,
  type SettleRequestBody,
  settleOperation,
} from "@/contracts/settlement.settle.v1.contract";

import { FacilitatorHttpError } from "../errors";
import type { PaymentIntent } from "../services/paymentIntent";

export interface FacilitatorClientOptions {
  baseUrl: string;
  /** Bearer token for the facilitator capability */
  apiToken?: string;
  fetch?: typeof fetch;
}

export function toSettleRequestBody(intent: PaymentIntent): SettleRequestBody {
  const { receipt, proof } = intent;
  return {
    paymentId: receipt.paymentId,
    skuId: receipt.skuId.toString(),
    agentId: receipt.agentId.toString(),
    payer: receipt.payer,
    amount: receipt.amount.toString(),
    usdcAuth: {
      validAfter: proof.validAfter.toString(),
      validBefore: proof.validBefore.toString(),
      nonce: proof.nonce,
      signature: proof.signature,
    },
  };
}

async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * @throws FacilitatorHttpError on any non-2xx response
 */
export async function submitToFacilitator(
  intent: PaymentIntent,
  options: FacilitatorClientOptions
): Promise<SettleOutput> {
  const doFetch = options.fetch ?? fetch;
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
  };
  if (options.apiToken) {
    headers.Authorization = `Bearer ${options.apiToken}`;
  }

  const res = await doFetch(
    new URL("/v1/settlements", options.baseUrl).toString(),
    {
      method: "POST",
      headers,
      body: JSON.stringify(toSettleRequestBody(intent)),
    }
  );
  const body = await readBody(res);

  if (!res.ok) {
    throw new FacilitatorHttpError(res.status, body);
  }
  return settleOperation.output.parse(body);
}
