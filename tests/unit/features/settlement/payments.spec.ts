// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/features/settlement/payments`
 * Purpose: Payment-id status, authorization nonce state and SKU verification reads.
 * Scope: Read-only services. Does NOT settle except to set up state.
 * Side-effects: none
 * Links: src/features/settlement/services/payments.ts, src/features/settlement/services/verifySku.ts
 */

import { beforeEach, describe, expect, it } from "vitest";

import { InactiveSkuError, SkuMismatchError } from "@/core";
import {
  getAuthorizationState,
  getPaymentStatus,
  settle,
  verifySku,
} from "@/features/settlement/public";
import {
  AGENT_ID,
  makeSettlementHarness,
  ownerAccount,
  PER_CALL_SKU_ID,
  paymentId,
  payerAccount,
  type SettlementHarness,
  TREASURY_ADDRESS,
  USDC_ADDRESS,
} from "@tests/_fakes";

describe("getPaymentStatus", () => {
  let h: SettlementHarness;

  beforeEach(() => {
    h = makeSettlementHarness();
  });

  it("reports an unseen id as unconsumed", async () => {
    expect(await getPaymentStatus(h.ledger, paymentId(9))).toEqual({
      paymentId: paymentId(9),
      consumed: false,
      settlement: null,
    });
  });

  it("returns the anchored receipt after settlement", async () => {
    const { receipt, proof } = await h.paidReceipt(1);
    await settle(h.deps, h.facilitator, receipt, proof);

    expect(await getPaymentStatus(h.ledger, receipt.paymentId)).toEqual({
      paymentId: receipt.paymentId,
      consumed: true,
      settlement: {
        paymentId: receipt.paymentId,
        skuId: PER_CALL_SKU_ID,
        agentId: AGENT_ID,
        payer: payerAccount.address,
        amount: 10_000_000n,
        licenseType: "PER_CALL",
        owner: ownerAccount.address,
        treasury: TREASURY_ADDRESS,
        fee: 250_000n,
        net: 9_750_000n,
        settledAt: new Date("2025-01-01T00:00:00.000Z"),
      },
    });
  });

  it("shows a burned id with no settlement after a failed pull", async () => {
    const { receipt } = await h.paidReceipt(1);
    const expired = await h.authorize({
      amount: receipt.amount,
      validBefore: h.nowSeconds(),
    });
    await expect(
      settle(h.deps, h.facilitator, receipt, expired)
    ).rejects.toMatchObject({ code: "FUNDS_PULL_FAILED" });

    const status = await getPaymentStatus(h.ledger, receipt.paymentId);
    expect(status.consumed).toBe(true);
    expect(status.settlement).toBeNull();
  });
});

describe("getAuthorizationState", () => {
  it("flips to used once the token consumes the nonce", async () => {
    const h = makeSettlementHarness();
    const { receipt, proof } = await h.paidReceipt(1);

    expect(
      (await getAuthorizationState(h.token, payerAccount.address, proof.nonce))
        .used
    ).toBe(false);
    await settle(h.deps, h.facilitator, receipt, proof);
    expect(
      await getAuthorizationState(h.token, payerAccount.address, proof.nonce)
    ).toEqual({ payer: payerAccount.address, nonce: proof.nonce, used: true });
  });
});

describe("verifySku", () => {
  it("returns an offered SKU", async () => {
    const h = makeSettlementHarness();
    const sku = await verifySku(
      h.skus,
      { skuId: PER_CALL_SKU_ID, agentId: AGENT_ID },
      USDC_ADDRESS
    );
    expect(sku.price).toBe(10_000_000n);
  });

  it("rejects an inactive or foreign SKU", async () => {
    const h = makeSettlementHarness();
    await expect(
      verifySku(h.skus, { skuId: PER_CALL_SKU_ID, agentId: 8n }, USDC_ADDRESS)
    ).rejects.toBeInstanceOf(SkuMismatchError);

    h.skus.setActive(PER_CALL_SKU_ID, false);
    await expect(
      verifySku(
        h.skus,
        { skuId: PER_CALL_SKU_ID, agentId: AGENT_ID },
        USDC_ADDRESS
      )
    ).rejects.toBeInstanceOf(InactiveSkuError);
  });
});
