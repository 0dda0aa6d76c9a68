// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/features/settlement/settle`
 * Purpose: Settlement engine behavior over in-process adapters: happy path, replay, validation, pull failures and ownership.
 * Scope: Drives settle() with the fake token, registries and in-memory ledger. Does NOT test HTTP.
 * Invariants:
 * - A payment id settles at most once; validation failures leave it unburned.
 * - A failed pull leaves the id burned and moves no funds or entitlements.
 * - Funds that reached custody without a settlement record are reported with their tx hash.
 * - Net revenue goes to the agent owner at settlement time.
 * Side-effects: none
 * Links: src/features/settlement/services/settle.ts
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

import {
  AmountMismatchError,
  FundsPullError,
  InactiveSkuError,
  ReplayError,
  SettlementIncompleteError,
  UnauthorizedCallerError,
  UnknownAgentError,
} from "@/core";
import { setFeeBasisPoints, settle } from "@/features/settlement/public";
import {
  AGENT_ID,
  bytes32,
  CUSTODY_ADDRESS,
  DAY_SECONDS,
  makeSettlementHarness,
  makeSku,
  newOwnerAccount,
  ownerAccount,
  PER_PERIOD_SKU_ID,
  payerAccount,
  type SettlementHarness,
  strangerAccount,
  TREASURY_ADDRESS,
} from "@tests/_fakes";

describe("settle", () => {
  let h: SettlementHarness;

  beforeEach(() => {
    h = makeSettlementHarness();
  });

  it("pulls funds, grants a call credit and splits revenue", async () => {
    const { receipt, proof } = await h.paidReceipt(1);

    const result = await settle(h.deps, h.facilitator, receipt, proof);

    expect(result).toEqual({
      paymentId: receipt.paymentId,
      txHash: `0x${"1".padStart(64, "0")}`,
      owner: ownerAccount.address,
      treasury: TREASURY_ADDRESS,
      fee: 250_000n,
      net: 9_750_000n,
      entitlement: {
        agentId: AGENT_ID,
        payer: payerAccount.address,
        callCredits: 1n,
        validUntil: 0n,
      },
    });
    expect(h.token.balanceOf(payerAccount.address)).toBe(90_000_000n);
    expect(h.token.balanceOf(CUSTODY_ADDRESS)).toBe(10_000_000n);
    expect(await h.ledger.getBalance(ownerAccount.address)).toBe(9_750_000n);
    expect(await h.ledger.getBalance(TREASURY_ADDRESS)).toBe(250_000n);
    expect(h.events.types()).toEqual([
      "settlement.receipt_anchored",
      "settlement.entitlement_granted",
      "settlement.revenue_accrued",
    ]);
  });

  it("forwards the authorization unmodified to the token", async () => {
    const { receipt, proof } = await h.paidReceipt(1);

    await settle(h.deps, h.facilitator, receipt, proof);

    expect(h.token.lastPullParams).toEqual({
      from: payerAccount.address,
      to: CUSTODY_ADDRESS,
      amount: 10_000_000n,
      proof,
    });
  });

  it("rejects a second settlement of the same payment id", async () => {
    const first = await h.paidReceipt(1);
    await settle(h.deps, h.facilitator, first.receipt, first.proof);

    const retryProof = await h.authorize({ amount: first.receipt.amount });
    await expect(
      settle(h.deps, h.facilitator, first.receipt, retryProof)
    ).rejects.toBeInstanceOf(ReplayError);

    expect(h.token.balanceOf(payerAccount.address)).toBe(90_000_000n);
    expect(
      (await h.ledger.getEntitlement(AGENT_ID, payerAccount.address))
        .callCredits
    ).toBe(1n);
  });

  it("checks replay before SKU state", async () => {
    const { receipt, proof } = await h.paidReceipt(1);
    await settle(h.deps, h.facilitator, receipt, proof);
    h.skus.setActive(receipt.skuId, false);

    await expect(
      settle(h.deps, h.facilitator, receipt, proof)
    ).rejects.toBeInstanceOf(ReplayError);
  });

  it("lets exactly one of two concurrent settlements of an id through", async () => {
    const { receipt, proof } = await h.paidReceipt(1);
    const otherProof = await h.authorize({ amount: receipt.amount });

    const outcomes = await Promise.allSettled([
      settle(h.deps, h.facilitator, receipt, proof),
      settle(h.deps, h.facilitator, receipt, otherProof),
    ]);

    const fulfilled = outcomes.filter((o) => o.status === "fulfilled");
    const rejected = outcomes.filter(
      (o): o is PromiseRejectedResult => o.status === "rejected"
    );
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]?.reason).toBeInstanceOf(ReplayError);
    expect(h.token.balanceOf(payerAccount.address)).toBe(90_000_000n);
  });

  it("rejects an inactive SKU without burning the id", async () => {
    const { receipt, proof } = await h.paidReceipt(1);
    h.skus.setActive(receipt.skuId, false);

    await expect(
      settle(h.deps, h.facilitator, receipt, proof)
    ).rejects.toBeInstanceOf(InactiveSkuError);

    expect(h.ledger.consumedCount).toBe(0);
    expect(h.token.balanceOf(payerAccount.address)).toBe(100_000_000n);
    expect(h.events.events).toHaveLength(0);
  });

  it("rejects an underpaying receipt before any funds move", async () => {
    const { receipt } = await h.paidReceipt(1);
    const underpaid = { ...receipt, amount: 9_000_000n };
    const proof = await h.authorize({ amount: 9_000_000n });

    await expect(
      settle(h.deps, h.facilitator, underpaid, proof)
    ).rejects.toBeInstanceOf(AmountMismatchError);

    expect(h.token.balanceOf(payerAccount.address)).toBe(100_000_000n);
    expect(h.token.balanceOf(CUSTODY_ADDRESS)).toBe(0n);
    expect(await h.ledger.isPaymentConsumed(receipt.paymentId)).toBe(false);
    expect(h.events.events).toHaveLength(0);
  });

  it("rejects an unregistered agent without burning the id", async () => {
    h.skus.register(makeSku({ skuId: 5n, agentId: 8n }));
    const { receipt, proof } = await h.paidReceipt(1, 5n);

    await expect(
      settle(h.deps, h.facilitator, { ...receipt, agentId: 8n }, proof)
    ).rejects.toBeInstanceOf(UnknownAgentError);
    expect(h.ledger.consumedCount).toBe(0);
  });

  it("keeps the id burned when the pull fails", async () => {
    const { receipt } = await h.paidReceipt(1);
    const expired = await h.authorize({
      amount: receipt.amount,
      validBefore: h.nowSeconds() - 1n,
    });

    const error = await settle(h.deps, h.facilitator, receipt, expired).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(FundsPullError);
    if (error instanceof FundsPullError) {
      expect(error.reason).toBe("EXPIRED");
      expect(error.paymentId).toBe(receipt.paymentId);
    }
    expect(await h.ledger.isPaymentConsumed(receipt.paymentId)).toBe(true);
    expect(await h.ledger.getBalance(ownerAccount.address)).toBe(0n);
    expect(
      (await h.ledger.getEntitlement(AGENT_ID, payerAccount.address))
        .callCredits
    ).toBe(0n);
    expect(h.events.events).toHaveLength(0);

    const fresh = await h.authorize({ amount: receipt.amount });
    await expect(
      settle(h.deps, h.facilitator, receipt, fresh)
    ).rejects.toBeInstanceOf(ReplayError);
  });

  it("reports pulled funds when the settlement cannot be recorded", async () => {
    const { receipt, proof } = await h.paidReceipt(1);
    vi.spyOn(h.ledger, "applySettlement").mockRejectedValue(
      new Error("connection reset")
    );

    const error = await settle(h.deps, h.facilitator, receipt, proof).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(SettlementIncompleteError);
    expect(error).toMatchObject({
      code: "SETTLEMENT_INCOMPLETE",
      paymentId: receipt.paymentId,
      txHash: bytes32(1),
    });
    expect(h.token.balanceOf(CUSTODY_ADDRESS)).toBe(10_000_000n);
    expect(await h.ledger.isPaymentConsumed(receipt.paymentId)).toBe(true);
    expect(h.events.events).toEqual([
      {
        type: "settlement.apply_failed",
        paymentId: receipt.paymentId,
        agentId: AGENT_ID,
        payer: receipt.payer,
        amount: 10_000_000n,
        txHash: bytes32(1),
        detail: "connection reset",
      },
    ]);
  });

  it("reports a pull that was broadcast but never confirmed", async () => {
    const { receipt, proof } = await h.paidReceipt(1);
    h.token.setConfirmationFailure("receipt timeout");

    await expect(
      settle(h.deps, h.facilitator, receipt, proof)
    ).rejects.toMatchObject({
      code: "SETTLEMENT_INCOMPLETE",
      txHash: bytes32(1),
    });

    expect(await h.ledger.getBalance(ownerAccount.address)).toBe(0n);
    expect(h.events.ofType("settlement.apply_failed")).toMatchObject([
      {
        paymentId: receipt.paymentId,
        txHash: bytes32(1),
        detail: "receipt timeout",
      },
    ]);
  });

  it("maps a signature from someone other than the payer", async () => {
    const { receipt } = await h.paidReceipt(1);
    const forged = await h.authorize({
      amount: receipt.amount,
      account: strangerAccount,
    });

    await expect(
      settle(h.deps, h.facilitator, receipt, forged)
    ).rejects.toMatchObject({
      code: "FUNDS_PULL_FAILED",
      reason: "INVALID_SIGNATURE",
    });
  });

  it("maps a payer without funds", async () => {
    const { receipt, proof } = await h.paidReceipt(1);
    h.token.reset();

    await expect(
      settle(h.deps, h.facilitator, receipt, proof)
    ).rejects.toMatchObject({ reason: "INSUFFICIENT_FUNDS" });
  });

  it("rejects a not-yet-valid authorization", async () => {
    const { receipt } = await h.paidReceipt(1);
    const early = await h.authorize({
      amount: receipt.amount,
      validAfter: h.nowSeconds() + 10n,
    });

    await expect(
      settle(h.deps, h.facilitator, receipt, early)
    ).rejects.toMatchObject({ reason: "NOT_YET_VALID" });
  });

  it("pays whoever owns the agent at settlement time", async () => {
    const first = await h.paidReceipt(1);
    await settle(h.deps, h.facilitator, first.receipt, first.proof);

    h.identity.transferOwnership(AGENT_ID, newOwnerAccount.address);
    const second = await h.paidReceipt(2);
    const result = await settle(
      h.deps,
      h.facilitator,
      second.receipt,
      second.proof
    );

    expect(result.owner).toBe(newOwnerAccount.address);
    expect(await h.ledger.getBalance(ownerAccount.address)).toBe(9_750_000n);
    expect(await h.ledger.getBalance(newOwnerAccount.address)).toBe(
      9_750_000n
    );
  });

  it("stacks period purchases from the end of the running window", async () => {
    const start = h.nowSeconds();
    const first = await h.paidReceipt(1, PER_PERIOD_SKU_ID);
    const r1 = await settle(h.deps, h.facilitator, first.receipt, first.proof);
    expect(r1.entitlement.validUntil).toBe(start + DAY_SECONDS);
    expect(r1.fee).toBe(25_000n);
    expect(r1.net).toBe(975_000n);

    h.clock.advanceSeconds(3_600);
    const second = await h.paidReceipt(2, PER_PERIOD_SKU_ID);
    const r2 = await settle(
      h.deps,
      h.facilitator,
      second.receipt,
      second.proof
    );
    expect(r2.entitlement.validUntil).toBe(start + 2n * DAY_SECONDS);
  });

  it("applies the fee in force at settlement time", async () => {
    await setFeeBasisPoints(h.deps, h.admin, 1_000);
    const { receipt, proof } = await h.paidReceipt(1);

    const result = await settle(h.deps, h.facilitator, receipt, proof);

    expect(result.fee).toBe(1_000_000n);
    expect(result.net).toBe(9_000_000n);
  });

  it.each([
    { kind: "anonymous" as const },
    { kind: "admin" as const, id: "ops" },
  ])("refuses a $kind caller", async (caller) => {
    const { receipt, proof } = await h.paidReceipt(1);

    await expect(
      settle(h.deps, caller, receipt, proof)
    ).rejects.toBeInstanceOf(UnauthorizedCallerError);
    expect(h.ledger.consumedCount).toBe(0);
  });
});
