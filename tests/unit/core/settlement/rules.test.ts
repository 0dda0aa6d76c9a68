// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/core/settlement/rules`
 * Purpose: Unit tests for settlement intake rules: SKU offer checks, receipt validation order and revenue split.
 * Scope: Pure domain logic. Does not test adapters or services.
 * Invariants: fee + net === amount; first failing check wins in the documented order.
 * Side-effects: none (unit tests only)
 * Links: src/core/settlement/rules.ts
 */

import { describe, expect, it } from "vitest";

import {
  AmountMismatchError,
  assertReceiptMatchesSku,
  assertValidFeeBasisPoints,
  InactiveSkuError,
  InvalidFeeError,
  InvalidPayerError,
  isSettlementDomainError,
  isUsableAddress,
  MAX_FEE_BASIS_POINTS,
  sameAddress,
  SkuMismatchError,
  splitRevenue,
  toUnixSeconds,
  WrongTokenError,
} from "@/core";
import {
  makeReceipt,
  makeSku,
  OTHER_TOKEN_ADDRESS,
  USDC_ADDRESS,
  ZERO,
} from "@tests/_fakes";

describe("splitRevenue", () => {
  it("takes 2.5% of 10 USDC as fee", () => {
    expect(splitRevenue(10_000_000n, 250)).toEqual({
      fee: 250_000n,
      net: 9_750_000n,
    });
  });

  it("floors the fee and gives the remainder to the owner", () => {
    expect(splitRevenue(999n, 2_000)).toEqual({ fee: 199n, net: 800n });
  });

  it("sends everything to the owner at zero fee", () => {
    expect(splitRevenue(1_234_567n, 0)).toEqual({ fee: 0n, net: 1_234_567n });
  });

  it("handles a zero amount", () => {
    expect(splitRevenue(0n, 250)).toEqual({ fee: 0n, net: 0n });
  });

  it("rejects a fee above the cap", () => {
    expect(() => splitRevenue(100n, MAX_FEE_BASIS_POINTS + 1)).toThrow(
      InvalidFeeError
    );
  });

  it("rejects a negative amount", () => {
    expect(() => splitRevenue(-1n, 250)).toThrow(RangeError);
  });

  it("always conserves the amount", () => {
    for (const amount of [1n, 7n, 10_001n, 123_456_789n]) {
      for (const bps of [0, 1, 250, 1_999, 2_000]) {
        const { fee, net } = splitRevenue(amount, bps);
        expect(fee + net).toBe(amount);
      }
    }
  });
});

describe("assertValidFeeBasisPoints", () => {
  it("accepts the bounds", () => {
    expect(() => assertValidFeeBasisPoints(0)).not.toThrow();
    expect(() => assertValidFeeBasisPoints(2_000)).not.toThrow();
  });

  it.each([-1, 2_001, 12.5, Number.NaN])("rejects %s", (bps) => {
    expect(() => assertValidFeeBasisPoints(bps)).toThrow(InvalidFeeError);
  });
});

describe("assertReceiptMatchesSku", () => {
  it("returns the SKU for a matching receipt", () => {
    const sku = makeSku();
    expect(assertReceiptMatchesSku(makeReceipt(), sku, USDC_ADDRESS)).toBe(sku);
  });

  it("treats an unknown SKU as inactive", () => {
    expect(() =>
      assertReceiptMatchesSku(makeReceipt(), null, USDC_ADDRESS)
    ).toThrow(InactiveSkuError);
  });

  it("rejects an inactive SKU before any other check", () => {
    const sku = makeSku({ active: false, agentId: 99n, price: 1n });
    expect(() =>
      assertReceiptMatchesSku(makeReceipt({ payer: ZERO }), sku, USDC_ADDRESS)
    ).toThrow(InactiveSkuError);
  });

  it("checks agent before token", () => {
    const sku = makeSku({ agentId: 99n, pricingToken: OTHER_TOKEN_ADDRESS });
    expect(() =>
      assertReceiptMatchesSku(makeReceipt(), sku, USDC_ADDRESS)
    ).toThrow(SkuMismatchError);
  });

  it("checks token before amount", () => {
    const sku = makeSku({ pricingToken: OTHER_TOKEN_ADDRESS });
    expect(() =>
      assertReceiptMatchesSku(
        makeReceipt({ amount: 1n }),
        sku,
        USDC_ADDRESS
      )
    ).toThrow(WrongTokenError);
  });

  it("requires the exact price", () => {
    let caught: unknown;
    try {
      assertReceiptMatchesSku(
        makeReceipt({ amount: 9_000_000n }),
        makeSku(),
        USDC_ADDRESS
      );
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(AmountMismatchError);
    expect(isSettlementDomainError(caught)).toBe(true);
    if (caught instanceof AmountMismatchError) {
      expect(caught.price).toBe(10_000_000n);
      expect(caught.amount).toBe(9_000_000n);
    }
  });

  it("rejects an overpayment too", () => {
    expect(() =>
      assertReceiptMatchesSku(
        makeReceipt({ amount: 10_000_001n }),
        makeSku(),
        USDC_ADDRESS
      )
    ).toThrow(AmountMismatchError);
  });

  it("rejects the zero payer last", () => {
    expect(() =>
      assertReceiptMatchesSku(
        makeReceipt({ payer: ZERO }),
        makeSku(),
        USDC_ADDRESS
      )
    ).toThrow(InvalidPayerError);
  });

  it("compares token addresses case-insensitively", () => {
    const sku = makeSku({ pricingToken: USDC_ADDRESS.toUpperCase().replace("0X", "0x") });
    expect(() =>
      assertReceiptMatchesSku(makeReceipt(), sku, USDC_ADDRESS)
    ).not.toThrow();
  });
});

describe("address helpers", () => {
  it("sameAddress ignores case", () => {
    expect(
      sameAddress(
        "0x000000000000000000000000000000000000dEaD",
        "0x000000000000000000000000000000000000dead"
      )
    ).toBe(true);
  });

  it("isUsableAddress rejects zero, short and empty values", () => {
    expect(isUsableAddress(USDC_ADDRESS)).toBe(true);
    expect(isUsableAddress(ZERO)).toBe(false);
    expect(isUsableAddress("0x1234")).toBe(false);
    expect(isUsableAddress("")).toBe(false);
    expect(isUsableAddress(undefined)).toBe(false);
  });
});

describe("toUnixSeconds", () => {
  it("floors milliseconds", () => {
    expect(toUnixSeconds("2025-01-01T00:00:00.999Z")).toBe(1_735_689_600n);
  });

  it("rejects garbage", () => {
    expect(() => toUnixSeconds("not-a-date")).toThrow(RangeError);
  });
});
