// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/web3/identifiers`
 * Purpose: Address, payment-id and license-type conversions at the chain boundary.
 * Scope: Pure helpers.
 * Side-effects: none
 * Links: src/shared/web3/identifiers.ts
 */

import { keccak256, stringToHex } from "viem";
import { describe, expect, it } from "vitest";

import {
  decodeLicenseType,
  encodeLicenseType,
  isAccountAddress,
  isSignatureHex,
  normalizeAddress,
  normalizePaymentId,
} from "@/shared/web3";
import { bytes32 } from "@tests/_fakes";

describe("addresses", () => {
  it("checksums lowercase input", () => {
    expect(normalizeAddress("0x000000000000000000000000000000000000dead")).toBe(
      "0x000000000000000000000000000000000000dEaD"
    );
  });

  it("accepts any casing but not a short value", () => {
    expect(isAccountAddress("0x000000000000000000000000000000000000DEAD")).toBe(
      true
    );
    expect(isAccountAddress("0xdead")).toBe(false);
  });
});

describe("normalizePaymentId", () => {
  it("keeps a bytes32 value", () => {
    expect(normalizePaymentId(bytes32(7))).toBe(bytes32(7));
  });

  it("hashes anything else", () => {
    expect(normalizePaymentId("invoice-7")).toBe(
      keccak256(stringToHex("invoice-7"))
    );
  });
});

describe("isSignatureHex", () => {
  it("requires at least 65 bytes of hex", () => {
    expect(isSignatureHex(`0x${"ab".repeat(65)}`)).toBe(true);
    expect(isSignatureHex(`0x${"ab".repeat(64)}`)).toBe(false);
    expect(isSignatureHex(`0x${"zz".repeat(65)}`)).toBe(false);
  });
});

describe("license type codes", () => {
  it("maps 0 and 1 both ways", () => {
    expect(decodeLicenseType(0)).toBe("PER_CALL");
    expect(decodeLicenseType(1)).toBe("PER_PERIOD");
    expect(encodeLicenseType("PER_PERIOD")).toBe(1);
  });

  it("rejects unknown codes", () => {
    expect(() => decodeLicenseType(2)).toThrow(RangeError);
  });
});
