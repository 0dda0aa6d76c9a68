// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/contract/ports/settlement-ledger.port.contract`
 * Purpose: Reusable behavior suite every SettlementLedgerRepository adapter must pass.
 * Scope: Replay guard, entitlement and revenue ledgers, fee config and withdrawal nonces. Does NOT set up storage.
 * Invariants: Insert-if-absent burns; conditional debits; fee config seeded once from defaults.
 * Side-effects: depends on the adapter under test
 * Notes: Call runSettlementLedgerContract(factory) from an adapter spec; the factory must return an empty ledger.
 * Links: src/ports/settlement-ledger.port.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import type { SettlementRecord } from "@/core";
import type { SettlementLedgerRepository } from "@/ports";
import {
  AGENT_ID,
  newOwnerAccount,
  ownerAccount,
  PER_CALL_SKU_ID,
  paymentId,
  payerAccount,
  TREASURY_ADDRESS,
} from "@tests/_fakes";

const SETTLED_AT = new Date("2025-01-01T00:00:00.000Z");

function record(n: number): SettlementRecord {
  return {
    paymentId: paymentId(n),
    skuId: PER_CALL_SKU_ID,
    agentId: AGENT_ID,
    payer: payerAccount.address,
    amount: 10_000_000n,
    licenseType: "PER_CALL",
    owner: ownerAccount.address,
    treasury: TREASURY_ADDRESS,
    fee: 250_000n,
    net: 9_750_000n,
    settledAt: SETTLED_AT,
  };
}

const DEFAULTS = { feeBasisPoints: 250, treasuryAddress: TREASURY_ADDRESS };

export function runSettlementLedgerContract(
  makeLedger: () => Promise<SettlementLedgerRepository> | SettlementLedgerRepository
): void {
  describe("SettlementLedgerRepository contract", () => {
    it("burns a payment id exactly once", async () => {
      const ledger = await makeLedger();

      expect(await ledger.isPaymentConsumed(paymentId(1))).toBe(false);
      expect(await ledger.consumePaymentId(paymentId(1), SETTLED_AT)).toBe(true);
      expect(await ledger.consumePaymentId(paymentId(1), SETTLED_AT)).toBe(
        false
      );
      expect(await ledger.isPaymentConsumed(paymentId(1))).toBe(true);
      expect(await ledger.isPaymentConsumed(paymentId(2))).toBe(false);
    });

    it("treats payment ids case-insensitively", async () => {
      const ledger = await makeLedger();
      const id = `0x${"AB".repeat(32)}` as const;

      await ledger.consumePaymentId(id, SETTLED_AT);

      expect(await ledger.isPaymentConsumed(`0x${"ab".repeat(32)}`)).toBe(true);
    });

    it("applies a settlement to entitlements and balances together", async () => {
      const ledger = await makeLedger();

      const entitlement = await ledger.applySettlement({
        settlement: record(1),
        grant: { kind: "call" },
      });

      expect(entitlement.callCredits).toBe(1n);
      expect(await ledger.getBalance(ownerAccount.address)).toBe(9_750_000n);
      expect(await ledger.getBalance(TREASURY_ADDRESS)).toBe(250_000n);
      expect(await ledger.findSettlement(paymentId(1))).toEqual(record(1));
      expect(await ledger.findSettlement(paymentId(2))).toBeNull();
    });

    it("hands out entitlement copies, never the stored record", async () => {
      const ledger = await makeLedger();
      const applied = await ledger.applySettlement({
        settlement: record(1),
        grant: { kind: "call" },
      });
      const read = await ledger.getEntitlement(AGENT_ID, payerAccount.address);

      applied.callCredits = 50n;
      read.callCredits = 99n;
      read.validUntil = 99n;

      expect(
        await ledger.getEntitlement(AGENT_ID, payerAccount.address)
      ).toMatchObject({ callCredits: 1n, validUntil: 0n });
    });

    it("returns an empty entitlement for an unknown pair", async () => {
      const ledger = await makeLedger();

      expect(
        await ledger.getEntitlement(AGENT_ID, payerAccount.address)
      ).toEqual({
        agentId: AGENT_ID,
        payer: payerAccount.address,
        callCredits: 0n,
        validUntil: 0n,
      });
    });

    it("stacks period grants", async () => {
      const ledger = await makeLedger();
      const grant = { kind: "period" as const, periodSeconds: 100n, now: 1_000n };

      await ledger.applySettlement({ settlement: record(1), grant });
      const second = await ledger.applySettlement({
        settlement: record(2),
        grant,
      });

      expect(second.validUntil).toBe(1_200n);
    });

    it("consumes call credits down to zero, then refuses", async () => {
      const ledger = await makeLedger();
      expect(
        await ledger.consumeCallCredit(AGENT_ID, payerAccount.address)
      ).toBeNull();

      await ledger.applySettlement({
        settlement: record(1),
        grant: { kind: "call" },
      });

      const after = await ledger.consumeCallCredit(
        AGENT_ID,
        payerAccount.address
      );
      expect(after?.callCredits).toBe(0n);
      expect(
        await ledger.consumeCallCredit(AGENT_ID, payerAccount.address)
      ).toBeNull();
    });

    it("debits only what is there and credits back", async () => {
      const ledger = await makeLedger();
      await ledger.applySettlement({
        settlement: record(1),
        grant: { kind: "call" },
      });

      expect(
        await ledger.debitBalance(ownerAccount.address, 9_750_001n)
      ).toBeNull();
      expect(await ledger.debitBalance(ownerAccount.address, 750_000n)).toBe(
        9_000_000n
      );
      expect(await ledger.creditBalance(ownerAccount.address, 750_000n)).toBe(
        9_750_000n
      );
      expect(await ledger.debitBalance(newOwnerAccount.address, 1n)).toBeNull();
    });

    it("seeds the fee config once and applies patches", async () => {
      const ledger = await makeLedger();

      expect(await ledger.getFeeConfig(DEFAULTS)).toEqual(DEFAULTS);
      expect(
        await ledger.getFeeConfig({ ...DEFAULTS, feeBasisPoints: 999 })
      ).toEqual(DEFAULTS);

      const updated = await ledger.updateFeeConfig(
        { feeBasisPoints: 100 },
        DEFAULTS
      );
      expect(updated).toEqual({ ...DEFAULTS, feeBasisPoints: 100 });
      expect(await ledger.getFeeConfig(DEFAULTS)).toEqual(updated);
    });

    it("burns withdrawal nonces per beneficiary", async () => {
      const ledger = await makeLedger();
      const nonce = paymentId(50);

      expect(
        await ledger.consumeWithdrawalNonce(ownerAccount.address, nonce)
      ).toBe(true);
      expect(
        await ledger.consumeWithdrawalNonce(ownerAccount.address, nonce)
      ).toBe(false);
      expect(
        await ledger.consumeWithdrawalNonce(newOwnerAccount.address, nonce)
      ).toBe(true);
    });
  });
}
