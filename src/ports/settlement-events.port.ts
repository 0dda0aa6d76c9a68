// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/settlement-events`
 * Purpose: Side channel for settlement, metering, withdrawal and admin events.
 * Scope: Event shapes and the sink interface. Does not define transport.
 * Invariants:
 * - Events are published only after the state they describe is committed.
 * - `*.apply_failed` and `*_unconfirmed` events mark funds that moved (or may have) without a matching ledger record.
 * Side-effects: none (interface definition only)
 * Links: PinoSettlementEventSink, RecordingEventSink
 * @public
 */

import type { AccountAddress, HexString, LicenseType } from "@/core";

export type SettlementEvent =
  | {
      type: "settlement.receipt_anchored";
      paymentId: HexString;
      skuId: bigint;
      agentId: bigint;
      payer: AccountAddress;
      amount: bigint;
      txHash: HexString;
    }
  | {
      type: "settlement.entitlement_granted";
      paymentId: HexString;
      agentId: bigint;
      payer: AccountAddress;
      licenseType: LicenseType;
      callCredits: bigint;
      validUntil: bigint;
    }
  | {
      type: "settlement.revenue_accrued";
      paymentId: HexString;
      owner: AccountAddress;
      net: bigint;
      treasury: AccountAddress;
      fee: bigint;
    }
  | {
      type: "settlement.apply_failed";
      paymentId: HexString;
      agentId: bigint;
      payer: AccountAddress;
      amount: bigint;
      txHash: HexString;
      detail: string;
    }
  | {
      type: "metering.call_consumed";
      agentId: bigint;
      payer: AccountAddress;
      remainingCredits: bigint;
    }
  | {
      type: "revenue.withdrawn";
      beneficiary: AccountAddress;
      to: AccountAddress;
      amount: bigint;
      txHash: HexString;
    }
  | {
      type: "revenue.withdrawal_unconfirmed";
      beneficiary: AccountAddress;
      to: AccountAddress;
      amount: bigint;
      pendingTxHash: HexString | null;
      detail: string;
    }
  | {
      type: "admin.fee_updated";
      previousFeeBasisPoints: number;
      feeBasisPoints: number;
    }
  | {
      type: "admin.treasury_updated";
      previousTreasury: AccountAddress;
      treasuryAddress: AccountAddress;
    };

export type SettlementEventType = SettlementEvent["type"];

export interface SettlementEventSink {
  publish(event: SettlementEvent): void;
}
