// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/events/pino-event-sink`
 * Purpose: SettlementEventSink that writes each domain event as a structured log line and feeds revenue metrics.
 * Scope: Serialization to pino and counter increments. Does not deliver to external brokers.
 * Invariants: bigint fields are written as decimal strings; the event type is the `event` key; reconciliation events log at error.
 * Side-effects: IO (logging), global (prom-client counters)
 * Links: Implements SettlementEventSink port
 * @public
 */

import type { SettlementEvent, SettlementEventSink } from "@/ports";
import type { Logger } from "@/shared/observability";
import { settlementRevenueUnitsTotal } from "@/shared/observability";

type Serialized = Record<string, string | number | boolean | null>;

const RECONCILIATION_EVENTS: ReadonlySet<string> = new Set<
  SettlementEvent["type"]
>([
  "settlement.apply_failed",
  "revenue.withdrawal_unconfirmed",
]);

export function serializeEvent(event: SettlementEvent): Serialized {
  const out: Serialized = {};
  for (const [field, value] of Object.entries(event)) {
    if (field === "type") continue;
    out[field] = typeof value === "bigint" ? value.toString() : value;
  }
  return out;
}

export class PinoSettlementEventSink implements SettlementEventSink {
  constructor(private readonly log: Logger) {}

  publish(event: SettlementEvent): void {
    if (event.type === "settlement.revenue_accrued") {
      // prom-client counters take numbers; USDC base units stay exact below 2^53
      settlementRevenueUnitsTotal.inc({ kind: "net" }, Number(event.net));
      settlementRevenueUnitsTotal.inc({ kind: "fee" }, Number(event.fee));
    }
    const fields = { event: event.type, ...serializeEvent(event) };
    if (RECONCILIATION_EVENTS.has(event.type)) {
      this.log.error(fields, event.type);
      return;
    }
    this.log.info(fields, event.type);
  }
}
